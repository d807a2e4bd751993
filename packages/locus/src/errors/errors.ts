const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

/** Where a lookup was attempted. */
export type LookupLocation = 'registry' | 'tree';

const describeName = (name: string | null | undefined): string =>
  name === null || name === undefined ? 'no name' : `name '${name}'`;

/**
 * Base class of every error thrown by the locator.
 */
export class LocatorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LocatorError';
  }
}

/**
 * Malformed construction or conflicting options.
 */
export class ConfigurationError extends LocatorError {
  constructor(public reason: string) {
    const dev = ['Invalid locator configuration', '', reason];
    super(format(`Invalid locator configuration: ${reason}`, dev));
    this.name = 'ConfigurationError';
  }
}

export class AlreadyRegisteredError extends LocatorError {
  constructor(
    public typeLabel: string,
    public registeredName: string | null,
    public location: LookupLocation
  ) {
    const head =
      location === 'registry'
        ? `'${typeLabel}' with ${describeName(registeredName)} is already registered.`
        : `A tree node already binds '${typeLabel}'.`;

    const dev =
      location === 'registry'
        ? [
            head,
            '',
            'Only one object per type and name can live in the registry.',
            '',
            'Possible causes:',
            `  1. Two bindings publish '${typeLabel}' without distinct names`,
            '  2. A binding group was mounted twice without an idempotency key',
            '  3. The object was meant for the tree (location: tree) but was placed in the registry',
          ]
        : [
            head,
            '',
            'Each node may bind a given type once. Bind the second instance on a child node instead.',
          ];

    super(format(head, dev));
    this.name = 'AlreadyRegisteredError';
  }
}

/**
 * Registry lookup miss. The message points at the tree as the other place the
 * object may have been published.
 */
export class NotRegisteredError extends LocatorError {
  readonly location = 'registry' as const;

  constructor(
    public typeLabel: string,
    public registeredName: string | null,
    public registeredNames: readonly (string | null)[] = []
  ) {
    const head = `'${typeLabel}' with ${describeName(registeredName)} is not registered.`;
    const parts: string[] = [head, ''];

    if (registeredNames.length > 0) {
      parts.push(`Registered names for '${typeLabel}':`);
      registeredNames.forEach((n) => parts.push(`  - ${n === null ? '(unnamed)' : n}`));
      parts.push('');
    }

    parts.push(
      'Possible causes:',
      `  1. '${typeLabel}' was bound in the tree (location: tree), so the registry never saw it.`,
      '     Resolve it from a tree position instead, or promote the binding.',
      '  2. The owning node was already unmounted.',
      '  3. The name does not match the one used at registration.'
    );

    super(format(head, parts));
    this.name = 'NotRegisteredError';
  }
}

/**
 * Tree walk miss: no ancestor binds the requested type.
 */
export class NotFoundError extends LocatorError {
  readonly location = 'tree' as const;

  constructor(
    public typeLabel: string,
    message?: string
  ) {
    const head = message ?? `No ancestor binding of '${typeLabel}' was found in the tree.`;
    const dev = [
      head,
      '',
      'Possible causes:',
      `  1. '${typeLabel}' was placed in the registry (location: registry). Look it up there instead.`,
      '  2. The resolving position is not a descendant of the binding node.',
      '  3. The binding node has already been unmounted.',
    ];
    super(format(head, message ? [head] : dev));
    this.name = 'NotFoundError';
  }
}

/**
 * A reactive lookup or a listen request hit a value that cannot notify.
 *
 * Extends NotFoundError: no observable binding of the type was found, though a
 * plain one may exist.
 */
export class CapabilityError extends NotFoundError {
  constructor(typeLabel: string) {
    super(
      typeLabel,
      format(
        `'${typeLabel}' is not observable.`,
        [
          `'${typeLabel}' was found but does not expose addListener/removeListener/dispose.`,
          '',
          'Reactive lookups and listenTo() require a change-notifying value.',
          'Use a non-reactive lookup, or make the type extend ChangeNotifier.',
        ]
      )
    );
    this.name = 'CapabilityError';
  }
}

export class CircularConstructionError extends LocatorError {
  constructor(public typeLabel: string) {
    const dev = [
      `Circular construction of '${typeLabel}'.`,
      '',
      `The factory of '${typeLabel}' asked for '${typeLabel}' again before returning.`,
      'Break the cycle by passing the dependency in after construction.',
    ];
    super(format(`Circular construction of '${typeLabel}'.`, dev));
    this.name = 'CircularConstructionError';
  }
}

export class FactoryExecutionError extends LocatorError {
  constructor(
    public typeLabel: string,
    cause: unknown
  ) {
    const dev = [
      'Factory execution failed',
      '',
      `Factory for '${typeLabel}' threw during creation. See 'cause' for details.`,
    ];
    super(format(`Factory for '${typeLabel}' failed during creation.`, dev), { cause });
    this.name = 'FactoryExecutionError';
  }
}

export class CellDisposedError extends LocatorError {
  constructor(public typeLabel: string) {
    const dev = [
      `'${typeLabel}' has been disposed.`,
      '',
      'Its owner was torn down. Look the object up again from a live binding.',
    ];
    super(format(`'${typeLabel}' has been disposed.`, dev));
    this.name = 'CellDisposedError';
  }
}

export class NotifierDisposedError extends LocatorError {
  constructor(public notifierName: string) {
    super(`${notifierName} was used after being disposed.`);
    this.name = 'NotifierDisposedError';
  }
}

/**
 * One or more disposals failed while tearing down a set of objects. Every
 * disposal was attempted before this was thrown.
 */
export class AggregateDisposalError extends LocatorError {
  constructor(public errors: Error[]) {
    const errorList = errors.map((e, i) => `  ${i + 1}. ${e.message}`).join('\n');
    const dev = [
      'Multiple disposal errors occurred',
      '',
      `${errors.length} error(s) occurred during teardown:`,
      errorList,
      '',
      'Check the `errors` property for detailed information about each failure.',
    ];

    super(format(`${errors.length} disposal error(s) occurred.`, dev));
    this.name = 'AggregateDisposalError';
  }
}

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
