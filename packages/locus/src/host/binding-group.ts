/* BindingGroup
 *
 * Registers a set of registry declarations when their owning group node
 * mounts and unregisters them when it unmounts.
 *
 * A caller-supplied key makes mount() idempotent: hosts that re-run a group's
 * mount for the same node (a re-render, a hot reload) pass the same key and
 * the second mount is skipped. Mounts without a key always register.
 *
 * mount() is all-or-nothing: every declaration is validated against the
 * registry and against the rest of the batch before the first insert, and if
 * an insert still fails the already inserted ones are removed (without
 * disposal) before the error is rethrown.
 */
import type { Logger } from 'pino';

import {
  AggregateDisposalError,
  AlreadyRegisteredError,
  toError,
} from '../errors/errors.js';
import { normalizeName, type Registry } from '../core/registry.js';
import { toTypeId, type TypeId } from '../core/type-id.js';
import type { Provider, TypeKey } from '../types/types.js';

export type GroupKey = string | symbol;

export interface GroupDeclaration<T = unknown> {
  type: TypeKey<T>;
  provider: Provider<T>;
  name?: string | null;
  /**
   * Dispose the object on unmount.
   * @default true
   */
  dispose?: boolean;
}

/**
 * Typed constructor for a declaration, keeping `type` and `provider` in step.
 *
 * @example
 * ```typescript
 * group.mount('services', [
 *   groupEntry(Settings, { useValue: settings }),
 *   groupEntry(Counter, { useFactory: () => new Counter() }, { name: 'clicks' }),
 * ]);
 * ```
 */
export function groupEntry<T>(
  type: TypeKey<T>,
  provider: Provider<T>,
  options: { name?: string | null; dispose?: boolean } = {}
): GroupDeclaration<T> {
  return { type, provider, ...options };
}

interface ResolvedDeclaration {
  readonly id: TypeId;
  readonly name: string | null;
  readonly declaration: GroupDeclaration;
}

export class BindingGroup {
  private readonly processedKeys = new Set<GroupKey>();
  private readonly logger: Logger;

  constructor(
    private readonly registry: Registry,
    logger?: Logger
  ) {
    this.logger = (logger ?? registry.logger).child({ component: 'binding-group' });
  }

  /** Whether `key` was mounted and not unmounted since. */
  isMounted(key: GroupKey): boolean {
    return this.processedKeys.has(key);
  }

  /**
   * Register every declaration. Returns false when `key` was already
   * processed and nothing was registered.
   *
   * @throws {AlreadyRegisteredError} if a declaration collides with the registry or the batch
   * @throws {ConfigurationError} on a malformed declaration
   */
  mount(key: GroupKey | undefined, declarations: readonly GroupDeclaration[]): boolean {
    if (key !== undefined && this.processedKeys.has(key)) {
      this.logger.debug({ key: String(key) }, 'group already mounted; skipping');
      return false;
    }

    const resolved = this.resolveAll(declarations);
    const inserted: ResolvedDeclaration[] = [];
    try {
      for (const entry of resolved) {
        this.registry.register(entry.id, entry.declaration.provider, { name: entry.name });
        inserted.push(entry);
      }
    } catch (error) {
      for (const entry of inserted.reverse()) {
        this.registry.unregister(entry.id, { name: entry.name, dispose: false });
      }
      throw error;
    }

    if (key !== undefined) this.processedKeys.add(key);
    this.logger.debug(
      { key: key === undefined ? null : String(key), size: inserted.length },
      'group mounted'
    );
    return true;
  }

  /**
   * Unregister every declaration, disposing per its flag, and forget `key`.
   * Every declaration is attempted before failures are reported.
   *
   * @throws {AggregateDisposalError} if one or more removals failed
   */
  unmount(key: GroupKey | undefined, declarations: readonly GroupDeclaration[]): void {
    if (key !== undefined) this.processedKeys.delete(key);

    const errors: Error[] = [];
    for (const declaration of declarations) {
      try {
        this.registry.unregister(declaration.type, {
          name: declaration.name,
          dispose: declaration.dispose ?? true,
        });
      } catch (error) {
        errors.push(toError(error));
      }
    }

    this.logger.debug({ key: key === undefined ? null : String(key) }, 'group unmounted');
    if (errors.length > 0) throw new AggregateDisposalError(errors);
  }

  private resolveAll(declarations: readonly GroupDeclaration[]): ResolvedDeclaration[] {
    const seen = new Map<TypeId, Set<string | null>>();
    return declarations.map((declaration) => {
      const id = toTypeId(declaration.type);
      const name = normalizeName(declaration.name);

      let names = seen.get(id);
      if (!names) {
        names = new Set();
        seen.set(id, names);
      }
      if (names.has(name) || this.registry.isRegistered(id, { name })) {
        throw new AlreadyRegisteredError(id.label, name, 'registry');
      }
      names.add(name);
      return { id, name, declaration };
    });
  }
}
