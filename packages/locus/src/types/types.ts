import type { Logger } from 'pino';

import type { TypeId } from '../core/type-id.js';

/**
 * Constructor signature used as a type key. Abstract classes qualify too.
 *
 * @template T - Type produced by the constructor
 */
export type Constructor<T = unknown> = abstract new (...args: never[]) => T;

/**
 * Anything that identifies a model type: an explicit {@link TypeId} or a class.
 * Classes are mapped to a TypeId on first use (see `typeIdOf`).
 */
export type TypeKey<T = unknown> = TypeId<T> | Constructor<T>;

/**
 * Where a binding publishes its object.
 *
 *   - **Registry**: visible from anywhere through the registry, keyed by type and name
 *   - **Tree**: visible only to descendants of the binding node
 *
 * @example
 * ```typescript
 * binding.onMount(node, { type: Counter, provider: { useFactory: () => new Counter() }, location: Location.Tree });
 * ```
 */
export const Location = {
  Registry: 'registry',
  Tree: 'tree',
} as const;

export type Location = (typeof Location)[keyof typeof Location];

/**
 * Register a pre-built instance.
 *
 * @example
 * ```typescript
 * { useValue: new Settings() }
 * ```
 */
export interface ValueProvider<T> {
  useValue: T;
}

/**
 * Register a zero-argument factory, invoked on first lookup.
 *
 * @example
 * ```typescript
 * { useFactory: () => new Counter() }
 * ```
 */
export interface FactoryProvider<T> {
  useFactory: () => T;
}

export type Provider<T> = ValueProvider<T> | FactoryProvider<T>;

/** Receives every registered name of a type and picks one. */
export type NameFilter = (names: readonly (string | null)[]) => string | null | undefined;

/** Receives the type label and construction time in nanoseconds. */
export type InstantiateHook = (typeLabel: string, durationNs: number) => void;

export interface NameOptions {
  /** Distinguishes several registrations of one type. Omitted and `null` are the same key. */
  name?: string | null;
}

export interface GetOptions extends NameOptions {
  /** Picks a name from the registered ones. Cannot be combined with `name`. */
  filter?: NameFilter;
}

export interface UnregisterOptions extends NameOptions {
  /**
   * Dispose the object if it is observable.
   * @default true
   */
  dispose?: boolean;
}

/**
 * Registry configuration passed to the constructor.
 */
export interface RegistryConfig {
  /**
   * Name used in log records.
   * @default 'Registry'
   */
  name?: string;

  /**
   * Logger for lifecycle records. Defaults to a pino logger whose level comes
   * from `LOCUS_LOG_LEVEL` (silent when unset).
   */
  logger?: Logger;

  /**
   * Optional hook invoked after a factory-backed object is built.
   *
   * Useful for profiling or custom telemetry.
   */
  onInstantiate?: InstantiateHook;
}
