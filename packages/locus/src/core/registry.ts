/*
 * Registry
 * --------
 * Keyed store of lazily built objects:
 *  - TypeId -> bucket
 *  - bucket: name (string | null) -> entry
 *
 * Responsibilities
 *  - enforce one entry per (type, name); a duplicate is an error, never an overwrite
 *  - prune a bucket as soon as its last entry goes, so no empty buckets linger
 *  - dispose entries on unregister() / reset() unless told not to
 *
 * Entries created for tree bindings (registry-located bindings and promoted
 * tree bindings) are borrowed: the tree node owns the cell and disposes it on
 * unmount. unregister() / reset() still dispose a borrowed cell when asked
 * (cell disposal is idempotent) and tell the owning binding through its
 * detach callback; the binding's own teardown detaches silently.
 *
 * Every mutation validates before it touches the maps; a failed call leaves
 * the registry exactly as it was.
 */
import type { Logger } from 'pino';

import {
  AggregateDisposalError,
  AlreadyRegisteredError,
  ConfigurationError,
  NotRegisteredError,
  toError,
} from '../errors/errors.js';
import type {
  GetOptions,
  InstantiateHook,
  NameOptions,
  Provider,
  RegistryConfig,
  TypeKey,
  UnregisterOptions,
} from '../types/types.js';
import { LazyCell, type Cell } from './lazy-cell.js';
import { createDefaultLogger } from './logger.js';
import { runtimeTypeIdOf, toTypeId, type TypeId } from './type-id.js';

const DEFAULT_NAME = 'Registry';

interface RegistryEntry {
  readonly typeId: TypeId;
  readonly name: string | null;
  readonly cell: Cell;
  /** Owned by a tree binding. */
  readonly borrowed: boolean;
  /** Tells the owning binding its entry was removed from outside. */
  readonly onDetach?: () => void;
}

type Bucket = Map<string | null, RegistryEntry>;

/** Omitted and explicit `null` names address the same entry. */
export const normalizeName = (name: string | null | undefined): string | null => {
  if (name === undefined || name === null) return null;
  if (typeof name !== 'string') {
    throw new ConfigurationError(`A name must be a string or null, got ${typeof name}.`);
  }
  return name;
};

function validateConfig(config: RegistryConfig | undefined): Readonly<RegistryConfig> {
  if (config === undefined) return Object.freeze({});
  if (typeof config !== 'object' || config === null) {
    throw new ConfigurationError('Registry configuration must be an object.');
  }
  if (config.name !== undefined && (typeof config.name !== 'string' || config.name.length === 0)) {
    throw new ConfigurationError(`'name' must be a non-empty string.`);
  }
  if (config.onInstantiate !== undefined && typeof config.onInstantiate !== 'function') {
    throw new ConfigurationError(`'onInstantiate' must be a function.`);
  }
  if (config.logger !== undefined && typeof config.logger?.child !== 'function') {
    throw new ConfigurationError(`'logger' must be a pino logger.`);
  }
  return Object.freeze({ ...config });
}

export class Registry {
  readonly name: string;
  /** Parent logger for components working on this registry. */
  readonly logger: Logger;
  private readonly buckets = new Map<TypeId, Bucket>();
  private readonly log: Logger;
  private readonly instantiateHook?: InstantiateHook;

  /**
   * @throws {ConfigurationError} when the configuration is malformed
   */
  constructor(config?: RegistryConfig) {
    const cfg = validateConfig(config);
    this.name = cfg.name ?? DEFAULT_NAME;
    this.logger = (cfg.logger ?? createDefaultLogger('locus')).child({ registry: this.name });
    this.log = this.logger.child({ component: 'registry' });
    this.instantiateHook = cfg.onInstantiate;
  }

  /** Total number of entries across every type. */
  get size(): number {
    let total = 0;
    for (const bucket of this.buckets.values()) total += bucket.size;
    return total;
  }

  /**
   * Register an object or a factory under `(type, name)`.
   *
   * @throws {AlreadyRegisteredError} if `(type, name)` is taken; the existing entry is untouched
   * @throws {ConfigurationError} unless exactly one of `useValue` / `useFactory` is supplied
   *
   * @example
   * ```typescript
   * registry.register(Counter, { useFactory: () => new Counter() });
   * registry.register(SettingsT, { useValue: settings }, { name: 'staging' });
   * ```
   */
  register<T>(type: TypeKey<T>, provider: Provider<T>, options: NameOptions = {}): void {
    const id = toTypeId(type);
    const name = normalizeName(options.name);
    this.assertAvailable(id, name);
    const cell = new LazyCell(provider, { label: id.label, onInstantiate: this.instantiateHook });
    this.insert(id, name, cell, false);
  }

  /**
   * Register `instance` under its runtime class rather than a statically
   * declared type; for callers holding a supertype-typed reference.
   *
   * @example
   * ```typescript
   * const shape: Shape = new Circle();
   * registry.registerByRuntimeIdentity(shape);
   * registry.get(Circle); // the same object
   * ```
   */
  registerByRuntimeIdentity(instance: object, options: NameOptions = {}): void {
    const id = runtimeTypeIdOf(instance);
    const name = normalizeName(options.name);
    this.assertAvailable(id, name);
    const cell = new LazyCell<unknown>({ useValue: instance }, { label: id.label });
    this.insert(id, name, cell, false);
  }

  /**
   * Remove the entry for `(type, name)`, disposing its object unless
   * `dispose: false`.
   *
   * @throws {NotRegisteredError} if nothing is registered under `(type, name)`
   */
  unregister<T>(type: TypeKey<T>, options: UnregisterOptions = {}): void {
    this.removeAndDispose(toTypeId(type), options);
  }

  /** {@link unregister} keyed by the runtime class of `instance`. */
  unregisterByRuntimeIdentity(instance: object, options: UnregisterOptions = {}): void {
    this.removeAndDispose(runtimeTypeIdOf(instance), options);
  }

  /**
   * Look up an object, building it on first access.
   *
   * @throws {NotRegisteredError} when nothing matches
   * @throws {ConfigurationError} when both `name` and `filter` are given
   *
   * @example
   * ```typescript
   * const page = registry.get(BookPage, { filter: (names) => names[0] });
   * ```
   */
  get<T>(type: TypeKey<T>, options: GetOptions = {}): T {
    const id = toTypeId(type);
    const entry = this.select(id, options);
    if (!entry.found) {
      throw new NotRegisteredError(id.label, entry.name, this.namesOf(id));
    }
    // The entry was stored under TypeId<T>, so its cell holds a T.
    return entry.found.cell.resolve() as T;
  }

  /**
   * Like {@link get} but returns `undefined` when nothing matches. Other
   * errors (construction failures, bad options) still propagate.
   */
  tryGet<T>(type: TypeKey<T>, options: GetOptions = {}): T | undefined {
    const id = toTypeId(type);
    const entry = this.select(id, options);
    return entry.found ? (entry.found.cell.resolve() as T) : undefined;
  }

  /** Pure query; never builds anything. */
  isRegistered<T>(type: TypeKey<T>, options: NameOptions = {}): boolean {
    return this.has(toTypeId(type), normalizeName(options.name));
  }

  /** {@link isRegistered} keyed by the runtime class of `instance`. */
  isRegisteredByRuntimeIdentity(instance: object, options: NameOptions = {}): boolean {
    return this.has(runtimeTypeIdOf(instance), normalizeName(options.name));
  }

  /** Registered names of a type, in registration order. `null` is the unnamed entry. */
  names<T>(type: TypeKey<T>): (string | null)[] {
    return this.namesOf(toTypeId(type));
  }

  /**
   * Drop every entry. Built observables are disposed unless
   * `dispose: false`; bindings owning a dropped entry fall back to unpromoted. All disposals are attempted before failures are
   * reported.
   *
   * @throws {AggregateDisposalError} if one or more disposals threw
   */
  reset(options: { dispose?: boolean } = {}): void {
    const dispose = options.dispose ?? true;
    const entries: RegistryEntry[] = [];
    for (const bucket of this.buckets.values()) entries.push(...bucket.values());
    this.buckets.clear();
    for (const entry of entries) entry.onDetach?.();

    if (!dispose) return;

    const errors: Error[] = [];
    for (const entry of entries) {
      try {
        entry.cell.dispose();
      } catch (error) {
        errors.push(toError(error));
      }
    }

    if (errors.length > 0) {
      this.log.warn({ failures: errors.length }, 'disposal failed during reset');
      throw new AggregateDisposalError(errors);
    }
  }

  /**
   * Insert a cell owned by a tree binding. `onDetach` runs when the entry is
   * removed through unregister() or reset(), not through {@link _detachCell}.
   *
   * @internal Used by TreeScope
   * @throws {AlreadyRegisteredError} if `(typeId, name)` is taken
   */
  _attachCell(typeId: TypeId, name: string | null, cell: Cell, onDetach?: () => void): void {
    this.assertAvailable(typeId, name);
    this.insert(typeId, name, cell, true, onDetach);
  }

  /**
   * Remove `(typeId, name)` only if it still holds `cell`. Returns whether an
   * entry was removed.
   *
   * @internal Used by TreeScope during demotion and teardown
   */
  _detachCell(typeId: TypeId, name: string | null, cell: Cell): boolean {
    const entry = this.buckets.get(typeId)?.get(name);
    if (!entry || entry.cell !== cell) return false;
    this.remove(typeId, name);
    return true;
  }

  private has(id: TypeId, name: string | null): boolean {
    return this.buckets.get(id)?.has(name) ?? false;
  }

  private namesOf(id: TypeId): (string | null)[] {
    const bucket = this.buckets.get(id);
    return bucket ? Array.from(bucket.keys()) : [];
  }

  private assertAvailable(id: TypeId, name: string | null): void {
    if (this.has(id, name)) throw new AlreadyRegisteredError(id.label, name, 'registry');
  }

  private select(
    id: TypeId,
    options: GetOptions
  ): { name: string | null; found: RegistryEntry | undefined } {
    const { filter } = options;
    if (filter !== undefined && options.name !== undefined) {
      throw new ConfigurationError(
        `'name' and 'filter' cannot both be given when looking up '${id.label}'.`
      );
    }
    if (filter !== undefined && typeof filter !== 'function') {
      throw new ConfigurationError(`'filter' must be a function.`);
    }

    const bucket = this.buckets.get(id);
    let name: string | null;
    if (filter) {
      // An empty type has nothing to choose from; the filter is not consulted
      name = bucket ? normalizeName(filter(Array.from(bucket.keys()))) : null;
    } else {
      name = normalizeName(options.name);
    }
    return { name, found: bucket?.get(name) };
  }

  private insert(
    id: TypeId,
    name: string | null,
    cell: Cell,
    borrowed: boolean,
    onDetach?: () => void
  ): void {
    let bucket = this.buckets.get(id);
    if (!bucket) {
      bucket = new Map();
      this.buckets.set(id, bucket);
    }
    bucket.set(name, { typeId: id, name, cell, borrowed, onDetach });
    this.log.debug({ type: id.label, name, borrowed }, 'registered');
  }

  private remove(id: TypeId, name: string | null): RegistryEntry | undefined {
    const bucket = this.buckets.get(id);
    const entry = bucket?.get(name);
    if (!bucket || !entry) return undefined;

    bucket.delete(name);
    if (bucket.size === 0) this.buckets.delete(id);
    this.log.debug({ type: id.label, name }, 'unregistered');
    return entry;
  }

  private removeAndDispose(id: TypeId, options: UnregisterOptions): void {
    const name = normalizeName(options.name);
    const entry = this.remove(id, name);
    if (!entry) throw new NotRegisteredError(id.label, name, this.namesOf(id));
    entry.onDetach?.();
    if (options.dispose ?? true) entry.cell.dispose();
  }
}
