/* TreeScope
 *
 * Binds objects to positions in a host-owned tree so that descendants can find
 * them by type, without a name, by walking toward the root.
 *
 * Visibility:
 *  - a tree-located binding is visible to the descendants of its node only
 *    (the node itself resolves from its own parent upward)
 *  - a registry-located binding shares its cell with a registry entry and is
 *    not part of the walk
 *  - promote() additionally publishes a tree binding's object through the
 *    registry; demote() withdraws it again without disposal
 *
 * Binding states:
 *
 *   bound <-> promoted
 *     \        /
 *     torn-down      (terminal, reached once through unbind())
 *
 * Reactive lookups record the resolving position as a dependent of the
 * binding. When the bound object notifies, each dependent is handed to
 * TreeHost.scheduleUpdate(). The observable check applies to the first
 * matching ancestor only; the walk never skips a non-observable match to look
 * further up.
 */
import type { Logger } from 'pino';

import {
  AggregateDisposalError,
  AlreadyRegisteredError,
  CapabilityError,
  ConfigurationError,
  NotFoundError,
  NotRegisteredError,
  toError,
} from '../errors/errors.js';
import { Location, type Provider, type TypeKey } from '../types/types.js';
import { LazyCell, type Cell } from './lazy-cell.js';
import { isObservable, type Listener, type Observable } from './observable.js';
import { normalizeName, type Registry } from './registry.js';
import { toTypeId, type TypeId } from './type-id.js';

/**
 * What the locator needs from the host's tree.
 *
 * @template N - The host's node (position) type
 */
export interface TreeHost<N> {
  /** Walk primitive: the parent of `node`, or null/undefined at the root. */
  parentOf(node: N): N | null | undefined;
  /** Ask the host to re-evaluate `node`, e.g. to rebuild it. */
  scheduleUpdate(node: N): void;
}

export type BindingState = 'bound' | 'promoted' | 'torn-down';

export interface BindOptions<T> {
  /** @default Location.Tree */
  location?: Location;
  /** Registry name; used with `location: registry` only. */
  name?: string | null;
  /**
   * Dispose the object when the node is unbound.
   * @default true
   */
  dispose?: boolean;
  /** Runs once with the object when it is first resolved. */
  onInit?: (instance: T) => void;
}

/** Read-only view of a binding handed out to callers. */
export interface TreeBinding<N> {
  readonly node: N;
  readonly typeId: TypeId;
  readonly location: Location;
  readonly name: string | null;
  readonly dispose: boolean;
  readonly state: BindingState;
  /** Registry name while promoted, otherwise undefined. */
  readonly promotedName: string | null | undefined;
  readonly dependents: ReadonlySet<N>;
}

interface BindingRecord<N> extends TreeBinding<N> {
  readonly cell: Cell;
  state: BindingState;
  promotedName: string | null | undefined;
  readonly dependents: Set<N>;
  /** Set once a reactive dependent made the binding listen to its object. */
  observed?: { readonly observable: Observable; readonly listener: Listener };
}

const LOCATIONS: readonly string[] = Object.values(Location);

export class TreeScope<N> {
  /** node -> (TypeId -> binding) */
  private readonly bindings = new Map<N, Map<TypeId, BindingRecord<N>>>();

  /** dependent node -> bindings it reactively depends on */
  private readonly dependencies = new Map<N, Set<BindingRecord<N>>>();

  private readonly logger: Logger;

  constructor(
    readonly host: TreeHost<N>,
    readonly registry: Registry,
    logger?: Logger
  ) {
    this.logger = (logger ?? registry.logger).child({ component: 'tree-scope' });
  }

  /**
   * Attach an object to `node`. With `location: registry` the same cell is
   * also inserted into the registry under `(type, name)`.
   *
   * @throws {AlreadyRegisteredError} if `node` already binds `type`, or the registry key is taken
   * @throws {ConfigurationError} on a malformed provider or location
   */
  bind<T>(
    node: N,
    type: TypeKey<T>,
    provider: Provider<T>,
    options: BindOptions<T> = {}
  ): TreeBinding<N> {
    const id = toTypeId(type);
    const location = options.location ?? Location.Tree;
    if (!LOCATIONS.includes(location)) {
      throw new ConfigurationError(`Unknown location '${String(location)}' for '${id.label}'.`);
    }
    const name = normalizeName(options.name);

    const atNode = this.bindings.get(node);
    if (atNode?.has(id)) throw new AlreadyRegisteredError(id.label, null, 'tree');

    const cell = new LazyCell(provider, {
      label: id.label,
      onInit: options.onInit,
    });

    // Registry insert is the last step that can fail
    if (location === Location.Registry) this.registry._attachCell(id, name, cell);

    const record: BindingRecord<N> = {
      node,
      typeId: id,
      location,
      name,
      dispose: options.dispose ?? true,
      cell,
      state: 'bound',
      promotedName: undefined,
      dependents: new Set(),
    };

    if (atNode) atNode.set(id, record);
    else this.bindings.set(node, new Map([[id, record]]));

    this.logger.debug({ type: id.label, location, name }, 'bound');
    return record;
  }

  /**
   * Nearest ancestor of `from` binding `type` in the tree, or undefined.
   * Never builds the object.
   */
  findBinding<T>(from: N, type: TypeKey<T>): TreeBinding<N> | undefined {
    return this.findAncestor(from, toTypeId(type));
  }

  /** The binding `node` itself holds for `type`, if any. */
  bindingAt<T>(node: N, type: TypeKey<T>): TreeBinding<N> | undefined {
    return this.bindings.get(node)?.get(toTypeId(type));
  }

  hasBinding<T>(node: N, type: TypeKey<T>): boolean {
    return this.bindingAt(node, type) !== undefined;
  }

  /**
   * Object of the nearest ancestor binding of exactly `type`. No dependency
   * is recorded; callers that need fresh values call again.
   *
   * @throws {NotFoundError} if no ancestor binds `type`
   */
  resolveNonReactive<T>(from: N, type: TypeKey<T>): T {
    const id = toTypeId(type);
    const record = this.findAncestor(from, id);
    if (!record) throw new NotFoundError(id.label);
    // Bound under TypeId<T>, so the cell holds a T.
    return record.cell.resolve() as T;
  }

  /**
   * Like {@link resolveNonReactive}, and records `from` as a dependent: every
   * notification of the object schedules an update of `from` until `from` is
   * unbound.
   *
   * @throws {NotFoundError} if no ancestor binds `type`
   * @throws {CapabilityError} if the nearest match is not observable
   */
  resolveReactive<T>(from: N, type: TypeKey<T>): T {
    const id = toTypeId(type);
    const record = this.findAncestor(from, id);
    if (!record) throw new NotFoundError(id.label);

    const instance = record.cell.resolve() as T;
    if (!isObservable(instance)) throw new CapabilityError(id.label);

    this.addDependent(record, from, instance);
    return instance;
  }

  /**
   * Publish the object of `node`'s tree binding through the registry as well.
   * The object is built first if needed and the registry entry shares it.
   * Removing the entry through the registry (unregister, reset) returns the
   * binding to `bound`.
   *
   * @throws {NotFoundError} if `node` does not bind `type`
   * @throws {ConfigurationError} if the binding already lives in the registry
   * @throws {AlreadyRegisteredError} if already promoted or the registry key is taken
   */
  promote<T>(node: N, type: TypeKey<T>, options: { name?: string | null } = {}): void {
    const id = toTypeId(type);
    const record = this.requireOwn(node, id);
    if (record.location === Location.Registry) {
      throw new ConfigurationError(`'${id.label}' is already bound in the registry.`);
    }
    if (record.promotedName !== undefined) {
      throw new AlreadyRegisteredError(id.label, record.promotedName, 'registry');
    }

    const name = normalizeName(options.name);
    record.cell.resolve();
    this.registry._attachCell(id, name, record.cell, () => {
      // Dropped through the registry: back to unpromoted
      record.promotedName = undefined;
      if (record.state === 'promoted') record.state = 'bound';
    });
    record.promotedName = name;
    record.state = 'promoted';
    this.logger.debug({ type: id.label, name }, 'promoted');
  }

  /**
   * Withdraw a promotion. The object stays alive; `node` still owns it.
   *
   * @throws {NotFoundError} if `node` does not bind `type`
   * @throws {NotRegisteredError} if the binding is not promoted
   */
  demote<T>(node: N, type: TypeKey<T>): void {
    const id = toTypeId(type);
    const record = this.requireOwn(node, id);
    if (record.promotedName === undefined) {
      throw new NotRegisteredError(id.label, null, this.registry.names(id));
    }

    this.registry._detachCell(id, record.promotedName, record.cell);
    this.logger.debug({ type: id.label, name: record.promotedName }, 'demoted');
    record.promotedName = undefined;
    record.state = 'bound';
  }

  /**
   * Tear down every binding of `node` and drop `node` as a reactive dependent.
   *
   * Per binding: the registry entry (registry location or promotion) is
   * removed without disposal, the change listener is detached, then the cell
   * is disposed if the binding's `dispose` flag is set. Every binding is torn
   * down even if a disposal throws.
   *
   * @throws {AggregateDisposalError} if one or more disposals threw
   */
  unbind(node: N): void {
    this.forgetDependent(node);

    const atNode = this.bindings.get(node);
    if (!atNode) return;
    this.bindings.delete(node);

    const errors: Error[] = [];
    for (const record of atNode.values()) {
      try {
        this.teardown(record);
      } catch (error) {
        errors.push(toError(error));
      }
    }
    if (errors.length > 0) throw new AggregateDisposalError(errors);
  }

  private teardown(record: BindingRecord<N>): void {
    if (record.location === Location.Registry) {
      this.registry._detachCell(record.typeId, record.name, record.cell);
    }
    if (record.promotedName !== undefined) {
      this.registry._detachCell(record.typeId, record.promotedName, record.cell);
      record.promotedName = undefined;
    }

    if (record.observed) {
      record.observed.observable.removeListener(record.observed.listener);
      record.observed = undefined;
    }
    for (const dependent of record.dependents) this.dependencies.get(dependent)?.delete(record);
    record.dependents.clear();
    record.state = 'torn-down';
    this.logger.debug({ type: record.typeId.label, location: record.location }, 'unbound');

    if (record.dispose) record.cell.dispose();
  }

  private findAncestor(from: N, id: TypeId): BindingRecord<N> | undefined {
    let current = this.host.parentOf(from);
    while (current !== null && current !== undefined) {
      const record = this.bindings.get(current)?.get(id);
      if (record && record.location === Location.Tree) return record;
      current = this.host.parentOf(current);
    }
    return undefined;
  }

  private requireOwn(node: N, id: TypeId): BindingRecord<N> {
    const record = this.bindings.get(node)?.get(id);
    if (!record) {
      throw new NotFoundError(id.label, `The node holds no binding of '${id.label}'.`);
    }
    return record;
  }

  private addDependent(record: BindingRecord<N>, dependent: N, observable: Observable): void {
    record.dependents.add(dependent);

    let deps = this.dependencies.get(dependent);
    if (!deps) {
      deps = new Set();
      this.dependencies.set(dependent, deps);
    }
    deps.add(record);

    if (!record.observed) {
      const listener = () => this.notifyDependents(record);
      observable.addListener(listener);
      record.observed = { observable, listener };
    }
  }

  private notifyDependents(record: BindingRecord<N>): void {
    // Snapshot: an update may unbind dependents
    for (const dependent of Array.from(record.dependents)) this.host.scheduleUpdate(dependent);
  }

  private forgetDependent(node: N): void {
    const deps = this.dependencies.get(node);
    if (!deps) return;
    for (const record of deps) record.dependents.delete(node);
    this.dependencies.delete(node);
  }
}
