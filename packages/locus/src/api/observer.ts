import { CapabilityError, ConfigurationError, NotFoundError } from '../errors/errors.js';
import { isObservable, type Listener, type Observable } from '../core/observable.js';
import type { Registry } from '../core/registry.js';
import { SubscriptionManager } from '../core/subscription-manager.js';
import type { TreeScope } from '../core/tree-scope.js';
import { toTypeId } from '../core/type-id.js';
import type { NameFilter, TypeKey } from '../types/types.js';

export interface ObserverOptions<N> {
  registry: Registry;
  /** Needed for lookups that start from a tree position. */
  scope?: TreeScope<N>;
}

export interface ObserverGetOptions<N> {
  /** Search the tree upward from this position instead of the registry. */
  from?: N;
  name?: string | null;
  filter?: NameFilter;
}

export interface ListenOptions<N, T> extends ObserverGetOptions<N> {
  /** An observable already in hand; skips the lookup. */
  notifier?: T;
  listener: Listener;
}

/**
 * Consumer-side access to the locator for a stateful entity such as a view
 * model or a component.
 *
 * Subscriptions made through listenTo() are de-duplicated and stay attached
 * until cancelSubscriptions() is called; the owner calls it from its own
 * teardown.
 *
 * @example
 * ```typescript
 * const observer = new Observer({ registry, scope });
 * const count = observer.listenTo(Counter, { listener: rebuild }).count;
 * // ...
 * observer.cancelSubscriptions();
 * ```
 */
export class Observer<N = unknown> {
  private readonly registry: Registry;
  private readonly scope?: TreeScope<N>;
  private readonly subscriptions = new SubscriptionManager();

  constructor(options: ObserverOptions<N>) {
    this.registry = options.registry;
    this.scope = options.scope;
  }

  /** Number of live subscriptions. */
  get subscriptionCount(): number {
    return this.subscriptions.size;
  }

  /**
   * Get without listening. With `from`, the nearest ancestor binding is
   * used; otherwise the registry entry for `(type, name)` or `filter`.
   *
   * @throws {ConfigurationError} if `from` is combined with `name` or `filter`
   */
  get<T>(type: TypeKey<T>, options: ObserverGetOptions<N> = {}): T {
    const { from, name, filter } = options;
    if (from === undefined) return this.registry.get(type, { name, filter });

    if (name !== undefined || filter !== undefined) {
      throw new ConfigurationError('Tree lookups match by type only; drop `name` and `filter`.');
    }
    return this.requireScope().resolveNonReactive(from, type);
  }

  /**
   * Locate an observable and subscribe `listener` to it (once per pair).
   * At most one of `from`, `notifier` and `name` may be given.
   *
   * @throws {CapabilityError} if the located object is not observable
   */
  listenTo<T extends Observable>(type: TypeKey<T>, options: ListenOptions<N, T>): T {
    const { from, notifier, name, filter, listener } = options;
    const sources = [from, notifier, name].filter((v) => v !== undefined).length;
    if (sources > 1) {
      throw new ConfigurationError('listenTo() takes at most one of `from`, `notifier` and `name`.');
    }

    const located: T = notifier ?? this.get(type, { from, name, filter });
    if (!isObservable(located)) throw new CapabilityError(toTypeId(type).label);
    return this.subscriptions.subscribe(located, listener);
  }

  /**
   * Promote the nearest ancestor tree binding of `type` into the registry,
   * making it reachable from outside its subtree. `name` is the registry name;
   * it plays no part in finding the binding.
   *
   * @throws {NotFoundError} if no ancestor binds `type`
   */
  register<T>(from: N, type: TypeKey<T>, options: { name?: string | null } = {}): void {
    const scope = this.requireScope();
    scope.promote(this.nearestNode(scope, from, type), type, options);
  }

  /**
   * Withdraw a promotion made with {@link register}. The object is not
   * disposed; its node still owns it.
   */
  unregister<T>(from: N, type: TypeKey<T>): void {
    const scope = this.requireScope();
    scope.demote(this.nearestNode(scope, from, type), type);
  }

  /** Detach every subscription made through listenTo(). */
  cancelSubscriptions(): void {
    this.subscriptions.unsubscribeAll();
  }

  private nearestNode<T>(scope: TreeScope<N>, from: N, type: TypeKey<T>): N {
    const binding = scope.findBinding(from, type);
    if (!binding) throw new NotFoundError(toTypeId(type).label);
    return binding.node;
  }

  private requireScope(): TreeScope<N> {
    if (!this.scope) {
      throw new ConfigurationError('This observer has no tree scope; pass `scope` to look up by position.');
    }
    return this.scope;
  }
}
