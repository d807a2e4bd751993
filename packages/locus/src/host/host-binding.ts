/* HostBinding
 *
 * Lifecycle adapter between a host tree and the locator. The host calls
 * onMount() when a node carrying a binding enters the tree, and onUnmount()
 * when any node that holds a binding or resolved reactively leaves it; the
 * locator never discovers mounts on its own. A reactive dependent that is
 * never unmounted keeps receiving scheduleUpdate() calls.
 *
 * For observable objects the owning node itself is scheduled for an update on
 * every notification, in addition to the reactive dependents TreeScope
 * tracks. That listener is attached when the object is first resolved and
 * removed before the binding is torn down.
 */
import type { Logger } from 'pino';

import { isObservable } from '../core/observable.js';
import { SubscriptionManager } from '../core/subscription-manager.js';
import type { TreeBinding, TreeScope } from '../core/tree-scope.js';
import type { Location, Provider, TypeKey } from '../types/types.js';

/**
 * What a node publishes.
 *
 * @example
 * ```typescript
 * binding.onMount(node, {
 *   type: Counter,
 *   provider: { useFactory: () => new Counter() },
 *   location: Location.Tree,
 * });
 * ```
 */
export interface BindingSpec<T> {
  type: TypeKey<T>;
  provider: Provider<T>;
  /** @default Location.Tree */
  location?: Location;
  /** Registry name; only meaningful with `location: registry`. */
  name?: string | null;
  /**
   * Dispose the object on unmount.
   * @default true
   */
  dispose?: boolean;
}

export class HostBinding<N> {
  /** Owner-update subscriptions, per mounted node. */
  private readonly owners = new Map<N, SubscriptionManager>();
  private readonly logger: Logger;

  constructor(
    private readonly scope: TreeScope<N>,
    logger?: Logger
  ) {
    this.logger = (logger ?? scope.registry.logger).child({ component: 'host-binding' });
  }

  /**
   * Bind `spec` at `node`. May be called once per type for the same node.
   */
  onMount<T>(node: N, spec: BindingSpec<T>): TreeBinding<N> {
    const binding = this.scope.bind(node, spec.type, spec.provider, {
      location: spec.location,
      name: spec.name,
      dispose: spec.dispose,
      onInit: (instance) => this.watch(node, instance),
    });
    this.logger.debug({ type: binding.typeId.label, location: binding.location }, 'mounted');
    return binding;
  }

  /**
   * Detach owner listeners, tear down every binding of `node` and drop it as
   * a reactive dependent. Call it for every node that called
   * `resolveReactive`, not only for nodes carrying a binding.
   */
  onUnmount(node: N): void {
    const subscriptions = this.owners.get(node);
    if (subscriptions) {
      subscriptions.unsubscribeAll();
      this.owners.delete(node);
    }
    this.scope.unbind(node);
    this.logger.debug('unmounted');
  }

  private watch(node: N, instance: unknown): void {
    if (!isObservable(instance)) return;

    let subscriptions = this.owners.get(node);
    if (!subscriptions) {
      subscriptions = new SubscriptionManager();
      this.owners.set(node, subscriptions);
    }
    subscriptions.subscribe(instance, () => this.scope.host.scheduleUpdate(node));
  }
}
