import type { Listener, Observable } from './observable.js';

interface Subscription {
  readonly observable: Observable;
  readonly listener: Listener;
}

/**
 * Tracks the (observable, listener) pairs of one observing entity.
 *
 * Held by composition: an entity keeps a SubscriptionManager and calls it
 * explicitly. Nothing is released automatically; the owner calls
 * unsubscribeAll() when it goes away.
 */
export class SubscriptionManager {
  private subscriptions: Subscription[] = [];

  get size(): number {
    return this.subscriptions.length;
  }

  /**
   * Attach `listener` to `observable` unless this exact pair is already
   * tracked. Returns the observable for chaining.
   */
  subscribe<O extends Observable>(observable: O, listener: Listener): O {
    if (this.indexOf(observable, listener) !== -1) return observable;
    observable.addListener(listener);
    this.subscriptions.push({ observable, listener });
    return observable;
  }

  /** Detach one pair. Returns false when the pair was not tracked. */
  unsubscribe(observable: Observable, listener: Listener): boolean {
    const idx = this.indexOf(observable, listener);
    if (idx === -1) return false;
    this.subscriptions.splice(idx, 1);
    observable.removeListener(listener);
    return true;
  }

  /** Detach every tracked pair. Safe to call repeatedly. */
  unsubscribeAll(): void {
    const current = this.subscriptions;
    this.subscriptions = [];
    for (const { observable, listener } of current) observable.removeListener(listener);
  }

  private indexOf(observable: Observable, listener: Listener): number {
    return this.subscriptions.findIndex(
      (s) => s.observable === observable && s.listener === listener
    );
  }
}
