/*
 * Observable capability
 * ---------------------
 * The locator never depends on a concrete reactive library. A value is
 * observable when it structurally exposes addListener / removeListener /
 * dispose; ChangeNotifier is the reference implementation the package ships.
 *
 * Delivery policy
 *  - listeners run synchronously, in the order they were added
 *  - the listener list is snapshotted when delivery starts: a listener added
 *    during delivery first runs on the next notification
 *  - a listener removed during delivery, before its turn, is skipped
 */
import { NotifierDisposedError } from '../errors/errors.js';

export type Listener = () => void;

export interface Observable {
  addListener(listener: Listener): void;
  removeListener(listener: Listener): void;
  dispose(): void;
}

/**
 * Capability check used wherever the locator needs change notification or
 * disposal.
 */
export function isObservable(value: unknown): value is Observable {
  if ((typeof value !== 'object' && typeof value !== 'function') || value === null) return false;
  const candidate = value as Partial<Observable>;
  return (
    typeof candidate.addListener === 'function' &&
    typeof candidate.removeListener === 'function' &&
    typeof candidate.dispose === 'function'
  );
}

/**
 * Base class for models that notify listeners of state changes.
 *
 * @example
 * ```typescript
 * class Counter extends ChangeNotifier {
 *   count = 0;
 *   increment() {
 *     this.count++;
 *     this.notifyListeners();
 *   }
 * }
 * ```
 */
export class ChangeNotifier implements Observable {
  private listeners: Listener[] = [];
  private disposed = false;

  get hasListeners(): boolean {
    return this.listeners.length > 0;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Adding the same listener twice registers it twice. Use a
   * SubscriptionManager for de-duplicated subscriptions.
   */
  addListener(listener: Listener): void {
    this.assertNotDisposed();
    this.listeners.push(listener);
  }

  /** Removes the first registration of `listener`. No-op when absent. */
  removeListener(listener: Listener): void {
    const idx = this.listeners.indexOf(listener);
    if (idx !== -1) this.listeners.splice(idx, 1);
  }

  notifyListeners(): void {
    this.assertNotDisposed();
    if (this.listeners.length === 0) return;

    const snapshot = this.listeners.slice();
    for (const listener of snapshot) {
      if (!this.listeners.includes(listener)) continue;
      listener();
    }
  }

  /** Drops every listener. Idempotent. */
  dispose(): void {
    this.disposed = true;
    this.listeners = [];
  }

  private assertNotDisposed(): void {
    if (this.disposed) throw new NotifierDisposedError(this.constructor.name);
  }
}

/**
 * A ChangeNotifier holding a single value; notifies when the value changes.
 */
export class ValueNotifier<T> extends ChangeNotifier {
  constructor(private _value: T) {
    super();
  }

  get value(): T {
    return this._value;
  }

  set value(next: T) {
    if (Object.is(this._value, next)) return;
    this._value = next;
    this.notifyListeners();
  }
}
