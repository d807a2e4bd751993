/* LazyCell
 *
 * Deferred-construction holder for a single object.
 *
 * A cell is built from exactly one of:
 *  - a value provider (the object already exists)
 *  - a factory provider (the object is built on first resolve())
 *
 * Guarantees
 *  - the factory runs at most once per successful construction; a factory
 *    that throws leaves the cell empty so a later resolve() can retry
 *  - the init hook runs once, on the first resolve(), for both provider kinds
 *  - a resolve() that re-enters the same cell while its factory is running
 *    fails with CircularConstructionError instead of building twice
 *  - dispose() never forces construction
 */
import {
  CellDisposedError,
  CircularConstructionError,
  ConfigurationError,
  FactoryExecutionError,
  LocatorError,
} from '../errors/errors.js';
import type { InstantiateHook, Provider } from '../types/types.js';
import { isObservable } from './observable.js';

/**
 * High-resolution timer function.
 * Prefers performance.now() when available, falls back to Date.now().
 */
const nowMs = (() => {
  const maybePerf = typeof globalThis !== 'undefined' ? globalThis.performance : undefined;
  return maybePerf && typeof maybePerf.now === 'function'
    ? () => maybePerf.now()
    : () => Date.now();
})();

/** Convert milliseconds to nanoseconds for instrumentation hook */
const toNs = (ms: number) => Math.round(ms * 1_000_000);

/**
 * Read side of a cell. Covariant in T, so cells of any type can share one
 * heterogeneous store.
 */
export interface Cell<T = unknown> {
  readonly label: string;
  readonly isMaterialized: boolean;
  readonly isDisposed: boolean;
  resolve(): T;
  peek(): T | undefined;
  dispose(): void;
}

export interface LazyCellOptions<T> {
  /** Type label used in errors and timing reports */
  label: string;
  /** Runs once with the object on the first resolve() */
  onInit?: (instance: T) => void;
  onInstantiate?: InstantiateHook;
}

type CellState = 'idle' | 'constructing' | 'ready' | 'disposed';

export class LazyCell<T> implements Cell<T> {
  readonly label: string;
  private readonly factory?: () => T;
  private readonly onInit?: (instance: T) => void;
  private readonly onInstantiate?: InstantiateHook;

  /** Boxed so that a factory may legitimately produce `undefined`. */
  private materialized?: { readonly value: T };
  private initialized = false;
  private state: CellState = 'idle';

  /**
   * @throws {ConfigurationError} unless exactly one of `useValue` / `useFactory` is supplied
   */
  constructor(provider: Provider<T>, options: LazyCellOptions<T>) {
    this.label = options.label;
    this.onInit = options.onInit;
    this.onInstantiate = options.onInstantiate;

    const value = 'useValue' in provider ? provider.useValue : undefined;
    const factory = 'useFactory' in provider ? provider.useFactory : undefined;

    if ((value != null) === (factory != null)) {
      throw new ConfigurationError(
        value != null
          ? `'${this.label}' was given both an instance and a factory; supply exactly one.`
          : `'${this.label}' was given neither an instance nor a factory; supply exactly one.`
      );
    }

    if (factory != null) {
      if (typeof factory !== 'function') {
        throw new ConfigurationError(`Factory for '${this.label}' must be a function.`);
      }
      this.factory = factory;
    } else if (value != null) {
      this.materialized = { value };
      this.state = 'ready';
    }
  }

  get isMaterialized(): boolean {
    return this.materialized !== undefined;
  }

  get isDisposed(): boolean {
    return this.state === 'disposed';
  }

  /** The object if it already exists; never constructs. */
  peek(): T | undefined {
    return this.materialized?.value;
  }

  /**
   * Return the object, building it on first call.
   *
   * @throws {CircularConstructionError} on re-entry while the factory runs
   * @throws {FactoryExecutionError} when the factory throws
   * @throws {CellDisposedError} after dispose()
   */
  resolve(): T {
    if (this.state === 'disposed') throw new CellDisposedError(this.label);
    if (this.state === 'constructing') throw new CircularConstructionError(this.label);

    let box = this.materialized;
    if (!box) {
      box = { value: this.construct() };
      this.materialized = box;
      this.state = 'ready';
    }

    if (!this.initialized) {
      this.initialized = true;
      this.onInit?.(box.value);
    }
    return box.value;
  }

  /**
   * Dispose the object if it was built and is observable. Idempotent.
   */
  dispose(): void {
    if (this.state === 'disposed') return;
    const box = this.materialized;
    this.state = 'disposed';
    this.materialized = undefined;
    if (box && isObservable(box.value)) box.value.dispose();
  }

  private construct(): T {
    const factory = this.factory;
    if (!factory) throw new ConfigurationError(`'${this.label}' has nothing to construct from.`);

    this.state = 'constructing';
    const hook = this.onInstantiate;
    const start = hook ? nowMs() : 0;
    try {
      return factory();
    } catch (e) {
      // Locator errors raised by nested lookups keep their own type
      if (e instanceof LocatorError) throw e;
      throw new FactoryExecutionError(this.label, e);
    } finally {
      if (this.state === 'constructing') this.state = 'idle';
      if (hook) hook(this.label, toNs(nowMs() - start));
    }
  }
}
