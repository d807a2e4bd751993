import { describe, expect, it, vi } from 'vitest';

import { LazyCell } from '../src/core/lazy-cell.js';
import {
  CellDisposedError,
  CircularConstructionError,
  ConfigurationError,
  FactoryExecutionError,
  NotRegisteredError,
} from '../src/errors/errors.js';
import type { Provider } from '../src/types/types.js';
import { Counter, Settings } from './support/models.js';

describe('LazyCell', () => {
  it('defers the factory until the first resolve and runs it once', () => {
    const factory = vi.fn(() => new Counter());
    const cell = new LazyCell({ useFactory: factory }, { label: 'Counter' });

    expect(cell.isMaterialized).toBe(false);
    expect(cell.peek()).toBeUndefined();
    expect(factory).not.toHaveBeenCalled();

    const first = cell.resolve();
    expect(cell.resolve()).toBe(first);
    expect(cell.peek()).toBe(first);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('runs the init hook once for value and factory providers', () => {
    const onInit = vi.fn();
    const settings = new Settings();
    const eager = new LazyCell({ useValue: settings }, { label: 'Settings', onInit });

    expect(eager.isMaterialized).toBe(true);
    expect(onInit).not.toHaveBeenCalled();
    eager.resolve();
    eager.resolve();
    expect(onInit).toHaveBeenCalledTimes(1);
    expect(onInit).toHaveBeenCalledWith(settings);

    const lazyInit = vi.fn();
    const lazy = new LazyCell({ useFactory: () => new Settings('dark') }, { label: 'Settings', onInit: lazyInit });
    const built = lazy.resolve();
    lazy.resolve();
    expect(lazyInit).toHaveBeenCalledTimes(1);
    expect(lazyInit).toHaveBeenCalledWith(built);
  });

  it('requires exactly one of value and factory', () => {
    const both = { useValue: new Settings(), useFactory: () => new Settings() } as Provider<Settings>;
    const neither = {} as Provider<Settings>;
    const nullValue: Provider<Settings | null> = { useValue: null };

    expect(() => new LazyCell(both, { label: 'Settings' })).toThrow(ConfigurationError);
    expect(() => new LazyCell(neither, { label: 'Settings' })).toThrow(ConfigurationError);
    expect(() => new LazyCell(nullValue, { label: 'Settings' })).toThrow(ConfigurationError);
    expect(
      () => new LazyCell({ useFactory: 'nope' } as never, { label: 'Settings' })
    ).toThrow('must be a function');
  });

  it('accepts an explicit undefined next to the provided half', () => {
    const settings = new Settings();
    const provider = { useValue: settings, useFactory: undefined } as Provider<Settings>;

    expect(new LazyCell(provider, { label: 'Settings' }).resolve()).toBe(settings);
  });

  it('wraps factory failures and allows a retry', () => {
    let attempts = 0;
    const cell = new LazyCell(
      {
        useFactory: () => {
          attempts++;
          if (attempts === 1) throw new Error('boom');
          return new Counter();
        },
      },
      { label: 'Counter' }
    );

    const error = (() => {
      try {
        cell.resolve();
      } catch (e) {
        return e;
      }
    })();
    expect(error).toBeInstanceOf(FactoryExecutionError);
    expect(error instanceof Error ? error.cause : undefined).toEqual(new Error('boom'));
    expect(cell.isMaterialized).toBe(false);

    expect(cell.resolve()).toBeInstanceOf(Counter);
    expect(attempts).toBe(2);
  });

  it('lets locator errors from nested lookups through unchanged', () => {
    const cell = new LazyCell<Counter>(
      {
        useFactory: () => {
          throw new NotRegisteredError('Dependency', null);
        },
      },
      { label: 'Counter' }
    );

    expect(() => cell.resolve()).toThrow(NotRegisteredError);
  });

  it('detects re-entry while the factory runs', () => {
    const holder: { cell?: LazyCell<Counter> } = {};
    holder.cell = new LazyCell<Counter>(
      {
        useFactory: () => {
          holder.cell?.resolve();
          return new Counter();
        },
      },
      { label: 'Counter' }
    );

    expect(() => holder.cell?.resolve()).toThrow(CircularConstructionError);
    expect(holder.cell.isMaterialized).toBe(false);
  });

  it('reports construction time to the instantiate hook', () => {
    const onInstantiate = vi.fn();
    const cell = new LazyCell({ useFactory: () => new Counter() }, { label: 'Counter', onInstantiate });

    cell.resolve();
    cell.resolve();

    expect(onInstantiate).toHaveBeenCalledTimes(1);
    expect(onInstantiate).toHaveBeenCalledWith('Counter', expect.any(Number));
  });

  it('disposes built observables once and never constructs on dispose', () => {
    const factory = vi.fn(() => new Counter());
    const unbuilt = new LazyCell({ useFactory: factory }, { label: 'Counter' });
    unbuilt.dispose();
    expect(factory).not.toHaveBeenCalled();
    expect(unbuilt.isDisposed).toBe(true);

    const built = new LazyCell({ useFactory: () => new Counter() }, { label: 'Counter' });
    const counter = built.resolve();
    const dispose = vi.spyOn(counter, 'dispose');
    built.dispose();
    built.dispose();

    expect(dispose).toHaveBeenCalledTimes(1);
    expect(counter.isDisposed).toBe(true);
    expect(() => built.resolve()).toThrow(CellDisposedError);
  });

  it('leaves non-observable values alone on dispose', () => {
    const settings = new Settings();
    const cell = new LazyCell({ useValue: settings }, { label: 'Settings' });

    expect(() => cell.dispose()).not.toThrow();
    expect(cell.peek()).toBeUndefined();
  });
});
