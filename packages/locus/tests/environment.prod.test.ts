import { afterEach, describe, expect, it, vi } from 'vitest';

const originalEnv = process.env.NODE_ENV;

describe('Production environment branches', () => {
  afterEach(() => {
    process.env.NODE_ENV = originalEnv;
    vi.resetModules();
  });

  it('uses one-line messages in production', async () => {
    process.env.NODE_ENV = 'production';
    vi.resetModules();

    const {
      AggregateDisposalError,
      AlreadyRegisteredError,
      CapabilityError,
      ConfigurationError,
      FactoryExecutionError,
      NotFoundError,
      NotRegisteredError,
    } = await import('../src/errors/errors.js');

    expect(new ConfigurationError('bad option').message).toBe('Invalid locator configuration: bad option');
    expect(new AlreadyRegisteredError('Counter', null, 'registry').message).toBe(
      "'Counter' with no name is already registered."
    );
    expect(new NotRegisteredError('Counter', 'main', ['other']).message).toBe(
      "'Counter' with name 'main' is not registered."
    );
    expect(new NotFoundError('Model').message).toBe("No ancestor binding of 'Model' was found in the tree.");
    expect(new CapabilityError('Model').message).toBe("'Model' is not observable.");
    expect(new FactoryExecutionError('Counter', new Error('x')).message).toBe(
      "Factory for 'Counter' failed during creation."
    );
    expect(new AggregateDisposalError([new Error('a')]).message).toBe('1 disposal error(s) occurred.');
  });

  it('keeps registry behavior unchanged in production', async () => {
    process.env.NODE_ENV = 'production';
    vi.resetModules();

    const { Registry } = await import('../src/core/registry.js');
    const { NotRegisteredError } = await import('../src/errors/errors.js');
    const registry = new Registry();
    const ValueT = (await import('../src/core/type-id.js')).typeId<number>('Value');

    registry.register(ValueT, { useValue: 7 });

    expect(registry.get(ValueT)).toBe(7);
    expect(() => registry.get(ValueT, { name: 'missing' })).toThrow(NotRegisteredError);
  });
});
