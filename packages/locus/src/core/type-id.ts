import { ConfigurationError } from '../errors/errors.js';
import type { Constructor, TypeKey } from '../types/types.js';

/**
 * Phantom type brand for compile-time type safety.
 * Associates type ids with the type they stand for without runtime overhead.
 */
declare const TYPE_BRAND: unique symbol;

/**
 * Stable identity of a model type.
 *
 * Registry keys and tree bindings are looked up by TypeId, never by
 * structural compatibility: two ids with the same label are still distinct.
 *
 * @template T - The type of object this id locates
 */
export interface TypeId<T = unknown> {
  /** Discriminant for runtime type checking */
  readonly kind: 'type-id';

  /** Unique identifier (type_1, type_2, etc.) */
  readonly id: string;

  /** Human-readable label used in diagnostics */
  readonly label: string;

  readonly sym: symbol;

  /** Phantom type brand - associates the id with its object type */
  readonly [TYPE_BRAND]: T;
}

let _typeCounter = 0;

/**
 * Create a new type id.
 *
 * @example
 * ```typescript
 * const SettingsT = typeId<Settings>('Settings');
 * registry.register(SettingsT, { useValue: new Settings() });
 * ```
 */
export function typeId<T = unknown>(label?: string): TypeId<T> {
  const resolvedLabel = label ?? 'Type';
  return Object.freeze({
    kind: 'type-id',
    id: `type_${++_typeCounter}`,
    label: resolvedLabel,
    sym: Symbol(resolvedLabel),
  }) as TypeId<T>;
}

export function isTypeId(x: unknown): x is TypeId<unknown> {
  return (
    typeof x === 'object' &&
    x !== null &&
    (x as TypeId).kind === 'type-id' &&
    typeof (x as TypeId).id === 'string' &&
    typeof (x as TypeId).label === 'string' &&
    typeof (x as TypeId).sym === 'symbol'
  );
}

/** Dispatch table from class (or any constructor function) to its id. */
const ctorIds = new WeakMap<object, TypeId>();

function idForConstructor(ctor: object, label: string): TypeId {
  if (ctor === Object || ctor === Function) {
    throw new ConfigurationError(
      `'${label}' is too general to be a type key. Pass a class or a typeId() of the concrete type.`
    );
  }
  let id = ctorIds.get(ctor);
  if (!id) {
    id = typeId(label);
    ctorIds.set(ctor, id);
  }
  return id;
}

/**
 * TypeId of a class. The same class always maps to the same id; subclasses get
 * their own.
 */
export function typeIdOf<T>(ctor: Constructor<T>): TypeId<T> {
  return idForConstructor(ctor, ctor.name || 'AnonymousClass') as TypeId<T>;
}

/**
 * TypeId of an instance's runtime class, for callers that only hold a
 * supertype-typed reference.
 *
 * @throws {ConfigurationError} for plain objects and objects without a prototype
 */
export function runtimeTypeIdOf(instance: object): TypeId {
  const ctor: unknown = instance.constructor;
  if (typeof ctor !== 'function') {
    throw new ConfigurationError(
      'Cannot key an object without a constructor. Register it under an explicit type instead.'
    );
  }
  return idForConstructor(ctor, ctor.name || 'AnonymousClass');
}

/**
 * Normalize a type key to its TypeId.
 *
 * @throws {ConfigurationError} when the key is neither a TypeId nor a constructor
 */
export function toTypeId<T>(key: TypeKey<T>): TypeId<T> {
  if (isTypeId(key)) return key;
  if (typeof key === 'function') return typeIdOf(key);
  throw new ConfigurationError(`Expected a class or a typeId(), got ${String(key)}.`);
}
