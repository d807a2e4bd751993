export { Locus } from './api/locus.js';
export { Observer } from './api/observer.js';
export type { ListenOptions, ObserverGetOptions, ObserverOptions } from './api/observer.js';

export { Location } from './types/types.js';
export type {
  Constructor,
  FactoryProvider,
  GetOptions,
  InstantiateHook,
  NameFilter,
  NameOptions,
  Provider,
  RegistryConfig,
  TypeKey,
  UnregisterOptions,
  ValueProvider,
} from './types/types.js';

export * from './core/type-id.js';

export { ChangeNotifier, ValueNotifier, isObservable } from './core/observable.js';
export type { Listener, Observable } from './core/observable.js';
export { LazyCell } from './core/lazy-cell.js';
export type { Cell, LazyCellOptions } from './core/lazy-cell.js';
export { Registry } from './core/registry.js';
export { SubscriptionManager } from './core/subscription-manager.js';
export { TreeScope } from './core/tree-scope.js';
export type { BindOptions, BindingState, TreeBinding, TreeHost } from './core/tree-scope.js';

export { HostBinding } from './host/host-binding.js';
export type { BindingSpec } from './host/host-binding.js';
export { BindingGroup, groupEntry } from './host/binding-group.js';
export type { GroupDeclaration, GroupKey } from './host/binding-group.js';

// Errors
export {
  AggregateDisposalError,
  AlreadyRegisteredError,
  CapabilityError,
  CellDisposedError,
  CircularConstructionError,
  ConfigurationError,
  FactoryExecutionError,
  LocatorError,
  NotFoundError,
  NotifierDisposedError,
  NotRegisteredError,
} from './errors/errors.js';
export type { LookupLocation } from './errors/errors.js';
