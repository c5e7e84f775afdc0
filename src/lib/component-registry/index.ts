/**
 * ComponentRegistry - dependency-ordered component lifecycles for a host
 *
 * Registers component types, resolves and initializes their dependencies
 * first, rejects dependency cycles, tracks dependents so nothing is torn down
 * from under a live component, and supports in-place reloads.
 *
 * @module component-registry
 */

// Core classes
export { ComponentRegistry } from './component-registry';
export {
  BaseComponent,
  bindHostContext,
  isContextAware,
  type ContextAware,
} from './base-component';
export { HostEventBus } from './host-event-bus';
export { DependencyGraph, type DependencyGraphOptions } from './dependency-graph';
export {
  ComponentRegistryEvents,
  type ComponentRegistryEventMap,
  type ComponentRegistryEventName,
  type ComponentRegistryEmit,
} from './events';

// Capabilities
export {
  isInitializable,
  isUnloadable,
  isReloadable,
  isEventSubscriber,
  type Initializable,
  type Unloadable,
  type Reloadable,
} from './capabilities';
export {
  getComponentTypeName,
  staticDependencyProvider,
} from './component-type';

// Types
export type {
  ActiveComponent,
  ComponentRegistryOptions,
  ComponentType,
  DependencyProvider,
  EventHandlerMap,
  EventSubscriber,
  HostContext,
  HostEventSystem,
  ReloadResult,
  TeardownErrorAction,
  TeardownErrorPolicy,
  TeardownHandle,
  TeardownResult,
} from './types';

// Errors
export {
  componentRegistryErrPrefix,
  componentRegistryErrTypes,
  componentRegistryErrCodes,
  type ComponentRegistryErrCode,
  ComponentConfigurationError,
  DependencyCycleError,
  ActiveDependentsError,
  ComponentInitializationError,
  ComponentTeardownError,
  ComponentReloadError,
  ComponentNotActiveError,
  ComponentContextError,
} from './errors';
