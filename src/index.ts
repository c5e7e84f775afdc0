// module entry point

// ComponentRegistry - Full export from component-registry module
export * from './lib/component-registry/index';

// Logger
export * from './lib/logger/index';

// ID Helpers
export { generateID, validateID, getIDTimestamp } from './lib/id-helpers';

// Event handling
export {
  EventEmitter,
  EventEmitterProtected,
  type EventCallback,
} from './lib/event-emitter';

// Utility functions
export { errorToString } from './lib/error-to-string';
export { isFunction } from './lib/is-function';
export { isPromise } from './lib/is-promise';
