import { isFunction } from '../is-function';
import type { EventSubscriber } from './types';

/**
 * Component with a custom init hook, called once the context is injected
 */
export interface Initializable {
  init(): void;
}

/**
 * Component with clean-up to do on teardown.
 *
 * Any component can be torn down; implement this only when something has to
 * be released.
 */
export interface Unloadable {
  unload(): void;
}

/**
 * Component that can refresh its state in place
 */
export interface Reloadable {
  reload(): void;
}

export function isInitializable(instance: object): instance is Initializable {
  return 'init' in instance && isFunction(instance.init);
}

export function isUnloadable(instance: object): instance is Unloadable {
  return 'unload' in instance && isFunction(instance.unload);
}

export function isReloadable(instance: object): instance is Reloadable {
  return 'reload' in instance && isFunction(instance.reload);
}

export function isEventSubscriber(
  instance: object,
): instance is EventSubscriber {
  return 'getEventHandlers' in instance && isFunction(instance.getEventHandlers);
}
