import type { Logger } from '../logger';
import type {
  ComponentReloadError,
  ComponentTeardownError,
} from './errors';

/**
 * Host event system the registry hands event subscribers to.
 * Opaque beyond these two operations.
 */
export interface HostEventSystem {
  subscribe(subscriber: EventSubscriber): void;
  unsubscribeAll(subscriber: EventSubscriber): void;
}

/**
 * Event handlers a subscriber exposes, keyed by event name
 */
export type EventHandlerMap = Record<string, (payload: unknown) => void>;

/**
 * Component capability: registered with the host's event system while active
 */
export interface EventSubscriber {
  getEventHandlers(): EventHandlerMap;
}

/**
 * The single long-lived object supplied by the host application and injected
 * into every component of a registry.
 */
export interface HostContext {
  /** Host (plugin/application) name */
  readonly name: string;

  /** Root logger of the host */
  readonly logger: Logger;

  readonly events: HostEventSystem;
}

/**
 * A component kind. Component types are classes; the class itself is the
 * identity used as map key everywhere.
 *
 * Construction paths, in order of preference:
 * 1. a static `create(context)` factory
 * 2. a constructor declaring exactly one parameter (receives the context)
 * 3. a constructor declaring no parameters
 *
 * @example
 * ```typescript
 * class CommandsComponent extends BaseComponent<MyHost> implements Initializable {
 *   static readonly componentName = 'commands';
 *   static readonly dependsOn = [ConfigComponent];
 *
 *   init() {
 *     this.logger.info('Registering commands');
 *   }
 * }
 * ```
 */
export interface ComponentType<
  TContext extends HostContext = HostContext,
  TInstance extends object = object,
> {
  // Extra parameters are typed never so they can never be supplied
  new (context?: TContext, ...rest: never[]): TInstance;

  readonly name: string;

  /** Display name used in logs and errors (defaults to the class name) */
  readonly componentName?: string;

  /** Static dependency declaration read by the default dependency provider */
  readonly dependsOn?: readonly ComponentType<TContext>[];

  /** Explicit factory, preferred over the constructor when present */
  create?(context: TContext): TInstance;
}

/**
 * Source of dependency declarations. Called at most once per type and
 * registry; the result is cached for the registry's lifetime.
 */
export type DependencyProvider<TContext extends HostContext = HostContext> = (
  type: ComponentType<TContext>,
) => readonly ComponentType<TContext>[];

/**
 * Decision of a teardown exception policy
 */
export type TeardownErrorAction = 'continue' | 'abort';

/**
 * Decides whether a batch teardown continues after a component failed to
 * deinitialize. May also throw to propagate the error out of `run()`.
 */
export type TeardownErrorPolicy = (
  error: ComponentTeardownError,
) => TeardownErrorAction;

/**
 * Result of running a teardown handle
 */
export interface TeardownResult {
  /** True if every active component was deinitialized */
  success: boolean;

  /** Machine-readable failure code if !success */
  code?: 'already_run' | 'component_failures' | 'aborted';

  /** Human-readable explanation if !success */
  reason?: string;

  /** Names of components that were deinitialized, in teardown order */
  deinitializedComponents: string[];

  /** Wrapped errors of components that failed to deinitialize */
  failures: ComponentTeardownError[];

  /** True if the policy stopped the batch early */
  aborted: boolean;

  /** How long teardown took */
  durationMS: number;
}

/**
 * Single-use handle returned by `initializeAll()`; the only way to tear down
 * the whole set of components of a binding.
 */
export interface TeardownHandle {
  /** True once `run()` has been called */
  readonly hasRun: boolean;

  /**
   * Deinitialize every active component and release the host binding.
   * Only the first call does anything; later calls return `already_run`.
   *
   * @param policy - Overrides the default log-and-continue policy
   */
  run(policy?: TeardownErrorPolicy): TeardownResult;
}

/**
 * Result of a reload pass
 */
export interface ReloadResult {
  /** True if every reload hook completed */
  success: boolean;

  /** Names of components reloaded, in call order */
  reloadedComponents: string[];

  /** Wrapped errors of reload hooks that threw */
  failures: ComponentReloadError[];
}

/**
 * One active component, owned by the registry's active-instance map
 */
export interface ActiveComponent<TContext extends HostContext = HostContext> {
  readonly type: ComponentType<TContext>;
  readonly instance: object;

  /** Unique activation handle (ULID) */
  readonly handle: string;

  /** Unix timestamp (ms) of activation */
  readonly activatedAt: number;

  /** Context the instance was activated with */
  readonly context: TContext;
}

/**
 * Registry configuration options
 */
export interface ComponentRegistryOptions<
  TContext extends HostContext = HostContext,
> {
  /** Root logger the registry logs through (required) */
  logger: Logger;

  /** Registry name used as logger service name (default: 'component-registry') */
  name?: string;

  /** Dependency declaration source (default: static `dependsOn`) */
  dependencyProvider?: DependencyProvider<TContext>;
}
