import { EventEmitterProtected } from '../event-emitter';
import { generateID } from '../id-helpers';
import type { LoggerService } from '../logger';
import { isContextAware, bindHostContext } from './base-component';
import {
  isEventSubscriber,
  isInitializable,
  isReloadable,
  isUnloadable,
} from './capabilities';
import {
  getComponentTypeName,
  staticDependencyProvider,
} from './component-type';
import { DependencyGraph } from './dependency-graph';
import {
  ActiveDependentsError,
  ComponentConfigurationError,
  ComponentInitializationError,
  ComponentNotActiveError,
  ComponentReloadError,
  ComponentTeardownError,
  DependencyCycleError,
  componentRegistryErrCodes,
} from './errors';
import { ComponentRegistryEvents } from './events';
import type {
  ComponentRegistryEventMap,
  ComponentRegistryEventName,
} from './events';
import { LifecycleState } from './lifecycle-state';
import type {
  ActiveComponent,
  ComponentRegistryOptions,
  ComponentType,
  HostContext,
  ReloadResult,
  TeardownErrorPolicy,
  TeardownHandle,
  TeardownResult,
} from './types';

/**
 * Entry of the reload candidate list. Dead once the active map holds a
 * different activation (or none) for its type.
 */
interface ReloadCandidate<TContext extends HostContext> {
  type: ComponentType<TContext>;
  handle: string;
}

/**
 * One batch teardown pass: the activations it covers, and those whose
 * teardown already failed in it (by handle).
 */
interface TeardownBatch {
  handles: ReadonlySet<string>;
  failures: Map<string, ComponentTeardownError>;
}

/**
 * ComponentRegistry - the authority for component lifecycles of one host
 *
 * Components are registered by type. Once the registry is bound to a host
 * context through `initializeAll()`, every registered type is instantiated,
 * with its dependencies initialized first (registering them implicitly when
 * needed). Teardown goes through the single-use handle `initializeAll()`
 * returns, and always deinitializes dependents before the components they
 * depend on.
 *
 * Everything runs synchronously on the caller's stack; the registry is not
 * meant to be shared between threads of control.
 *
 * @example
 * ```typescript
 * const registry = new ComponentRegistry<MyHost>({ logger });
 *
 * registry.register(ConfigComponent).register(CommandsComponent);
 *
 * const teardown = registry.initializeAll(host);
 * const commands = registry.getActive(CommandsComponent);
 *
 * // On shutdown
 * const result = teardown.run();
 * ```
 */
export class ComponentRegistry<
  TContext extends HostContext = HostContext,
> extends EventEmitterProtected {
  private readonly name: string;
  private readonly logger: LoggerService;
  private readonly registryEvents: ComponentRegistryEvents;
  private readonly graph: DependencyGraph<TContext>;
  private readonly state: LifecycleState<TContext> =
    new LifecycleState<TContext>();

  private registeredTypes: ComponentType<TContext>[] = [];
  private activeComponents: Map<
    ComponentType<TContext>,
    ActiveComponent<TContext>
  > = new Map();
  private reloadCandidates: ReloadCandidate<TContext>[] = [];

  private boundContext: TContext | null = null;
  private teardownHandle: TeardownHandle | null = null;

  constructor(options: ComponentRegistryOptions<TContext>) {
    super();

    this.name = options.name ?? 'component-registry';
    this.logger = options.logger.service(this.name);
    this.registryEvents = new ComponentRegistryEvents((event, data) =>
      this.emitEvent(event, data),
    );
    this.graph = new DependencyGraph<TContext>({
      dependencyProvider: options.dependencyProvider ?? staticDependencyProvider,
      isActive: (type) => this.activeComponents.has(type),
      isKnown: (type) => this.isRegistered(type),
    });
  }

  // ============================================================================
  // Registration
  // ============================================================================

  /**
   * Register a component type. Registering a type twice is a no-op.
   *
   * While the registry is bound, the type is initialized right away, along
   * with any dependency that is not active yet. Initialization errors
   * propagate; the type stays registered but inactive.
   *
   * @returns The registry, for chaining
   */
  public register(type: ComponentType<TContext>): this {
    if (this.isRegistered(type)) {
      return this;
    }

    const name = getComponentTypeName(type);

    this.registeredTypes.push(type);
    this.logger.entity(name).debug('Component registered');
    this.registryEvents.componentRegistered(name);

    if (this.boundContext) {
      this.initialize(type, this.boundContext);
    }

    return this;
  }

  /**
   * Unregister a component type, deinitializing its active instance first.
   *
   * Fails with `ActiveDependentsError` while components depending on it are
   * active, and with `ComponentTeardownError` if its unload hook throws. In
   * both cases the type stays registered and active.
   */
  public unregister(type: ComponentType<TContext>): void {
    const name = getComponentTypeName(type);
    const record = this.activeComponents.get(type);

    if (record) {
      this.deinitialize(record, null, []);
    }

    const index = this.registeredTypes.indexOf(type);

    if (index === -1) {
      return;
    }

    this.registeredTypes.splice(index, 1);
    this.logger.entity(name).debug('Component unregistered');
    this.registryEvents.componentUnregistered(name, record !== undefined);
  }

  public isRegistered(type: ComponentType<TContext>): boolean {
    return this.registeredTypes.includes(type);
  }

  /**
   * Registered types, in registration order
   */
  public getRegisteredTypes(): ComponentType<TContext>[] {
    return [...this.registeredTypes];
  }

  // ============================================================================
  // Lookups
  // ============================================================================

  public isActive(type: ComponentType<TContext>): boolean {
    return this.activeComponents.has(type);
  }

  /**
   * Active instance of a type
   *
   * @throws {ComponentNotActiveError} If the type has no active instance
   */
  public getActive<TInstance extends object>(
    type: ComponentType<TContext, TInstance>,
  ): TInstance {
    const instance = this.findActive(type);

    if (instance === undefined) {
      throw new ComponentNotActiveError({
        componentName: getComponentTypeName(type),
        registered: this.isRegistered(type),
      });
    }

    return instance;
  }

  /**
   * Active instance of a type, or undefined
   */
  public findActive<TInstance extends object>(
    type: ComponentType<TContext, TInstance>,
  ): TInstance | undefined {
    const record = this.activeComponents.get(type);

    // Narrows the stored instance to the requested type
    if (record && record.instance instanceof type) {
      return record.instance;
    }

    return undefined;
  }

  /**
   * Activation handle of a type's current instance, or undefined
   */
  public getActivationHandle(
    type: ComponentType<TContext>,
  ): string | undefined {
    return this.activeComponents.get(type)?.handle;
  }

  /**
   * Active types, in activation order
   */
  public getActiveTypes(): ComponentType<TContext>[] {
    return Array.from(this.activeComponents.keys());
  }

  /**
   * Display names of active components, in activation order
   */
  public getActiveComponentNames(): string[] {
    return this.getActiveTypes().map((type) => getComponentTypeName(type));
  }

  /**
   * Whether the registry is bound to a host context
   */
  public isBound(): boolean {
    return this.boundContext !== null;
  }

  /**
   * Teardown handle of the current binding, or null while unbound
   */
  public getTeardownHandle(): TeardownHandle | null {
    return this.teardownHandle;
  }

  // ============================================================================
  // Bulk operations
  // ============================================================================

  /**
   * Bind the registry to a host context and initialize every registered type
   * that is not active yet, in registration order. A reload pass follows.
   *
   * If a component fails, the error propagates and the registry stays bound;
   * components initialized so far stay active and the handle remains
   * available through `getTeardownHandle()`.
   *
   * @throws {ComponentConfigurationError} If the registry is already bound
   * @returns The single-use teardown handle of this binding
   */
  public initializeAll(context: TContext): TeardownHandle {
    if (this.boundContext) {
      throw new ComponentConfigurationError(
        'Attempt to initialize components when they are already initialized',
        componentRegistryErrCodes.InvalidBindingState,
        { hostName: this.boundContext.name },
      );
    }

    this.boundContext = context;

    const handle = this.createTeardownHandle();
    this.teardownHandle = handle;

    this.logger.info('Initializing components', {
      params: { host: context.name, registered: this.registeredTypes.length },
    });
    this.registryEvents.registryBound(context.name);

    // Initializing a type may register more types
    for (const type of [...this.registeredTypes]) {
      if (!this.isActive(type)) {
        this.initialize(type, context);
      }
    }

    this.reloadAll();

    this.logger.success('Components initialized', {
      params: { active: this.activeComponents.size },
    });

    return handle;
  }

  /**
   * Call the reload hook of every active reloadable component, each after
   * the components it depends on. Every component reloads at most once per
   * pass. A throwing hook is logged and the pass continues.
   */
  public reloadAll(): ReloadResult {
    const visited = new Set<string>();
    const reloadedComponents: string[] = [];
    const failures: ComponentReloadError[] = [];

    for (const candidate of [...this.reloadCandidates]) {
      const record = this.activeComponents.get(candidate.type);

      if (!record || record.handle !== candidate.handle) {
        this.reloadCandidates = this.reloadCandidates.filter(
          (entry) => entry !== candidate,
        );
        continue;
      }

      this.reloadWithDependencies(record, visited, reloadedComponents, failures);
    }

    return {
      success: failures.length === 0,
      reloadedComponents,
      failures,
    };
  }

  // ============================================================================
  // Initialization
  // ============================================================================

  private initialize(
    type: ComponentType<TContext>,
    context: TContext,
  ): ActiveComponent<TContext> {
    const name = getComponentTypeName(type);

    if (this.activeComponents.has(type)) {
      throw new ComponentConfigurationError(
        `Component "${name}" is already initialized`,
        componentRegistryErrCodes.AlreadyActive,
        { componentName: name },
      );
    }

    if (this.state.isPendingInit(type)) {
      throw new DependencyCycleError({
        componentName: name,
        phase: 'initialize',
        cycle: this.state
          .pendingInitChainFrom(type)
          .map((pending) => getComponentTypeName(pending)),
      });
    }

    this.state.setPendingInit(type, true);

    try {
      this.initializeDependencies(type, context);

      return this.activate(type, context);
    } finally {
      this.state.setPendingInit(type, false);
    }
  }

  private initializeDependencies(
    type: ComponentType<TContext>,
    context: TContext,
  ): void {
    for (const dependency of this.graph.resolveDependencies(type)) {
      this.graph.registerDependent(dependency, type);

      if (!this.isRegistered(dependency)) {
        // Initializes the dependency too, the registry is bound
        this.register(dependency);
      }

      if (!this.isActive(dependency)) {
        this.initialize(dependency, context);
      }
    }
  }

  /**
   * Construct, inject, init and publish one instance. Nothing is left behind
   * if any step fails.
   */
  private activate(
    type: ComponentType<TContext>,
    context: TContext,
  ): ActiveComponent<TContext> {
    const name = getComponentTypeName(type);
    const logger = this.logger.entity(name);
    const instance = this.construct(type, context);

    let record: ActiveComponent<TContext> | null = null;

    try {
      if (isContextAware<TContext>(instance)) {
        instance[bindHostContext](context);
      }

      if (isInitializable(instance)) {
        instance.init();
      }

      record = {
        type,
        instance,
        handle: generateID(),
        activatedAt: Date.now(),
        context,
      };

      this.activeComponents.set(type, record);

      if (isReloadable(instance)) {
        this.reloadCandidates.push({ type, handle: record.handle });
      }

      if (isEventSubscriber(instance)) {
        context.events.subscribe(instance);
      }
    } catch (error) {
      if (record) {
        this.removeActive(record);
      }

      const initError = new ComponentInitializationError(
        { componentName: name },
        error,
      );

      logger.errorObject('Component failed to initialize', error);
      this.registryEvents.componentInitializationFailed(name, initError);

      throw initError;
    }

    logger.success('Component initialized', {
      params: { handle: record.handle },
    });
    this.registryEvents.componentInitialized(name, record.handle);

    return record;
  }

  /**
   * Create an instance through the first available construction path:
   * static factory, one-parameter constructor, no-parameter constructor.
   */
  private construct(type: ComponentType<TContext>, context: TContext): object {
    const name = getComponentTypeName(type);
    let instance: unknown;

    try {
      if (typeof type.create === 'function') {
        instance = type.create(context);
      } else if (type.length === 1) {
        instance = new type(context);
      } else if (type.length === 0) {
        instance = new type();
      } else {
        throw new ComponentConfigurationError(
          `Component "${name}" has no compatible construction path: expected a static create(context), or a constructor taking the host context or nothing (declares ${type.length} parameters)`,
          componentRegistryErrCodes.NoConstructionPath,
          { componentName: name, constructorParameters: type.length },
        );
      }
    } catch (error) {
      if (error instanceof ComponentConfigurationError) {
        throw error;
      }

      const initError = new ComponentInitializationError(
        { componentName: name },
        error,
      );

      this.logger
        .entity(name)
        .errorObject('Component failed to construct', error);
      this.registryEvents.componentInitializationFailed(name, initError);

      throw initError;
    }

    if (!(instance instanceof type)) {
      throw new ComponentConfigurationError(
        `Component "${name}" was constructed as something that is not an instance of its type`,
        componentRegistryErrCodes.FactoryResultMismatch,
        { componentName: name },
      );
    }

    return instance;
  }

  // ============================================================================
  // Deinitialization
  // ============================================================================

  /**
   * Tear down one instance, its active dependents first.
   *
   * Dependents may only be torn down along with it when they belong to the
   * current batch; without a batch any active dependent is an error.
   * Hook failures surface as `ComponentTeardownError` naming the component
   * whose hook threw. A dependent that already failed in the batch is not
   * retried; the component it blocks fails instead.
   */
  private deinitialize(
    record: ActiveComponent<TContext>,
    batch: TeardownBatch | null,
    deinitialized: string[],
  ): void {
    const name = getComponentTypeName(record.type);

    if (this.state.isPendingDeinit(record.handle)) {
      throw new DependencyCycleError({
        componentName: name,
        phase: 'deinitialize',
        cycle: this.state
          .pendingDeinitChainFrom(record.handle)
          .map((handle) => this.describeHandle(handle)),
      });
    }

    this.state.setPendingDeinit(record.handle, true);

    try {
      this.deinitializeDependents(record, batch, deinitialized);

      const { instance } = record;

      if (isUnloadable(instance)) {
        this.runTeardownHook(record, () => instance.unload());
      }

      if (isEventSubscriber(instance)) {
        this.runTeardownHook(record, () =>
          record.context.events.unsubscribeAll(instance),
        );
      }
    } finally {
      this.state.setPendingDeinit(record.handle, false);
    }

    this.removeActive(record);

    // Its edges die with it
    for (const dependency of this.graph.resolveDependencies(record.type)) {
      this.graph.unregisterDependent(dependency, record.type);
    }

    deinitialized.push(name);
    this.logger.entity(name).info('Component deinitialized', {
      params: { handle: record.handle },
    });
    this.registryEvents.componentDeinitialized(name, record.handle);
  }

  private deinitializeDependents(
    record: ActiveComponent<TContext>,
    batch: TeardownBatch | null,
    deinitialized: string[],
  ): void {
    const dependents: ActiveComponent<TContext>[] = [];

    for (const type of this.graph.activeDependentsOf(record.type)) {
      const dependent = this.activeComponents.get(type);

      if (dependent && !this.state.isPendingDeinit(dependent.handle)) {
        dependents.push(dependent);
      }
    }

    const blocking = dependents.filter(
      (dependent) => !batch || !batch.handles.has(dependent.handle),
    );

    if (blocking.length > 0) {
      throw new ActiveDependentsError({
        componentName: getComponentTypeName(record.type),
        dependents: blocking.map((dependent) =>
          getComponentTypeName(dependent.type),
        ),
      });
    }

    for (const dependent of dependents) {
      const earlierFailure = batch?.failures.get(dependent.handle);

      if (earlierFailure) {
        throw new ComponentTeardownError(
          record.instance,
          { componentName: getComponentTypeName(record.type) },
          earlierFailure,
        );
      }
    }

    for (const dependent of dependents) {
      // An earlier dependent may already have taken this one down
      if (this.activeComponents.get(dependent.type)?.handle === dependent.handle) {
        this.deinitialize(dependent, batch, deinitialized);
      }
    }
  }

  /**
   * Deinitialize every active component as one batch and release the binding
   */
  private deinitializeAll(policy?: TeardownErrorPolicy): TeardownResult {
    const context = this.boundContext;

    if (!context) {
      throw new ComponentConfigurationError(
        'Cannot deinitialize components when they are not initialized',
        componentRegistryErrCodes.InvalidBindingState,
      );
    }

    const startTime = Date.now();
    const onError = policy ?? this.createDefaultTeardownPolicy(context);
    const records = Array.from(this.activeComponents.values());
    const batch: TeardownBatch = {
      handles: new Set(records.map((record) => record.handle)),
      failures: new Map(),
    };

    const deinitializedComponents: string[] = [];
    const failures: ComponentTeardownError[] = [];
    let aborted = false;

    this.logger.info('Deinitializing components', {
      params: { host: context.name, active: records.length },
    });

    try {
      for (const record of records) {
        // Torn down as a dependent earlier in this pass, or already failed
        if (
          this.activeComponents.get(record.type)?.handle !== record.handle ||
          batch.failures.has(record.handle)
        ) {
          continue;
        }

        try {
          this.deinitialize(record, batch, deinitializedComponents);
        } catch (error) {
          for (const failure of this.toTeardownFailures(record, error)) {
            const failed = this.findActiveByInstance(failure.component);

            if (failed) {
              batch.failures.set(failed.handle, failure);
            }

            failures.push(failure);
            this.registryEvents.componentDeinitializationFailed(
              failure.componentName,
              failure,
            );

            if (onError(failure) === 'abort') {
              aborted = true;
              break;
            }
          }

          if (aborted) {
            break;
          }
        }
      }
    } finally {
      this.boundContext = null;
      this.teardownHandle = null;
      this.registryEvents.registryUnbound(context.name, deinitializedComponents.length);
    }

    const durationMS = Date.now() - startTime;

    if (aborted) {
      this.logger.warn('Teardown aborted', {
        params: {
          deinitialized: deinitializedComponents.length,
          remaining: this.activeComponents.size,
        },
      });

      return {
        success: false,
        code: 'aborted',
        reason: `Teardown aborted after ${failures.length} failure(s); ${this.activeComponents.size} component(s) still active`,
        deinitializedComponents,
        failures,
        aborted,
        durationMS,
      };
    }

    if (failures.length > 0) {
      this.logger.warn('Components deinitialized with failures', {
        params: {
          deinitialized: deinitializedComponents.length,
          failed: failures.length,
        },
      });

      return {
        success: false,
        code: 'component_failures',
        reason: `${failures.length} component(s) failed to deinitialize: ${failures.map((failure) => failure.componentName).join(', ')}`,
        deinitializedComponents,
        failures,
        aborted,
        durationMS,
      };
    }

    this.logger.success('Components deinitialized', {
      params: { deinitialized: deinitializedComponents.length, durationMS },
    });

    return {
      success: true,
      deinitializedComponents,
      failures,
      aborted,
      durationMS,
    };
  }

  /**
   * Failures of one batch step. When a dependent's hook threw, the dependent
   * fails first and the component it left blocked fails with it.
   */
  private toTeardownFailures(
    record: ActiveComponent<TContext>,
    error: unknown,
  ): ComponentTeardownError[] {
    const componentName = getComponentTypeName(record.type);

    if (!(error instanceof ComponentTeardownError)) {
      return [
        new ComponentTeardownError(record.instance, { componentName }, error),
      ];
    }

    if (error.component === record.instance) {
      return [error];
    }

    return [
      error,
      new ComponentTeardownError(record.instance, { componentName }, error),
    ];
  }

  /**
   * Log each failure through the host's logger and keep going
   */
  private createDefaultTeardownPolicy(context: TContext): TeardownErrorPolicy {
    const hostLogger = context.logger.service(this.name);

    return (error) => {
      hostLogger
        .entity(error.componentName)
        .errorObject('Failed to deinitialize component', error);

      return 'continue';
    };
  }

  private createTeardownHandle(): TeardownHandle {
    let hasRun = false;

    return {
      get hasRun() {
        return hasRun;
      },
      run: (policy) => {
        if (hasRun) {
          return {
            success: false,
            code: 'already_run',
            reason: 'Teardown handle has already been run',
            deinitializedComponents: [],
            failures: [],
            aborted: false,
            durationMS: 0,
          };
        }

        hasRun = true;

        return this.deinitializeAll(policy);
      },
    };
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private reloadWithDependencies(
    record: ActiveComponent<TContext>,
    visited: Set<string>,
    reloadedComponents: string[],
    failures: ComponentReloadError[],
  ): void {
    if (visited.has(record.handle)) {
      return;
    }

    visited.add(record.handle);

    for (const dependency of this.graph.resolveDependencies(record.type)) {
      const dependencyRecord = this.activeComponents.get(dependency);

      if (dependencyRecord) {
        this.reloadWithDependencies(
          dependencyRecord,
          visited,
          reloadedComponents,
          failures,
        );
      }
    }

    const { instance } = record;

    if (!isReloadable(instance)) {
      return;
    }

    const name = getComponentTypeName(record.type);

    try {
      instance.reload();
    } catch (error) {
      const reloadError = new ComponentReloadError(
        { componentName: name },
        error,
      );

      failures.push(reloadError);
      this.logger.entity(name).errorObject('Component failed to reload', error);
      this.registryEvents.componentReloadFailed(name, reloadError);

      return;
    }

    reloadedComponents.push(name);
    this.logger.entity(name).debug('Component reloaded');
    this.registryEvents.componentReloaded(name);
  }

  /**
   * Wrap a failing teardown hook so the error names its component
   */
  private runTeardownHook(
    record: ActiveComponent<TContext>,
    hook: () => void,
  ): void {
    try {
      hook();
    } catch (error) {
      throw new ComponentTeardownError(
        record.instance,
        { componentName: getComponentTypeName(record.type) },
        error,
      );
    }
  }

  /**
   * Remove an activation only if the map still holds that exact activation
   */
  private removeActive(record: ActiveComponent<TContext>): void {
    if (this.activeComponents.get(record.type)?.handle === record.handle) {
      this.activeComponents.delete(record.type);
    }
  }

  private findActiveByInstance(
    instance: object,
  ): ActiveComponent<TContext> | undefined {
    for (const record of this.activeComponents.values()) {
      if (record.instance === instance) {
        return record;
      }
    }

    return undefined;
  }

  private describeHandle(handle: string): string {
    for (const record of this.activeComponents.values()) {
      if (record.handle === handle) {
        return getComponentTypeName(record.type);
      }
    }

    return handle;
  }

  private emitEvent<K extends ComponentRegistryEventName>(
    event: K,
    data: ComponentRegistryEventMap[K],
  ): void {
    this.emit(event, data);
  }

  /**
   * Listener failures never break a lifecycle operation
   */
  protected handleListenerError(event: string, error: unknown): void {
    this.logger.errorObject(`Event handler error for ${event}`, error);
  }
}
