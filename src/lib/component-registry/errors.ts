/**
 * Error prefix constant for all component registry errors
 */
export const componentRegistryErrPrefix = 'ComponentRegistryErr';

/**
 * Error type constants
 */
export const componentRegistryErrTypes = {
  Configuration: 'Configuration',
  Component: 'Component',
  Lookup: 'Lookup',
} as const;

/**
 * Error code constants
 */
export const componentRegistryErrCodes = {
  NoConstructionPath: 'NoConstructionPath',
  FactoryResultMismatch: 'FactoryResultMismatch',
  AlreadyActive: 'AlreadyActive',
  InvalidBindingState: 'InvalidBindingState',
  CyclicDependency: 'CyclicDependency',
  DependentsActive: 'DependentsActive',
  InitializationFailed: 'InitializationFailed',
  TeardownFailed: 'TeardownFailed',
  ReloadFailed: 'ReloadFailed',
  NotActive: 'NotActive',
  ContextNotBound: 'ContextNotBound',
} as const;

export type ComponentRegistryErrCode =
  (typeof componentRegistryErrCodes)[keyof typeof componentRegistryErrCodes];

/**
 * Fatal misuse or misconfiguration, surfaced straight to the caller.
 *
 * Raised for:
 * - a component type with no compatible construction path
 * - double initialization of an active type
 * - `initializeAll()` on a bound registry
 * - dependency cycles (see `DependencyCycleError`)
 * - teardown of a component whose dependents are still active
 *   (see `ActiveDependentsError`)
 */
export class ComponentConfigurationError extends Error {
  public errPrefix = componentRegistryErrPrefix;
  public errType: string = componentRegistryErrTypes.Configuration;
  public errCode: ComponentRegistryErrCode;
  public additionalInfo: Record<string, unknown>;

  constructor(
    message: string,
    errCode: ComponentRegistryErrCode,
    additionalInfo: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'ComponentConfigurationError';
    this.errCode = errCode;
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error thrown when a component is reached again while it is still being
 * initialized or deinitialized
 *
 * Example: Config depends on Commands, Commands depends on Config
 */
export class DependencyCycleError extends ComponentConfigurationError {
  declare additionalInfo: {
    componentName: string;
    phase: 'initialize' | 'deinitialize';
    cycle: string[];
  };

  constructor(additionalInfo: {
    componentName: string;
    phase: 'initialize' | 'deinitialize';
    cycle: string[];
  }) {
    const chain =
      additionalInfo.cycle.length > 0
        ? additionalInfo.cycle.join(' -> ')
        : additionalInfo.componentName;

    super(
      `Component "${additionalInfo.componentName}" is already pending ${additionalInfo.phase === 'initialize' ? 'initialization' : 'deinitialization'} (circular dependency: ${chain} -> ${additionalInfo.componentName})`,
      componentRegistryErrCodes.CyclicDependency,
      additionalInfo,
    );
    this.name = 'DependencyCycleError';
  }
}

/**
 * Error thrown when a component would be torn down while components that
 * depend on it are still active and not part of the same teardown batch
 */
export class ActiveDependentsError extends ComponentConfigurationError {
  declare additionalInfo: {
    componentName: string;
    dependents: string[];
  };

  constructor(additionalInfo: { componentName: string; dependents: string[] }) {
    super(
      `Component "${additionalInfo.componentName}" cannot be deinitialized because its dependents are still active: ${additionalInfo.dependents.join(', ')}`,
      componentRegistryErrCodes.DependentsActive,
      additionalInfo,
    );
    this.name = 'ActiveDependentsError';
  }
}

/**
 * Error thrown when constructing, wiring or running the init hook of a
 * component fails. The component is left registered but inactive.
 */
export class ComponentInitializationError extends Error {
  public errPrefix = componentRegistryErrPrefix;
  public errType = componentRegistryErrTypes.Component;
  public errCode = componentRegistryErrCodes.InitializationFailed;
  public additionalInfo: { componentName: string };

  constructor(additionalInfo: { componentName: string }, cause?: unknown) {
    const causeMessage = cause instanceof Error ? `: ${cause.message}` : '';
    super(
      `Component "${additionalInfo.componentName}" failed to initialize${causeMessage}`,
      cause !== undefined ? { cause } : undefined,
    );
    this.name = 'ComponentInitializationError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error produced when a component fails to deinitialize during teardown.
 * Handed to the teardown policy and collected in `TeardownResult.failures`.
 */
export class ComponentTeardownError extends Error {
  public errPrefix = componentRegistryErrPrefix;
  public errType = componentRegistryErrTypes.Component;
  public errCode = componentRegistryErrCodes.TeardownFailed;
  public additionalInfo: { componentName: string };

  /** The instance that failed to deinitialize */
  public readonly component: object;

  constructor(
    component: object,
    additionalInfo: { componentName: string },
    cause?: unknown,
  ) {
    const causeMessage = cause instanceof Error ? `: ${cause.message}` : '';
    super(
      `An exception has occurred while deinitializing component "${additionalInfo.componentName}"${causeMessage}`,
      cause !== undefined ? { cause } : undefined,
    );
    this.name = 'ComponentTeardownError';
    this.component = component;
    this.additionalInfo = additionalInfo;
  }

  public get componentName(): string {
    return this.additionalInfo.componentName;
  }
}

/**
 * Error produced when a reload hook throws
 */
export class ComponentReloadError extends Error {
  public errPrefix = componentRegistryErrPrefix;
  public errType = componentRegistryErrTypes.Component;
  public errCode = componentRegistryErrCodes.ReloadFailed;
  public additionalInfo: { componentName: string };

  constructor(additionalInfo: { componentName: string }, cause?: unknown) {
    const causeMessage = cause instanceof Error ? `: ${cause.message}` : '';
    super(
      `Component "${additionalInfo.componentName}" failed to reload${causeMessage}`,
      cause !== undefined ? { cause } : undefined,
    );
    this.name = 'ComponentReloadError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error thrown when looking up a component that is not active
 */
export class ComponentNotActiveError extends Error {
  public errPrefix = componentRegistryErrPrefix;
  public errType = componentRegistryErrTypes.Lookup;
  public errCode = componentRegistryErrCodes.NotActive;
  public additionalInfo: { componentName: string; registered: boolean };

  constructor(additionalInfo: { componentName: string; registered: boolean }) {
    super(
      additionalInfo.registered
        ? `Component "${additionalInfo.componentName}" has not been initialized`
        : `Component "${additionalInfo.componentName}" is not registered`,
    );
    this.name = 'ComponentNotActiveError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error thrown when a component reads its host context before the registry
 * injected it (e.g. from its constructor)
 */
export class ComponentContextError extends Error {
  public errPrefix = componentRegistryErrPrefix;
  public errType = componentRegistryErrTypes.Component;
  public errCode = componentRegistryErrCodes.ContextNotBound;
  public additionalInfo: { componentName: string };

  constructor(additionalInfo: { componentName: string }) {
    super(
      `Host context of component "${additionalInfo.componentName}" accessed before it was injected`,
    );
    this.name = 'ComponentContextError';
    this.additionalInfo = additionalInfo;
  }
}
