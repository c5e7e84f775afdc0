import { describe, test, expect } from 'vitest';
import {
  ActiveDependentsError,
  ComponentConfigurationError,
  ComponentInitializationError,
  ComponentNotActiveError,
  ComponentReloadError,
  ComponentTeardownError,
  DependencyCycleError,
  componentRegistryErrCodes,
  componentRegistryErrPrefix,
  componentRegistryErrTypes,
} from './errors';

describe('ComponentRegistry errors', () => {
  test('DependencyCycleError should describe the chain', () => {
    const error = new DependencyCycleError({
      componentName: 'config',
      phase: 'initialize',
      cycle: ['config', 'commands'],
    });

    expect(error).toBeInstanceOf(ComponentConfigurationError);
    expect(error.name).toBe('DependencyCycleError');
    expect(error.message).toBe(
      'Component "config" is already pending initialization (circular dependency: config -> commands -> config)',
    );
    expect(error.errPrefix).toBe(componentRegistryErrPrefix);
    expect(error.errType).toBe(componentRegistryErrTypes.Configuration);
    expect(error.errCode).toBe(componentRegistryErrCodes.CyclicDependency);
  });

  test('DependencyCycleError should fall back to the component name', () => {
    const error = new DependencyCycleError({
      componentName: 'config',
      phase: 'deinitialize',
      cycle: [],
    });

    expect(error.message).toBe(
      'Component "config" is already pending deinitialization (circular dependency: config -> config)',
    );
  });

  test('ActiveDependentsError should list the dependents', () => {
    const error = new ActiveDependentsError({
      componentName: 'config',
      dependents: ['commands', 'chat'],
    });

    expect(error).toBeInstanceOf(ComponentConfigurationError);
    expect(error.message).toBe(
      'Component "config" cannot be deinitialized because its dependents are still active: commands, chat',
    );
    expect(error.errCode).toBe(componentRegistryErrCodes.DependentsActive);
    expect(error.additionalInfo).toEqual({
      componentName: 'config',
      dependents: ['commands', 'chat'],
    });
  });

  test('ComponentInitializationError should keep its cause', () => {
    const cause = new Error('disk full');
    const error = new ComponentInitializationError(
      { componentName: 'config' },
      cause,
    );

    expect(error.message).toBe(
      'Component "config" failed to initialize: disk full',
    );
    expect(error.cause).toBe(cause);
    expect(error.errType).toBe(componentRegistryErrTypes.Component);
  });

  test('ComponentInitializationError should accept a non-error cause', () => {
    const error = new ComponentInitializationError(
      { componentName: 'config' },
      'disk full',
    );

    expect(error.message).toBe('Component "config" failed to initialize');
    expect(error.cause).toBe('disk full');
  });

  test('ComponentTeardownError should carry the failing component', () => {
    const component = { id: 1 };
    const error = new ComponentTeardownError(
      component,
      { componentName: 'commands' },
      new Error('socket closed'),
    );

    expect(error.message).toBe(
      'An exception has occurred while deinitializing component "commands": socket closed',
    );
    expect(error.component).toBe(component);
    expect(error.componentName).toBe('commands');
    expect(error.errCode).toBe(componentRegistryErrCodes.TeardownFailed);
  });

  test('ComponentReloadError should name the component', () => {
    const error = new ComponentReloadError(
      { componentName: 'config' },
      new Error('bad file'),
    );

    expect(error.message).toBe('Component "config" failed to reload: bad file');
    expect(error.errCode).toBe(componentRegistryErrCodes.ReloadFailed);
  });

  test('ComponentNotActiveError should tell registered from unknown types', () => {
    expect(
      new ComponentNotActiveError({ componentName: 'config', registered: true })
        .message,
    ).toBe('Component "config" has not been initialized');
    expect(
      new ComponentNotActiveError({ componentName: 'config', registered: false })
        .message,
    ).toBe('Component "config" is not registered');
  });
});
