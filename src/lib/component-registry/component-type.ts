import type { ComponentType, HostContext } from './types';

/**
 * Display name of a component type: its static `componentName`, or the class name
 */
export function getComponentTypeName<TContext extends HostContext>(
  type: ComponentType<TContext>,
): string {
  return type.componentName ?? (type.name || '(anonymous component)');
}

/**
 * Default dependency provider: the type's static `dependsOn` declaration
 */
export function staticDependencyProvider<TContext extends HostContext>(
  type: ComponentType<TContext>,
): readonly ComponentType<TContext>[] {
  return type.dependsOn ?? [];
}
