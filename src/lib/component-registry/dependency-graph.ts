import type { ComponentType, DependencyProvider, HostContext } from './types';

export interface DependencyGraphOptions<TContext extends HostContext> {
  /** Source of dependency declarations, read at most once per type */
  dependencyProvider: DependencyProvider<TContext>;

  /** Whether a type currently has an active instance */
  isActive: (type: ComponentType<TContext>) => boolean;

  /** Whether a type is still known to the owner; unknown dependents are dead edges */
  isKnown: (type: ComponentType<TContext>) => boolean;
}

/**
 * Dependency graph between component types.
 *
 * Forward edges (type -> dependencies) come from the dependency provider and
 * are cached. Reverse edges (dependency -> dependents) are recorded as
 * dependencies get resolved and are only used to find teardown blockers.
 * Edges hold types as plain lookup keys; whether a dependent is alive is
 * always answered by the owner through `isActive`/`isKnown`.
 */
export class DependencyGraph<TContext extends HostContext = HostContext> {
  private readonly dependencyProvider: DependencyProvider<TContext>;
  private readonly isActive: (type: ComponentType<TContext>) => boolean;
  private readonly isKnown: (type: ComponentType<TContext>) => boolean;

  private resolvedDependencies: Map<
    ComponentType<TContext>,
    readonly ComponentType<TContext>[]
  > = new Map();

  private resolvedDependents: Map<
    ComponentType<TContext>,
    ComponentType<TContext>[]
  > = new Map();

  constructor(options: DependencyGraphOptions<TContext>) {
    this.dependencyProvider = options.dependencyProvider;
    this.isActive = options.isActive;
    this.isKnown = options.isKnown;
  }

  /**
   * Dependencies of a type, in declaration order and without duplicates.
   * The provider is consulted once per type; later calls return the cached list.
   */
  public resolveDependencies(
    type: ComponentType<TContext>,
  ): readonly ComponentType<TContext>[] {
    const cached = this.resolvedDependencies.get(type);

    if (cached) {
      return cached;
    }

    const dependencies = Object.freeze(
      Array.from(new Set(this.dependencyProvider(type))),
    );

    this.resolvedDependencies.set(type, dependencies);

    return dependencies;
  }

  /**
   * Record that `dependent` depends on `dependency`. Adding an existing edge
   * is a no-op.
   */
  public registerDependent(
    dependency: ComponentType<TContext>,
    dependent: ComponentType<TContext>,
  ): void {
    let dependents = this.resolvedDependents.get(dependency);

    if (!dependents) {
      dependents = [];
      this.resolvedDependents.set(dependency, dependents);
    }

    if (!dependents.includes(dependent)) {
      dependents.push(dependent);
    }
  }

  /**
   * Remove the edge if present, pruning dead dependents on the way. The
   * dependency's entry is dropped once it has no dependents left.
   */
  public unregisterDependent(
    dependency: ComponentType<TContext>,
    dependent: ComponentType<TContext>,
  ): void {
    const dependents = this.resolvedDependents.get(dependency);

    if (!dependents) {
      return;
    }

    const remaining = dependents.filter(
      (linked) => linked !== dependent && this.isKnown(linked),
    );

    if (remaining.length === 0) {
      this.resolvedDependents.delete(dependency);
    } else {
      this.resolvedDependents.set(dependency, remaining);
    }
  }

  /**
   * Dependents of a type that currently have an active instance, in the
   * order their edges were recorded. Reading never mutates the graph.
   */
  public activeDependentsOf(
    type: ComponentType<TContext>,
  ): ComponentType<TContext>[] {
    const dependents = this.resolvedDependents.get(type) ?? [];

    return dependents.filter(
      (dependent) => this.isKnown(dependent) && this.isActive(dependent),
    );
  }
}
