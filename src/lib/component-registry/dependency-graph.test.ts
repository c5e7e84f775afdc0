import { describe, test, expect, vi, beforeEach } from 'vitest';
import { DependencyGraph } from './dependency-graph';
import type { ComponentType } from './types';

class Alpha {}
class Beta {}
class Gamma {}

describe('DependencyGraph', () => {
  let known: Set<ComponentType>;
  let active: Set<ComponentType>;

  const createGraph = (
    dependencyProvider: (type: ComponentType) => ComponentType[] = () => [],
  ): DependencyGraph =>
    new DependencyGraph({
      dependencyProvider,
      isActive: (type) => active.has(type),
      isKnown: (type) => known.has(type),
    });

  beforeEach(() => {
    known = new Set<ComponentType>([Alpha, Beta, Gamma]);
    active = new Set<ComponentType>();
  });

  describe('resolveDependencies', () => {
    test('should de-duplicate in declaration order', () => {
      const graph = createGraph((type) =>
        type === Alpha ? [Gamma, Beta, Gamma] : [],
      );

      expect(graph.resolveDependencies(Alpha)).toEqual([Gamma, Beta]);
    });

    test('should consult the provider once per type', () => {
      const provider = vi.fn((type: ComponentType): ComponentType[] =>
        type === Alpha ? [Beta] : [],
      );
      const graph = createGraph(provider);

      const first = graph.resolveDependencies(Alpha);
      const second = graph.resolveDependencies(Alpha);

      expect(second).toBe(first);
      expect(Object.isFrozen(first)).toBe(true);
      expect(provider).toHaveBeenCalledTimes(1);
      expect(provider).toHaveBeenCalledWith(Alpha);
    });
  });

  describe('dependents', () => {
    beforeEach(() => {
      active = new Set<ComponentType>([Alpha, Beta, Gamma]);
    });

    test('should ignore a repeated edge', () => {
      const graph = createGraph();

      graph.registerDependent(Beta, Alpha);
      graph.registerDependent(Beta, Alpha);

      expect(graph.activeDependentsOf(Beta)).toEqual([Alpha]);
    });

    test('should only report active, known dependents', () => {
      const graph = createGraph();

      graph.registerDependent(Beta, Alpha);
      graph.registerDependent(Beta, Gamma);
      active.delete(Gamma);

      expect(graph.activeDependentsOf(Beta)).toEqual([Alpha]);

      active.add(Gamma);
      expect(graph.activeDependentsOf(Beta)).toEqual([Alpha, Gamma]);

      known.delete(Alpha);
      expect(graph.activeDependentsOf(Beta)).toEqual([Gamma]);

      // Reading does not prune
      known.add(Alpha);
      expect(graph.activeDependentsOf(Beta)).toEqual([Alpha, Gamma]);
    });

    test('should prune dead dependents while removing an edge', () => {
      const graph = createGraph();

      graph.registerDependent(Beta, Alpha);
      graph.registerDependent(Beta, Gamma);
      known.delete(Gamma);

      graph.unregisterDependent(Beta, Alpha);
      known.add(Gamma);

      expect(graph.activeDependentsOf(Beta)).toEqual([]);
    });

    test('should keep live dependents when removing an edge', () => {
      const graph = createGraph();

      graph.registerDependent(Beta, Alpha);
      graph.registerDependent(Beta, Gamma);

      graph.unregisterDependent(Beta, Alpha);

      expect(graph.activeDependentsOf(Beta)).toEqual([Gamma]);
    });

    test('should ignore removal of an unknown edge', () => {
      const graph = createGraph();

      graph.unregisterDependent(Beta, Alpha);

      expect(graph.activeDependentsOf(Beta)).toEqual([]);
    });
  });
});
