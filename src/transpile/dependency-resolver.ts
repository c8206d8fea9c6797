/**
 * Dependency resolution and stage ordering for workflow steps
 */

export interface StepNode {
  id: string;
  dependencies: string[];
  dependents: string[];
}

export interface ExecutionGroup {
  /** Steps that can run in parallel, in insertion order */
  parallel: string[];
  /** Stage index (0 = no dependencies, 1 = depends on stage 0, etc.) */
  level: number;
}

export interface DependencyGraph {
  nodes: Map<string, StepNode>;
  executionOrder: ExecutionGroup[];
  hasCycles: boolean;
  cycleNodes?: string[];
}

export class DependencyResolver {
  /**
   * Build dependency graph from step dependencies. Pass a Map to keep insertion order inside
   * every execution group.
   */
  static buildDependencyGraph(
    dependencies: Map<string, string[]> | Record<string, string[]>
  ): DependencyGraph {
    const nodes = new Map<string, StepNode>();
    const entries =
      dependencies instanceof Map ? [...dependencies.entries()] : Object.entries(dependencies);

    for (const [id, deps] of entries) {
      nodes.set(id, { id, dependencies: [...new Set(deps)], dependents: [] });
    }

    // Build bidirectional relationships
    for (const node of nodes.values()) {
      for (const depId of node.dependencies) {
        const depNode = nodes.get(depId);
        if (!depNode) {
          throw new Error(`Step "${node.id}" depends on "${depId}" but "${depId}" is not defined`);
        }
        depNode.dependents.push(node.id);
      }
    }

    const cycleDetection = this.detectCycles(nodes);
    if (cycleDetection.hasCycles) {
      return {
        nodes,
        executionOrder: [],
        hasCycles: true,
        cycleNodes: cycleDetection.cycleNodes,
      };
    }

    return {
      nodes,
      executionOrder: this.topologicalSort(nodes),
      hasCycles: false,
    };
  }

  /**
   * Detect cycles in the dependency graph using DFS
   */
  static detectCycles(nodes: Map<string, StepNode>): {
    hasCycles: boolean;
    cycleNodes?: string[];
  } {
    const visited = new Set<string>();
    const recursionStack = new Set<string>();
    const cycleNodes: string[] = [];

    const dfs = (nodeId: string): boolean => {
      if (recursionStack.has(nodeId)) {
        cycleNodes.push(nodeId);
        return true;
      }
      if (visited.has(nodeId)) {
        return false;
      }

      visited.add(nodeId);
      recursionStack.add(nodeId);

      const node = nodes.get(nodeId);
      if (node) {
        for (const depId of node.dependencies) {
          if (dfs(depId)) {
            cycleNodes.push(nodeId);
            return true;
          }
        }
      }

      recursionStack.delete(nodeId);
      return false;
    };

    for (const nodeId of nodes.keys()) {
      if (!visited.has(nodeId) && dfs(nodeId)) {
        return { hasCycles: true, cycleNodes: [...new Set(cycleNodes)].reverse() };
      }
    }

    return { hasCycles: false };
  }

  /**
   * Path from `start` back to itself, if `start` lies on a cycle
   */
  static findCycleThrough(dependencies: Map<string, string[]>, start: string): string[] | null {
    const visited = new Set<string>();

    const dfs = (nodeId: string, trail: string[]): string[] | null => {
      for (const depId of dependencies.get(nodeId) ?? []) {
        if (depId === start) {
          return [...trail, start];
        }
        if (visited.has(depId)) continue;
        visited.add(depId);
        const found = dfs(depId, [...trail, depId]);
        if (found) return found;
      }
      return null;
    };

    return dfs(start, [start]);
  }

  /**
   * Group nodes into levels: a node lands one level after its deepest dependency, which is
   * the earliest level it can run at
   */
  private static topologicalSort(nodes: Map<string, StepNode>): ExecutionGroup[] {
    const remainingNodes = new Map(nodes);
    const executionGroups: ExecutionGroup[] = [];
    let level = 0;

    while (remainingNodes.size > 0) {
      const readyNodes: string[] = [];

      for (const [nodeId, node] of remainingNodes.entries()) {
        const unmetDependencies = node.dependencies.filter(depId => remainingNodes.has(depId));
        if (unmetDependencies.length === 0) {
          readyNodes.push(nodeId);
        }
      }

      if (readyNodes.length === 0) {
        // Unreachable after cycle detection
        throw new Error('Unable to resolve dependencies - possible circular dependency detected');
      }

      executionGroups.push({ parallel: readyNodes, level });

      for (const nodeId of readyNodes) {
        remainingNodes.delete(nodeId);
      }

      level++;
    }

    return executionGroups;
  }

  /**
   * Level of every node, keyed by id
   */
  static levelsOf(graph: DependencyGraph): Map<string, number> {
    const levels = new Map<string, number>();
    for (const group of graph.executionOrder) {
      for (const id of group.parallel) {
        levels.set(id, group.level);
      }
    }
    return levels;
  }

  /**
   * Get execution statistics for debugging
   */
  static getExecutionStats(graph: DependencyGraph): {
    totalSteps: number;
    stages: number;
    maxParallelism: number;
    stepsWithDependencies: number;
  } {
    return {
      totalSteps: graph.nodes.size,
      stages: graph.executionOrder.length,
      maxParallelism: Math.max(0, ...graph.executionOrder.map(group => group.parallel.length)),
      stepsWithDependencies: Array.from(graph.nodes.values()).filter(
        node => node.dependencies.length > 0
      ).length,
    };
  }
}
