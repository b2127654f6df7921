/**
 * Dependency Graph for operation ordering
 *
 * Tracks dependencies between entities touched by one commit and provides:
 * - Cycle detection
 * - Topological sorting (dependencies first, used for creates)
 * - Reverse topological sorting (dependents first, used for deletes)
 *
 * Both sorts are stable: among nodes that are ready at the same time, the
 * one added first comes first.
 */

import { CircularDependencyError } from '../errors';
import { Operation } from './operations';

/**
 * Types of dependencies between entities
 */
export enum DependencyType {
  /** Child needs its parent (folder → task, product → version, ...) */
  HIERARCHY = 'hierarchy',
  /** Version linked to a task */
  TASK_LINK = 'task_link',
}

/**
 * A node in the dependency graph
 */
export interface DependencyNode {
  /** Entity identifier */
  id: string;
  /** Entity kind */
  type: string;
  /** Depth in the entity tree, used for messages */
  hierarchyLevel: number;
  /** Associated operation */
  operation: Operation;
}

/**
 * An edge in the dependency graph
 */
export interface DependencyEdge {
  /** Source node (depends on toId) */
  fromId: string;
  /** Target node (dependency) */
  toId: string;
  /** Type of dependency */
  depType: DependencyType;
}

export class DependencyGraph {
  private nodes: Map<string, DependencyNode>;
  private edges: Map<string, DependencyEdge[]>; // adjacency list: node -> list of edges

  constructor() {
    this.nodes = new Map();
    this.edges = new Map();
  }

  get size(): number {
    return this.nodes.size;
  }

  addNode(node: DependencyNode): void {
    if (!this.nodes.has(node.id)) {
      this.edges.set(node.id, []);
    }
    this.nodes.set(node.id, node);
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  /**
   * Add an edge (dependency) to the graph
   * Edge direction: fromId → toId means "fromId depends on toId"
   */
  addEdge(fromId: string, toId: string, depType: DependencyType): void {
    if (!this.nodes.has(fromId)) {
      throw new Error(`Node ${fromId} not found in graph`);
    }
    if (!this.nodes.has(toId)) {
      throw new Error(`Node ${toId} not found in graph`);
    }

    const edges = this.edges.get(fromId) ?? [];
    if (edges.some(edge => edge.toId === toId)) {
      return;
    }
    edges.push({ fromId, toId, depType });
    this.edges.set(fromId, edges);
  }

  getNode(id: string): DependencyNode | undefined {
    return this.nodes.get(id);
  }

  /**
   * Get all dependencies for a node (outgoing edges)
   */
  getDependencies(nodeId: string): DependencyEdge[] {
    return this.edges.get(nodeId) ?? [];
  }

  /**
   * Get all dependents of a node (incoming edges)
   */
  getDependents(nodeId: string): DependencyEdge[] {
    const dependents: DependencyEdge[] = [];
    for (const edges of this.edges.values()) {
      for (const edge of edges) {
        if (edge.toId === nodeId) {
          dependents.push(edge);
        }
      }
    }
    return dependents;
  }

  /**
   * Detect cycles in the graph using DFS
   * Returns array of cycles, where each cycle is an array of node IDs
   */
  detectCycles(): string[][] {
    const visited = new Set<string>();
    const recStack = new Set<string>();
    const cycles: string[][] = [];

    const dfs = (nodeId: string, path: string[]): void => {
      if (recStack.has(nodeId)) {
        const cycleStart = path.indexOf(nodeId);
        if (cycleStart !== -1) {
          cycles.push([...path.slice(cycleStart), nodeId]);
        }
        return;
      }

      if (visited.has(nodeId)) {
        return;
      }

      visited.add(nodeId);
      recStack.add(nodeId);
      path.push(nodeId);

      for (const edge of this.getDependencies(nodeId)) {
        dfs(edge.toId, [...path]);
      }

      recStack.delete(nodeId);
    };

    for (const nodeId of this.nodes.keys()) {
      if (!visited.has(nodeId)) {
        dfs(nodeId, []);
      }
    }

    return cycles;
  }

  /**
   * Topological sort using Kahn's algorithm
   * Returns operations in dependency order (dependencies first)
   * Throws CircularDependencyError if cycles are detected
   */
  topologicalSort(): Operation[] {
    return this.kahnSort(
      nodeId => this.getDependencies(nodeId).length,
      nodeId => this.getDependents(nodeId).map(edge => edge.fromId)
    );
  }

  /**
   * Returns operations with dependents first, e.g. children before parents
   */
  reverseTopologicalSort(): Operation[] {
    return this.kahnSort(
      nodeId => this.getDependents(nodeId).length,
      nodeId => this.getDependencies(nodeId).map(edge => edge.toId)
    );
  }

  private kahnSort(
    blockerCount: (nodeId: string) => number,
    unblocks: (nodeId: string) => string[]
  ): Operation[] {
    const cycles = this.detectCycles();
    if (cycles.length > 0) {
      throw new CircularDependencyError(cycles);
    }

    const remaining = new Map<string, number>();
    const queue: string[] = [];
    for (const nodeId of this.nodes.keys()) {
      const count = blockerCount(nodeId);
      remaining.set(nodeId, count);
      if (count === 0) {
        queue.push(nodeId);
      }
    }

    const sorted: Operation[] = [];
    for (let index = 0; index < queue.length; index += 1) {
      const nodeId = queue[index];
      const node = this.nodes.get(nodeId);
      if (node) {
        sorted.push(node.operation);
      }
      for (const nextId of unblocks(nodeId)) {
        const count = (remaining.get(nextId) ?? 0) - 1;
        remaining.set(nextId, count);
        if (count === 0) {
          queue.push(nextId);
        }
      }
    }

    if (sorted.length !== this.nodes.size) {
      throw new Error('Topological sort failed - likely due to cycles');
    }
    return sorted;
  }
}
