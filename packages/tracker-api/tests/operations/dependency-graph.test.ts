import { describe, expect, test } from '@jest/globals';

import { CircularDependencyError } from '../../src/errors';
import { DependencyGraph, DependencyType } from '../../src/operations/dependency-graph';
import { createOperation } from '../../src/operations/operations';

function graphOf(...ids: string[]): DependencyGraph {
  const graph = new DependencyGraph();
  ids.forEach((id, index) => {
    graph.addNode({
      id,
      type: 'folder',
      hierarchyLevel: 0,
      operation: createOperation('create', 'folder', id, { name: id }, `op_${index + 1}`),
    });
  });
  return graph;
}

describe('DependencyGraph', () => {
  test('topologicalSort puts dependencies first and keeps insertion order otherwise', () => {
    const graph = graphOf('A', 'B', 'C');
    graph.addEdge('B', 'A', DependencyType.HIERARCHY);

    expect(graph.topologicalSort().map(operation => operation.entityId)).toEqual(['A', 'C', 'B']);
  });

  test('reverseTopologicalSort puts dependents first', () => {
    const graph = graphOf('A', 'B', 'C');
    graph.addEdge('B', 'A', DependencyType.HIERARCHY);

    expect(graph.reverseTopologicalSort().map(operation => operation.entityId)).toEqual(['B', 'C', 'A']);
  });

  test('orders a chain with a task link', () => {
    const graph = graphOf('version', 'task', 'product', 'folder');
    graph.addEdge('version', 'product', DependencyType.HIERARCHY);
    graph.addEdge('version', 'task', DependencyType.TASK_LINK);
    graph.addEdge('product', 'folder', DependencyType.HIERARCHY);
    graph.addEdge('task', 'folder', DependencyType.HIERARCHY);

    expect(graph.topologicalSort().map(operation => operation.id)).toEqual(['op_4', 'op_2', 'op_3', 'op_1']);
  });

  test('ignores duplicate edges', () => {
    const graph = graphOf('A', 'B');
    graph.addEdge('B', 'A', DependencyType.HIERARCHY);
    graph.addEdge('B', 'A', DependencyType.HIERARCHY);

    expect(graph.getDependencies('B')).toHaveLength(1);
    expect(graph.getDependents('A').map(edge => edge.fromId)).toEqual(['B']);
  });

  test('rejects edges to unknown nodes', () => {
    const graph = graphOf('A');
    expect(() => graph.addEdge('A', 'missing', DependencyType.HIERARCHY)).toThrow('Node missing not found in graph');
  });

  test('raises CircularDependencyError for a cycle', () => {
    const graph = graphOf('A', 'B');
    graph.addEdge('A', 'B', DependencyType.HIERARCHY);
    graph.addEdge('B', 'A', DependencyType.HIERARCHY);

    expect(graph.detectCycles()).toEqual([['A', 'B', 'A']]);
    expect(() => graph.topologicalSort()).toThrow(CircularDependencyError);
    expect(() => graph.reverseTopologicalSort()).toThrow('Circular dependencies detected:\nA -> B -> A');
  });
});
