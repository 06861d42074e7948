import { describe, it, expect, beforeEach } from 'vitest';
import { findShortestPaths } from '../../../../src/services/knowledge-graph/path-finder.js';
import { GraphStore } from '../../../../src/services/knowledge-graph/graph-store.js';
import { MemoryGraphPersistence, makeNode } from '../../../helpers/memory-persistence.js';

describe('findShortestPaths', () => {
  let store: GraphStore;

  beforeEach(() => {
    store = new GraphStore(new MemoryGraphPersistence());
    for (const id of ['A1', 'A2', 'A3', 'A4', 'v1', 'v2', 'v3', 'v4', 'lonely']) {
      store.upsertNode(makeNode({ id, node_type: id.startsWith('A') ? 'article' : 'vulnerability' }));
    }
  });

  it('returns the direct edge as a single two-node path', () => {
    store.upsertEdge('A1', 'A2', 'related_to', 0.8);
    expect(findShortestPaths(store, 'A1', 'A2', 3)).toEqual([['A1', 'A2']]);
  });

  it('walks edges against their direction', () => {
    store.upsertEdge('A1', 'v1', 'mentions');
    store.upsertEdge('A2', 'v1', 'mentions');

    expect(findShortestPaths(store, 'A1', 'A2', 3)).toEqual([['A1', 'v1', 'A2']]);
    expect(findShortestPaths(store, 'A2', 'A1', 3)).toEqual([['A2', 'v1', 'A1']]);
  });

  it('returns every shortest path up to the cap, none longer', () => {
    for (const v of ['v1', 'v2', 'v3', 'v4']) {
      store.upsertEdge('A1', v, 'mentions');
      store.upsertEdge('A2', v, 'mentions');
    }
    // longer detour that must never appear
    store.upsertEdge('A1', 'A3', 'related_to', 0.5);
    store.upsertEdge('A3', 'A4', 'related_to', 0.5);
    store.upsertEdge('A4', 'A2', 'related_to', 0.5);

    const paths = findShortestPaths(store, 'A1', 'A2', 3);

    expect(paths).toEqual([
      ['A1', 'v1', 'A2'],
      ['A1', 'v2', 'A2'],
      ['A1', 'v3', 'A2'],
    ]);
    expect(findShortestPaths(store, 'A1', 'A2', 10)).toHaveLength(4);
  });

  it('returns [] when the nodes are disconnected', () => {
    store.upsertEdge('A1', 'v1', 'mentions');
    expect(findShortestPaths(store, 'A1', 'lonely', 3)).toEqual([]);
  });

  it('returns [] when either node is absent', () => {
    expect(findShortestPaths(store, 'A1', 'missing', 3)).toEqual([]);
    expect(findShortestPaths(store, 'missing', 'A1', 3)).toEqual([]);
  });

  it('returns the single-node path from a node to itself', () => {
    expect(findShortestPaths(store, 'A1', 'A1', 3)).toEqual([['A1']]);
  });
});
