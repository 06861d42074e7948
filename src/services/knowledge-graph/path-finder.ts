/**
 * Shortest paths between two nodes, edge direction ignored.
 *
 * Breadth-first search records every parent that reaches a node at its
 * shortest distance; paths are then enumerated back from the target.
 * Neighbor order follows edge insertion order, which makes the result
 * deterministic for a given graph.
 *
 * @module services/knowledge-graph/path-finder
 */

import type { GraphStore } from './graph-store.js';

/**
 * Up to `maxPaths` shortest paths from `sourceId` to `targetId`, each a list
 * of node ids starting at the source. Empty when either node is absent or
 * the two are disconnected.
 */
export function findShortestPaths(
  store: GraphStore,
  sourceId: string,
  targetId: string,
  maxPaths: number
): string[][] {
  if (maxPaths <= 0 || !store.hasNode(sourceId) || !store.hasNode(targetId)) {
    return [];
  }
  if (sourceId === targetId) {
    return [[sourceId]];
  }

  const distance = new Map<string, number>([[sourceId, 0]]);
  const parents = new Map<string, string[]>();
  let frontier = [sourceId];

  while (frontier.length > 0 && !distance.has(targetId)) {
    const next: string[] = [];
    for (const id of frontier) {
      const depth = distance.get(id) ?? 0;
      for (const neighbor of store.neighbors(id)) {
        const seen = distance.get(neighbor);
        if (seen === undefined) {
          distance.set(neighbor, depth + 1);
          parents.set(neighbor, [id]);
          next.push(neighbor);
        } else if (seen === depth + 1) {
          parents.get(neighbor)?.push(id);
        }
      }
    }
    frontier = next;
  }

  if (!distance.has(targetId)) {
    return [];
  }

  const paths: string[][] = [];
  const walk = (id: string, suffix: string[]): void => {
    if (paths.length >= maxPaths) return;
    if (id === sourceId) {
      paths.push([sourceId, ...suffix]);
      return;
    }
    for (const parent of parents.get(id) ?? []) {
      walk(parent, [id, ...suffix]);
      if (paths.length >= maxPaths) return;
    }
  };
  walk(targetId, []);

  return paths;
}
