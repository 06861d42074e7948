/**
 * Subgraph Extractor
 *
 * Bounded-depth neighborhood around a focus node, rendered for graph
 * visualization. Expansion ignores edge direction: each round adds the
 * predecessors and successors of everything collected so far. Cost grows
 * with (average degree)^depth, hence the depth cap of 5.
 *
 * @module services/knowledge-graph/subgraph
 */

import type { NodeType, RelationshipType } from '../../models/knowledge-graph.js';
import type { GraphStore } from './graph-store.js';

export interface SubgraphNode {
  id: string;
  label: string;
  node_type: NodeType;
  size: number;
  properties: Record<string, unknown>;
}

export interface SubgraphEdge {
  source: string;
  target: string;
  relationship: RelationshipType;
  weight: number;
}

export interface Subgraph {
  nodes: SubgraphNode[];
  edges: SubgraphEdge[];
  focus_id: string;
  depth: number;
  total_nodes: number;
  total_edges: number;
}

/** vis-network compatible projection */
export interface VisNetworkData {
  nodes: Array<{ id: string; label: string; group: NodeType; value: number; title: string }>;
  edges: Array<{ from: string; to: string; label: string; value: number }>;
}

/** Size multiplier applied to the focus node */
const FOCUS_SIZE_FACTOR = 2;

/**
 * Collect every node within `depth` undirected hops of `focusId`, plus every
 * edge with both endpoints in that set. An unknown focus yields an empty
 * subgraph that still carries the requested focus id and depth.
 */
export function extractSubgraph(store: GraphStore, focusId: string, depth: number): Subgraph {
  if (!store.hasNode(focusId)) {
    return { nodes: [], edges: [], focus_id: focusId, depth, total_nodes: 0, total_edges: 0 };
  }

  const collected = new Set<string>([focusId]);
  let frontier = [focusId];

  for (let round = 0; round < depth && frontier.length > 0; round++) {
    const next: string[] = [];
    for (const id of frontier) {
      for (const neighbor of store.neighbors(id)) {
        if (!collected.has(neighbor)) {
          collected.add(neighbor);
          next.push(neighbor);
        }
      }
    }
    frontier = next;
  }

  const nodes: SubgraphNode[] = [];
  for (const id of collected) {
    const node = store.getNode(id);
    if (!node) continue;
    nodes.push({
      id: node.id,
      label: node.label,
      node_type: node.node_type,
      size: id === focusId ? node.size * FOCUS_SIZE_FACTOR : node.size,
      properties: { ...node.properties },
    });
  }

  const edges: SubgraphEdge[] = [];
  for (const edge of store.listEdges()) {
    if (collected.has(edge.source_id) && collected.has(edge.target_id)) {
      edges.push({
        source: edge.source_id,
        target: edge.target_id,
        relationship: edge.relationship,
        weight: edge.weight,
      });
    }
  }

  return {
    nodes,
    edges,
    focus_id: focusId,
    depth,
    total_nodes: nodes.length,
    total_edges: edges.length,
  };
}

export function toVisNetworkFormat(subgraph: Subgraph): VisNetworkData {
  return {
    nodes: subgraph.nodes.map((n) => ({
      id: n.id,
      label: n.label,
      group: n.node_type,
      value: n.size,
      title: n.label,
    })),
    edges: subgraph.edges.map((e) => ({
      from: e.source,
      to: e.target,
      label: e.relationship,
      value: e.weight,
    })),
  };
}
