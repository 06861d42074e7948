/**
 * Graph Store - authoritative in-memory directed multigraph
 *
 * Holds nodes by id, edges by (source, target, relationship) and per-node
 * successor/predecessor edge indexes. Every mutation is applied in memory
 * first and then mirrored to persistence through a serialized write-behind
 * queue; a failed mirror write is logged and counted, never thrown.
 *
 * Mutating methods are synchronous, so within one process there is never
 * more than one structural update in progress and readers always see a
 * consistent graph. Nodes and edges handed out are copies; the maps are
 * only ever changed through the methods below.
 *
 * @module services/knowledge-graph/graph-store
 */

import {
  edgeKey,
  type GraphEdge,
  type GraphNode,
  type NodeType,
  type RelationshipType,
} from '../../models/knowledge-graph.js';
import type { GraphPersistence } from '../storage/persistence.js';
import {
  nodeTypeConflictError,
  persistenceError,
  referentialIntegrityError,
  validationError,
} from '../../server/errors.js';

// ============================================================
// Types
// ============================================================

export interface GraphStatistics {
  total_nodes: number;
  total_edges: number;
  article_nodes: number;
  /** Every node that is not an article */
  entity_nodes: number;
  nodes_by_type: Partial<Record<NodeType, number>>;
  edges_by_relationship: Partial<Record<RelationshipType, number>>;
}

export interface ReplaceResult {
  nodes_loaded: number;
  edges_loaded: number;
  edges_skipped: number;
}

type MirrorOperation = (persistence: GraphPersistence) => Promise<void>;

function copyNode(node: GraphNode): GraphNode {
  return { ...node, properties: { ...node.properties } };
}

function copyEdge(edge: GraphEdge): GraphEdge {
  return { ...edge, properties: { ...edge.properties } };
}

// ============================================================
// GraphStore
// ============================================================

export class GraphStore {
  private nodes = new Map<string, GraphNode>();
  private edges = new Map<string, GraphEdge>();
  /** node id -> keys of edges leaving it */
  private outgoing = new Map<string, Set<string>>();
  /** node id -> keys of edges entering it */
  private incoming = new Map<string, Set<string>>();
  private articleCount = 0;

  private mirrorChain: Promise<void> = Promise.resolve();
  private pendingWrites = 0;
  private failedWrites = 0;

  constructor(private readonly persistence: GraphPersistence) {}

  // ──────────────────────────────────────────────────────────────
  // Mutations
  // ──────────────────────────────────────────────────────────────

  /**
   * Insert a node or replace its label, properties, size and color.
   *
   * @throws MCPError NODE_TYPE_CONFLICT when the id exists with another type
   */
  upsertNode(node: GraphNode): GraphNode {
    const existing = this.nodes.get(node.id);
    if (existing && existing.node_type !== node.node_type) {
      throw nodeTypeConflictError(node.id, existing.node_type, node.node_type);
    }

    const stored = copyNode(node);
    this.nodes.set(stored.id, stored);
    if (!existing && stored.node_type === 'article') {
      this.articleCount++;
    }

    this.mirror(`upsertNode(${stored.id})`, (p) => p.upsertNode(stored));
    return copyNode(stored);
  }

  /**
   * Insert an edge or replace the weight, properties and timestamp of the
   * edge with the same (source, target, relationship).
   *
   * @returns the stored edge, or null when an endpoint is not in the graph
   */
  upsertEdge(
    sourceId: string,
    targetId: string,
    relationship: RelationshipType,
    weight: number = 1.0,
    properties: Record<string, unknown> = {}
  ): GraphEdge | null {
    if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
      throw validationError(`Edge weight must be within [0, 1], got ${weight}`, {
        sourceId,
        targetId,
        relationship,
      });
    }

    const missing = [sourceId, targetId].filter((id) => !this.nodes.has(id));
    if (missing.length > 0) {
      console.error(
        `[GraphStore] Rejected edge: ${referentialIntegrityError(sourceId, targetId, [...new Set(missing)]).message}`
      );
      return null;
    }

    const edge: GraphEdge = {
      source_id: sourceId,
      target_id: targetId,
      relationship,
      weight,
      timestamp: new Date().toISOString(),
      properties: { ...properties },
    };

    const key = edgeKey(sourceId, targetId, relationship);
    const isNew = !this.edges.has(key);
    this.edges.set(key, edge);
    if (isNew) {
      this.index(this.outgoing, sourceId).add(key);
      this.index(this.incoming, targetId).add(key);
    }

    this.mirror(`upsertEdge(${sourceId} -> ${targetId} ${relationship})`, (p) =>
      p.upsertEdge(edge)
    );
    return copyEdge(edge);
  }

  /**
   * Remove a node and every edge where it is source or target.
   *
   * @returns number of edges removed alongside the node, or null when the node was absent
   */
  deleteNode(id: string): number | null {
    const node = this.nodes.get(id);
    if (!node) return null;

    const touching = new Set<string>([
      ...(this.outgoing.get(id) ?? []),
      ...(this.incoming.get(id) ?? []),
    ]);
    for (const key of touching) {
      this.unlinkEdge(key);
    }

    this.nodes.delete(id);
    this.outgoing.delete(id);
    this.incoming.delete(id);
    if (node.node_type === 'article') {
      this.articleCount--;
    }

    this.mirror(`deleteNode(${id})`, (p) => p.deleteNode(id));
    return touching.size;
  }

  deleteEdge(sourceId: string, targetId: string, relationship: RelationshipType): boolean {
    const key = edgeKey(sourceId, targetId, relationship);
    if (!this.unlinkEdge(key)) return false;

    this.mirror(`deleteEdge(${sourceId} -> ${targetId} ${relationship})`, (p) =>
      p.deleteEdge(sourceId, targetId, relationship)
    );
    return true;
  }

  /**
   * Replace the whole graph in one step. Nothing is mirrored.
   * Edges whose endpoints are not among `nodes` are dropped.
   */
  replaceAll(nodes: GraphNode[], edges: GraphEdge[]): ReplaceResult {
    const nextNodes = new Map<string, GraphNode>();
    for (const node of nodes) {
      nextNodes.set(node.id, copyNode(node));
    }

    const nextEdges = new Map<string, GraphEdge>();
    const nextOutgoing = new Map<string, Set<string>>();
    const nextIncoming = new Map<string, Set<string>>();
    let skipped = 0;

    for (const edge of edges) {
      if (!nextNodes.has(edge.source_id) || !nextNodes.has(edge.target_id)) {
        skipped++;
        continue;
      }
      const key = edgeKey(edge.source_id, edge.target_id, edge.relationship);
      if (!nextEdges.has(key)) {
        this.index(nextOutgoing, edge.source_id).add(key);
        this.index(nextIncoming, edge.target_id).add(key);
      }
      nextEdges.set(key, copyEdge(edge));
    }

    if (skipped > 0) {
      console.error(`[GraphStore] Dropped ${skipped} loaded edge(s) with a missing endpoint`);
    }

    this.nodes = nextNodes;
    this.edges = nextEdges;
    this.outgoing = nextOutgoing;
    this.incoming = nextIncoming;
    this.articleCount = [...nextNodes.values()].filter((n) => n.node_type === 'article').length;

    return { nodes_loaded: nextNodes.size, edges_loaded: nextEdges.size, edges_skipped: skipped };
  }

  /** Empty the in-memory graph. Persistence is untouched. */
  clear(): void {
    this.replaceAll([], []);
  }

  // ──────────────────────────────────────────────────────────────
  // Reads
  // ──────────────────────────────────────────────────────────────

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  getNode(id: string): GraphNode | undefined {
    const node = this.nodes.get(id);
    return node ? copyNode(node) : undefined;
  }

  /** Type of the node stored under `id`, without copying it */
  nodeType(id: string): NodeType | undefined {
    return this.nodes.get(id)?.node_type;
  }

  hasEdge(sourceId: string, targetId: string, relationship: RelationshipType): boolean {
    return this.edges.has(edgeKey(sourceId, targetId, relationship));
  }

  getEdge(
    sourceId: string,
    targetId: string,
    relationship: RelationshipType
  ): GraphEdge | undefined {
    const edge = this.edges.get(edgeKey(sourceId, targetId, relationship));
    return edge ? copyEdge(edge) : undefined;
  }

  listNodes(): GraphNode[] {
    return [...this.nodes.values()].map(copyNode);
  }

  listNodesByType(nodeType: NodeType, limit?: number): GraphNode[] {
    const result: GraphNode[] = [];
    for (const node of this.nodes.values()) {
      if (limit !== undefined && result.length >= limit) break;
      if (node.node_type === nodeType) result.push(copyNode(node));
    }
    return result;
  }

  /** All edges in insertion order */
  listEdges(): GraphEdge[] {
    return [...this.edges.values()].map(copyEdge);
  }

  outgoingEdges(id: string): GraphEdge[] {
    return this.edgesFor(this.outgoing.get(id));
  }

  incomingEdges(id: string): GraphEdge[] {
    return this.edgesFor(this.incoming.get(id));
  }

  /** Distinct targets of edges leaving `id` */
  successors(id: string): string[] {
    return [...new Set(this.outgoingEdges(id).map((e) => e.target_id))];
  }

  /** Distinct sources of edges entering `id` */
  predecessors(id: string): string[] {
    return [...new Set(this.incomingEdges(id).map((e) => e.source_id))];
  }

  /** Predecessors and successors together, direction ignored */
  neighbors(id: string): string[] {
    return [...new Set([...this.predecessors(id), ...this.successors(id)])];
  }

  statistics(): GraphStatistics {
    const nodesByType: Partial<Record<NodeType, number>> = {};
    for (const node of this.nodes.values()) {
      nodesByType[node.node_type] = (nodesByType[node.node_type] ?? 0) + 1;
    }
    const edgesByRelationship: Partial<Record<RelationshipType, number>> = {};
    for (const edge of this.edges.values()) {
      edgesByRelationship[edge.relationship] = (edgesByRelationship[edge.relationship] ?? 0) + 1;
    }

    return {
      total_nodes: this.nodes.size,
      total_edges: this.edges.size,
      article_nodes: this.articleCount,
      entity_nodes: this.nodes.size - this.articleCount,
      nodes_by_type: nodesByType,
      edges_by_relationship: edgesByRelationship,
    };
  }

  // ──────────────────────────────────────────────────────────────
  // Persistence mirror
  // ──────────────────────────────────────────────────────────────

  /** Mirror writes queued or running */
  get pendingMirrorWrites(): number {
    return this.pendingWrites;
  }

  /** Mirror writes that failed since construction */
  get mirrorFailures(): number {
    return this.failedWrites;
  }

  /**
   * Resolve once every mirror write queued so far, and any queued while
   * waiting, has settled.
   */
  async flush(): Promise<void> {
    while (this.pendingWrites > 0) {
      await this.mirrorChain;
    }
  }

  /**
   * Queue a write to persistence behind the previous ones. The chain never
   * rejects: failures are logged and counted.
   */
  mirror(label: string, operation: MirrorOperation): void {
    this.pendingWrites++;
    this.mirrorChain = this.mirrorChain.then(async () => {
      try {
        await operation(this.persistence);
      } catch (error) {
        this.failedWrites++;
        console.error(`[GraphStore] ${persistenceError(label, error).message}`);
      } finally {
        this.pendingWrites--;
      }
    });
  }

  // ──────────────────────────────────────────────────────────────
  // Internals
  // ──────────────────────────────────────────────────────────────

  private index(map: Map<string, Set<string>>, id: string): Set<string> {
    let keys = map.get(id);
    if (!keys) {
      keys = new Set<string>();
      map.set(id, keys);
    }
    return keys;
  }

  private edgesFor(keys: Set<string> | undefined): GraphEdge[] {
    if (!keys) return [];
    const result: GraphEdge[] = [];
    for (const key of keys) {
      const edge = this.edges.get(key);
      if (edge) result.push(copyEdge(edge));
    }
    return result;
  }

  private unlinkEdge(key: string): boolean {
    const edge = this.edges.get(key);
    if (!edge) return false;
    this.edges.delete(key);
    this.outgoing.get(edge.source_id)?.delete(key);
    this.incoming.get(edge.target_id)?.delete(key);
    return true;
  }
}
