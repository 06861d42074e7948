/**
 * Graph persistence contract
 *
 * The narrow CRUD + listing surface the engine mirrors its mutations into.
 * Implementations own durable storage; the in-memory graph stays the source
 * of truth for the running process.
 *
 * @module services/storage/persistence
 */

import type {
  GraphEdge,
  GraphNode,
  NodeType,
  RelationshipType,
} from '../../models/knowledge-graph.js';

export interface GraphPersistence {
  /** Insert or update by id. Must never change the stored node_type. */
  upsertNode(node: GraphNode): Promise<void>;
  /** Insert or update by (source_id, target_id, relationship). */
  upsertEdge(edge: GraphEdge): Promise<void>;
  listNodesByType(nodeType: NodeType, limit?: number): Promise<GraphNode[]>;
  listAllNodes(limit?: number): Promise<GraphNode[]>;
  listAllEdges(limit?: number): Promise<GraphEdge[]>;
  /** Removes the node and every edge touching it. */
  deleteNode(id: string): Promise<void>;
  deleteEdge(sourceId: string, targetId: string, relationship: RelationshipType): Promise<void>;
  countNodes(): Promise<number>;
  countEdges(): Promise<number>;
}
