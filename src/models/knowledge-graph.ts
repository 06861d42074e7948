/**
 * Knowledge Graph Models
 *
 * Node and edge shapes shared by the in-memory store, the persistence
 * adapter and the query services. Enum wire values are lowercase and match
 * the `node_type` / `relationship` columns of the backing store.
 *
 * @module models/knowledge-graph
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ENUMS
// ═══════════════════════════════════════════════════════════════════════════════

export const NODE_TYPES = [
  'article',
  'entity',
  'vulnerability',
  'threat_actor',
  'product',
  'technique',
] as const;

export type NodeType = (typeof NODE_TYPES)[number];

export const RELATIONSHIP_TYPES = [
  'mentions',
  'exploits',
  'related_to',
  'evolves_from',
  'targets',
  'uses',
  'attributed_to',
] as const;

export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

// ═══════════════════════════════════════════════════════════════════════════════
// GRAPH ELEMENTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A typed vertex: an article or an entity extracted from one.
 *
 * `id` is stable across restarts. Article nodes reuse the article id, entity
 * nodes are `<node_type>-<slug(label)>`. `node_type` never changes once the
 * node exists.
 */
export interface GraphNode {
  id: string;
  node_type: NodeType;
  label: string;
  properties: Record<string, unknown>;
  /** Relative size hint for visualization */
  size: number;
  color: string | null;
}

/**
 * Directed, weighted relationship. Unique per (source_id, target_id, relationship).
 */
export interface GraphEdge {
  source_id: string;
  target_id: string;
  relationship: RelationshipType;
  /** In [0, 1] */
  weight: number;
  /** ISO-8601 time of the latest upsert */
  timestamp: string;
  properties: Record<string, unknown>;
}

/**
 * Article as handed over by ingestion, after entity extraction.
 */
export interface ArticleInput {
  id: string;
  title: string;
  url: string;
  published_at: string;
  categories: string[];
  vulnerabilities: string[];
  threat_actors: string[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/** Uniqueness key of an edge */
export function edgeKey(
  sourceId: string,
  targetId: string,
  relationship: RelationshipType
): string {
  return `${sourceId}\u0000${targetId}\u0000${relationship}`;
}
