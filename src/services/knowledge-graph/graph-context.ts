/**
 * Graph Context Extractor
 *
 * Summarizes an article's connectivity into the signal bundle the prediction
 * subsystem consumes: connection counts, related CVEs and threat actors with
 * mention counts, and directly related articles. The bundle carries no
 * interpretation; thresholds only set the boolean flags.
 *
 * @module services/knowledge-graph/graph-context
 */

import type { NodeType, RelationshipType } from '../../models/knowledge-graph.js';
import type { GraphStore } from './graph-store.js';

// ============================================================
// Types
// ============================================================

export interface ArticleConnection {
  id: string;
  title: string;
  relationship: RelationshipType;
  weight: number;
}

export interface ConnectedEntity {
  id: string;
  name: string;
  node_type: NodeType;
  relationship: RelationshipType;
}

export interface ArticleConnections {
  article_id: string;
  connections: ArticleConnection[];
  entities: ConnectedEntity[];
}

export interface RelatedArticle {
  id: string;
  title: string;
  relationship: RelationshipType;
}

export interface ThreatActorActivity {
  actor: string;
  article_count: number;
  active_campaigns: boolean;
}

export interface CveSeverity {
  cve: string;
  article_count: number;
  is_trending: boolean;
}

export interface GraphContext {
  has_graph_data: boolean;
  connection_count: number;
  /** min(1, connection_count / densityNormalization) */
  connection_density: number;
  related_cves: string[];
  related_threat_actors: string[];
  related_articles: RelatedArticle[];
  threat_actor_history: ThreatActorActivity[];
  cve_severity_context: CveSeverity[];
}

export interface ContextThresholds {
  densityNormalization: number;
  trendingThreshold: number;
  activeCampaignThreshold: number;
}

// ============================================================
// Connections
// ============================================================

/**
 * Successors of an article, split into other articles and entities. Each
 * successor appears once, with the first edge that reaches it.
 */
export function getArticleConnections(store: GraphStore, articleId: string): ArticleConnections {
  const connections: ArticleConnection[] = [];
  const entities: ConnectedEntity[] = [];
  const seen = new Set<string>();

  for (const edge of store.outgoingEdges(articleId)) {
    if (seen.has(edge.target_id)) continue;
    seen.add(edge.target_id);

    const target = store.getNode(edge.target_id);
    if (!target) continue;

    if (target.node_type === 'article') {
      connections.push({
        id: target.id,
        title: target.label,
        relationship: edge.relationship,
        weight: edge.weight,
      });
    } else {
      entities.push({
        id: target.id,
        name: target.label,
        node_type: target.node_type,
        relationship: edge.relationship,
      });
    }
  }

  return { article_id: articleId, connections, entities };
}

// ============================================================
// Context
// ============================================================

export function emptyGraphContext(): GraphContext {
  return {
    has_graph_data: false,
    connection_count: 0,
    connection_density: 0,
    related_cves: [],
    related_threat_actors: [],
    related_articles: [],
    threat_actor_history: [],
    cve_severity_context: [],
  };
}

/** Number of article nodes with an edge into `entityId` */
function mentioningArticles(store: GraphStore, entityId: string): number {
  return store
    .predecessors(entityId)
    .filter((id) => store.nodeType(id) === 'article').length;
}

export function extractGraphContext(
  store: GraphStore,
  articleId: string,
  thresholds: ContextThresholds
): GraphContext {
  if (store.nodeType(articleId) !== 'article') {
    return emptyGraphContext();
  }

  const { connections, entities } = getArticleConnections(store, articleId);
  const connectionCount = connections.length + entities.length;

  const cves = entities.filter((e) => e.node_type === 'vulnerability');
  const actors = entities.filter((e) => e.node_type === 'threat_actor');

  return {
    has_graph_data: true,
    connection_count: connectionCount,
    connection_density: Math.min(1, connectionCount / thresholds.densityNormalization),
    related_cves: cves.map((e) => e.name),
    related_threat_actors: actors.map((e) => e.name),
    related_articles: connections.map((c) => ({
      id: c.id,
      title: c.title,
      relationship: c.relationship,
    })),
    threat_actor_history: actors.map((e) => {
      const count = mentioningArticles(store, e.id);
      return {
        actor: e.name,
        article_count: count,
        active_campaigns: count > thresholds.activeCampaignThreshold,
      };
    }),
    cve_severity_context: cves.map((e) => {
      const count = mentioningArticles(store, e.id);
      return {
        cve: e.name,
        article_count: count,
        is_trending: count > thresholds.trendingThreshold,
      };
    }),
  };
}
