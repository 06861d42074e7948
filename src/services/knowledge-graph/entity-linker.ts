/**
 * Entity Linker
 *
 * Turns an ingested article and its extracted entity lists into an article
 * node, one node per distinct entity and one MENTIONS edge per entity.
 * Entity ids are derived from the entity name alone, so the same name maps
 * to the same node whichever article introduces it. Re-linking an article
 * updates it in place and creates nothing new.
 *
 * Known limitation: slugging only lowercases and turns spaces into hyphens,
 * so distinct names that slug identically ("APT 28" and "apt-28") share a
 * node.
 *
 * @module services/knowledge-graph/entity-linker
 */

import type { ArticleInput, GraphNode, NodeType } from '../../models/knowledge-graph.js';
import type { GraphStore } from './graph-store.js';
import { nodeTypeConflictError } from '../../server/errors.js';

export const ARTICLE_NODE_SIZE = 1.5;
export const ENTITY_NODE_SIZE = 1.0;

export interface LinkResult {
  article: GraphNode;
  /** Entity node ids in the order they were linked */
  entity_ids: string[];
  entities_created: number;
  edges_upserted: number;
}

export function slugify(name: string): string {
  return name.toLowerCase().replace(/ /g, '-');
}

export function entityNodeId(nodeType: NodeType, name: string): string {
  return `${nodeType}-${slugify(name)}`;
}

export function articleLabel(title: string, maxLength: number): string {
  return title.length > maxLength ? `${title.slice(0, maxLength)}...` : title;
}

/**
 * Upsert the article node, then each distinct vulnerability, threat actor
 * and category with a MENTIONS edge from the article (weight 1.0).
 * Categories become generic `entity` nodes.
 *
 * Every id is checked before anything is written, so a conflict leaves the
 * graph untouched.
 *
 * @throws MCPError NODE_TYPE_CONFLICT when the article id or an entity id is
 *   held by a node of another type
 */
export function linkArticle(
  store: GraphStore,
  article: ArticleInput,
  labelMaxLength: number
): LinkResult {
  const groups: Array<[NodeType, string[]]> = [
    ['vulnerability', article.vulnerabilities],
    ['threat_actor', article.threat_actors],
    ['entity', article.categories],
  ];

  const entities = new Map<string, { nodeType: NodeType; name: string }>();
  for (const [nodeType, names] of groups) {
    for (const name of names) {
      const id = entityNodeId(nodeType, name);
      if (!entities.has(id)) entities.set(id, { nodeType, name });
    }
  }

  assertType(store, article.id, 'article');
  for (const [id, { nodeType }] of entities) {
    if (id === article.id) {
      throw nodeTypeConflictError(id, 'article', nodeType);
    }
    assertType(store, id, nodeType);
  }

  const articleNode = store.upsertNode({
    id: article.id,
    node_type: 'article',
    label: articleLabel(article.title, labelMaxLength),
    properties: {
      url: article.url,
      published_at: article.published_at,
      categories: [...article.categories],
    },
    size: ARTICLE_NODE_SIZE,
    color: null,
  });

  let created = 0;
  let edges = 0;

  for (const [id, { nodeType, name }] of entities) {
    if (!store.hasNode(id)) {
      store.upsertNode({
        id,
        node_type: nodeType,
        label: name,
        properties: {},
        size: ENTITY_NODE_SIZE,
        color: null,
      });
      created++;
    }

    if (store.upsertEdge(articleNode.id, id, 'mentions', 1.0)) {
      edges++;
    }
  }

  return {
    article: articleNode,
    entity_ids: [...entities.keys()],
    entities_created: created,
    edges_upserted: edges,
  };
}

function assertType(store: GraphStore, id: string, nodeType: NodeType): void {
  const existing = store.nodeType(id);
  if (existing !== undefined && existing !== nodeType) {
    throw nodeTypeConflictError(id, existing, nodeType);
  }
}
