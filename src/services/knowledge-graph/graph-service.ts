/**
 * Knowledge Graph Service - Orchestration layer
 *
 * Owns one GraphStore and the persistence it mirrors into. Mutations run one
 * at a time through an exclusive writer section; queries read the in-memory
 * store synchronously and never touch persistence.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module services/knowledge-graph/graph-service
 */

import type {
  ArticleInput,
  GraphEdge,
  GraphNode,
  NodeType,
  RelationshipType,
} from '../../models/knowledge-graph.js';
import type { GraphPersistence } from '../storage/persistence.js';
import {
  ArticleInputSchema,
  ArticleRefSchema,
  DepthSchema,
  RelationshipAssertionSchema,
  SimilarArticlesSchema,
  validateInput,
} from '../../utils/validation.js';
import { persistenceError, referentialIntegrityError } from '../../server/errors.js';
import { DEFAULT_GRAPH_CONFIG, type GraphConfig } from './config.js';
import { GraphStore, type GraphStatistics, type ReplaceResult } from './graph-store.js';
import { linkArticle } from './entity-linker.js';
import { extractSubgraph, type Subgraph } from './subgraph.js';
import { findShortestPaths } from './path-finder.js';
import {
  extractGraphContext,
  getArticleConnections,
  type ArticleConnections,
  type GraphContext,
} from './graph-context.js';

// ============================================================
// Types
// ============================================================

export interface SimilarArticle {
  article: { id: string };
  similarity: number;
}

export interface ConnectResult {
  article_id: string;
  edges_created: number;
  /** Ids that were not connected because one endpoint is not in the graph */
  skipped: string[];
}

export interface RelationshipInput {
  source_id: string;
  target_id: string;
  relationship: RelationshipType;
  weight?: number;
  properties?: Record<string, unknown>;
}

export interface DeleteNodeResult {
  node_id: string;
  deleted: boolean;
  edges_removed: number;
}

export interface ReconcileResult {
  nodes_written: number;
  edges_written: number;
  /** Persisted rows with no in-memory counterpart, removed */
  nodes_deleted: number;
  edges_deleted: number;
  failures: number;
}

export interface GraphHealth {
  healthy: boolean;
  memory: { nodes: number; edges: number };
  persisted: { nodes: number; edges: number } | null;
  pending_mirror_writes: number;
  /** Failed mirror writes not yet repaired by a clean reconcile */
  mirror_failures: number;
  issues: string[];
}

// ============================================================
// KnowledgeGraphService
// ============================================================

export class KnowledgeGraphService {
  readonly store: GraphStore;
  readonly config: GraphConfig;
  private readonly persistence: GraphPersistence;
  /** Settles when the last queued mutation has; never rejects */
  private writer: Promise<void> = Promise.resolve();
  /** store.mirrorFailures as of the last reconcile that had no failures */
  private repairedFailures = 0;

  constructor(persistence: GraphPersistence, config: GraphConfig = DEFAULT_GRAPH_CONFIG) {
    this.persistence = persistence;
    this.config = config;
    this.store = new GraphStore(persistence);
  }

  // ──────────────────────────────────────────────────────────────
  // Mutations
  // ──────────────────────────────────────────────────────────────

  /**
   * Link an article and all of its entities into the graph.
   *
   * @returns the stored article node
   * @throws ValidationError when the article is malformed
   * @throws MCPError NODE_TYPE_CONFLICT when the article id or an entity id is
   *   already used by a node of another type
   */
  async addArticleNode(article: ArticleInput): Promise<GraphNode> {
    const input = validateInput(ArticleInputSchema, article);
    return this.exclusive(() => {
      const result = linkArticle(this.store, input, this.config.articleLabelMaxLength);
      console.error(
        `[KnowledgeGraph] Linked article ${input.id}: ${result.entity_ids.length} entities (${result.entities_created} new)`
      );
      return result.article;
    });
  }

  /**
   * Add a RELATED_TO edge from `article` to each similar article, weighted by
   * the similarity score. Pairs with a missing endpoint are skipped.
   */
  async connectSimilarArticles(
    article: { id: string },
    similar: SimilarArticle[]
  ): Promise<ConnectResult> {
    const articleId = validateInput(ArticleRefSchema, article).id;
    const pairs = validateInput(SimilarArticlesSchema, similar);
    return this.exclusive(() => {
      let created = 0;
      const skipped: string[] = [];
      for (const { article, similarity } of pairs) {
        if (this.store.upsertEdge(articleId, article.id, 'related_to', similarity)) {
          created++;
        } else {
          skipped.push(article.id);
        }
      }
      return { article_id: articleId, edges_created: created, skipped };
    });
  }

  /**
   * Record an externally asserted relationship between two existing nodes.
   *
   * @throws MCPError REFERENTIAL_INTEGRITY when an endpoint is not in the graph
   */
  async addRelationship(assertion: RelationshipInput): Promise<GraphEdge> {
    const input = validateInput(RelationshipAssertionSchema, assertion);
    return this.exclusive(() => {
      const edge = this.store.upsertEdge(
        input.source_id,
        input.target_id,
        input.relationship,
        input.weight,
        input.properties
      );
      if (!edge) {
        const missing = [input.source_id, input.target_id].filter((id) => !this.store.hasNode(id));
        throw referentialIntegrityError(input.source_id, input.target_id, [...new Set(missing)]);
      }
      return edge;
    });
  }

  /** Administrative delete of a node and every edge touching it. */
  async deleteNode(nodeId: string): Promise<DeleteNodeResult> {
    return this.exclusive(() => {
      const removed = this.store.deleteNode(nodeId);
      if (removed === null) {
        return { node_id: nodeId, deleted: false, edges_removed: 0 };
      }
      console.error(`[KnowledgeGraph] Deleted node ${nodeId} and ${removed} edge(s)`);
      return { node_id: nodeId, deleted: true, edges_removed: removed };
    });
  }

  async deleteEdge(
    sourceId: string,
    targetId: string,
    relationship: RelationshipType
  ): Promise<boolean> {
    return this.exclusive(() => this.store.deleteEdge(sourceId, targetId, relationship));
  }

  /**
   * Replace the in-memory graph with the persisted one.
   *
   * Queued mirror writes are drained first so the listing reflects them. If
   * listing fails the current graph is kept and 0 is returned.
   *
   * @returns number of nodes loaded
   */
  async loadFromPersistence(): Promise<number> {
    return this.exclusive(() => this.load());
  }

  /** Empty memory, then reload everything from persistence. */
  async clearAndRebuild(): Promise<number> {
    return this.exclusive(async () => {
      this.store.clear();
      return this.load();
    });
  }

  /**
   * Make persistence match memory: re-write every in-memory node, then every
   * edge, then delete persisted edges and nodes that memory no longer has.
   * Recovery path after mirror failures. A run with no failures clears the
   * failure count reported by getHealth.
   */
  async reconcilePersistence(): Promise<ReconcileResult> {
    return this.exclusive(async () => {
      await this.store.flush();
      const failuresBefore = this.store.mirrorFailures;
      const nodes = this.store.listNodes();
      const edges = this.store.listEdges();
      for (const node of nodes) {
        this.store.mirror(`reconcile node ${node.id}`, (p) => p.upsertNode(node));
      }
      for (const edge of edges) {
        this.store.mirror(
          `reconcile edge ${edge.source_id} -> ${edge.target_id} ${edge.relationship}`,
          (p) => p.upsertEdge(edge)
        );
      }
      await this.store.flush();

      let listingFailures = 0;
      let staleNodes: GraphNode[] = [];
      let staleEdges: GraphEdge[] = [];
      try {
        const persistedEdges = await this.persistence.listAllEdges(this.config.loadLimit);
        const persistedNodes = await this.persistence.listAllNodes(this.config.loadLimit);
        staleEdges = persistedEdges.filter(
          (e) => !this.store.hasEdge(e.source_id, e.target_id, e.relationship)
        );
        staleNodes = persistedNodes.filter((n) => !this.store.hasNode(n.id));
      } catch (error) {
        listingFailures = 1;
        console.error(`[KnowledgeGraph] ${persistenceError('reconcile listing', error).message}`);
      }

      for (const edge of staleEdges) {
        this.store.mirror(
          `reconcile stale edge ${edge.source_id} -> ${edge.target_id} ${edge.relationship}`,
          (p) => p.deleteEdge(edge.source_id, edge.target_id, edge.relationship)
        );
      }
      for (const node of staleNodes) {
        this.store.mirror(`reconcile stale node ${node.id}`, (p) => p.deleteNode(node.id));
      }
      await this.store.flush();

      const failures = this.store.mirrorFailures - failuresBefore + listingFailures;
      if (failures === 0) {
        this.repairedFailures = this.store.mirrorFailures;
      }
      console.error(
        `[KnowledgeGraph] Reconciled ${nodes.length} nodes, ${edges.length} edges, removed ${staleNodes.length} stale nodes, ${staleEdges.length} stale edges (${failures} failed)`
      );
      return {
        nodes_written: nodes.length,
        edges_written: edges.length,
        nodes_deleted: staleNodes.length,
        edges_deleted: staleEdges.length,
        failures,
      };
    });
  }

  // ──────────────────────────────────────────────────────────────
  // Queries
  // ──────────────────────────────────────────────────────────────

  /**
   * @throws ValidationError when depth is outside 1..5
   */
  getSubgraph(focusId: string, depth: number = this.config.defaultDepth): Subgraph {
    const checked = validateInput(DepthSchema.max(this.config.maxDepth), depth);
    return extractSubgraph(this.store, focusId, checked);
  }

  findPaths(sourceId: string, targetId: string): string[][] {
    return findShortestPaths(this.store, sourceId, targetId, this.config.maxPaths);
  }

  getStatistics(): GraphStatistics {
    return this.store.statistics();
  }

  getPredictionContext(articleId: string): GraphContext {
    return extractGraphContext(this.store, articleId, this.config);
  }

  getArticleConnections(articleId: string): ArticleConnections {
    return getArticleConnections(this.store, articleId);
  }

  listNodesByType(nodeType: NodeType, limit?: number): GraphNode[] {
    return this.store.listNodesByType(nodeType, limit);
  }

  getNode(nodeId: string): GraphNode | undefined {
    return this.store.getNode(nodeId);
  }

  /**
   * Compare in-memory counts with persisted counts after draining the mirror
   * queue. Persisted counts are null when they cannot be read. Failed writes
   * count against health until a reconcile completes without failures.
   */
  async getHealth(): Promise<GraphHealth> {
    await this.store.flush();
    const stats = this.store.statistics();
    const memory = { nodes: stats.total_nodes, edges: stats.total_edges };
    const issues: string[] = [];

    let persisted: GraphHealth['persisted'] = null;
    try {
      persisted = {
        nodes: await this.persistence.countNodes(),
        edges: await this.persistence.countEdges(),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[KnowledgeGraph] Health check could not count persisted rows: ${message}`);
      issues.push(`Persisted counts unavailable: ${message}`);
    }

    if (persisted) {
      if (persisted.nodes !== memory.nodes) {
        issues.push(`Node count mismatch: ${memory.nodes} in memory, ${persisted.nodes} persisted`);
      }
      if (persisted.edges !== memory.edges) {
        issues.push(`Edge count mismatch: ${memory.edges} in memory, ${persisted.edges} persisted`);
      }
    }
    const unrepaired = this.store.mirrorFailures - this.repairedFailures;
    if (unrepaired > 0) {
      issues.push(`${unrepaired} persistence write(s) failed since the last reconcile`);
    }

    return {
      healthy: issues.length === 0,
      memory,
      persisted,
      pending_mirror_writes: this.store.pendingMirrorWrites,
      mirror_failures: unrepaired,
      issues,
    };
  }

  /** Wait for every queued persistence write to settle. */
  async flush(): Promise<void> {
    await this.writer;
    await this.store.flush();
  }

  // ──────────────────────────────────────────────────────────────
  // Internals
  // ──────────────────────────────────────────────────────────────

  /**
   * Run `fn` after every previously queued mutation has settled. A failing
   * mutation rejects its own caller only.
   */
  private exclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const run = this.writer.then(() => fn());
    this.writer = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async load(): Promise<number> {
    await this.store.flush();

    let nodes: GraphNode[];
    let edges: GraphEdge[];
    try {
      nodes = await this.persistence.listAllNodes(this.config.loadLimit);
      edges = await this.persistence.listAllEdges(this.config.loadLimit);
    } catch (error) {
      console.error(
        `[KnowledgeGraph] ${persistenceError('load', error).message}; keeping current graph`
      );
      return 0;
    }

    const result: ReplaceResult = this.store.replaceAll(nodes, edges);
    if (nodes.length >= this.config.loadLimit || edges.length >= this.config.loadLimit) {
      console.error(
        `[KnowledgeGraph] Load hit the limit of ${this.config.loadLimit} rows; the graph may be truncated`
      );
    }
    console.error(
      `[KnowledgeGraph] Loaded ${result.nodes_loaded} nodes, ${result.edges_loaded} edges from persistence`
    );
    return result.nodes_loaded;
  }
}
