/**
 * Knowledge Graph MCP Tools
 *
 * Tools: graph_add_article, graph_connect_similar, graph_add_relationship,
 *        graph_subgraph, graph_paths, graph_article_connections,
 *        graph_prediction_context, graph_stats, graph_nodes_by_type,
 *        graph_delete_node, graph_delete_edge, graph_reload
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/knowledge-graph
 */

import { z } from 'zod';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';
import {
  validateInput,
  ArticleInputSchema,
  NodeIdSchema,
  NodeTypeSchema,
  RelationshipTypeSchema,
  SimilarArticlesSchema,
  RelationshipAssertionSchema,
} from '../utils/validation.js';
import { requireGraph } from '../server/state.js';
import { successResult } from '../server/types.js';
import { toVisNetworkFormat } from '../services/knowledge-graph/subgraph.js';

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const AddArticleInput = ArticleInputSchema;

const ConnectSimilarInput = z.object({
  article_id: NodeIdSchema.describe('Article the RELATED_TO edges start from'),
  similar: SimilarArticlesSchema.describe(
    'Articles judged similar, each with a similarity score in [0, 1] used as edge weight'
  ),
});

const AddRelationshipInput = RelationshipAssertionSchema;

const SubgraphInput = z.object({
  focus_id: NodeIdSchema.describe('Node to center the subgraph on'),
  depth: z
    .number()
    .int()
    .min(1)
    .max(5)
    .optional()
    .describe('Number of hops to expand, edge direction ignored (default: 2)'),
  format: z
    .enum(['raw', 'vis'])
    .default('raw')
    .describe('raw: nodes/edges as stored; vis: vis-network nodes/edges'),
});

const PathsInput = z.object({
  source_id: NodeIdSchema,
  target_id: NodeIdSchema,
});

const ArticleIdInput = z.object({
  article_id: NodeIdSchema,
});

const StatsInput = z.object({});

const NodesByTypeInput = z.object({
  node_type: NodeTypeSchema,
  limit: z.number().int().min(1).max(10_000).default(100),
});

const DeleteNodeInput = z.object({
  node_id: NodeIdSchema,
});

const DeleteEdgeInput = z.object({
  source_id: NodeIdSchema,
  target_id: NodeIdSchema,
  relationship: RelationshipTypeSchema,
});

const ReloadInput = z.object({
  clear: z
    .boolean()
    .default(false)
    .describe('Empty the in-memory graph before reloading (clear and rebuild)'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// MUTATION HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle graph_add_article - Link an article and its entities
 */
async function handleAddArticle(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(AddArticleInput, params);
    const graph = requireGraph();

    const node = await graph.addArticleNode(input);
    const connections = graph.getArticleConnections(node.id);

    return formatResponse(
      successResult({
        article: node,
        entities: connections.entities.map((e) => e.id),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

async function handleConnectSimilar(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConnectSimilarInput, params);
    const result = await requireGraph().connectSimilarArticles(
      { id: input.article_id },
      input.similar
    );
    return formatResponse(successResult(result));
  } catch (error) {
    return handleError(error);
  }
}

async function handleAddRelationship(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(AddRelationshipInput, params);
    const edge = await requireGraph().addRelationship(input);
    return formatResponse(successResult({ edge }));
  } catch (error) {
    return handleError(error);
  }
}

async function handleDeleteNode(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DeleteNodeInput, params);
    const result = await requireGraph().deleteNode(input.node_id);
    return formatResponse(successResult(result));
  } catch (error) {
    return handleError(error);
  }
}

async function handleDeleteEdge(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DeleteEdgeInput, params);
    const deleted = await requireGraph().deleteEdge(
      input.source_id,
      input.target_id,
      input.relationship
    );
    return formatResponse(successResult({ ...input, deleted }));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle graph_reload - Reload the in-memory graph from the SQLite store
 */
async function handleReload(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ReloadInput, params);
    const graph = requireGraph();

    const nodesLoaded = input.clear
      ? await graph.clearAndRebuild()
      : await graph.loadFromPersistence();

    return formatResponse(
      successResult({
        nodes_loaded: nodesLoaded,
        cleared: input.clear,
        statistics: graph.getStatistics(),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// QUERY HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle graph_subgraph - Neighborhood of a node for visualization
 */
async function handleSubgraph(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(SubgraphInput, params);
    const subgraph = requireGraph().getSubgraph(input.focus_id, input.depth);

    if (input.format === 'vis') {
      return formatResponse(
        successResult({
          ...toVisNetworkFormat(subgraph),
          focus_id: subgraph.focus_id,
          depth: subgraph.depth,
          total_nodes: subgraph.total_nodes,
          total_edges: subgraph.total_edges,
        })
      );
    }
    return formatResponse(successResult(subgraph));
  } catch (error) {
    return handleError(error);
  }
}

async function handlePaths(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(PathsInput, params);
    const paths = requireGraph().findPaths(input.source_id, input.target_id);
    return formatResponse(
      successResult({
        source_id: input.source_id,
        target_id: input.target_id,
        paths,
        path_count: paths.length,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

async function handleArticleConnections(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ArticleIdInput, params);
    return formatResponse(successResult(requireGraph().getArticleConnections(input.article_id)));
  } catch (error) {
    return handleError(error);
  }
}

async function handlePredictionContext(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ArticleIdInput, params);
    return formatResponse(successResult(requireGraph().getPredictionContext(input.article_id)));
  } catch (error) {
    return handleError(error);
  }
}

async function handleStats(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(StatsInput, params);
    return formatResponse(successResult(requireGraph().getStatistics()));
  } catch (error) {
    return handleError(error);
  }
}

async function handleNodesByType(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(NodesByTypeInput, params);
    const nodes = requireGraph().listNodesByType(input.node_type, input.limit);
    return formatResponse(
      successResult({ node_type: input.node_type, nodes, count: nodes.length })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

export const knowledgeGraphTools: Record<string, ToolDefinition> = {
  graph_add_article: {
    description:
      'Add an article to the knowledge graph and link it to its vulnerabilities, threat actors and categories with MENTIONS edges. Idempotent.',
    inputSchema: AddArticleInput.shape,
    handler: handleAddArticle,
  },
  graph_connect_similar: {
    description:
      'Connect an article to semantically similar articles with RELATED_TO edges weighted by similarity',
    inputSchema: ConnectSimilarInput.shape,
    handler: handleConnectSimilar,
  },
  graph_add_relationship: {
    description:
      'Record a typed relationship between two existing nodes (e.g. threat actor USES technique)',
    inputSchema: AddRelationshipInput.shape,
    handler: handleAddRelationship,
  },
  graph_subgraph: {
    description:
      'Get every node within N hops of a focus node (edge direction ignored) and the edges among them',
    inputSchema: SubgraphInput.shape,
    handler: handleSubgraph,
  },
  graph_paths: {
    description: 'Find up to three shortest paths between two nodes, edge direction ignored',
    inputSchema: PathsInput.shape,
    handler: handlePaths,
  },
  graph_article_connections: {
    description: 'List the articles and entities an article points to',
    inputSchema: ArticleIdInput.shape,
    handler: handleArticleConnections,
  },
  graph_prediction_context: {
    description:
      'Get the graph context signal bundle for an article: connection density, related CVEs with trending flags, threat actors with campaign activity, related articles',
    inputSchema: ArticleIdInput.shape,
    handler: handlePredictionContext,
  },
  graph_stats: {
    description: 'Get node and edge counts, broken down by node type and relationship',
    inputSchema: StatsInput.shape,
    handler: handleStats,
  },
  graph_nodes_by_type: {
    description: 'List nodes of one type in insertion order',
    inputSchema: NodesByTypeInput.shape,
    handler: handleNodesByType,
  },
  graph_delete_node: {
    description: '[ADMIN] Delete a node and every edge touching it',
    inputSchema: DeleteNodeInput.shape,
    handler: handleDeleteNode,
  },
  graph_delete_edge: {
    description: '[ADMIN] Delete one edge identified by source, target and relationship',
    inputSchema: DeleteEdgeInput.shape,
    handler: handleDeleteEdge,
  },
  graph_reload: {
    description:
      '[ADMIN] Reload the in-memory graph from the SQLite store, optionally clearing it first',
    inputSchema: ReloadInput.shape,
    handler: handleReload,
  },
};
