/**
 * Unit Tests for Knowledge Graph MCP Tools
 *
 * Drives the tool handlers in src/tools/knowledge-graph.ts and
 * src/tools/health.ts through the server state, against a graph backed by
 * the in-process persistence stand-in.
 *
 * FAIL FAST - error responses carry the expected category.
 *
 * @module tests/unit/tools/knowledge-graph
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { knowledgeGraphTools } from '../../../src/tools/knowledge-graph.js';
import { healthTools } from '../../../src/tools/health.js';
import { attachGraph, resetState } from '../../../src/server/state.js';
import { KnowledgeGraphService } from '../../../src/services/knowledge-graph/graph-service.js';
import { MemoryGraphPersistence, makeArticle } from '../../helpers/memory-persistence.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

interface ToolResponse {
  success: boolean;
  data?: Record<string, unknown>;
  error?: {
    category: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

function parseResponse(response: { content: Array<{ type: string; text: string }> }): ToolResponse {
  return JSON.parse(response.content[0].text);
}

async function call(name: string, params: Record<string, unknown>): Promise<ToolResponse> {
  const tool = knowledgeGraphTools[name] ?? healthTools[name];
  return parseResponse(await tool.handler(params));
}

// ═══════════════════════════════════════════════════════════════════════════════
// TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('knowledge graph tools', () => {
  let persistence: MemoryGraphPersistence;
  let graph: KnowledgeGraphService;

  beforeEach(async () => {
    resetState();
    persistence = new MemoryGraphPersistence();
    graph = new KnowledgeGraphService(persistence);
    await attachGraph(graph);
  });

  afterEach(() => {
    resetState();
  });

  it('exports every graph tool', () => {
    expect(Object.keys(knowledgeGraphTools)).toEqual([
      'graph_add_article',
      'graph_connect_similar',
      'graph_add_relationship',
      'graph_subgraph',
      'graph_paths',
      'graph_article_connections',
      'graph_prediction_context',
      'graph_stats',
      'graph_nodes_by_type',
      'graph_delete_node',
      'graph_delete_edge',
      'graph_reload',
    ]);
    expect(Object.keys(healthTools)).toEqual(['graph_health']);
  });

  it('returns GRAPH_NOT_LOADED when no graph is open', async () => {
    resetState();
    const response = await call('graph_stats', {});
    expect(response.success).toBe(false);
    expect(response.error?.category).toBe('GRAPH_NOT_LOADED');
  });

  describe('graph_add_article', () => {
    it('links the article and lists its entity ids', async () => {
      const response = await call(
        'graph_add_article',
        makeArticle('A1', { vulnerabilities: ['CVE-2025-1111'], threat_actors: ['Sandworm'] })
      );

      expect(response.success).toBe(true);
      expect(response.data?.entities).toEqual([
        'vulnerability-cve-2025-1111',
        'threat_actor-sandworm',
      ]);
      expect(graph.getStatistics().total_nodes).toBe(3);
    });

    it('fills missing entity lists with empty arrays', async () => {
      const response = await call('graph_add_article', {
        id: 'A1',
        title: 'Bare article',
        url: 'https://news.example.test/bare',
        published_at: '2025-01-15',
      });

      expect(response.success).toBe(true);
      expect(response.data?.entities).toEqual([]);
    });

    it('rejects a missing title with VALIDATION_ERROR', async () => {
      const response = await call('graph_add_article', {
        id: 'A1',
        url: 'https://news.example.test/a1',
        published_at: '2025-01-15',
      });

      expect(response.success).toBe(false);
      expect(response.error?.category).toBe('VALIDATION_ERROR');
      expect(response.error?.message).toBe('title: Required');
      expect(response.error?.details).toEqual({ originalName: 'ValidationError' });
    });
  });

  describe('graph_connect_similar and graph_paths', () => {
    it('finds the direct path after connecting two articles', async () => {
      await call('graph_add_article', makeArticle('A1'));
      await call('graph_add_article', makeArticle('A2'));

      const connect = await call('graph_connect_similar', {
        article_id: 'A1',
        similar: [{ article: { id: 'A2' }, similarity: 0.8 }],
      });
      expect(connect.data).toEqual({ article_id: 'A1', edges_created: 1, skipped: [] });

      const paths = await call('graph_paths', { source_id: 'A1', target_id: 'A2' });
      expect(paths.data).toEqual({
        source_id: 'A1',
        target_id: 'A2',
        paths: [['A1', 'A2']],
        path_count: 1,
      });
    });
  });

  describe('graph_add_relationship', () => {
    it('rejects an unknown relationship type', async () => {
      const response = await call('graph_add_relationship', {
        source_id: 'a',
        target_id: 'b',
        relationship: 'befriends',
      });
      expect(response.error?.category).toBe('VALIDATION_ERROR');
    });

    it('reports REFERENTIAL_INTEGRITY for a missing endpoint', async () => {
      await call('graph_add_article', makeArticle('A1'));
      const response = await call('graph_add_relationship', {
        source_id: 'A1',
        target_id: 'technique-spearphishing',
        relationship: 'uses',
      });

      expect(response.success).toBe(false);
      expect(response.error?.category).toBe('REFERENTIAL_INTEGRITY');
      expect(response.error?.message).toBe(
        'Edge A1 -> technique-spearphishing references unknown node(s): technique-spearphishing'
      );
    });
  });

  describe('graph_subgraph', () => {
    beforeEach(async () => {
      await call('graph_add_article', makeArticle('A1', { vulnerabilities: ['CVE-2025-1111'] }));
    });

    it('returns the raw subgraph', async () => {
      const response = await call('graph_subgraph', { focus_id: 'A1', depth: 1 });
      expect(response.data?.total_nodes).toBe(2);
      expect(response.data?.total_edges).toBe(1);
      expect(response.data?.focus_id).toBe('A1');
    });

    it('returns vis-network data on request', async () => {
      const response = await call('graph_subgraph', { focus_id: 'A1', depth: 1, format: 'vis' });
      expect(response.data?.edges).toEqual([
        { from: 'A1', to: 'vulnerability-cve-2025-1111', label: 'mentions', value: 1 },
      ]);
    });

    it('returns an empty result for an unknown focus', async () => {
      const response = await call('graph_subgraph', { focus_id: 'nonexistent' });
      expect(response.success).toBe(true);
      expect(response.data).toEqual({
        nodes: [],
        edges: [],
        focus_id: 'nonexistent',
        depth: 2,
        total_nodes: 0,
        total_edges: 0,
      });
    });

    it('rejects depth 6', async () => {
      const response = await call('graph_subgraph', { focus_id: 'A1', depth: 6 });
      expect(response.error?.category).toBe('VALIDATION_ERROR');
    });
  });

  describe('graph_prediction_context', () => {
    it('returns has_graph_data false for an unknown article', async () => {
      const response = await call('graph_prediction_context', { article_id: 'nonexistent' });
      expect(response.success).toBe(true);
      expect(response.data?.has_graph_data).toBe(false);
      expect(response.data?.connection_count).toBe(0);
    });

    it('flags a CVE shared by three articles as trending', async () => {
      for (const id of ['A1', 'A2', 'A3']) {
        await call('graph_add_article', makeArticle(id, { vulnerabilities: ['CVE-2025-1111'] }));
      }

      const response = await call('graph_prediction_context', { article_id: 'A1' });
      expect(response.data?.cve_severity_context).toEqual([
        { cve: 'CVE-2025-1111', article_count: 3, is_trending: true },
      ]);
    });
  });

  describe('administration', () => {
    it('graph_nodes_by_type lists nodes of one type', async () => {
      await call('graph_add_article', makeArticle('A1', { categories: ['Malware', 'Cloud'] }));

      const response = await call('graph_nodes_by_type', { node_type: 'entity', limit: 1 });
      expect(response.data?.count).toBe(1);
      expect(response.data?.node_type).toBe('entity');
    });

    it('graph_delete_node and graph_delete_edge report what they removed', async () => {
      await call('graph_add_article', makeArticle('A1', { categories: ['Malware'] }));
      await call('graph_add_article', makeArticle('A2'));
      await call('graph_connect_similar', {
        article_id: 'A1',
        similar: [{ article: { id: 'A2' }, similarity: 0.5 }],
      });

      const edge = await call('graph_delete_edge', {
        source_id: 'A1',
        target_id: 'A2',
        relationship: 'related_to',
      });
      expect(edge.data?.deleted).toBe(true);

      const node = await call('graph_delete_node', { node_id: 'A1' });
      expect(node.data).toEqual({ node_id: 'A1', deleted: true, edges_removed: 1 });
    });

    it('graph_reload with clear drops what was never persisted', async () => {
      persistence.failWrites = 'read-only';
      await call('graph_add_article', makeArticle('A1'));
      await graph.flush();
      persistence.failWrites = null;

      const response = await call('graph_reload', { clear: true });
      expect(response.data?.nodes_loaded).toBe(0);
      expect(response.data?.cleared).toBe(true);
    });

    it('graph_health repairs drift when fix is set', async () => {
      persistence.failWrites = 'disk full';
      await call('graph_add_article', makeArticle('A1', { vulnerabilities: ['CVE-2025-7777'] }));
      await graph.flush();
      persistence.failWrites = null;

      const before = await call('graph_health', {});
      expect(before.data?.healthy).toBe(false);

      const fixed = await call('graph_health', { fix: true });
      expect(fixed.data?.reconciled).toEqual({
        nodes_written: 2,
        edges_written: 1,
        nodes_deleted: 0,
        edges_deleted: 0,
        failures: 0,
      });
      expect(fixed.data?.persisted).toEqual({ nodes: 2, edges: 1 });
      expect(fixed.data?.healthy).toBe(true);
      expect(fixed.data?.issues).toEqual([]);
      expect(persistence.nodes.size).toBe(2);
    });
  });
});
