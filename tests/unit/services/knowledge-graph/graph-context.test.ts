import { describe, it, expect, beforeEach } from 'vitest';
import {
  extractGraphContext,
  getArticleConnections,
  emptyGraphContext,
} from '../../../../src/services/knowledge-graph/graph-context.js';
import { GraphStore } from '../../../../src/services/knowledge-graph/graph-store.js';
import { linkArticle } from '../../../../src/services/knowledge-graph/entity-linker.js';
import { DEFAULT_GRAPH_CONFIG } from '../../../../src/services/knowledge-graph/config.js';
import { MemoryGraphPersistence, makeArticle } from '../../../helpers/memory-persistence.js';

const thresholds = DEFAULT_GRAPH_CONFIG;

describe('getArticleConnections', () => {
  it('splits successors into articles and entities', () => {
    const store = new GraphStore(new MemoryGraphPersistence());
    linkArticle(store, makeArticle('A1', { title: 'First', vulnerabilities: ['CVE-2025-0001'] }), 50);
    linkArticle(store, makeArticle('A2', { title: 'Second' }), 50);
    store.upsertEdge('A1', 'A2', 'related_to', 0.75);

    expect(getArticleConnections(store, 'A1')).toEqual({
      article_id: 'A1',
      connections: [{ id: 'A2', title: 'Second', relationship: 'related_to', weight: 0.75 }],
      entities: [
        {
          id: 'vulnerability-cve-2025-0001',
          name: 'CVE-2025-0001',
          node_type: 'vulnerability',
          relationship: 'mentions',
        },
      ],
    });
  });

  it('lists a successor reached by two relationships once', () => {
    const store = new GraphStore(new MemoryGraphPersistence());
    linkArticle(store, makeArticle('A1'), 50);
    linkArticle(store, makeArticle('A2', { title: 'Follow-up' }), 50);
    store.upsertEdge('A1', 'A2', 'evolves_from', 1);
    store.upsertEdge('A1', 'A2', 'related_to', 0.6);

    expect(getArticleConnections(store, 'A1').connections).toEqual([
      { id: 'A2', title: 'Follow-up', relationship: 'evolves_from', weight: 1 },
    ]);
  });
});

describe('extractGraphContext', () => {
  let store: GraphStore;

  beforeEach(() => {
    store = new GraphStore(new MemoryGraphPersistence());
  });

  it('reports no graph data for an unknown article', () => {
    expect(extractGraphContext(store, 'nonexistent', thresholds)).toEqual(emptyGraphContext());
    expect(extractGraphContext(store, 'nonexistent', thresholds).has_graph_data).toBe(false);
  });

  it('reports no graph data for a non-article node', () => {
    linkArticle(store, makeArticle('A1', { vulnerabilities: ['CVE-2025-0001'] }), 50);
    expect(
      extractGraphContext(store, 'vulnerability-cve-2025-0001', thresholds).has_graph_data
    ).toBe(false);
  });

  it('marks a CVE mentioned by three articles as trending', () => {
    for (const id of ['A1', 'A2', 'A3']) {
      linkArticle(store, makeArticle(id, { vulnerabilities: ['CVE-2025-1111'] }), 50);
    }

    const context = extractGraphContext(store, 'A1', thresholds);

    expect(context.cve_severity_context).toEqual([
      { cve: 'CVE-2025-1111', article_count: 3, is_trending: true },
    ]);
    expect(context.related_cves).toEqual(['CVE-2025-1111']);
  });

  it('does not mark a CVE with two mentions as trending', () => {
    linkArticle(store, makeArticle('A1', { vulnerabilities: ['CVE-2025-2222'] }), 50);
    linkArticle(store, makeArticle('A2', { vulnerabilities: ['CVE-2025-2222'] }), 50);

    expect(extractGraphContext(store, 'A1', thresholds).cve_severity_context).toEqual([
      { cve: 'CVE-2025-2222', article_count: 2, is_trending: false },
    ]);
  });

  it('flags an active campaign once an actor appears in two articles', () => {
    linkArticle(store, makeArticle('A1', { threat_actors: ['Volt Typhoon', 'Lone Wolf'] }), 50);
    linkArticle(store, makeArticle('A2', { threat_actors: ['Volt Typhoon'] }), 50);

    const context = extractGraphContext(store, 'A1', thresholds);

    expect(context.related_threat_actors).toEqual(['Volt Typhoon', 'Lone Wolf']);
    expect(context.threat_actor_history).toEqual([
      { actor: 'Volt Typhoon', article_count: 2, active_campaigns: true },
      { actor: 'Lone Wolf', article_count: 1, active_campaigns: false },
    ]);
  });

  it('computes connection count and capped density', () => {
    linkArticle(
      store,
      makeArticle('A1', {
        vulnerabilities: ['CVE-2025-0001', 'CVE-2025-0002'],
        threat_actors: ['Actor One'],
        categories: ['Phishing'],
      }),
      50
    );
    linkArticle(store, makeArticle('A2', { title: 'Related coverage' }), 50);
    store.upsertEdge('A1', 'A2', 'related_to', 0.9);

    const context = extractGraphContext(store, 'A1', thresholds);

    expect(context.has_graph_data).toBe(true);
    expect(context.connection_count).toBe(5);
    expect(context.connection_density).toBe(0.5);
    expect(context.related_articles).toEqual([
      { id: 'A2', title: 'Related coverage', relationship: 'related_to' },
    ]);

    const categories = Array.from({ length: 12 }, (_, i) => `Category ${i}`);
    linkArticle(store, makeArticle('A3', { categories }), 50);
    const dense = extractGraphContext(store, 'A3', thresholds);
    expect(dense.connection_count).toBe(12);
    expect(dense.connection_density).toBe(1);
  });

  it('counts only article predecessors of an entity', () => {
    linkArticle(store, makeArticle('A1', { vulnerabilities: ['CVE-2025-3333'] }), 50);
    linkArticle(store, makeArticle('A2', { threat_actors: ['Actor Two'] }), 50);
    store.upsertEdge('threat_actor-actor-two', 'vulnerability-cve-2025-3333', 'exploits', 1);

    const context = extractGraphContext(store, 'A1', thresholds);
    expect(context.cve_severity_context).toEqual([
      { cve: 'CVE-2025-3333', article_count: 1, is_trending: false },
    ]);
  });

  it('applies custom thresholds', () => {
    linkArticle(store, makeArticle('A1', { vulnerabilities: ['CVE-2025-4444'] }), 50);
    linkArticle(store, makeArticle('A2', { vulnerabilities: ['CVE-2025-4444'] }), 50);

    const context = extractGraphContext(store, 'A1', {
      densityNormalization: 4,
      trendingThreshold: 1,
      activeCampaignThreshold: 1,
    });

    expect(context.connection_density).toBe(0.25);
    expect(context.cve_severity_context[0].is_trending).toBe(true);
  });
});
