/**
 * In-process GraphPersistence stand-in for service tests.
 *
 * Stores copies of what it receives, in insertion order, and can be told to
 * fail writes or listings to exercise the engine's degradation paths.
 *
 * @module tests/helpers/memory-persistence
 */

import {
  edgeKey,
  type GraphEdge,
  type GraphNode,
  type NodeType,
  type RelationshipType,
} from '../../src/models/knowledge-graph.js';
import type { GraphPersistence } from '../../src/services/storage/persistence.js';

export class MemoryGraphPersistence implements GraphPersistence {
  readonly nodes = new Map<string, GraphNode>();
  readonly edges = new Map<string, GraphEdge>();

  /** When set, every write rejects with this message */
  failWrites: string | null = null;
  /** When set, listings reject with this message */
  failReads: string | null = null;
  /** Number of write calls received, failed ones included */
  writeCalls = 0;

  async upsertNode(node: GraphNode): Promise<void> {
    this.beginWrite();
    const existing = this.nodes.get(node.id);
    if (existing && existing.node_type !== node.node_type) {
      throw new Error(`stored node ${node.id} has type ${existing.node_type}`);
    }
    this.nodes.set(node.id, { ...node, properties: { ...node.properties } });
  }

  async upsertEdge(edge: GraphEdge): Promise<void> {
    this.beginWrite();
    if (!this.nodes.has(edge.source_id) || !this.nodes.has(edge.target_id)) {
      throw new Error(`FOREIGN KEY constraint failed for ${edge.source_id} -> ${edge.target_id}`);
    }
    this.edges.set(edgeKey(edge.source_id, edge.target_id, edge.relationship), {
      ...edge,
      properties: { ...edge.properties },
    });
  }

  async listNodesByType(nodeType: NodeType, limit = 10_000): Promise<GraphNode[]> {
    this.beginRead();
    return [...this.nodes.values()].filter((n) => n.node_type === nodeType).slice(0, limit);
  }

  async listAllNodes(limit = 10_000): Promise<GraphNode[]> {
    this.beginRead();
    return [...this.nodes.values()].slice(0, limit);
  }

  async listAllEdges(limit = 10_000): Promise<GraphEdge[]> {
    this.beginRead();
    return [...this.edges.values()].slice(0, limit);
  }

  async deleteNode(id: string): Promise<void> {
    this.beginWrite();
    for (const [key, edge] of this.edges) {
      if (edge.source_id === id || edge.target_id === id) {
        this.edges.delete(key);
      }
    }
    this.nodes.delete(id);
  }

  async deleteEdge(
    sourceId: string,
    targetId: string,
    relationship: RelationshipType
  ): Promise<void> {
    this.beginWrite();
    this.edges.delete(edgeKey(sourceId, targetId, relationship));
  }

  async countNodes(): Promise<number> {
    this.beginRead();
    return this.nodes.size;
  }

  async countEdges(): Promise<number> {
    this.beginRead();
    return this.edges.size;
  }

  private beginWrite(): void {
    this.writeCalls++;
    if (this.failWrites !== null) {
      throw new Error(this.failWrites);
    }
  }

  private beginRead(): void {
    if (this.failReads !== null) {
      throw new Error(this.failReads);
    }
  }
}

export function makeNode(overrides: Partial<GraphNode> & { id: string }): GraphNode {
  return {
    node_type: 'entity',
    label: overrides.id,
    properties: {},
    size: 1.0,
    color: null,
    ...overrides,
  };
}

export function makeArticle(
  id: string,
  overrides: {
    title?: string;
    url?: string;
    published_at?: string;
    categories?: string[];
    vulnerabilities?: string[];
    threat_actors?: string[];
  } = {}
) {
  return {
    id,
    title: overrides.title ?? `Article ${id}`,
    url: overrides.url ?? `https://news.example.test/${id}`,
    published_at: overrides.published_at ?? '2025-03-01T00:00:00.000Z',
    categories: overrides.categories ?? [],
    vulnerabilities: overrides.vulnerabilities ?? [],
    threat_actors: overrides.threat_actors ?? [],
  };
}
