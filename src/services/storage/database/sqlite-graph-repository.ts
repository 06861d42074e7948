/**
 * SQLite-backed graph persistence
 *
 * Durable store the in-memory graph mirrors into and reloads from at
 * startup. Calls are synchronous underneath (better-sqlite3) and exposed
 * through the asynchronous GraphPersistence contract.
 *
 * @module services/storage/database/sqlite-graph-repository
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import type {
  GraphEdge,
  GraphNode,
  NodeType,
  RelationshipType,
} from '../../../models/knowledge-graph.js';
import type { GraphPersistence } from '../persistence.js';
import { initializeSchema, verifySchema } from '../migrations/verification.js';
import {
  upsertGraphNode,
  upsertGraphEdge,
  getGraphNode,
  listGraphNodes,
  listGraphNodesByType,
  listGraphEdges,
  deleteGraphNode,
  deleteGraphEdge,
  countGraphNodes,
  countGraphEdges,
} from './graph-operations.js';

/** Listing limit when the caller passes none */
export const DEFAULT_LIST_LIMIT = 10_000;

export class SqliteGraphRepository implements GraphPersistence {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.db.pragma('foreign_keys = ON');
    initializeSchema(this.db);
  }

  /**
   * Open (creating if needed) the database file at `filePath`.
   * `:memory:` opens a private in-memory database.
   */
  static open(filePath: string): SqliteGraphRepository {
    if (filePath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    }
    const db = new Database(filePath);
    if (filePath !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }
    console.error(`[SqliteGraphRepository] Opened graph store at ${filePath}`);
    return new SqliteGraphRepository(db);
  }

  getConnection(): Database.Database {
    return this.db;
  }

  verify(): ReturnType<typeof verifySchema> {
    return verifySchema(this.db);
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  async upsertNode(node: GraphNode): Promise<void> {
    upsertGraphNode(this.db, node);
  }

  async upsertEdge(edge: GraphEdge): Promise<void> {
    upsertGraphEdge(this.db, edge);
  }

  async getNode(id: string): Promise<GraphNode | null> {
    return getGraphNode(this.db, id);
  }

  async listNodesByType(nodeType: NodeType, limit: number = DEFAULT_LIST_LIMIT): Promise<GraphNode[]> {
    return listGraphNodesByType(this.db, nodeType, limit);
  }

  async listAllNodes(limit: number = DEFAULT_LIST_LIMIT): Promise<GraphNode[]> {
    return listGraphNodes(this.db, limit);
  }

  async listAllEdges(limit: number = DEFAULT_LIST_LIMIT): Promise<GraphEdge[]> {
    return listGraphEdges(this.db, limit);
  }

  async deleteNode(id: string): Promise<void> {
    deleteGraphNode(this.db, id);
  }

  async deleteEdge(
    sourceId: string,
    targetId: string,
    relationship: RelationshipType
  ): Promise<void> {
    deleteGraphEdge(this.db, sourceId, targetId, relationship);
  }

  async countNodes(): Promise<number> {
    return countGraphNodes(this.db);
  }

  async countEdges(): Promise<number> {
    return countGraphEdges(this.db);
  }
}
