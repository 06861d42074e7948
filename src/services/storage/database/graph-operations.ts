/**
 * Graph operations on the SQLite store
 *
 * CRUD for graph_nodes and graph_edges. Upserts key nodes by id and edges by
 * (source_id, target_id, relationship). Rows read back are validated; rows
 * with an unknown node type or relationship are skipped with a warning.
 */

import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type {
  GraphNode,
  GraphEdge,
  NodeType,
  RelationshipType,
} from '../../../models/knowledge-graph.js';
import { NodeRowSchema, EdgeRowSchema, CountRowSchema } from '../../../utils/validation.js';
import { runWithForeignKeyCheck, parseProperties } from './helpers.js';

// ============================================================
// Row mapping
// ============================================================

function rowsToNodes(rows: unknown[]): GraphNode[] {
  const nodes: GraphNode[] = [];
  for (const row of rows) {
    const parsed = NodeRowSchema.safeParse(row);
    if (!parsed.success) {
      console.error(
        `[GraphDB] Skipping malformed graph_nodes row: ${parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')}`
      );
      continue;
    }
    const r = parsed.data;
    nodes.push({
      id: r.id,
      node_type: r.node_type,
      label: r.label,
      properties: parseProperties(r.properties, `node ${r.id}`),
      size: r.size ?? 1.0,
      color: r.color,
    });
  }
  return nodes;
}

function rowsToEdges(rows: unknown[]): GraphEdge[] {
  const edges: GraphEdge[] = [];
  for (const row of rows) {
    const parsed = EdgeRowSchema.safeParse(row);
    if (!parsed.success) {
      console.error(
        `[GraphDB] Skipping malformed graph_edges row: ${parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')}`
      );
      continue;
    }
    const r = parsed.data;
    edges.push({
      source_id: r.source_id,
      target_id: r.target_id,
      relationship: r.relationship,
      weight: r.weight ?? 1.0,
      timestamp: r.created_at,
      properties: parseProperties(r.properties, `edge ${r.source_id} -> ${r.target_id}`),
    });
  }
  return edges;
}

function count(db: Database.Database, sql: string): number {
  return CountRowSchema.parse(db.prepare(sql).get()).cnt;
}

// ============================================================
// Graph Nodes CRUD
// ============================================================

/**
 * Insert or update a node by id.
 *
 * The stored node_type is never rewritten: an upsert whose type differs from
 * the stored one changes nothing and throws.
 */
export function upsertGraphNode(db: Database.Database, node: GraphNode): void {
  const now = new Date().toISOString();
  const result = db
    .prepare(
      `
    INSERT INTO graph_nodes (id, node_type, label, properties, size, color, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(id) DO UPDATE SET
      label = excluded.label,
      properties = excluded.properties,
      size = excluded.size,
      color = excluded.color,
      updated_at = excluded.updated_at
    WHERE graph_nodes.node_type = excluded.node_type
  `
    )
    .run(
      node.id,
      node.node_type,
      node.label,
      JSON.stringify(node.properties),
      node.size,
      node.color,
      now,
      now
    );

  if (result.changes === 0) {
    throw new Error(
      `graph_nodes row "${node.id}" exists with a different node_type, refusing to store it as "${node.node_type}"`
    );
  }
}

export function getGraphNode(db: Database.Database, id: string): GraphNode | null {
  const row = db.prepare('SELECT * FROM graph_nodes WHERE id = ?').get(id);
  if (row === undefined) return null;
  return rowsToNodes([row])[0] ?? null;
}

export function listGraphNodes(db: Database.Database, limit: number): GraphNode[] {
  const rows = db.prepare('SELECT * FROM graph_nodes ORDER BY rowid LIMIT ?').all(limit);
  return rowsToNodes(rows);
}

export function listGraphNodesByType(
  db: Database.Database,
  nodeType: NodeType,
  limit: number
): GraphNode[] {
  const rows = db
    .prepare('SELECT * FROM graph_nodes WHERE node_type = ? ORDER BY rowid LIMIT ?')
    .all(nodeType, limit);
  return rowsToNodes(rows);
}

/**
 * Delete a node and every edge touching it.
 */
export function deleteGraphNode(db: Database.Database, id: string): number {
  return db.transaction(() => {
    const edges = db
      .prepare('DELETE FROM graph_edges WHERE source_id = ? OR target_id = ?')
      .run(id, id);
    db.prepare('DELETE FROM graph_nodes WHERE id = ?').run(id);
    return edges.changes;
  })();
}

export function countGraphNodes(db: Database.Database): number {
  return count(db, 'SELECT COUNT(*) as cnt FROM graph_nodes');
}

// ============================================================
// Graph Edges CRUD
// ============================================================

/**
 * Insert or update an edge keyed by (source_id, target_id, relationship).
 * An update replaces weight, properties and timestamp; the row id stays.
 */
export function upsertGraphEdge(db: Database.Database, edge: GraphEdge): void {
  const stmt = db.prepare(`
    INSERT INTO graph_edges (id, source_id, target_id, relationship, weight, properties, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(source_id, target_id, relationship) DO UPDATE SET
      weight = excluded.weight,
      properties = excluded.properties,
      created_at = excluded.created_at
  `);

  runWithForeignKeyCheck(
    stmt,
    [
      uuidv4(),
      edge.source_id,
      edge.target_id,
      edge.relationship,
      edge.weight,
      JSON.stringify(edge.properties),
      edge.timestamp,
    ],
    `upserting graph_edge: source_id="${edge.source_id}" or target_id="${edge.target_id}" is not a stored node`
  );
}

export function listGraphEdges(db: Database.Database, limit: number): GraphEdge[] {
  const rows = db.prepare('SELECT * FROM graph_edges ORDER BY rowid LIMIT ?').all(limit);
  return rowsToEdges(rows);
}

export function deleteGraphEdge(
  db: Database.Database,
  sourceId: string,
  targetId: string,
  relationship: RelationshipType
): boolean {
  const result = db
    .prepare('DELETE FROM graph_edges WHERE source_id = ? AND target_id = ? AND relationship = ?')
    .run(sourceId, targetId, relationship);
  return result.changes > 0;
}

export function countGraphEdges(db: Database.Database): number {
  return count(db, 'SELECT COUNT(*) as cnt FROM graph_edges');
}
