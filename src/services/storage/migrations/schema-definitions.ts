/**
 * Schema definitions for the graph store database
 *
 * @module migrations/schema-definitions
 */

export const SCHEMA_VERSION = 1;

export const CREATE_GRAPH_NODES_TABLE = `
CREATE TABLE IF NOT EXISTS graph_nodes (
  id TEXT PRIMARY KEY,
  node_type TEXT NOT NULL,
  label TEXT NOT NULL,
  properties TEXT NOT NULL DEFAULT '{}',
  size REAL NOT NULL DEFAULT 1.0,
  color TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)`;

export const CREATE_GRAPH_EDGES_TABLE = `
CREATE TABLE IF NOT EXISTS graph_edges (
  id TEXT PRIMARY KEY,
  source_id TEXT NOT NULL REFERENCES graph_nodes(id) ON DELETE CASCADE,
  target_id TEXT NOT NULL REFERENCES graph_nodes(id) ON DELETE CASCADE,
  relationship TEXT NOT NULL,
  weight REAL NOT NULL DEFAULT 1.0 CHECK (weight >= 0 AND weight <= 1),
  properties TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL,
  UNIQUE (source_id, target_id, relationship)
)`;

export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_graph_nodes_type ON graph_nodes(node_type)',
  'CREATE INDEX IF NOT EXISTS idx_graph_edges_source ON graph_edges(source_id)',
  'CREATE INDEX IF NOT EXISTS idx_graph_edges_target ON graph_edges(target_id)',
] as const;

export const REQUIRED_TABLES = ['graph_nodes', 'graph_edges'] as const;

export const REQUIRED_INDEXES = [
  'idx_graph_nodes_type',
  'idx_graph_edges_source',
  'idx_graph_edges_target',
] as const;
