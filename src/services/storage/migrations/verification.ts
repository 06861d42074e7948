/**
 * Schema Verification Functions
 *
 * Creates and verifies the graph store schema.
 *
 * @module migrations/verification
 */

import type Database from 'better-sqlite3';
import {
  CREATE_GRAPH_NODES_TABLE,
  CREATE_GRAPH_EDGES_TABLE,
  CREATE_INDEXES,
  REQUIRED_TABLES,
  REQUIRED_INDEXES,
  SCHEMA_VERSION,
} from './schema-definitions.js';

/**
 * Create all tables and indexes if missing. Idempotent.
 */
export function initializeSchema(db: Database.Database): void {
  db.transaction(() => {
    db.exec(CREATE_GRAPH_NODES_TABLE);
    db.exec(CREATE_GRAPH_EDGES_TABLE);
    for (const statement of CREATE_INDEXES) {
      db.exec(statement);
    }
    db.pragma(`user_version = ${SCHEMA_VERSION}`);
  })();
}

/**
 * Verify all required tables and indexes exist
 * @param db - Database instance
 * @returns Object with verification results
 */
export function verifySchema(db: Database.Database): {
  valid: boolean;
  missingTables: string[];
  missingIndexes: string[];
} {
  const missingTables: string[] = [];
  const missingIndexes: string[] = [];

  // Check tables
  for (const tableName of REQUIRED_TABLES) {
    const exists = db
      .prepare(
        `
      SELECT name FROM sqlite_master
      WHERE type = 'table' AND name = ?
    `
      )
      .get(tableName);

    if (!exists) {
      missingTables.push(tableName);
    }
  }

  // Check indexes
  for (const indexName of REQUIRED_INDEXES) {
    const exists = db
      .prepare(
        `
      SELECT name FROM sqlite_master
      WHERE type = 'index' AND name = ?
    `
      )
      .get(indexName);

    if (!exists) {
      missingIndexes.push(indexName);
    }
  }

  return {
    valid: missingTables.length === 0 && missingIndexes.length === 0,
    missingTables,
    missingIndexes,
  };
}
