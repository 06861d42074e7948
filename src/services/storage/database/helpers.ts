/**
 * Shared helpers for the graph database operations
 *
 * @module services/storage/database/helpers
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';

/**
 * Run a statement, turning an SQLite foreign-key failure into an error that
 * names what was being written.
 */
export function runWithForeignKeyCheck(
  stmt: Database.Statement,
  params: unknown[],
  context: string
): Database.RunResult {
  try {
    return stmt.run(...params);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'SQLITE_CONSTRAINT_FOREIGNKEY') {
      throw new Error(`Foreign key violation ${context}`);
    }
    throw error;
  }
}

const PropertiesJson = z.record(z.unknown());

/**
 * Parse a JSON properties column. Corrupt or non-object JSON yields an empty
 * object and a warning rather than failing the whole listing.
 */
export function parseProperties(raw: string | null, context: string): Record<string, unknown> {
  if (raw === null || raw.length === 0) return {};
  try {
    const parsed = PropertiesJson.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
    console.error(`[GraphDB] properties of ${context} is not a JSON object, using {}`);
  } catch (error) {
    console.error(
      `[GraphDB] properties of ${context} is not valid JSON, using {}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return {};
}
