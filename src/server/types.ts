/**
 * MCP Server Types
 *
 * @module server/types
 */

import type { GraphConfig } from '../services/knowledge-graph/config.js';
import type { KnowledgeGraphService } from '../services/knowledge-graph/graph-service.js';
import type { SqliteGraphRepository } from '../services/storage/database/sqlite-graph-repository.js';

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

/** Server configuration is the graph engine configuration */
export type ServerConfig = GraphConfig;

export interface ServerState {
  /** Graph currently served by the tools */
  currentGraph: KnowledgeGraphService | null;
  /** Repository opened by openGraph; null when the graph was attached */
  currentRepository: SqliteGraphRepository | null;
  config: ServerConfig;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULTS
// ═══════════════════════════════════════════════════════════════════════════════

export interface SuccessResult<T> {
  success: true;
  data: T;
}

/**
 * Wrap tool output in the success envelope
 */
export function successResult<T>(data: T): SuccessResult<T> {
  return { success: true, data };
}
