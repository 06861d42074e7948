/**
 * MCP Server State Management
 *
 * Holds the graph the tools operate on and the active configuration.
 * FAIL FAST: requireGraph throws immediately when no graph is open.
 *
 * The engine itself is not a singleton: this module only tracks which
 * KnowledgeGraphService the server is currently serving.
 *
 * @module server/state
 */

import { KnowledgeGraphService } from '../services/knowledge-graph/graph-service.js';
import { DEFAULT_GRAPH_CONFIG } from '../services/knowledge-graph/config.js';
import { SqliteGraphRepository } from '../services/storage/database/sqlite-graph-repository.js';
import { graphNotLoadedError } from './errors.js';
import type { ServerState, ServerConfig } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

export const state: ServerState = {
  currentGraph: null,
  currentRepository: null,
  config: { ...DEFAULT_GRAPH_CONFIG },
};

// ═══════════════════════════════════════════════════════════════════════════════
// GRAPH ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Require an open graph - FAIL FAST if none
 *
 * @throws MCPError with GRAPH_NOT_LOADED
 */
export function requireGraph(): KnowledgeGraphService {
  if (!state.currentGraph) {
    throw graphNotLoadedError();
  }
  return state.currentGraph;
}

export function hasGraph(): boolean {
  return state.currentGraph !== null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// GRAPH LIFECYCLE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Open the SQLite store at `databasePath` (default: config.databasePath),
 * load it into a fresh graph and make that graph current.
 *
 * The new graph is loaded before the swap, so tools keep serving the old one
 * until it is ready. The previous graph is flushed and its repository closed.
 */
export async function openGraph(databasePath?: string): Promise<KnowledgeGraphService> {
  const config: ServerConfig = {
    ...state.config,
    databasePath: databasePath ?? state.config.databasePath,
  };
  const repository = SqliteGraphRepository.open(config.databasePath);
  const graph = new KnowledgeGraphService(repository, config);
  await graph.loadFromPersistence();

  const previous = { graph: state.currentGraph, repository: state.currentRepository };
  state.currentGraph = graph;
  state.currentRepository = repository;
  state.config = config;

  if (previous.graph) {
    await previous.graph.flush();
  }
  previous.repository?.close();

  return graph;
}

/**
 * Serve an already constructed graph. Its persistence stays owned by the caller.
 * The previous graph is flushed before its repository is closed.
 */
export async function attachGraph(graph: KnowledgeGraphService): Promise<void> {
  const previous = { graph: state.currentGraph, repository: state.currentRepository };
  state.currentGraph = graph;
  state.currentRepository = null;

  if (previous.graph && previous.graph !== graph) {
    await previous.graph.flush();
  }
  previous.repository?.close();
}

/**
 * Drain the current graph's persistence queue and close its repository.
 */
export async function closeGraph(): Promise<void> {
  const graph = state.currentGraph;
  const repository = state.currentRepository;
  state.currentGraph = null;
  state.currentRepository = null;

  if (graph) {
    await graph.flush();
  }
  repository?.close();
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export function getConfig(): ServerConfig {
  return { ...state.config };
}

/**
 * Update server configuration. Takes effect for graphs opened afterwards.
 */
export function updateConfig(updates: Partial<ServerConfig>): void {
  state.config = { ...state.config, ...updates };
}

export function resetConfig(): void {
  state.config = { ...DEFAULT_GRAPH_CONFIG };
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE RESET (FOR TESTS)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reset all server state - ONLY USE IN TESTS
 *
 * Closes the repository without draining the mirror queue.
 */
export function resetState(): void {
  state.currentRepository?.close();
  state.currentGraph = null;
  state.currentRepository = null;
  state.config = { ...DEFAULT_GRAPH_CONFIG };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESS EXIT CLEANUP
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Close the SQLite connection on exit so the WAL is checkpointed.
 */
process.on('exit', () => {
  if (state.currentRepository) {
    try {
      state.currentRepository.close();
    } catch (error) {
      console.error(
        '[state] graph store close on exit failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    state.currentRepository = null;
  }
});
