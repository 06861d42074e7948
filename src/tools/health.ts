/**
 * Health Check MCP Tools
 *
 * Tools: graph_health
 *
 * Compares the in-memory graph with the SQLite copy and optionally
 * re-mirrors everything to close the gap.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/health
 */

import { z } from 'zod';
import { requireGraph, state } from '../server/state.js';
import { successResult } from '../server/types.js';
import { validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';
import type { ReconcileResult } from '../services/knowledge-graph/graph-service.js';

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const HealthCheckInput = z.object({
  fix: z
    .boolean()
    .default(false)
    .describe(
      'If true, re-write every in-memory node and edge to the SQLite store when the two disagree.'
    ),
});

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: graph_health
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle graph_health - Detect and optionally fix drift between memory and SQLite
 *
 * Checks for:
 * 1. Node/edge count mismatch between memory and the SQLite store
 * 2. Persistence writes that failed and were not yet reconciled
 * 3. Missing tables or indexes in the SQLite schema
 */
async function handleHealthCheck(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(HealthCheckInput, params);
    const graph = requireGraph();

    let health = await graph.getHealth();
    const schema = state.currentRepository?.verify() ?? null;

    let reconciled: ReconcileResult | undefined;
    if (input.fix && !health.healthy) {
      reconciled = await graph.reconcilePersistence();
      health = await graph.getHealth();
    }

    const issues = [...health.issues];
    if (schema && !schema.valid) {
      issues.push(
        `Schema incomplete: missing tables [${schema.missingTables.join(', ')}], missing indexes [${schema.missingIndexes.join(', ')}]`
      );
    }

    return formatResponse(
      successResult({
        ...health,
        healthy: health.healthy && (schema?.valid ?? true),
        issues,
        schema,
        reconciled,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Health check tools collection for MCP server registration
 */
export const healthTools: Record<string, ToolDefinition> = {
  graph_health: {
    description:
      'Check that the in-memory knowledge graph and its SQLite copy agree (counts, failed writes, schema). Set fix=true to re-write the graph to SQLite.',
    inputSchema: HealthCheckInput.shape,
    handler: handleHealthCheck,
  },
};
