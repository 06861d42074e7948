/**
 * Threat Graph MCP Server
 *
 * Entry point for the MCP server using stdio transport.
 * Exposes the security-news knowledge graph (article linking, subgraphs,
 * paths, prediction context, administration) as tools via JSON-RPC.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module index
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';

// Load .env from multiple candidate locations (first found wins):
// 1. KG_ENV_FILE env var (explicit override)
// 2. CWD/.env (project-local)
// 3. Package root/.env (development; compiled entry lives in dist/src)
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envCandidates = [
  process.env.KG_ENV_FILE,
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '..', '..', '.env'),
].filter((p): p is string => typeof p === 'string');

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
    break;
  }
}

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import type { ToolDefinition } from './tools/shared.js';
import { closeGraph, openGraph, updateConfig } from './server/state.js';
import { loadGraphConfig } from './services/knowledge-graph/config.js';
import { knowledgeGraphTools } from './tools/knowledge-graph.js';
import { healthTools } from './tools/health.js';

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER INITIALIZATION
// ═══════════════════════════════════════════════════════════════════════════════

const server = new McpServer({
  name: 'threat-graph-mcp',
  version: '1.0.0',
});

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

// All tool modules in registration order
const allToolModules: Record<string, ToolDefinition>[] = [
  knowledgeGraphTools, // 12 tools
  healthTools, // 1 tool
];

// Register tools with duplicate detection
const registeredToolNames = new Set<string>();
let toolCount = 0;

for (const toolModule of allToolModules) {
  for (const [name, tool] of Object.entries(toolModule)) {
    if (registeredToolNames.has(name)) {
      console.error(
        `[FATAL] Duplicate tool name detected: "${name}". Each tool must have a unique name.`
      );
      process.exit(1);
    }
    registeredToolNames.add(name);
    server.tool(name, tool.description, tool.inputSchema as Record<string, unknown>, tool.handler);
    toolCount++;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STARTUP
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Read configuration from the environment and open the graph.
 * Fail-fast: invalid configuration or an unopenable store aborts startup.
 */
async function loadGraph(): Promise<void> {
  const config = loadGraphConfig();
  updateConfig(config);
  console.error(
    `[Config] database=${config.databasePath} depth=${config.defaultDepth} ` +
      `density/${config.densityNormalization} trending>${config.trendingThreshold} ` +
      `campaign>${config.activeCampaignThreshold}`
  );

  const graph = await openGraph(config.databasePath);
  const stats = graph.getStatistics();
  console.error(
    `[Startup] Graph loaded: ${stats.total_nodes} nodes (${stats.article_nodes} articles), ${stats.total_edges} edges`
  );
}

async function main(): Promise<void> {
  await loadGraph();

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`Threat Graph MCP Server running on stdio`);
  console.error(`Tools registered: ${toolCount}`);
}

// Graceful shutdown handler
function handleShutdown(signal: string): void {
  console.error(`[Shutdown] Received ${signal}, shutting down gracefully...`);
  // Drain pending SQLite writes, then close the MCP server connection
  closeGraph()
    .then(() => server.close())
    .then(() => {
      console.error('[Shutdown] Server closed successfully');
      process.exit(0);
    })
    .catch((err) => {
      console.error(`[Shutdown] Error closing server: ${err}`);
      process.exit(1);
    });
  // Force exit after 5s if graceful shutdown hangs
  setTimeout(() => {
    console.error('[Shutdown] Forced exit after timeout');
    process.exit(1);
  }, 5000).unref();
}

process.on('SIGTERM', () => handleShutdown('SIGTERM'));
process.on('SIGINT', () => handleShutdown('SIGINT'));

main().catch((error) => {
  console.error('Fatal error starting MCP server:', error);
  process.exit(1);
});
