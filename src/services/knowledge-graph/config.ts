/**
 * Knowledge Graph Configuration
 *
 * Scoring constants of the graph-context bundle and traversal limits. The
 * density normalization and the trending/active-campaign thresholds are
 * fixed heuristics inherited from the first deployment; they are exposed
 * here so consumers can tune them without touching the extractor.
 *
 * @module services/knowledge-graph/config
 */

import { z } from 'zod';
import { validateInput } from '../../utils/validation.js';

export const DEFAULT_DATABASE_PATH = './data/knowledge-graph.db';

// Configuration schema
export const GraphConfigSchema = z.object({
  databasePath: z.string().min(1).default(DEFAULT_DATABASE_PATH),

  // Traversal
  defaultDepth: z.number().int().min(1).max(5).default(2),
  maxDepth: z.number().int().min(1).max(5).default(5),
  maxPaths: z.number().int().min(1).default(3),

  // Graph-context scoring
  densityNormalization: z.number().positive().default(10),
  trendingThreshold: z.number().int().min(0).default(2),
  activeCampaignThreshold: z.number().int().min(0).default(1),

  // Startup load
  loadLimit: z.number().int().positive().default(50_000),

  // Article node labels are truncated past this many characters
  articleLabelMaxLength: z.number().int().positive().default(50),
});

export type GraphConfig = z.infer<typeof GraphConfigSchema>;

export const DEFAULT_GRAPH_CONFIG: GraphConfig = GraphConfigSchema.parse({});

function readInt(name: string): number | undefined {
  const raw = process.env[name];
  return raw === undefined || raw.trim() === '' ? undefined : parseInt(raw, 10);
}

function readFloat(name: string): number | undefined {
  const raw = process.env[name];
  return raw === undefined || raw.trim() === '' ? undefined : parseFloat(raw);
}

/**
 * Load configuration from environment variables, then apply overrides.
 *
 * @throws ValidationError when an environment value is out of range or not a number
 */
export function loadGraphConfig(overrides?: Partial<GraphConfig>): GraphConfig {
  const envConfig = {
    databasePath: process.env.KG_DATABASE_PATH || undefined,
    defaultDepth: readInt('KG_DEFAULT_DEPTH'),
    densityNormalization: readFloat('KG_DENSITY_NORMALIZATION'),
    trendingThreshold: readInt('KG_TRENDING_THRESHOLD'),
    activeCampaignThreshold: readInt('KG_ACTIVE_CAMPAIGN_THRESHOLD'),
    loadLimit: readInt('KG_LOAD_LIMIT'),
  };

  return validateInput(GraphConfigSchema, { ...envConfig, ...overrides });
}
