/**
 * Zod Validation Schemas
 *
 * Boundary validation for everything that enters the graph engine: articles
 * from ingestion, similarity assertions, traversal parameters, rows read back
 * from persistence and MCP tool inputs. Malformed input is rejected here and
 * never reaches the Graph Store.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import { NODE_TYPES, RELATIONSHIP_TYPES } from '../models/knowledge-graph.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @returns Validated and typed input data
 * @throws ValidationError listing every failing path
 */
export function validateInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED ENUMS AND BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const NodeTypeSchema = z.enum(NODE_TYPES);

export const RelationshipTypeSchema = z.enum(RELATIONSHIP_TYPES);

export const NodeIdSchema = z
  .string()
  .min(1, 'Node id is required')
  .max(512, 'Node id must be 512 characters or less')
  .refine((id) => !id.includes('\u0000'), 'Node id must not contain NUL characters');

export const WeightSchema = z
  .number()
  .min(0, 'Weight must be between 0 and 1')
  .max(1, 'Weight must be between 0 and 1');

export const DepthSchema = z
  .number()
  .int('Depth must be an integer')
  .min(1, 'Depth must be at least 1')
  .max(5, 'Depth must be at most 5');

const EntityNameList = z
  .array(z.string().trim().min(1, 'Entity names must not be blank'))
  .default([]);

const PropertiesSchema = z.record(z.unknown());

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Article handed over by ingestion. `published_at` accepts a Date or any
 * string Date can parse and is normalized to ISO-8601.
 */
export const ArticleInputSchema = z.object({
  id: NodeIdSchema,
  title: z.string().min(1, 'Article title is required'),
  url: z.string().min(1, 'Article url is required'),
  published_at: z
    .union([z.string(), z.date()])
    .transform((value, ctx) => {
      const date = value instanceof Date ? value : new Date(value);
      if (Number.isNaN(date.getTime())) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid published_at date' });
        return z.NEVER;
      }
      return date.toISOString();
    }),
  categories: EntityNameList,
  vulnerabilities: EntityNameList,
  threat_actors: EntityNameList,
});

export const ArticleRefSchema = z.object({ id: NodeIdSchema });

export const SimilarArticlesSchema = z.array(
  z.object({
    article: ArticleRefSchema,
    similarity: WeightSchema,
  })
);

/**
 * A relationship asserted by an upstream collaborator between two nodes
 * that already exist (e.g. actor USES technique).
 */
export const RelationshipAssertionSchema = z.object({
  source_id: NodeIdSchema,
  target_id: NodeIdSchema,
  relationship: RelationshipTypeSchema,
  weight: WeightSchema.default(1.0),
  properties: PropertiesSchema.default({}),
});

// ═══════════════════════════════════════════════════════════════════════════════
// PERSISTED ROW SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const NodeRowSchema = z.object({
  id: z.string(),
  node_type: NodeTypeSchema,
  label: z.string(),
  properties: z.string().nullable(),
  size: z.number().nullable(),
  color: z.string().nullable(),
});

export const EdgeRowSchema = z.object({
  source_id: z.string(),
  target_id: z.string(),
  relationship: RelationshipTypeSchema,
  weight: z.number().nullable(),
  properties: z.string().nullable(),
  created_at: z.string(),
});

export const CountRowSchema = z.object({ cnt: z.number() });
