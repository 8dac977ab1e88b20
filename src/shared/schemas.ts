/**
 * Write-payload schemas
 * Shared by the engine facade (validation) and the CLI/MCP layers.
 */

import { z } from 'zod';
import { CLASSIFICATIONS, NODE_TYPES, type EdgeType, type JsonValue } from './types.js';
import { isEdgeType } from './categories.js';
import { InvalidArgumentError } from './errors.js';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const jsonObjectSchema = z.record(jsonValueSchema);

export const timestampSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Expected an ISO 8601 timestamp' });

export const nodeTypeSchema = z.enum(NODE_TYPES);

export const edgeTypeSchema = z
  .string()
  .refine((value): value is EdgeType => isEdgeType(value), { message: 'Unknown edge type' });

export const classificationSchema = z.enum(CLASSIFICATIONS);

export const createNodeSchema = z.object({
  type: nodeTypeSchema,
  name: z.string().min(1).max(500),
  qualified_name: z.string().min(1).max(1000).optional(),
  description: z.string().optional(),
  documentation_url: z.string().max(1000).optional(),
  system: z.string().max(200).optional(),
  platform: z.string().max(200).optional(),
  location: z.string().optional(),
  classification: classificationSchema.optional(),
  tags: jsonObjectSchema.optional(),
  attributes: jsonObjectSchema.optional(),
});

export type CreateNodeInput = z.input<typeof createNodeSchema>;

export const updateNodeSchema = z.object({
  name: z.string().min(1).max(500).optional(),
  description: z.string().nullable().optional(),
  documentation_url: z.string().max(1000).nullable().optional(),
  classification: classificationSchema.nullable().optional(),
  tags: jsonObjectSchema.optional(),
  attributes: jsonObjectSchema.optional(),
});

export type UpdateNodeInput = z.input<typeof updateNodeSchema>;

export const listNodesSchema = z.object({
  type: nodeTypeSchema.optional(),
  limit: z.number().int().min(1).max(1000).optional(),
  offset: z.number().int().min(0).optional(),
  include_deleted: z.boolean().optional(),
});

export const createEdgeSchema = z.object({
  /** Node id or qualified name */
  source: z.string().min(1),
  target: z.string().min(1),
  edge_type: edgeTypeSchema,
  metadata: jsonObjectSchema.optional(),
  valid_from: timestampSchema.optional(),
  created_by: z.string().max(200).optional(),
});

export type CreateEdgeInput = z.input<typeof createEdgeSchema>;

export const columnLineageSchema = z.object({
  source_column: z.string().min(1).max(500),
  target_column: z.string().min(1).max(500),
  transformation: z.string().optional(),
  transformation_type: z.string().max(50).optional(),
  confidence: z.number().min(0).max(1).optional(),
  metadata: jsonObjectSchema.optional(),
});

export type ColumnLineageInput = z.input<typeof columnLineageSchema>;

export const runStatusSchema = z.enum(['created', 'running', 'success', 'failed']);

export const createRunSchema = z.object({
  run_id: z.string().min(1).max(200),
  pipeline_name: z.string().min(1).max(500),
  /** Node id or qualified name the run belongs to */
  node: z.string().min(1).optional(),
  status: z.enum(['created', 'running']).optional(),
  started_at: timestampSchema.optional(),
  git_sha: z.string().max(40).optional(),
  git_branch: z.string().max(200).optional(),
  environment: z.string().max(50).optional(),
  parameters: jsonObjectSchema.optional(),
  triggered_by: z.string().max(200).optional(),
  executor: z.string().max(200).optional(),
});

export type CreateRunInput = z.input<typeof createRunSchema>;

export const updateRunSchema = z.object({
  status: runStatusSchema.optional(),
  completed_at: timestampSchema.optional(),
  metrics: jsonObjectSchema.optional(),
  error_message: z.string().optional(),
});

export type UpdateRunInput = z.input<typeof updateRunSchema>;

/**
 * Parse `value` or throw InvalidArgumentError naming the first failing field.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? ` (${issue.path.join('.')})` : '';
    throw new InvalidArgumentError(`Invalid ${what}${field}: ${issue?.message ?? 'validation failed'}`);
  }
  return result.data;
}
