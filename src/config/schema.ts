/**
 * QueryGate - Configuration Schema
 * Zod-based validation schemas for service configuration
 */

import { z } from 'zod';

import { DEFAULT_ROW_LIMIT_CEILING } from '../guard/normalizer.js';
import { DEFAULT_FORBIDDEN_KEYWORDS } from '../guard/policy.js';

// =============================================================================
// Server Configuration Schema
// =============================================================================

export const ServerConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8080),
  host: z.string().default('0.0.0.0'),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
});

// =============================================================================
// Database Configuration Schema
// =============================================================================

export const DatabaseConfigSchema = z.object({
  connectionString: z.string().min(1).optional(),
  readOnly: z.boolean().default(true),
  poolMax: z.number().int().min(1).default(10),
  connectionTimeoutMs: z.number().int().min(100).default(10000),
});

// =============================================================================
// Guardrail Policy Schema
// =============================================================================

export const ForbiddenKeywordSchema = z
  .string()
  .regex(/^(?:[A-Za-z_][A-Za-z0-9_]*|--|\/\*)$/, "must be a bare word, '--' or '/*'");

export const PolicyConfigSchema = z.object({
  rowLimitCeiling: z.number().int().min(1).default(DEFAULT_ROW_LIMIT_CEILING),
  schemaWhitelist: z.array(z.string().trim().min(1)).default([]),
  forbiddenKeywords: z.array(ForbiddenKeywordSchema).default([...DEFAULT_FORBIDDEN_KEYWORDS]),
  maxQueryLength: z.number().int().min(1).default(5000),
  queryTimeoutMs: z.number().int().min(1).default(5000),
});

// =============================================================================
// Full Configuration Schema
// =============================================================================

export const QueryGateConfigSchema = z.object({
  server: ServerConfigSchema.default({}),
  database: DatabaseConfigSchema.default({}),
  policy: PolicyConfigSchema.default({}),
});

/**
 * Shape accepted from a YAML/JSON config file: every field optional, no
 * defaults applied, unknown keys rejected
 */
export const ConfigFileSchema = z
  .object({
    server: ServerConfigSchema.partial().strict().optional(),
    database: DatabaseConfigSchema.partial().strict().optional(),
    policy: PolicyConfigSchema.partial().strict().optional(),
  })
  .strict();

// =============================================================================
// Type Exports
// =============================================================================

export type QueryGateConfigInput = z.input<typeof QueryGateConfigSchema>;
export type QueryGateConfigOutput = z.output<typeof QueryGateConfigSchema>;
export type ConfigFileInput = z.input<typeof ConfigFileSchema>;
export type ConfigFileOutput = z.output<typeof ConfigFileSchema>;

/**
 * Format Zod validation errors into readable messages
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}
