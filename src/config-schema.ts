/**
 * Config Schema Validation
 *
 * Zod schemas for the sequence engine configuration.
 * Every field has a default, so an empty document yields a usable config.
 */

import { z } from 'zod';

// --- Reusable Validators ---

const positiveInt = z.number().int().min(1);

const keywordListSchema = z.array(z.string().min(1)).min(1);

// --- Parser Limits ---

const parserConfigSchema = z.object({
  maxCommandLength: positiveInt.default(1000),
  maxMatchGroups: positiveInt.default(10),
  matchBudgetMs: z.number().positive().default(1000),
  maxWaitSeconds: z.number().positive().default(3600),
});

// --- Structural Limits ---

const sequenceConfigSchema = z.object({
  maxSequenceLength: positiveInt.default(10000),
  maxExpansionDepth: positiveInt.default(20),
});

// --- Caches ---

const cacheConfigSchema = z.object({
  validateCapacity: positiveInt.default(10000),
  expandCapacity: positiveInt.default(5000),
  searchCapacity: positiveInt.default(1000),
});

// --- Execution ---

const executionConfigSchema = z.object({
  waitSliceMs: z.number().int().min(10).max(200).default(100),
  ackTimeoutMs: z.number().int().min(1).default(5000),
  nestedIf: z.enum(['skip', 'evaluate']).default('skip'),
  continueOnError: z.boolean().default(false),
});

// --- Device Responses ---

const responseConfigSchema = z.object({
  successKeywords: keywordListSchema.default(['ok', 'complete', 'completed', 'done']),
  errorKeywords: keywordListSchema.default(['err', 'error', 'fail']),
});

// --- Logging Config ---

const loggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
});

// --- Full Engine Config Schema ---

export const engineConfigSchema = z.object({
  parser: parserConfigSchema.default({}),
  sequences: sequenceConfigSchema.default({}),
  cache: cacheConfigSchema.default({}),
  execution: executionConfigSchema.default({}),
  responses: responseConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

// --- Type Exports ---

export type EngineConfigInput = z.input<typeof engineConfigSchema>;
export type EngineConfig = z.output<typeof engineConfigSchema>;
export type ParserLimits = EngineConfig['parser'];
export type ExecutionConfig = EngineConfig['execution'];
export type ResponseKeywords = EngineConfig['responses'];
export type NestedIfPolicy = ExecutionConfig['nestedIf'];

/**
 * Validate an engine config object, filling in defaults
 */
export function validateEngineConfig(data: unknown): EngineConfig {
  return engineConfigSchema.parse(data ?? {});
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `  - ${path}: ${issue.message}`;
  }).join('\n');
}
