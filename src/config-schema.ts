/**
 * Config Schema Validation
 *
 * Zod schemas for the triage configuration file.
 */

import { z } from 'zod';

// --- Reusable Validators ---

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export type LogLevel = z.infer<typeof logLevelSchema>;

const encodingSchema = z.enum(['utf-8', 'utf8', 'latin1', 'ascii']);

export type LogEncoding = z.infer<typeof encodingSchema>;

// --- Input Config ---

const inputConfigSchema = z.object({
  path: z.string().min(1).optional(),
  encoding: encodingSchema.default('utf-8'),
});

// --- Report Config ---

const reportConfigSchema = z.object({
  format: z.enum(['text', 'json']).default('text'),
  timing: z.boolean().default(true),
  stats: z.boolean().default(false),
});

// --- Logging Config ---

const loggingConfigSchema = z.object({
  level: logLevelSchema.optional(),
  pretty: z.boolean().optional(),
});

// --- Full Triage Config Schema ---

export const triageConfigSchema = z.object({
  input: inputConfigSchema.default({}),
  report: reportConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
}).strict();

// --- Type Exports ---

export type TriageConfigInput = z.input<typeof triageConfigSchema>;
export type TriageConfigOutput = z.output<typeof triageConfigSchema>;

/**
 * Validate a parsed config document
 */
export function validateTriageConfig(data: unknown): TriageConfigOutput {
  return triageConfigSchema.parse(data);
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
