/**
 * Configuration Schemas
 *
 * Centralized Zod schemas for type-safe runtime configuration validation.
 * All environment variable parsing goes through these schemas for consistent
 * validation and clear error messages.
 */

import { z } from 'zod';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true; everything else as false.
 */
export const booleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (!val) return false;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

/**
 * Like booleanStringSchema, but an unset variable yields `fallback`.
 */
export function booleanWithDefault(fallback: boolean) {
  return z
    .string()
    .optional()
    .transform((val) => {
      if (val === undefined || val === '') return fallback;
      return ['true', '1', 'yes'].includes(val.toLowerCase());
    });
}

/**
 * Schema for parsing a string as an integer with bounds.
 */
export function integerStringSchema(options: { min?: number; max?: number; default: number }) {
  const { min, max } = options;
  let schema = z.coerce.number().int();

  if (min !== undefined) schema = schema.min(min);
  if (max !== undefined) schema = schema.max(max);

  return schema.default(options.default);
}

export const urlSchema = z.string().url();

/**
 * Schema for a comma-separated list of strings.
 */
export const commaSeparatedListSchema = z
  .string()
  .transform((val) => val.split(',').map((s) => s.trim()).filter(Boolean));

// ============================================
// LOG LEVEL SCHEMA
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema,
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// RECORDER CONFIGURATION
// ============================================

export const recorderConfigSchema = z.object({
  targetUrl: urlSchema,
  loginUrl: urlSchema.optional(),
  sessionFile: z.string().min(1).default('./session.json'),
  eventsLog: z
    .string()
    .min(1)
    .refine((p) => p.endsWith('.json'), { message: 'Event log path must end in .json' })
    .default('./events.json'),
  headless: booleanWithDefault(false),
  maxLoginSteps: integerStringSchema({ min: 1, max: 100, default: 10 }),
  exploreClicks: integerStringSchema({ min: 0, max: 50, default: 3 }),
  enrichConcurrency: integerStringSchema({ min: 1, max: 64, default: 10 }),
  captureDenylist: commaSeparatedListSchema.optional(),
});

export type RecorderConfig = z.infer<typeof recorderConfigSchema>;

// ============================================
// TOOL SERVER CONFIGURATION
// ============================================

export const toolServerConfigSchema = z.object({
  toolsModule: z.string().min(1).default('./generated-tools.mjs'),
  sessionFile: z.string().min(1).default('./session.json'),
});

export type ToolServerConfig = z.infer<typeof toolServerConfigSchema>;

// ============================================
// SESSION LOOKUP CONFIGURATION
// ============================================

export const sessionConfigSchema = toolServerConfigSchema.pick({ sessionFile: true });

export type SessionConfig = z.infer<typeof sessionConfigSchema>;

// ============================================
// ERROR FORMATTING
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Create a configuration validation error with helpful messages.
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
      `Please check your environment variables or .env file.`
    );
    this.name = 'ConfigValidationError';
  }
}
