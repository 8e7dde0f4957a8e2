/**
 * Configuration Schema
 *
 * Defines all environment variables with validation, types, and defaults.
 */

import { z } from 'zod';

/**
 * Comma separated list, trimmed, empty items dropped
 */
const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    );

/**
 * Complete configuration schema for the audit cache and orchestrator
 */
export const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // ============================================================================
  // Cache Layout
  // ============================================================================
  AUDIT_CACHE_DIR: z
    .string()
    .min(1)
    .refine((value) => !value.includes('..'), 'must stay inside the project root')
    .default('.audit'),
  AUDIT_PATTERN_CACHE_MAX_AGE_MS: z.coerce.number().int().min(0).default(3_600_000), // 1 hour

  // ============================================================================
  // File Discovery
  // ============================================================================
  AUDIT_INCLUDE_EXTENSIONS: commaList('.py,.ts,.tsx,.js,.jsx,.mjs,.cjs').pipe(
    z.array(z.string().regex(/^\.[A-Za-z0-9]+$/, 'extensions look like ".ts"')).min(1)
  ),
  AUDIT_EXTRA_EXCLUDE_DIRS: commaList(''),

  // ============================================================================
  // Orchestration
  // ============================================================================
  AUDIT_TOOL_TIMEOUT_MS: z.coerce.number().int().min(1).default(300_000), // 5 minutes
  AUDIT_TIMEOUT_MS: z.coerce.number().int().min(1).optional(),
  AUDIT_MAX_CONCURRENCY: z.coerce.number().int().min(1).optional(),
  AUDIT_LOCK_TIMEOUT_MS: z.coerce.number().int().min(0).default(30_000),

  // ============================================================================
  // Logging
  // ============================================================================
  AUDIT_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  AUDIT_LOG_FORMAT: z.enum(['text', 'json']).default('text'),
});

export type ConfigSchema = z.infer<typeof configSchema>;

