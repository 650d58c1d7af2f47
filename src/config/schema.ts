/**
 * Configuration Schema Definitions
 * @module config/schema
 *
 * Zod schemas for validating the run configuration. The validated
 * configuration is immutable for the lifetime of a run.
 */

import { z } from 'zod';

// ============================================================================
// Durations
// ============================================================================

/**
 * Accepted duration syntax: `500ms`, `10s`, `1.5m`, `1h`
 */
export const DURATION_PATTERN = /^(\d+(?:\.\d+)?)(ms|s|m|h)$/;

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

/**
 * Parse a duration string into milliseconds.
 *
 * @returns the duration in milliseconds, or null when the syntax is invalid
 */
export function parseDuration(value: string): number | null {
  const match = DURATION_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, amount, unit] = match;
  const factor = unit === undefined ? undefined : UNIT_MS[unit];
  if (amount === undefined || factor === undefined) {
    return null;
  }
  return Math.round(Number(amount) * factor);
}

/**
 * Render milliseconds in the load generator's duration syntax
 */
export function toGeneratorDuration(ms: number): string {
  return ms % 1000 === 0 ? `${ms / 1000}s` : `${ms}ms`;
}

// ============================================================================
// Run Configuration
// ============================================================================

const DurationSchema = z
  .string()
  .trim()
  .regex(DURATION_PATTERN, 'Duration must look like 500ms, 10s, 1m or 1h')
  .refine((value) => (parseDuration(value) ?? 0) > 0, 'Duration must be greater than zero');

/**
 * Run configuration schema
 */
export const RunConfigurationSchema = z
  .object({
    /** Target request rates; duplicates are dropped, order kept */
    rates: z
      .array(z.coerce.number().int().positive())
      .min(1, 'At least one rate is required')
      .default([1000, 5000, 10000]),
    /** Host the service binds to */
    host: z.string().min(1).default('127.0.0.1'),
    /** Port the service binds to */
    port: z.coerce.number().int().min(1).max(65535).default(8000),
    /** Per-cycle load duration */
    duration: DurationSchema.default('10s'),
    /** Worker processes for the service */
    workers: z.coerce.number().int().min(1).default(1),
    /** Only benchmark routes under this path prefix */
    filter: z.string().startsWith('/', 'Filter must be a path prefix').optional(),
    /** Directory run outputs are written under */
    outputRoot: z.string().min(1).default('.tmp'),
    /** Route manifest file or module; the bundled sample service when absent */
    routes: z.string().min(1).optional(),
    /** Launch command of the service under test */
    serverCommand: z.array(z.string().min(1)).min(1),
    /** Substring identifying this tool's server processes in the process table */
    processSignature: z.string().min(1).optional(),
    /** Value substituted for `{placeholder}` segments in route templates */
    resourceId: z.string().min(1).default('1000'),
    /** Seed route of the service under test */
    seedPath: z.string().startsWith('/').default('/api/db/seed'),
    /** Load generator executable */
    loadGenerator: z.string().min(1).default('vegeta'),
  })
  .transform((config) => ({
    ...config,
    rates: [...new Set(config.rates)],
    durationMs: parseDuration(config.duration) ?? 0,
    processSignature: config.processSignature ?? config.serverCommand[config.serverCommand.length - 1] ?? '',
  }));

export type RunConfigurationInput = z.input<typeof RunConfigurationSchema>;
export type RunConfiguration = Readonly<z.output<typeof RunConfigurationSchema>>;

// ============================================================================
// Report Command Configuration
// ============================================================================

export const ReportConfigurationSchema = z.object({
  outputRoot: z.string().min(1).default('.tmp'),
  file: z.string().min(1).optional(),
  format: z.enum(['table', 'json']).default('table'),
});

export type ReportConfiguration = Readonly<z.output<typeof ReportConfigurationSchema>>;
