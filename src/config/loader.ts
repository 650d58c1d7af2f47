/**
 * Configuration Loader
 * @module config/loader
 *
 * Merges configuration sources by priority and validates the result:
 * schema defaults < environment variables < command-line flags.
 */

import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { splitCommand, type ParsedArgs } from '../cli/args.js';
import {
  RunConfigurationSchema,
  ReportConfigurationSchema,
  type RunConfiguration,
  type ReportConfiguration,
} from './schema.js';

// ============================================================================
// Defaults
// ============================================================================

const SOURCE_EXTENSION = import.meta.url.endsWith('.ts') ? '.ts' : '.js';

/**
 * Entry point of the bundled sample service
 */
export const BENCH_APP_ENTRY = fileURLToPath(
  new URL(`../bench-app/server${SOURCE_EXTENSION}`, import.meta.url)
);

/**
 * Launch command for the bundled sample service (run through tsx)
 */
export function defaultServerCommand(): string[] {
  return [process.execPath, '--import', 'tsx', BENCH_APP_ENTRY];
}

// ============================================================================
// Sources
// ============================================================================

/**
 * Raw string values gathered from a source, validated later by the schema
 */
export interface RawRunInput {
  rates?: string[];
  host?: string;
  port?: string;
  duration?: string;
  workers?: string;
  filter?: string;
  outputRoot?: string;
  routes?: string;
  serverCommand?: string[];
  processSignature?: string;
  resourceId?: string;
  seedPath?: string;
  loadGenerator?: string;
}

function listOf(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value.split(/[\s,]+/).filter((item) => item.length > 0);
}

function commandOf(value: string | undefined): string[] | undefined {
  return value === undefined ? undefined : splitCommand(value);
}

/**
 * Drop undefined entries so lower-priority sources are not overwritten
 */
function definedOnly<T extends object>(source: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in source) {
    if (source[key] !== undefined) {
      result[key] = source[key];
    }
  }
  return result;
}

/**
 * Read run configuration from `BENCH_*` environment variables
 */
export function readEnvironment(env: NodeJS.ProcessEnv): RawRunInput {
  return definedOnly<RawRunInput>({
    rates: listOf(env.BENCH_RATES),
    host: env.BENCH_HOST,
    port: env.BENCH_PORT,
    duration: env.BENCH_DURATION,
    workers: env.BENCH_WORKERS,
    filter: env.BENCH_FILTER,
    outputRoot: env.BENCH_OUTPUT_DIR,
    routes: env.BENCH_ROUTES,
    serverCommand: commandOf(env.BENCH_SERVER_COMMAND),
    processSignature: env.BENCH_PROCESS_SIGNATURE,
    resourceId: env.BENCH_RESOURCE_ID,
    seedPath: env.BENCH_SEED_PATH,
    loadGenerator: env.VEGETA_BIN,
  });
}

/**
 * Read run configuration from parsed command-line flags
 */
export function readArgs(args: ParsedArgs): RawRunInput {
  return definedOnly<RawRunInput>({
    rates: args.rates,
    host: args.host,
    port: args.port,
    duration: args.duration,
    workers: args.workers,
    filter: args.filter,
    outputRoot: args.output,
    routes: args.routes,
    serverCommand: commandOf(args.serverCommand),
    resourceId: args.resourceId,
    seedPath: args.seedPath,
    loadGenerator: args.loadGenerator,
  });
}

// ============================================================================
// Validation
// ============================================================================

function validationError(error: z.ZodError): ConfigurationError {
  const issues = error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  const summary = issues.map((issue) => `${issue.path || 'config'}: ${issue.message}`).join('; ');
  return new ConfigurationError(`Invalid configuration: ${summary}`, { details: { issues } }, true);
}

/**
 * Build the validated run configuration
 *
 * @throws ConfigurationError when validation fails
 */
export function loadRunConfiguration(
  args: ParsedArgs,
  env: NodeJS.ProcessEnv = process.env
): RunConfiguration {
  const input: RawRunInput = {
    serverCommand: defaultServerCommand(),
    ...readEnvironment(env),
    ...readArgs(args),
  };

  const parsed = RunConfigurationSchema.safeParse(input);
  if (!parsed.success) {
    throw validationError(parsed.error);
  }
  return Object.freeze(parsed.data);
}

/**
 * Build the validated report-command configuration
 */
export function loadReportConfiguration(
  args: ParsedArgs,
  env: NodeJS.ProcessEnv = process.env
): ReportConfiguration {
  const parsed = ReportConfigurationSchema.safeParse(
    definedOnly({
      outputRoot: args.output ?? env.BENCH_OUTPUT_DIR,
      file: args.file,
      format: args.format,
    })
  );
  if (!parsed.success) {
    throw validationError(parsed.error);
  }
  return Object.freeze(parsed.data);
}
