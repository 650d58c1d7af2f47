#!/usr/bin/env node
/**
 * Clean-Room Benchmark CLI
 * @module cli/run-benchmark
 *
 * `clean-bench [run]` benchmarks every discovered endpoint at every rate,
 * restarting the service under test before each cycle.
 * `clean-bench report` prints the tables and analysis of a stored run.
 */

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { BENCH_APP_ROUTES } from '../bench-app/manifest.js';
import {
  loadReportConfiguration,
  loadRunConfiguration,
  type RunConfiguration,
} from '../config/index.js';
import { StaticRouteSource, discover, routeSourceFor } from '../discovery/index.js';
import { ExitCodes, getErrorMessage, isFatalError, type ExitCode } from '../errors/index.js';
import { FetchServiceClient, type ServiceClient } from '../http/index.js';
import { VegetaLoadSource, type LoadSource } from '../load/index.js';
import { getLogger } from '../logging/index.js';
import { BenchmarkOrchestrator, type PacingOptions, type Sampler } from '../orchestrator/index.js';
import {
  ProcessRegistry,
  ShutdownCoordinator,
  SubprocessServiceDriver,
  type ServiceDriver,
  type ShutdownCoordinatorOptions,
} from '../process/index.js';
import { RunStore, formatAnalysis, formatRateTables, summarizeRun } from '../reporting/index.js';
import { ResourceSampler } from '../sampler/index.js';
import { countRecords, type RunResult } from '../types/index.js';
import { formatDuration } from '../utils/async.js';
import { parseArgs, printHelp, type ParsedArgs } from './args.js';

const logger = getLogger();

/**
 * Collaborators of the run command, replaceable by embedders and tests
 */
export interface RunDependencies {
  createDriver(config: RunConfiguration): ServiceDriver;
  createSampler(): Sampler;
  createLoadSource(config: RunConfiguration): LoadSource;
  createClient(): ServiceClient;
  readonly pacing?: Partial<PacingOptions>;
  readonly shutdown?: Omit<ShutdownCoordinatorOptions, 'driver'>;
}

const defaultDependencies: RunDependencies = {
  createDriver: (config) =>
    new SubprocessServiceDriver({
      processSignature: config.processSignature,
      registry: new ProcessRegistry(),
    }),
  createSampler: () => new ResourceSampler(),
  createLoadSource: (config) => new VegetaLoadSource({ binary: config.loadGenerator }),
  createClient: () => new FetchServiceClient(),
};

// ============================================================================
// Commands
// ============================================================================

function routeSource(config: RunConfiguration) {
  return config.routes
    ? routeSourceFor(config.routes)
    : new StaticRouteSource(BENCH_APP_ROUTES, 'bundled sample service');
}

function interruptExitCode(reason: unknown): ExitCode {
  return reason === 'SIGTERM' ? ExitCodes.SIGTERM : ExitCodes.SIGINT;
}

async function runCommand(args: ParsedArgs, env: NodeJS.ProcessEnv, deps: RunDependencies): Promise<ExitCode> {
  const config = loadRunConfiguration(args, env);
  const endpoints = await discover(routeSource(config), {
    filter: config.filter,
    seedPath: config.seedPath,
  });

  const store = new RunStore(config.outputRoot);
  const driver = deps.createDriver(config);
  const shutdown = new ShutdownCoordinator({ ...deps.shutdown, driver }).install();

  let latest: RunResult | null = null;
  let finished = false;
  shutdown.addFinalizer(async () => {
    if (latest && !finished) {
      const path = await store.persist({ ...latest, metadata: { ...latest.metadata, interrupted: true } });
      logger.runPersisted(path, countRecords(latest));
    }
  });

  try {
    const swept = await driver.sweepOrphans();
    if (swept > 0) {
      logger.warn({ swept }, `Cleaned up ${swept} orphaned server processes`);
    }

    const workDir = await store.createRunDir();
    console.log('Clean-Room Benchmark (server restart between tests)');
    console.log('='.repeat(70));
    console.log(`Rates:     ${config.rates.join(', ')} RPS`);
    console.log(`Duration:  ${config.duration}`);
    console.log(`Server:    ${config.host}:${config.port}`);
    console.log(`Workers:   ${config.workers}`);
    if (config.filter) {
      console.log(`Filter:    ${config.filter}`);
    }
    console.log(`Endpoints: ${endpoints.map((endpoint) => endpoint.name).join(', ')}`);
    console.log(`Output:    ${workDir}`);

    const orchestrator = new BenchmarkOrchestrator({
      driver,
      sampler: deps.createSampler(),
      loadSource: deps.createLoadSource(config),
      client: deps.createClient(),
      sink: store,
      pacing: deps.pacing,
    });

    const startedAt = Date.now();
    const run = await shutdown.track(
      orchestrator.run(config, endpoints, {
        workDir,
        signal: shutdown.signal,
        onCycleStart: (cycle) => {
          console.log(`\nTest ${cycle.index}/${cycle.total}: ${cycle.endpoint} at ${cycle.rate} RPS`);
        },
        onCycleComplete: (outcome, snapshot) => {
          latest = snapshot;
          console.log(
            outcome.ok
              ? `  Achieved ${outcome.record.achievedRps.toFixed(1)} RPS, P95 ${outcome.record.p95Ms.toFixed(1)}ms`
              : `  Skipped at ${outcome.failure.stage}: ${outcome.failure.message}`
          );
        },
      })
    );
    finished = true;

    console.log(`\n${'='.repeat(100)}\nCLEAN BENCHMARK RESULTS (${formatDuration(Date.now() - startedAt)})\n${'='.repeat(100)}`);
    console.log(formatRateTables(run));
    console.log(`\nResults saved: ${store.runDir ?? workDir}`);
    console.log(`\n${formatAnalysis(summarizeRun(run))}`);

    return run.metadata.interrupted ? interruptExitCode(shutdown.signal.reason) : ExitCodes.SUCCESS;
  } finally {
    await shutdown.cleanup();
    shutdown.uninstall();
  }
}

async function reportCommand(args: ParsedArgs, env: NodeJS.ProcessEnv): Promise<ExitCode> {
  const config = loadReportConfiguration(args, env);
  const store = new RunStore(config.outputRoot);
  const { path, run } = config.file
    ? { path: config.file, run: await store.load(config.file) }
    : await store.loadLatest();
  const rollups = summarizeRun(run);

  if (config.format === 'json') {
    console.log(JSON.stringify({ file: path, metadata: run.metadata, endpoints: rollups, skipped: run.skipped }, null, 2));
    return ExitCodes.SUCCESS;
  }

  console.log(`Using data from: ${path}`);
  console.log(formatRateTables(run));
  console.log(`\n${formatAnalysis(rollups)}`);
  if (run.skipped.length > 0) {
    console.log(`\nSkipped cycles: ${run.skipped.length}`);
    for (const failure of run.skipped) {
      console.log(`  ${failure.endpoint} @ ${failure.rate} RPS: ${failure.stage} (${failure.code}) ${failure.message}`);
    }
  }
  return ExitCodes.SUCCESS;
}

// ============================================================================
// Main
// ============================================================================

/**
 * Run the CLI and resolve with the process exit code
 */
export async function main(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<RunDependencies> = {}
): Promise<ExitCode> {
  try {
    const args = parseArgs(argv);
    if (args.help) {
      printHelp();
      return ExitCodes.SUCCESS;
    }
    return args.command === 'report'
      ? await reportCommand(args, env)
      : await runCommand(args, env, { ...defaultDependencies, ...overrides });
  } catch (error) {
    if (isFatalError(error)) {
      logger.error({ err: error, code: error.code }, error.message);
      console.error(`Error: ${error.message}`);
      if (error.exitCode === ExitCodes.USAGE) {
        console.error('Run with --help for usage.');
      }
      return error.exitCode;
    }
    logger.fatal({ err: error }, `Benchmark failed: ${getErrorMessage(error)}`);
    return ExitCodes.FATAL;
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch (error) {
    logger.debug({ error: getErrorMessage(error) }, 'Cannot resolve entry script');
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error('Benchmark runner failed:', error);
      process.exit(ExitCodes.FATAL);
    }
  );
}
