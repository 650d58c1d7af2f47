/**
 * CLI Argument Parsing
 * @module cli/args
 *
 * Hand-rolled parser for the `clean-bench` command line. Accepts both
 * `--flag=value` and `--flag value`; `--rates` additionally takes several
 * space- or comma-separated values.
 */

import { ConfigurationError } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

export type CommandName = 'run' | 'report';

/**
 * Raw string values collected from argv, before validation
 */
export interface ParsedArgs {
  command: CommandName;
  help: boolean;
  rates?: string[];
  host?: string;
  port?: string;
  duration?: string;
  workers?: string;
  filter?: string;
  output?: string;
  routes?: string;
  serverCommand?: string;
  resourceId?: string;
  seedPath?: string;
  loadGenerator?: string;
  file?: string;
  format?: string;
}

type ValueKey = Exclude<keyof ParsedArgs, 'command' | 'help' | 'rates'>;

const VALUE_FLAGS: Readonly<Record<string, ValueKey>> = {
  '--host': 'host',
  '--port': 'port',
  '--duration': 'duration',
  '--workers': 'workers',
  '--filter': 'filter',
  '--output': 'output',
  '-o': 'output',
  '--routes': 'routes',
  '--server-command': 'serverCommand',
  '--resource-id': 'resourceId',
  '--seed-path': 'seedPath',
  '--load-generator': 'loadGenerator',
  '--file': 'file',
  '--format': 'format',
  '-f': 'format',
};

const COMMANDS: readonly CommandName[] = ['run', 'report'];

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

function isFlag(token: string): boolean {
  return token.startsWith('-') && !/^-\d/.test(token);
}

function splitList(value: string): string[] {
  return value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
}

// ============================================================================
// Parser
// ============================================================================

/**
 * Parse argv (without the node executable and script path)
 *
 * @throws ConfigurationError for unknown flags or missing values
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { command: 'run', help: false };
  let index = 0;

  const first = argv[0];
  if (first !== undefined && !isFlag(first)) {
    if (!isCommandName(first)) {
      throw new ConfigurationError(`Unknown command: ${first}`, { details: { command: first } }, true);
    }
    parsed.command = first;
    index = 1;
  }

  while (index < argv.length) {
    const token = argv[index] ?? '';
    index += 1;

    if (token === '--help' || token === '-h') {
      parsed.help = true;
      continue;
    }

    const eq = token.indexOf('=');
    const flag = eq > 0 ? token.slice(0, eq) : token;
    const inline = eq > 0 ? token.slice(eq + 1) : undefined;

    if (flag === '--rates' || flag === '-r') {
      const values = inline !== undefined ? splitList(inline) : [];
      while (inline === undefined && index < argv.length && !isFlag(argv[index] ?? '')) {
        values.push(...splitList(argv[index] ?? ''));
        index += 1;
      }
      if (values.length === 0) {
        throw new ConfigurationError('--rates requires at least one value', {}, true);
      }
      parsed.rates = [...(parsed.rates ?? []), ...values];
      continue;
    }

    const key = VALUE_FLAGS[flag];
    if (key === undefined) {
      throw new ConfigurationError(`Unknown option: ${flag}`, { details: { flag } }, true);
    }

    let value = inline;
    if (value === undefined) {
      const next = argv[index];
      if (next === undefined || isFlag(next)) {
        throw new ConfigurationError(`${flag} requires a value`, { details: { flag } }, true);
      }
      value = next;
      index += 1;
    }
    parsed[key] = value;
  }

  return parsed;
}

/**
 * Split a shell-style command string into argv, honouring simple quotes
 */
export function splitCommand(command: string): string[] {
  const parts: string[] = [];
  const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(command)) !== null) {
    parts.push(match[1] ?? match[2] ?? match[3] ?? '');
  }
  return parts;
}

// ============================================================================
// Help
// ============================================================================

export function printHelp(): void {
  console.log(`
Clean-Room HTTP Benchmark
=========================

Restarts the service under test before every (rate, endpoint) cycle so no
state leaks between measurements.

Usage: clean-bench [run] [options]
       clean-bench report [options]

Run options:
  --rates <r...>           Target rates in RPS, space or comma separated
                           Default: 1000 5000 10000
  --host <host>            Server host (default: 127.0.0.1)
  --port <port>            Server port (default: 8000)
  --duration <d>           Load duration per cycle, e.g. 10s, 1m (default: 10s)
  --workers <n>            Server worker processes (default: 1)
  --filter <prefix>        Only benchmark routes under this path prefix
                           e.g. --filter=/api/simple
  --output, -o <dir>       Output root directory (default: .tmp)
  --routes <file|module>   Route manifest (.json) or module exporting \`routes\`
                           Default: the bundled sample service
  --server-command <cmd>   Command that starts the service under test;
                           --host, --port and --workers are appended
  --resource-id <id>       Value for {placeholders} in routes (default: 1000)
  --seed-path <path>       Seed route (default: /api/db/seed)
  --load-generator <bin>   Load generator executable (default: vegeta)

Report options:
  --file <path>            Results document (default: latest run)
  --output, -o <dir>       Output root to search (default: .tmp)
  --format, -f <fmt>       table or json (default: table)

  --help, -h               Show this help message

Environment:
  BENCH_RATES, BENCH_HOST, BENCH_PORT, BENCH_DURATION, BENCH_WORKERS,
  BENCH_FILTER, BENCH_OUTPUT_DIR, BENCH_ROUTES, BENCH_SERVER_COMMAND,
  BENCH_RESOURCE_ID, BENCH_SEED_PATH, VEGETA_BIN, LOG_LEVEL, LOG_PRETTY

Examples:
  clean-bench --rates 100 500 --duration 10s --filter /api/simple
  clean-bench --workers=4 --rates=1000,2000
  clean-bench report --format=json
`);
}
