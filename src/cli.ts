/**
 * CLI Argument Parsing and Help
 *
 * Handles command-line argument parsing and help text display. Values are
 * only collected here; validation and environment fallback happen in
 * config/config-manager.ts.
 */

import chalk from 'chalk';
import { ArgumentError } from './errors/index.js';

export const VERSION = '1.0.0';

/**
 * CLI arguments structure.
 */
export interface CLIArgs {
  help: boolean;
  version: boolean;
  debug: boolean;
  startDate?: string;
  endDate?: string;
  token?: string;
  projectUuid?: string;
  outputDir?: string;
  /** Optional JSON file with tuning options */
  configPath?: string;
  /** Copy log entries as JSON lines to this file */
  logFile?: string;
}

type ValueOption = 'startDate' | 'endDate' | 'token' | 'projectUuid' | 'outputDir' | 'configPath' | 'logFile';

const VALUE_OPTIONS: Record<string, ValueOption> = {
  '--start-date': 'startDate',
  '-s': 'startDate',
  '--end-date': 'endDate',
  '-e': 'endDate',
  '--token': 'token',
  '-t': 'token',
  '--project-uuid': 'projectUuid',
  '-p': 'projectUuid',
  '--output-dir': 'outputDir',
  '-o': 'outputDir',
  '--config': 'configPath',
  '-c': 'configPath',
  '--log-file': 'logFile',
};

/**
 * Parse command-line arguments. Accepts `--flag value` and `--flag=value`.
 * Throws ArgumentError on unknown flags, stray positionals or missing values.
 */
export function parseArgs(argv: string[] = process.argv.slice(2)): CLIArgs {
  const result: CLIArgs = {
    help: false,
    version: false,
    debug: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const raw = argv[i];
    const eq = raw.startsWith('--') ? raw.indexOf('=') : -1;
    const arg = eq === -1 ? raw : raw.slice(0, eq);

    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--version' || arg === '-v') {
      result.version = true;
    } else if (arg === '--debug') {
      result.debug = true;
    } else if (Object.hasOwn(VALUE_OPTIONS, arg)) {
      const key = VALUE_OPTIONS[arg];
      let value: string | undefined;
      if (eq !== -1) {
        value = raw.slice(eq + 1);
      } else {
        const next = argv[i + 1];
        if (next !== undefined && !next.startsWith('-')) {
          value = next;
          i++;
        }
      }
      if (value === undefined || value === '') {
        throw new ArgumentError(`Option ${arg} requires a value`, [key]);
      }
      result[key] = value;
    } else if (arg.startsWith('-')) {
      throw new ArgumentError(`Unknown option: ${arg}`, [arg]);
    } else {
      throw new ArgumentError(`Unexpected argument: ${arg}`, [arg]);
    }
  }

  return result;
}

/**
 * Help text shown by --help.
 */
export function helpText(): string {
  const rule = chalk.dim('━'.repeat(72));
  return `
${rule}
${chalk.bold('                 CONVERSATION TRACE ANALYZER')}
${rule}

Collects the conversations of a Weni project for a date range, walks the
agent traces of every agent message, and reports which collaborator agents
and tools were invoked, with the parameters of every tool call.

${chalk.bold('USAGE:')}
  conversation-trace-analyzer -s DD-MM-YYYY -e DD-MM-YYYY [OPTIONS]

${chalk.bold('OPTIONS:')}
  -s, --start-date DATE   First day of the range, DD-MM-YYYY (required)
  -e, --end-date DATE     Last day of the range, DD-MM-YYYY (required)
  -t, --token TOKEN       Bearer token (default: $WENI_BEARER_TOKEN)
  -p, --project-uuid ID   Project UUID (default: $WENI_PROJECT_UUID)
  -o, --output-dir DIR    Directory for the report files (default: .)
  -c, --config FILE       JSON file with rate limits, retries and API URLs
  --log-file FILE         Also write log entries to FILE as JSON lines
  --debug                 Verbose logging
  -h, --help              Show this help
  -v, --version           Show version (${VERSION})

${chalk.bold('EXAMPLES:')}
  ${chalk.dim('# Token and project from the environment or .env')}
  conversation-trace-analyzer -s 15-05-2025 -e 22-05-2025

  ${chalk.dim('# Explicit credentials, reports into ./reports')}
  conversation-trace-analyzer -s 01-01-2025 -e 31-01-2025 -t TOKEN -p PROJECT -o reports

${chalk.bold('ENVIRONMENT VARIABLES:')}
  WENI_BEARER_TOKEN       Bearer token for all API calls
  WENI_PROJECT_UUID       Project to analyze
  WENI_BILLING_API_URL    Conversation listing API (default: https://billing.weni.ai)
  WENI_NEXUS_API_URL      Messages and traces API (default: https://nexus.weni.ai)
  ANALYZER_LOG_LEVEL      trace, debug, info, warn, error or silent

${chalk.bold('OUTPUT FILES:')}
  conversation_statistics_<timestamp>.txt   Agent and tool invocation counts
  conversation_statistics_<timestamp>.json  Same summary, machine-readable
  tool_invocations_<timestamp>.csv          Every tool call with its parameters
  tool_<name>_<timestamp>.csv               Calls of one tool
${rule}
`;
}
