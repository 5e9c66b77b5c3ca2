#!/usr/bin/env node
/**
 * Conversation Trace Analyzer
 *
 * Collects the conversations of a Weni project for a date range, follows each
 * agent message to its traces, and reports collaborator agent and tool usage.
 *
 * Exit codes:
 *   0    completed (items that failed individually are reported as skipped)
 *   1    bad arguments, conversation collection failed, or authentication failed
 *   130  interrupted; partial reports were written
 *
 * Run: npx tsx src/main.ts -s 01-05-2025 -e 31-05-2025
 */

// Load environment
import { config as loadEnv } from 'dotenv';
loadEnv();

import chalk from 'chalk';

import { WeniClient } from './api/weni-client.js';
import { helpText, parseArgs, VERSION } from './cli.js';
import { resolveConfig, type AnalyzerConfig } from './config/index.js';
import { createCancellationTokenSource } from './core/cancellation.js';
import { ArgumentError, formatError, formatErrorForLog } from './errors/index.js';
import { RateLimiter, rateLimitPolicyFrom } from './http/rate-limiter.js';
import { bearerHeaders, ResilientFetcher } from './http/resilient-fetch.js';
import { configureLogger, ConsoleSink, createComponentLogger, FileSink, type LogSink } from './observability/logger.js';
import { runAnalysis, type AnalysisResult } from './pipeline/index.js';
import { formatRunTimestamp, renderConsoleSummary, summarize, writeReports } from './reporting/index.js';

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_INTERRUPTED = 130;

const USER_AGENT = `conversation-trace-analyzer/${VERSION}`;

// =============================================================================
// PROCESS ERROR HANDLERS
// =============================================================================

process.on('unhandledRejection', (reason) => {
  console.error('\n[FATAL] Unhandled Promise Rejection:');
  console.error('  Reason:', reason);
  process.exit(EXIT_FAILURE);
});

process.on('uncaughtException', (error, origin) => {
  console.error(`\n[FATAL] Uncaught Exception (${origin}):`);
  console.error('  Error:', error.message);
  if (error.stack) {
    console.error('  Stack:', error.stack.split('\n').slice(0, 5).join('\n'));
  }
  process.exit(EXIT_FAILURE);
});

// =============================================================================
// MAIN
// =============================================================================

function loadConfiguration(): { config?: AnalyzerConfig; exitCode?: number } {
  try {
    const args = parseArgs();
    if (args.version) {
      console.log(`conversation-trace-analyzer v${VERSION}`);
      return { exitCode: EXIT_OK };
    }
    if (args.help) {
      console.log(helpText());
      return { exitCode: EXIT_OK };
    }
    return { config: resolveConfig({ args }) };
  } catch (error) {
    if (error instanceof ArgumentError) {
      console.error(chalk.red(`Error: ${error.message}`));
      console.error('Run with --help for usage.');
      return { exitCode: EXIT_FAILURE };
    }
    throw error;
  }
}

async function main(): Promise<number> {
  const { config, exitCode } = loadConfiguration();
  if (!config) return exitCode ?? EXIT_FAILURE;

  const sinks: LogSink[] = [new ConsoleSink()];
  if (config.logFile) sinks.push(new FileSink(config.logFile));
  const log = configureLogger({ level: config.logLevel, sinks });

  // First signal stops the run gracefully, a second one exits at once
  const cancellation = createCancellationTokenSource();
  const onSignal = (signal: NodeJS.Signals): void => {
    if (cancellation.isCancellationRequested) {
      process.exit(EXIT_INTERRUPTED);
    }
    log.warn(`Received ${signal}; stopping and writing partial reports`);
    cancellation.cancel(`Interrupted by ${signal}`);
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  const limiter = new RateLimiter(rateLimitPolicyFrom(config.rateLimits));
  const fetcher = new ResilientFetcher({
    limiter,
    headers: bearerHeaders(config.token, USER_AGENT),
    network: config.network,
    cancellationToken: cancellation.token,
    logger: createComponentLogger('http', log),
  });
  const api = new WeniClient(fetcher, config.api);

  log.info('Starting conversation analysis', {
    startDate: config.startDate,
    endDate: config.endDate,
    projectUuid: config.projectUuid,
  });

  let result: AnalysisResult;
  try {
    result = await runAnalysis(
      { projectUuid: config.projectUuid, startDate: config.startDate, endDate: config.endDate },
      { api, maxPages: config.maxPages, logger: log, cancellationToken: cancellation.token }
    );
  } catch (error) {
    log.error(`Conversation collection failed: ${formatErrorForLog(error)}`);
    console.error(chalk.red(`Error: ${formatError(error)}`));
    return EXIT_FAILURE;
  }

  const summary = summarize(result.state, result.stats, {
    period: { startDate: config.startDate, endDate: config.endDate },
    cancelled: result.cancelled,
  });
  console.log(renderConsoleSummary(summary));

  const written = await writeReports(config.outputDir, { state: result.state, summary }, formatRunTimestamp());
  console.log(chalk.bold('Report files:'));
  console.log(`  ${written.statisticsText}`);
  console.log(`  ${written.statisticsJson}`);
  if (written.toolInvocationsCsv) {
    console.log(`  ${written.toolInvocationsCsv}`);
  } else {
    console.log(chalk.gray('  No tool call data to export.'));
  }
  for (const path of written.toolCsvs.values()) {
    console.log(`  ${path}`);
  }

  if (result.authFailure) {
    console.error(chalk.red(`Error: ${result.authFailure.message}`));
    return EXIT_FAILURE;
  }
  if (result.cancelled) {
    console.error(chalk.yellow('\nAnalysis interrupted by user.'));
    return EXIT_INTERRUPTED;
  }
  console.log(chalk.green('\nAnalysis completed successfully!'));
  return EXIT_OK;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(chalk.red(`[FATAL] ${formatErrorForLog(error)}`));
    process.exitCode = EXIT_FAILURE;
  }
);
