/**
 * Run Configuration Loader
 *
 * Single entry point for building the validated run configuration from the
 * optional --config JSON file, the process environment and CLI flags.
 *
 * Priority: defaults ← config file ← environment ← CLI flags.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { CLIArgs } from '../cli.js';
import { ArgumentError } from '../errors/index.js';
import { AnalyzerConfigSchema, ConfigFileSchema, type AnalyzerConfig, type ConfigFile } from './schema.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ConfigLoadOptions {
  args: CLIArgs;
  /** Environment to read credentials from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Base for relative paths (defaults to process.cwd()) */
  cwd?: string;
}

// =============================================================================
// HELPERS
// =============================================================================

/** Empty strings in the environment count as unset. */
function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

/**
 * Load and validate the --config file. Any problem with it is an argument
 * error: the user named the file explicitly.
 */
export function loadConfigFile(filePath: string): ConfigFile {
  if (!existsSync(filePath)) {
    throw new ArgumentError(`Config file not found: ${filePath}`, ['config']);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ArgumentError(
      `Config file ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      ['config']
    );
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new ArgumentError(`Invalid config file ${filePath}: ${details.join('; ')}`, ['config']);
  }
  return result.data;
}

// =============================================================================
// LOADER
// =============================================================================

/**
 * Merge every source and validate the result.
 * Throws ArgumentError listing every missing or invalid value.
 */
export function resolveConfig(options: ConfigLoadOptions): AnalyzerConfig {
  const { args } = options;
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const file: ConfigFile = args.configPath ? loadConfigFile(resolve(cwd, args.configPath)) : {};

  const logFile = args.logFile ?? file.logFile;
  const billingBaseUrl = nonEmpty(env.WENI_BILLING_API_URL);
  const nexusBaseUrl = nonEmpty(env.WENI_NEXUS_API_URL);
  const candidate = {
    token: nonEmpty(args.token) ?? nonEmpty(env.WENI_BEARER_TOKEN),
    projectUuid: nonEmpty(args.projectUuid) ?? nonEmpty(env.WENI_PROJECT_UUID),
    startDate: args.startDate,
    endDate: args.endDate,
    outputDir: resolve(cwd, args.outputDir ?? file.outputDir ?? '.'),
    api: {
      ...file.api,
      ...(billingBaseUrl ? { billingBaseUrl } : {}),
      ...(nexusBaseUrl ? { nexusBaseUrl } : {}),
    },
    rateLimits: file.rateLimits,
    network: file.network,
    maxPages: file.maxPages,
    logLevel: args.debug ? 'debug' : nonEmpty(env.ANALYZER_LOG_LEVEL) ?? file.logLevel,
    logFile: logFile === undefined ? undefined : resolve(cwd, logFile),
  };

  const result = AnalyzerConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw ArgumentError.fromZodError(result.error);
  }
  return result.data;
}
