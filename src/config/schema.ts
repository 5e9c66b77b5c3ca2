/**
 * Zod schemas for analyzer configuration.
 *
 * `ConfigFileSchema` validates the optional JSON file passed with --config
 * (tuning only, never credentials). `AnalyzerConfigSchema` validates the fully
 * merged run configuration and fills in defaults.
 */

import { z } from 'zod';

// =============================================================================
// DATES
// =============================================================================

const DATE_PATTERN = /^(\d{2})-(\d{2})-(\d{4})$/;

/**
 * Parse a DD-MM-YYYY date. Returns null for anything that is not a real
 * calendar date (31-02-2025 is rejected).
 */
export function parseDayMonthYear(value: string): Date | null {
  const match = DATE_PATTERN.exec(value);
  if (!match) return null;

  const day = Number(match[1]);
  const month = Number(match[2]);
  const year = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

function dateArgument(flag: string) {
  return z
    .string({ required_error: `${flag} is required (DD-MM-YYYY)` })
    .refine((value) => parseDayMonthYear(value) !== null, {
      message: `${flag} must be a valid date in DD-MM-YYYY format`,
    });
}

// =============================================================================
// SUB-SCHEMAS
// =============================================================================

const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']);

const ApiSchema = z
  .object({
    billingBaseUrl: z.string().url().default('https://billing.weni.ai'),
    nexusBaseUrl: z.string().url().default('https://nexus.weni.ai'),
  })
  .strict();

/** Minimum spacing in ms between consecutive calls to the same endpoint. */
const RateLimitSchema = z
  .object({
    conversationsMs: z.number().int().nonnegative().default(500),
    messagesMs: z.number().int().nonnegative().default(0),
    tracesMs: z.number().int().nonnegative().default(200),
  })
  .strict();

const NetworkSchema = z
  .object({
    /** Total attempts per request, including the first */
    maxRetries: z.number().int().positive().default(3),
    timeoutMs: z.number().int().positive().default(30000),
    /** Floor for the spacing between retries of an endpoint with no delay */
    retryDelayMs: z.number().int().nonnegative().default(200),
  })
  .strict();

// =============================================================================
// CONFIG FILE
// =============================================================================

export const ConfigFileSchema = z
  .object({
    outputDir: z.string().min(1).optional(),
    api: ApiSchema.partial().optional(),
    rateLimits: RateLimitSchema.partial().optional(),
    network: NetworkSchema.partial().optional(),
    maxPages: z.number().int().positive().optional(),
    logLevel: logLevelSchema.optional(),
    logFile: z.string().min(1).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// =============================================================================
// RESOLVED CONFIG
// =============================================================================

export const AnalyzerConfigSchema = z
  .object({
    token: z
      .string({ required_error: 'Bearer token is required: pass --token or set WENI_BEARER_TOKEN' })
      .min(1, 'Bearer token is required: pass --token or set WENI_BEARER_TOKEN'),
    projectUuid: z
      .string({ required_error: 'Project UUID is required: pass --project-uuid or set WENI_PROJECT_UUID' })
      .min(1, 'Project UUID is required: pass --project-uuid or set WENI_PROJECT_UUID'),
    startDate: dateArgument('--start-date'),
    endDate: dateArgument('--end-date'),
    outputDir: z.string().min(1),
    api: ApiSchema.default({}),
    rateLimits: RateLimitSchema.default({}),
    network: NetworkSchema.default({}),
    maxPages: z.number().int().positive().default(10000),
    logLevel: logLevelSchema.default('info'),
    logFile: z.string().min(1).optional(),
  })
  .superRefine((config, ctx) => {
    const start = parseDayMonthYear(config.startDate);
    const end = parseDayMonthYear(config.endDate);
    if (start && end && start.getTime() > end.getTime()) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['endDate'],
        message: '--end-date must not be before --start-date',
      });
    }
  });

export type AnalyzerConfig = z.infer<typeof AnalyzerConfigSchema>;
export type RateLimitConfig = AnalyzerConfig['rateLimits'];
export type NetworkConfig = AnalyzerConfig['network'];
export type ApiConfig = AnalyzerConfig['api'];
