/**
 * Report Writer
 *
 * Writes the report files of one run, each suffixed with the run timestamp:
 *   conversation_statistics_<ts>.txt
 *   conversation_statistics_<ts>.json
 *   tool_invocations_<ts>.csv          (only when a tool was invoked)
 *   tool_<name>_<ts>.csv               (one per tool)
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { AggregationState } from '../pipeline/types.js';
import { renderStatisticsJson, renderStatisticsText, type ReportSummary } from './statistics.js';
import { renderToolCsvs, renderToolInvocationsCsv } from './tool-csv.js';

const COMBINED_STEM = 'invocations';

export interface ReportInput {
  state: AggregationState;
  summary: ReportSummary;
}

export interface WrittenReports {
  statisticsText: string;
  statisticsJson: string;
  toolInvocationsCsv?: string;
  /** Function name → file path */
  toolCsvs: Map<string, string>;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYYMMDD_HHMMSS` in local time. */
export function formatRunTimestamp(date: Date = new Date()): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/** Tool names become part of a file name; anything outside [A-Za-z0-9._-] is replaced. */
export function sanitizeFileComponent(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9._-]/g, '_');
  return sanitized.length > 0 ? sanitized : '_';
}

export async function writeReports(outputDir: string, input: ReportInput, timestamp: string): Promise<WrittenReports> {
  await mkdir(outputDir, { recursive: true });

  const written: WrittenReports = {
    statisticsText: join(outputDir, `conversation_statistics_${timestamp}.txt`),
    statisticsJson: join(outputDir, `conversation_statistics_${timestamp}.json`),
    toolCsvs: new Map(),
  };

  await writeFile(written.statisticsText, renderStatisticsText(input.summary), 'utf-8');
  await writeFile(written.statisticsJson, renderStatisticsJson(input.summary), 'utf-8');

  if (input.state.toolInvocationRows.length === 0) {
    return written;
  }

  written.toolInvocationsCsv = join(outputDir, `tool_${COMBINED_STEM}_${timestamp}.csv`);
  await writeFile(written.toolInvocationsCsv, renderToolInvocationsCsv(input.state), 'utf-8');

  // the combined table owns its stem; a tool named after it gets a suffix
  const usedStems = new Set<string>([COMBINED_STEM]);
  for (const [tool, csv] of renderToolCsvs(input.state)) {
    // distinct names may sanitize alike
    let stem = sanitizeFileComponent(tool);
    for (let n = 2; usedStems.has(stem); n++) stem = `${sanitizeFileComponent(tool)}_${n}`;
    usedStems.add(stem);

    const path = join(outputDir, `tool_${stem}_${timestamp}.csv`);
    await writeFile(path, csv, 'utf-8');
    written.toolCsvs.set(tool, path);
  }

  return written;
}
