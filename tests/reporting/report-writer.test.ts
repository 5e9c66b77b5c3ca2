/**
 * Report file tests, written into a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readdir, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createAggregationState, foldTraceEvents } from '../../src/pipeline/aggregator.js';
import { createRunStats, type TraceEvent } from '../../src/pipeline/types.js';
import { formatRunTimestamp, sanitizeFileComponent, writeReports } from '../../src/reporting/report-writer.js';
import { renderStatisticsText, summarize } from '../../src/reporting/statistics.js';

const TS = '20250522_101500';

function tool(functionName: string, parameters: Record<string, string> = {}): TraceEvent {
  return {
    kind: 'tool-invocation',
    functionName,
    actionGroupName: 'group',
    executionType: 'LAMBDA',
    parameters: new Map(Object.entries(parameters)),
  };
}

describe('formatRunTimestamp', () => {
  it('should format local time as YYYYMMDD_HHMMSS', () => {
    expect(formatRunTimestamp(new Date(2025, 4, 22, 9, 5, 7))).toBe('20250522_090507');
  });
});

describe('sanitizeFileComponent', () => {
  it('should replace characters outside the safe set', () => {
    expect(sanitizeFileComponent('order_status_by_order_number-17')).toBe('order_status_by_order_number-17');
    expect(sanitizeFileComponent('order/status v2')).toBe('order_status_v2');
    expect(sanitizeFileComponent('')).toBe('_');
  });
});

describe('writeReports', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `analyzer-reports-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should write statistics and tool tables', async () => {
    const state = foldTraceEvents(createAggregationState(), [
      { kind: 'agent-invocation', agentName: 'orders_agent_vtex' },
      tool('order_status_by_order_number-17', { orderID: '150639' }),
      tool('send email', { to: 'a@example.com' }),
    ]);
    const summary = summarize(state, createRunStats());
    const outputDir = join(testDir, 'nested', 'reports');

    const written = await writeReports(outputDir, { state, summary }, TS);

    expect((await readdir(outputDir)).sort()).toEqual([
      `conversation_statistics_${TS}.json`,
      `conversation_statistics_${TS}.txt`,
      `tool_invocations_${TS}.csv`,
      `tool_order_status_by_order_number-17_${TS}.csv`,
      `tool_send_email_${TS}.csv`,
    ]);
    expect(await readFile(written.statisticsText, 'utf-8')).toBe(renderStatisticsText(summary));
    expect(await readFile(join(outputDir, `tool_order_status_by_order_number-17_${TS}.csv`), 'utf-8')).toBe(
      'function_name,action_group_name,execution_type,param_orderID,param_to\n' +
        'order_status_by_order_number-17,group,LAMBDA,150639,\n'
    );
    expect(written.toolCsvs.get('send email')).toBe(join(outputDir, `tool_send_email_${TS}.csv`));
  });

  it('should write only statistics when no tool was called', async () => {
    const state = foldTraceEvents(createAggregationState(), [{ kind: 'unclassified' }]);

    const written = await writeReports(testDir, { state, summary: summarize(state, createRunStats()) }, TS);

    expect((await readdir(testDir)).sort()).toEqual([
      `conversation_statistics_${TS}.json`,
      `conversation_statistics_${TS}.txt`,
    ]);
    expect(written.toolInvocationsCsv).toBeUndefined();
    expect(written.toolCsvs.size).toBe(0);
  });

  it('should keep tools apart whose names sanitize alike', async () => {
    const state = foldTraceEvents(createAggregationState(), [tool('a b'), tool('a_b')]);

    const written = await writeReports(testDir, { state, summary: summarize(state, createRunStats()) }, TS);

    expect(written.toolCsvs.get('a b')).toBe(join(testDir, `tool_a_b_${TS}.csv`));
    expect(written.toolCsvs.get('a_b')).toBe(join(testDir, `tool_a_b_2_${TS}.csv`));
  });

  it('should not let a tool named invocations replace the combined table', async () => {
    const state = foldTraceEvents(createAggregationState(), [tool('invocations', { a: '1' }), tool('lookup', { b: '2' })]);

    const written = await writeReports(testDir, { state, summary: summarize(state, createRunStats()) }, TS);

    expect(written.toolInvocationsCsv).toBe(join(testDir, `tool_invocations_${TS}.csv`));
    expect(written.toolCsvs.get('invocations')).toBe(join(testDir, `tool_invocations_2_${TS}.csv`));
    expect(await readFile(join(testDir, `tool_invocations_${TS}.csv`), 'utf-8')).toBe(
      'function_name,action_group_name,execution_type,param_a,param_b\n' +
        'invocations,group,LAMBDA,1,\n' +
        'lookup,group,LAMBDA,,2\n'
    );
  });
});
