/**
 * Statistics summary and its text renderings.
 *
 * The text file and the console summary share one layout; only the theme
 * differs (identity for the file, chalk colours for the terminal).
 */

import chalk from 'chalk';
import { compareText, sumCounts } from '../pipeline/aggregator.js';
import type { AggregationState, RunStats } from '../pipeline/types.js';

// =============================================================================
// SUMMARY
// =============================================================================

export interface RankedCount {
  name: string;
  count: number;
  /** Share of its category, 0-100 */
  percentage: number;
}

export interface ReportPeriod {
  startDate: string;
  endDate: string;
}

export interface ReportSummary {
  period?: ReportPeriod;
  cancelled: boolean;
  agents: RankedCount[];
  tools: RankedCount[];
  mostUsedAgent?: RankedCount;
  mostUsedTool?: RankedCount;
  totals: {
    agentInvocations: number;
    toolInvocations: number;
    unclassified: number;
    events: number;
  };
  parameterNames: string[];
  stats: RunStats;
}

export interface SummaryOptions {
  period?: ReportPeriod;
  cancelled?: boolean;
}

function rank(counts: ReadonlyMap<string, number>): RankedCount[] {
  const total = sumCounts(counts);
  return [...counts.entries()]
    .sort(([nameA, countA], [nameB, countB]) => countB - countA || compareText(nameA, nameB))
    .map(([name, count]) => ({ name, count, percentage: total > 0 ? (count / total) * 100 : 0 }));
}

export function summarize(state: AggregationState, stats: RunStats, options: SummaryOptions = {}): ReportSummary {
  const agents = rank(state.agentCounts);
  const tools = rank(state.toolCounts);
  return {
    ...(options.period ? { period: options.period } : {}),
    cancelled: options.cancelled ?? false,
    agents,
    tools,
    ...(agents.length > 0 ? { mostUsedAgent: agents[0] } : {}),
    ...(tools.length > 0 ? { mostUsedTool: tools[0] } : {}),
    totals: {
      agentInvocations: sumCounts(state.agentCounts),
      toolInvocations: sumCounts(state.toolCounts),
      unclassified: state.unclassifiedCount,
      events: state.totalEvents,
    },
    parameterNames: [...state.parameterNames],
    stats: { ...stats },
  };
}

// =============================================================================
// RENDERING
// =============================================================================

type Style = (s: string) => string;

interface SummaryTheme {
  title: Style;
  heading: Style;
  rule: Style;
  name: Style;
  count: Style;
  muted: Style;
  warning: Style;
}

const identity: Style = (s) => s;

const PLAIN_THEME: SummaryTheme = {
  title: identity,
  heading: identity,
  rule: identity,
  name: identity,
  count: identity,
  muted: identity,
  warning: identity,
};

const CONSOLE_THEME: SummaryTheme = {
  title: (s) => chalk.bold.cyan(s),
  heading: (s) => chalk.bold.yellow(s),
  rule: (s) => chalk.gray(s),
  name: (s) => chalk.white(s),
  count: (s) => chalk.green(s),
  muted: (s) => chalk.gray(s),
  warning: (s) => chalk.yellow(s),
};

function formatPercentage(value: number): string {
  return `${value.toFixed(1)}%`;
}

function renderSection(
  theme: SummaryTheme,
  heading: string,
  ranked: RankedCount[],
  total: number,
  noun: string,
  mostUsed?: RankedCount
): string[] {
  const lines = ['', theme.heading(`${heading}:`), theme.rule('-'.repeat(30))];
  if (ranked.length === 0) {
    lines.push(theme.muted(`  No ${noun} invocations found`));
    return lines;
  }
  for (const entry of ranked) {
    lines.push(
      `  ${theme.name(entry.name)}: ${theme.count(String(entry.count))} ${theme.muted(`(${formatPercentage(entry.percentage)})`)}`
    );
  }
  lines.push('', `Total ${noun} invocations: ${theme.count(String(total))}`);
  if (mostUsed) {
    lines.push(`Most used ${noun}: ${theme.name(mostUsed.name)} (${mostUsed.count})`);
  }
  return lines;
}

const PROCESSING_LINES: Array<[label: string, key: keyof RunStats]> = [
  ['Conversation pages fetched', 'conversationPagesFetched'],
  ['Conversation pages skipped', 'conversationPagesSkipped'],
  ['Conversations found', 'conversationsFound'],
  ['Conversation records skipped', 'conversationRecordsSkipped'],
  ['Conversations processed', 'conversationsProcessed'],
  ['Conversations skipped', 'conversationsSkipped'],
  ['Messages seen', 'messagesSeen'],
  ['Message records skipped', 'messageRecordsSkipped'],
  ['Agent messages', 'agentMessages'],
  ['Agent messages processed', 'agentMessagesProcessed'],
  ['Agent messages skipped', 'agentMessagesSkipped'],
  ['Trace events processed', 'tracesProcessed'],
  ['Trace records skipped', 'tracesSkipped'],
  ['Partial-data warnings', 'partialDataWarnings'],
];

function renderSummary(summary: ReportSummary, theme: SummaryTheme): string {
  const lines = [theme.title('CONVERSATION ANALYSIS STATISTICS'), theme.rule('='.repeat(60))];
  if (summary.period) {
    lines.push(`Period: ${summary.period.startDate} to ${summary.period.endDate}`);
  }
  if (summary.cancelled) {
    lines.push(theme.warning('Run interrupted: results are partial'));
  }

  lines.push(
    ...renderSection(theme, 'AGENT INVOCATIONS', summary.agents, summary.totals.agentInvocations, 'agent', summary.mostUsedAgent),
    ...renderSection(theme, 'TOOL INVOCATIONS', summary.tools, summary.totals.toolInvocations, 'tool', summary.mostUsedTool),
    '',
    `Unclassified traces: ${theme.count(String(summary.totals.unclassified))}`,
    `Total trace events: ${theme.count(String(summary.totals.events))}`,
    '',
    theme.heading('PROCESSING:'),
    theme.rule('-'.repeat(30))
  );

  for (const [label, key] of PROCESSING_LINES) {
    const value = summary.stats[key];
    const styled = value > 0 && key.endsWith('Skipped') ? theme.warning(String(value)) : String(value);
    lines.push(`  ${label}: ${styled}`);
  }

  return `${lines.join('\n')}\n`;
}

/** Plain text for the statistics file. */
export function renderStatisticsText(summary: ReportSummary): string {
  return renderSummary(summary, PLAIN_THEME);
}

/** Coloured text for the terminal. */
export function renderConsoleSummary(summary: ReportSummary): string {
  return renderSummary(summary, CONSOLE_THEME);
}

export function renderStatisticsJson(summary: ReportSummary): string {
  return `${JSON.stringify(summary, null, 2)}\n`;
}
