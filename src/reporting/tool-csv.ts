/**
 * Tool invocation tables.
 *
 * Fixed columns first, then one `param_<name>` column per parameter name,
 * sorted. Per-tool tables hold only that tool's rows but keep the parameter
 * columns of the whole run.
 */

import { compareText } from '../pipeline/aggregator.js';
import type { AggregationState, ToolInvocationRow } from '../pipeline/types.js';
import { formatCsv } from './csv.js';

export const BASE_COLUMNS = ['function_name', 'action_group_name', 'execution_type'] as const;

export const PARAMETER_COLUMN_PREFIX = 'param_';

function sortedUnique(names: Iterable<string>): string[] {
  return [...new Set(names)].sort(compareText);
}

export function toolInvocationColumns(parameterNames: Iterable<string>): string[] {
  return [...BASE_COLUMNS, ...sortedUnique(parameterNames).map((name) => `${PARAMETER_COLUMN_PREFIX}${name}`)];
}

function renderRows(rows: readonly ToolInvocationRow[], parameterNames: Iterable<string>): string {
  const names = sortedUnique(parameterNames);
  const cells = rows.map((row) => [
    row.functionName,
    row.actionGroupName,
    row.executionType,
    ...names.map((name) => row.parameters.get(name) ?? ''),
  ]);
  return formatCsv(toolInvocationColumns(names), cells);
}

/** Every tool call of the run, one row each, in arrival order. */
export function renderToolInvocationsCsv(state: AggregationState): string {
  return renderRows(state.toolInvocationRows, state.parameterNames);
}

/**
 * One table per distinct tool, keyed by function name (sorted).
 */
export function renderToolCsvs(state: AggregationState): Map<string, string> {
  const byTool = new Map<string, ToolInvocationRow[]>();
  for (const row of state.toolInvocationRows) {
    const rows = byTool.get(row.functionName);
    if (rows) rows.push(row);
    else byTool.set(row.functionName, [row]);
  }

  const tables = new Map<string, string>();
  for (const tool of [...byTool.keys()].sort(compareText)) {
    tables.set(tool, renderRows(byTool.get(tool) ?? [], state.parameterNames));
  }
  return tables;
}
