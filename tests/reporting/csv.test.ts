/**
 * CSV writer and tool table tests.
 */

import { describe, it, expect } from 'vitest';
import { createAggregationState, foldTraceEvents } from '../../src/pipeline/aggregator.js';
import type { ToolInvocation } from '../../src/pipeline/types.js';
import { escapeCsvField, formatCsv, formatCsvRow } from '../../src/reporting/csv.js';
import { renderToolCsvs, renderToolInvocationsCsv, toolInvocationColumns } from '../../src/reporting/tool-csv.js';

function tool(functionName: string, parameters: Record<string, string>, actionGroupName = 'group'): ToolInvocation {
  return {
    kind: 'tool-invocation',
    functionName,
    actionGroupName,
    executionType: 'LAMBDA',
    parameters: new Map(Object.entries(parameters)),
  };
}

describe('escapeCsvField', () => {
  it('should leave plain values alone', () => {
    expect(escapeCsvField('150639')).toBe('150639');
    expect(escapeCsvField('')).toBe('');
  });

  it('should quote separators, quotes and line breaks', () => {
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('line1\nline2')).toBe('"line1\nline2"');
    expect(escapeCsvField('cr\r')).toBe('"cr\r"');
  });
});

describe('formatCsv', () => {
  it('should end every line with a newline', () => {
    expect(formatCsvRow(['a', 'b,c'])).toBe('a,"b,c"');
    expect(formatCsv(['h1', 'h2'], [['1', '2'], ['', 'x']])).toBe('h1,h2\n1,2\n,x\n');
  });

  it('should write only the header without rows', () => {
    expect(formatCsv(['h'], [])).toBe('h\n');
  });
});

describe('toolInvocationColumns', () => {
  it('should put fixed columns first and sort parameter columns', () => {
    expect(toolInvocationColumns(['zip', 'amount', 'zip', 'City'])).toEqual([
      'function_name',
      'action_group_name',
      'execution_type',
      'param_City',
      'param_amount',
      'param_zip',
    ]);
  });
});

describe('renderToolInvocationsCsv', () => {
  it('should use the union of parameters and leave missing cells blank', () => {
    const state = foldTraceEvents(createAggregationState(), [
      tool('order_status', { orderID: '150639' }),
      { kind: 'agent-invocation', agentName: 'orders' },
      tool('create_ticket', { subject: 'Late, again', priority: 'high' }, 'support'),
    ]);

    expect(renderToolInvocationsCsv(state)).toBe(
      'function_name,action_group_name,execution_type,param_orderID,param_priority,param_subject\n' +
        'order_status,group,LAMBDA,150639,,\n' +
        'create_ticket,support,LAMBDA,,high,"Late, again"\n'
    );
  });

  it('should render only the header for an empty run', () => {
    expect(renderToolInvocationsCsv(createAggregationState())).toBe(
      'function_name,action_group_name,execution_type\n'
    );
  });
});

describe('renderToolCsvs', () => {
  it('should write one table per tool with the columns of the whole run', () => {
    const state = foldTraceEvents(createAggregationState(), [
      tool('lookup', { sku: 'A1' }),
      tool('create_ticket', { subject: 'Help' }),
      tool('lookup', { sku: 'B2', qty: '3' }),
    ]);

    const tables = renderToolCsvs(state);

    expect([...tables.keys()]).toEqual(['create_ticket', 'lookup']);
    expect(tables.get('create_ticket')).toBe(
      'function_name,action_group_name,execution_type,param_qty,param_sku,param_subject\n' +
        'create_ticket,group,LAMBDA,,,Help\n'
    );
    expect(tables.get('lookup')).toBe(
      'function_name,action_group_name,execution_type,param_qty,param_sku,param_subject\n' +
        'lookup,group,LAMBDA,,A1,\n' +
        'lookup,group,LAMBDA,3,B2,\n'
    );
  });

  it('should be empty when no tool was called', () => {
    expect(renderToolCsvs(createAggregationState()).size).toBe(0);
  });
});
