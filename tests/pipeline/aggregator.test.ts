/**
 * Aggregator tests: counting, row collection, parameter union, purity.
 */

import { describe, it, expect } from 'vitest';
import {
  compareText,
  createAggregationState,
  foldTraceEvent,
  foldTraceEvents,
  isAggregationConsistent,
  sumCounts,
} from '../../src/pipeline/aggregator.js';
import type { ToolInvocation, TraceEvent } from '../../src/pipeline/types.js';

function tool(functionName: string, parameters: Record<string, string> = {}): ToolInvocation {
  return {
    kind: 'tool-invocation',
    functionName,
    actionGroupName: 'group',
    executionType: 'LAMBDA',
    parameters: new Map(Object.entries(parameters)),
  };
}

const agent = (agentName: string): TraceEvent => ({ kind: 'agent-invocation', agentName });
const unclassified: TraceEvent = { kind: 'unclassified' };

describe('createAggregationState', () => {
  it('should start empty', () => {
    const state = createAggregationState();

    expect(state.agentCounts.size).toBe(0);
    expect(state.toolCounts.size).toBe(0);
    expect(state.unclassifiedCount).toBe(0);
    expect(state.totalEvents).toBe(0);
    expect(state.toolInvocationRows).toEqual([]);
    expect(state.parameterNames).toEqual([]);
  });
});

describe('foldTraceEvent', () => {
  it('should count agent invocations by name', () => {
    const state = foldTraceEvents(createAggregationState(), [agent('orders'), agent('support'), agent('orders')]);

    expect([...state.agentCounts]).toEqual([
      ['orders', 2],
      ['support', 1],
    ]);
    expect(state.totalEvents).toBe(3);
  });

  it('should count tools and keep one row per call', () => {
    const state = foldTraceEvents(createAggregationState(), [
      tool('order_status', { orderID: '1' }),
      tool('order_status', { orderID: '2' }),
    ]);

    expect(state.toolCounts.get('order_status')).toBe(2);
    expect(state.toolInvocationRows).toEqual([
      { functionName: 'order_status', actionGroupName: 'group', executionType: 'LAMBDA', parameters: new Map([['orderID', '1']]) },
      { functionName: 'order_status', actionGroupName: 'group', executionType: 'LAMBDA', parameters: new Map([['orderID', '2']]) },
    ]);
  });

  it('should count unclassified traces', () => {
    const state = foldTraceEvents(createAggregationState(), [unclassified, unclassified]);

    expect(state.unclassifiedCount).toBe(2);
    expect(state.totalEvents).toBe(2);
  });

  it('should keep the sorted union of parameter names', () => {
    const state = foldTraceEvents(createAggregationState(), [
      tool('a', { zip: '1', city: 'x' }),
      tool('b', { amount: '3', city: 'y' }),
      agent('orders'),
    ]);

    expect(state.parameterNames).toEqual(['amount', 'city', 'zip']);
  });

  it('should not mutate its input', () => {
    const before = foldTraceEvent(createAggregationState(), tool('a', { x: '1' }));
    const agentsBefore = before.agentCounts;
    const toolsBefore = before.toolCounts;
    const rowsBefore = before.toolInvocationRows;

    const after = foldTraceEvents(before, [agent('orders'), tool('a', { y: '2' }), unclassified]);

    expect(before.totalEvents).toBe(1);
    expect(before.agentCounts).toBe(agentsBefore);
    expect(agentsBefore.size).toBe(0);
    expect(toolsBefore.get('a')).toBe(1);
    expect(rowsBefore).toHaveLength(1);
    expect(before.parameterNames).toEqual(['x']);
    expect(after.totalEvents).toBe(4);
    expect(after.parameterNames).toEqual(['x', 'y']);
  });

  it('should fold a batch the same as one event at a time', () => {
    const events = [agent('a'), tool('t', { q: '1' }), unclassified, tool('u', { p: '2' }), agent('a')];

    const batched = foldTraceEvents(createAggregationState(), events);
    const stepped = events.reduce(foldTraceEvent, createAggregationState());

    expect(stepped).toEqual(batched);
    expect(batched.parameterNames).toEqual(['p', 'q']);
    expect(batched.toolInvocationRows.map((row) => row.functionName)).toEqual(['t', 'u']);
  });

  it('should keep the row list of the input when folding more tools', () => {
    const before = foldTraceEvents(createAggregationState(), [tool('a')]);
    const after = foldTraceEvents(before, [tool('b'), tool('c')]);

    expect(before.toolInvocationRows).toHaveLength(1);
    expect(after.toolInvocationRows).toHaveLength(3);
  });

  it('should give the same result for the same events', () => {
    const events = [agent('a'), tool('t', { p: '1' }), unclassified, agent('b'), agent('a')];

    const first = foldTraceEvents(createAggregationState(), events);
    const second = foldTraceEvents(createAggregationState(), events);

    expect(second).toEqual(first);
  });

  it('should touch exactly one counter per event', () => {
    const events: TraceEvent[] = [
      agent('a'),
      tool('t'),
      unclassified,
      agent('b'),
      tool('u', { k: 'v' }),
      tool('t'),
      unclassified,
    ];

    let state = createAggregationState();
    for (const event of events) {
      state = foldTraceEvent(state, event);
      expect(isAggregationConsistent(state)).toBe(true);
    }

    expect(sumCounts(state.agentCounts)).toBe(2);
    expect(sumCounts(state.toolCounts)).toBe(3);
    expect(state.unclassifiedCount).toBe(2);
    expect(state.totalEvents).toBe(events.length);
  });
});

describe('isAggregationConsistent', () => {
  it('should detect counters that do not add up', () => {
    const state = { ...createAggregationState(), totalEvents: 1 };
    expect(isAggregationConsistent(state)).toBe(false);
  });
});

describe('compareText', () => {
  it('should order by code unit', () => {
    expect(['b', 'B', 'a', 'A'].sort(compareText)).toEqual(['A', 'B', 'a', 'b']);
  });
});
