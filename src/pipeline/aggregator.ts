/**
 * Aggregator
 *
 * Folds trace events into an AggregationState. Each fold returns a new state
 * and leaves its input untouched.
 */

import type { AggregationState, ToolInvocationRow, TraceEvent } from './types.js';

/** Code-unit order, independent of the host locale. */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function createAggregationState(): AggregationState {
  return {
    agentCounts: new Map(),
    toolCounts: new Map(),
    unclassifiedCount: 0,
    totalEvents: 0,
    toolInvocationRows: [],
    parameterNames: [],
  };
}

/** Fold a batch of events; the input state is copied once per call. */
export function foldTraceEvents(state: AggregationState, events: Iterable<TraceEvent>): AggregationState {
  const agentCounts = new Map(state.agentCounts);
  const toolCounts = new Map(state.toolCounts);
  const rows: ToolInvocationRow[] = [...state.toolInvocationRows];
  const names = new Set(state.parameterNames);
  let unclassifiedCount = state.unclassifiedCount;
  let totalEvents = state.totalEvents;

  for (const event of events) {
    switch (event.kind) {
      case 'agent-invocation':
        agentCounts.set(event.agentName, (agentCounts.get(event.agentName) ?? 0) + 1);
        break;

      case 'tool-invocation':
        toolCounts.set(event.functionName, (toolCounts.get(event.functionName) ?? 0) + 1);
        rows.push({
          functionName: event.functionName,
          actionGroupName: event.actionGroupName,
          executionType: event.executionType,
          parameters: new Map(event.parameters),
        });
        for (const name of event.parameters.keys()) names.add(name);
        break;

      case 'unclassified':
        unclassifiedCount += 1;
        break;

      default: {
        const unknownEvent: never = event;
        return unknownEvent;
      }
    }
    totalEvents += 1;
  }

  return {
    agentCounts,
    toolCounts,
    unclassifiedCount,
    totalEvents,
    toolInvocationRows: rows,
    parameterNames: names.size === state.parameterNames.length ? state.parameterNames : [...names].sort(compareText),
  };
}

export function foldTraceEvent(state: AggregationState, event: TraceEvent): AggregationState {
  return foldTraceEvents(state, [event]);
}

export function sumCounts(counts: ReadonlyMap<string, number>): number {
  let total = 0;
  for (const count of counts.values()) total += count;
  return total;
}

/** Every folded event landed in exactly one counter. */
export function isAggregationConsistent(state: AggregationState): boolean {
  return sumCounts(state.agentCounts) + sumCounts(state.toolCounts) + state.unclassifiedCount === state.totalEvents;
}
