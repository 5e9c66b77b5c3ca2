/**
 * Pipeline Types
 *
 * Trace events as decoded from raw trace records, the aggregation state they
 * are folded into, and the bookkeeping counters reported next to it.
 */

// =============================================================================
// TRACE EVENTS
// =============================================================================

/** Delegation to a named collaborator agent. */
export interface AgentInvocation {
  kind: 'agent-invocation';
  agentName: string;
}

/** A call to a tool (action group function) with its parameters. */
export interface ToolInvocation {
  kind: 'tool-invocation';
  functionName: string;
  actionGroupName: string;
  executionType: string;
  /** Parameter name → stringified value; insertion order of first occurrence */
  parameters: ReadonlyMap<string, string>;
}

/** A trace record matching neither recognised shape. */
export interface UnclassifiedTrace {
  kind: 'unclassified';
}

export type TraceEvent = AgentInvocation | ToolInvocation | UnclassifiedTrace;

// =============================================================================
// AGGREGATION
// =============================================================================

/** One exported tool call. */
export type ToolInvocationRow = Omit<ToolInvocation, 'kind'>;

/**
 * Everything the reporter needs, built by folding trace events.
 * Values are never mutated; each fold returns a new state.
 */
export interface AggregationState {
  readonly agentCounts: ReadonlyMap<string, number>;
  readonly toolCounts: ReadonlyMap<string, number>;
  readonly unclassifiedCount: number;
  /** Events folded so far; equals the sum of all counters */
  readonly totalEvents: number;
  readonly toolInvocationRows: readonly ToolInvocationRow[];
  /** Union of parameter names over the whole run, sorted */
  readonly parameterNames: readonly string[];
}

// =============================================================================
// RUN STATISTICS
// =============================================================================

export interface RunStats {
  conversationPagesFetched: number;
  conversationPagesSkipped: number;
  conversationsFound: number;
  /** Conversation records dropped because they could not be decoded */
  conversationRecordsSkipped: number;
  conversationsProcessed: number;
  /** Conversations whose messages could not be fetched */
  conversationsSkipped: number;
  messagesSeen: number;
  agentMessages: number;
  messageRecordsSkipped: number;
  agentMessagesProcessed: number;
  /** Agent messages whose traces could not be fetched */
  agentMessagesSkipped: number;
  /** Trace events that reached the aggregator */
  tracesProcessed: number;
  /** Trace records dropped because they could not be decoded */
  tracesSkipped: number;
  partialDataWarnings: number;
}

export function createRunStats(): RunStats {
  return {
    conversationPagesFetched: 0,
    conversationPagesSkipped: 0,
    conversationsFound: 0,
    conversationRecordsSkipped: 0,
    conversationsProcessed: 0,
    conversationsSkipped: 0,
    messagesSeen: 0,
    agentMessages: 0,
    messageRecordsSkipped: 0,
    agentMessagesProcessed: 0,
    agentMessagesSkipped: 0,
    tracesProcessed: 0,
    tracesSkipped: 0,
    partialDataWarnings: 0,
  };
}
