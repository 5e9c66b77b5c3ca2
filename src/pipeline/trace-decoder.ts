/**
 * Trace Record Decoder
 *
 * Maps one raw trace record onto a TraceEvent. The record is nested and
 * mostly optional:
 *
 *   trace.orchestrationTrace.invocationInput
 *     .agentCollaboratorInvocationInput  { agentCollaboratorName }
 *     .actionGroupInvocationInput        { function, actionGroupName,
 *                                          executionType, parameters[] }
 *
 * Absent (or null) segments lead to `unclassified`. A segment that is present
 * with the wrong type makes the whole record a DecodeFailure. When both
 * invocation inputs are present the agent invocation wins.
 */

import { z } from 'zod';
import { DecodeFailure, partialData, type PartialDataWarning } from '../errors/index.js';
import type { TraceEvent } from './types.js';

// =============================================================================
// SCHEMA
// =============================================================================

const ParameterSchema = z
  .object({
    name: z.string().nullish(),
    value: z.unknown(),
  })
  .passthrough();

const ActionGroupInvocationSchema = z
  .object({
    function: z.string().nullish(),
    actionGroupName: z.string().nullish(),
    executionType: z.string().nullish(),
    parameters: z.array(ParameterSchema).nullish(),
  })
  .passthrough();

const AgentCollaboratorInvocationSchema = z
  .object({
    agentCollaboratorName: z.string().nullish(),
  })
  .passthrough();

const InvocationInputSchema = z
  .object({
    agentCollaboratorInvocationInput: AgentCollaboratorInvocationSchema.nullish(),
    actionGroupInvocationInput: ActionGroupInvocationSchema.nullish(),
  })
  .passthrough();

export const TraceRecordSchema = z
  .object({
    trace: z
      .object({
        orchestrationTrace: z
          .object({
            invocationInput: InvocationInputSchema.nullish(),
          })
          .passthrough()
          .nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

type ActionGroupInvocation = z.infer<typeof ActionGroupInvocationSchema>;

// =============================================================================
// DECODING
// =============================================================================

export const UNKNOWN_NAME = 'unknown';

export type TraceDecodeResult =
  | { ok: true; event: TraceEvent; warnings: PartialDataWarning[] }
  | { ok: false; error: DecodeFailure };

/**
 * Render a parameter value as a table cell.
 */
export function formatParameterValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return JSON.stringify(value) ?? '';
}

function foldParameters(
  parameters: ActionGroupInvocation['parameters'],
  warnings: PartialDataWarning[]
): Map<string, string> {
  const folded = new Map<string, string>();
  for (const [index, parameter] of (parameters ?? []).entries()) {
    if (!parameter.name) {
      warnings.push(partialData(`actionGroupInvocationInput.parameters.${index}.name`, '(dropped)'));
      continue;
    }
    // last value wins
    folded.set(parameter.name, formatParameterValue(parameter.value));
  }
  return folded;
}

/**
 * Decode one raw trace record. `context` (conversation and message ids) is
 * attached to the failure.
 */
export function decodeTraceRecord(raw: unknown, context: Record<string, unknown> = {}): TraceDecodeResult {
  const parsed = TraceRecordSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: DecodeFailure.fromZodError('trace record', parsed.error, context) };
  }

  const warnings: PartialDataWarning[] = [];
  const input = parsed.data.trace?.orchestrationTrace?.invocationInput;

  const agent = input?.agentCollaboratorInvocationInput;
  if (agent) {
    if (!agent.agentCollaboratorName) {
      warnings.push(partialData('agentCollaboratorInvocationInput.agentCollaboratorName', UNKNOWN_NAME));
    }
    return {
      ok: true,
      event: { kind: 'agent-invocation', agentName: agent.agentCollaboratorName || UNKNOWN_NAME },
      warnings,
    };
  }

  const action = input?.actionGroupInvocationInput;
  if (action) {
    if (!action.function) {
      warnings.push(partialData('actionGroupInvocationInput.function', UNKNOWN_NAME));
    }
    return {
      ok: true,
      event: {
        kind: 'tool-invocation',
        functionName: action.function || UNKNOWN_NAME,
        actionGroupName: action.actionGroupName ?? '',
        executionType: action.executionType ?? '',
        parameters: foldParameters(action.parameters, warnings),
      },
      warnings,
    };
  }

  return { ok: true, event: { kind: 'unclassified' }, warnings };
}
