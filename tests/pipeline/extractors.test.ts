/**
 * Message and trace extractor tests.
 */

import { describe, it, expect } from 'vitest';
import { AuthError, DecodeFailure, NetworkFailure } from '../../src/errors/index.js';
import { MemorySink, StructuredLogger } from '../../src/observability/logger.js';
import { isAgentMessage, MessageExtractor } from '../../src/pipeline/message-extractor.js';
import { TraceExtractor } from '../../src/pipeline/trace-extractor.js';
import {
  agentMessage,
  agentTrace,
  failure,
  FakePlatformApi,
  listing,
  missingList,
  rationaleTrace,
  toolTrace,
  userMessage,
} from '../helpers/fake-platform-api.js';

const CONVERSATION = { id: 'c1', contactUrn: 'whatsapp:1', startTime: '2025-05-01T10:00:00Z' };

describe('MessageExtractor', () => {
  it('should keep agent messages only', async () => {
    const api = new FakePlatformApi();
    api.messages.set('c1', listing([userMessage(1), agentMessage(2), userMessage(3), agentMessage(4)]));

    const result = await new MessageExtractor(api, 'p').messagesFor(CONVERSATION);

    expect(result).toEqual({
      messages: [
        { id: '2', sourceType: 'agent' },
        { id: '4', sourceType: 'agent' },
      ],
      totalMessages: 4,
      skippedRecords: 0,
      failed: false,
    });
  });

  it('should skip malformed message records', async () => {
    const api = new FakePlatformApi();
    api.messages.set('c1', listing([agentMessage(1), { source_type: 'agent' }, 17]));

    const result = await new MessageExtractor(api, 'p').messagesFor(CONVERSATION);

    expect(result.messages).toEqual([{ id: '1', sourceType: 'agent' }]);
    expect(result.totalMessages).toBe(3);
    expect(result.skippedRecords).toBe(2);
  });

  it('should treat a listing without results as empty', async () => {
    const api = new FakePlatformApi();
    api.messages.set('c1', missingList());

    const result = await new MessageExtractor(api, 'p').messagesFor(CONVERSATION);

    expect(result).toEqual({ messages: [], totalMessages: 0, skippedRecords: 0, failed: false });
  });

  it('should contain fetch failures and log the conversation id', async () => {
    const api = new FakePlatformApi();
    api.messages.set('c1', failure(new NetworkFailure('messages request failed after 3 attempts: HTTP 500', 3)));
    const sink = new MemorySink();

    const result = await new MessageExtractor(api, 'p', {
      logger: new StructuredLogger({ level: 'warn', sinks: [sink] }),
    }).messagesFor(CONVERSATION);

    expect(result).toEqual({ messages: [], totalMessages: 0, skippedRecords: 0, failed: true });
    expect(sink.getEntries()).toHaveLength(1);
    expect(sink.getEntries()[0].message).toBe(
      'Could not fetch messages: messages request failed after 3 attempts: HTTP 500'
    );
    expect(sink.getEntries()[0].data).toEqual({ conversationId: 'c1' });
  });

  it('should rethrow authentication failures', async () => {
    const api = new FakePlatformApi();
    api.messages.set('c1', failure(new AuthError(403)));

    await expect(new MessageExtractor(api, 'p').messagesFor(CONVERSATION)).rejects.toBeInstanceOf(AuthError);
  });

  it('should recognise agent messages by source type', () => {
    expect(isAgentMessage({ id: '1', sourceType: 'agent' })).toBe(true);
    expect(isAgentMessage({ id: '1', sourceType: 'user' })).toBe(false);
    expect(isAgentMessage({ id: '1', sourceType: null })).toBe(false);
  });
});

describe('TraceExtractor', () => {
  const MESSAGE = { id: '150', sourceType: 'agent' };

  it('should decode every trace in order', async () => {
    const api = new FakePlatformApi();
    api.traces.set('150', listing([agentTrace('orders_agent_vtex'), rationaleTrace('...'), toolTrace('lookup')]));

    const result = await new TraceExtractor(api, 'p').tracesFor(MESSAGE, 'c1');

    expect(result.failed).toBe(false);
    expect(result.skipped).toBe(0);
    expect(result.events.map((e) => e.kind)).toEqual(['agent-invocation', 'unclassified', 'tool-invocation']);
  });

  it('should skip a malformed record and keep its neighbours', async () => {
    const api = new FakePlatformApi();
    api.traces.set('150', listing([agentTrace('a'), { trace: 'broken' }, agentTrace('b')]));
    const sink = new MemorySink();

    const result = await new TraceExtractor(api, 'p', {
      logger: new StructuredLogger({ level: 'warn', sinks: [sink] }),
    }).tracesFor(MESSAGE, 'c1');

    expect(result.events).toEqual([
      { kind: 'agent-invocation', agentName: 'a' },
      { kind: 'agent-invocation', agentName: 'b' },
    ]);
    expect(result.skipped).toBe(1);
    expect(sink.getEntries()).toHaveLength(1);
    expect(sink.getEntries()[0].message).toBe('Malformed trace record: trace: Expected object, received string');
    expect(sink.getEntries()[0].data).toEqual({ conversationId: 'c1', messageId: '150', index: 1 });
  });

  it('should collect partial-data warnings', async () => {
    const api = new FakePlatformApi();
    api.traces.set('150', listing([{ trace: { orchestrationTrace: { invocationInput: { agentCollaboratorInvocationInput: {} } } } }]));

    const result = await new TraceExtractor(api, 'p').tracesFor(MESSAGE);

    expect(result.events).toEqual([{ kind: 'agent-invocation', agentName: 'unknown' }]);
    expect(result.warnings).toHaveLength(1);
  });

  it('should skip the message when the listing cannot be fetched', async () => {
    const api = new FakePlatformApi();
    api.traces.set('150', failure(new DecodeFailure('Response body is not valid JSON')));

    const result = await new TraceExtractor(api, 'p').tracesFor(MESSAGE);

    expect(result).toEqual({ events: [], skipped: 0, warnings: [], failed: true });
  });

  it('should skip the message when the listing has no results', async () => {
    const api = new FakePlatformApi();
    api.traces.set('150', missingList());

    const result = await new TraceExtractor(api, 'p').tracesFor(MESSAGE);

    expect(result.failed).toBe(true);
  });

  it('should rethrow authentication failures', async () => {
    const api = new FakePlatformApi();
    api.traces.set('150', failure(new AuthError(401)));

    await expect(new TraceExtractor(api, 'p').tracesFor(MESSAGE)).rejects.toBeInstanceOf(AuthError);
  });
});
