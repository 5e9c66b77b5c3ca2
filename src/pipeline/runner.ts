/**
 * Pipeline Runner
 *
 * One linear pass: collect conversations, then for each conversation its agent
 * messages, then for each message its traces, folding every trace event into
 * the aggregation state as it arrives.
 *
 * Failures below collection only skip the item they hit. An AuthError stops
 * the run wherever it happens; cancellation stops it at the next conversation
 * or message boundary (or aborts the request in flight). Both return the
 * state gathered so far so that partial reports can still be written.
 */

import type { PlatformApi } from '../api/weni-client.js';
import { CancellationToken } from '../core/cancellation.js';
import { AuthError, isCancellationError } from '../errors/index.js';
import { createComponentLogger, createSilentLogger, type StructuredLogger } from '../observability/logger.js';
import { createAggregationState, foldTraceEvents, isAggregationConsistent } from './aggregator.js';
import { ConversationCollector } from './conversation-collector.js';
import { MessageExtractor } from './message-extractor.js';
import { TraceExtractor } from './trace-extractor.js';
import { createRunStats, type AggregationState, type RunStats } from './types.js';

export interface AnalysisRequest {
  projectUuid: string;
  /** DD-MM-YYYY */
  startDate: string;
  endDate: string;
}

export interface AnalysisDependencies {
  api: PlatformApi;
  maxPages?: number;
  logger?: StructuredLogger;
  cancellationToken?: CancellationToken;
}

export interface AnalysisResult {
  state: AggregationState;
  stats: RunStats;
  cancelled: boolean;
  cancellationReason?: string;
  /** Set when authentication failed after collection */
  authFailure?: AuthError;
}

class AnalysisRun {
  state = createAggregationState();
  readonly stats = createRunStats();

  private readonly log: StructuredLogger;
  private readonly token: CancellationToken;
  private readonly collector: ConversationCollector;
  private readonly messages: MessageExtractor;
  private readonly traces: TraceExtractor;

  constructor(
    private readonly request: AnalysisRequest,
    deps: AnalysisDependencies
  ) {
    const base = deps.logger ?? createSilentLogger();
    this.log = createComponentLogger('runner', base);
    this.token = deps.cancellationToken ?? CancellationToken.None;
    this.collector = new ConversationCollector(deps.api, {
      maxPages: deps.maxPages,
      logger: createComponentLogger('collector', base),
      cancellationToken: this.token,
    });
    this.messages = new MessageExtractor(deps.api, request.projectUuid, {
      logger: createComponentLogger('messages', base),
    });
    this.traces = new TraceExtractor(deps.api, request.projectUuid, {
      logger: createComponentLogger('traces', base),
    });
  }

  async execute(): Promise<void> {
    const { projectUuid, startDate, endDate } = this.request;
    const collection = await this.collector.collect(projectUuid, startDate, endDate);

    this.stats.conversationPagesFetched = collection.pagesFetched;
    this.stats.conversationPagesSkipped = collection.pagesSkipped;
    this.stats.conversationsFound = collection.conversations.length;
    this.stats.conversationRecordsSkipped = collection.recordsSkipped;
    this.stats.partialDataWarnings += collection.partialDataWarnings;

    const total = collection.conversations.length;
    for (const [index, conversation] of collection.conversations.entries()) {
      this.token.throwIfCancellationRequested();
      this.log.info(`Processing conversation ${index + 1}/${total}`, { conversationId: conversation.id });

      const extraction = await this.messages.messagesFor(conversation);
      this.stats.messagesSeen += extraction.totalMessages;
      this.stats.messageRecordsSkipped += extraction.skippedRecords;
      if (extraction.failed) {
        this.stats.conversationsSkipped++;
        continue;
      }
      this.stats.agentMessages += extraction.messages.length;

      for (const message of extraction.messages) {
        this.token.throwIfCancellationRequested();

        const traces = await this.traces.tracesFor(message, conversation.id);
        this.stats.tracesSkipped += traces.skipped;
        this.stats.partialDataWarnings += traces.warnings.length;
        if (traces.failed) {
          this.stats.agentMessagesSkipped++;
          continue;
        }

        this.state = foldTraceEvents(this.state, traces.events);
        this.stats.tracesProcessed += traces.events.length;
        this.stats.agentMessagesProcessed++;
      }

      this.stats.conversationsProcessed++;
    }
  }
}

/**
 * Run the whole analysis.
 *
 * @throws NetworkFailure or AuthError when conversation collection fails;
 *   nothing has been aggregated at that point
 */
export async function runAnalysis(request: AnalysisRequest, deps: AnalysisDependencies): Promise<AnalysisResult> {
  const run = new AnalysisRun(request, deps);
  const log = createComponentLogger('runner', deps.logger ?? createSilentLogger());
  const token = deps.cancellationToken ?? CancellationToken.None;

  const finish = (extra: Partial<AnalysisResult> = {}): AnalysisResult => {
    if (!isAggregationConsistent(run.state)) {
      log.error('Aggregation counters do not add up to the number of events', {
        totalEvents: run.state.totalEvents,
      });
    }
    return { state: run.state, stats: run.stats, cancelled: false, ...extra };
  };

  try {
    await run.execute();
  } catch (error) {
    if (isCancellationError(error)) {
      const reason = token.cancellationReason ?? error.message;
      log.warn(`Run cancelled: ${reason}`);
      return finish({ cancelled: true, cancellationReason: reason });
    }
    if (error instanceof AuthError && run.stats.conversationsFound > 0) {
      log.error(error.message, { statusCode: error.statusCode });
      return finish({ authFailure: error });
    }
    throw error;
  }

  log.info(
    `Processed ${run.stats.conversationsProcessed} conversations, ` +
      `${run.stats.agentMessagesProcessed} agent messages, ${run.stats.tracesProcessed} traces`
  );
  return finish();
}
