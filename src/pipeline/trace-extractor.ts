/**
 * Trace Extractor
 *
 * Fetches the traces of one agent message and decodes them record by record.
 * A bad record is skipped on its own; a listing that cannot be fetched or
 * decoded skips the message.
 */

import type { Message } from '../api/types.js';
import type { PlatformApi } from '../api/weni-client.js';
import { AuthError, type PartialDataWarning } from '../errors/index.js';
import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';
import { decodeTraceRecord } from './trace-decoder.js';
import type { TraceEvent } from './types.js';

export interface TraceExtraction {
  /** Decoded events, in record order */
  events: TraceEvent[];
  /** Records that failed to decode */
  skipped: number;
  warnings: PartialDataWarning[];
  /** The traces of this message could not be fetched */
  failed: boolean;
}

export class TraceExtractor {
  private readonly log: StructuredLogger;

  constructor(
    private readonly api: PlatformApi,
    private readonly projectUuid: string,
    options: { logger?: StructuredLogger } = {}
  ) {
    this.log = options.logger ?? createSilentLogger();
  }

  /**
   * @throws AuthError
   */
  async tracesFor(message: Message, conversationId?: string): Promise<TraceExtraction> {
    const context = { conversationId, messageId: message.id };
    const log = this.log.withContext(context);
    const extraction: TraceExtraction = { events: [], skipped: 0, warnings: [], failed: false };

    const response = await this.api.listTraces(this.projectUuid, message.id);
    if (!response.ok) {
      if (response.error instanceof AuthError) throw response.error;
      log.warn(`Could not fetch traces: ${response.error.message}`);
      return { ...extraction, failed: true };
    }
    if (response.value.missingList) {
      log.warn('Trace listing has no results field; skipping message');
      return { ...extraction, failed: true };
    }

    for (const [index, record] of response.value.records.entries()) {
      const decoded = decodeTraceRecord(record, { ...context, index });
      if (!decoded.ok) {
        extraction.skipped++;
        log.warn(decoded.error.message, { index });
        continue;
      }
      for (const warning of decoded.warnings) {
        log.debug(`Missing ${warning.field}; using "${warning.substitute}"`, { index });
      }
      extraction.events.push(decoded.event);
      extraction.warnings.push(...decoded.warnings);
    }

    return extraction;
  }
}
