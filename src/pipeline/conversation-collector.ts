/**
 * Conversation Collector
 *
 * Walks the billing API pages 1, 2, 3, ... until a page comes back empty.
 * The `next` and `count` fields of the page are ignored.
 */

import type { Conversation } from '../api/types.js';
import { ConversationSchema } from '../api/schemas.js';
import type { PlatformApi } from '../api/weni-client.js';
import { CancellationToken } from '../core/cancellation.js';
import { DecodeFailure } from '../errors/index.js';
import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';

export const DEFAULT_MAX_PAGES = 10_000;

export interface CollectionResult {
  conversations: Conversation[];
  pagesFetched: number;
  /** Pages whose body could not be decoded; collection stops at the first */
  pagesSkipped: number;
  /** Conversation records dropped from otherwise valid pages */
  recordsSkipped: number;
  /** Pages without a list field, treated as empty */
  partialDataWarnings: number;
  reachedPageLimit: boolean;
}

export interface CollectorOptions {
  maxPages?: number;
  logger?: StructuredLogger;
  cancellationToken?: CancellationToken;
}

export class ConversationCollector {
  private readonly maxPages: number;
  private readonly log: StructuredLogger;
  private readonly token: CancellationToken;

  constructor(
    private readonly api: PlatformApi,
    options: CollectorOptions = {}
  ) {
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
    this.log = options.logger ?? createSilentLogger();
    this.token = options.cancellationToken ?? CancellationToken.None;
  }

  /**
   * Collect every conversation in the date range.
   *
   * @throws NetworkFailure or AuthError when a page cannot be fetched
   * @throws CancellationError when the run is interrupted
   */
  async collect(projectUuid: string, startDate: string, endDate: string): Promise<CollectionResult> {
    const result: CollectionResult = {
      conversations: [],
      pagesFetched: 0,
      pagesSkipped: 0,
      recordsSkipped: 0,
      partialDataWarnings: 0,
      reachedPageLimit: false,
    };

    for (let page = 1; page <= this.maxPages; page++) {
      this.token.throwIfCancellationRequested();
      this.log.info(`Fetching conversations page ${page}`, { page });

      const response = await this.api.listConversations({ projectUuid, page, startDate, endDate });
      if (!response.ok) {
        if (response.error instanceof DecodeFailure) {
          result.pagesSkipped++;
          this.log.warn(`Conversation page ${page} could not be decoded; stopping collection`, {
            page,
            error: response.error.message,
          });
          return result;
        }
        this.log.error(`Conversation page ${page} failed`, { page, error: response.error.message });
        throw response.error;
      }

      result.pagesFetched++;
      const listing = response.value;
      if (listing.missingList) {
        result.partialDataWarnings++;
        this.log.warn(`Conversation page ${page} has no results field; treating it as empty`, { page });
      }
      if (listing.records.length === 0) {
        this.log.info(`Collected ${result.conversations.length} conversations from ${page - 1} pages`);
        return result;
      }

      let kept = 0;
      for (const [index, record] of listing.records.entries()) {
        const parsed = ConversationSchema.safeParse(record);
        if (!parsed.success) {
          result.recordsSkipped++;
          const failure = DecodeFailure.fromZodError('conversation record', parsed.error, { page, index });
          this.log.warn(failure.message, { page, index });
          continue;
        }
        result.conversations.push(parsed.data);
        kept++;
      }
      this.log.debug(`Page ${page}: ${kept} of ${listing.records.length} conversations kept`, { page });
    }

    result.reachedPageLimit = true;
    this.log.warn(`Stopped after ${this.maxPages} pages without reaching an empty page`, {
      maxPages: this.maxPages,
    });
    return result;
  }
}
