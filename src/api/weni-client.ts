/**
 * Weni Platform API Client
 *
 * The three read endpoints the analyzer needs:
 * - conversation listing (billing API), paginated by `page`
 * - messages of one conversation (nexus API)
 * - agent traces of one message (nexus API)
 *
 * Responses are decoded up to the list envelope; the records inside are left
 * to the pipeline.
 */

import type { ApiConfig } from '../config/schema.js';
import { DecodeFailure } from '../errors/index.js';
import type { FetchResult, ResilientFetcher } from '../http/resilient-fetch.js';
import { ListingSchema } from './schemas.js';
import type { Conversation, Listing } from './types.js';

export interface ConversationPageQuery {
  projectUuid: string;
  page: number;
  /** DD-MM-YYYY, passed through as the API expects it */
  startDate: string;
  endDate: string;
}

/**
 * What the pipeline needs from the platform. Tests substitute in-memory fakes.
 */
export interface PlatformApi {
  listConversations(query: ConversationPageQuery): Promise<FetchResult<Listing>>;
  listMessages(projectUuid: string, conversation: Conversation): Promise<FetchResult<Listing>>;
  listTraces(projectUuid: string, messageId: string): Promise<FetchResult<Listing>>;
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

export class WeniClient implements PlatformApi {
  private readonly billingBaseUrl: string;
  private readonly nexusBaseUrl: string;

  constructor(
    private readonly fetcher: ResilientFetcher,
    api: ApiConfig
  ) {
    this.billingBaseUrl = trimSlash(api.billingBaseUrl);
    this.nexusBaseUrl = trimSlash(api.nexusBaseUrl);
  }

  async listConversations(query: ConversationPageQuery): Promise<FetchResult<Listing>> {
    const url = `${this.billingBaseUrl}/api/v1/${encodeURIComponent(query.projectUuid)}/conversations/`;
    const result = await this.fetcher.getJson('conversations', url, {
      page: query.page,
      start: query.startDate,
      end: query.endDate,
    });
    return decodeListing(result, 'conversation page', { page: query.page });
  }

  async listMessages(projectUuid: string, conversation: Conversation): Promise<FetchResult<Listing>> {
    const url = `${this.nexusBaseUrl}/api/${encodeURIComponent(projectUuid)}/conversations/`;
    const result = await this.fetcher.getJson('messages', url, {
      start: conversation.startTime,
      contact_urn: conversation.contactUrn,
    });
    return decodeListing(result, 'message listing', { conversationId: conversation.id });
  }

  async listTraces(projectUuid: string, messageId: string): Promise<FetchResult<Listing>> {
    const url = `${this.nexusBaseUrl}/api/agents/traces/`;
    const result = await this.fetcher.getJson('traces', url, {
      project_uuid: projectUuid,
      log_id: messageId,
    });
    return decodeListing(result, 'trace listing', { messageId });
  }
}

function decodeListing(
  result: FetchResult<unknown>,
  what: string,
  context: Record<string, unknown>
): FetchResult<Listing> {
  if (!result.ok) return result;

  const parsed = ListingSchema.safeParse(result.value);
  if (!parsed.success) {
    return { ok: false, error: DecodeFailure.fromZodError(what, parsed.error, context) };
  }
  return { ok: true, value: parsed.data, attempts: result.attempts };
}
