/**
 * Message Extractor
 *
 * Lists the messages of one conversation and keeps the agent turns, the only
 * ones that carry traces.
 */

import type { Conversation, Message } from '../api/types.js';
import { MessageSchema } from '../api/schemas.js';
import type { PlatformApi } from '../api/weni-client.js';
import { AuthError, DecodeFailure } from '../errors/index.js';
import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';

export const AGENT_SOURCE_TYPE = 'agent';

export interface MessageExtraction {
  /** Agent messages, in response order */
  messages: Message[];
  /** Message records received, agent or not */
  totalMessages: number;
  skippedRecords: number;
  /** The listing could not be fetched; the conversation is skipped */
  failed: boolean;
}

export function isAgentMessage(message: Message): boolean {
  return message.sourceType === AGENT_SOURCE_TYPE;
}

export class MessageExtractor {
  private readonly log: StructuredLogger;

  constructor(
    private readonly api: PlatformApi,
    private readonly projectUuid: string,
    options: { logger?: StructuredLogger } = {}
  ) {
    this.log = options.logger ?? createSilentLogger();
  }

  /**
   * @throws AuthError, which no other request would get past either
   */
  async messagesFor(conversation: Conversation): Promise<MessageExtraction> {
    const log = this.log.withContext({ conversationId: conversation.id });
    const response = await this.api.listMessages(this.projectUuid, conversation);

    if (!response.ok) {
      if (response.error instanceof AuthError) throw response.error;
      log.warn(`Could not fetch messages: ${response.error.message}`);
      return { messages: [], totalMessages: 0, skippedRecords: 0, failed: true };
    }

    const extraction: MessageExtraction = { messages: [], totalMessages: 0, skippedRecords: 0, failed: false };
    for (const [index, record] of response.value.records.entries()) {
      extraction.totalMessages++;
      const parsed = MessageSchema.safeParse(record);
      if (!parsed.success) {
        extraction.skippedRecords++;
        log.warn(DecodeFailure.fromZodError('message record', parsed.error).message, { index });
        continue;
      }
      if (isAgentMessage(parsed.data)) {
        extraction.messages.push(parsed.data);
      }
    }

    log.debug(`${extraction.messages.length} agent messages of ${extraction.totalMessages}`);
    return extraction;
  }
}
