/**
 * Auto Reply
 *
 * Sends the inbox's configured greeting once per conversation, as the
 * assignee, after the visitor's first message. Assignment and the first
 * message arrive in either order, so both trigger a check and a marker in
 * the shared store lets only one of them send.
 */

import { createLogger, toError, type ServiceLogger, type SharedStore } from '@chatrouter/core';

import { CHAT_EVENTS, type ChatEventBus } from '../events.js';
import type { ConversationService } from './conversation-service.js';
import type { ConversationRepository, InboxRepository, MessageRepository } from './repositories.js';
import type { Message } from './types.js';

export interface AutoReplyDeps {
  store: SharedStore;
  inboxes: InboxRepository;
  conversations: ConversationRepository;
  messages: MessageRepository;
  conversationService: Pick<ConversationService, 'recordMessage'>;
  events: ChatEventBus;
  logger?: ServiceLogger;
}

const SENT_MARKER_TTL_SECONDS = 24 * 60 * 60;

export function autoReplyKey(conversationId: number): string {
  return `auto_reply:${conversationId}`;
}

export class AutoReplyResponder {
  private readonly deps: AutoReplyDeps;
  private readonly logger: ServiceLogger;

  constructor(deps: AutoReplyDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger({ name: 'auto-reply' });
  }

  /**
   * Send the greeting when the conversation is open, has an assignee and a
   * visitor message, and nobody has replied yet
   *
   * @returns the reply, or null when nothing was sent
   */
  async respond(conversationId: number, correlationId?: string): Promise<Message | null> {
    const { store, inboxes, conversations, messages, conversationService } = this.deps;

    const conversation = await conversations.findById(conversationId);
    if (!conversation || conversation.status !== 'open' || conversation.assigneeId === null) {
      return null;
    }
    const inbox = await inboxes.findById(conversation.inboxId);
    const settings = inbox?.settings.autoReply;
    if (!settings?.enabled || settings.body.trim() === '') {
      return null;
    }

    const [inbound, outbound] = await Promise.all([
      messages.listLatest(conversationId, { directions: ['in'], limit: 1 }),
      messages.listLatest(conversationId, { directions: ['out'], limit: 1 }),
    ]);
    if (inbound.length === 0 || outbound.length > 0) {
      return null;
    }

    const claimed = await store.set(autoReplyKey(conversationId), '1', {
      ttlSeconds: SENT_MARKER_TTL_SECONDS,
      onlyIfAbsent: true,
    });
    if (!claimed) {
      return null;
    }

    try {
      const { message } = await conversationService.recordMessage(
        {
          conversationId,
          direction: 'out',
          body: settings.body.trim(),
          senderAgentId: conversation.assigneeId,
        },
        correlationId === undefined ? {} : { correlationId }
      );
      this.logger.info(
        { conversationId, agentId: conversation.assigneeId },
        'Auto reply sent'
      );
      return message;
    } catch (error) {
      this.logger.warn({ err: toError(error), conversationId }, 'Auto reply failed');
      return null;
    }
  }

  /**
   * Check after every visitor message and every automatic assignment
   *
   * @returns a function removing both listeners
   */
  registerListeners(events: ChatEventBus = this.deps.events): () => void {
    const unsubscribeMessage = events.subscribe(
      CHAT_EVENTS.messageCreated,
      async (event) => {
        if (event.payload.message.direction !== 'in') return;
        await this.respond(event.payload.conversation.id, event.metadata.correlationId);
      },
      { async: true }
    );

    const unsubscribeAssignee = events.subscribe(
      CHAT_EVENTS.assigneeChanged,
      async (event) => {
        if (event.payload.reason !== 'auto_assignment') return;
        await this.respond(event.payload.conversation.id, event.metadata.correlationId);
      },
      { async: true }
    );

    return () => {
      unsubscribeMessage();
      unsubscribeAssignee();
    };
  }
}
