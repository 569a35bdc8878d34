/**
 * @fileoverview Outbound webhooks
 *
 * Posts conversation and message events to the URL configured on the inbox
 * (`settings.webhook`). Delivery is fire-and-forget from asynchronous event
 * listeners: a slow or failing endpoint is logged and never retried, and the
 * request that raised the event does not wait on it.
 *
 * @module @chatrouter/infrastructure/services/WebhookNotifier
 */

import { createHmac } from 'node:crypto';

import { createLogger, toError, type ServiceLogger } from '@chatrouter/core';
import {
  CHAT_EVENTS,
  type ChatEventBus,
  type Conversation,
  type Inbox,
  type InboxRepository,
  type Message,
} from '@chatrouter/domain';

export type WebhookEventType =
  | 'conversation.created'
  | 'conversation.closed'
  | 'message.in'
  | 'message.out';

export interface WebhookNotifierOptions {
  /** Per-request timeout (default: 2000 ms) */
  timeoutMs?: number;
  logger?: ServiceLogger;
}

interface WebhookConversation {
  id: number;
  inbox_id: number;
  branch_id: number | null;
  status: Conversation['status'];
  contact_id?: number;
  created_at?: string;
}

export interface WebhookPayload {
  event: WebhookEventType;
  conversation: WebhookConversation;
  message?: {
    id: number;
    conversation_id: number;
    direction: Message['direction'];
    body: string;
    created_at: string;
    sender_contact_id?: number;
    sender_agent_id?: number;
  };
}

export function signWebhookBody(secret: string, body: string): string {
  return createHmac('sha256', secret).update(body, 'utf8').digest('hex');
}

function conversationSummary(conversation: Conversation): WebhookConversation {
  return {
    id: conversation.id,
    inbox_id: conversation.inboxId,
    branch_id: conversation.branchId,
    status: conversation.status,
  };
}

export class WebhookNotifier {
  private readonly timeoutMs: number;
  private readonly logger: ServiceLogger;

  constructor(
    private readonly inboxes: InboxRepository,
    options: WebhookNotifierOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 2000;
    this.logger = options.logger ?? createLogger({ name: 'webhook-notifier' });
  }

  /**
   * Deliver one payload when the inbox has an enabled webhook subscribed to
   * its event (an empty event list subscribes to all)
   *
   * @returns whether a request was made and answered below 500
   */
  async deliver(inboxId: number, payload: WebhookPayload): Promise<boolean> {
    const inbox = await this.inboxes.findById(inboxId);
    const target = inbox ? this.targetFor(inbox, payload.event) : null;
    if (!inbox || !target) {
      return false;
    }

    const body = JSON.stringify(payload);
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'X-Chat-Event': payload.event,
      'X-Chat-Inbox-Id': String(inbox.id),
    };
    if (target.secret !== '') {
      headers['X-Chat-Signature'] = signWebhookBody(target.secret, body);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(target.url, {
        method: 'POST',
        headers,
        body,
        signal: controller.signal,
      });
      if (response.status >= 500) {
        this.logger.warn(
          { inboxId: inbox.id, event: payload.event, statusCode: response.status },
          'Webhook endpoint returned a server error'
        );
        return false;
      }
      return true;
    } catch (error) {
      this.logger.warn(
        { err: toError(error), inboxId: inbox.id, event: payload.event },
        'Webhook delivery failed'
      );
      return false;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Subscribe delivery to conversation creation and closing and to inbound
   * and outbound messages. Internal notes are not delivered.
   *
   * @returns a function removing every listener registered here
   */
  registerListeners(events: ChatEventBus): () => void {
    const unsubscribers = [
      events.subscribe(
        CHAT_EVENTS.conversationCreated,
        async (event) => {
          const { conversation } = event.payload;
          await this.deliver(conversation.inboxId, {
            event: 'conversation.created',
            conversation: {
              ...conversationSummary(conversation),
              contact_id: conversation.contactId,
              created_at: conversation.createdAt.toISOString(),
            },
          });
        },
        { async: true }
      ),
      events.subscribe(
        CHAT_EVENTS.conversationClosed,
        async (event) => {
          const { conversation } = event.payload;
          await this.deliver(conversation.inboxId, {
            event: 'conversation.closed',
            conversation: conversationSummary(conversation),
          });
        },
        { async: true }
      ),
      events.subscribe(
        CHAT_EVENTS.messageCreated,
        async (event) => {
          const { message, conversation } = event.payload;
          if (message.direction === 'internal') return;
          await this.deliver(conversation.inboxId, {
            event: message.direction === 'in' ? 'message.in' : 'message.out',
            conversation: conversationSummary(conversation),
            message: {
              id: message.id,
              conversation_id: conversation.id,
              direction: message.direction,
              body: message.body,
              created_at: message.createdAt.toISOString(),
              ...(message.senderContactId === null
                ? {}
                : { sender_contact_id: message.senderContactId }),
              ...(message.senderAgentId === null ? {} : { sender_agent_id: message.senderAgentId }),
            },
          });
        },
        { async: true }
      ),
    ];

    return () => {
      for (const unsubscribe of unsubscribers) unsubscribe();
    };
  }

  private targetFor(
    inbox: Inbox,
    event: WebhookEventType
  ): { url: string; secret: string } | null {
    const webhook = inbox.settings.webhook;
    if (!webhook?.enabled || webhook.url.trim() === '') {
      return null;
    }
    if (webhook.events.length > 0 && !webhook.events.includes(event)) {
      return null;
    }
    return { url: webhook.url.trim(), secret: webhook.secret.trim() };
  }
}
