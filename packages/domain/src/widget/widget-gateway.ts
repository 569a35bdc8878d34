/**
 * Widget Gateway
 *
 * Everything a website visitor can do: bootstrap a session, send a message,
 * poll for replies, signal typing and follow the conversation live. Every
 * entry point passes the abuse throttle before touching the store of record.
 */

import {
  AuthenticationError,
  CaptchaRequiredError,
  ForbiddenError,
  NotFoundError,
  RateLimitError,
  ValidationError,
  createLogger,
  type ServiceLogger,
} from '@chatrouter/core';

import type { ConversationService, OperationContext } from '../conversations/conversation-service.js';
import type { LastSeenTracker } from '../conversations/last-seen.js';
import { normalizeMessageBody } from '../conversations/message.js';
import type { InboxRepository, MessageRepository } from '../conversations/repositories.js';
import type { TypingIndicator } from '../conversations/typing-indicator.js';
import type { ConversationStatus, Inbox, Message } from '../conversations/types.js';
import { CHAT_EVENTS, type ChatEventBus } from '../events.js';
import type { RegionLocator } from '../routing/branch-router.js';
import type { AbuseThrottle } from './abuse-throttle.js';
import type { CaptchaService } from './captcha-service.js';
import { assertOriginAllowed } from './origin-allowlist.js';
import type { WidgetSession, WidgetSessionStore } from './session-store.js';

// =============================================================================
// Types
// =============================================================================

export interface WidgetGatewayDeps {
  inboxes: InboxRepository;
  messages: MessageRepository;
  conversationService: ConversationService;
  sessions: WidgetSessionStore;
  captcha: CaptchaService;
  throttle: AbuseThrottle;
  typing: TypingIndicator;
  lastSeen: LastSeenTracker;
  events: ChatEventBus;
  /** Places visitors of global inboxes; without one they have no region */
  regions?: RegionLocator;
  /** Inbound messages allowed per conversation per minute (default: 20) */
  floodLimitPerMinute?: number;
  logger?: ServiceLogger;
  clock?: () => Date;
}

export interface BootstrapInput {
  widgetToken: string;
  contactExternalId: string;
  name?: string | null;
  email?: string | null;
  phone?: string | null;
  origin?: string | null;
  referer?: string | null;
  clientIp: string;
}

export interface BootstrapResult {
  sessionToken: string;
  conversationId: number;
  captchaRequired: boolean;
  captchaToken?: string;
  captchaQuestion?: string;
  initialMessages: WidgetMessage[];
}

export interface SendInput {
  widgetToken: string;
  sessionToken: string;
  body: string;
  captchaToken?: string | null;
  captchaAnswer?: string | null;
  clientIp: string;
}

export interface PollInput {
  widgetToken: string;
  sessionToken: string;
  sinceId: number;
}

export interface TypingInput {
  widgetToken: string;
  sessionToken: string;
  isTyping: boolean;
}

/** A message as the visitor sees it */
export interface WidgetMessage {
  id: number;
  body: string;
  direction: Message['direction'];
  created_at: string;
}

export type WidgetNotification =
  | { event: 'message'; id: number; data: WidgetMessage }
  | { event: 'assignee'; data: { conversation_id: number; assignee_id: number | null } }
  | { event: 'conversation'; data: { conversation_id: number; status: ConversationStatus } }
  | { event: 'typing'; data: { conversation_id: number; is_typing: boolean } };

export const INITIAL_MESSAGE_COUNT = 10;
export const POLL_BATCH_SIZE = 50;
const VISITOR_DIRECTIONS = ['out'] as const;

export function toWidgetMessage(message: Message): WidgetMessage {
  return {
    id: message.id,
    body: message.body,
    direction: message.direction,
    created_at: message.createdAt.toISOString(),
  };
}

// =============================================================================
// Gateway
// =============================================================================

export class WidgetGateway {
  private readonly deps: WidgetGatewayDeps;
  private readonly floodLimit: number;
  private readonly logger: ServiceLogger;
  private readonly clock: () => Date;

  constructor(deps: WidgetGatewayDeps) {
    this.deps = deps;
    this.floodLimit = deps.floodLimitPerMinute ?? 20;
    this.logger = deps.logger ?? createLogger({ name: 'widget-gateway' });
    this.clock = deps.clock ?? (() => new Date());
  }

  async bootstrap(input: BootstrapInput, context: OperationContext = {}): Promise<BootstrapResult> {
    const { throttle, inboxes, conversationService, sessions, captcha, messages } = this.deps;

    await throttle.assertBootstrapAllowed(input.clientIp, input.widgetToken);

    const inbox = await inboxes.findActiveByWidgetToken(input.widgetToken);
    if (!inbox) {
      throw new NotFoundError('Inbox');
    }
    assertOriginAllowed(inbox.settings.security.allowedDomains, input);

    const externalId = input.contactExternalId.trim();
    if (externalId.length === 0) {
      throw new ValidationError('contact_external_id is required', {
        field: 'contact_external_id',
      });
    }

    const contact = await conversationService.upsertContact(
      { externalId, name: input.name, email: input.email, phone: input.phone },
      context
    );
    // Only a global inbox routes by region
    const regionId =
      inbox.branchId === null && this.deps.regions
        ? await this.deps.regions.locate(input.clientIp)
        : null;
    const { conversation } = await conversationService.findOrCreateActiveConversation(
      inbox,
      contact.id,
      context,
      regionId
    );

    const reusable = await sessions.findReusable(inbox.id, contact.id, conversation.id);
    const session = reusable
      ? await sessions.touch(reusable)
      : await sessions.create({
          inboxId: inbox.id,
          contactId: contact.id,
          conversationId: conversation.id,
        });

    const ipOverThreshold = await captcha.recordIpActivity(input.clientIp);

    const result: BootstrapResult = {
      sessionToken: session.token,
      conversationId: conversation.id,
      captchaRequired: false,
      initialMessages: [],
    };

    if (captcha.enabled && !session.captchaPassed) {
      const challenge = ipOverThreshold
        ? await captcha.outstandingOrIssue(session.token)
        : await captcha.outstanding(session.token);
      if (challenge) {
        result.captchaRequired = true;
        result.captchaToken = challenge.token;
        result.captchaQuestion = challenge.question;
      }
    }

    const latest = await messages.listLatest(conversation.id, {
      directions: VISITOR_DIRECTIONS,
      limit: INITIAL_MESSAGE_COUNT,
    });
    result.initialMessages = latest.map(toWidgetMessage);

    this.logger.info(
      { inboxId: inbox.id, conversationId: conversation.id, reused: reusable !== null },
      'Widget session bootstrapped'
    );
    return result;
  }

  async send(
    input: SendInput,
    context: OperationContext = {}
  ): Promise<{ id: number; createdAt: Date }> {
    const { throttle, captcha, sessions, messages, conversationService } = this.deps;

    await throttle.assertSendAllowed(input.clientIp, input.sessionToken);
    let { session } = await this.resolveSession(input.widgetToken, input.sessionToken);

    const body = normalizeMessageBody(input.body);

    const ipOverThreshold = await captcha.recordIpActivity(input.clientIp);
    if (captcha.enabled && !session.captchaPassed) {
      const outstanding = await captcha.outstanding(session.token);
      if (outstanding || ipOverThreshold) {
        const solved =
          input.captchaToken && input.captchaAnswer
            ? await captcha.verify(session.token, input.captchaToken, input.captchaAnswer)
            : false;
        if (!solved) {
          const challenge = outstanding ?? (await captcha.issue(session.token));
          throw new CaptchaRequiredError(challenge.token, challenge.question);
        }
        session = await sessions.markCaptchaPassed(session);
      }
    }

    const since = new Date(this.clock().getTime() - 60_000);
    const recent = await messages.countSince(session.conversationId, 'in', since);
    if (recent >= this.floodLimit) {
      this.logger.warn({ conversationId: session.conversationId }, 'Visitor message flood');
      throw new RateLimitError(60);
    }

    session = await sessions.activate(session);

    const { message } = await conversationService.recordMessage(
      {
        conversationId: session.conversationId,
        direction: 'in',
        body,
        senderContactId: session.contactId,
      },
      context
    );
    await this.deps.lastSeen.touchContact(session.conversationId, session.contactId);

    return { id: message.id, createdAt: message.createdAt };
  }

  /**
   * Agent replies after `sinceId`, oldest first
   */
  async poll(input: PollInput): Promise<WidgetMessage[]> {
    if (input.widgetToken.length === 0 || input.sessionToken.length === 0) {
      throw new ValidationError('widget_token and widget_session_token are required');
    }
    if (!Number.isInteger(input.sinceId) || input.sinceId < 0) {
      throw new ValidationError('since_id must be a non-negative integer', { field: 'since_id' });
    }

    await this.deps.throttle.assertPollAllowed(input.sessionToken);
    const { session } = await this.resolveSession(input.widgetToken, input.sessionToken);
    await this.deps.sessions.activate(session);
    await this.deps.lastSeen.touchContact(session.conversationId, session.contactId);

    const replies = await this.deps.messages.listAfter(session.conversationId, input.sinceId, {
      directions: VISITOR_DIRECTIONS,
      limit: POLL_BATCH_SIZE,
    });
    return replies.map(toWidgetMessage);
  }

  /**
   * Raise or clear the visitor's typing indicator
   */
  async setTyping(input: TypingInput, context: OperationContext = {}): Promise<void> {
    await this.deps.throttle.assertTypingAllowed(input.sessionToken);
    const { session } = await this.resolveSession(input.widgetToken, input.sessionToken);
    const conversation = await this.deps.conversationService.getConversation(
      session.conversationId
    );

    if (input.isTyping) {
      await this.deps.typing.start(conversation, 'contact', context);
    } else {
      await this.deps.typing.stop(conversation, 'contact', context);
    }
  }

  /**
   * Validate the tokens for a live stream and activate the session
   */
  async openStream(widgetToken: string, sessionToken: string): Promise<WidgetSession> {
    const { session } = await this.resolveSession(widgetToken, sessionToken);
    return this.deps.sessions.activate(session);
  }

  /**
   * Agent replies after `sinceId`, for a stream resuming from a known position
   */
  async replay(session: WidgetSession, sinceId: number): Promise<WidgetMessage[]> {
    const replies = await this.deps.messages.listAfter(session.conversationId, sinceId, {
      directions: VISITOR_DIRECTIONS,
      limit: POLL_BATCH_SIZE,
    });
    return replies.map(toWidgetMessage);
  }

  /**
   * Forward the session's conversation events to `onNotification`
   *
   * @returns a function removing every listener registered here
   */
  subscribe(
    session: WidgetSession,
    onNotification: (notification: WidgetNotification) => void
  ): () => void {
    const { events } = this.deps;
    const conversationId = session.conversationId;

    const unsubscribers = [
      events.subscribe(CHAT_EVENTS.messageCreated, (event) => {
        const { message } = event.payload;
        if (message.conversationId !== conversationId || message.direction !== 'out') return;
        onNotification({ event: 'message', id: message.id, data: toWidgetMessage(message) });
      }),
      events.subscribe(CHAT_EVENTS.messageUpdated, (event) => {
        const { message } = event.payload;
        if (message.conversationId !== conversationId || message.direction !== 'out') return;
        onNotification({ event: 'message', id: message.id, data: toWidgetMessage(message) });
      }),
      events.subscribe(CHAT_EVENTS.assigneeChanged, (event) => {
        const { conversation } = event.payload;
        if (conversation.id !== conversationId) return;
        onNotification({
          event: 'assignee',
          data: { conversation_id: conversation.id, assignee_id: conversation.assigneeId },
        });
      }),
      events.subscribe(CHAT_EVENTS.conversationResolved, (event) => {
        const { conversation } = event.payload;
        if (conversation.id !== conversationId) return;
        onNotification({
          event: 'conversation',
          data: { conversation_id: conversation.id, status: conversation.status },
        });
      }),
      events.subscribe(CHAT_EVENTS.conversationClosed, (event) => {
        const { conversation } = event.payload;
        if (conversation.id !== conversationId) return;
        onNotification({
          event: 'conversation',
          data: { conversation_id: conversation.id, status: conversation.status },
        });
      }),
      events.subscribe(CHAT_EVENTS.conversationTypingStarted, (event) => {
        const { conversation, side } = event.payload;
        if (conversation.id !== conversationId || side !== 'operator') return;
        onNotification({
          event: 'typing',
          data: { conversation_id: conversation.id, is_typing: true },
        });
      }),
      events.subscribe(CHAT_EVENTS.conversationTypingStopped, (event) => {
        const { conversation, side } = event.payload;
        if (conversation.id !== conversationId || side !== 'operator') return;
        onNotification({
          event: 'typing',
          data: { conversation_id: conversation.id, is_typing: false },
        });
      }),
    ];

    return () => {
      for (const unsubscribe of unsubscribers) unsubscribe();
    };
  }

  private async resolveSession(
    widgetToken: string,
    sessionToken: string
  ): Promise<{ inbox: Inbox; session: WidgetSession }> {
    const inbox = await this.deps.inboxes.findActiveByWidgetToken(widgetToken);
    if (!inbox) {
      throw new NotFoundError('Inbox');
    }

    const session = await this.deps.sessions.get(sessionToken);
    if (!session) {
      throw new AuthenticationError('Widget session expired or invalid');
    }
    if (session.inboxId !== inbox.id) {
      throw new ForbiddenError('Widget session belongs to another inbox', 'SESSION_INBOX_MISMATCH');
    }

    return { inbox, session };
  }
}
