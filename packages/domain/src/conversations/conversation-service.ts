/**
 * Conversation Service
 *
 * Owns the writes the dispatch core makes outside of assignment: contact
 * upsert, conversation creation, message recording with first-reply and
 * waiting-time bookkeeping, status transitions and retention closing.
 * Every write is followed by the matching chat events.
 */

import {
  ForbiddenError,
  NotFoundError,
  createLogger,
  toError,
  type DispatchOptions,
  type ServiceLogger,
} from '@chatrouter/core';

import { CHAT_EVENTS, type ChatEventBus } from '../events.js';
import type { BranchResolver } from '../routing/branch-router.js';
import { createMessage, type NewMessageInput } from './message.js';
import type {
  ContactPatch,
  ContactRepository,
  ConversationPatch,
  ConversationRepository,
  MessageRepository,
} from './repositories.js';
import type {
  Contact,
  Conversation,
  ConversationStatus,
  Inbox,
  Message,
  MessageDirection,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface ConversationServiceDeps {
  conversations: ConversationRepository;
  messages: MessageRepository;
  contacts: ContactRepository;
  branches: BranchResolver;
  events: ChatEventBus;
  logger?: ServiceLogger;
  clock?: () => Date;
}

/** Request-scoped context threaded through to dispatched events */
export interface OperationContext {
  correlationId?: string;
}

export interface ContactUpsertInput {
  externalId?: string | null;
  name?: string | null;
  email?: string | null;
  phone?: string | null;
}

export interface RecordedMessage {
  message: Message;
  conversation: Conversation;
}

export interface RetentionOptions {
  olderThanDays: number;
  limit: number;
  dryRun?: boolean;
}

export interface RetentionReport {
  cutoff: Date;
  dryRun: boolean;
  candidates: number[];
  closed: number[];
  failed: number[];
}

// =============================================================================
// Service
// =============================================================================

export class ConversationService {
  private readonly conversations: ConversationRepository;
  private readonly messages: MessageRepository;
  private readonly contacts: ContactRepository;
  private readonly branches: BranchResolver;
  private readonly events: ChatEventBus;
  private readonly logger: ServiceLogger;
  private readonly clock: () => Date;

  constructor(deps: ConversationServiceDeps) {
    this.conversations = deps.conversations;
    this.messages = deps.messages;
    this.contacts = deps.contacts;
    this.branches = deps.branches;
    this.events = deps.events;
    this.logger = deps.logger ?? createLogger({ name: 'conversation-service' });
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Resolve a contact by external ID, then email, then phone; create it when
   * none matches and fill in any newly supplied fields otherwise
   */
  async upsertContact(input: ContactUpsertInput, context: OperationContext = {}): Promise<Contact> {
    const externalId = clean(input.externalId);
    const email = clean(input.email)?.toLowerCase() ?? null;
    const phone = clean(input.phone);
    const name = clean(input.name);
    const now = this.clock();

    let existing: Contact | null = null;
    if (externalId) existing = await this.contacts.findByExternalId(externalId);
    if (!existing && email) existing = await this.contacts.findByEmail(email);
    if (!existing && phone) existing = await this.contacts.findByPhone(phone);

    if (!existing) {
      const contact = await this.contacts.create({ externalId, name, email, phone }, now);
      await this.events.dispatch(CHAT_EVENTS.contactCreated, now, { contact }, context);
      return contact;
    }

    const patch: ContactPatch = {};
    if (externalId && existing.externalId !== externalId) patch.externalId = externalId;
    if (name && existing.name !== name) patch.name = name;
    if (email && existing.email !== email) patch.email = email;
    if (phone && existing.phone !== phone) patch.phone = phone;

    if (Object.keys(patch).length === 0) {
      return existing;
    }

    const contact = await this.contacts.update(existing.id, patch, now);
    await this.events.dispatch(CHAT_EVENTS.contactUpdated, now, { contact }, context);
    return contact;
  }

  /**
   * Return the contact's open or pending conversation in the inbox, or start
   * one in the branch the router picks for the visitor's region
   */
  async findOrCreateActiveConversation(
    inbox: Inbox,
    contactId: number,
    context: OperationContext = {},
    regionId: number | null = null
  ): Promise<{ conversation: Conversation; created: boolean }> {
    const existing = await this.conversations.findActiveForContact(inbox.id, contactId);
    if (existing) {
      return { conversation: existing, created: false };
    }

    const placement = await this.branches.resolve(inbox, regionId);
    const now = this.clock();
    const conversation = await this.conversations.create(
      { inboxId: inbox.id, contactId, branchId: placement.branchId, regionId, status: 'open' },
      now
    );

    this.logger.info(
      {
        conversationId: conversation.id,
        inboxId: inbox.id,
        branchId: placement.branchId,
        branchSource: placement.source,
      },
      'Conversation created'
    );
    await this.events.dispatch(
      CHAT_EVENTS.conversationCreated,
      now,
      { conversation },
      asyncDispatch(context)
    );

    return { conversation, created: true };
  }

  async getConversation(conversationId: number): Promise<Conversation> {
    const conversation = await this.conversations.findById(conversationId);
    if (!conversation) {
      throw new NotFoundError('Conversation');
    }
    return conversation;
  }

  /**
   * Persist a message and update the conversation's message-derived fields
   *
   * Inbound messages start the waiting clock; an outbound reply stops it,
   * stamps the first reply, and counts as the assignee having opened the
   * conversation when the sender still holds the assignment.
   */
  async recordMessage(
    input: NewMessageInput,
    context: OperationContext = {}
  ): Promise<RecordedMessage> {
    const conversation = await this.getConversation(input.conversationId);
    const now = this.clock();

    const message = await this.messages.create(createMessage(input, now));

    const patch: ConversationPatch = { lastMessageAt: now };
    let isFirstReply = false;

    if (message.direction === 'in') {
      if (conversation.waitingSince === null) {
        patch.waitingSince = now;
      }
    } else if (message.direction === 'out') {
      patch.waitingSince = null;
      if (conversation.firstReplyAt === null) {
        patch.firstReplyAt = now;
        isFirstReply = true;
      }
    }

    let updated = await this.conversations.update(conversation.id, patch, now);
    if (
      message.direction === 'out' &&
      message.senderAgentId !== null &&
      updated.assigneeId === message.senderAgentId &&
      updated.assigneeOpenedAt === null
    ) {
      updated =
        (await this.conversations.markOpenedByAssignee(
          conversation.id,
          message.senderAgentId,
          now
        )) ?? updated;
    }
    const payload = { message, conversation: updated };

    await this.events.dispatch(CHAT_EVENTS.messageCreated, now, payload, asyncDispatch(context));
    if (message.direction === 'out') {
      if (isFirstReply) {
        await this.events.dispatch(CHAT_EVENTS.firstReplyCreated, now, payload, context);
      }
      await this.events.dispatch(CHAT_EVENTS.replyCreated, now, payload, context);
    }
    await this.events.dispatch(
      CHAT_EVENTS.conversationUpdated,
      now,
      { conversation: updated },
      context
    );

    return payload;
  }

  async listMessages(
    conversationId: number,
    afterId: number,
    directions: readonly MessageDirection[],
    limit: number
  ): Promise<Message[]> {
    return this.messages.listAfter(conversationId, afterId, { directions, limit });
  }

  /**
   * Move a conversation to a new status; no-op when it is already there
   */
  async changeStatus(
    conversationId: number,
    status: ConversationStatus,
    context: OperationContext = {}
  ): Promise<Conversation> {
    const conversation = await this.getConversation(conversationId);
    if (conversation.status === status) {
      return conversation;
    }

    const now = this.clock();
    const updated = await this.conversations.update(conversationId, { status }, now);

    await this.events.dispatch(
      CHAT_EVENTS.conversationStatusChanged,
      now,
      { conversation: updated, previousStatus: conversation.status },
      context
    );

    const statusEvent = STATUS_EVENTS[status];
    if (statusEvent) {
      await this.events.dispatch(
        statusEvent,
        now,
        { conversation: updated },
        asyncDispatch(context)
      );
    }

    await this.events.dispatch(
      CHAT_EVENTS.conversationUpdated,
      now,
      { conversation: updated },
      context
    );

    return updated;
  }

  /**
   * Record that the assignee opened the conversation, which stops escalation
   *
   * @throws ForbiddenError when the agent is not the current assignee
   */
  async openByAssignee(
    conversationId: number,
    agentId: number,
    context: OperationContext = {}
  ): Promise<Conversation> {
    const conversation = await this.getConversation(conversationId);
    if (conversation.assigneeId !== agentId) {
      throw new ForbiddenError('Only the assignee can open this conversation', 'NOT_ASSIGNEE');
    }
    if (conversation.assigneeOpenedAt !== null) {
      return conversation;
    }

    const now = this.clock();
    const updated = await this.conversations.markOpenedByAssignee(conversationId, agentId, now);
    if (!updated) {
      // Reassigned or opened since the read above
      const current = await this.getConversation(conversationId);
      if (current.assigneeId !== agentId) {
        throw new ForbiddenError('Only the assignee can open this conversation', 'NOT_ASSIGNEE');
      }
      return current;
    }

    await this.events.dispatch(
      CHAT_EVENTS.conversationUpdated,
      now,
      { conversation: updated },
      context
    );
    return updated;
  }

  /**
   * Close resolved conversations with no activity since the cutoff
   */
  async closeResolvedBefore(options: RetentionOptions): Promise<RetentionReport> {
    const dryRun = options.dryRun === true;
    const cutoff = new Date(this.clock().getTime() - options.olderThanDays * 24 * 60 * 60 * 1000);
    const stale = await this.conversations.findResolvedBefore(cutoff, options.limit);
    const report: RetentionReport = {
      cutoff,
      dryRun,
      candidates: stale.map((conversation) => conversation.id),
      closed: [],
      failed: [],
    };

    if (dryRun) {
      return report;
    }

    for (const conversation of stale) {
      try {
        await this.changeStatus(conversation.id, 'closed');
        report.closed.push(conversation.id);
      } catch (error) {
        report.failed.push(conversation.id);
        this.logger.error(
          { err: toError(error), conversationId: conversation.id },
          'Failed to close resolved conversation'
        );
      }
    }

    this.logger.info(
      { candidates: report.candidates.length, closed: report.closed.length },
      'Closed stale resolved conversations'
    );
    return report;
  }
}

const STATUS_EVENTS: Partial<
  Record<
    ConversationStatus,
    | typeof CHAT_EVENTS.conversationOpened
    | typeof CHAT_EVENTS.conversationResolved
    | typeof CHAT_EVENTS.conversationClosed
  >
> = {
  open: CHAT_EVENTS.conversationOpened,
  resolved: CHAT_EVENTS.conversationResolved,
  closed: CHAT_EVENTS.conversationClosed,
};

function asyncDispatch(context: OperationContext): DispatchOptions {
  return { ...context, async: true };
}

function clean(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}
