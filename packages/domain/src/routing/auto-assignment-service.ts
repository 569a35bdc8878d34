/**
 * Auto Assignment Service
 *
 * Gives unassigned conversations an agent as soon as a visitor writes in.
 * Runs as an asynchronous listener so the visitor's request never waits on
 * the queue.
 */

import { createLogger, toError, type ServiceLogger } from '@chatrouter/core';

import type { AgentDirectory, ConversationRepository } from '../conversations/repositories.js';
import { isActiveConversation, type Conversation } from '../conversations/types.js';
import { CHAT_EVENTS, type ChatEventBus } from '../events.js';
import type { RateLimiter } from './assignment-rate-limiter.js';
import { selectAssignableAgents } from './candidate-selection.js';
import type { PresenceStore } from './presence-tracker.js';
import type { QueueStore } from './round-robin-queue.js';

export interface AutoAssignmentDeps {
  conversations: ConversationRepository;
  agents: AgentDirectory;
  presence: PresenceStore;
  rateLimiter: RateLimiter;
  queue: QueueStore;
  events: ChatEventBus;
  logger?: ServiceLogger;
  clock?: () => Date;
}

export class AutoAssignmentService {
  private readonly deps: AutoAssignmentDeps;
  private readonly logger: ServiceLogger;
  private readonly clock: () => Date;

  constructor(deps: AutoAssignmentDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger({ name: 'auto-assignment' });
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Assign the conversation to the next agent of its branch in the inbox's
   * rotation
   *
   * @returns the updated conversation, or null when nothing was assigned
   */
  async assign(conversationId: number, correlationId?: string): Promise<Conversation | null> {
    const { conversations, queue, rateLimiter, events } = this.deps;

    const conversation = await conversations.findById(conversationId);
    if (!conversation || conversation.assigneeId !== null || !isActiveConversation(conversation)) {
      return null;
    }

    const candidates = await selectAssignableAgents(this.deps, conversation.branchId);
    if (candidates.length === 0) {
      this.logger.debug(
        { conversationId, inboxId: conversation.inboxId, branchId: conversation.branchId },
        'No assignable agent available'
      );
      return null;
    }

    let pick: number | null;
    try {
      pick = await queue.next(conversation.inboxId, candidates);
    } catch (error) {
      this.logger.error(
        { err: toError(error), conversationId, inboxId: conversation.inboxId },
        'Round-robin queue unavailable, conversation left unassigned'
      );
      return null;
    }
    if (pick === null) {
      return null;
    }

    await rateLimiter.increment(pick);

    const now = this.clock();
    const updated = await conversations.compareAndSetAssignee(conversationId, null, pick, now);
    if (!updated) {
      this.logger.info({ conversationId, agentId: pick }, 'Conversation assigned concurrently');
      return null;
    }

    this.logger.info({ conversationId, agentId: pick }, 'Conversation auto-assigned');

    await events.dispatch(
      CHAT_EVENTS.assigneeChanged,
      now,
      { conversation: updated, previousAssigneeId: null, reason: 'auto_assignment' },
      correlationId === undefined ? { async: true } : { correlationId, async: true }
    );

    return updated;
  }

  /**
   * Subscribe `assign` as an asynchronous listener for new conversations and
   * inbound messages on unassigned ones
   *
   * @returns a function removing both listeners
   */
  registerListeners(events: ChatEventBus = this.deps.events): () => void {
    const unsubscribeCreated = events.subscribe(
      CHAT_EVENTS.conversationCreated,
      async (event) => {
        await this.assign(event.payload.conversation.id, event.metadata.correlationId);
      },
      { async: true }
    );

    const unsubscribeMessage = events.subscribe(
      CHAT_EVENTS.messageCreated,
      async (event) => {
        const { message, conversation } = event.payload;
        if (message.direction !== 'in' || conversation.assigneeId !== null) {
          return;
        }
        await this.assign(conversation.id, event.metadata.correlationId);
      },
      { async: true }
    );

    return () => {
      unsubscribeCreated();
      unsubscribeMessage();
    };
  }
}
