/**
 * Branch Transfer
 *
 * Moves a conversation of a global inbox to another branch and hands it to
 * that branch's rotation.
 */

import { ForbiddenError, NotFoundError, createLogger, type ServiceLogger } from '@chatrouter/core';

import type { OperationContext } from '../conversations/conversation-service.js';
import type { ConversationRepository, InboxRepository } from '../conversations/repositories.js';
import { isActiveConversation, type Conversation } from '../conversations/types.js';
import { CHAT_EVENTS, type ChatEventBus } from '../events.js';
import type { AutoAssignmentService } from './auto-assignment-service.js';

export interface BranchTransferDeps {
  inboxes: InboxRepository;
  conversations: ConversationRepository;
  autoAssignment: Pick<AutoAssignmentService, 'assign'>;
  events: ChatEventBus;
  logger?: ServiceLogger;
  clock?: () => Date;
}

export interface BranchTransferResult {
  conversation: Conversation;
  /** Whether the target branch had someone to take it */
  assigned: boolean;
}

export class BranchTransferService {
  private readonly deps: BranchTransferDeps;
  private readonly logger: ServiceLogger;
  private readonly clock: () => Date;

  constructor(deps: BranchTransferDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger({ name: 'branch-transfer' });
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Put the conversation in `branchId`, drop its assignee and run automatic
   * assignment in the new branch. Only conversations of inboxes without a
   * fixed branch can move.
   */
  async transfer(
    conversationId: number,
    branchId: number,
    context: OperationContext = {}
  ): Promise<BranchTransferResult> {
    const { inboxes, conversations, autoAssignment, events } = this.deps;

    const conversation = await conversations.findById(conversationId);
    if (!conversation) {
      throw new NotFoundError('Conversation');
    }
    const inbox = await inboxes.findById(conversation.inboxId);
    if (!inbox) {
      throw new NotFoundError('Inbox');
    }
    if (inbox.branchId !== null) {
      throw new ForbiddenError(
        'Conversations of a branch inbox cannot change branch',
        'INBOX_HAS_BRANCH'
      );
    }
    if (!isActiveConversation(conversation)) {
      throw new ForbiddenError('Only open or pending conversations can be transferred', 'INACTIVE');
    }
    if (conversation.branchId === branchId) {
      return { conversation, assigned: conversation.assigneeId !== null };
    }

    const now = this.clock();
    const moved = await conversations.moveToBranch(conversationId, branchId, now);
    this.logger.info(
      { conversationId, fromBranchId: conversation.branchId, toBranchId: branchId },
      'Conversation moved to another branch'
    );

    const dispatchOptions =
      context.correlationId === undefined ? {} : { correlationId: context.correlationId };
    if (conversation.assigneeId !== null) {
      await events.dispatch(
        CHAT_EVENTS.assigneeChanged,
        now,
        { conversation: moved, previousAssigneeId: conversation.assigneeId, reason: 'branch_transfer' },
        dispatchOptions
      );
    }
    await events.dispatch(CHAT_EVENTS.conversationUpdated, now, { conversation: moved }, dispatchOptions);

    const assigned = await autoAssignment.assign(conversationId, context.correlationId);
    return { conversation: assigned ?? moved, assigned: assigned !== null };
  }
}
