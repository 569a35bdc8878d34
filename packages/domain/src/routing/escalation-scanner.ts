/**
 * Escalation Scanner
 *
 * Moves conversations whose assignee has not opened them within the timeout
 * to the next online agent of the same branch. Safe to run from several
 * workers at once: a reassignment only commits while the assignee read at
 * selection time is still in place and has still not opened it.
 */

import { createLogger, toError, type ServiceLogger } from '@chatrouter/core';

import type { AgentDirectory, ConversationRepository } from '../conversations/repositories.js';
import type { Conversation } from '../conversations/types.js';
import { CHAT_EVENTS, type ChatEventBus } from '../events.js';
import type { RateLimiter } from './assignment-rate-limiter.js';
import { selectAssignableAgents } from './candidate-selection.js';
import type { PresenceStore } from './presence-tracker.js';
import type { QueueStore } from './round-robin-queue.js';

// =============================================================================
// Types
// =============================================================================

export interface EscalationScannerDeps {
  conversations: ConversationRepository;
  agents: AgentDirectory;
  presence: PresenceStore;
  rateLimiter: RateLimiter;
  queue: QueueStore;
  events: ChatEventBus;
  /** Budget for one conversation's reassignment (default: 5000 ms) */
  attemptTimeoutMs?: number;
  logger?: ServiceLogger;
  clock?: () => Date;
}

export interface EscalationScanOptions {
  /** Seconds an assignment may stay unopened (default: 240) */
  timeoutSeconds?: number;
  /** Report what would move without committing or rotating the queue */
  dryRun?: boolean;
  /** Conversations examined per scan (default: 500) */
  limit?: number;
  correlationId?: string;
}

export interface Reassignment {
  conversationId: number;
  fromAgentId: number;
  toAgentId: number;
}

export type EscalationSkipReason = 'no_candidate' | 'contention' | 'timeout' | 'error';

export interface EscalationSkip {
  conversationId: number;
  reason: EscalationSkipReason;
}

export interface EscalationReport {
  timeoutSeconds: number;
  dryRun: boolean;
  scanned: number;
  /** Reassignments proposed by a dry run or committed by a live one */
  candidates: Reassignment[];
  reassigned: Reassignment[];
  skipped: EscalationSkip[];
}

interface AttemptBudget {
  expired: boolean;
  committing: boolean;
}

type EscalationOutcome =
  | { kind: 'reassigned'; reassignment: Reassignment }
  | { kind: 'proposed'; reassignment: Reassignment }
  | { kind: 'skipped'; reason: EscalationSkipReason };

// =============================================================================
// Scanner
// =============================================================================

export class EscalationScanner {
  private readonly deps: EscalationScannerDeps;
  private readonly attemptTimeoutMs: number;
  private readonly logger: ServiceLogger;
  private readonly clock: () => Date;

  constructor(deps: EscalationScannerDeps) {
    this.deps = deps;
    this.attemptTimeoutMs = deps.attemptTimeoutMs ?? 5000;
    this.logger = deps.logger ?? createLogger({ name: 'escalation-scanner' });
    this.clock = deps.clock ?? (() => new Date());
  }

  async scan(options: EscalationScanOptions = {}): Promise<EscalationReport> {
    const timeoutSeconds = options.timeoutSeconds ?? 240;
    const dryRun = options.dryRun === true;
    const limit = options.limit ?? 500;

    const assignedBefore = new Date(this.clock().getTime() - timeoutSeconds * 1000);
    const stale = await this.deps.conversations.findEscalationCandidates({
      assignedBefore,
      limit,
    });

    const report: EscalationReport = {
      timeoutSeconds,
      dryRun,
      scanned: stale.length,
      candidates: [],
      reassigned: [],
      skipped: [],
    };

    for (const conversation of stale) {
      const outcome = await this.escalateWithinBudget(conversation, dryRun, options.correlationId);

      switch (outcome.kind) {
        case 'reassigned':
          report.candidates.push(outcome.reassignment);
          report.reassigned.push(outcome.reassignment);
          break;
        case 'proposed':
          report.candidates.push(outcome.reassignment);
          break;
        case 'skipped':
          report.skipped.push({ conversationId: conversation.id, reason: outcome.reason });
          break;
      }
    }

    this.logger.info(
      {
        timeoutSeconds,
        dryRun,
        scanned: report.scanned,
        reassigned: report.reassigned.length,
        skipped: report.skipped.length,
      },
      'Escalation scan completed'
    );

    return report;
  }

  /**
   * Runs one attempt against the time budget. The budget covers selection
   * only; an attempt that has started committing runs to completion and
   * reports what it wrote.
   */
  private async escalateWithinBudget(
    conversation: Conversation,
    dryRun: boolean,
    correlationId: string | undefined
  ): Promise<EscalationOutcome> {
    const budget: AttemptBudget = { expired: false, committing: false };
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<EscalationOutcome>((resolve) => {
      timer = setTimeout(() => {
        budget.expired = true;
        if (!budget.committing) {
          resolve({ kind: 'skipped', reason: 'timeout' });
        }
      }, this.attemptTimeoutMs);
    });

    try {
      return await Promise.race([
        this.escalate(conversation, dryRun, budget, correlationId),
        timedOut,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async escalate(
    conversation: Conversation,
    dryRun: boolean,
    budget: AttemptBudget,
    correlationId: string | undefined
  ): Promise<EscalationOutcome> {
    const { conversations, queue, rateLimiter, events } = this.deps;
    const fromAgentId = conversation.assigneeId;
    if (fromAgentId === null) {
      return { kind: 'skipped', reason: 'contention' };
    }

    try {
      const candidates = await selectAssignableAgents(
        this.deps,
        conversation.branchId,
        fromAgentId
      );
      if (candidates.length === 0) {
        return { kind: 'skipped', reason: 'no_candidate' };
      }

      if (budget.expired) {
        return { kind: 'skipped', reason: 'timeout' };
      }

      const toAgentId = dryRun
        ? await queue.peek(conversation.inboxId, candidates)
        : await queue.next(conversation.inboxId, candidates);
      if (toAgentId === null) {
        return { kind: 'skipped', reason: 'no_candidate' };
      }

      const reassignment: Reassignment = { conversationId: conversation.id, fromAgentId, toAgentId };
      if (dryRun) {
        return { kind: 'proposed', reassignment };
      }

      // An attempt that ran past its budget has already been reported as a
      // timeout and must not write anything.
      if (budget.expired) {
        return { kind: 'skipped', reason: 'timeout' };
      }
      budget.committing = true;

      await rateLimiter.increment(toAgentId);

      const now = this.clock();
      const updated = await conversations.compareAndSetAssignee(
        conversation.id,
        fromAgentId,
        toAgentId,
        now,
        { requireUnopened: true }
      );
      if (!updated) {
        return { kind: 'skipped', reason: 'contention' };
      }

      this.logger.info(
        { conversationId: conversation.id, fromAgentId, toAgentId },
        'Conversation escalated'
      );

      const context = correlationId === undefined ? {} : { correlationId };
      await events.dispatch(
        CHAT_EVENTS.assigneeChanged,
        now,
        { conversation: updated, previousAssigneeId: fromAgentId, reason: 'escalation' },
        context
      );
      await events.dispatch(
        CHAT_EVENTS.conversationUpdated,
        now,
        { conversation: updated },
        context
      );

      return { kind: 'reassigned', reassignment };
    } catch (error) {
      this.logger.error(
        { err: toError(error), conversationId: conversation.id },
        'Escalation attempt failed'
      );
      return { kind: 'skipped', reason: 'error' };
    }
  }
}
