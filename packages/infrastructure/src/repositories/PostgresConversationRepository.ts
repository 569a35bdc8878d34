/**
 * @fileoverview PostgreSQL conversation repository (Infrastructure Layer)
 *
 * Assignment goes through a single conditional UPDATE so that the auto
 * assigner, the escalation scanner and manual reassignment never overwrite
 * each other: the row changes only while `assignee_id` still holds the value
 * the caller read. Opening works the same way, keyed on the agent that holds
 * the assignment.
 *
 * @module @chatrouter/infrastructure/repositories/postgres-conversation-repository
 */

import { NotFoundError, type DatabaseClient } from '@chatrouter/core';
import type {
  AssigneeSwapOptions,
  Conversation,
  ConversationPatch,
  ConversationRepository,
  EscalationQuery,
  LastSeenSide,
  NewConversationInput,
} from '@chatrouter/domain';

import { returnedRow, rowToConversation, type ConversationRow } from './rows.js';

const CONVERSATION_COLUMNS = `id, inbox_id, contact_id, branch_id, region_id, status, assignee_id,
  assignee_assigned_at, assignee_opened_at, waiting_since, first_reply_at,
  last_message_at, agent_last_seen_at, contact_last_seen_at, created_at, updated_at`;

const PATCH_COLUMNS = {
  status: 'status',
  waitingSince: 'waiting_since',
  firstReplyAt: 'first_reply_at',
  lastMessageAt: 'last_message_at',
} as const satisfies Record<keyof ConversationPatch, string>;

const PATCH_FIELDS = [
  'status',
  'waitingSince',
  'firstReplyAt',
  'lastMessageAt',
] as const;

const LAST_SEEN_COLUMNS = {
  agent: 'agent_last_seen_at',
  contact: 'contact_last_seen_at',
} as const satisfies Record<LastSeenSide, string>;

export class PostgresConversationRepository implements ConversationRepository {
  constructor(private readonly db: DatabaseClient) {}

  async findById(conversationId: number): Promise<Conversation | null> {
    const result = await this.db.query<ConversationRow>(
      `SELECT ${CONVERSATION_COLUMNS} FROM conversations WHERE id = $1`,
      [conversationId]
    );
    const row = result.rows[0];
    return row ? rowToConversation(row) : null;
  }

  async findActiveForContact(inboxId: number, contactId: number): Promise<Conversation | null> {
    const result = await this.db.query<ConversationRow>(
      `SELECT ${CONVERSATION_COLUMNS} FROM conversations
       WHERE inbox_id = $1 AND contact_id = $2 AND status IN ('open', 'pending')
       ORDER BY id DESC
       LIMIT 1`,
      [inboxId, contactId]
    );
    const row = result.rows[0];
    return row ? rowToConversation(row) : null;
  }

  async create(input: NewConversationInput, at: Date): Promise<Conversation> {
    const result = await this.db.query<ConversationRow>(
      `INSERT INTO conversations
         (inbox_id, contact_id, branch_id, region_id, status, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $6)
       RETURNING ${CONVERSATION_COLUMNS}`,
      [
        input.inboxId,
        input.contactId,
        input.branchId,
        input.regionId ?? null,
        input.status ?? 'open',
        at,
      ]
    );
    return rowToConversation(returnedRow(result, 'createConversation'));
  }

  async update(conversationId: number, patch: ConversationPatch, at: Date): Promise<Conversation> {
    const params: unknown[] = [conversationId, at];
    const assignments = ['updated_at = $2'];

    for (const field of PATCH_FIELDS) {
      const value = patch[field];
      if (value === undefined) continue;
      params.push(value);
      assignments.push(`${PATCH_COLUMNS[field]} = $${params.length}`);
    }

    const result = await this.db.query<ConversationRow>(
      `UPDATE conversations SET ${assignments.join(', ')}
       WHERE id = $1
       RETURNING ${CONVERSATION_COLUMNS}`,
      params
    );
    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError('Conversation');
    }
    return rowToConversation(row);
  }

  async compareAndSetAssignee(
    conversationId: number,
    expectedAssigneeId: number | null,
    nextAssigneeId: number,
    at: Date,
    options: AssigneeSwapOptions = {}
  ): Promise<Conversation | null> {
    const unopened = options.requireUnopened === true ? ' AND assignee_opened_at IS NULL' : '';
    const result = await this.db.query<ConversationRow>(
      `UPDATE conversations
       SET assignee_id = $3,
           assignee_assigned_at = $4,
           assignee_opened_at = NULL,
           waiting_since = NULL,
           updated_at = $4
       WHERE id = $1 AND assignee_id IS NOT DISTINCT FROM $2::integer${unopened}
       RETURNING ${CONVERSATION_COLUMNS}`,
      [conversationId, expectedAssigneeId, nextAssigneeId, at]
    );
    const row = result.rows[0];
    return row ? rowToConversation(row) : null;
  }

  async markOpenedByAssignee(
    conversationId: number,
    agentId: number,
    at: Date
  ): Promise<Conversation | null> {
    const result = await this.db.query<ConversationRow>(
      `UPDATE conversations
       SET assignee_opened_at = $3, updated_at = $3
       WHERE id = $1 AND assignee_id = $2 AND assignee_opened_at IS NULL
       RETURNING ${CONVERSATION_COLUMNS}`,
      [conversationId, agentId, at]
    );
    const row = result.rows[0];
    return row ? rowToConversation(row) : null;
  }

  async moveToBranch(conversationId: number, branchId: number, at: Date): Promise<Conversation> {
    const result = await this.db.query<ConversationRow>(
      `UPDATE conversations
       SET branch_id = $2,
           assignee_id = NULL,
           assignee_assigned_at = NULL,
           assignee_opened_at = NULL,
           updated_at = $3
       WHERE id = $1
       RETURNING ${CONVERSATION_COLUMNS}`,
      [conversationId, branchId, at]
    );
    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError('Conversation');
    }
    return rowToConversation(row);
  }

  async setLastSeen(conversationId: number, side: LastSeenSide, at: Date): Promise<void> {
    await this.db.query(
      `UPDATE conversations SET ${LAST_SEEN_COLUMNS[side]} = $2 WHERE id = $1`,
      [conversationId, at]
    );
  }

  async countActiveByAssignee(agentIds: readonly number[]): Promise<Map<number, number>> {
    const counts = new Map<number, number>();
    if (agentIds.length === 0) {
      return counts;
    }
    const result = await this.db.query<{ assignee_id: number; open_count: string }>(
      `SELECT assignee_id, COUNT(*) AS open_count FROM conversations
       WHERE assignee_id = ANY($1::integer[]) AND status IN ('open', 'pending')
       GROUP BY assignee_id`,
      [[...agentIds]]
    );
    for (const row of result.rows) {
      counts.set(row.assignee_id, Number(row.open_count));
    }
    return counts;
  }

  async findEscalationCandidates(query: EscalationQuery): Promise<Conversation[]> {
    const result = await this.db.query<ConversationRow>(
      `SELECT ${CONVERSATION_COLUMNS} FROM conversations
       WHERE assignee_id IS NOT NULL
         AND assignee_opened_at IS NULL
         AND status IN ('open', 'pending')
         AND COALESCE(assignee_assigned_at, created_at) <= $1
       ORDER BY COALESCE(assignee_assigned_at, created_at) ASC, id ASC
       LIMIT $2`,
      [query.assignedBefore, query.limit]
    );
    return result.rows.map(rowToConversation);
  }

  async findResolvedBefore(cutoff: Date, limit: number): Promise<Conversation[]> {
    const result = await this.db.query<ConversationRow>(
      `SELECT ${CONVERSATION_COLUMNS} FROM conversations
       WHERE status = 'resolved' AND COALESCE(last_message_at, created_at) < $1
       ORDER BY id ASC
       LIMIT $2`,
      [cutoff, limit]
    );
    return result.rows.map(rowToConversation);
  }
}
