/**
 * @fileoverview PostgreSQL message repository (Infrastructure Layer)
 *
 * Message IDs come from a sequence, so ID order is creation order and the
 * widget poll cursor is simply the last ID the client saw.
 *
 * @module @chatrouter/infrastructure/repositories/postgres-message-repository
 */

import type { DatabaseClient } from '@chatrouter/core';
import type {
  DraftMessage,
  Message,
  MessageDirection,
  MessageQuery,
  MessageRepository,
} from '@chatrouter/domain';

import { returnedRow, rowToMessage, type CountRow, type MessageRow } from './rows.js';

const MESSAGE_COLUMNS =
  'id, conversation_id, direction, sender_contact_id, sender_agent_id, body, created_at';

export class PostgresMessageRepository implements MessageRepository {
  constructor(private readonly db: DatabaseClient) {}

  async create(draft: DraftMessage): Promise<Message> {
    const result = await this.db.query<MessageRow>(
      `INSERT INTO messages
         (conversation_id, direction, sender_contact_id, sender_agent_id, body, created_at)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${MESSAGE_COLUMNS}`,
      [
        draft.conversationId,
        draft.direction,
        draft.senderContactId,
        draft.senderAgentId,
        draft.body,
        draft.createdAt,
      ]
    );
    return rowToMessage(returnedRow(result, 'createMessage'));
  }

  async listAfter(
    conversationId: number,
    afterId: number,
    query: MessageQuery
  ): Promise<Message[]> {
    const result = await this.db.query<MessageRow>(
      `SELECT ${MESSAGE_COLUMNS} FROM messages
       WHERE conversation_id = $1 AND id > $2 AND direction = ANY($3::text[])
       ORDER BY id ASC
       LIMIT $4`,
      [conversationId, afterId, [...query.directions], query.limit]
    );
    return result.rows.map(rowToMessage);
  }

  async listLatest(conversationId: number, query: MessageQuery): Promise<Message[]> {
    const result = await this.db.query<MessageRow>(
      `SELECT ${MESSAGE_COLUMNS} FROM (
         SELECT ${MESSAGE_COLUMNS} FROM messages
         WHERE conversation_id = $1 AND direction = ANY($2::text[])
         ORDER BY id DESC
         LIMIT $3
       ) latest
       ORDER BY id ASC`,
      [conversationId, [...query.directions], query.limit]
    );
    return result.rows.map(rowToMessage);
  }

  async countSince(
    conversationId: number,
    direction: MessageDirection,
    since: Date
  ): Promise<number> {
    const result = await this.db.query<CountRow>(
      `SELECT COUNT(*) AS count FROM messages
       WHERE conversation_id = $1 AND direction = $2 AND created_at >= $3`,
      [conversationId, direction, since]
    );
    return parseInt(result.rows[0]?.count ?? '0', 10);
  }
}
