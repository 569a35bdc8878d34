import { ValidationError } from '@chatrouter/core';

import type { Message, MessageDirection } from './types.js';

export const MAX_MESSAGE_LENGTH = 150_000;

export interface NewMessageInput {
  conversationId: number;
  direction: MessageDirection;
  body: string;
  senderContactId?: number | null;
  senderAgentId?: number | null;
}

/** A validated message not yet persisted */
export type DraftMessage = Omit<Message, 'id'>;

/**
 * Build a message, enforcing the sender invariant:
 * inbound messages come from a contact and never an agent, outbound and
 * internal ones from an agent and never a contact.
 *
 * @throws ValidationError on a sender mismatch or an empty/oversized body
 */
export function createMessage(input: NewMessageInput, createdAt: Date = new Date()): DraftMessage {
  const senderContactId = input.senderContactId ?? null;
  const senderAgentId = input.senderAgentId ?? null;

  if (input.direction === 'in') {
    if (senderAgentId !== null) {
      throw new ValidationError('Inbound messages cannot have an agent sender', {
        field: 'senderAgentId',
      });
    }
    if (senderContactId === null) {
      throw new ValidationError('Inbound messages require a contact sender', {
        field: 'senderContactId',
      });
    }
  } else {
    if (senderContactId !== null) {
      throw new ValidationError(`${input.direction} messages cannot have a contact sender`, {
        field: 'senderContactId',
      });
    }
    if (senderAgentId === null) {
      throw new ValidationError(`${input.direction} messages require an agent sender`, {
        field: 'senderAgentId',
      });
    }
  }

  const body = normalizeMessageBody(input.body);

  return {
    conversationId: input.conversationId,
    direction: input.direction,
    senderContactId,
    senderAgentId,
    body,
    createdAt,
  };
}

/**
 * Trim and bound-check a message body
 */
export function normalizeMessageBody(raw: string): string {
  const body = raw.trim();
  if (body.length === 0) {
    throw new ValidationError('Message body is required', { field: 'body' });
  }
  if (body.length > MAX_MESSAGE_LENGTH) {
    throw new ValidationError(`Message body exceeds ${MAX_MESSAGE_LENGTH} characters`, {
      field: 'body',
    });
  }
  return body;
}
