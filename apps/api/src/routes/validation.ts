import type { FastifyRequest } from 'fastify';
import { z } from 'zod';
import { ValidationError } from '@chatrouter/core';
import type { Conversation } from '@chatrouter/domain';

/**
 * Parse a body, query or params object, throwing a ValidationError carrying
 * the flattened zod issues
 */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  message: string
): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(message, result.error.flatten());
  }
  return result.data;
}

export const IdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

/**
 * Agent identity from the `x-agent-id` header
 */
export function requireAgentId(request: FastifyRequest): number {
  const header = request.headers['x-agent-id'];
  const agentId = typeof header === 'string' && /^\d+$/.test(header) ? Number(header) : NaN;
  if (!Number.isSafeInteger(agentId) || agentId <= 0) {
    throw new ValidationError('x-agent-id header is required', { field: 'x-agent-id' });
  }
  return agentId;
}

const iso = (date: Date | null): string | null => (date ? date.toISOString() : null);

export function toConversationResponse(conversation: Conversation): Record<string, unknown> {
  return {
    id: conversation.id,
    inbox_id: conversation.inboxId,
    contact_id: conversation.contactId,
    branch_id: conversation.branchId,
    region_id: conversation.regionId,
    status: conversation.status,
    assignee_id: conversation.assigneeId,
    assignee_assigned_at: iso(conversation.assigneeAssignedAt),
    assignee_opened_at: iso(conversation.assigneeOpenedAt),
    waiting_since: iso(conversation.waitingSince),
    first_reply_at: iso(conversation.firstReplyAt),
    last_message_at: iso(conversation.lastMessageAt),
    agent_last_seen_at: iso(conversation.agentLastSeenAt),
    contact_last_seen_at: iso(conversation.contactLastSeenAt),
    created_at: conversation.createdAt.toISOString(),
    updated_at: conversation.updatedAt.toISOString(),
  };
}
