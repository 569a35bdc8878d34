/**
 * Agent console routes
 *
 * The acting agent is named by the `x-agent-id` header; the API key on the
 * request (checked by the api-auth plugin) vouches for it. Every
 * conversation route first checks that the conversation lies within the
 * agent's visibility scope.
 */
import type { FastifyPluginAsync } from 'fastify';
import { ForbiddenError, NotFoundError, createLogger } from '@chatrouter/core';
import {
  canAgentSeeConversation,
  subscribeAgentFeed,
  type Agent,
  type AgentStatus,
  type Conversation,
  type ConversationStatus,
  type Message,
} from '@chatrouter/domain';
import { z } from 'zod';

import type { Container } from '../container.js';
import { SSEStream, StreamRegistry, type StreamTimings } from './sse.js';
import {
  IdParamsSchema,
  parseInput,
  requireAgentId,
  toConversationResponse,
} from './validation.js';

const logger = createLogger({ name: 'agent-routes' });

const CONVERSATION_STATUSES: readonly [ConversationStatus, ...ConversationStatus[]] = [
  'open',
  'pending',
  'resolved',
  'closed',
];

export const PresenceBodySchema = z.object({
  status: z.enum(['online', 'away', 'busy', 'offline']),
});

export const AgentMessageBodySchema = z.object({
  body: z.string(),
  direction: z.enum(['out', 'internal']).default('out'),
});

export const StatusBodySchema = z.object({
  status: z.enum(CONVERSATION_STATUSES),
});

export const MessagesQuerySchema = z.object({
  since_id: z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER).default(0),
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

export const TransferBodySchema = z.object({
  branch_id: z.number().int().positive(),
});

export const TypingBodySchema = z.object({
  is_typing: z.boolean().default(true),
});

const AgentParamsSchema = z.object({
  agentId: z.coerce.number().int().positive(),
});

function toMessageResponse(message: Message): Record<string, unknown> {
  return {
    id: message.id,
    conversation_id: message.conversationId,
    direction: message.direction,
    sender_contact_id: message.senderContactId,
    sender_agent_id: message.senderAgentId,
    body: message.body,
    created_at: message.createdAt.toISOString(),
  };
}

export function createAgentRoutes(container: Container, timings: StreamTimings): FastifyPluginAsync {
  return async (fastify) => {
    const { presence, conversations, events, repositories, branchTransfer, typing, lastSeen } =
      container;
    const registry = new StreamRegistry();

    fastify.addHook('preClose', async () => {
      registry.closeAll();
    });

    /**
     * The agent named by the header, which must exist and be active
     */
    async function actingAgent(agentId: number): Promise<Agent> {
      const agent = await repositories.agents.findAgent(agentId);
      if (!agent) {
        throw new NotFoundError('Agent');
      }
      if (!agent.isActive) {
        throw new ForbiddenError('Agent is deactivated', 'AGENT_INACTIVE');
      }
      return agent;
    }

    /**
     * The conversation, when it exists and the agent's scope covers it
     */
    async function visibleConversation(agent: Agent, id: number): Promise<Conversation> {
      const conversation = await conversations.getConversation(id);
      if (!canAgentSeeConversation(agent, conversation)) {
        logger.warn(
          { agentId: agent.id, conversationId: id },
          'Agent denied a conversation outside their scope'
        );
        throw new ForbiddenError(
          'Conversation is outside your visibility scope',
          'CONVERSATION_OUT_OF_SCOPE'
        );
      }
      return conversation;
    }

    fastify.put('/agent/presence', async (request) => {
      const agent = await actingAgent(requireAgentId(request));
      const { status } = parseInput(PresenceBodySchema, request.body, 'Invalid presence payload');

      await presence.setStatus(agent.id, status);
      return { agent_id: agent.id, status };
    });

    fastify.get('/agent/presence/:agentId', async (request) => {
      const { agentId } = parseInput(AgentParamsSchema, request.params, 'Invalid agent id');
      const status: AgentStatus = (await presence.getStatus(agentId)) ?? 'offline';
      return { agent_id: agentId, status };
    });

    fastify.post('/agent/conversations/:id/open', async (request) => {
      const agent = await actingAgent(requireAgentId(request));
      const { id } = parseInput(IdParamsSchema, request.params, 'Invalid conversation id');
      await visibleConversation(agent, id);

      const conversation = await conversations.openByAssignee(id, agent.id, {
        correlationId: request.correlationId,
      });
      await lastSeen.touchAgent(id, agent.id);
      return { conversation: toConversationResponse(conversation) };
    });

    fastify.post('/agent/conversations/:id/messages', async (request, reply) => {
      const agent = await actingAgent(requireAgentId(request));
      const { id } = parseInput(IdParamsSchema, request.params, 'Invalid conversation id');
      const body = parseInput(AgentMessageBodySchema, request.body, 'Invalid message payload');
      await visibleConversation(agent, id);

      const { message } = await conversations.recordMessage(
        { conversationId: id, direction: body.direction, body: body.body, senderAgentId: agent.id },
        { correlationId: request.correlationId }
      );

      return reply.status(201).send({ id: message.id, created_at: message.createdAt.toISOString() });
    });

    fastify.patch('/agent/conversations/:id/status', async (request) => {
      const agent = await actingAgent(requireAgentId(request));
      const { id } = parseInput(IdParamsSchema, request.params, 'Invalid conversation id');
      const { status } = parseInput(StatusBodySchema, request.body, 'Invalid status payload');
      await visibleConversation(agent, id);

      const conversation = await conversations.changeStatus(id, status, {
        correlationId: request.correlationId,
      });
      return { conversation: toConversationResponse(conversation) };
    });

    /**
     * POST /agent/conversations/:id/transfer
     * Move a global-inbox conversation to another branch and reassign it there
     */
    fastify.post('/agent/conversations/:id/transfer', async (request) => {
      const agent = await actingAgent(requireAgentId(request));
      const { id } = parseInput(IdParamsSchema, request.params, 'Invalid conversation id');
      const body = parseInput(TransferBodySchema, request.body, 'Invalid transfer payload');
      await visibleConversation(agent, id);

      const result = await branchTransfer.transfer(id, body.branch_id, {
        correlationId: request.correlationId,
      });
      return {
        conversation: toConversationResponse(result.conversation),
        assigned: result.assigned,
      };
    });

    fastify.get('/agent/conversations/:id/typing', async (request) => {
      const agent = await actingAgent(requireAgentId(request));
      const { id } = parseInput(IdParamsSchema, request.params, 'Invalid conversation id');
      await visibleConversation(agent, id);

      const status = await typing.status(id);
      return { operator_typing: status.operatorTyping, contact_typing: status.contactTyping };
    });

    fastify.post('/agent/conversations/:id/typing', async (request) => {
      const agent = await actingAgent(requireAgentId(request));
      const { id } = parseInput(IdParamsSchema, request.params, 'Invalid conversation id');
      const body = parseInput(TypingBodySchema, request.body ?? {}, 'Invalid typing payload');
      const conversation = await visibleConversation(agent, id);

      const context = { correlationId: request.correlationId };
      if (body.is_typing) {
        await typing.start(conversation, 'operator', context);
      } else {
        await typing.stop(conversation, 'operator', context);
      }
      return { status: 'ok' };
    });

    fastify.get('/agent/conversations/:id/messages', async (request) => {
      const agent = await actingAgent(requireAgentId(request));
      const { id } = parseInput(IdParamsSchema, request.params, 'Invalid conversation id');
      const query = parseInput(MessagesQuerySchema, request.query, 'Invalid messages query');
      await visibleConversation(agent, id);

      await lastSeen.touchAgent(id, agent.id);
      const messages = await conversations.listMessages(
        id,
        query.since_id,
        ['in', 'out', 'internal'],
        query.limit
      );
      return { messages: messages.map(toMessageResponse) };
    });

    /**
     * GET /agent/stream
     * Assignment changes, visitor messages and typing, and presence for the
     * acting agent
     */
    fastify.get('/agent/stream', async (request, reply) => {
      const { id: agentId } = await actingAgent(requireAgentId(request));

      const stream = new SSEStream(reply, timings);
      registry.track(stream);
      stream.open();
      stream.send({ event: 'ready', data: { agent_id: agentId } });

      const unsubscribe = subscribeAgentFeed(events, agentId, (notification) => {
        if (notification.event === 'message') {
          stream.send({ event: notification.event, id: notification.id, data: notification.data });
        } else {
          stream.send({ event: notification.event, data: notification.data });
        }
      });

      stream.onClose((reason) => {
        unsubscribe();
        logger.debug({ agentId, reason }, 'Agent stream closed');
      });
    });
  };
}
