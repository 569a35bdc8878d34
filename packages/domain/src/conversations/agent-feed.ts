import { CHAT_EVENTS, type ChatEventBus } from '../events.js';
import type { AgentStatus, Message } from './types.js';

export type AgentNotification =
  | {
      event: 'assignee';
      data: {
        conversation_id: number;
        assignee_id: number | null;
        previous_assignee_id: number | null;
        reason: string;
      };
    }
  | {
      event: 'message';
      id: number;
      data: {
        conversation_id: number;
        id: number;
        body: string;
        direction: Message['direction'];
        created_at: string;
      };
    }
  | { event: 'presence'; data: { agent_id: number; status: AgentStatus } }
  | { event: 'typing'; data: { conversation_id: number; is_typing: boolean } };

/**
 * Forward what concerns one agent to their console: assignment changes to or
 * from them, visitor messages and typing on their conversations and their
 * own presence
 *
 * @returns a function removing every listener registered here
 */
export function subscribeAgentFeed(
  events: ChatEventBus,
  agentId: number,
  onNotification: (notification: AgentNotification) => void
): () => void {
  const unsubscribers = [
    events.subscribe(CHAT_EVENTS.assigneeChanged, (event) => {
      const { conversation, previousAssigneeId, reason } = event.payload;
      if (conversation.assigneeId !== agentId && previousAssigneeId !== agentId) return;
      onNotification({
        event: 'assignee',
        data: {
          conversation_id: conversation.id,
          assignee_id: conversation.assigneeId,
          previous_assignee_id: previousAssigneeId,
          reason,
        },
      });
    }),
    events.subscribe(CHAT_EVENTS.messageCreated, (event) => {
      const { message, conversation } = event.payload;
      if (message.direction !== 'in' || conversation.assigneeId !== agentId) return;
      onNotification({
        event: 'message',
        id: message.id,
        data: {
          conversation_id: conversation.id,
          id: message.id,
          body: message.body,
          direction: message.direction,
          created_at: message.createdAt.toISOString(),
        },
      });
    }),
    events.subscribe(CHAT_EVENTS.conversationTypingStarted, (event) => {
      const { conversation, side } = event.payload;
      if (side !== 'contact' || conversation.assigneeId !== agentId) return;
      onNotification({ event: 'typing', data: { conversation_id: conversation.id, is_typing: true } });
    }),
    events.subscribe(CHAT_EVENTS.conversationTypingStopped, (event) => {
      const { conversation, side } = event.payload;
      if (side !== 'contact' || conversation.assigneeId !== agentId) return;
      onNotification({
        event: 'typing',
        data: { conversation_id: conversation.id, is_typing: false },
      });
    }),
    events.subscribe(CHAT_EVENTS.agentStatusChanged, (event) => {
      if (event.payload.agentId !== agentId) return;
      onNotification({
        event: 'presence',
        data: { agent_id: event.payload.agentId, status: event.payload.status },
      });
    }),
  ];

  return () => {
    for (const unsubscribe of unsubscribers) unsubscribe();
  };
}
