/**
 * Chat event catalogue
 *
 * Stable event names and their payloads. Components publish and subscribe
 * through a `ChatEventBus`, an injected `EventDispatcher` instance.
 */

import { EventDispatcher, type EventBus, type EventDispatcherOptions } from '@chatrouter/core';

import type {
  AgentStatus,
  Contact,
  Conversation,
  ConversationStatus,
  Message,
} from './conversations/types.js';

export const CHAT_EVENTS = {
  conversationCreated: 'conversation.created',
  conversationUpdated: 'conversation.updated',
  conversationOpened: 'conversation.opened',
  conversationResolved: 'conversation.resolved',
  conversationClosed: 'conversation.closed',
  conversationStatusChanged: 'conversation.status_changed',
  conversationTypingStarted: 'conversation.typing_started',
  conversationTypingStopped: 'conversation.typing_stopped',
  assigneeChanged: 'assignee.changed',
  messageCreated: 'message.created',
  messageUpdated: 'message.updated',
  firstReplyCreated: 'first_reply.created',
  replyCreated: 'reply.created',
  contactCreated: 'contact.created',
  contactUpdated: 'contact.updated',
  agentStatusChanged: 'agent.status_changed',
} as const;

export type ChatEventName = (typeof CHAT_EVENTS)[keyof typeof CHAT_EVENTS];

export interface ConversationEventPayload {
  conversation: Conversation;
}

export interface StatusChangedPayload extends ConversationEventPayload {
  previousStatus: ConversationStatus;
}

export interface AssigneeChangedPayload extends ConversationEventPayload {
  previousAssigneeId: number | null;
  /** What triggered the change */
  reason: 'auto_assignment' | 'escalation' | 'branch_transfer' | 'manual';
}

/** Who is typing: the agent side or the visitor */
export type TypingSide = 'operator' | 'contact';

export interface TypingPayload extends ConversationEventPayload {
  side: TypingSide;
}

export interface MessageEventPayload {
  message: Message;
  conversation: Conversation;
}

export interface ContactEventPayload {
  contact: Contact;
}

export interface AgentStatusChangedPayload {
  agentId: number;
  status: AgentStatus;
}

export interface ChatEventMap {
  'conversation.created': ConversationEventPayload;
  'conversation.updated': ConversationEventPayload;
  'conversation.opened': ConversationEventPayload;
  'conversation.resolved': ConversationEventPayload;
  'conversation.closed': ConversationEventPayload;
  'conversation.status_changed': StatusChangedPayload;
  'conversation.typing_started': TypingPayload;
  'conversation.typing_stopped': TypingPayload;
  'assignee.changed': AssigneeChangedPayload;
  'message.created': MessageEventPayload;
  'message.updated': MessageEventPayload;
  'first_reply.created': MessageEventPayload;
  'reply.created': MessageEventPayload;
  'contact.created': ContactEventPayload;
  'contact.updated': ContactEventPayload;
  'agent.status_changed': AgentStatusChangedPayload;
}

export type ChatEventBus = EventBus<ChatEventMap>;

/**
 * Build the process-wide dispatcher; call once at startup and inject it
 */
export function createChatEventDispatcher(
  options: EventDispatcherOptions = {}
): EventDispatcher<ChatEventMap> {
  return new EventDispatcher<ChatEventMap>(options);
}
