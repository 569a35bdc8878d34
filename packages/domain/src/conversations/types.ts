/**
 * Conversation domain types
 *
 * The dispatch core owns assignee fields, status transitions and the
 * message-derived timestamps; everything else is read from the store of
 * record.
 */

export type AgentStatus = 'online' | 'away' | 'busy' | 'offline';

export const AGENT_STATUSES: readonly AgentStatus[] = ['online', 'away', 'busy', 'offline'];

export type AgentRole = 'agent' | 'admin';

/**
 * Which conversations a non-admin agent may see. `global` grants nothing
 * beyond `branch`; only admins see every branch.
 */
export type AgentDataScope = 'global' | 'branch' | 'self';

export const AGENT_DATA_SCOPES: readonly AgentDataScope[] = ['global', 'branch', 'self'];

export type ConversationStatus = 'open' | 'pending' | 'resolved' | 'closed';

/** Statuses in which a conversation still expects an agent */
export const ACTIVE_CONVERSATION_STATUSES: readonly ConversationStatus[] = ['open', 'pending'];

export type MessageDirection = 'in' | 'out' | 'internal';

export interface InboxSecuritySettings {
  /** Hostnames (optionally `*.` wildcards) allowed to embed the widget; empty allows all */
  allowedDomains: string[];
}

export interface InboxAutoReplySettings {
  enabled: boolean;
  /** Sent once, as the assignee, after the first inbound message */
  body: string;
}

export interface InboxWebhookSettings {
  enabled: boolean;
  url: string;
  /** HMAC-SHA256 key for the signature header; empty sends unsigned */
  secret: string;
  /** Webhook event names to deliver; empty delivers all */
  events: string[];
}

export interface InboxSettings {
  security: InboxSecuritySettings;
  autoReply?: InboxAutoReplySettings;
  webhook?: InboxWebhookSettings;
}

export interface Inbox {
  id: number;
  name: string;
  /** Null for a global inbox, whose conversations are placed by routing rules */
  branchId: number | null;
  widgetToken: string;
  isActive: boolean;
  settings: InboxSettings;
}

export interface Agent {
  id: number;
  branchId: number | null;
  role: AgentRole;
  dataScope: AgentDataScope;
  isActive: boolean;
}

/**
 * Places conversations of a global inbox in a branch by visitor region
 */
export interface RoutingRule {
  id: number;
  name: string;
  inboxId: number;
  branchId: number;
  regionIds: number[];
  /** Lower wins */
  priority: number;
  /** Used when no rule matches the region */
  isFallback: boolean;
  isActive: boolean;
}

export interface AgentProfile {
  agentId: number;
  status: AgentStatus;
  updatedAt: Date;
}

export interface Contact {
  id: number;
  externalId: string | null;
  name: string | null;
  email: string | null;
  phone: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface Conversation {
  id: number;
  inboxId: number;
  contactId: number;
  branchId: number | null;
  regionId: number | null;
  status: ConversationStatus;
  assigneeId: number | null;
  assigneeAssignedAt: Date | null;
  assigneeOpenedAt: Date | null;
  waitingSince: Date | null;
  firstReplyAt: Date | null;
  lastMessageAt: Date | null;
  agentLastSeenAt: Date | null;
  contactLastSeenAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface Message {
  id: number;
  conversationId: number;
  direction: MessageDirection;
  senderContactId: number | null;
  senderAgentId: number | null;
  body: string;
  createdAt: Date;
}

export function isAgentStatus(value: unknown): value is AgentStatus {
  return AGENT_STATUSES.some((status) => status === value);
}

export function isAgentDataScope(value: unknown): value is AgentDataScope {
  return AGENT_DATA_SCOPES.some((scope) => scope === value);
}

export function isActiveConversation(conversation: Pick<Conversation, 'status'>): boolean {
  return ACTIVE_CONVERSATION_STATUSES.includes(conversation.status);
}
