/**
 * Database row types and row-to-domain mapping shared by the Postgres repositories
 */

import { z } from 'zod';
import { DatabaseOperationError, type QueryResult } from '@chatrouter/core';
import {
  isAgentDataScope,
  isAgentStatus,
  type Agent,
  type AgentProfile,
  type Contact,
  type Conversation,
  type ConversationStatus,
  type Inbox,
  type InboxSettings,
  type Message,
  type MessageDirection,
  type RoutingRule,
} from '@chatrouter/domain';

// ============================================================================
// DATABASE ROW TYPES
// ============================================================================

export interface InboxRow {
  id: number;
  name: string;
  branch_id: number | null;
  widget_token: string;
  is_active: boolean;
  settings: unknown;
}

export interface AgentRow {
  id: number;
  branch_id: number | null;
  role: Agent['role'];
  data_scope: string;
  is_active: boolean;
}

export interface AgentProfileRow {
  agent_id: number;
  status: string;
  updated_at: Date;
}

export interface ContactRow {
  id: number;
  external_id: string | null;
  name: string | null;
  email: string | null;
  phone: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface ConversationRow {
  id: number;
  inbox_id: number;
  contact_id: number;
  branch_id: number | null;
  region_id: number | null;
  status: ConversationStatus;
  assignee_id: number | null;
  assignee_assigned_at: Date | null;
  assignee_opened_at: Date | null;
  waiting_since: Date | null;
  first_reply_at: Date | null;
  last_message_at: Date | null;
  agent_last_seen_at: Date | null;
  contact_last_seen_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface RoutingRuleRow {
  id: number;
  name: string;
  inbox_id: number;
  branch_id: number;
  /** Aggregated from routing_rule_regions; null when the rule has none */
  region_ids: number[] | null;
  priority: number;
  is_fallback: boolean;
  is_active: boolean;
}

export interface MessageRow {
  id: number;
  conversation_id: number;
  direction: MessageDirection;
  sender_contact_id: number | null;
  sender_agent_id: number | null;
  body: string;
  created_at: Date;
}

export interface CountRow {
  count: string;
}

// ============================================================================
// MAPPING
// ============================================================================

const AutoReplySettingsSchema = z.object({
  enabled: z.boolean().catch(false),
  body: z.string().catch(''),
});

const WebhookSettingsSchema = z.object({
  enabled: z.boolean().catch(false),
  url: z.string().catch(''),
  secret: z.string().catch(''),
  events: z.array(z.string()).catch([]),
});

/** `settings` JSONB column; unknown keys are ignored */
const InboxSettingsSchema = z
  .object({
    security: z
      .object({
        allowed_domains: z.array(z.string()).catch([]),
      })
      .catch({ allowed_domains: [] }),
    automation: z
      .object({ auto_reply: AutoReplySettingsSchema.optional().catch(undefined) })
      .optional()
      .catch(undefined),
    integrations: z
      .object({ webhook: WebhookSettingsSchema.optional().catch(undefined) })
      .optional()
      .catch(undefined),
  })
  .catch({ security: { allowed_domains: [] } });

export function rowToInbox(row: InboxRow): Inbox {
  const parsed = InboxSettingsSchema.parse(row.settings ?? {});
  const settings: InboxSettings = {
    security: { allowedDomains: parsed.security.allowed_domains },
  };
  const autoReply = parsed.automation?.auto_reply;
  if (autoReply) {
    settings.autoReply = { enabled: autoReply.enabled, body: autoReply.body.trim() };
  }
  const webhook = parsed.integrations?.webhook;
  if (webhook && webhook.url.trim() !== '') {
    settings.webhook = {
      enabled: webhook.enabled,
      url: webhook.url.trim(),
      secret: webhook.secret.trim(),
      events: webhook.events,
    };
  }
  return {
    id: row.id,
    name: row.name,
    branchId: row.branch_id,
    widgetToken: row.widget_token,
    isActive: row.is_active,
    settings,
  };
}

export function rowToAgent(row: AgentRow): Agent {
  return {
    id: row.id,
    branchId: row.branch_id,
    role: row.role,
    // Scopes other tools write that we do not know read as the narrowest
    dataScope: isAgentDataScope(row.data_scope) ? row.data_scope : 'self',
    isActive: row.is_active,
  };
}

export function rowToRoutingRule(row: RoutingRuleRow): RoutingRule {
  return {
    id: row.id,
    name: row.name,
    inboxId: row.inbox_id,
    branchId: row.branch_id,
    regionIds: row.region_ids ?? [],
    priority: row.priority,
    isFallback: row.is_fallback,
    isActive: row.is_active,
  };
}

export function rowToAgentProfile(row: AgentProfileRow): AgentProfile {
  return {
    agentId: row.agent_id,
    // Unknown values written by other tools read as offline
    status: isAgentStatus(row.status) ? row.status : 'offline',
    updatedAt: row.updated_at,
  };
}

export function rowToContact(row: ContactRow): Contact {
  return {
    id: row.id,
    externalId: row.external_id,
    name: row.name,
    email: row.email,
    phone: row.phone,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function rowToConversation(row: ConversationRow): Conversation {
  return {
    id: row.id,
    inboxId: row.inbox_id,
    contactId: row.contact_id,
    branchId: row.branch_id,
    regionId: row.region_id,
    status: row.status,
    assigneeId: row.assignee_id,
    assigneeAssignedAt: row.assignee_assigned_at,
    assigneeOpenedAt: row.assignee_opened_at,
    waitingSince: row.waiting_since,
    firstReplyAt: row.first_reply_at,
    lastMessageAt: row.last_message_at,
    agentLastSeenAt: row.agent_last_seen_at,
    contactLastSeenAt: row.contact_last_seen_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function rowToMessage(row: MessageRow): Message {
  return {
    id: row.id,
    conversationId: row.conversation_id,
    direction: row.direction,
    senderContactId: row.sender_contact_id,
    senderAgentId: row.sender_agent_id,
    body: row.body,
    createdAt: row.created_at,
  };
}

/**
 * The single row an INSERT/UPSERT ... RETURNING must produce
 */
export function returnedRow<T>(result: QueryResult<T>, operation: string): T {
  const row = result.rows[0];
  if (row === undefined) {
    throw new DatabaseOperationError(operation, 'no row returned');
  }
  return row;
}
