/**
 * Repository interfaces for the store of record
 *
 * The dispatch core reaches inboxes, agents, contacts, conversations and
 * messages only through these ports. Postgres implementations live in
 * @chatrouter/infrastructure; in-memory ones in ./in-memory-repositories.ts.
 */

import type { DraftMessage } from './message.js';
import type {
  Agent,
  AgentProfile,
  AgentStatus,
  Contact,
  Conversation,
  ConversationStatus,
  Inbox,
  Message,
  MessageDirection,
  RoutingRule,
} from './types.js';

export interface InboxRepository {
  findById(inboxId: number): Promise<Inbox | null>;
  /** Active inbox owning the widget token */
  findActiveByWidgetToken(widgetToken: string): Promise<Inbox | null>;
}

export interface RoutingRuleRepository {
  /** Active rules of the inbox, by priority then ID */
  listActiveForInbox(inboxId: number): Promise<RoutingRule[]>;
}

export interface AgentDirectory {
  findAgent(agentId: number): Promise<Agent | null>;
  /**
   * Members of the inbox's rotation in ascending ID order: the active,
   * non-admin agents of its branch, or of every branch for a global inbox
   */
  listEligibleAgentIds(inboxId: number): Promise<number[]>;
  /** Active, non-admin agents, optionally restricted to one branch */
  listActiveAgentIds(branchId?: number): Promise<number[]>;
  getProfile(agentId: number): Promise<AgentProfile | null>;
  /** Write the status on the agent profile, creating the profile when missing */
  saveStatus(agentId: number, status: AgentStatus, at: Date): Promise<AgentProfile>;
}

export interface NewContactInput {
  externalId: string | null;
  name: string | null;
  email: string | null;
  phone: string | null;
}

export type ContactPatch = Partial<Pick<Contact, 'externalId' | 'name' | 'email' | 'phone'>>;

export interface ContactRepository {
  findById(contactId: number): Promise<Contact | null>;
  findByExternalId(externalId: string): Promise<Contact | null>;
  findByEmail(email: string): Promise<Contact | null>;
  findByPhone(phone: string): Promise<Contact | null>;
  create(input: NewContactInput, at: Date): Promise<Contact>;
  update(contactId: number, patch: ContactPatch, at: Date): Promise<Contact>;
}

export interface NewConversationInput {
  inboxId: number;
  contactId: number;
  branchId: number | null;
  regionId?: number | null;
  status?: ConversationStatus;
}

/** Fields the conversation service may write outside of assignment */
export type ConversationPatch = Partial<
  Pick<Conversation, 'status' | 'waitingSince' | 'firstReplyAt' | 'lastMessageAt'>
>;

export interface AssigneeSwapOptions {
  /** Only swap while the current assignee has not opened the conversation */
  requireUnopened?: boolean;
}

export type LastSeenSide = 'agent' | 'contact';

export interface EscalationQuery {
  /** Conversations whose assignment (or creation, if never stamped) is at or before this instant */
  assignedBefore: Date;
  limit: number;
}

export interface ConversationRepository {
  findById(conversationId: number): Promise<Conversation | null>;
  /** Most recent open or pending conversation for the pair */
  findActiveForContact(inboxId: number, contactId: number): Promise<Conversation | null>;
  create(input: NewConversationInput, at: Date): Promise<Conversation>;
  update(conversationId: number, patch: ConversationPatch, at: Date): Promise<Conversation>;

  /**
   * Set the assignee only if the current one still equals `expectedAssigneeId`.
   * Stamps `assigneeAssignedAt` and clears `assigneeOpenedAt` and `waitingSince`.
   *
   * @returns the updated conversation, or null when the expectation no longer held
   */
  compareAndSetAssignee(
    conversationId: number,
    expectedAssigneeId: number | null,
    nextAssigneeId: number,
    at: Date,
    options?: AssigneeSwapOptions
  ): Promise<Conversation | null>;

  /**
   * Stamp `assigneeOpenedAt` only while `agentId` is still the assignee and
   * the assignment is unopened
   *
   * @returns the updated conversation, or null when either no longer held
   */
  markOpenedByAssignee(
    conversationId: number,
    agentId: number,
    at: Date
  ): Promise<Conversation | null>;

  /** Move to another branch and drop the assignment */
  moveToBranch(conversationId: number, branchId: number, at: Date): Promise<Conversation>;

  setLastSeen(conversationId: number, side: LastSeenSide, at: Date): Promise<void>;

  /** Open and pending conversations per assignee; agents with none are absent */
  countActiveByAssignee(agentIds: readonly number[]): Promise<Map<number, number>>;

  /** Assigned, unopened, open/pending conversations, oldest assignment first */
  findEscalationCandidates(query: EscalationQuery): Promise<Conversation[]>;

  /** Resolved conversations whose last message (or creation) is before the cutoff */
  findResolvedBefore(cutoff: Date, limit: number): Promise<Conversation[]>;
}

export interface MessageQuery {
  directions: readonly MessageDirection[];
  limit: number;
}

export interface MessageRepository {
  create(draft: DraftMessage): Promise<Message>;
  /** Messages with ID greater than `afterId`, ascending */
  listAfter(conversationId: number, afterId: number, query: MessageQuery): Promise<Message[]>;
  /** The newest `limit` messages, returned in ascending ID order */
  listLatest(conversationId: number, query: MessageQuery): Promise<Message[]>;
  countSince(conversationId: number, direction: MessageDirection, since: Date): Promise<number>;
}
