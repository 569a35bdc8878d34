/**
 * In-Memory Conversation Repositories
 *
 * In-memory implementations of the store-of-record ports for development
 * and tests. Each method completes synchronously, so compare-and-set
 * operations are atomic within the process.
 */

import { NotFoundError } from '@chatrouter/core';

import type { DraftMessage } from './message.js';
import type {
  AgentDirectory,
  AssigneeSwapOptions,
  ContactPatch,
  ContactRepository,
  ConversationPatch,
  ConversationRepository,
  EscalationQuery,
  InboxRepository,
  LastSeenSide,
  MessageQuery,
  MessageRepository,
  NewContactInput,
  NewConversationInput,
  RoutingRuleRepository,
} from './repositories.js';
import {
  isActiveConversation,
  type Agent,
  type AgentProfile,
  type AgentStatus,
  type Contact,
  type Conversation,
  type Inbox,
  type Message,
  type MessageDirection,
  type RoutingRule,
} from './types.js';

// =============================================================================
// Inboxes and agents
// =============================================================================

export class InMemoryInboxRepository implements InboxRepository {
  private inboxes = new Map<number, Inbox>();

  constructor(seed: Inbox[] = []) {
    for (const inbox of seed) this.add(inbox);
  }

  add(inbox: Inbox): void {
    this.inboxes.set(inbox.id, structuredClone(inbox));
  }

  findById(inboxId: number): Promise<Inbox | null> {
    const inbox = this.inboxes.get(inboxId);
    return Promise.resolve(inbox ? structuredClone(inbox) : null);
  }

  findActiveByWidgetToken(widgetToken: string): Promise<Inbox | null> {
    for (const inbox of this.inboxes.values()) {
      if (inbox.isActive && inbox.widgetToken === widgetToken) {
        return Promise.resolve(structuredClone(inbox));
      }
    }
    return Promise.resolve(null);
  }
}

export class InMemoryRoutingRuleRepository implements RoutingRuleRepository {
  private rules = new Map<number, RoutingRule>();

  constructor(seed: RoutingRule[] = []) {
    for (const rule of seed) this.add(rule);
  }

  add(rule: RoutingRule): void {
    this.rules.set(rule.id, structuredClone(rule));
  }

  listActiveForInbox(inboxId: number): Promise<RoutingRule[]> {
    const rules = [...this.rules.values()]
      .filter((rule) => rule.inboxId === inboxId && rule.isActive)
      .sort((a, b) => a.priority - b.priority || a.id - b.id)
      .map((rule) => structuredClone(rule));
    return Promise.resolve(rules);
  }
}

export class InMemoryAgentDirectory implements AgentDirectory {
  private agents = new Map<number, Agent>();
  private profiles = new Map<number, AgentProfile>();

  constructor(
    private readonly inboxes: InboxRepository,
    seed: Agent[] = []
  ) {
    for (const agent of seed) this.addAgent(agent);
  }

  addAgent(agent: Agent, status?: AgentStatus): void {
    this.agents.set(agent.id, { ...agent });
    if (status) {
      this.profiles.set(agent.id, { agentId: agent.id, status, updatedAt: new Date(0) });
    }
  }

  findAgent(agentId: number): Promise<Agent | null> {
    const agent = this.agents.get(agentId);
    return Promise.resolve(agent ? { ...agent } : null);
  }

  async listEligibleAgentIds(inboxId: number): Promise<number[]> {
    const inbox = await this.inboxes.findById(inboxId);
    if (!inbox) {
      return [];
    }
    return this.listActiveAgentIds(inbox.branchId ?? undefined);
  }

  listActiveAgentIds(branchId?: number): Promise<number[]> {
    const ids = [...this.agents.values()]
      .filter((agent) => agent.isActive && agent.role !== 'admin')
      .filter((agent) => branchId === undefined || agent.branchId === branchId)
      .map((agent) => agent.id)
      .sort((a, b) => a - b);
    return Promise.resolve(ids);
  }

  getProfile(agentId: number): Promise<AgentProfile | null> {
    const profile = this.profiles.get(agentId);
    return Promise.resolve(profile ? { ...profile } : null);
  }

  saveStatus(agentId: number, status: AgentStatus, at: Date): Promise<AgentProfile> {
    const profile: AgentProfile = { agentId, status, updatedAt: at };
    this.profiles.set(agentId, profile);
    return Promise.resolve({ ...profile });
  }
}

// =============================================================================
// Contacts
// =============================================================================

export class InMemoryContactRepository implements ContactRepository {
  private contacts = new Map<number, Contact>();
  private nextId = 1;

  findById(contactId: number): Promise<Contact | null> {
    const contact = this.contacts.get(contactId);
    return Promise.resolve(contact ? { ...contact } : null);
  }

  findByExternalId(externalId: string): Promise<Contact | null> {
    return this.findFirst((contact) => contact.externalId === externalId);
  }

  findByEmail(email: string): Promise<Contact | null> {
    const normalized = email.toLowerCase();
    return this.findFirst((contact) => contact.email?.toLowerCase() === normalized);
  }

  findByPhone(phone: string): Promise<Contact | null> {
    return this.findFirst((contact) => contact.phone === phone);
  }

  create(input: NewContactInput, at: Date): Promise<Contact> {
    const contact: Contact = { id: this.nextId++, ...input, createdAt: at, updatedAt: at };
    this.contacts.set(contact.id, contact);
    return Promise.resolve({ ...contact });
  }

  update(contactId: number, patch: ContactPatch, at: Date): Promise<Contact> {
    const contact = this.contacts.get(contactId);
    if (!contact) {
      return Promise.reject(new NotFoundError('Contact'));
    }
    const updated: Contact = { ...contact, ...patch, updatedAt: at };
    this.contacts.set(contactId, updated);
    return Promise.resolve({ ...updated });
  }

  private findFirst(predicate: (contact: Contact) => boolean): Promise<Contact | null> {
    for (const contact of this.contacts.values()) {
      if (predicate(contact)) return Promise.resolve({ ...contact });
    }
    return Promise.resolve(null);
  }
}

// =============================================================================
// Conversations
// =============================================================================

export class InMemoryConversationRepository implements ConversationRepository {
  private conversations = new Map<number, Conversation>();
  private nextId = 1;

  /** Insert a fully specified conversation (tests and fixtures) */
  add(conversation: Conversation): Conversation {
    this.conversations.set(conversation.id, { ...conversation });
    this.nextId = Math.max(this.nextId, conversation.id + 1);
    return { ...conversation };
  }

  findById(conversationId: number): Promise<Conversation | null> {
    const conversation = this.conversations.get(conversationId);
    return Promise.resolve(conversation ? { ...conversation } : null);
  }

  findActiveForContact(inboxId: number, contactId: number): Promise<Conversation | null> {
    const matches = [...this.conversations.values()]
      .filter((c) => c.inboxId === inboxId && c.contactId === contactId && isActiveConversation(c))
      .sort((a, b) => b.id - a.id);
    const latest = matches[0];
    return Promise.resolve(latest ? { ...latest } : null);
  }

  create(input: NewConversationInput, at: Date): Promise<Conversation> {
    const conversation: Conversation = {
      id: this.nextId++,
      inboxId: input.inboxId,
      contactId: input.contactId,
      branchId: input.branchId,
      regionId: input.regionId ?? null,
      status: input.status ?? 'open',
      assigneeId: null,
      assigneeAssignedAt: null,
      assigneeOpenedAt: null,
      waitingSince: null,
      firstReplyAt: null,
      lastMessageAt: null,
      agentLastSeenAt: null,
      contactLastSeenAt: null,
      createdAt: at,
      updatedAt: at,
    };
    this.conversations.set(conversation.id, conversation);
    return Promise.resolve({ ...conversation });
  }

  update(conversationId: number, patch: ConversationPatch, at: Date): Promise<Conversation> {
    const conversation = this.conversations.get(conversationId);
    if (!conversation) {
      return Promise.reject(new NotFoundError('Conversation'));
    }
    const updated: Conversation = { ...conversation, ...patch, updatedAt: at };
    this.conversations.set(conversationId, updated);
    return Promise.resolve({ ...updated });
  }

  compareAndSetAssignee(
    conversationId: number,
    expectedAssigneeId: number | null,
    nextAssigneeId: number,
    at: Date,
    options: AssigneeSwapOptions = {}
  ): Promise<Conversation | null> {
    const conversation = this.conversations.get(conversationId);
    if (!conversation || conversation.assigneeId !== expectedAssigneeId) {
      return Promise.resolve(null);
    }
    if (options.requireUnopened === true && conversation.assigneeOpenedAt !== null) {
      return Promise.resolve(null);
    }
    return Promise.resolve(
      this.write(conversation, {
        assigneeId: nextAssigneeId,
        assigneeAssignedAt: at,
        assigneeOpenedAt: null,
        waitingSince: null,
        updatedAt: at,
      })
    );
  }

  markOpenedByAssignee(
    conversationId: number,
    agentId: number,
    at: Date
  ): Promise<Conversation | null> {
    const conversation = this.conversations.get(conversationId);
    if (
      !conversation ||
      conversation.assigneeId !== agentId ||
      conversation.assigneeOpenedAt !== null
    ) {
      return Promise.resolve(null);
    }
    return Promise.resolve(this.write(conversation, { assigneeOpenedAt: at, updatedAt: at }));
  }

  moveToBranch(conversationId: number, branchId: number, at: Date): Promise<Conversation> {
    const conversation = this.conversations.get(conversationId);
    if (!conversation) {
      return Promise.reject(new NotFoundError('Conversation'));
    }
    return Promise.resolve(
      this.write(conversation, {
        branchId,
        assigneeId: null,
        assigneeAssignedAt: null,
        assigneeOpenedAt: null,
        updatedAt: at,
      })
    );
  }

  setLastSeen(conversationId: number, side: LastSeenSide, at: Date): Promise<void> {
    const conversation = this.conversations.get(conversationId);
    if (conversation) {
      this.write(
        conversation,
        side === 'agent' ? { agentLastSeenAt: at } : { contactLastSeenAt: at }
      );
    }
    return Promise.resolve();
  }

  countActiveByAssignee(agentIds: readonly number[]): Promise<Map<number, number>> {
    const wanted = new Set(agentIds);
    const counts = new Map<number, number>();
    for (const conversation of this.conversations.values()) {
      const { assigneeId } = conversation;
      if (assigneeId === null || !wanted.has(assigneeId) || !isActiveConversation(conversation)) {
        continue;
      }
      counts.set(assigneeId, (counts.get(assigneeId) ?? 0) + 1);
    }
    return Promise.resolve(counts);
  }

  findEscalationCandidates(query: EscalationQuery): Promise<Conversation[]> {
    const cutoff = query.assignedBefore.getTime();
    const stale = [...this.conversations.values()]
      .filter(
        (c) =>
          c.assigneeId !== null &&
          c.assigneeOpenedAt === null &&
          isActiveConversation(c) &&
          assignmentTime(c) <= cutoff
      )
      .sort((a, b) => assignmentTime(a) - assignmentTime(b) || a.id - b.id)
      .slice(0, query.limit);
    return Promise.resolve(stale.map((c) => ({ ...c })));
  }

  findResolvedBefore(cutoff: Date, limit: number): Promise<Conversation[]> {
    const resolved = [...this.conversations.values()]
      .filter(
        (c) =>
          c.status === 'resolved' && (c.lastMessageAt ?? c.createdAt).getTime() < cutoff.getTime()
      )
      .sort((a, b) => a.id - b.id)
      .slice(0, limit);
    return Promise.resolve(resolved.map((c) => ({ ...c })));
  }

  private write(conversation: Conversation, changes: Partial<Conversation>): Conversation {
    const updated: Conversation = { ...conversation, ...changes };
    this.conversations.set(conversation.id, updated);
    return { ...updated };
  }
}

function assignmentTime(conversation: Conversation): number {
  return (conversation.assigneeAssignedAt ?? conversation.createdAt).getTime();
}

// =============================================================================
// Messages
// =============================================================================

export class InMemoryMessageRepository implements MessageRepository {
  private messages: Message[] = [];
  private nextId = 1;

  create(draft: DraftMessage): Promise<Message> {
    const message: Message = { id: this.nextId++, ...draft };
    this.messages.push(message);
    return Promise.resolve({ ...message });
  }

  listAfter(conversationId: number, afterId: number, query: MessageQuery): Promise<Message[]> {
    const found = this.forConversation(conversationId, query.directions)
      .filter((m) => m.id > afterId)
      .slice(0, query.limit);
    return Promise.resolve(found);
  }

  listLatest(conversationId: number, query: MessageQuery): Promise<Message[]> {
    const all = this.forConversation(conversationId, query.directions);
    return Promise.resolve(all.slice(Math.max(0, all.length - query.limit)));
  }

  countSince(conversationId: number, direction: MessageDirection, since: Date): Promise<number> {
    const count = this.messages.filter(
      (m) =>
        m.conversationId === conversationId &&
        m.direction === direction &&
        m.createdAt.getTime() >= since.getTime()
    ).length;
    return Promise.resolve(count);
  }

  private forConversation(
    conversationId: number,
    directions: readonly MessageDirection[]
  ): Message[] {
    return this.messages
      .filter((m) => m.conversationId === conversationId && directions.includes(m.direction))
      .sort((a, b) => a.id - b.id)
      .map((m) => ({ ...m }));
  }
}
