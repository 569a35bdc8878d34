import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DatabaseOperationError, NotFoundError } from '@chatrouter/core';

import { createPostgresRepositories } from '../repositories/index.js';
import type { ConversationRow, MessageRow } from '../repositories/rows.js';

const T0 = new Date('2024-05-01T09:00:00.000Z');

function result<T>(...rows: T[]) {
  return { rows, rowCount: rows.length };
}

function conversationRow(overrides: Partial<ConversationRow> = {}): ConversationRow {
  return {
    id: 42,
    inbox_id: 1,
    contact_id: 3,
    branch_id: 10,
    region_id: null,
    status: 'open',
    assignee_id: null,
    assignee_assigned_at: null,
    assignee_opened_at: null,
    waiting_since: null,
    first_reply_at: null,
    last_message_at: null,
    agent_last_seen_at: null,
    contact_last_seen_at: null,
    created_at: T0,
    updated_at: T0,
    ...overrides,
  };
}

function messageRow(overrides: Partial<MessageRow> = {}): MessageRow {
  return {
    id: 7,
    conversation_id: 42,
    direction: 'out',
    sender_contact_id: null,
    sender_agent_id: 5,
    body: 'Hello!',
    created_at: T0,
    ...overrides,
  };
}

describe('Postgres repositories', () => {
  let db: { query: ReturnType<typeof vi.fn> };
  let repos: ReturnType<typeof createPostgresRepositories>;

  beforeEach(() => {
    db = { query: vi.fn().mockResolvedValue(result()) };
    repos = createPostgresRepositories(db);
  });

  function lastCall(): { sql: string; params: unknown[] } {
    const call = db.query.mock.calls.at(-1);
    return { sql: String(call?.[0]), params: Array.isArray(call?.[1]) ? call[1] : [] };
  }

  describe('PostgresInboxRepository', () => {
    it('should map the row and its allowed domains', async () => {
      db.query.mockResolvedValueOnce(
        result({
          id: 1,
          name: 'Website chat',
          branch_id: 10,
          widget_token: 'widget-test-token',
          is_active: true,
          settings: { security: { allowed_domains: ['*.shop.test'] }, theme: 'dark' },
        })
      );

      const inbox = await repos.inboxes.findActiveByWidgetToken('widget-test-token');

      expect(inbox).toEqual({
        id: 1,
        name: 'Website chat',
        branchId: 10,
        widgetToken: 'widget-test-token',
        isActive: true,
        settings: { security: { allowedDomains: ['*.shop.test'] } },
      });
      expect(lastCall().sql).toContain('widget_token = $1 AND is_active');
      expect(lastCall().params).toEqual(['widget-test-token']);
    });

    it('should read malformed settings as an empty allowlist', async () => {
      db.query.mockResolvedValueOnce(
        result({
          id: 1,
          name: 'Website chat',
          branch_id: null,
          widget_token: 'widget-test-token',
          is_active: true,
          settings: { security: { allowed_domains: 'example.com' } },
        })
      );

      const inbox = await repos.inboxes.findById(1);

      expect(inbox?.settings.security.allowedDomains).toEqual([]);
    });

    it('should return null when no inbox matches', async () => {
      expect(await repos.inboxes.findById(99)).toBeNull();
    });

    it('should map auto-reply and webhook settings', async () => {
      db.query.mockResolvedValueOnce(
        result({
          id: 1,
          name: 'Website chat',
          branch_id: null,
          widget_token: 'widget-test-token',
          is_active: true,
          settings: {
            automation: { auto_reply: { enabled: true, body: '  Hi there!  ' } },
            integrations: {
              webhook: {
                enabled: true,
                url: ' https://hooks.example.test/chat ',
                secret: 'test-secret',
                events: ['message.in'],
              },
            },
          },
        })
      );

      const inbox = await repos.inboxes.findById(1);

      expect(inbox?.settings).toEqual({
        security: { allowedDomains: [] },
        autoReply: { enabled: true, body: 'Hi there!' },
        webhook: {
          enabled: true,
          url: 'https://hooks.example.test/chat',
          secret: 'test-secret',
          events: ['message.in'],
        },
      });
    });

    it('should ignore a webhook without a URL', async () => {
      db.query.mockResolvedValueOnce(
        result({
          id: 1,
          name: 'Website chat',
          branch_id: 10,
          widget_token: 'widget-test-token',
          is_active: true,
          settings: { integrations: { webhook: { enabled: true, url: '  ' } } },
        })
      );

      const inbox = await repos.inboxes.findById(1);

      expect(inbox?.settings).toEqual({ security: { allowedDomains: [] } });
    });
  });

  describe('PostgresRoutingRuleRepository', () => {
    it('should aggregate rule regions and order by priority', async () => {
      db.query.mockResolvedValueOnce(
        result(
          {
            id: 3,
            name: 'North',
            inbox_id: 1,
            branch_id: 20,
            region_ids: [4, 5],
            priority: 10,
            is_fallback: false,
            is_active: true,
          },
          {
            id: 4,
            name: 'Everyone else',
            inbox_id: 1,
            branch_id: 30,
            region_ids: null,
            priority: 100,
            is_fallback: true,
            is_active: true,
          }
        )
      );

      const rules = await repos.routingRules.listActiveForInbox(1);

      expect(rules).toEqual([
        {
          id: 3,
          name: 'North',
          inboxId: 1,
          branchId: 20,
          regionIds: [4, 5],
          priority: 10,
          isFallback: false,
          isActive: true,
        },
        {
          id: 4,
          name: 'Everyone else',
          inboxId: 1,
          branchId: 30,
          regionIds: [],
          priority: 100,
          isFallback: true,
          isActive: true,
        },
      ]);
      expect(lastCall().sql).toContain('LEFT JOIN routing_rule_regions rr ON rr.rule_id = r.id');
      expect(lastCall().sql).toContain('ORDER BY r.priority ASC, r.id ASC');
      expect(lastCall().params).toEqual([1]);
    });
  });

  describe('PostgresAgentDirectory', () => {
    it('should list the pool of an inbox in ID order', async () => {
      db.query.mockResolvedValueOnce(result({ id: 2 }, { id: 5 }));

      expect(await repos.agents.listEligibleAgentIds(1)).toEqual([2, 5]);
      expect(lastCall().sql).toContain(
        'JOIN inboxes i ON i.branch_id IS NULL OR i.branch_id = a.branch_id'
      );
      expect(lastCall().sql).toContain("a.role <> 'admin'");
      expect(lastCall().sql).toContain('ORDER BY a.id ASC');
    });

    it('should filter active agents by branch only when one is given', async () => {
      await repos.agents.listActiveAgentIds();
      expect(lastCall().params).toEqual([]);

      await repos.agents.listActiveAgentIds(10);
      expect(lastCall().params).toEqual([10]);
      expect(lastCall().sql).toContain('branch_id = $1');
    });

    it('should map the data scope and narrow unknown ones to self', async () => {
      db.query
        .mockResolvedValueOnce(
          result({ id: 5, branch_id: 10, role: 'agent', data_scope: 'branch', is_active: true })
        )
        .mockResolvedValueOnce(
          result({ id: 6, branch_id: 10, role: 'agent', data_scope: 'team', is_active: true })
        );

      expect(await repos.agents.findAgent(5)).toEqual({
        id: 5,
        branchId: 10,
        role: 'agent',
        dataScope: 'branch',
        isActive: true,
      });
      expect((await repos.agents.findAgent(6))?.dataScope).toBe('self');
    });

    it('should upsert the profile status', async () => {
      db.query.mockResolvedValueOnce(result({ agent_id: 5, status: 'online', updated_at: T0 }));

      const profile = await repos.agents.saveStatus(5, 'online', T0);

      expect(profile).toEqual({ agentId: 5, status: 'online', updatedAt: T0 });
      expect(lastCall().sql).toContain('ON CONFLICT (agent_id) DO UPDATE');
      expect(lastCall().params).toEqual([5, 'online', T0]);
    });

    it('should read an unknown stored status as offline', async () => {
      db.query.mockResolvedValueOnce(result({ agent_id: 5, status: 'lunch', updated_at: T0 }));

      expect(await repos.agents.getProfile(5)).toEqual({
        agentId: 5,
        status: 'offline',
        updatedAt: T0,
      });
    });

    it('should fail when the upsert returns nothing', async () => {
      await expect(repos.agents.saveStatus(5, 'online', T0)).rejects.toBeInstanceOf(
        DatabaseOperationError
      );
    });
  });

  describe('PostgresContactRepository', () => {
    it('should match email case-insensitively', async () => {
      await repos.contacts.findByEmail('Visitor@Example.com');

      expect(lastCall().sql).toContain('LOWER(email) = LOWER($1)');
      expect(lastCall().params).toEqual(['Visitor@Example.com']);
    });

    it('should write only the patched fields', async () => {
      db.query.mockResolvedValueOnce(
        result({
          id: 3,
          external_id: 'visitor-1',
          name: 'Ana',
          email: null,
          phone: '+40700000000',
          created_at: T0,
          updated_at: T0,
        })
      );

      const contact = await repos.contacts.update(3, { name: 'Ana', phone: '+40700000000' }, T0);

      expect(contact.name).toBe('Ana');
      expect(lastCall().sql).toContain('SET updated_at = $2, name = $3, phone = $4');
      expect(lastCall().params).toEqual([3, T0, 'Ana', '+40700000000']);
    });

    it('should raise NotFoundError when updating a missing contact', async () => {
      await expect(repos.contacts.update(3, { name: 'Ana' }, T0)).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });

  describe('PostgresConversationRepository', () => {
    it('should map every column', async () => {
      db.query.mockResolvedValueOnce(
        result(conversationRow({ assignee_id: 7, assignee_assigned_at: T0, status: 'pending' }))
      );

      expect(await repos.conversations.findById(42)).toEqual({
        id: 42,
        inboxId: 1,
        contactId: 3,
        branchId: 10,
        regionId: null,
        status: 'pending',
        assigneeId: 7,
        assigneeAssignedAt: T0,
        assigneeOpenedAt: null,
        waitingSince: null,
        firstReplyAt: null,
        lastMessageAt: null,
        agentLastSeenAt: null,
        contactLastSeenAt: null,
        createdAt: T0,
        updatedAt: T0,
      });
    });

    it('should set the assignee only while the expected one still holds', async () => {
      const at = new Date('2024-05-01T09:05:00.000Z');
      db.query.mockResolvedValueOnce(
        result(conversationRow({ assignee_id: 9, assignee_assigned_at: at, updated_at: at }))
      );

      const updated = await repos.conversations.compareAndSetAssignee(42, 7, 9, at);

      expect(updated).toMatchObject({ assigneeId: 9, assigneeAssignedAt: at });
      expect(lastCall().sql).toContain('assignee_id IS NOT DISTINCT FROM $2::integer');
      expect(lastCall().sql).toContain('assignee_opened_at = NULL');
      expect(lastCall().sql).not.toContain('AND assignee_opened_at IS NULL');
      expect(lastCall().params).toEqual([42, 7, 9, at]);
    });

    it('should require an unopened assignment when asked to', async () => {
      await repos.conversations.compareAndSetAssignee(42, 7, 9, T0, { requireUnopened: true });

      expect(lastCall().sql).toContain(
        'WHERE id = $1 AND assignee_id IS NOT DISTINCT FROM $2::integer AND assignee_opened_at IS NULL'
      );
    });

    it('should stamp the open only for the current assignee', async () => {
      const at = new Date('2024-05-01T09:02:00.000Z');
      db.query.mockResolvedValueOnce(
        result(conversationRow({ assignee_id: 7, assignee_opened_at: at, updated_at: at }))
      );

      const opened = await repos.conversations.markOpenedByAssignee(42, 7, at);

      expect(opened?.assigneeOpenedAt).toEqual(at);
      expect(lastCall().sql).toContain(
        'WHERE id = $1 AND assignee_id = $2 AND assignee_opened_at IS NULL'
      );
      expect(lastCall().params).toEqual([42, 7, at]);
    });

    it('should report an open by a former assignee as null', async () => {
      expect(await repos.conversations.markOpenedByAssignee(42, 7, T0)).toBeNull();
    });

    it('should drop the assignment when moving to another branch', async () => {
      db.query.mockResolvedValueOnce(result(conversationRow({ branch_id: 20 })));

      const moved = await repos.conversations.moveToBranch(42, 20, T0);

      expect(moved.branchId).toBe(20);
      expect(lastCall().sql).toContain('assignee_id = NULL');
      expect(lastCall().params).toEqual([42, 20, T0]);
    });

    it('should write the last-seen column of the given side', async () => {
      await repos.conversations.setLastSeen(42, 'contact', T0);

      expect(lastCall().sql).toBe(
        'UPDATE conversations SET contact_last_seen_at = $2 WHERE id = $1'
      );
      expect(lastCall().params).toEqual([42, T0]);
    });

    it('should count open conversations per assignee', async () => {
      db.query.mockResolvedValueOnce(
        result({ assignee_id: 7, open_count: '3' }, { assignee_id: 9, open_count: '1' })
      );

      const counts = await repos.conversations.countActiveByAssignee([7, 8, 9]);

      expect([...counts]).toEqual([
        [7, 3],
        [9, 1],
      ]);
      expect(lastCall().params).toEqual([[7, 8, 9]]);
    });

    it('should not query load for no agents', async () => {
      expect((await repos.conversations.countActiveByAssignee([])).size).toBe(0);
      expect(db.query).not.toHaveBeenCalled();
    });

    it('should report a lost compare-and-set as null', async () => {
      expect(await repos.conversations.compareAndSetAssignee(42, null, 9, T0)).toBeNull();
      expect(lastCall().params).toEqual([42, null, 9, T0]);
    });

    it('should build the patch from defined fields, keeping explicit nulls', async () => {
      db.query.mockResolvedValueOnce(result(conversationRow()));

      await repos.conversations.update(42, { waitingSince: null, lastMessageAt: T0 }, T0);

      expect(lastCall().sql).toContain('SET updated_at = $2, waiting_since = $3, last_message_at = $4');
      expect(lastCall().params).toEqual([42, T0, null, T0]);
    });

    it('should query stale unopened assignments oldest first', async () => {
      const cutoff = new Date('2024-05-01T08:56:00.000Z');
      db.query.mockResolvedValueOnce(result(conversationRow({ id: 1 }), conversationRow({ id: 2 })));

      const found = await repos.conversations.findEscalationCandidates({
        assignedBefore: cutoff,
        limit: 500,
      });

      expect(found.map((c) => c.id)).toEqual([1, 2]);
      expect(lastCall().sql).toContain('assignee_opened_at IS NULL');
      expect(lastCall().sql).toContain('COALESCE(assignee_assigned_at, created_at) <= $1');
      expect(lastCall().params).toEqual([cutoff, 500]);
    });
  });

  describe('PostgresMessageRepository', () => {
    it('should insert a draft and map the returned row', async () => {
      db.query.mockResolvedValueOnce(result(messageRow()));

      const message = await repos.messages.create({
        conversationId: 42,
        direction: 'out',
        senderContactId: null,
        senderAgentId: 5,
        body: 'Hello!',
        createdAt: T0,
      });

      expect(message).toEqual({
        id: 7,
        conversationId: 42,
        direction: 'out',
        senderContactId: null,
        senderAgentId: 5,
        body: 'Hello!',
        createdAt: T0,
      });
      expect(lastCall().params).toEqual([42, 'out', null, 5, 'Hello!', T0]);
    });

    it('should page after a cursor by direction', async () => {
      await repos.messages.listAfter(42, 7, { directions: ['out'], limit: 50 });

      expect(lastCall().sql).toContain('id > $2 AND direction = ANY($3::text[])');
      expect(lastCall().params).toEqual([42, 7, ['out'], 50]);
    });

    it('should take the newest rows and return them ascending', async () => {
      await repos.messages.listLatest(42, { directions: ['out'], limit: 10 });

      const { sql } = lastCall();
      expect(sql.indexOf('ORDER BY id DESC')).toBeLessThan(sql.lastIndexOf('ORDER BY id ASC'));
      expect(lastCall().params).toEqual([42, ['out'], 10]);
    });

    it('should parse the count', async () => {
      db.query.mockResolvedValueOnce(result({ count: '12' }));

      expect(await repos.messages.countSince(42, 'in', T0)).toBe(12);
      expect(lastCall().params).toEqual([42, 'in', T0]);
    });
  });
});
