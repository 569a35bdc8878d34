import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { adminHeaders, agentHeaders, createTestApp, WIDGET_TOKEN, type TestApp } from './test-app.js';

const T0 = new Date('2026-03-02T10:00:00.000Z');

describe('Admin Routes', () => {
  let testApp: TestApp;
  let now: Date;

  beforeEach(async () => {
    now = T0;
    testApp = await createTestApp({ clock: () => now });
  });

  afterEach(async () => {
    await testApp.app.close();
  });

  it('should refuse agent keys', async () => {
    const response = await testApp.app.inject({
      method: 'GET',
      url: '/admin/inboxes/1/queue',
      headers: agentHeaders(1),
    });

    expect(response.statusCode).toBe(403);
    expect(response.json()).toEqual({
      code: 'INSUFFICIENT_ROLE',
      message: "Role 'agent' does not have permission to access this resource",
      statusCode: 403,
    });
  });

  // ==========================================================================
  // Queue management
  // ==========================================================================

  describe('queue', () => {
    it('should report an empty queue before any rotation', async () => {
      const response = await testApp.app.inject({
        method: 'GET',
        url: '/admin/inboxes/1/queue',
        headers: adminHeaders,
      });

      expect(response.json()).toEqual({ inbox_id: 1, agent_ids: [] });
    });

    it('should reset, extend and shrink the rotation', async () => {
      const reset = await testApp.app.inject({
        method: 'PUT',
        url: '/admin/inboxes/1/queue',
        headers: adminHeaders,
        payload: { member_ids: [3, 1, 3, 2] },
      });
      expect(reset.json()).toEqual({ inbox_id: 1, agent_ids: [3, 1, 2] });

      const added = await testApp.app.inject({
        method: 'POST',
        url: '/admin/inboxes/1/queue/agents',
        headers: adminHeaders,
        payload: { agent_id: 5 },
      });
      expect(added.json()).toEqual({ inbox_id: 1, agent_ids: [3, 1, 2, 5] });

      const removed = await testApp.app.inject({
        method: 'DELETE',
        url: '/admin/inboxes/1/queue/agents/1',
        headers: adminHeaders,
      });
      expect(removed.json()).toEqual({ inbox_id: 1, agent_ids: [3, 2, 5] });
    });

    it('should reject a malformed member list', async () => {
      const response = await testApp.app.inject({
        method: 'PUT',
        url: '/admin/inboxes/1/queue',
        headers: adminHeaders,
        payload: { member_ids: ['a'] },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        code: 'VALIDATION_ERROR',
        message: 'Invalid queue payload',
      });
    });
  });

  // ==========================================================================
  // Escalation
  // ==========================================================================

  describe('escalations', () => {
    /** Agents 2 and 3 online; the new conversation goes to agent 2 at T0 */
    async function assignedConversation(): Promise<void> {
      await testApp.container.presence.setStatus(2, 'online');
      await testApp.container.presence.setStatus(3, 'online');
      await testApp.app.inject({
        method: 'POST',
        url: '/widget/bootstrap',
        payload: { widget_token: WIDGET_TOKEN, contact_external_id: 'visitor-1' },
      });
      await testApp.container.events.drain();
    }

    function runEscalation(payload: Record<string, unknown>) {
      return testApp.app.inject({
        method: 'POST',
        url: '/admin/escalations/run',
        headers: adminHeaders,
        payload,
      });
    }

    it('should leave conversations inside the timeout alone', async () => {
      await assignedConversation();
      now = new Date(T0.getTime() + 60_000);

      const response = await runEscalation({});

      expect(response.json()).toEqual({
        timeout_seconds: 240,
        dry_run: false,
        scanned: 0,
        candidates: [],
        reassigned: [],
        skipped: [],
      });
    });

    it('should hand an unopened conversation to the next agent', async () => {
      await assignedConversation();
      now = new Date(T0.getTime() + 241_000);

      const response = await runEscalation({});

      const moved = { conversation_id: 1, from_agent_id: 2, to_agent_id: 3 };
      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        timeout_seconds: 240,
        dry_run: false,
        scanned: 1,
        candidates: [moved],
        reassigned: [moved],
        skipped: [],
      });

      const conversation = await testApp.container.repositories.conversations.findById(1);
      expect(conversation?.assigneeId).toBe(3);
      expect(conversation?.assigneeAssignedAt).toEqual(now);
    });

    it('should only report in a dry run', async () => {
      await assignedConversation();
      now = new Date(T0.getTime() + 241_000);

      const response = await runEscalation({ dry_run: true });

      expect(response.json()).toMatchObject({
        dry_run: true,
        scanned: 1,
        candidates: [{ conversation_id: 1, from_agent_id: 2, to_agent_id: 3 }],
        reassigned: [],
      });
      const conversation = await testApp.container.repositories.conversations.findById(1);
      expect(conversation?.assigneeId).toBe(2);
      expect(await testApp.container.queue.current(1)).toEqual([1, 3, 2]);
    });

    it('should honour a shorter timeout from the request', async () => {
      await assignedConversation();
      now = new Date(T0.getTime() + 61_000);

      const response = await runEscalation({ timeout_seconds: 60, dry_run: true });

      expect(response.json()).toMatchObject({ timeout_seconds: 60, scanned: 1 });
    });

    it('should skip when nobody else is available', async () => {
      await assignedConversation();
      await testApp.container.presence.setStatus(3, 'offline');
      now = new Date(T0.getTime() + 241_000);

      const response = await runEscalation({});

      expect(response.json()).toMatchObject({
        scanned: 1,
        reassigned: [],
        skipped: [{ conversation_id: 1, reason: 'no_candidate' }],
      });
    });
  });
});
