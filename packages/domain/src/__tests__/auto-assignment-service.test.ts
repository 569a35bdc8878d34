import { describe, it, expect, beforeEach } from 'vitest';

import type { AssigneeChangedPayload } from '../events.js';
import { AutoAssignmentService } from '../routing/auto-assignment-service.js';
import type { QueueStore } from '../routing/round-robin-queue.js';
import {
  createRoutingWorld,
  createTestAgent,
  createTestConversation,
  type RoutingWorld,
} from './fixtures/routing-world.js';

describe('AutoAssignmentService', () => {
  let world: RoutingWorld;

  beforeEach(async () => {
    world = createRoutingWorld({ agents: [1, 2] });
    await world.setOnline(1, 2);
  });

  describe('assign', () => {
    it('should assign unassigned conversations in rotation', async () => {
      world.conversations.add(createTestConversation({ id: 10, contactId: 1 }));
      world.conversations.add(createTestConversation({ id: 11, contactId: 2 }));

      const first = await world.autoAssignment.assign(10);
      const second = await world.autoAssignment.assign(11);

      expect(first?.assigneeId).toBe(1);
      expect(second?.assigneeId).toBe(2);
      expect(first?.assigneeAssignedAt).toEqual(world.clock());
      expect(await world.store.get('assignment-rate:1')).toBe('1');
    });

    it('should announce the assignment', async () => {
      const changes: AssigneeChangedPayload[] = [];
      world.events.subscribe('assignee.changed', (event) => {
        changes.push(event.payload);
      });
      world.conversations.add(createTestConversation({ id: 10 }));

      await world.autoAssignment.assign(10, 'req-1');

      expect(changes).toHaveLength(1);
      expect(changes[0]?.reason).toBe('auto_assignment');
      expect(changes[0]?.previousAssigneeId).toBeNull();
    });

    it('should leave assigned or finished conversations alone', async () => {
      world.conversations.add(createTestConversation({ id: 10, assigneeId: 2 }));
      world.conversations.add(createTestConversation({ id: 11, contactId: 2, status: 'resolved' }));

      expect(await world.autoAssignment.assign(10)).toBeNull();
      expect(await world.autoAssignment.assign(11)).toBeNull();
      expect(await world.autoAssignment.assign(999)).toBeNull();
    });

    it('should skip offline agents', async () => {
      await world.presence.markOffline(1);
      world.conversations.add(createTestConversation({ id: 10 }));

      expect((await world.autoAssignment.assign(10))?.assigneeId).toBe(2);
    });

    it('should leave the conversation unassigned when every agent is rate-blocked', async () => {
      for (let i = 0; i < 10; i++) {
        await world.rateLimiter.increment(1);
        await world.rateLimiter.increment(2);
      }
      world.conversations.add(createTestConversation({ id: 10 }));

      expect(await world.autoAssignment.assign(10)).toBeNull();
      expect((await world.conversations.findById(10))?.assigneeId).toBeNull();
    });

    it('should only pick agents of the conversation branch', async () => {
      world.agents.addAgent(createTestAgent(3, { branchId: 20 }));
      await world.setOnline(3);
      world.conversations.add(createTestConversation({ id: 10, branchId: 20 }));

      expect((await world.autoAssignment.assign(10))?.assigneeId).toBe(3);
    });

    it('should leave a conversation without a branch unassigned', async () => {
      world.conversations.add(createTestConversation({ id: 10, branchId: null }));

      expect(await world.autoAssignment.assign(10)).toBeNull();
      expect(world.logger.debug).toHaveBeenCalledWith(
        { conversationId: 10, inboxId: 1, branchId: null },
        'No assignable agent available'
      );
    });

    it('should log queue failures and leave the conversation unassigned', async () => {
      const brokenQueue: QueueStore = {
        next: () => Promise.reject(new Error('store unavailable')),
        peek: () => Promise.resolve(null),
        add: () => Promise.resolve(),
        remove: () => Promise.resolve(),
        reset: () => Promise.resolve(),
        current: () => Promise.resolve([]),
      };
      const service = new AutoAssignmentService({ ...world.routingDeps, queue: brokenQueue });
      world.conversations.add(createTestConversation({ id: 10 }));

      expect(await service.assign(10)).toBeNull();
      expect(world.logger.error).toHaveBeenCalledWith(
        expect.objectContaining({ conversationId: 10, inboxId: 1 }),
        'Round-robin queue unavailable, conversation left unassigned'
      );
    });
  });

  describe('registerListeners', () => {
    it('should assign new conversations after the dispatch returns', async () => {
      world.autoAssignment.registerListeners();
      const contact = await world.conversationService.upsertContact({ externalId: 'visitor-1' });

      const { conversation } = await world.conversationService.findOrCreateActiveConversation(
        world.inbox,
        contact.id
      );
      expect(conversation.assigneeId).toBeNull();

      await world.events.drain();

      expect((await world.conversations.findById(conversation.id))?.assigneeId).toBe(1);
    });

    it('should assign on an inbound message to an unassigned conversation', async () => {
      world.autoAssignment.registerListeners();
      world.conversations.add(createTestConversation({ id: 10 }));

      await world.conversationService.recordMessage({
        conversationId: 10,
        direction: 'in',
        body: 'Hello?',
        senderContactId: 1,
      });
      await world.events.drain();

      expect((await world.conversations.findById(10))?.assigneeId).toBe(1);
    });

    it('should stop assigning once unsubscribed', async () => {
      const unsubscribe = world.autoAssignment.registerListeners();
      unsubscribe();
      world.conversations.add(createTestConversation({ id: 10 }));

      await world.conversationService.recordMessage({
        conversationId: 10,
        direction: 'in',
        body: 'Hello?',
        senderContactId: 1,
      });
      await world.events.drain();

      expect((await world.conversations.findById(10))?.assigneeId).toBeNull();
      expect(world.events.listenerCount('message.created')).toBe(0);
    });
  });
});
