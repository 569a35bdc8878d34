import { describe, it, expect, beforeEach } from 'vitest';
import { ForbiddenError, NotFoundError } from '@chatrouter/core';

import type { AssigneeChangedPayload } from '../events.js';
import {
  T0,
  createRoutingWorld,
  createTestAgent,
  createTestConversation,
  type RoutingWorld,
} from './fixtures/routing-world.js';

describe('BranchTransferService', () => {
  let world: RoutingWorld;

  beforeEach(async () => {
    world = createRoutingWorld({ agents: [1], inbox: { branchId: null } });
    world.agents.addAgent(createTestAgent(2, { branchId: 20 }));
    await world.setOnline(1, 2);
    world.conversations.add(
      createTestConversation({
        id: 5,
        assigneeId: 1,
        assigneeAssignedAt: T0,
        assigneeOpenedAt: T0,
      })
    );
  });

  it('should move the conversation and assign it within the new branch', async () => {
    const result = await world.branchTransfer.transfer(5, 20);

    expect(result.assigned).toBe(true);
    expect(result.conversation).toMatchObject({
      id: 5,
      branchId: 20,
      assigneeId: 2,
      assigneeOpenedAt: null,
    });
  });

  it('should announce the dropped assignee before the new one', async () => {
    const changes: AssigneeChangedPayload[] = [];
    world.events.subscribe('assignee.changed', (event) => {
      changes.push(event.payload);
    });

    await world.branchTransfer.transfer(5, 20, { correlationId: 'req-1' });

    expect(changes.map((change) => [change.reason, change.previousAssigneeId])).toEqual([
      ['branch_transfer', 1],
      ['auto_assignment', null],
    ]);
    expect(changes[0]?.conversation.assigneeId).toBeNull();
  });

  it('should leave the conversation unassigned when the branch has nobody online', async () => {
    await world.presence.markOffline(2);

    const result = await world.branchTransfer.transfer(5, 20);

    expect(result.assigned).toBe(false);
    expect(result.conversation).toMatchObject({ branchId: 20, assigneeId: null });
  });

  it('should refuse conversations of a branch inbox', async () => {
    const pinned = createRoutingWorld({ agents: [1] });
    pinned.conversations.add(createTestConversation({ id: 5 }));

    await expect(pinned.branchTransfer.transfer(5, 20)).rejects.toMatchObject({
      code: 'INBOX_HAS_BRANCH',
    });
    expect((await pinned.conversations.findById(5))?.branchId).toBe(10);
  });

  it('should refuse finished conversations', async () => {
    world.conversations.add(createTestConversation({ id: 6, contactId: 2, status: 'resolved' }));

    await expect(world.branchTransfer.transfer(6, 20)).rejects.toBeInstanceOf(ForbiddenError);
  });

  it('should reject unknown conversations', async () => {
    await expect(world.branchTransfer.transfer(404, 20)).rejects.toBeInstanceOf(NotFoundError);
  });
});
