import { describe, it, expect } from 'vitest';

import { canAgentSeeConversation } from '../conversations/visibility.js';
import { createTestAgent, createTestConversation } from './fixtures/routing-world.js';

describe('canAgentSeeConversation', () => {
  const inBranch = createTestConversation({ branchId: 10, assigneeId: 7 });
  const otherBranch = createTestConversation({ branchId: 20, assigneeId: 7 });
  const unassigned = createTestConversation({ branchId: 10, assigneeId: null });

  it('should let an admin see every conversation', () => {
    const admin = createTestAgent(1, { role: 'admin', branchId: null, dataScope: 'global' });

    expect(canAgentSeeConversation(admin, otherBranch)).toBe(true);
    expect(canAgentSeeConversation(admin, unassigned)).toBe(true);
  });

  it('should limit a branch agent to their branch', () => {
    const agent = createTestAgent(3, { branchId: 10, dataScope: 'branch' });

    expect(canAgentSeeConversation(agent, inBranch)).toBe(true);
    expect(canAgentSeeConversation(agent, unassigned)).toBe(true);
    expect(canAgentSeeConversation(agent, otherBranch)).toBe(false);
  });

  it('should not widen a global-scoped agent beyond their branch', () => {
    const agent = createTestAgent(3, { branchId: 10, dataScope: 'global' });

    expect(canAgentSeeConversation(agent, otherBranch)).toBe(false);
  });

  it('should limit a self-scoped agent to conversations assigned to them', () => {
    const agent = createTestAgent(7, { branchId: 10, dataScope: 'self' });

    expect(canAgentSeeConversation(agent, otherBranch)).toBe(true);
    expect(canAgentSeeConversation(agent, unassigned)).toBe(false);
    expect(canAgentSeeConversation(createTestAgent(8, { dataScope: 'self' }), inBranch)).toBe(false);
  });

  it('should limit an agent without a branch to their own conversations', () => {
    const agent = createTestAgent(7, { branchId: null, dataScope: 'branch' });

    expect(canAgentSeeConversation(agent, inBranch)).toBe(true);
    expect(canAgentSeeConversation(agent, unassigned)).toBe(false);
  });

  it('should hide everything from an inactive agent', () => {
    const agent = createTestAgent(1, { role: 'admin', isActive: false });

    expect(canAgentSeeConversation(agent, inBranch)).toBe(false);
  });
});
