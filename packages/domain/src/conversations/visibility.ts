import type { Agent, Conversation } from './types.js';

/**
 * Whether the agent may see and act on the conversation
 *
 * Admins see everything. A `self`-scoped agent, or one without a branch,
 * sees only conversations assigned to them; everyone else sees their
 * branch.
 */
export function canAgentSeeConversation(
  agent: Pick<Agent, 'id' | 'role' | 'branchId' | 'dataScope' | 'isActive'>,
  conversation: Pick<Conversation, 'branchId' | 'assigneeId'>
): boolean {
  if (!agent.isActive) return false;
  if (agent.role === 'admin') return true;
  if (agent.dataScope === 'self' || agent.branchId === null) {
    return conversation.assigneeId === agent.id;
  }
  return conversation.branchId === agent.branchId;
}
