import type { AgentDirectory, ConversationRepository } from '../conversations/repositories.js';
import type { RateLimiter } from './assignment-rate-limiter.js';
import type { PresenceStore } from './presence-tracker.js';

export interface CandidateSources {
  agents: AgentDirectory;
  conversations: ConversationRepository;
  presence: PresenceStore;
  rateLimiter: RateLimiter;
}

/**
 * Active agents of the conversation's branch that are online and below their
 * assignment limit, least loaded first with ties broken by ID. A conversation
 * without a branch has no candidates, and there is no fallback to blocked or
 * offline agents.
 */
export async function selectAssignableAgents(
  sources: CandidateSources,
  branchId: number | null,
  excludeAgentId: number | null = null
): Promise<number[]> {
  if (branchId === null) {
    return [];
  }

  const eligible = (await sources.agents.listActiveAgentIds(branchId)).filter(
    (id) => id !== excludeAgentId
  );
  if (eligible.length === 0) {
    return [];
  }

  const online = await sources.presence.onlineAgentIds();
  const present = eligible.filter((id) => online.has(id));

  const allowed = await Promise.all(present.map((id) => sources.rateLimiter.checkLimit(id)));
  const candidates = present.filter((_, index) => allowed[index] === true);
  if (candidates.length < 2) {
    return candidates;
  }

  const load = await sources.conversations.countActiveByAssignee(candidates);
  return [...candidates].sort((a, b) => (load.get(a) ?? 0) - (load.get(b) ?? 0) || a - b);
}
