/**
 * Round-Robin Queue
 *
 * One ordered list of agent IDs per inbox, kept in the shared store so every
 * worker rotates the same queue. A pick moves the agent to the tail; agents
 * filtered out of a pick keep their place and so come up again first.
 */

import {
  ConcurrencyError,
  createLogger,
  optimisticUpdate,
  type ServiceLogger,
  type SharedStore,
} from '@chatrouter/core';

import type { AgentDirectory } from '../conversations/repositories.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Rotation state for every inbox
 */
export interface QueueStore {
  /** Pick the first allowed agent and rotate it to the tail */
  next(inboxId: number, allowedAgentIds: Iterable<number>): Promise<number | null>;
  /** The agent `next` would pick, without rotating */
  peek(inboxId: number, allowedAgentIds: Iterable<number>): Promise<number | null>;
  add(inboxId: number, agentId: number): Promise<void>;
  remove(inboxId: number, agentId: number): Promise<void>;
  reset(inboxId: number, memberIds: readonly number[]): Promise<void>;
  current(inboxId: number): Promise<number[]>;
}

export interface RoundRobinQueueOptions {
  /** Expiry of the stored list (default: 7 days) */
  ttlSeconds?: number;
  /** Compare-and-swap attempts per operation (default: 5) */
  maxAttempts?: number;
  logger?: ServiceLogger;
}

const DEFAULT_TTL_SECONDS = 7 * 24 * 60 * 60;

export function queueKey(inboxId: number): string {
  return `rr:queue:${inboxId}`;
}

// =============================================================================
// Ordering
// =============================================================================

export interface Rotation {
  order: number[];
  rebuilt: boolean;
  pick: number | null;
}

/**
 * Parse a stored queue; anything that is not an array of integers counts as missing
 */
export function parseQueue(raw: string | null): number[] | null {
  if (raw === null) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    if (Array.isArray(parsed) && parsed.every((id) => Number.isInteger(id))) {
      return parsed.filter((id): id is number => typeof id === 'number');
    }
  } catch {
    return null;
  }
  return null;
}

function sameMembers(order: readonly number[], eligible: ReadonlySet<number>): boolean {
  if (order.length !== eligible.size || new Set(order).size !== order.length) return false;
  return order.every((id) => eligible.has(id));
}

function dedupe(ids: Iterable<number>): number[] {
  return [...new Set(ids)];
}

/**
 * Work out the next pick against the stored order, rebuilding it from the
 * eligible set in ascending order when the members have drifted
 */
export function rotate(
  stored: readonly number[] | null,
  eligibleIds: readonly number[],
  allowed: ReadonlySet<number>
): Rotation {
  const eligible = new Set(eligibleIds);
  const intact = stored !== null && sameMembers(stored, eligible);
  const rebuilt = !intact;
  const order = stored !== null && intact ? [...stored] : [...eligible].sort((a, b) => a - b);

  const pick = order.find((id) => allowed.has(id)) ?? null;
  if (pick === null) {
    return { order, rebuilt, pick };
  }

  return { order: [...order.filter((id) => id !== pick), pick], rebuilt, pick };
}

// =============================================================================
// Queue
// =============================================================================

export class RoundRobinQueue implements QueueStore {
  private readonly ttlSeconds: number;
  private readonly maxAttempts: number;
  private readonly logger: ServiceLogger;

  constructor(
    private readonly store: SharedStore,
    private readonly agents: AgentDirectory,
    options: RoundRobinQueueOptions = {}
  ) {
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_TTL_SECONDS;
    this.maxAttempts = options.maxAttempts ?? 5;
    this.logger = options.logger ?? createLogger({ name: 'round-robin-queue' });
  }

  async next(inboxId: number, allowedAgentIds: Iterable<number>): Promise<number | null> {
    const allowed = new Set(allowedAgentIds);
    const eligible = await this.agents.listEligibleAgentIds(inboxId);

    try {
      return await optimisticUpdate(
        this.store,
        queueKey(inboxId),
        (current) => {
          const rotation = rotate(parseQueue(current), eligible, allowed);
          const changed = rotation.pick !== null || rotation.rebuilt;
          return {
            next: changed ? JSON.stringify(rotation.order) : null,
            result: rotation.pick,
          };
        },
        { ttlSeconds: this.ttlSeconds, maxAttempts: this.maxAttempts }
      );
    } catch (error) {
      if (error instanceof ConcurrencyError) {
        this.logger.warn(
          { inboxId, attempts: this.maxAttempts },
          'Round-robin pick lost every compare-and-swap'
        );
        return null;
      }
      throw error;
    }
  }

  async peek(inboxId: number, allowedAgentIds: Iterable<number>): Promise<number | null> {
    const eligible = await this.agents.listEligibleAgentIds(inboxId);
    const stored = parseQueue(await this.store.get(queueKey(inboxId)));
    return rotate(stored, eligible, new Set(allowedAgentIds)).pick;
  }

  async add(inboxId: number, agentId: number): Promise<void> {
    await this.update(inboxId, (order) => (order.includes(agentId) ? null : [...order, agentId]));
  }

  async remove(inboxId: number, agentId: number): Promise<void> {
    await this.update(inboxId, (order) =>
      order.includes(agentId) ? order.filter((id) => id !== agentId) : null
    );
  }

  async reset(inboxId: number, memberIds: readonly number[]): Promise<void> {
    await this.store.set(queueKey(inboxId), JSON.stringify(dedupe(memberIds)), {
      ttlSeconds: this.ttlSeconds,
    });
    this.logger.info({ inboxId, members: memberIds.length }, 'Round-robin queue reset');
  }

  async current(inboxId: number): Promise<number[]> {
    return parseQueue(await this.store.get(queueKey(inboxId))) ?? [];
  }

  private async update(
    inboxId: number,
    change: (order: number[]) => number[] | null
  ): Promise<void> {
    await optimisticUpdate(
      this.store,
      queueKey(inboxId),
      (current) => {
        const next = change(parseQueue(current) ?? []);
        return { next: next === null ? null : JSON.stringify(next), result: undefined };
      },
      { ttlSeconds: this.ttlSeconds, maxAttempts: this.maxAttempts }
    );
  }
}
