/**
 * Presence Tracker
 *
 * The agent profile is the source of truth for presence; the shared store
 * holds a short-lived cache of it so routing can ask "who is online" on every
 * message without hitting the database.
 */

import { createLogger, toError, type ServiceLogger, type SharedStore } from '@chatrouter/core';

import type { AgentDirectory } from '../conversations/repositories.js';
import { isAgentStatus, type AgentStatus } from '../conversations/types.js';
import { CHAT_EVENTS, type ChatEventBus } from '../events.js';

export interface PresenceStore {
  getStatus(agentId: number): Promise<AgentStatus | null>;
  setStatus(agentId: number, status: AgentStatus): Promise<void>;
  isOnline(agentId: number): Promise<boolean>;
  onlineAgentIds(branchId?: number): Promise<Set<number>>;
}

export interface PresenceTrackerDeps {
  store: SharedStore;
  agents: AgentDirectory;
  events: ChatEventBus;
  /** Cache expiry in seconds (default: 300) */
  ttlSeconds?: number;
  logger?: ServiceLogger;
  clock?: () => Date;
}

export function presenceKey(agentId: number): string {
  return `presence:status:${agentId}`;
}

export class PresenceTracker implements PresenceStore {
  private readonly store: SharedStore;
  private readonly agents: AgentDirectory;
  private readonly events: ChatEventBus;
  private readonly ttlSeconds: number;
  private readonly logger: ServiceLogger;
  private readonly clock: () => Date;

  constructor(deps: PresenceTrackerDeps) {
    this.store = deps.store;
    this.agents = deps.agents;
    this.events = deps.events;
    this.ttlSeconds = deps.ttlSeconds ?? 300;
    this.logger = deps.logger ?? createLogger({ name: 'presence-tracker' });
    this.clock = deps.clock ?? (() => new Date());
  }

  async getStatus(agentId: number): Promise<AgentStatus | null> {
    const key = presenceKey(agentId);

    try {
      const cached = await this.store.get(key);
      if (isAgentStatus(cached)) {
        return cached;
      }
    } catch (error) {
      this.logger.warn(
        { err: toError(error), agentId },
        'Presence cache read failed, using agent profile'
      );
      const profile = await this.agents.getProfile(agentId);
      return profile?.status ?? null;
    }

    const profile = await this.agents.getProfile(agentId);
    if (!profile) {
      return null;
    }

    await this.cache(agentId, profile.status);
    return profile.status;
  }

  async setStatus(agentId: number, status: AgentStatus): Promise<void> {
    const now = this.clock();
    await this.agents.saveStatus(agentId, status, now);
    await this.cache(agentId, status);

    this.logger.info({ agentId, status }, 'Agent presence changed');
    await this.events.dispatch(CHAT_EVENTS.agentStatusChanged, now, { agentId, status });
  }

  async isOnline(agentId: number): Promise<boolean> {
    return (await this.getStatus(agentId)) === 'online';
  }

  async onlineAgentIds(branchId?: number): Promise<Set<number>> {
    const agentIds = await this.agents.listActiveAgentIds(branchId);
    const statuses = await Promise.all(agentIds.map((id) => this.getStatus(id)));
    return new Set(agentIds.filter((_, index) => statuses[index] === 'online'));
  }

  markOnline(agentId: number): Promise<void> {
    return this.setStatus(agentId, 'online');
  }

  markAway(agentId: number): Promise<void> {
    return this.setStatus(agentId, 'away');
  }

  markBusy(agentId: number): Promise<void> {
    return this.setStatus(agentId, 'busy');
  }

  markOffline(agentId: number): Promise<void> {
    return this.setStatus(agentId, 'offline');
  }

  private async cache(agentId: number, status: AgentStatus): Promise<void> {
    try {
      await this.store.set(presenceKey(agentId), status, { ttlSeconds: this.ttlSeconds });
    } catch (error) {
      this.logger.warn({ err: toError(error), agentId }, 'Presence cache write failed');
    }
  }
}
