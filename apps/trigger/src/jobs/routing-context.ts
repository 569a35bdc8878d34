import { randomUUID } from 'node:crypto';

import {
  createDatabasePool,
  createRedisSharedStore,
  InMemorySharedStore,
  loadRoutingConfig,
  type DatabasePool,
  type RoutingConfig,
  type SharedStore,
} from '@chatrouter/core';
import {
  AssignmentRateLimiter,
  BranchRouter,
  ConversationService,
  EscalationScanner,
  PresenceTracker,
  RoundRobinQueue,
  createChatEventDispatcher,
} from '@chatrouter/domain';
import { createPostgresRepositories } from '@chatrouter/infrastructure';
import { logger } from '@trigger.dev/sdk/v3';

/**
 * Services a scheduled job needs, opened per run and closed when it ends
 */
export interface RoutingContext {
  config: RoutingConfig;
  escalation: EscalationScanner;
  conversations: ConversationService;
  close(): Promise<void>;
}

export type RoutingContextResult =
  | { context: RoutingContext; error: null }
  | { context: null; error: string };

export function generateCorrelationId(prefix: string): string {
  return `${prefix}_${Date.now()}_${randomUUID().slice(0, 8)}`;
}

/**
 * Open the store of record and the shared store from the environment
 *
 * Jobs act on the production data, so a missing DATABASE_URL is reported
 * instead of falling back to memory. Without REDIS_URL the rotation and
 * presence live in this process only.
 */
export function openRoutingContext(
  source: Record<string, string | undefined> = process.env
): RoutingContextResult {
  const config = loadRoutingConfig(source);

  if (!config.databaseUrl) {
    return { context: null, error: 'DATABASE_URL not configured' };
  }

  const pool: DatabasePool = createDatabasePool({ connectionString: config.databaseUrl });
  const repositories = createPostgresRepositories(pool);

  let store: SharedStore;
  if (config.redisUrl) {
    store = createRedisSharedStore({ url: config.redisUrl, keyPrefix: config.storePrefix });
  } else {
    logger.warn('REDIS_URL not configured, round-robin state is local to this run');
    store = new InMemorySharedStore();
  }

  const events = createChatEventDispatcher({ source: 'chatrouter-trigger' });
  const presence = new PresenceTracker({
    store,
    agents: repositories.agents,
    events,
    ttlSeconds: config.presence.ttlSeconds,
  });
  const rateLimiter = new AssignmentRateLimiter(store, {
    limit: config.rateLimit.limit,
    windowSeconds: config.rateLimit.windowSeconds,
  });
  const queue = new RoundRobinQueue(store, repositories.agents, {
    ttlSeconds: config.queue.ttlSeconds,
    maxAttempts: config.queue.maxAttempts,
  });

  const escalation = new EscalationScanner({
    conversations: repositories.conversations,
    agents: repositories.agents,
    presence,
    rateLimiter,
    queue,
    events,
    attemptTimeoutMs: config.escalation.attemptTimeoutMs,
  });
  const conversations = new ConversationService({
    conversations: repositories.conversations,
    messages: repositories.messages,
    contacts: repositories.contacts,
    branches: new BranchRouter({
      rules: repositories.routingRules,
      defaultBranchId: config.routing.defaultBranchId,
    }),
    events,
  });

  return {
    error: null,
    context: {
      config,
      escalation,
      conversations,
      async close() {
        await events.drain();
        await store.close();
        await pool.end();
      },
    },
  };
}
