/**
 * Service container
 *
 * Builds the process-wide dispatcher, shared store and store of record once
 * and hands the same instances to every route. Redis and PostgreSQL are used
 * when their URLs are configured; otherwise everything runs in memory with
 * the development inbox pre-loaded. Region lookup needs the regions table,
 * so visitors are only placed by region when PostgreSQL is configured.
 */

import {
  InMemorySharedStore,
  createDatabasePool,
  createLogger,
  createRedisSharedStore,
  type DatabasePool,
  type EventDispatcher,
  type ServiceLogger,
  type SharedStore,
} from '@chatrouter/core';
import {
  AbuseThrottle,
  AssignmentRateLimiter,
  AutoAssignmentService,
  AutoReplyResponder,
  BranchRouter,
  BranchTransferService,
  CaptchaService,
  ConversationService,
  EscalationScanner,
  InMemoryAgentDirectory,
  InMemoryContactRepository,
  InMemoryConversationRepository,
  InMemoryInboxRepository,
  InMemoryMessageRepository,
  InMemoryRoutingRuleRepository,
  LastSeenTracker,
  PresenceTracker,
  RoundRobinQueue,
  TypingIndicator,
  WidgetGateway,
  WidgetSessionStore,
  createChatEventDispatcher,
  type AgentDirectory,
  type ChatEventMap,
  type ContactRepository,
  type ConversationRepository,
  type InboxRepository,
  type MessageRepository,
  type RegionLocator,
  type RoutingRuleRepository,
} from '@chatrouter/domain';
import {
  DEV_BRANCH_ID,
  DEV_WIDGET_TOKEN,
  GeoIpRegionLocator,
  WebhookNotifier,
  createPostgresRepositories,
} from '@chatrouter/infrastructure';

import type { ApiConfig } from './config.js';

export interface Repositories {
  inboxes: InboxRepository;
  routingRules: RoutingRuleRepository;
  agents: AgentDirectory;
  contacts: ContactRepository;
  conversations: ConversationRepository;
  messages: MessageRepository;
}

export interface ContainerOverrides {
  store?: SharedStore;
  repositories?: Repositories;
  logger?: ServiceLogger;
  clock?: () => Date;
}

export interface Container {
  store: SharedStore;
  repositories: Repositories;
  /** Pool behind the Postgres repositories; null when running in memory */
  database: DatabasePool | null;
  events: EventDispatcher<ChatEventMap>;
  presence: PresenceTracker;
  rateLimiter: AssignmentRateLimiter;
  queue: RoundRobinQueue;
  conversations: ConversationService;
  autoAssignment: AutoAssignmentService;
  escalation: EscalationScanner;
  branchTransfer: BranchTransferService;
  typing: TypingIndicator;
  lastSeen: LastSeenTracker;
  widget: WidgetGateway;
  close(): Promise<void>;
}

/**
 * In-memory store of record holding the same inbox and agents as the
 * development seed
 */
export function createDevelopmentRepositories(): Repositories {
  const inboxes = new InMemoryInboxRepository([
    {
      id: 1,
      name: 'Website chat',
      branchId: DEV_BRANCH_ID,
      widgetToken: DEV_WIDGET_TOKEN,
      isActive: true,
      settings: { security: { allowedDomains: [] } },
    },
  ]);
  const agents = new InMemoryAgentDirectory(inboxes, [
    { id: 1, branchId: DEV_BRANCH_ID, role: 'agent', dataScope: 'branch', isActive: true },
    { id: 2, branchId: DEV_BRANCH_ID, role: 'agent', dataScope: 'branch', isActive: true },
    { id: 3, branchId: DEV_BRANCH_ID, role: 'agent', dataScope: 'self', isActive: true },
    { id: 4, branchId: DEV_BRANCH_ID, role: 'admin', dataScope: 'global', isActive: true },
  ]);

  return {
    inboxes,
    routingRules: new InMemoryRoutingRuleRepository(),
    agents,
    contacts: new InMemoryContactRepository(),
    conversations: new InMemoryConversationRepository(),
    messages: new InMemoryMessageRepository(),
  };
}

export function createContainer(config: ApiConfig, overrides: ContainerOverrides = {}): Container {
  const logger = overrides.logger ?? createLogger({ name: 'container' });
  const clock = overrides.clock;

  let store: SharedStore;
  if (overrides.store) {
    store = overrides.store;
  } else if (config.redisUrl) {
    store = createRedisSharedStore({ url: config.redisUrl, keyPrefix: config.storePrefix });
  } else {
    logger.warn('REDIS_URL not set, using the in-memory shared store (single instance only)');
    store = new InMemorySharedStore();
  }

  // Service loggers stay on their own defaults unless the caller injects one
  const serviceOptions = overrides.logger ? { logger: overrides.logger } : {};
  const clockOptions = clock ? { clock } : {};

  let pool: DatabasePool | null = null;
  let repositories: Repositories;
  let regions: RegionLocator | undefined;
  if (overrides.repositories) {
    repositories = overrides.repositories;
  } else if (config.databaseUrl) {
    pool = createDatabasePool({ connectionString: config.databaseUrl });
    repositories = createPostgresRepositories(pool);
    regions = new GeoIpRegionLocator(pool, { ...config.routing.geoip, ...serviceOptions });
  } else {
    logger.warn('DATABASE_URL not set, using in-memory repositories with development data');
    repositories = createDevelopmentRepositories();
  }

  const events = createChatEventDispatcher({ ...serviceOptions, source: 'chatrouter-api' });

  const presence = new PresenceTracker({
    store,
    agents: repositories.agents,
    events,
    ttlSeconds: config.presence.ttlSeconds,
    ...serviceOptions,
    ...clockOptions,
  });
  const rateLimiter = new AssignmentRateLimiter(store, {
    limit: config.rateLimit.limit,
    windowSeconds: config.rateLimit.windowSeconds,
    ...serviceOptions,
  });
  const queue = new RoundRobinQueue(store, repositories.agents, {
    ttlSeconds: config.queue.ttlSeconds,
    maxAttempts: config.queue.maxAttempts,
    ...serviceOptions,
  });

  const conversations = new ConversationService({
    conversations: repositories.conversations,
    messages: repositories.messages,
    contacts: repositories.contacts,
    branches: new BranchRouter({
      rules: repositories.routingRules,
      defaultBranchId: config.routing.defaultBranchId,
      ...serviceOptions,
    }),
    events,
    ...serviceOptions,
    ...clockOptions,
  });

  const routingDeps = {
    conversations: repositories.conversations,
    agents: repositories.agents,
    presence,
    rateLimiter,
    queue,
    events,
    ...serviceOptions,
    ...clockOptions,
  };
  const autoAssignment = new AutoAssignmentService(routingDeps);
  const stopAutoAssignment = autoAssignment.registerListeners();
  const escalation = new EscalationScanner({
    ...routingDeps,
    attemptTimeoutMs: config.escalation.attemptTimeoutMs,
  });
  const branchTransfer = new BranchTransferService({
    inboxes: repositories.inboxes,
    conversations: repositories.conversations,
    autoAssignment,
    events,
    ...serviceOptions,
    ...clockOptions,
  });

  const stopAutoReply = new AutoReplyResponder({
    store,
    inboxes: repositories.inboxes,
    conversations: repositories.conversations,
    messages: repositories.messages,
    conversationService: conversations,
    events,
    ...serviceOptions,
  }).registerListeners();
  const stopWebhooks = new WebhookNotifier(repositories.inboxes, {
    timeoutMs: config.webhook.timeoutMs,
    ...serviceOptions,
  }).registerListeners(events);

  const typing = new TypingIndicator(store, events, {
    ttlSeconds: config.typing.ttlSeconds,
    ...serviceOptions,
    ...clockOptions,
  });
  const lastSeen = new LastSeenTracker(store, repositories.conversations, {
    throttleSeconds: config.lastSeen.throttleSeconds,
    ...clockOptions,
  });

  const widget = new WidgetGateway({
    inboxes: repositories.inboxes,
    messages: repositories.messages,
    conversationService: conversations,
    sessions: new WidgetSessionStore(store, {
      ttlSeconds: config.widget.sessionTtlSeconds,
      ...serviceOptions,
      ...clockOptions,
    }),
    captcha: new CaptchaService(store, { ...config.widget.captcha, ...serviceOptions }),
    throttle: new AbuseThrottle(store, config.widget.throttle, overrides.logger),
    typing,
    lastSeen,
    events,
    ...(regions ? { regions } : {}),
    floodLimitPerMinute: config.widget.floodLimitPerMinute,
    ...serviceOptions,
    ...clockOptions,
  });

  return {
    store,
    repositories,
    database: pool,
    events,
    presence,
    rateLimiter,
    queue,
    conversations,
    autoAssignment,
    escalation,
    branchTransfer,
    typing,
    lastSeen,
    widget,
    async close() {
      stopAutoAssignment();
      stopAutoReply();
      stopWebhooks();
      await events.drain();
      await store.close();
      if (pool) {
        await pool.end();
      }
    },
  };
}
