/**
 * Environment configuration
 *
 * Every routing tunable is read once from the environment, validated with
 * zod and defaulted here; components receive the parsed values through
 * their constructors.
 */

import { z } from 'zod';

import { ValidationError } from './errors.js';

const intFromEnv = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const optionalUrl = () =>
  z.preprocess((value) => (value === '' ? undefined : value), z.string().url().optional());

const optionalIntFromEnv = (min = 1) =>
  z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.coerce.number().int().min(min).optional()
  );

const booleanFromEnv = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .optional(),
  SERVICE_NAME: z.string().default('chatrouter'),

  // Server
  PORT: intFromEnv(3000, 1),
  HOST: z.string().default('0.0.0.0'),
  CORS_ORIGIN: z.string().optional(),

  // Backends
  REDIS_URL: optionalUrl(),
  DATABASE_URL: optionalUrl(),
  SHARED_STORE_PREFIX: z.string().default('chatrouter:'),

  // Round-robin queue
  QUEUE_TTL_SECONDS: intFromEnv(7 * 24 * 60 * 60, 1),
  QUEUE_CAS_MAX_ATTEMPTS: intFromEnv(5, 1),

  // Assignment rate limiter
  ASSIGNMENT_RATE_LIMIT: intFromEnv(10, 1),
  ASSIGNMENT_RATE_WINDOW_SECONDS: intFromEnv(60, 1),

  // Presence
  PRESENCE_TTL_SECONDS: intFromEnv(300, 1),
  TYPING_TTL_SECONDS: intFromEnv(8, 1),
  LAST_SEEN_THROTTLE_SECONDS: intFromEnv(15, 1),

  // Branch routing for global inboxes
  DEFAULT_BRANCH_ID: optionalIntFromEnv(),
  GEOIP_ENABLED: booleanFromEnv(true),
  GEOIP_TIMEOUT_MS: intFromEnv(3000, 1),

  // Outbound webhooks
  WEBHOOK_TIMEOUT_MS: intFromEnv(2000, 1),

  // Escalation
  ESCALATION_TIMEOUT_SECONDS: intFromEnv(240, 1),
  ESCALATION_BATCH_LIMIT: intFromEnv(500, 1),
  ESCALATION_ATTEMPT_TIMEOUT_MS: intFromEnv(5000, 1),

  // Widget sessions and captcha
  WIDGET_SESSION_TTL_SECONDS: intFromEnv(24 * 60 * 60, 1),
  CAPTCHA_TTL_SECONDS: intFromEnv(600, 1),
  CAPTCHA_IP_WINDOW_SECONDS: intFromEnv(600, 1),
  CAPTCHA_IP_THRESHOLD: intFromEnv(60, 1),
  CAPTCHA_ENABLED: booleanFromEnv(true),

  // Widget throttles (per minute)
  THROTTLE_BOOTSTRAP_PER_IP: intFromEnv(10, 1),
  THROTTLE_BOOTSTRAP_PER_TOKEN: intFromEnv(20, 1),
  THROTTLE_SEND_PER_IP: intFromEnv(60, 1),
  THROTTLE_SEND_PER_SESSION: intFromEnv(30, 1),
  THROTTLE_POLL_PER_SESSION: intFromEnv(20, 1),
  THROTTLE_TYPING_PER_SESSION: intFromEnv(60, 1),
  THROTTLE_POLL_MIN_INTERVAL_SECONDS: intFromEnv(2),
  MESSAGE_FLOOD_LIMIT_PER_MINUTE: intFromEnv(20, 1),

  // Streaming
  STREAM_HEARTBEAT_MS: intFromEnv(20_000, 1),
  STREAM_IDLE_TIMEOUT_MS: intFromEnv(60_000, 1),
  STREAM_DRAIN_TIMEOUT_MS: intFromEnv(5000, 1),

  // Retention
  RETENTION_RESOLVED_DAYS: intFromEnv(90, 1),
  RETENTION_BATCH_LIMIT: intFromEnv(5000, 1),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Routing configuration grouped by component
 */
export interface RoutingConfig {
  nodeEnv: Env['NODE_ENV'];
  logLevel: Env['LOG_LEVEL'];
  server: { port: number; host: string; corsOrigin: string | undefined };
  redisUrl: string | undefined;
  databaseUrl: string | undefined;
  storePrefix: string;
  queue: { ttlSeconds: number; maxAttempts: number };
  rateLimit: { limit: number; windowSeconds: number };
  presence: { ttlSeconds: number };
  typing: { ttlSeconds: number };
  lastSeen: { throttleSeconds: number };
  routing: {
    defaultBranchId: number | null;
    geoip: { enabled: boolean; timeoutMs: number };
  };
  webhook: { timeoutMs: number };
  escalation: { timeoutSeconds: number; batchLimit: number; attemptTimeoutMs: number };
  widget: {
    sessionTtlSeconds: number;
    captcha: { enabled: boolean; ttlSeconds: number; ipWindowSeconds: number; ipThreshold: number };
    throttle: {
      bootstrapPerIp: number;
      bootstrapPerToken: number;
      sendPerIp: number;
      sendPerSession: number;
      pollPerSession: number;
      typingPerSession: number;
      pollMinIntervalSeconds: number;
    };
    floodLimitPerMinute: number;
  };
  stream: { heartbeatMs: number; idleTimeoutMs: number; drainTimeoutMs: number };
  retention: { resolvedDays: number; batchLimit: number };
}

/**
 * Validate the environment and group it into a RoutingConfig
 *
 * @throws ValidationError listing every invalid variable
 */
export function loadRoutingConfig(
  source: Record<string, string | undefined> = process.env
): RoutingConfig {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    const fieldErrors = parsed.error.flatten().fieldErrors;
    throw new ValidationError(
      `Invalid environment configuration: ${Object.keys(fieldErrors).join(', ')}`,
      fieldErrors
    );
  }

  const env = parsed.data;

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    server: { port: env.PORT, host: env.HOST, corsOrigin: env.CORS_ORIGIN },
    redisUrl: env.REDIS_URL,
    databaseUrl: env.DATABASE_URL,
    storePrefix: env.SHARED_STORE_PREFIX,
    queue: { ttlSeconds: env.QUEUE_TTL_SECONDS, maxAttempts: env.QUEUE_CAS_MAX_ATTEMPTS },
    rateLimit: {
      limit: env.ASSIGNMENT_RATE_LIMIT,
      windowSeconds: env.ASSIGNMENT_RATE_WINDOW_SECONDS,
    },
    presence: { ttlSeconds: env.PRESENCE_TTL_SECONDS },
    typing: { ttlSeconds: env.TYPING_TTL_SECONDS },
    lastSeen: { throttleSeconds: env.LAST_SEEN_THROTTLE_SECONDS },
    routing: {
      defaultBranchId: env.DEFAULT_BRANCH_ID ?? null,
      geoip: { enabled: env.GEOIP_ENABLED, timeoutMs: env.GEOIP_TIMEOUT_MS },
    },
    webhook: { timeoutMs: env.WEBHOOK_TIMEOUT_MS },
    escalation: {
      timeoutSeconds: env.ESCALATION_TIMEOUT_SECONDS,
      batchLimit: env.ESCALATION_BATCH_LIMIT,
      attemptTimeoutMs: env.ESCALATION_ATTEMPT_TIMEOUT_MS,
    },
    widget: {
      sessionTtlSeconds: env.WIDGET_SESSION_TTL_SECONDS,
      captcha: {
        enabled: env.CAPTCHA_ENABLED,
        ttlSeconds: env.CAPTCHA_TTL_SECONDS,
        ipWindowSeconds: env.CAPTCHA_IP_WINDOW_SECONDS,
        ipThreshold: env.CAPTCHA_IP_THRESHOLD,
      },
      throttle: {
        bootstrapPerIp: env.THROTTLE_BOOTSTRAP_PER_IP,
        bootstrapPerToken: env.THROTTLE_BOOTSTRAP_PER_TOKEN,
        sendPerIp: env.THROTTLE_SEND_PER_IP,
        sendPerSession: env.THROTTLE_SEND_PER_SESSION,
        pollPerSession: env.THROTTLE_POLL_PER_SESSION,
        typingPerSession: env.THROTTLE_TYPING_PER_SESSION,
        pollMinIntervalSeconds: env.THROTTLE_POLL_MIN_INTERVAL_SECONDS,
      },
      floodLimitPerMinute: env.MESSAGE_FLOOD_LIMIT_PER_MINUTE,
    },
    stream: {
      heartbeatMs: env.STREAM_HEARTBEAT_MS,
      idleTimeoutMs: env.STREAM_IDLE_TIMEOUT_MS,
      drainTimeoutMs: env.STREAM_DRAIN_TIMEOUT_MS,
    },
    retention: {
      resolvedDays: env.RETENTION_RESOLVED_DAYS,
      batchLimit: env.RETENTION_BATCH_LIMIT,
    },
  };
}
