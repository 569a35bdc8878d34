import rateLimit, { type RateLimitPluginOptions } from '@fastify/rate-limit';
import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { Redis } from 'ioredis';
import { RateLimitError, createLogger, toError } from '@chatrouter/core';

const logger = createLogger({ name: 'rate-limit' });

/**
 * Request Rate Limiting Plugin
 *
 * Coarse per-IP limits in front of every route. The widget endpoints get
 * their own tier; the finer per-session and per-token widget throttles live
 * in the domain's AbuseThrottle.
 */

// =============================================================================
// Configuration
// =============================================================================

export interface RateLimitConfig {
  /** Redis connection URL for limits shared across instances */
  redisUrl?: string | undefined;
  /** Requests per minute per IP outside the widget tier */
  globalLimit: number;
  /** Requests per minute per IP on /widget routes */
  widgetLimit: number;
  /** IPs that bypass rate limiting */
  allowlist: string[];
  /** Send x-ratelimit-* headers */
  addHeaders: boolean;
}

const defaultConfig: RateLimitConfig = {
  globalLimit: 500,
  widgetLimit: 120,
  allowlist: [],
  addHeaders: true,
};

export type RateLimitTier = 'widget' | 'default';

export function resolveTier(request: FastifyRequest): RateLimitTier {
  const path = request.routeOptions.url ?? request.url;
  return path.startsWith('/widget/') ? 'widget' : 'default';
}

function generateKey(request: FastifyRequest): string {
  return `ratelimit:${resolveTier(request)}:${request.ip}`;
}

function getLimit(request: FastifyRequest, config: RateLimitConfig): number {
  return resolveTier(request) === 'widget' ? config.widgetLimit : config.globalLimit;
}

async function connectRedis(url: string): Promise<Redis | null> {
  const redis = new Redis(url, { maxRetriesPerRequest: 1, lazyConnect: true });
  try {
    await redis.connect();
    await redis.ping();
    logger.info('Redis connected for distributed rate limiting');
    return redis;
  } catch (error) {
    logger.warn(
      { err: toError(error) },
      'Failed to connect to Redis, falling back to in-memory rate limiting'
    );
    redis.disconnect();
    return null;
  }
}

// =============================================================================
// Plugin Implementation
// =============================================================================

const rateLimitPluginAsync: FastifyPluginAsync<Partial<RateLimitConfig>> = async (
  fastify,
  options
) => {
  const config: RateLimitConfig = { ...defaultConfig, ...options };

  logger.info(
    {
      useRedis: Boolean(config.redisUrl),
      globalLimit: config.globalLimit,
      widgetLimit: config.widgetLimit,
      allowlistCount: config.allowlist.length,
    },
    'Initializing rate limiting'
  );

  const rateLimitOptions: RateLimitPluginOptions = {
    global: true,
    max: (request) => getLimit(request, config),
    timeWindow: '1 minute',
    keyGenerator: generateKey,
    allowList: config.allowlist,
    onExceeding: (request) => {
      logger.debug(
        { correlationId: request.correlationId, ip: request.ip, path: request.url },
        'Approaching rate limit'
      );
    },
    onExceeded: (_request, key) => {
      logger.debug({ key }, 'Rate limit key exhausted');
    },
    errorResponseBuilder: (_request, context) => new RateLimitError(Math.ceil(context.ttl / 1000)),
  };

  if (config.addHeaders) {
    rateLimitOptions.addHeaders = {
      'x-ratelimit-limit': true,
      'x-ratelimit-remaining': true,
      'x-ratelimit-reset': true,
      'retry-after': true,
    };
    rateLimitOptions.addHeadersOnExceeding = {
      'x-ratelimit-limit': true,
      'x-ratelimit-remaining': true,
      'x-ratelimit-reset': true,
    };
  }

  if (config.redisUrl) {
    const redis = await connectRedis(config.redisUrl);
    if (redis) {
      rateLimitOptions.redis = redis;
      fastify.addHook('onClose', async () => {
        await redis.quit();
      });
    }
  } else {
    logger.info('Using in-memory rate limiting (not suitable for multi-instance deployments)');
  }

  await fastify.register(rateLimit, rateLimitOptions);
};

// =============================================================================
// Route-Specific Rate Limiters
// =============================================================================

/**
 * Skip rate limiting for specific routes
 */
export function skipRateLimit(): { config: { rateLimit: false } } {
  return {
    config: {
      rateLimit: false,
    },
  };
}

// =============================================================================
// Exports
// =============================================================================

export const rateLimitPlugin = fp(rateLimitPluginAsync, {
  name: 'rate-limit',
  fastify: '5.x',
  dependencies: ['correlation'],
});
