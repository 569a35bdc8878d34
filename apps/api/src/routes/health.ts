import type { FastifyPluginAsync } from 'fastify';
import { toError } from '@chatrouter/core';

import type { Container } from '../container.js';
import { skipRateLimit } from '../plugins/rate-limit.js';

/**
 * Health check routes
 *
 * /health checks the shared store and, when configured, PostgreSQL. The
 * shared store is critical: without it there is no queue, presence or
 * widget session.
 */

export interface HealthCheckResult {
  status: 'ok' | 'error' | 'not_configured';
  latencyMs?: number;
  message?: string;
}

export interface HealthResponse {
  status: 'ok' | 'unhealthy';
  timestamp: string;
  uptime: number;
  checks: {
    sharedStore: HealthCheckResult;
    database: HealthCheckResult;
  };
}

async function timed(check: () => Promise<unknown>): Promise<HealthCheckResult> {
  const started = Date.now();
  try {
    await check();
    return { status: 'ok', latencyMs: Date.now() - started };
  } catch (error) {
    return { status: 'error', latencyMs: Date.now() - started, message: toError(error).message };
  }
}

export function createHealthRoutes(container: Container): FastifyPluginAsync {
  return async (fastify) => {
    const { store, database } = container;

    fastify.get('/health', skipRateLimit(), async (request, reply) => {
      const [sharedStore, databaseCheck] = await Promise.all([
        timed(() => store.get('health:ping')),
        database
          ? timed(() => database.query('SELECT 1'))
          : Promise.resolve<HealthCheckResult>({ status: 'not_configured' }),
      ]);

      const healthy = sharedStore.status === 'ok' && databaseCheck.status !== 'error';
      if (!healthy) {
        request.log.warn({ sharedStore, database: databaseCheck }, 'Health check failed');
      }

      const body: HealthResponse = {
        status: healthy ? 'ok' : 'unhealthy',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        checks: { sharedStore, database: databaseCheck },
      };
      return reply.status(healthy ? 200 : 503).send(body);
    });

    fastify.get('/live', skipRateLimit(), async () => ({ status: 'alive' }));
  };
}
