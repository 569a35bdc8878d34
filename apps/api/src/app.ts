import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import {
  AppError,
  CaptchaRequiredError,
  RateLimitError,
  ValidationError,
  createLogger,
  createLoggerOptions,
  toSafeErrorResponse,
} from '@chatrouter/core';

import type { ApiConfig } from './config.js';
import type { Container } from './container.js';
import correlationPlugin from './plugins/correlation.js';
import { apiAuthPlugin, apiKeysFromConfig } from './plugins/api-auth.js';
import { rateLimitPlugin } from './plugins/rate-limit.js';
import {
  createAdminRoutes,
  createAgentRoutes,
  createHealthRoutes,
  createWidgetRoutes,
  createWidgetStreamRoutes,
} from './routes/index.js';

/**
 * chatrouter API
 *
 * Visitor widget endpoints, the agent console and the admin surface over the
 * routing services in the container.
 */

const logger = createLogger({ name: 'api' });

export interface BuildAppOptions {
  config: ApiConfig;
  container: Container;
}

/**
 * Parse CORS origins; the widget is embedded on customer sites, so CORS
 * stays open unless an explicit list is configured
 */
export function parseCorsOrigins(corsOrigin: string | undefined): string[] | boolean {
  if (!corsOrigin || corsOrigin === '*') return true;

  const origins = corsOrigin
    .split(',')
    .map((o) => o.trim())
    .filter(Boolean);

  for (const origin of origins) {
    try {
      new URL(origin);
    } catch {
      throw new Error(`Invalid CORS origin: ${origin}`);
    }
  }

  return origins;
}

/**
 * Body sent for an error, with the captcha fields the widget needs to render
 * a challenge
 */
export function errorBody(error: AppError): Record<string, unknown> {
  const body: Record<string, unknown> = { ...error.toSafeError() };

  if (error instanceof CaptchaRequiredError) {
    body.captcha_required = true;
    body.captcha_token = error.captchaToken;
    body.captcha_question = error.captchaQuestion;
  }
  if (error instanceof ValidationError && error.details !== undefined) {
    body.details = error.details;
  }

  return body;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config, container } = options;

  const fastify = Fastify({
    logger: {
      ...createLoggerOptions({ name: 'api', level: config.logLevel }),
      serializers: {
        req(request) {
          return {
            method: request.method,
            url: request.url,
            hostname: request.hostname,
            remoteAddress: request.ip,
          };
        },
        res(reply) {
          return {
            statusCode: reply.statusCode,
          };
        },
      },
    },
    // Only listed proxies may set X-Forwarded-For; the widget throttles key on request.ip
    trustProxy: config.trustProxy,
  });

  await fastify.register(correlationPlugin);

  await fastify.register(helmet, {
    contentSecurityPolicy: false,
    strictTransportSecurity: {
      maxAge: 31536000,
      includeSubDomains: true,
    },
    frameguard: { action: 'deny' },
    noSniff: true,
    hidePoweredBy: true,
    // The widget script runs on customer origins
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });

  await fastify.register(cors, {
    origin: parseCorsOrigins(config.server.corsOrigin),
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'],
    allowedHeaders: [
      'Content-Type',
      'Last-Event-ID',
      'X-Correlation-ID',
      'X-API-Key',
      'X-Agent-Id',
    ],
    exposedHeaders: ['X-Correlation-ID', 'Retry-After'],
  });

  await fastify.register(rateLimitPlugin, {
    redisUrl: config.redisUrl,
    ...config.httpRateLimit,
  });

  await fastify.register(apiAuthPlugin, {
    apiKeyConfigs: apiKeysFromConfig(config.apiKeys),
  });

  await fastify.register(createHealthRoutes(container));
  await fastify.register(createWidgetRoutes(container));
  await fastify.register(createWidgetStreamRoutes(container, config.stream));
  await fastify.register(createAgentRoutes(container, config.stream));
  await fastify.register(createAdminRoutes(container, config.escalation));

  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      if (error instanceof RateLimitError) {
        void reply.header('Retry-After', String(error.retryAfter));
      }
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, 'Operation failed');
      }
      return reply.status(error.statusCode).send(errorBody(error));
    }

    if (error.validation) {
      return reply.status(400).send(errorBody(new ValidationError(error.message)));
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      return reply.status(statusCode).send({
        code: error.code,
        message: error.message,
        statusCode,
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send(toSafeErrorResponse(error));
  });

  fastify.setNotFoundHandler((_request, reply) => {
    return reply.status(404).send({
      code: 'NOT_FOUND',
      message: 'Route not found',
      statusCode: 404,
    });
  });

  fastify.addHook('onClose', async () => {
    await container.close();
    logger.info('Container closed');
  });

  return fastify;
}
