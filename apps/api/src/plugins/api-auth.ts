/**
 * API Authentication Plugin with Role-Based Access Control (RBAC)
 *
 * Agent console and admin routes require an API key in `x-api-key`. Each key
 * carries a role:
 * - agent: the agent console (/agent)
 * - admin: everything, including queue management and escalation runs (/admin)
 *
 * Widget routes are public; they authenticate through widget and session
 * tokens instead.
 */

import crypto from 'node:crypto';

import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { AuthenticationError, ForbiddenError } from '@chatrouter/core';

export type UserRole = 'agent' | 'admin';

export interface RoutePermission {
  /** Path prefix to match */
  path: string;
  allowedRoles: UserRole[];
}

export interface ApiKeyConfig {
  key: string;
  role: UserRole;
  /** Name for audit logging */
  name?: string;
}

export interface ApiAuthConfig {
  apiKeyConfigs: ApiKeyConfig[];
  /**
   * Header name for the API key
   * @default 'x-api-key'
   */
  headerName?: string;
  routePermissions?: RoutePermission[];
}

export const DEFAULT_ROUTE_PERMISSIONS: RoutePermission[] = [
  { path: '/agent', allowedRoles: ['agent', 'admin'] },
  { path: '/admin', allowedRoles: ['admin'] },
];

/**
 * Timing-safe API key comparison that returns the matched key config
 */
export function verifyApiKeyWithRole(
  providedKey: string,
  keyConfigs: readonly ApiKeyConfig[]
): ApiKeyConfig | null {
  const provided = Buffer.from(providedKey);
  for (const keyConfig of keyConfigs) {
    const expected = Buffer.from(keyConfig.key);
    if (provided.length === expected.length && crypto.timingSafeEqual(provided, expected)) {
      return keyConfig;
    }
  }
  return null;
}

function pathOf(url: string): string {
  const query = url.indexOf('?');
  return query === -1 ? url : url.slice(0, query);
}

function matchesPrefix(path: string, prefix: string): boolean {
  return path === prefix || path.startsWith(`${prefix}/`);
}

/**
 * The most specific rule covering the path, or null when the path is public
 */
export function findRoutePermission(
  url: string,
  permissions: readonly RoutePermission[]
): RoutePermission | null {
  const path = pathOf(url);
  const matching = permissions
    .filter((permission) => matchesPrefix(path, permission.path))
    .sort((a, b) => b.path.length - a.path.length);
  return matching[0] ?? null;
}

declare module 'fastify' {
  interface FastifyRequest {
    authContext?: {
      role: UserRole;
      keyName?: string;
      authenticated: boolean;
    };
  }
}

const apiAuthPluginAsync: FastifyPluginAsync<ApiAuthConfig> = async (fastify, options) => {
  const headerName = options.headerName ?? 'x-api-key';
  const routePermissions = options.routePermissions ?? DEFAULT_ROUTE_PERMISSIONS;
  const apiKeyConfigs = options.apiKeyConfigs;

  if (apiKeyConfigs.length === 0) {
    fastify.log.error(
      'No API keys configured - agent and admin endpoints will reject all requests. ' +
        'Set API_KEY_AGENT and API_KEY_ADMIN.'
    );
  } else {
    const roles = [...new Set(apiKeyConfigs.map((k) => k.role))];
    fastify.log.info({ keyCount: apiKeyConfigs.length, roles }, 'API authentication initialized');
  }

  fastify.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    const permission = findRoutePermission(request.url, routePermissions);
    if (!permission) {
      return;
    }

    if (apiKeyConfigs.length === 0) {
      request.log.error({ url: request.url }, 'No API keys configured - rejecting request');
      return reply.status(500).send({
        code: 'CONFIGURATION_ERROR',
        message: 'Server configuration error',
        statusCode: 500,
      });
    }

    const providedKey = request.headers[headerName];
    if (typeof providedKey !== 'string' || providedKey.length === 0) {
      request.log.warn({ url: request.url }, 'Missing API key');
      throw new AuthenticationError('API key required');
    }

    const matchedKey = verifyApiKeyWithRole(providedKey, apiKeyConfigs);
    if (!matchedKey) {
      request.log.warn({ url: request.url }, 'Invalid API key');
      throw new AuthenticationError('Invalid API key');
    }

    request.authContext = matchedKey.name
      ? { role: matchedKey.role, keyName: matchedKey.name, authenticated: true }
      : { role: matchedKey.role, authenticated: true };

    if (!permission.allowedRoles.includes(matchedKey.role)) {
      request.log.warn(
        { url: request.url, method: request.method, role: matchedKey.role },
        'Access denied - insufficient permissions'
      );
      throw new ForbiddenError(
        `Role '${matchedKey.role}' does not have permission to access this resource`,
        'INSUFFICIENT_ROLE'
      );
    }
  });
};

/**
 * Build key configs from the configured agent and admin keys
 */
export function apiKeysFromConfig(keys: {
  agent: string | undefined;
  admin: string | undefined;
}): ApiKeyConfig[] {
  const configs: ApiKeyConfig[] = [];
  if (keys.agent) configs.push({ key: keys.agent, role: 'agent', name: 'env-agent' });
  if (keys.admin) configs.push({ key: keys.admin, role: 'admin', name: 'env-admin' });
  return configs;
}

export const apiAuthPlugin = fp(apiAuthPluginAsync, {
  name: 'api-auth',
  fastify: '5.x',
});
