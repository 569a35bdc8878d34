import { describe, it, expect } from 'vitest';
import { loadRoutingConfig } from '../env.js';
import { ValidationError } from '../errors.js';

describe('loadRoutingConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadRoutingConfig({});

    expect(config.nodeEnv).toBe('development');
    expect(config.server.port).toBe(3000);
    expect(config.redisUrl).toBeUndefined();
    expect(config.storePrefix).toBe('chatrouter:');
    expect(config.rateLimit).toEqual({ limit: 10, windowSeconds: 60 });
    expect(config.presence.ttlSeconds).toBe(300);
    expect(config.escalation).toEqual({
      timeoutSeconds: 240,
      batchLimit: 500,
      attemptTimeoutMs: 5000,
    });
    expect(config.widget.sessionTtlSeconds).toBe(86400);
    expect(config.widget.captcha).toEqual({
      enabled: true,
      ttlSeconds: 600,
      ipWindowSeconds: 600,
      ipThreshold: 60,
    });
    expect(config.widget.throttle.pollMinIntervalSeconds).toBe(2);
    expect(config.retention).toEqual({ resolvedDays: 90, batchLimit: 5000 });
    expect(config.typing).toEqual({ ttlSeconds: 8 });
    expect(config.lastSeen).toEqual({ throttleSeconds: 15 });
    expect(config.routing).toEqual({
      defaultBranchId: null,
      geoip: { enabled: true, timeoutMs: 3000 },
    });
    expect(config.stream.drainTimeoutMs).toBe(5000);
  });

  it('should read the default branch for global inboxes', () => {
    expect(loadRoutingConfig({ DEFAULT_BRANCH_ID: '7' }).routing.defaultBranchId).toBe(7);
    expect(loadRoutingConfig({ DEFAULT_BRANCH_ID: '' }).routing.defaultBranchId).toBeNull();
    expect(() => loadRoutingConfig({ DEFAULT_BRANCH_ID: '0' })).toThrow(
      'Invalid environment configuration: DEFAULT_BRANCH_ID'
    );
  });

  it('should coerce numeric and boolean variables', () => {
    const config = loadRoutingConfig({
      PORT: '8080',
      ESCALATION_TIMEOUT_SECONDS: '120',
      CAPTCHA_ENABLED: 'false',
      REDIS_URL: 'redis://localhost:6379',
    });

    expect(config.server.port).toBe(8080);
    expect(config.escalation.timeoutSeconds).toBe(120);
    expect(config.widget.captcha.enabled).toBe(false);
    expect(config.redisUrl).toBe('redis://localhost:6379');
  });

  it('should treat empty URLs as unset', () => {
    const config = loadRoutingConfig({ DATABASE_URL: '', REDIS_URL: '' });

    expect(config.databaseUrl).toBeUndefined();
    expect(config.redisUrl).toBeUndefined();
  });

  it('should reject invalid values with the offending variable names', () => {
    expect(() => loadRoutingConfig({ ASSIGNMENT_RATE_LIMIT: '0', REDIS_URL: 'not a url' })).toThrow(
      ValidationError
    );
    expect(() => loadRoutingConfig({ ASSIGNMENT_RATE_LIMIT: '0' })).toThrow(
      'Invalid environment configuration: ASSIGNMENT_RATE_LIMIT'
    );
  });
});
