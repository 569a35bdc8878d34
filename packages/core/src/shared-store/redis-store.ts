/**
 * Redis-backed SharedStore
 *
 * Conditional writes and counters run as Lua scripts so each one is a
 * single atomic step on the server, whichever worker issues it.
 */

import { Redis, type RedisOptions } from 'ioredis';

import { SharedStoreError, toError } from '../errors.js';
import { createLogger, type ServiceLogger } from '../logger/index.js';
import type { SetOptions, SharedStore } from './types.js';

/**
 * The subset of Redis commands the store issues
 */
export interface RedisCommandClient {
  get(key: string): Promise<string | null>;
  del(key: string): Promise<number>;
  eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>;
  quit(): Promise<unknown>;
}

// ARGV: value, ttlSeconds (0 = none), onlyIfAbsent ('1' | '0')
const SET_SCRIPT = `
if ARGV[3] == '1' and redis.call('EXISTS', KEYS[1]) == 1 then
  return 0
end
if tonumber(ARGV[2]) > 0 then
  redis.call('SET', KEYS[1], ARGV[1], 'EX', ARGV[2])
else
  redis.call('SET', KEYS[1], ARGV[1])
end
return 1
`;

// ARGV: ttlSeconds
const INCREMENT_SCRIPT = `
local value = redis.call('INCR', KEYS[1])
if redis.call('TTL', KEYS[1]) < 0 then
  redis.call('EXPIRE', KEYS[1], ARGV[1])
end
return value
`;

// ARGV: expectAbsent ('1' | '0'), expected, next, ttlSeconds (0 = none)
const COMPARE_AND_SWAP_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if ARGV[1] == '1' then
  if current then
    return 0
  end
elseif current ~= ARGV[2] then
  return 0
end
if tonumber(ARGV[4]) > 0 then
  redis.call('SET', KEYS[1], ARGV[3], 'EX', ARGV[4])
else
  redis.call('SET', KEYS[1], ARGV[3])
end
return 1
`;

export interface RedisSharedStoreOptions {
  /** Prefix prepended to every key */
  keyPrefix?: string;
  logger?: ServiceLogger;
}

export class RedisSharedStore implements SharedStore {
  private readonly keyPrefix: string;
  private readonly logger: ServiceLogger;

  constructor(
    private readonly client: RedisCommandClient,
    options: RedisSharedStoreOptions = {}
  ) {
    this.keyPrefix = options.keyPrefix ?? '';
    this.logger = options.logger ?? createLogger({ name: 'redis-shared-store' });
  }

  async get(key: string): Promise<string | null> {
    return this.run('get', () => this.client.get(this.prefixed(key)));
  }

  async set(key: string, value: string, options: SetOptions = {}): Promise<boolean> {
    const result = await this.run('set', () =>
      this.client.eval(
        SET_SCRIPT,
        1,
        this.prefixed(key),
        value,
        options.ttlSeconds ?? 0,
        options.onlyIfAbsent === true ? '1' : '0'
      )
    );
    return toInteger('set', result) === 1;
  }

  async delete(key: string): Promise<void> {
    await this.run('delete', () => this.client.del(this.prefixed(key)));
  }

  async increment(key: string, ttlSeconds: number): Promise<number> {
    const result = await this.run('increment', () =>
      this.client.eval(INCREMENT_SCRIPT, 1, this.prefixed(key), ttlSeconds)
    );
    return toInteger('increment', result);
  }

  async compareAndSwap(
    key: string,
    expected: string | null,
    next: string,
    ttlSeconds?: number
  ): Promise<boolean> {
    const result = await this.run('compareAndSwap', () =>
      this.client.eval(
        COMPARE_AND_SWAP_SCRIPT,
        1,
        this.prefixed(key),
        expected === null ? '1' : '0',
        expected ?? '',
        next,
        ttlSeconds ?? 0
      )
    );
    return toInteger('compareAndSwap', result) === 1;
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  private prefixed(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  private async run<T>(operation: string, command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (error) {
      const err = toError(error);
      this.logger.debug({ err, operation }, 'Redis command failed');
      throw new SharedStoreError(operation, err.message, err);
    }
  }
}

function toInteger(operation: string, value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && /^-?\d+$/.test(value)) return Number.parseInt(value, 10);
  throw new SharedStoreError(operation, `unexpected script reply ${String(value)}`);
}

export interface RedisConnectionConfig {
  url: string;
  keyPrefix?: string;
  /** Command timeout in milliseconds (default: 2000) */
  commandTimeout?: number;
  /** Maximum reconnect attempts before commands fail fast (default: 3) */
  maxRetries?: number;
  logger?: ServiceLogger;
}

/**
 * Open an ioredis connection and wrap it as a SharedStore
 *
 * TLS is enabled for rediss:// URLs.
 */
export function createRedisSharedStore(config: RedisConnectionConfig): RedisSharedStore {
  const maxRetries = config.maxRetries ?? 3;
  const options: RedisOptions = {
    commandTimeout: config.commandTimeout ?? 2000,
    maxRetriesPerRequest: maxRetries,
    enableReadyCheck: true,
    retryStrategy: (times: number) => Math.min(times * 200, 2000),
  };

  if (config.url.startsWith('rediss://')) {
    options.tls = { rejectUnauthorized: process.env.NODE_ENV === 'production' };
  }

  const redis = new Redis(config.url, options);
  const client: RedisCommandClient = {
    get: (key) => redis.get(key),
    del: (key) => redis.del(key),
    eval: (script, numKeys, ...args) => redis.eval(script, numKeys, ...args),
    quit: () => redis.quit(),
  };

  const storeOptions: RedisSharedStoreOptions = {};
  if (config.keyPrefix !== undefined) storeOptions.keyPrefix = config.keyPrefix;
  if (config.logger !== undefined) storeOptions.logger = config.logger;

  return new RedisSharedStore(client, storeOptions);
}
