/**
 * Assignment Rate Limiter
 *
 * Fixed-window cap on how many conversations one agent receives. A store
 * outage must never stop routing, so every failure fails open: the check
 * passes and the increment is dropped.
 */

import { createLogger, toError, type ServiceLogger, type SharedStore } from '@chatrouter/core';

export interface RateLimiter {
  /** True while the agent is below the limit; never mutates */
  checkLimit(agentId: number): Promise<boolean>;
  increment(agentId: number): Promise<void>;
  reset(agentId: number): Promise<void>;
}

export interface AssignmentRateLimiterOptions {
  /** Assignments allowed per window (default: 10) */
  limit?: number;
  /** Window length in seconds (default: 60) */
  windowSeconds?: number;
  logger?: ServiceLogger;
}

export function rateKey(agentId: number): string {
  return `assignment-rate:${agentId}`;
}

export class AssignmentRateLimiter implements RateLimiter {
  readonly limit: number;
  readonly windowSeconds: number;
  private readonly logger: ServiceLogger;

  constructor(
    private readonly store: SharedStore,
    options: AssignmentRateLimiterOptions = {}
  ) {
    this.limit = options.limit ?? 10;
    this.windowSeconds = options.windowSeconds ?? 60;
    this.logger = options.logger ?? createLogger({ name: 'assignment-rate-limiter' });
  }

  async checkLimit(agentId: number): Promise<boolean> {
    const key = rateKey(agentId);
    try {
      const raw = await this.store.get(key);
      const count = raw === null ? 0 : Number.parseInt(raw, 10);
      return !Number.isFinite(count) || count < this.limit;
    } catch (error) {
      this.logFailure('checkLimit', key, error);
      return true;
    }
  }

  async increment(agentId: number): Promise<void> {
    const key = rateKey(agentId);
    try {
      await this.store.increment(key, this.windowSeconds);
    } catch (error) {
      this.logFailure('increment', key, error);
    }
  }

  async reset(agentId: number): Promise<void> {
    const key = rateKey(agentId);
    try {
      await this.store.delete(key);
    } catch (error) {
      this.logFailure('reset', key, error);
    }
  }

  private logFailure(operation: string, key: string, error: unknown): void {
    this.logger.error(
      { err: toError(error), operation, key, policy: 'fail-open' },
      'Assignment rate limiter store failure'
    );
  }
}
