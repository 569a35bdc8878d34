/**
 * Widget abuse throttle
 *
 * Fixed one-minute windows over atomic counters, per IP, widget token and
 * session. Unlike assignment limits this fails closed: when the store cannot
 * answer, the request is throttled.
 */

import {
  RateLimitError,
  createLogger,
  toError,
  type ServiceLogger,
  type SharedStore,
} from '@chatrouter/core';

export interface WidgetThrottleLimits {
  bootstrapPerIp: number;
  bootstrapPerToken: number;
  sendPerIp: number;
  sendPerSession: number;
  pollPerSession: number;
  typingPerSession: number;
  /** Minimum seconds between two polls of one session */
  pollMinIntervalSeconds: number;
}

export const DEFAULT_THROTTLE_LIMITS: WidgetThrottleLimits = {
  bootstrapPerIp: 10,
  bootstrapPerToken: 20,
  sendPerIp: 60,
  sendPerSession: 30,
  pollPerSession: 20,
  typingPerSession: 60,
  pollMinIntervalSeconds: 2,
};

const WINDOW_SECONDS = 60;

export function throttleKey(scope: string, subject: string): string {
  return `widget:throttle:${scope}:${subject}`;
}

export class AbuseThrottle {
  private readonly limits: WidgetThrottleLimits;
  private readonly logger: ServiceLogger;

  constructor(
    private readonly store: SharedStore,
    limits: Partial<WidgetThrottleLimits> = {},
    logger?: ServiceLogger
  ) {
    this.limits = { ...DEFAULT_THROTTLE_LIMITS, ...limits };
    this.logger = logger ?? createLogger({ name: 'widget-throttle' });
  }

  /**
   * @throws RateLimitError
   */
  async assertBootstrapAllowed(clientIp: string, widgetToken: string): Promise<void> {
    const results = await Promise.all([
      this.hit(throttleKey('bootstrap-ip', clientIp), this.limits.bootstrapPerIp),
      this.hit(throttleKey('bootstrap-token', widgetToken), this.limits.bootstrapPerToken),
    ]);
    this.assertAll(results, 'bootstrap');
  }

  /**
   * @throws RateLimitError
   */
  async assertSendAllowed(clientIp: string, sessionToken: string): Promise<void> {
    const results = await Promise.all([
      this.hit(throttleKey('send-ip', clientIp), this.limits.sendPerIp),
      this.hit(throttleKey('send-session', sessionToken), this.limits.sendPerSession),
    ]);
    this.assertAll(results, 'send');
  }

  /**
   * @throws RateLimitError
   */
  async assertPollAllowed(sessionToken: string): Promise<void> {
    const withinLimit = await this.hit(
      throttleKey('poll-session', sessionToken),
      this.limits.pollPerSession
    );
    this.assertAll([withinLimit], 'poll');

    const interval = this.limits.pollMinIntervalSeconds;
    if (interval <= 0) return;

    const key = throttleKey('poll-interval', sessionToken);
    let first: boolean;
    try {
      first = await this.store.set(key, '1', { ttlSeconds: interval, onlyIfAbsent: true });
    } catch (error) {
      this.logFailure('poll-interval', key, error);
      first = false;
    }
    if (!first) {
      throw new RateLimitError(interval);
    }
  }

  /**
   * @throws RateLimitError
   */
  async assertTypingAllowed(sessionToken: string): Promise<void> {
    const withinLimit = await this.hit(
      throttleKey('typing-session', sessionToken),
      this.limits.typingPerSession
    );
    this.assertAll([withinLimit], 'typing');
  }

  private async hit(key: string, limit: number): Promise<boolean> {
    try {
      const count = await this.store.increment(key, WINDOW_SECONDS);
      return count <= limit;
    } catch (error) {
      this.logFailure('increment', key, error);
      return false;
    }
  }

  private assertAll(results: readonly boolean[], operation: string): void {
    if (results.every(Boolean)) return;

    this.logger.warn({ operation }, 'Widget request throttled');
    throw new RateLimitError(WINDOW_SECONDS);
  }

  private logFailure(operation: string, key: string, error: unknown): void {
    this.logger.error(
      { err: toError(error), operation, key, policy: 'fail-closed' },
      'Widget throttle store failure'
    );
  }
}
