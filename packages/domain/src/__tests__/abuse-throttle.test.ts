import { describe, it, expect, beforeEach } from 'vitest';
import { InMemorySharedStore, RateLimitError, SharedStoreError } from '@chatrouter/core';

import { AbuseThrottle } from '../widget/abuse-throttle.js';
import { createMockLogger } from './fixtures/routing-world.js';

class BrokenStore extends InMemorySharedStore {
  override increment(): Promise<number> {
    return Promise.reject(new SharedStoreError('increment', 'connection reset'));
  }
}

describe('AbuseThrottle', () => {
  let now: number;
  let store: InMemorySharedStore;
  let throttle: AbuseThrottle;

  beforeEach(() => {
    now = 0;
    store = new InMemorySharedStore({ now: () => now });
    throttle = new AbuseThrottle(store, {}, createMockLogger());
  });

  it('should allow ten bootstraps per IP per minute', async () => {
    for (let i = 0; i < 10; i++) {
      await throttle.assertBootstrapAllowed('203.0.113.9', `token-${i}`);
    }

    await expect(throttle.assertBootstrapAllowed('203.0.113.9', 'token-x')).rejects.toBeInstanceOf(
      RateLimitError
    );

    now += 60_000;
    await expect(throttle.assertBootstrapAllowed('203.0.113.9', 'token-x')).resolves.toBeUndefined();
  });

  it('should allow twenty bootstraps per widget token per minute', async () => {
    for (let i = 0; i < 20; i++) {
      await throttle.assertBootstrapAllowed(`198.51.100.${i}`, 'widget-test-token');
    }

    await expect(
      throttle.assertBootstrapAllowed('198.51.100.99', 'widget-test-token')
    ).rejects.toBeInstanceOf(RateLimitError);
  });

  it('should allow thirty sends per session per minute', async () => {
    for (let i = 0; i < 30; i++) {
      await throttle.assertSendAllowed(`198.51.100.${i}`, 'session-a');
    }

    await expect(throttle.assertSendAllowed('198.51.100.99', 'session-a')).rejects.toBeInstanceOf(
      RateLimitError
    );
  });

  it('should enforce the minimum poll interval', async () => {
    await throttle.assertPollAllowed('session-a');

    const error = await throttle.assertPollAllowed('session-a').catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ retryAfter: 2 });

    now += 2_000;
    await expect(throttle.assertPollAllowed('session-a')).resolves.toBeUndefined();
  });

  it('should allow twenty polls per session per minute', async () => {
    for (let i = 0; i < 20; i++) {
      await throttle.assertPollAllowed('session-a');
      now += 2_000;
    }

    await expect(throttle.assertPollAllowed('session-a')).rejects.toBeInstanceOf(RateLimitError);
  });

  it('should allow sixty typing signals per session per minute', async () => {
    for (let i = 0; i < 60; i++) {
      await throttle.assertTypingAllowed('session-a');
    }

    await expect(throttle.assertTypingAllowed('session-a')).rejects.toBeInstanceOf(RateLimitError);
    await expect(throttle.assertTypingAllowed('session-b')).resolves.toBeUndefined();
  });

  it('should fail closed and log when the store is unavailable', async () => {
    const logger = createMockLogger();
    const broken = new AbuseThrottle(new BrokenStore(), {}, logger);

    await expect(broken.assertSendAllowed('203.0.113.9', 'session-a')).rejects.toBeInstanceOf(
      RateLimitError
    );
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ operation: 'increment', policy: 'fail-closed' }),
      'Widget throttle store failure'
    );
  });
});
