import { describe, it, expect, beforeEach } from 'vitest';
import { AuthenticationError, InMemorySharedStore } from '@chatrouter/core';

import { WidgetSessionStore, sessionKey, sessionOwnerKey } from '../widget/session-store.js';
import { T0, createMockLogger } from './fixtures/routing-world.js';

/**
 * Runs one queued action right after the next read returns, so a second
 * writer lands between another update's read and its compare-and-swap
 */
class InterleavingStore extends InMemorySharedStore {
  private pending: (() => Promise<unknown>) | null = null;

  interleaveAfterNextRead(action: () => Promise<unknown>): void {
    this.pending = action;
  }

  override async get(key: string): Promise<string | null> {
    const value = await super.get(key);
    const action = this.pending;
    if (action) {
      this.pending = null;
      await action();
    }
    return value;
  }
}

describe('WidgetSessionStore', () => {
  let now: Date;
  let store: InterleavingStore;
  let sessions: WidgetSessionStore;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    now = T0;
    logger = createMockLogger();
    store = new InterleavingStore({ now: () => now.getTime() });
    sessions = new WidgetSessionStore(store, { ttlSeconds: 60, logger, clock: () => now });
  });

  function advanceSeconds(seconds: number) {
    now = new Date(now.getTime() + seconds * 1000);
  }

  async function createSession() {
    return sessions.create({ inboxId: 1, contactId: 4, conversationId: 9 });
  }

  it('should create a new session bound to its owner', async () => {
    const session = await createSession();

    expect(session).toMatchObject({ state: 'new', captchaPassed: false, lastSeenAt: T0 });
    expect(await store.get(sessionOwnerKey(1, 4))).toBe(session.token);
    expect(await sessions.get(session.token)).toEqual(session);
  });

  it('should keep a passed captcha when a stale copy is activated afterwards', async () => {
    const created = await createSession();
    const staleFromPoll = await sessions.get(created.token);
    const fromSend = await sessions.get(created.token);
    expect(staleFromPoll).not.toBeNull();
    expect(fromSend).not.toBeNull();
    if (!staleFromPoll || !fromSend) return;

    await sessions.markCaptchaPassed(fromSend);
    const activated = await sessions.activate(staleFromPoll);

    expect(activated).toMatchObject({ state: 'active', captchaPassed: true });
    expect(await sessions.get(created.token)).toMatchObject({
      state: 'active',
      captchaPassed: true,
    });
  });

  it('should retry an activation that lost its race to a captcha pass', async () => {
    const created = await createSession();
    store.interleaveAfterNextRead(() => sessions.markCaptchaPassed(created));

    const activated = await sessions.activate(created);

    expect(activated).toMatchObject({ state: 'active', captchaPassed: true });
    expect(await sessions.get(created.token)).toMatchObject({
      state: 'active',
      captchaPassed: true,
    });
  });

  it('should not move an active session back to new', async () => {
    const created = await createSession();
    await sessions.activate(created);

    const marked = await sessions.markCaptchaPassed(created);

    expect(marked).toMatchObject({ state: 'active', captchaPassed: true });
  });

  it('should slide the expiry on every touch', async () => {
    const created = await createSession();

    advanceSeconds(50);
    const touched = await sessions.touch(created);
    advanceSeconds(50);

    expect(touched.lastSeenAt).toEqual(new Date(T0.getTime() + 50_000));
    expect(await sessions.get(created.token)).toMatchObject({ conversationId: 9 });
    expect(await sessions.findReusable(1, 4, 9)).toMatchObject({ token: created.token });
  });

  it('should reject an update to an expired session', async () => {
    const created = await createSession();
    advanceSeconds(61);

    await expect(sessions.activate(created)).rejects.toThrow(AuthenticationError);
    expect(await store.get(sessionKey(created.token))).toBeNull();
  });

  it('should discard an unreadable record', async () => {
    await store.set(sessionKey('broken'), '{not json');

    expect(await sessions.get('broken')).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith({}, 'Discarding unreadable widget session');
  });
});
