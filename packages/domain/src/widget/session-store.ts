/**
 * Widget sessions
 *
 * A session binds an opaque token to one inbox, contact and conversation. It
 * lives only in the shared store with a sliding expiry; a missing record is
 * an expired session.
 */

import { randomBytes } from 'node:crypto';

import {
  AuthenticationError,
  createLogger,
  optimisticUpdate,
  type ServiceLogger,
  type SharedStore,
} from '@chatrouter/core';
import { z } from 'zod';

export type WidgetSessionState = 'new' | 'active';

export interface WidgetSession {
  token: string;
  inboxId: number;
  contactId: number;
  conversationId: number;
  state: WidgetSessionState;
  captchaPassed: boolean;
  createdAt: Date;
  lastSeenAt: Date;
}

export interface NewWidgetSession {
  inboxId: number;
  contactId: number;
  conversationId: number;
}

export interface WidgetSessionStoreOptions {
  /** Sliding expiry in seconds (default: 24 hours) */
  ttlSeconds?: number;
  logger?: ServiceLogger;
  clock?: () => Date;
}

const StoredSessionSchema = z.object({
  inboxId: z.number().int(),
  contactId: z.number().int(),
  conversationId: z.number().int(),
  state: z.enum(['new', 'active']),
  captchaPassed: z.boolean(),
  createdAt: z.coerce.date(),
  lastSeenAt: z.coerce.date(),
});

export function sessionKey(token: string): string {
  return `widget:session:${token}`;
}

export function sessionOwnerKey(inboxId: number, contactId: number): string {
  return `widget:session-owner:${inboxId}:${contactId}`;
}

export function generateSessionToken(): string {
  return randomBytes(32).toString('base64url');
}

export class WidgetSessionStore {
  private readonly ttlSeconds: number;
  private readonly logger: ServiceLogger;
  private readonly clock: () => Date;

  constructor(
    private readonly store: SharedStore,
    options: WidgetSessionStoreOptions = {}
  ) {
    this.ttlSeconds = options.ttlSeconds ?? 24 * 60 * 60;
    this.logger = options.logger ?? createLogger({ name: 'widget-sessions' });
    this.clock = options.clock ?? (() => new Date());
  }

  async create(input: NewWidgetSession): Promise<WidgetSession> {
    const now = this.clock();
    const session: WidgetSession = {
      token: generateSessionToken(),
      ...input,
      state: 'new',
      captchaPassed: false,
      createdAt: now,
      lastSeenAt: now,
    };
    await this.save(session);
    this.logger.info(
      { inboxId: input.inboxId, conversationId: input.conversationId },
      'Widget session created'
    );
    return session;
  }

  async get(token: string): Promise<WidgetSession | null> {
    if (token.length === 0) return null;
    return this.decode(token, await this.store.get(sessionKey(token)));
  }

  /**
   * The live session of this contact in this inbox, if it is still bound to
   * the given conversation
   */
  async findReusable(
    inboxId: number,
    contactId: number,
    conversationId: number
  ): Promise<WidgetSession | null> {
    const token = await this.store.get(sessionOwnerKey(inboxId, contactId));
    if (token === null) return null;

    const session = await this.get(token);
    if (
      !session ||
      session.inboxId !== inboxId ||
      session.contactId !== contactId ||
      session.conversationId !== conversationId
    ) {
      return null;
    }
    return session;
  }

  /** Record activity and push the expiry out */
  async touch(session: WidgetSession): Promise<WidgetSession> {
    return this.update(session, {});
  }

  /** Move a new session to active on its first send, poll or stream */
  async activate(session: WidgetSession): Promise<WidgetSession> {
    return this.update(session, { state: 'active' });
  }

  async markCaptchaPassed(session: WidgetSession): Promise<WidgetSession> {
    return this.update(session, { captchaPassed: true });
  }

  /**
   * Merge a change into the stored record rather than the caller's copy.
   * State only moves new -> active and the captcha flag only false -> true,
   * so a stale copy from a concurrent poll cannot undo either.
   *
   * @throws AuthenticationError when the session expired in the meantime
   */
  private async update(
    session: WidgetSession,
    change: { state?: 'active'; captchaPassed?: true }
  ): Promise<WidgetSession> {
    const { token } = session;
    const now = this.clock();

    const updated = await optimisticUpdate(
      this.store,
      sessionKey(token),
      (raw) => {
        const current = this.decode(token, raw);
        if (!current) return { next: null, result: null };

        const merged: WidgetSession = {
          ...current,
          state: change.state ?? current.state,
          captchaPassed: current.captchaPassed || change.captchaPassed === true,
          lastSeenAt: now > current.lastSeenAt ? now : current.lastSeenAt,
        };
        return { next: this.encode(merged), result: merged };
      },
      { ttlSeconds: this.ttlSeconds }
    );

    if (!updated) {
      throw new AuthenticationError('Widget session expired or invalid');
    }

    await this.store.set(sessionOwnerKey(updated.inboxId, updated.contactId), token, {
      ttlSeconds: this.ttlSeconds,
    });
    return updated;
  }

  private async save(session: WidgetSession): Promise<void> {
    await this.store.set(sessionKey(session.token), this.encode(session), {
      ttlSeconds: this.ttlSeconds,
    });
    await this.store.set(sessionOwnerKey(session.inboxId, session.contactId), session.token, {
      ttlSeconds: this.ttlSeconds,
    });
  }

  private encode(session: WidgetSession): string {
    const { token: _token, ...stored } = session;
    return JSON.stringify(stored);
  }

  private decode(token: string, raw: string | null): WidgetSession | null {
    if (raw === null) return null;

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      this.logger.warn({}, 'Discarding unreadable widget session');
      return null;
    }

    const parsed = StoredSessionSchema.safeParse(decoded);
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues.length }, 'Discarding malformed widget session');
      return null;
    }
    return { token, ...parsed.data };
  }
}
