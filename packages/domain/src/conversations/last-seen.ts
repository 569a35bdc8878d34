import type { SharedStore } from '@chatrouter/core';

import type { ConversationRepository } from './repositories.js';

export interface LastSeenTrackerOptions {
  /** Minimum seconds between two writes for the same reader (default: 15) */
  throttleSeconds?: number;
  clock?: () => Date;
}

/**
 * Records when the assignee or the visitor last looked at a conversation.
 * Writes are throttled per reader through a marker key in the shared store,
 * so a polling widget does not write on every request.
 */
export class LastSeenTracker {
  private readonly throttleSeconds: number;
  private readonly clock: () => Date;

  constructor(
    private readonly store: SharedStore,
    private readonly conversations: ConversationRepository,
    options: LastSeenTrackerOptions = {}
  ) {
    this.throttleSeconds = options.throttleSeconds ?? 15;
    this.clock = options.clock ?? (() => new Date());
  }

  /** @returns whether the timestamp was written */
  touchAgent(conversationId: number, agentId: number): Promise<boolean> {
    return this.touch(`last_seen:agent:${agentId}:${conversationId}`, conversationId, 'agent');
  }

  /** @returns whether the timestamp was written */
  touchContact(conversationId: number, contactId: number): Promise<boolean> {
    return this.touch(
      `last_seen:contact:${contactId}:${conversationId}`,
      conversationId,
      'contact'
    );
  }

  private async touch(
    marker: string,
    conversationId: number,
    side: 'agent' | 'contact'
  ): Promise<boolean> {
    const due = await this.store.set(marker, '1', {
      ttlSeconds: this.throttleSeconds,
      onlyIfAbsent: true,
    });
    if (!due) {
      return false;
    }
    await this.conversations.setLastSeen(conversationId, side, this.clock());
    return true;
  }
}
