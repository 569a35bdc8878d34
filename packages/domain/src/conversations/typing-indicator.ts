/**
 * Typing indicators
 *
 * A short-lived flag per conversation and side in the shared store. Starting
 * refreshes the flag; it lapses on its own when the typist goes quiet, without
 * a stop event.
 */

import { createLogger, type ServiceLogger, type SharedStore } from '@chatrouter/core';

import { CHAT_EVENTS, type ChatEventBus, type TypingSide } from '../events.js';
import type { OperationContext } from './conversation-service.js';
import type { Conversation } from './types.js';

export interface TypingIndicatorOptions {
  /** Seconds a typing flag lives without a refresh (default: 8) */
  ttlSeconds?: number;
  logger?: ServiceLogger;
  clock?: () => Date;
}

export interface TypingStatus {
  operatorTyping: boolean;
  contactTyping: boolean;
}

export function typingKey(conversationId: number, side: TypingSide): string {
  return `typing:${conversationId}:${side}`;
}

export class TypingIndicator {
  private readonly ttlSeconds: number;
  private readonly logger: ServiceLogger;
  private readonly clock: () => Date;

  constructor(
    private readonly store: SharedStore,
    private readonly events: ChatEventBus,
    options: TypingIndicatorOptions = {}
  ) {
    this.ttlSeconds = options.ttlSeconds ?? 8;
    this.logger = options.logger ?? createLogger({ name: 'typing-indicator' });
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Raise or refresh the flag; `typing_started` fires only when it was not set
   *
   * @returns whether this call started the indicator
   */
  async start(
    conversation: Conversation,
    side: TypingSide,
    context: OperationContext = {}
  ): Promise<boolean> {
    const key = typingKey(conversation.id, side);
    const started = await this.store.set(key, '1', {
      ttlSeconds: this.ttlSeconds,
      onlyIfAbsent: true,
    });
    if (!started) {
      await this.store.set(key, '1', { ttlSeconds: this.ttlSeconds });
      return false;
    }

    this.logger.debug({ conversationId: conversation.id, side }, 'Typing started');
    await this.events.dispatch(
      CHAT_EVENTS.conversationTypingStarted,
      this.clock(),
      { conversation, side },
      context.correlationId === undefined ? {} : { correlationId: context.correlationId }
    );
    return true;
  }

  /**
   * Clear the flag; `typing_stopped` fires only when it was set
   */
  async stop(
    conversation: Conversation,
    side: TypingSide,
    context: OperationContext = {}
  ): Promise<boolean> {
    const key = typingKey(conversation.id, side);
    if ((await this.store.get(key)) === null) {
      return false;
    }
    await this.store.delete(key);

    await this.events.dispatch(
      CHAT_EVENTS.conversationTypingStopped,
      this.clock(),
      { conversation, side },
      context.correlationId === undefined ? {} : { correlationId: context.correlationId }
    );
    return true;
  }

  async status(conversationId: number): Promise<TypingStatus> {
    const [operator, contact] = await Promise.all([
      this.store.get(typingKey(conversationId, 'operator')),
      this.store.get(typingKey(conversationId, 'contact')),
    ]);
    return { operatorTyping: operator !== null, contactTyping: contact !== null };
  }
}
