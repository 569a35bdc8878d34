/**
 * Domain events and the in-process event dispatcher
 *
 * The dispatcher is a plain instance built at process start and handed to
 * every component that publishes or subscribes. It is a fan-out hub, not a
 * durable log: listeners registered after an event fires never see it.
 */

import { randomUUID } from 'node:crypto';

import { toError } from './errors.js';
import { createLogger, type ServiceLogger } from './logger/index.js';

// ============================================================================
// DOMAIN EVENTS
// ============================================================================

/**
 * Event metadata included with every domain event
 */
export interface EventMetadata {
  /** Unique event ID */
  eventId: string;
  /** Event timestamp */
  timestamp: Date;
  /** Correlation ID for tracing */
  correlationId?: string;
  /** Causation ID (ID of event that caused this one) */
  causationId?: string;
  /** Service that emitted the event */
  source: string;
  /** Event schema version */
  version: number;
}

/**
 * Base domain event structure
 */
export interface DomainEvent<TType extends string = string, TPayload = unknown> {
  type: TType;
  payload: TPayload;
  metadata: EventMetadata;
}

/**
 * Options for creating a domain event
 */
export interface CreateEventOptions {
  correlationId?: string;
  causationId?: string;
  /** Service name (defaults to SERVICE_NAME env var) */
  source?: string;
  /** Schema version (defaults to 1) */
  version?: number;
  /** Event time (defaults to now) */
  timestamp?: Date;
}

/**
 * Create a domain event with proper metadata
 */
export function createDomainEvent<TType extends string, TPayload>(
  type: TType,
  payload: TPayload,
  options: CreateEventOptions = {}
): DomainEvent<TType, TPayload> {
  const {
    correlationId,
    causationId,
    source = process.env.SERVICE_NAME ?? 'chatrouter',
    version = 1,
    timestamp = new Date(),
  } = options;

  const metadata: EventMetadata = {
    eventId: randomUUID(),
    timestamp,
    source,
    version,
  };

  if (correlationId !== undefined) {
    metadata.correlationId = correlationId;
  }
  if (causationId !== undefined) {
    metadata.causationId = causationId;
  }

  return { type, payload, metadata };
}

// ============================================================================
// EVENT BUS
// ============================================================================

export type EventListener<TName extends string, TPayload> = (
  event: DomainEvent<TName, TPayload>
) => void | Promise<void>;

export interface SubscribeOptions {
  /** Only invoked for dispatches made with `async: true`, after dispatch returns */
  async?: boolean;
}

export interface DispatchOptions {
  /** Also schedule the asynchronous listeners */
  async?: boolean;
  correlationId?: string;
}

/**
 * Publish/subscribe surface shared by every component
 *
 * `TMap` maps each event name to its payload type.
 */
export interface EventBus<TMap extends object> {
  subscribe<K extends keyof TMap & string>(
    eventName: K,
    listener: EventListener<K, TMap[K]>,
    options?: SubscribeOptions
  ): () => void;
  unsubscribe<K extends keyof TMap & string>(
    eventName: K,
    listener: EventListener<K, TMap[K]>
  ): void;
  dispatch<K extends keyof TMap & string>(
    eventName: K,
    timestamp: Date,
    payload: TMap[K],
    options?: DispatchOptions
  ): Promise<void>;
}

interface RegisteredListener {
  listener: unknown;
  invoke(event: DomainEvent<string, unknown>): void | Promise<void>;
}

export interface EventDispatcherOptions {
  logger?: ServiceLogger;
  /** Value of `metadata.source` on dispatched events */
  source?: string;
}

/**
 * In-process event dispatcher
 *
 * Synchronous listeners run in registration order and are awaited before
 * `dispatch` resolves. Asynchronous listeners are deferred to the next
 * macrotask; `drain()` waits for them. A failing listener is logged and
 * never affects the caller or the other listeners.
 */
export class EventDispatcher<TMap extends object> implements EventBus<TMap> {
  private readonly syncListeners = new Map<string, RegisteredListener[]>();
  private readonly asyncListeners = new Map<string, RegisteredListener[]>();
  private readonly pending = new Set<Promise<void>>();
  private readonly logger: ServiceLogger;
  private readonly source: string | undefined;

  constructor(options: EventDispatcherOptions = {}) {
    this.logger = options.logger ?? createLogger({ name: 'event-dispatcher' });
    this.source = options.source;
  }

  subscribe<K extends keyof TMap & string>(
    eventName: K,
    listener: EventListener<K, TMap[K]>,
    options: SubscribeOptions = {}
  ): () => void {
    const registry = options.async === true ? this.asyncListeners : this.syncListeners;
    const entries = registry.get(eventName) ?? [];
    entries.push({ listener, invoke: listener });
    registry.set(eventName, entries);

    return () => this.unsubscribe(eventName, listener);
  }

  unsubscribe<K extends keyof TMap & string>(
    eventName: K,
    listener: EventListener<K, TMap[K]>
  ): void {
    for (const registry of [this.syncListeners, this.asyncListeners]) {
      const entries = registry.get(eventName);
      if (!entries) continue;

      const remaining = entries.filter((entry) => entry.listener !== listener);
      if (remaining.length === 0) {
        registry.delete(eventName);
      } else {
        registry.set(eventName, remaining);
      }
    }
  }

  async dispatch<K extends keyof TMap & string>(
    eventName: K,
    timestamp: Date,
    payload: TMap[K],
    options: DispatchOptions = {}
  ): Promise<void> {
    const eventOptions: CreateEventOptions = { timestamp };
    if (options.correlationId !== undefined) eventOptions.correlationId = options.correlationId;
    if (this.source !== undefined) eventOptions.source = this.source;

    const event = createDomainEvent(eventName, payload, eventOptions);

    // Snapshot so listeners that (un)subscribe during delivery do not affect this dispatch
    const syncEntries = [...(this.syncListeners.get(eventName) ?? [])];
    for (const entry of syncEntries) {
      await this.invokeSafely(entry, event);
    }

    if (options.async === true) {
      const asyncEntries = [...(this.asyncListeners.get(eventName) ?? [])];
      for (const entry of asyncEntries) {
        this.defer(entry, event);
      }
    }
  }

  /**
   * Wait until every deferred listener (including ones scheduled while draining) has settled
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  /**
   * Number of listeners registered for an event, both modes combined
   */
  listenerCount(eventName: keyof TMap & string): number {
    return (
      (this.syncListeners.get(eventName)?.length ?? 0) +
      (this.asyncListeners.get(eventName)?.length ?? 0)
    );
  }

  private defer(entry: RegisteredListener, event: DomainEvent<string, unknown>): void {
    const task = new Promise<void>((resolve) => {
      setImmediate(resolve);
    })
      .then(() => this.invokeSafely(entry, event))
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  private async invokeSafely(
    entry: RegisteredListener,
    event: DomainEvent<string, unknown>
  ): Promise<void> {
    try {
      await entry.invoke(event);
    } catch (error) {
      this.logger.error(
        { err: toError(error), eventName: event.type, eventId: event.metadata.eventId },
        'Event listener failed'
      );
    }
  }
}
