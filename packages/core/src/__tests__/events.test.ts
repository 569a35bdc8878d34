import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createDomainEvent, EventDispatcher, type DomainEvent } from '../events.js';

interface TestEvents {
  'conversation.created': { conversationId: number };
  'assignee.changed': { conversationId: number; assigneeId: number | null };
}

const createMockLogger = () => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
});

describe('createDomainEvent', () => {
  const originalServiceName = process.env.SERVICE_NAME;

  beforeEach(() => {
    process.env.SERVICE_NAME = 'test-service';
  });

  afterEach(() => {
    if (originalServiceName !== undefined) {
      process.env.SERVICE_NAME = originalServiceName;
    } else {
      delete process.env.SERVICE_NAME;
    }
  });

  it('should create a basic domain event with required fields', () => {
    const event = createDomainEvent('test.event', { message: 'Hello' });

    expect(event.type).toBe('test.event');
    expect(event.payload).toEqual({ message: 'Hello' });
    expect(event.metadata).toMatchObject({
      eventId: expect.any(String),
      timestamp: expect.any(Date),
      source: 'test-service',
      version: 1,
    });
    expect(event.metadata.correlationId).toBeUndefined();
  });

  it('should use the given timestamp and correlation ID', () => {
    const timestamp = new Date('2024-03-01T10:00:00.000Z');
    const event = createDomainEvent('test.event', {}, { timestamp, correlationId: 'corr-1' });

    expect(event.metadata.timestamp).toBe(timestamp);
    expect(event.metadata.correlationId).toBe('corr-1');
  });

  it('should generate unique event IDs', () => {
    const event1 = createDomainEvent('test.event', { value: 1 });
    const event2 = createDomainEvent('test.event', { value: 2 });

    expect(event1.metadata.eventId).not.toBe(event2.metadata.eventId);
  });
});

describe('EventDispatcher', () => {
  let dispatcher: EventDispatcher<TestEvents>;
  let logger: ReturnType<typeof createMockLogger>;
  const at = new Date('2024-03-01T10:00:00.000Z');

  beforeEach(() => {
    logger = createMockLogger();
    dispatcher = new EventDispatcher<TestEvents>({ logger, source: 'test' });
  });

  it('should invoke synchronous listeners in registration order before dispatch resolves', async () => {
    const calls: string[] = [];
    dispatcher.subscribe('conversation.created', () => {
      calls.push('first');
    });
    dispatcher.subscribe('conversation.created', async () => {
      await Promise.resolve();
      calls.push('second');
    });
    dispatcher.subscribe('conversation.created', () => {
      calls.push('third');
    });

    await dispatcher.dispatch('conversation.created', at, { conversationId: 1 });

    expect(calls).toEqual(['first', 'second', 'third']);
  });

  it('should deliver payload, type and metadata', async () => {
    const received: DomainEvent<'assignee.changed', TestEvents['assignee.changed']>[] = [];
    dispatcher.subscribe('assignee.changed', (event) => {
      received.push(event);
    });

    await dispatcher.dispatch(
      'assignee.changed',
      at,
      { conversationId: 5, assigneeId: 2 },
      { correlationId: 'corr-9' }
    );

    expect(received).toHaveLength(1);
    expect(received[0]?.type).toBe('assignee.changed');
    expect(received[0]?.payload).toEqual({ conversationId: 5, assigneeId: 2 });
    expect(received[0]?.metadata.timestamp).toBe(at);
    expect(received[0]?.metadata.correlationId).toBe('corr-9');
    expect(received[0]?.metadata.source).toBe('test');
  });

  it('should log a failing listener and keep delivering to the rest', async () => {
    const after = vi.fn();
    dispatcher.subscribe('conversation.created', () => {
      throw new Error('listener exploded');
    });
    dispatcher.subscribe('conversation.created', after);

    await expect(
      dispatcher.dispatch('conversation.created', at, { conversationId: 1 })
    ).resolves.toBeUndefined();

    expect(after).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ eventName: 'conversation.created' }),
      'Event listener failed'
    );
  });

  it('should not invoke async listeners unless dispatched with async', async () => {
    const asyncListener = vi.fn();
    dispatcher.subscribe('conversation.created', asyncListener, { async: true });

    await dispatcher.dispatch('conversation.created', at, { conversationId: 1 });
    await dispatcher.drain();

    expect(asyncListener).not.toHaveBeenCalled();
  });

  it('should defer async listeners until after dispatch returns', async () => {
    const asyncListener = vi.fn();
    const syncListener = vi.fn();
    dispatcher.subscribe('conversation.created', asyncListener, { async: true });
    dispatcher.subscribe('conversation.created', syncListener);

    await dispatcher.dispatch('conversation.created', at, { conversationId: 3 }, { async: true });

    expect(syncListener).toHaveBeenCalledTimes(1);
    expect(asyncListener).not.toHaveBeenCalled();

    await dispatcher.drain();

    expect(asyncListener).toHaveBeenCalledTimes(1);
    expect(asyncListener).toHaveBeenCalledWith(
      expect.objectContaining({ payload: { conversationId: 3 } })
    );
  });

  it('should catch and log async listener failures', async () => {
    dispatcher.subscribe(
      'conversation.created',
      async () => {
        await Promise.resolve();
        throw new Error('deferred failure');
      },
      { async: true }
    );

    await dispatcher.dispatch('conversation.created', at, { conversationId: 1 }, { async: true });
    await dispatcher.drain();

    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('should stop delivering after unsubscribe', async () => {
    const listener = vi.fn();
    const unsubscribe = dispatcher.subscribe('conversation.created', listener);

    await dispatcher.dispatch('conversation.created', at, { conversationId: 1 });
    unsubscribe();
    await dispatcher.dispatch('conversation.created', at, { conversationId: 2 });

    expect(listener).toHaveBeenCalledTimes(1);
    expect(dispatcher.listenerCount('conversation.created')).toBe(0);
  });

  it('should not replay events to listeners registered later', async () => {
    await dispatcher.dispatch('conversation.created', at, { conversationId: 1 });

    const late = vi.fn();
    dispatcher.subscribe('conversation.created', late);

    expect(late).not.toHaveBeenCalled();
  });

  it('should keep separate dispatchers isolated', async () => {
    const other = new EventDispatcher<TestEvents>({ logger });
    const listener = vi.fn();
    other.subscribe('conversation.created', listener);

    await dispatcher.dispatch('conversation.created', at, { conversationId: 1 });

    expect(listener).not.toHaveBeenCalled();
  });
});
