import { describe, it, expect, beforeEach } from 'vitest';

import { LastSeenTracker } from '../conversations/last-seen.js';
import {
  T0,
  createRoutingWorld,
  createTestConversation,
  type RoutingWorld,
} from './fixtures/routing-world.js';

describe('LastSeenTracker', () => {
  let world: RoutingWorld;
  let tracker: LastSeenTracker;

  beforeEach(() => {
    world = createRoutingWorld();
    world.conversations.add(createTestConversation({ id: 3, assigneeId: 5 }));
    tracker = new LastSeenTracker(world.store, world.conversations, { clock: world.clock });
  });

  it('should write at most once per reader within the throttle window', async () => {
    expect(await tracker.touchAgent(3, 5)).toBe(true);
    world.advanceSeconds(10);
    expect(await tracker.touchAgent(3, 5)).toBe(false);

    expect((await world.conversations.findById(3))?.agentLastSeenAt).toEqual(T0);
  });

  it('should write again once the window has passed', async () => {
    await tracker.touchAgent(3, 5);
    world.advanceSeconds(16);

    expect(await tracker.touchAgent(3, 5)).toBe(true);
    expect((await world.conversations.findById(3))?.agentLastSeenAt).toEqual(
      new Date(T0.getTime() + 16_000)
    );
  });

  it('should throttle the visitor independently of the agent', async () => {
    await tracker.touchAgent(3, 5);

    expect(await tracker.touchContact(3, 1)).toBe(true);
    const conversation = await world.conversations.findById(3);
    expect(conversation?.contactLastSeenAt).toEqual(T0);
    expect(await world.store.get('last_seen:contact:1:3')).toBe('1');
  });
});
