import { describe, it, expect, beforeEach } from 'vitest';

import { subscribeAgentFeed, type AgentNotification } from '../conversations/agent-feed.js';
import { TypingIndicator } from '../conversations/typing-indicator.js';
import {
  T0,
  createRoutingWorld,
  createTestConversation,
  type RoutingWorld,
} from './fixtures/routing-world.js';

describe('subscribeAgentFeed', () => {
  let world: RoutingWorld;
  let typing: TypingIndicator;
  let received: AgentNotification[];
  let unsubscribe: () => void;

  beforeEach(() => {
    world = createRoutingWorld({ agents: [5, 6] });
    typing = new TypingIndicator(world.store, world.events, {
      logger: world.logger,
      clock: world.clock,
    });
    received = [];
    unsubscribe = subscribeAgentFeed(world.events, 5, (notification) => {
      received.push(notification);
    });
  });

  async function assignedConversation() {
    const contact = await world.conversationService.upsertContact({ externalId: 'visitor-1' });
    const { conversation } = await world.conversationService.findOrCreateActiveConversation(
      world.inbox,
      contact.id
    );
    await world.autoAssignment.assign(conversation.id);
    const assigned = await world.conversationService.getConversation(conversation.id);
    return { contact, conversation: assigned };
  }

  it('should forward presence, assignment and visitor messages for the agent', async () => {
    await world.setOnline(5);
    const { contact, conversation } = await assignedConversation();
    const { message } = await world.conversationService.recordMessage({
      conversationId: conversation.id,
      direction: 'in',
      body: 'Hello',
      senderContactId: contact.id,
    });

    expect(received).toEqual([
      { event: 'presence', data: { agent_id: 5, status: 'online' } },
      {
        event: 'assignee',
        data: {
          conversation_id: conversation.id,
          assignee_id: 5,
          previous_assignee_id: null,
          reason: 'auto_assignment',
        },
      },
      {
        event: 'message',
        id: message.id,
        data: {
          conversation_id: conversation.id,
          id: message.id,
          body: 'Hello',
          direction: 'in',
          created_at: T0.toISOString(),
        },
      },
    ]);
  });

  it('should forward visitor typing on the agent conversations only', async () => {
    await world.setOnline(5);
    const { conversation } = await assignedConversation();
    const foreign = createTestConversation({ id: 99, assigneeId: 6 });
    received.length = 0;

    await typing.start(conversation, 'contact');
    await typing.start(conversation, 'operator');
    await typing.start(foreign, 'contact');
    await typing.stop(conversation, 'contact');

    expect(received).toEqual([
      { event: 'typing', data: { conversation_id: conversation.id, is_typing: true } },
      { event: 'typing', data: { conversation_id: conversation.id, is_typing: false } },
    ]);
  });

  it('should stop forwarding once unsubscribed', async () => {
    unsubscribe();

    await world.setOnline(5);

    expect(received).toEqual([]);
  });
});
