import { afterEach, describe, expect, it } from 'vitest';

import { agentHeaders, createTestApp, WIDGET_TOKEN, type TestApp } from './test-app.js';
import {
  createSSEClient,
  listenOnFreePort,
  parseSSEFrames,
  type SSEClient,
} from './streaming-test-utils.js';

/**
 * SSE endpoints over a real loopback socket
 */
describe('Streaming endpoints', () => {
  let testApp: TestApp;
  let port: number;
  const clients: SSEClient[] = [];

  async function start(env: Record<string, string> = {}): Promise<void> {
    testApp = await createTestApp({ env });
    port = await listenOnFreePort(testApp.app);
  }

  async function connect(path: string, headers: Record<string, string> = {}): Promise<SSEClient> {
    const client = await createSSEClient({ port, path, headers });
    clients.push(client);
    return client;
  }

  async function bootstrap(): Promise<string> {
    const response = await testApp.app.inject({
      method: 'POST',
      url: '/widget/bootstrap',
      payload: { widget_token: WIDGET_TOKEN, contact_external_id: 'visitor-1' },
    });
    return response.json<{ widget_session_token: string }>().widget_session_token;
  }

  async function agentReply(body: string): Promise<void> {
    await testApp.app.inject({
      method: 'POST',
      url: '/agent/conversations/1/messages',
      headers: agentHeaders(1),
      payload: { body },
    });
  }

  function widgetStreamPath(sessionToken: string, sinceId?: number): string {
    const query = new URLSearchParams({
      widget_token: WIDGET_TOKEN,
      widget_session_token: sessionToken,
    });
    if (sinceId !== undefined) query.set('since_id', String(sinceId));
    return `/widget/stream?${query.toString()}`;
  }

  afterEach(async () => {
    for (const client of clients.splice(0)) client.close();
    await testApp.app.close();
  });

  // ==========================================================================
  // Frame parsing
  // ==========================================================================

  it('should keep an incomplete frame for the next chunk', () => {
    const parsed = parseSSEFrames(
      'event: ready\ndata: {"a":1}\n\n: heartbeat\n\nid: 2\nevent: mes'
    );

    expect(parsed.events).toEqual([{ event: 'ready', data: { a: 1 } }]);
    expect(parsed.comments).toEqual(['heartbeat']);
    expect(parsed.rest).toBe('id: 2\nevent: mes');
  });

  // ==========================================================================
  // GET /widget/stream
  // ==========================================================================

  describe('GET /widget/stream', () => {
    it('should open with a ready frame and push agent replies', async () => {
      await start();
      const sessionToken = await bootstrap();

      const client = await connect(widgetStreamPath(sessionToken), {
        'x-correlation-id': 'test-stream-1',
      });

      expect(client.statusCode).toBe(200);
      expect(client.headers['content-type']).toBe('text/event-stream');
      expect(client.headers['x-correlation-id']).toBe('test-stream-1');

      const [ready] = await client.waitForEvents(1);
      expect(ready).toEqual({ event: 'ready', data: { conversation_id: 1 } });

      await agentReply('Hi there');

      const events = await client.waitForEvents(2);
      expect(events[1]).toEqual({
        id: '1',
        event: 'message',
        data: { id: 1, body: 'Hi there', direction: 'out', created_at: expect.any(String) },
      });
    });

    it('should replay replies after since_id', async () => {
      await start();
      const sessionToken = await bootstrap();
      await agentReply('First');
      await agentReply('Second');

      const client = await connect(widgetStreamPath(sessionToken, 1));

      const events = await client.waitForEvents(2);
      expect(events.map((e) => e.event)).toEqual(['ready', 'message']);
      expect(events[1]?.id).toBe('2');
    });

    it('should resume from Last-Event-ID', async () => {
      await start();
      const sessionToken = await bootstrap();
      await agentReply('First');
      await agentReply('Second');
      await agentReply('Third');

      const client = await connect(widgetStreamPath(sessionToken), { 'last-event-id': '2' });

      const events = await client.waitForEvents(2);
      expect(events[1]?.id).toBe('3');
    });

    it('should refuse an invalid session before streaming', async () => {
      await start();

      const client = await connect(widgetStreamPath('not-a-session'));

      expect(client.statusCode).toBe(401);
      expect(client.headers['content-type']).toMatch(/^application\/json/);
    });

    it('should send heartbeats and close an idle stream', async () => {
      await start({ STREAM_HEARTBEAT_MS: '50', STREAM_IDLE_TIMEOUT_MS: '300' });
      const sessionToken = await bootstrap();

      const client = await connect(widgetStreamPath(sessionToken));
      await client.ended;

      expect(client.events.map((e) => e.event)).toEqual(['ready']);
      expect(client.comments).toContain('heartbeat');
    });
  });

  // ==========================================================================
  // GET /agent/stream
  // ==========================================================================

  describe('GET /agent/stream', () => {
    it('should require an API key', async () => {
      await start();

      const client = await connect('/agent/stream', { 'x-agent-id': '2' });

      expect(client.statusCode).toBe(401);
    });

    it('should push presence, assignment and visitor messages to the agent', async () => {
      await start();
      const client = await connect('/agent/stream', agentHeaders(2));
      await client.waitForEvents(1);

      await testApp.app.inject({
        method: 'PUT',
        url: '/agent/presence',
        headers: agentHeaders(2),
        payload: { status: 'online' },
      });
      const sessionToken = await bootstrap();
      await testApp.container.events.drain();
      await testApp.app.inject({
        method: 'POST',
        url: '/widget/send',
        payload: {
          widget_token: WIDGET_TOKEN,
          widget_session_token: sessionToken,
          body: 'I need help',
        },
      });

      const events = await client.waitForEvents(4);
      expect(events.slice(0, 3)).toEqual([
        { event: 'ready', data: { agent_id: 2 } },
        { event: 'presence', data: { agent_id: 2, status: 'online' } },
        {
          event: 'assignee',
          data: {
            conversation_id: 1,
            assignee_id: 2,
            previous_assignee_id: null,
            reason: 'auto_assignment',
          },
        },
      ]);
      expect(events[3]).toMatchObject({
        id: '1',
        event: 'message',
        data: { conversation_id: 1, id: 1, body: 'I need help', direction: 'in' },
      });
    });
  });
});
