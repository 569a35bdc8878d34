/**
 * Streaming Test Utilities
 *
 * Reads SSE endpoints over a real socket; fastify.inject() waits for the
 * response to finish, which a stream never does.
 */
import * as http from 'node:http';

import type { FastifyInstance } from 'fastify';

// =============================================================================
// Types
// =============================================================================

export interface SSEEvent {
  id?: string;
  event: string;
  data: unknown;
}

export interface SSEClientOptions {
  port: number;
  path: string;
  headers?: Record<string, string>;
  timeout?: number;
}

export interface SSEClient {
  events: SSEEvent[];
  statusCode: number;
  headers: http.IncomingHttpHeaders;
  /** Comment lines (heartbeats) seen so far */
  comments: string[];
  close: () => void;
  waitForEvents: (count: number, timeoutMs?: number) => Promise<SSEEvent[]>;
  /** Resolves once the server ends the response */
  ended: Promise<void>;
}

// =============================================================================
// SSE Parser
// =============================================================================

/**
 * Split buffered text into complete frames; the incomplete tail is returned
 * as `rest` for the next chunk
 */
export function parseSSEFrames(buffer: string): {
  events: SSEEvent[];
  comments: string[];
  rest: string;
} {
  const blocks = buffer.split('\n\n');
  const rest = blocks.pop() ?? '';
  const events: SSEEvent[] = [];
  const comments: string[] = [];

  for (const block of blocks) {
    let event = 'message';
    let id: string | undefined;
    let data: string | undefined;

    for (const line of block.split('\n')) {
      if (line.startsWith(':')) {
        comments.push(line.slice(1).trim());
      } else if (line.startsWith('event: ')) {
        event = line.slice(7);
      } else if (line.startsWith('id: ')) {
        id = line.slice(4);
      } else if (line.startsWith('data: ')) {
        data = line.slice(6);
      }
    }

    if (data !== undefined) {
      const parsed: unknown = JSON.parse(data);
      events.push(id === undefined ? { event, data: parsed } : { id, event, data: parsed });
    }
  }

  return { events, comments, rest };
}

// =============================================================================
// SSE Client
// =============================================================================

export function createSSEClient(options: SSEClientOptions): Promise<SSEClient> {
  return new Promise((resolve, reject) => {
    const { port, path, headers = {}, timeout = 5000 } = options;

    const events: SSEEvent[] = [];
    const comments: string[] = [];
    let waiters: { count: number; resolve: (events: SSEEvent[]) => void }[] = [];
    let markEnded: () => void = () => undefined;
    const ended = new Promise<void>((resolveEnded) => {
      markEnded = resolveEnded;
    });

    const req = http.request(
      {
        hostname: '127.0.0.1',
        port,
        path,
        method: 'GET',
        headers: { Accept: 'text/event-stream', ...headers },
      },
      (res) => {
        clearTimeout(connectionTimer);
        let buffer = '';

        const waitForEvents = (count: number, waitTimeout = 5000): Promise<SSEEvent[]> =>
          new Promise((resolveWait, rejectWait) => {
            if (events.length >= count) {
              resolveWait([...events]);
              return;
            }

            const timer = setTimeout(() => {
              rejectWait(
                new Error(`Timeout waiting for ${count} events, received ${events.length}`)
              );
            }, waitTimeout);

            waiters.push({
              count,
              resolve: (received) => {
                clearTimeout(timer);
                resolveWait(received);
              },
            });
          });

        res.setEncoding('utf8');
        res.on('data', (chunk: string) => {
          const parsed = parseSSEFrames(buffer + chunk);
          buffer = parsed.rest;
          events.push(...parsed.events);
          comments.push(...parsed.comments);

          waiters = waiters.filter((waiter) => {
            if (events.length < waiter.count) return true;
            waiter.resolve([...events]);
            return false;
          });
        });
        res.on('end', markEnded);
        res.on('close', markEnded);

        resolve({
          events,
          comments,
          statusCode: res.statusCode ?? 0,
          headers: res.headers,
          close: () => req.destroy(),
          waitForEvents,
          ended,
        });
      }
    );

    const connectionTimer = setTimeout(() => {
      req.destroy();
      reject(new Error('Connection timeout'));
    }, timeout);

    req.on('error', (error) => {
      clearTimeout(connectionTimer);
      reject(error);
    });

    req.end();
  });
}

// =============================================================================
// Test Helpers
// =============================================================================

/**
 * Listen on an ephemeral loopback port and return it
 */
export async function listenOnFreePort(app: FastifyInstance): Promise<number> {
  await app.listen({ port: 0, host: '127.0.0.1' });
  const address = app.server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Could not get port');
  }
  return address.port;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
