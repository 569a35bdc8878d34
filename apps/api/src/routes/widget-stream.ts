/**
 * Widget live stream
 *
 * GET /widget/stream pushes agent replies, assignee changes and the
 * conversation's resolution to the visitor over SSE. A reconnecting client
 * resumes with since_id or Last-Event-ID and is sent what it missed first.
 */
import type { FastifyPluginAsync } from 'fastify';
import { ValidationError, createLogger, toError } from '@chatrouter/core';
import type { WidgetNotification } from '@chatrouter/domain';
import { z } from 'zod';

import type { Container } from '../container.js';
import { SSEStream, StreamRegistry, resumeCursor, type StreamTimings } from './sse.js';
import { parseInput } from './validation.js';

const logger = createLogger({ name: 'widget-stream' });

export const StreamQuerySchema = z.object({
  widget_token: z.string().default(''),
  widget_session_token: z.string().default(''),
  since_id: z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER).optional(),
});

function toFrame(notification: WidgetNotification) {
  return notification.event === 'message'
    ? { event: notification.event, id: notification.id, data: notification.data }
    : { event: notification.event, data: notification.data };
}

export function createWidgetStreamRoutes(
  container: Container,
  timings: StreamTimings
): FastifyPluginAsync {
  return async (fastify) => {
    const { widget } = container;
    const registry = new StreamRegistry();

    fastify.addHook('preClose', async () => {
      registry.closeAll();
    });

    fastify.get('/widget/stream', async (request, reply) => {
      const query = parseInput(StreamQuerySchema, request.query, 'Invalid stream query');
      if (query.widget_token.length === 0 || query.widget_session_token.length === 0) {
        throw new ValidationError('widget_token and widget_session_token are required');
      }

      const session = await widget.openStream(query.widget_token, query.widget_session_token);
      let cursor = resumeCursor(query.since_id, request.headers['last-event-id']);

      const stream = new SSEStream(reply, timings);
      registry.track(stream);
      stream.open();
      stream.send({ event: 'ready', data: { conversation_id: session.conversationId } });

      // Live events are held back until the replay is written, then de-duplicated by id
      let pending: WidgetNotification[] | null = [];
      const forward = (notification: WidgetNotification): void => {
        if (notification.event === 'message') {
          if (notification.id <= cursor) return;
          cursor = notification.id;
        }
        stream.send(toFrame(notification));
      };

      const unsubscribe = widget.subscribe(session, (notification) => {
        if (pending) {
          pending.push(notification);
        } else {
          forward(notification);
        }
      });

      stream.onClose((reason) => {
        unsubscribe();
        logger.debug({ conversationId: session.conversationId, reason }, 'Widget stream closed');
      });

      try {
        const missed = await widget.replay(session, cursor);
        for (const message of missed) {
          forward({ event: 'message', id: message.id, data: message });
        }
      } catch (error) {
        logger.error(
          { err: toError(error), conversationId: session.conversationId },
          'Widget stream replay failed'
        );
        stream.close('error');
        return;
      }

      const held = pending;
      pending = null;
      for (const notification of held) {
        forward(notification);
      }

      logger.debug(
        { conversationId: session.conversationId, cursor, streams: registry.size },
        'Widget stream opened'
      );
    });
  };
}
