/**
 * Widget Routes
 *
 * Public endpoints the embeddable chat widget calls. They authenticate with
 * the inbox's widget token and the visitor's session token; abuse limits and
 * captcha are enforced by the gateway.
 */
import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import { z } from 'zod';

import type { Container } from '../container.js';
import { parseInput } from './validation.js';

const optionalText = (max: number) => z.string().trim().max(max).nullish();

export const BootstrapBodySchema = z.object({
  widget_token: z.string().min(1).max(255),
  contact_external_id: z.string().max(255),
  name: optionalText(255),
  email: optionalText(254),
  phone: optionalText(64),
});

export const SendBodySchema = z.object({
  widget_token: z.string().min(1).max(255),
  widget_session_token: z.string().min(1).max(255),
  body: z.string(),
  captcha_token: z.string().max(255).nullish(),
  captcha_answer: z.string().max(32).nullish(),
});

export const PollQuerySchema = z.object({
  widget_token: z.string().default(''),
  widget_session_token: z.string().default(''),
  since_id: z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER).default(0),
});

export const TypingBodySchema = z.object({
  widget_token: z.string().min(1).max(255),
  widget_session_token: z.string().min(1).max(255),
  is_typing: z.boolean(),
});

function header(request: FastifyRequest, name: 'origin' | 'referer'): string | null {
  const value = request.headers[name];
  return typeof value === 'string' ? value : null;
}

export function createWidgetRoutes(container: Container): FastifyPluginAsync {
  return async (fastify) => {
    const { widget } = container;

    /**
     * POST /widget/bootstrap
     * Start or resume the visitor's session and conversation
     */
    fastify.post('/widget/bootstrap', async (request) => {
      const body = parseInput(BootstrapBodySchema, request.body, 'Invalid bootstrap payload');

      const result = await widget.bootstrap(
        {
          widgetToken: body.widget_token,
          contactExternalId: body.contact_external_id,
          name: body.name,
          email: body.email,
          phone: body.phone,
          origin: header(request, 'origin'),
          referer: header(request, 'referer'),
          clientIp: request.ip,
        },
        { correlationId: request.correlationId }
      );

      const response: Record<string, unknown> = {
        widget_session_token: result.sessionToken,
        conversation_id: result.conversationId,
        captcha_required: result.captchaRequired,
      };
      if (result.captchaToken !== undefined) response.captcha_token = result.captchaToken;
      if (result.captchaQuestion !== undefined) response.captcha_question = result.captchaQuestion;
      response.initial_messages = result.initialMessages;

      return response;
    });

    /**
     * POST /widget/send
     * Record a visitor message
     */
    fastify.post('/widget/send', async (request, reply) => {
      const body = parseInput(SendBodySchema, request.body, 'Invalid send payload');

      const sent = await widget.send(
        {
          widgetToken: body.widget_token,
          sessionToken: body.widget_session_token,
          body: body.body,
          captchaToken: body.captcha_token,
          captchaAnswer: body.captcha_answer,
          clientIp: request.ip,
        },
        { correlationId: request.correlationId }
      );

      return reply.status(201).send({ id: sent.id, created_at: sent.createdAt.toISOString() });
    });

    /**
     * GET /widget/poll
     * Agent replies after since_id
     */
    fastify.get('/widget/poll', async (request) => {
      const query = parseInput(PollQuerySchema, request.query, 'Invalid poll query');

      const messages = await widget.poll({
        widgetToken: query.widget_token,
        sessionToken: query.widget_session_token,
        sinceId: query.since_id,
      });

      return { messages };
    });

    /**
     * POST /widget/typing
     * Raise or clear the visitor's typing indicator
     */
    fastify.post('/widget/typing', async (request) => {
      const body = parseInput(TypingBodySchema, request.body, 'Invalid typing payload');

      await widget.setTyping(
        {
          widgetToken: body.widget_token,
          sessionToken: body.widget_session_token,
          isTyping: body.is_typing,
        },
        { correlationId: request.correlationId }
      );

      return { status: 'ok' };
    });
  };
}
