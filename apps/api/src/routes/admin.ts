/**
 * Admin routes: round-robin queue membership and on-demand escalation runs
 */
import type { FastifyPluginAsync } from 'fastify';
import type { EscalationReport, Reassignment } from '@chatrouter/domain';
import { z } from 'zod';

import type { Container } from '../container.js';
import { parseInput } from './validation.js';

export interface EscalationDefaults {
  timeoutSeconds: number;
  batchLimit: number;
}

const InboxParamsSchema = z.object({
  inboxId: z.coerce.number().int().positive(),
});

const InboxAgentParamsSchema = InboxParamsSchema.extend({
  agentId: z.coerce.number().int().positive(),
});

export const AddAgentBodySchema = z.object({
  agent_id: z.number().int().positive(),
});

export const ResetQueueBodySchema = z.object({
  member_ids: z.array(z.number().int().positive()).max(1000),
});

export const EscalationRunBodySchema = z.object({
  timeout_seconds: z.number().int().min(1).optional(),
  dry_run: z.boolean().default(false),
});

const toReassignment = (r: Reassignment) => ({
  conversation_id: r.conversationId,
  from_agent_id: r.fromAgentId,
  to_agent_id: r.toAgentId,
});

export function toEscalationResponse(report: EscalationReport): Record<string, unknown> {
  return {
    timeout_seconds: report.timeoutSeconds,
    dry_run: report.dryRun,
    scanned: report.scanned,
    candidates: report.candidates.map(toReassignment),
    reassigned: report.reassigned.map(toReassignment),
    skipped: report.skipped.map((s) => ({ conversation_id: s.conversationId, reason: s.reason })),
  };
}

export function createAdminRoutes(
  container: Container,
  escalation: EscalationDefaults
): FastifyPluginAsync {
  return async (fastify) => {
    const { queue } = container;

    const queueResponse = async (inboxId: number) => ({
      inbox_id: inboxId,
      agent_ids: await queue.current(inboxId),
    });

    fastify.get('/admin/inboxes/:inboxId/queue', async (request) => {
      const { inboxId } = parseInput(InboxParamsSchema, request.params, 'Invalid inbox id');
      return queueResponse(inboxId);
    });

    fastify.post('/admin/inboxes/:inboxId/queue/agents', async (request) => {
      const { inboxId } = parseInput(InboxParamsSchema, request.params, 'Invalid inbox id');
      const body = parseInput(AddAgentBodySchema, request.body, 'Invalid queue member payload');

      await queue.add(inboxId, body.agent_id);
      request.log.info({ inboxId, agentId: body.agent_id }, 'Agent added to queue');
      return queueResponse(inboxId);
    });

    fastify.delete('/admin/inboxes/:inboxId/queue/agents/:agentId', async (request) => {
      const { inboxId, agentId } = parseInput(
        InboxAgentParamsSchema,
        request.params,
        'Invalid queue member'
      );

      await queue.remove(inboxId, agentId);
      request.log.info({ inboxId, agentId }, 'Agent removed from queue');
      return queueResponse(inboxId);
    });

    fastify.put('/admin/inboxes/:inboxId/queue', async (request) => {
      const { inboxId } = parseInput(InboxParamsSchema, request.params, 'Invalid inbox id');
      const body = parseInput(ResetQueueBodySchema, request.body, 'Invalid queue payload');

      await queue.reset(inboxId, body.member_ids);
      return queueResponse(inboxId);
    });

    /**
     * POST /admin/escalations/run
     * One escalation scan; with dry_run it only reports what would move
     */
    fastify.post('/admin/escalations/run', async (request) => {
      const body = parseInput(
        EscalationRunBodySchema,
        request.body ?? {},
        'Invalid escalation payload'
      );

      const report = await container.escalation.scan({
        timeoutSeconds: body.timeout_seconds ?? escalation.timeoutSeconds,
        dryRun: body.dry_run,
        limit: escalation.batchLimit,
        correlationId: request.correlationId,
      });

      return toEscalationResponse(report);
    });
  };
}
