import { schedules, task, logger } from '@trigger.dev/sdk/v3';
import { toError } from '@chatrouter/core';
import type { EscalationScanner } from '@chatrouter/domain';
import { z } from 'zod';

import { generateCorrelationId, openRoutingContext } from './routing-context.js';

/**
 * Escalation jobs
 *
 * Conversations assigned but not opened within the timeout move to the next
 * agent in the inbox's rotation. The cron keeps the delay bounded to about
 * a minute past the timeout; the manual task runs one scan on demand.
 */

// ============================================================================
// TYPES
// ============================================================================

export const EscalationPayloadSchema = z.object({
  timeoutSeconds: z.number().int().min(1).optional(),
  dryRun: z.boolean().default(false),
});

export type EscalationPayload = z.input<typeof EscalationPayloadSchema>;

export interface EscalationSettings {
  timeoutSeconds: number;
  batchLimit: number;
}

export interface EscalationJobResult {
  success: boolean;
  reason?: string;
  dryRun: boolean;
  scanned: number;
  reassigned: number;
  skipped: number;
  correlationId: string;
}

// ============================================================================
// HANDLER
// ============================================================================

/**
 * Run one scan and summarise it for the run log
 */
export async function runEscalationScan(
  scanner: Pick<EscalationScanner, 'scan'>,
  settings: EscalationSettings,
  payload: EscalationPayload,
  correlationId: string
): Promise<EscalationJobResult> {
  const options = EscalationPayloadSchema.parse(payload);
  const timeoutSeconds = options.timeoutSeconds ?? settings.timeoutSeconds;

  const report = await scanner.scan({
    timeoutSeconds,
    dryRun: options.dryRun,
    limit: settings.batchLimit,
    correlationId,
  });

  for (const move of report.candidates) {
    logger.info(options.dryRun ? 'Would escalate conversation' : 'Escalated conversation', {
      conversationId: move.conversationId,
      fromAgentId: move.fromAgentId,
      toAgentId: move.toAgentId,
      correlationId,
    });
  }
  for (const skipped of report.skipped) {
    logger.warn('Conversation not escalated', { ...skipped, correlationId });
  }

  return {
    success: true,
    dryRun: report.dryRun,
    scanned: report.scanned,
    reassigned: report.reassigned.length,
    skipped: report.skipped.length,
    correlationId,
  };
}

async function escalateFromEnvironment(
  payload: EscalationPayload,
  correlationId: string
): Promise<EscalationJobResult> {
  const { context, error } = openRoutingContext();
  if (!context) {
    logger.warn('Escalation skipped', { reason: error, correlationId });
    return {
      success: false,
      reason: error,
      dryRun: payload.dryRun === true,
      scanned: 0,
      reassigned: 0,
      skipped: 0,
      correlationId,
    };
  }

  try {
    return await runEscalationScan(
      context.escalation,
      context.config.escalation,
      payload,
      correlationId
    );
  } catch (err) {
    logger.error('Escalation scan failed', { error: toError(err).message, correlationId });
    throw err;
  } finally {
    await context.close();
  }
}

// ============================================================================
// TASKS
// ============================================================================

/**
 * Every minute; a conversation waits at most the timeout plus one interval
 */
export const escalateStaleAssignments = schedules.task({
  id: 'escalate-stale-assignments',
  cron: '* * * * *',
  run: async (payload) => {
    const correlationId = generateCorrelationId('escalation');
    logger.info('Starting escalation scan', {
      scheduledAt: payload.timestamp.toISOString(),
      correlationId,
    });
    return escalateFromEnvironment({}, correlationId);
  },
});

export const runEscalationNow = task({
  id: 'escalate-stale-assignments-now',
  run: async (payload: EscalationPayload) => {
    const correlationId = generateCorrelationId('escalation_manual');
    logger.info('Starting manual escalation scan', { ...payload, correlationId });
    return escalateFromEnvironment(payload, correlationId);
  },
});
