import { schedules, task, logger } from '@trigger.dev/sdk/v3';
import { toError } from '@chatrouter/core';
import type { ConversationService } from '@chatrouter/domain';
import { z } from 'zod';

import { generateCorrelationId, openRoutingContext } from './routing-context.js';

/**
 * Retention jobs
 *
 * Resolved conversations with no activity for RETENTION_RESOLVED_DAYS are
 * closed, which ends any widget stream still attached to them.
 */

export const RetentionPayloadSchema = z.object({
  olderThanDays: z.number().int().min(1).optional(),
  limit: z.number().int().min(1).max(50_000).optional(),
  dryRun: z.boolean().default(false),
});

export type RetentionPayload = z.input<typeof RetentionPayloadSchema>;

export interface RetentionSettings {
  resolvedDays: number;
  batchLimit: number;
}

export interface RetentionJobResult {
  success: boolean;
  reason?: string;
  dryRun: boolean;
  cutoff: string | null;
  candidates: number;
  closed: number;
  failed: number;
  correlationId: string;
}

export async function runRetentionSweep(
  conversations: Pick<ConversationService, 'closeResolvedBefore'>,
  settings: RetentionSettings,
  payload: RetentionPayload,
  correlationId: string
): Promise<RetentionJobResult> {
  const options = RetentionPayloadSchema.parse(payload);

  const report = await conversations.closeResolvedBefore({
    olderThanDays: options.olderThanDays ?? settings.resolvedDays,
    limit: options.limit ?? settings.batchLimit,
    dryRun: options.dryRun,
  });

  if (report.failed.length > 0) {
    logger.warn('Some conversations could not be closed', {
      failed: report.failed,
      correlationId,
    });
  }

  logger.info('Retention sweep completed', {
    cutoff: report.cutoff.toISOString(),
    dryRun: report.dryRun,
    candidates: report.candidates.length,
    closed: report.closed.length,
    correlationId,
  });

  return {
    success: report.failed.length === 0,
    dryRun: report.dryRun,
    cutoff: report.cutoff.toISOString(),
    candidates: report.candidates.length,
    closed: report.closed.length,
    failed: report.failed.length,
    correlationId,
  };
}

async function sweepFromEnvironment(
  payload: RetentionPayload,
  correlationId: string
): Promise<RetentionJobResult> {
  const { context, error } = openRoutingContext();
  if (!context) {
    logger.warn('Retention sweep skipped', { reason: error, correlationId });
    return {
      success: false,
      reason: error,
      dryRun: payload.dryRun === true,
      cutoff: null,
      candidates: 0,
      closed: 0,
      failed: 0,
      correlationId,
    };
  }

  try {
    return await runRetentionSweep(
      context.conversations,
      context.config.retention,
      payload,
      correlationId
    );
  } catch (err) {
    logger.error('Retention sweep failed', { error: toError(err).message, correlationId });
    throw err;
  } finally {
    await context.close();
  }
}

export const closeResolvedConversations = schedules.task({
  id: 'close-resolved-conversations',
  cron: '30 3 * * *', // 3:30 AM every day
  run: async () => {
    const correlationId = generateCorrelationId('retention');
    logger.info('Starting retention sweep', { correlationId });
    return sweepFromEnvironment({}, correlationId);
  },
});

export const closeResolvedConversationsNow = task({
  id: 'close-resolved-conversations-now',
  run: async (payload: RetentionPayload) => {
    const correlationId = generateCorrelationId('retention_manual');
    logger.info('Starting manual retention sweep', { ...payload, correlationId });
    return sweepFromEnvironment(payload, correlationId);
  },
});
