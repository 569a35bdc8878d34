/**
 * Scheduled routing jobs
 */

export {
  escalateStaleAssignments,
  runEscalationNow,
  runEscalationScan,
  EscalationPayloadSchema,
  type EscalationPayload,
  type EscalationJobResult,
} from './jobs/escalation-jobs.js';

export {
  closeResolvedConversations,
  closeResolvedConversationsNow,
  runRetentionSweep,
  RetentionPayloadSchema,
  type RetentionPayload,
  type RetentionJobResult,
} from './jobs/retention-jobs.js';
