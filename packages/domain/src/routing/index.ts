/**
 * Conversation routing: branch placement, round-robin rotation, per-agent
 * assignment limits, presence, automatic assignment, escalation of unopened
 * assignments and transfers between branches
 */

export {
  RoundRobinQueue,
  queueKey,
  parseQueue,
  rotate,
  type QueueStore,
  type RoundRobinQueueOptions,
  type Rotation,
} from './round-robin-queue.js';

export {
  AssignmentRateLimiter,
  rateKey,
  type RateLimiter,
  type AssignmentRateLimiterOptions,
} from './assignment-rate-limiter.js';

export {
  PresenceTracker,
  presenceKey,
  type PresenceStore,
  type PresenceTrackerDeps,
} from './presence-tracker.js';

export { selectAssignableAgents, type CandidateSources } from './candidate-selection.js';

export { AutoAssignmentService, type AutoAssignmentDeps } from './auto-assignment-service.js';

export {
  EscalationScanner,
  type EscalationScannerDeps,
  type EscalationScanOptions,
  type EscalationReport,
  type EscalationSkip,
  type EscalationSkipReason,
  type Reassignment,
} from './escalation-scanner.js';

export {
  BranchRouter,
  selectRoutingRule,
  type BranchDecision,
  type BranchResolver,
  type BranchRouterDeps,
  type BranchSource,
  type RegionLocator,
} from './branch-router.js';

export {
  BranchTransferService,
  type BranchTransferDeps,
  type BranchTransferResult,
} from './branch-transfer.js';
