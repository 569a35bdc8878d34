/**
 * Branch Router
 *
 * Decides which branch a new conversation belongs to. A branch inbox pins
 * its conversations to its own branch; a global inbox picks the
 * highest-priority active rule covering the visitor's region, then its
 * fallback rule, then the configured default branch.
 */

import { createLogger, type ServiceLogger } from '@chatrouter/core';

import type { RoutingRuleRepository } from '../conversations/repositories.js';
import type { Inbox, RoutingRule } from '../conversations/types.js';

export type BranchSource = 'inbox' | 'rule' | 'fallback_rule' | 'default' | 'none';

export interface BranchDecision {
  branchId: number | null;
  source: BranchSource;
  ruleId: number | null;
}

/** What the conversation service needs to place a new conversation */
export interface BranchResolver {
  resolve(inbox: Inbox, regionId: number | null): Promise<BranchDecision>;
}

/** Maps a visitor's address to a known region */
export interface RegionLocator {
  locate(clientIp: string | null): Promise<number | null>;
}

export interface BranchRouterDeps {
  rules: RoutingRuleRepository;
  /** Branch for global-inbox conversations no rule places */
  defaultBranchId?: number | null;
  logger?: ServiceLogger;
}

/**
 * Pick the rule for a region: matching active rules by priority then ID,
 * otherwise the first active fallback rule
 */
export function selectRoutingRule(
  rules: readonly RoutingRule[],
  regionId: number | null
): RoutingRule | null {
  const active = rules
    .filter((rule) => rule.isActive)
    .sort((a, b) => a.priority - b.priority || a.id - b.id);

  if (regionId !== null) {
    const match = active.find((rule) => rule.regionIds.includes(regionId));
    if (match) return match;
  }

  return active.find((rule) => rule.isFallback) ?? null;
}

export class BranchRouter implements BranchResolver {
  private readonly rules: RoutingRuleRepository;
  private readonly defaultBranchId: number | null;
  private readonly logger: ServiceLogger;

  constructor(deps: BranchRouterDeps) {
    this.rules = deps.rules;
    this.defaultBranchId = deps.defaultBranchId ?? null;
    this.logger = deps.logger ?? createLogger({ name: 'branch-router' });
  }

  async resolve(inbox: Inbox, regionId: number | null): Promise<BranchDecision> {
    if (inbox.branchId !== null) {
      return { branchId: inbox.branchId, source: 'inbox', ruleId: null };
    }

    const rule = selectRoutingRule(await this.rules.listActiveForInbox(inbox.id), regionId);
    if (rule) {
      const source: BranchSource =
        regionId !== null && rule.regionIds.includes(regionId) ? 'rule' : 'fallback_rule';
      return { branchId: rule.branchId, source, ruleId: rule.id };
    }

    if (this.defaultBranchId !== null) {
      return { branchId: this.defaultBranchId, source: 'default', ruleId: null };
    }

    this.logger.warn(
      { inboxId: inbox.id, regionId },
      'No routing rule or default branch for global inbox'
    );
    return { branchId: null, source: 'none', ruleId: null };
  }
}
