/**
 * @fileoverview PostgreSQL inbox and agent directory (Infrastructure Layer)
 *
 * Read-mostly lookups the routing core makes against the CRM tables:
 * inboxes by widget token, routing rules, the agent pool, and agent profile
 * status.
 *
 * @module @chatrouter/infrastructure/repositories/postgres-inbox-repository
 */

import type { DatabaseClient } from '@chatrouter/core';
import type {
  Agent,
  AgentDirectory,
  AgentProfile,
  AgentStatus,
  Inbox,
  InboxRepository,
  RoutingRule,
  RoutingRuleRepository,
} from '@chatrouter/domain';

import {
  returnedRow,
  rowToAgent,
  rowToAgentProfile,
  rowToInbox,
  rowToRoutingRule,
  type AgentProfileRow,
  type AgentRow,
  type InboxRow,
  type RoutingRuleRow,
} from './rows.js';

const INBOX_COLUMNS = 'id, name, branch_id, widget_token, is_active, settings';

export class PostgresInboxRepository implements InboxRepository {
  constructor(private readonly db: DatabaseClient) {}

  async findById(inboxId: number): Promise<Inbox | null> {
    const result = await this.db.query<InboxRow>(
      `SELECT ${INBOX_COLUMNS} FROM inboxes WHERE id = $1`,
      [inboxId]
    );
    const row = result.rows[0];
    return row ? rowToInbox(row) : null;
  }

  async findActiveByWidgetToken(widgetToken: string): Promise<Inbox | null> {
    const result = await this.db.query<InboxRow>(
      `SELECT ${INBOX_COLUMNS} FROM inboxes WHERE widget_token = $1 AND is_active`,
      [widgetToken]
    );
    const row = result.rows[0];
    return row ? rowToInbox(row) : null;
  }
}

export class PostgresRoutingRuleRepository implements RoutingRuleRepository {
  constructor(private readonly db: DatabaseClient) {}

  async listActiveForInbox(inboxId: number): Promise<RoutingRule[]> {
    const result = await this.db.query<RoutingRuleRow>(
      `SELECT r.id, r.name, r.inbox_id, r.branch_id, r.priority, r.is_fallback, r.is_active,
              ARRAY_AGG(rr.region_id ORDER BY rr.region_id)
                FILTER (WHERE rr.region_id IS NOT NULL) AS region_ids
       FROM routing_rules r
       LEFT JOIN routing_rule_regions rr ON rr.rule_id = r.id
       WHERE r.inbox_id = $1 AND r.is_active
       GROUP BY r.id
       ORDER BY r.priority ASC, r.id ASC`,
      [inboxId]
    );
    return result.rows.map(rowToRoutingRule);
  }
}

export class PostgresAgentDirectory implements AgentDirectory {
  constructor(private readonly db: DatabaseClient) {}

  async findAgent(agentId: number): Promise<Agent | null> {
    const result = await this.db.query<AgentRow>(
      'SELECT id, branch_id, role, data_scope, is_active FROM agents WHERE id = $1',
      [agentId]
    );
    const row = result.rows[0];
    return row ? rowToAgent(row) : null;
  }

  async listEligibleAgentIds(inboxId: number): Promise<number[]> {
    // A global inbox rotates over the agents of every branch
    const result = await this.db.query<{ id: number }>(
      `SELECT a.id
       FROM agents a
       JOIN inboxes i ON i.branch_id IS NULL OR i.branch_id = a.branch_id
       WHERE i.id = $1 AND a.is_active AND a.role <> 'admin'
       ORDER BY a.id ASC`,
      [inboxId]
    );
    return result.rows.map((row) => row.id);
  }

  async listActiveAgentIds(branchId?: number): Promise<number[]> {
    const result =
      branchId === undefined
        ? await this.db.query<{ id: number }>(
            `SELECT id FROM agents WHERE is_active AND role <> 'admin' ORDER BY id ASC`
          )
        : await this.db.query<{ id: number }>(
            `SELECT id FROM agents
             WHERE is_active AND role <> 'admin' AND branch_id = $1
             ORDER BY id ASC`,
            [branchId]
          );
    return result.rows.map((row) => row.id);
  }

  async getProfile(agentId: number): Promise<AgentProfile | null> {
    const result = await this.db.query<AgentProfileRow>(
      'SELECT agent_id, status, updated_at FROM agent_profiles WHERE agent_id = $1',
      [agentId]
    );
    const row = result.rows[0];
    return row ? rowToAgentProfile(row) : null;
  }

  async saveStatus(agentId: number, status: AgentStatus, at: Date): Promise<AgentProfile> {
    const result = await this.db.query<AgentProfileRow>(
      `INSERT INTO agent_profiles (agent_id, status, updated_at)
       VALUES ($1, $2, $3)
       ON CONFLICT (agent_id) DO UPDATE
         SET status = EXCLUDED.status, updated_at = EXCLUDED.updated_at
       RETURNING agent_id, status, updated_at`,
      [agentId, status, at]
    );
    return rowToAgentProfile(returnedRow(result, 'saveStatus'));
  }
}
