/**
 * Development seed data
 *
 * One branch inbox with three agents and an admin, enough to exercise
 * round-robin assignment and escalation locally. Safe to re-run.
 *
 * @module infrastructure/database/seed
 */

import { createLogger, type DatabaseClient, type ServiceLogger } from '@chatrouter/core';

export const DEV_BRANCH_ID = 1;
export const DEV_WIDGET_TOKEN = 'dev-widget-token';

const DEV_AGENTS = [
  { name: 'Agent One', role: 'agent', dataScope: 'branch' },
  { name: 'Agent Two', role: 'agent', dataScope: 'branch' },
  { name: 'Agent Three', role: 'agent', dataScope: 'self' },
  { name: 'Branch Admin', role: 'admin', dataScope: 'global' },
] as const;

export interface SeedReport {
  inboxId: number;
  agentIds: number[];
}

export async function seedDevelopmentData(
  db: DatabaseClient,
  logger: ServiceLogger = createLogger({ name: 'seed' })
): Promise<SeedReport> {
  if (process.env.NODE_ENV === 'production') {
    throw new Error('Refusing to seed development data in production');
  }

  const inbox = await db.query<{ id: number }>(
    `INSERT INTO inboxes (name, branch_id, widget_token, settings)
     VALUES ($1, $2, $3, $4)
     ON CONFLICT (widget_token) DO UPDATE SET name = EXCLUDED.name
     RETURNING id`,
    ['Website chat', DEV_BRANCH_ID, DEV_WIDGET_TOKEN, { security: { allowed_domains: [] } }]
  );
  const inboxId = inbox.rows[0]?.id;
  if (inboxId === undefined) {
    throw new Error('Seed inbox was not returned');
  }

  const agentIds: number[] = [];
  for (const agent of DEV_AGENTS) {
    const existing = await db.query<{ id: number }>(
      'SELECT id FROM agents WHERE name = $1 AND branch_id = $2',
      [agent.name, DEV_BRANCH_ID]
    );
    const found = existing.rows[0];
    if (found) {
      agentIds.push(found.id);
      continue;
    }

    const created = await db.query<{ id: number }>(
      `INSERT INTO agents (name, branch_id, role, data_scope)
       VALUES ($1, $2, $3, $4)
       RETURNING id`,
      [agent.name, DEV_BRANCH_ID, agent.role, agent.dataScope]
    );
    const id = created.rows[0]?.id;
    if (id === undefined) {
      throw new Error(`Seed agent ${agent.name} was not returned`);
    }
    agentIds.push(id);
  }

  logger.info({ inboxId, agentCount: agentIds.length }, 'Development data seeded');
  return { inboxId, agentIds };
}
