import type { DatabaseClient } from '@chatrouter/core';

import {
  PostgresAgentDirectory,
  PostgresInboxRepository,
  PostgresRoutingRuleRepository,
} from './PostgresInboxRepository.js';
import { PostgresContactRepository } from './PostgresContactRepository.js';
import { PostgresConversationRepository } from './PostgresConversationRepository.js';
import { PostgresMessageRepository } from './PostgresMessageRepository.js';

export {
  PostgresAgentDirectory,
  PostgresInboxRepository,
  PostgresRoutingRuleRepository,
} from './PostgresInboxRepository.js';
export { PostgresContactRepository } from './PostgresContactRepository.js';
export { PostgresConversationRepository } from './PostgresConversationRepository.js';
export { PostgresMessageRepository } from './PostgresMessageRepository.js';

/**
 * All store-of-record adapters over one client
 */
export function createPostgresRepositories(db: DatabaseClient) {
  return {
    inboxes: new PostgresInboxRepository(db),
    routingRules: new PostgresRoutingRuleRepository(db),
    agents: new PostgresAgentDirectory(db),
    contacts: new PostgresContactRepository(db),
    conversations: new PostgresConversationRepository(db),
    messages: new PostgresMessageRepository(db),
  };
}

export type PostgresRepositories = ReturnType<typeof createPostgresRepositories>;
