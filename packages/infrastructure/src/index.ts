/**
 * @fileoverview Infrastructure Layer Package
 *
 * Adapters implementing the store-of-record ports declared in
 * @chatrouter/domain on top of PostgreSQL, the schema migrations they rely
 * on, and the outbound HTTP services (GeoIP lookup, webhooks).
 *
 * ```
 *    DOMAIN LAYER                         INFRASTRUCTURE LAYER
 *   ┌─────────────────┐                  ┌─────────────────────────────┐
 *   │ InboxRepository │─────implements──▶│ PostgresInboxRepository     │
 *   │ RoutingRule...  │─────implements──▶│ PostgresRoutingRuleRepo...  │
 *   │ AgentDirectory  │─────implements──▶│ PostgresAgentDirectory      │
 *   │ Contact...      │─────implements──▶│ PostgresContactRepository   │
 *   │ Conversation... │─────implements──▶│ PostgresConversationRepo... │
 *   │ Message...      │─────implements──▶│ PostgresMessageRepository   │
 *   │ RegionLocator   │─────implements──▶│ GeoIpRegionLocator          │
 *   └─────────────────┘                  └─────────────────────────────┘
 * ```
 *
 * @module @chatrouter/infrastructure
 */

export * from './repositories/index.js';
export * from './services/index.js';
export * from './database/index.js';
