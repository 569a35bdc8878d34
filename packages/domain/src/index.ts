/**
 * @chatrouter/domain
 *
 * Conversation routing and the visitor widget, built on the ports in
 * ./conversations/repositories.ts and the shared store from @chatrouter/core.
 *
 * @example
 * ```typescript
 * import { createChatEventDispatcher, RoundRobinQueue, EscalationScanner } from '@chatrouter/domain';
 *
 * const events = createChatEventDispatcher();
 * const queue = new RoundRobinQueue(store, agents);
 * const scanner = new EscalationScanner({ conversations, agents, presence, rateLimiter, queue, events });
 * const report = await scanner.scan({ timeoutSeconds: 240 });
 * ```
 */

export * from './events.js';
export * from './conversations/index.js';
export * from './routing/index.js';
export * from './widget/index.js';
