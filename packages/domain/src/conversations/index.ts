export * from './types.js';
export * from './message.js';
export * from './repositories.js';
export * from './in-memory-repositories.js';
export * from './conversation-service.js';
export * from './agent-feed.js';
export * from './visibility.js';
export * from './typing-indicator.js';
export * from './last-seen.js';
export * from './auto-reply.js';
