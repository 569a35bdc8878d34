export type { SharedStore, SetOptions } from './types.js';
export { InMemorySharedStore, type InMemorySharedStoreOptions } from './in-memory-store.js';
export {
  RedisSharedStore,
  createRedisSharedStore,
  type RedisCommandClient,
  type RedisSharedStoreOptions,
  type RedisConnectionConfig,
} from './redis-store.js';
export {
  optimisticUpdate,
  type MutationStep,
  type OptimisticUpdateOptions,
} from './optimistic-update.js';
