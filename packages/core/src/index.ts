/**
 * @chatrouter/core
 *
 * Shared core for the routing services: logging, errors, configuration,
 * the event dispatcher, the shared store and the database client.
 */

// Logger
export {
  createLogger,
  createLoggerOptions,
  logger,
  REDACTION_PATHS,
  redactString,
  maskToken,
  maskEmail,
  type Logger,
  type LoggerConfig,
  type ServiceLogger,
} from './logger/index.js';

// Errors
export {
  AppError,
  ValidationError,
  AuthenticationError,
  ForbiddenError,
  OriginNotAllowedError,
  NotFoundError,
  ConcurrencyError,
  RateLimitError,
  CaptchaRequiredError,
  SharedStoreError,
  DatabaseOperationError,
  isOperationalError,
  toSafeErrorResponse,
  toError,
  type SafeErrorDetails,
} from './errors.js';

// Configuration
export { EnvSchema, loadRoutingConfig, type Env, type RoutingConfig } from './env.js';

// Events
export {
  createDomainEvent,
  EventDispatcher,
  type DomainEvent,
  type EventMetadata,
  type CreateEventOptions,
  type EventBus,
  type EventListener,
  type SubscribeOptions,
  type DispatchOptions,
  type EventDispatcherOptions,
} from './events.js';

// Shared store
export {
  InMemorySharedStore,
  RedisSharedStore,
  createRedisSharedStore,
  optimisticUpdate,
  type SharedStore,
  type SetOptions,
  type InMemorySharedStoreOptions,
  type RedisCommandClient,
  type RedisSharedStoreOptions,
  type RedisConnectionConfig,
  type MutationStep,
  type OptimisticUpdateOptions,
} from './shared-store/index.js';

// Database
export {
  createDatabasePool,
  type DatabaseClient,
  type DatabasePool,
  type DatabaseConfig,
  type QueryResult,
} from './database.js';
