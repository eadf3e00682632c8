// Scheduling model & boundaries
export { Priority, PRIORITY_RANK, parsePriority } from './scheduling.js';
export type {
  Request,
  Resource,
  AgentBinding,
  RejectReason,
  SubmitResult,
  CoordinatorStats,
  CoordinatorStatus,
  OutcomeStatus,
  RequestOutcome,
  ResourceLoader,
  AgentExecutor,
  Clock,
  Disposable,
} from './scheduling.js';

// Logging
export { noopLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';

// Errors
export {
  AgentNotFoundError,
  ResourceLoadError,
  ResourceUnloadError,
  ExecutionError,
  RequestCancelledError,
  ConcurrencyViolationError,
  ConfigError,
} from './errors.js';

// Configuration
export type {
  ModelgateConfig,
  CoordinatorConfig,
  LoaderConfig,
  ExecutorConfig,
  ServerConfig,
} from './config.js';

// Configuration validator
export {
  validateConfig,
  validateConfigObject,
  loadConfig,
} from './config-validator.js';
export type {
  ConfigValidationError,
  ConfigValidationResult,
} from './config-validator.js';

// Config env overlay
export { applyEnvOverrides } from './config-env-overlay.js';

// Utilities
export { generateId, now, isRecord, toError } from './utils.js';
