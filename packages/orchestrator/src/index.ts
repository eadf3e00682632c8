// Resource registry
export { ResourceRegistry } from './resource-registry.js';
export { RegistryError } from './errors.js';

// Request queue
export { RequestQueue, compareRequests } from './request-queue.js';

// Resource slot
export { AsyncLock } from './async-lock.js';
export { ResourceManager } from './resource-manager.js';
export type {
  ResourceManagerOptions,
  ResourceManagerState,
  ResourceCounters,
} from './resource-manager.js';
export { IdleEvictor } from './idle-evictor.js';
export type { IdleEvictorOptions } from './idle-evictor.js';

// Outcome streams
export { AsyncEventQueue } from './async-event-queue.js';

// Coordinator
export { Coordinator } from './coordinator.js';
export type { CoordinatorOptions, OutcomeListener } from './coordinator.js';
