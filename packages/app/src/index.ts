export { bootstrap } from './bootstrap.js';
export type { BootstrapOptions, AppServer } from './bootstrap.js';

export { createConsoleLogger, isLogLevel } from './console-logger.js';
export { createLoader, createExecutor } from './factories.js';
