// Resource loaders
export { SimulatedResourceLoader } from './simulated-loader.js';
export type { SimulatedLoaderOptions } from './simulated-loader.js';
export { ContainerResourceLoader } from './container-loader.js';
export type { ContainerLoaderOptions, ContainerRuntime } from './container-loader.js';

// Agent executors
export { SimulatedAgentExecutor } from './simulated-executor.js';
export { HttpAgentExecutor } from './http-executor.js';
export type { HttpExecutorOptions } from './http-executor.js';

// Errors
export { ContainerCommandError, AgentHttpError } from './errors.js';

// Process helpers
export { execFile } from './exec-util.js';
export type { ExecResult } from './exec-util.js';
