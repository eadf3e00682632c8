import type { AgentExecutor, Logger, ModelgateConfig, ResourceLoader } from '@modelgate/core';
import { ConfigError, loadConfig, toError } from '@modelgate/core';
import { ControlServer, OutcomeWebSocketServer } from '@modelgate/gateway';
import { ContainerResourceLoader } from '@modelgate/loaders';
import { Coordinator, ResourceRegistry } from '@modelgate/orchestrator';
import { createExecutor, createLoader } from './factories.js';

export interface BootstrapOptions {
  configPath: string;
  logger: Logger;
  /** Environment for `MODELGATE_*` overrides. Omit to skip the overlay. */
  env?: Record<string, string | undefined>;
  /** Override the configured loader (e.g. for testing with a fake). */
  loader?: ResourceLoader;
  /** Override the configured executor. */
  executor?: AgentExecutor;
  /** Fail unless the config has a `server` section. */
  requireServer?: boolean;
}

export interface AppServer {
  config: ModelgateConfig;
  registry: ResourceRegistry;
  coordinator: Coordinator;
  /** Present when the config has a `server` section. */
  control: ControlServer | null;
  sockets: OutcomeWebSocketServer | null;
  shutdown: () => Promise<void>;
}

/**
 * Bootstrap the application:
 * 1. Load and validate config (with env overrides)
 * 2. Build the registry, loader and executor
 * 3. Adopt a pod left running by a previous process
 * 4. Start the coordinator and, if configured, the control server
 * 5. Return an AppServer handle for lifecycle management
 */
export async function bootstrap(options: BootstrapOptions): Promise<AppServer> {
  const { configPath, logger, env } = options;

  // 1. Load config
  const result = loadConfig(configPath, env);
  if (!result.valid || !result.config) {
    const errorMessages = result.errors.map((e) => `${e.path}: ${e.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${errorMessages}`);
  }
  const config = result.config;
  if (options.requireServer && !config.server) {
    throw new ConfigError('Invalid configuration: server: Missing required section: "server"');
  }

  // 2. Collaborators
  const registry = ResourceRegistry.fromConfig(config);
  const loader = options.loader ?? createLoader(config.loader, config.resources, logger);
  const executor = options.executor ?? createExecutor(config.executor, config.agents, logger);

  const coordinator = new Coordinator({
    registry,
    loader,
    executor,
    keepAliveMs: config.coordinator.keepAliveMs,
    evictionIntervalMs: config.coordinator.evictionIntervalMs,
    maxQueueSize: config.coordinator.maxQueueSize,
    unloadOnShutdown: config.coordinator.unloadOnShutdown,
    logger,
  });

  // 3. Adopt an already-running pod
  if (loader instanceof ContainerResourceLoader) {
    const running = await loader.syncLoaded();
    if (running) await coordinator.adoptLoadedResource(running);
  }

  coordinator.start();
  logger.info(
    `Coordinator started: ${registry.listAgents().length} agent(s) on ${registry.listResources().length} resource(s)`,
  );

  // 4. Control surface
  let control: ControlServer | null = null;
  let sockets: OutcomeWebSocketServer | null = null;
  if (config.server) {
    control = new ControlServer(coordinator, logger);
    const httpServer = await control.start(config.server.port, config.server.host);
    sockets = new OutcomeWebSocketServer(coordinator);
    sockets.start({ httpServer, logger });
  }

  // 5. Shutdown handler
  let shutdownPromise: Promise<void> | null = null;

  const shutdown = (): Promise<void> => {
    if (shutdownPromise) return shutdownPromise;

    shutdownPromise = (async () => {
      logger.info('Shutting down...');
      try {
        await sockets?.close();
        await control?.close();
      } catch (err) {
        logger.error(`Error closing control server: ${toError(err).message}`);
      }
      await coordinator.shutdown();
      logger.info('Coordinator stopped');
    })();
    return shutdownPromise;
  };

  return { config, registry, coordinator, control, sockets, shutdown };
}
