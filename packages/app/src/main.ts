import * as path from 'node:path';
import { bootstrap } from './bootstrap.js';
import { createConsoleLogger, isLogLevel } from './console-logger.js';

async function main(): Promise<void> {
  const configPath =
    process.env['MODELGATE_CONFIG'] ?? path.resolve(process.cwd(), 'config/default.json5');
  const level = process.env['MODELGATE_LOG_LEVEL'] ?? 'info';
  const logger = createConsoleLogger(isLogLevel(level) ? level : 'info');

  // The control server is the only thing keeping the process alive.
  const app = await bootstrap({ configPath, logger, env: process.env, requireServer: true });

  // Handle shutdown signals
  const handleShutdown = () => {
    app.shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', handleShutdown);
  process.on('SIGTERM', handleShutdown);

  logger.info(`modelgate running, control server on port ${app.control?.port ?? 0}`);
}

main().catch((err) => {
  console.error('Fatal:', err);
  process.exit(1);
});
