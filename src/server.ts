/**
 * HTTP server entrypoint for the parameter validation service.
 *
 * This file:
 * - Loads configuration
 * - Builds runtime dependencies and the Express app
 * - Starts listening on the configured port
 * - Releases dependencies on SIGTERM / SIGINT
 */
import { createServer } from 'http';
import { createApp } from './app';
import { buildRuntimeDeps } from './bootstrap/buildDeps';
import { config } from './shared/config/Config';
import { logger } from './shared/logging/Logger';

const deps = buildRuntimeDeps();
const app = createApp(deps);
const server = createServer(app);

server.listen(config.port, () => {
  logger.info(
    {
      port: config.port,
      env: config.env,
      validationPolicy: deps.validationPolicy,
    },
    'Parameter validation service started',
  );
});

function shutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down gracefully...');
  server.close(() => {
    deps
      .shutdown()
      .then(() => {
        logger.info('HTTP server closed');
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error({ err }, 'Failed to release dependencies');
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
