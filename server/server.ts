import 'dotenv/config';
import './observability/instruments.js';

import * as Sentry from '@sentry/node';
import { loadConfig } from './config/app-config.js';
import { createApp } from './app.js';
import { logEnvironmentInfo } from './debug-helpers.js';
import { logger } from './observability/logger.js';

const version = process.env.npm_package_version || 'dev';
const config = loadConfig();

logEnvironmentInfo(config, version);

const { app, mcpService } = createApp(config, version);
const stopReaper = mcpService.startReaper(config.sweepIntervalMs);

const server = app.listen(config.port, () => {
  logger.info('Server is listening', { port: config.port, url: config.displayUrl });
});

function shutdown(signal: string): void {
  logger.info('Server shutdown requested', { signal });
  stopReaper();
  mcpService.closeAll()
    .catch((error: unknown) => {
      logger.error('Error closing MCP sessions', { error: error instanceof Error ? error.message : String(error) });
    })
    .finally(() => {
      server.close(() => process.exit(0));
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

process.on('unhandledRejection', (err: unknown) => {
  logger.error('Unhandled promise rejection', { error: err instanceof Error ? err.message : String(err) });
  Sentry.captureException(err);
});

process.on('uncaughtException', (err: Error) => {
  logger.error('Uncaught exception', { error: err.message, stack: err.stack });
  Sentry.captureException(err);
});
