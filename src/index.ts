/**
 * @fileoverview Express server entry point.
 *
 * Validates config, wires services, mounts the HTTP surface and starts the
 * idle-dialog sweeper. SIGTERM/SIGINT stop the sweeper, then the server,
 * then close the dialog store.
 */

import config, { validateConfig } from './config.js';
import { initObservability, createLogger } from './utils/observability/index.js';
import { buildServices } from './services/index.js';
import { closeDialogStore } from './services/dialog/index.js';
import { createDialogSweeper } from './services/dialog/sweeper.js';
import { createApp } from './app.js';

// Fail fast if critical configuration is missing
validateConfig();
initObservability();

const logger = createLogger({ domain: 'server' });

const startedAt = Date.now();
const services = buildServices();
const app = createApp({
  manager: services.manager,
  registry: services.registry,
  store: services.store,
  startedAt,
});

const sweeper = config.cleanup.enabled
  ? createDialogSweeper(services.manager, config.cleanup.intervalMs)
  : null;

const server = app.listen(config.port, () => {
  logger.info('server_started', {
    port: config.port,
    env: config.nodeEnv,
    apiPrefix: config.apiPrefix,
    provider: services.provider.name,
    storage: config.dialogs.provider,
    handlers: services.registry.listAvailable().map(capability => capability.name),
  });

  if (config.useMockLlm) {
    logger.warn('keyword_provider_active');
  }

  // Start the sweeper after server is ready
  sweeper?.start();
});

let isShuttingDown = false;

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  logger.info('shutdown_signal_received', { signal });

  // Stop the sweeper first, waiting for an in-flight run
  await sweeper?.stop();

  const forceExitTimer = setTimeout(() => {
    logger.warn('shutdown_forced');
    process.exit(1);
  }, 10000);

  server.close(() => {
    clearTimeout(forceExitTimer);
    closeDialogStore();
    logger.info('server_closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
