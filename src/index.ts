import { createDbBackend, type DbBackend } from './utils/db.js';
import { scheduleMaintenance, stopMaintenance } from './utils/db-maintenance.js';
import { ConfigError, loadConfigFromEnvironment, type RelayConfig } from './utils/config.js';
import { logger } from './middleware/logger.js';
import { startHealthServer, stopHealthServer, startMemoryWatchdog } from './middleware/health.js';
import { createDiscordRuntime } from './platforms/discord/runtime.js';
import type { PlatformRuntime } from './platforms/types.js';

let backend: DbBackend | null = null;
let runtime: PlatformRuntime | null = null;

function loadConfigOrExit(): RelayConfig {
  try {
    return loadConfigFromEnvironment();
  } catch (err) {
    if (err instanceof ConfigError) {
      for (const issue of err.issues) logger.fatal({ issue }, 'Invalid configuration');
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  logger.info('Channel relay starting...');

  const config = loadConfigOrExit();

  logger.info({
    dbDialect: config.DB_DIALECT,
    demo: config.DISCORD_DEMO,
    commandPrefix: config.COMMAND_PREFIX,
    strictFilter: config.STRICT_FILTER,
    retentionDays: config.RETENTION_DAYS,
    healthPort: config.HEALTH_PORT,
    healthBindHost: config.HEALTH_BIND_HOST,
    logLevel: config.LOG_LEVEL,
  }, 'Configuration loaded');

  backend = await createDbBackend(config);

  // Health check server + memory watchdog for monitoring
  startHealthServer(config.HEALTH_PORT, config.HEALTH_BIND_HOST);
  startMemoryWatchdog();

  // Daily spam-tracking retention sweep at 4 AM
  scheduleMaintenance(backend, config.RETENTION_DAYS);

  runtime = createDiscordRuntime(config, backend);
  logger.info({ platform: runtime.platform }, 'Starting platform runtime');
  await runtime.start();
  logger.info('Channel relay is online');
}

main().catch((err) => {
  logger.fatal({ err }, 'Startup failed, shutting down');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled promise rejection');
});

process.on('uncaughtException', (err) => {
  logger.error({ err }, 'Uncaught exception');
});

// Graceful shutdown
async function shutdown(signal: 'SIGINT' | 'SIGTERM'): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal, shutting down');
  stopMaintenance();
  stopHealthServer();

  try {
    await runtime?.stop();
  } catch (err) {
    logger.error({ err, signal }, 'Failed to stop platform runtime cleanly');
  }

  try {
    await backend?.close();
  } catch (err) {
    logger.error({ err, signal }, 'Failed to close database cleanly during shutdown');
  }

  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
