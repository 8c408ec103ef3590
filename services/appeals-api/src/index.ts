/**
 * Appeals API entry point
 */

import { config, logger } from '@civic-appeals/shared';
import { createApp } from './app';
import { checkDatabase, getOrchestrator, pool } from './lib/session';

const app = createApp({ orchestrator: getOrchestrator, checkDatabase });

// Start server
app.listen(config.port, () => {
  logger.info('Appeals API started', { port: config.port, classifier: config.classifierType });
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await pool.end();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
