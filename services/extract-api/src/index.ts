/**
 * Extract API - service entry point
 */

import {
  config,
  logger,
  enableDefaultMetrics,
  loadProfilesFromDirectory,
  getRegisteredProfiles,
} from '@reportgrid/shared';
import { createApp } from './app';

enableDefaultMetrics();

if (config.profilesDir) {
  loadProfilesFromDirectory(config.profilesDir);
}

const app = createApp();

const server = app.listen(config.port, () => {
  logger.info('Extract API started', {
    port: config.port,
    profiles: getRegisteredProfiles(),
  });
});

// Graceful shutdown
function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down`);
  server.close(err => {
    if (err) {
      logger.error('Server close failed', err);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
