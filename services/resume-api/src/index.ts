/**
 * Resume API Server
 *
 * Wires the configured pipeline into the HTTP app and handles shutdown.
 */

import { logger, config, setLogLevel } from '@resume-parser/shared';
import { createApp } from './app';
import { createResumePipeline } from './lib/pipeline';

setLogLevel(config.logLevel);

const pipeline = createResumePipeline(config);
const app = createApp({ pipeline, config });

// Start server
const server = app.listen(config.port, () => {
  logger.info('Resume API started', {
    port: config.port,
    generation_provider: config.generationProvider,
    generation_model: config.generationModel,
  });
});

// Graceful shutdown
function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down`);
  server.close((error) => {
    if (error) {
      logger.error('Error while closing server', error);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
