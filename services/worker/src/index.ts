/**
 * Worker Service Entry Point
 *
 * Starts the BullMQ worker for bundle validation.
 */

import { Orchestrator, createLogger } from '@bundlehub/orchestration';
import { closeAllConnections, configureRedis } from '@bundlehub/queue';
import { config, validateConfig } from './config';
import { createBundleValidationWorker } from './workers/bundle-validation.worker';

const logger = createLogger('Worker', config.orchestration.logging);

const errors = validateConfig();
if (errors.length > 0) {
  logger.error('Invalid configuration:');
  for (const error of errors) {
    logger.error(`- ${error}`);
  }
  process.exit(1);
}

configureRedis(config.redis);

const orchestrator = new Orchestrator({
  remoteValidator: config.orchestration.remoteValidator,
  logger: logger.child('Orchestrator'),
});
logger.info(`Running on ${orchestrator.device.hostname} (${orchestrator.device.address})`);

const workers = [
  createBundleValidationWorker({
    orchestrator,
    concurrency: config.worker.concurrency.bundleValidation,
    defaults: { validationStrategy: config.orchestration.validationStrategy },
    logger: logger.child('BundleValidation'),
  }),
];

async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down...`);

  await Promise.all(
    workers.map((worker) =>
      worker.close().catch((err: unknown) => {
        logger.error(`Error closing worker: ${err instanceof Error ? err.message : String(err)}`);
      })
    )
  );

  await closeAllConnections();
  process.exit(0);
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

logger.info('Service started');
