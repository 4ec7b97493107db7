/**
 * Worker Configuration
 *
 * Environment-based configuration for the worker service.
 */

import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadEnvFile, loadOrchestrationConfigFromEnv, validateConfig as validateOrchestrationConfig } from '@bundlehub/orchestration';
import type { OrchestrationConfig } from '@bundlehub/orchestration';
import { isRedisConfigured, loadRedisSettings, type RedisSettings } from '@bundlehub/queue';

// Load environment variables from root .env
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
loadEnvFile(resolve(__dirname, '../../../.env'));

export interface WorkerConfig {
  // Redis
  redis: RedisSettings;
  /** FORCE_IN_MEMORY_QUEUE; only the submit command can run jobs in memory */
  forceInMemoryQueue: boolean;

  // Validation engines and logging
  orchestration: OrchestrationConfig;

  // Worker settings
  worker: {
    concurrency: {
      bundleValidation: number;
    };
  };
}

export function loadWorkerConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  return {
    redis: loadRedisSettings(env),
    forceInMemoryQueue: env.FORCE_IN_MEMORY_QUEUE === 'true',

    orchestration: loadOrchestrationConfigFromEnv(env),

    worker: {
      concurrency: {
        bundleValidation: parseInt(env.WORKER_CONCURRENCY_BUNDLE_VALIDATION || '2', 10),
      },
    },
  };
}

export const config: WorkerConfig = loadWorkerConfig();

/**
 * Validate configuration for the long-running worker, which consumes Redis only
 */
export function validateConfig(workerConfig: WorkerConfig = config): string[] {
  const errors = validateOrchestrationConfig(workerConfig.orchestration);

  // Check Redis
  if (workerConfig.forceInMemoryQueue) {
    errors.push('FORCE_IN_MEMORY_QUEUE is not supported by the worker (use the submit command to validate in process)');
  }
  if (!isRedisConfigured(workerConfig.redis)) {
    errors.push('Redis connection not configured (REDIS_URL or REDIS_HOST required)');
  }

  const { bundleValidation } = workerConfig.worker.concurrency;
  if (!Number.isInteger(bundleValidation) || bundleValidation < 1) {
    errors.push('WORKER_CONCURRENCY_BUNDLE_VALIDATION must be a positive integer');
  }

  return errors;
}
