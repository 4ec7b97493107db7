/**
 * Queue Definitions and Configuration
 *
 * Defines the BullMQ queues with their retry policies and concurrency settings.
 */

import { Queue, type QueueOptions, type JobsOptions } from 'bullmq';
import { createLogger } from '@bundlehub/orchestration';
import { createQueueConnection } from './connection';
import type { BundleValidationJobData, BundleValidationJobResult } from './types';

const logger = createLogger('Queue');

/**
 * Queue names as constants
 */
export const QUEUE_NAMES = {
  BUNDLE_VALIDATION: 'bundle-validation',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

/**
 * Default job options per queue type
 */
export const DEFAULT_JOB_OPTIONS: Record<QueueName, JobsOptions> = {
  [QUEUE_NAMES.BUNDLE_VALIDATION]: {
    attempts: 2,
    backoff: {
      type: 'fixed',
      delay: 5000,
    },
    removeOnComplete: { age: 86400, count: 5000 }, // Keep 24h or 5000 jobs
    removeOnFail: { age: 604800, count: 5000 }, // Keep 7d or 5000 jobs
  },
};

/**
 * Worker concurrency per queue
 */
export const WORKER_CONCURRENCY: Record<QueueName, number> = {
  [QUEUE_NAMES.BUNDLE_VALIDATION]: 2,
};

export type BundleValidationQueue = Queue<BundleValidationJobData, BundleValidationJobResult, QueueName>;

let bundleValidationQueue: BundleValidationQueue | undefined;

/**
 * Get or create the bundle validation queue
 */
export function getQueue(name: QueueName = QUEUE_NAMES.BUNDLE_VALIDATION, options?: Partial<QueueOptions>): BundleValidationQueue {
  if (bundleValidationQueue) {
    return bundleValidationQueue;
  }

  const connection = createQueueConnection(name);
  bundleValidationQueue = new Queue<BundleValidationJobData, BundleValidationJobResult, QueueName>(name, {
    connection,
    defaultJobOptions: DEFAULT_JOB_OPTIONS[name],
    ...options,
  });
  return bundleValidationQueue;
}

/**
 * Close all queue instances
 */
export async function closeAllQueues(): Promise<void> {
  if (!bundleValidationQueue) return;
  const queue = bundleValidationQueue;
  bundleValidationQueue = undefined;
  try {
    await queue.close();
  } catch (error) {
    logger.warn(`Failed to close ${queue.name}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export interface QueueMetrics {
  name: string;
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}

/**
 * Get queue health metrics
 */
export async function getQueueMetrics(name: QueueName): Promise<QueueMetrics> {
  const queue = getQueue(name);
  const [waiting, active, completed, failed, delayed] = await Promise.all([
    queue.getWaitingCount(),
    queue.getActiveCount(),
    queue.getCompletedCount(),
    queue.getFailedCount(),
    queue.getDelayedCount(),
  ]);

  return { name, waiting, active, completed, failed, delayed };
}
