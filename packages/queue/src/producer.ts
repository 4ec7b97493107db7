/**
 * Job Producer
 *
 * Type-safe job enqueueing with metadata and generated job ids.
 */

import type { Job, JobsOptions } from 'bullmq';
import { getQueue, type QueueName } from './queues';
import type { BundleValidationJobData, BundleValidationJobResult, JobMetadata } from './types';

type BundleValidationJob = Job<BundleValidationJobData, BundleValidationJobResult, QueueName>;

/**
 * Generate a unique job ID
 */
function generateJobId(prefix: string): string {
  const timestamp = Date.now();
  const random = Math.random().toString(36).substring(2, 11);
  return `${prefix}-${timestamp}-${random}`;
}

/**
 * Add metadata to job data
 */
export function withMetadata(
  data: BundleValidationJobData,
  options?: { priority?: number; attempts?: number }
): BundleValidationJobData & { _metadata: JobMetadata } {
  return {
    ...data,
    _metadata: {
      enqueuedAt: new Date().toISOString(),
      enqueuedBy: data.submittedBy,
      priority: options?.priority,
      attemptsMade: 0,
      maxAttempts: options?.attempts ?? 2,
    },
  };
}

/**
 * Generic job enqueue function
 */
export async function enqueueJob(
  queueName: QueueName,
  data: BundleValidationJobData,
  options?: JobsOptions
): Promise<BundleValidationJob> {
  const queue = getQueue(queueName);
  const jobId = generateJobId(queueName);

  return queue.add(queueName, withMetadata(data, options), {
    jobId,
    ...options,
  });
}

export interface JobStatusView {
  id: string;
  state: string;
  data: BundleValidationJobData;
  returnvalue?: BundleValidationJobResult;
  failedReason?: string;
  attemptsMade: number;
  timestamp: number;
  finishedOn?: number;
}

/**
 * Get job status by ID
 */
export async function getJobStatus(queueName: QueueName, jobId: string): Promise<JobStatusView | null> {
  const queue = getQueue(queueName);
  const job = await queue.getJob(jobId);

  if (!job) return null;

  const state = await job.getState();

  return {
    id: job.id || jobId,
    state,
    data: job.data,
    returnvalue: job.returnvalue ?? undefined,
    failedReason: job.failedReason,
    attemptsMade: job.attemptsMade,
    timestamp: job.timestamp,
    finishedOn: job.finishedOn,
  };
}
