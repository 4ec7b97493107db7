/**
 * Queue Adapter
 *
 * Switches between BullMQ and an in-memory fallback when Redis is not
 * available. In-memory jobs live in this process only, so whoever adds
 * them also drains them (see `drainInMemoryJobs`).
 */

import type { JobsOptions } from 'bullmq';
import { createLogger } from '@bundlehub/orchestration';
import { isRedisConfigured, queueConnectionName, redisConnections } from './connection';
import { enqueueJob, getJobStatus, withMetadata } from './producer';
import { getQueueMetrics, type QueueName } from './queues';
import type { BundleValidationJobData, BundleValidationJobResult } from './types';

const logger = createLogger('Queue');

export type JobState = 'waiting' | 'active' | 'completed' | 'failed';

/**
 * In-memory job storage for fallback mode
 */
interface InMemoryJob {
  id: string;
  name: QueueName;
  data: BundleValidationJobData;
  state: JobState;
  returnvalue?: BundleValidationJobResult;
  failedReason?: string;
  attemptsMade: number;
  timestamp: number;
  finishedOn?: number;
  opts: JobsOptions;
}

export interface JobView {
  id: string;
  state: string;
  data: BundleValidationJobData;
  returnvalue?: BundleValidationJobResult;
  failedReason?: string;
  attemptsMade?: number;
  timestamp?: number;
  finishedOn?: number;
}

type JobEventHandler = (job: InMemoryJob) => void;

class InMemoryJobStore {
  private jobs = new Map<string, InMemoryJob>();
  private handlers = new Map<string, JobEventHandler[]>();

  add(queueName: QueueName, data: BundleValidationJobData, opts: JobsOptions = {}): InMemoryJob {
    const id = opts.jobId || `${queueName}-${Date.now()}-${Math.random().toString(36).slice(2)}`;
    const job: InMemoryJob = {
      id,
      name: queueName,
      data,
      state: 'waiting',
      attemptsMade: 0,
      timestamp: Date.now(),
      opts,
    };

    this.jobs.set(id, job);
    return job;
  }

  get(id: string): InMemoryJob | undefined {
    return this.jobs.get(id);
  }

  listByQueue(queueName: QueueName): InMemoryJob[] {
    return Array.from(this.jobs.values()).filter((job) => job.name === queueName);
  }

  count(queueName: QueueName, state: JobState): number {
    return this.listByQueue(queueName).filter((job) => job.state === state).length;
  }

  onComplete(queueName: QueueName, handler: JobEventHandler): void {
    const handlers = this.handlers.get(queueName) || [];
    handlers.push(handler);
    this.handlers.set(queueName, handlers);
  }

  complete(job: InMemoryJob, returnvalue: BundleValidationJobResult): void {
    job.state = 'completed';
    job.returnvalue = returnvalue;
    job.finishedOn = Date.now();

    for (const handler of this.handlers.get(job.name) || []) {
      handler(job);
    }
  }

  fail(job: InMemoryJob, error: string): void {
    job.state = 'failed';
    job.failedReason = error;
    job.finishedOn = Date.now();
  }

  clear(): void {
    this.jobs.clear();
    this.handlers.clear();
  }
}

/**
 * Singleton in-memory store
 */
const inMemoryStore = new InMemoryJobStore();

/**
 * Redis is used only when configured and answering a ping.
 */
async function isRedisAvailable(queueName: QueueName): Promise<boolean> {
  if (process.env.FORCE_IN_MEMORY_QUEUE === 'true') {
    return false;
  }

  if (!isRedisConfigured(redisConnections.getSettings())) {
    return false;
  }

  return redisConnections.ping(queueConnectionName(queueName));
}

/**
 * Adapter that automatically switches between BullMQ and in-memory
 */
export class QueueAdapter {
  private useInMemory: boolean | null = null;

  constructor(private readonly queueName: QueueName) {}

  private async shouldUseInMemory(): Promise<boolean> {
    if (this.useInMemory === null) {
      this.useInMemory = !(await isRedisAvailable(this.queueName));
      if (this.useInMemory) {
        logger.info(`${this.queueName}: using in-memory fallback (Redis not available)`);
      }
    }
    return this.useInMemory;
  }

  /**
   * Expose whether adapter is using in-memory mode
   */
  async isInMemory(): Promise<boolean> {
    return this.shouldUseInMemory();
  }

  async add(data: BundleValidationJobData, opts?: JobsOptions): Promise<{ id: string; data: BundleValidationJobData }> {
    if (await this.shouldUseInMemory()) {
      const job = inMemoryStore.add(this.queueName, withMetadata(data, opts), opts);
      return { id: job.id, data: job.data };
    }

    const job = await enqueueJob(this.queueName, data, opts);
    return { id: job.id || '', data: job.data };
  }

  async getJob(jobId: string): Promise<JobView | null> {
    if (await this.shouldUseInMemory()) {
      const job = inMemoryStore.get(jobId);
      if (!job) return null;
      return {
        id: job.id,
        state: job.state,
        data: job.data,
        returnvalue: job.returnvalue,
        failedReason: job.failedReason,
        attemptsMade: job.attemptsMade,
        timestamp: job.timestamp,
        finishedOn: job.finishedOn,
      };
    }

    return getJobStatus(this.queueName, jobId);
  }

  /**
   * Invoke `handler` when an in-memory job of this queue completes.
   */
  onComplete(handler: (jobId: string, result: BundleValidationJobResult) => void): void {
    inMemoryStore.onComplete(this.queueName, (job) => {
      if (job.returnvalue) handler(job.id, job.returnvalue);
    });
  }

  async getMetrics(): Promise<{
    waiting: number;
    active: number;
    completed: number;
    failed: number;
  }> {
    if (await this.shouldUseInMemory()) {
      return {
        waiting: inMemoryStore.count(this.queueName, 'waiting'),
        active: inMemoryStore.count(this.queueName, 'active'),
        completed: inMemoryStore.count(this.queueName, 'completed'),
        failed: inMemoryStore.count(this.queueName, 'failed'),
      };
    }

    const metrics = await getQueueMetrics(this.queueName);
    return {
      waiting: metrics.waiting,
      active: metrics.active,
      completed: metrics.completed,
      failed: metrics.failed,
    };
  }
}

/**
 * Get an adapter for a specific queue
 */
export function getQueueAdapter(queueName: QueueName): QueueAdapter {
  return new QueueAdapter(queueName);
}

/**
 * Process a waiting in-memory job (development and tests)
 */
export async function processInMemoryJob(
  jobId: string,
  processor: (data: BundleValidationJobData) => Promise<BundleValidationJobResult>
): Promise<void> {
  const job = inMemoryStore.get(jobId);
  if (!job || job.state !== 'waiting') return;

  job.state = 'active';
  job.attemptsMade += 1;

  try {
    inMemoryStore.complete(job, await processor(job.data));
  } catch (error) {
    inMemoryStore.fail(job, error instanceof Error ? error.message : String(error));
  }
}

/**
 * Process every waiting in-memory job of the queue, oldest first, and
 * return how many ran. Jobs added while draining are picked up too.
 */
export async function drainInMemoryJobs(
  queueName: QueueName,
  processor: (data: BundleValidationJobData) => Promise<BundleValidationJobResult>
): Promise<number> {
  const nextWaiting = () => inMemoryStore.listByQueue(queueName).find((job) => job.state === 'waiting');
  let processed = 0;
  for (let job = nextWaiting(); job; job = nextWaiting()) {
    await processInMemoryJob(job.id, processor);
    processed++;
  }
  return processed;
}

/**
 * Clear all in-memory jobs (for testing)
 */
export function clearInMemoryQueue(): void {
  inMemoryStore.clear();
}
