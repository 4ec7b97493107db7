/**
 * Bundle Submission
 *
 * Producer side of the bundle validation queue. With Redis the job is left
 * for the worker; with the in-memory fallback it is drained in this process.
 */

import type { Logger, Orchestrator } from '@bundlehub/orchestration';
import {
  QUEUE_NAMES,
  drainInMemoryJobs,
  getQueueAdapter,
  type BundleValidationJobData,
  type BundleValidationJobResult,
} from '@bundlehub/queue';
import { processBundleValidationJob, type BundleValidationDefaults } from './workers/bundle-validation.worker';

export type SubmitMode = 'redis' | 'in-memory';

export interface SubmitOutcome {
  jobId: string;
  mode: SubmitMode;
  state: string;
  result?: BundleValidationJobResult;
  failedReason?: string;
}

export interface SubmitOptions {
  orchestrator: Orchestrator;
  defaults?: BundleValidationDefaults;
  logger: Logger;
}

export async function submitBundleValidation(
  data: BundleValidationJobData,
  options: SubmitOptions
): Promise<SubmitOutcome> {
  const { orchestrator, defaults, logger } = options;
  const adapter = getQueueAdapter(QUEUE_NAMES.BUNDLE_VALIDATION);
  const job = await adapter.add(data);

  if (!(await adapter.isInMemory())) {
    logger.info(`Job ${job.id} enqueued`, { payloads: data.payloads.length, correlationId: data.correlationId });
    return { jobId: job.id, mode: 'redis', state: 'waiting' };
  }

  const processed = await drainInMemoryJobs(QUEUE_NAMES.BUNDLE_VALIDATION, (jobData) =>
    processBundleValidationJob(jobData, orchestrator, defaults)
  );
  logger.debug(`Drained ${processed} in-memory job(s)`);

  const status = await adapter.getJob(job.id);
  if (status?.failedReason) {
    logger.error(`Job ${job.id} failed: ${status.failedReason}`);
  }
  return {
    jobId: job.id,
    mode: 'in-memory',
    state: status?.state ?? 'unknown',
    result: status?.returnvalue,
    failedReason: status?.failedReason,
  };
}

/**
 * An enqueued job is accepted for now; a job run in process must have validated.
 */
export function isAccepted(outcome: SubmitOutcome): boolean {
  if (outcome.mode === 'redis') return true;
  return outcome.result?.valid === true;
}
