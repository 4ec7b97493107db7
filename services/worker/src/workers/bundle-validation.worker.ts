/**
 * Bundle Validation Worker
 *
 * Runs one validation session per job and returns its session record.
 */

import { Worker, type Job } from 'bullmq';
import { toSessionRecord, type Logger, type Orchestrator } from '@bundlehub/orchestration';
import {
  QUEUE_NAMES,
  createWorkerConnection,
  type BundleValidationJobData,
  type BundleValidationJobResult,
  type QueueName,
} from '@bundlehub/queue';

export const NO_ENGINE_SELECTED = 'No validation engine was selected; the payloads were not validated';

export interface BundleValidationDefaults {
  /** Strategy used when the job names none */
  validationStrategy?: string;
}

/**
 * Build a session from the job, orchestrate it and summarise the outcome.
 * Without a strategy from the job or the defaults, the local rule engine runs.
 * A job whose strategy selects no engine is never reported valid.
 */
export async function processBundleValidationJob(
  data: BundleValidationJobData,
  orchestrator: Orchestrator,
  defaults: BundleValidationDefaults = {}
): Promise<BundleValidationJobResult> {
  const builder = orchestrator.session().withPayloads(data.payloads).withProfileUrl(data.profileUrl);
  if (data.structureDefinitionUrls) builder.withStructureDefinitionUrls(data.structureDefinitionUrls);
  if (data.codeSystemUrls) builder.withCodeSystemUrls(data.codeSystemUrls);
  if (data.valueSetUrls) builder.withValueSetUrls(data.valueSetUrls);

  const strategy = data.strategy ?? defaults.validationStrategy;
  if (strategy === undefined) {
    builder.addLocalRuleEngine();
  } else {
    builder.withValidationStrategy(strategy, data.clearExisting ?? false);
  }

  const session = builder.build();
  await orchestrator.orchestrate(session);

  const record = toSessionRecord(session);
  const strategyIssues = [...builder.getStrategyIssues()];
  if (session.engines.length === 0) {
    strategyIssues.push(NO_ENGINE_SELECTED);
  }
  return {
    sessionId: session.id,
    valid: record.valid,
    strategyIssues,
    session: record,
  };
}

export interface BundleValidationWorkerOptions {
  orchestrator: Orchestrator;
  concurrency: number;
  defaults?: BundleValidationDefaults;
  logger: Logger;
}

export function createBundleValidationWorker(
  options: BundleValidationWorkerOptions
): Worker<BundleValidationJobData, BundleValidationJobResult, QueueName> {
  const { orchestrator, defaults, logger } = options;
  const connection = createWorkerConnection(QUEUE_NAMES.BUNDLE_VALIDATION);

  const worker = new Worker<BundleValidationJobData, BundleValidationJobResult, QueueName>(
    QUEUE_NAMES.BUNDLE_VALIDATION,
    async (job: Job<BundleValidationJobData, BundleValidationJobResult, QueueName>) => {
      logger.info(`Job ${job.id} started`, {
        payloads: job.data.payloads.length,
        profileUrl: job.data.profileUrl,
        correlationId: job.data.correlationId,
      });
      return processBundleValidationJob(job.data, orchestrator, defaults);
    },
    {
      connection,
      concurrency: options.concurrency,
    }
  );

  worker.on('completed', (job, result) => {
    logger.info(`Job ${job.id} completed`, { sessionId: result.sessionId, valid: result.valid });
  });

  worker.on('failed', (job, error) => {
    logger.error(`Job ${job?.id} failed: ${error.message}`);
  });

  return worker;
}
