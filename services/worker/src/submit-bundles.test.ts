import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Orchestrator, silentLogger } from '@bundlehub/orchestration';
import { QUEUE_NAMES, clearInMemoryQueue, getQueueAdapter, type BundleValidationJobData } from '@bundlehub/queue';
import { isAccepted, submitBundleValidation } from './submit-bundles';
import { NO_ENGINE_SELECTED } from './workers/bundle-validation.worker';

const data: BundleValidationJobData = {
  submittedBy: 'user-1',
  payloads: ['{"resourceType":"Bundle","type":"collection"}'],
  profileUrl: 'http://example.org/StructureDefinition/test-bundle',
  strategy: '{"engines":["HL7-Official-Embedded"]}',
  correlationId: 'corr-1',
};

function createOrchestrator(): Orchestrator {
  return new Orchestrator({ device: { address: '127.0.0.1', hostname: 'test-host' } });
}

describe('worker:submit', () => {
  beforeEach(() => {
    process.env.FORCE_IN_MEMORY_QUEUE = 'true';
    clearInMemoryQueue();
  });

  afterEach(() => {
    delete process.env.FORCE_IN_MEMORY_QUEUE;
    clearInMemoryQueue();
  });

  it('should run the job in process without Redis', async () => {
    const orchestrator = createOrchestrator();

    const outcome = await submitBundleValidation(data, { orchestrator, logger: silentLogger });

    expect(outcome.mode).toBe('in-memory');
    expect(outcome.state).toBe('completed');
    expect(outcome.result?.valid).toBe(true);
    expect(outcome.result?.session.engines).toEqual(['EmbeddedReferenceEngine']);
    expect(outcome.result?.sessionId).toBe(orchestrator.getSessions()[0].id);
    expect(isAccepted(outcome)).toBe(true);

    const job = await getQueueAdapter(QUEUE_NAMES.BUNDLE_VALIDATION).getJob(outcome.jobId);
    expect(job?.data._metadata?.enqueuedBy).toBe('user-1');
  });

  it('should use the default strategy when the job names none', async () => {
    const outcome = await submitBundleValidation({ ...data, strategy: undefined }, {
      orchestrator: createOrchestrator(),
      defaults: { validationStrategy: '{"engines":["HL7-Official-Embedded"]}' },
      logger: silentLogger,
    });

    expect(outcome.result?.session.engines).toEqual(['EmbeddedReferenceEngine']);
  });

  it('should not accept a submission that validated nothing', async () => {
    const outcome = await submitBundleValidation(
      { ...data, strategy: '{"engines":["BOGUS"]}' },
      { orchestrator: createOrchestrator(), logger: silentLogger }
    );

    expect(outcome.state).toBe('completed');
    expect(outcome.result?.valid).toBe(false);
    expect(outcome.result?.strategyIssues.at(-1)).toBe(NO_ENGINE_SELECTED);
    expect(isAccepted(outcome)).toBe(false);
  });

  it('should accept a job handed to Redis and reject a failed in-process job', () => {
    expect(isAccepted({ jobId: 'bundle-1', mode: 'redis', state: 'waiting' })).toBe(true);
    expect(isAccepted({ jobId: 'bundle-2', mode: 'in-memory', state: 'failed', failedReason: 'boom' })).toBe(false);
  });
});
