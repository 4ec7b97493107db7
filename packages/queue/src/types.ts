/**
 * Job Data Types for BullMQ Queues
 *
 * Type-safe payloads for bundle validation jobs:
 * - Input data (JobData)
 * - Result data (JobResult)
 */

import type { ResourceUrlMap, SessionRecord } from '@bundlehub/orchestration';

/**
 * Job metadata stored with each job
 */
export interface JobMetadata {
  enqueuedAt: string;
  enqueuedBy: string;
  priority?: number;
  attemptsMade: number;
  maxAttempts: number;
}

/**
 * Bundle Validation Job
 * Runs one validation session over the payloads
 */
export interface BundleValidationJobData {
  /** Who submitted the bundles, recorded in the job metadata */
  submittedBy: string;
  payloads: string[];
  profileUrl: string;
  /** Strategy descriptor, e.g. {"engines":["HAPI"]} */
  strategy?: string;
  /** Replace the default engine selection when the strategy is well-formed */
  clearExisting?: boolean;
  structureDefinitionUrls?: ResourceUrlMap;
  codeSystemUrls?: ResourceUrlMap;
  valueSetUrls?: ResourceUrlMap;
  correlationId?: string;
  _metadata?: JobMetadata;
}

export interface BundleValidationJobResult {
  sessionId: string;
  /** At least one engine ran and every result is valid */
  valid: boolean;
  strategyIssues: string[];
  session: SessionRecord;
}
