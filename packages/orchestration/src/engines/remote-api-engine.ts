/**
 * Remote API Engine
 *
 * Posts the payload to an HL7 validator service and maps its response.
 */

import { z } from 'zod';
import { DEFAULT_REMOTE_VALIDATOR } from '../config';
import type { RemoteValidatorConfig } from '../config';
import { RemoteTimeoutError } from '../errors';
import { silentLogger } from '../logger';
import type { Logger } from '../logger';
import type { FetchLike } from '../resource-fetcher';
import { createObservability, fatalResult, sourceLocation, validationIssue, validationResult } from '../result';
import type { Observability, ValidationIssue, ValidationResult } from '../result';
import type { ValidationEngine } from './validation-engine';

/** Marker whose presence in the response body means the payload was accepted */
const VALID_MARKER = 'OperationOutcome';

const text = z.unknown().transform((value) => (typeof value === 'string' ? value : value == null ? '' : String(value)));
const integerOrNull = z
  .unknown()
  .transform((value) => (typeof value === 'number' && Number.isInteger(value) ? value : null));

const remoteIssueSchema = z.object({
  message: text,
  line: integerOrNull,
  col: integerOrNull,
  level: text,
  location: text,
});

export interface RemoteApiEngineOptions {
  profileUrl: string;
  remoteValidator?: Partial<RemoteValidatorConfig>;
  fetch?: FetchLike;
  logger?: Logger;
}

/**
 * Request body for the validator service.
 */
export function buildRemoteRequest(payload: string, profileUrl: string, config: RemoteValidatorConfig): string {
  return JSON.stringify({
    cliContext: {
      sv: config.fhirVersion,
      ig: [profileUrl],
      locale: config.locale,
    },
    filesToValidate: [
      {
        fileName: 'input.json',
        fileContent: payload.replace(/\r\n|\r|\n/g, '\r\n'),
        fileType: 'json',
      },
    ],
  });
}

/**
 * Issues from `outcomes[].issues[]`. Unreadable parts are logged and skipped.
 */
export function parseRemoteIssues(body: string, logger: Logger = silentLogger): ValidationIssue[] {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    logger.warn(`Remote response is not JSON: ${error instanceof Error ? error.message : String(error)}`);
    return [];
  }

  const root = z.object({ outcomes: z.array(z.unknown()) }).safeParse(json);
  if (!root.success) {
    logger.warn('Remote response has no outcomes array');
    return [];
  }

  const issues: ValidationIssue[] = [];
  for (const outcome of root.data.outcomes) {
    const parsedOutcome = z.object({ issues: z.array(z.unknown()) }).safeParse(outcome);
    if (!parsedOutcome.success) continue;

    for (const rawIssue of parsedOutcome.data.issues) {
      const parsed = remoteIssueSchema.safeParse(rawIssue);
      if (!parsed.success) {
        logger.warn('Skipping unreadable remote issue');
        continue;
      }
      const { message, line, col, level, location } = parsed.data;
      issues.push(validationIssue(message, sourceLocation(line, col, location), level));
    }
  }
  return issues;
}

export class RemoteApiEngine implements ValidationEngine {
  readonly engineType = 'remote-api' as const;
  readonly profileUrl: string;
  readonly observability: Observability;
  readonly config: RemoteValidatorConfig;

  private readonly fetchFn: FetchLike;
  private readonly logger: Logger;

  constructor(options: RemoteApiEngineOptions) {
    const initAt = new Date();
    this.profileUrl = options.profileUrl;
    this.config = Object.freeze({ ...DEFAULT_REMOTE_VALIDATOR, ...options.remoteValidator });
    this.fetchFn = options.fetch ?? globalThis.fetch;
    this.logger = options.logger ?? silentLogger;
    this.observability = createObservability('RemoteApiEngine', `Remote validator API (${this.config.url})`, initAt);
  }

  async validate(payload: string): Promise<ValidationResult> {
    const initiatedAt = new Date();
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await this.fetchFn(this.config.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: buildRemoteRequest(payload, this.profileUrl, this.config),
        signal: controller.signal,
      });
      const body = await response.text();

      if (!response.ok) {
        this.logger.warn(`Remote validator answered HTTP ${response.status} ${response.statusText}`);
      }

      return validationResult({
        initiatedAt,
        completedAt: new Date(),
        profileUrl: this.profileUrl,
        observability: this.observability,
        isValid: body.includes(VALID_MARKER),
        operationOutcome: '',
        issues: parseRemoteIssues(body, this.logger),
      });
    } catch (error) {
      const failure =
        error instanceof Error && error.name === 'AbortError'
          ? new RemoteTimeoutError(this.config.url, this.config.timeoutMs)
          : error;
      this.logger.error(
        `Remote validation failed: ${failure instanceof Error ? failure.message : String(failure)}`
      );
      return fatalResult(failure, {
        initiatedAt,
        profileUrl: this.profileUrl,
        observability: this.observability,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
