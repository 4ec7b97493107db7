/**
 * Plain JSON records of results and sessions for reporting and queue results.
 */

import { z } from 'zod';
import type { JsonValue } from '@bundlehub/fhir-validator';
import type { ValidationResult } from './result';
import type { ValidationSession } from './session';

export interface IssueRecord {
  severity: string;
  message: string;
  line: number | null;
  column: number | null;
  diagnostics: string;
}

export interface ResultRecord {
  engine: string;
  engineName: string;
  profileUrl: string;
  isValid: boolean;
  initiatedAt: string;
  completedAt: string;
  durationMs: number;
  issues: IssueRecord[];
  operationOutcome: JsonValue | null;
}

export interface SessionRecord {
  id: string;
  createdAt: string;
  device: { address: string; hostname: string };
  profileUrl: string | null;
  payloadCount: number;
  engines: string[];
  resultCount: number;
  invalidCount: number;
  /** False when any result is invalid or when no engine ran at all. */
  valid: boolean;
  results: ResultRecord[];
}

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

function parseOutcome(text: string): JsonValue | null {
  if (text.trim() === '') return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return text;
  }
  const checked = jsonValueSchema.safeParse(parsed);
  return checked.success ? checked.data : text;
}

export function toResultRecord(result: ValidationResult): ResultRecord {
  return {
    engine: result.observability.identity,
    engineName: result.observability.name,
    profileUrl: result.profileUrl,
    isValid: result.isValid,
    initiatedAt: result.initiatedAt.toISOString(),
    completedAt: result.completedAt.toISOString(),
    durationMs: result.completedAt.getTime() - result.initiatedAt.getTime(),
    issues: result.issues.map((issue) => ({
      severity: issue.severity,
      message: issue.message,
      line: issue.location.line,
      column: issue.location.column,
      diagnostics: issue.location.diagnostics,
    })),
    operationOutcome: parseOutcome(result.operationOutcome),
  };
}

export function toSessionRecord(session: ValidationSession): SessionRecord {
  const results = session.getResults().map(toResultRecord);
  const invalidCount = results.filter((result) => !result.isValid).length;
  return {
    id: session.id,
    createdAt: session.createdAt.toISOString(),
    device: { address: session.device.address, hostname: session.device.hostname },
    profileUrl: session.profileUrl ?? null,
    payloadCount: session.payloads.length,
    engines: session.engines.map((engine) => engine.observability.identity),
    resultCount: results.length,
    invalidCount,
    valid: session.engines.length > 0 && invalidCount === 0,
    results,
  };
}
