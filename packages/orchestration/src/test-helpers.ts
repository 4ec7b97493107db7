/**
 * Fakes shared by the orchestration tests.
 */

import type { ValidationEngine } from './engines';
import type { Logger, LogMetadata } from './logger';
import type { FetchLike } from './resource-fetcher';
import { createObservability, validationResult } from './result';

export const PROFILE_URL = 'http://example.org/StructureDefinition/test-patient';

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  metadata?: LogMetadata;
}

export function recordingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    debug: (message, metadata) => entries.push({ level: 'debug', message, metadata }),
    info: (message, metadata) => entries.push({ level: 'info', message, metadata }),
    warn: (message, metadata) => entries.push({ level: 'warn', message, metadata }),
    error: (message, metadata) => entries.push({ level: 'error', message, metadata }),
  };
}

export interface StubRoute {
  status?: number;
  body: string;
}

/**
 * fetch that answers from a URL-keyed table (404 otherwise) and records the
 * URLs it was asked for.
 */
export function stubFetch(routes: Record<string, StubRoute>): FetchLike & { requested: string[] } {
  const requested: string[] = [];
  const fetch = async (input: string | URL | Request): Promise<Response> => {
    const url = input instanceof Request ? input.url : String(input);
    requested.push(url);
    const route = routes[url];
    if (!route) return new Response('', { status: 404 });
    return new Response(route.body, { status: route.status ?? 200 });
  };
  return Object.assign(fetch, { requested });
}

export interface RecordingEngineOptions {
  /** Payloads the engine throws on. */
  failOn?: string[];
  /** Payloads the engine reports as invalid. */
  invalidOn?: string[];
  /** Milliseconds to wait before answering. */
  delayMs?: number;
}

/**
 * Engine that records `payload:name` for every call and accepts everything
 * except the payloads named in the options. The outcome text echoes the payload.
 */
export function recordingEngine(
  name: string,
  calls: string[],
  options: RecordingEngineOptions = {}
): ValidationEngine {
  const { failOn = [], invalidOn = [], delayMs = 0 } = options;
  const observability = createObservability(name, name, new Date());
  return {
    engineType: 'embedded-reference',
    profileUrl: PROFILE_URL,
    observability,
    async validate(payload) {
      calls.push(`${payload}:${name}`);
      const initiatedAt = new Date();
      if (delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, delayMs));
      }
      if (failOn.includes(payload)) {
        throw new Error(`${name} crashed on ${payload}`);
      }
      return validationResult({
        initiatedAt,
        completedAt: new Date(),
        profileUrl: PROFILE_URL,
        observability,
        isValid: !invalidOn.includes(payload),
        operationOutcome: payload,
        issues: [],
      });
    },
  };
}
