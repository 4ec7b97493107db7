/**
 * Fetches conformance resources (profiles, code systems, value sets) as text.
 * Failures never throw: they are logged and yield an empty string.
 */

import { silentLogger } from './logger';
import type { Logger } from './logger';

export type FetchLike = typeof globalThis.fetch;

export interface ResourceFetcher {
  fetchText(url: string): Promise<string>;
}

export interface ResourceFetcherOptions {
  fetch?: FetchLike;
  logger?: Logger;
}

export function createResourceFetcher(options: ResourceFetcherOptions = {}): ResourceFetcher {
  const fetchFn = options.fetch ?? globalThis.fetch;
  const logger = options.logger ?? silentLogger;

  async function fetchText(url: string): Promise<string> {
    try {
      const response = await fetchFn(url, {
        method: 'GET',
        headers: { Accept: 'application/fhir+json, application/json;q=0.9, */*;q=0.8' },
      });
      if (!response.ok) {
        logger.warn(`Fetch failed for ${url}: HTTP ${response.status} ${response.statusText}`);
        return '';
      }
      return await response.text();
    } catch (error) {
      logger.warn(`Fetch failed for ${url}: ${error instanceof Error ? error.message : String(error)}`);
      return '';
    }
  }

  return { fetchText };
}
