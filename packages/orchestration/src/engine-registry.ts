/**
 * Engine Registry
 *
 * Memoizes engines by (engine type, profile URL). Construction is synchronous
 * and performs no I/O, so the lookup and the insert happen in one turn of the
 * event loop and every caller sees the same instance. Reference-resource maps
 * passed on later calls for an existing key are ignored.
 */

import type { RemoteValidatorConfig } from './config';
import { engineKey, engineKeyToString, isEngineType, ENGINE_TYPES } from './engine-type';
import type { EngineType } from './engine-type';
import { EmbeddedReferenceEngine, LocalRuleEngine, RemoteApiEngine } from './engines';
import type { ResourceUrlMap, ValidationEngine } from './engines';
import { ConfigurationError } from './errors';
import { silentLogger } from './logger';
import type { Logger } from './logger';
import { createResourceFetcher } from './resource-fetcher';
import type { FetchLike, ResourceFetcher } from './resource-fetcher';

export interface EngineDependencies {
  /** HTTP client for resource fetches and the remote validator */
  fetch?: FetchLike;
  /** Overrides the fetcher built from `fetch` */
  fetcher?: ResourceFetcher;
  remoteValidator?: Partial<RemoteValidatorConfig>;
  logger?: Logger;
}

export class EngineRegistry {
  private readonly engines = new Map<string, ValidationEngine>();
  private readonly fetcher: ResourceFetcher;
  private readonly logger: Logger;

  constructor(private readonly dependencies: EngineDependencies = {}) {
    this.logger = dependencies.logger ?? silentLogger;
    this.fetcher =
      dependencies.fetcher ?? createResourceFetcher({ fetch: dependencies.fetch, logger: this.logger });
  }

  /**
   * Engine for (type, profileUrl), built on first request.
   * @throws ConfigurationError when `type` is not an engine type
   */
  getOrCreate(
    type: string,
    profileUrl: string,
    structureDefinitionUrls?: ResourceUrlMap,
    codeSystemUrls?: ResourceUrlMap,
    valueSetUrls?: ResourceUrlMap
  ): ValidationEngine {
    if (!isEngineType(type)) {
      throw new ConfigurationError(`Unknown engine type '${type}' (expected one of ${ENGINE_TYPES.join(', ')})`);
    }

    const key = engineKeyToString(engineKey(type, profileUrl));
    const existing = this.engines.get(key);
    if (existing) return existing;

    const engine = this.createEngine(type, profileUrl, { structureDefinitionUrls, codeSystemUrls, valueSetUrls });
    this.engines.set(key, engine);
    this.logger.debug(`Created ${type} engine for ${profileUrl}`);
    return engine;
  }

  has(type: EngineType, profileUrl: string): boolean {
    return this.engines.has(engineKeyToString(engineKey(type, profileUrl)));
  }

  get size(): number {
    return this.engines.size;
  }

  private createEngine(
    type: EngineType,
    profileUrl: string,
    urls: {
      structureDefinitionUrls?: ResourceUrlMap;
      codeSystemUrls?: ResourceUrlMap;
      valueSetUrls?: ResourceUrlMap;
    }
  ): ValidationEngine {
    switch (type) {
      case 'local-rule':
        return new LocalRuleEngine({ profileUrl, ...urls, fetcher: this.fetcher, logger: this.logger });
      case 'embedded-reference':
        return new EmbeddedReferenceEngine(profileUrl);
      case 'remote-api':
        return new RemoteApiEngine({
          profileUrl,
          remoteValidator: this.dependencies.remoteValidator,
          fetch: this.dependencies.fetch,
          logger: this.logger,
        });
    }
  }
}
