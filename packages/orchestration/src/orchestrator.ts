/**
 * Orchestrator
 *
 * Owns the engine registry and the device identity, hands out session
 * builders and keeps the history of orchestrated sessions.
 */

import { resolveDevice } from './device';
import type { Device } from './device';
import { EngineRegistry } from './engine-registry';
import type { EngineDependencies } from './engine-registry';
import type { ResourceUrlMap, ValidationEngine } from './engines';
import { silentLogger } from './logger';
import type { Logger } from './logger';
import { SessionBuilder } from './session';
import type { ValidationSession } from './session';

export interface OrchestratorOptions extends EngineDependencies {
  device?: Device;
  registry?: EngineRegistry;
}

export class Orchestrator {
  readonly device: Device;
  private readonly registry: EngineRegistry;
  private readonly logger: Logger;
  private readonly sessions: ValidationSession[] = [];

  constructor(options: OrchestratorOptions = {}) {
    this.device = options.device ?? resolveDevice();
    this.registry = options.registry ?? new EngineRegistry(options);
    this.logger = options.logger ?? silentLogger;
  }

  session(): SessionBuilder {
    return new SessionBuilder(this.registry, this.device);
  }

  getValidationEngine(
    type: string,
    profileUrl: string,
    structureDefinitionUrls?: ResourceUrlMap,
    codeSystemUrls?: ResourceUrlMap,
    valueSetUrls?: ResourceUrlMap
  ): ValidationEngine {
    return this.registry.getOrCreate(type, profileUrl, structureDefinitionUrls, codeSystemUrls, valueSetUrls);
  }

  /**
   * Validate each session in turn. A session whose validation throws keeps the
   * results it already has and still joins the history; the error is rethrown
   * and the remaining sessions are not run.
   */
  async orchestrate(...sessions: ValidationSession[]): Promise<void> {
    for (const session of sessions) {
      this.logger.info(`Validating session ${session.id}`, {
        payloads: session.payloads.length,
        engines: session.engines.length,
      });
      try {
        await session.validate();
      } finally {
        this.sessions.push(session);
      }
      this.logger.info(`Session ${session.id} complete`, { results: session.getResults().length });
    }
  }

  getSessions(): readonly ValidationSession[] {
    return [...this.sessions];
  }
}
