/**
 * Local Rule Engine
 *
 * Validates bundles in-process with @bundlehub/fhir-validator. The engine
 * instance is cached by the registry, but reference resources are fetched and
 * the support chain rebuilt on every call.
 */

import {
  BundleValidator,
  CachingSupport,
  CommonTerminologySupport,
  CoreDefinitionsSupport,
  InMemoryTerminologySupport,
  PrepopulatedSupport,
  SupportChain,
  parseCodeSystem,
  parseStructureDefinition,
  parseValueSet,
  toOperationOutcome,
} from '@bundlehub/fhir-validator';
import type { StructureDefinition, ValidationMessage } from '@bundlehub/fhir-validator';
import { silentLogger } from '../logger';
import type { Logger } from '../logger';
import { createResourceFetcher } from '../resource-fetcher';
import type { ResourceFetcher } from '../resource-fetcher';
import {
  createObservability,
  fatalResult,
  sourceLocation,
  validationIssue,
  validationResult,
} from '../result';
import type { Observability, ValidationIssue, ValidationResult } from '../result';
import { FHIR_VERSION } from './validation-engine';
import type { ReferenceResourceUrls, ResourceUrlMap, ValidationEngine } from './validation-engine';

export interface LocalRuleEngineOptions extends ReferenceResourceUrls {
  profileUrl: string;
  fetcher?: ResourceFetcher;
  logger?: Logger;
}

function toIssue(message: ValidationMessage): ValidationIssue {
  return validationIssue(
    message.message,
    sourceLocation(message.line ?? null, message.column ?? null, message.location),
    message.severity
  );
}

export class LocalRuleEngine implements ValidationEngine {
  readonly engineType = 'local-rule' as const;
  readonly profileUrl: string;
  readonly observability: Observability;
  readonly structureDefinitionUrls: ResourceUrlMap;
  readonly codeSystemUrls: ResourceUrlMap;
  readonly valueSetUrls: ResourceUrlMap;

  private readonly fetcher: ResourceFetcher;
  private readonly logger: Logger;

  constructor(options: LocalRuleEngineOptions) {
    const initAt = new Date();
    this.profileUrl = options.profileUrl;
    this.structureDefinitionUrls = Object.freeze({ ...options.structureDefinitionUrls });
    this.codeSystemUrls = Object.freeze({ ...options.codeSystemUrls });
    this.valueSetUrls = Object.freeze({ ...options.valueSetUrls });
    this.logger = options.logger ?? silentLogger;
    this.fetcher = options.fetcher ?? createResourceFetcher({ logger: this.logger });
    this.observability = createObservability(
      'LocalRuleEngine',
      `Local rule engine (FHIR version ${FHIR_VERSION})`,
      initAt
    );
  }

  async validate(payload: string): Promise<ValidationResult> {
    const initiatedAt = new Date();
    try {
      const { support, profile } = await this.loadSupport();
      const outcome = new BundleValidator(support, { profiles: [profile] }).validate(payload);

      return validationResult({
        initiatedAt,
        completedAt: new Date(),
        profileUrl: this.profileUrl,
        observability: this.observability,
        isValid: outcome.successful,
        operationOutcome: JSON.stringify(toOperationOutcome(outcome.messages), null, 2),
        issues: outcome.messages.map(toIssue),
      });
    } catch (error) {
      this.logger.error(
        `Validation against ${this.profileUrl} failed: ${error instanceof Error ? error.message : String(error)}`
      );
      return fatalResult(error, {
        initiatedAt,
        profileUrl: this.profileUrl,
        observability: this.observability,
      });
    }
  }

  /**
   * Fetch the profile and the reference resources, and assemble the support
   * chain: core definitions, common terminology, in-memory terminology and
   * the fetched resources, behind a cache.
   */
  private async loadSupport(): Promise<{ support: CachingSupport; profile: StructureDefinition }> {
    const prepopulated = new PrepopulatedSupport();

    const profile = parseStructureDefinition(await this.fetcher.fetchText(this.profileUrl));
    prepopulated.addStructureDefinition(profile);

    for (const url of Object.values(this.structureDefinitionUrls)) {
      prepopulated.addStructureDefinition(parseStructureDefinition(await this.fetcher.fetchText(url)));
    }
    for (const url of Object.values(this.codeSystemUrls)) {
      prepopulated.addCodeSystem(parseCodeSystem(await this.fetcher.fetchText(url)));
    }
    for (const url of Object.values(this.valueSetUrls)) {
      prepopulated.addValueSet(parseValueSet(await this.fetcher.fetchText(url)));
    }
    this.logger.debug(`Loaded ${prepopulated.size} conformance resource(s) for ${this.profileUrl}`);

    const support = new CachingSupport(
      new SupportChain(
        new CoreDefinitionsSupport(),
        new CommonTerminologySupport(),
        new InMemoryTerminologySupport(),
        prepopulated
      )
    );
    return { support, profile };
  }
}
