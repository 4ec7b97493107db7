/**
 * Validation Session
 *
 * A session pairs a fixed list of payloads with a fixed, ordered list of
 * engines. Each `validate()` runs every payload through every engine,
 * payload-major, and appends the results.
 */

import { randomUUID } from 'node:crypto';
import type { Device } from './device';
import type { EngineRegistry } from './engine-registry';
import { isEngineType } from './engine-type';
import type { EngineType } from './engine-type';
import type { ResourceUrlMap, ValidationEngine } from './engines';
import { ConfigurationError } from './errors';
import type { ValidationResult } from './result';
import { parseValidationStrategy } from './strategy';

export interface ValidationSessionInit {
  device: Device;
  payloads: readonly string[];
  engines: readonly ValidationEngine[];
  profileUrl?: string;
  structureDefinitionUrls?: ResourceUrlMap;
  codeSystemUrls?: ResourceUrlMap;
  valueSetUrls?: ResourceUrlMap;
}

export class ValidationSession {
  readonly id: string = randomUUID();
  readonly createdAt = new Date();
  readonly device: Device;
  readonly payloads: readonly string[];
  readonly engines: readonly ValidationEngine[];
  readonly profileUrl?: string;
  readonly structureDefinitionUrls: ResourceUrlMap;
  readonly codeSystemUrls: ResourceUrlMap;
  readonly valueSetUrls: ResourceUrlMap;

  private readonly results: ValidationResult[] = [];

  constructor(init: ValidationSessionInit) {
    this.device = init.device;
    this.payloads = Object.freeze([...init.payloads]);
    this.engines = Object.freeze([...init.engines]);
    this.profileUrl = init.profileUrl;
    this.structureDefinitionUrls = Object.freeze({ ...init.structureDefinitionUrls });
    this.codeSystemUrls = Object.freeze({ ...init.codeSystemUrls });
    this.valueSetUrls = Object.freeze({ ...init.valueSetUrls });
  }

  /**
   * Run every (payload, engine) pair in order, one at a time.
   */
  async validate(): Promise<void> {
    for (const payload of this.payloads) {
      for (const engine of this.engines) {
        this.results.push(await engine.validate(payload));
      }
    }
  }

  getResults(): readonly ValidationResult[] {
    return [...this.results];
  }
}

type EngineSelection = { kind: 'instance'; engine: ValidationEngine } | { kind: 'registry'; engineType: EngineType };

/**
 * Fluent session builder. Registry-backed engine selections are resolved in
 * `build()`, so the profile URL and resource maps may be set in any order.
 */
export class SessionBuilder {
  private readonly payloads: string[] = [];
  private selections: EngineSelection[] = [];
  private readonly strategyIssues: string[] = [];
  private profileUrl?: string;
  private structureDefinitionUrls: ResourceUrlMap = {};
  private codeSystemUrls: ResourceUrlMap = {};
  private valueSetUrls: ResourceUrlMap = {};

  constructor(
    private readonly registry: EngineRegistry,
    private device: Device
  ) {}

  /** Appends to the payloads added so far */
  withPayloads(payloads: readonly string[]): this {
    this.payloads.push(...payloads);
    return this;
  }

  onDevice(device: Device): this {
    this.device = device;
    return this;
  }

  withProfileUrl(profileUrl: string): this {
    this.profileUrl = profileUrl;
    return this;
  }

  withStructureDefinitionUrls(urls: ResourceUrlMap): this {
    this.structureDefinitionUrls = { ...urls };
    return this;
  }

  withCodeSystemUrls(urls: ResourceUrlMap): this {
    this.codeSystemUrls = { ...urls };
    return this;
  }

  withValueSetUrls(urls: ResourceUrlMap): this {
    this.valueSetUrls = { ...urls };
    return this;
  }

  addValidationEngine(engine: ValidationEngine): this {
    this.selections.push({ kind: 'instance', engine });
    return this;
  }

  /**
   * @throws ConfigurationError when `type` is not an engine type
   */
  addEngine(type: string): this {
    if (!isEngineType(type)) {
      throw new ConfigurationError(`Unknown engine type '${type}'`);
    }
    this.selections.push({ kind: 'registry', engineType: type });
    return this;
  }

  addLocalRuleEngine(): this {
    return this.addEngine('local-rule');
  }

  addEmbeddedReferenceEngine(): this {
    return this.addEngine('embedded-reference');
  }

  addRemoteApiEngine(): this {
    return this.addEngine('remote-api');
  }

  /**
   * Select engines from a strategy descriptor. Problems are recorded in
   * `getStrategyIssues()`; with `clearExisting` a well-formed descriptor
   * replaces the current selection.
   */
  withValidationStrategy(json: string | null | undefined, clearExisting = false): this {
    const strategy = parseValidationStrategy(json);
    this.strategyIssues.push(...strategy.diagnostics);

    if (strategy.wellFormed && clearExisting) {
      this.selections = [];
    }
    for (const engineType of strategy.engines) {
      this.selections.push({ kind: 'registry', engineType });
    }
    return this;
  }

  getStrategyIssues(): readonly string[] {
    return [...this.strategyIssues];
  }

  /**
   * @throws ConfigurationError when a registry-backed engine is selected without a profile URL
   */
  build(): ValidationSession {
    const engines = this.selections.map((selection) => {
      if (selection.kind === 'instance') return selection.engine;
      if (this.profileUrl === undefined) {
        throw new ConfigurationError(`A profile URL is required to use the ${selection.engineType} engine`);
      }
      return this.registry.getOrCreate(
        selection.engineType,
        this.profileUrl,
        this.structureDefinitionUrls,
        this.codeSystemUrls,
        this.valueSetUrls
      );
    });

    return new ValidationSession({
      device: this.device,
      payloads: this.payloads,
      engines,
      profileUrl: this.profileUrl,
      structureDefinitionUrls: this.structureDefinitionUrls,
      codeSystemUrls: this.codeSystemUrls,
      valueSetUrls: this.valueSetUrls,
    });
  }
}
