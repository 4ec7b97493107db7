/**
 * Core Definitions Support
 *
 * Base FHIR R4 definitions bundled with the package in data/core-definitions.json:
 * the list of resource types, base element constraints for the common
 * resources, and the core code systems and value sets they bind to. Resource
 * types without bundled constraints get a root-only definition so that they
 * are still recognised.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import {
  canonicalUrl,
  codeSystemSchema,
  structureDefinitionSchema,
  valueSetSchema,
} from '../conformance';
import type { CodeSystem, StructureDefinition, ValueSet } from '../conformance';
import { BaseValidationSupport } from './validation-support';

export const CORE_DEFINITION_BASE = 'http://hl7.org/fhir/StructureDefinition/';

const coreDefinitionsSchema = z.object({
  fhirVersion: z.string(),
  resourceTypes: z.array(z.string()),
  structureDefinitions: z.array(structureDefinitionSchema),
  codeSystems: z.array(codeSystemSchema),
  valueSets: z.array(valueSetSchema),
});

export type CoreDefinitions = z.infer<typeof coreDefinitionsSchema>;

let cached: CoreDefinitions | undefined;

export function loadCoreDefinitions(): CoreDefinitions {
  if (!cached) {
    const file = new URL('../../data/core-definitions.json', import.meta.url);
    cached = coreDefinitionsSchema.parse(JSON.parse(readFileSync(file, 'utf-8')));
  }
  return cached;
}

export class CoreDefinitionsSupport extends BaseValidationSupport {
  readonly name = 'core-definitions';

  private readonly resourceTypes: Set<string>;
  private readonly structureDefinitions = new Map<string, StructureDefinition>();
  private readonly codeSystems = new Map<string, CodeSystem>();
  private readonly valueSets = new Map<string, ValueSet>();

  constructor(definitions: CoreDefinitions = loadCoreDefinitions()) {
    super();
    this.resourceTypes = new Set(definitions.resourceTypes);
    for (const definition of definitions.structureDefinitions) {
      this.structureDefinitions.set(definition.url, definition);
    }
    for (const codeSystem of definitions.codeSystems) {
      this.codeSystems.set(codeSystem.url, codeSystem);
    }
    for (const valueSet of definitions.valueSets) {
      this.valueSets.set(valueSet.url, valueSet);
    }
  }

  isKnownResourceType(resourceType: string): boolean {
    return this.resourceTypes.has(resourceType);
  }

  override fetchStructureDefinition(url: string): StructureDefinition | undefined {
    const canonical = canonicalUrl(url);
    const bundled = this.structureDefinitions.get(canonical);
    if (bundled) return bundled;

    if (!canonical.startsWith(CORE_DEFINITION_BASE)) return undefined;
    const type = canonical.slice(CORE_DEFINITION_BASE.length);
    if (!this.resourceTypes.has(type)) return undefined;

    const synthesized: StructureDefinition = {
      resourceType: 'StructureDefinition',
      url: canonical,
      name: type,
      type,
      kind: 'resource',
      derivation: 'specialization',
      snapshot: { element: [{ id: type, path: type, min: 0, max: '*' }] },
    };
    this.structureDefinitions.set(canonical, synthesized);
    return synthesized;
  }

  override fetchCodeSystem(url: string): CodeSystem | undefined {
    return this.codeSystems.get(canonicalUrl(url));
  }

  override fetchValueSet(url: string): ValueSet | undefined {
    return this.valueSets.get(canonicalUrl(url));
  }
}
