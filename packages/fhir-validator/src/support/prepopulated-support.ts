import { canonicalUrl } from '../conformance';
import type { CodeSystem, StructureDefinition, ValueSet } from '../conformance';
import { BaseValidationSupport } from './validation-support';

/**
 * Holds custom conformance resources (profiles, code systems, value sets)
 * registered by URL. Lookups ignore a `|version` suffix.
 */
export class PrepopulatedSupport extends BaseValidationSupport {
  readonly name = 'prepopulated';

  private readonly structureDefinitions = new Map<string, StructureDefinition>();
  private readonly codeSystems = new Map<string, CodeSystem>();
  private readonly valueSets = new Map<string, ValueSet>();

  addStructureDefinition(definition: StructureDefinition): this {
    this.structureDefinitions.set(canonicalUrl(definition.url), definition);
    return this;
  }

  addCodeSystem(codeSystem: CodeSystem): this {
    this.codeSystems.set(canonicalUrl(codeSystem.url), codeSystem);
    return this;
  }

  addValueSet(valueSet: ValueSet): this {
    this.valueSets.set(canonicalUrl(valueSet.url), valueSet);
    return this;
  }

  get size(): number {
    return this.structureDefinitions.size + this.codeSystems.size + this.valueSets.size;
  }

  override fetchStructureDefinition(url: string): StructureDefinition | undefined {
    return this.structureDefinitions.get(canonicalUrl(url));
  }

  override fetchCodeSystem(url: string): CodeSystem | undefined {
    return this.codeSystems.get(canonicalUrl(url));
  }

  override fetchValueSet(url: string): ValueSet | undefined {
    return this.valueSets.get(canonicalUrl(url));
  }
}
