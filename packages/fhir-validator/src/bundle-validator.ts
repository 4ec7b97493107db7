/**
 * Bundle Validator
 *
 * Parses a Bundle, works out which structure definitions apply to the bundle
 * and to each entry resource, and runs the instance rules over it.
 */

import type { StructureDefinition } from './conformance';
import { parseBundleDocument } from './parser';
import type { BundleDocument } from './parser';
import { childElements, getDefaultRules } from './rules';
import type { BundleEntryNode, ElementNode, InstanceRule, RuleContext, ValidationTarget } from './rules';
import { CORE_DEFINITION_BASE } from './support/core-definitions-support';
import type { ValidationSupport } from './support/validation-support';
import { isJsonObject } from './types';
import type { BundleValidationOutcome, ValidationMessage } from './types';

export interface BundleValidatorOptions {
  /**
   * Profiles applied to every resource of their type. A profile of type
   * Bundle applies to the bundle itself.
   */
  profiles?: StructureDefinition[];

  /** Replaces the default rule set */
  rules?: InstanceRule[];
}

function stringProperty(node: ElementNode | undefined, key: string): string | undefined {
  if (!node || !isJsonObject(node.value)) return undefined;
  const value = node.value[key];
  return typeof value === 'string' ? value : undefined;
}

export class BundleValidator {
  private readonly rules: InstanceRule[];
  private readonly profiles: StructureDefinition[];

  constructor(
    private readonly support: ValidationSupport,
    options: BundleValidatorOptions = {}
  ) {
    this.rules = options.rules ?? getDefaultRules();
    this.profiles = options.profiles ?? [];
  }

  /**
   * Validate a Bundle payload.
   * @throws BundleParseError when the payload is not a JSON Bundle
   */
  validate(payload: string): BundleValidationOutcome {
    const document = parseBundleDocument(payload);
    const context = this.buildContext(document);

    const messages: ValidationMessage[] = [];
    for (const rule of this.rules) {
      try {
        messages.push(...rule.validate(context));
      } catch (error) {
        // Rule execution error counts as failure
        messages.push({
          ruleName: rule.name,
          severity: 'ERROR',
          type: 'processing',
          message: `Rule execution error: ${error instanceof Error ? error.message : String(error)}`,
          location: 'Bundle',
        });
      }
    }

    return {
      successful: !messages.some((message) => message.severity === 'ERROR' || message.severity === 'FATAL'),
      messages,
    };
  }

  private buildContext(document: BundleDocument): RuleContext {
    const bundle: ElementNode = { value: document.value, jsonPath: [], location: 'Bundle' };

    const entries: BundleEntryNode[] = childElements(bundle, 'entry').map((entry, index) => {
      const [resource] = childElements(entry, 'resource');
      return {
        index,
        entry,
        resource,
        resourceType: stringProperty(resource, 'resourceType'),
        fullUrl: stringProperty(entry, 'fullUrl'),
      };
    });

    const targets: ValidationTarget[] = [
      { resource: bundle, resourceType: 'Bundle', definitions: this.definitionsFor(bundle, 'Bundle') },
    ];
    for (const { resource, resourceType } of entries) {
      if (!resource || resourceType === undefined) continue;
      targets.push({ resource, resourceType, definitions: this.definitionsFor(resource, resourceType) });
    }

    return {
      document,
      bundle,
      bundleType: stringProperty(bundle, 'type'),
      entries,
      targets,
      support: this.support,
    };
  }

  /**
   * Configured profiles and declared meta.profile definitions of the right
   * type; the base definition when none apply.
   */
  private definitionsFor(resource: ElementNode, resourceType: string): StructureDefinition[] {
    const definitions = this.profiles.filter((profile) => profile.type === resourceType);

    const declared = childElements(resource, 'meta').flatMap((meta) => childElements(meta, 'profile'));
    for (const { value } of declared) {
      if (typeof value !== 'string') continue;
      const definition = this.support.fetchStructureDefinition(value);
      if (definition && definition.type === resourceType && !definitions.some((known) => known.url === definition.url)) {
        definitions.push(definition);
      }
    }

    if (definitions.length === 0) {
      const base = this.support.fetchStructureDefinition(`${CORE_DEFINITION_BASE}${resourceType}`);
      if (base) definitions.push(base);
    }
    return definitions;
  }
}
