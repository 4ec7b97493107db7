/**
 * Bundle Structure Rules
 *
 * Invariants of the Bundle resource itself and of its entries.
 */

import { CORE_DEFINITION_BASE } from '../support/core-definitions-support';
import { isJsonObject } from '../types';
import type { ValidationMessage } from '../types';
import type { InstanceRule, RuleContext } from './base-rule';
import { createMessage } from './base-rule';
import { childElements } from './element-walker';
import type { ElementNode } from './element-walker';

const BUNDLE_TYPE_SYSTEM = 'http://hl7.org/fhir/bundle-type';
const BUNDLE_TYPE_VALUE_SET = 'http://hl7.org/fhir/ValueSet/bundle-type';
const RESOURCE_ID_PATTERN = /^[A-Za-z0-9\-.]{1,64}$/;

const REQUEST_TYPES = new Set(['batch', 'transaction', 'history']);
const RESPONSE_TYPES = new Set(['batch-response', 'transaction-response', 'history']);

/**
 * Bundle.type is mandatory and must come from the bundle-type value set.
 */
export const bundleTypeRule: InstanceRule = {
  name: 'bundle-type',
  description: 'Bundle.type must be present and a code from the bundle-type value set',

  validate(context): ValidationMessage[] {
    const [typeNode] = childElements(context.bundle, 'type');
    if (!typeNode) {
      return [createMessage(this, context, 'ERROR', 'required', 'Bundle.type: minimum required = 1, but only found 0')];
    }
    if (typeof typeNode.value !== 'string') {
      return [createMessage(this, context, 'ERROR', 'structure', 'Bundle.type must be a code string', typeNode)];
    }

    const result = context.support.validateCode(
      { system: BUNDLE_TYPE_SYSTEM, code: typeNode.value, valueSetUrl: BUNDLE_TYPE_VALUE_SET },
      context.support
    );
    if (result && !result.valid) {
      return [
        createMessage(
          this,
          context,
          'ERROR',
          'code-invalid',
          `The value '${typeNode.value}' is not a valid Bundle type (${BUNDLE_TYPE_VALUE_SET})`,
          typeNode
        ),
      ];
    }
    return [];
  },
};

/**
 * Each entry carries a resource unless it has a request or a response.
 */
export const entryContentRule: InstanceRule = {
  name: 'bundle-entry-content',
  description: 'An entry must contain a resource, a request or a response',

  validate(context): ValidationMessage[] {
    const messages: ValidationMessage[] = [];
    for (const { entry } of context.entries) {
      const value = entry.value;
      if (!isJsonObject(value)) {
        messages.push(createMessage(this, context, 'ERROR', 'structure', 'Bundle entry must be a JSON object', entry));
        continue;
      }
      const hasContent = ['resource', 'request', 'response'].some((key) => key in value);
      if (!hasContent) {
        messages.push(
          createMessage(
            this,
            context,
            'ERROR',
            'invariant',
            'Entry must contain a resource unless there is a request or response',
            entry
          )
        );
      }
    }
    return messages;
  },
};

/**
 * Entry resources name a resource type the support chain knows.
 */
export const resourceTypeRule: InstanceRule = {
  name: 'resource-type-known',
  description: 'Entry resources must declare a known resourceType',

  validate(context): ValidationMessage[] {
    const messages: ValidationMessage[] = [];
    for (const { resource, resourceType } of context.entries) {
      if (!resource) continue;
      if (!isJsonObject(resource.value)) {
        messages.push(createMessage(this, context, 'ERROR', 'structure', 'Entry resource must be a JSON object', resource));
      } else if (resourceType === undefined) {
        messages.push(createMessage(this, context, 'ERROR', 'structure', 'Resource has no resourceType', resource));
      } else if (!context.support.fetchStructureDefinition(`${CORE_DEFINITION_BASE}${resourceType}`)) {
        messages.push(
          createMessage(this, context, 'ERROR', 'not-found', `Unknown resource type '${resourceType}'`, resource)
        );
      }
    }
    return messages;
  },
};

/**
 * Logical ids follow the FHIR id syntax.
 */
export const resourceIdRule: InstanceRule = {
  name: 'resource-id-format',
  description: 'Resource ids must be 1-64 characters of A-Z, a-z, 0-9, - and .',

  validate(context): ValidationMessage[] {
    const resources: ElementNode[] = [context.bundle];
    for (const { resource } of context.entries) {
      if (resource) resources.push(resource);
    }

    const messages: ValidationMessage[] = [];
    for (const resource of resources) {
      for (const idNode of childElements(resource, 'id')) {
        const valid = typeof idNode.value === 'string' && RESOURCE_ID_PATTERN.test(idNode.value);
        if (!valid) {
          messages.push(
            createMessage(this, context, 'ERROR', 'value', `Invalid Resource id ${JSON.stringify(idNode.value)}`, idNode)
          );
        }
      }
    }
    return messages;
  },
};

function versionIdOf(resource: ElementNode | undefined): string {
  if (!resource || !isJsonObject(resource.value)) return '';
  const meta = resource.value.meta;
  return isJsonObject(meta) && typeof meta.versionId === 'string' ? meta.versionId : '';
}

/**
 * fullUrl is unique within the bundle unless the versions differ; history
 * bundles are exempt.
 */
export const fullUrlUniqueRule: InstanceRule = {
  name: 'fullurl-unique',
  description: 'Entries must not share a fullUrl unless their meta.versionId differs',

  validate(context): ValidationMessage[] {
    if (context.bundleType === 'history') return [];

    const seen = new Map<string, number>();
    const messages: ValidationMessage[] = [];
    for (const { index, entry, resource, fullUrl } of context.entries) {
      if (fullUrl === undefined) continue;
      const key = `${fullUrl}|${versionIdOf(resource)}`;
      const first = seen.get(key);
      if (first === undefined) {
        seen.set(key, index);
        continue;
      }
      const [fullUrlNode] = childElements(entry, 'fullUrl');
      messages.push(
        createMessage(
          this,
          context,
          'ERROR',
          'duplicate',
          `Duplicate entries in bundle with fullUrl '${fullUrl}' (entries ${first} and ${index})`,
          fullUrlNode ?? entry
        )
      );
    }
    return messages;
  },
};

/**
 * request is required for batch, transaction and history entries and not
 * allowed otherwise; response likewise for the response bundle types.
 */
export const entryRequestResponseRule: InstanceRule = {
  name: 'entry-request-response',
  description: 'entry.request and entry.response must match the bundle type',

  validate(context): ValidationMessage[] {
    const type = context.bundleType;
    if (type === undefined) return [];

    const messages: ValidationMessage[] = [];
    for (const { entry } of context.entries) {
      const value = entry.value;
      if (!isJsonObject(value)) continue;
      const hasRequest = 'request' in value;
      const hasResponse = 'response' in value;

      if (REQUEST_TYPES.has(type) && !hasRequest) {
        messages.push(
          createMessage(this, context, 'ERROR', 'invariant', `entry.request is mandatory for a ${type} bundle`, entry)
        );
      } else if (!REQUEST_TYPES.has(type) && hasRequest) {
        messages.push(
          createMessage(
            this,
            context,
            'ERROR',
            'invariant',
            'entry.request is only allowed for batch, transaction and history bundles',
            entry
          )
        );
      }

      if (RESPONSE_TYPES.has(type) && !hasResponse) {
        messages.push(
          createMessage(this, context, 'ERROR', 'invariant', `entry.response is mandatory for a ${type} bundle`, entry)
        );
      } else if (!RESPONSE_TYPES.has(type) && hasResponse) {
        messages.push(
          createMessage(
            this,
            context,
            'ERROR',
            'invariant',
            'entry.response is only allowed for batch-response, transaction-response and history bundles',
            entry
          )
        );
      }
    }
    return messages;
  },
};

/**
 * A document starts with a Composition, a message with a MessageHeader.
 */
export const firstEntryRule: InstanceRule = {
  name: 'first-entry-type',
  description: 'Documents start with a Composition and messages with a MessageHeader',

  validate(context: RuleContext): ValidationMessage[] {
    const expected =
      context.bundleType === 'document' ? 'Composition' : context.bundleType === 'message' ? 'MessageHeader' : undefined;
    if (!expected) return [];

    const [first] = context.entries;
    if (first?.resourceType === expected) return [];
    return [
      createMessage(
        this,
        context,
        'ERROR',
        'invariant',
        `The first entry of a ${context.bundleType} bundle must be a ${expected}`,
        first?.entry
      ),
    ];
  },
};

export const BUNDLE_RULES: InstanceRule[] = [
  bundleTypeRule,
  entryContentRule,
  resourceTypeRule,
  resourceIdRule,
  fullUrlUniqueRule,
  entryRequestResponseRule,
  firstEntryRule,
];
