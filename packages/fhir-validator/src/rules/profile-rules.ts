/**
 * Profile Rules
 *
 * Element constraints from the structure definitions that apply to each
 * resource in the bundle.
 */

import { elementsOf } from '../conformance';
import type { ElementDefinition, StructureDefinition } from '../conformance';
import { isJsonObject } from '../types';
import type { ValidationMessage } from '../types';
import type { InstanceRule, RuleContext, ValidationTarget } from './base-rule';
import { createMessage } from './base-rule';
import { childElements, selectElements, splitElementPath } from './element-walker';

export interface ConstrainedElement {
  target: ValidationTarget;
  definition: StructureDefinition;
  element: ElementDefinition;
}

/**
 * Non-root, non-slice elements of every definition applied to every target.
 */
export function constrainedElements(context: RuleContext): ConstrainedElement[] {
  const result: ConstrainedElement[] = [];
  for (const target of context.targets) {
    for (const definition of target.definitions) {
      for (const element of elementsOf(definition)) {
        if (!element.path.startsWith(`${definition.type}.`)) continue;
        if (element.sliceName !== undefined || element.id?.includes(':')) continue;
        result.push({ target, definition, element });
      }
    }
  }
  return result;
}

function declaredProfiles(resource: ValidationTarget['resource']) {
  return childElements(resource, 'meta').flatMap((meta) => childElements(meta, 'profile'));
}

/**
 * Profiles named in meta.profile must be resolvable; unknown ones are skipped
 * with a warning.
 */
export const declaredProfilesRule: InstanceRule = {
  name: 'declared-profiles-known',
  description: 'Profiles declared in meta.profile should be known to the validator',

  validate(context): ValidationMessage[] {
    const messages: ValidationMessage[] = [];
    for (const target of context.targets) {
      for (const profileNode of declaredProfiles(target.resource)) {
        if (typeof profileNode.value !== 'string') continue;
        if (!context.support.fetchStructureDefinition(profileNode.value)) {
          messages.push(
            createMessage(
              this,
              context,
              'WARNING',
              'not-found',
              `Profile reference '${profileNode.value}' has not been checked because it is unknown`,
              profileNode
            )
          );
        }
      }
    }
    return messages;
  },
};

export const cardinalityRule: InstanceRule = {
  name: 'element-cardinality',
  description: 'Elements must occur between their min and max cardinality',

  validate(context): ValidationMessage[] {
    const messages: ValidationMessage[] = [];
    for (const { target, definition, element } of constrainedElements(context)) {
      const { parentPath, name } = splitElementPath(element.path);
      const max = element.max === undefined || element.max === '*' ? undefined : Number.parseInt(element.max, 10);

      for (const parent of selectElements(target.resource, parentPath)) {
        if (!isJsonObject(parent.value)) continue;
        const children = childElements(parent, name);

        if (element.min !== undefined && children.length < element.min) {
          messages.push(
            createMessage(
              this,
              context,
              'ERROR',
              'required',
              `${element.path}: minimum required = ${element.min}, but only found ${children.length} (from ${definition.url})`,
              parent
            )
          );
        }
        if (max !== undefined && Number.isFinite(max) && children.length > max) {
          messages.push(
            createMessage(
              this,
              context,
              'ERROR',
              'structure',
              `${element.path}: max allowed = ${max}, but found ${children.length} (from ${definition.url})`,
              children[max] ?? parent
            )
          );
        }
      }
    }
    return messages;
  },
};

export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    const other: unknown[] = b;
    return a.length === other.length && a.every((item, index) => deepEqual(item, other[index]));
  }
  if (isJsonObject(a) && isJsonObject(b)) {
    const source = a;
    const other = b;
    const keys = Object.keys(source);
    return (
      keys.length === Object.keys(other).length &&
      keys.every((key) => key in other && deepEqual(source[key], other[key]))
    );
  }
  return false;
}

/**
 * A value matches a pattern when every property of the pattern is present with
 * a matching value; each pattern array item must match some value item.
 */
export function matchesPattern(value: unknown, pattern: unknown): boolean {
  if (Array.isArray(pattern)) {
    if (!Array.isArray(value)) return false;
    const items: unknown[] = value;
    return pattern.every((item) => items.some((candidate) => matchesPattern(candidate, item)));
  }
  if (isJsonObject(pattern)) {
    if (!isJsonObject(value)) return false;
    const object = value;
    return Object.entries(pattern).every(([key, expected]) => matchesPattern(object[key], expected));
  }
  return value === pattern;
}

function prefixedConstraints(element: ElementDefinition, prefix: 'fixed' | 'pattern'): unknown[] {
  return Object.entries(element)
    .filter(([key]) => key.startsWith(prefix) && /^[A-Z]/.test(key.slice(prefix.length)))
    .map(([, value]) => value);
}

export const fixedValueRule: InstanceRule = {
  name: 'element-fixed-value',
  description: 'Elements with a fixed[x] or pattern[x] constraint must match it',

  validate(context): ValidationMessage[] {
    const messages: ValidationMessage[] = [];
    for (const { target, element } of constrainedElements(context)) {
      const fixed = prefixedConstraints(element, 'fixed');
      const patterns = prefixedConstraints(element, 'pattern');
      if (fixed.length === 0 && patterns.length === 0) continue;

      for (const node of selectElements(target.resource, element.path)) {
        for (const expected of fixed) {
          if (!deepEqual(node.value, expected)) {
            messages.push(
              createMessage(
                this,
                context,
                'ERROR',
                'value',
                `${element.path}: value is ${JSON.stringify(node.value)} but must be ${JSON.stringify(expected)}`,
                node
              )
            );
          }
        }
        for (const expected of patterns) {
          if (!matchesPattern(node.value, expected)) {
            messages.push(
              createMessage(
                this,
                context,
                'ERROR',
                'value',
                `${element.path}: value does not match the required pattern ${JSON.stringify(expected)}`,
                node
              )
            );
          }
        }
      }
    }
    return messages;
  },
};

export const PROFILE_RULES: InstanceRule[] = [declaredProfilesRule, cardinalityRule, fixedValueRule];
