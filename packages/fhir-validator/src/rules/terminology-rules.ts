/**
 * Terminology Rules
 *
 * Required and extensible bindings. Preferred and example bindings are not
 * checked.
 */

import { canonicalUrl } from '../conformance';
import { isJsonObject } from '../types';
import type { CodeValidationRequest, CodeValidationResult, JsonValue, ValidationMessage } from '../types';
import type { InstanceRule } from './base-rule';
import { createMessage } from './base-rule';
import { selectElements } from './element-walker';
import { constrainedElements } from './profile-rules';

type CodedValue = Pick<CodeValidationRequest, 'system' | 'code'>;

function toCoding(value: JsonValue): CodedValue | undefined {
  if (!isJsonObject(value) || typeof value.code !== 'string') return undefined;
  return { system: typeof value.system === 'string' ? value.system : undefined, code: value.code };
}

/**
 * Codes carried by a code, Coding, Quantity or CodeableConcept value.
 * Returns undefined when the value is not coded at all.
 */
export function extractCodings(value: JsonValue): CodedValue[] | undefined {
  if (typeof value === 'string') return [{ code: value }];
  if (!isJsonObject(value)) return undefined;

  if ('coding' in value || 'text' in value) {
    const codings = Array.isArray(value.coding) ? value.coding : [];
    return codings.map(toCoding).filter((coding): coding is CodedValue => coding !== undefined);
  }

  const coding = toCoding(value);
  return coding ? [coding] : undefined;
}

export const bindingRule: InstanceRule = {
  name: 'terminology-binding',
  description: 'Coded elements must use codes from their required or extensible value set',

  validate(context): ValidationMessage[] {
    const messages: ValidationMessage[] = [];
    const { support } = context;

    for (const { target, element } of constrainedElements(context)) {
      const binding = element.binding;
      if (!binding?.valueSet) continue;
      if (binding.strength !== 'required' && binding.strength !== 'extensible') continue;

      const valueSetUrl = canonicalUrl(binding.valueSet);
      const failureSeverity = binding.strength === 'required' ? 'ERROR' : 'WARNING';

      for (const node of selectElements(target.resource, element.path)) {
        const codings = extractCodings(node.value);
        if (codings === undefined) continue;

        if (codings.length === 0) {
          if (binding.strength === 'required') {
            messages.push(
              createMessage(
                this,
                context,
                'ERROR',
                'code-invalid',
                `${element.path}: no code provided, and a code is required from the value set '${valueSetUrl}'`,
                node
              )
            );
          }
          continue;
        }

        if (!support.fetchValueSet(valueSetUrl)) {
          messages.push(
            createMessage(
              this,
              context,
              'WARNING',
              'not-found',
              `${element.path}: value set '${valueSetUrl}' could not be found, so the code cannot be validated`,
              node
            )
          );
          continue;
        }

        const results: Array<CodeValidationResult | undefined> = codings.map((coding) =>
          support.validateCode({ ...coding, valueSetUrl }, support)
        );
        if (results.some((result) => result?.valid === true)) continue;

        if (results.some((result) => result === undefined)) {
          messages.push(
            createMessage(
              this,
              context,
              'WARNING',
              'processing',
              `${element.path}: unable to determine whether the code is in the value set '${valueSetUrl}'`,
              node
            )
          );
          continue;
        }

        const message =
          results.length === 1
            ? results[0]?.message ?? `The code '${codings[0].code}' is not in the value set '${valueSetUrl}'`
            : `None of the codings provided are in the value set '${valueSetUrl}'`;
        messages.push(createMessage(this, context, failureSeverity, 'code-invalid', `${element.path}: ${message}`, node));
      }
    }
    return messages;
  },
};

export const TERMINOLOGY_RULES: InstanceRule[] = [bindingRule];
