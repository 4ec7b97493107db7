import type { CodeValidationRequest, CodeValidationResult } from '../types';
import { BaseValidationSupport } from './validation-support';

/**
 * Well-known external code systems that are never enumerated. Codes are
 * checked against the syntax of the system only.
 */
const EXTERNAL_SYSTEMS: Record<string, { label: string; pattern: RegExp }> = {
  'urn:ietf:bcp:47': { label: 'language tag', pattern: /^[a-zA-Z]{2,3}(-[a-zA-Z0-9]{1,8})*$/ },
  'urn:ietf:bcp:13': {
    label: 'mime type',
    pattern: /^[a-z]+\/[a-zA-Z0-9][a-zA-Z0-9.+_-]*(\s*;\s*[a-zA-Z0-9-]+=[^;]+)*$/,
  },
  'urn:iso:std:iso:3166': { label: 'country code', pattern: /^([A-Z]{2}|[A-Z]{3}|\d{3})$/ },
  'urn:iso:std:iso:4217': { label: 'currency code', pattern: /^[A-Z]{3}$/ },
  'http://unitsofmeasure.org': { label: 'UCUM unit', pattern: /^[^\s]+$/ },
};

export function isExternalSystem(system: string): boolean {
  return system in EXTERNAL_SYSTEMS;
}

export class CommonTerminologySupport extends BaseValidationSupport {
  readonly name = 'common-terminology';

  override validateCode(request: CodeValidationRequest): CodeValidationResult | undefined {
    // value set membership is answered by the in-memory support
    if (request.valueSetUrl || !request.system) return undefined;

    const external = EXTERNAL_SYSTEMS[request.system];
    if (!external) return undefined;

    if (external.pattern.test(request.code)) {
      return { valid: true, display: request.display };
    }
    return {
      valid: false,
      message: `'${request.code}' is not a valid ${external.label} (${request.system})`,
    };
  }
}
