/**
 * Validation Support
 *
 * A support answers conformance lookups and code checks for the rules. Each
 * method returns `undefined` when the support cannot answer, which lets a
 * chain fall through to its next member.
 */

import type { CodeSystem, StructureDefinition, ValueSet } from '../conformance';
import type { CodeValidationRequest, CodeValidationResult } from '../types';

export interface ValidationSupport {
  /** Name used in logs and cache statistics */
  readonly name: string;

  fetchStructureDefinition(url: string): StructureDefinition | undefined;

  fetchCodeSystem(url: string): CodeSystem | undefined;

  fetchValueSet(url: string): ValueSet | undefined;

  /**
   * Check a code, optionally against a value set.
   * @param root - Support to use for nested lookups (normally the outermost chain)
   */
  validateCode(request: CodeValidationRequest, root: ValidationSupport): CodeValidationResult | undefined;
}

/**
 * Base for supports that only answer some of the lookups.
 */
export abstract class BaseValidationSupport implements ValidationSupport {
  abstract readonly name: string;

  fetchStructureDefinition(_url: string): StructureDefinition | undefined {
    return undefined;
  }

  fetchCodeSystem(_url: string): CodeSystem | undefined {
    return undefined;
  }

  fetchValueSet(_url: string): ValueSet | undefined {
    return undefined;
  }

  validateCode(_request: CodeValidationRequest, _root: ValidationSupport): CodeValidationResult | undefined {
    return undefined;
  }
}
