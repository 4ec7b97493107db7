import type { EngineType } from '../engine-type';
import type { Observability, ValidationResult } from '../result';

/**
 * Reference resource URLs keyed by a caller-chosen name.
 */
export type ResourceUrlMap = Readonly<Record<string, string>>;

export interface ReferenceResourceUrls {
  structureDefinitionUrls?: ResourceUrlMap;
  codeSystemUrls?: ResourceUrlMap;
  valueSetUrls?: ResourceUrlMap;
}

/**
 * A validation backend. Engines are immutable once constructed; `validate`
 * reports failures inside the result rather than rejecting.
 */
export interface ValidationEngine {
  readonly engineType: EngineType;
  readonly profileUrl: string;
  readonly observability: Observability;

  validate(payload: string): Promise<ValidationResult>;
}

export const FHIR_VERSION = '4.0.1';
