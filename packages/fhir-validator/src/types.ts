/**
 * Shared types for the local bundle validator.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Message severities, upper-cased the way validation reports print them.
 */
export type IssueSeverity = 'FATAL' | 'ERROR' | 'WARNING' | 'INFORMATION';

/**
 * Subset of the FHIR IssueType codes the rules emit.
 */
export type IssueType =
  | 'structure'
  | 'required'
  | 'value'
  | 'invariant'
  | 'code-invalid'
  | 'not-found'
  | 'duplicate'
  | 'processing'
  | 'informational';

/**
 * One finding produced while validating a bundle.
 */
export interface ValidationMessage {
  ruleName: string;
  severity: IssueSeverity;
  type: IssueType;
  message: string;
  /** FHIRPath-like location, e.g. Bundle.entry[0].resource.gender */
  location: string;
  line?: number;
  column?: number;
}

/**
 * Native result of a bundle validation run.
 */
export interface BundleValidationOutcome {
  /** false when any message is ERROR or FATAL */
  successful: boolean;
  messages: ValidationMessage[];
}

export interface CodeValidationRequest {
  system?: string;
  code: string;
  display?: string;
  valueSetUrl?: string;
}

export interface CodeValidationResult {
  valid: boolean;
  display?: string;
  message?: string;
}
