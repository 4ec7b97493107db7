/**
 * Validation Result Model
 *
 * Results, issues and source locations are plain frozen records tagged by
 * `kind`, so one `describe()` renders any of them.
 */

/**
 * Engine identity attached to every result it produces.
 */
export interface Observability {
  /** Implementation identifier, e.g. LocalRuleEngine */
  readonly identity: string;
  /** Human-readable name including the backend version */
  readonly name: string;
  readonly initAt: Date;
  readonly constructedAt: Date;
}

export interface SourceLocation {
  readonly kind: 'source-location';
  readonly line: number | null;
  readonly column: number | null;
  readonly diagnostics: string;
}

export interface ValidationIssue {
  readonly kind: 'validation-issue';
  readonly message: string;
  readonly location: SourceLocation;
  /** FATAL, ERROR, WARNING, INFORMATION, or whatever a remote backend reports */
  readonly severity: string;
}

export interface ValidationResult {
  readonly kind: 'validation-result';
  readonly initiatedAt: Date;
  readonly completedAt: Date;
  readonly profileUrl: string;
  readonly observability: Observability;
  readonly isValid: boolean;
  /** Serialized backend outcome document; empty when the backend gives none */
  readonly operationOutcome: string;
  readonly issues: readonly ValidationIssue[];
}

export type ResultModel = ValidationResult | ValidationIssue | SourceLocation;

export function createObservability(identity: string, name: string, initAt: Date): Observability {
  const observability: Observability = { identity, name, initAt, constructedAt: new Date() };
  return Object.freeze(observability);
}

export function sourceLocation(line: number | null, column: number | null, diagnostics: string): SourceLocation {
  const location: SourceLocation = { kind: 'source-location', line, column, diagnostics };
  return Object.freeze(location);
}

export function validationIssue(message: string, location: SourceLocation, severity: string): ValidationIssue {
  const issue: ValidationIssue = { kind: 'validation-issue', message, location, severity };
  return Object.freeze(issue);
}

export function validationResult(fields: Omit<ValidationResult, 'kind'>): ValidationResult {
  // completedAt never precedes initiatedAt, even if the wall clock steps back
  const completedAt =
    fields.completedAt.getTime() < fields.initiatedAt.getTime() ? fields.initiatedAt : fields.completedAt;
  const result: ValidationResult = {
    kind: 'validation-result',
    ...fields,
    completedAt,
    issues: Object.freeze([...fields.issues]),
  };
  return Object.freeze(result);
}

/**
 * Result for a validation that failed outright: not valid, one FATAL issue
 * carrying the error message, located by the error's name.
 */
export function fatalResult(
  error: unknown,
  fields: Pick<ValidationResult, 'initiatedAt' | 'profileUrl' | 'observability'>
): ValidationResult {
  const message = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : 'Error';
  return validationResult({
    ...fields,
    completedAt: new Date(),
    isValid: false,
    operationOutcome: '',
    issues: [validationIssue(message, sourceLocation(null, null, name), 'FATAL')],
  });
}

/**
 * One-line human-readable rendering of any result model.
 */
export function describe(model: ResultModel): string {
  switch (model.kind) {
    case 'source-location': {
      const position = `line ${model.line ?? '?'}, column ${model.column ?? '?'}`;
      return model.diagnostics ? `${position} (${model.diagnostics})` : position;
    }
    case 'validation-issue':
      return `${model.severity}: ${model.message} at ${describe(model.location)}`;
    case 'validation-result': {
      const durationMs = model.completedAt.getTime() - model.initiatedAt.getTime();
      const status = model.isValid ? 'VALID' : 'INVALID';
      return `${status} by ${model.observability.name} against ${model.profileUrl || '(no profile)'}: ${model.issues.length} issue(s) in ${durationMs}ms`;
    }
  }
}
