import { createObservability, validationResult } from '../result';
import type { Observability, ValidationResult } from '../result';
import type { ValidationEngine } from './validation-engine';

/**
 * Baseline engine: accepts every payload without inspecting it.
 */
export class EmbeddedReferenceEngine implements ValidationEngine {
  readonly engineType = 'embedded-reference' as const;
  readonly observability: Observability;

  constructor(readonly profileUrl: string) {
    this.observability = createObservability('EmbeddedReferenceEngine', 'Embedded reference validator', new Date());
  }

  async validate(_payload: string): Promise<ValidationResult> {
    const initiatedAt = new Date();
    return validationResult({
      initiatedAt,
      completedAt: new Date(),
      profileUrl: this.profileUrl,
      observability: this.observability,
      isValid: true,
      operationOutcome: '',
      issues: [],
    });
  }
}
