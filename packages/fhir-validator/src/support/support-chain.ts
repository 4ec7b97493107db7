import type { CodeSystem, StructureDefinition, ValueSet } from '../conformance';
import type { CodeValidationRequest, CodeValidationResult } from '../types';
import type { ValidationSupport } from './validation-support';

/**
 * Ordered list of supports; the first member with an answer wins.
 */
export class SupportChain implements ValidationSupport {
  readonly name = 'support-chain';
  private readonly members: ValidationSupport[];

  constructor(...members: ValidationSupport[]) {
    this.members = [...members];
  }

  addValidationSupport(support: ValidationSupport): this {
    this.members.push(support);
    return this;
  }

  getMembers(): readonly ValidationSupport[] {
    return [...this.members];
  }

  fetchStructureDefinition(url: string): StructureDefinition | undefined {
    return this.firstAnswer((member) => member.fetchStructureDefinition(url));
  }

  fetchCodeSystem(url: string): CodeSystem | undefined {
    return this.firstAnswer((member) => member.fetchCodeSystem(url));
  }

  fetchValueSet(url: string): ValueSet | undefined {
    return this.firstAnswer((member) => member.fetchValueSet(url));
  }

  validateCode(request: CodeValidationRequest, root: ValidationSupport = this): CodeValidationResult | undefined {
    return this.firstAnswer((member) => member.validateCode(request, root));
  }

  private firstAnswer<T>(ask: (member: ValidationSupport) => T | undefined): T | undefined {
    for (const member of this.members) {
      const answer = ask(member);
      if (answer !== undefined) return answer;
    }
    return undefined;
  }
}
