import { canonicalUrl } from '../conformance';
import type { CodeSystem, CodeSystemConcept, ValueSet, ValueSetContains, ValueSetInclude } from '../conformance';
import type { CodeValidationRequest, CodeValidationResult } from '../types';
import { BaseValidationSupport } from './validation-support';
import type { ValidationSupport } from './validation-support';

type Membership = { found: true; display?: string } | { found: false } | { found: 'unknown' };

function findConcept(concepts: CodeSystemConcept[] | undefined, code: string): CodeSystemConcept | undefined {
  for (const concept of concepts ?? []) {
    if (concept.code === code) return concept;
    const nested = findConcept(concept.concept, code);
    if (nested) return nested;
  }
  return undefined;
}

function findContains(
  contains: ValueSetContains[] | undefined,
  request: CodeValidationRequest
): ValueSetContains | undefined {
  for (const entry of contains ?? []) {
    if (entry.code === request.code && (!request.system || entry.system === request.system)) return entry;
    const nested = findContains(entry.contains, request);
    if (nested) return nested;
  }
  return undefined;
}

/**
 * Checks codes against value sets and code systems that can be found through
 * the root support: expansions, composed includes/excludes (explicit concepts,
 * whole systems, nested value sets) and complete code systems.
 */
export class InMemoryTerminologySupport extends BaseValidationSupport {
  readonly name = 'in-memory-terminology';

  override validateCode(request: CodeValidationRequest, root: ValidationSupport): CodeValidationResult | undefined {
    if (request.valueSetUrl) {
      const valueSet = root.fetchValueSet(request.valueSetUrl);
      if (!valueSet) return undefined;

      const membership = this.checkValueSet(valueSet, request, root, new Set());
      if (membership.found === 'unknown') return undefined;
      if (membership.found) return { valid: true, display: membership.display };
      return {
        valid: false,
        message: `The code '${this.describeCode(request)}' is not in the value set '${canonicalUrl(valueSet.url)}'`,
      };
    }

    if (!request.system) return undefined;
    const codeSystem = root.fetchCodeSystem(request.system);
    if (!codeSystem) return undefined;

    const membership = this.checkCodeSystem(codeSystem, request.code);
    if (membership.found === 'unknown') return undefined;
    if (membership.found) return { valid: true, display: membership.display };
    return {
      valid: false,
      message: `Unknown code '${request.code}' in the code system '${canonicalUrl(codeSystem.url)}'`,
    };
  }

  private describeCode(request: CodeValidationRequest): string {
    return request.system ? `${request.system}#${request.code}` : request.code;
  }

  private checkCodeSystem(codeSystem: CodeSystem, code: string): Membership {
    const concept = findConcept(codeSystem.concept, code);
    if (concept) return { found: true, display: concept.display };
    const complete = codeSystem.content === undefined || codeSystem.content === 'complete';
    return complete ? { found: false } : { found: 'unknown' };
  }

  private checkValueSet(
    valueSet: ValueSet,
    request: CodeValidationRequest,
    root: ValidationSupport,
    visited: Set<string>
  ): Membership {
    const url = canonicalUrl(valueSet.url);
    if (visited.has(url)) return { found: false };
    visited.add(url);

    const contains = valueSet.expansion?.contains;
    if (contains && contains.length > 0) {
      const entry = findContains(contains, request);
      return entry ? { found: true, display: entry.display } : { found: false };
    }

    const compose = valueSet.compose;
    if (!compose) return { found: 'unknown' };

    for (const exclude of compose.exclude ?? []) {
      if (this.checkInclude(exclude, request, root, visited).found === true) {
        return { found: false };
      }
    }

    let undecided = false;
    for (const include of compose.include) {
      const membership = this.checkInclude(include, request, root, visited);
      if (membership.found === true) return membership;
      if (membership.found === 'unknown') undecided = true;
    }
    return undecided ? { found: 'unknown' } : { found: false };
  }

  private checkInclude(
    include: ValueSetInclude,
    request: CodeValidationRequest,
    root: ValidationSupport,
    visited: Set<string>
  ): Membership {
    if (include.system && request.system && include.system !== request.system) {
      return { found: false };
    }

    let membership: Membership = { found: true };

    if (include.concept && include.concept.length > 0) {
      const concept = include.concept.find((candidate) => candidate.code === request.code);
      membership = concept ? { found: true, display: concept.display } : { found: false };
    } else if (include.system) {
      if (include.filter && include.filter.length > 0) {
        membership = { found: 'unknown' };
      } else {
        const codeSystem = root.fetchCodeSystem(include.system);
        if (codeSystem) {
          membership = this.checkCodeSystem(codeSystem, request.code);
        } else {
          const answer = root.validateCode({ system: include.system, code: request.code }, root);
          membership = answer === undefined ? { found: 'unknown' } : answer.valid ? { found: true } : { found: false };
        }
      }
    }

    if (membership.found !== true) return membership;

    // every listed value set must contain the code as well
    for (const nestedUrl of include.valueSet ?? []) {
      const nested = root.fetchValueSet(nestedUrl);
      if (!nested) return { found: 'unknown' };
      const nestedMembership = this.checkValueSet(nested, request, root, new Set(visited));
      if (nestedMembership.found !== true) return nestedMembership;
    }

    return membership;
  }
}
