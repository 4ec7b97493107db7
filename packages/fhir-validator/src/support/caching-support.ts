import { canonicalUrl } from '../conformance';
import type { CodeSystem, StructureDefinition, ValueSet } from '../conformance';
import type { CodeValidationRequest, CodeValidationResult } from '../types';
import type { ValidationSupport } from './validation-support';

export interface CacheStats {
  hits: number;
  misses: number;
}

/**
 * Memoizes lookups and code checks of the wrapped support, misses included.
 * Nested lookups made while checking a code go back through this wrapper.
 */
export class CachingSupport implements ValidationSupport {
  readonly name: string;

  private readonly structureDefinitions = new Map<string, StructureDefinition | undefined>();
  private readonly codeSystems = new Map<string, CodeSystem | undefined>();
  private readonly valueSets = new Map<string, ValueSet | undefined>();
  private readonly codes = new Map<string, CodeValidationResult | undefined>();
  private readonly stats: CacheStats = { hits: 0, misses: 0 };

  constructor(private readonly delegate: ValidationSupport) {
    this.name = `caching(${delegate.name})`;
  }

  fetchStructureDefinition(url: string): StructureDefinition | undefined {
    return this.memoize(this.structureDefinitions, canonicalUrl(url), () =>
      this.delegate.fetchStructureDefinition(url)
    );
  }

  fetchCodeSystem(url: string): CodeSystem | undefined {
    return this.memoize(this.codeSystems, canonicalUrl(url), () => this.delegate.fetchCodeSystem(url));
  }

  fetchValueSet(url: string): ValueSet | undefined {
    return this.memoize(this.valueSets, canonicalUrl(url), () => this.delegate.fetchValueSet(url));
  }

  validateCode(request: CodeValidationRequest, _root: ValidationSupport = this): CodeValidationResult | undefined {
    const key = JSON.stringify([request.system ?? null, request.code, request.valueSetUrl ?? null]);
    return this.memoize(this.codes, key, () => this.delegate.validateCode(request, this));
  }

  getStats(): CacheStats {
    return { ...this.stats };
  }

  private memoize<T>(cache: Map<string, T | undefined>, key: string, load: () => T | undefined): T | undefined {
    if (cache.has(key)) {
      this.stats.hits++;
      return cache.get(key);
    }
    this.stats.misses++;
    const value = load();
    cache.set(key, value);
    return value;
  }
}
