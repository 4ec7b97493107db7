/**
 * Engine Registry Tests
 */

import { describe, it, expect } from 'vitest';
import { EngineRegistry } from './engine-registry';
import { EmbeddedReferenceEngine, LocalRuleEngine, RemoteApiEngine } from './engines';
import { ConfigurationError } from './errors';
import { PROFILE_URL, stubFetch } from './test-helpers';

describe('orchestration:registry', () => {
  it('should return the same engine for the same type and profile', () => {
    const registry = new EngineRegistry({ fetch: stubFetch({}) });

    const first = registry.getOrCreate('local-rule', PROFILE_URL);
    const second = registry.getOrCreate('local-rule', PROFILE_URL);

    expect(second).toBe(first);
    expect(registry.size).toBe(1);
  });

  it('should hand concurrent callers one instance', async () => {
    const registry = new EngineRegistry({ fetch: stubFetch({}) });

    const engines = await Promise.all(
      Array.from({ length: 8 }, async () => registry.getOrCreate('remote-api', PROFILE_URL))
    );

    expect(new Set(engines).size).toBe(1);
    expect(registry.size).toBe(1);
  });

  it('should ignore different reference maps for an existing key', () => {
    const registry = new EngineRegistry({ fetch: stubFetch({}) });

    const first = registry.getOrCreate('local-rule', PROFILE_URL, { a: 'http://example.org/sd/a' });
    const second = registry.getOrCreate('local-rule', PROFILE_URL, { b: 'http://example.org/sd/b' });

    expect(second).toBe(first);
    expect(first).toBeInstanceOf(LocalRuleEngine);
    if (first instanceof LocalRuleEngine) {
      expect(first.structureDefinitionUrls).toEqual({ a: 'http://example.org/sd/a' });
    }
  });

  it('should keep separate engines per type and per profile', () => {
    const registry = new EngineRegistry({ fetch: stubFetch({}) });

    const local = registry.getOrCreate('local-rule', PROFILE_URL);
    const embedded = registry.getOrCreate('embedded-reference', PROFILE_URL);
    const remote = registry.getOrCreate('remote-api', PROFILE_URL);
    const otherProfile = registry.getOrCreate('local-rule', 'http://example.org/StructureDefinition/other');

    expect(local).toBeInstanceOf(LocalRuleEngine);
    expect(embedded).toBeInstanceOf(EmbeddedReferenceEngine);
    expect(remote).toBeInstanceOf(RemoteApiEngine);
    expect(otherProfile).not.toBe(local);
    expect(registry.size).toBe(4);
    expect(registry.has('embedded-reference', PROFILE_URL)).toBe(true);
    expect(registry.has('embedded-reference', 'http://example.org/StructureDefinition/other')).toBe(false);
  });

  it('should reject an unknown engine type', () => {
    const registry = new EngineRegistry();

    expect(() => registry.getOrCreate('schematron', PROFILE_URL)).toThrow(ConfigurationError);
    expect(() => registry.getOrCreate('schematron', PROFILE_URL)).toThrow(
      "Unknown engine type 'schematron' (expected one of local-rule, embedded-reference, remote-api)"
    );
    expect(registry.size).toBe(0);
  });

  it('should pass the remote validator settings to remote engines', () => {
    const registry = new EngineRegistry({ remoteValidator: { url: 'https://validator.test/validate', timeoutMs: 500 } });

    const engine = registry.getOrCreate('remote-api', PROFILE_URL);

    expect(engine).toBeInstanceOf(RemoteApiEngine);
    if (engine instanceof RemoteApiEngine) {
      expect(engine.config).toEqual({
        url: 'https://validator.test/validate',
        fhirVersion: '4.0.1',
        locale: 'en',
        timeoutMs: 500,
      });
    }
  });
});
