/**
 * Session and Builder Tests
 */

import { describe, it, expect } from 'vitest';
import type { Device } from './device';
import { EngineRegistry } from './engine-registry';
import { EmbeddedReferenceEngine, LocalRuleEngine, RemoteApiEngine } from './engines';
import { ConfigurationError } from './errors';
import { SessionBuilder } from './session';
import { PROFILE_URL, recordingEngine, stubFetch } from './test-helpers';

const device: Device = { address: '10.0.0.5', hostname: 'test-host' };

function createBuilder(registry = new EngineRegistry({ fetch: stubFetch({}) })): SessionBuilder {
  return new SessionBuilder(registry, device);
}

describe('orchestration:session', () => {
  it('should validate payload-major across engines', async () => {
    const calls: string[] = [];
    const session = createBuilder()
      .withPayloads(['p1', 'p2'])
      .addValidationEngine(recordingEngine('e1', calls))
      .addValidationEngine(recordingEngine('e2', calls))
      .build();

    await session.validate();

    expect(calls).toEqual(['p1:e1', 'p1:e2', 'p2:e1', 'p2:e2']);
    expect(session.getResults().map((result) => result.observability.identity)).toEqual(['e1', 'e2', 'e1', 'e2']);
  });

  it('should append results on every validate call', async () => {
    const calls: string[] = [];
    const session = createBuilder().withPayloads(['p1']).addValidationEngine(recordingEngine('e1', calls)).build();

    await session.validate();
    await session.validate();

    expect(session.getResults()).toHaveLength(2);
  });

  it('should hand out copies of the results', async () => {
    const session = createBuilder().withPayloads(['p1']).addValidationEngine(recordingEngine('e1', [])).build();
    await session.validate();

    const results = session.getResults();
    expect(Object.isFrozen(results)).toBe(false);
    expect(session.getResults()).not.toBe(results);
    expect(session.getResults()).toEqual(results);
  });

  it('should freeze payloads and engines at build time', () => {
    const builder = createBuilder().withPayloads(['p1']).addValidationEngine(recordingEngine('e1', []));
    const session = builder.build();

    builder.withPayloads(['p2']).addValidationEngine(recordingEngine('e2', []));

    expect(session.payloads).toEqual(['p1']);
    expect(session.engines).toHaveLength(1);
    expect(Object.isFrozen(session.payloads)).toBe(true);
    expect(Object.isFrozen(session.engines)).toBe(true);
  });

  it('should append payloads across calls and keep the device', () => {
    const session = createBuilder().withPayloads(['p1']).withPayloads(['p2', 'p3']).build();

    expect(session.payloads).toEqual(['p1', 'p2', 'p3']);
    expect(session.device).toEqual(device);
    expect(session.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should let onDevice override the orchestrator device', () => {
    const session = createBuilder().onDevice({ address: '192.168.1.9', hostname: 'edge' }).build();

    expect(session.device).toEqual({ address: '192.168.1.9', hostname: 'edge' });
  });

  it('should resolve registry engines in selection order at build time', () => {
    const registry = new EngineRegistry({ fetch: stubFetch({}) });
    const session = createBuilder(registry)
      .addRemoteApiEngine()
      .addLocalRuleEngine()
      .addEmbeddedReferenceEngine()
      .withProfileUrl(PROFILE_URL)
      .build();

    expect(session.engines[0]).toBeInstanceOf(RemoteApiEngine);
    expect(session.engines[1]).toBeInstanceOf(LocalRuleEngine);
    expect(session.engines[2]).toBeInstanceOf(EmbeddedReferenceEngine);
    expect(session.engines[1]).toBe(registry.getOrCreate('local-rule', PROFILE_URL));
  });

  it('should hand reference maps to the engines it creates', () => {
    const session = createBuilder()
      .withProfileUrl(PROFILE_URL)
      .withStructureDefinitionUrls({ extra: 'http://example.org/sd/extra' })
      .withCodeSystemUrls({ local: 'http://example.org/cs/local' })
      .withValueSetUrls({ colours: 'http://example.org/vs/colours' })
      .addLocalRuleEngine()
      .build();

    const [engine] = session.engines;
    expect(engine).toBeInstanceOf(LocalRuleEngine);
    if (engine instanceof LocalRuleEngine) {
      expect(engine.structureDefinitionUrls).toEqual({ extra: 'http://example.org/sd/extra' });
      expect(engine.codeSystemUrls).toEqual({ local: 'http://example.org/cs/local' });
      expect(engine.valueSetUrls).toEqual({ colours: 'http://example.org/vs/colours' });
    }
    expect(session.valueSetUrls).toEqual({ colours: 'http://example.org/vs/colours' });
  });

  it('should require a profile URL for registry engines', () => {
    const builder = createBuilder().addLocalRuleEngine();

    expect(() => builder.build()).toThrow(ConfigurationError);
    expect(() => builder.build()).toThrow('A profile URL is required to use the local-rule engine');
  });

  it('should build without a profile URL when only instances are added', () => {
    const session = createBuilder().addValidationEngine(recordingEngine('e1', [])).build();

    expect(session.profileUrl).toBeUndefined();
    expect(session.engines).toHaveLength(1);
  });

  it('should reject unknown engine types', () => {
    expect(() => createBuilder().addEngine('schematron')).toThrow("Unknown engine type 'schematron'");
  });
});

describe('orchestration:session strategy', () => {
  it('should add the known engines and report the rest', () => {
    const builder = createBuilder()
      .withProfileUrl(PROFILE_URL)
      .withValidationStrategy('{"engines":["HAPI","BOGUS"]}');
    const session = builder.build();

    expect(session.engines).toHaveLength(1);
    expect(session.engines[0]).toBeInstanceOf(LocalRuleEngine);
    expect(builder.getStrategyIssues()).toEqual([
      "Unknown validation engine 'BOGUS' in strategy (expected one of HAPI, HL7-Official-API, HL7-Official-Embedded)",
    ]);
  });

  it('should append to the existing selection by default', () => {
    const session = createBuilder()
      .withProfileUrl(PROFILE_URL)
      .addEmbeddedReferenceEngine()
      .withValidationStrategy('{"engines":["HL7-Official-API"]}')
      .build();

    expect(session.engines.map((engine) => engine.engineType)).toEqual(['embedded-reference', 'remote-api']);
  });

  it('should replace the selection when clearing a well-formed descriptor', () => {
    const session = createBuilder()
      .withProfileUrl(PROFILE_URL)
      .addEmbeddedReferenceEngine()
      .addValidationEngine(recordingEngine('e1', []))
      .withValidationStrategy('{"engines":["HAPI"]}', true)
      .build();

    expect(session.engines.map((engine) => engine.engineType)).toEqual(['local-rule']);
  });

  it('should keep the selection when the descriptor is malformed', () => {
    const builder = createBuilder()
      .withProfileUrl(PROFILE_URL)
      .addEmbeddedReferenceEngine()
      .withValidationStrategy('not json', true);

    expect(builder.build().engines.map((engine) => engine.engineType)).toEqual(['embedded-reference']);
    expect(builder.getStrategyIssues()).toHaveLength(1);
  });

  it('should leave the selection alone for a missing descriptor', () => {
    const builder = createBuilder().withProfileUrl(PROFILE_URL).addEmbeddedReferenceEngine();

    builder.withValidationStrategy(null, true);

    expect(builder.build().engines).toHaveLength(1);
    expect(builder.getStrategyIssues()).toEqual([]);
  });
});
