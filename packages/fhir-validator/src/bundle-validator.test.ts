/**
 * Bundle Validator Tests
 *
 * Runs whole bundles through the default rule set with the standard support chain.
 */

import { describe, it, expect } from 'vitest';
import {
  BundleParseError,
  BundleValidator,
  CachingSupport,
  CommonTerminologySupport,
  CoreDefinitionsSupport,
  InMemoryTerminologySupport,
  PrepopulatedSupport,
  SupportChain,
  toOperationOutcome,
} from './index';
import type { InstanceRule, StructureDefinition } from './index';

const STRICT_PATIENT = 'http://example.org/StructureDefinition/strict-patient';

const strictPatient: StructureDefinition = {
  resourceType: 'StructureDefinition',
  url: STRICT_PATIENT,
  type: 'Patient',
  derivation: 'constraint',
  differential: {
    element: [
      { path: 'Patient' },
      { path: 'Patient.birthDate', min: 1 },
      { path: 'Patient.identifier.system', fixedUri: 'urn:oid:1.2.3' },
    ],
  },
};

function createValidator(prepopulated = new PrepopulatedSupport(), profiles: StructureDefinition[] = []) {
  const support = new CachingSupport(
    new SupportChain(
      new CoreDefinitionsSupport(),
      new CommonTerminologySupport(),
      new InMemoryTerminologySupport(),
      prepopulated
    )
  );
  return new BundleValidator(support, { profiles });
}

function bundle(type: string | undefined, entry: unknown[]): string {
  return JSON.stringify({ resourceType: 'Bundle', id: 'bundle-1', type, entry });
}

describe('fhir-validator:bundle', () => {
  it('should accept a well-formed collection bundle', () => {
    const outcome = createValidator().validate(
      bundle('collection', [
        {
          fullUrl: 'urn:uuid:p1',
          resource: { resourceType: 'Patient', id: 'p1', gender: 'female', name: [{ family: 'Doe' }] },
        },
        {
          fullUrl: 'urn:uuid:o1',
          resource: { resourceType: 'Observation', id: 'o1', status: 'final', code: { text: 'Heart rate' } },
        },
      ])
    );

    expect(outcome).toEqual({ successful: true, messages: [] });
  });

  it('should require Bundle.type', () => {
    const outcome = createValidator().validate('{"resourceType": "Bundle"}');

    expect(outcome.successful).toBe(false);
    expect(outcome.messages).toEqual([
      {
        ruleName: 'bundle-type',
        severity: 'ERROR',
        type: 'required',
        message: 'Bundle.type: minimum required = 1, but only found 0',
        location: 'Bundle',
        line: 1,
        column: 1,
      },
    ]);
  });

  it('should reject a Bundle.type outside the bundle-type value set', () => {
    const outcome = createValidator().validate(bundle('bogus', []));

    expect(outcome.messages.map((message) => message.message)).toEqual([
      "The value 'bogus' is not a valid Bundle type (http://hl7.org/fhir/ValueSet/bundle-type)",
    ]);
  });

  it('should report binding violations with their source position', () => {
    const payload = [
      '{',
      '  "resourceType": "Bundle",',
      '  "type": "collection",',
      '  "entry": [{',
      '    "resource": {"resourceType": "Patient", "gender": "robot"}',
      '  }]',
      '}',
    ].join('\n');

    const outcome = createValidator().validate(payload);

    expect(outcome.successful).toBe(false);
    expect(outcome.messages).toEqual([
      {
        ruleName: 'terminology-binding',
        severity: 'ERROR',
        type: 'code-invalid',
        message:
          "Patient.gender: The code 'robot' is not in the value set 'http://hl7.org/fhir/ValueSet/administrative-gender'",
        location: 'Bundle.entry[0].resource.gender',
        line: 5,
        column: 45,
      },
    ]);
  });

  it('should require a code for required CodeableConcept bindings', () => {
    const outcome = createValidator().validate(
      bundle('collection', [
        {
          resource: {
            resourceType: 'Condition',
            clinicalStatus: { text: 'active' },
            subject: { reference: 'Patient/p1' },
          },
        },
      ])
    );

    expect(outcome.messages.map((message) => message.message)).toEqual([
      "Condition.clinicalStatus: no code provided, and a code is required from the value set 'http://hl7.org/fhir/ValueSet/condition-clinical'",
    ]);
  });

  it('should flag duplicate fullUrls on the later entry', () => {
    const outcome = createValidator().validate(
      bundle('collection', [
        { fullUrl: 'urn:uuid:same', resource: { resourceType: 'Patient' } },
        { fullUrl: 'urn:uuid:same', resource: { resourceType: 'Patient' } },
      ])
    );

    expect(outcome.messages).toHaveLength(1);
    expect(outcome.messages[0]).toMatchObject({
      ruleName: 'fullurl-unique',
      type: 'duplicate',
      message: "Duplicate entries in bundle with fullUrl 'urn:uuid:same' (entries 0 and 1)",
      location: 'Bundle.entry[1].fullUrl',
    });
  });

  it('should allow a shared fullUrl when versions differ', () => {
    const outcome = createValidator().validate(
      bundle('collection', [
        { fullUrl: 'urn:uuid:same', resource: { resourceType: 'Patient', meta: { versionId: '1' } } },
        { fullUrl: 'urn:uuid:same', resource: { resourceType: 'Patient', meta: { versionId: '2' } } },
      ])
    );

    expect(outcome.successful).toBe(true);
  });

  it('should require entry.request in transactions', () => {
    const outcome = createValidator().validate(
      bundle('transaction', [{ fullUrl: 'urn:uuid:p1', resource: { resourceType: 'Patient' } }])
    );

    expect(outcome.messages).toHaveLength(1);
    expect(outcome.messages[0]).toMatchObject({
      ruleName: 'entry-request-response',
      message: 'entry.request is mandatory for a transaction bundle',
      location: 'Bundle.entry[0]',
    });
  });

  it('should accept a transaction with valid requests', () => {
    const outcome = createValidator().validate(
      bundle('transaction', [
        { fullUrl: 'urn:uuid:p1', resource: { resourceType: 'Patient' }, request: { method: 'POST', url: 'Patient' } },
      ])
    );

    expect(outcome).toEqual({ successful: true, messages: [] });
  });

  it('should check request methods against the http-verb value set', () => {
    const outcome = createValidator().validate(
      bundle('batch', [{ resource: { resourceType: 'Patient' }, request: { method: 'FETCH', url: 'Patient' } }])
    );

    expect(outcome.messages).toHaveLength(1);
    expect(outcome.messages[0]).toMatchObject({
      severity: 'ERROR',
      message: "Bundle.entry.request.method: The code 'FETCH' is not in the value set 'http://hl7.org/fhir/ValueSet/http-verb'",
      location: 'Bundle.entry[0].request.method',
    });
  });

  it('should reject request entries outside batch and transaction bundles', () => {
    const outcome = createValidator().validate(
      bundle('collection', [{ resource: { resourceType: 'Patient' }, request: { method: 'GET', url: 'Patient' } }])
    );

    expect(outcome.messages.map((message) => message.message)).toEqual([
      'entry.request is only allowed for batch, transaction and history bundles',
    ]);
  });

  it('should require a Composition first in documents', () => {
    const outcome = createValidator().validate(bundle('document', [{ resource: { resourceType: 'Patient' } }]));

    expect(outcome.messages.map((message) => message.message)).toEqual([
      'The first entry of a document bundle must be a Composition',
    ]);
  });

  it('should reject unknown resource types', () => {
    const outcome = createValidator().validate(bundle('collection', [{ resource: { resourceType: 'Spaceship' } }]));

    expect(outcome.messages).toHaveLength(1);
    expect(outcome.messages[0]).toMatchObject({
      ruleName: 'resource-type-known',
      message: "Unknown resource type 'Spaceship'",
      location: 'Bundle.entry[0].resource',
    });
  });

  it('should reject malformed resource ids', () => {
    const outcome = createValidator().validate(
      bundle('collection', [{ resource: { resourceType: 'Patient', id: 'has spaces' } }])
    );

    expect(outcome.messages.map((message) => [message.message, message.location])).toEqual([
      ['Invalid Resource id "has spaces"', 'Bundle.entry[0].resource.id'],
    ]);
  });

  it('should warn about unknown declared profiles without failing', () => {
    const outcome = createValidator().validate(
      bundle('collection', [
        {
          resource: {
            resourceType: 'Patient',
            meta: { profile: ['http://example.org/StructureDefinition/unknown'] },
          },
        },
      ])
    );

    expect(outcome.successful).toBe(true);
    expect(outcome.messages).toHaveLength(1);
    expect(outcome.messages[0]).toMatchObject({
      severity: 'WARNING',
      message: "Profile reference 'http://example.org/StructureDefinition/unknown' has not been checked because it is unknown",
      location: 'Bundle.entry[0].resource.meta.profile[0]',
    });
  });

  it('should apply configured profiles to resources of their type', () => {
    const outcome = createValidator(new PrepopulatedSupport(), [strictPatient]).validate(
      bundle('collection', [
        { resource: { resourceType: 'Patient', identifier: [{ system: 'urn:other', value: '1' }] } },
      ])
    );

    expect(outcome.messages.map((message) => [message.ruleName, message.message, message.location])).toEqual([
      [
        'element-cardinality',
        `Patient.birthDate: minimum required = 1, but only found 0 (from ${STRICT_PATIENT})`,
        'Bundle.entry[0].resource',
      ],
      [
        'element-fixed-value',
        'Patient.identifier.system: value is "urn:other" but must be "urn:oid:1.2.3"',
        'Bundle.entry[0].resource.identifier[0].system',
      ],
    ]);
  });

  it('should apply declared profiles found in the support chain', () => {
    const prepopulated = new PrepopulatedSupport().addStructureDefinition(strictPatient);
    const outcome = createValidator(prepopulated).validate(
      bundle('collection', [
        {
          resource: {
            resourceType: 'Patient',
            meta: { profile: [STRICT_PATIENT] },
            birthDate: '1980-02-01',
            identifier: [{ system: 'urn:oid:1.2.3', value: '1' }],
          },
        },
      ])
    );

    expect(outcome).toEqual({ successful: true, messages: [] });
  });

  it('should match pattern constraints partially', () => {
    const heartRate: StructureDefinition = {
      resourceType: 'StructureDefinition',
      url: 'http://example.org/StructureDefinition/heart-rate',
      type: 'Observation',
      differential: {
        element: [
          { path: 'Observation.code', patternCodeableConcept: { coding: [{ system: 'http://loinc.org', code: '8867-4' }] } },
        ],
      },
    };
    const validator = createValidator(new PrepopulatedSupport(), [heartRate]);
    const observation = (code: string) =>
      bundle('collection', [
        {
          resource: {
            resourceType: 'Observation',
            code: { coding: [{ system: 'http://loinc.org', code, display: 'Heart rate' }] },
          },
        },
      ]);

    expect(validator.validate(observation('8867-4')).successful).toBe(true);
    expect(validator.validate(observation('1234-5')).messages[0]?.ruleName).toBe('element-fixed-value');
  });

  it('should report a failing rule instead of aborting', () => {
    const explodingRule: InstanceRule = {
      name: 'explodes',
      description: 'Always throws',
      validate() {
        throw new Error('boom');
      },
    };
    const validator = new BundleValidator(new CoreDefinitionsSupport(), { rules: [explodingRule] });

    expect(validator.validate(bundle('collection', []))).toEqual({
      successful: false,
      messages: [
        {
          ruleName: 'explodes',
          severity: 'ERROR',
          type: 'processing',
          message: 'Rule execution error: boom',
          location: 'Bundle',
        },
      ],
    });
  });

  it('should throw on payloads that are not bundles', () => {
    expect(() => createValidator().validate('{"resourceType": "Patient"}')).toThrow(BundleParseError);
  });
});

describe('fhir-validator:operation-outcome', () => {
  it('should report an informational issue when there are no messages', () => {
    expect(toOperationOutcome([])).toEqual({
      resourceType: 'OperationOutcome',
      issue: [{ severity: 'information', code: 'informational', diagnostics: 'No issues detected during validation' }],
    });
  });

  it('should map messages to issues', () => {
    const outcome = toOperationOutcome([
      {
        ruleName: 'bundle-type',
        severity: 'ERROR',
        type: 'required',
        message: 'Bundle.type: minimum required = 1, but only found 0',
        location: 'Bundle',
        line: 1,
        column: 1,
      },
      { ruleName: 'other', severity: 'WARNING', type: 'processing', message: 'check skipped', location: 'Bundle.entry[0]' },
    ]);

    expect(outcome.issue).toEqual([
      {
        severity: 'error',
        code: 'required',
        diagnostics: 'Bundle.type: minimum required = 1, but only found 0',
        expression: ['Bundle'],
        location: ['Line[1] Col[1]'],
      },
      { severity: 'warning', code: 'processing', diagnostics: 'check skipped', expression: ['Bundle.entry[0]'] },
    ]);
  });
});
