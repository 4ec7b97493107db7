import { describe, it, expect } from 'vitest';
import { BundleParseError, ResourceParseError } from './errors';
import { canonicalUrl, parseCodeSystem, parseStructureDefinition, parseValueSet } from './conformance';
import { parseBundleDocument } from './parser';

describe('fhir-validator:parser:bundle', () => {
  const text = ['{', '  "resourceType": "Bundle",', '  "type": "collection",', '  "entry": [{"fullUrl": "urn:uuid:a"}]', '}'].join(
    '\n'
  );

  it('should parse a bundle and keep its value', () => {
    const document = parseBundleDocument(text);
    expect(document.value.type).toBe('collection');
  });

  it('should locate properties by their key position', () => {
    const document = parseBundleDocument(text);
    expect(document.locate(['type'])).toEqual({ line: 3, column: 3 });
    expect(document.locate(['entry', 0, 'fullUrl'])).toEqual({ line: 4, column: 14 });
  });

  it('should locate the root at line 1 column 1', () => {
    expect(parseBundleDocument(text).locate([])).toEqual({ line: 1, column: 1 });
  });

  it('should return undefined for paths that do not exist', () => {
    expect(parseBundleDocument(text).locate(['entry', 3])).toBeUndefined();
  });

  it('should count CRLF line endings once', () => {
    const document = parseBundleDocument('{\r\n"resourceType": "Bundle",\r\n"type": "batch"\r\n}');
    expect(document.locate(['type'])).toEqual({ line: 3, column: 1 });
  });

  it('should reject an empty payload', () => {
    expect(() => parseBundleDocument('  ')).toThrow('Unable to parse Bundle: payload is empty');
  });

  it('should reject malformed JSON', () => {
    expect(() => parseBundleDocument('{"resourceType": ')).toThrow(BundleParseError);
  });

  it('should reject a root that is not an object', () => {
    expect(() => parseBundleDocument('[]')).toThrow('Unable to parse Bundle: root element must be a JSON object');
  });

  it('should reject resources other than Bundle', () => {
    expect(() => parseBundleDocument('{"resourceType": "Patient"}')).toThrow(
      "Unable to parse Bundle: expected resourceType 'Bundle' but found Patient"
    );
  });
});

describe('fhir-validator:parser:conformance', () => {
  it('should parse a structure definition', () => {
    const definition = parseStructureDefinition(
      JSON.stringify({
        resourceType: 'StructureDefinition',
        url: 'http://example.org/StructureDefinition/test-patient',
        type: 'Patient',
        differential: { element: [{ path: 'Patient.birthDate', min: 1, fixedDate: '2000-01-01' }] },
        publisher: 'Example',
      })
    );

    expect(definition.type).toBe('Patient');
    expect(definition.differential?.element[0].fixedDate).toBe('2000-01-01');
  });

  it('should reject empty content', () => {
    expect(() => parseStructureDefinition('')).toThrow('Unable to parse StructureDefinition: content is empty');
  });

  it('should reject content that is not JSON', () => {
    expect(() => parseCodeSystem('<html/>')).toThrow(ResourceParseError);
  });

  it('should reject a resource of the wrong type', () => {
    try {
      parseValueSet(JSON.stringify({ resourceType: 'CodeSystem', url: 'http://example.org/cs' }));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ResourceParseError);
      expect(error instanceof ResourceParseError && error.resourceType).toBe('ValueSet');
    }
  });

  it('should strip the version from canonical URLs', () => {
    expect(canonicalUrl('http://hl7.org/fhir/ValueSet/bundle-type|4.0.1')).toBe('http://hl7.org/fhir/ValueSet/bundle-type');
    expect(canonicalUrl('http://example.org/vs')).toBe('http://example.org/vs');
  });
});
