import { z } from 'zod';
import { ResourceParseError } from './errors';

/**
 * Conformance resources (StructureDefinition, CodeSystem, ValueSet) are fetched
 * from arbitrary URLs, so their shape is checked before the rules touch them.
 * Only the parts the rules read are modelled; other keys are dropped, except on
 * element definitions where fixed[x] and pattern[x] keys are open-ended.
 */

const elementTypeSchema = z.object({
  code: z.string(),
  profile: z.array(z.string()).optional(),
});

export const bindingStrengthSchema = z.enum(['required', 'extensible', 'preferred', 'example']);
export type BindingStrength = z.infer<typeof bindingStrengthSchema>;

export const elementDefinitionSchema = z
  .object({
    id: z.string().optional(),
    path: z.string().min(1),
    sliceName: z.string().optional(),
    min: z.number().int().nonnegative().optional(),
    max: z.string().optional(),
    type: z.array(elementTypeSchema).optional(),
    binding: z
      .object({
        strength: bindingStrengthSchema,
        valueSet: z.string().optional(),
      })
      .optional(),
  })
  .catchall(z.unknown());

export type ElementDefinition = z.infer<typeof elementDefinitionSchema>;

export const structureDefinitionSchema = z.object({
  resourceType: z.literal('StructureDefinition'),
  url: z.string().min(1),
  name: z.string().optional(),
  version: z.string().optional(),
  type: z.string().min(1),
  kind: z.string().optional(),
  baseDefinition: z.string().optional(),
  derivation: z.enum(['specialization', 'constraint']).optional(),
  snapshot: z.object({ element: z.array(elementDefinitionSchema) }).optional(),
  differential: z.object({ element: z.array(elementDefinitionSchema) }).optional(),
});

export type StructureDefinition = z.infer<typeof structureDefinitionSchema>;

export interface CodeSystemConcept {
  code: string;
  display?: string;
  concept?: CodeSystemConcept[];
}

const codeSystemConceptSchema: z.ZodType<CodeSystemConcept> = z.lazy(() =>
  z.object({
    code: z.string().min(1),
    display: z.string().optional(),
    concept: z.array(codeSystemConceptSchema).optional(),
  })
);

export const codeSystemSchema = z.object({
  resourceType: z.literal('CodeSystem'),
  url: z.string().min(1),
  name: z.string().optional(),
  version: z.string().optional(),
  content: z.enum(['not-present', 'example', 'fragment', 'complete', 'supplement']).optional(),
  caseSensitive: z.boolean().optional(),
  concept: z.array(codeSystemConceptSchema).optional(),
});

export type CodeSystem = z.infer<typeof codeSystemSchema>;

const valueSetIncludeSchema = z.object({
  system: z.string().optional(),
  version: z.string().optional(),
  concept: z
    .array(z.object({ code: z.string().min(1), display: z.string().optional() }))
    .optional(),
  filter: z
    .array(z.object({ property: z.string(), op: z.string(), value: z.string() }))
    .optional(),
  valueSet: z.array(z.string()).optional(),
});

export type ValueSetInclude = z.infer<typeof valueSetIncludeSchema>;

export interface ValueSetContains {
  system?: string;
  code?: string;
  display?: string;
  contains?: ValueSetContains[];
}

const valueSetContainsSchema: z.ZodType<ValueSetContains> = z.lazy(() =>
  z.object({
    system: z.string().optional(),
    code: z.string().optional(),
    display: z.string().optional(),
    contains: z.array(valueSetContainsSchema).optional(),
  })
);

export const valueSetSchema = z.object({
  resourceType: z.literal('ValueSet'),
  url: z.string().min(1),
  name: z.string().optional(),
  version: z.string().optional(),
  compose: z
    .object({
      include: z.array(valueSetIncludeSchema),
      exclude: z.array(valueSetIncludeSchema).optional(),
    })
    .optional(),
  expansion: z.object({ contains: z.array(valueSetContainsSchema).optional() }).optional(),
});

export type ValueSet = z.infer<typeof valueSetSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function parseConformanceResource<S extends z.ZodTypeAny>(
  text: string,
  schema: S,
  resourceType: string
): z.infer<S> {
  if (text.trim() === '') {
    throw new ResourceParseError(resourceType, 'content is empty');
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ResourceParseError(
      resourceType,
      `invalid JSON (${error instanceof Error ? error.message : String(error)})`
    );
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new ResourceParseError(resourceType, formatIssues(parsed.error));
  }
  return parsed.data;
}

export function parseStructureDefinition(text: string): StructureDefinition {
  return parseConformanceResource(text, structureDefinitionSchema, 'StructureDefinition');
}

export function parseCodeSystem(text: string): CodeSystem {
  return parseConformanceResource(text, codeSystemSchema, 'CodeSystem');
}

export function parseValueSet(text: string): ValueSet {
  return parseConformanceResource(text, valueSetSchema, 'ValueSet');
}

/**
 * Drops a trailing `|version` from a canonical URL.
 */
export function canonicalUrl(url: string): string {
  const bar = url.indexOf('|');
  return bar === -1 ? url : url.slice(0, bar);
}

/**
 * Element list used for validation: the snapshot when present, else the differential.
 */
export function elementsOf(definition: StructureDefinition): ElementDefinition[] {
  return definition.snapshot?.element ?? definition.differential?.element ?? [];
}
