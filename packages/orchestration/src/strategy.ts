/**
 * Strategy Descriptor
 *
 * `{"engines": ["HAPI", "HL7-Official-API", "HL7-Official-Embedded"]}` selects
 * engines by wire name. Problems never throw; they become diagnostics and
 * whatever can be applied still is.
 */

import { z } from 'zod';
import { ENGINE_WIRE_NAMES } from './engine-type';
import type { EngineType, EngineWireName } from './engine-type';

const engineWireNameSchema = z.enum(['HAPI', 'HL7-Official-API', 'HL7-Official-Embedded']) satisfies z.ZodType<EngineWireName>;

const descriptorSchema = z.object({ engines: z.array(z.unknown()) });

export interface ParsedStrategy {
  /** Engine types in descriptor order */
  engines: EngineType[];
  diagnostics: string[];
  /** The descriptor was a JSON object with an `engines` array */
  wellFormed: boolean;
}

export function parseValidationStrategy(json: string | null | undefined): ParsedStrategy {
  if (json === null || json === undefined) {
    return { engines: [], diagnostics: [], wellFormed: false };
  }

  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    return {
      engines: [],
      diagnostics: [`Invalid validation strategy JSON: ${error instanceof Error ? error.message : String(error)}`],
      wellFormed: false,
    };
  }

  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return { engines: [], diagnostics: ['Validation strategy must be a JSON object'], wellFormed: false };
  }

  const descriptor = descriptorSchema.safeParse(value);
  if (!descriptor.success) {
    return {
      engines: [],
      diagnostics: ['Validation strategy must contain an "engines" array'],
      wellFormed: false,
    };
  }

  const engines: EngineType[] = [];
  const diagnostics: string[] = [];
  descriptor.data.engines.forEach((entry, index) => {
    if (typeof entry !== 'string') {
      diagnostics.push(`Validation strategy entry ${index} is not a string (found ${JSON.stringify(entry)})`);
      return;
    }
    const name = engineWireNameSchema.safeParse(entry);
    if (!name.success) {
      diagnostics.push(
        `Unknown validation engine '${entry}' in strategy (expected one of ${engineWireNameSchema.options.join(', ')})`
      );
      return;
    }
    engines.push(ENGINE_WIRE_NAMES[name.data]);
  });

  return { engines, diagnostics, wellFormed: true };
}
