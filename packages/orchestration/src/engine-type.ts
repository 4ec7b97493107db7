/**
 * Engine Types
 *
 * The closed set of validation backends and their wire names in strategy
 * descriptors.
 */

export const ENGINE_TYPES = ['local-rule', 'embedded-reference', 'remote-api'] as const;

export type EngineType = (typeof ENGINE_TYPES)[number];

export const ENGINE_WIRE_NAMES = {
  HAPI: 'local-rule',
  'HL7-Official-API': 'remote-api',
  'HL7-Official-Embedded': 'embedded-reference',
} as const satisfies Record<string, EngineType>;

export type EngineWireName = keyof typeof ENGINE_WIRE_NAMES;

export function isEngineType(value: unknown): value is EngineType {
  return typeof value === 'string' && ENGINE_TYPES.some((type) => type === value);
}

/**
 * Cache key for an engine: equal type and profile URL give equal keys.
 */
export interface EngineKey {
  readonly engineType: EngineType;
  readonly profileUrl: string;
}

export function engineKey(engineType: EngineType, profileUrl: string): EngineKey {
  return { engineType, profileUrl };
}

export function engineKeyToString(key: EngineKey): string {
  return JSON.stringify([key.engineType, key.profileUrl]);
}
