export * from './config';
export * from './device';
export * from './engine-registry';
export * from './engine-type';
export * from './engines';
export * from './errors';
export * from './logger';
export * from './orchestrator';
export * from './resource-fetcher';
export * from './result';
export * from './serialization';
export * from './session';
export * from './strategy';
export { parseCliArgs } from './cli-args';
export type { CliOptions } from './cli-args';
