export * from './types';
export * from './errors';
export * from './conformance';
export * from './parser';
export * from './support';
export * from './rules';
export * from './bundle-validator';
export * from './operation-outcome';
