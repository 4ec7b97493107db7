export * from './validation-support';
export * from './core-definitions-support';
export * from './common-terminology-support';
export * from './in-memory-terminology-support';
export * from './prepopulated-support';
export * from './support-chain';
export * from './caching-support';
