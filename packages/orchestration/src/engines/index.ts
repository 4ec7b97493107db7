export * from './validation-engine';
export * from './local-rule-engine';
export * from './embedded-reference-engine';
export * from './remote-api-engine';
