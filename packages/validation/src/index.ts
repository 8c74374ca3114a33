export * from './default-registry.js';
export * from './rule.js';
export * from './rule-registry.js';
export * from './rules/index.js';
export * from './validation-config.js';
export * from './validation-engine.js';
export * from './validation-result-set.js';
