export * from './aggregates.js';
export * from './default-dimensions.js';
export * from './dimension-spec.js';
export * from './summary-engine.js';
