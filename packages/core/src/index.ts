export * from './errors/index.js';
export * from './utils/decimal-utils.js';
export * from './model/field.js';
export * from './model/cell-value.js';
export * from './model/loan-record.js';
export type * from './model/loan-tape.js';
