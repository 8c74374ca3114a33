export * from './column-resolver.js';
export * from './field-catalogue.js';
export * from './tape-reader.js';
export * from './value-coercion.js';
