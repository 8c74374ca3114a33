export * from './report-sheets.js';
export * from './report-writer.js';
