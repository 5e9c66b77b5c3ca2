export * from './csv.js';
export * from './tool-csv.js';
export * from './statistics.js';
export * from './report-writer.js';
