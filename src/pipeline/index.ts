export * from './types.js';
export * from './trace-decoder.js';
export * from './aggregator.js';
export * from './conversation-collector.js';
export * from './message-extractor.js';
export * from './trace-extractor.js';
export * from './runner.js';
