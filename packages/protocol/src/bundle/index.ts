export * from './ndjson.js';
export * from './paths.js';
