// World bundle import.
// Reads the folder layout described by the protocol's bundle paths.

export * from './types.js';
export * from './import.js';
export * from './fs.js';
