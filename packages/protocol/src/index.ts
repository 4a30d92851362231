// @worldkeep/protocol
// Data types, the temporal value model and input schemas shared by every package

export * from './types/index.js';
export * from './attributes.js';
export * from './temporal/index.js';
export * from './validation/index.js';
export * from './bundle/index.js';
