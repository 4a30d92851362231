// Re-export all protocol types

export * from './common.js';
export * from './entities.js';
export * from './declarations.js';
export * from './events.js';
export * from './identity.js';
export * from './resolution.js';
