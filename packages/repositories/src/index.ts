// @worldkeep/repositories
// Read access to a merged world, and the bundle format worlds are loaded from.
//
// Key concepts:
// - Interfaces define WHAT queries are available, not HOW they're served
// - The in-memory implementation serves the entities the runtime built
// - Bundles are validated at the boundary; the engine never sees raw files

export * from './interfaces/index.js';
export { createInMemoryEntityRepository } from './in-memory/index.js';
export * as bundle from './bundle/index.js';
