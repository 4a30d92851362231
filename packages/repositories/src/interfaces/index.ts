// Repository interfaces
// Define the contract for reading a world, independent of where it is kept.

export type { EntityRepository, EntityFilter, PropertyHistory } from './entity-repository.js';
