// Engine errors. Per-item input problems are reported as warnings instead.

import type { EntityRef } from '@worldkeep/protocol';

export type RuntimeErrorCode =
  | 'VALIDATION_ERROR'
  | 'ENTITY_NOT_FOUND'
  | 'UNRESOLVED_REFERENCE'
  | 'AMBIGUOUS_REFERENCE';

/**
 * Base class for engine errors. `code` is stable across releases; messages are not.
 */
export class RuntimeError extends Error {
  readonly code: RuntimeErrorCode;

  constructor(code: RuntimeErrorCode, message: string) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when a referenced entity does not exist in the store.
 */
export class EntityNotFoundError extends RuntimeError {
  readonly entityName: string;

  constructor(entityName: string) {
    super('ENTITY_NOT_FOUND', `Entity not found: ${entityName}`);
    this.name = 'EntityNotFoundError';
    this.entityName = entityName;
  }
}

/**
 * Error when a query matches nothing. Only raised for callers that ask for
 * it; the pipeline reports misses as results.
 */
export class UnresolvedReferenceError extends RuntimeError {
  readonly query: string;

  constructor(query: string) {
    super('UNRESOLVED_REFERENCE', `No entity matches "${query}"`);
    this.name = 'UnresolvedReferenceError';
    this.query = query;
  }
}

/**
 * Error when a query names several distinct owners at the same priority.
 */
export class AmbiguousReferenceError extends RuntimeError {
  readonly query: string;
  readonly owners: EntityRef[];

  constructor(query: string, owners: EntityRef[]) {
    super(
      'AMBIGUOUS_REFERENCE',
      `"${query}" is ambiguous between ${owners.map((owner) => owner.name).join(', ')}`
    );
    this.name = 'AmbiguousReferenceError';
    this.query = query;
    this.owners = owners;
  }
}
