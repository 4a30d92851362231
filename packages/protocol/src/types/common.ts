// Common types used across the protocol

/**
 * ISO 8601 timestamp string, always UTC (e.g. "2024-06-30T23:59:59.999Z")
 */
export type Timestamp = string;

/**
 * A point in time accepted by read paths: a Date, an ISO date-time or a
 * partial date ("2024", "2024-06", "2024-06-15").
 */
export type InstantInput = Date | string;

/**
 * A structured, non-fatal problem found while processing a batch.
 * Batches collect these instead of throwing.
 */
export type ProcessingWarning = {
  code: WarningCode;
  message: string;
  context?: Record<string, unknown>;
};

export type WarningCode =
  | 'MALFORMED_LINE'
  | 'MALFORMED_DATE'
  | 'INVALID_RANGE'
  | 'INVALID_STATUS'
  | 'INVALID_QUANTITY'
  | 'TYPE_CONFLICT'
  | 'CONTAINMENT_CYCLE'
  | 'UNRESOLVED_TARGET'
  | 'UNMAPPED_PLAYER';
