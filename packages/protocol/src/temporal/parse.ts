// Temporal value parsing
//
// Raw attribute values carry an optional validity range as a trailing
// parenthetical: "Erathia (2021-01:2024-06)". Either side may be empty.
// Partial dates expand to the first instant of their period as a start
// bound and to the last millisecond of their period as an end bound.

import type { ProcessingWarning, Timestamp, InstantInput } from '../types/common.js';

export type DateBound = 'start' | 'end';

/**
 * Result of parsing a raw scoped value.
 */
export type ParsedTimeScoped = {
  /**
   * The value with the range parenthetical removed
   */
  text: string;
  validFrom: Timestamp | null;
  validTo: Timestamp | null;

  /**
   * True when at least one bound parsed to a timestamp
   */
  hasRange: boolean;

  /**
   * Bound fragments that could not be parsed (the parse still succeeds)
   */
  issues: ProcessingWarning[];
};

const PARTIAL_DATE = /^(\d{4})(?:-(\d{1,2})(?:-(\d{1,2}))?)?$/;
const TRAILING_PARENTHETICAL = /^([\s\S]*?)\s*\(([^()]*)\)\s*$/;

/**
 * Expand a date fragment to a timestamp.
 *
 * @returns The timestamp, or null when the fragment is not a date
 */
export function parseDateBound(fragment: string, bound: DateBound): Timestamp | null {
  const trimmed = fragment.trim();
  if (!trimmed) {
    return null;
  }

  const match = PARTIAL_DATE.exec(trimmed);
  if (!match) {
    // Full date-times are taken as written
    if (!trimmed.includes('T')) {
      return null;
    }
    const ms = Date.parse(trimmed);
    return Number.isNaN(ms) ? null : new Date(ms).toISOString();
  }

  const year = Number(match[1]);
  const month = match[2] === undefined ? undefined : Number(match[2]);
  const day = match[3] === undefined ? undefined : Number(match[3]);

  if (month === undefined) {
    const ms = bound === 'start' ? Date.UTC(year, 0, 1) : Date.UTC(year + 1, 0, 1) - 1;
    return new Date(ms).toISOString();
  }

  if (month < 1 || month > 12) {
    return null;
  }

  if (day === undefined) {
    const ms = bound === 'start' ? Date.UTC(year, month - 1, 1) : Date.UTC(year, month, 1) - 1;
    return new Date(ms).toISOString();
  }

  const start = new Date(Date.UTC(year, month - 1, day));
  if (day < 1 || start.getUTCMonth() !== month - 1) {
    return null;
  }

  const ms = bound === 'start' ? start.getTime() : Date.UTC(year, month - 1, day + 1) - 1;
  return new Date(ms).toISOString();
}

/**
 * Normalise an instant to epoch milliseconds.
 * Partial dates resolve to the start of their period.
 *
 * @returns Milliseconds, or null when the input is not a valid instant
 */
export function toInstant(input: InstantInput): number | null {
  if (input instanceof Date) {
    const ms = input.getTime();
    return Number.isNaN(ms) ? null : ms;
  }

  const trimmed = input.trim();
  if (PARTIAL_DATE.test(trimmed)) {
    const start = parseDateBound(trimmed, 'start');
    return start === null ? null : Date.parse(start);
  }

  const ms = Date.parse(trimmed);
  return Number.isNaN(ms) ? null : ms;
}

/**
 * Normalise an instant to a timestamp string, or null when invalid.
 */
export function toTimestamp(input: InstantInput): Timestamp | null {
  const ms = toInstant(input);
  return ms === null ? null : new Date(ms).toISOString();
}

function splitRange(inner: string): [string, string] | null {
  const colons: number[] = [];
  for (let i = 0; i < inner.length; i++) {
    if (inner[i] === ':') colons.push(i);
  }
  if (colons.length === 0) {
    return null;
  }

  // Date-times carry colons of their own; prefer the split where both sides read as bounds
  for (const at of colons) {
    const start = inner.slice(0, at);
    const end = inner.slice(at + 1);
    const startOk = !start.trim() || parseDateBound(start, 'start') !== null;
    const endOk = !end.trim() || parseDateBound(end, 'end') !== null;
    if (startOk && endOk) {
      return [start, end];
    }
  }

  return [inner.slice(0, colons[0]), inner.slice(colons[0] + 1)];
}

/**
 * Parse a raw value of the shape "<text> (<start>:<end>)".
 *
 * A value without a trailing range is active at every instant.
 *
 * @example
 * ```typescript
 * parseTimeScoped('Erathia (2021-01:)');
 * // { text: 'Erathia', validFrom: '2021-01-01T00:00:00.000Z', validTo: null, hasRange: true, issues: [] }
 * ```
 */
export function parseTimeScoped(raw: string): ParsedTimeScoped {
  const issues: ProcessingWarning[] = [];
  const unscoped: ParsedTimeScoped = {
    text: raw.trim(),
    validFrom: null,
    validTo: null,
    hasRange: false,
    issues,
  };

  const match = TRAILING_PARENTHETICAL.exec(raw);
  if (!match) {
    return unscoped;
  }

  const range = splitRange(match[2]);
  if (!range) {
    return unscoped;
  }

  const [startFragment, endFragment] = range;
  let validFrom = parseDateBound(startFragment, 'start');
  let validTo = parseDateBound(endFragment, 'end');

  if (startFragment.trim() && validFrom === null) {
    issues.push({
      code: 'MALFORMED_DATE',
      message: `Unparseable start date "${startFragment.trim()}"`,
      context: { raw },
    });
  }
  if (endFragment.trim() && validTo === null) {
    issues.push({
      code: 'MALFORMED_DATE',
      message: `Unparseable end date "${endFragment.trim()}"`,
      context: { raw },
    });
  }

  // A parenthetical where no written fragment reads as a date is part of the value
  if (issues.length > 0 && validFrom === null && validTo === null) {
    return unscoped;
  }

  if (validFrom !== null && validTo !== null && Date.parse(validFrom) > Date.parse(validTo)) {
    issues.push({
      code: 'INVALID_RANGE',
      message: `Range starts after it ends: ${validFrom} > ${validTo}`,
      context: { raw },
    });
    validFrom = null;
    validTo = null;
  }

  return {
    text: match[1].trim(),
    validFrom,
    validTo,
    hasRange: validFrom !== null || validTo !== null,
    issues,
  };
}
