// Activity of scoped values and histories

import type { InstantInput } from '../types/common.js';
import type { History, TimeScoped } from '../types/entities.js';
import { toInstant } from './parse.js';

function instantMs(instant: InstantInput | number): number {
  if (typeof instant === 'number') {
    return instant;
  }
  const ms = toInstant(instant);
  if (ms === null) {
    throw new RangeError(`Invalid instant: ${String(instant)}`);
  }
  return ms;
}

/**
 * Whether a scoped value is active at an instant.
 *
 * An absent instant is an unscoped query: every value is active.
 * Missing bounds are unbounded on their side; both bounds are inclusive.
 */
export function isActiveAt<T>(
  value: TimeScoped<T>,
  instant?: InstantInput | number | null
): boolean {
  if (instant === undefined || instant === null) {
    return true;
  }

  const t = instantMs(instant);
  if (value.validFrom !== null && t < Date.parse(value.validFrom)) {
    return false;
  }
  if (value.validTo !== null && t > Date.parse(value.validTo)) {
    return false;
  }
  return true;
}

/**
 * Order two scoped values by validFrom, open starts first.
 */
export function compareValidFrom<T>(a: TimeScoped<T>, b: TimeScoped<T>): number {
  if (a.validFrom === b.validFrom) return 0;
  if (a.validFrom === null) return -1;
  if (b.validFrom === null) return 1;
  return Date.parse(a.validFrom) - Date.parse(b.validFrom);
}

/**
 * Stable sort of a history by validFrom (nulls first). Returns a new array.
 */
export function sortHistory<T>(history: History<T>): History<T> {
  return [...history].sort(compareValidFrom);
}

/**
 * The active value of a single-valued history: the last entry of the sorted
 * history that is active at the instant.
 */
export function activeValue<T>(
  history: History<T>,
  instant?: InstantInput | number | null
): T | undefined {
  const sorted = sortHistory(history);
  for (let i = sorted.length - 1; i >= 0; i--) {
    if (isActiveAt(sorted[i], instant)) {
      return sorted[i].value;
    }
  }
  return undefined;
}

/**
 * Every active value of a multi-valued history, in sorted order.
 * String values are de-duplicated case-insensitively.
 */
export function activeValues<T>(
  history: History<T>,
  instant?: InstantInput | number | null
): T[] {
  const seen = new Set<unknown>();
  const values: T[] = [];

  for (const entry of sortHistory(history)) {
    if (!isActiveAt(entry, instant)) continue;

    const identity = typeof entry.value === 'string' ? entry.value.toLowerCase() : entry.value;
    if (seen.has(identity)) continue;
    seen.add(identity);
    values.push(entry.value);
  }

  return values;
}
