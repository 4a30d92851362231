import { describe, it, expect } from 'vitest';
import { normalizeAttributeKey } from './attributes.js';

describe('normalizeAttributeKey', () => {
  it('folds case, spaces and underscores into one key', () => {
    expect(normalizeAttributeKey('  Access Link ')).toBe('access-link');
    expect(normalizeAttributeKey('ulubiony_kolor')).toBe('ulubiony-kolor');
    expect(normalizeAttributeKey('Ulubiony   Kolor')).toBe('ulubiony-kolor');
  });
});
