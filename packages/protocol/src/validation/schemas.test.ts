// Tests for input schemas

import { describe, it, expect } from 'vitest';
import {
  ChangeRecordSchema,
  DeclarationSourceSchema,
  EngineConfigSchema,
  PlayerRecordSchema,
  WorldManifestSchema,
} from './schemas.js';
import { validateWith, formatValidationErrors } from './validate.js';

describe('DeclarationSourceSchema', () => {
  it('accepts a structured source and fills defaults', () => {
    const result = validateWith(DeclarationSourceSchema, {
      id: 'base',
      sections: [{ label: 'NPCs', entities: [{ name: 'Sandro' }] }],
    });

    expect(result.valid).toBe(true);
    expect(result.data?.sections[0].entities[0].lines).toEqual([]);
  });

  it('rejects an entity without a name', () => {
    const result = validateWith(DeclarationSourceSchema, {
      id: 'base',
      sections: [{ label: 'NPCs', entities: [{ name: '  ', lines: [] }] }],
    });

    expect(result.valid).toBe(false);
    expect(result.errors[0].path).toBe('sections.0.entities.0.name');
  });
});

describe('PlayerRecordSchema', () => {
  it('defaults aliases to an empty list', () => {
    const result = validateWith(PlayerRecordSchema, { name: 'Kacper' });

    expect(result.valid).toBe(true);
    expect(result.data).toEqual({ name: 'Kacper', aliases: [] });
  });
});

describe('ChangeRecordSchema', () => {
  it('requires at least one tag', () => {
    const result = validateWith(ChangeRecordSchema, { date: '2026-02-01', target: 'Korm', tags: [] });

    expect(result.valid).toBe(false);
    expect(result.errors[0].path).toBe('tags');
  });

  it('accepts a dated change', () => {
    const result = validateWith(ChangeRecordSchema, {
      date: '2026-02-01',
      target: 'Korm',
      tags: [{ tag: 'status', value: 'Removed' }],
    });

    expect(result.valid).toBe(true);
  });
});

describe('EngineConfigSchema', () => {
  it('accepts partial dates as activeOn', () => {
    expect(validateWith(EngineConfigSchema, { activeOn: '2026-03' }).valid).toBe(true);
  });

  it('rejects invalid instants and lengths', () => {
    const result = validateWith(EngineConfigSchema, { activeOn: 'next week', minTokenLength: 0 });

    expect(result.valid).toBe(false);
    expect(formatValidationErrors(result.errors)).toBe(
      'minTokenLength: Number must be greater than or equal to 1; activeOn: Invalid instant'
    );
  });
});

describe('WorldManifestSchema', () => {
  it('requires at least one source', () => {
    const result = validateWith(WorldManifestSchema, { sources: [] });

    expect(result.valid).toBe(false);
    expect(result.errors[0].path).toBe('sources');
  });
});
