// Tests for NDJSON helpers

import { describe, it, expect } from 'vitest';
import { parseNdjson, stringifyNdjson } from './ndjson.js';
import { bundlePath } from './paths.js';

describe('parseNdjson', () => {
  it('skips blank lines', () => {
    expect(parseNdjson('{"name":"Kacper"}\n\n{"name":"Ola"}\n')).toEqual([
      { name: 'Kacper' },
      { name: 'Ola' },
    ]);
  });

  it('returns an empty list for empty content', () => {
    expect(parseNdjson('  \n')).toEqual([]);
  });

  it('reports the failing line number', () => {
    expect(() => parseNdjson('{"a":1}\n{broken')).toThrow(/line 2/);
  });
});

describe('stringifyNdjson', () => {
  it('writes one item per line with a trailing newline', () => {
    expect(stringifyNdjson([{ a: 1 }, { b: 2 }])).toBe('{"a":1}\n{"b":2}\n');
    expect(stringifyNdjson([])).toBe('');
  });
});

describe('bundlePath', () => {
  it('joins segments with single slashes', () => {
    expect(bundlePath('/worlds/erathia/', 'log/events.ndjson')).toBe('/worlds/erathia/log/events.ndjson');
    expect(bundlePath('worlds', '', '/sources/base.json')).toBe('worlds/sources/base.json');
  });
});
