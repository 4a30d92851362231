import { describe, it, expect } from 'vitest';
import { BkTree } from './bk-tree.js';
import { distanceThreshold, levenshtein } from './levenshtein.js';

describe('levenshtein', () => {
  it('counts single-character edits', () => {
    expect(levenshtein('kitten', 'sitting')).toBe(3);
    expect(levenshtein('steadwik', 'steadwick')).toBe(1);
    expect(levenshtein('sadnro', 'sandro')).toBe(2);
  });

  it('handles empty strings and identity', () => {
    expect(levenshtein('', 'abc')).toBe(3);
    expect(levenshtein('abc', '')).toBe(3);
    expect(levenshtein('praga', 'praga')).toBe(0);
  });

  it('is symmetric and case-sensitive', () => {
    expect(levenshtein('korm', 'gorn')).toBe(levenshtein('gorn', 'korm'));
    expect(levenshtein('Praga', 'praga')).toBe(1);
  });
});

describe('distanceThreshold', () => {
  it('allows one edit below five characters and a third of the length above', () => {
    expect(distanceThreshold(4)).toBe(1);
    expect(distanceThreshold(5)).toBe(1);
    expect(distanceThreshold(6)).toBe(2);
    expect(distanceThreshold(9)).toBe(3);
  });
});

describe('BkTree', () => {
  it('ignores duplicate terms', () => {
    const tree = new BkTree();

    expect(tree.add('korm')).toBe(true);
    expect(tree.add('gorn')).toBe(true);
    expect(tree.add('korm')).toBe(false);
    expect(tree.size).toBe(2);
  });

  it('finds every term within the radius, closest first', () => {
    const tree = BkTree.from(['korm', 'gorn', 'sandro', 'xeron', 'korn']);

    expect(tree.search('korn', 1)).toEqual([
      { term: 'korn', distance: 0 },
      { term: 'gorn', distance: 1 },
      { term: 'korm', distance: 1 },
    ]);
    expect(tree.search('sandr', 1)).toEqual([{ term: 'sandro', distance: 1 }]);
  });

  it('returns nothing from an empty tree', () => {
    expect(new BkTree().search('korm', 3)).toEqual([]);
  });
});
