// Tests for the in-memory entity repository

import { describe, it, expect } from 'vitest';
import type { Entity, EntityHistories, EntityType } from '@worldkeep/protocol';
import { createInMemoryEntityRepository } from './index.js';

// --- Test Fixtures ---

function makeEntity(
  name: string,
  type: EntityType,
  histories: Partial<EntityHistories> = {},
  extra: Partial<Entity> = {}
): Entity {
  return {
    name,
    type,
    names: [name],
    canonicalName: null,
    histories: {
      location: [],
      accessLinks: [],
      typeOverride: [],
      owner: [],
      groups: [],
      status: [],
      quantity: [],
      aliases: [],
      ...histories,
    },
    genericNames: [],
    contains: [],
    overrides: {},
    sources: ['base'],
    active: {
      activeOn: null,
      location: null,
      accessLinks: [],
      typeOverride: null,
      owner: null,
      groups: [],
      status: 'Active',
      quantity: null,
      aliases: [],
      overrides: {},
    },
    ...extra,
  };
}

const korm = makeEntity('Korm', 'NPC', {
  groups: [{ value: 'Bractwo Miecza', validFrom: null, validTo: '2025-12-31T23:59:59.999Z' }],
  status: [{ value: 'Removed', validFrom: '2026-02-01T00:00:00.000Z', validTo: null }],
  location: [{ value: 'Steadwick', validFrom: null, validTo: null }],
});

const sandro = makeEntity(
  'Sandro',
  'NPC',
  {
    location: [
      { value: 'Erathia', validFrom: '2024-01-01T00:00:00.000Z', validTo: null },
      { value: 'Deyja', validFrom: '2025-06-01T00:00:00.000Z', validTo: '2025-12-31T23:59:59.999Z' },
    ],
    aliases: [{ value: 'Lich z Deyji', validFrom: null, validTo: null }],
  },
  {
    names: ['Sandro', 'Lich z Deyji'],
    overrides: { 'ulubiony-kolor': [{ value: 'czerń', validFrom: null, validTo: null }] },
  }
);

const steadwick = makeEntity('Steadwick', 'Location');

function createRepository() {
  return createInMemoryEntityRepository([korm, sandro, steadwick]);
}

describe('createInMemoryEntityRepository', () => {
  it('gets entities by primary name, ignoring case', async () => {
    const repo = createRepository();

    expect(await repo.get('KORM')).toBe(korm);
    expect(await repo.get('Lich z Deyji')).toBeNull();
  });

  it('finds entities by alias', async () => {
    const repo = createRepository();

    expect(await repo.findByName('lich z deyji')).toBe(sandro);
    expect(await repo.findByName('Nikt')).toBeNull();
  });

  it('lists and counts in declaration order', async () => {
    const repo = createRepository();

    expect((await repo.list()).map((entity) => entity.name)).toEqual(['Korm', 'Sandro', 'Steadwick']);
    expect(await repo.count()).toBe(3);
  });

  describe('query', () => {
    it('filters by type', async () => {
      const result = await createRepository().query({ type: 'Location' });

      expect(result).toEqual([steadwick]);
    });

    it('filters by status at an instant', async () => {
      const repo = createRepository();

      expect((await repo.query({ status: 'Removed', activeOn: '2026-03-01' })).map((e) => e.name)).toEqual([
        'Korm',
      ]);
      expect((await repo.query({ status: 'Active', activeOn: '2025-12-01' })).map((e) => e.name)).toEqual([
        'Korm',
        'Sandro',
        'Steadwick',
      ]);
    });

    it('filters by location at an instant', async () => {
      const repo = createRepository();

      expect((await repo.query({ location: 'deyja', activeOn: '2025-08' })).map((e) => e.name)).toEqual([
        'Sandro',
      ]);
      expect((await repo.query({ location: 'Erathia', activeOn: '2026-01-15' })).map((e) => e.name)).toEqual([
        'Sandro',
      ]);
    });

    it('filters by group membership', async () => {
      const repo = createRepository();

      expect(await repo.query({ group: 'bractwo miecza', activeOn: '2025-06-01' })).toEqual([korm]);
      expect(await repo.query({ group: 'bractwo miecza', activeOn: '2026-06-01' })).toEqual([]);
      expect(await repo.query({ group: 'Bractwo Miecza' })).toEqual([korm]);
    });

    it('pages results', async () => {
      const repo = createRepository();

      expect((await repo.query({ offset: 1, limit: 1 })).map((e) => e.name)).toEqual(['Sandro']);
    });
  });

  describe('getHistory', () => {
    it('returns a sorted copy of a history', async () => {
      const repo = createRepository();

      const history = await repo.getHistory('Sandro', 'location');

      expect(history?.map((entry) => entry.value)).toEqual(['Erathia', 'Deyja']);
      expect(history).not.toBe(sandro.histories.location);
    });

    it('returns null for unknown entities', async () => {
      expect(await createRepository().getHistory('Nikt', 'status')).toBeNull();
    });

    it('reads override tags by their normalised key', async () => {
      const repo = createRepository();

      expect(await repo.getOverrideHistory('Sandro', 'Ulubiony kolor')).toEqual([
        { value: 'czerń', validFrom: null, validTo: null },
      ]);
      expect(await repo.getOverrideHistory('Sandro', 'wzrost')).toEqual([]);
    });
  });
});
