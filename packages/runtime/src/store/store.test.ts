// Tests for the entity store merge

import { describe, it, expect } from 'vitest';
import type { DeclarationSource, EntityDeclaration } from '@worldkeep/protocol';
import { createCapturingLogger } from '../logging.js';
import { EntityNotFoundError } from '../errors.js';
import { EntityStore, buildEntityStore, mergeDeclarationSource, splitAttributeLine } from './store.js';
import { deriveActiveState } from './entity.js';

// --- Test Fixtures ---

function declare(name: string, ...lines: string[]): EntityDeclaration {
  return { name, lines: lines.map((text) => ({ text })) };
}

function createSource(id: string, label: string, ...entities: EntityDeclaration[]): DeclarationSource {
  return { id, sections: [{ label, entities }] };
}

// --- splitAttributeLine ---

describe('splitAttributeLine', () => {
  it('splits on the first colon only', () => {
    expect(splitAttributeLine('Opis: Uwaga: groźny')).toEqual({ key: 'Opis', value: 'Uwaga: groźny' });
  });

  it('joins continuation lines', () => {
    expect(splitAttributeLine('Opis:', ['  pierwsza', '  druga'])).toEqual({
      key: 'Opis',
      value: 'pierwsza\ndruga',
    });
  });

  it('rejects lines without a key', () => {
    expect(splitAttributeLine('bez klucza')).toBeUndefined();
    expect(splitAttributeLine(': wartość')).toBeUndefined();
  });
});

// --- buildEntityStore ---

describe('buildEntityStore', () => {
  it('unions aliases declared in different sources', () => {
    const base = createSource('base', 'NPCs', declare('Sandro', 'Alias: Mroczny Mag'));
    const campaign = createSource('campaign', 'NPCs', declare('Sandro', 'Alias: Lich z Deyji (2024-01:)'));

    const { store } = buildEntityStore([base, campaign]);
    const sandro = store.require('Sandro');

    expect(store.size).toBe(1);
    expect(sandro.names).toEqual(['Sandro', 'Mroczny Mag', 'Lich z Deyji']);
    expect(sandro.sources).toEqual(['base', 'campaign']);
    expect(store.find('mroczny mag')).toBe(sandro);
    expect(store.find('LICH Z DEYJI')).toBe(sandro);
  });

  it('derives aliases active at the configured instant', () => {
    const base = createSource('base', 'NPCs', declare('Sandro', 'Alias: Mroczny Mag'));
    const campaign = createSource('campaign', 'NPCs', declare('Sandro', 'Alias: Lich z Deyji (2024-01:)'));

    const { store } = buildEntityStore([base, campaign], { activeOn: '2023-06-01' });

    expect(store.require('Sandro').active.aliases).toEqual(['Mroczny Mag']);
    expect(store.require('Sandro').active.activeOn).toBe('2023-06-01T00:00:00.000Z');
  });

  it('lets the later source win ties between undated values', () => {
    const base = createSource('base', 'Lokacje', declare('Wieża', 'Lokacja: Erathia'));
    const campaign = createSource('campaign', 'Lokacje', declare('Wieża', 'Lokacja: Deyja'));

    const { store } = buildEntityStore([base, campaign]);

    expect(store.require('Wieża').active.location).toBe('Deyja');
    expect(store.require('Wieża').histories.location.map((entry) => entry.value)).toEqual(['Erathia', 'Deyja']);
  });

  it('sorts histories so the latest dated value wins', () => {
    const source = createSource(
      'base',
      'NPCs',
      declare('Korm Blackhand', 'Location: Nighon (2024-01:)', 'Location: Erathia (2020:)')
    );

    const { store } = buildEntityStore([source], { activeOn: '2025-01-01' });
    const korm = store.require('Korm Blackhand');

    expect(korm.histories.location.map((entry) => entry.value)).toEqual(['Erathia', 'Nighon']);
    expect(korm.active.location).toBe('Nighon');
  });

  it('produces the same projections when a source is merged twice', () => {
    const source = createSource(
      'base',
      'NPCs',
      declare(
        'Gem',
        'Grupa: Druidzi (2020:)',
        'Grupa: Rada (2022:2023)',
        'Lokacja: Rampart',
        'Status: Inactive (2025:)',
        'Ilość: 3'
      )
    );

    const once = buildEntityStore([source]).store.require('Gem');
    const twice = buildEntityStore([source, source]).store.require('Gem');

    for (const at of ['2019-01-01', '2021-01-01', '2022-06-01', '2026-01-01']) {
      expect(deriveActiveState(twice, at)).toEqual(deriveActiveState(once, at));
    }
    expect(twice.sources).toEqual(['base']);
  });

  it('routes unknown keys to overrides and joins continuation lines', () => {
    const source: DeclarationSource = {
      id: 'base',
      sections: [
        {
          label: 'NPCs',
          entities: [
            {
              name: 'Adela',
              lines: [{ text: 'Opis: Kapłanka', continuation: ['  z Erathii'] }],
            },
          ],
        },
      ],
    };

    const { store } = buildEntityStore([source]);
    const adela = store.require('Adela');

    expect(adela.overrides.opis).toEqual([{ value: 'Kapłanka\nz Erathii', validFrom: null, validTo: null }]);
    expect(adela.active.overrides).toEqual({ opis: 'Kapłanka\nz Erathii' });
  });

  it('reads the known attribute keys', () => {
    const source = createSource(
      'base',
      'Przedmioty',
      declare(
        'Miecz Armagedonu',
        'Właściciel: Gelu (2021:)',
        'Ilość: 1,5',
        'Typ: Artefakt',
        'Nazwa: miecz',
        'Status: Usunięty (2026-02:)'
      )
    );

    const { store } = buildEntityStore([source], { activeOn: '2025-01-01' });
    const sword = store.require('Miecz Armagedonu');

    expect(sword.type).toBe('Item');
    expect(sword.active.owner).toBe('Gelu');
    expect(sword.active.quantity).toBe(1.5);
    expect(sword.active.typeOverride).toBe('Artefakt');
    expect(sword.active.status).toBe('Active');
    expect(sword.genericNames).toEqual(['miecz']);
    expect(sword.names).toEqual(['Miecz Armagedonu', 'miecz']);
    expect(sword.histories.status).toEqual([
      { value: 'Removed', validFrom: '2026-02-01T00:00:00.000Z', validTo: null },
    ]);
  });

  it('collects containment hints', () => {
    const source = createSource('base', 'Locations', declare('Erathia', 'Contains: Steadwick, Wieża Magów', 'Zawiera: steadwick'));

    const { store } = buildEntityStore([source]);

    expect(store.require('Erathia').contains).toEqual(['Steadwick', 'Wieża Magów']);
  });

  it('skips malformed lines with a warning and keeps the rest', () => {
    const logger = createCapturingLogger();
    const source = createSource(
      'base',
      'NPCs',
      declare('Crag Hack', 'bez dwukropka', 'Status: Zaginiony', 'Ilość: dużo', 'Grupa: Barbarzyńcy')
    );

    const { store, warnings } = buildEntityStore([source], { logger });

    expect(warnings.map((warning) => warning.code)).toEqual([
      'MALFORMED_LINE',
      'INVALID_STATUS',
      'INVALID_QUANTITY',
    ]);
    expect(store.require('Crag Hack').active.groups).toEqual(['Barbarzyńcy']);
    expect(logger.entries.filter((entry) => entry.level === 'warn')).toHaveLength(3);
  });

  it('skips sections that declare no entities', () => {
    const logger = createCapturingLogger();
    const source = createSource('base', '## Notatki', declare('Nie-byt', 'Opis: nic'));

    const { store } = buildEntityStore([source], { logger });

    expect(store.size).toBe(0);
    expect(logger.entries[0]).toMatchObject({ level: 'debug', message: 'Skipping section "## Notatki" in base' });
  });

  it('keeps the first type on conflicting declarations', () => {
    const base = createSource('base', 'NPCs', declare('Tarnum'));
    const campaign = createSource('campaign', 'Player Characters', declare('Tarnum'));

    const { store, warnings } = buildEntityStore([base, campaign]);

    expect(store.require('Tarnum').type).toBe('NPC');
    expect(warnings[0].code).toBe('TYPE_CONFLICT');
  });
});

describe('EntityStore', () => {
  it('finds entities by primary name before aliases', () => {
    const store = new EntityStore();
    mergeDeclarationSource(
      store,
      createSource('base', 'NPCs', declare('Gelu', 'Alias: Łowca'), declare('Łowca'))
    );

    expect(store.find('łowca')?.name).toBe('Łowca');
    expect(store.findAll('Łowca').map((entity) => entity.name)).toEqual(['Łowca', 'Gelu']);
  });

  it('throws for unknown names on require', () => {
    expect(() => new EntityStore().require('Nikt')).toThrow(EntityNotFoundError);
  });
});
