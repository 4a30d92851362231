// Tests for world bundle import

import { describe, it, expect } from 'vitest';
import { stringifyNdjson } from '@worldkeep/protocol';
import { createInMemoryReader } from './fs.js';
import { importWorldBundle } from './import.js';

// --- Test Fixtures ---

const base = {
  id: 'base',
  sections: [{ label: 'NPCs', entities: [{ name: 'Korm', lines: [{ text: 'Status: Active' }] }] }],
};

const campaign = {
  id: 'campaign',
  sections: [{ label: 'Lokacje', entities: [{ name: 'Steadwick' }] }],
};

function bundleFiles(overrides: Record<string, string> = {}): Record<string, string> {
  return {
    'world/world.json': JSON.stringify({ name: 'Erathia', sources: ['base.json', 'sources/campaign.json'] }),
    'world/base.json': JSON.stringify(base),
    'world/sources/campaign.json': JSON.stringify(campaign),
    'world/players.ndjson': stringifyNdjson([{ name: 'Kacper', aliases: ['Kacperek'] }, { name: 'Gosia' }]),
    'world/log/events.ndjson': stringifyNdjson([
      { date: '2026-02-01', target: 'Korm', tags: [{ tag: 'status', value: 'Removed' }] },
    ]),
    ...overrides,
  };
}

describe('importWorldBundle', () => {
  it('reads sources in manifest order with both logs', async () => {
    const bundle = await importWorldBundle(createInMemoryReader(bundleFiles()), 'world');

    expect(bundle.manifest.name).toBe('Erathia');
    expect(bundle.sources.map((source) => source.id)).toEqual(['base', 'campaign']);
    expect(bundle.sources[1].sections[0].entities[0]).toEqual({ name: 'Steadwick', lines: [] });
    expect(bundle.players).toEqual([
      { name: 'Kacper', aliases: ['Kacperek'] },
      { name: 'Gosia', aliases: [] },
    ]);
    expect(bundle.events).toEqual([
      { date: '2026-02-01', target: 'Korm', tags: [{ tag: 'status', value: 'Removed' }] },
    ]);
  });

  it('treats missing default logs as empty', async () => {
    const files = bundleFiles();
    delete files['world/players.ndjson'];
    delete files['world/log/events.ndjson'];

    const bundle = await importWorldBundle(createInMemoryReader(files), 'world');

    expect(bundle.players).toEqual([]);
    expect(bundle.events).toEqual([]);
  });

  it('reads logs from the paths the manifest names', async () => {
    const files = bundleFiles({
      'world/world.json': JSON.stringify({ sources: ['base.json'], events: 'sesje.ndjson' }),
      'world/sesje.ndjson': stringifyNdjson([
        { date: '2026-03-01', target: 'Kormowi', tags: [{ tag: 'grupa', value: 'Bractwo' }], source: 'sesja 4' },
      ]),
    });

    const bundle = await importWorldBundle(createInMemoryReader(files), 'world');

    expect(bundle.events.map((event) => event.source)).toEqual(['sesja 4']);
  });

  it('fails when a named log is missing', async () => {
    const files = bundleFiles({
      'world/world.json': JSON.stringify({ sources: ['base.json'], players: 'gracze.ndjson' }),
    });

    await expect(importWorldBundle(createInMemoryReader(files), 'world')).rejects.toThrow(
      'Invalid bundle: missing gracze.ndjson'
    );
  });

  it('fails without a manifest', async () => {
    await expect(importWorldBundle(createInMemoryReader({}), 'world')).rejects.toThrow(
      'Invalid bundle: missing world.json'
    );
  });

  it('fails on a missing source', async () => {
    const files = bundleFiles({ 'world/world.json': JSON.stringify({ sources: ['brak.json'] }) });

    await expect(importWorldBundle(createInMemoryReader(files), 'world')).rejects.toThrow(
      'Invalid bundle: missing source brak.json'
    );
  });

  it('reports schema violations with their location', async () => {
    const files = bundleFiles({
      'world/log/events.ndjson': stringifyNdjson([
        { date: '2026-02-01', target: 'Korm', tags: [{ tag: 'status', value: 'Removed' }] },
        { date: '2026-02-02', target: 'Korm', tags: [] },
      ]),
    });

    await expect(importWorldBundle(createInMemoryReader(files), 'world')).rejects.toThrow(
      'Invalid bundle: log/events.ndjson record 2: tags: Array must contain at least 1 element(s)'
    );
  });

  it('reports invalid JSON', async () => {
    const files = bundleFiles({ 'world/base.json': '{ id: base' });

    await expect(importWorldBundle(createInMemoryReader(files), 'world')).rejects.toThrow(
      'Invalid bundle: base.json is not valid JSON'
    );
  });

  it('reports broken NDJSON lines', async () => {
    const files = bundleFiles({ 'world/players.ndjson': '{"name":"Kacper"}\nnot json\n' });

    await expect(importWorldBundle(createInMemoryReader(files), 'world')).rejects.toThrow(
      'Invalid bundle: players.ndjson: Failed to parse NDJSON at line 2'
    );
  });

  it('rejects a manifest without sources', async () => {
    const files = bundleFiles({ 'world/world.json': JSON.stringify({ sources: [] }) });

    await expect(importWorldBundle(createInMemoryReader(files), 'world')).rejects.toThrow(
      'Invalid bundle: world.json: sources: Array must contain at least 1 element(s)'
    );
  });
});

describe('createInMemoryReader', () => {
  it('normalises paths and reports directories as existing', async () => {
    const reader = createInMemoryReader(new Map([['./world/log/events.ndjson', '']]));

    expect(await reader.exists('world/log/events.ndjson')).toBe(true);
    expect(await reader.exists('world/log')).toBe(true);
    expect(await reader.exists('world/lo')).toBe(false);
    await expect(reader.readFile('world/missing.json')).rejects.toThrow('File not found: world/missing.json');
  });
});
