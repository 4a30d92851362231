// Event Overlay
//
// Applies dated change records from an external log on top of the merged
// store. Records are replayed in date order; each one names its target in
// free text, so targets go through the resolver. A value without its own
// range takes effect from the record's date.

import {
  parseDateBound,
  type ChangeRecord,
  type EntityRef,
  type Entity,
  type InstantInput,
  type ProcessingWarning,
  type Timestamp,
  type WarningCode,
} from '@worldkeep/protocol';
import type { EngineLogger } from '../logging.js';
import { silentLogger } from '../logging.js';
import type { EntityStore } from '../store/index.js';
import { applyAttribute, refreshEntity } from '../store/index.js';
import type { EntityResolver } from '../resolver/index.js';

export type ApplyChangeRecordsOptions = {
  /**
   * Resolver for targets the store cannot find by name
   */
  resolver?: EntityResolver;

  /**
   * Instant the touched entities' active state is derived for
   */
  activeOn?: InstantInput;

  logger?: EngineLogger;
};

export type SkippedRecord = {
  record: ChangeRecord;
  reason: WarningCode;
};

export type OverlayResult = {
  /**
   * Number of records applied to an entity
   */
  applied: number;
  skipped: SkippedRecord[];

  /**
   * Names of the entities that received at least one value, in first-touch order
   */
  touched: string[];
  warnings: ProcessingWarning[];
};

export type DatedRecord = {
  record: ChangeRecord;
  date: Timestamp;
};

type TargetLookup = { entity: Entity } | { reason: WarningCode; message: string };

// Player records are not entities; changes land on the entity that plays them
const PLAYER_ENTITY_TYPES = ['Player', 'PlayerCharacter'] as const;

function entityForPlayer(store: EntityStore, resolver: EntityResolver, owner: EntityRef): Entity | undefined {
  const names = resolver.index.identities.get(owner)?.names ?? [owner.name];
  for (const type of PLAYER_ENTITY_TYPES) {
    for (const name of names) {
      const match = store.findAll(name).find((entity) => entity.type === type);
      if (match) return match;
    }
  }
  return undefined;
}

function findTarget(store: EntityStore, target: string, resolver?: EntityResolver): TargetLookup {
  const direct = store.find(target);
  if (direct) {
    return { entity: direct };
  }

  const result = resolver?.resolve(target);
  if (!resolver || !result) {
    return { reason: 'UNRESOLVED_TARGET', message: `No entity matches "${target}"` };
  }
  if (result.status === 'unresolved') {
    const owners = result.ambiguousOwners.map((owner) => owner.name);
    return owners.length > 0
      ? { reason: 'UNRESOLVED_TARGET', message: `"${target}" is ambiguous between ${owners.join(', ')}` }
      : { reason: 'UNRESOLVED_TARGET', message: `No entity matches "${target}"` };
  }

  if (result.owner.kind === 'player') {
    const entity = entityForPlayer(store, resolver, result.owner);
    return entity
      ? { entity }
      : { reason: 'UNMAPPED_PLAYER', message: `Player ${result.owner.name} has no entity to apply "${target}" to` };
  }

  const entity = store.get(result.owner.name);
  return entity
    ? { entity }
    : { reason: 'UNRESOLVED_TARGET', message: `Resolved "${target}" to ${result.owner.name}, which is not in the store` };
}

/**
 * Sort records by date, oldest first. Equal dates keep their input order;
 * records with an unreadable date are returned separately.
 */
export function orderChangeRecords(records: readonly ChangeRecord[]): {
  ordered: DatedRecord[];
  malformed: ChangeRecord[];
} {
  const ordered: DatedRecord[] = [];
  const malformed: ChangeRecord[] = [];

  for (const record of records) {
    const date = parseDateBound(record.date, 'start');
    if (date === null) {
      malformed.push(record);
    } else {
      ordered.push({ record, date });
    }
  }

  ordered.sort((a, b) => Date.parse(a.date) - Date.parse(b.date));
  return { ordered, malformed };
}

/**
 * Apply change records to the entities of a store.
 *
 * A record whose target cannot be found is skipped with a warning and the
 * rest of the batch still applies.
 *
 * @example
 * ```typescript
 * const result = applyChangeRecords(store, [
 *   { date: '2026-02-01', target: 'Korm', tags: [{ tag: 'status', value: 'Removed' }] },
 * ], { resolver });
 * // result.touched → ['Korm']
 * ```
 */
export function applyChangeRecords(
  store: EntityStore,
  records: readonly ChangeRecord[],
  options: ApplyChangeRecordsOptions = {}
): OverlayResult {
  const { resolver, activeOn, logger = silentLogger } = options;
  const result: OverlayResult = { applied: 0, skipped: [], touched: [], warnings: [] };
  const touched = new Map<string, Entity>();

  const skip = (record: ChangeRecord, reason: WarningCode, message: string) => {
    result.skipped.push({ record, reason });
    result.warnings.push({
      code: reason,
      message,
      context: { target: record.target, date: record.date, source: record.source },
    });
  };

  const { ordered, malformed } = orderChangeRecords(records);
  for (const record of malformed) {
    skip(record, 'MALFORMED_DATE', `Unparseable date "${record.date}" on change to ${record.target}`);
  }

  for (const { record, date } of ordered) {
    const lookup = findTarget(store, record.target, resolver);
    if (!('entity' in lookup)) {
      skip(record, lookup.reason, lookup.message);
      continue;
    }

    const { entity } = lookup;
    for (const { tag, value } of record.tags) {
      const warnings = applyAttribute(entity, tag, value, {
        defaultValidFrom: date,
        onName: (owner, name) => store.registerName(owner, name),
      });
      for (const warning of warnings) {
        result.warnings.push({
          ...warning,
          context: { ...warning.context, date: record.date, source: record.source },
        });
      }
    }

    result.applied++;
    if (!touched.has(entity.name)) {
      touched.set(entity.name, entity);
      result.touched.push(entity.name);
    }
  }

  for (const entity of touched.values()) {
    refreshEntity(entity, activeOn);
  }

  for (const warning of result.warnings) {
    logger.warn(warning.message, { code: warning.code, ...warning.context });
  }
  logger.info('Change records applied', {
    records: records.length,
    applied: result.applied,
    skipped: result.skipped.length,
    touched: result.touched.length,
  });

  return result;
}
