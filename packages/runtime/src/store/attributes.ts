// Attribute dispatch
//
// Every "key: value" pair, whether it comes from a declaration line or from
// a change record, goes through applyAttribute. Known keys land in typed
// histories; anything else lands in the entity's override bag.

import {
  ENTITY_STATUSES,
  normalizeAttributeKey,
  parseTimeScoped,
  type Entity,
  type EntityStatus,
  type ProcessingWarning,
  type Timestamp,
} from '@worldkeep/protocol';
import { addUniqueName } from './entity.js';

export type AttributeKind =
  | 'location'
  | 'accessLink'
  | 'typeOverride'
  | 'owner'
  | 'group'
  | 'alias'
  | 'genericName'
  | 'status'
  | 'quantity'
  | 'contains';

const ATTRIBUTE_KEYS: ReadonlyMap<string, AttributeKind> = new Map<string, AttributeKind>([
  ['location', 'location'],
  ['lokacja', 'location'],
  ['access-link', 'accessLink'],
  ['dostęp', 'accessLink'],
  ['type-override', 'typeOverride'],
  ['typ', 'typeOverride'],
  ['owner', 'owner'],
  ['właściciel', 'owner'],
  ['group', 'group'],
  ['grupa', 'group'],
  ['alias', 'alias'],
  ['generic-name', 'genericName'],
  ['nazwa', 'genericName'],
  ['status', 'status'],
  ['quantity', 'quantity'],
  ['ilość', 'quantity'],
  ['contains', 'contains'],
  ['zawiera', 'contains'],
]);

const STATUS_VALUES: ReadonlyMap<string, EntityStatus> = new Map<string, EntityStatus>([
  ...ENTITY_STATUSES.map((status): [string, EntityStatus] => [status.toLowerCase(), status]),
  ['aktywny', 'Active'],
  ['aktywna', 'Active'],
  ['nieaktywny', 'Inactive'],
  ['nieaktywna', 'Inactive'],
  ['usunięty', 'Removed'],
  ['usunięta', 'Removed'],
]);

/**
 * The interpretation of an attribute key, or undefined for generic tags.
 */
export function attributeKind(key: string): AttributeKind | undefined {
  return ATTRIBUTE_KEYS.get(normalizeAttributeKey(key));
}

export function parseStatus(text: string): EntityStatus | undefined {
  return STATUS_VALUES.get(text.trim().toLowerCase());
}

export type ApplyAttributeOptions = {
  /**
   * validFrom for values that carry no range of their own
   */
  defaultValidFrom?: Timestamp;

  /**
   * Called for every alias or generic name added, so the store can index it
   */
  onName?: (entity: Entity, name: string) => void;
};

/**
 * Append one attribute value to an entity.
 *
 * @returns Warnings for values that could not be applied; the entity is left
 * untouched for those
 */
export function applyAttribute(
  entity: Entity,
  key: string,
  rawValue: string,
  options: ApplyAttributeOptions = {}
): ProcessingWarning[] {
  const context = { entity: entity.name, key: key.trim() };
  const parsed = parseTimeScoped(rawValue);
  const warnings: ProcessingWarning[] = parsed.issues.map((issue) => ({
    ...issue,
    context: { ...context, ...issue.context },
  }));

  if (!parsed.text) {
    warnings.push({
      code: 'MALFORMED_LINE',
      message: `Empty value for "${key.trim()}" on ${entity.name}`,
      context,
    });
    return warnings;
  }

  const validFrom = parsed.hasRange ? parsed.validFrom : (options.defaultValidFrom ?? null);
  const validTo = parsed.hasRange ? parsed.validTo : null;
  const scoped = <T>(value: T) => ({ value, validFrom, validTo });
  const { histories } = entity;

  switch (attributeKind(key)) {
    case 'location':
      histories.location.push(scoped(parsed.text));
      break;
    case 'accessLink':
      histories.accessLinks.push(scoped(parsed.text));
      break;
    case 'typeOverride':
      histories.typeOverride.push(scoped(parsed.text));
      break;
    case 'owner':
      histories.owner.push(scoped(parsed.text));
      break;
    case 'group':
      histories.groups.push(scoped(parsed.text));
      break;
    case 'alias':
      histories.aliases.push(scoped(parsed.text));
      if (addUniqueName(entity.names, parsed.text)) {
        options.onName?.(entity, parsed.text);
      }
      break;
    case 'genericName':
      addUniqueName(entity.genericNames, parsed.text);
      if (addUniqueName(entity.names, parsed.text)) {
        options.onName?.(entity, parsed.text);
      }
      break;
    case 'contains':
      for (const child of parsed.text.split(/[,\n]/)) {
        addUniqueName(entity.contains, child.trim());
      }
      break;
    case 'status': {
      const status = parseStatus(parsed.text);
      if (!status) {
        warnings.push({
          code: 'INVALID_STATUS',
          message: `Unknown status "${parsed.text}" on ${entity.name}`,
          context,
        });
        break;
      }
      histories.status.push(scoped(status));
      break;
    }
    case 'quantity': {
      const quantity = Number(parsed.text.replace(',', '.'));
      if (!Number.isFinite(quantity)) {
        warnings.push({
          code: 'INVALID_QUANTITY',
          message: `Quantity "${parsed.text}" on ${entity.name} is not a number`,
          context,
        });
        break;
      }
      histories.quantity.push(scoped(quantity));
      break;
    }
    case undefined: {
      const overrideKey = normalizeAttributeKey(key);
      (entity.overrides[overrideKey] ??= []).push(scoped(parsed.text));
      break;
    }
  }

  return warnings;
}
