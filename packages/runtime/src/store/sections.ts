// Section labels that carry entity declarations

import type { EntityType } from '@worldkeep/protocol';

const SECTION_TYPES: ReadonlyMap<string, EntityType> = new Map<string, EntityType>([
  ['npc', 'NPC'],
  ['npcs', 'NPC'],
  ['bn', 'NPC'],
  ['postacie', 'NPC'],
  ['postacie niezależne', 'NPC'],
  ['organization', 'Organization'],
  ['organizations', 'Organization'],
  ['faction', 'Organization'],
  ['factions', 'Organization'],
  ['organizacje', 'Organization'],
  ['frakcje', 'Organization'],
  ['location', 'Location'],
  ['locations', 'Location'],
  ['lokacje', 'Location'],
  ['miejsca', 'Location'],
  ['player', 'Player'],
  ['players', 'Player'],
  ['gracze', 'Player'],
  ['playercharacter', 'PlayerCharacter'],
  ['player character', 'PlayerCharacter'],
  ['player characters', 'PlayerCharacter'],
  ['postacie graczy', 'PlayerCharacter'],
  ['item', 'Item'],
  ['items', 'Item'],
  ['przedmioty', 'Item'],
]);

/**
 * Map a section header to the entity type it declares.
 * Leading '#' marks and a trailing ':' are ignored.
 *
 * @returns The type, or undefined for sections that declare no entities
 */
export function sectionEntityType(label: string): EntityType | undefined {
  const normalized = label
    .trim()
    .replace(/^#+\s*/, '')
    .replace(/:$/, '')
    .trim()
    .toLowerCase()
    .replace(/\s+/g, ' ');
  return SECTION_TYPES.get(normalized);
}
