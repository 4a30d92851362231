// World bundle path constants
// Defines the default file layout of a world bundle folder

/**
 * The manifest at the bundle root. It lists the declaration sources in
 * precedence order and may point at the player and event logs.
 */
export const WORLD_MANIFEST = 'world.json';

/**
 * Default locations of the logs when the manifest does not name them
 */
export const WORLD_FILES = {
  PLAYERS: 'players.ndjson',
  EVENTS: 'log/events.ndjson',
} as const;

/**
 * Join bundle-relative path segments with forward slashes
 */
export function bundlePath(...parts: string[]): string {
  return parts
    .filter((part) => part.length > 0)
    .map((part, i) => (i === 0 ? part.replace(/\/+$/, '') : part.replace(/^\/+|\/+$/g, '')))
    .join('/');
}
