// Bundle import functionality.
// Reads a world bundle folder and validates everything in it.

import {
  ChangeRecordSchema,
  DeclarationSourceSchema,
  PlayerRecordSchema,
  WORLD_FILES,
  WORLD_MANIFEST,
  WorldManifestSchema,
  bundlePath,
  formatValidationErrors,
  parseNdjson,
  validateWith,
  type DeclarationSource,
  type Schema,
} from '@worldkeep/protocol';
import type { BundleReader, WorldBundle } from './types.js';

/**
 * Import a world bundle.
 *
 * The manifest lists declaration sources in precedence order. The player
 * and event logs are optional; a log the manifest names explicitly must
 * exist.
 *
 * @param reader - Bundle reader for file operations
 * @param rootPath - Root path of the bundle
 * @returns The validated bundle contents
 * @throws Error when a file is missing, unreadable or fails its schema
 */
export async function importWorldBundle(reader: BundleReader, rootPath: string): Promise<WorldBundle> {
  const readJson = async (relativePath: string): Promise<unknown> => {
    const content = await reader.readFile(bundlePath(rootPath, relativePath));
    try {
      return JSON.parse(content);
    } catch (error) {
      throw new Error(
        `Invalid bundle: ${relativePath} is not valid JSON (${error instanceof Error ? error.message : 'Unknown error'})`
      );
    }
  };

  const check = <T>(schema: Schema<T>, input: unknown, where: string): T => {
    const result = validateWith(schema, input);
    if (!result.valid) {
      throw new Error(`Invalid bundle: ${where}: ${formatValidationErrors(result.errors)}`);
    }
    return result.data;
  };

  const readLog = async <T>(
    schema: Schema<T>,
    declared: string | undefined,
    fallback: string
  ): Promise<T[]> => {
    const relativePath = declared ?? fallback;
    if (!(await reader.exists(bundlePath(rootPath, relativePath)))) {
      if (declared !== undefined) {
        throw new Error(`Invalid bundle: missing ${relativePath}`);
      }
      return [];
    }

    let items: unknown[];
    try {
      items = parseNdjson(await reader.readFile(bundlePath(rootPath, relativePath)));
    } catch (error) {
      throw new Error(`Invalid bundle: ${relativePath}: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
    return items.map((item, i) => check(schema, item, `${relativePath} record ${i + 1}`));
  };

  if (!(await reader.exists(bundlePath(rootPath, WORLD_MANIFEST)))) {
    throw new Error(`Invalid bundle: missing ${WORLD_MANIFEST}`);
  }
  const manifest = check(WorldManifestSchema, await readJson(WORLD_MANIFEST), WORLD_MANIFEST);

  const sources: DeclarationSource[] = [];
  for (const sourcePath of manifest.sources) {
    if (!(await reader.exists(bundlePath(rootPath, sourcePath)))) {
      throw new Error(`Invalid bundle: missing source ${sourcePath}`);
    }
    sources.push(check(DeclarationSourceSchema, await readJson(sourcePath), sourcePath));
  }

  const players = await readLog(PlayerRecordSchema, manifest.players, WORLD_FILES.PLAYERS);
  const events = await readLog(ChangeRecordSchema, manifest.events, WORLD_FILES.EVENTS);

  return { bundlePath: rootPath, manifest, sources, players, events };
}
