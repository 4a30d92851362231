// BundleReader implementations: the local filesystem, and a table of files
// for tests.

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { BundleReader } from './types.js';

/**
 * Create a BundleReader over the local filesystem.
 *
 * @param rootDir - Relative paths resolve against this directory (default: the working directory)
 */
export function createFilesystemReader(rootDir?: string): BundleReader {
  const resolve = (filePath: string) => (rootDir ? path.resolve(rootDir, filePath) : filePath);

  return {
    async exists(filePath: string): Promise<boolean> {
      try {
        await fs.access(resolve(filePath));
        return true;
      } catch {
        return false;
      }
    },

    async readFile(filePath: string): Promise<string> {
      return fs.readFile(resolve(filePath), 'utf-8');
    },
  };
}

function normalize(filePath: string): string {
  return path.posix.normalize(filePath.replace(/\\/g, '/')).replace(/^\.\//, '');
}

/**
 * Create a BundleReader over files held in memory, keyed by path.
 *
 * @example
 * ```typescript
 * const reader = createInMemoryReader({
 *   'world/world.json': JSON.stringify({ sources: ['base.json'] }),
 *   'world/base.json': JSON.stringify({ id: 'base', sections: [] }),
 * });
 * ```
 */
export function createInMemoryReader(files: Record<string, string> | Map<string, string>): BundleReader {
  const entries = files instanceof Map ? Array.from(files) : Object.entries(files);
  const table = new Map(entries.map(([filePath, content]) => [normalize(filePath), content]));

  return {
    async exists(filePath: string): Promise<boolean> {
      const key = normalize(filePath);
      if (table.has(key)) return true;
      const prefix = key.endsWith('/') ? key : `${key}/`;
      return Array.from(table.keys()).some((candidate) => candidate.startsWith(prefix));
    },

    async readFile(filePath: string): Promise<string> {
      const content = table.get(normalize(filePath));
      if (content === undefined) {
        throw new Error(`File not found: ${filePath}`);
      }
      return content;
    },
  };
}
