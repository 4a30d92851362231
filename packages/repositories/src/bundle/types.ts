// Bundle file system abstraction for import operations.
// Allows testing and different storage backends (filesystem, in-memory, etc.)

import type {
  ChangeRecord,
  DeclarationSource,
  PlayerRecord,
  WorldManifest,
} from '@worldkeep/protocol';

/**
 * Abstraction for reading bundle files. Paths use forward slashes.
 */
export interface BundleReader {
  /**
   * Check if a path exists.
   */
  exists(path: string): Promise<boolean>;

  /**
   * Read a file as text.
   */
  readFile(path: string): Promise<string>;
}

/**
 * A world bundle, read and validated.
 */
export type WorldBundle = {
  bundlePath: string;
  manifest: WorldManifest;

  /**
   * Declaration sources in manifest order, lowest precedence first
   */
  sources: DeclarationSource[];
  players: PlayerRecord[];
  events: ChangeRecord[];
};
