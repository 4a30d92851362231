// Engine configuration
//
// Every component takes its knobs from one options object. Defaults live
// here; values coming from a bundle manifest are checked against the
// protocol's EngineConfigSchema before use.

import {
  EngineConfigSchema,
  formatValidationErrors,
  toTimestamp,
  validateWith,
  type InstantInput,
  type Timestamp,
} from '@worldkeep/protocol';
import { ValidationError } from './errors.js';

export type EngineConfig = {
  /**
   * Shortest token of a multi-word name that gets its own index key
   */
  minTokenLength: number;

  /**
   * Shortest stem the morphological stages will look up
   */
  minStemLength: number;

  /**
   * Cache resolution results per query within one resolver
   */
  cacheResults: boolean;

  /**
   * Run the edit-distance stage
   */
  fuzzy: boolean;

  /**
   * Instant every temporal projection is computed for (undefined = unscoped)
   */
  activeOn?: Timestamp;
};

export type EngineConfigOptions = {
  minTokenLength?: number;
  minStemLength?: number;
  cacheResults?: boolean;
  fuzzy?: boolean;
  activeOn?: InstantInput;
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  minTokenLength: 3,
  minStemLength: 3,
  cacheResults: true,
  fuzzy: true,
};

/**
 * Merge options over the defaults.
 *
 * @throws ValidationError when an option is out of range or activeOn is not an instant
 */
export function resolveEngineConfig(options: EngineConfigOptions = {}): EngineConfig {
  const result = validateWith(EngineConfigSchema, options);
  if (!result.valid) {
    throw new ValidationError(`Invalid engine configuration: ${formatValidationErrors(result.errors)}`, {
      field: result.errors[0]?.path,
      details: { errors: result.errors },
    });
  }

  const { activeOn, ...rest } = result.data;
  const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG };
  if (rest.minTokenLength !== undefined) config.minTokenLength = rest.minTokenLength;
  if (rest.minStemLength !== undefined) config.minStemLength = rest.minStemLength;
  if (rest.cacheResults !== undefined) config.cacheResults = rest.cacheResults;
  if (rest.fuzzy !== undefined) config.fuzzy = rest.fuzzy;

  if (activeOn !== undefined) {
    const timestamp = toTimestamp(activeOn);
    if (timestamp !== null) {
      config.activeOn = timestamp;
    }
  }

  return config;
}
