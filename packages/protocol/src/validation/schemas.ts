// Schemas for everything that enters the engine from outside
//
// Declaration sources, player records and change records are produced by
// external parsers and log readers; they are checked here before the engine
// sees them.

import { z } from 'zod';
import type { DeclarationSource } from '../types/declarations.js';
import type { ChangeRecord } from '../types/events.js';
import type { PlayerRecord } from '../types/identity.js';
import { toInstant } from '../temporal/parse.js';

const nonEmpty = z.string().trim().min(1);

export const AttributeLineSchema = z.object({
  text: z.string(),
  continuation: z.array(z.string()).optional(),
});

export const EntityDeclarationSchema = z.object({
  name: nonEmpty,
  lines: z.array(AttributeLineSchema).default([]),
});

export const DeclarationSectionSchema = z.object({
  label: z.string(),
  entities: z.array(EntityDeclarationSchema).default([]),
});

export const DeclarationSourceSchema: z.ZodType<DeclarationSource, z.ZodTypeDef, unknown> = z.object({
  id: nonEmpty,
  sections: z.array(DeclarationSectionSchema),
});

export const PlayerRecordSchema: z.ZodType<PlayerRecord, z.ZodTypeDef, unknown> = z.object({
  name: nonEmpty,
  aliases: z.array(nonEmpty).default([]),
});

export const ChangeTagSchema = z.object({
  tag: nonEmpty,
  value: z.string(),
});

export const ChangeRecordSchema: z.ZodType<ChangeRecord, z.ZodTypeDef, unknown> = z.object({
  date: nonEmpty,
  target: nonEmpty,
  tags: z.array(ChangeTagSchema).min(1),
  source: z.string().optional(),
});

const instantSchema = z
  .union([z.string(), z.date()])
  .refine((value) => toInstant(value) !== null, { message: 'Invalid instant' });

export const EngineConfigSchema = z.object({
  minTokenLength: z.number().int().min(1).optional(),
  minStemLength: z.number().int().min(1).optional(),
  cacheResults: z.boolean().optional(),
  fuzzy: z.boolean().optional(),
  activeOn: instantSchema.optional(),
});

export const WorldManifestSchema = z.object({
  name: z.string().optional(),
  /**
   * Declaration source files, lowest precedence first
   */
  sources: z.array(nonEmpty).min(1),
  players: z.string().optional(),
  events: z.string().optional(),
  config: EngineConfigSchema.optional(),
});

export type WorldManifest = z.infer<typeof WorldManifestSchema>;
