/**
 * Manual Structure
 * Ordered sections and chapters that sub-questions are anchored to
 */

import * as fs from 'fs';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors/retrieval-errors';
import bundledStructure from './manual-structure.json';

export const MANUAL_STRUCTURE = 'MANUAL_STRUCTURE';

export const manualSectionSchema = z.object({
  section: z.number().int().positive(),
  title: z.string().min(1),
  chapters: z.array(z.string().min(1)),
});

export const manualStructureSchema = z.array(manualSectionSchema).min(1);

export type ManualSection = z.infer<typeof manualSectionSchema>;
export type ManualStructure = ManualSection[];

function parseStructure(raw: unknown, source: string): ManualStructure {
  const parsed = manualStructureSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`manual structure in ${source} is invalid: ${parsed.error.message}`);
  }
  return parsed.data;
}

/**
 * Reads the structure from `path` when given, otherwise uses the bundled one
 */
export function loadManualStructure(path?: string): ManualStructure {
  if (!path) {
    return parseStructure(bundledStructure, 'manual-structure.json');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`cannot read manual structure from ${path}: ${errorMessage(error)}`);
  }
  return parseStructure(raw, path);
}
