/**
 * Loading and validation of the brush input file
 */

import { z } from 'zod';
import json5 from 'json5';
import { logger } from '@brushgen/logger';
import { isValidBrushName, MIN_NAME_SEGMENTS } from './brush-name.js';
import { InvalidBrushInputError, BrushInputNotFoundError } from './errors.js';
import { fileResourceIO, isNotFound, type ResourceIO } from './resource-io.js';
import type { BrushRecord } from './types.js';

const log = logger.source;

/**
 * Zod schema for the per-theme values
 */
const ThemeValuesSchema = z.object({
  light: z.string(),
  dark: z.string(),
});

/**
 * Zod schema for a single brush entry
 */
export const BrushRecordSchema = z.object({
  name: z.string().refine(isValidBrushName, {
    message: `Brush name must have at least ${MIN_NAME_SEGMENTS} dot-separated segments`,
  }),
  themeValues: ThemeValuesSchema,
  alternateKeys: z.array(z.string()).nullish(),
  obsoleteKeys: z.array(z.string()).nullish(),
});

export const BrushFileSchema = z.array(BrushRecordSchema);

function freezeRecord(entry: z.infer<typeof BrushRecordSchema>): BrushRecord {
  const record: BrushRecord = {
    name: entry.name,
    themeValues: Object.freeze({ light: entry.themeValues.light, dark: entry.themeValues.dark }),
    ...(entry.alternateKeys ? { alternateKeys: Object.freeze([...entry.alternateKeys]) } : {}),
    ...(entry.obsoleteKeys ? { obsoleteKeys: Object.freeze([...entry.obsoleteKeys]) } : {}),
  };
  return Object.freeze(record);
}

/**
 * Parse and validate brush input text.
 *
 * Names are checked up front, so a malformed name fails here with the file
 * name attached rather than later while emitting.
 *
 * @param text Raw file contents
 * @param source Label used in error messages (usually the file path)
 */
export function parseBrushes(text: string, source: string = '<input>'): BrushRecord[] {
  let data: unknown;
  try {
    data = json5.parse(text);
  } catch (error) {
    throw new InvalidBrushInputError(
      source,
      `could not parse: ${error instanceof Error ? error.message : String(error)}`,
      [],
      { cause: error }
    );
  }

  if (data === null || data === undefined) {
    throw new InvalidBrushInputError(source, 'Did not find brushes from source file');
  }

  const result = BrushFileSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    log.error(`Validation error in ${source}:`, issues);
    throw new InvalidBrushInputError(source, issues[0] ?? result.error.message, issues, { cause: result.error });
  }

  if (result.data.length === 0) {
    throw new InvalidBrushInputError(source, 'Did not find brushes from source file');
  }

  return result.data.map(freezeRecord);
}

/**
 * Read and validate the brush input file
 */
export async function loadBrushes(path: string, io: ResourceIO = fileResourceIO): Promise<BrushRecord[]> {
  let text: string;
  try {
    text = await io.read(path);
  } catch (error) {
    if (isNotFound(error)) {
      throw new BrushInputNotFoundError(path);
    }
    throw error;
  }

  const brushes = parseBrushes(text, path);
  log.debug(`Loaded ${brushes.length} brushes from ${path}`);
  return brushes;
}

/**
 * Ordinal comparison of brush names (UTF-16 code units, culture independent)
 */
export function compareBrushNames(a: BrushRecord, b: BrushRecord): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * New array sorted by name. The sort is stable, so duplicates keep input order.
 */
export function sortBrushes(brushes: readonly BrushRecord[]): BrushRecord[] {
  return [...brushes].sort(compareBrushNames);
}

/**
 * Drop the sentinel brush that only belongs in the theme dictionaries
 */
export function withoutIgnored(brushes: readonly BrushRecord[], ignoredName: string): BrushRecord[] {
  return brushes.filter(brush => brush.name !== ignoredName);
}
