import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import JSON5 from 'json5';
import type { z } from 'zod';

const DATA_DIR = new URL('../../data/', import.meta.url);

export const dataFilePath = (filename: string): string => fileURLToPath(new URL(filename, DATA_DIR));

/** Reads a JSON5 file from `data/` and validates it; throws with the file name on either failure. */
export const readDataFile = <S extends z.ZodTypeAny>(filename: string, schema: S): z.output<S> => {
  const target = dataFilePath(filename);
  let raw: unknown;
  try {
    raw = JSON5.parse(fs.readFileSync(target, 'utf-8'));
  } catch (error) {
    throw new Error(`Failed to read data file ${filename}: ${error instanceof Error ? error.message : String(error)}`);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid data file ${filename}: ${parsed.error.message}`);
  }
  return parsed.data;
};
