import { readFile } from 'node:fs/promises';

import { createConfigurationError } from './errors.js';

export function parseSeedList(contents: string): string[] {
  return contents
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/** Seed URLs, one per line. A missing or empty file stops the run. */
export async function loadSeeds(path: string): Promise<string[]> {
  let contents: string;
  try {
    contents = await readFile(path, 'utf8');
  } catch (error) {
    throw createConfigurationError(`Seed file not found or unreadable: ${path}`, { path }, { cause: error });
  }

  const seeds = parseSeedList(contents);
  if (seeds.length === 0) {
    throw createConfigurationError(`No seeds found in ${path}`, { path });
  }

  return seeds;
}
