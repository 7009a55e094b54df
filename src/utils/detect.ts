import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { glob } from 'glob';

export const DEFAULT_PATTERN = '*.kamut.yaml';

export const SETTINGS_FILE_NAME = 'kamut.config.yaml';

/**
 * Expand a glob into the kamut files it matches, sorted so runs are reproducible.
 * Relative patterns resolve against the working directory.
 */
export async function findConfigFiles(pattern: string): Promise<string[]> {
  const files = await glob(pattern, { nodir: true });
  return files.sort();
}

/**
 * Build the pattern for `--name`: `<name>.kamut.yaml`.
 */
export function patternForName(name: string): string {
  return `${name}.kamut.yaml`;
}

/**
 * Find the project settings file in a directory.
 */
export function findSettingsFile(dir: string): string | null {
  const fullPath = resolve(dir, SETTINGS_FILE_NAME);
  return existsSync(fullPath) ? fullPath : null;
}
