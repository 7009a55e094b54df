import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { FileIOError, ParseError, errorMessage } from '../errors.js';
import { findSettingsFile } from '../utils/detect.js';
import { settingsSchema, type Settings } from './schema.js';

/**
 * Load project settings. An explicit path must exist; otherwise
 * `kamut.config.yaml` in `cwd` is used when present, else the defaults.
 */
export async function loadSettings(
  explicitPath: string | undefined,
  cwd: string = process.cwd(),
): Promise<Settings> {
  const path = explicitPath ?? findSettingsFile(cwd);
  if (!path) return settingsSchema.parse({});

  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new FileIOError(`Failed to read settings file ${path}: ${errorMessage(err)}`, path, err);
  }

  const source = { file: path, index: 1 };
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ParseError(`Failed to parse settings file ${path}: ${errorMessage(err)}`, source);
  }

  const result = settingsSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ParseError(
      `Invalid settings file ${path}:\n${issues.map((i) => `  - ${i}`).join('\n')}`,
      source,
      issues,
    );
  }
  return result.data;
}
