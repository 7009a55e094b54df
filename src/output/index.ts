import { writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { FileIOError, errorMessage } from '../errors.js';
import type { GeneratedManifest } from '../types/k8s.js';
import { joinDocuments, manifestToYaml } from '../utils/yaml.js';

const KAMUT_SUFFIXES = ['.kamut.yaml', '-kamut.yaml', '.kamut.yml', '-kamut.yml'];

/**
 * Output file for an input file: same directory, kamut suffix replaced by `.yaml`.
 * `api.kamut.yaml` and `api-kamut.yaml` both become `api.yaml`.
 */
export function outputPathFor(inputFile: string): string {
  const fileName = basename(inputFile);
  const suffix = KAMUT_SUFFIXES.find((s) => fileName.endsWith(s) && fileName.length > s.length);

  let base: string;
  if (suffix) {
    base = fileName.slice(0, -suffix.length);
  } else {
    const dot = fileName.indexOf('.');
    base = dot > 0 ? fileName.slice(0, dot) : fileName;
  }

  return join(dirname(inputFile), `${base}.yaml`);
}

/**
 * Render manifests into one multi-document YAML string.
 */
export function renderManifests(manifests: GeneratedManifest[]): string {
  return joinDocuments(manifests.map((gm) => manifestToYaml(gm.manifest)));
}

/**
 * Write rendered manifests to a single multi-document YAML file.
 */
export async function writeOutput(outputPath: string, content: string): Promise<void> {
  try {
    await writeFile(outputPath, content, 'utf-8');
  } catch (err) {
    throw new FileIOError(
      `Failed to write to file ${outputPath}: ${errorMessage(err)}`,
      outputPath,
      err,
    );
  }
}
