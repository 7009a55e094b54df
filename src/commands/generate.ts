import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import * as p from '@clack/prompts';
import chalk from 'chalk';
import { FileIOError, errorMessage } from '../errors.js';
import { loadSettings } from '../config/loader.js';
import { parseDocument, splitDocuments } from '../parser/document.js';
import { generateForDocument } from '../generator/index.js';
import { outputPathFor, renderManifests, writeOutput } from '../output/index.js';
import { findConfigFiles, patternForName } from '../utils/detect.js';
import type { KindPolicy } from '../types/kamut.js';
import type { FileResult, GeneratedManifest } from '../types/k8s.js';

export interface GenerateOptions {
  name?: string;
  config?: string;
  inferKind?: boolean;
  dryRun?: boolean;
}

export interface ProcessOptions {
  kindPolicy: KindPolicy;
  dryRun?: boolean;
}

/**
 * Render every document of one kamut file and write the combined output next
 * to it. Nothing is written when the file yields no manifests. Parse errors
 * and missing kinds abort the file; documents that are merely incomplete are
 * skipped with a warning.
 */
export async function processFile(file: string, options: ProcessOptions): Promise<FileResult> {
  let content: string;
  try {
    content = await readFile(file, 'utf-8');
  } catch (err) {
    throw new FileIOError(`Failed to read file ${file}: ${errorMessage(err)}`, file, err);
  }

  const documents = splitDocuments(content);
  const manifests: GeneratedManifest[] = [];
  const warnings: string[] = [];

  for (const document of documents) {
    const source = { file, index: document.index };
    const doc = parseDocument(document.text, source);
    const result = generateForDocument(doc, { source, kindPolicy: options.kindPolicy });
    manifests.push(...result.manifests);
    warnings.push(...result.warnings);
  }

  if (manifests.length === 0) {
    return { file, documents: documents.length, manifests, warnings };
  }

  const outputPath = outputPathFor(file);
  if (resolve(outputPath) === resolve(file)) {
    throw new FileIOError(
      `Refusing to overwrite input file ${file}; rename it to end in .kamut.yaml`,
      file,
    );
  }
  const rendered = renderManifests(manifests);
  if (!options.dryRun) {
    await writeOutput(outputPath, rendered);
  }

  return { file, outputPath, documents: documents.length, manifests, warnings };
}

/**
 * Process every file matching the pattern in order, stopping at the first
 * file-level error.
 */
export async function generateFiles(
  pattern: string,
  options: ProcessOptions,
  onFile?: (result: FileResult) => void,
): Promise<FileResult[]> {
  const files = await findConfigFiles(pattern);
  const results: FileResult[] = [];
  for (const file of files) {
    const result = await processFile(file, options);
    onFile?.(result);
    results.push(result);
  }
  return results;
}

function reportFile(result: FileResult, dryRun: boolean): void {
  p.log.step(`Processing ${chalk.cyan(result.file)}`);

  if (result.documents === 0) {
    p.log.warn('No YAML documents found in file');
    return;
  }

  for (const w of result.warnings) {
    p.log.warn(w);
  }

  if (!result.outputPath) {
    p.log.info(`No manifests generated from ${result.documents} document(s)`);
    return;
  }

  const verb = dryRun ? 'Would write' : 'Saved';
  p.log.success(`${verb} ${result.manifests.length} manifest(s) to ${chalk.cyan(result.outputPath)}`);
  p.log.message(result.manifests.map((m) => `${chalk.dim('•')} ${m.description}`).join('\n'));
}

export async function generate(
  patternArg: string | undefined,
  options: GenerateOptions,
): Promise<void> {
  p.intro(chalk.bold('kamut'));

  try {
    const settings = await loadSettings(options.config);
    const pattern = options.name ? patternForName(options.name) : patternArg ?? settings.pattern;
    const kindPolicy: KindPolicy = options.inferKind ? 'infer' : settings.kindPolicy;
    const dryRun = options.dryRun ?? false;

    const results = await generateFiles(pattern, { kindPolicy, dryRun }, (r) =>
      reportFile(r, dryRun),
    );

    if (results.length === 0) {
      p.outro(`No files matching ${chalk.bold(pattern)} found`);
      return;
    }

    const written = results.filter((r) => r.outputPath).length;
    p.outro(chalk.green(`Processed ${results.length} file(s), ${written} output file(s)${dryRun ? ' (dry run)' : ''}`));
  } catch (err) {
    p.log.error(errorMessage(err));
    process.exit(1);
  }
}
