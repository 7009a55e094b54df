import { parse as parseYaml } from 'yaml';
import { ParseError, errorMessage, type DocumentSource } from '../errors.js';
import type { KamutDocument, SourceDocument } from '../types/kamut.js';
import { kamutDocumentSchema } from './schema.js';

const SEPARATOR = /^---[ \t]*\r?$/m;

/**
 * Split a multi-document file on `---` lines, dropping blank documents.
 */
export function splitDocuments(content: string): SourceDocument[] {
  const documents: SourceDocument[] = [];
  for (const text of content.split(SEPARATOR)) {
    if (!text.trim()) continue;
    documents.push({ index: documents.length + 1, text });
  }
  return documents;
}

/**
 * Parse and validate a single kamut document.
 */
export function parseDocument(text: string, source: DocumentSource): KamutDocument {
  const where = `document ${source.index} in ${source.file}`;

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new ParseError(
      `Failed to parse ${where}: ${errorMessage(err)}`,
      source,
    );
  }

  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ParseError(`Failed to parse ${where}: expected a mapping`, source);
  }

  const result = kamutDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new ParseError(
      `Invalid structure in ${where}:\n${issues.map((i) => `  - ${i}`).join('\n')}`,
      source,
      issues,
    );
  }

  return result.data;
}
