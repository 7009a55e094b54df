import { stringify } from 'yaml';
import { SerializationError, errorMessage } from '../errors.js';
import type { K8sManifest } from '../types/k8s.js';

export const DOCUMENT_SEPARATOR = '---';

/**
 * Serialize a K8s manifest to YAML with proper ordering.
 */
export function manifestToYaml(manifest: K8sManifest): string {
  // Enforce K8s key ordering
  const ordered: Record<string, unknown> = {};
  const keyOrder = ['apiVersion', 'kind', 'metadata', 'spec'];

  for (const key of keyOrder) {
    if (key in manifest && manifest[key] !== undefined) {
      ordered[key] = manifest[key];
    }
  }

  // Add any remaining keys
  for (const [key, value] of Object.entries(manifest)) {
    if (!(key in ordered) && value !== undefined) {
      ordered[key] = value;
    }
  }

  try {
    return stringify(ordered, {
      indent: 2,
      lineWidth: 0,
      defaultStringType: 'PLAIN',
      defaultKeyType: 'PLAIN',
      nullStr: '',
      // Generators share constant arrays; never emit anchors for them.
      aliasDuplicateObjects: false,
    });
  } catch (err) {
    throw new SerializationError(
      `Failed to serialize ${manifest.kind} "${manifest.metadata.name}" to YAML: ${errorMessage(err)}`,
      manifest.kind,
      err,
    );
  }
}

/**
 * Join rendered documents with `---` separator lines.
 */
export function joinDocuments(documents: string[]): string {
  return documents
    .map((doc) => (doc.endsWith('\n') ? doc : `${doc}\n`))
    .join(`${DOCUMENT_SEPARATOR}\n`);
}
