import { MissingRequiredFieldError } from '../errors.js';
import type { KamutDocument } from '../types/kamut.js';
import type { K8sManifest, GeneratedManifest } from '../types/k8s.js';
import {
  appLabels,
  namespaceField,
  resourceNames,
  sortedRecord,
} from '../utils/k8s-names.js';
import { buildContainerSpec } from './container.js';

/**
 * Generate a Deployment manifest for a document.
 */
export function generateDeployment(doc: KamutDocument): GeneratedManifest {
  if (!doc.image) {
    throw new MissingRequiredFieldError('Deployment', 'image', doc.name);
  }

  const name = resourceNames.workload(doc.name);
  const labels = appLabels(doc.name);

  const container = buildContainerSpec(doc, doc.image);

  const manifest: K8sManifest = {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: {
      name,
      ...namespaceField(doc.namespace),
      labels,
    },
    spec: {
      ...(doc.replicas != null ? { replicas: doc.replicas } : {}),
      selector: { matchLabels: appLabels(doc.name) },
      template: {
        metadata: { labels: appLabels(doc.name) },
        spec: {
          containers: [container],
          ...(doc.nodeSelector ? { nodeSelector: sortedRecord(doc.nodeSelector) } : {}),
        },
      },
    },
  };

  return {
    manifest,
    sourceName: doc.name,
    description: `Deployment for ${doc.name}`,
  };
}
