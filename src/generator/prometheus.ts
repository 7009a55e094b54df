import { MissingRequiredFieldError } from '../errors.js';
import type { KamutDocument } from '../types/kamut.js';
import type { K8sManifest, GeneratedManifest } from '../types/k8s.js';
import {
  appLabels,
  namespaceField,
  resourceNames,
  sortedRecord,
} from '../utils/k8s-names.js';
import { buildResources } from './container.js';
import { identityEnabled } from './rbac.js';

export const DEFAULT_RETENTION = '15d';

// Matches the defaults the prometheus-operator documents for non-root pods.
const SECURITY_CONTEXT = {
  fsGroup: 2000,
  runAsNonRoot: true,
  runAsUser: 1000,
} as const;

/**
 * Generate a prometheus-operator Prometheus resource.
 */
export function generatePrometheus(doc: KamutDocument): GeneratedManifest {
  if (!doc.image) {
    throw new MissingRequiredFieldError('Prometheus', 'image', doc.name);
  }

  const resources = doc.resources ? buildResources(doc.resources) : {};

  const manifest: K8sManifest = {
    apiVersion: 'monitoring.coreos.com/v1',
    kind: 'Prometheus',
    metadata: {
      name: resourceNames.workload(doc.name),
      ...namespaceField(doc.namespace),
      labels: appLabels(doc.name),
    },
    spec: {
      image: doc.image,
      ...(doc.nodeSelector
        ? {
            nodeSelector: sortedRecord(doc.nodeSelector),
            tolerations: tolerationsFor(doc.nodeSelector),
          }
        : {}),
      podMetadata: { labels: appLabels(doc.name) },
      ...(doc.replicas != null ? { replicas: doc.replicas } : {}),
      ...(Object.keys(resources).length ? { resources } : {}),
      retention: doc.retention ?? DEFAULT_RETENTION,
      scrapeConfigNamespaceSelector: {},
      scrapeConfigSelector: { matchLabels: {} },
      securityContext: { ...SECURITY_CONTEXT },
      ...(identityEnabled(doc)
        ? { serviceAccountName: resourceNames.serviceAccount(doc.name) }
        : {}),
      ...(doc.storage
        ? {
            storage: {
              volumeClaimTemplate: {
                spec: {
                  resources: { requests: { storage: doc.storage.size } },
                  storageClassName: doc.storage.className,
                },
              },
            },
          }
        : {}),
    },
  };

  return {
    manifest,
    sourceName: doc.name,
    description: `Prometheus for ${doc.name}`,
  };
}

/**
 * One NoSchedule toleration per node selector entry, so the pods can land on
 * the tainted nodes they are pinned to.
 */
export function tolerationsFor(
  nodeSelector: Record<string, string>,
): Array<Record<string, string>> {
  return Object.entries(sortedRecord(nodeSelector)).map(([key, value]) => ({
    effect: 'NoSchedule',
    key,
    operator: 'Equal',
    value,
  }));
}
