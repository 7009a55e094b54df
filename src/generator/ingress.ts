import type { KamutDocument } from '../types/kamut.js';
import type { K8sManifest, GeneratedManifest } from '../types/k8s.js';
import { appLabels, namespaceField, resourceNames } from '../utils/k8s-names.js';
import { PROMETHEUS_PORT } from './service.js';

/**
 * Generate an Ingress routing `/` on the configured host to the Prometheus
 * Service. Returns null when the document has no `ingress` block.
 */
export function generateIngress(doc: KamutDocument): GeneratedManifest | null {
  if (!doc.ingress) return null;

  const manifest: K8sManifest = {
    apiVersion: 'networking.k8s.io/v1',
    kind: 'Ingress',
    metadata: {
      name: resourceNames.ingress(doc.name),
      ...namespaceField(doc.namespace),
      labels: appLabels(doc.name),
    },
    spec: {
      rules: [
        {
          host: doc.ingress.host,
          http: {
            paths: [
              {
                path: '/',
                pathType: 'Prefix',
                backend: {
                  service: {
                    name: resourceNames.service(doc.name),
                    port: { number: PROMETHEUS_PORT },
                  },
                },
              },
            ],
          },
        },
      ],
    },
  };

  return {
    manifest,
    sourceName: doc.name,
    description: `Ingress for ${doc.name}`,
  };
}
