import type { KamutDocument } from '../types/kamut.js';
import type { K8sManifest, GeneratedManifest } from '../types/k8s.js';
import {
  appLabels,
  namespaceField,
  prometheusSelectorLabels,
  resourceNames,
} from '../utils/k8s-names.js';

export const PROMETHEUS_PORT = 9090;

/**
 * Generate the ClusterIP Service exposing a Prometheus web port.
 */
export function generatePrometheusService(doc: KamutDocument): GeneratedManifest {
  const manifest: K8sManifest = {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: {
      name: resourceNames.service(doc.name),
      ...namespaceField(doc.namespace),
      labels: appLabels(doc.name),
    },
    spec: {
      ports: [
        {
          name: 'web',
          port: PROMETHEUS_PORT,
          protocol: 'TCP',
          targetPort: PROMETHEUS_PORT,
        },
      ],
      selector: prometheusSelectorLabels(doc.name),
      type: 'ClusterIP',
    },
  };

  return {
    manifest,
    sourceName: doc.name,
    description: `Service for ${doc.name}`,
  };
}
