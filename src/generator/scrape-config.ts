import { MissingRequiredFieldError } from '../errors.js';
import type { KamutDocument } from '../types/kamut.js';
import type { K8sManifest, GeneratedManifest } from '../types/k8s.js';
import {
  appLabels,
  namespaceField,
  resourceNames,
  sortedRecord,
} from '../utils/k8s-names.js';

export const DISCOVERY_ROLES = [
  'Pod',
  'Service',
  'Endpoints',
  'EndpointSlice',
  'Node',
  'Ingress',
] as const;

export type DiscoveryRole = (typeof DISCOVERY_ROLES)[number];

export const DEFAULT_DISCOVERY_ROLE: DiscoveryRole = 'Pod';

const TERMINAL_POD_PHASES = 'Pending|Succeeded|Failed|Completed';

export interface RelabelConfig {
  action: 'keep' | 'drop' | 'replace';
  sourceLabels: string[];
  regex?: string;
  targetLabel?: string;
}

/**
 * Parse a discovery role case-insensitively, falling back to `Pod`.
 */
export function parseDiscoveryRole(value: string): DiscoveryRole {
  const wanted = value.trim().toLowerCase();
  return DISCOVERY_ROLES.find((role) => role.toLowerCase() === wanted) ?? DEFAULT_DISCOVERY_ROLE;
}

/**
 * Keep the first whitespace-delimited token, so `30s # twice a minute` becomes `30s`.
 */
export function sanitizeDuration(value: string | undefined): string | undefined {
  if (value == null) return undefined;
  const [token] = value.trim().split(/\s+/);
  return token ? token : undefined;
}

/**
 * Relabeling rules applied to discovered targets. Order matters: Prometheus
 * evaluates them top to bottom.
 */
export function buildRelabelings(
  name: string,
  port: string | number | undefined,
): RelabelConfig[] {
  const rules: RelabelConfig[] = [
    {
      action: 'keep',
      sourceLabels: ['__meta_kubernetes_pod_label_app'],
      regex: name,
    },
    {
      action: 'replace',
      sourceLabels: ['__meta_kubernetes_pod_name'],
      targetLabel: 'pod',
    },
  ];

  if (port != null && String(port).trim() !== '') {
    const value = String(port).trim();
    const byNumber = /^\d+$/.test(value);
    rules.push({
      action: 'keep',
      sourceLabels: [
        byNumber
          ? '__meta_kubernetes_pod_container_port_number'
          : '__meta_kubernetes_pod_container_port_name',
      ],
      regex: value,
    });
  }

  rules.push({
    action: 'drop',
    sourceLabels: ['__meta_kubernetes_pod_phase'],
    regex: TERMINAL_POD_PHASES,
  });

  return rules;
}

/**
 * Generate a prometheus-operator ScrapeConfig using Kubernetes service discovery.
 */
export function generateScrapeConfig(doc: KamutDocument): GeneratedManifest {
  if (!doc.role) {
    throw new MissingRequiredFieldError('ScrapeConfig', 'role', doc.name);
  }

  const scrapeInterval = sanitizeDuration(doc.scrapeInterval);
  const scrapeTimeout = sanitizeDuration(doc.scrapeTimeout);

  const sdConfig = {
    role: parseDiscoveryRole(doc.role),
    ...(doc.namespace ? { namespaces: { names: [doc.namespace] } } : {}),
  };

  const manifest: K8sManifest = {
    apiVersion: 'monitoring.coreos.com/v1alpha1',
    kind: 'ScrapeConfig',
    metadata: {
      name: resourceNames.workload(doc.name),
      ...namespaceField(doc.namespace),
      labels: sortedRecord({ ...appLabels(doc.name), ...doc.labels }),
    },
    spec: {
      jobName: doc.name,
      ...(scrapeInterval ? { scrapeInterval } : {}),
      ...(scrapeTimeout ? { scrapeTimeout } : {}),
      ...(doc.metricsPath ? { metricsPath: doc.metricsPath } : {}),
      kubernetesSDConfigs: [sdConfig],
      relabelings: buildRelabelings(doc.name, doc.port),
    },
  };

  return {
    manifest,
    sourceName: doc.name,
    description: `ScrapeConfig for ${doc.name}`,
  };
}
