import type { KamutDocument } from '../types/kamut.js';
import type { K8sManifest, GeneratedManifest } from '../types/k8s.js';
import {
  appLabels,
  namespaceField,
  resourceNames,
  sortedRecord,
} from '../utils/k8s-names.js';

const RBAC_API_GROUP = 'rbac.authorization.k8s.io';
const READ_VERBS = ['get', 'list', 'watch'];

// Read access Prometheus needs for Kubernetes service discovery.
const PROMETHEUS_RULES = [
  {
    apiGroups: [''],
    resources: ['nodes', 'nodes/proxy', 'services', 'endpoints', 'pods'],
    verbs: READ_VERBS,
  },
  { apiGroups: ['extensions'], resources: ['ingresses'], verbs: READ_VERBS },
  { apiGroups: ['networking.k8s.io'], resources: ['ingresses'], verbs: READ_VERBS },
  { nonResourceURLs: ['/metrics'], verbs: ['get'] },
];

/**
 * Whether a ServiceAccount is created for the document. Requires an explicit
 * `serviceAccount` block; `create` defaults to true inside it.
 */
export function identityEnabled(doc: KamutDocument): boolean {
  return doc.serviceAccount?.create ?? false;
}

/**
 * Generate the ServiceAccount and, unless disabled, the ClusterRole and
 * ClusterRoleBinding granting it discovery access. Returns them in that order.
 */
export function generateServiceAccount(doc: KamutDocument): GeneratedManifest[] {
  const sa = doc.serviceAccount;
  if (!sa || !sa.create) return [];

  const saName = resourceNames.serviceAccount(doc.name);
  const roleName = resourceNames.clusterRole(doc.name);
  const labels = appLabels(doc.name);

  const serviceAccount: K8sManifest = {
    apiVersion: 'v1',
    kind: 'ServiceAccount',
    automountServiceAccountToken: true,
    metadata: {
      ...(sa.annotations && Object.keys(sa.annotations).length
        ? { annotations: sortedRecord(sa.annotations) }
        : {}),
      labels,
      name: saName,
      ...namespaceField(doc.namespace),
    },
  };

  const manifests: GeneratedManifest[] = [
    {
      manifest: serviceAccount,
      sourceName: doc.name,
      description: `ServiceAccount for ${doc.name}`,
    },
  ];

  if (!sa.clusterRole) return manifests;

  const clusterRole: K8sManifest = {
    apiVersion: `${RBAC_API_GROUP}/v1`,
    kind: 'ClusterRole',
    metadata: { labels: appLabels(doc.name), name: roleName },
    rules: PROMETHEUS_RULES.map((rule) => ({ ...rule })),
  };

  const clusterRoleBinding: K8sManifest = {
    apiVersion: `${RBAC_API_GROUP}/v1`,
    kind: 'ClusterRoleBinding',
    metadata: {
      labels: appLabels(doc.name),
      name: resourceNames.clusterRoleBinding(doc.name),
    },
    roleRef: {
      apiGroup: RBAC_API_GROUP,
      kind: 'ClusterRole',
      name: roleName,
    },
    subjects: [
      {
        kind: 'ServiceAccount',
        name: saName,
        namespace: doc.namespace ?? 'default',
      },
    ],
  };

  manifests.push(
    {
      manifest: clusterRole,
      sourceName: doc.name,
      description: `ClusterRole for ${doc.name}`,
    },
    {
      manifest: clusterRoleBinding,
      sourceName: doc.name,
      description: `ClusterRoleBinding for ${doc.name}`,
    },
  );

  return manifests;
}
