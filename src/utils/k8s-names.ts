/**
 * Names of the objects derived from a kamut document.
 *
 * Pod-facing objects of a Prometheus (its Service and ServiceAccount) use the
 * operator's `prometheus-<name>` prefix; auxiliary objects take a suffix.
 */
export const resourceNames = {
  workload: (name: string) => name,
  service: (name: string) => `prometheus-${name}`,
  serviceAccount: (name: string) => `prometheus-${name}`,
  ingress: (name: string) => `${name}-ingress`,
  clusterRole: (name: string) => `${name}-role`,
  clusterRoleBinding: (name: string) => `${name}-role-binding`,
} as const;

/**
 * Labels every generated object carries.
 */
export function appLabels(name: string): Record<string, string> {
  return { app: name };
}

/**
 * Label the prometheus-operator puts on the pods of a Prometheus.
 */
export function prometheusSelectorLabels(name: string): Record<string, string> {
  return { prometheus: name };
}

/**
 * Copy a map with its keys in lexicographic order so rendered output is stable.
 */
export function sortedRecord<T>(record: Record<string, T>): Record<string, T> {
  const result: Record<string, T> = {};
  for (const key of Object.keys(record).sort()) {
    result[key] = record[key];
  }
  return result;
}

/**
 * Metadata namespace field, omitted when the document sets none.
 */
export function namespaceField(namespace: string | undefined): { namespace?: string } {
  return namespace ? { namespace } : {};
}
