import type { KamutDocument, ResourceQuantities, ResourceRequirements } from '../types/kamut.js';
import { resourceNames, sortedRecord } from '../utils/k8s-names.js';

/**
 * Build the single container of a Deployment.
 */
export function buildContainerSpec(
  doc: KamutDocument,
  image: string,
): Record<string, unknown> {
  const env = doc.env
    ? Object.entries(sortedRecord(doc.env)).map(([name, value]) => ({ name, value }))
    : [];

  const resources = doc.resources ? buildResources(doc.resources) : {};

  return {
    name: resourceNames.workload(doc.name),
    image,
    ...(env.length ? { env } : {}),
    ...(Object.keys(resources).length ? { resources } : {}),
  };
}

/**
 * Map requests/limits to a Kubernetes resources block. Quantities are passed
 * through as written; empty sections are omitted.
 */
export function buildResources(
  resources: ResourceRequirements,
): Record<string, Record<string, string>> {
  const result: Record<string, Record<string, string>> = {};

  const limits = quantities(resources.limits);
  if (limits) result.limits = limits;

  const requests = quantities(resources.requests);
  if (requests) result.requests = requests;

  return result;
}

function quantities(spec: ResourceQuantities | undefined): Record<string, string> | null {
  if (!spec) return null;
  const result: Record<string, string> = {
    ...(spec.cpu ? { cpu: spec.cpu } : {}),
    ...(spec.memory ? { memory: spec.memory } : {}),
  };
  return Object.keys(result).length ? result : null;
}
