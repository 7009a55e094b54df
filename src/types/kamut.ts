export interface ResourceQuantities {
  cpu?: string;
  memory?: string;
}

export interface ResourceRequirements {
  requests?: ResourceQuantities;
  limits?: ResourceQuantities;
}

export interface StorageConfig {
  size: string;
  className: string;
}

export interface IngressConfig {
  host: string;
}

export interface ServiceAccountConfig {
  create: boolean;
  annotations?: Record<string, string>;
  clusterRole: boolean;
}

/**
 * One parsed input document. Everything except `name` may be absent.
 */
export interface KamutDocument {
  name: string;
  kind?: string;
  namespace?: string;
  image?: string;
  env?: Record<string, string>;
  resources?: ResourceRequirements;
  storage?: StorageConfig;
  nodeSelector?: Record<string, string>;
  replicas?: number;
  retention?: string;
  ingress?: IngressConfig;
  serviceAccount?: ServiceAccountConfig;
  role?: string;
  scrapeInterval?: string;
  scrapeTimeout?: string;
  metricsPath?: string;
  labels?: Record<string, string>;
  port?: string | number;
}

export type SupportedKind = 'Deployment' | 'Prometheus' | 'ScrapeConfig';

export const SUPPORTED_KINDS: readonly SupportedKind[] = [
  'Deployment',
  'Prometheus',
  'ScrapeConfig',
];

export type ResolvedKind =
  | { type: 'known'; kind: SupportedKind; inferred: boolean }
  | { type: 'unrecognized'; kind: string };

export type KindPolicy = 'required' | 'infer';

export interface SourceDocument {
  /** 1-based position among the non-empty documents of the file. */
  index: number;
  text: string;
}
