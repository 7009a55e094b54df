import {
  MissingKindError,
  UnsupportedKindError,
  isRecoverable,
  type DocumentSource,
} from '../errors.js';
import {
  SUPPORTED_KINDS,
  type KamutDocument,
  type KindPolicy,
  type ResolvedKind,
  type SupportedKind,
} from '../types/kamut.js';
import type { DispatchResult, GeneratedManifest } from '../types/k8s.js';
import { generateDeployment } from './deployment.js';
import { generateIngress } from './ingress.js';
import { generatePrometheus } from './prometheus.js';
import { generateServiceAccount } from './rbac.js';
import { generateScrapeConfig } from './scrape-config.js';
import { generatePrometheusService } from './service.js';

export interface DispatchOptions {
  source: DocumentSource;
  kindPolicy: KindPolicy;
}

function isSupportedKind(kind: string): kind is SupportedKind {
  return SUPPORTED_KINDS.some((k) => k === kind);
}

/**
 * Guess the kind of a document from its populated fields.
 */
export function inferKind(doc: KamutDocument): SupportedKind | null {
  if (
    doc.role != null ||
    doc.metricsPath != null ||
    doc.scrapeInterval != null ||
    doc.scrapeTimeout != null ||
    doc.port != null
  ) {
    return 'ScrapeConfig';
  }
  if (
    doc.retention != null ||
    doc.storage != null ||
    doc.ingress != null ||
    doc.serviceAccount != null
  ) {
    return 'Prometheus';
  }
  if (doc.image != null) return 'Deployment';
  return null;
}

/**
 * Determine the effective kind of a document. A missing kind is fatal under
 * the `required` policy, and under `infer` when no kind can be inferred.
 */
export function resolveKind(doc: KamutDocument, options: DispatchOptions): ResolvedKind {
  if (doc.kind != null) {
    return isSupportedKind(doc.kind)
      ? { type: 'known', kind: doc.kind, inferred: false }
      : { type: 'unrecognized', kind: doc.kind };
  }

  if (options.kindPolicy === 'infer') {
    const inferred = inferKind(doc);
    if (inferred) return { type: 'known', kind: inferred, inferred: true };
  }

  throw new MissingKindError(options.source);
}

/**
 * Run the generators registered for a kind, in emission order.
 */
export function generateForKind(kind: SupportedKind, doc: KamutDocument): GeneratedManifest[] {
  switch (kind) {
    case 'Deployment':
      return [generateDeployment(doc)];
    case 'Prometheus': {
      const manifests = [generatePrometheus(doc), generatePrometheusService(doc)];
      const ingress = generateIngress(doc);
      if (ingress) manifests.push(ingress);
      manifests.push(...generateServiceAccount(doc));
      return manifests;
    }
    case 'ScrapeConfig':
      return [generateScrapeConfig(doc)];
    default: {
      const unreachable: never = kind;
      throw new Error(`Unhandled kind: ${String(unreachable)}`);
    }
  }
}

/**
 * Turn one document into its manifests. Documents that lack a field their kind
 * needs, or declare an unknown kind, produce a warning and no manifests.
 */
export function generateForDocument(
  doc: KamutDocument,
  options: DispatchOptions,
): DispatchResult {
  const warnings: string[] = [];
  const resolved = resolveKind(doc, options);
  const where = `document ${options.source.index}`;

  try {
    if (resolved.type === 'unrecognized') {
      throw new UnsupportedKindError(resolved.kind, doc.name);
    }
    if (resolved.inferred) {
      warnings.push(`No kind in ${where}; treating "${doc.name}" as ${resolved.kind}`);
    }
    return { manifests: generateForKind(resolved.kind, doc), warnings };
  } catch (err) {
    if (!isRecoverable(err)) throw err;
    warnings.push(`Skipping ${where}: ${err.message}`);
    return { manifests: [], warnings };
  }
}
