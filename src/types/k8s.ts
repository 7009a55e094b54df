export interface K8sMetadata {
  name: string;
  namespace?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
}

export interface K8sManifest {
  apiVersion: string;
  kind: string;
  metadata: K8sMetadata;
  spec?: Record<string, unknown>;
  [key: string]: unknown;
}

export interface GeneratedManifest {
  manifest: K8sManifest;
  /** Name of the kamut document the manifest was rendered from. */
  sourceName: string;
  description: string;
}

export interface DispatchResult {
  manifests: GeneratedManifest[];
  warnings: string[];
}

export interface FileResult {
  file: string;
  /** Set when an output file was (or, in dry-run mode, would be) written. */
  outputPath?: string;
  documents: number;
  manifests: GeneratedManifest[];
  warnings: string[];
}
