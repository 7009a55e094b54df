import { describe, it, expect } from 'vitest';
import {
  generateForDocument,
  inferKind,
  resolveKind,
  type DispatchOptions,
} from '../../src/generator/index.js';
import { MissingKindError } from '../../src/errors.js';

const required: DispatchOptions = {
  source: { file: 'app.kamut.yaml', index: 2 },
  kindPolicy: 'required',
};
const infer: DispatchOptions = { ...required, kindPolicy: 'infer' };

describe('resolveKind', () => {
  it('recognizes supported kinds', () => {
    expect(resolveKind({ name: 'a', kind: 'Prometheus' }, required)).toEqual({
      type: 'known',
      kind: 'Prometheus',
      inferred: false,
    });
  });

  it('marks other kinds as unrecognized', () => {
    expect(resolveKind({ name: 'a', kind: 'UnknownKind' }, required)).toEqual({
      type: 'unrecognized',
      kind: 'UnknownKind',
    });
  });

  it('is case-sensitive', () => {
    expect(resolveKind({ name: 'a', kind: 'deployment' }, required).type).toBe('unrecognized');
  });

  it('throws MissingKindError when kind is required', () => {
    expect(() => resolveKind({ name: 'a', image: 'x:1' }, required)).toThrow(MissingKindError);
    expect(() => resolveKind({ name: 'a', image: 'x:1' }, required)).toThrow(
      "'kind' field is required in document 2 of app.kamut.yaml",
    );
  });

  it('infers the kind when allowed', () => {
    expect(resolveKind({ name: 'a', image: 'x:1' }, infer)).toEqual({
      type: 'known',
      kind: 'Deployment',
      inferred: true,
    });
  });

  it('throws when nothing can be inferred', () => {
    expect(() => resolveKind({ name: 'a' }, infer)).toThrow(MissingKindError);
  });
});

describe('inferKind', () => {
  it('prefers scrape fields, then monitoring fields, then image', () => {
    expect(inferKind({ name: 'a', image: 'x:1', role: 'pod' })).toBe('ScrapeConfig');
    expect(inferKind({ name: 'a', image: 'x:1', retention: '7d' })).toBe('Prometheus');
    expect(inferKind({ name: 'a', image: 'x:1', ingress: { host: 'h' } })).toBe('Prometheus');
    expect(inferKind({ name: 'a', image: 'x:1' })).toBe('Deployment');
    expect(inferKind({ name: 'a' })).toBeNull();
  });
});

describe('generateForDocument', () => {
  it('produces one manifest for a deployment', () => {
    const result = generateForDocument({ name: 'web', kind: 'Deployment', image: 'web:1' }, required);

    expect(result.warnings).toEqual([]);
    expect(result.manifests.map((m) => m.manifest.kind)).toEqual(['Deployment']);
  });

  it('fans a Prometheus document out in emission order', () => {
    const result = generateForDocument(
      {
        name: 'prom',
        kind: 'Prometheus',
        image: 'prom/prometheus:v2.42.0',
        ingress: { host: 'prom.example.com' },
        serviceAccount: { create: true, clusterRole: true },
      },
      required,
    );

    expect(result.manifests.map((m) => m.manifest.kind)).toEqual([
      'Prometheus',
      'Service',
      'Ingress',
      'ServiceAccount',
      'ClusterRole',
      'ClusterRoleBinding',
    ]);
  });

  it('describes each manifest by kind and source document', () => {
    const result = generateForDocument(
      { name: 'prom', kind: 'Prometheus', image: 'prom/prometheus:v2.42.0' },
      required,
    );

    expect(result.manifests.map((m) => m.description)).toEqual([
      'Prometheus for prom',
      'Service for prom',
    ]);
  });

  it('emits only Prometheus and Service for a minimal document', () => {
    const result = generateForDocument(
      { name: 'prom', kind: 'Prometheus', image: 'prom/prometheus:v2.42.0' },
      required,
    );

    expect(result.manifests.map((m) => m.manifest.kind)).toEqual(['Prometheus', 'Service']);
  });

  it('skips a document without an image with a warning', () => {
    const result = generateForDocument({ name: 'web', kind: 'Deployment' }, required);

    expect(result.manifests).toEqual([]);
    expect(result.warnings).toEqual([
      `Skipping document 2: Deployment "web" requires 'image' to be specified`,
    ]);
  });

  it('skips a scrape target without a role', () => {
    const result = generateForDocument({ name: 'api', kind: 'ScrapeConfig' }, required);

    expect(result.manifests).toEqual([]);
    expect(result.warnings).toHaveLength(1);
  });

  it('skips unsupported kinds with a warning', () => {
    const result = generateForDocument({ name: 'x', kind: 'UnknownKind', image: 'x:1' }, required);

    expect(result.manifests).toEqual([]);
    expect(result.warnings).toEqual([
      'Skipping document 2: Unsupported kind "UnknownKind" for "x"',
    ]);
  });

  it('notes an inferred kind', () => {
    const result = generateForDocument({ name: 'web', image: 'web:1' }, infer);

    expect(result.manifests).toHaveLength(1);
    expect(result.warnings).toEqual(['No kind in document 2; treating "web" as Deployment']);
  });

  it('propagates a missing kind', () => {
    expect(() => generateForDocument({ name: 'web', image: 'web:1' }, required)).toThrow(
      MissingKindError,
    );
  });
});
