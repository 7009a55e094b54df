import { describe, it, expect } from 'vitest';
import { generatePrometheusService } from '../../src/generator/service.js';

describe('generatePrometheusService', () => {
  it('generates a ClusterIP service on port 9090', () => {
    const result = generatePrometheusService({ name: 'prometheus-self', namespace: 'monitoring' });

    expect(result.manifest.apiVersion).toBe('v1');
    expect(result.manifest.kind).toBe('Service');
    expect(result.manifest.metadata).toEqual({
      name: 'prometheus-prometheus-self',
      namespace: 'monitoring',
      labels: { app: 'prometheus-self' },
    });
    expect(result.manifest.spec).toEqual({
      ports: [{ name: 'web', port: 9090, protocol: 'TCP', targetPort: 9090 }],
      selector: { prometheus: 'prometheus-self' },
      type: 'ClusterIP',
    });
  });

  it('omits the namespace when the document has none', () => {
    const result = generatePrometheusService({ name: 'prom' });

    expect(result.manifest.metadata).not.toHaveProperty('namespace');
  });
});
