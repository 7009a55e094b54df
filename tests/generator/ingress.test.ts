import { describe, it, expect } from 'vitest';
import { generateIngress } from '../../src/generator/ingress.js';

describe('generateIngress', () => {
  it('returns null without an ingress block', () => {
    expect(generateIngress({ name: 'test-prometheus' })).toBeNull();
  });

  it('routes / on the host to the prometheus service', () => {
    const result = generateIngress({
      name: 'test-prometheus',
      namespace: 'monitoring',
      ingress: { host: 'test.example.com' },
    });

    expect(result).not.toBeNull();
    expect(result!.manifest.apiVersion).toBe('networking.k8s.io/v1');
    expect(result!.manifest.kind).toBe('Ingress');
    expect(result!.manifest.metadata).toEqual({
      name: 'test-prometheus-ingress',
      namespace: 'monitoring',
      labels: { app: 'test-prometheus' },
    });
    expect(result!.manifest.spec).toEqual({
      rules: [
        {
          host: 'test.example.com',
          http: {
            paths: [
              {
                path: '/',
                pathType: 'Prefix',
                backend: {
                  service: {
                    name: 'prometheus-test-prometheus',
                    port: { number: 9090 },
                  },
                },
              },
            ],
          },
        },
      ],
    });
  });
});
