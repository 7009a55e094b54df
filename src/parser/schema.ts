import { z } from 'zod';

// YAML turns `PORT: 8080` or `cpu: 1` into numbers; keep them as the text the user wrote.
const scalarString = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((v) => String(v));

const stringMap = z.record(z.string(), scalarString);

// A key left blank (`image:`) or set to `~` parses as null; treat it as unset.
function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((v) => v ?? undefined);
}

const resourceSpecSchema = z.object({
  cpu: optional(scalarString),
  memory: optional(scalarString),
});

const resourcesSchema = z.object({
  requests: optional(resourceSpecSchema),
  limits: optional(resourceSpecSchema),
});

const storageSchema = z.object({
  size: scalarString,
  className: z.string(),
});

const ingressSchema = z.object({
  host: z.string().min(1),
});

const enabledByDefault = z
  .boolean()
  .nullish()
  .transform((v) => v ?? true);

const serviceAccountSchema = z.object({
  create: enabledByDefault,
  annotations: optional(stringMap),
  clusterRole: enabledByDefault,
});

/**
 * One kamut document. Unknown keys are stripped rather than rejected.
 */
export const kamutDocumentSchema = z.object({
  name: z.string().min(1),
  kind: optional(z.string()),
  namespace: optional(z.string()),
  image: optional(z.string()),
  env: optional(z.record(z.string(), z.union([scalarString, z.null().transform(() => '')]))),
  resources: optional(resourcesSchema),
  storage: optional(storageSchema),
  nodeSelector: optional(stringMap),
  replicas: optional(z.number().int().min(0)),
  retention: optional(scalarString),
  ingress: optional(ingressSchema),
  serviceAccount: optional(serviceAccountSchema),

  // ScrapeConfig
  role: optional(z.string()),
  scrapeInterval: optional(scalarString),
  scrapeTimeout: optional(scalarString),
  metricsPath: optional(z.string()),
  labels: optional(stringMap),
  port: optional(z.union([z.string(), z.number().int()])),
});
