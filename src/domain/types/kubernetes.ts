/**
 * Kubernetes Manifest Types
 *
 * Zod schemas for the resource shapes kube-rollout reads and writes. Unknown
 * top-level and spec fields pass through so manifests round-trip untouched.
 */

import { z } from 'zod';

const DNS_SUBDOMAIN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?(\.[a-z0-9]([-a-z0-9]*[a-z0-9])?)*$/;
const DNS_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

const labelMap = z.record(z.string());

export const ManifestMetadataSchema = z.object({
  name: z
    .string()
    .min(1, 'name is required')
    .max(253, 'name must be at most 253 characters')
    .regex(DNS_SUBDOMAIN, 'name must be a lowercase RFC 1123 subdomain'),
  namespace: z
    .string()
    .max(63)
    .regex(DNS_LABEL, 'namespace must be a lowercase RFC 1123 label')
    .optional(),
  labels: labelMap.optional(),
  annotations: labelMap.optional(),
  resourceVersion: z.string().optional(),
  uid: z.string().optional(),
  generation: z.number().int().optional(),
});

export const KubernetesManifestSchema = z
  .object({
    apiVersion: z.string().min(1, 'apiVersion is required'),
    kind: z.string().min(1, 'kind is required'),
    metadata: ManifestMetadataSchema,
  })
  .passthrough();

const ContainerSchema = z
  .object({
    name: z.string().min(1),
    image: z.string().min(1),
  })
  .passthrough();

const PodTemplateSchema = z
  .object({
    metadata: z
      .object({
        labels: labelMap,
        annotations: labelMap.optional(),
      })
      .passthrough(),
    spec: z
      .object({
        containers: z.array(ContainerSchema).min(1, 'at least one container is required'),
      })
      .passthrough(),
  })
  .passthrough();

export const DeploymentSchema = KubernetesManifestSchema.extend({
  kind: z.literal('Deployment'),
  spec: z
    .object({
      replicas: z.number().int().min(0).optional(),
      selector: z
        .object({
          matchLabels: labelMap.refine((labels) => Object.keys(labels).length > 0, {
            message: 'matchLabels must not be empty',
          }),
        })
        .passthrough(),
      template: PodTemplateSchema,
    })
    .passthrough(),
}).superRefine((deployment, ctx) => {
  const templateLabels = deployment.spec.template.metadata.labels;
  for (const [key, value] of Object.entries(deployment.spec.selector.matchLabels)) {
    if (templateLabels[key] !== value) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['spec', 'template', 'metadata', 'labels', key],
        message: `selector label ${key}=${value} is missing from the pod template`,
      });
    }
  }
});

const ServicePortSchema = z
  .object({
    name: z.string().optional(),
    port: z.number().int().min(1).max(65535),
    targetPort: z.union([z.number().int(), z.string()]).optional(),
    nodePort: z.number().int().optional(),
    protocol: z.string().optional(),
  })
  .passthrough();

export const ServiceSchema = KubernetesManifestSchema.extend({
  kind: z.literal('Service'),
  spec: z
    .object({
      type: z.string().optional(),
      clusterIP: z.string().optional(),
      clusterIPs: z.array(z.string()).optional(),
      selector: labelMap.optional(),
      ports: z.array(ServicePortSchema).min(1, 'at least one port is required'),
    })
    .passthrough(),
});

export const ConfigMapSchema = KubernetesManifestSchema.extend({
  kind: z.literal('ConfigMap'),
  data: labelMap.optional(),
  binaryData: labelMap.optional(),
});

export const SecretSchema = KubernetesManifestSchema.extend({
  kind: z.literal('Secret'),
  type: z.string().optional(),
  data: z
    .record(
      z.string().refine((value) => value.length % 4 === 0 && BASE64.test(value), {
        message: 'must be base64 encoded',
      }),
    )
    .optional(),
  stringData: labelMap.optional(),
});

export const IngressSchema = KubernetesManifestSchema.extend({
  kind: z.literal('Ingress'),
  spec: z
    .object({
      ingressClassName: z.string().optional(),
      defaultBackend: z.record(z.unknown()).optional(),
      rules: z.array(z.record(z.unknown())).optional(),
      tls: z.array(z.record(z.unknown())).optional(),
    })
    .passthrough()
    .refine((spec) => spec.defaultBackend !== undefined || (spec.rules?.length ?? 0) > 0, {
      message: 'spec.rules or spec.defaultBackend is required',
    }),
});

const RouteDestinationSchema = z
  .object({
    destination: z
      .object({
        host: z.string().min(1),
        subset: z.string().optional(),
        port: z.object({ number: z.number().int() }).passthrough().optional(),
      })
      .passthrough(),
    weight: z.number().int().min(0).max(100).optional(),
  })
  .passthrough();

const HttpRouteSchema = z
  .object({
    name: z.string().optional(),
    route: z.array(RouteDestinationSchema).min(1),
  })
  .passthrough();

export const VirtualServiceSchema = KubernetesManifestSchema.extend({
  apiVersion: z.string().startsWith('networking.istio.io/', 'must be a networking.istio.io resource'),
  kind: z.literal('VirtualService'),
  spec: z
    .object({
      hosts: z.array(z.string().min(1)).min(1, 'at least one host is required'),
      gateways: z.array(z.string()).optional(),
      http: z.array(HttpRouteSchema).optional(),
    })
    .passthrough(),
});

export const NamespaceSchema = KubernetesManifestSchema.extend({
  kind: z.literal('Namespace'),
});

export type ManifestMetadata = z.infer<typeof ManifestMetadataSchema>;
export type KubernetesManifest = z.infer<typeof KubernetesManifestSchema>;
export type DeploymentManifest = z.infer<typeof DeploymentSchema>;
export type ServiceManifest = z.infer<typeof ServiceSchema>;
export type VirtualServiceManifest = z.infer<typeof VirtualServiceSchema>;
export type HttpRoute = z.infer<typeof HttpRouteSchema>;
export type RouteDestination = z.infer<typeof RouteDestinationSchema>;

/**
 * Kind-specific schemas; kinds not listed here are checked against the base shape only
 */
export const KIND_SCHEMAS: Readonly<Record<string, z.ZodTypeAny>> = {
  Deployment: DeploymentSchema,
  Service: ServiceSchema,
  ConfigMap: ConfigMapSchema,
  Secret: SecretSchema,
  Ingress: IngressSchema,
  VirtualService: VirtualServiceSchema,
  Namespace: NamespaceSchema,
};

export const CLUSTER_SCOPED_KINDS: ReadonlySet<string> = new Set([
  'Namespace',
  'ClusterRole',
  'ClusterRoleBinding',
  'CustomResourceDefinition',
  'PersistentVolume',
  'StorageClass',
  'IngressClass',
  'PriorityClass',
]);

export interface ResourceRef {
  apiVersion: string;
  kind: string;
  name: string;
  namespace?: string;
}

export const refOf = (manifest: KubernetesManifest): ResourceRef => {
  const ref: ResourceRef = {
    apiVersion: manifest.apiVersion,
    kind: manifest.kind,
    name: manifest.metadata.name,
  };
  if (manifest.metadata.namespace !== undefined) {
    ref.namespace = manifest.metadata.namespace;
  }
  return ref;
};

export const describeRef = (ref: ResourceRef): string =>
  ref.namespace ? `${ref.kind}/${ref.namespace}/${ref.name}` : `${ref.kind}/${ref.name}`;

export interface DeploymentCondition {
  type: string;
  status: string;
  reason?: string;
  message?: string;
}

/**
 * Observed state of a Deployment as reported by the API server
 */
export interface DeploymentStatus {
  name: string;
  namespace: string;
  generation: number;
  observedGeneration: number;
  desiredReplicas: number;
  replicas: number;
  updatedReplicas: number;
  readyReplicas: number;
  availableReplicas: number;
  conditions: DeploymentCondition[];
}

export interface PodSummary {
  name: string;
  phase: string;
  ready: boolean;
  restarts: number;
}
