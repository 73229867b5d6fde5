/**
 * Manifest Transforms
 *
 * Pure functions deriving the variants each strategy applies. Inputs are never
 * mutated; every function returns a fresh object.
 */

import {
  CLUSTER_SCOPED_KINDS,
  type DeploymentManifest,
  type KubernetesManifest,
  type ManifestMetadata,
  type RouteDestination,
  type ServiceManifest,
  type VirtualServiceManifest,
} from '../domain/types';
import { MANAGER_NAME, ROLLOUT_LABELS } from '../config/defaults';
import { ErrorCodes, PlanError } from '../lib/errors';

export type Slot = 'blue' | 'green';
export type Track = 'stable' | 'canary';

export const otherSlot = (slot: Slot): Slot => (slot === 'blue' ? 'green' : 'blue');

export const isSlot = (value: unknown): value is Slot => value === 'blue' || value === 'green';

const SERVER_ANNOTATIONS = [
  'kubectl.kubernetes.io/last-applied-configuration',
  'deployment.kubernetes.io/revision',
];

function withLabels(metadata: ManifestMetadata, labels: Record<string, string>): ManifestMetadata {
  return { ...metadata, labels: { ...metadata.labels, ...labels } };
}

export function withNamespace<T extends KubernetesManifest>(manifest: T, namespace: string): T {
  if (CLUSTER_SCOPED_KINDS.has(manifest.kind) || manifest.metadata.namespace !== undefined) {
    return manifest;
  }
  return { ...manifest, metadata: { ...manifest.metadata, namespace } };
}

/**
 * Stamp the rollout revision annotation and managed-by label
 */
export function withRevision<T extends KubernetesManifest>(manifest: T, revision: number): T {
  return {
    ...manifest,
    metadata: {
      ...withLabels(manifest.metadata, { [ROLLOUT_LABELS.managedBy]: MANAGER_NAME }),
      annotations: { ...manifest.metadata.annotations, [ROLLOUT_LABELS.revision]: String(revision) },
    },
  };
}

export function setContainerImage(
  deployment: DeploymentManifest,
  image: string,
  container?: string,
): DeploymentManifest {
  const containers = deployment.spec.template.spec.containers;
  const index = container === undefined ? 0 : containers.findIndex((c) => c.name === container);
  if (index === -1) {
    throw new PlanError(
      `Container ${container ?? ''} not found in Deployment ${deployment.metadata.name}`,
      ErrorCodes.TARGET_NOT_FOUND,
      { container, available: containers.map((c) => c.name) },
    );
  }

  return {
    ...deployment,
    spec: {
      ...deployment.spec,
      template: {
        ...deployment.spec.template,
        spec: {
          ...deployment.spec.template.spec,
          containers: containers.map((c, i) => (i === index ? { ...c, image } : c)),
        },
      },
    },
  };
}

/**
 * Image of the named (or first) container
 */
export function containerImage(deployment: DeploymentManifest, container?: string): string | undefined {
  const containers = deployment.spec.template.spec.containers;
  const match = container === undefined ? containers[0] : containers.find((c) => c.name === container);
  return match?.image;
}

export function desiredReplicas(deployment: DeploymentManifest): number {
  return deployment.spec.replicas ?? 1;
}

export function withReplicas(deployment: DeploymentManifest, replicas: number): DeploymentManifest {
  return { ...deployment, spec: { ...deployment.spec, replicas } };
}

/**
 * Add labels to the selector, pod template and object metadata of a Deployment
 */
function withPodLabels(
  deployment: DeploymentManifest,
  name: string,
  labels: Record<string, string>,
  includeSelector: boolean,
): DeploymentManifest {
  const { spec } = deployment;
  return {
    ...deployment,
    metadata: { ...withLabels(deployment.metadata, labels), name },
    spec: {
      ...spec,
      selector: includeSelector
        ? { ...spec.selector, matchLabels: { ...spec.selector.matchLabels, ...labels } }
        : spec.selector,
      template: {
        ...spec.template,
        metadata: {
          ...spec.template.metadata,
          labels: { ...spec.template.metadata.labels, ...labels },
        },
      },
    },
  };
}

export function slotDeploymentName(name: string, slot: Slot): string {
  return `${name}-${slot}`;
}

export function toSlotDeployment(deployment: DeploymentManifest, slot: Slot): DeploymentManifest {
  return withPodLabels(
    deployment,
    slotDeploymentName(deployment.metadata.name, slot),
    { [ROLLOUT_LABELS.slot]: slot },
    true,
  );
}

export function canaryDeploymentName(name: string): string {
  return `${name}-canary`;
}

/**
 * The canary variant gets its own name and selector; the stable variant keeps
 * both (selectors are immutable) and only labels its pods
 */
export function toTrackDeployment(
  deployment: DeploymentManifest,
  track: Track,
  replicas?: number,
): DeploymentManifest {
  const labels = { [ROLLOUT_LABELS.track]: track };
  const tracked =
    track === 'canary'
      ? withPodLabels(deployment, canaryDeploymentName(deployment.metadata.name), labels, true)
      : withPodLabels(deployment, deployment.metadata.name, labels, false);
  return replicas === undefined ? tracked : withReplicas(tracked, replicas);
}

export function withSelector(service: ServiceManifest, labels: Record<string, string>): ServiceManifest {
  return {
    ...service,
    spec: { ...service.spec, selector: { ...service.spec.selector, ...labels } },
  };
}

/**
 * Copy of a Service under a new name without the allocated addresses and node ports
 */
function cloneService(service: ServiceManifest, name: string, labels: Record<string, string>): ServiceManifest {
  const spec = {
    ...service.spec,
    ports: service.spec.ports.map((port) => {
      const copy = { ...port };
      delete copy.nodePort;
      return copy;
    }),
    selector: { ...service.spec.selector, ...labels },
  };
  delete spec.clusterIP;
  delete spec.clusterIPs;
  return { ...service, metadata: { ...service.metadata, name }, spec };
}

export function toPreviewService(service: ServiceManifest, slot: Slot): ServiceManifest {
  return cloneService(service, `${service.metadata.name}-preview`, { [ROLLOUT_LABELS.slot]: slot });
}

export function toCanaryService(service: ServiceManifest): ServiceManifest {
  return cloneService(service, `${service.metadata.name}-canary`, { [ROLLOUT_LABELS.track]: 'canary' });
}

/**
 * Whether a VirtualService destination host refers to the given Service
 */
export function hostMatchesService(host: string, service: string, namespace: string): boolean {
  return (
    host === service ||
    host === `${service}.${namespace}` ||
    host === `${service}.${namespace}.svc` ||
    host === `${service}.${namespace}.svc.cluster.local`
  );
}

/**
 * Canary host with the same qualification as the stable one (web.prod -> web-canary.prod)
 */
export function canaryHostFor(stableHost: string, service: string): string {
  return `${service}-canary${stableHost.slice(service.length)}`;
}

/**
 * Rewrite every HTTP route that targets the stable Service into a stable/canary
 * split; a weight of 0 collapses the route back to the stable destination
 */
export function withTrafficWeights(
  virtualService: VirtualServiceManifest,
  service: string,
  namespace: string,
  canaryWeight: number,
): VirtualServiceManifest {
  const http = virtualService.spec.http?.map((route) => {
    const stable = route.route.find((dest) => hostMatchesService(dest.destination.host, service, namespace));
    if (!stable) {
      return route;
    }

    const stableDestination: RouteDestination = { ...stable, weight: 100 - canaryWeight };
    if (canaryWeight === 0) {
      return { ...route, route: [{ ...stableDestination, weight: 100 }] };
    }
    const canaryDestination: RouteDestination = {
      ...stable,
      destination: { ...stable.destination, host: canaryHostFor(stable.destination.host, service) },
      weight: canaryWeight,
    };
    return { ...route, route: [stableDestination, canaryDestination] };
  });

  return { ...virtualService, spec: { ...virtualService.spec, ...(http && { http }) } };
}

/**
 * Replica counts for a canary step; the canary always gets at least one pod
 */
export function canaryReplicaSplit(desired: number, weight: number): { canary: number; stable: number } {
  const canary = weight >= 100 ? desired : Math.max(1, Math.ceil((desired * weight) / 100));
  return { canary, stable: Math.max(desired - canary, 0) };
}

/**
 * Strip server-populated fields so a live object can be applied again
 */
export function sanitizeLiveObject<T extends KubernetesManifest>(live: T): T {
  const metadata: ManifestMetadata = { name: live.metadata.name };
  if (live.metadata.namespace !== undefined) metadata.namespace = live.metadata.namespace;
  if (live.metadata.labels !== undefined) metadata.labels = { ...live.metadata.labels };
  if (live.metadata.annotations !== undefined) {
    const annotations = { ...live.metadata.annotations };
    for (const key of SERVER_ANNOTATIONS) {
      delete annotations[key];
    }
    metadata.annotations = annotations;
  }

  const clean = { ...live, metadata };
  delete clean.status;
  return clean;
}
