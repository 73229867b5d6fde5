import type { KubernetesManifest } from '../domain/types';

/**
 * Kinds in the order they must reach the cluster; anything unlisted goes last
 */
export const APPLY_ORDER: readonly string[] = [
  'Namespace',
  'ResourceQuota',
  'LimitRange',
  'ServiceAccount',
  'Secret',
  'ConfigMap',
  'PersistentVolumeClaim',
  'Role',
  'RoleBinding',
  'Service',
  'Deployment',
  'StatefulSet',
  'DaemonSet',
  'Job',
  'CronJob',
  'HorizontalPodAutoscaler',
  'Ingress',
  'VirtualService',
];

const rank = (kind: string): number => {
  const index = APPLY_ORDER.indexOf(kind);
  return index === -1 ? APPLY_ORDER.length : index;
};

/**
 * Order manifests for apply; stable for manifests of the same kind
 */
export function orderManifests<T extends KubernetesManifest>(manifests: readonly T[]): T[] {
  return manifests
    .map((manifest, position) => ({ manifest, position }))
    .sort((a, b) => rank(a.manifest.kind) - rank(b.manifest.kind) || a.position - b.position)
    .map(({ manifest }) => manifest);
}
