/**
 * Kubernetes infrastructure - External K8s client interface
 */

export {
  type ApplyOutcome,
  type ClusterClient,
  type KubernetesClientOptions,
  createKubernetesClient,
} from './client';
