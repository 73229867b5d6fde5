/**
 * Kubernetes Client - Direct k8s API Access
 *
 * Narrow cluster interface used by the rollout strategies, implemented with
 * @kubernetes/client-node. Every fallible call returns a Result.
 */

import { delimiter } from 'node:path';
import * as k8s from '@kubernetes/client-node';
import type { Logger } from 'pino';
import {
  KubernetesManifestSchema,
  Success,
  Failure,
  describeError,
  describeRef,
  refOf,
  type DeploymentCondition,
  type DeploymentStatus,
  type KubernetesManifest,
  type PodSummary,
  type ResourceRef,
  type Result,
} from '../../domain/types';
import { retry } from '../../shared/async';

export type ApplyOutcome = 'created' | 'configured';

export interface ClusterClient {
  /** Create the object, or replace it on top of the live resourceVersion */
  apply: (manifest: KubernetesManifest) => Promise<Result<ApplyOutcome>>;
  /** Live object, or null when it does not exist */
  get: (ref: ResourceRef) => Promise<Result<KubernetesManifest | null>>;
  /** False when the object was already gone */
  delete: (ref: ResourceRef) => Promise<Result<boolean>>;
  getDeploymentStatus: (namespace: string, name: string) => Promise<Result<DeploymentStatus>>;
  scaleDeployment: (namespace: string, name: string, replicas: number) => Promise<Result<void>>;
  listPods: (namespace: string, labelSelector: string) => Promise<Result<PodSummary[]>>;
  /** True when the namespace had to be created */
  ensureNamespace: (namespace: string) => Promise<Result<boolean>>;
  ping: () => Promise<boolean>;
}

export interface KubernetesClientOptions {
  kubeconfig?: string;
  context?: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const hasStatus = (error: unknown, statusCode: number): boolean =>
  error instanceof k8s.HttpError && error.statusCode === statusCode;

const isNotFound = (error: unknown): boolean => hasStatus(error, 404);

const isConflict = (error: unknown): boolean => hasStatus(error, 409);

/**
 * Prefer the API server's Status message over the generic HTTP error text
 */
function describeApiError(error: unknown): string {
  if (error instanceof k8s.HttpError) {
    const body: unknown = error.body;
    const message = isRecord(body) && typeof body.message === 'string' ? body.message : error.message;
    return error.statusCode ? `${message} (HTTP ${error.statusCode})` : message;
  }
  return describeError(error);
}

function headerOf(ref: ResourceRef): k8s.KubernetesObject & { metadata: { name: string; namespace: string } } {
  return {
    apiVersion: ref.apiVersion,
    kind: ref.kind,
    metadata: { name: ref.name, namespace: ref.namespace ?? '' },
  };
}

function fromLiveObject(live: k8s.KubernetesObject, ref: ResourceRef): KubernetesManifest {
  const parsed = KubernetesManifestSchema.safeParse(JSON.parse(JSON.stringify(live)));
  if (!parsed.success) {
    throw new Error(`Unexpected object returned for ${describeRef(ref)}`);
  }
  return parsed.data;
}

function toConditions(conditions: k8s.V1DeploymentCondition[] | undefined): DeploymentCondition[] {
  return (conditions ?? []).map((condition) => {
    const mapped: DeploymentCondition = { type: condition.type, status: condition.status };
    if (condition.reason) mapped.reason = condition.reason;
    if (condition.message) mapped.message = condition.message;
    return mapped;
  });
}

function toPodSummary(pod: k8s.V1Pod): PodSummary {
  const ready = (pod.status?.conditions ?? []).some((c) => c.type === 'Ready' && c.status === 'True');
  const restarts = (pod.status?.containerStatuses ?? []).reduce((sum, c) => sum + c.restartCount, 0);
  return {
    name: pod.metadata?.name ?? '',
    phase: pod.status?.phase ?? 'Unknown',
    ready,
    restarts,
  };
}

function loadKubeConfig(options: KubernetesClientOptions): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  // A KUBECONFIG list is merged by loadFromDefault
  if (options.kubeconfig && !options.kubeconfig.includes(delimiter)) {
    kc.loadFromFile(options.kubeconfig);
  } else {
    kc.loadFromDefault();
  }
  if (options.context) {
    kc.setCurrentContext(options.context);
  }
  return kc;
}

/**
 * Create a Kubernetes client with core operations
 */
export const createKubernetesClient = (
  logger: Logger,
  options: KubernetesClientOptions = {},
): ClusterClient => {
  const kc = loadKubeConfig(options);
  const objectApi = k8s.KubernetesObjectApi.makeApiClient(kc);
  const appsApi = kc.makeApiClient(k8s.AppsV1Api);
  const coreApi = kc.makeApiClient(k8s.CoreV1Api);
  const versionApi = kc.makeApiClient(k8s.VersionApi);
  const log = logger.child({ component: 'kubernetes-client' });

  async function read(ref: ResourceRef): Promise<KubernetesManifest | null> {
    try {
      const response = await objectApi.read(headerOf(ref));
      return fromLiveObject(response.body, ref);
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  return {
    async apply(manifest) {
      const ref = refOf(manifest);
      try {
        const outcome = await retry(
          async (): Promise<ApplyOutcome> => {
            const live = await read(ref);
            if (!live) {
              await objectApi.create(manifest);
              return 'created';
            }
            const metadata = { ...manifest.metadata, resourceVersion: live.metadata.resourceVersion };
            await objectApi.replace({ ...manifest, metadata });
            return 'configured';
          },
          { maxAttempts: 3, delayMs: 250, shouldRetry: isConflict },
        );
        log.debug({ resource: describeRef(ref), outcome }, 'Manifest applied');
        return Success(outcome);
      } catch (error) {
        return Failure(`Failed to apply ${describeRef(ref)}: ${describeApiError(error)}`);
      }
    },

    async get(ref) {
      try {
        return Success(await read(ref));
      } catch (error) {
        return Failure(`Failed to read ${describeRef(ref)}: ${describeApiError(error)}`);
      }
    },

    async delete(ref) {
      try {
        await objectApi.delete(headerOf(ref), undefined, undefined, undefined, undefined, 'Background');
        log.debug({ resource: describeRef(ref) }, 'Resource deleted');
        return Success(true);
      } catch (error) {
        if (isNotFound(error)) return Success(false);
        return Failure(`Failed to delete ${describeRef(ref)}: ${describeApiError(error)}`);
      }
    },

    async getDeploymentStatus(namespace, name) {
      try {
        const { body } = await appsApi.readNamespacedDeployment(name, namespace);
        return Success({
          name,
          namespace,
          generation: body.metadata?.generation ?? 0,
          observedGeneration: body.status?.observedGeneration ?? 0,
          desiredReplicas: body.spec?.replicas ?? 1,
          replicas: body.status?.replicas ?? 0,
          updatedReplicas: body.status?.updatedReplicas ?? 0,
          readyReplicas: body.status?.readyReplicas ?? 0,
          availableReplicas: body.status?.availableReplicas ?? 0,
          conditions: toConditions(body.status?.conditions),
        });
      } catch (error) {
        return Failure(`Failed to get deployment status for ${namespace}/${name}: ${describeApiError(error)}`);
      }
    },

    async scaleDeployment(namespace, name, replicas) {
      try {
        await retry(
          async () => {
            const { body } = await appsApi.readNamespacedDeployment(name, namespace);
            if (!body.spec) {
              throw new Error('deployment has no spec');
            }
            body.spec.replicas = replicas;
            await appsApi.replaceNamespacedDeployment(name, namespace, body);
          },
          { maxAttempts: 3, delayMs: 250, shouldRetry: isConflict },
        );
        log.info({ namespace, name, replicas }, 'Deployment scaled');
        return Success(undefined);
      } catch (error) {
        return Failure(`Failed to scale ${namespace}/${name} to ${replicas}: ${describeApiError(error)}`);
      }
    },

    async listPods(namespace, labelSelector) {
      try {
        const { body } = await coreApi.listNamespacedPod(
          namespace,
          undefined,
          undefined,
          undefined,
          undefined,
          labelSelector,
        );
        return Success(body.items.map(toPodSummary));
      } catch (error) {
        return Failure(`Failed to list pods in ${namespace}: ${describeApiError(error)}`);
      }
    },

    async ensureNamespace(namespace) {
      try {
        await coreApi.readNamespace(namespace);
        return Success(false);
      } catch (error) {
        if (!isNotFound(error)) {
          return Failure(`Failed to read namespace ${namespace}: ${describeApiError(error)}`);
        }
      }
      try {
        await coreApi.createNamespace({ metadata: { name: namespace } });
        log.info({ namespace }, 'Namespace created');
        return Success(true);
      } catch (error) {
        if (isConflict(error)) return Success(false);
        return Failure(`Failed to create namespace ${namespace}: ${describeApiError(error)}`);
      }
    },

    async ping() {
      try {
        await versionApi.getCode();
        return true;
      } catch (error) {
        log.debug({ error: describeApiError(error) }, 'Cluster ping failed');
        return false;
      }
    },
  };
};
