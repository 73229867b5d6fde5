/**
 * Target Resolution
 *
 * Picks the Deployment a rollout drives, the Service that fronts it and the
 * VirtualService that routes to it. Everything else in the bundle becomes a
 * dependency applied ahead of the rollout.
 */

import {
  DeploymentSchema,
  ServiceSchema,
  VirtualServiceSchema,
  type DeploymentManifest,
  type KubernetesManifest,
  type ServiceManifest,
  type VirtualServiceManifest,
} from '../domain/types';
import { ErrorCodes, PlanError } from '../lib/errors';
import type { ManifestBundle } from './loader';
import { orderManifests } from './order';
import { hostMatchesService, withNamespace } from './transforms';

export interface TargetRequest {
  namespace: string;
  deployment?: string;
  service?: string;
  virtualService?: string;
}

export interface RolloutTarget {
  namespace: string;
  deployment: DeploymentManifest;
  service?: ServiceManifest;
  virtualService?: VirtualServiceManifest;
  dependencies: KubernetesManifest[];
}

function pickByName<T extends KubernetesManifest>(
  candidates: T[],
  name: string,
  kind: string,
): T {
  const match = candidates.find((candidate) => candidate.metadata.name === name);
  if (!match) {
    throw new PlanError(`${kind} ${name} not found in manifests`, ErrorCodes.TARGET_NOT_FOUND, {
      kind,
      name,
      available: candidates.map((c) => c.metadata.name),
    });
  }
  return match;
}

/**
 * A Service fronts a Deployment when its selector is a non-empty subset of the pod labels
 */
export function serviceSelectsDeployment(service: ServiceManifest, deployment: DeploymentManifest): boolean {
  const selector = service.spec.selector ?? {};
  const entries = Object.entries(selector);
  const podLabels = deployment.spec.template.metadata.labels;
  return entries.length > 0 && entries.every(([key, value]) => podLabels[key] === value);
}

export function virtualServiceRoutesTo(
  virtualService: VirtualServiceManifest,
  service: string,
  namespace: string,
): boolean {
  return (virtualService.spec.http ?? []).some((route) =>
    route.route.some((dest) => hostMatchesService(dest.destination.host, service, namespace)),
  );
}

/**
 * Resolve the rollout target from a bundle
 */
export function resolveTarget(bundle: ManifestBundle, request: TargetRequest): RolloutTarget {
  const placed = bundle.manifests.map((manifest) => withNamespace(manifest, request.namespace));

  const deployments: DeploymentManifest[] = [];
  const services: ServiceManifest[] = [];
  const virtualServices: VirtualServiceManifest[] = [];
  for (const manifest of placed) {
    const deployment = DeploymentSchema.safeParse(manifest);
    if (deployment.success) deployments.push(deployment.data);
    const service = ServiceSchema.safeParse(manifest);
    if (service.success) services.push(service.data);
    const virtualService = VirtualServiceSchema.safeParse(manifest);
    if (virtualService.success) virtualServices.push(virtualService.data);
  }

  let deployment: DeploymentManifest;
  if (request.deployment) {
    deployment = pickByName(deployments, request.deployment, 'Deployment');
  } else if (deployments.length === 1 && deployments[0]) {
    deployment = deployments[0];
  } else if (deployments.length === 0) {
    throw new PlanError('No Deployment found in manifests', ErrorCodes.TARGET_NOT_FOUND);
  } else {
    throw new PlanError(
      `Found ${deployments.length} Deployments; choose one with --deployment or spec.target.deployment`,
      ErrorCodes.TARGET_AMBIGUOUS,
      { available: deployments.map((d) => d.metadata.name) },
    );
  }

  const namespace = deployment.metadata.namespace ?? request.namespace;

  const service = request.service
    ? pickByName(services, request.service, 'Service')
    : services.find((candidate) => serviceSelectsDeployment(candidate, deployment));

  const virtualService =
    request.virtualService
      ? pickByName(virtualServices, request.virtualService, 'VirtualService')
      : service
        ? virtualServices.find((candidate) => virtualServiceRoutesTo(candidate, service.metadata.name, namespace))
        : undefined;

  const dependencies = orderManifests(
    placed.filter((manifest) => {
      const name = manifest.metadata.name;
      const isOwned =
        (manifest.kind === 'Deployment' && name === deployment.metadata.name) ||
        (manifest.kind === 'Service' && name === service?.metadata.name) ||
        (manifest.kind === 'VirtualService' && name === virtualService?.metadata.name);
      return !isOwned;
    }),
  );

  const target: RolloutTarget = { namespace, deployment, dependencies };
  if (service) target.service = service;
  if (virtualService) target.virtualService = virtualService;
  return target;
}
