import type { AppConfig } from '../config';
import type { ResolvedPlan, RolloutPlanSpec, StrategyKind } from '../domain/types';
import type { TargetRequest } from '../manifests';

/**
 * Values given on the command line; they win over the plan descriptor
 */
export interface PlanFlags {
  strategy?: StrategyKind;
  image?: string;
  container?: string;
  autoRollback?: boolean;
  timeoutMs?: number;
  namespace?: string;
  deployment?: string;
  service?: string;
}

/**
 * Merge configuration defaults, the RolloutPlan spec and CLI flags
 */
export function resolvePlan(config: AppConfig, spec?: RolloutPlanSpec, flags: PlanFlags = {}): ResolvedPlan {
  const { rollout } = config;
  const health = spec?.health;

  const plan: ResolvedPlan = {
    strategy: flags.strategy ?? spec?.strategy ?? rollout.strategy,
    autoRollback: flags.autoRollback ?? spec?.autoRollback ?? rollout.autoRollback,
    health: {
      intervalMs: health?.intervalMs ?? rollout.intervalMs,
      timeoutMs: flags.timeoutMs ?? health?.timeoutMs ?? rollout.timeoutMs,
      successThreshold: health?.successThreshold ?? rollout.successThreshold,
      failureThreshold: health?.failureThreshold ?? rollout.failureThreshold,
      probes: health?.probes ?? [],
    },
    blueGreen: {
      previewService: spec?.blueGreen?.previewService ?? rollout.previewService,
      scaleDownPrevious: spec?.blueGreen?.scaleDownPrevious ?? rollout.scaleDownPrevious,
    },
    canary: {
      trafficRouting: spec?.canary?.trafficRouting ?? 'replicas',
      steps: spec?.canary?.steps ?? rollout.canarySteps,
    },
  };

  const image = flags.image ?? spec?.image;
  if (image !== undefined) plan.image = image;
  const container = flags.container ?? spec?.container;
  if (container !== undefined) plan.container = container;
  return plan;
}

/**
 * Target selection from flags, then the plan's target block
 */
export function resolveTargetRequest(config: AppConfig, spec?: RolloutPlanSpec, flags: PlanFlags = {}): TargetRequest {
  const request: TargetRequest = { namespace: flags.namespace ?? config.kubernetes.namespace };
  const deployment = flags.deployment ?? spec?.target.deployment;
  if (deployment !== undefined) request.deployment = deployment;
  const service = flags.service ?? spec?.target.service;
  if (service !== undefined) request.service = service;
  const virtualService = spec?.target.virtualService;
  if (virtualService !== undefined) request.virtualService = virtualService;
  return request;
}
