/**
 * Canary strategy
 *
 * Runs a `<name>-canary` Deployment next to the stable one and shifts traffic
 * step by step, either through replica ratios or VirtualService weights. The
 * stable Deployment is updated only after the last step.
 */

import {
  describeError,
  refOf,
  type CanaryStep,
  type DeploymentManifest,
  type ResolvedPlan,
  type ServiceManifest,
  type VirtualServiceManifest,
} from '../../domain/types';
import { ROLLOUT_LABELS } from '../../config/defaults';
import {
  canaryDeploymentName,
  canaryReplicaSplit,
  desiredReplicas,
  toCanaryService,
  toTrackDeployment,
  withReplicas,
  withSelector,
  withTrafficWeights,
  type RolloutTarget,
} from '../../manifests';
import { RollingStrategy } from './rolling';
import {
  abortReason,
  applyOrThrow,
  causeOf,
  deleteOrThrow,
  readLiveDeployment,
  settle,
  succeed,
  unwrap,
} from './shared';
import type { RolloutStrategy, StrategyContext, StrategyResult } from './types';

interface TrafficRouter {
  service: ServiceManifest;
  virtualService: VirtualServiceManifest;
}

const describeStep = (step: CanaryStep, desired: number, virtualService: boolean): string => {
  if ('pause' in step) {
    return `pause for ${step.pause.durationMs}ms`;
  }
  if (virtualService) {
    return `route ${step.setWeight}% of traffic to the canary`;
  }
  const split = canaryReplicaSplit(desired, step.setWeight);
  return `set weight ${step.setWeight}% (canary ${split.canary}, stable ${split.stable} replicas)`;
};

export class CanaryStrategy implements RolloutStrategy {
  readonly kind = 'canary' as const;

  private readonly fallback = new RollingStrategy();

  validate(): void {}

  describe(target: RolloutTarget, plan: ResolvedPlan): string[] {
    const name = target.deployment.metadata.name;
    const desired = desiredReplicas(target.deployment);
    const viaVirtualService =
      plan.canary.trafficRouting === 'virtual-service' && !!target.virtualService && !!target.service;
    return [
      `if ${name} does not exist yet, fall back to a rolling update`,
      ...(viaVirtualService && target.virtualService
        ? [`route through VirtualService ${target.virtualService.metadata.name}`]
        : []),
      ...plan.canary.steps.map((step) => describeStep(step, desired, viaVirtualService)),
      `promote: update ${name} to ${desired} replicas and remove ${canaryDeploymentName(name)}`,
    ];
  }

  async execute(context: StrategyContext): Promise<StrategyResult> {
    const { client, target, machine, plan, logger } = context;
    const stable = target.deployment;
    const name = stable.metadata.name;
    const log = logger.child({ strategy: this.kind, deployment: name });

    let live: DeploymentManifest | null = null;
    try {
      live = await readLiveDeployment(client, stable);
    } catch (error) {
      return await settle(context, describeError(error), 'failure', async () => {});
    }
    if (!live) {
      log.info('No live stable Deployment; falling back to a rolling update');
      return await this.fallback.execute(context);
    }
    const previousStable = live;

    const router = this.trafficRouter(context, previousStable);
    const desired = desiredReplicas(stable);
    const canaryBase = toTrackDeployment(stable, 'canary');
    const canaryService = router ? toCanaryService(router.service) : null;

    let canaryApplied = false;
    let canaryServiceApplied = false;
    let stableScaled = false;
    let weighted = false;
    let promoted = false;
    const cleanup = async (): Promise<void> => {
      if (router && weighted) {
        await applyOrThrow(client, this.weighted(context, router, 0));
      }
      if (promoted) {
        await applyOrThrow(client, withReplicas(previousStable, desired));
      } else if (stableScaled) {
        unwrap(await client.scaleDeployment(target.namespace, name, desired));
      }
      if (canaryApplied) {
        await deleteOrThrow(client, refOf(canaryBase));
      }
      if (canaryService && canaryServiceApplied) {
        await deleteOrThrow(client, refOf(canaryService));
      }
    };

    machine.dispatch('start', `Canary rollout of ${target.namespace}/${name}`);
    try {
      if (router && canaryService) {
        await applyOrThrow(client, withSelector(router.service, { [ROLLOUT_LABELS.track]: 'stable' }));
        await applyOrThrow(client, canaryService);
        canaryServiceApplied = true;
      }

      for (const step of plan.canary.steps) {
        if (context.signal?.aborted) {
          return await settle(context, abortReason, 'abort', cleanup);
        }

        if ('pause' in step) {
          machine.dispatch('pause', `Pausing for ${step.pause.durationMs}ms`);
          await context.sleep(step.pause.durationMs, context.signal);
          if (context.signal?.aborted) {
            return await settle(context, abortReason, 'abort', cleanup);
          }
          machine.dispatch('resume');
          continue;
        }

        const split = canaryReplicaSplit(desired, step.setWeight);
        await applyOrThrow(client, withReplicas(canaryBase, split.canary));
        canaryApplied = true;
        if (!router) {
          unwrap(await client.scaleDeployment(target.namespace, name, split.stable));
          stableScaled = true;
        }

        const report = await context.checkHealth(canaryBase.metadata.name);
        if (report.outcome !== 'healthy') {
          return await settle(context, report.message, causeOf(report), cleanup);
        }

        if (router) {
          await applyOrThrow(client, this.weighted(context, router, step.setWeight));
          weighted = true;
        }
        log.info({ weight: step.setWeight, canary: split.canary, stable: split.stable }, 'Canary step healthy');
      }

      if (context.signal?.aborted) {
        return await settle(context, abortReason, 'abort', cleanup);
      }

      machine.dispatch('promote', `Promoting ${name}`);
      await applyOrThrow(client, toTrackDeployment(stable, 'stable', desired));
      promoted = true;
      const report = await context.checkHealth(name);
      if (report.outcome !== 'healthy') {
        return await settle(context, report.message, causeOf(report), cleanup);
      }

      if (router && weighted) {
        await applyOrThrow(client, this.weighted(context, router, 0));
        weighted = false;
      }
      await deleteOrThrow(client, refOf(canaryBase));
      if (canaryService) {
        await deleteOrThrow(client, refOf(canaryService));
      }
      return succeed(context, `Canary promoted; ${name} runs the new version`);
    } catch (error) {
      return await settle(context, describeError(error), 'failure', cleanup);
    }
  }

  /**
   * VirtualService routing only works once the live stable pods carry the stable
   * track label, otherwise the stable Service would select no pods
   */
  private trafficRouter(context: StrategyContext, liveStable: DeploymentManifest): TrafficRouter | null {
    const { plan, target, logger } = context;
    if (plan.canary.trafficRouting !== 'virtual-service') {
      return null;
    }
    if (!target.virtualService || !target.service) {
      logger.warn('No VirtualService routes to the target Service; using replica routing');
      return null;
    }
    if (liveStable.spec.template.metadata.labels[ROLLOUT_LABELS.track] !== 'stable') {
      logger.warn(
        { label: ROLLOUT_LABELS.track },
        'Live stable pods are not labelled with the stable track yet; using replica routing for this rollout',
      );
      return null;
    }
    return { service: target.service, virtualService: target.virtualService };
  }

  private weighted(context: StrategyContext, router: TrafficRouter, weight: number): VirtualServiceManifest {
    return withTrafficWeights(router.virtualService, router.service.metadata.name, context.target.namespace, weight);
  }
}
