/**
 * Blue/green strategy
 *
 * Two slot Deployments (`<name>-blue`, `<name>-green`) sit behind one Service.
 * The idle slot receives the new version; once healthy the Service selector
 * flips to it and the old slot is scaled to zero.
 */

import {
  ServiceSchema,
  describeError,
  refOf,
  type ResolvedPlan,
  type ServiceManifest,
} from '../../domain/types';
import { ROLLOUT_LABELS } from '../../config/defaults';
import { ErrorCodes, PlanError } from '../../lib/errors';
import {
  isSlot,
  otherSlot,
  slotDeploymentName,
  toPreviewService,
  toSlotDeployment,
  withSelector,
  type RolloutTarget,
  type Slot,
} from '../../manifests';
import type { ClusterClient } from '../../infrastructure/kubernetes';
import { abortReason, applyOrThrow, causeOf, deleteOrThrow, settle, succeed, unwrap } from './shared';
import type { RolloutStrategy, StrategyContext, StrategyResult } from './types';

function requireService(target: RolloutTarget): ServiceManifest {
  if (!target.service) {
    throw new PlanError(
      `Blue/green rollout of ${target.deployment.metadata.name} needs a Service that selects it`,
      ErrorCodes.PLAN_INVALID,
      { deployment: target.deployment.metadata.name },
    );
  }
  // the slot label alone would match every app's slot pods in the namespace
  if (Object.keys(target.service.spec.selector ?? {}).length === 0) {
    throw new PlanError(
      `Blue/green rollout of ${target.deployment.metadata.name} needs Service ${target.service.metadata.name} to have a selector`,
      ErrorCodes.PLAN_INVALID,
      { deployment: target.deployment.metadata.name, service: target.service.metadata.name },
    );
  }
  return target.service;
}

/**
 * Slot the live Service currently routes to, if any
 */
export async function activeSlot(client: ClusterClient, service: ServiceManifest): Promise<Slot | null> {
  const live = unwrap(await client.get(refOf(service)));
  if (!live) return null;
  const parsed = ServiceSchema.safeParse(live);
  const slot = parsed.success ? parsed.data.spec.selector?.[ROLLOUT_LABELS.slot] : undefined;
  return isSlot(slot) ? slot : null;
}

export class BlueGreenStrategy implements RolloutStrategy {
  readonly kind = 'blue-green' as const;

  validate(target: RolloutTarget): void {
    requireService(target);
  }

  describe(target: RolloutTarget, plan: ResolvedPlan): string[] {
    const service = requireService(target);
    const name = target.deployment.metadata.name;
    const steps = [
      `read the active slot from Service ${service.metadata.name}`,
      `apply Deployment ${name}-<idle slot>`,
    ];
    if (plan.blueGreen.previewService) {
      steps.push(`apply preview Service ${service.metadata.name}-preview`);
    }
    steps.push(
      `wait up to ${plan.health.timeoutMs}ms for the idle slot to become healthy`,
      `switch Service ${service.metadata.name} to the idle slot`,
    );
    if (plan.blueGreen.scaleDownPrevious) {
      steps.push('scale the previous slot to 0');
    }
    return steps;
  }

  async execute(context: StrategyContext): Promise<StrategyResult> {
    const { client, target, machine, plan, logger } = context;
    const service = requireService(target);
    const name = target.deployment.metadata.name;
    const log = logger.child({ strategy: this.kind, deployment: name });

    let deployed: Slot | null = null;
    let previewApplied = false;
    const cleanup = async (): Promise<void> => {
      if (deployed) {
        await deleteOrThrow(client, refOf(toSlotDeployment(target.deployment, deployed)));
      }
      if (previewApplied && deployed) {
        await deleteOrThrow(client, refOf(toPreviewService(service, deployed)));
      }
    };

    machine.dispatch('start', `Blue/green rollout of ${target.namespace}/${name}`);
    try {
      const active = await activeSlot(client, service);
      const next = active ? otherSlot(active) : 'blue';
      const slotDeployment = toSlotDeployment(target.deployment, next);
      log.info({ active, next }, 'Deploying to idle slot');

      if (context.signal?.aborted) {
        return await settle(context, abortReason, 'abort', cleanup);
      }
      await applyOrThrow(client, slotDeployment);
      deployed = next;
      if (plan.blueGreen.previewService) {
        await applyOrThrow(client, toPreviewService(service, next));
        previewApplied = true;
      }

      const report = await context.checkHealth(slotDeployment.metadata.name);
      if (report.outcome !== 'healthy') {
        return await settle(context, report.message, causeOf(report), cleanup);
      }
      if (context.signal?.aborted) {
        return await settle(context, abortReason, 'abort', cleanup);
      }

      machine.dispatch('promote', `Switching Service ${service.metadata.name} to ${next}`);
      await applyOrThrow(client, withSelector(service, { [ROLLOUT_LABELS.slot]: next }));
      log.info({ slot: next }, 'Service switched');

      if (plan.blueGreen.scaleDownPrevious) {
        await this.scaleDownPrevious(context, active);
      }
      return succeed(context, `Service ${service.metadata.name} now routes to ${slotDeploymentName(name, next)}`);
    } catch (error) {
      return await settle(context, describeError(error), 'failure', cleanup);
    }
  }

  /**
   * Scale the old slot, or the pre-blue/green Deployment on a first run, to zero.
   * Traffic has already moved, so a failure here is only logged.
   */
  private async scaleDownPrevious(context: StrategyContext, active: Slot | null): Promise<void> {
    const { client, target, logger } = context;
    const base = target.deployment.metadata.name;
    let previous: string | null = active ? slotDeploymentName(base, active) : null;
    if (!previous) {
      const legacy = await client.get(refOf(target.deployment));
      previous = legacy.ok && legacy.value ? base : null;
    }
    if (!previous) return;

    const scaled = await client.scaleDeployment(target.namespace, previous, 0);
    if (!scaled.ok) {
      logger.warn({ deployment: previous, error: scaled.error }, 'Could not scale down previous Deployment');
    }
  }
}
