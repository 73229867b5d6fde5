/**
 * Rolling strategy: update the Deployment in place and let the controller roll
 * pods; restore the previous spec on rollback
 */

import { describeError, refOf, type DeploymentManifest, type ResolvedPlan } from '../../domain/types';
import { toTrackDeployment, type RolloutTarget } from '../../manifests';
import {
  abortReason,
  applyOrThrow,
  causeOf,
  deleteOrThrow,
  readLiveDeployment,
  settle,
  succeed,
} from './shared';
import type { RolloutStrategy, StrategyContext, StrategyResult } from './types';

export class RollingStrategy implements RolloutStrategy {
  readonly kind = 'rolling' as const;

  validate(): void {}

  describe(target: RolloutTarget, plan: ResolvedPlan): string[] {
    const name = target.deployment.metadata.name;
    const steps: string[] = [];
    if (target.service) {
      steps.push(`apply Service ${target.service.metadata.name}`);
    }
    steps.push(
      `apply Deployment ${name}`,
      `wait up to ${plan.health.timeoutMs}ms for ${name} to become healthy`,
      plan.autoRollback ? 'on failure restore the previous Deployment' : 'on failure stop without rollback',
    );
    return steps;
  }

  async execute(context: StrategyContext): Promise<StrategyResult> {
    const { client, target, machine, logger } = context;
    const deployment = toTrackDeployment(target.deployment, 'stable');
    const name = deployment.metadata.name;
    const log = logger.child({ strategy: this.kind, deployment: name });

    let previous: DeploymentManifest | null = null;
    let applied = false;
    const restore = async (): Promise<void> => {
      if (!applied) return;
      if (previous) {
        await applyOrThrow(client, previous);
        log.info('Previous Deployment restored');
      } else {
        await deleteOrThrow(client, refOf(deployment));
        log.info('New Deployment removed');
      }
    };

    machine.dispatch('start', `Rolling update of ${target.namespace}/${name}`);
    try {
      previous = await readLiveDeployment(client, deployment);

      if (target.service) {
        await applyOrThrow(client, target.service);
      }
      if (context.signal?.aborted) {
        return await settle(context, abortReason, 'abort', restore);
      }
      await applyOrThrow(client, deployment);
      applied = true;
      log.info({ update: previous !== null }, 'Deployment applied');

      const report = await context.checkHealth(name);
      if (report.outcome !== 'healthy') {
        return await settle(context, report.message, causeOf(report), restore);
      }

      machine.dispatch('promote', report.message);
      return succeed(context, `Deployment ${name} rolled out`);
    } catch (error) {
      return await settle(context, describeError(error), 'failure', restore);
    }
  }
}
