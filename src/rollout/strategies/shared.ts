/**
 * Helpers shared by the strategy drivers
 */

import {
  DeploymentSchema,
  describeError,
  refOf,
  type DeploymentManifest,
  type KubernetesManifest,
  type ResourceRef,
  type Result,
} from '../../domain/types';
import { ClusterError, ErrorCodes, PlanError } from '../../lib/errors';
import { sanitizeLiveObject } from '../../manifests';
import type { ClusterClient } from '../../infrastructure/kubernetes';
import type { HealthReport } from '../health';
import type { StrategyContext, StrategyResult } from './types';

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new ClusterError(result.error);
  }
  return result.value;
}

export async function applyOrThrow(client: ClusterClient, manifest: KubernetesManifest): Promise<void> {
  unwrap(await client.apply(manifest));
}

export async function deleteOrThrow(client: ClusterClient, ref: ResourceRef): Promise<void> {
  unwrap(await client.delete(ref));
}

/**
 * Live Deployment with server fields removed, or null when it does not exist
 */
export async function readLiveDeployment(
  client: ClusterClient,
  deployment: DeploymentManifest,
): Promise<DeploymentManifest | null> {
  const live = unwrap(await client.get(refOf(deployment)));
  if (!live) {
    return null;
  }
  const parsed = DeploymentSchema.safeParse(sanitizeLiveObject(live));
  if (!parsed.success) {
    throw new PlanError(
      `Live Deployment ${deployment.metadata.name} cannot be restored: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
      ErrorCodes.PLAN_INVALID,
    );
  }
  return parsed.data;
}

export type SettleCause = 'abort' | 'failure';

export const causeOf = (report: HealthReport): SettleCause =>
  report.outcome === 'aborted' ? 'abort' : 'failure';

/**
 * Drive the machine to a settled phase after an abort or a failure. Aborts always
 * clean up; failures clean up only under autoRollback.
 */
export async function settle(
  context: StrategyContext,
  reason: string,
  cause: SettleCause,
  cleanup: () => Promise<void>,
): Promise<StrategyResult> {
  const { machine, plan, logger } = context;

  if (machine.phase === 'pending') {
    machine.dispatch(cause === 'abort' ? 'abort' : 'fail', reason);
    return { phase: machine.phase, message: reason };
  }

  if (cause === 'abort') {
    machine.dispatch('abort', reason);
  } else if (plan.autoRollback) {
    machine.dispatch('rollback', reason);
  } else {
    machine.dispatch('fail', reason);
    logger.warn({ reason }, 'Rollout failed; automatic rollback disabled');
    return { phase: machine.phase, message: reason };
  }

  logger.warn({ reason, cause }, 'Rolling back');
  try {
    await cleanup();
  } catch (error) {
    const message = `Rollback failed: ${describeError(error)}`;
    machine.dispatch('fail', message);
    logger.error({ error: describeError(error) }, 'Rollback failed');
    return { phase: machine.phase, message };
  }

  machine.dispatch('complete', cause === 'abort' ? 'Cleanup finished' : 'Rollback finished');
  return { phase: machine.phase, message: reason };
}

/** Complete a promoting rollout */
export function succeed(context: StrategyContext, message: string): StrategyResult {
  context.machine.dispatch('complete', message);
  return { phase: context.machine.phase, message };
}

export const abortReason = 'Rollout aborted';
