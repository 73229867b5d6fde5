/**
 * Rollout Workflow - Orchestrates one rollout end to end
 *
 * Steps:
 * 1. Resolve the target Deployment, Service and VirtualService
 * 2. Make sure the namespace exists
 * 3. Apply supporting resources in dependency order
 * 4. Run the strategy
 * 5. Record the outcome in the history store
 */

import { nanoid } from 'nanoid';
import { describeError, type ResolvedPlan, type RolloutRecord } from '../domain/types';
import { createTimer } from '../lib/logger';
import { ClusterError, ErrorCodes, RolloutError } from '../lib/errors';
import {
  containerImage,
  resolveTarget,
  setContainerImage,
  withRevision,
  type ManifestBundle,
  type RolloutTarget,
} from '../manifests';
import { pollDeploymentHealth } from '../rollout/health';
import { RolloutStateMachine } from '../rollout/state-machine';
import { createStrategy, type RolloutStrategy } from '../rollout/strategies';
import { sleep as defaultSleep } from '../shared/async';
import type {
  RolloutWorkflowContext,
  RolloutWorkflowParams,
  RolloutWorkflowResult,
  UndoParams,
  WorkflowStep,
} from './types';

export const ROLLOUT_STEPS = [
  'resolve-target',
  'prepare-namespace',
  'apply-dependencies',
  'execute-strategy',
  'record-history',
] as const;

export type RolloutStepName = (typeof ROLLOUT_STEPS)[number];

type StepMap = Record<RolloutStepName, WorkflowStep>;

function createSteps(): StepMap {
  return {
    'resolve-target': { name: 'resolve-target', status: 'pending' },
    'prepare-namespace': { name: 'prepare-namespace', status: 'pending' },
    'apply-dependencies': { name: 'apply-dependencies', status: 'pending' },
    'execute-strategy': { name: 'execute-strategy', status: 'pending' },
    'record-history': { name: 'record-history', status: 'pending' },
  };
}

async function runStep<T>(step: WorkflowStep, now: () => Date, fn: () => Promise<T>): Promise<T> {
  step.status = 'running';
  step.startTime = now();
  try {
    const output = await fn();
    step.status = 'completed';
    return output;
  } catch (error) {
    step.status = 'failed';
    step.error = describeError(error);
    throw error;
  } finally {
    step.endTime = now();
  }
}

interface Prepared {
  target: RolloutTarget;
  strategy: RolloutStrategy;
  record: RolloutRecord;
}

/**
 * Run the complete rollout workflow
 */
export async function runRolloutWorkflow(
  params: RolloutWorkflowParams,
  context: RolloutWorkflowContext,
): Promise<RolloutWorkflowResult> {
  const { bundle, plan, request } = params;
  const { client, store, signal } = context;
  const now = context.now ?? ((): Date => new Date());
  const sleep = context.sleep ?? defaultSleep;
  const logger = context.logger.child({ workflow: 'rollout' });
  const timer = createTimer(logger, 'rollout-workflow', { strategy: plan.strategy });
  const startedAt = now();
  const steps = createSteps();
  const machine = new RolloutStateMachine(now);
  const unsubscribe = machine.onTransition((transition) => {
    logger.info({ from: transition.from, to: transition.to, reason: transition.reason }, `Rollout ${transition.to}`);
    context.onTransition?.(transition);
  });

  let prepared: Prepared | undefined;
  let error: string | undefined;

  try {
    prepared = await runStep(steps['resolve-target'], now, async () => {
      const resolved = resolveTarget(bundle, request);
      const strategy = createStrategy(plan.strategy);
      strategy.validate(resolved, plan);

      const name = resolved.deployment.metadata.name;
      const revision = await store.nextRevision(resolved.namespace, name);
      let deployment = plan.image
        ? setContainerImage(resolved.deployment, plan.image, plan.container)
        : resolved.deployment;
      deployment = withRevision(deployment, revision);
      const target: RolloutTarget = { ...resolved, deployment };
      if (resolved.service) target.service = withRevision(resolved.service, revision);

      const record: RolloutRecord = {
        id: nanoid(),
        name,
        namespace: resolved.namespace,
        strategy: plan.strategy,
        revision,
        phase: machine.phase,
        startedAt: startedAt.toISOString(),
        transitions: [],
        snapshot: [
          deployment,
          ...(target.service ? [target.service] : []),
          ...(target.virtualService ? [target.virtualService] : []),
        ],
      };
      const image = containerImage(deployment, plan.container);
      if (image !== undefined) record.image = image;

      steps['resolve-target'].output = { deployment: name, namespace: resolved.namespace, revision };
      logger.info({ deployment: name, namespace: resolved.namespace, revision }, 'Rollout target resolved');
      return { target, strategy, record };
    });
    const { target, strategy } = prepared;

    await runStep(steps['prepare-namespace'], now, async () => {
      const created = await client.ensureNamespace(target.namespace);
      if (!created.ok) {
        throw new ClusterError(created.error, ErrorCodes.KUBERNETES_CONNECTION_FAILED);
      }
      steps['prepare-namespace'].output = { created: created.value };
    });

    if (target.dependencies.length === 0) {
      steps['apply-dependencies'].status = 'skipped';
    } else {
      await runStep(steps['apply-dependencies'], now, async () => {
        const applied: string[] = [];
        for (const manifest of target.dependencies) {
          const result = await client.apply(manifest);
          if (!result.ok) {
            throw new ClusterError(result.error);
          }
          applied.push(`${manifest.kind}/${manifest.metadata.name} ${result.value}`);
        }
        steps['apply-dependencies'].output = { applied };
        logger.info({ count: applied.length }, 'Dependencies applied');
      });
    }

    await runStep(steps['execute-strategy'], now, async () => {
      const outcome = await strategy.execute({
        client,
        target,
        plan,
        machine,
        logger,
        sleep,
        ...(signal && { signal }),
        checkHealth: (deployment) =>
          pollDeploymentHealth({
            client,
            namespace: target.namespace,
            name: deployment,
            ...plan.health,
            logger,
            sleep,
            now: () => now().getTime(),
            ...(signal && { signal }),
            ...(context.runProbe && { runProbe: context.runProbe }),
          }),
      });
      steps['execute-strategy'].output = outcome;
      if (outcome.phase !== 'succeeded') {
        throw new RolloutError(outcome.message, ErrorCodes.ROLLOUT_FAILED, { phase: outcome.phase });
      }
    });
  } catch (caught) {
    error = describeError(caught);
    for (const step of Object.values(steps)) {
      if (step.status === 'pending' && step.name !== 'record-history') step.status = 'skipped';
    }
    if (machine.phase === 'pending') {
      machine.dispatch(signal?.aborted ? 'abort' : 'fail', error);
    }
  }

  let record: RolloutRecord | undefined;
  if (prepared) {
    const base = prepared.record;
    record = {
      ...base,
      phase: machine.phase,
      transitions: machine.history,
      finishedAt: now().toISOString(),
    };
    const message = error ?? machine.history.at(-1)?.reason;
    if (message !== undefined) record.message = message;

    const toSave = record;
    try {
      await runStep(steps['record-history'], now, () => store.save(toSave));
    } catch (caught) {
      error ??= describeError(caught);
    }
  } else {
    steps['record-history'].status = 'skipped';
  }

  unsubscribe();
  const success = machine.phase === 'succeeded' && error === undefined;
  const duration =
    error === undefined
      ? timer.end({ success, phase: machine.phase })
      : timer.error(error, { phase: machine.phase });
  const result: RolloutWorkflowResult = { success, steps: Object.values(steps), duration };
  if (record) result.record = record;
  if (error !== undefined) result.error = error;
  return result;
}

/**
 * Redeploy the snapshot of the succeeded revision before the current one
 */
export async function undoRollout(
  params: UndoParams,
  context: RolloutWorkflowContext,
): Promise<RolloutWorkflowResult> {
  const { namespace, name } = params;
  const succeeded = (await context.store.list({ namespace, name })).filter((r) => r.phase === 'succeeded');
  const previous = succeeded[1];
  if (!previous) {
    throw new RolloutError(
      `No earlier successful rollout of ${namespace}/${name} to return to`,
      ErrorCodes.NO_PREVIOUS_REVISION,
      { namespace, name, succeeded: succeeded.length },
    );
  }

  context.logger.info({ namespace, name, revision: previous.revision }, 'Rolling back to previous revision');
  const bundle: ManifestBundle = {
    manifests: previous.snapshot,
    sources: [`${namespace}/${name} revision ${previous.revision}`],
  };
  const plan: ResolvedPlan = {
    strategy: previous.strategy,
    autoRollback: params.plan.autoRollback,
    health: params.plan.health,
    blueGreen: params.plan.blueGreen,
    canary: params.plan.canary,
  };
  return runRolloutWorkflow({ bundle, plan, request: { namespace, deployment: name } }, context);
}
