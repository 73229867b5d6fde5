/**
 * CLI command handlers
 *
 * Each handler writes its result through `print` and returns the process exit
 * code. Errors propagate to the program, which adds guidance.
 */

import type { Deps } from '../app/container';
import {
  DeploymentSchema,
  StrategyKindSchema,
  describeRef,
  refOf,
  type DeploymentManifest,
  type RolloutFilter,
  type RolloutPlanSpec,
  type StrategyKind,
} from '../domain/types';
import { ClusterError, ErrorCodes, PlanError } from '../lib/errors';
import {
  canaryDeploymentName,
  loadManifests,
  resolveTarget,
  setContainerImage,
  slotDeploymentName,
  type ManifestBundle,
} from '../manifests';
import { evaluateDeploymentReadiness } from '../rollout/health';
import { resolvePlan, resolveTargetRequest, type PlanFlags } from '../rollout/plan';
import { createStrategy } from '../rollout/strategies';
import { runRolloutWorkflow, undoRollout } from '../workflows/rollout';
import type { RolloutWorkflowResult } from '../workflows/types';
import { formatHistory, formatRecordSummary, formatSteps } from './format';

export interface CommandContext {
  deps: Deps;
  print: (line: string) => void;
  signal?: AbortSignal;
}

/**
 * Options shared by plan and deploy, as parsed by commander
 */
export type RolloutOptions = {
  strategy?: string;
  image?: string;
  container?: string;
  namespace?: string;
  deployment?: string;
  service?: string;
  autoRollback?: boolean;
  timeout?: number;
};

export function toPlanFlags(options: RolloutOptions): PlanFlags {
  const flags: PlanFlags = {};
  if (options.strategy !== undefined) flags.strategy = parseStrategy(options.strategy);
  if (options.image !== undefined) flags.image = options.image;
  if (options.container !== undefined) flags.container = options.container;
  if (options.namespace !== undefined) flags.namespace = options.namespace;
  if (options.deployment !== undefined) flags.deployment = options.deployment;
  if (options.service !== undefined) flags.service = options.service;
  if (options.autoRollback !== undefined) flags.autoRollback = options.autoRollback;
  if (options.timeout !== undefined) flags.timeoutMs = options.timeout;
  return flags;
}

function parseStrategy(value: string): StrategyKind {
  const parsed = StrategyKindSchema.safeParse(value);
  if (!parsed.success) {
    throw new PlanError(
      `Unknown strategy ${value}; expected one of ${StrategyKindSchema.options.join(', ')}`,
      ErrorCodes.PLAN_INVALID,
    );
  }
  return parsed.data;
}

const planSpecOf = (bundle: ManifestBundle): RolloutPlanSpec | undefined => bundle.plan?.spec;

export async function validateCommand(paths: string[], { print }: CommandContext): Promise<number> {
  const bundle = await loadManifests(paths);
  for (const manifest of bundle.manifests) {
    print(`valid ${describeRef(refOf(manifest))}`);
  }
  if (bundle.plan) {
    print(`valid RolloutPlan/${bundle.plan.metadata.name}`);
  }
  print(`${bundle.manifests.length} resources in ${bundle.sources.length} files`);
  return 0;
}

export async function planCommand(
  paths: string[],
  options: RolloutOptions,
  { deps, print }: CommandContext,
): Promise<number> {
  const bundle = await loadManifests(paths);
  const spec = planSpecOf(bundle);
  const flags = toPlanFlags(options);
  const plan = resolvePlan(deps.config, spec, flags);
  const target = resolveTarget(bundle, resolveTargetRequest(deps.config, spec, flags));
  const deployment = plan.image
    ? setContainerImage(target.deployment, plan.image, plan.container)
    : target.deployment;
  const strategy = createStrategy(plan.strategy);
  strategy.validate(target, plan);

  print(`Target: Deployment ${deployment.metadata.name} in namespace ${target.namespace}`);
  print(`Strategy: ${plan.strategy} (auto-rollback ${plan.autoRollback ? 'on' : 'off'})`);
  const images = deployment.spec.template.spec.containers.map((c) => `${c.name}=${c.image}`);
  print(`Images: ${images.join(', ')}`);
  print('Apply order:');
  target.dependencies.forEach((manifest, index) => {
    print(`  ${index + 1}. ${describeRef(refOf(manifest))}`);
  });
  if (target.dependencies.length === 0) {
    print('  (no supporting resources)');
  }
  print('Steps:');
  for (const step of strategy.describe({ ...target, deployment }, plan)) {
    print(`  - ${step}`);
  }
  return 0;
}

function reportRun(result: RolloutWorkflowResult, print: (line: string) => void): number {
  formatSteps(result.steps).forEach((line) => print(line));
  if (result.record) {
    print(formatRecordSummary(result.record));
  } else if (result.error) {
    print(`Rollout failed: ${result.error}`);
  }
  return result.success ? 0 : 1;
}

export async function deployCommand(
  paths: string[],
  options: RolloutOptions,
  { deps, print, signal }: CommandContext,
): Promise<number> {
  const bundle = await loadManifests(paths);
  const spec = planSpecOf(bundle);
  const flags = toPlanFlags(options);
  const result = await runRolloutWorkflow(
    {
      bundle,
      plan: resolvePlan(deps.config, spec, flags),
      request: resolveTargetRequest(deps.config, spec, flags),
    },
    {
      client: deps.getClusterClient(),
      store: deps.store,
      logger: deps.logger,
      ...(signal && { signal }),
    },
  );
  return reportRun(result, print);
}

const selectorOf = (deployment: DeploymentManifest): string =>
  Object.entries(deployment.spec.selector.matchLabels)
    .map(([key, value]) => `${key}=${value}`)
    .join(',');

export async function statusCommand(
  name: string,
  options: { namespace?: string },
  { deps, print }: CommandContext,
): Promise<number> {
  const client = deps.getClusterClient();
  const namespace = options.namespace ?? deps.config.kubernetes.namespace;
  const candidates = [
    name,
    slotDeploymentName(name, 'blue'),
    slotDeploymentName(name, 'green'),
    canaryDeploymentName(name),
  ];

  let found = 0;
  for (const candidate of candidates) {
    const live = await client.get({ apiVersion: 'apps/v1', kind: 'Deployment', name: candidate, namespace });
    if (!live.ok) {
      throw new ClusterError(live.error, ErrorCodes.KUBERNETES_CONNECTION_FAILED);
    }
    const deployment = live.value ? DeploymentSchema.safeParse(live.value) : null;
    if (!deployment?.success) continue;
    found++;

    const status = await client.getDeploymentStatus(namespace, candidate);
    if (!status.ok) {
      print(`${candidate}: status unavailable (${status.error})`);
      continue;
    }
    const readiness = evaluateDeploymentReadiness(status.value);
    print(
      `${candidate}: ${readiness.state} (${status.value.readyReplicas}/${status.value.desiredReplicas} ready, ` +
        `${status.value.updatedReplicas} updated) - ${readiness.message}`,
    );

    const pods = await client.listPods(namespace, selectorOf(deployment.data));
    if (pods.ok) {
      for (const pod of pods.value) {
        print(`  pod ${pod.name} ${pod.phase} ready=${pod.ready} restarts=${pod.restarts}`);
      }
    }
  }

  const [latest] = await deps.store.list({ namespace, name, limit: 1 });
  if (latest) {
    print(`Last rollout: ${formatRecordSummary(latest)}`);
  }

  if (found === 0) {
    print(`No Deployment ${name} found in namespace ${namespace}`);
    return 1;
  }
  return 0;
}

export async function historyCommand(
  name: string | undefined,
  options: { namespace?: string; limit?: number },
  { deps, print }: CommandContext,
): Promise<number> {
  const filter: RolloutFilter = {};
  if (options.namespace !== undefined) filter.namespace = options.namespace;
  if (name !== undefined) filter.name = name;
  if (options.limit !== undefined) filter.limit = options.limit;

  const records = await deps.store.list(filter);
  if (records.length === 0) {
    print('No rollouts recorded');
    return 0;
  }
  formatHistory(records).forEach((line) => print(line));
  return 0;
}

export async function undoCommand(
  name: string,
  options: { namespace?: string },
  { deps, print, signal }: CommandContext,
): Promise<number> {
  const namespace = options.namespace ?? deps.config.kubernetes.namespace;
  const result = await undoRollout(
    { namespace, name, plan: resolvePlan(deps.config) },
    {
      client: deps.getClusterClient(),
      store: deps.store,
      logger: deps.logger,
      ...(signal && { signal }),
    },
  );
  return reportRun(result, print);
}
