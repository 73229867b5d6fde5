/**
 * Builders and fakes shared by the unit tests
 */

import pino from 'pino';
import { createAppConfig, type AppConfig } from '../../src/config';
import type {
  DeploymentManifest,
  ResolvedPlan,
  ServiceManifest,
  VirtualServiceManifest,
} from '../../src/domain/types';
import type { RolloutTarget } from '../../src/manifests';
import { pollDeploymentHealth } from '../../src/rollout/health';
import { resolvePlan } from '../../src/rollout/plan';
import { RolloutStateMachine } from '../../src/rollout/state-machine';
import type { StrategyContext } from '../../src/rollout/strategies';
import type { Sleep } from '../../src/shared/async';
import type { FakeCluster } from './fake-cluster';

export const silentLogger = pino({ level: 'silent' });

export const testConfig = (): AppConfig => createAppConfig({ logLevel: 'silent', stateStore: 'memory' }, {});

/**
 * Plan with fast health settings; overrides are merged one level deep
 */
export function testPlan(overrides: Partial<ResolvedPlan> = {}): ResolvedPlan {
  const base = resolvePlan(testConfig());
  return {
    ...base,
    health: { ...base.health, intervalMs: 10, timeoutMs: 1000, successThreshold: 1, failureThreshold: 2 },
    ...overrides,
  };
}

/**
 * Manual clock; `sleep` advances it instead of waiting
 */
export interface FakeTime {
  now: () => Date;
  ms: () => number;
  sleep: Sleep;
  slept: number[];
}

export function fakeTime(start = Date.parse('2024-05-01T12:00:00.000Z')): FakeTime {
  let current = start;
  const slept: number[] = [];
  return {
    now: () => new Date(current),
    ms: () => current,
    slept,
    sleep: async (ms: number) => {
      slept.push(ms);
      current += ms;
    },
  };
}

export function deployment(
  name = 'web',
  options: { namespace?: string; image?: string; replicas?: number; labels?: Record<string, string> } = {},
): DeploymentManifest {
  const labels = options.labels ?? { app: name };
  const manifest: DeploymentManifest = {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: { name },
    spec: {
      replicas: options.replicas ?? 4,
      selector: { matchLabels: { ...labels } },
      template: {
        metadata: { labels: { ...labels } },
        spec: { containers: [{ name: 'app', image: options.image ?? 'registry.local/web:1.0.0' }] },
      },
    },
  };
  if (options.namespace !== undefined) manifest.metadata.namespace = options.namespace;
  return manifest;
}

export function service(
  name = 'web',
  options: { namespace?: string; selector?: Record<string, string> } = {},
): ServiceManifest {
  const manifest: ServiceManifest = {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: { name },
    spec: { selector: options.selector ?? { app: name }, ports: [{ port: 80, targetPort: 8080 }] },
  };
  if (options.namespace !== undefined) manifest.metadata.namespace = options.namespace;
  return manifest;
}

export function virtualService(name = 'web', host = 'web', namespace?: string): VirtualServiceManifest {
  const manifest: VirtualServiceManifest = {
    apiVersion: 'networking.istio.io/v1beta1',
    kind: 'VirtualService',
    metadata: { name },
    spec: {
      hosts: ['web.example.test'],
      http: [{ route: [{ destination: { host } }] }],
    },
  };
  if (namespace !== undefined) manifest.metadata.namespace = namespace;
  return manifest;
}

/**
 * Target in namespace `shop` for the `web` Deployment and its Service
 */
export function shopTarget(overrides: Partial<RolloutTarget> = {}): RolloutTarget {
  return {
    namespace: 'shop',
    deployment: deployment('web', { namespace: 'shop', image: 'registry.local/web:2.0.0' }),
    service: service('web', { namespace: 'shop' }),
    dependencies: [],
    ...overrides,
  };
}

/**
 * Strategy context wired to a fake cluster, a fresh state machine and fake time
 */
export function strategyContext(
  cluster: FakeCluster,
  target: RolloutTarget,
  plan: ResolvedPlan,
  options: { signal?: AbortSignal; sleep?: Sleep } = {},
): StrategyContext & { time: FakeTime } {
  const time = fakeTime();
  const sleep = options.sleep ?? time.sleep;
  const { signal } = options;
  return {
    client: cluster,
    target,
    plan,
    machine: new RolloutStateMachine(time.now),
    logger: silentLogger,
    sleep,
    time,
    ...(signal && { signal }),
    checkHealth: (name) =>
      pollDeploymentHealth({
        client: cluster,
        namespace: target.namespace,
        name,
        ...plan.health,
        logger: silentLogger,
        sleep,
        now: time.ms,
        ...(signal && { signal }),
      }),
  };
}
