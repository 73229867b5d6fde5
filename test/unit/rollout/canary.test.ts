/**
 * Unit Tests: Canary strategy
 */

import { DeploymentSchema, VirtualServiceSchema, type CanaryStep, type ResolvedPlan } from '../../../src/domain/types';
import { containerImage, toTrackDeployment } from '../../../src/manifests';
import { CanaryStrategy } from '../../../src/rollout/strategies';
import { FakeCluster } from '../../__support__/fake-cluster';
import {
  deployment,
  shopTarget,
  strategyContext,
  testPlan,
  virtualService,
} from '../../__support__/helpers';

const liveStable = () => deployment('web', { namespace: 'shop', image: 'registry.local/web:1.0.0' });

const canaryPlan = (steps: CanaryStep[], trafficRouting: ResolvedPlan['canary']['trafficRouting'] = 'replicas') =>
  testPlan({ canary: { trafficRouting, steps } });

const liveDeployment = (cluster: FakeCluster, name: string) => {
  const parsed = DeploymentSchema.safeParse(cluster.find('Deployment', 'shop', name));
  return parsed.success ? parsed.data : undefined;
};

describe('CanaryStrategy', () => {
  const strategy = new CanaryStrategy();

  it('describes replica splits per step', () => {
    const plan = canaryPlan([{ setWeight: 25 }, { pause: { durationMs: 5000 } }, { setWeight: 100 }]);

    expect(strategy.describe(shopTarget(), plan)).toEqual([
      'if web does not exist yet, fall back to a rolling update',
      'set weight 25% (canary 1, stable 3 replicas)',
      'pause for 5000ms',
      'set weight 100% (canary 4, stable 0 replicas)',
      'promote: update web to 4 replicas and remove web-canary',
    ]);
  });

  it('describes VirtualService routing', () => {
    const target = shopTarget({ virtualService: virtualService('web', 'web', 'shop') });

    expect(strategy.describe(target, canaryPlan([{ setWeight: 40 }], 'virtual-service'))).toEqual([
      'if web does not exist yet, fall back to a rolling update',
      'route through VirtualService web',
      'route 40% of traffic to the canary',
      'promote: update web to 4 replicas and remove web-canary',
    ]);
  });

  it('falls back to a rolling update when the Deployment does not exist', async () => {
    const cluster = new FakeCluster();

    const result = await strategy.execute(strategyContext(cluster, shopTarget(), canaryPlan([{ setWeight: 50 }])));

    expect(result).toEqual({ phase: 'succeeded', message: 'Deployment web rolled out' });
    expect(cluster.operations).toEqual(['apply Service/shop/web', 'apply Deployment/shop/web']);
  });

  it('shifts replicas step by step and promotes the stable Deployment', async () => {
    const cluster = new FakeCluster().seed(liveStable());
    const context = strategyContext(
      cluster,
      shopTarget(),
      canaryPlan([{ setWeight: 25 }, { pause: { durationMs: 5000 } }, { setWeight: 50 }]),
    );

    const result = await strategy.execute(context);

    expect(result).toEqual({ phase: 'succeeded', message: 'Canary promoted; web runs the new version' });
    expect(cluster.operations).toEqual([
      'apply Deployment/shop/web-canary',
      'scale shop/web 3',
      'apply Deployment/shop/web-canary',
      'scale shop/web 2',
      'apply Deployment/shop/web',
      'delete Deployment/shop/web-canary',
    ]);
    expect(context.time.slept).toEqual([5000]);
    expect(context.machine.history.map((r) => r.to)).toEqual([
      'progressing',
      'paused',
      'progressing',
      'promoting',
      'succeeded',
    ]);

    const promoted = liveDeployment(cluster, 'web');
    expect(promoted?.spec.replicas).toBe(4);
    expect(promoted && containerImage(promoted)).toBe('registry.local/web:2.0.0');
    expect(cluster.find('Deployment', 'shop', 'web-canary')).toBeUndefined();
  });

  it('restores stable replicas and removes the canary when a step fails', async () => {
    const cluster = new FakeCluster().seed(liveStable()).script('shop', 'web-canary', 'ready', 'failed');

    const result = await strategy.execute(
      strategyContext(cluster, shopTarget(), canaryPlan([{ setWeight: 25 }, { setWeight: 50 }])),
    );

    expect(result).toEqual({ phase: 'rolled-back', message: 'Deployment web-canary exceeded its progress deadline' });
    expect(cluster.operations).toEqual([
      'apply Deployment/shop/web-canary',
      'scale shop/web 3',
      'apply Deployment/shop/web-canary',
      'scale shop/web 2',
      'scale shop/web 4',
      'delete Deployment/shop/web-canary',
    ]);
    const stable = liveDeployment(cluster, 'web');
    expect(stable?.spec.replicas).toBe(4);
    expect(stable && containerImage(stable)).toBe('registry.local/web:1.0.0');
  });

  it('re-applies the previous stable Deployment when the promoted one fails', async () => {
    const cluster = new FakeCluster().seed(liveStable()).script('shop', 'web', 'failed');

    const result = await strategy.execute(strategyContext(cluster, shopTarget(), canaryPlan([{ setWeight: 100 }])));

    expect(result.phase).toBe('rolled-back');
    expect(cluster.operations).toEqual([
      'apply Deployment/shop/web-canary',
      'scale shop/web 0',
      'apply Deployment/shop/web',
      'apply Deployment/shop/web',
      'delete Deployment/shop/web-canary',
    ]);
    const stable = liveDeployment(cluster, 'web');
    expect(stable?.spec.replicas).toBe(4);
    expect(stable && containerImage(stable)).toBe('registry.local/web:1.0.0');
  });

  it('aborts during a pause and cleans up', async () => {
    const controller = new AbortController();
    const cluster = new FakeCluster().seed(liveStable());
    const context = strategyContext(
      cluster,
      shopTarget(),
      canaryPlan([{ setWeight: 25 }, { pause: { durationMs: 60_000 } }, { setWeight: 100 }]),
      {
        signal: controller.signal,
        sleep: async () => {
          controller.abort();
        },
      },
    );

    const result = await strategy.execute(context);

    expect(result).toEqual({ phase: 'aborted', message: 'Rollout aborted' });
    expect(cluster.operations).toEqual([
      'apply Deployment/shop/web-canary',
      'scale shop/web 3',
      'scale shop/web 4',
      'delete Deployment/shop/web-canary',
    ]);
    expect(context.machine.history.map((r) => r.event)).toEqual(['start', 'pause', 'abort', 'complete']);
  });

  describe('with VirtualService routing', () => {
    const routedTarget = () => shopTarget({ virtualService: virtualService('web', 'web', 'shop') });

    it('shifts VirtualService weights and resets them after promotion', async () => {
      const cluster = new FakeCluster().seed(toTrackDeployment(liveStable(), 'stable'));
      const context = strategyContext(
        cluster,
        routedTarget(),
        canaryPlan([{ setWeight: 30 }, { setWeight: 100 }], 'virtual-service'),
      );

      const result = await strategy.execute(context);

      expect(result.phase).toBe('succeeded');
      expect(cluster.operations).toEqual([
        'apply Service/shop/web',
        'apply Service/shop/web-canary',
        'apply Deployment/shop/web-canary',
        'apply VirtualService/shop/web',
        'apply Deployment/shop/web-canary',
        'apply VirtualService/shop/web',
        'apply Deployment/shop/web',
        'apply VirtualService/shop/web',
        'delete Deployment/shop/web-canary',
        'delete Service/shop/web-canary',
      ]);
      expect(cluster.find('Service', 'shop', 'web')).toMatchObject({
        spec: { selector: { app: 'web', 'kube-rollout/track': 'stable' } },
      });
      const routes = VirtualServiceSchema.safeParse(cluster.find('VirtualService', 'shop', 'web'));
      expect(routes.success && routes.data.spec.http?.[0]?.route).toEqual([{ destination: { host: 'web' }, weight: 100 }]);
    });

    it('resets the weights when the promoted Deployment fails', async () => {
      const cluster = new FakeCluster()
        .seed(toTrackDeployment(liveStable(), 'stable'))
        .script('shop', 'web', 'failed');

      const result = await strategy.execute(
        strategyContext(cluster, routedTarget(), canaryPlan([{ setWeight: 30 }], 'virtual-service')),
      );

      expect(result.phase).toBe('rolled-back');
      expect(cluster.operations).toEqual([
        'apply Service/shop/web',
        'apply Service/shop/web-canary',
        'apply Deployment/shop/web-canary',
        'apply VirtualService/shop/web',
        'apply Deployment/shop/web',
        'apply VirtualService/shop/web',
        'apply Deployment/shop/web',
        'delete Deployment/shop/web-canary',
        'delete Service/shop/web-canary',
      ]);
      const routes = VirtualServiceSchema.safeParse(cluster.find('VirtualService', 'shop', 'web'));
      expect(routes.success && routes.data.spec.http?.[0]?.route).toEqual([{ destination: { host: 'web' }, weight: 100 }]);
    });

    it('uses replica routing until the stable pods carry the track label', async () => {
      const cluster = new FakeCluster().seed(liveStable());

      await strategy.execute(strategyContext(cluster, routedTarget(), canaryPlan([{ setWeight: 50 }], 'virtual-service')));

      expect(cluster.operations.slice(0, 2)).toEqual(['apply Deployment/shop/web-canary', 'scale shop/web 2']);
      expect(cluster.operations).not.toContain('apply VirtualService/shop/web');
    });
  });
});
