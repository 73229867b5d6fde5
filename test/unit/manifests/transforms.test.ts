/**
 * Unit Tests: Manifest Transforms
 */

import {
  canaryHostFor,
  canaryReplicaSplit,
  containerImage,
  sanitizeLiveObject,
  setContainerImage,
  toCanaryService,
  toPreviewService,
  toSlotDeployment,
  toTrackDeployment,
  withNamespace,
  withRevision,
  withTrafficWeights,
} from '../../../src/manifests';
import { ErrorCodes } from '../../../src/lib/errors';
import { deployment, service, virtualService } from '../../__support__/helpers';

describe('withNamespace', () => {
  it('fills in a missing namespace', () => {
    expect(withNamespace(service(), 'shop').metadata.namespace).toBe('shop');
  });

  it('keeps an explicit namespace and leaves cluster-scoped kinds alone', () => {
    expect(withNamespace(service('web', { namespace: 'prod' }), 'shop').metadata.namespace).toBe('prod');
    const ns = { apiVersion: 'v1', kind: 'Namespace', metadata: { name: 'shop' } };
    expect(withNamespace(ns, 'other').metadata).toEqual({ name: 'shop' });
  });
});

describe('withRevision', () => {
  it('adds the revision annotation and managed-by label without touching the input', () => {
    const input = deployment();
    const stamped = withRevision(input, 7);

    expect(stamped.metadata.annotations).toEqual({ 'kube-rollout/revision': '7' });
    expect(stamped.metadata.labels).toEqual({ 'app.kubernetes.io/managed-by': 'kube-rollout' });
    expect(input.metadata.annotations).toBeUndefined();
  });
});

describe('setContainerImage', () => {
  const twoContainers = () => {
    const base = deployment();
    return {
      ...base,
      spec: {
        ...base.spec,
        template: {
          ...base.spec.template,
          spec: {
            containers: [
              { name: 'app', image: 'registry.local/web:1.0.0' },
              { name: 'sidecar', image: 'registry.local/proxy:2.0' },
            ],
          },
        },
      },
    };
  };

  it('replaces the first container image by default', () => {
    const updated = setContainerImage(twoContainers(), 'registry.local/web:1.1.0');

    expect(updated.spec.template.spec.containers.map((c) => c.image)).toEqual([
      'registry.local/web:1.1.0',
      'registry.local/proxy:2.0',
    ]);
  });

  it('targets a named container', () => {
    const updated = setContainerImage(twoContainers(), 'registry.local/proxy:2.1', 'sidecar');

    expect(containerImage(updated, 'sidecar')).toBe('registry.local/proxy:2.1');
    expect(containerImage(updated)).toBe('registry.local/web:1.0.0');
  });

  it('fails for an unknown container', () => {
    let caught: unknown;
    try {
      setContainerImage(twoContainers(), 'x', 'db');
    } catch (error) {
      caught = error;
    }

    expect(caught).toMatchObject({
      code: ErrorCodes.TARGET_NOT_FOUND,
      message: 'Container db not found in Deployment web',
      details: { container: 'db', available: ['app', 'sidecar'] },
    });
  });
});

describe('slot and track variants', () => {
  it('renames slot Deployments and adds the slot to selector and pods', () => {
    const green = toSlotDeployment(deployment(), 'green');

    expect(green.metadata.name).toBe('web-green');
    expect(green.spec.selector.matchLabels).toEqual({ app: 'web', 'kube-rollout/slot': 'green' });
    expect(green.spec.template.metadata.labels).toEqual({ app: 'web', 'kube-rollout/slot': 'green' });
  });

  it('keeps the stable selector and only labels the pods', () => {
    const stable = toTrackDeployment(deployment(), 'stable');

    expect(stable.metadata.name).toBe('web');
    expect(stable.spec.selector.matchLabels).toEqual({ app: 'web' });
    expect(stable.spec.template.metadata.labels).toEqual({ app: 'web', 'kube-rollout/track': 'stable' });
  });

  it('gives the canary its own name, selector and replica count', () => {
    const canary = toTrackDeployment(deployment(), 'canary', 1);

    expect(canary.metadata.name).toBe('web-canary');
    expect(canary.spec.replicas).toBe(1);
    expect(canary.spec.selector.matchLabels).toEqual({ app: 'web', 'kube-rollout/track': 'canary' });
  });
});

describe('service clones', () => {
  const allocated = () => {
    const base = service();
    return {
      ...base,
      spec: { ...base.spec, clusterIP: '10.0.0.12', clusterIPs: ['10.0.0.12'], ports: [{ port: 80, nodePort: 30080 }] },
    };
  };

  it('drops allocated addresses from the preview Service', () => {
    const preview = toPreviewService(allocated(), 'blue');

    expect(preview.metadata.name).toBe('web-preview');
    expect(preview.spec).toEqual({ selector: { app: 'web', 'kube-rollout/slot': 'blue' }, ports: [{ port: 80 }] });
  });

  it('selects canary pods from the canary Service', () => {
    const canary = toCanaryService(service());

    expect(canary.metadata.name).toBe('web-canary');
    expect(canary.spec.selector).toEqual({ app: 'web', 'kube-rollout/track': 'canary' });
  });
});

describe('withTrafficWeights', () => {
  it('splits routes to the stable host between stable and canary', () => {
    const weighted = withTrafficWeights(virtualService('web', 'web.shop.svc.cluster.local'), 'web', 'shop', 25);

    expect(weighted.spec.http?.[0]?.route).toEqual([
      { destination: { host: 'web.shop.svc.cluster.local' }, weight: 75 },
      { destination: { host: 'web-canary.shop.svc.cluster.local' }, weight: 25 },
    ]);
  });

  it('collapses to the stable destination at weight 0', () => {
    const weighted = withTrafficWeights(virtualService(), 'web', 'shop', 0);

    expect(weighted.spec.http?.[0]?.route).toEqual([{ destination: { host: 'web' }, weight: 100 }]);
  });

  it('leaves routes to other hosts untouched', () => {
    const weighted = withTrafficWeights(virtualService('web', 'api'), 'web', 'shop', 50);

    expect(weighted.spec.http?.[0]?.route).toEqual([{ destination: { host: 'api' } }]);
  });

  it('keeps the qualification of the stable host', () => {
    expect(canaryHostFor('web.prod', 'web')).toBe('web-canary.prod');
  });
});

describe('canaryReplicaSplit', () => {
  it.each([
    [4, 20, { canary: 1, stable: 3 }],
    [4, 50, { canary: 2, stable: 2 }],
    [10, 33, { canary: 4, stable: 6 }],
    [1, 10, { canary: 1, stable: 0 }],
    [4, 100, { canary: 4, stable: 0 }],
    [0, 100, { canary: 0, stable: 0 }],
  ])('splits %i replicas at %i%%', (desired, weight, expected) => {
    expect(canaryReplicaSplit(desired, weight)).toEqual(expected);
  });
});

describe('sanitizeLiveObject', () => {
  it('removes status and server-populated metadata', () => {
    const live = {
      ...deployment('web', { namespace: 'shop' }),
      metadata: {
        name: 'web',
        namespace: 'shop',
        uid: 'abc',
        resourceVersion: '42',
        generation: 3,
        annotations: { 'deployment.kubernetes.io/revision': '5', team: 'payments' },
      },
      status: { replicas: 4 },
    };

    const clean = sanitizeLiveObject(live);

    expect(clean.metadata).toEqual({ name: 'web', namespace: 'shop', annotations: { team: 'payments' } });
    expect('status' in clean).toBe(false);
  });
});
