/**
 * Unit Tests: Manifest Loader
 */

import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import {
  buildBundle,
  loadManifests,
  parseManifestDocuments,
  resolveManifestPaths,
  validateManifest,
} from '../../../src/manifests';
import { ErrorCodes, ManifestError, ManifestValidationError } from '../../../src/lib/errors';

const DEPLOYMENT_YAML = `apiVersion: apps/v1
kind: Deployment
metadata:
  name: web
spec:
  replicas: 2
  selector:
    matchLabels:
      app: web
  template:
    metadata:
      labels:
        app: web
    spec:
      containers:
        - name: app
          image: registry.local/web:1.0.0
`;

const SERVICE_YAML = `apiVersion: v1
kind: Service
metadata:
  name: web
spec:
  selector:
    app: web
  ports:
    - port: 80
`;

describe('parseManifestDocuments', () => {
  it('splits multi-document YAML and drops empty documents', () => {
    const docs = parseManifestDocuments(`${DEPLOYMENT_YAML}---\n---\n${SERVICE_YAML}`, 'app.yaml');

    expect(docs).toHaveLength(2);
    expect(docs).toMatchObject([{ kind: 'Deployment' }, { kind: 'Service' }]);
  });

  it('parses content starting with a brace as JSON', () => {
    const docs = parseManifestDocuments('  {"apiVersion":"v1","kind":"ConfigMap","metadata":{"name":"cfg"}}', 'cfg.json');

    expect(docs).toEqual([{ apiVersion: 'v1', kind: 'ConfigMap', metadata: { name: 'cfg' } }]);
  });

  it('flattens List documents and JSON arrays', () => {
    const list = JSON.stringify({
      apiVersion: 'v1',
      kind: 'List',
      items: [
        { apiVersion: 'v1', kind: 'ConfigMap', metadata: { name: 'a' } },
        { apiVersion: 'v1', kind: 'ConfigMap', metadata: { name: 'b' } },
      ],
    });

    expect(parseManifestDocuments(list, 'list.json')).toHaveLength(2);
    expect(parseManifestDocuments(`[${list}, {"kind":"x"}]`, 'arr.json')).toHaveLength(3);
  });

  it('returns nothing for blank content', () => {
    expect(parseManifestDocuments('  \n\n', 'empty.yaml')).toEqual([]);
  });

  it('reports JSON syntax errors with the source', () => {
    expect(() => parseManifestDocuments('{"kind": ', 'broken.json')).toThrow(/^Failed to parse JSON in broken\.json: /);
  });

  it('reports YAML syntax errors as MANIFEST_PARSE_FAILED', () => {
    let caught: unknown;
    try {
      parseManifestDocuments('kind: [unclosed', 'broken.yaml');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ManifestError);
    expect(caught).toMatchObject({ code: ErrorCodes.MANIFEST_PARSE_FAILED, details: { source: 'broken.yaml' } });
  });
});

describe('validateManifest', () => {
  it('rejects documents missing the base fields', () => {
    expect(() => validateManifest({ kind: 'ConfigMap', metadata: { name: 'cfg' } }, 'a.yaml', 3)).toThrow(
      'Invalid manifest a.yaml#3: apiVersion: Required',
    );
  });

  it('checks kind-specific shape and names the resource', () => {
    const doc = {
      apiVersion: 'v1',
      kind: 'Service',
      metadata: { name: 'web' },
      spec: { ports: [] },
    };

    expect(() => validateManifest(doc, 'svc.yaml')).toThrow(
      'Invalid manifest svc.yaml#0 (Service/web): spec.ports: at least one port is required',
    );
  });

  it('requires the Deployment selector to match the pod template', () => {
    const doc = {
      apiVersion: 'apps/v1',
      kind: 'Deployment',
      metadata: { name: 'web' },
      spec: {
        selector: { matchLabels: { app: 'web' } },
        template: { metadata: { labels: { app: 'other' } }, spec: { containers: [{ name: 'a', image: 'i' }] } },
      },
    };

    let caught: unknown;
    try {
      validateManifest(doc, 'dep.yaml');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ManifestValidationError);
    expect(caught).toMatchObject({
      issues: ['spec.template.metadata.labels.app: selector label app=web is missing from the pod template'],
    });
  });

  it('rejects names that are not RFC 1123 subdomains', () => {
    expect(() => validateManifest({ apiVersion: 'v1', kind: 'ConfigMap', metadata: { name: 'Web_App' } }, 'x')).toThrow(
      'metadata.name: name must be a lowercase RFC 1123 subdomain',
    );
  });

  it('accepts unknown kinds against the base shape and keeps their fields', () => {
    const doc = { apiVersion: 'example.dev/v1', kind: 'Widget', metadata: { name: 'w' }, spec: { size: 3 } };

    expect(validateManifest(doc, 'w.yaml')).toEqual(doc);
  });

  it('rejects Secret data that is not base64', () => {
    const doc = { apiVersion: 'v1', kind: 'Secret', metadata: { name: 's' }, data: { password: 'not base64!' } };

    expect(() => validateManifest(doc, 's.yaml')).toThrow('data.password: must be base64 encoded');
  });
});

describe('buildBundle', () => {
  it('separates the RolloutPlan from the manifests', () => {
    const plan = `apiVersion: kube-rollout/v1
kind: RolloutPlan
metadata:
  name: web-plan
spec:
  strategy: canary
`;
    const bundle = buildBundle([
      { source: 'app.yaml', content: `${DEPLOYMENT_YAML}---\n${SERVICE_YAML}` },
      { source: 'plan.yaml', content: plan },
    ]);

    expect(bundle.manifests.map((m) => m.kind)).toEqual(['Deployment', 'Service']);
    expect(bundle.plan?.metadata.name).toBe('web-plan');
    expect(bundle.plan?.spec.strategy).toBe('canary');
    expect(bundle.sources).toEqual(['app.yaml', 'plan.yaml']);
  });

  it('rejects a second RolloutPlan', () => {
    const plan = 'apiVersion: kube-rollout/v1\nkind: RolloutPlan\nmetadata:\n  name: p\nspec: {}\n';

    expect(() =>
      buildBundle([{ source: 'a.yaml', content: `${DEPLOYMENT_YAML}---\n${plan}---\n${plan}` }]),
    ).toThrow('Only one RolloutPlan is allowed; found another in a.yaml#2 after a.yaml#1');
  });

  it('rejects canary steps that do not end with a weight', () => {
    const plan = `apiVersion: kube-rollout/v1
kind: RolloutPlan
metadata:
  name: p
spec:
  canary:
    steps:
      - setWeight: 20
      - pause:
          durationMs: 1000
`;

    expect(() => buildBundle([{ source: 'p.yaml', content: `${DEPLOYMENT_YAML}---\n${plan}` }])).toThrow(
      'Invalid manifest p.yaml#1 (RolloutPlan): spec.canary: canary steps must end with a setWeight step',
    );
  });

  it('rejects duplicate resources across files', () => {
    let caught: unknown;
    try {
      buildBundle([
        { source: 'a.yaml', content: SERVICE_YAML },
        { source: 'b.yaml', content: SERVICE_YAML },
      ]);
    } catch (error) {
      caught = error;
    }

    expect(caught).toMatchObject({
      code: ErrorCodes.DUPLICATE_RESOURCE,
      message: 'Duplicate resource Service//web in b.yaml#0 (first defined in a.yaml#0)',
    });
  });

  it('treats the same name in different namespaces as distinct', () => {
    const inNamespace = SERVICE_YAML.replace('  name: web\n', '  name: web\n  namespace: shop\n');

    expect(
      buildBundle([
        { source: 'a.yaml', content: SERVICE_YAML },
        { source: 'b.yaml', content: inNamespace },
      ]).manifests,
    ).toHaveLength(2);
  });

  it('fails when no manifests were found', () => {
    expect(() => buildBundle([{ source: 'empty.yaml', content: '' }])).toThrow('No Kubernetes manifests found');
  });
});

describe('loading from disk', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'kube-rollout-manifests-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads yaml, yml and json files of a directory in name order', async () => {
    await writeFile(path.join(dir, 'b-service.yml'), SERVICE_YAML);
    await writeFile(path.join(dir, 'a-deployment.yaml'), DEPLOYMENT_YAML);
    await writeFile(
      path.join(dir, 'c-config.json'),
      JSON.stringify({ apiVersion: 'v1', kind: 'ConfigMap', metadata: { name: 'cfg' } }),
    );
    await writeFile(path.join(dir, 'notes.txt'), 'ignored');
    await mkdir(path.join(dir, 'nested'));
    await writeFile(path.join(dir, 'nested', 'skip.yaml'), SERVICE_YAML);

    const files = await resolveManifestPaths([dir]);
    expect(files).toEqual([
      path.join(dir, 'a-deployment.yaml'),
      path.join(dir, 'b-service.yml'),
      path.join(dir, 'c-config.json'),
    ]);

    const bundle = await loadManifests([dir]);
    expect(bundle.manifests.map((m) => `${m.kind}/${m.metadata.name}`)).toEqual([
      'Deployment/web',
      'Service/web',
      'ConfigMap/cfg',
    ]);
  });

  it('accepts explicit file paths', async () => {
    const file = path.join(dir, 'deployment.txt');
    await writeFile(file, DEPLOYMENT_YAML);

    const bundle = await loadManifests([file]);
    expect(bundle.sources).toEqual([file]);
  });

  it('reports a missing path', async () => {
    const missing = path.join(dir, 'missing.yaml');

    await expect(loadManifests([missing])).rejects.toMatchObject({
      code: ErrorCodes.MANIFEST_NOT_FOUND,
      message: `Manifest path not found: ${missing}`,
    });
  });
});
