/**
 * Manifest Loader
 *
 * Reads YAML/JSON manifest files, flattens List documents, validates every
 * document against its kind and assembles a ManifestBundle.
 */

import type { Stats } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import * as path from 'node:path';
import * as yaml from 'js-yaml';
import { glob } from 'glob';
import {
  KIND_SCHEMAS,
  KubernetesManifestSchema,
  PLAN_KIND,
  RolloutPlanDocumentSchema,
  type KubernetesManifest,
  type RolloutPlanDocument,
} from '../domain/types';
import {
  ErrorCodes,
  ManifestError,
  ManifestValidationError,
  formatIssues,
} from '../lib/errors';

export interface ManifestSource {
  source: string;
  content: string;
}

export interface ManifestBundle {
  manifests: KubernetesManifest[];
  plan?: RolloutPlanDocument;
  sources: string[];
}

const MANIFEST_PATTERN = '*.{yaml,yml,json}';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Expand arrays and `*List` documents into their items
 */
function flattenDocument(doc: unknown): unknown[] {
  if (Array.isArray(doc)) {
    return doc.flatMap(flattenDocument);
  }
  if (isRecord(doc) && typeof doc.kind === 'string' && doc.kind.endsWith('List') && Array.isArray(doc.items)) {
    return doc.items.flatMap(flattenDocument);
  }
  return [doc];
}

/**
 * Parse the raw documents held in a manifest file
 */
export function parseManifestDocuments(content: string, source: string): unknown[] {
  const trimmed = content.trim();
  if (trimmed === '') {
    return [];
  }

  let documents: unknown[];
  if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
    try {
      documents = [JSON.parse(trimmed)];
    } catch (error) {
      throw new ManifestError(
        `Failed to parse JSON in ${source}: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCodes.MANIFEST_PARSE_FAILED,
        { source },
        error instanceof Error ? error : undefined,
      );
    }
  } else {
    try {
      documents = yaml.loadAll(content);
    } catch (error) {
      throw new ManifestError(
        `Failed to parse YAML in ${source}: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCodes.MANIFEST_PARSE_FAILED,
        { source },
        error instanceof Error ? error : undefined,
      );
    }
  }

  return documents
    .filter((doc) => doc !== null && doc !== undefined)
    .flatMap(flattenDocument);
}

/**
 * Validate a document against the base shape and its kind-specific schema
 */
export function validateManifest(doc: unknown, source: string, index = 0): KubernetesManifest {
  const label = `${source}#${index}`;
  const base = KubernetesManifestSchema.safeParse(doc);
  if (!base.success) {
    throw new ManifestValidationError(label, formatIssues(base.error.issues));
  }

  const schema = KIND_SCHEMAS[base.data.kind];
  if (schema) {
    const specific = schema.safeParse(doc);
    if (!specific.success) {
      throw new ManifestValidationError(
        `${label} (${base.data.kind}/${base.data.metadata.name})`,
        formatIssues(specific.error.issues),
      );
    }
  }

  return base.data;
}

function validatePlan(doc: unknown, label: string): RolloutPlanDocument {
  const parsed = RolloutPlanDocumentSchema.safeParse(doc);
  if (!parsed.success) {
    throw new ManifestValidationError(`${label} (${PLAN_KIND})`, formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

const resourceKey = (manifest: KubernetesManifest): string =>
  `${manifest.kind}/${manifest.metadata.namespace ?? ''}/${manifest.metadata.name}`;

/**
 * Assemble a bundle from already-read sources
 */
export function buildBundle(sources: ManifestSource[]): ManifestBundle {
  const manifests: KubernetesManifest[] = [];
  const seen = new Map<string, string>();
  let plan: RolloutPlanDocument | undefined;
  let planSource: string | undefined;

  for (const { source, content } of sources) {
    const documents = parseManifestDocuments(content, source);

    for (const [index, doc] of documents.entries()) {
      const label = `${source}#${index}`;
      if (isRecord(doc) && doc.kind === PLAN_KIND) {
        if (plan) {
          throw new ManifestError(
            `Only one ${PLAN_KIND} is allowed; found another in ${label} after ${planSource ?? 'an earlier document'}`,
            ErrorCodes.DUPLICATE_RESOURCE,
            { source: label },
          );
        }
        plan = validatePlan(doc, label);
        planSource = label;
        continue;
      }

      const manifest = validateManifest(doc, source, index);
      const key = resourceKey(manifest);
      const previous = seen.get(key);
      if (previous) {
        throw new ManifestError(
          `Duplicate resource ${key} in ${label} (first defined in ${previous})`,
          ErrorCodes.DUPLICATE_RESOURCE,
          { key, source: label, previous },
        );
      }
      seen.set(key, label);
      manifests.push(manifest);
    }
  }

  if (manifests.length === 0) {
    throw new ManifestError('No Kubernetes manifests found', ErrorCodes.MANIFEST_NOT_FOUND, {
      sources: sources.map((s) => s.source),
    });
  }

  const bundle: ManifestBundle = { manifests, sources: sources.map((s) => s.source) };
  if (plan) {
    bundle.plan = plan;
  }
  return bundle;
}

/**
 * Expand files and directories (non-recursive) into manifest file paths
 */
export async function resolveManifestPaths(paths: string[]): Promise<string[]> {
  const files: string[] = [];

  for (const input of paths) {
    let info: Stats;
    try {
      info = await stat(input);
    } catch (error) {
      throw new ManifestError(
        `Manifest path not found: ${input}`,
        ErrorCodes.MANIFEST_NOT_FOUND,
        { path: input },
        error instanceof Error ? error : undefined,
      );
    }

    if (info.isDirectory()) {
      const matches = await glob(MANIFEST_PATTERN, { cwd: input, nodir: true });
      files.push(...matches.sort().map((match) => path.join(input, match)));
    } else {
      files.push(input);
    }
  }

  return files;
}

/**
 * Load and validate manifests from files and directories
 */
export async function loadManifests(paths: string[]): Promise<ManifestBundle> {
  const files = await resolveManifestPaths(paths);
  const sources = await Promise.all(
    files.map(async (file) => ({ source: file, content: await readFile(file, 'utf-8') })),
  );
  return buildBundle(sources);
}
