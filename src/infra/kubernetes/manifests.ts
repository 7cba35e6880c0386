/**
 * Manifest file loading and generic apply
 */

import { readFile } from 'node:fs/promises';
import * as k8s from '@kubernetes/client-node';
import yaml from 'js-yaml';
import type { Logger } from '@/lib/logger';
import { getStatusCode, extractErrorMessage } from '@/lib/errors';
import { Success, Failure, type Result } from '@/types';
import { extractK8sErrorGuidance } from './errors';

export interface AppliedResource {
  kind: string;
  name: string;
  namespace?: string;
  action: 'created' | 'patched';
}

const CLUSTER_SCOPED_KINDS = new Set(['Namespace', 'ClusterRole', 'ClusterRoleBinding', 'PersistentVolume']);

export function isKubernetesObject(value: unknown): value is k8s.KubernetesObject & {
  kind: string;
  apiVersion: string;
  metadata: k8s.V1ObjectMeta & { name: string };
} {
  if (typeof value !== 'object' || value === null) return false;
  if (!('kind' in value) || typeof value.kind !== 'string') return false;
  if (!('apiVersion' in value) || typeof value.apiVersion !== 'string') return false;
  if (!('metadata' in value) || typeof value.metadata !== 'object' || value.metadata === null) return false;
  return 'name' in value.metadata && typeof value.metadata.name === 'string' && value.metadata.name !== '';
}

/**
 * Parse every YAML document in `content`. Empty documents are skipped.
 */
export function parseManifests(content: string): Result<k8s.KubernetesObject[]> {
  let documents: unknown[];
  try {
    documents = yaml.loadAll(content);
  } catch (error) {
    return Failure(`Invalid YAML: ${extractErrorMessage(error)}`, {
      message: 'Manifest is not valid YAML',
      hint: extractErrorMessage(error),
      resolution: 'Fix the YAML syntax; `kubectl apply --dry-run=client -f <file>` reports the line',
    });
  }

  const manifests: k8s.KubernetesObject[] = [];
  for (const [index, doc] of documents.entries()) {
    if (doc === null || doc === undefined) continue;
    if (!isKubernetesObject(doc)) {
      return Failure(`Document ${index + 1} is not a Kubernetes object`, {
        message: 'Manifest document is missing apiVersion, kind or metadata.name',
        resolution: 'Every document needs apiVersion, kind and metadata.name',
        details: { document: index + 1 },
      });
    }
    manifests.push(doc);
  }
  return Success(manifests);
}

export async function loadManifestFile(filePath: string): Promise<Result<k8s.KubernetesObject[]>> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    return Failure(`Cannot read manifest ${filePath}: ${extractErrorMessage(error)}`, {
      message: 'Manifest file not readable',
      hint: extractErrorMessage(error),
      resolution: 'Check the path and file permissions',
      details: { filePath },
    });
  }
  return parseManifests(content);
}

/**
 * Create each manifest, patching those that already exist
 */
export async function applyManifests(
  kc: k8s.KubeConfig,
  manifests: k8s.KubernetesObject[],
  namespace: string,
  logger: Logger,
): Promise<Result<AppliedResource[]>> {
  const objectApi = k8s.KubernetesObjectApi.makeApiClient(kc);
  const applied: AppliedResource[] = [];

  for (const manifest of manifests) {
    const kind = manifest.kind ?? 'Unknown';
    const name = manifest.metadata?.name ?? '';
    const scoped = !CLUSTER_SCOPED_KINDS.has(kind);
    const resource: k8s.KubernetesObject =
      scoped && !manifest.metadata?.namespace
        ? { ...manifest, metadata: { ...manifest.metadata, namespace } }
        : manifest;
    const resourceNamespace = scoped ? resource.metadata?.namespace : undefined;
    const entry = { kind, name, ...(resourceNamespace ? { namespace: resourceNamespace } : {}) };

    try {
      await objectApi.create(resource);
      logger.info(entry, 'Resource created');
      applied.push({ ...entry, action: 'created' });
    } catch (createError) {
      if (getStatusCode(createError) !== 409) {
        const guidance = extractK8sErrorGuidance(createError, `create ${kind}`);
        logger.error({ ...entry, error: guidance.message }, 'Resource create failed');
        return Failure(`Failed to create ${kind} ${name}: ${guidance.message}`, guidance);
      }
      try {
        await objectApi.patch(resource);
        logger.info(entry, 'Resource patched');
        applied.push({ ...entry, action: 'patched' });
      } catch (patchError) {
        const guidance = extractK8sErrorGuidance(patchError, `patch ${kind}`);
        logger.error({ ...entry, error: guidance.message }, 'Resource patch failed');
        return Failure(`Failed to patch ${kind} ${name}: ${guidance.message}`, guidance);
      }
    }
  }

  return Success(applied);
}
