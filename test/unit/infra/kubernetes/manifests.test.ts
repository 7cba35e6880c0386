import { describe, it, expect, afterEach, jest } from '@jest/globals';
import * as k8s from '@kubernetes/client-node';
import { applyManifests, isKubernetesObject, parseManifests } from '@/infra/kubernetes/manifests';
import { silentLogger } from '../../../__support__/utilities/net-helpers';
import { apiError, apiResponse, testKubeConfig } from '../../../__support__/utilities/kubernetes';

const TWO_DOCUMENTS = `apiVersion: v1
kind: Service
metadata:
  name: kafka
spec:
  ports:
  - port: 9092
---
---
apiVersion: apps/v1
kind: StatefulSet
metadata:
  name: kafka
`;

describe('manifests', () => {
  describe('parseManifests', () => {
    it('parses every document and skips empty ones', () => {
      const result = parseManifests(TWO_DOCUMENTS);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.map((m) => m.kind)).toEqual(['Service', 'StatefulSet']);
      }
    });

    it('rejects a document without metadata.name', () => {
      const result = parseManifests('apiVersion: v1\nkind: ConfigMap\nmetadata: {}\n');

      expect(result).toMatchObject({ ok: false, error: 'Document 1 is not a Kubernetes object' });
    });

    it('rejects invalid YAML', () => {
      const result = parseManifests('kind: [unclosed');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.startsWith('Invalid YAML: ')).toBe(true);
        expect(result.guidance?.message).toBe('Manifest is not valid YAML');
      }
    });
  });

  describe('isKubernetesObject', () => {
    it('requires apiVersion, kind and a non-empty name', () => {
      expect(isKubernetesObject({ apiVersion: 'v1', kind: 'Pod', metadata: { name: 'kafka-0' } })).toBe(true);
      expect(isKubernetesObject({ apiVersion: 'v1', kind: 'Pod', metadata: { name: '' } })).toBe(false);
      expect(isKubernetesObject({ kind: 'Pod', metadata: { name: 'kafka-0' } })).toBe(false);
      expect(isKubernetesObject('Pod')).toBe(false);
    });
  });

  describe('applyManifests', () => {
    const response = apiResponse();
    const service: k8s.KubernetesObject = {
      apiVersion: 'v1',
      kind: 'Service',
      metadata: { name: 'kafka' },
    };
    const statefulSet: k8s.KubernetesObject = {
      apiVersion: 'apps/v1',
      kind: 'StatefulSet',
      metadata: { name: 'kafka', namespace: 'brokers' },
    };
    const namespaceObject: k8s.KubernetesObject = {
      apiVersion: 'v1',
      kind: 'Namespace',
      metadata: { name: 'streaming' },
    };

    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('creates new resources and patches ones that already exist', async () => {
      const create = jest.spyOn(k8s.KubernetesObjectApi.prototype, 'create').mockImplementation(async (spec) => {
        if (spec.kind === 'Service') {
          throw apiError(409, 'services "kafka" already exists');
        }
        return { response, body: spec };
      });
      const patch = jest
        .spyOn(k8s.KubernetesObjectApi.prototype, 'patch')
        .mockImplementation(async (spec) => ({ response, body: spec }));

      const result = await applyManifests(
        testKubeConfig(),
        [namespaceObject, service, statefulSet],
        'streaming',
        silentLogger(),
      );

      expect(result).toEqual({
        ok: true,
        value: [
          { kind: 'Namespace', name: 'streaming', action: 'created' },
          { kind: 'Service', name: 'kafka', namespace: 'streaming', action: 'patched' },
          { kind: 'StatefulSet', name: 'kafka', namespace: 'brokers', action: 'created' },
        ],
      });
      expect(create).toHaveBeenCalledTimes(3);
      expect(create.mock.calls[0]?.[0].metadata).toEqual({ name: 'streaming' });
      expect(patch).toHaveBeenCalledTimes(1);
      expect(patch.mock.calls[0]?.[0].metadata).toEqual({ name: 'kafka', namespace: 'streaming' });
    });

    it('stops at the first resource that cannot be created', async () => {
      jest
        .spyOn(k8s.KubernetesObjectApi.prototype, 'create')
        .mockRejectedValue(apiError(403, 'services is forbidden'));
      const patch = jest.spyOn(k8s.KubernetesObjectApi.prototype, 'patch');

      const result = await applyManifests(testKubeConfig(), [service, statefulSet], 'streaming', silentLogger());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe('Failed to create Service kafka: Kubernetes authorization failed');
      }
      expect(patch).not.toHaveBeenCalled();
    });

    it('reports a failed patch', async () => {
      jest
        .spyOn(k8s.KubernetesObjectApi.prototype, 'create')
        .mockRejectedValue(apiError(409, 'services "kafka" already exists'));
      jest
        .spyOn(k8s.KubernetesObjectApi.prototype, 'patch')
        .mockRejectedValue(apiError(422, 'spec.ports: Required value'));

      const result = await applyManifests(testKubeConfig(), [service], 'streaming', silentLogger());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe('Failed to patch Service kafka: Kubernetes resource validation failed');
      }
    });
  });
});
