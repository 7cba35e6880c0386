/**
 * Tests for kubeconfig discovery utilities
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { discoverKubeconfigPath, validateKubeconfig } from '@/infra/kubernetes/kubeconfig-discovery';

const KUBECONFIG_YAML = `apiVersion: v1
kind: Config
clusters:
- name: test-cluster
  cluster:
    server: https://127.0.0.1:6443
contexts:
- name: test-context
  context:
    cluster: test-cluster
    user: test-user
current-context: test-context
users:
- name: test-user
  user:
    token: test-secret
`;

describe('kubeconfig-discovery', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'podgate-kube-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  describe('discoverKubeconfigPath', () => {
    it('takes the first existing entry of KUBECONFIG', () => {
      const file = writeConfig('config', KUBECONFIG_YAML);
      const missing = path.join(dir, 'missing');

      const result = discoverKubeconfigPath({ KUBECONFIG: `${missing}${path.delimiter}${file}` });

      expect(result).toEqual({ ok: true, value: file });
    });

    it('fails when KUBECONFIG names no existing file', () => {
      const missing = path.join(dir, 'missing');

      const result = discoverKubeconfigPath({ KUBECONFIG: missing });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe(`KUBECONFIG is set but no file exists: ${missing}`);
        expect(result.guidance?.hint).toBe('KUBECONFIG points to a non-existent file');
      }
    });
  });

  describe('validateKubeconfig', () => {
    it('reports the current context, cluster and user', () => {
      const file = writeConfig('config', KUBECONFIG_YAML);

      expect(validateKubeconfig(file)).toEqual({
        ok: true,
        value: { path: file, contextName: 'test-context', clusterName: 'test-cluster', user: 'test-user' },
      });
    });

    it('fails for a file without a current context', () => {
      const file = writeConfig('no-context', KUBECONFIG_YAML.replace('current-context: test-context\n', ''));

      const result = validateKubeconfig(file);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe('No current context set in kubeconfig');
      }
    });

    it('fails for a missing file', () => {
      const missing = path.join(dir, 'absent');

      const result = validateKubeconfig(missing);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe(`Kubeconfig file does not exist: ${missing}`);
      }
    });
  });
});
