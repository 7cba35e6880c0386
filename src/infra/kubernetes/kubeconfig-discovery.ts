/**
 * Kubeconfig discovery and validation
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import * as k8s from '@kubernetes/client-node';
import { Success, Failure, type Result } from '@/types';

export interface KubeconfigInfo {
  path: string;
  contextName: string;
  clusterName: string;
  user: string;
}

/**
 * Discover kubeconfig location the way kubectl does:
 * the first existing entry of KUBECONFIG, then ~/.kube/config.
 */
export function discoverKubeconfigPath(
  env: Record<string, string | undefined> = process.env,
): Result<string> {
  const kubeconfigEnv = env.KUBECONFIG;
  if (kubeconfigEnv) {
    const found = kubeconfigEnv.split(path.delimiter).find((p) => p && fs.existsSync(p));
    if (found) {
      return Success(found);
    }
    return Failure(`KUBECONFIG is set but no file exists: ${kubeconfigEnv}`, {
      message: 'Kubeconfig file not found',
      hint: 'KUBECONFIG points to a non-existent file',
      resolution: 'Fix the path in KUBECONFIG, or unset it to use ~/.kube/config',
      details: { kubeconfigEnv },
    });
  }

  const defaultPath = path.join(os.homedir(), '.kube', 'config');
  if (fs.existsSync(defaultPath)) {
    return Success(defaultPath);
  }

  return Failure('Kubeconfig not found', {
    message: 'No kubeconfig file found',
    hint: 'Neither KUBECONFIG nor ~/.kube/config exists',
    resolution: 'Configure cluster access with kubectl, then run `kubectl config view` to confirm',
    details: { defaultPath },
  });
}

/**
 * Check that a kubeconfig file parses and has a current context
 */
export function validateKubeconfig(configPath: string): Result<KubeconfigInfo> {
  if (!fs.existsSync(configPath)) {
    return Failure(`Kubeconfig file does not exist: ${configPath}`, {
      message: 'Kubeconfig file not found',
      hint: `File does not exist at path: ${configPath}`,
      resolution: 'Verify the kubeconfig path is correct and the file exists.',
      details: { configPath },
    });
  }

  const kc = new k8s.KubeConfig();
  try {
    kc.loadFromFile(configPath);
  } catch (error) {
    return Failure(`Failed to parse kubeconfig: ${configPath}`, {
      message: 'Invalid kubeconfig format',
      hint: 'The kubeconfig file could not be parsed',
      resolution: 'Run `kubectl config view` to check the file for syntax errors.',
      details: { configPath, error: String(error) },
    });
  }

  const currentContext = kc.getCurrentContext();
  if (!currentContext) {
    return Failure('No current context set in kubeconfig', {
      message: 'No active Kubernetes context',
      hint: 'The kubeconfig file has no current context configured',
      resolution: 'Select one with `kubectl config use-context <context-name>`.',
      details: { configPath },
    });
  }

  return Success({
    path: configPath,
    contextName: currentContext,
    clusterName: kc.getCurrentCluster()?.name ?? 'unknown',
    user: kc.getCurrentUser()?.name ?? 'unknown',
  });
}

/**
 * True when running inside a pod with a mounted service account
 */
export function isInCluster(): boolean {
  return (
    fs.existsSync('/var/run/secrets/kubernetes.io/serviceaccount/token') &&
    fs.existsSync('/var/run/secrets/kubernetes.io/serviceaccount/ca.crt')
  );
}
