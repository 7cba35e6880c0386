/**
 * Health Check Module
 * Reachability checks for the Docker daemon and the Kubernetes API
 */

import type { Logger } from './logger';
import { extractErrorMessage } from './errors';
import { withTimeout } from './clock';

/**
 * Status of an individual dependency
 */
export interface DependencyStatus {
  available: boolean;
  detail?: string;
  error?: string;
}

export interface HealthReport {
  status: 'healthy' | 'degraded';
  dependencies: {
    docker?: DependencyStatus;
    kubernetes?: DependencyStatus;
  };
}

/**
 * Anything that answers a ping; both platform clients do
 */
export interface Pingable {
  ping(): Promise<boolean>;
}

/**
 * Default timeout for health checks in milliseconds
 */
const DEFAULT_TIMEOUT_MS = 3000;

async function checkDependency(
  name: string,
  client: Pingable,
  logger: Logger,
  timeout: number,
): Promise<DependencyStatus> {
  try {
    const connected = await withTimeout(client.ping(), timeout, `${name} health check`);
    if (connected) {
      return { available: true, detail: 'connected' };
    }
    return { available: false, error: `Unable to reach ${name}` };
  } catch (error) {
    logger.debug({ dependency: name, error: extractErrorMessage(error) }, 'Health check failed');
    return { available: false, error: extractErrorMessage(error) };
  }
}

/**
 * Check Docker daemon health and connectivity
 */
export function checkDockerHealth(
  client: Pingable,
  logger: Logger,
  options: { timeout?: number } = {},
): Promise<DependencyStatus> {
  return checkDependency('Docker daemon', client, logger, options.timeout ?? DEFAULT_TIMEOUT_MS);
}

/**
 * Check Kubernetes cluster health and connectivity
 */
export function checkKubernetesHealth(
  client: Pingable,
  logger: Logger,
  options: { timeout?: number } = {},
): Promise<DependencyStatus> {
  return checkDependency('Kubernetes cluster', client, logger, options.timeout ?? DEFAULT_TIMEOUT_MS);
}

/**
 * Healthy only when every checked dependency is available
 */
export function summarizeHealth(dependencies: HealthReport['dependencies']): HealthReport {
  const statuses = Object.values(dependencies).filter((s): s is DependencyStatus => s !== undefined);
  const healthy = statuses.length > 0 && statuses.every((s) => s.available);
  return { status: healthy ? 'healthy' : 'degraded', dependencies };
}
