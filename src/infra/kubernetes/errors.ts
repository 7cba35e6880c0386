/**
 * Kubernetes error handling utilities with actionable guidance
 */

import type { ErrorGuidance } from '@/types';
import {
  createErrorGuidanceBuilder,
  customPattern,
  statusCodePattern,
  type ErrorPattern,
} from '@/lib/error-guidance';

/**
 * API errors carry the useful text in `body.message`; the Error message
 * itself is only "HTTP request failed".
 */
export function getK8sErrorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'body' in error) {
    const body = error.body;
    if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
      return body.message;
    }
  }
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

function messageIncludes(...needles: string[]): (error: unknown) => boolean {
  return (error: unknown) => {
    const msg = getK8sErrorMessage(error).toLowerCase();
    return needles.some((needle) => msg.includes(needle));
  };
}

/**
 * Kubernetes error patterns in order of specificity
 */
const k8sErrorPatterns: ErrorPattern[] = [
  statusCodePattern(401, {
    message: 'Kubernetes authentication failed',
    hint: 'Invalid or expired credentials',
    resolution: 'Refresh cluster credentials, then retry. `kubectl auth whoami` shows the current identity.',
  }),
  statusCodePattern(403, {
    message: 'Kubernetes authorization failed',
    hint: 'Your user or service account lacks required permissions',
    resolution: 'Check RBAC with `kubectl auth can-i <verb> <resource> -n <namespace>`.',
  }),
  statusCodePattern(404, {
    message: 'Kubernetes resource not found',
    hint: 'The requested resource does not exist in the cluster',
    resolution: 'Verify the resource name and namespace with `kubectl get <resource> -n <namespace>`.',
  }),
  statusCodePattern(409, {
    message: 'Kubernetes resource already exists',
    hint: 'A resource with this name already exists',
    resolution: 'Delete the existing resource first, or pick a different name.',
  }),
  statusCodePattern(422, {
    message: 'Kubernetes resource validation failed',
    hint: 'The resource specification is invalid',
    resolution: 'Validate the manifest with `kubectl apply --dry-run=server -f <file>`.',
  }),

  customPattern(messageIncludes('kubeconfig', 'config file'), {
    message: 'Kubernetes configuration not found',
    hint: 'Unable to locate or read kubeconfig file',
    resolution: 'Set KUBECONFIG or create ~/.kube/config. Run `kubectl config view` to verify.',
  }),
  customPattern(messageIncludes('econnrefused', 'connection refused'), {
    message: 'Cannot connect to Kubernetes cluster',
    hint: 'Connection to the Kubernetes API server was refused',
    resolution: 'Verify the cluster is running with `kubectl cluster-info` and check the API server address.',
  }),
  customPattern(messageIncludes('etimedout', 'timeout', 'timed out'), {
    message: 'Kubernetes operation timed out',
    hint: 'The API server did not respond in time',
    resolution: 'Check cluster connectivity and load. Try `kubectl get nodes`.',
  }),
  customPattern(messageIncludes('no matches for kind', 'api version'), {
    message: 'Kubernetes API version not supported',
    hint: 'The resource type or API version is not available in this cluster',
    resolution: 'Check the cluster version with `kubectl version` and update apiVersion in the manifest.',
  }),
];

function defaultK8sGuidance(error: unknown): ErrorGuidance {
  const message = getK8sErrorMessage(error);

  return {
    message: message || 'Kubernetes operation failed',
    hint: 'An error occurred during the Kubernetes operation',
    resolution: 'Run `kubectl get events --sort-by=.lastTimestamp` to see recent cluster events.',
    details: { originalError: message },
  };
}

const baseExtractor = createErrorGuidanceBuilder(k8sErrorPatterns, defaultK8sGuidance);

/**
 * Extract error with actionable guidance for Kubernetes operations
 *
 * @param operation - Included in the message of not-found errors
 */
export function extractK8sErrorGuidance(error: unknown, operation?: string): ErrorGuidance {
  const guidance = baseExtractor(error);

  if (operation && guidance.message === 'Kubernetes resource not found') {
    return {
      ...guidance,
      message: `Kubernetes resource not found (${operation})`,
    };
  }

  return guidance;
}
