/**
 * Kubernetes Client - Direct k8s API Access
 *
 * Pod, workload and service operations on top of @kubernetes/client-node.
 * Every operation resolves to a Result; API errors are mapped to guidance.
 */

import { PassThrough } from 'node:stream';
import * as k8s from '@kubernetes/client-node';
import type { Logger } from '@/lib/logger';
import { withTimeout } from '@/lib/clock';
import { ERROR_MESSAGES, TimeoutError, extractErrorMessage, getStatusCode, tagNotFound } from '@/lib/errors';
import { DEFAULT_TIMEOUTS } from '@/config/constants';
import { Success, Failure, type Result } from '@/types';
import { extractK8sErrorGuidance } from './errors';
import { discoverKubeconfigPath, isInCluster, validateKubeconfig } from './kubeconfig-discovery';
import { applyManifests, loadManifestFile, type AppliedResource } from './manifests';

export interface PodSummary {
  name: string;
  namespace: string;
  phase: string;
  /** Running with every container reporting ready */
  ready: boolean;
  containers: string[];
  labels: Record<string, string>;
}

export interface DeploymentResult {
  ready: boolean;
  readyReplicas: number;
  totalReplicas: number;
}

export interface ExecOptions {
  /** Defaults to the pod's first container */
  container?: string;
  timeoutMs?: number;
}

export interface PodLogOptions {
  container?: string;
  tailLines?: number;
}

export interface NodePortOptions {
  port?: number;
  targetPort?: number;
  nodePort?: number;
  /** Pod selector; defaults to `app=<serviceName>` */
  selector?: Record<string, string>;
}

export interface KubernetesClient {
  /** Loaded kubeconfig, shared with the port-forward connector */
  readonly kubeConfig: k8s.KubeConfig;
  listPods(namespace: string, labelSelector?: string): Promise<Result<PodSummary[]>>;
  /** `Success(null)` when the pod does not exist */
  getPod(namespace: string, name: string): Promise<Result<PodSummary | null>>;
  execInPod(
    namespace: string,
    name: string,
    command: string[],
    options?: ExecOptions,
  ): Promise<Result<string>>;
  readPodLogs(namespace: string, name: string, options?: PodLogOptions): Promise<Result<string>>;
  createDeployment(namespace: string, deployment: k8s.V1Deployment): Promise<Result<string>>;
  createService(namespace: string, service: k8s.V1Service): Promise<Result<string>>;
  deleteDeployment(namespace: string, name: string): Promise<Result<void>>;
  deleteService(namespace: string, name: string): Promise<Result<void>>;
  exposeNodePort(
    namespace: string,
    serviceName: string,
    options?: NodePortOptions,
  ): Promise<Result<string>>;
  applyManifestFile(filePath: string, namespace?: string): Promise<Result<AppliedResource[]>>;
  getDeploymentStatus(namespace: string, name: string): Promise<Result<DeploymentResult>>;
  waitForDeploymentReady(
    namespace: string,
    name: string,
    timeoutSeconds: number,
    pollIntervalMs?: number,
  ): Promise<Result<DeploymentResult>>;
  ping(): Promise<boolean>;
}

const DELETE_GRACE_PERIOD_SECONDS = 5;

export function toPodSummary(pod: k8s.V1Pod): PodSummary {
  const phase = pod.status?.phase ?? 'Unknown';
  const statuses = pod.status?.containerStatuses ?? [];
  return {
    name: pod.metadata?.name ?? '',
    namespace: pod.metadata?.namespace ?? '',
    phase,
    ready: phase === 'Running' && statuses.length > 0 && statuses.every((s) => s.ready),
    containers: (pod.spec?.containers ?? []).map((c) => c.name),
    labels: pod.metadata?.labels ?? {},
  };
}

/**
 * Load kubeconfig: the given path (or KUBECONFIG / ~/.kube/config), falling
 * back to the in-cluster service account.
 *
 * @throws Error if no usable kubeconfig is found
 */
export function loadKubeConfig(logger: Logger, kubeconfigPath?: string): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  const discovered = kubeconfigPath
    ? discoverKubeconfigPath({ KUBECONFIG: kubeconfigPath })
    : discoverKubeconfigPath();

  if (!discovered.ok) {
    if (isInCluster()) {
      kc.loadFromCluster();
      logger.debug('Loaded in-cluster kubeconfig');
      return kc;
    }
    logger.error(
      { error: discovered.error, hint: discovered.guidance?.hint },
      'Kubeconfig discovery failed',
    );
    throw new Error(`${discovered.error}. ${discovered.guidance?.resolution ?? ''}`.trim());
  }

  const validation = validateKubeconfig(discovered.value);
  if (!validation.ok) {
    logger.error(
      {
        error: validation.error,
        hint: validation.guidance?.hint,
        resolution: validation.guidance?.resolution,
      },
      'Kubeconfig validation failed',
    );
    throw new Error(`${validation.error}. ${validation.guidance?.hint ?? ''}`.trim());
  }

  kc.loadFromFile(validation.value.path);
  logger.debug(
    {
      path: validation.value.path,
      context: validation.value.contextName,
      cluster: validation.value.clusterName,
    },
    'Loaded kubeconfig',
  );
  return kc;
}

/**
 * Create a Kubernetes client over an already-loaded kubeconfig
 */
export const createKubernetesClient = (
  logger: Logger,
  kc: k8s.KubeConfig,
  timeout: number = DEFAULT_TIMEOUTS.kubernetes,
): KubernetesClient => {
  const appsApi = kc.makeApiClient(k8s.AppsV1Api);
  const coreApi = kc.makeApiClient(k8s.CoreV1Api);
  const exec = new k8s.Exec(kc);

  const fail = <T>(error: unknown, operation: string, context: Record<string, unknown>): Result<T> => {
    const guidance = tagNotFound(extractK8sErrorGuidance(error, operation), error);
    const errorMessage = ERROR_MESSAGES.K8S_OPERATION_FAILED(operation, guidance.message);
    logger.error(
      { ...context, error: errorMessage, hint: guidance.hint, resolution: guidance.resolution },
      `Kubernetes ${operation} failed`,
    );
    return Failure(errorMessage, guidance);
  };

  const fetchDeploymentStatus = async (
    namespace: string,
    name: string,
  ): Promise<Result<DeploymentResult>> => {
    try {
      const { body: deployment } = await appsApi.readNamespacedDeployment(name, namespace);
      const readyReplicas = deployment.status?.readyReplicas ?? 0;
      const totalReplicas = deployment.spec?.replicas ?? 0;
      return Success({ ready: readyReplicas === totalReplicas, readyReplicas, totalReplicas });
    } catch (error) {
      return fail(error, 'get deployment status', { namespace, name });
    }
  };

  const createService = async (namespace: string, service: k8s.V1Service): Promise<Result<string>> => {
    try {
      const { body } = await coreApi.createNamespacedService(namespace, service);
      const name = body.metadata?.name ?? '';
      logger.info({ namespace, name }, 'Service created');
      return Success(name);
    } catch (error) {
      return fail(error, 'create service', { namespace, name: service.metadata?.name });
    }
  };

  const resolveContainer = async (namespace: string, name: string): Promise<string | undefined> => {
    const { body: pod } = await coreApi.readNamespacedPod(name, namespace);
    return pod.spec?.containers[0]?.name;
  };

  const runExec = async (
    namespace: string,
    name: string,
    container: string,
    command: string[],
    timeoutMs: number,
  ): Promise<Result<string>> => {
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    const out: Buffer[] = [];
    const err: Buffer[] = [];
    stdout.on('data', (chunk: Buffer) => out.push(chunk));
    stderr.on('data', (chunk: Buffer) => err.push(chunk));

    const status = await new Promise<k8s.V1Status>((resolve, reject) => {
      let socket: { close(): void } | undefined;
      const timer = setTimeout(() => {
        socket?.close();
        reject(new TimeoutError(`Exec in ${name} timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      const settle = (result: k8s.V1Status): void => {
        clearTimeout(timer);
        resolve(result);
      };

      exec
        .exec(namespace, name, container, command, stdout, stderr, null, false, settle)
        .then((ws) => {
          socket = ws;
          // The status channel reports first; a bare close means the stream dropped
          ws.on('close', () => settle({ status: 'Failure', message: 'exec stream closed without a status' }));
        })
        .catch((error: unknown) => {
          clearTimeout(timer);
          reject(error);
        });
    });

    const output = Buffer.concat(out).toString('utf-8');
    if (status.status === 'Success') {
      return Success(output);
    }
    const stderrText = Buffer.concat(err).toString('utf-8').trim();
    const message = status.message ?? 'command failed';
    return Failure(`Command exited with failure in ${name}: ${message}`, {
      message: `Command failed in pod ${name}`,
      hint: stderrText || message,
      resolution: 'Run the command by hand with `kubectl exec` to see its full output',
      details: { command, reason: status.reason, stdout: output },
    });
  };

  return {
    kubeConfig: kc,

    async listPods(namespace, labelSelector) {
      try {
        const { body } = await coreApi.listNamespacedPod(
          namespace,
          undefined,
          undefined,
          undefined,
          undefined,
          labelSelector,
        );
        return Success(body.items.map(toPodSummary));
      } catch (error) {
        return fail(error, 'list pods', { namespace, labelSelector });
      }
    },

    async getPod(namespace, name) {
      try {
        const { body } = await coreApi.readNamespacedPod(name, namespace);
        return Success(toPodSummary(body));
      } catch (error) {
        if (getStatusCode(error) === 404) {
          return Success(null);
        }
        return fail(error, 'get pod', { namespace, name });
      }
    },

    async execInPod(namespace, name, command, options = {}) {
      const timeoutMs = options.timeoutMs ?? timeout;
      try {
        const container = options.container ?? (await resolveContainer(namespace, name));
        if (!container) {
          return Failure(`Pod ${name} has no containers`);
        }
        logger.debug({ namespace, name, container, command }, 'Executing command in pod');
        return await runExec(namespace, name, container, command, timeoutMs);
      } catch (error) {
        logger.debug({ namespace, name, error: extractErrorMessage(error) }, 'Exec failed');
        const guidance = tagNotFound(extractK8sErrorGuidance(error, 'exec'), error);
        return Failure(`Exec in ${name} failed: ${guidance.message}`, guidance);
      }
    },

    async readPodLogs(namespace, name, options = {}) {
      try {
        const { body } = await coreApi.readNamespacedPodLog(
          name,
          namespace,
          options.container,
          undefined,
          undefined,
          undefined,
          undefined,
          undefined,
          undefined,
          options.tailLines,
        );
        return Success(body);
      } catch (error) {
        return fail(error, 'read pod logs', { namespace, name });
      }
    },

    async createDeployment(namespace, deployment) {
      try {
        const { body } = await appsApi.createNamespacedDeployment(namespace, deployment);
        const name = body.metadata?.name ?? '';
        logger.info({ namespace, name }, 'Deployment created');
        return Success(name);
      } catch (error) {
        return fail(error, 'create deployment', { namespace, name: deployment.metadata?.name });
      }
    },

    createService,

    async deleteDeployment(namespace, name) {
      try {
        await appsApi.deleteNamespacedDeployment(
          name,
          namespace,
          undefined,
          undefined,
          DELETE_GRACE_PERIOD_SECONDS,
          undefined,
          'Foreground',
        );
        logger.info({ namespace, name }, 'Deployment deleted');
        return Success(undefined);
      } catch (error) {
        return fail(error, 'delete deployment', { namespace, name });
      }
    },

    async deleteService(namespace, name) {
      try {
        await coreApi.deleteNamespacedService(name, namespace);
        logger.info({ namespace, name }, 'Service deleted');
        return Success(undefined);
      } catch (error) {
        return fail(error, 'delete service', { namespace, name });
      }
    },

    async exposeNodePort(namespace, serviceName, options = {}) {
      const port = options.port ?? 80;
      const nodePort = options.nodePort ?? 30000;
      const service: k8s.V1Service = {
        apiVersion: 'v1',
        kind: 'Service',
        metadata: { name: serviceName },
        spec: {
          type: 'NodePort',
          ports: [{ port, targetPort: options.targetPort ?? 80, nodePort }],
          selector: options.selector ?? { app: serviceName },
        },
      };
      const created = await createService(namespace, service);
      if (created.ok) {
        logger.info({ namespace, serviceName, nodePort }, 'NodePort service exposed');
      }
      return created;
    },

    async applyManifestFile(filePath, namespace = 'default') {
      const loaded = await loadManifestFile(filePath);
      if (!loaded.ok) {
        return loaded;
      }
      return applyManifests(kc, loaded.value, namespace, logger);
    },

    getDeploymentStatus(namespace, name) {
      return fetchDeploymentStatus(namespace, name);
    },

    /**
     * Poll deployment status until every desired replica is ready or the timeout is reached
     */
    async waitForDeploymentReady(
      namespace,
      name,
      timeoutSeconds,
      pollIntervalMs = DEFAULT_TIMEOUTS.deploymentPoll,
    ) {
      const startTime = Date.now();
      const maxWaitTime = timeoutSeconds * 1000;

      logger.debug({ namespace, name, timeoutSeconds, pollIntervalMs }, 'Waiting for deployment to be ready');

      let lastStatusResult: Result<DeploymentResult> | undefined;

      while (Date.now() - startTime < maxWaitTime) {
        lastStatusResult = await fetchDeploymentStatus(namespace, name);

        if (lastStatusResult.ok && lastStatusResult.value.ready) {
          logger.info(
            {
              namespace,
              name,
              readyReplicas: lastStatusResult.value.readyReplicas,
              elapsedSeconds: Math.round((Date.now() - startTime) / 1000),
            },
            'Deployment is ready',
          );
          return lastStatusResult;
        }

        await new Promise((resolve) => setTimeout(resolve, pollIntervalMs));
      }

      const errorMessage = `Deployment did not become ready within ${timeoutSeconds} seconds`;
      logger.error(
        {
          namespace,
          name,
          timeoutSeconds,
          currentStatus: lastStatusResult?.ok ? lastStatusResult.value : undefined,
        },
        errorMessage,
      );
      return Failure(errorMessage, {
        message: errorMessage,
        hint: 'Pods of the deployment are not all ready',
        resolution: `Inspect them with \`kubectl get pods -n ${namespace}\` and \`kubectl describe deployment ${name}\``,
        details: { code: 'TIMEOUT', namespace, name },
      });
    },

    async ping() {
      try {
        await withTimeout(coreApi.listNamespace(), DEFAULT_TIMEOUTS.ping, 'Cluster ping');
        return true;
      } catch (error) {
        const guidance = extractK8sErrorGuidance(error, 'ping cluster');
        logger.debug(
          { error: guidance.message, hint: guidance.hint, resolution: guidance.resolution },
          'Cluster ping failed',
        );
        return false;
      }
    },
  };
};
