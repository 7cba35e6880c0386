/**
 * WorkloadRuntime over the Kubernetes client
 */

import type { WorkloadRuntime, WorkloadUnit } from '@/types';
import { Success } from '@/types';
import type { KubernetesClient, PodSummary } from './client';

function toUnit(pod: PodSummary): WorkloadUnit {
  return { name: pod.name, namespace: pod.namespace, phase: pod.phase, ready: pod.ready };
}

export function createKubernetesRuntime(client: KubernetesClient): WorkloadRuntime {
  return {
    kind: 'kubernetes',

    async list(namespace, selector) {
      const pods = await client.listPods(namespace, selector);
      return pods.ok ? Success(pods.value.map(toUnit)) : pods;
    },

    async get(namespace, name) {
      const pod = await client.getPod(namespace, name);
      if (!pod.ok) return pod;
      return Success(pod.value ? toUnit(pod.value) : null);
    },

    exec(namespace, name, command, timeoutMs) {
      return client.execInPod(namespace, name, command, { timeoutMs });
    },

    logs(namespace, name, options = {}) {
      return client.readPodLogs(
        namespace,
        name,
        options.tailLines === undefined ? {} : { tailLines: options.tailLines },
      );
    },
  };
}
