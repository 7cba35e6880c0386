/**
 * WorkloadRuntime over the Docker client.
 *
 * Docker has no namespaces; the namespace argument is ignored. Selectors
 * are comma-separated `key=value` label filters.
 */

import type { WorkloadRuntime, WorkloadUnit } from '@/types';
import { Success } from '@/types';
import type { DockerClient, DockerContainerInfo } from './client';

function isReadyStatus(container: DockerContainerInfo): boolean {
  return (
    container.State === 'running' &&
    !container.Status.includes('(health: starting)') &&
    !container.Status.includes('(unhealthy)')
  );
}

export function labelFilters(selector: string): string[] {
  return selector
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

export function createDockerRuntime(client: DockerClient): WorkloadRuntime {
  return {
    kind: 'docker',

    async list(namespace, selector) {
      const containers = await client.listContainers({
        all: true,
        filters: { label: labelFilters(selector) },
      });
      if (!containers.ok) return containers;

      return Success(
        containers.value.map(
          (c): WorkloadUnit => ({
            name: (c.Names[0] ?? c.Id).replace(/^\//, ''),
            namespace,
            phase: c.State,
            ready: isReadyStatus(c),
          }),
        ),
      );
    },

    async get(namespace, name) {
      const container = await client.getContainer(name);
      if (!container.ok) return container;
      const details = container.value;
      if (!details) return Success(null);

      return Success({
        name: details.name,
        namespace,
        phase: details.state,
        ready: details.running && (details.health === undefined || details.health === 'healthy'),
      });
    },

    exec(_namespace, name, command, timeoutMs) {
      return client.execInContainer(name, command, timeoutMs);
    },

    logs(_namespace, name, options = {}) {
      return client.getContainerLogs(
        name,
        options.tailLines === undefined ? {} : { tail: options.tailLines },
      );
    },
  };
}
