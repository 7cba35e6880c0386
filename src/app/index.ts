/**
 * Application entry point
 *
 * Wires configuration, logger, one platform (Docker or Kubernetes), the
 * target resolver, the readiness prober and the tunnel registry.
 */

import { loadConfig, type AppConfig } from '@/config/app-config';
import { createLogger, type Logger } from '@/lib/logger';
import type { Clock } from '@/lib/clock';
import { summarizeHealth, checkDockerHealth, checkKubernetesHealth, type HealthReport, type Pingable } from '@/lib/health-checks';
import { createDockerClient } from '@/infra/docker/client';
import { createDockerRuntime } from '@/infra/docker/runtime';
import { createDockerStreamConnector } from '@/infra/docker/stream-connector';
import { createKubernetesClient, loadKubeConfig } from '@/infra/kubernetes/client';
import { createKubernetesRuntime } from '@/infra/kubernetes/runtime';
import { createKubernetesStreamConnector } from '@/infra/kubernetes/port-forward';
import { createTargetResolver, type TargetResolver } from '@/targets/resolver';
import { createReadinessProber, type ReadinessProber } from '@/readiness/prober';
import { createTunnelRegistry, type TunnelRegistry } from '@/tunnel/registry';
import type { RuntimeKind, StreamConnector, WorkloadRuntime } from '@/types';

/**
 * Capabilities of one platform as the core consumes them
 */
export interface Platform {
  runtime: WorkloadRuntime;
  connector: StreamConnector;
  client: Pingable;
  /** Release platform resources the app created; returns how many were released */
  cleanup(): Promise<number>;
}

export interface AppOptions {
  config?: AppConfig;
  logger?: Logger;
  /** Defaults to kubernetes */
  runtime?: RuntimeKind;
  /** Pre-built platform, replacing the one derived from `runtime` */
  platform?: Platform;
  clock?: Clock;
}

export interface App {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly runtime: WorkloadRuntime;
  readonly resolver: TargetResolver;
  readonly prober: ReadinessProber;
  readonly tunnels: TunnelRegistry;
  healthCheck(): Promise<HealthReport>;
  /** Close every tunnel, then clean up platform resources */
  shutdown(): Promise<void>;
}

/**
 * Build the platform capabilities for `kind`.
 *
 * @throws Error when kind is kubernetes and no kubeconfig can be loaded
 */
export function createPlatform(kind: RuntimeKind, config: AppConfig, logger: Logger): Platform {
  if (kind === 'docker') {
    const client = createDockerClient(logger, {
      socketPath: config.docker.socketPath,
      timeout: config.docker.timeout,
      enableMutex: true,
    });
    return {
      runtime: createDockerRuntime(client),
      connector: createDockerStreamConnector(client, logger),
      client,
      cleanup: () => client.cleanup(),
    };
  }

  const kc = loadKubeConfig(logger, config.kubernetes.kubeconfig);
  const client = createKubernetesClient(logger, kc);
  return {
    runtime: createKubernetesRuntime(client),
    connector: createKubernetesStreamConnector(kc, logger),
    client,
    cleanup: () => Promise.resolve(0),
  };
}

export function createApp(options: AppOptions = {}): App {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger({ name: 'podgate', level: config.logging.level });
  const kind = options.runtime ?? 'kubernetes';
  const platform = options.platform ?? createPlatform(kind, config, logger);
  const clock = options.clock;

  const resolver = createTargetResolver({
    runtime: platform.runtime,
    logger,
    ...(clock && { clock }),
  });
  const prober = createReadinessProber({
    runtime: platform.runtime,
    resolver,
    logger,
    ...(clock && { clock }),
  });
  const tunnels = createTunnelRegistry({
    connector: platform.connector,
    resolver,
    prober,
    logger,
    config,
    ...(clock && { clock }),
  });

  let shutdownPromise: Promise<void> | undefined;

  return {
    config,
    logger,
    runtime: platform.runtime,
    resolver,
    prober,
    tunnels,

    async healthCheck() {
      const status =
        platform.runtime.kind === 'docker'
          ? { docker: await checkDockerHealth(platform.client, logger) }
          : { kubernetes: await checkKubernetesHealth(platform.client, logger) };
      return summarizeHealth(status);
    },

    shutdown() {
      shutdownPromise ??= (async () => {
        const closed = await tunnels.closeAll();
        const cleaned = await platform.cleanup();
        logger.info({ closed, cleaned }, 'Application shut down');
      })();
      return shutdownPromise;
    },
  };
}
