#!/usr/bin/env node
/**
 * podgate CLI
 * Wait for workloads to become ready and keep local port-forwards to them alive
 */

import { Command, InvalidArgumentError as UsageError } from 'commander';
import { exit, argv } from 'node:process';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { createApp, type App } from '@/app';
import { loadConfig, type AppConfig } from '@/config/app-config';
import { createLogger, type Logger } from '@/lib/logger';
import { extractErrorMessage } from '@/lib/errors';
import { checkDockerHealth, checkKubernetesHealth, type DependencyStatus } from '@/lib/health-checks';
import { installShutdownHandlers } from '@/lib/runtime-logging';
import { validateDockerSocket } from '@/infra/docker/socket-validation';
import { createDockerClient } from '@/infra/docker/client';
import { createKubernetesClient, loadKubeConfig } from '@/infra/kubernetes/client';
import { createKafkaReadinessChecks } from '@/readiness/kafka';
import type { ReadinessResult } from '@/readiness/prober';
import type { TunnelSnapshot } from '@/tunnel/session';
import type { RuntimeKind, Target } from '@/types';
import { formatReadiness, formatTunnel } from './render';

const packageJsonPath = __dirname.includes('dist')
  ? join(__dirname, '../../../package.json') // dist/src/cli/ -> root
  : join(__dirname, '../../package.json'); // src/cli/ -> root
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));

const TUNNEL_WATCH_INTERVAL_MS = 5000;

type GlobalOptions = {
  runtime: RuntimeKind;
  namespace?: string;
  logLevel?: string;
  quiet?: boolean;
};

type ForwardOptions = {
  selector?: string;
  waitKafka?: boolean;
  readinessTimeout?: number;
};

type WaitReadyOptions = {
  selector?: boolean;
  log?: string;
  timeout?: number;
  bootstrapServer?: string;
};

type ResolveOptions = {
  timeout?: number;
};

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new UsageError(`${value} is not a valid port`);
  }
  return port;
}

function parseDuration(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new UsageError(`${value} is not a positive number of milliseconds`);
  }
  return ms;
}

function parseRuntime(value: string): RuntimeKind {
  if (value === 'kubernetes' || value === 'docker') {
    return value;
  }
  throw new UsageError('runtime must be kubernetes or docker');
}

const program = new Command();

function globalOptions(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

function buildConfig(options: GlobalOptions): AppConfig {
  const overrides: Record<string, string> = {};
  if (options.logLevel) overrides.LOG_LEVEL = options.logLevel;
  if (options.namespace) overrides.K8S_NAMESPACE = options.namespace;
  return loadConfig({ ...process.env, ...overrides });
}

function bootstrap(): App {
  const options = globalOptions();
  const config = buildConfig(options);
  const logger = createLogger({ name: 'podgate', level: config.logging.level });
  return createApp({ config, logger, runtime: options.runtime });
}

function status(line: string): void {
  if (!globalOptions().quiet) {
    console.error(line);
  }
}

function watchTunnel(app: App, initial: TunnelSnapshot): void {
  let lastState = initial.state;
  const timer = setInterval(() => {
    const current = app.tunnels.status(initial.target, initial.localPort);
    if (!current || current.state === lastState) return;
    lastState = current.state;
    status(formatTunnel(current));
    if (current.state === 'FAILED') {
      clearInterval(timer);
      app
        .shutdown()
        .then(() => exit(1))
        .catch((error: unknown) => {
          console.error(`Shutdown failed: ${extractErrorMessage(error)}`);
          exit(1);
        });
    }
  }, TUNNEL_WATCH_INTERVAL_MS);
}

async function forward(
  target: string,
  localPort: number,
  remotePort: number,
  options: ForwardOptions,
): Promise<void> {
  const app = bootstrap();
  const namespace = app.config.kubernetes.namespace;
  installShutdownHandlers(app, app.logger, globalOptions().quiet);

  status(`Opening localhost:${localPort} -> ${target}:${remotePort} (${namespace})`);
  const result = await app.tunnels.open({
    target,
    localPort,
    remotePort,
    namespace,
    ...(options.selector ? { selector: options.selector } : {}),
    ...(options.waitKafka
      ? {
          readiness: {
            checks: createKafkaReadinessChecks(),
            timeoutMs: options.readinessTimeout ?? app.config.readiness.timeoutMs,
          },
        }
      : {}),
  });

  if (result.ok) {
    status(formatTunnel(result.value));
    status('Press Ctrl+C to stop');
    watchTunnel(app, result.value);
    return;
  }

  console.error(`Failed: ${result.error}`);
  if (result.guidance?.resolution) {
    console.error(`  ${result.guidance.resolution}`);
  }
  await app.shutdown();
  exit(1);
}

async function waitReady(target: string, options: WaitReadyOptions): Promise<void> {
  const app = bootstrap();
  const namespace = app.config.kubernetes.namespace;
  const probeTarget: Target = options.selector
    ? { mode: 'selector', selector: target, namespace }
    : { mode: 'name', name: target, namespace };
  const timeoutMs = options.timeout ?? app.config.readiness.timeoutMs;

  status(`Waiting for ${target} in ${namespace} (timeout ${timeoutMs}ms)`);
  let result: ReadinessResult;
  if (options.log) {
    result = await app.prober.waitForLog(probeTarget, options.log, timeoutMs);
  } else {
    result = await app.prober.waitReady(
      probeTarget,
      createKafkaReadinessChecks(
        options.bootstrapServer ? { bootstrapServer: options.bootstrapServer } : {},
      ),
      {
        timeoutMs,
        pollIntervalMs: app.config.readiness.pollIntervalMs,
        probeTimeoutMs: app.config.readiness.probeTimeoutMs,
      },
    );
  }

  status(formatReadiness(target, result));
  await app.shutdown();
  exit(result.ready ? 0 : 1);
}

async function resolve(selector: string, options: ResolveOptions): Promise<void> {
  const app = bootstrap();
  const namespace = app.config.kubernetes.namespace;
  const result = await app.resolver.resolve(
    selector,
    namespace,
    options.timeout ?? app.config.resolver.readyTimeoutMs,
    app.config.resolver.pollIntervalMs,
  );

  await app.shutdown();
  if (result.ok) {
    console.log(result.value);
    exit(0);
  } else {
    console.error(`Not found: ${result.error}`);
    exit(1);
  }
}

function printDependency(name: string, dependency: DependencyStatus): void {
  console.error(
    dependency.available
      ? `  ok    ${name}: ${dependency.detail ?? 'available'}`
      : `  fail  ${name}: ${dependency.error ?? 'unavailable'}`,
  );
}

async function kubernetesStatus(config: AppConfig, logger: Logger): Promise<DependencyStatus> {
  try {
    const kc = loadKubeConfig(logger, config.kubernetes.kubeconfig);
    return await checkKubernetesHealth(createKubernetesClient(logger, kc), logger);
  } catch (error) {
    return { available: false, error: extractErrorMessage(error) };
  }
}

async function check(): Promise<void> {
  const config = buildConfig(globalOptions());
  const logger = createLogger({ name: 'podgate', level: config.logging.level });

  const socket = validateDockerSocket(config.docker.socketPath);
  for (const warning of socket.warnings) {
    console.error(`  warn  ${warning}`);
  }

  console.error('Checking dependencies...');
  const docker = await checkDockerHealth(
    createDockerClient(logger, { socketPath: socket.dockerSocket, timeout: config.docker.timeout }),
    logger,
  );
  const kubernetes = await kubernetesStatus(config, logger);
  printDependency('Docker', docker);
  printDependency('Kubernetes', kubernetes);

  exit(docker.available || kubernetes.available ? 0 : 1);
}

program
  .name('podgate')
  .description('Readiness gating and self-healing port forwards for containers and pods')
  .version(packageJson.version)
  .option('-r, --runtime <kind>', 'kubernetes or docker', parseRuntime, 'kubernetes')
  .option('-n, --namespace <namespace>', 'Kubernetes namespace (default: K8S_NAMESPACE or default)')
  .option('--log-level <level>', 'logging level: debug, info, warn, error, silent')
  .option('-q, --quiet', 'suppress status lines');

program
  .command('forward')
  .description('Forward a local port to a pod or container and keep it connected')
  .argument('<target>', 'pod or container name (logical name with --selector)')
  .argument('<localPort>', 'local port to bind', parsePort)
  .argument('<remotePort>', 'port on the target', parsePort)
  .option('-l, --selector <selector>', 'resolve the target through a label selector')
  .option('--wait-kafka', 'wait for Kafka readiness before forwarding')
  .option('--readiness-timeout <ms>', 'readiness budget in milliseconds', parseDuration)
  .action(forward);

program
  .command('wait-ready')
  .description('Wait until a Kafka broker (or a log line) reports ready')
  .argument('<target>', 'pod or container name, or a label selector with --selector')
  .option('-l, --selector', 'treat <target> as a label selector')
  .option('--log <pattern>', 'wait for this log pattern instead of the Kafka checks')
  .option('-t, --timeout <ms>', 'readiness budget in milliseconds', parseDuration)
  .option('--bootstrap-server <address>', 'Kafka bootstrap server inside the target')
  .action(waitReady);

program
  .command('resolve')
  .description('Print the first ready unit matching a label selector')
  .argument('<selector>', 'label selector, e.g. app=kafka')
  .option('-t, --timeout <ms>', 'how long to wait for a ready unit', parseDuration)
  .action(resolve);

program
  .command('check')
  .description('Check that Docker and Kubernetes are reachable')
  .action(check);

program.addHelpText(
  'after',
  `

Examples:
  $ podgate wait-ready kafka-0                          Wait for a Kafka pod
  $ podgate -r docker wait-ready broker --log started   Wait for a log line in a container
  $ podgate forward kafka 9092 9092 -l app=kafka        Forward to the first ready pod
  $ podgate resolve app=kafka -n streaming              Print the ready pod name

Environment Variables:
  LOG_LEVEL, K8S_NAMESPACE, KUBECONFIG, DOCKER_SOCKET, DOCKER_TIMEOUT
  READINESS_TIMEOUT_MS, READINESS_POLL_INTERVAL_MS, READINESS_PROBE_TIMEOUT_MS
  RESOLVER_READY_TIMEOUT_MS, RESOLVER_POLL_INTERVAL_MS
  TUNNEL_RETRY_LIMIT, TUNNEL_RECONNECT_DELAY_MS, TUNNEL_SETTLE_DELAY_MS, TUNNEL_BIND_HOST
`,
);

program.parseAsync(argv).catch((error: unknown) => {
  console.error(`Error: ${extractErrorMessage(error)}`);
  exit(1);
});
