/**
 * Public API: readiness gating and self-healing port forwards
 */

/** @public */
export { createApp, createPlatform } from './app/index';
/** @public */
export type { App, AppOptions, Platform } from './app/index';

/** @public */
export { loadConfig } from './config/app-config';
export type { AppConfig, LogLevel } from './config/app-config';

/** @public */
export type {
  ErrorGuidance,
  Result,
  RuntimeKind,
  Target,
  WorkloadUnit,
  WorkloadRuntime,
  StreamConnector,
  RelayRequest,
  LogOptions,
} from './types/index';
export { Success, Failure, failureCode } from './types/index';

// Error taxonomy
export {
  PodgateError,
  NotFoundError,
  TimeoutError,
  PortInUseError,
  TransientProbeError,
  RetryExhaustedError,
  InvalidArgumentError,
} from './lib/errors';
export type { ErrorCode } from './lib/errors';

export { createLogger } from './lib/logger';
export type { Logger } from './lib/logger';
export { systemClock } from './lib/clock';
export type { Clock } from './lib/clock';

// Readiness
export {
  defineReadinessCheck,
  execCheck,
  logPatternCheck,
  orderChecks,
} from './readiness/checks';
export type { ReadinessCheck, ReadinessProbe } from './readiness/checks';
export { createReadinessProber } from './readiness/prober';
export type { ReadinessProber, ReadinessResult, WaitReadyOptions } from './readiness/prober';
export { createKafkaReadinessChecks, KAFKA_CHECK_NAMES } from './readiness/kafka';

// Targets and tunnels
export { createTargetResolver } from './targets/resolver';
export type { TargetResolver } from './targets/resolver';
export { createTunnelSession } from './tunnel/session';
export type { TunnelSession, TunnelSnapshot, TunnelState } from './tunnel/session';
export { createTunnelRegistry } from './tunnel/registry';
export type { OpenTunnelRequest, TunnelRegistry } from './tunnel/registry';

// Platform clients
/** @public */
export { createDockerClient } from './infra/docker/client';
export type { DockerClient, DockerClientConfig, StartContainerOptions } from './infra/docker/client';
export { createDockerRuntime } from './infra/docker/runtime';
export { createDockerStreamConnector } from './infra/docker/stream-connector';
/** @public */
export { createKubernetesClient, loadKubeConfig } from './infra/kubernetes/client';
export type { KubernetesClient, PodSummary } from './infra/kubernetes/client';
export { createKubernetesRuntime } from './infra/kubernetes/runtime';
export { createKubernetesStreamConnector } from './infra/kubernetes/port-forward';
