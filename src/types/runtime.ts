/**
 * Capability interfaces the core consumes.
 *
 * The readiness prober, target resolver and tunnel registry never talk to
 * dockerode or the Kubernetes API directly; they receive these capabilities
 * so tests can substitute in-process fakes.
 */

import type { Server } from 'node:net';
import type { Result } from './core';

export type RuntimeKind = 'kubernetes' | 'docker';

/**
 * Identity of an addressable unit (pod or container).
 *
 * In `selector` mode the target must be resolved to exactly one concrete
 * unit name before exec-based probes or tunnels can use it.
 */
export type Target =
  | { mode: 'name'; name: string; namespace: string }
  | { mode: 'selector'; selector: string; namespace: string };

/**
 * Snapshot of one pod or container as reported by a listing call
 */
export interface WorkloadUnit {
  name: string;
  namespace: string;
  /** Platform phase or state (`Running`, `Pending`, `running`, `exited`...) */
  phase: string;
  /** Running, and every sub-component (container, health check) reports ready */
  ready: boolean;
}

export interface LogOptions {
  tailLines?: number;
}

/**
 * Uniform view over a container runtime or a cluster.
 * Every call resolves; failures come back as `Result` failures.
 */
export interface WorkloadRuntime {
  readonly kind: RuntimeKind;
  /** Units matching a label selector, in the platform's listing order */
  list(namespace: string, selector: string): Promise<Result<WorkloadUnit[]>>;
  /** `Success(null)` when the unit does not exist */
  get(namespace: string, name: string): Promise<Result<WorkloadUnit | null>>;
  /** Run a command; fails on transport error or non-zero exit */
  exec(
    namespace: string,
    name: string,
    command: string[],
    timeoutMs: number,
  ): Promise<Result<string>>;
  logs(namespace: string, name: string, options?: LogOptions): Promise<Result<string>>;
}

export interface RelayRequest {
  namespace: string;
  /** Concrete unit name */
  unit: string;
  remotePort: number;
  /** Bound local listener whose accepted sockets must be forwarded */
  listener: Server;
  /** Aborted when the owning session closes */
  signal: AbortSignal;
}

/**
 * Raw bidirectional stream primitive of the orchestration client.
 */
export interface StreamConnector {
  /**
   * Forward every connection accepted by `listener` to the remote port.
   * Resolves once `signal` aborts; rejects when the upstream transport fails.
   */
  relay(request: RelayRequest): Promise<void>;
}
