/**
 * Error taxonomy and helpers
 *
 * Component-internal failures (one exec failing, one relay attempt failing)
 * are logged and folded into "not ready yet" or "reconnect". Only budget or
 * resource exhaustion reaches the caller, as a `Result` failure whose
 * guidance carries the taxonomy code in `details.code`.
 */

import { Failure, type ErrorGuidance, type Result } from '@/types';

// ============================================================================
// Error Message Templates
// ============================================================================

export const ERROR_MESSAGES = {
  TARGET_NOT_FOUND: (target: string, namespace: string) =>
    `No unit matches ${target} in ${namespace}`,
  TARGET_NOT_READY: (selector: string, namespace: string, timeoutMs: number) =>
    `No ready unit matched ${selector} in ${namespace} within ${timeoutMs}ms`,
  READINESS_TIMEOUT: (target: string, timeoutMs: number) =>
    `${target} did not become ready within ${timeoutMs}ms`,
  PORT_IN_USE: (port: number) => `Local port ${port} is already in use`,
  TUNNEL_LIVENESS_FAILED: (port: number, unit: string) =>
    `Port-forward on localhost:${port} to ${unit} did not accept connections`,
  RETRY_EXHAUSTED: (attempts: number) => `Relay failed after ${attempts} reconnect attempts`,
  DOCKER_OPERATION_FAILED: (operation: string, error: string) =>
    `Docker ${operation} failed: ${error}`,
  K8S_OPERATION_FAILED: (operation: string, error: string) =>
    `Kubernetes ${operation} failed: ${error}`,
} as const;

// ============================================================================
// Error Taxonomy
// ============================================================================

export type ErrorCode =
  | 'NOT_FOUND'
  | 'TIMEOUT'
  | 'PORT_IN_USE'
  | 'TRANSIENT_PROBE'
  | 'RETRY_EXHAUSTED'
  | 'INVALID_ARGUMENT';

/**
 * Base class for the errors this package raises or records
 */
export abstract class PodgateError extends Error {
  abstract readonly code: ErrorCode;
  readonly hint?: string;
  readonly resolution?: string;

  constructor(message: string, options: { hint?: string; resolution?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    if (options.hint !== undefined) this.hint = options.hint;
    if (options.resolution !== undefined) this.resolution = options.resolution;
  }
}

/** Target or resource does not exist; never retried */
export class NotFoundError extends PodgateError {
  readonly code = 'NOT_FOUND';
}

/** A readiness or resolution deadline, or a single probe's timeout, was exceeded */
export class TimeoutError extends PodgateError {
  readonly code = 'TIMEOUT';
}

/** The local port is already bound; the caller owns port allocation */
export class PortInUseError extends PodgateError {
  readonly code = 'PORT_IN_USE';
  readonly port: number;

  constructor(port: number) {
    super(ERROR_MESSAGES.PORT_IN_USE(port), {
      hint: 'Another process or tunnel is listening on this port',
      resolution: `Pick a different local port or stop whatever listens on ${port}`,
    });
    this.port = port;
  }
}

/** One readiness check or one relay attempt failed; recovered locally */
export class TransientProbeError extends PodgateError {
  readonly code = 'TRANSIENT_PROBE';
}

/** Reconnect attempts exceeded the session's retry limit */
export class RetryExhaustedError extends PodgateError {
  readonly code = 'RETRY_EXHAUSTED';
  readonly attempts: number;

  constructor(attempts: number, cause?: unknown) {
    super(ERROR_MESSAGES.RETRY_EXHAUSTED(attempts), {
      hint: 'The remote side kept dropping the port-forward stream',
      resolution: 'Check that the pod is still running, then close and reopen the tunnel',
      cause,
    });
    this.attempts = attempts;
  }
}

/** Malformed arguments; a programmer error, thrown rather than returned */
export class InvalidArgumentError extends PodgateError {
  readonly code = 'INVALID_ARGUMENT';
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Safely extracts error message from unknown error types.
 * Invariant: Always returns a string message
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Create error guidance with context
 */
export function createErrorGuidance(
  message: string,
  hint?: string,
  resolution?: string,
  details?: Record<string, unknown>,
): ErrorGuidance {
  const guidance: ErrorGuidance = { message };
  if (hint !== undefined) guidance.hint = hint;
  if (resolution !== undefined) guidance.resolution = resolution;
  if (details !== undefined) guidance.details = details;
  return guidance;
}

/**
 * Convert a taxonomy error into a failed Result, keeping its code in the guidance
 */
export function toFailure<T>(error: PodgateError, details: Record<string, unknown> = {}): Result<T> {
  return Failure(
    error.message,
    createErrorGuidance(error.message, error.hint, error.resolution, {
      ...details,
      code: error.code,
    }),
  );
}

/**
 * Pull the numeric HTTP status out of a client error, if it carries one
 */
export function getStatusCode(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const response = error.response;
    if ('statusCode' in response && typeof response.statusCode === 'number') {
      return response.statusCode;
    }
  }
  return undefined;
}

/**
 * Tag the guidance of a 404 client error with the NOT_FOUND code, so callers
 * can tell a vanished unit from a transient failure
 */
export function tagNotFound(guidance: ErrorGuidance, error: unknown): ErrorGuidance {
  if (getStatusCode(error) !== 404) {
    return guidance;
  }
  return { ...guidance, details: { ...guidance.details, code: 'NOT_FOUND' } };
}
