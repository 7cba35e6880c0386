/**
 * Core type definitions shared by the readiness, tunnel and client layers.
 */

// ===== RESULT TYPE SYSTEM =====

/**
 * Structured error information with actionable guidance
 */
export interface ErrorGuidance {
  /** Primary error message */
  message: string;
  /** Actionable hint for the operator (what went wrong in user terms) */
  hint?: string;
  /** Specific resolution steps to fix the issue */
  resolution?: string;
  /** Additional context or details; `code` carries the error taxonomy code when known */
  details?: Record<string, unknown>;
}

/**
 * Result type for functional error handling
 *
 * Operations against the container runtime and the cluster return a Result
 * instead of throwing, so orchestration flows can branch on `ok` without
 * try/catch around every call.
 *
 * @example
 * ```typescript
 * const result = await registry.open({ target: 'kafka', localPort: 9092, remotePort: 9092 });
 * if (result.ok) {
 *   console.log(result.value.state);
 * } else {
 *   console.error(result.error);
 *   if (result.guidance) {
 *     console.error('Hint:', result.guidance.hint);
 *   }
 * }
 * ```
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; guidance?: ErrorGuidance };

/** Create a success result */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/**
 * Create a failure result with optional guidance
 * @param error - Error message
 * @param guidance - Optional structured guidance for operators
 */
export const Failure = <T>(error: string, guidance?: ErrorGuidance): Result<T> => {
  // Always create a new guidance object to avoid mutating the input parameter
  const resultGuidance = guidance ? { ...guidance, message: guidance.message || error } : undefined;
  return resultGuidance ? { ok: false, error, guidance: resultGuidance } : { ok: false, error };
};

/**
 * Read the taxonomy code attached to a failed result, if any
 */
export function failureCode<T>(result: Result<T>): string | undefined {
  if (result.ok) {
    return undefined;
  }
  const code = result.guidance?.details?.code;
  return typeof code === 'string' ? code : undefined;
}
