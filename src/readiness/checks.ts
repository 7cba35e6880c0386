/**
 * Readiness check definitions
 *
 * A check pairs a probe (an exec command or a log tail) with a predicate
 * over the probe's raw output. Lower priority runs first; declaration
 * order breaks ties.
 */

import { InvalidArgumentError } from '@/lib/errors';

export type ReadinessProbe =
  | { readonly kind: 'exec'; readonly command: readonly string[] }
  | { readonly kind: 'logs'; readonly tailLines?: number };

export interface ReadinessCheck {
  readonly name: string;
  readonly priority: number;
  readonly probe: ReadinessProbe;
  readonly isSatisfied: (output: string) => boolean;
  /** Overrides the prober's per-probe timeout for this check */
  readonly timeoutMs?: number;
}

export interface ReadinessCheckInput {
  name: string;
  priority: number;
  probe: ReadinessProbe;
  isSatisfied: (output: string) => boolean;
  timeoutMs?: number;
}

/**
 * Validate and freeze a check definition
 */
export function defineReadinessCheck(input: ReadinessCheckInput): ReadinessCheck {
  if (!input.name) {
    throw new InvalidArgumentError('Readiness check name must not be empty');
  }
  if (!Number.isFinite(input.priority)) {
    throw new InvalidArgumentError(`Readiness check ${input.name} has a non-numeric priority`);
  }
  if (input.probe.kind === 'exec' && input.probe.command.length === 0) {
    throw new InvalidArgumentError(`Readiness check ${input.name} has an empty command`);
  }
  if (input.timeoutMs !== undefined && input.timeoutMs <= 0) {
    throw new InvalidArgumentError(`Readiness check ${input.name} has a non-positive timeout`);
  }

  const probe: ReadinessProbe =
    input.probe.kind === 'exec'
      ? Object.freeze({ kind: 'exec', command: Object.freeze([...input.probe.command]) })
      : Object.freeze({ ...input.probe });

  return Object.freeze({ ...input, probe });
}

/**
 * Check that runs `command` and passes when the predicate accepts its stdout.
 * Without a predicate any zero exit passes.
 */
export function execCheck(
  name: string,
  priority: number,
  command: string[],
  isSatisfied: (output: string) => boolean = () => true,
  timeoutMs?: number,
): ReadinessCheck {
  return defineReadinessCheck({
    name,
    priority,
    probe: { kind: 'exec', command },
    isSatisfied,
    ...(timeoutMs === undefined ? {} : { timeoutMs }),
  });
}

/**
 * Check that passes when the unit's log tail matches `pattern`
 */
export function logPatternCheck(
  name: string,
  priority: number,
  pattern: RegExp | string,
  tailLines?: number,
): ReadinessCheck {
  const matches =
    typeof pattern === 'string'
      ? (output: string) => output.includes(pattern)
      : (output: string) => new RegExp(pattern.source, pattern.flags.replace('g', '')).test(output);

  return defineReadinessCheck({
    name,
    priority,
    probe: tailLines === undefined ? { kind: 'logs' } : { kind: 'logs', tailLines },
    isSatisfied: matches,
  });
}

/**
 * Stable sort by ascending priority
 */
export function orderChecks(checks: readonly ReadinessCheck[]): ReadinessCheck[] {
  return checks
    .map((check, index) => ({ check, index }))
    .sort((a, b) => a.check.priority - b.check.priority || a.index - b.index)
    .map(({ check }) => check);
}
