/**
 * Human-readable status lines for the CLI
 */

import type { ReadinessResult } from '@/readiness/prober';
import type { TunnelSnapshot } from '@/tunnel/session';

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * One line describing a readiness outcome
 */
export function formatReadiness(target: string, result: ReadinessResult): string {
  if (result.ready) {
    const unit = result.unit && result.unit !== target ? ` (${result.unit})` : '';
    return `Ready: ${target}${unit} satisfied by ${result.satisfiedBy ?? 'unknown'} after ${seconds(result.elapsedMs)}`;
  }
  if (result.reason === 'not-found') {
    return `Not found: ${target}`;
  }
  return `Timed out: ${target} not ready after ${seconds(result.elapsedMs)} (${result.passes} passes)`;
}

/**
 * One line describing a tunnel's current state
 */
export function formatTunnel(snapshot: TunnelSnapshot): string {
  const route = `localhost:${snapshot.localPort} -> ${snapshot.namespace}/${snapshot.unit}:${snapshot.remotePort}`;
  switch (snapshot.state) {
    case 'RELAYING':
      return snapshot.retryCount > 0
        ? `Forwarding ${route} (reconnected ${snapshot.retryCount}x)`
        : `Forwarding ${route}`;
    case 'RECONNECTING':
      return `Reconnecting ${route} (attempt ${snapshot.retryCount})`;
    case 'FAILED':
      return `Failed ${route}: ${snapshot.lastError?.message ?? 'relay stopped'}`;
    case 'CLOSED':
      return `Closed ${route}`;
    default:
      return `${snapshot.state} ${route}`;
  }
}
