/**
 * Default timeouts, intervals and limits
 */

export const DEFAULT_TIMEOUTS = {
  docker: 60000, // 60 seconds
  kubernetes: 30000, // 30 seconds
  readiness: 120000, // 2 minutes
  readinessPoll: 5000, // 5 seconds (between readiness passes)
  readinessProbe: 10000, // 10 seconds (one exec or log read)
  resolverReady: 60000, // 1 minute
  resolverPoll: 2000, // 2 seconds (between pod listings)
  deploymentPoll: 5000, // 5 seconds (between deployment status checks)
  tunnelSettle: 2000, // 2 seconds (after binding, before the liveness connect)
  tunnelReconnect: 1000, // 1 second (between relay attempts)
  livenessConnect: 2000, // 2 seconds
  ping: 5000, // 5 seconds
} as const;

export const DEFAULT_TUNNEL = {
  retryLimit: 3,
  bindHost: '127.0.0.1',
} as const;

export const DEFAULT_NAMESPACE = 'default';

/** Label container cleanup and `docker` selectors operate on */
export const MANAGED_BY_LABEL = 'app.kubernetes.io/managed-by';
export const MANAGED_BY_VALUE = 'podgate';
