/**
 * Unified Application Configuration
 *
 * Single source of truth for all configuration with Zod validation.
 * Environment variables are read through env-utils; defaults come from constants.
 */

import { z } from 'zod';
import os from 'node:os';
import path from 'node:path';
import { autoDetectDockerSocket } from '@/infra/docker/socket-validation';
import { DEFAULT_NAMESPACE, DEFAULT_TIMEOUTS, DEFAULT_TUNNEL } from './constants';
import { parseIntEnv, parseStringEnv, type Env } from './env-utils';

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const positiveMs = z.number().int().positive();

const AppConfigSchema = z.object({
  logging: z.object({
    level: LogLevelSchema,
  }),
  kubernetes: z.object({
    namespace: z.string().min(1),
    kubeconfig: z.string(),
  }),
  docker: z.object({
    socketPath: z.string().min(1),
    timeout: positiveMs,
  }),
  readiness: z.object({
    timeoutMs: positiveMs,
    pollIntervalMs: positiveMs,
    probeTimeoutMs: positiveMs,
  }),
  resolver: z.object({
    readyTimeoutMs: positiveMs,
    pollIntervalMs: positiveMs,
  }),
  tunnel: z.object({
    retryLimit: z.number().int().min(0),
    reconnectDelayMs: z.number().int().min(0),
    settleDelayMs: z.number().int().min(0),
    bindHost: z.string().min(1),
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Build and validate configuration from environment variables.
 * Throws a ZodError naming every invalid field.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const rawConfig = {
    logging: {
      level: parseStringEnv('LOG_LEVEL', env.NODE_ENV === 'test' ? 'silent' : 'info', env),
    },
    kubernetes: {
      namespace: parseStringEnv('K8S_NAMESPACE', DEFAULT_NAMESPACE, env),
      kubeconfig: parseStringEnv('KUBECONFIG', path.join(os.homedir(), '.kube', 'config'), env),
    },
    docker: {
      socketPath: env.DOCKER_SOCKET || autoDetectDockerSocket(),
      timeout: parseIntEnv('DOCKER_TIMEOUT', DEFAULT_TIMEOUTS.docker, env),
    },
    readiness: {
      timeoutMs: parseIntEnv('READINESS_TIMEOUT_MS', DEFAULT_TIMEOUTS.readiness, env),
      pollIntervalMs: parseIntEnv('READINESS_POLL_INTERVAL_MS', DEFAULT_TIMEOUTS.readinessPoll, env),
      probeTimeoutMs: parseIntEnv('READINESS_PROBE_TIMEOUT_MS', DEFAULT_TIMEOUTS.readinessProbe, env),
    },
    resolver: {
      readyTimeoutMs: parseIntEnv('RESOLVER_READY_TIMEOUT_MS', DEFAULT_TIMEOUTS.resolverReady, env),
      pollIntervalMs: parseIntEnv('RESOLVER_POLL_INTERVAL_MS', DEFAULT_TIMEOUTS.resolverPoll, env),
    },
    tunnel: {
      retryLimit: parseIntEnv('TUNNEL_RETRY_LIMIT', DEFAULT_TUNNEL.retryLimit, env),
      reconnectDelayMs: parseIntEnv('TUNNEL_RECONNECT_DELAY_MS', DEFAULT_TIMEOUTS.tunnelReconnect, env),
      settleDelayMs: parseIntEnv('TUNNEL_SETTLE_DELAY_MS', DEFAULT_TIMEOUTS.tunnelSettle, env),
      bindHost: parseStringEnv('TUNNEL_BIND_HOST', DEFAULT_TUNNEL.bindHost, env),
    },
  };

  return AppConfigSchema.parse(rawConfig);
}
