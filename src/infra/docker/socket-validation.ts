/**
 * Docker socket validation and auto-detection
 */

import { existsSync, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { extractErrorMessage } from '@/lib/errors';

export interface SocketValidationResult {
  /** The validated Docker socket path (empty string if invalid) */
  dockerSocket: string;
  warnings: string[];
}

const NO_SOCKET_WARNINGS = [
  'No valid Docker socket found',
  'Container operations require a running Docker daemon',
  'Start Docker, or set DOCKER_SOCKET to the daemon socket path',
];

/**
 * Colima and Lima socket locations, in order of preference
 */
function getColimaSockets(): string[] {
  const homeDir = homedir();
  return [
    join(homeDir, '.colima/default/docker.sock'),
    join(homeDir, '.colima/docker/docker.sock'),
    join(homeDir, '.lima/colima/sock/docker.sock'),
  ];
}

function isSocket(socketPath: string): boolean {
  try {
    return existsSync(socketPath) && statSync(socketPath).isSocket();
  } catch {
    return false;
  }
}

/**
 * Auto-detect the Docker socket path (synchronous).
 * Falls back to /var/run/docker.sock when nothing is found.
 */
export function autoDetectDockerSocket(): string {
  if (process.platform === 'win32') {
    return 'npipe://./pipe/docker_engine';
  }

  const candidates = ['/var/run/docker.sock', ...getColimaSockets()];
  return candidates.find(isSocket) ?? '/var/run/docker.sock';
}

/**
 * Validate a socket path, returning warnings instead of throwing.
 * Named pipes cannot be stat()'d and are passed through to dockerode.
 */
export function validateDockerSocket(socketPath: string): SocketValidationResult {
  if (socketPath.includes('pipe')) {
    return { dockerSocket: socketPath, warnings: [] };
  }

  try {
    const stat = statSync(socketPath);
    if (!stat.isSocket()) {
      return {
        dockerSocket: '',
        warnings: [`${socketPath} exists but is not a socket`, ...NO_SOCKET_WARNINGS],
      };
    }
  } catch (error) {
    return {
      dockerSocket: '',
      warnings: [
        `Cannot access Docker socket: ${socketPath} - ${extractErrorMessage(error)}`,
        ...NO_SOCKET_WARNINGS,
      ],
    };
  }

  return { dockerSocket: socketPath, warnings: [] };
}
