/**
 * Docker error handling utilities leveraging dockerode's native error structure
 */

import type { ErrorGuidance } from '@/types';
import {
  createErrorGuidanceBuilder,
  customPattern,
  messagePattern,
  statusCodePattern,
  type ErrorPattern,
} from '@/lib/error-guidance';
import { getStatusCode } from '@/lib/errors';

/**
 * Fields dockerode and the socket layer attach to their errors
 */
interface DockerodeErrorFields {
  statusCode?: number;
  json?: unknown;
  reason?: string;
  code?: string;
}

function readFields(error: unknown): DockerodeErrorFields {
  const fields: DockerodeErrorFields = {};
  if (typeof error !== 'object' || error === null) return fields;
  const statusCode = getStatusCode(error);
  if (statusCode !== undefined) fields.statusCode = statusCode;
  if ('json' in error && error.json !== null && error.json !== undefined) fields.json = error.json;
  if ('reason' in error && typeof error.reason === 'string') fields.reason = error.reason;
  if ('code' in error && typeof error.code === 'string') fields.code = error.code;
  return fields;
}

/**
 * Detailed message: the daemon's json.message, else the longer of message and reason
 */
export function extractDockerMessage(error: unknown): string {
  const fields = readFields(error);
  const json = fields.json;
  if (typeof json === 'object' && json !== null && 'message' in json && typeof json.message === 'string' && json.message) {
    return json.message;
  }
  const message = error instanceof Error ? error.message : String(error);
  if (!message || (fields.reason && fields.reason.length > message.length)) {
    return fields.reason ?? message;
  }
  return message;
}

/**
 * `errno` rather than `code`: guidance `details.code` is reserved for the error taxonomy
 */
function buildDetails(error: unknown): Record<string, unknown> {
  const fields = readFields(error);
  const details: Record<string, unknown> = {};
  if (fields.statusCode !== undefined) details.statusCode = fields.statusCode;
  if (fields.reason) details.reason = fields.reason;
  if (fields.code) details.errno = fields.code;
  return details;
}

function hasErrno(code: string): (error: unknown) => boolean {
  return (error: unknown) => readFields(error).code === code;
}

/**
 * Docker error patterns in order of specificity
 */
const dockerErrorPatterns: ErrorPattern[] = [
  customPattern(hasErrno('ECONNREFUSED'), (error) => ({
    message: 'Docker daemon is not available',
    hint: 'Connection to Docker daemon was refused',
    resolution: 'Ensure Docker is installed and running: `docker ps` should succeed.',
    details: buildDetails(error),
  })),
  customPattern(hasErrno('ETIMEDOUT'), (error) => ({
    message: 'Docker operation timed out',
    hint: 'The daemon did not answer in time',
    resolution: 'Check the daemon load, or raise DOCKER_TIMEOUT.',
    details: buildDetails(error),
  })),
  messagePattern('connect ENOENT', {
    message: 'Docker daemon is not running',
    hint: 'Cannot connect to Docker socket',
    resolution: 'Start the Docker daemon or Docker Desktop, or point DOCKER_SOCKET at a running daemon.',
  }),
  messagePattern('connect EACCES', {
    message: 'Permission denied on the Docker socket',
    hint: 'The current user may not talk to the Docker daemon',
    resolution: 'Add the user to the `docker` group, or run against a rootless daemon.',
  }),
  statusCodePattern(304, {
    message: 'Container already in the requested state',
    hint: 'The container was already started or stopped',
  }),
  customPattern(
    (error) => getStatusCode(error) === 404,
    (error) => ({
      message: extractDockerMessage(error) || 'No such container or image',
      hint: 'The container or image does not exist',
      resolution: 'Check the name with `docker ps -a` or `docker images`.',
      details: buildDetails(error),
    }),
  ),
  customPattern(
    (error) => getStatusCode(error) === 409,
    (error) => ({
      message: extractDockerMessage(error) || 'Container name conflict',
      hint: 'A container with this name already exists or is in a conflicting state',
      resolution: 'Remove the existing container with `docker rm -f <name>`, or use a different name.',
      details: buildDetails(error),
    }),
  ),
  customPattern(
    (error) => {
      const statusCode = getStatusCode(error);
      return statusCode !== undefined && statusCode >= 500;
    },
    (error) => ({
      message: extractDockerMessage(error) || 'Docker daemon error',
      hint: 'The daemon rejected the request',
      resolution: 'Check `docker info` and the daemon logs.',
      details: buildDetails(error),
    }),
  ),
];

function defaultDockerGuidance(error: unknown): ErrorGuidance {
  return {
    message: extractDockerMessage(error) || 'Docker operation failed',
    hint: 'An error occurred during the Docker operation',
    resolution: 'Check Docker daemon logs and ensure Docker is functioning correctly.',
    details: buildDetails(error),
  };
}

const baseExtractor = createErrorGuidanceBuilder(dockerErrorPatterns, defaultDockerGuidance);

/**
 * Extract error with actionable guidance for operators
 */
export function extractDockerErrorGuidance(error: unknown): ErrorGuidance {
  return baseExtractor(error);
}
