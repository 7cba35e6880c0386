/**
 * Docker client for container lifecycle operations with optional mutex support
 */

import { PassThrough } from 'node:stream';
import Docker, { type DockerOptions } from 'dockerode';
import type { Logger } from '@/lib/logger';
import { createKeyedMutex, type KeyedMutexInstance } from '@/lib/mutex';
import { withTimeout } from '@/lib/clock';
import { ERROR_MESSAGES, TimeoutError, getStatusCode, tagNotFound } from '@/lib/errors';
import { DEFAULT_TIMEOUTS, MANAGED_BY_LABEL, MANAGED_BY_VALUE } from '@/config/constants';
import { Success, Failure, type Result } from '@/types';
import { extractDockerErrorGuidance } from './errors';
import { autoDetectDockerSocket } from './socket-validation';

/**
 * Docker client configuration options.
 */
export interface DockerClientConfig {
  /** Docker socket path (defaults to auto-detection with Colima support) */
  socketPath?: string;
  /** Connection timeout in milliseconds */
  timeout?: number;
  /** Serialize lifecycle calls per container name */
  enableMutex?: boolean;
  mutexConfig?: {
    defaultTimeout?: number;
  };
}

export interface StartContainerOptions {
  name: string;
  image: string;
  env?: Record<string, string>;
  /** Container port → host port */
  ports?: Record<number, number>;
  command?: string[];
  /** bridge, host, or a user network name */
  networkMode?: string;
  labels?: Record<string, string>;
}

export interface StartedContainer {
  id: string;
  name: string;
}

/**
 * Docker container information as returned by listing.
 */
export interface DockerContainerInfo {
  Id: string;
  Names: string[];
  Image: string;
  State: string;
  Status: string;
  Labels: Record<string, string>;
}

export interface ContainerDetails {
  id: string;
  name: string;
  /** created, running, exited... */
  state: string;
  running: boolean;
  /** Health check status when the image defines one */
  health?: string;
  /** Container IP on its first network, when it has one */
  address?: string;
}

export interface ListContainersOptions {
  all?: boolean;
  filters?: Record<string, string[]>;
}

/**
 * Docker client interface for container operations.
 */
export interface DockerClient {
  /** Pull the image when missing, then create and start the container */
  startContainer: (options: StartContainerOptions) => Promise<Result<StartedContainer>>;
  /** `Success(false)` when the container does not exist */
  stopContainer: (nameOrId: string) => Promise<Result<boolean>>;
  removeContainer: (nameOrId: string, force?: boolean) => Promise<Result<void>>;
  /** `Success(null)` when the container does not exist */
  getContainer: (nameOrId: string) => Promise<Result<ContainerDetails | null>>;
  listContainers: (options?: ListContainersOptions) => Promise<Result<DockerContainerInfo[]>>;
  /** Fails on a non-zero exit code */
  execInContainer: (
    nameOrId: string,
    command: string[],
    timeoutMs?: number,
  ) => Promise<Result<string>>;
  getContainerLogs: (nameOrId: string, options?: { tail?: number }) => Promise<Result<string>>;
  /** Stop and remove every container this client started; returns how many were removed */
  cleanup: () => Promise<number>;
  ping: () => Promise<boolean>;
}

/**
 * Split a non-TTY log or exec buffer into its text, dropping the 8-byte
 * frame headers. TTY output has no headers and is returned as-is.
 */
export function demuxDockerBuffer(buffer: Buffer): string {
  const looksMultiplexed =
    buffer.length >= 8 &&
    [0, 1, 2].includes(buffer[0] ?? -1) &&
    buffer[1] === 0 &&
    buffer[2] === 0 &&
    buffer[3] === 0;
  if (!looksMultiplexed) {
    return buffer.toString('utf-8');
  }

  const parts: Buffer[] = [];
  let offset = 0;
  while (offset + 8 <= buffer.length) {
    const length = buffer.readUInt32BE(offset + 4);
    const start = offset + 8;
    parts.push(buffer.subarray(start, Math.min(start + length, buffer.length)));
    offset = start + length;
  }
  return Buffer.concat(parts).toString('utf-8');
}

/**
 * Create base Docker client implementation
 */
function createBaseDockerClient(docker: Docker, logger: Logger): DockerClient {
  const started = new Map<string, string>();

  const fail = <T>(
    error: unknown,
    operation: string,
    context: Record<string, unknown>,
  ): Result<T> => {
    const guidance = tagNotFound(extractDockerErrorGuidance(error), error);
    const errorMessage = ERROR_MESSAGES.DOCKER_OPERATION_FAILED(operation, guidance.message);

    logger.error(
      {
        ...context,
        error: errorMessage,
        hint: guidance.hint,
        resolution: guidance.resolution,
        errorDetails: guidance.details,
      },
      `Docker ${operation} failed`,
    );

    return Failure(errorMessage, guidance);
  };

  const ensureImage = async (image: string): Promise<void> => {
    try {
      await docker.getImage(image).inspect();
      return;
    } catch (error) {
      if (getStatusCode(error) !== 404) throw error;
    }

    logger.info({ image }, 'Pulling image');
    const stream = await docker.pull(image);
    await new Promise<void>((resolve, reject) => {
      docker.modem.followProgress(stream, (err: Error | null) => (err ? reject(err) : resolve()));
    });
  };

  const stopContainer = async (nameOrId: string): Promise<Result<boolean>> => {
    try {
      await docker.getContainer(nameOrId).stop();
      logger.info({ container: nameOrId }, 'Container stopped');
      return Success(true);
    } catch (error) {
      const statusCode = getStatusCode(error);
      if (statusCode === 304) {
        return Success(true);
      }
      if (statusCode === 404) {
        logger.debug({ container: nameOrId }, 'Container not found');
        return Success(false);
      }
      return fail(error, 'stop container', { container: nameOrId });
    }
  };

  const removeContainer = async (nameOrId: string, force = false): Promise<Result<void>> => {
    try {
      await docker.getContainer(nameOrId).remove({ force });
      started.delete(nameOrId);
      logger.debug({ container: nameOrId }, 'Container removed');
      return Success(undefined);
    } catch (error) {
      return fail(error, 'remove container', { container: nameOrId, force });
    }
  };

  return {
    async startContainer(options) {
      const exposedPorts: Record<string, object> = {};
      const portBindings: Record<string, Array<{ HostPort: string }>> = {};
      for (const [containerPort, hostPort] of Object.entries(options.ports ?? {})) {
        const key = `${containerPort}/tcp`;
        exposedPorts[key] = {};
        portBindings[key] = [{ HostPort: String(hostPort) }];
      }

      try {
        await ensureImage(options.image);

        const container = await docker.createContainer({
          name: options.name,
          Image: options.image,
          Env: Object.entries(options.env ?? {}).map(([key, value]) => `${key}=${value}`),
          ...(options.command && { Cmd: options.command }),
          ExposedPorts: exposedPorts,
          Labels: { ...options.labels, [MANAGED_BY_LABEL]: MANAGED_BY_VALUE },
          HostConfig: {
            PortBindings: portBindings,
            NetworkMode: options.networkMode ?? 'bridge',
          },
        });
        await container.start();
        started.set(options.name, container.id);

        logger.info({ name: options.name, image: options.image, id: container.id }, 'Container started');
        return Success({ id: container.id, name: options.name });
      } catch (error) {
        return fail(error, 'start container', { name: options.name, image: options.image });
      }
    },

    stopContainer,
    removeContainer,

    async getContainer(nameOrId) {
      try {
        const info = await docker.getContainer(nameOrId).inspect();
        const details: ContainerDetails = {
          id: info.Id,
          name: info.Name.replace(/^\//, ''),
          state: info.State.Status,
          running: info.State.Running,
        };
        const health = info.State.Health?.Status;
        if (health) details.health = health;
        const address =
          info.NetworkSettings.IPAddress ||
          Object.values(info.NetworkSettings.Networks ?? {})[0]?.IPAddress;
        if (address) details.address = address;
        return Success(details);
      } catch (error) {
        if (getStatusCode(error) === 404) {
          return Success(null);
        }
        return fail(error, 'inspect container', { container: nameOrId });
      }
    },

    async listContainers(options = {}) {
      try {
        logger.debug({ options }, 'Listing containers');
        const containers = await docker.listContainers(options);
        return Success(
          containers.map((c) => ({
            Id: c.Id,
            Names: c.Names,
            Image: c.Image,
            State: c.State,
            Status: c.Status,
            Labels: c.Labels,
          })),
        );
      } catch (error) {
        return fail(error, 'list containers', { options });
      }
    },

    async execInContainer(nameOrId, command, timeoutMs = DEFAULT_TIMEOUTS.docker) {
      try {
        const run = async (): Promise<Result<string>> => {
          const exec = await docker.getContainer(nameOrId).exec({
            Cmd: command,
            AttachStdout: true,
            AttachStderr: true,
          });
          const stream = await exec.start({ hijack: true, stdin: false });
          const stdout = new PassThrough();
          const stderr = new PassThrough();
          const out: Buffer[] = [];
          const err: Buffer[] = [];
          stdout.on('data', (chunk: Buffer) => out.push(chunk));
          stderr.on('data', (chunk: Buffer) => err.push(chunk));
          docker.modem.demuxStream(stream, stdout, stderr);

          await new Promise<void>((resolve, reject) => {
            stream.on('end', resolve);
            stream.on('close', resolve);
            stream.on('error', reject);
          });

          const { ExitCode: exitCode } = await exec.inspect();
          const output = Buffer.concat(out).toString('utf-8');
          if (exitCode === 0) {
            return Success(output);
          }
          const stderrText = Buffer.concat(err).toString('utf-8').trim();
          return Failure(`Command exited with code ${exitCode} in ${nameOrId}`, {
            message: `Command failed in container ${nameOrId}`,
            hint: stderrText || `Exit code ${exitCode}`,
            resolution: 'Run the command by hand with `docker exec` to see its full output',
            details: { command, exitCode, stdout: output },
          });
        };

        logger.debug({ container: nameOrId, command }, 'Executing command in container');
        return await withTimeout(run(), timeoutMs, `Exec in ${nameOrId}`);
      } catch (error) {
        const guidance = tagNotFound(extractDockerErrorGuidance(error), error);
        logger.debug({ container: nameOrId, error: guidance.message }, 'Exec failed');
        return Failure(`Exec in ${nameOrId} failed: ${guidance.message}`, guidance);
      }
    },

    async getContainerLogs(nameOrId, options = {}) {
      try {
        const buffer = await docker.getContainer(nameOrId).logs({
          stdout: true,
          stderr: true,
          follow: false,
          ...(options.tail === undefined ? {} : { tail: options.tail }),
        });
        return Success(demuxDockerBuffer(buffer));
      } catch (error) {
        return fail(error, 'read container logs', { container: nameOrId });
      }
    },

    async cleanup() {
      let removed = 0;
      for (const name of [...started.keys()]) {
        const stopped = await stopContainer(name);
        if (!stopped.ok) {
          logger.warn({ container: name, error: stopped.error }, 'Stop before removal failed');
        }
        const result = await removeContainer(name, true);
        if (result.ok) {
          removed++;
        }
        started.delete(name);
      }
      if (removed > 0) {
        logger.info({ removed }, 'Removed started containers');
      }
      return removed;
    },

    async ping() {
      try {
        await withTimeout(docker.ping(), DEFAULT_TIMEOUTS.ping, 'Docker ping');
        return true;
      } catch (error) {
        logger.debug({ error: extractDockerErrorGuidance(error).message }, 'Docker ping failed');
        return false;
      }
    },
  };
}

/**
 * Wrap Docker client with mutex protection on lifecycle calls
 */
function wrapWithMutex(
  baseClient: DockerClient,
  mutex: KeyedMutexInstance,
  mutexConfig: DockerClientConfig['mutexConfig'],
  logger: Logger,
): DockerClient {
  const timeout = mutexConfig?.defaultTimeout ?? 30000;

  const locked = async <T>(name: string, fn: () => Promise<Result<T>>): Promise<Result<T>> => {
    const lockKey = `docker:container:${name}`;
    try {
      return await mutex.withLock(lockKey, fn, timeout);
    } catch (error) {
      if (error instanceof TimeoutError) {
        logger.error({ lockKey, timeout }, 'Container mutex timeout');
        return Failure(`Operation on ${name} timed out after ${timeout}ms waiting for another operation`);
      }
      throw error;
    }
  };

  return {
    ...baseClient,
    startContainer: (options) => locked(options.name, () => baseClient.startContainer(options)),
    stopContainer: (nameOrId) => locked(nameOrId, () => baseClient.stopContainer(nameOrId)),
    removeContainer: (nameOrId, force) =>
      locked(nameOrId, () => baseClient.removeContainer(nameOrId, force)),
  };
}

/**
 * Create a Docker client with container lifecycle operations
 */
export const createDockerClient = (logger: Logger, config?: DockerClientConfig): DockerClient => {
  let socketPath: string;

  if (config?.socketPath) {
    socketPath = config.socketPath;
  } else {
    socketPath = autoDetectDockerSocket();
    logger.debug({ socketPath }, 'Auto-detected Docker socket');
  }

  const dockerOptions: DockerOptions = {};

  if (socketPath.startsWith('tcp://') || socketPath.startsWith('http://')) {
    const url = new URL(socketPath.replace(/^tcp:/, 'http:'));
    dockerOptions.host = url.hostname;
    dockerOptions.port = url.port || 2375;
  } else {
    dockerOptions.socketPath = socketPath;
  }

  if (config?.timeout) {
    dockerOptions.timeout = config.timeout;
  }

  const docker = new Docker(dockerOptions);

  logger.debug({ dockerOptions, enableMutex: config?.enableMutex }, 'Created Docker client');

  const baseClient = createBaseDockerClient(docker, logger);

  if (config?.enableMutex) {
    const mutex = createKeyedMutex({
      defaultTimeout: config.mutexConfig?.defaultTimeout ?? 30000,
    });
    logger.debug('Docker client mutex protection enabled');
    return wrapWithMutex(baseClient, mutex, config.mutexConfig, logger);
  }

  return baseClient;
};
