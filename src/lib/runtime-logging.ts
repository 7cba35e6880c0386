/**
 * Shutdown logging and signal handling for long-running commands.
 *
 * A forwarding command holds local ports until the process exits; the
 * handlers installed here close every tunnel before exiting.
 */

import type { Logger } from './logger';
import { extractErrorMessage } from './errors';

/**
 * Anything that releases its resources on shutdown
 */
export interface Stoppable {
  shutdown(): Promise<void>;
}

export interface ShutdownInfo {
  signal: string;
  /** Duration of the shutdown in milliseconds */
  duration: number;
  exitCode: number;
  graceful: boolean;
}

export function logShutdownStart(signal: string, logger: Logger, quiet = false): void {
  logger.info({ signal }, 'Shutdown initiated');

  if (!quiet) {
    console.error(`\nReceived ${signal}, closing tunnels...`);
  }
}

export function logShutdownSuccess(info: ShutdownInfo, logger: Logger, quiet = false): void {
  logger.info(
    { signal: info.signal, duration: info.duration, graceful: info.graceful },
    'Shutdown completed successfully',
  );

  if (!quiet) {
    console.error('Shutdown complete');
  }
}

export function logShutdownFailure(
  error: unknown,
  info: Partial<ShutdownInfo>,
  logger: Logger,
  quiet = false,
): void {
  logger.error(
    { error: extractErrorMessage(error), signal: info.signal, duration: info.duration, graceful: false },
    'Shutdown error',
  );

  if (!quiet) {
    console.error(`Shutdown error: ${extractErrorMessage(error)}`);
  }
}

export function logForcedShutdown(logger: Logger, quiet = false): void {
  logger.error('Forced shutdown due to timeout');

  if (!quiet) {
    console.error('Forced shutdown - some local ports may not have been released');
  }
}

/**
 * Create a shutdown handler that exits the process once `target` has stopped
 */
export function createShutdownHandler(
  target: Stoppable,
  logger: Logger,
  quiet = false,
  timeoutMs = 10000,
): (signal: string) => Promise<void> {
  return async (signal: string): Promise<void> => {
    const startTime = Date.now();
    logShutdownStart(signal, logger, quiet);

    const shutdownTimeout = setTimeout(() => {
      logForcedShutdown(logger, quiet);
      process.exit(1);
    }, timeoutMs);

    try {
      await target.shutdown();
      clearTimeout(shutdownTimeout);
      logShutdownSuccess(
        { signal, duration: Date.now() - startTime, exitCode: 0, graceful: true },
        logger,
        quiet,
      );
      process.exit(0);
    } catch (error) {
      clearTimeout(shutdownTimeout);
      logShutdownFailure(
        error,
        { signal, duration: Date.now() - startTime, exitCode: 1, graceful: false },
        logger,
        quiet,
      );
      process.exit(1);
    }
  };
}

/**
 * Install SIGINT/SIGTERM handlers that shut `target` down before exit
 */
export function installShutdownHandlers(target: Stoppable, logger: Logger, quiet = false): void {
  const shutdownHandler = createShutdownHandler(target, logger, quiet);

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      shutdownHandler(signal).catch((error: unknown) => {
        logger.error({ error: extractErrorMessage(error) }, `Error during ${signal} shutdown`);
        process.exit(1);
      });
    });
  }

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason: extractErrorMessage(reason) }, 'Unhandled promise rejection');
    console.error(`Unhandled rejection: ${extractErrorMessage(reason)}`);
    process.exit(1);
  });
}
