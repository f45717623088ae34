// Process-level error handlers and graceful shutdown.

import type { AppLogger } from '@/services/logger';

export type ShutdownHook = () => Promise<void> | void;

const SHUTDOWN_TIMEOUT_MS = 15_000;

/**
 * Unhandled rejections are logged and the process keeps serving;
 * an uncaught exception triggers a graceful shutdown.
 */
export function setupProcessHandlers(logger: AppLogger, onShutdown: ShutdownHook): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Promise Rejection', reason);
  });

  process.on('uncaughtException', (error: Error) => {
    logger.fatal('Uncaught Exception', error);
    void gracefulShutdown(logger, 'uncaughtException', onShutdown, 1);
  });

  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  signals.forEach((signal) => {
    process.once(signal, () => {
      logger.info(`Received ${signal}, shutting down`);
      void gracefulShutdown(logger, signal, onShutdown, 0);
    });
  });
}

async function gracefulShutdown(
  logger: AppLogger,
  reason: string,
  onShutdown: ShutdownHook,
  exitCode: number,
): Promise<void> {
  const forced = setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forced.unref();

  try {
    await onShutdown();
    logger.info(`Shutdown complete (${reason})`);
    process.exit(exitCode);
  } catch (error) {
    logger.error('Error during shutdown', error);
    process.exit(1);
  }
}
