// Process-level error handlers and graceful shutdown
import type { Server } from 'http';
import { errorMessage } from '@/services/errors';
import { logger } from '@/services/logger';

const SHUTDOWN_TIMEOUT_MS = 15_000;

export function setupProcessErrorHandlers(nodeEnv: string): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      err: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    // Keep serving in production; fail fast elsewhere.
    if (nodeEnv !== 'production') process.exit(1);
  });

  process.on('uncaughtException', (error: Error) => {
    logger.fatal('process:uncaught_exception', { err: error.message, stack: error.stack });
    process.exit(1);
  });
}

export function setupGracefulShutdown(server: Server): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  for (const signal of signals) {
    process.once(signal, () => {
      logger.info('process:shutdown', { signal });
      const forced = setTimeout(() => {
        logger.error('process:forced_shutdown', { timeoutMs: SHUTDOWN_TIMEOUT_MS });
        process.exit(1);
      }, SHUTDOWN_TIMEOUT_MS);
      forced.unref();
      server.close(() => {
        clearTimeout(forced);
        process.exit(0);
      });
    });
  }
}
