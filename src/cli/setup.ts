/**
 * CLI-only process lifecycle helpers.
 *
 * Installs global signal handlers, so it must only be imported from the CLI
 * entry point (src/cli.ts), never from the library API.
 */

import { logger } from '../utils/logger';

const FORCED_EXIT_MS = 5000;

/**
 * The parts of `process` the handlers need
 */
export type ProcessHandle = Pick<NodeJS.Process, 'on' | 'off' | 'exit'>;

/**
 * Abort `controller` on SIGINT or SIGTERM so running operations stop between
 * files. A second signal, or a stuck operation after five seconds, exits 1.
 *
 * @param proc - The process object to register handlers on. Accepts a custom
 *               value for testing.
 * @returns A function that removes the installed handlers.
 */
export function setupGracefulShutdown(
  controller: AbortController,
  proc: ProcessHandle = process
): () => void {
  const shutdown = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      logger.warn(`Received ${signal} again, exiting`);
      proc.exit(1);
      return;
    }
    logger.info(`Received ${signal}, cancelling`);
    controller.abort();
    setTimeout(() => {
      logger.warn('Forcing shutdown');
      proc.exit(1);
    }, FORCED_EXIT_MS).unref();
  };

  const onUnhandledRejection = (reason: unknown) => {
    logger.error('Unhandled Rejection', { reason: String(reason) });
    proc.exit(1);
  };

  proc.on('SIGINT', shutdown);
  proc.on('SIGTERM', shutdown);
  proc.on('unhandledRejection', onUnhandledRejection);

  return () => {
    proc.off('SIGINT', shutdown);
    proc.off('SIGTERM', shutdown);
    proc.off('unhandledRejection', onUnhandledRejection);
  };
}
