/**
 * @file process-handlers.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';

/**
 * Stops every tunnel and exits. `exitCode` overrides the code derived from
 * whether the tunnels stopped in time.
 */
export type ShutdownFn = (reason: string, exitCode?: number) => Promise<void>;

/**
 * The slice of `process` the handlers attach to.
 */
export interface ProcessEvents {
  on(event: 'SIGINT' | 'SIGTERM', listener: () => void): unknown;
  on(event: 'uncaughtException', listener: (error: Error) => void): unknown;
  on(event: 'unhandledRejection', listener: (reason: unknown) => void): unknown;
}

/**
 * Routes signals and crashes through the shutdown path, so session children
 * in their own process groups are stopped before the host exits.
 */
export function installShutdownHandlers(
  target: ProcessEvents,
  logger: Logger,
  shutdown: ShutdownFn
): void {
  target.on('SIGINT', () => void shutdown('SIGINT'));
  target.on('SIGTERM', () => void shutdown('SIGTERM'));

  target.on('uncaughtException', (error) => {
    logger.fatal({ error }, 'Uncaught exception');
    void shutdown('uncaughtException', 1);
  });

  target.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
  });
}
