/**
 * @file process-handlers.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, vi } from 'vitest';
import { EventEmitter } from 'node:events';
import { installShutdownHandlers, type ShutdownFn } from '../../../src/cli/process-handlers.js';
import { createSilentLogger } from '../../../src/infrastructure/logging/pino-logger.js';

function setup() {
  const events = new EventEmitter();
  const logger = createSilentLogger();
  const fatal = vi.spyOn(logger, 'fatal');
  const shutdown = vi.fn<ShutdownFn>(() => Promise.resolve());
  installShutdownHandlers(events, logger, shutdown);
  return { events, fatal, shutdown };
}

describe('installShutdownHandlers', () => {
  it('should shut down on SIGINT and SIGTERM', () => {
    const { events, shutdown } = setup();

    events.emit('SIGINT');
    events.emit('SIGTERM');

    expect(shutdown.mock.calls).toEqual([['SIGINT'], ['SIGTERM']]);
  });

  it('should stop every tunnel and exit with 1 on an uncaught exception', () => {
    const { events, fatal, shutdown } = setup();
    const error = new Error('boom');

    events.emit('uncaughtException', error);

    expect(fatal).toHaveBeenCalledWith({ error }, 'Uncaught exception');
    expect(shutdown.mock.calls).toEqual([['uncaughtException', 1]]);
  });

  it('should only log unhandled rejections', () => {
    const { events, shutdown } = setup();

    events.emit('unhandledRejection', new Error('late'));

    expect(shutdown).not.toHaveBeenCalled();
  });
});
