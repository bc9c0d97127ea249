/**
 * @file session-process.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, afterEach } from 'vitest';
import { PortAllocator } from '../../../src/infrastructure/network/port-allocator.js';
import { canConnect } from '../../../src/infrastructure/network/tcp-probe.js';
import type { SessionProcess } from '../../../src/infrastructure/process/session-process.js';
import {
  ChildExitedEarlyError,
  ReadinessTimeoutError,
  StartCancelledError,
} from '../../../src/domain/errors/domain-errors.js';
import { createSilentLogger } from '../../../src/infrastructure/logging/pino-logger.js';
import { FAST_TIMING, createFakeLauncher } from '../../fixtures/session-fixture.js';

const logger = createSilentLogger();
const ports = new PortAllocator({ rangeStart: 20000, rangeEnd: 40000 });

describe('SessionProcess', () => {
  const running: SessionProcess[] = [];

  afterEach(async () => {
    await Promise.all(running.map((session) => session.stop()));
    running.length = 0;
  });

  async function launch(
    fakeEnv: Record<string, string> = {},
    timing = FAST_TIMING
  ): Promise<{ session: SessionProcess; localPort: number }> {
    const localPort = await ports.allocate();
    ports.release(localPort);
    const session = await createFakeLauncher(logger, fakeEnv, timing).launchEcs({
      clusterName: 'main',
      taskId: 'task-1',
      containerRuntimeId: 'runtime-1',
      remotePort: 80,
      localPort,
    });
    running.push(session);
    return { session, localPort };
  }

  it('should become ready once the local port accepts connections', async () => {
    const { session, localPort } = await launch();

    await session.waitUntilReady();

    expect(session.state).toBe('running');
    expect(session.pid).toBeTypeOf('number');
    expect(session.stdoutText()).toContain('Waiting for connections...');
    await expect(canConnect('127.0.0.1', localPort, 1_000)).resolves.toBe(true);
  });

  it('should report the stderr tail when the child exits early', async () => {
    const { session } = await launch({
      FAKE_SSM_MODE: 'exit-early',
      FAKE_SSM_STDERR: 'An error occurred (TargetNotConnected) when calling the StartSession operation',
    });

    const error = await session.waitUntilReady().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ChildExitedEarlyError);
    expect(error).toMatchObject({
      exitCode: 255,
      message: 'An error occurred (TargetNotConnected) when calling the StartSession operation',
    });
    expect(session.state).toBe('exited');
  });

  it('should fall back to stdout when stderr is empty', async () => {
    const { session } = await launch({ FAKE_SSM_MODE: 'exit-early' });

    await expect(session.waitUntilReady()).rejects.toThrow(
      'Starting session with SessionId: fake-session'
    );
  });

  it('should time out when the port never opens', async () => {
    const { session } = await launch({ FAKE_SSM_MODE: 'hang' }, { ...FAST_TIMING, startTimeoutMs: 400 });

    const error = await session.waitUntilReady().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ReadinessTimeoutError);
    expect(error).toHaveProperty('message', 'Session was not ready within 400ms');
    expect(session.state).toBe('running');
  });

  it('should withhold readiness until the settle interval has passed', async () => {
    const launchedAt = Date.now();
    const { session } = await launch({}, { ...FAST_TIMING, settleMs: 600 });

    await session.waitUntilReady();

    // The fake listens and prints the ready line well before 600ms
    expect(session.stdoutText()).toContain('Waiting for connections...');
    expect(Date.now() - launchedAt).toBeGreaterThanOrEqual(600);
  });

  it('should time out at the configured deadline', async () => {
    const launchedAt = Date.now();
    const { session } = await launch(
      { FAKE_SSM_MODE: 'hang' },
      { ...FAST_TIMING, startTimeoutMs: 500, probeIntervalMs: 25 }
    );
    const spawnedBy = Date.now();

    await expect(session.waitUntilReady()).rejects.toThrow(ReadinessTimeoutError);

    const failedAt = Date.now();
    expect(failedAt - launchedAt).toBeGreaterThanOrEqual(500);
    // One probe interval plus scheduling slack
    expect(failedAt - spawnedBy).toBeLessThan(500 + 150);
  });

  it('should stop waiting when the start is cancelled', async () => {
    const { session } = await launch({ FAKE_SSM_MODE: 'hang' });
    const controller = new AbortController();

    const waiting = session.waitUntilReady(controller.signal);
    setTimeout(() => controller.abort(), 100);

    await expect(waiting).rejects.toThrow(StartCancelledError);
  });

  it('should stop gracefully with SIGTERM', async () => {
    const { session } = await launch();
    await session.waitUntilReady();

    await expect(session.stop()).resolves.toEqual({ code: 0, signal: null });
    expect(session.state).toBe('exited');
  });

  it('should force kill a child that ignores SIGTERM', async () => {
    const { session } = await launch(
      { FAKE_SSM_IGNORE_SIGTERM: '1' },
      { ...FAST_TIMING, stopGraceMs: 300 }
    );
    await session.waitUntilReady();

    await expect(session.stop()).resolves.toEqual({ code: null, signal: 'SIGKILL' });
  });

  it('should return the same exit status when stopped twice', async () => {
    const { session } = await launch();
    await session.waitUntilReady();

    const first = await session.stop();
    await expect(session.stop()).resolves.toBe(first);
  });
});
