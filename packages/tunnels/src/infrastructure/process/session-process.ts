/**
 * @file session-process.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 *
 * Supervised Session Manager child process.
 * The child runs in its own process group so that stop signals also reach the
 * session-manager plugin it spawns.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import type { Logger } from 'pino';
import { PORT_RANGE, SESSION_MANAGER, TUNNEL_TIMING } from '../../config/constants.js';
import {
  ChildExitedEarlyError,
  ChildLaunchFailedError,
  ReadinessTimeoutError,
  StartCancelledError,
  describeError,
} from '../../domain/errors/domain-errors.js';
import { canConnect } from '../network/tcp-probe.js';
import { OutputRingBuffer } from './output-ring-buffer.js';

export interface SessionTiming {
  settleMs: number;
  startTimeoutMs: number;
  stopGraceMs: number;
  probeIntervalMs: number;
}

export const DEFAULT_SESSION_TIMING: SessionTiming = {
  settleMs: TUNNEL_TIMING.SETTLE_MS,
  startTimeoutMs: TUNNEL_TIMING.START_TIMEOUT_MS,
  stopGraceMs: TUNNEL_TIMING.STOP_GRACE_MS,
  probeIntervalMs: TUNNEL_TIMING.PROBE_INTERVAL_MS,
};

export interface SessionProcessConfig {
  command: string;
  args: readonly string[];
  env: NodeJS.ProcessEnv;
  /** Local port the session binds; probed for readiness */
  localPort: number;
  timing?: Partial<SessionTiming>;
  readyLine?: RegExp;
  logger: Logger;
}

export interface SessionExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export type SessionState = 'idle' | 'running' | 'exited';

/**
 * Wraps one session-manager subprocess: spawn, readiness, output capture and stop.
 */
export class SessionProcess {
  private readonly command: string;
  private readonly args: readonly string[];
  private readonly env: NodeJS.ProcessEnv;
  private readonly localPort: number;
  private readonly timing: SessionTiming;
  private readonly readyLine: RegExp;
  private readonly logger: Logger;
  private readonly stdout = new OutputRingBuffer(SESSION_MANAGER.OUTPUT_BUFFER_BYTES);
  private readonly stderr = new OutputRingBuffer(SESSION_MANAGER.OUTPUT_BUFFER_BYTES);
  private child: ChildProcess | null = null;
  private spawnedAt = 0;
  private readyLineSeen = false;
  private exitInfo: SessionExit | null = null;
  private resolveExited: (exit: SessionExit) => void = () => undefined;

  /**
   * Settles once the child has exited and its output streams are drained.
   * Never rejects.
   */
  readonly exited: Promise<SessionExit>;

  constructor(config: SessionProcessConfig) {
    this.command = config.command;
    this.args = config.args;
    this.env = config.env;
    this.localPort = config.localPort;
    this.timing = { ...DEFAULT_SESSION_TIMING, ...config.timing };
    this.readyLine = config.readyLine ?? SESSION_MANAGER.READY_LINE;
    this.logger = config.logger.child({ component: 'SessionProcess', localPort: config.localPort });
    this.exited = new Promise((resolve) => {
      this.resolveExited = resolve;
    });
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  get state(): SessionState {
    if (this.exitInfo) return 'exited';
    return this.child ? 'running' : 'idle';
  }

  get exitStatus(): SessionExit | null {
    return this.exitInfo;
  }

  /**
   * Spawns the child. Resolves once the OS reports it running.
   */
  start(): Promise<void> {
    if (this.child) {
      return Promise.reject(new Error('Session process already started'));
    }

    return new Promise((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(this.command, [...this.args], {
          env: this.env,
          stdio: ['ignore', 'pipe', 'pipe'],
          detached: true,
        });
      } catch (error) {
        this.recordExit({ code: null, signal: null });
        reject(new ChildLaunchFailedError(this.command, describeError(error)));
        return;
      }
      this.child = child;

      child.stdout?.on('data', (data: Buffer) => this.capture(this.stdout, data));
      child.stderr?.on('data', (data: Buffer) => this.capture(this.stderr, data));

      child.once('spawn', () => {
        this.spawnedAt = Date.now();
        this.logger.debug({ pid: child.pid, args: this.args }, 'Session process spawned');
        resolve();
      });

      child.on('error', (error) => {
        if (child.pid === undefined) {
          this.recordExit({ code: null, signal: null });
          reject(new ChildLaunchFailedError(this.command, error.message));
          return;
        }
        this.logger.error({ error, pid: child.pid }, 'Session process error');
      });

      // 'close' fires after stdio is drained, so stderr is complete by then
      child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
        this.recordExit({ code, signal });
      });
    });
  }

  /**
   * Resolves once the session is usable: it has been alive for the settle
   * interval and either accepts TCP connections on its local port or has
   * printed the ready line. Rejects with ChildExitedEarly, ReadinessTimeout
   * or StartCancelled; the caller owns killing the child afterwards.
   */
  async waitUntilReady(signal?: AbortSignal): Promise<void> {
    if (!this.child) {
      throw new Error('Session process not started');
    }

    const settleAt = this.spawnedAt + this.timing.settleMs;
    const deadline = this.spawnedAt + this.timing.startTimeoutMs;

    for (;;) {
      if (signal?.aborted) {
        throw new StartCancelledError();
      }
      if (this.exitInfo) {
        throw new ChildExitedEarlyError(this.exitInfo.code, this.stderrTail());
      }

      const now = Date.now();
      if (now >= deadline) {
        throw new ReadinessTimeoutError(this.timing.startTimeoutMs);
      }

      if (now >= settleAt) {
        if (this.readyLineSeen) {
          return;
        }
        const probeTimeout = Math.min(TUNNEL_TIMING.PROBE_CONNECT_TIMEOUT_MS, deadline - now);
        const connected = await canConnect(PORT_RANGE.HOST, this.localPort, probeTimeout);
        // A late exit wins over a probe that raced it
        if (connected && !this.exitInfo) {
          return;
        }
        if (this.exitInfo || signal?.aborted) {
          continue;
        }
      }

      const wakeAt = Math.min(
        now < settleAt ? settleAt : Date.now() + this.timing.probeIntervalMs,
        deadline
      );
      await this.pause(wakeAt - Date.now(), signal);
    }
  }

  /**
   * SIGTERM to the process group, SIGKILL after the grace period.
   * Resolves with the exit status; safe to call repeatedly.
   */
  async stop(): Promise<SessionExit> {
    if (!this.child) {
      this.recordExit({ code: null, signal: null });
      return this.exited;
    }
    if (this.exitInfo) {
      return this.exitInfo;
    }

    this.logger.debug({ pid: this.child.pid }, 'Stopping session process');
    this.signalGroup('SIGTERM');

    const forceKill = setTimeout(() => {
      this.logger.warn({ pid: this.pid }, 'Session process did not exit gracefully, force killing');
      this.signalGroup('SIGKILL');
    }, this.timing.stopGraceMs);

    try {
      return await this.exited;
    } finally {
      clearTimeout(forceKill);
    }
  }

  /**
   * Trimmed tail of captured stderr, falling back to stdout when stderr is empty.
   */
  stderrTail(maxBytes: number = SESSION_MANAGER.STDERR_TAIL_BYTES): string {
    const tail = this.stderr.tail(maxBytes);
    return tail.length > 0 ? tail : this.stdout.tail(maxBytes);
  }

  stdoutText(): string {
    return this.stdout.toString();
  }

  private capture(buffer: OutputRingBuffer, data: Buffer): void {
    buffer.append(data);
    if (!this.readyLineSeen && this.readyLine.test(buffer.tail(512))) {
      this.readyLineSeen = true;
      this.logger.debug('Session printed ready line');
    }
  }

  private recordExit(exit: SessionExit): void {
    if (this.exitInfo) return;
    this.exitInfo = exit;
    this.logger.debug({ pid: this.pid, ...exit }, 'Session process exited');
    this.resolveExited(exit);
  }

  private signalGroup(signal: NodeJS.Signals): void {
    const pid = this.child?.pid;
    if (pid === undefined || this.exitInfo) return;
    try {
      process.kill(-pid, signal);
    } catch (error) {
      this.logger.debug({ error, pid, signal }, 'Process group signal failed, signalling child');
      this.child?.kill(signal);
    }
  }

  private pause(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', done);
        resolve();
      };
      const timer = setTimeout(done, Math.max(0, ms));
      signal?.addEventListener('abort', done, { once: true });
      void this.exited.then(done);
    });
  }
}
