/**
 * @file ecs-tunnel-manager.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import {
  EcsTunnel,
  type EcsRestartParams,
  type EcsTarget,
  type EcsTunnelSnapshot,
} from '../domain/entities/ecs-tunnel.js';
import { TunnelId } from '../domain/value-objects/tunnel-id.js';
import type { TunnelRegistry } from '../domain/ports/tunnel-registry.js';
import {
  InvalidTunnelStateError,
  StartCancelledError,
  TunnelNotFoundError,
  describeError,
} from '../domain/errors/domain-errors.js';
import { InMemoryTunnelRegistry } from '../infrastructure/persistence/in-memory-registry.js';
import type { PortAllocator } from '../infrastructure/network/port-allocator.js';
import type { SessionLauncher } from '../infrastructure/process/session-launcher.js';
import type { SessionProcess } from '../infrastructure/process/session-process.js';
import { TUNNEL_TIMING } from '../config/constants.js';
import { anySignal, createDeferred, settlesWithin, type Deferred } from '../utils/async.js';
import { byStartedAtDesc } from './snapshot-order.js';

export interface StartEcsTunnelParams extends EcsTarget {
  remotePort: number;
  /** 0 or omitted picks a free port */
  localPort?: number;
  /** Cancels the start, including the readiness wait */
  signal?: AbortSignal;
}

export interface PreparedEcsRestart {
  /** Entry as it was when removed */
  tunnel: EcsTunnelSnapshot;
  params: EcsRestartParams;
}

export interface EcsTunnelManagerDeps {
  portAllocator: PortAllocator;
  launcher: SessionLauncher;
  registry?: TunnelRegistry<EcsTunnel>;
  generateId?: () => string;
  logger: Logger;
}

/**
 * Per-tunnel supervisor bookkeeping.
 */
interface Supervision {
  readonly abort: AbortController;
  readonly finished: Deferred<void>;
  session: SessionProcess | null;
  stopRequested: boolean;
}

/**
 * Lifecycle of container port-forward tunnels.
 *
 * Registry mutations never span an await, so the event loop serializes them
 * the way a manager-wide mutex would.
 */
export class EcsTunnelManager {
  private readonly ports: PortAllocator;
  private readonly launcher: SessionLauncher;
  private readonly registry: TunnelRegistry<EcsTunnel>;
  private readonly generateId: () => string;
  private readonly logger: Logger;
  private readonly supervisors = new Map<string, Supervision>();

  constructor(deps: EcsTunnelManagerDeps) {
    this.ports = deps.portAllocator;
    this.launcher = deps.launcher;
    this.registry = deps.registry ?? new InMemoryTunnelRegistry<EcsTunnel>();
    this.generateId = deps.generateId ?? (() => nanoid(12));
    this.logger = deps.logger.child({ component: 'EcsTunnelManager' });
  }

  /**
   * Allocates the port, registers a `starting` entry and launches the session.
   * Readiness is observed in the background; poll `getTunnels` for the outcome.
   */
  async startTunnel(params: StartEcsTunnelParams): Promise<EcsTunnelSnapshot> {
    if (params.signal?.aborted) {
      throw new StartCancelledError();
    }

    const localPort = await this.ports.allocate(params.localPort);
    const tunnel = new EcsTunnel({
      id: TunnelId.generate('ecs', this.generateId),
      localPort,
      remotePort: params.remotePort,
      serviceName: params.serviceName,
      clusterArn: params.clusterArn,
      taskId: params.taskId,
      containerName: params.containerName,
      containerRuntimeId: params.containerRuntimeId,
    });
    const supervision: Supervision = {
      abort: new AbortController(),
      finished: createDeferred(),
      session: null,
      stopRequested: false,
    };
    this.registry.register(tunnel);
    this.supervisors.set(tunnel.id.value, supervision);

    const log = this.logger.child({ tunnelId: tunnel.id.value, localPort });
    log.info(
      { service: params.serviceName, task: params.taskId, remotePort: params.remotePort },
      'Starting ECS tunnel'
    );

    let session: SessionProcess;
    try {
      session = await this.launcher.launchEcs({
        clusterName: tunnel.clusterName,
        taskId: params.taskId,
        containerRuntimeId: params.containerRuntimeId,
        remotePort: params.remotePort,
        localPort,
      });
    } catch (error) {
      tunnel.markError(describeError(error));
      this.finish(tunnel, supervision);
      log.error({ error }, 'Failed to launch session');
      throw error;
    }

    supervision.session = session;
    tunnel.attachProcess(session.pid);

    if (supervision.stopRequested || params.signal?.aborted) {
      await session.stop();
      if (supervision.stopRequested) {
        tunnel.markTerminated();
      } else {
        tunnel.markError(new StartCancelledError().message);
      }
      this.finish(tunnel, supervision);
      log.info({ status: tunnel.status }, 'Tunnel start abandoned');
      if (!supervision.stopRequested) {
        throw new StartCancelledError();
      }
      return tunnel.toSnapshot();
    }

    void this.supervise(tunnel, session, supervision, anySignal(supervision.abort.signal, params.signal), log);
    return tunnel.toSnapshot();
  }

  /**
   * Requests termination and waits for the supervisor to observe the exit.
   * A no-op on tunnels that already finished.
   */
  async stopTunnel(id: string): Promise<EcsTunnelSnapshot> {
    const tunnel = this.requireTunnel(id);
    const supervision = this.supervisors.get(id);
    if (!tunnel.isLive || !supervision) {
      return tunnel.toSnapshot();
    }

    if (!supervision.stopRequested) {
      supervision.stopRequested = true;
      supervision.abort.abort();
      this.logger.info({ tunnelId: id, localPort: tunnel.localPort }, 'Stopping ECS tunnel');
    }

    if (supervision.session) {
      await supervision.session.stop();
    }
    await supervision.finished.promise;
    return tunnel.toSnapshot();
  }

  /**
   * Removes a finished entry and returns what is needed to start it again.
   */
  prepareRestart(id: string): PreparedEcsRestart {
    const tunnel = this.requireTunnel(id);
    if (tunnel.isLive) {
      throw new InvalidTunnelStateError(
        `Tunnel ${id} is ${tunnel.status}; stop it before restarting`
      );
    }

    this.registry.unregister(tunnel.id);
    this.supervisors.delete(id);
    this.logger.info({ tunnelId: id, localPort: tunnel.localPort }, 'Prepared ECS tunnel restart');
    return { tunnel: tunnel.toSnapshot(), params: tunnel.restartParams() };
  }

  /**
   * Drops terminated and failed entries. Returns how many were removed.
   */
  clearTerminated(): number {
    const removed = this.registry.removeWhere((tunnel) => !tunnel.isLive);
    for (const tunnel of removed) {
      this.supervisors.delete(tunnel.id.value);
    }
    if (removed.length > 0) {
      this.logger.info({ count: removed.length }, 'Cleared finished ECS tunnels');
    }
    return removed.length;
  }

  getTunnels(): EcsTunnelSnapshot[] {
    return this.registry
      .getAll()
      .map((tunnel) => tunnel.toSnapshot())
      .sort(byStartedAtDesc);
  }

  getTunnel(id: string): EcsTunnelSnapshot | undefined {
    return this.findTunnel(id)?.toSnapshot();
  }

  activeCount(): number {
    return this.registry.getAll().filter((tunnel) => tunnel.status === 'active').length;
  }

  /**
   * Stops every live tunnel concurrently. Resolves true when all supervisors
   * finished before the deadline.
   */
  async stopAll(timeoutMs: number = TUNNEL_TIMING.SHUTDOWN_TIMEOUT_MS): Promise<boolean> {
    const live = this.registry.getAll().filter((tunnel) => tunnel.isLive);
    if (live.length === 0) {
      return true;
    }

    this.logger.info({ count: live.length }, 'Stopping all ECS tunnels');
    const stops = live.map((tunnel) =>
      this.stopTunnel(tunnel.id.value).catch((error: unknown) => {
        this.logger.error({ error, tunnelId: tunnel.id.value }, 'Failed to stop tunnel');
      })
    );
    const completed = await settlesWithin(Promise.all(stops), timeoutMs);
    if (!completed) {
      this.logger.warn({ timeoutMs }, 'Timed out waiting for ECS tunnels to stop');
    }
    return completed;
  }

  private async supervise(
    tunnel: EcsTunnel,
    session: SessionProcess,
    supervision: Supervision,
    signal: AbortSignal,
    log: Logger
  ): Promise<void> {
    try {
      await session.waitUntilReady(signal);
      if (tunnel.markActive()) {
        log.info({ pid: session.pid }, 'ECS tunnel active');
      }
    } catch (error) {
      await session.stop();
      if (!supervision.stopRequested && tunnel.markError(describeError(error))) {
        log.error({ error }, 'ECS tunnel failed to start');
      }
    }

    const exit = await session.exited;
    const lastError = supervision.stopRequested ? undefined : session.stderrTail();
    if (tunnel.markTerminated(lastError)) {
      const level = supervision.stopRequested ? 'info' : 'warn';
      log[level]({ ...exit, lastError }, 'ECS tunnel terminated');
    }
    this.finish(tunnel, supervision);
  }

  /**
   * Releases the port and wakes everyone waiting on the supervisor.
   */
  private finish(tunnel: EcsTunnel, supervision: Supervision): void {
    this.ports.release(tunnel.localPort);
    supervision.finished.resolve();
  }

  private findTunnel(id: string): EcsTunnel | undefined {
    const tunnelId = TunnelId.tryCreate(id);
    return tunnelId && this.registry.get(tunnelId);
  }

  private requireTunnel(id: string): EcsTunnel {
    const tunnel = this.findTunnel(id);
    if (!tunnel) {
      throw new TunnelNotFoundError(id);
    }
    return tunnel;
  }
}
