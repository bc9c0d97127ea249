/**
 * @file gateway-tunnel-manager.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import type { AwsCredentialIdentityProvider } from '@smithy/types';
import {
  GatewayTunnel,
  type GatewayTunnelSnapshot,
  type PrivateRoute,
} from '../domain/entities/gateway-tunnel.js';
import { TunnelId } from '../domain/value-objects/tunnel-id.js';
import {
  isPrivateApi,
  stagePathPrefix,
  upstreamHost,
  type ApiTarget,
} from '../domain/value-objects/api-target.js';
import { primaryDnsName, type JumpHost, type VpcEndpoint } from '../domain/value-objects/topology.js';
import type { TunnelRegistry } from '../domain/ports/tunnel-registry.js';
import type { TopologyCloudApi } from '../domain/ports/topology-cloud-api.js';
import {
  InvalidTunnelStateError,
  NoUsableEndpointError,
  PortBusyError,
  StartCancelledError,
  TunnelNotFoundError,
  describeError,
} from '../domain/errors/domain-errors.js';
import { InMemoryTunnelRegistry } from '../infrastructure/persistence/in-memory-registry.js';
import type { PortAllocator } from '../infrastructure/network/port-allocator.js';
import type { SessionLauncher } from '../infrastructure/process/session-launcher.js';
import type { SessionProcess } from '../infrastructure/process/session-process.js';
import { SigningProxy, type UpstreamTarget } from '../infrastructure/proxy/signing-proxy.js';
import { PROXY_CONFIG, TUNNEL_TIMING } from '../config/constants.js';
import { anySignal, createDeferred, settlesWithin, type Deferred } from '../utils/async.js';
import { byStartedAtDesc } from './snapshot-order.js';
import {
  TopologyResolver,
  crossAccountWarning,
  type TopologyPreferences,
  type TopologyResolution,
} from './topology-resolver.js';

export interface StartPublicTunnelParams {
  api: ApiTarget;
  stage: string;
  localPort?: number;
}

export interface StartPrivateTunnelParams {
  api: ApiTarget;
  stage: string;
  jumpHost: JumpHost;
  /** Endpoint discovered for the jump host's VPC, if any */
  vpcEndpoint?: VpcEndpoint;
  /** Cross-account fallback; defaults to the configured VPC_ENDPOINT_ID */
  configuredEndpointId?: string;
  localPort?: number;
  signal?: AbortSignal;
  warnings?: readonly string[];
}

export interface StartDiscoveredTunnelParams {
  api: ApiTarget;
  stage: string;
  localPort?: number;
  signal?: AbortSignal;
}

/**
 * Where connections of public tunnels go; the default is the gateway host on 443.
 */
export type PublicUpstreamResolver = (host: string) => Omit<UpstreamTarget, 'host'>;

export interface GatewayTunnelManagerDeps {
  portAllocator: PortAllocator;
  launcher: SessionLauncher;
  credentials: AwsCredentialIdentityProvider;
  cloud: TopologyCloudApi;
  topology?: TopologyPreferences;
  registry?: TunnelRegistry<GatewayTunnel>;
  publicUpstream?: PublicUpstreamResolver;
  /** Extra CA certificates trusted for VPC endpoint TLS */
  upstreamCa?: string | string[];
  requestTimeoutMs?: number;
  generateId?: () => string;
  logger: Logger;
}

interface Supervision {
  readonly abort: AbortController;
  readonly finished: Deferred<void>;
  session: SessionProcess | null;
  proxy: SigningProxy | null;
  stopRequested: boolean;
}

interface ChosenEndpoint {
  endpointId: string;
  dns: string;
  usesConfiguredEndpoint: boolean;
}

function isAddressInUse(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EADDRINUSE';
}

function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

/**
 * Lifecycle of API Gateway tunnels: a signing proxy straight to the public
 * endpoint, or a signing proxy in front of a bastion session that forwards to
 * an execute-api VPC endpoint.
 */
export class GatewayTunnelManager {
  private readonly ports: PortAllocator;
  private readonly launcher: SessionLauncher;
  private readonly credentials: AwsCredentialIdentityProvider;
  private readonly cloud: TopologyCloudApi;
  private readonly resolver: TopologyResolver;
  private readonly registry: TunnelRegistry<GatewayTunnel>;
  private readonly publicUpstream: PublicUpstreamResolver;
  private readonly upstreamCa: string | string[] | undefined;
  private readonly requestTimeoutMs: number;
  private readonly generateId: () => string;
  private readonly configuredEndpointId: string | undefined;
  private readonly logger: Logger;
  private readonly supervisors = new Map<string, Supervision>();

  constructor(deps: GatewayTunnelManagerDeps) {
    this.ports = deps.portAllocator;
    this.launcher = deps.launcher;
    this.credentials = deps.credentials;
    this.cloud = deps.cloud;
    this.registry = deps.registry ?? new InMemoryTunnelRegistry<GatewayTunnel>();
    this.publicUpstream =
      deps.publicUpstream ?? ((host) => ({ origin: `https://${host}:${PROXY_CONFIG.UPSTREAM_PORT}` }));
    this.upstreamCa = deps.upstreamCa;
    this.requestTimeoutMs = deps.requestTimeoutMs ?? PROXY_CONFIG.REQUEST_TIMEOUT_MS;
    this.generateId = deps.generateId ?? (() => nanoid(12));
    this.configuredEndpointId = deps.topology?.vpcEndpointId;
    this.logger = deps.logger.child({ component: 'GatewayTunnelManager' });
    this.resolver = new TopologyResolver({
      cloud: deps.cloud,
      preferences: deps.topology ?? {},
      logger: deps.logger,
    });
  }

  private get region(): string {
    return this.launcher.awsContext.region;
  }

  /**
   * Opens a signing proxy to the API's public endpoint. The entry is active
   * as soon as the listener is bound.
   */
  async startPublicTunnel(params: StartPublicTunnelParams): Promise<GatewayTunnelSnapshot> {
    if (isPrivateApi(params.api)) {
      throw new InvalidTunnelStateError(
        `API ${params.api.apiId} is private; start a private tunnel through a jump host`
      );
    }

    const host = upstreamHost(params.api, this.region);
    const localPort = await this.ports.allocate(params.localPort);
    const tunnel = new GatewayTunnel({
      id: TunnelId.generate('api', this.generateId),
      kind: 'public',
      localPort,
      api: params.api,
      stageName: params.stage,
      upstreamHost: host,
    });
    const supervision = this.register(tunnel);
    const log = this.logger.child({ tunnelId: tunnel.id.value });
    log.info({ apiId: params.api.apiId, stage: params.stage, host, localPort }, 'Starting public gateway tunnel');

    try {
      supervision.proxy = await this.openProxy(tunnel, params.localPort, (port) =>
        new SigningProxy({
          port,
          upstream: { ...this.publicUpstream(host), host },
          pathPrefix: stagePathPrefix(params.api, params.stage),
          region: this.region,
          credentials: this.credentials,
          requestTimeoutMs: this.requestTimeoutMs,
          logger: this.logger,
        })
      );
    } catch (error) {
      tunnel.markError(describeError(error));
      this.finish(tunnel, supervision);
      log.error({ error }, 'Failed to open signing proxy');
      throw error;
    }

    tunnel.markActive();
    log.info({ localPort: tunnel.localPort, invokeUrl: tunnel.invokeUrl }, 'Public gateway tunnel active');
    void this.supervisePublic(tunnel, supervision, log);
    return tunnel.toSnapshot();
  }

  /**
   * Opens a bastion session to the VPC endpoint, then a signing proxy in front
   * of it. The endpoint is the discovered one when it lives in the jump host's
   * VPC, otherwise the configured one.
   */
  async startPrivateTunnel(params: StartPrivateTunnelParams): Promise<GatewayTunnelSnapshot> {
    if (params.signal?.aborted) {
      throw new StartCancelledError();
    }

    const host = upstreamHost(params.api, this.region);
    const endpoint = await this.chooseEndpoint(params);

    const forwardPort = await this.ports.allocate();
    let localPort: number;
    try {
      localPort = await this.ports.allocate(params.localPort);
    } catch (error) {
      this.ports.release(forwardPort);
      throw error;
    }

    const warnings = new Set(params.warnings ?? []);
    if (endpoint.usesConfiguredEndpoint) {
      warnings.add(crossAccountWarning(params.jumpHost, endpoint.endpointId));
    }

    const route: PrivateRoute = {
      jumpHost: params.jumpHost,
      vpcEndpointId: endpoint.endpointId,
      vpcEndpointDns: endpoint.dns,
      forwardPort,
      usesConfiguredEndpoint: endpoint.usesConfiguredEndpoint,
    };
    const tunnel = new GatewayTunnel({
      id: TunnelId.generate('api', this.generateId),
      kind: 'private',
      localPort,
      api: params.api,
      stageName: params.stage,
      upstreamHost: host,
      route,
      warnings: [...warnings],
    });
    const supervision = this.register(tunnel);
    const log = this.logger.child({ tunnelId: tunnel.id.value });
    log.info(
      {
        apiId: params.api.apiId,
        stage: params.stage,
        jumpHost: params.jumpHost.instanceId,
        vpcEndpoint: endpoint.endpointId,
        localPort,
        forwardPort,
      },
      'Starting private gateway tunnel'
    );

    let session: SessionProcess;
    try {
      session = await this.launcher.launchRemoteHost({
        instanceId: params.jumpHost.instanceId,
        host: endpoint.dns,
        localPort: forwardPort,
      });
    } catch (error) {
      tunnel.markError(describeError(error));
      this.finish(tunnel, supervision);
      log.error({ error }, 'Failed to launch bastion session');
      throw error;
    }
    supervision.session = session;

    void this.supervisePrivate(
      tunnel,
      session,
      supervision,
      params,
      anySignal(supervision.abort.signal, params.signal),
      log
    );
    return tunnel.toSnapshot();
  }

  /**
   * Resolves the topology first, then starts a private tunnel along it.
   * Resolver warnings are recorded on the entry.
   */
  async startPrivateTunnelWithDiscovery(
    params: StartDiscoveredTunnelParams
  ): Promise<GatewayTunnelSnapshot> {
    const resolution = await this.resolveTopology(params.signal);
    return this.startPrivateTunnel({
      api: params.api,
      stage: params.stage,
      jumpHost: resolution.jumpHost,
      ...(resolution.source === 'discovered'
        ? { vpcEndpoint: resolution.vpcEndpoint }
        : { configuredEndpointId: resolution.configuredEndpointId }),
      ...(params.localPort !== undefined && { localPort: params.localPort }),
      ...(params.signal && { signal: params.signal }),
      warnings: resolution.warnings,
    });
  }

  resolveTopology(signal?: AbortSignal): Promise<TopologyResolution> {
    return this.resolver.resolve(signal);
  }

  async stopTunnel(id: string): Promise<GatewayTunnelSnapshot> {
    const tunnel = this.requireTunnel(id);
    const supervision = this.supervisors.get(id);
    if (!tunnel.isLive || !supervision) {
      return tunnel.toSnapshot();
    }

    if (!supervision.stopRequested) {
      supervision.stopRequested = true;
      supervision.abort.abort();
      this.logger.info({ tunnelId: id, localPort: tunnel.localPort }, 'Stopping gateway tunnel');
    }

    if (supervision.session) {
      await supervision.session.stop();
    }
    await supervision.finished.promise;
    return tunnel.toSnapshot();
  }

  clearTerminated(): number {
    const removed = this.registry.removeWhere((tunnel) => !tunnel.isLive);
    for (const tunnel of removed) {
      this.supervisors.delete(tunnel.id.value);
    }
    if (removed.length > 0) {
      this.logger.info({ count: removed.length }, 'Cleared finished gateway tunnels');
    }
    return removed.length;
  }

  getTunnels(): GatewayTunnelSnapshot[] {
    return this.registry
      .getAll()
      .map((tunnel) => tunnel.toSnapshot())
      .sort(byStartedAtDesc);
  }

  getTunnel(id: string): GatewayTunnelSnapshot | undefined {
    return this.findTunnel(id)?.toSnapshot();
  }

  activeCount(): number {
    return this.registry.getAll().filter((tunnel) => tunnel.status === 'active').length;
  }

  async stopAll(timeoutMs: number = TUNNEL_TIMING.SHUTDOWN_TIMEOUT_MS): Promise<boolean> {
    const live = this.registry.getAll().filter((tunnel) => tunnel.isLive);
    if (live.length === 0) {
      return true;
    }

    this.logger.info({ count: live.length }, 'Stopping all gateway tunnels');
    const stops = live.map((tunnel) =>
      this.stopTunnel(tunnel.id.value).catch((error: unknown) => {
        this.logger.error({ error, tunnelId: tunnel.id.value }, 'Failed to stop tunnel');
      })
    );
    const completed = await settlesWithin(Promise.all(stops), timeoutMs);
    if (!completed) {
      this.logger.warn({ timeoutMs }, 'Timed out waiting for gateway tunnels to stop');
    }
    return completed;
  }

  private async chooseEndpoint(params: StartPrivateTunnelParams): Promise<ChosenEndpoint> {
    const discovered = params.vpcEndpoint;
    if (discovered && discovered.vpcId === params.jumpHost.vpcId) {
      const dns = primaryDnsName(discovered);
      if (dns) {
        return { endpointId: discovered.endpointId, dns, usesConfiguredEndpoint: false };
      }
    }

    const configured = params.configuredEndpointId ?? this.configuredEndpointId;
    if (!configured) {
      throw new NoUsableEndpointError(params.jumpHost.vpcId);
    }

    const described = await this.cloud.describeVpcEndpoint(configured, params.signal);
    const dns = primaryDnsName(described);
    if (!dns) {
      throw new NoUsableEndpointError(params.jumpHost.vpcId);
    }
    return { endpointId: configured, dns, usesConfiguredEndpoint: true };
  }

  /**
   * Binds the proxy; when the port was auto-allocated and lost to a bind
   * race, retries once on a fresh port.
   */
  private async openProxy(
    tunnel: GatewayTunnel,
    requested: number | undefined,
    build: (port: number) => SigningProxy
  ): Promise<SigningProxy> {
    const autoAllocated = requested === undefined || requested <= 0;

    for (let attempt = 0; ; attempt++) {
      const port = tunnel.localPort;
      const proxy = build(port);
      try {
        await proxy.start();
        return proxy;
      } catch (error) {
        await proxy.stop();
        if (!isAddressInUse(error)) {
          throw error;
        }
        if (!autoAllocated || attempt > 0) {
          throw new PortBusyError(port);
        }
        this.logger.warn({ tunnelId: tunnel.id.value, port }, 'Local port taken before bind, retrying');
        const replacement = await this.ports.allocate();
        this.ports.release(port);
        tunnel.relocate(replacement);
      }
    }
  }

  private async supervisePublic(tunnel: GatewayTunnel, supervision: Supervision, log: Logger): Promise<void> {
    await waitForAbort(supervision.abort.signal);
    await supervision.proxy?.stop();
    if (tunnel.markTerminated()) {
      log.info('Public gateway tunnel terminated');
    }
    this.finish(tunnel, supervision);
  }

  private async supervisePrivate(
    tunnel: GatewayTunnel,
    session: SessionProcess,
    supervision: Supervision,
    params: StartPrivateTunnelParams,
    signal: AbortSignal,
    log: Logger
  ): Promise<void> {
    const route = tunnel.route;
    try {
      if (!route) {
        throw new Error('Private tunnel without a route');
      }
      await session.waitUntilReady(signal);
      supervision.proxy = await this.openProxy(tunnel, params.localPort, (port) =>
        new SigningProxy({
          port,
          upstream: {
            origin: `https://127.0.0.1:${route.forwardPort}`,
            host: upstreamHost(params.api, this.region),
            servername: route.vpcEndpointDns,
            ...(this.upstreamCa !== undefined && { ca: this.upstreamCa }),
          },
          pathPrefix: stagePathPrefix(params.api, params.stage),
          region: this.region,
          credentials: this.credentials,
          apiId: params.api.apiId,
          requestTimeoutMs: this.requestTimeoutMs,
          logger: this.logger,
        })
      );
      if (supervision.stopRequested) {
        await session.stop();
      } else if (tunnel.markActive()) {
        log.info(
          { localPort: tunnel.localPort, forwardPort: route.forwardPort, pid: session.pid },
          'Private gateway tunnel active'
        );
      }
    } catch (error) {
      await session.stop();
      if (!supervision.stopRequested && tunnel.markError(describeError(error))) {
        log.error({ error }, 'Private gateway tunnel failed to start');
      }
    }

    const exit = await session.exited;
    await supervision.proxy?.stop();
    const lastError = supervision.stopRequested ? undefined : session.stderrTail();
    if (tunnel.markTerminated(lastError)) {
      const level = supervision.stopRequested ? 'info' : 'warn';
      log[level]({ ...exit, lastError }, 'Private gateway tunnel terminated');
    }
    this.finish(tunnel, supervision);
  }

  private register(tunnel: GatewayTunnel): Supervision {
    const supervision: Supervision = {
      abort: new AbortController(),
      finished: createDeferred(),
      session: null,
      proxy: null,
      stopRequested: false,
    };
    this.registry.register(tunnel);
    this.supervisors.set(tunnel.id.value, supervision);
    return supervision;
  }

  /**
   * Releases every port the tunnel holds and wakes waiting stoppers.
   */
  private finish(tunnel: GatewayTunnel, supervision: Supervision): void {
    this.ports.release(tunnel.localPort);
    if (tunnel.route) {
      this.ports.release(tunnel.route.forwardPort);
    }
    supervision.finished.resolve();
  }

  private findTunnel(id: string): GatewayTunnel | undefined {
    const tunnelId = TunnelId.tryCreate(id);
    return tunnelId && this.registry.get(tunnelId);
  }

  private requireTunnel(id: string): GatewayTunnel {
    const tunnel = this.findTunnel(id);
    if (!tunnel) {
      throw new TunnelNotFoundError(id);
    }
    return tunnel;
  }
}
