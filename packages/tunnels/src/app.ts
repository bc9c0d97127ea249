/**
 * @file app.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { AwsCredentialIdentityProvider } from '@smithy/types';
import type { Logger } from 'pino';
import type { Env } from './config/env.js';
import type { TopologyCloudApi } from './domain/ports/topology-cloud-api.js';
import { PortAllocator } from './infrastructure/network/port-allocator.js';
import { SessionLauncher, type AwsContext } from './infrastructure/process/session-launcher.js';
import { EcsTunnelManager } from './application/ecs-tunnel-manager.js';
import { GatewayTunnelManager } from './application/gateway-tunnel-manager.js';
import { RegistryView } from './application/registry-view.js';

export interface TunnelServicesConfig {
  env: Env;
  context: AwsContext;
  credentials: AwsCredentialIdentityProvider;
  cloud: TopologyCloudApi;
  logger: Logger;
  /** Arguments placed before `ssm start-session`, e.g. a wrapper script */
  commandPrefixArgs?: readonly string[];
}

export interface TunnelServices {
  ecs: EcsTunnelManager;
  gateway: GatewayTunnelManager;
  view: RegistryView;
  ports: PortAllocator;
  /**
   * Stops every tunnel of both managers. Resolves true when all of them
   * finished before the shutdown deadline.
   */
  stopAll(): Promise<boolean>;
}

/**
 * Wires both tunnel managers around one port allocator and session launcher.
 */
export function createTunnelServices(config: TunnelServicesConfig): TunnelServices {
  const { env, logger } = config;

  const ports = new PortAllocator({
    rangeStart: env.TUNNEL_PORT_RANGE_START,
    rangeEnd: env.TUNNEL_PORT_RANGE_END,
    maxAttempts: env.TUNNEL_PORT_ATTEMPTS,
  });

  const launcher = new SessionLauncher({
    command: env.SESSION_MANAGER_COMMAND,
    ...(config.commandPrefixArgs && { commandPrefixArgs: config.commandPrefixArgs }),
    context: config.context,
    credentials: config.credentials,
    timing: {
      settleMs: env.TUNNEL_SETTLE_MS,
      startTimeoutMs: env.TUNNEL_START_TIMEOUT_MS,
      stopGraceMs: env.TUNNEL_STOP_GRACE_MS,
    },
    logger,
  });

  const ecs = new EcsTunnelManager({ portAllocator: ports, launcher, logger });

  const gateway = new GatewayTunnelManager({
    portAllocator: ports,
    launcher,
    credentials: config.credentials,
    cloud: config.cloud,
    topology: {
      ...(env.JUMP_HOST && { jumpHost: env.JUMP_HOST }),
      ...(env.JUMP_HOST_TAG && { jumpHostTag: env.JUMP_HOST_TAG }),
      defaultTags: env.JUMP_HOST_TAGS,
      defaultNames: env.JUMP_HOST_NAMES,
      ...(env.VPC_ENDPOINT_ID && { vpcEndpointId: env.VPC_ENDPOINT_ID }),
    },
    requestTimeoutMs: env.PROXY_REQUEST_TIMEOUT_MS,
    logger,
  });

  const view = new RegistryView({ ecs, gateway });

  return {
    ecs,
    gateway,
    view,
    ports,
    async stopAll() {
      const [ecsDone, gatewayDone] = await Promise.all([
        ecs.stopAll(env.TUNNEL_SHUTDOWN_TIMEOUT_MS),
        gateway.stopAll(env.TUNNEL_SHUTDOWN_TIMEOUT_MS),
      ]);
      return ecsDone && gatewayDone;
    },
  };
}
