/**
 * @file registry-view.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { EcsTunnelSnapshot } from '../domain/entities/ecs-tunnel.js';
import type { GatewayTunnelSnapshot } from '../domain/entities/gateway-tunnel.js';
import type { TunnelSnapshot } from '../domain/entities/index.js';
import { byStartedAtDesc } from './snapshot-order.js';

/**
 * Snapshot source of one manager.
 */
export interface TunnelSource<T extends TunnelSnapshot> {
  getTunnels(): T[];
}

export interface RegistryViewDeps {
  ecs: TunnelSource<EcsTunnelSnapshot>;
  gateway: TunnelSource<GatewayTunnelSnapshot>;
}

/**
 * Read-only combined view of both managers for renderers.
 * Each call returns a frozen value copy, newest first.
 */
export class RegistryView {
  private readonly ecs: TunnelSource<EcsTunnelSnapshot>;
  private readonly gateway: TunnelSource<GatewayTunnelSnapshot>;

  constructor(deps: RegistryViewDeps) {
    this.ecs = deps.ecs;
    this.gateway = deps.gateway;
  }

  snapshot(): readonly TunnelSnapshot[] {
    const combined: TunnelSnapshot[] = [...this.ecs.getTunnels(), ...this.gateway.getTunnels()];
    return Object.freeze(combined.sort(byStartedAtDesc));
  }

  find(id: string): TunnelSnapshot | undefined {
    return this.snapshot().find((tunnel) => tunnel.id === id);
  }

  activeCount(): number {
    return this.snapshot().filter((tunnel) => tunnel.status === 'active').length;
  }

  /**
   * Local ports held by live tunnels, including private forward ports.
   */
  livePorts(): number[] {
    const ports: number[] = [];
    for (const tunnel of this.snapshot()) {
      if (tunnel.status !== 'starting' && tunnel.status !== 'active') continue;
      ports.push(tunnel.localPort);
      if (tunnel.type === 'gateway' && tunnel.forwardPort !== undefined) {
        ports.push(tunnel.forwardPort);
      }
    }
    return ports;
  }
}
