/**
 * @file in-memory-registry.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Tunnel } from '../../domain/entities/tunnel.js';
import type { TunnelId } from '../../domain/value-objects/tunnel-id.js';
import type { TunnelRegistry } from '../../domain/ports/tunnel-registry.js';

/**
 * In-memory implementation of TunnelRegistry.
 * Stores tunnels in a Map indexed by tunnel ID.
 */
export class InMemoryTunnelRegistry<T extends Tunnel> implements TunnelRegistry<T> {
  private readonly tunnels = new Map<string, T>();

  register(tunnel: T): void {
    this.tunnels.set(tunnel.id.value, tunnel);
  }

  unregister(tunnelId: TunnelId): boolean {
    return this.tunnels.delete(tunnelId.value);
  }

  get(tunnelId: TunnelId): T | undefined {
    return this.tunnels.get(tunnelId.value);
  }

  getAll(): T[] {
    return Array.from(this.tunnels.values());
  }

  removeWhere(predicate: (tunnel: T) => boolean): T[] {
    const removed: T[] = [];
    for (const [key, tunnel] of this.tunnels) {
      if (predicate(tunnel)) {
        this.tunnels.delete(key);
        removed.push(tunnel);
      }
    }
    return removed;
  }
}
