/**
 * @file tunnel-registry.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import type { Tunnel } from '../entities/tunnel.js';
import type { TunnelId } from '../value-objects/tunnel-id.js';

/**
 * Port (interface) for a manager's tunnel registry.
 * Only the owning manager mutates it.
 */
export interface TunnelRegistry<T extends Tunnel> {
  /**
   * Adds a tunnel entry.
   */
  register(tunnel: T): void;

  /**
   * Removes a tunnel entry.
   */
  unregister(tunnelId: TunnelId): boolean;

  /**
   * Retrieves a tunnel by id.
   */
  get(tunnelId: TunnelId): T | undefined;

  /**
   * Returns all tunnels in insertion order.
   */
  getAll(): T[];

  /**
   * Removes and returns every tunnel matching the predicate.
   */
  removeWhere(predicate: (tunnel: T) => boolean): T[];
}
