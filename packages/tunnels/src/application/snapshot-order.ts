/**
 * @file snapshot-order.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { TunnelSnapshotBase } from '../domain/entities/tunnel.js';

/**
 * Newest first; ids break ties so the order is stable between frames.
 */
export function byStartedAtDesc(a: TunnelSnapshotBase, b: TunnelSnapshotBase): number {
  const delta = b.startedAt.getTime() - a.startedAt.getTime();
  if (delta !== 0) return delta;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
