/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export * from './tunnel.js';
export * from './ecs-tunnel.js';
export * from './gateway-tunnel.js';

import type { EcsTunnelSnapshot } from './ecs-tunnel.js';
import type { GatewayTunnelSnapshot } from './gateway-tunnel.js';

export type TunnelSnapshot = EcsTunnelSnapshot | GatewayTunnelSnapshot;
