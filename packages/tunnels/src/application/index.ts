/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export {
  EcsTunnelManager,
  type EcsTunnelManagerDeps,
  type StartEcsTunnelParams,
  type PreparedEcsRestart,
} from './ecs-tunnel-manager.js';
export {
  GatewayTunnelManager,
  type GatewayTunnelManagerDeps,
  type StartPublicTunnelParams,
  type StartPrivateTunnelParams,
  type StartDiscoveredTunnelParams,
  type PublicUpstreamResolver,
} from './gateway-tunnel-manager.js';
export {
  TopologyResolver,
  crossAccountWarning,
  parseTagSelector,
  type TopologyPreferences,
  type TopologyResolution,
  type TopologyResolverDeps,
} from './topology-resolver.js';
export { RegistryView, type RegistryViewDeps, type TunnelSource } from './registry-view.js';
export { byStartedAtDesc } from './snapshot-order.js';
