/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export type { TunnelRegistry } from './tunnel-registry.js';
export type { TopologyCloudApi } from './topology-cloud-api.js';
