/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export { TunnelId, type TunnelKindPrefix } from './tunnel-id.js';
export * from './api-target.js';
export * from './topology.js';
