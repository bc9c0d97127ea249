/**
 * @file topology-cloud-api.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { JumpHost, VpcEndpoint } from '../value-objects/topology.js';

/**
 * Port (interface) for the cloud lookups topology discovery needs.
 * Errors from the provider are surfaced verbatim.
 */
export interface TopologyCloudApi {
  /**
   * Available execute-api interface endpoints, indexed by VPC id.
   */
  listExecuteApiVpcEndpoints(signal?: AbortSignal): Promise<Map<string, VpcEndpoint>>;

  /**
   * Instances whose SSM agent is online.
   */
  listSsmManagedInstances(signal?: AbortSignal): Promise<JumpHost[]>;

  describeVpcEndpoint(endpointId: string, signal?: AbortSignal): Promise<VpcEndpoint>;
}
