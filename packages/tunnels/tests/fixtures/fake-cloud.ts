/**
 * @file fake-cloud.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { TopologyCloudApi } from '../../src/domain/ports/topology-cloud-api.js';
import type { JumpHost, VpcEndpoint } from '../../src/domain/value-objects/topology.js';
import { TargetNotFoundError } from '../../src/domain/errors/domain-errors.js';

export function jumpHost(overrides: Partial<JumpHost> & Pick<JumpHost, 'instanceId'>): JumpHost {
  return {
    name: '',
    vpcId: 'vpc-a',
    privateIp: '10.0.0.5',
    ssmManaged: true,
    state: 'running',
    tags: {},
    ...overrides,
  };
}

export function vpcEndpoint(overrides: Partial<VpcEndpoint> & Pick<VpcEndpoint, 'endpointId' | 'vpcId'>): VpcEndpoint {
  return {
    serviceName: 'com.amazonaws.us-east-1.execute-api',
    state: 'available',
    dnsEntries: [`${overrides.endpointId}-abcd.execute-api.us-east-1.vpce.amazonaws.com`],
    ...overrides,
  };
}

/**
 * In-memory account: discovery lists come from the given endpoints and instances.
 * `describeVpcEndpoint` also sees endpoints outside the account (cross-account ones).
 */
export class FakeCloud implements TopologyCloudApi {
  readonly calls: string[] = [];

  constructor(
    private readonly endpoints: readonly VpcEndpoint[],
    private readonly instances: readonly JumpHost[],
    private readonly foreignEndpoints: readonly VpcEndpoint[] = []
  ) {}

  listExecuteApiVpcEndpoints(): Promise<Map<string, VpcEndpoint>> {
    this.calls.push('listExecuteApiVpcEndpoints');
    const index = new Map<string, VpcEndpoint>();
    for (const endpoint of this.endpoints) {
      if (!index.has(endpoint.vpcId)) index.set(endpoint.vpcId, endpoint);
    }
    return Promise.resolve(index);
  }

  listSsmManagedInstances(): Promise<JumpHost[]> {
    this.calls.push('listSsmManagedInstances');
    return Promise.resolve([...this.instances]);
  }

  describeVpcEndpoint(endpointId: string): Promise<VpcEndpoint> {
    this.calls.push(`describeVpcEndpoint:${endpointId}`);
    const found = [...this.endpoints, ...this.foreignEndpoints].find(
      (endpoint) => endpoint.endpointId === endpointId
    );
    if (!found) {
      return Promise.reject(new TargetNotFoundError(`VPC endpoint not found: ${endpointId}`));
    }
    return Promise.resolve(found);
  }
}
