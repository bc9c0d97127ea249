/**
 * @file mappers.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Instance, VpcEndpoint as Ec2VpcEndpoint } from '@aws-sdk/client-ec2';
import type { RestEndpointType } from '../../domain/value-objects/api-target.js';
import type { JumpHost, VpcEndpoint } from '../../domain/value-objects/topology.js';

const EXECUTE_API = 'execute-api';

/**
 * Available interface endpoint of the execute-api service.
 */
export function isExecuteApiEndpoint(endpoint: Ec2VpcEndpoint): boolean {
  return (
    (endpoint.ServiceName ?? '').includes(EXECUTE_API) &&
    (endpoint.State ?? '').toLowerCase() === 'available'
  );
}

export function toVpcEndpoint(endpoint: Ec2VpcEndpoint): VpcEndpoint {
  return {
    endpointId: endpoint.VpcEndpointId ?? '',
    serviceName: endpoint.ServiceName ?? '',
    vpcId: endpoint.VpcId ?? '',
    state: (endpoint.State ?? '').toLowerCase(),
    dnsEntries: (endpoint.DnsEntries ?? [])
      .map((entry) => entry.DnsName ?? '')
      .filter((name) => name.length > 0),
  };
}

export function toJumpHost(instance: Instance, ssmManaged: boolean): JumpHost {
  const tags: Record<string, string> = {};
  for (const tag of instance.Tags ?? []) {
    if (tag.Key !== undefined) {
      tags[tag.Key] = tag.Value ?? '';
    }
  }

  return {
    instanceId: instance.InstanceId ?? '',
    name: tags.Name ?? '',
    vpcId: instance.VpcId ?? '',
    privateIp: instance.PrivateIpAddress ?? '',
    ssmManaged,
    state: instance.State?.Name ?? 'unknown',
    tags,
  };
}

/**
 * REST APIs without an endpoint configuration are edge-optimized.
 */
export function toRestEndpointType(types: readonly string[] | undefined): RestEndpointType {
  const first = types?.[0]?.toUpperCase();
  if (first === 'PRIVATE' || first === 'REGIONAL') {
    return first;
  }
  return 'EDGE';
}

/**
 * Task id from a task ARN (`arn:aws:ecs:region:account:task/cluster/<id>`).
 */
export function taskIdFromArn(taskArn: string): string {
  const slash = taskArn.lastIndexOf('/');
  return slash === -1 ? taskArn : taskArn.slice(slash + 1);
}

/**
 * Splits `items` into consecutive batches of at most `size`.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}
