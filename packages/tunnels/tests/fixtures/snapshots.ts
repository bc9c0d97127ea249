/**
 * @file snapshots.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { EcsTunnel } from '../../src/domain/entities/ecs-tunnel.js';
import { GatewayTunnel } from '../../src/domain/entities/gateway-tunnel.js';
import { TunnelId } from '../../src/domain/value-objects/tunnel-id.js';
import type { RestApiTarget } from '../../src/domain/value-objects/api-target.js';
import { jumpHost } from './fake-cloud.js';

export const ordersApi: RestApiTarget = {
  kind: 'rest',
  apiId: 'abc123',
  name: 'orders',
  endpointType: 'PRIVATE',
};

export function ecsTunnel(id: string, localPort: number, startedAt: Date): EcsTunnel {
  return new EcsTunnel({
    id: TunnelId.create(id),
    localPort,
    startedAt,
    serviceName: 'api',
    clusterArn: 'arn:aws:ecs:us-east-1:111111111111:cluster/main',
    taskId: 'task-1',
    containerName: 'web',
    containerRuntimeId: 'runtime-1',
    remotePort: 8080,
  });
}

export function publicGatewayTunnel(id: string, localPort: number, startedAt: Date): GatewayTunnel {
  return new GatewayTunnel({
    id: TunnelId.create(id),
    localPort,
    startedAt,
    kind: 'public',
    api: { ...ordersApi, endpointType: 'REGIONAL' },
    stageName: 'prod',
    upstreamHost: 'abc123.execute-api.us-east-1.amazonaws.com',
  });
}

export function privateGatewayTunnel(
  id: string,
  localPort: number,
  forwardPort: number,
  startedAt: Date
): GatewayTunnel {
  return new GatewayTunnel({
    id: TunnelId.create(id),
    localPort,
    startedAt,
    kind: 'private',
    api: ordersApi,
    stageName: 'prod',
    upstreamHost: 'abc123.execute-api.us-east-1.amazonaws.com',
    route: {
      jumpHost: jumpHost({ instanceId: 'i-0aaa', vpcId: 'vpc-A' }),
      vpcEndpointId: 'vpce-0aaa',
      vpcEndpointDns: 'vpce-0aaa-abcd.execute-api.us-east-1.vpce.amazonaws.com',
      forwardPort,
      usesConfiguredEndpoint: false,
    },
  });
}
