/**
 * @file format.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { TunnelSnapshot } from '../domain/entities/index.js';
import type { TopologyResolution } from '../application/topology-resolver.js';

const STATUS_LABEL = {
  starting: 'STARTING',
  active: 'ACTIVE',
  error: 'ERROR',
  terminated: 'TERMINATED',
} as const;

/**
 * One status line per tunnel, e.g.
 * `ecs-abc  ACTIVE  127.0.0.1:10042 -> api/web:8080`.
 */
export function formatTunnelLine(tunnel: TunnelSnapshot): string {
  const status = STATUS_LABEL[tunnel.status];
  let line: string;

  if (tunnel.type === 'ecs') {
    line = `${tunnel.id}  ${status}  127.0.0.1:${tunnel.localPort} -> ${tunnel.serviceName}/${tunnel.containerName}:${tunnel.remotePort}`;
  } else {
    const route =
      tunnel.kind === 'private'
        ? ` via ${tunnel.jumpHostId ?? '?'} -> ${tunnel.vpcEndpointId ?? '?'}`
        : '';
    line = `${tunnel.id}  ${status}  ${tunnel.invokeUrl} -> ${tunnel.apiName} [${tunnel.stageName}]${route}`;
  }

  if (tunnel.lastError) {
    line += `  (${tunnel.lastError.split('\n').pop() ?? tunnel.lastError})`;
  }
  return line;
}

export function formatTopology(resolution: TopologyResolution): string[] {
  const host = resolution.jumpHost;
  const lines = [
    `Jump host:      ${host.instanceId}${host.name ? ` (${host.name})` : ''} in ${host.vpcId}`,
    `Endpoint VPCs:  ${resolution.preferredVpcs.length > 0 ? resolution.preferredVpcs.join(', ') : '(none)'}`,
  ];
  if (resolution.source === 'discovered') {
    lines.push(
      `VPC endpoint:   ${resolution.vpcEndpoint.endpointId} (${resolution.vpcEndpoint.dnsEntries[0] ?? 'no DNS'})`
    );
  } else {
    lines.push(`VPC endpoint:   ${resolution.configuredEndpointId} (configured)`);
  }
  for (const warning of resolution.warnings) {
    lines.push(`Warning:        ${warning}`);
  }
  return lines;
}
