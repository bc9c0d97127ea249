/**
 * @file gateway-tunnel.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { Tunnel, type TunnelProps, type TunnelSnapshotBase } from './tunnel.js';
import {
  apiTypeLabel,
  endpointTypeOf,
  type ApiTarget,
  type RestEndpointType,
} from '../value-objects/api-target.js';
import type { JumpHost } from '../value-objects/topology.js';

export type GatewayTunnelKind = 'public' | 'private';

/**
 * Route of a private tunnel: the bastion session and the endpoint it forwards to.
 */
export interface PrivateRoute {
  jumpHost: JumpHost;
  vpcEndpointId: string;
  vpcEndpointDns: string;
  forwardPort: number;
  /** True when the endpoint came from configuration instead of the jump host's VPC */
  usesConfiguredEndpoint: boolean;
}

export interface GatewayTunnelProps extends TunnelProps {
  kind: GatewayTunnelKind;
  api: ApiTarget;
  stageName: string;
  upstreamHost: string;
  route?: PrivateRoute;
  warnings?: readonly string[];
}

export interface GatewayTunnelSnapshot extends TunnelSnapshotBase {
  readonly type: 'gateway';
  readonly kind: GatewayTunnelKind;
  readonly apiId: string;
  readonly apiName: string;
  readonly apiType: 'REST' | 'HTTP';
  readonly stageName: string;
  readonly endpointType: RestEndpointType;
  readonly upstreamHost: string;
  readonly invokeUrl: string;
  readonly jumpHostId?: string;
  readonly jumpHostVpcId?: string;
  readonly vpcEndpointId?: string;
  readonly vpcEndpointDns?: string;
  readonly forwardPort?: number;
  readonly usesConfiguredEndpoint?: boolean;
  readonly warnings: readonly string[];
}

/**
 * Entity representing a local signing proxy in front of an API Gateway stage.
 */
export class GatewayTunnel extends Tunnel<GatewayTunnelSnapshot> {
  private readonly _kind: GatewayTunnelKind;
  private readonly _api: ApiTarget;
  private readonly _stageName: string;
  private readonly _upstreamHost: string;
  private readonly _route: PrivateRoute | undefined;
  private readonly _warnings: readonly string[];

  constructor(props: GatewayTunnelProps) {
    super(props);
    if ((props.kind === 'private') !== (props.route !== undefined)) {
      throw new Error('A private gateway tunnel requires a route and a public one must not have one');
    }
    this._kind = props.kind;
    this._api = props.api;
    this._stageName = props.stageName;
    this._upstreamHost = props.upstreamHost;
    this._route = props.route;
    this._warnings = [...(props.warnings ?? [])];
  }

  get kind(): GatewayTunnelKind {
    return this._kind;
  }

  get api(): ApiTarget {
    return this._api;
  }

  get stageName(): string {
    return this._stageName;
  }

  get route(): PrivateRoute | undefined {
    return this._route;
  }

  get warnings(): readonly string[] {
    return this._warnings;
  }

  get invokeUrl(): string {
    return `http://127.0.0.1:${this.localPort}`;
  }

  toSnapshot(): GatewayTunnelSnapshot {
    const route = this._route;
    return Object.freeze({
      type: 'gateway' as const,
      ...this.baseSnapshot(),
      kind: this._kind,
      apiId: this._api.apiId,
      apiName: this._api.name,
      apiType: apiTypeLabel(this._api),
      stageName: this._stageName,
      endpointType: endpointTypeOf(this._api),
      upstreamHost: this._upstreamHost,
      invokeUrl: this.invokeUrl,
      ...(route && {
        jumpHostId: route.jumpHost.instanceId,
        jumpHostVpcId: route.jumpHost.vpcId,
        vpcEndpointId: route.vpcEndpointId,
        vpcEndpointDns: route.vpcEndpointDns,
        forwardPort: route.forwardPort,
        usesConfiguredEndpoint: route.usesConfiguredEndpoint,
      }),
      warnings: Object.freeze([...this._warnings]),
    });
  }
}
