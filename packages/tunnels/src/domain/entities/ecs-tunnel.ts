/**
 * @file ecs-tunnel.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { Tunnel, type TunnelProps, type TunnelSnapshotBase } from './tunnel.js';

/**
 * ECS task container a tunnel forwards to.
 */
export interface EcsTarget {
  serviceName: string;
  clusterArn: string;
  taskId: string;
  containerName: string;
  containerRuntimeId: string;
}

export interface EcsTunnelProps extends TunnelProps, EcsTarget {
  remotePort: number;
}

export interface EcsTunnelSnapshot extends TunnelSnapshotBase, Readonly<EcsTarget> {
  readonly type: 'ecs';
  readonly clusterName: string;
  readonly remotePort: number;
  readonly pid?: number;
}

/**
 * Parameters needed to start an equivalent tunnel again.
 */
export interface EcsRestartParams {
  readonly serviceName: string;
  readonly clusterArn: string;
  readonly localPort: number;
  readonly remotePort: number;
  readonly containerName: string;
}

/**
 * Extracts the cluster name from an ARN (`arn:aws:ecs:...:cluster/<name>`).
 * Plain names pass through.
 */
export function clusterNameFromArn(clusterArn: string): string {
  const slash = clusterArn.lastIndexOf('/');
  return slash === -1 ? clusterArn : clusterArn.slice(slash + 1);
}

/**
 * Entity representing a port forward to an ECS container.
 */
export class EcsTunnel extends Tunnel<EcsTunnelSnapshot> {
  private readonly _target: EcsTarget;
  private readonly _remotePort: number;
  private _pid: number | undefined;

  constructor(props: EcsTunnelProps) {
    super(props);
    this._target = {
      serviceName: props.serviceName,
      clusterArn: props.clusterArn,
      taskId: props.taskId,
      containerName: props.containerName,
      containerRuntimeId: props.containerRuntimeId,
    };
    this._remotePort = props.remotePort;
  }

  get target(): Readonly<EcsTarget> {
    return this._target;
  }

  get clusterName(): string {
    return clusterNameFromArn(this._target.clusterArn);
  }

  get remotePort(): number {
    return this._remotePort;
  }

  get pid(): number | undefined {
    return this._pid;
  }

  attachProcess(pid: number | undefined): void {
    this._pid = pid;
  }

  restartParams(): EcsRestartParams {
    return {
      serviceName: this._target.serviceName,
      clusterArn: this._target.clusterArn,
      localPort: this.localPort,
      remotePort: this._remotePort,
      containerName: this._target.containerName,
    };
  }

  toSnapshot(): EcsTunnelSnapshot {
    return Object.freeze({
      type: 'ecs' as const,
      ...this.baseSnapshot(),
      ...this._target,
      clusterName: this.clusterName,
      remotePort: this._remotePort,
      ...(this._pid !== undefined && { pid: this._pid }),
    });
  }
}
