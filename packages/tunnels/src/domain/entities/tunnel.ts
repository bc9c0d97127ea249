/**
 * @file tunnel.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { TunnelId } from '../value-objects/tunnel-id.js';

export type TunnelStatus = 'starting' | 'active' | 'error' | 'terminated';

/**
 * Fields every tunnel snapshot carries.
 */
export interface TunnelSnapshotBase {
  readonly id: string;
  readonly status: TunnelStatus;
  readonly localPort: number;
  readonly startedAt: Date;
  readonly endedAt?: Date;
  readonly lastError?: string;
}

export interface TunnelProps {
  id: TunnelId;
  localPort: number;
  startedAt?: Date;
}

/**
 * Lifecycle shared by container and gateway tunnels.
 *
 * Transitions are guarded: `starting → active`, `starting|active → error`,
 * `starting|active → terminated`. Finished tunnels never change again,
 * so a late supervisor update cannot resurrect or relabel an entry.
 */
export abstract class Tunnel<TSnapshot extends TunnelSnapshotBase = TunnelSnapshotBase> {
  private readonly _id: TunnelId;
  private _localPort: number;
  private readonly _startedAt: Date;
  private _status: TunnelStatus = 'starting';
  private _endedAt: Date | undefined;
  private _lastError: string | undefined;

  protected constructor(props: TunnelProps) {
    this._id = props.id;
    this._localPort = props.localPort;
    this._startedAt = props.startedAt ?? new Date();
  }

  get id(): TunnelId {
    return this._id;
  }

  get localPort(): number {
    return this._localPort;
  }

  get status(): TunnelStatus {
    return this._status;
  }

  get startedAt(): Date {
    return this._startedAt;
  }

  get endedAt(): Date | undefined {
    return this._endedAt;
  }

  get lastError(): string | undefined {
    return this._lastError;
  }

  /**
   * Starting or active; the tunnel still owns a child process or listener.
   */
  get isLive(): boolean {
    return this._status === 'starting' || this._status === 'active';
  }

  /**
   * Moves a starting tunnel to another local port after a bind race.
   */
  relocate(localPort: number): void {
    if (this._status !== 'starting') {
      throw new Error(`Cannot relocate a ${this._status} tunnel`);
    }
    this._localPort = localPort;
  }

  markActive(): boolean {
    if (this._status !== 'starting') {
      return false;
    }
    this._status = 'active';
    return true;
  }

  markError(message: string): boolean {
    if (!this.isLive) {
      return false;
    }
    this._status = 'error';
    this._lastError = message;
    this._endedAt = new Date();
    return true;
  }

  markTerminated(lastError?: string): boolean {
    if (!this.isLive) {
      return false;
    }
    this._status = 'terminated';
    if (lastError !== undefined && lastError.length > 0) {
      this._lastError = lastError;
    }
    this._endedAt = new Date();
    return true;
  }

  /**
   * Returns an immutable value copy safe to hold across frames.
   */
  abstract toSnapshot(): TSnapshot;

  protected baseSnapshot(): TunnelSnapshotBase {
    return {
      id: this._id.value,
      status: this._status,
      localPort: this._localPort,
      startedAt: new Date(this._startedAt.getTime()),
      ...(this._endedAt && { endedAt: new Date(this._endedAt.getTime()) }),
      ...(this._lastError !== undefined && { lastError: this._lastError }),
    };
  }
}
