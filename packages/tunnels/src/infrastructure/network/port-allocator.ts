/**
 * @file port-allocator.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { PORT_RANGE } from '../../config/constants.js';
import { PortBusyError, PortExhaustedError } from '../../domain/errors/domain-errors.js';
import { canBind } from './tcp-probe.js';

const MAX_PORT = 65_535;

export interface PortAllocatorConfig {
  rangeStart?: number;
  rangeEnd?: number;
  maxAttempts?: number;
  host?: string;
  /** Source of randomness in [0, 1); defaults to Math.random */
  random?: () => number;
  /** Bind probe; defaults to an exclusive loopback bind */
  probe?: (host: string, port: number) => Promise<boolean>;
}

/**
 * Hands out local ports shared by every tunnel manager.
 *
 * A port is reserved synchronously before it is probed, so concurrent
 * allocations never return the same port even while probes are in flight.
 * Reservations hold until `release`; the OS stays the source of truth for
 * ports used by other programs.
 */
export class PortAllocator {
  readonly rangeStart: number;
  readonly rangeEnd: number;
  private readonly maxAttempts: number;
  private readonly host: string;
  private readonly random: () => number;
  private readonly probe: (host: string, port: number) => Promise<boolean>;
  private readonly reserved = new Set<number>();

  constructor(config: PortAllocatorConfig = {}) {
    this.rangeStart = config.rangeStart ?? PORT_RANGE.START;
    this.rangeEnd = config.rangeEnd ?? PORT_RANGE.END;
    this.maxAttempts = config.maxAttempts ?? PORT_RANGE.MAX_ATTEMPTS;
    this.host = config.host ?? PORT_RANGE.HOST;
    this.random = config.random ?? Math.random;
    this.probe = config.probe ?? canBind;

    if (this.rangeStart > this.rangeEnd) {
      throw new RangeError(`Invalid port range ${this.rangeStart}-${this.rangeEnd}`);
    }
  }

  /**
   * Returns the requested port if it is free, or any free port in range when
   * `requested` is 0 or omitted. Rejects with RangeError for anything that is
   * not a port number.
   */
  async allocate(requested?: number): Promise<number> {
    if (requested !== undefined && requested !== 0) {
      return this.allocateRequested(requested);
    }

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const candidate = this.pickCandidate();
      if (this.reserved.has(candidate)) {
        continue;
      }
      if (await this.reserveIfFree(candidate)) {
        return candidate;
      }
    }

    throw new PortExhaustedError(this.rangeStart, this.rangeEnd, this.maxAttempts);
  }

  release(port: number): void {
    this.reserved.delete(port);
  }

  isReserved(port: number): boolean {
    return this.reserved.has(port);
  }

  reservedPorts(): number[] {
    return [...this.reserved].sort((a, b) => a - b);
  }

  private async allocateRequested(port: number): Promise<number> {
    if (!Number.isInteger(port) || port < 1 || port > MAX_PORT) {
      throw new RangeError(`Invalid port ${port}`);
    }
    if (this.reserved.has(port) || !(await this.reserveIfFree(port))) {
      throw new PortBusyError(port);
    }
    return port;
  }

  /**
   * Reserves the port, then probes it. The reservation is dropped unless the
   * probe reports the port free.
   */
  private async reserveIfFree(port: number): Promise<boolean> {
    this.reserved.add(port);
    let free = false;
    try {
      free = await this.probe(this.host, port);
    } finally {
      if (!free) {
        this.reserved.delete(port);
      }
    }
    return free;
  }

  private pickCandidate(): number {
    const span = this.rangeEnd - this.rangeStart + 1;
    return this.rangeStart + Math.min(span - 1, Math.floor(this.random() * span));
  }
}
