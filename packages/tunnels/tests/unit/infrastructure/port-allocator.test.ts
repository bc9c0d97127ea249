/**
 * @file port-allocator.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, vi } from 'vitest';
import { createServer, type Server } from 'node:net';
import { PortAllocator } from '../../../src/infrastructure/network/port-allocator.js';
import { PortBusyError, PortExhaustedError } from '../../../src/domain/errors/domain-errors.js';

function sequence(...values: number[]): () => number {
  let index = 0;
  return () => values[index++ % values.length] ?? 0;
}

function listen(port = 0): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer();
    server.once('error', reject);
    server.listen(port, '127.0.0.1', () => resolve(server));
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

function portOf(server: Server): number {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on TCP');
  }
  return address.port;
}

describe('PortAllocator', () => {
  it('should reject an inverted range', () => {
    expect(() => new PortAllocator({ rangeStart: 20000, rangeEnd: 10000 })).toThrow(
      'Invalid port range 20000-10000'
    );
  });

  it('should map random values onto the range', async () => {
    const allocator = new PortAllocator({
      rangeStart: 10000,
      rangeEnd: 10009,
      random: sequence(0.55),
      probe: () => Promise.resolve(true),
    });

    await expect(allocator.allocate()).resolves.toBe(10005);
    expect(allocator.isReserved(10005)).toBe(true);
  });

  it('should treat 0 as a request for any free port', async () => {
    const allocator = new PortAllocator({
      rangeStart: 10000,
      rangeEnd: 10009,
      random: sequence(0),
      probe: () => Promise.resolve(true),
    });

    await expect(allocator.allocate(0)).resolves.toBe(10000);
  });

  it('should skip ports that fail the bind probe', async () => {
    const probe = vi.fn((_host: string, port: number) => Promise.resolve(port !== 10000));
    const allocator = new PortAllocator({
      rangeStart: 10000,
      rangeEnd: 10009,
      random: sequence(0, 0.3),
      probe,
    });

    await expect(allocator.allocate()).resolves.toBe(10003);
    expect(probe).toHaveBeenCalledTimes(2);
    expect(allocator.isReserved(10000)).toBe(false);
  });

  it('should never hand out the same port to concurrent callers', async () => {
    const allocator = new PortAllocator({
      rangeStart: 10000,
      rangeEnd: 10001,
      random: sequence(0, 0, 0.9),
      probe: () => new Promise((resolve) => setTimeout(() => resolve(true), 10)),
    });

    const ports = await Promise.all([allocator.allocate(), allocator.allocate()]);
    expect(ports).toEqual([10000, 10001]);
    expect(allocator.reservedPorts()).toEqual([10000, 10001]);
  });

  it('should throw PortExhaustedError after the attempt budget', async () => {
    const probe = vi.fn(() => Promise.resolve(false));
    const allocator = new PortAllocator({
      rangeStart: 10000,
      rangeEnd: 10009,
      maxAttempts: 5,
      random: sequence(0.1),
      probe,
    });

    await expect(allocator.allocate()).rejects.toThrow(PortExhaustedError);
    await expect(allocator.allocate()).rejects.toThrow(
      'No free local port in 10000-10009 after 5 attempts'
    );
    expect(probe).toHaveBeenCalledTimes(10);
  });

  it('should count reserved candidates as attempts', async () => {
    const probe = vi.fn(() => Promise.resolve(true));
    const allocator = new PortAllocator({
      rangeStart: 10000,
      rangeEnd: 10000,
      maxAttempts: 3,
      probe,
    });

    await expect(allocator.allocate()).resolves.toBe(10000);
    await expect(allocator.allocate()).rejects.toThrow(PortExhaustedError);
    expect(probe).toHaveBeenCalledTimes(1);
  });

  it('should return a requested port when it is free', async () => {
    const allocator = new PortAllocator({ probe: () => Promise.resolve(true) });
    await expect(allocator.allocate(5432)).resolves.toBe(5432);
    expect(allocator.isReserved(5432)).toBe(true);
  });

  it('should fail a requested port that is already reserved', async () => {
    const allocator = new PortAllocator({ probe: () => Promise.resolve(true) });
    await allocator.allocate(5432);

    const error = await allocator.allocate(5432).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(PortBusyError);
    expect(error).toMatchObject({ port: 5432, message: 'Local port 5432 is already in use' });
  });

  it('should fail a requested port that another program holds', async () => {
    const server = await listen();
    const port = portOf(server);
    try {
      const allocator = new PortAllocator();
      await expect(allocator.allocate(port)).rejects.toThrow(PortBusyError);
      expect(allocator.isReserved(port)).toBe(false);
    } finally {
      await close(server);
    }
  });

  it.each([70000, -1, 80.5])('should reject %s without reserving it', async (port) => {
    const probe = vi.fn(() => Promise.resolve(true));
    const allocator = new PortAllocator({ probe });

    await expect(allocator.allocate(port)).rejects.toThrow(new RangeError(`Invalid port ${port}`));
    expect(allocator.reservedPorts()).toEqual([]);
    expect(probe).not.toHaveBeenCalled();
  });

  it('should drop the reservation when the probe itself fails', async () => {
    const allocator = new PortAllocator({
      rangeStart: 10000,
      rangeEnd: 10009,
      random: sequence(0),
      probe: () => Promise.reject(new Error('probe failed')),
    });

    await expect(allocator.allocate(5432)).rejects.toThrow('probe failed');
    await expect(allocator.allocate()).rejects.toThrow('probe failed');
    expect(allocator.reservedPorts()).toEqual([]);
  });

  it('should make a released port available again', async () => {
    const allocator = new PortAllocator({ probe: () => Promise.resolve(true) });
    await allocator.allocate(5432);
    allocator.release(5432);

    expect(allocator.isReserved(5432)).toBe(false);
    await expect(allocator.allocate(5432)).resolves.toBe(5432);
  });

  it('should allocate a bindable port from the real range', async () => {
    const allocator = new PortAllocator({ rangeStart: 20000, rangeEnd: 40000 });
    const port = await allocator.allocate();

    expect(port).toBeGreaterThanOrEqual(20000);
    expect(port).toBeLessThanOrEqual(40000);
    const server = await listen(port);
    await close(server);
  });
});
