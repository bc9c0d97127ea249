/**
 * @file output-ring-buffer.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Keeps the most recent `capacity` bytes written to it.
 */
export class OutputRingBuffer {
  private chunks: Buffer[] = [];
  private size = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }
  }

  get length(): number {
    return this.size;
  }

  append(chunk: Buffer | string): void {
    const data = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    if (data.length === 0) return;

    if (data.length >= this.capacity) {
      this.chunks = [Buffer.from(data.subarray(data.length - this.capacity))];
      this.size = this.capacity;
      return;
    }

    this.chunks.push(data);
    this.size += data.length;

    while (this.size > this.capacity) {
      const head = this.chunks[0];
      if (head === undefined) break;
      const excess = this.size - this.capacity;
      if (head.length <= excess) {
        this.chunks.shift();
        this.size -= head.length;
      } else {
        this.chunks[0] = head.subarray(excess);
        this.size -= excess;
      }
    }
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks, this.size);
  }

  toString(): string {
    return this.toBuffer().toString('utf8');
  }

  /**
   * Last `maxBytes` bytes as trimmed text.
   */
  tail(maxBytes: number): string {
    const buffer = this.toBuffer();
    return buffer.subarray(Math.max(0, buffer.length - maxBytes)).toString('utf8').trim();
  }

  clear(): void {
    this.chunks = [];
    this.size = 0;
  }
}
