/**
 * @file tunnel-id.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

export type TunnelKindPrefix = 'ecs' | 'api';

/**
 * Value object representing a unique tunnel identifier.
 * Ids stay addressable for the whole process lifetime, including after termination.
 */
export class TunnelId {
  private readonly _value: string;

  private constructor(value: string) {
    this._value = value;
  }

  get value(): string {
    return this._value;
  }

  static create(value: string): TunnelId {
    if (!value || value.trim().length === 0) {
      throw new Error('TunnelId cannot be empty');
    }
    return new TunnelId(value.trim());
  }

  /**
   * Like `create`, but yields undefined for blank input.
   */
  static tryCreate(value: string): TunnelId | undefined {
    return value.trim().length === 0 ? undefined : new TunnelId(value.trim());
  }

  /**
   * Generates a new id such as `ecs-V1StGXR8_Z5j` from a random token.
   */
  static generate(prefix: TunnelKindPrefix, generator: () => string): TunnelId {
    return new TunnelId(`${prefix}-${generator()}`);
  }

  get prefix(): string {
    const dash = this._value.indexOf('-');
    return dash === -1 ? '' : this._value.slice(0, dash);
  }

  equals(other: TunnelId): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}
