/**
 * @file domain-errors.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Base class for all domain errors.
 * Provides structured error information for callers and logs.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { code: string; message: string } {
    return {
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Error thrown when a requested local port is already taken.
 */
export class PortBusyError extends DomainError {
  readonly code = 'PORT_BUSY';
  readonly statusCode = 409;

  constructor(readonly port: number) {
    super(`Local port ${port} is already in use`);
  }
}

/**
 * Error thrown when no free port was found within the attempt budget.
 */
export class PortExhaustedError extends DomainError {
  readonly code = 'PORT_EXHAUSTED';
  readonly statusCode = 503;

  constructor(rangeStart: number, rangeEnd: number, attempts: number) {
    super(`No free local port in ${rangeStart}-${rangeEnd} after ${attempts} attempts`);
  }
}

/**
 * Error thrown when the session-manager executable cannot be started.
 */
export class ChildLaunchFailedError extends DomainError {
  readonly code = 'CHILD_LAUNCH_FAILED';
  readonly statusCode = 500;

  constructor(command: string, reason: string) {
    super(`Failed to launch ${command}: ${reason}`);
  }
}

/**
 * Error thrown when a session child exits before it became ready.
 */
export class ChildExitedEarlyError extends DomainError {
  readonly code = 'CHILD_EXITED_EARLY';
  readonly statusCode = 502;

  constructor(
    readonly exitCode: number | null,
    readonly stderrTail: string
  ) {
    super(
      stderrTail.length > 0
        ? stderrTail
        : `Session process exited before it was ready (exit code ${exitCode ?? 'none'})`
    );
  }
}

/**
 * Error thrown when a session did not become ready before the start timeout.
 */
export class ReadinessTimeoutError extends DomainError {
  readonly code = 'READINESS_TIMEOUT';
  readonly statusCode = 504;

  constructor(timeoutMs: number) {
    super(`Session was not ready within ${timeoutMs}ms`);
  }
}

/**
 * Error thrown when a tunnel start was cancelled by its caller.
 */
export class StartCancelledError extends DomainError {
  readonly code = 'START_CANCELLED';
  readonly statusCode = 499;

  constructor() {
    super('Tunnel start was cancelled');
  }
}

/**
 * Error raised by the signing proxy when the gateway cannot be reached.
 */
export class UpstreamError extends DomainError {
  readonly code = 'UPSTREAM_ERROR';
  readonly statusCode = 502;

  constructor(cause: string) {
    super(`Upstream error: ${cause}`);
  }
}

/**
 * Error raised by the signing proxy when a request cannot be signed.
 */
export class SigningError extends DomainError {
  readonly code = 'SIGNING_ERROR';
  readonly statusCode = 500;

  constructor(cause: string) {
    super(`Signing error: ${cause}`);
  }
}

/**
 * Error thrown when neither a discovered nor a configured VPC endpoint is available.
 */
export class NoUsableEndpointError extends DomainError {
  readonly code = 'NO_USABLE_ENDPOINT';
  readonly statusCode = 422;

  constructor(vpcId: string) {
    super(
      `No execute-api VPC endpoint in ${vpcId} and no VPC_ENDPOINT_ID configured for cross-account access`
    );
  }
}

/**
 * Error thrown when no jump host matched any lookup.
 */
export class NoJumpHostError extends DomainError {
  readonly code = 'NO_JUMP_HOST';
  readonly statusCode = 404;

  constructor(readonly tried: readonly string[]) {
    super(`No suitable jump host found. Tried: ${tried.join('; ')}`);
  }
}

/**
 * Error thrown when a tunnel with the specified ID is not found.
 */
export class TunnelNotFoundError extends DomainError {
  readonly code = 'TUNNEL_NOT_FOUND';
  readonly statusCode = 404;

  constructor(tunnelId: string) {
    super(`Tunnel not found: ${tunnelId}`);
  }
}

/**
 * Error thrown when a cloud resource a tunnel targets cannot be found.
 */
export class TargetNotFoundError extends DomainError {
  readonly code = 'TARGET_NOT_FOUND';
  readonly statusCode = 404;
}

/**
 * Error thrown when an operation is not allowed in the tunnel's current state.
 */
export class InvalidTunnelStateError extends DomainError {
  readonly code = 'INVALID_STATE';
  readonly statusCode = 409;
}

/**
 * Error thrown when configuration values are invalid.
 */
export class InvalidConfigError extends DomainError {
  readonly code = 'INVALID_CONFIG';
  readonly statusCode = 400;

  constructor(details: string) {
    super(`Invalid configuration: ${details}`);
  }
}

/**
 * Converts anything thrown into a one-line message for tunnel entries.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
