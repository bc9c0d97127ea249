/**
 * @file domain-errors.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect } from 'vitest';
import {
  ChildExitedEarlyError,
  DomainError,
  NoJumpHostError,
  NoUsableEndpointError,
  PortBusyError,
  TargetNotFoundError,
  describeError,
} from '../../../src/domain/errors/domain-errors.js';

describe('domain errors', () => {
  it('should carry code, status and name', () => {
    const error = new PortBusyError(8080);

    expect(error).toBeInstanceOf(DomainError);
    expect(error.name).toBe('PortBusyError');
    expect(error.code).toBe('PORT_BUSY');
    expect(error.statusCode).toBe(409);
    expect(error.toJSON()).toEqual({ code: 'PORT_BUSY', message: 'Local port 8080 is already in use' });
  });

  it('should use the stderr tail as the early exit message', () => {
    expect(new ChildExitedEarlyError(255, 'TargetNotConnected').message).toBe('TargetNotConnected');
    expect(new ChildExitedEarlyError(1, '').message).toBe(
      'Session process exited before it was ready (exit code 1)'
    );
    expect(new ChildExitedEarlyError(null, '').message).toBe(
      'Session process exited before it was ready (exit code none)'
    );
  });

  it('should list every lookup that was tried', () => {
    const error = new NoJumpHostError(["configured tag 'role=bastion': no match", 'SSM instances: none found online']);
    expect(error.message).toBe(
      "No suitable jump host found. Tried: configured tag 'role=bastion': no match; SSM instances: none found online"
    );
  });

  it('should name the VPC without an endpoint', () => {
    expect(new NoUsableEndpointError('vpc-a').message).toBe(
      'No execute-api VPC endpoint in vpc-a and no VPC_ENDPOINT_ID configured for cross-account access'
    );
  });

  it('should take free-form messages where no template applies', () => {
    const error = new TargetNotFoundError('No running tasks');
    expect(error.code).toBe('TARGET_NOT_FOUND');
    expect(error.message).toBe('No running tasks');
  });

  it('should describe non-error values', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
  });
});
