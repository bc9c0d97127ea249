/**
 * @file session-launcher.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect } from 'vitest';
import {
  SessionLauncher,
  buildEcsSessionArgs,
  buildRemoteHostSessionArgs,
  ecsSessionTarget,
} from '../../../src/infrastructure/process/session-launcher.js';
import { staticCredentials } from '../../../src/infrastructure/aws/credentials.js';
import { ChildLaunchFailedError } from '../../../src/domain/errors/domain-errors.js';
import { createSilentLogger } from '../../../src/infrastructure/logging/pino-logger.js';

const logger = createSilentLogger();

describe('session arguments', () => {
  it('should build the ECS session target', () => {
    expect(ecsSessionTarget('main', 'task-1', 'runtime-1')).toBe('ecs:main_task-1_runtime-1');
  });

  it('should build a container port forward', () => {
    const args = buildEcsSessionArgs(
      { clusterName: 'main', taskId: 'task-1', containerRuntimeId: 'runtime-1', remotePort: 5432, localPort: 15432 },
      { region: 'us-east-1', profile: 'dev' }
    );

    expect(args).toEqual([
      'ssm',
      'start-session',
      '--target',
      'ecs:main_task-1_runtime-1',
      '--document-name',
      'AWS-StartPortForwardingSession',
      '--parameters',
      '{"portNumber":["5432"],"localPortNumber":["15432"]}',
      '--region',
      'us-east-1',
      '--profile',
      'dev',
    ]);
  });

  it('should forward to a remote host on port 443 without a profile', () => {
    const args = buildRemoteHostSessionArgs(
      { instanceId: 'i-0123', host: 'vpce-1.execute-api.us-east-1.vpce.amazonaws.com', localPort: 18081 },
      { region: 'us-east-1' }
    );

    expect(args).toEqual([
      'ssm',
      'start-session',
      '--target',
      'i-0123',
      '--document-name',
      'AWS-StartPortForwardingSessionToRemoteHost',
      '--parameters',
      '{"host":["vpce-1.execute-api.us-east-1.vpce.amazonaws.com"],"portNumber":["443"],"localPortNumber":["18081"]}',
      '--region',
      'us-east-1',
    ]);
  });
});

describe('SessionLauncher', () => {
  describe('buildEnv', () => {
    it('should set region, profile and credentials', async () => {
      const launcher = new SessionLauncher({
        command: 'aws',
        context: { region: 'eu-west-1', profile: 'dev' },
        credentials: staticCredentials({
          accessKeyId: 'test-access-key',
          secretAccessKey: 'test-secret',
          sessionToken: 'test-token',
        }),
        baseEnv: { PATH: '/usr/bin' },
        logger,
      });

      await expect(launcher.buildEnv()).resolves.toEqual({
        PATH: '/usr/bin',
        AWS_REGION: 'eu-west-1',
        AWS_DEFAULT_REGION: 'eu-west-1',
        AWS_PROFILE: 'dev',
        AWS_ACCESS_KEY_ID: 'test-access-key',
        AWS_SECRET_ACCESS_KEY: 'test-secret',
        AWS_SESSION_TOKEN: 'test-token',
      });
    });

    it('should drop an inherited session token when the credentials have none', async () => {
      const launcher = new SessionLauncher({
        command: 'aws',
        context: { region: 'eu-west-1' },
        credentials: staticCredentials({ accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' }),
        baseEnv: { AWS_SESSION_TOKEN: 'stale-token' },
        logger,
      });

      const env = await launcher.buildEnv();
      expect(env.AWS_SESSION_TOKEN).toBeUndefined();
      expect(env.AWS_PROFILE).toBeUndefined();
    });

    it('should fail the launch when credentials cannot be resolved', async () => {
      const launcher = new SessionLauncher({
        command: 'aws',
        context: { region: 'eu-west-1' },
        credentials: () => Promise.reject(new Error('token expired')),
        baseEnv: {},
        logger,
      });

      const error = await launcher.buildEnv().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ChildLaunchFailedError);
      expect(error).toHaveProperty('message', 'Failed to launch aws: credentials unavailable: token expired');
    });
  });

  it('should reject when the executable does not exist', async () => {
    const launcher = new SessionLauncher({
      command: '/nonexistent/session-manager',
      context: { region: 'us-east-1' },
      baseEnv: {},
      logger,
    });

    await expect(
      launcher.launchEcs({
        clusterName: 'main',
        taskId: 'task-1',
        containerRuntimeId: 'runtime-1',
        remotePort: 80,
        localPort: 18000,
      })
    ).rejects.toThrow(ChildLaunchFailedError);
  });
});
