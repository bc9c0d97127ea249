/**
 * @file session-launcher.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { AwsCredentialIdentityProvider } from '@smithy/types';
import { PROXY_CONFIG, SESSION_MANAGER } from '../../config/constants.js';
import { ChildLaunchFailedError, describeError } from '../../domain/errors/domain-errors.js';
import { SessionProcess, type SessionTiming } from './session-process.js';

/**
 * Profile and region every session and signature is made with.
 */
export interface AwsContext {
  profile?: string;
  region: string;
}

export interface EcsSessionParams {
  clusterName: string;
  taskId: string;
  containerRuntimeId: string;
  remotePort: number;
  localPort: number;
}

export interface RemoteHostSessionParams {
  instanceId: string;
  host: string;
  remotePort?: number;
  localPort: number;
}

/**
 * Session Manager target of an ECS container.
 */
export function ecsSessionTarget(clusterName: string, taskId: string, containerRuntimeId: string): string {
  return `ecs:${clusterName}_${taskId}_${containerRuntimeId}`;
}

function contextArgs(context: AwsContext): string[] {
  const args = ['--region', context.region];
  if (context.profile) {
    args.push('--profile', context.profile);
  }
  return args;
}

/**
 * `aws ssm start-session` arguments forwarding a container port.
 */
export function buildEcsSessionArgs(params: EcsSessionParams, context: AwsContext): string[] {
  return [
    'ssm',
    'start-session',
    '--target',
    ecsSessionTarget(params.clusterName, params.taskId, params.containerRuntimeId),
    '--document-name',
    SESSION_MANAGER.PORT_FORWARD_DOCUMENT,
    '--parameters',
    JSON.stringify({
      portNumber: [String(params.remotePort)],
      localPortNumber: [String(params.localPort)],
    }),
    ...contextArgs(context),
  ];
}

/**
 * `aws ssm start-session` arguments forwarding host:port reachable from an instance.
 */
export function buildRemoteHostSessionArgs(params: RemoteHostSessionParams, context: AwsContext): string[] {
  return [
    'ssm',
    'start-session',
    '--target',
    params.instanceId,
    '--document-name',
    SESSION_MANAGER.REMOTE_HOST_DOCUMENT,
    '--parameters',
    JSON.stringify({
      host: [params.host],
      portNumber: [String(params.remotePort ?? PROXY_CONFIG.UPSTREAM_PORT)],
      localPortNumber: [String(params.localPort)],
    }),
    ...contextArgs(context),
  ];
}

export interface SessionLauncherDeps {
  /** Executable, `aws` unless overridden */
  command: string;
  /** Arguments placed before the `ssm start-session` vector */
  commandPrefixArgs?: readonly string[];
  context: AwsContext;
  credentials?: AwsCredentialIdentityProvider;
  timing?: Partial<SessionTiming>;
  /** Base environment; defaults to process.env */
  baseEnv?: NodeJS.ProcessEnv;
  logger: Logger;
}

/**
 * Spawns session-manager children with the active profile, region and credentials.
 */
export class SessionLauncher {
  private readonly command: string;
  private readonly commandPrefixArgs: readonly string[];
  private readonly context: AwsContext;
  private readonly credentials: AwsCredentialIdentityProvider | undefined;
  private readonly timing: Partial<SessionTiming>;
  private readonly baseEnv: NodeJS.ProcessEnv;
  private readonly logger: Logger;

  constructor(deps: SessionLauncherDeps) {
    this.command = deps.command;
    this.commandPrefixArgs = deps.commandPrefixArgs ?? [];
    this.context = deps.context;
    this.credentials = deps.credentials;
    this.timing = deps.timing ?? {};
    this.baseEnv = deps.baseEnv ?? process.env;
    this.logger = deps.logger;
  }

  get awsContext(): AwsContext {
    return this.context;
  }

  async launchEcs(params: EcsSessionParams): Promise<SessionProcess> {
    return this.launch(buildEcsSessionArgs(params, this.context), params.localPort);
  }

  async launchRemoteHost(params: RemoteHostSessionParams): Promise<SessionProcess> {
    return this.launch(buildRemoteHostSessionArgs(params, this.context), params.localPort);
  }

  /**
   * Environment for the child: profile, region and the credential block.
   */
  async buildEnv(): Promise<NodeJS.ProcessEnv> {
    const env: NodeJS.ProcessEnv = {
      ...this.baseEnv,
      AWS_REGION: this.context.region,
      AWS_DEFAULT_REGION: this.context.region,
    };
    if (this.context.profile) {
      env.AWS_PROFILE = this.context.profile;
    }

    if (this.credentials) {
      const identity = await this.credentials().catch((error: unknown) => {
        throw new ChildLaunchFailedError(this.command, `credentials unavailable: ${describeError(error)}`);
      });
      env.AWS_ACCESS_KEY_ID = identity.accessKeyId;
      env.AWS_SECRET_ACCESS_KEY = identity.secretAccessKey;
      if (identity.sessionToken) {
        env.AWS_SESSION_TOKEN = identity.sessionToken;
      } else {
        delete env.AWS_SESSION_TOKEN;
      }
    }

    return env;
  }

  private async launch(args: string[], localPort: number): Promise<SessionProcess> {
    const env = await this.buildEnv();
    const session = new SessionProcess({
      command: this.command,
      args: [...this.commandPrefixArgs, ...args],
      env,
      localPort,
      timing: this.timing,
      logger: this.logger,
    });
    await session.start();
    return session;
  }
}
