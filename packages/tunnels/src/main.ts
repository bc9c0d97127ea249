/**
 * @file main.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { Command, InvalidArgumentError } from 'commander';
import { getEnv, resolveRegion, type Env } from './config/env.js';
import { createLogger, type Logger } from './infrastructure/logging/pino-logger.js';
import { createCredentialProvider } from './infrastructure/aws/credentials.js';
import { AwsCloudClient } from './infrastructure/aws/aws-cloud-client.js';
import { createTunnelServices, type TunnelServices } from './app.js';
import { isPrivateApi } from './domain/value-objects/api-target.js';
import { formatTopology, formatTunnelLine } from './cli/format.js';
import { installShutdownHandlers } from './cli/process-handlers.js';
import { getPackageVersion } from './utils/version.js';

/** How often status transitions are printed */
const WATCH_INTERVAL_MS = 500;

/** Grace on top of the tunnel shutdown deadline before forcing exit */
const FORCE_EXIT_GRACE_MS = 2_000;

interface GlobalOptions {
  profile?: string;
  region?: string;
}

interface EcsCommandOptions {
  container?: string;
  localPort?: number;
}

interface ApiCommandOptions {
  localPort?: number;
}

interface Runtime {
  env: Env;
  logger: Logger;
  cloud: AwsCloudClient;
  services: TunnelServices;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new InvalidArgumentError('Not a valid port number.');
  }
  return port;
}

/**
 * Loads configuration and wires the AWS facade and both tunnel managers.
 * Exits with 1 when no region can be determined.
 */
function bootstrap(options: GlobalOptions): Runtime {
  const env = getEnv();

  const logger = createLogger({
    name: 'skyport',
    level: env.LOG_LEVEL,
    pretty: env.LOG_PRETTY,
  });

  const region = resolveRegion(env, options.region);
  if (!region) {
    logger.fatal('No AWS region configured; pass --region or set AWS_REGION');
    process.exit(1);
  }
  const profile = options.profile ?? env.AWS_PROFILE;

  logger.info({ version: getPackageVersion(), profile: profile ?? 'default', region }, 'Starting skyport');

  const credentials = createCredentialProvider(profile);
  const cloud = new AwsCloudClient({ region, credentials, logger });
  const services = createTunnelServices({
    env,
    context: { region, ...(profile && { profile }) },
    credentials,
    cloud,
    logger,
  });

  return { env, logger, cloud, services };
}

/**
 * Prints status transitions until a signal arrives or no tunnel is live,
 * then stops everything. Exit code 0 when shutdown completed cleanly.
 */
function hold(runtime: Runtime): void {
  const { env, logger, cloud, services } = runtime;
  const lastStatus = new Map<string, string>();
  let shuttingDown = false;

  let ticker: NodeJS.Timeout | undefined;

  const shutdown = async (reason: string, exitCode?: number): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    if (ticker) clearInterval(ticker);
    logger.info({ reason }, 'Shutting down');

    const forceExitTimer = setTimeout(() => {
      logger.error('Shutdown timed out, forcing exit');
      process.exit(1);
    }, env.TUNNEL_SHUTDOWN_TIMEOUT_MS + FORCE_EXIT_GRACE_MS);

    try {
      const stopped = await services.stopAll();
      render();
      cloud.destroy();
      clearTimeout(forceExitTimer);
      process.exit(exitCode ?? (stopped ? 0 : 1));
    } catch (error) {
      clearTimeout(forceExitTimer);
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  const render = (): void => {
    let live = 0;
    let failed = false;
    for (const tunnel of services.view.snapshot()) {
      if (lastStatus.get(tunnel.id) !== tunnel.status) {
        lastStatus.set(tunnel.id, tunnel.status);
        process.stdout.write(`${formatTunnelLine(tunnel)}\n`);
      }
      if (tunnel.status === 'starting' || tunnel.status === 'active') live++;
      if (tunnel.status === 'error') failed = true;
    }
    if (live === 0 && !shuttingDown) {
      void shutdown('idle', failed ? 1 : 0);
    }
  };

  ticker = setInterval(render, WATCH_INTERVAL_MS);

  installShutdownHandlers(process, logger, shutdown);

  render();
}

/**
 * Reports an init failure and exits before any tunnel is running.
 */
function failInit(runtime: Runtime, error: unknown): never {
  runtime.logger.fatal({ error }, 'Failed to start tunnel');
  runtime.cloud.destroy();
  process.exit(1);
}

const program = new Command();

program
  .name('skyport')
  .description('Local tunnels to ECS containers and API Gateway stages, including private APIs via a jump host.')
  .version(getPackageVersion())
  .option('--profile <name>', 'AWS profile to use')
  .option('--region <name>', 'AWS region to use');

program
  .command('ecs')
  .description('Forward a local port to a container of a running ECS service task')
  .argument('<cluster>', 'cluster name or ARN')
  .argument('<service>', 'service name')
  .argument('<remotePort>', 'container port', parsePort)
  .option('--container <name>', 'container to forward to (defaults to the first one)')
  .option('--local-port <port>', 'local port (0 picks a free one)', parsePort)
  .action(async (cluster: string, service: string, remotePort: number, options: EcsCommandOptions) => {
    const runtime = bootstrap(program.opts<GlobalOptions>());
    try {
      const target = await runtime.cloud.resolveEcsTarget(cluster, service, options.container);
      await runtime.services.ecs.startTunnel({
        ...target,
        remotePort,
        localPort: options.localPort ?? 0,
      });
    } catch (error) {
      failInit(runtime, error);
    }
    hold(runtime);
  });

program
  .command('api')
  .description('Serve an API Gateway stage locally through a SigV4 signing proxy')
  .argument('<apiId>', 'REST or HTTP API id')
  .argument('<stage>', 'stage name ($default for HTTP APIs without a stage prefix)')
  .option('--local-port <port>', 'local port (0 picks a free one)', parsePort)
  .action(async (apiId: string, stage: string, options: ApiCommandOptions) => {
    const runtime = bootstrap(program.opts<GlobalOptions>());
    const localPort = options.localPort ?? 0;
    try {
      const api = await runtime.cloud.resolveApiTarget(apiId);
      if (isPrivateApi(api)) {
        await runtime.services.gateway.startPrivateTunnelWithDiscovery({ api, stage, localPort });
      } else {
        await runtime.services.gateway.startPublicTunnel({ api, stage, localPort });
      }
    } catch (error) {
      failInit(runtime, error);
    }
    hold(runtime);
  });

program
  .command('status')
  .description('Show the jump host and VPC endpoint private API tunnels would use')
  .action(async () => {
    const runtime = bootstrap(program.opts<GlobalOptions>());
    try {
      const resolution = await runtime.services.gateway.resolveTopology();
      process.stdout.write(`${formatTopology(resolution).join('\n')}\n`);
    } catch (error) {
      failInit(runtime, error);
    }
    runtime.cloud.destroy();
  });

program.parseAsync().catch((error: unknown) => {
  console.error('Failed to run:', error);
  process.exit(1);
});
