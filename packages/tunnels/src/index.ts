/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export * from './domain/index.js';
export * from './application/index.js';
export { createTunnelServices, type TunnelServices, type TunnelServicesConfig } from './app.js';
export { parseEnv, resolveRegion, type Env } from './config/env.js';
export { PortAllocator, type PortAllocatorConfig } from './infrastructure/network/port-allocator.js';
export {
  SessionLauncher,
  buildEcsSessionArgs,
  buildRemoteHostSessionArgs,
  ecsSessionTarget,
  type AwsContext,
  type SessionLauncherDeps,
} from './infrastructure/process/session-launcher.js';
export {
  SessionProcess,
  DEFAULT_SESSION_TIMING,
  type SessionExit,
  type SessionState,
  type SessionTiming,
} from './infrastructure/process/session-process.js';
export {
  SigningProxy,
  type SigningProxyConfig,
  type UpstreamTarget,
} from './infrastructure/proxy/signing-proxy.js';
export { AwsCloudClient, type AwsCloudClientDeps } from './infrastructure/aws/aws-cloud-client.js';
export { createCredentialProvider, staticCredentials } from './infrastructure/aws/credentials.js';
export { InMemoryTunnelRegistry } from './infrastructure/persistence/in-memory-registry.js';
export { createLogger, createSilentLogger, type Logger, type LoggerConfig } from './infrastructure/logging/pino-logger.js';
