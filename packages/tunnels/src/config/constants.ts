/**
 * @file constants.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Local port allocation defaults.
 */
export const PORT_RANGE = {
  /** First port handed out when no port is requested */
  START: 10_000,

  /** Last port handed out when no port is requested (inclusive) */
  END: 60_000,

  /** Candidate ports tried before giving up with PortExhausted */
  MAX_ATTEMPTS: 100,

  /** Interface used both for bind probes and for tunnel listeners */
  HOST: '127.0.0.1',
} as const;

/**
 * Tunnel lifecycle timing constants (in milliseconds).
 */
export const TUNNEL_TIMING = {
  /** Minimum time a session child must stay alive before it can count as ready */
  SETTLE_MS: 2_000,

  /** Session start deadline; the child is killed once it elapses */
  START_TIMEOUT_MS: 15_000,

  /** Time between SIGTERM and SIGKILL when stopping a session */
  STOP_GRACE_MS: 5_000,

  /** Deadline for StopAll on shutdown */
  SHUTDOWN_TIMEOUT_MS: 10_000,

  /** Interval between readiness probes */
  PROBE_INTERVAL_MS: 200,

  /** Upper bound for a single TCP connect probe */
  PROBE_CONNECT_TIMEOUT_MS: 1_000,
} as const;

/**
 * Signing proxy defaults.
 */
export const PROXY_CONFIG = {
  /** Per-request upstream deadline */
  REQUEST_TIMEOUT_MS: 30_000,

  /** Idle keep-alive timeout of pooled upstream connections */
  POOL_IDLE_TIMEOUT_MS: 90_000,

  /** Upper bound of pooled upstream connections per tunnel */
  POOL_MAX_CONNECTIONS: 10,

  /** Largest request body accepted from local clients */
  BODY_LIMIT_BYTES: 10 * 1024 * 1024,

  /** SigV4 service name for API Gateway invocations */
  SIGNING_SERVICE: 'execute-api',

  /** Port API Gateway and its VPC endpoints listen on */
  UPSTREAM_PORT: 443,
} as const;

/**
 * Session Manager invocation constants.
 */
export const SESSION_MANAGER = {
  /** Document forwarding a port of the session target itself */
  PORT_FORWARD_DOCUMENT: 'AWS-StartPortForwardingSession',

  /** Document forwarding an arbitrary host:port reachable from the target */
  REMOTE_HOST_DOCUMENT: 'AWS-StartPortForwardingSessionToRemoteHost',

  /** Line printed by the session-manager plugin once the local port is open */
  READY_LINE: /Waiting for connections/,

  /** Capacity of each captured output stream */
  OUTPUT_BUFFER_BYTES: 64 * 1024,

  /** Bytes of captured stderr surfaced as a tunnel's last error */
  STDERR_TAIL_BYTES: 1_024,
} as const;

/**
 * Jump host discovery defaults, used when the environment provides none.
 */
export const TOPOLOGY_DEFAULTS = {
  JUMP_HOST_TAGS: ['skyport:jump-host=true', 'Name=bastion', 'Name=jump-host'],
  JUMP_HOST_NAMES: ['bastion', 'jump-host', 'jumphost'],
} as const;

/**
 * Headers that describe a single hop and are never forwarded upstream or back.
 */
export const HOP_BY_HOP_HEADERS: ReadonlySet<string> = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
]);
