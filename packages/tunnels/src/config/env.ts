/**
 * @file env.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { z } from 'zod';
import { config } from 'dotenv';
import { PORT_RANGE, PROXY_CONFIG, TOPOLOGY_DEFAULTS, TUNNEL_TIMING } from './constants.js';
import { InvalidConfigError, describeError } from '../domain/errors/domain-errors.js';

const port = z.coerce.number().int().min(1).max(65_535);
const millis = z.coerce.number().int().positive();

/**
 * Comma separated list; an unset variable yields the fallback,
 * an empty one yields an empty list.
 */
function csvList(fallback: readonly string[]) {
  return z
    .string()
    .optional()
    .transform((value) =>
      value === undefined
        ? [...fallback]
        : value
            .split(',')
            .map((item) => item.trim())
            .filter((item) => item.length > 0)
    );
}

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

/**
 * Schema for environment variables validation.
 */
const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z
      .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
      .default('info'),
    LOG_PRETTY: flag,

    // AWS context; --profile and --region take precedence
    AWS_PROFILE: z.string().min(1).optional(),
    AWS_REGION: z.string().min(1).optional(),
    AWS_DEFAULT_REGION: z.string().min(1).optional(),

    /**
     * Executable that understands `ssm start-session`.
     * The session-manager plugin must be on its PATH.
     */
    SESSION_MANAGER_COMMAND: z.string().min(1).default('aws'),

    // Tunnel tuning
    TUNNEL_PORT_RANGE_START: port.default(PORT_RANGE.START),
    TUNNEL_PORT_RANGE_END: port.default(PORT_RANGE.END),
    TUNNEL_PORT_ATTEMPTS: z.coerce.number().int().positive().default(PORT_RANGE.MAX_ATTEMPTS),
    TUNNEL_SETTLE_MS: z.coerce.number().int().nonnegative().default(TUNNEL_TIMING.SETTLE_MS),
    TUNNEL_START_TIMEOUT_MS: millis.default(TUNNEL_TIMING.START_TIMEOUT_MS),
    TUNNEL_STOP_GRACE_MS: millis.default(TUNNEL_TIMING.STOP_GRACE_MS),
    TUNNEL_SHUTDOWN_TIMEOUT_MS: millis.default(TUNNEL_TIMING.SHUTDOWN_TIMEOUT_MS),
    PROXY_REQUEST_TIMEOUT_MS: millis.default(PROXY_CONFIG.REQUEST_TIMEOUT_MS),

    // Private gateway topology
    /**
     * Jump host instance id (`i-...`) or Name tag value.
     */
    JUMP_HOST: z.string().min(1).optional(),

    /**
     * Jump host tag selector in `Key=Value` form.
     */
    JUMP_HOST_TAG: z
      .string()
      .regex(/^[^=]+=.*$/, 'must have the form Key=Value')
      .optional(),
    JUMP_HOST_TAGS: csvList(TOPOLOGY_DEFAULTS.JUMP_HOST_TAGS),
    JUMP_HOST_NAMES: csvList(TOPOLOGY_DEFAULTS.JUMP_HOST_NAMES),

    /**
     * VPC endpoint used when the jump host's VPC has none (cross-account APIs).
     */
    VPC_ENDPOINT_ID: z
      .string()
      .regex(/^vpce-[0-9a-z]+$/, 'must be a VPC endpoint id (vpce-...)')
      .optional(),
  })
  .superRefine((env, ctx) => {
    if (env.TUNNEL_PORT_RANGE_START > env.TUNNEL_PORT_RANGE_END) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TUNNEL_PORT_RANGE_START'],
        message: 'must not exceed TUNNEL_PORT_RANGE_END',
      });
    }
    if (env.TUNNEL_SETTLE_MS >= env.TUNNEL_START_TIMEOUT_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TUNNEL_SETTLE_MS'],
        message: 'must be shorter than TUNNEL_START_TIMEOUT_MS',
      });
    }
  });

export type Env = z.infer<typeof EnvSchema>;

/**
 * Validates an environment block without touching process state.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = EnvSchema.safeParse(source);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigError(details);
  }

  return result.data;
}

/**
 * Loads .env files and validates environment variables.
 * Exits the process if validation fails.
 */
export function loadEnv(): Env {
  config({ path: '.env.local' });
  config({ path: '.env' });

  try {
    return parseEnv(process.env);
  } catch (error) {
    console.error('❌ Invalid environment variables:');
    console.error(describeError(error));
    process.exit(1);
  }
}

/**
 * Picks the region: explicit flag, then AWS_REGION, then AWS_DEFAULT_REGION.
 */
export function resolveRegion(env: Env, override?: string): string | undefined {
  return override ?? env.AWS_REGION ?? env.AWS_DEFAULT_REGION;
}

// Singleton env instance
let envInstance: Env | null = null;

/**
 * Gets the environment configuration singleton.
 */
export function getEnv(): Env {
  envInstance ??= loadEnv();
  return envInstance;
}
