/**
 * @file topology-resolver.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { TopologyCloudApi } from '../domain/ports/topology-cloud-api.js';
import {
  UNUSABLE_INSTANCE_STATES,
  type JumpHost,
  type VpcEndpoint,
} from '../domain/value-objects/topology.js';
import { NoJumpHostError, NoUsableEndpointError } from '../domain/errors/domain-errors.js';
import { TOPOLOGY_DEFAULTS } from '../config/constants.js';

/**
 * Jump host and endpoint preferences, normally from the environment.
 */
export interface TopologyPreferences {
  /** Instance id (`i-...`) or Name tag value */
  jumpHost?: string;
  /** `Key=Value` tag selector */
  jumpHostTag?: string;
  defaultTags?: readonly string[];
  defaultNames?: readonly string[];
  /** Cross-account endpoint used when the jump host's VPC has none */
  vpcEndpointId?: string;
}

/**
 * Route chosen for a private gateway tunnel. Exactly one of `vpcEndpoint`
 * (discovered in the jump host's VPC) or `configuredEndpointId` is set.
 */
export type TopologyResolution =
  | {
      source: 'discovered';
      jumpHost: JumpHost;
      vpcEndpoint: VpcEndpoint;
      preferredVpcs: string[];
      warnings: string[];
    }
  | {
      source: 'configured';
      jumpHost: JumpHost;
      configuredEndpointId: string;
      preferredVpcs: string[];
      warnings: string[];
    };

/**
 * Message surfaced when a tunnel falls back to the configured endpoint.
 */
export function crossAccountWarning(jumpHost: JumpHost, endpointId: string): string {
  return `Jump host ${jumpHost.instanceId} is in ${jumpHost.vpcId} which has no execute-api VPC endpoint; using configured endpoint ${endpointId}`;
}

interface Tier {
  label: string;
  matches: (host: JumpHost) => boolean;
}

/**
 * Splits `Key=Value` at the first '='.
 */
export function parseTagSelector(selector: string): { key: string; value: string } {
  const eq = selector.indexOf('=');
  if (eq === -1) {
    return { key: selector, value: '' };
  }
  return { key: selector.slice(0, eq), value: selector.slice(eq + 1) };
}

function hasTag(host: JumpHost, selector: string): boolean {
  const { key, value } = parseTagSelector(selector);
  return host.tags[key] === value;
}

export interface TopologyResolverDeps {
  cloud: TopologyCloudApi;
  preferences: TopologyPreferences;
  logger: Logger;
}

/**
 * Picks the jump host and execute-api VPC endpoint for a private API tunnel.
 */
export class TopologyResolver {
  private readonly cloud: TopologyCloudApi;
  private readonly preferences: TopologyPreferences;
  private readonly logger: Logger;

  constructor(deps: TopologyResolverDeps) {
    this.cloud = deps.cloud;
    this.preferences = deps.preferences;
    this.logger = deps.logger.child({ component: 'TopologyResolver' });
  }

  get configuredEndpointId(): string | undefined {
    return this.preferences.vpcEndpointId;
  }

  async resolve(signal?: AbortSignal): Promise<TopologyResolution> {
    const [endpoints, instances] = await Promise.all([
      this.cloud.listExecuteApiVpcEndpoints(signal),
      this.cloud.listSsmManagedInstances(signal),
    ]);

    const preferredVpcs = [...endpoints.keys()].sort();
    if (preferredVpcs.length === 0) {
      this.logger.warn('No execute-api VPC endpoints found in account');
    } else {
      this.logger.info({ preferredVpcs }, 'Found execute-api VPC endpoints');
    }

    const jumpHost = this.selectJumpHost(instances, new Set(preferredVpcs));
    const warnings: string[] = [];

    const discovered = endpoints.get(jumpHost.vpcId);
    if (discovered) {
      this.logger.info(
        { jumpHost: jumpHost.instanceId, vpcId: jumpHost.vpcId, vpcEndpoint: discovered.endpointId },
        'Jump host VPC has an execute-api endpoint'
      );
      return { source: 'discovered', jumpHost, vpcEndpoint: discovered, preferredVpcs, warnings };
    }

    const configured = this.preferences.vpcEndpointId;
    if (configured) {
      const warning = crossAccountWarning(jumpHost, configured);
      this.logger.warn({ jumpHost: jumpHost.instanceId, vpcId: jumpHost.vpcId, configured }, warning);
      warnings.push(warning);
      return {
        source: 'configured',
        jumpHost,
        configuredEndpointId: configured,
        preferredVpcs,
        warnings,
      };
    }

    throw new NoUsableEndpointError(jumpHost.vpcId);
  }

  /**
   * Walks the lookup tiers in priority order. Within a tier, hosts in
   * preferred VPCs win, then the smallest instance id.
   */
  selectJumpHost(instances: readonly JumpHost[], preferredVpcs: ReadonlySet<string>): JumpHost {
    const usable = instances.filter(
      (host) => host.ssmManaged && !UNUSABLE_INSTANCE_STATES.has(host.state)
    );
    const tried: string[] = [];

    for (const tier of this.tiers()) {
      const matches = usable.filter(tier.matches);
      if (matches.length === 0) {
        tried.push(`${tier.label}: no match`);
        continue;
      }
      const picked = pickPreferred(matches, preferredVpcs);
      this.logger.info(
        { jumpHost: picked.instanceId, name: picked.name, vpcId: picked.vpcId, lookup: tier.label },
        'Selected jump host'
      );
      return picked;
    }

    if (usable.length === 0) {
      tried.push('SSM instances: none found online');
    }
    throw new NoJumpHostError(tried);
  }

  private tiers(): Tier[] {
    const tiers: Tier[] = [];
    const { jumpHost, jumpHostTag } = this.preferences;
    const defaultTags: readonly string[] = this.preferences.defaultTags ?? TOPOLOGY_DEFAULTS.JUMP_HOST_TAGS;
    const defaultNames: readonly string[] = this.preferences.defaultNames ?? TOPOLOGY_DEFAULTS.JUMP_HOST_NAMES;

    if (jumpHost) {
      tiers.push(
        jumpHost.startsWith('i-')
          ? {
              label: `configured instance id '${jumpHost}'`,
              matches: (host) => host.instanceId === jumpHost,
            }
          : {
              label: `configured instance name '${jumpHost}'`,
              matches: (host) => host.name === jumpHost,
            }
      );
    }

    if (jumpHostTag) {
      tiers.push({
        label: `configured tag '${jumpHostTag}'`,
        matches: (host) => hasTag(host, jumpHostTag),
      });
    }

    if (defaultTags.length > 0) {
      tiers.push({
        label: `default tags '${defaultTags.join("', '")}'`,
        matches: (host) => defaultTags.some((selector) => hasTag(host, selector)),
      });
    }

    if (defaultNames.length > 0) {
      tiers.push({
        label: `default names '${defaultNames.join("', '")}'`,
        matches: (host) => defaultNames.includes(host.name),
      });
    }

    tiers.push({ label: 'any SSM managed instance', matches: () => true });
    return tiers;
  }
}

function pickPreferred(candidates: readonly JumpHost[], preferredVpcs: ReadonlySet<string>): JumpHost {
  const ranked = [...candidates].sort((a, b) => {
    const aPreferred = preferredVpcs.has(a.vpcId) ? 0 : 1;
    const bPreferred = preferredVpcs.has(b.vpcId) ? 0 : 1;
    if (aPreferred !== bPreferred) return aPreferred - bPreferred;
    return a.instanceId < b.instanceId ? -1 : a.instanceId > b.instanceId ? 1 : 0;
  });
  const [first] = ranked;
  if (!first) {
    throw new Error('pickPreferred called without candidates');
  }
  return first;
}
