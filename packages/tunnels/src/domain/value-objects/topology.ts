/**
 * @file topology.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * EC2 instance usable as a Session Manager jump host.
 * Created by topology discovery; immutable thereafter.
 */
export interface JumpHost {
  readonly instanceId: string;
  readonly name: string;
  readonly vpcId: string;
  readonly privateIp: string;
  readonly ssmManaged: boolean;
  /** EC2 instance state name, e.g. `running` or `stopping` */
  readonly state: string;
  readonly tags: Readonly<Record<string, string>>;
}

/**
 * Interface VPC endpoint of a regional service.
 */
export interface VpcEndpoint {
  readonly endpointId: string;
  readonly serviceName: string;
  readonly vpcId: string;
  readonly state: string;
  /** Hostnames in the order EC2 reports them; the first one is used for forwarding */
  readonly dnsEntries: readonly string[];
}

/**
 * Instance states a jump host is never picked from.
 */
export const UNUSABLE_INSTANCE_STATES: ReadonlySet<string> = new Set([
  'shutting-down',
  'terminated',
  'stopping',
  'stopped',
]);

export function primaryDnsName(endpoint: VpcEndpoint): string | undefined {
  return endpoint.dnsEntries[0];
}
