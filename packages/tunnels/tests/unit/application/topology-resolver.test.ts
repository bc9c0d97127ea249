/**
 * @file topology-resolver.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect } from 'vitest';
import {
  TopologyResolver,
  crossAccountWarning,
  parseTagSelector,
  type TopologyPreferences,
} from '../../../src/application/topology-resolver.js';
import { NoJumpHostError, NoUsableEndpointError } from '../../../src/domain/errors/domain-errors.js';
import { createSilentLogger } from '../../../src/infrastructure/logging/pino-logger.js';
import { FakeCloud, jumpHost, vpcEndpoint } from '../../fixtures/fake-cloud.js';
import type { JumpHost, VpcEndpoint } from '../../../src/domain/value-objects/topology.js';

const logger = createSilentLogger();

function resolver(
  endpoints: VpcEndpoint[],
  instances: JumpHost[],
  preferences: TopologyPreferences = {}
): TopologyResolver {
  return new TopologyResolver({ cloud: new FakeCloud(endpoints, instances), preferences, logger });
}

describe('parseTagSelector', () => {
  it('should split at the first equals sign', () => {
    expect(parseTagSelector('role=jump=host')).toEqual({ key: 'role', value: 'jump=host' });
    expect(parseTagSelector('role')).toEqual({ key: 'role', value: '' });
  });
});

describe('TopologyResolver', () => {
  describe('resolve', () => {
    it('should use the endpoint in the jump host VPC', async () => {
      const endpoint = vpcEndpoint({ endpointId: 'vpce-a', vpcId: 'vpc-a' });
      const host = jumpHost({ instanceId: 'i-a', vpcId: 'vpc-a', name: 'bastion' });

      const resolution = await resolver([endpoint], [host]).resolve();

      expect(resolution).toEqual({
        source: 'discovered',
        jumpHost: host,
        vpcEndpoint: endpoint,
        preferredVpcs: ['vpc-a'],
        warnings: [],
      });
    });

    it('should fall back to the configured endpoint with a warning', async () => {
      const host = jumpHost({ instanceId: 'i-b', vpcId: 'vpc-b', name: 'bastion' });

      const resolution = await resolver(
        [vpcEndpoint({ endpointId: 'vpce-a', vpcId: 'vpc-a' })],
        [host],
        { vpcEndpointId: 'vpce-shared' }
      ).resolve();

      expect(resolution).toEqual({
        source: 'configured',
        jumpHost: host,
        configuredEndpointId: 'vpce-shared',
        preferredVpcs: ['vpc-a'],
        warnings: [
          'Jump host i-b is in vpc-b which has no execute-api VPC endpoint; using configured endpoint vpce-shared',
        ],
      });
    });

    it('should fail without a discovered or configured endpoint', async () => {
      const host = jumpHost({ instanceId: 'i-b', vpcId: 'vpc-b' });

      const error = await resolver([], [host]).resolve().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NoUsableEndpointError);
      expect(error).toHaveProperty(
        'message',
        'No execute-api VPC endpoint in vpc-b and no VPC_ENDPOINT_ID configured for cross-account access'
      );
    });

    it('should report sorted preferred VPCs', async () => {
      const resolution = await resolver(
        [
          vpcEndpoint({ endpointId: 'vpce-c', vpcId: 'vpc-c' }),
          vpcEndpoint({ endpointId: 'vpce-a', vpcId: 'vpc-a' }),
        ],
        [jumpHost({ instanceId: 'i-a', vpcId: 'vpc-a' })]
      ).resolve();

      expect(resolution.preferredVpcs).toEqual(['vpc-a', 'vpc-c']);
    });
  });

  describe('selectJumpHost', () => {
    const preferred = new Set(['vpc-a']);

    it('should honor a configured instance id first', () => {
      const hosts = [
        jumpHost({ instanceId: 'i-1', name: 'bastion' }),
        jumpHost({ instanceId: 'i-9', vpcId: 'vpc-z' }),
      ];

      expect(resolver([], [], { jumpHost: 'i-9' }).selectJumpHost(hosts, preferred).instanceId).toBe('i-9');
    });

    it('should match a configured name against the Name tag', () => {
      const hosts = [
        jumpHost({ instanceId: 'i-1', name: 'bastion' }),
        jumpHost({ instanceId: 'i-2', name: 'ops-box' }),
      ];

      expect(resolver([], [], { jumpHost: 'ops-box' }).selectJumpHost(hosts, preferred).instanceId).toBe('i-2');
    });

    it('should use the configured tag before the defaults', () => {
      const hosts = [
        jumpHost({ instanceId: 'i-1', name: 'bastion' }),
        jumpHost({ instanceId: 'i-2', tags: { role: 'jump' } }),
      ];

      expect(
        resolver([], [], { jumpHostTag: 'role=jump' }).selectJumpHost(hosts, preferred).instanceId
      ).toBe('i-2');
    });

    it('should prefer default tags over default names', () => {
      const hosts = [
        jumpHost({ instanceId: 'i-1', name: 'jumphost' }),
        jumpHost({ instanceId: 'i-2', tags: { 'skyport:jump-host': 'true' } }),
      ];

      expect(resolver([], []).selectJumpHost(hosts, preferred).instanceId).toBe('i-2');
    });

    it('should prefer hosts in VPCs with an endpoint within a tier', () => {
      const hosts = [
        jumpHost({ instanceId: 'i-1', name: 'bastion', vpcId: 'vpc-z' }),
        jumpHost({ instanceId: 'i-2', name: 'bastion', vpcId: 'vpc-a' }),
      ];

      expect(resolver([], []).selectJumpHost(hosts, preferred).instanceId).toBe('i-2');
    });

    it('should break ties by instance id', () => {
      const hosts = [
        jumpHost({ instanceId: 'i-3', name: 'bastion' }),
        jumpHost({ instanceId: 'i-1', name: 'bastion' }),
      ];

      expect(resolver([], []).selectJumpHost(hosts, preferred).instanceId).toBe('i-1');
    });

    it('should fall through a configured host that is missing', () => {
      const hosts = [jumpHost({ instanceId: 'i-1', name: 'bastion' })];

      expect(resolver([], [], { jumpHost: 'i-missing' }).selectJumpHost(hosts, preferred).instanceId).toBe('i-1');
    });

    it('should pick any SSM managed instance as a last resort', () => {
      const hosts = [jumpHost({ instanceId: 'i-7', name: 'worker' })];

      expect(resolver([], []).selectJumpHost(hosts, preferred).instanceId).toBe('i-7');
    });

    it('should skip stopped and unmanaged instances', () => {
      const hosts = [
        jumpHost({ instanceId: 'i-1', name: 'bastion', state: 'stopped' }),
        jumpHost({ instanceId: 'i-2', name: 'bastion', ssmManaged: false }),
        jumpHost({ instanceId: 'i-3', name: 'worker' }),
      ];

      expect(resolver([], []).selectJumpHost(hosts, preferred).instanceId).toBe('i-3');
    });

    it('should list every tier tried when nothing is online', () => {
      const error = (() => {
        try {
          resolver([], [], { jumpHost: 'i-0123', jumpHostTag: 'role=jump', defaultTags: ['env=ops'], defaultNames: ['bastion'] })
            .selectJumpHost([jumpHost({ instanceId: 'i-1', state: 'terminated' })], preferred);
        } catch (caught) {
          return caught;
        }
        return undefined;
      })();

      expect(error).toBeInstanceOf(NoJumpHostError);
      expect(error).toHaveProperty('tried', [
        "configured instance id 'i-0123': no match",
        "configured tag 'role=jump': no match",
        "default tags 'env=ops': no match",
        "default names 'bastion': no match",
        'any SSM managed instance: no match',
        'SSM instances: none found online',
      ]);
    });

    it('should skip empty default lists', () => {
      const error = (() => {
        try {
          resolver([], [], { defaultTags: [], defaultNames: [] }).selectJumpHost([], preferred);
        } catch (caught) {
          return caught;
        }
        return undefined;
      })();

      expect(error).toHaveProperty('tried', [
        'any SSM managed instance: no match',
        'SSM instances: none found online',
      ]);
    });
  });

  it('should format the cross-account warning', () => {
    expect(crossAccountWarning(jumpHost({ instanceId: 'i-1', vpcId: 'vpc-b' }), 'vpce-x')).toBe(
      'Jump host i-1 is in vpc-b which has no execute-api VPC endpoint; using configured endpoint vpce-x'
    );
  });
});
