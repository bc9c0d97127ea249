/**
 * @file credentials.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { fromNodeProviderChain } from '@aws-sdk/credential-providers';
import type { AwsCredentialIdentity, AwsCredentialIdentityProvider } from '@smithy/types';

/**
 * Credentials of the active profile (or the default chain when none is set).
 * The provider caches and refreshes them; nothing is written to disk.
 */
export function createCredentialProvider(profile?: string): AwsCredentialIdentityProvider {
  return fromNodeProviderChain(profile ? { profile } : {});
}

/**
 * Fixed credentials, for callers that already hold a key pair.
 */
export function staticCredentials(identity: AwsCredentialIdentity): AwsCredentialIdentityProvider {
  return () => Promise.resolve(identity);
}
