/**
 * @file version.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

export const PACKAGE_NAME = '@skyport/tunnels';

/**
 * Extracts the version from package.json text when it belongs to this package.
 */
export function versionFromManifest(content: string): string | undefined {
  const manifest: unknown = JSON.parse(content);
  if (typeof manifest !== 'object' || manifest === null) {
    return undefined;
  }
  const name: unknown = Reflect.get(manifest, 'name');
  const version: unknown = Reflect.get(manifest, 'version');
  if (name === PACKAGE_NAME && typeof version === 'string' && version.length > 0) {
    return version;
  }
  return undefined;
}

/**
 * Reads the CLI version from package.json.
 */
export function getPackageVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // ../package.json from dist/, ../../package.json from src/utils/
  const candidates = [join(here, '../package.json'), join(here, '../../package.json')];

  for (const candidate of candidates) {
    let content: string;
    try {
      content = readFileSync(candidate, 'utf8');
    } catch {
      // Try next path
      continue;
    }
    const version = versionFromManifest(content);
    if (version) {
      return version;
    }
  }
  return 'unknown';
}
