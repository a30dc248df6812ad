/**
 * On-disk layout of the keys and the public site
 */

import { join, resolve } from 'node:path';
import type { KeyLayout } from './types.js';

/**
 * Path under the site root where the Fleet API looks for the public key
 */
export const WELL_KNOWN_PATH = '.well-known/appspecific/com.tesla.3p.public-key.pem';

/**
 * Resolve every path of a run from the project root.
 * Relative roots are resolved against the working directory.
 */
export function resolveLayout(rootDir: string): KeyLayout {
  const root = resolve(rootDir);
  const keysDir = join(root, 'keys');
  const siteDir = join(root, 'public_site');
  const wellKnownDir = join(siteDir, '.well-known', 'appspecific');

  return {
    rootDir: root,
    keysDir,
    siteDir,
    wellKnownDir,
    privateKeyPath: join(keysDir, 'private-key.pem'),
    publicKeyPath: join(keysDir, 'public-key.pem'),
    publishedKeyPath: join(wellKnownDir, 'com.tesla.3p.public-key.pem'),
  };
}

export function publicKeyUrl(domain: string): string {
  return `https://${domain}/${WELL_KNOWN_PATH}`;
}

/**
 * Follow-up instructions printed after a successful run
 */
export function nextSteps(domain?: string): string[] {
  const origin = `https://${domain ?? 'YOUR_DOMAIN'}`;

  return [
    '1) Deploy the contents of public_site/ to a site served at your domain root.',
    `   The public key must be reachable at: ${origin}/${WELL_KNOWN_PATH}`,
    `2) Use ${origin} as an Allowed Origin URL in Tesla Developer Portal.`,
    `3) Use ${origin}/oauth/callback as an Allowed Redirect URI.`,
  ];
}
