/**
 * Key generation and publication procedure
 */

import { derivePublicKey, generateKid, generatePrivateKey } from '@fleetkey/keys';
import { KeyStorage } from './key-storage.js';
import { assertCryptoCapability } from './preflight.js';
import type { KeyLayout, PublicationResult, PublishStep } from './types.js';

export interface PublishOptions {
  /** Curve list to check instead of the runtime's */
  curves?: readonly string[];
  /** Called as each step starts */
  onStep?: (step: PublishStep) => void;
}

/**
 * Generate a P-256 key pair under `layout.keysDir` and copy the public key
 * to the well-known path. Steps run in order and the first failure aborts
 * the run; files written before it are left in place.
 */
export async function publishKeyPair(
  layout: KeyLayout,
  options: PublishOptions = {}
): Promise<PublicationResult> {
  const { onStep } = options;
  const storage = new KeyStorage(layout);

  // Nothing is written when the capability is missing
  onStep?.('check');
  assertCryptoCapability(options.curves);

  onStep?.('directories');
  await storage.ensureDirectories();

  onStep?.('private-key');
  await storage.writePrivateKey(generatePrivateKey());

  // Derive from the file on disk so the pair matches what was stored
  onStep?.('public-key');
  const privateKeyPem = await storage.readPrivateKey();
  if (privateKeyPem === null) {
    throw new Error(`Private key was not written to ${layout.privateKeyPath}`);
  }
  const publicKey = derivePublicKey(privateKeyPem);
  await storage.writePublicKey(publicKey);

  onStep?.('publish');
  await storage.publish();

  return {
    layout,
    publicKey,
    thumbprint: generateKid(publicKey),
  };
}
