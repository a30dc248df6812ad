/**
 * Read-only checks of a previous run's output
 */

import { derivePublicKey, isP256PublicKey } from '@fleetkey/keys';
import { errorMessage } from './errors.js';
import { KeyStorage } from './key-storage.js';
import type { KeyLayout, VerificationCheck, VerificationReport } from './types.js';

export async function verifyPublication(layout: KeyLayout): Promise<VerificationReport> {
  const storage = new KeyStorage(layout);
  const privateKeyPem = await storage.readPrivateKey();
  const publicKeyPem = await storage.readPublicKey();
  const publishedPem = await storage.readPublishedKey();
  const checks: VerificationCheck[] = [];

  let derived: string | null = null;
  if (privateKeyPem === null) {
    checks.push({ name: 'private-key', ok: false, detail: `Missing ${layout.privateKeyPath}` });
  } else {
    try {
      derived = derivePublicKey(privateKeyPem);
      checks.push({ name: 'private-key', ok: true, detail: 'EC P-256 private key' });
    } catch (error) {
      checks.push({ name: 'private-key', ok: false, detail: errorMessage(error) });
    }
  }

  if (publicKeyPem === null) {
    checks.push({ name: 'public-key-curve', ok: false, detail: `Missing ${layout.publicKeyPath}` });
  } else if (isP256PublicKey(publicKeyPem)) {
    checks.push({ name: 'public-key-curve', ok: true, detail: 'EC P-256 public key' });
  } else {
    checks.push({
      name: 'public-key-curve',
      ok: false,
      detail: `${layout.publicKeyPath} is not an EC P-256 public key`,
    });
  }

  if (derived === null || publicKeyPem === null) {
    checks.push({ name: 'round-trip', ok: false, detail: 'Private or public key unavailable' });
  } else if (derived === publicKeyPem) {
    checks.push({ name: 'round-trip', ok: true, detail: 'Public key matches private key' });
  } else {
    checks.push({ name: 'round-trip', ok: false, detail: 'Public key does not match private key' });
  }

  if (publishedPem === null) {
    checks.push({ name: 'published-copy', ok: false, detail: `Missing ${layout.publishedKeyPath}` });
  } else if (publicKeyPem === null) {
    checks.push({ name: 'published-copy', ok: false, detail: 'Working public key unavailable' });
  } else if (publishedPem === publicKeyPem) {
    checks.push({ name: 'published-copy', ok: true, detail: 'Published copy is identical' });
  } else {
    checks.push({ name: 'published-copy', ok: false, detail: 'Published copy differs from working copy' });
  }

  return {
    ok: checks.every((check) => check.ok),
    checks,
  };
}
