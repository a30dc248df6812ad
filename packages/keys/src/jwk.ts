/**
 * JWK utilities for P-256 public keys
 */

import { createHash, createPublicKey } from 'node:crypto';
import { base64ToBase64Url, isP256PublicKey } from './keygen.js';
import type { EcPublicJWK } from './types.js';

function exportCoordinates(publicKeyPem: string): { x: string; y: string } {
  if (!isP256PublicKey(publicKeyPem)) {
    throw new Error('Expected an EC P-256 public key');
  }

  const { x, y } = createPublicKey(publicKeyPem).export({ format: 'jwk' });
  if (!x || !y) {
    throw new Error('Public key JWK export is missing coordinates');
  }
  return { x, y };
}

/**
 * Compute the RFC 7638 thumbprint of a P-256 public key.
 * Required members are serialized in lexicographic order: crv, kty, x, y.
 */
export function generateKid(publicKeyPem: string): string {
  const { x, y } = exportCoordinates(publicKeyPem);
  const canonical = JSON.stringify({ crv: 'P-256', kty: 'EC', x, y });
  const hash = createHash('sha256').update(canonical).digest('base64');
  return base64ToBase64Url(hash);
}

/**
 * Convert a P-256 public key (PEM) to JWK format
 */
export function publicKeyToJWK(
  publicKeyPem: string,
  kid?: string,
  options?: {
    alg?: 'ES256';
  }
): EcPublicJWK {
  const { x, y } = exportCoordinates(publicKeyPem);

  const jwk: EcPublicJWK = {
    kty: 'EC',
    crv: 'P-256',
    kid: kid || generateKid(publicKeyPem),
    x,
    y,
    use: 'sig',
  };

  if (options?.alg) {
    jwk.alg = options.alg;
  }

  return jwk;
}
