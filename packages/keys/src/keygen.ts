/**
 * EC P-256 key generation utilities
 */

import { createPrivateKey, createPublicKey, generateKeyPairSync, getCurves } from 'node:crypto';
import type { EcKeyPair, KeyDetails } from './types.js';

/**
 * OpenSSL name of NIST P-256
 */
export const CURVE_NAME = 'prime256v1';

const CURVE_ALIASES: Record<string, string> = {
  prime256v1: 'P-256',
  secp384r1: 'P-384',
  secp521r1: 'P-521',
};

/**
 * Check whether the crypto module can generate P-256 keys
 */
export function hasCurveSupport(curves: readonly string[] = getCurves()): boolean {
  return curves.includes(CURVE_NAME);
}

/**
 * Generate a P-256 private key in SEC1 PEM format
 */
export function generatePrivateKey(): string {
  const { privateKey } = generateKeyPairSync('ec', { namedCurve: CURVE_NAME });
  return privateKey.export({ type: 'sec1', format: 'pem' }).toString();
}

/**
 * Derive the SPKI PEM public key from a P-256 private key PEM
 */
export function derivePublicKey(privateKeyPem: string): string {
  const privateKey = createPrivateKey(privateKeyPem);
  const details = privateKey.asymmetricKeyDetails;

  if (privateKey.asymmetricKeyType !== 'ec' || details?.namedCurve !== CURVE_NAME) {
    throw new Error(
      `Expected an EC ${CURVE_NAME} private key, got ${privateKey.asymmetricKeyType ?? 'unknown'}` +
        (details?.namedCurve ? ` on ${details.namedCurve}` : '')
    );
  }

  return createPublicKey(privateKey).export({ type: 'spki', format: 'pem' }).toString();
}

/**
 * Generate a P-256 key pair in PEM format
 */
export function generateKeyPair(): EcKeyPair {
  const { publicKey, privateKey } = generateKeyPairSync('ec', {
    namedCurve: CURVE_NAME,
    publicKeyEncoding: {
      type: 'spki',
      format: 'pem',
    },
    privateKeyEncoding: {
      type: 'sec1',
      format: 'pem',
    },
  });

  return {
    publicKey,
    privateKey,
  };
}

/**
 * Report the key type and curve of a public key PEM.
 * OpenSSL curve names are mapped to their NIST names (prime256v1 -> P-256).
 */
export function describePublicKey(publicKeyPem: string): KeyDetails {
  const publicKey = createPublicKey(publicKeyPem);
  const namedCurve = publicKey.asymmetricKeyDetails?.namedCurve;

  return {
    keyType: publicKey.asymmetricKeyType ?? 'unknown',
    curve: namedCurve ? CURVE_ALIASES[namedCurve] ?? namedCurve : 'none',
  };
}

/**
 * Check that a PEM parses as an EC public key on P-256
 */
export function isP256PublicKey(publicKeyPem: string): boolean {
  try {
    const details = describePublicKey(publicKeyPem);
    return details.keyType === 'ec' && details.curve === 'P-256';
  } catch {
    return false;
  }
}

/**
 * Convert base64 to base64url format (RFC 4648)
 */
export function base64ToBase64Url(base64: string): string {
  return base64
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=/g, '');
}
