/**
 * Type definitions for P-256 keys and JWKs
 */

export interface EcKeyPair {
  publicKey: string;   // PEM SubjectPublicKeyInfo
  privateKey: string;  // PEM SEC1
}

export interface KeyDetails {
  keyType: string;
  curve: string;
}

export interface EcPublicJWK {
  kty: 'EC';
  crv: 'P-256';
  kid: string;
  x: string;  // base64url affine x coordinate
  y: string;  // base64url affine y coordinate
  use: 'sig';
  alg?: 'ES256';
}
