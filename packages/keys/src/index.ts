/**
 * @fleetkey/keys
 *
 * EC P-256 key generation, public key derivation and JWK formatting.
 * Used by the fleet-key CLI.
 */

export * from './keygen.js';
export * from './jwk.js';
export * from './types.js';
