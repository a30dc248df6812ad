/**
 * Type definitions for fleet-key CLI
 */

export interface KeyLayout {
  rootDir: string;
  keysDir: string;
  siteDir: string;
  wellKnownDir: string;
  privateKeyPath: string;
  publicKeyPath: string;     // working copy
  publishedKeyPath: string;  // copy under public_site/.well-known
}

export type PublishStep = 'check' | 'directories' | 'private-key' | 'public-key' | 'publish';

export interface PublicationResult {
  layout: KeyLayout;
  publicKey: string;
  thumbprint: string;
}

export type VerificationCheckName = 'private-key' | 'public-key-curve' | 'round-trip' | 'published-copy';

export interface VerificationCheck {
  name: VerificationCheckName;
  ok: boolean;
  detail: string;
}

export interface VerificationReport {
  ok: boolean;
  checks: VerificationCheck[];
}
