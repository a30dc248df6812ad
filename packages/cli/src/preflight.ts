import { hasCurveSupport, CURVE_NAME } from '@fleetkey/keys';
import { MissingDependencyError } from './errors.js';

/**
 * Fail before touching the filesystem when the runtime cannot generate P-256 keys.
 * `curves` overrides the runtime curve list.
 */
export function assertCryptoCapability(curves?: readonly string[]): void {
  if (!hasCurveSupport(curves)) {
    throw new MissingDependencyError(
      `EC curve ${CURVE_NAME} (P-256) is not supported by this Node.js build`,
      'Install an official Node.js 20 release (https://nodejs.org), which is built with OpenSSL EC support.'
    );
  }
}
