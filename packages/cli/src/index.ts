/**
 * @fleetkey/cli
 *
 * Programmatic access to the generation and verification procedures behind the fleet-key command.
 */

export * from './layout.js';
export * from './errors.js';
export * from './preflight.js';
export * from './publish.js';
export * from './verify.js';
export * from './config.js';
export * from './key-storage.js';
export * from './program.js';
export * from './types.js';
