#!/usr/bin/env node

/**
 * Fleet Key CLI
 *
 * Generates an EC P-256 key pair and publishes the public key for Fleet API domain verification
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
