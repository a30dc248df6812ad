/**
 * CLI configuration
 *
 * Options arrive from commander with env-backed defaults and are validated here.
 */

import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

const HOSTNAME_PATTERN = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?(\.[a-z0-9]([a-z0-9-]*[a-z0-9])?)+$/;

export const configSchema = z.object({
  root: z.string().min(1, 'Root directory must not be empty'),
  domain: z
    .string()
    .trim()
    .toLowerCase()
    .transform((value) => value.replace(/^https?:\/\//, '').replace(/\/+$/, ''))
    .pipe(z.string().regex(HOSTNAME_PATTERN, 'Invalid domain: expected a host name such as fleet.example.com'))
    .optional(),
});

export interface CliOptions {
  root?: string;
  domain?: string;
}

export interface FleetKeyConfig {
  root: string;
  domain?: string;
}

export function loadConfig(options: CliOptions): FleetKeyConfig {
  const result = configSchema.safeParse({
    root: options.root ?? process.cwd(),
    domain: options.domain || undefined,
  });

  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => issue.message).join('; '));
  }

  return {
    root: resolve(result.data.root),
    domain: result.data.domain,
  };
}
