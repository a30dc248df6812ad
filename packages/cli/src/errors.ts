/**
 * Errors raised before any key material is written
 */

export class MissingDependencyError extends Error {
  readonly remediation: string;

  constructor(message: string, remediation: string) {
    super(message);
    this.name = 'MissingDependencyError';
    this.remediation = remediation;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
