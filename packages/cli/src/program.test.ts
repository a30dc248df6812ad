import { rm } from 'node:fs/promises';
import chalk from 'chalk';
import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from 'vitest';
import { resolveLayout } from './layout.js';
import { createProgram } from './program.js';
import { listFiles, makeTempRoot } from './test-helpers.js';

const EXPECTED_FILES = [
  'keys/private-key.pem',
  'keys/public-key.pem',
  'public_site/.well-known/appspecific/com.tesla.3p.public-key.pem',
];

function lines(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls.map((args) => args.join(' '));
}

describe('createProgram', () => {
  let root: string;
  let otherRoot: string;
  let logSpy: MockInstance<typeof console.log>;
  let exitSpy: MockInstance<typeof process.exit>;

  beforeEach(async () => {
    chalk.level = 0;
    root = await makeTempRoot();
    otherRoot = await makeTempRoot();
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
    await rm(otherRoot, { recursive: true, force: true });
  });

  it('should run generate when no command is given', async () => {
    await createProgram({ FLEET_KEY_ROOT: root }).parseAsync([], { from: 'user' });

    expect(exitSpy).not.toHaveBeenCalled();
    expect(await listFiles(root)).toEqual(EXPECTED_FILES);
    expect(lines(logSpy)).toContain(`  Private key: ${resolveLayout(root).privateKeyPath}`);
  });

  it('should take root and domain defaults from the environment', async () => {
    await createProgram({ FLEET_KEY_ROOT: root, FLEET_KEY_DOMAIN: 'fleet.example.com' }).parseAsync(['generate'], {
      from: 'user',
    });

    expect(await listFiles(root)).toEqual(EXPECTED_FILES);
    expect(lines(logSpy)).toContain('  2) Use https://fleet.example.com as an Allowed Origin URL in Tesla Developer Portal.');
  });

  it('should let --root override the environment', async () => {
    await createProgram({ FLEET_KEY_ROOT: otherRoot }).parseAsync(['--root', root], { from: 'user' });

    expect(await listFiles(root)).toEqual(EXPECTED_FILES);
    expect(await listFiles(otherRoot)).toEqual([]);
  });

  it('should verify a generated root taken from the environment', async () => {
    const env = { FLEET_KEY_ROOT: root };
    await createProgram(env).parseAsync([], { from: 'user' });

    await createProgram(env).parseAsync(['verify'], { from: 'user' });

    expect(exitSpy).not.toHaveBeenCalled();
    expect(lines(logSpy)).toContain('✅ All checks passed\n');
  });
});
