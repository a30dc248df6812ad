/**
 * Fleet Key program definition
 *
 * `env` supplies the option defaults (FLEET_KEY_ROOT, FLEET_KEY_DOMAIN)
 */

import { Command } from 'commander';
import { generateCommand } from './commands/generate.js';
import { verifyCommand } from './commands/verify.js';
import { showCommand } from './commands/show.js';
import type { CliOptions } from './config.js';

export function createProgram(env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command();

  program
    .name('fleet-key')
    .description('Generate and publish the Fleet API domain verification key')
    .version('0.1.0');

  /**
   * generate command - default when no command is given
   */
  program
    .command('generate', { isDefault: true })
    .description('Generate an EC P-256 key pair and place the public key under public_site/.well-known')
    .option('--root <dir>', 'Project root holding keys/ and public_site/ (default: current directory)', env.FLEET_KEY_ROOT)
    .option('--domain <domain>', 'Domain the public site is served at', env.FLEET_KEY_DOMAIN)
    .action(async (options: CliOptions) => {
      await generateCommand({
        root: options.root,
        domain: options.domain,
      });
    });

  /**
   * verify command - Check stored and published keys
   */
  program
    .command('verify')
    .description('Check that the published key matches the stored key pair')
    .option('--root <dir>', 'Project root holding keys/ and public_site/ (default: current directory)', env.FLEET_KEY_ROOT)
    .action(async (options: CliOptions) => {
      await verifyCommand({ root: options.root });
    });

  /**
   * show command - Display the published key
   */
  program
    .command('show')
    .description('Display the published public key, its JWK and thumbprint')
    .option('--root <dir>', 'Project root holding keys/ and public_site/ (default: current directory)', env.FLEET_KEY_ROOT)
    .option('--domain <domain>', 'Domain the public site is served at', env.FLEET_KEY_DOMAIN)
    .action(async (options: CliOptions) => {
      await showCommand({
        root: options.root,
        domain: options.domain,
      });
    });

  program.addHelpText(
    'after',
    `
Examples:
  # Generate keys in the current directory
  $ fleet-key

  # Generate keys for a project elsewhere and print concrete URLs
  $ fleet-key generate --root ./site-project --domain fleet.example.com

  # Check an existing publication
  $ fleet-key verify

  # Print the published key as PEM and JWK
  $ fleet-key show --domain fleet.example.com
`
  );

  return program;
}
