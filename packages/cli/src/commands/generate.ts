/**
 * Generate Command
 *
 * Generates an EC P-256 key pair and places the public key at the well-known path
 */

import chalk from 'chalk';
import ora from 'ora';
import { loadConfig, type CliOptions } from '../config.js';
import { MissingDependencyError, errorMessage } from '../errors.js';
import { nextSteps, resolveLayout } from '../layout.js';
import { publishKeyPair } from '../publish.js';
import type { PublishStep } from '../types.js';

const STEP_STARTED: Record<PublishStep, string> = {
  check: 'Checking EC P-256 support...',
  directories: 'Creating directories...',
  'private-key': 'Generating EC P-256 private key...',
  'public-key': 'Deriving public key...',
  publish: 'Placing public key...',
};

const STEP_DONE: Record<PublishStep, string> = {
  check: 'EC P-256 supported',
  directories: 'Directories ready',
  'private-key': 'Private key generated',
  'public-key': 'Public key derived',
  publish: 'Public key placed',
};

export interface GenerateOptions extends CliOptions {
  curves?: readonly string[];
}

export async function generateCommand(options: GenerateOptions): Promise<void> {
  console.log(chalk.blue.bold('\n🔑 Fleet API Key Generator\n'));

  const spinner = ora();
  const progress: { step?: PublishStep } = {};

  try {
    const config = loadConfig(options);
    const layout = resolveLayout(config.root);

    const result = await publishKeyPair(layout, {
      curves: options.curves,
      onStep: (step) => {
        if (progress.step) {
          spinner.succeed(STEP_DONE[progress.step]);
        }
        progress.step = step;
        spinner.start(STEP_STARTED[step]);
      },
    });
    if (progress.step) {
      spinner.succeed(STEP_DONE[progress.step]);
    }

    console.log(chalk.green.bold('\n✅ Done. Files:\n'));
    console.log(chalk.cyan('  Private key:'), layout.privateKeyPath);
    console.log(chalk.cyan('  Public key: '), result.layout.publishedKeyPath);
    console.log(chalk.cyan('  Thumbprint: '), result.thumbprint);

    console.log(chalk.yellow.bold('\nNext steps:'));
    for (const line of nextSteps(config.domain)) {
      console.log(`  ${line}`);
    }

    console.log(chalk.red.bold('\n⚠️  Keep keys/private-key.pem secret. Never deploy it with public_site/.\n'));
  } catch (error) {
    if (progress.step) {
      spinner.fail(`${STEP_STARTED[progress.step].replace(/\.\.\.$/, '')} failed`);
    }
    console.error(chalk.red(`❌ ${errorMessage(error)}`));
    if (error instanceof MissingDependencyError) {
      console.error(chalk.yellow(error.remediation));
    }
    process.exit(1);
  }
}
