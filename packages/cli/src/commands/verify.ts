/**
 * Verify Command
 *
 * Checks that the stored and published keys belong together
 */

import chalk from 'chalk';
import { loadConfig, type CliOptions } from '../config.js';
import { errorMessage } from '../errors.js';
import { resolveLayout } from '../layout.js';
import { verifyPublication } from '../verify.js';

export async function verifyCommand(options: CliOptions): Promise<void> {
  console.log(chalk.blue.bold('\n🔍 Verifying key publication\n'));

  let ok = false;
  try {
    const layout = resolveLayout(loadConfig(options).root);
    const report = await verifyPublication(layout);

    for (const check of report.checks) {
      const mark = check.ok ? chalk.green('✔') : chalk.red('✖');
      console.log(`  ${mark} ${check.name}: ${check.detail}`);
    }
    console.log('');
    ok = report.ok;
  } catch (error) {
    console.error(chalk.red(`❌ ${errorMessage(error)}`));
  }

  if (!ok) {
    console.error(chalk.red('❌ Verification failed'));
    process.exit(1);
  }
  console.log(chalk.green('✅ All checks passed\n'));
}
