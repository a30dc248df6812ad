/**
 * Show Command
 *
 * Display the published public key
 */

import chalk from 'chalk';
import { generateKid, publicKeyToJWK } from '@fleetkey/keys';
import { loadConfig, type CliOptions } from '../config.js';
import { errorMessage } from '../errors.js';
import { KeyStorage } from '../key-storage.js';
import { publicKeyUrl, resolveLayout } from '../layout.js';

export async function showCommand(options: CliOptions): Promise<void> {
  try {
    const config = loadConfig(options);
    const layout = resolveLayout(config.root);
    const publicKey = await new KeyStorage(layout).readPublishedKey();

    if (publicKey === null) {
      throw new Error(
        `No published key found at ${layout.publishedKeyPath}. Run "fleet-key generate" to generate a key pair.`
      );
    }

    console.log(chalk.blue.bold('\n🔑 Published Public Key\n'));
    console.log(chalk.cyan('File:'), layout.publishedKeyPath);
    if (config.domain) {
      console.log(chalk.cyan('URL: '), publicKeyUrl(config.domain));
    }
    console.log(chalk.cyan('Thumbprint:'), generateKid(publicKey));
    console.log('');
    console.log(publicKey.trimEnd());
    console.log('');
    console.log(chalk.cyan('JWK:'));
    console.log(JSON.stringify(publicKeyToJWK(publicKey, undefined, { alg: 'ES256' }), null, 2));
    console.log('');
  } catch (error) {
    console.error(chalk.red(`❌ ${errorMessage(error)}`));
    process.exit(1);
  }
}
