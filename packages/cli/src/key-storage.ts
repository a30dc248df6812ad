/**
 * Key Storage for fleet-key CLI
 *
 * Reads and writes the key files of one layout
 */

import { readFile, writeFile, mkdir, copyFile, chmod } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import type { KeyLayout } from './types.js';

export class KeyStorage {
  constructor(private layout: KeyLayout) {}

  /**
   * Create the keys directory and the well-known publish directory
   */
  async ensureDirectories(): Promise<void> {
    await mkdir(this.layout.keysDir, { recursive: true });
    await mkdir(this.layout.wellKnownDir, { recursive: true });
  }

  /**
   * Write the private key, readable by the owner only.
   * `mode` applies to new files; an existing file is narrowed with chmod.
   */
  async writePrivateKey(pem: string): Promise<void> {
    await writeFile(this.layout.privateKeyPath, pem, { encoding: 'utf-8', mode: 0o600 });
    await chmod(this.layout.privateKeyPath, 0o600);
  }

  async writePublicKey(pem: string): Promise<void> {
    await writeFile(this.layout.publicKeyPath, pem, 'utf-8');
  }

  /**
   * Copy the working public key to the publish path
   */
  async publish(): Promise<void> {
    await copyFile(this.layout.publicKeyPath, this.layout.publishedKeyPath);
  }

  async readPrivateKey(): Promise<string | null> {
    return this.readIfExists(this.layout.privateKeyPath);
  }

  async readPublicKey(): Promise<string | null> {
    return this.readIfExists(this.layout.publicKeyPath);
  }

  async readPublishedKey(): Promise<string | null> {
    return this.readIfExists(this.layout.publishedKeyPath);
  }

  private async readIfExists(path: string): Promise<string | null> {
    if (!existsSync(path)) {
      return null;
    }
    return readFile(path, 'utf-8');
  }
}
