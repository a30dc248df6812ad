import { mkdtemp, readdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, relative } from 'node:path';

export async function makeTempRoot(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'fleet-key-test-'));
}

/**
 * Every regular file under `dir`, relative to it and sorted
 */
export async function listFiles(dir: string, base: string = dir): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(path, base)));
    } else if (entry.isFile()) {
      files.push(relative(base, path));
    }
  }
  return files.sort();
}
