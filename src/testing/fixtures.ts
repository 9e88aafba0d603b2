import * as fs from 'fs-extra';
import { mkdtemp } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

export async function createTempDir(prefix = 'java2php-'): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

/** Write `files` (relative path → content) under `root`, creating directories. */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    await fs.outputFile(path.join(root, relativePath), content);
  }
}

export async function removeDirs(dirs: string[]): Promise<void> {
  await Promise.all(dirs.map((dir) => fs.remove(dir)));
}
