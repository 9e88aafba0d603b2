import * as fs from 'fs/promises';
import * as path from 'path';
import { FileSystemError, InvalidPathError, errorCode } from '../utils/errors';

/**
 * Swap the last extension of the file name for `extension`, or append it when
 * the name has none.
 */
export function replaceExtension(filePath: string, extension: string): string {
  const { dir, name } = path.parse(filePath);
  return path.join(dir, `${name}.${extension}`);
}

/**
 * Re-root `target` from `sourceRoot` under `destinationRoot`, keeping its
 * relative path.
 */
export function mirrorPath(sourceRoot: string, destinationRoot: string, target: string): string {
  const relative = path.relative(path.resolve(sourceRoot), path.resolve(target));

  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new InvalidPathError(target, sourceRoot);
  }

  return path.join(destinationRoot, relative);
}

export function mapDestination(
  sourceRoot: string,
  destinationRoot: string,
  sourceFile: string,
  extension: string
): string {
  return replaceExtension(mirrorPath(sourceRoot, destinationRoot, sourceFile), extension);
}

/**
 * Create `dir` unless it is already a directory. Parents are not created.
 */
export async function ensureDirectory(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir);
    return;
  } catch (error) {
    if (errorCode(error) !== 'EEXIST') {
      throw new FileSystemError(dir, error);
    }
  }

  const stats = await fs.stat(dir).catch((error: unknown) => {
    throw new FileSystemError(dir, error);
  });
  if (!stats.isDirectory()) {
    throw new FileSystemError(dir, new Error(`${dir}: Not a directory`));
  }
}

export async function ensureParentDir(filePath: string): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
}
