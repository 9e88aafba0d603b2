import { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import ignore from 'ignore';
import { WalkEntry } from '../types';
import { DiscoveryError, describeError, errorCode } from '../utils/errors';

export interface WalkOptions {
  /** Extension of the files to yield, without the dot. Case-sensitive. */
  extension: string;
  /** Rule files read in every visited directory. */
  ignoreFiles: string[];
  /** Visit entries whose name starts with a dot. */
  hidden: boolean;
}

export const DEFAULT_WALK_OPTIONS: WalkOptions = {
  extension: 'java',
  ignoreFiles: ['.gitignore', '.ignore'],
  hidden: false,
};

type Ignore = ReturnType<typeof ignore>;

interface IgnoreLayer {
  base: string;
  rules: Ignore;
}

/**
 * Pre-order walk of `root`, the root itself first. Every directory is yielded
 * before anything beneath it. Directories excluded by ignore rules or hidden
 * are never read.
 */
export async function* walk(
  root: string,
  options: Partial<WalkOptions> = {}
): AsyncGenerator<WalkEntry> {
  const settings = { ...DEFAULT_WALK_OPTIONS, ...options };

  const ancestors = await loadAncestorLayers(root, settings.ignoreFiles);

  yield { type: 'directory', path: root };
  yield* visit(root, ancestors, settings);
}

/**
 * Rule files above `root`, outermost first. The search stops at the
 * repository root (the first directory holding `.git`) or the filesystem root.
 */
async function loadAncestorLayers(root: string, ignoreFiles: string[]): Promise<IgnoreLayer[]> {
  const layers: IgnoreLayer[] = [];
  if (ignoreFiles.length === 0) return layers;

  let dir = path.resolve(root);
  while (!(await exists(path.join(dir, '.git')))) {
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
    const rules = await loadIgnoreRules(dir, ignoreFiles);
    if (rules) layers.unshift({ base: dir, rules });
  }

  return layers;
}

async function* visit(dir: string, parentLayers: IgnoreLayer[], options: WalkOptions): AsyncGenerator<WalkEntry> {
  const entries = await readDirectory(dir);
  const rules = await loadIgnoreRules(dir, options.ignoreFiles);
  const layers = rules ? [...parentLayers, { base: dir, rules }] : parentLayers;
  const suffix = `.${options.extension}`;

  for (const entry of entries) {
    if (!options.hidden && entry.name.startsWith('.')) continue;

    const entryPath = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      if (isIgnored(layers, entryPath, true)) continue;
      yield { type: 'directory', path: entryPath };
      yield* visit(entryPath, layers, options);
    } else if (entry.name.endsWith(suffix) && entry.name !== suffix && (await isRegularFile(entry, entryPath))) {
      if (isIgnored(layers, entryPath, false)) continue;
      yield { type: 'file', path: entryPath };
    }
  }
}

/** Links to files count as files; links to directories are never descended. */
async function isRegularFile(entry: Dirent, entryPath: string): Promise<boolean> {
  if (!entry.isSymbolicLink()) {
    return entry.isFile();
  }
  try {
    return (await fs.stat(entryPath)).isFile();
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return false;
    throw new DiscoveryError(`${entryPath}: ${describeError(error)}`, { cause: error });
  }
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch {
    return false;
  }
}

async function readDirectory(dir: string): Promise<Dirent[]> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (error) {
    throw new DiscoveryError(`${dir}: ${describeError(error)}`, { cause: error });
  }
}

async function loadIgnoreRules(dir: string, ignoreFiles: string[]): Promise<Ignore | undefined> {
  let rules: Ignore | undefined;

  for (const name of ignoreFiles) {
    let content: string;
    try {
      content = await fs.readFile(path.join(dir, name), 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT' || errorCode(error) === 'EISDIR') continue;
      throw new DiscoveryError(`${path.join(dir, name)}: ${describeError(error)}`, { cause: error });
    }
    rules = (rules ?? ignore()).add(content);
  }

  return rules;
}

/**
 * The deepest layer with an opinion on the path decides, so a nested
 * `!pattern` can re-include what a parent excluded.
 */
function isIgnored(layers: IgnoreLayer[], entryPath: string, isDirectory: boolean): boolean {
  for (let i = layers.length - 1; i >= 0; i--) {
    const layer = layers[i];
    let relative = path.relative(layer.base, entryPath).split(path.sep).join('/');
    if (isDirectory) {
      relative += '/';
    }

    const result = layer.rules.test(relative);
    if (result.ignored) return true;
    if (result.unignored) return false;
  }
  return false;
}
