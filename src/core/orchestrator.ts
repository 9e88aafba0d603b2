import * as fs from 'fs/promises';
import { Stats } from 'fs';
import * as path from 'path';
import pLimit from 'p-limit';
import {
  ConversionOutcome,
  ConversionTask,
  RunConfig,
  RunSummary,
  WalkEntry,
} from '../types';
import {
  ConfigError,
  ConverterError,
  FileSystemError,
  describeError,
} from '../utils/errors';
import { ensureDirectory, ensureParentDir, mapDestination, mirrorPath, replaceExtension } from './path-mapper';
import { ProgressReporter } from './progress';
import { Translator } from './translator';
import { walk } from './walker';

export interface PlanOptions {
  sourceExtension: string;
  targetExtension: string;
  ignoreFiles: string[];
  hidden: boolean;
}

export interface ConverterOptions extends PlanOptions {
  /** Maximum conversions in flight. Unbounded when absent. */
  concurrency?: number;
  progress?: ProgressReporter;
  onOutcome?: (outcome: ConversionOutcome) => void;
}

export type SourceKind = 'file' | 'directory';
export type RunPaths = Pick<RunConfig, 'sourceRoot' | 'destinationRoot'>;

export class Converter {
  private translator: Translator;
  private options: ConverterOptions;

  constructor(translator: Translator, options: ConverterOptions) {
    this.translator = translator;
    this.options = options;
  }

  async run(config: RunConfig): Promise<RunSummary> {
    const startTime = Date.now();
    const kind = await validateRun(config);

    if (kind === 'file') {
      const task = singleFileTask(config, this.options);
      await ensureParentDir(task.destinationPath);
      const outcome = await this.convertFile(task);
      this.options.onOutcome?.(outcome);
      return summarize('file', [outcome], startTime);
    }

    const outcomes = await this.convertTree(config);
    return summarize('tree', outcomes, startTime);
  }

  /**
   * Read, translate and write one file. Never rejects: errors become a
   * failure outcome carrying the destination path.
   */
  async convertFile(task: ConversionTask): Promise<ConversionOutcome> {
    try {
      const content = await readSource(task.sourcePath);

      const translated = await this.translator.translate(content);

      await fs.writeFile(task.destinationPath, translated, 'utf-8').catch((error: unknown) => {
        throw new FileSystemError(task.destinationPath, error);
      });

      return { status: 'success', task };
    } catch (error) {
      const cause = toConverterError(error);
      return {
        status: 'failure',
        task,
        error: cause,
        message: `${task.destinationPath}: ${cause.message}`,
      };
    }
  }

  private async convertTree(config: RunPaths): Promise<ConversionOutcome[]> {
    const progress = this.options.progress ?? new ProgressReporter();
    const limit = pLimit(this.options.concurrency ?? Infinity);
    const pending: Promise<ConversionOutcome>[] = [];

    progress.start();

    try {
      for await (const entry of walkSource(config.sourceRoot, this.options)) {
        if (entry.type === 'directory') {
          await ensureDirectory(mirrorPath(config.sourceRoot, config.destinationRoot, entry.path));
          continue;
        }

        const task = treeTask(config, entry, this.options);
        progress.addTotal();
        pending.push(
          limit(async () => {
            const outcome = await this.convertFile(task);
            if (outcome.status === 'failure') {
              progress.reportFailure(outcome.message);
            }
            progress.increment();
            this.options.onOutcome?.(outcome);
            return outcome;
          })
        );
      }
    } catch (error) {
      // Let whatever was already spawned finish before giving up on the run.
      await Promise.allSettled(pending);
      progress.finish();
      throw error;
    }

    progress.setTotal(pending.length);
    const outcomes = await Promise.all(pending);
    progress.finish();

    return outcomes;
  }
}

/**
 * Tasks a run would perform. Nothing is created or translated.
 */
export async function planConversion(config: RunPaths, options: PlanOptions): Promise<ConversionTask[]> {
  const kind = await validateRun(config);

  if (kind === 'file') {
    return [singleFileTask(config, options)];
  }

  const tasks: ConversionTask[] = [];
  for await (const entry of walkSource(config.sourceRoot, options)) {
    if (entry.type === 'file') {
      tasks.push(treeTask(config, entry, options));
    }
  }
  return tasks;
}

export async function validateRun(config: RunPaths): Promise<SourceKind> {
  const destination = await statOrUndefined(config.destinationRoot);
  if (!destination?.isDirectory()) {
    throw new ConfigError(`${config.destinationRoot}: Not a directory`);
  }

  const source = await statOrUndefined(config.sourceRoot);
  if (source?.isFile()) {
    return 'file';
  }
  if (source?.isDirectory()) {
    return 'directory';
  }
  throw new ConfigError(`${config.sourceRoot}: No such file or directory`);
}

function walkSource(root: string, options: PlanOptions): AsyncGenerator<WalkEntry> {
  return walk(root, {
    extension: options.sourceExtension,
    ignoreFiles: options.ignoreFiles,
    hidden: options.hidden,
  });
}

function singleFileTask(config: RunPaths, options: PlanOptions): ConversionTask {
  const fileName = path.basename(config.sourceRoot);
  return {
    sourcePath: config.sourceRoot,
    destinationPath: replaceExtension(path.join(config.destinationRoot, fileName), options.targetExtension),
  };
}

function treeTask(config: RunPaths, entry: WalkEntry, options: PlanOptions): ConversionTask {
  return {
    sourcePath: entry.path,
    destinationPath: mapDestination(config.sourceRoot, config.destinationRoot, entry.path, options.targetExtension),
  };
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Source files must be valid UTF-8; undecodable bytes fail the file. */
async function readSource(sourcePath: string): Promise<string> {
  try {
    return utf8.decode(await fs.readFile(sourcePath));
  } catch (error) {
    throw new FileSystemError(sourcePath, error);
  }
}

async function statOrUndefined(target: string): Promise<Stats | undefined> {
  try {
    return await fs.stat(target);
  } catch {
    return undefined;
  }
}

function toConverterError(error: unknown): ConverterError {
  if (error instanceof ConverterError) {
    return error;
  }
  return new ConverterError(describeError(error), { cause: error });
}

function summarize(mode: RunSummary['mode'], outcomes: ConversionOutcome[], startTime: number): RunSummary {
  const failed = outcomes.filter((outcome) => outcome.status === 'failure').length;
  return {
    mode,
    outcomes,
    succeeded: outcomes.length - failed,
    failed,
    duration: (Date.now() - startTime) / 1000,
  };
}
