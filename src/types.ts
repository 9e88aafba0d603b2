import type { ConverterError } from './utils/errors';

export interface ConverterConfig {
  openaiApiKey?: string;
  openaiModel: string;
  baseURL?: string;
  temperature: number;
  maxTokens?: number;
  systemPrompt: string;
  userPrompt: string;
  sourceExtension: string;
  targetExtension: string;
  ignoreFiles: string[];
  hidden: boolean;
  parallel?: {
    limit?: number;
  };
}

/** Inputs of a single run. Read-only once created. */
export interface RunConfig {
  readonly sourceRoot: string;
  readonly destinationRoot: string;
  readonly apiKey: string;
}

export interface ConversionTask {
  readonly sourcePath: string;
  readonly destinationPath: string;
}

export type ConversionOutcome =
  | { status: 'success'; task: ConversionTask }
  | { status: 'failure'; task: ConversionTask; error: ConverterError; message: string };

export interface WalkEntry {
  type: 'file' | 'directory';
  path: string;
}

export interface ProgressState {
  total: number;
  completed: number;
}

export interface RunSummary {
  mode: 'file' | 'tree';
  outcomes: ConversionOutcome[];
  succeeded: number;
  failed: number;
  /** Seconds. */
  duration: number;
}
