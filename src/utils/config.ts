import { z } from 'zod';
import * as fs from 'fs-extra';
import * as path from 'path';
import dotenv from 'dotenv';
import { ConverterConfig, RunConfig } from '../types';
import { ConfigError } from './errors';
import { SOURCE_PLACEHOLDER } from '../core/translator';

export const CONFIG_FILE_NAME = 'java2php.config.json';

export const DEFAULT_SYSTEM_PROMPT =
  'You convert Java source files into equivalent PHP 8 source files. ' +
  'Keep class, method and variable names. Reply with the PHP file only, starting with <?php, without Markdown fences or explanations.';

export const DEFAULT_USER_PROMPT = `Java:\n${SOURCE_PLACEHOLDER}\n\nPHP:`;

const ExtensionSchema = z
  .string()
  .min(1)
  .regex(/^[^./\\]+$/, 'Extension must not contain dots or slashes');

const ConfigSchema = z.object({
  openaiApiKey: z.string().min(1).optional(),
  openaiModel: z.string().min(1).default('gpt-4o-mini'),
  baseURL: z.string().url().optional(),
  temperature: z.number().min(0).max(2).default(0),
  maxTokens: z.number().int().positive().optional(),
  systemPrompt: z.string().min(1).default(DEFAULT_SYSTEM_PROMPT),
  userPrompt: z
    .string()
    .includes(SOURCE_PLACEHOLDER, { message: `Prompt must contain ${SOURCE_PLACEHOLDER}` })
    .default(DEFAULT_USER_PROMPT),
  sourceExtension: ExtensionSchema.default('java'),
  targetExtension: ExtensionSchema.default('php'),
  ignoreFiles: z.array(z.string().min(1)).default(['.gitignore', '.ignore']),
  hidden: z.boolean().default(false),
  parallel: z
    .object({
      limit: z.number().int().min(1).optional(),
    })
    .optional(),
});

export function parseConfig(rawConfig: unknown): ConverterConfig {
  try {
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map(issue =>
        `  - ${issue.path.join('.')}: ${issue.message}`
      ).join('\n');
      throw new ConfigError(`Invalid configuration:\n${issues}`);
    }
    throw error;
  }
}

export async function loadConfig(configPath?: string, cwd: string = process.cwd()): Promise<ConverterConfig> {
  dotenv.config({ path: path.join(cwd, '.env') });

  const configFile = configPath ? path.resolve(cwd, configPath) : path.join(cwd, CONFIG_FILE_NAME);

  if (!await fs.pathExists(configFile)) {
    if (configPath) {
      throw new ConfigError(`Configuration file not found: ${configFile}`);
    }
    return parseConfig({});
  }

  let rawConfig: unknown;
  try {
    rawConfig = await fs.readJson(configFile);
  } catch (error) {
    throw new ConfigError(`Cannot read ${configFile}: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parseConfig(rawConfig);
}

export async function saveConfig(config: Partial<ConverterConfig>, configPath?: string): Promise<string> {
  const configFile = configPath || path.join(process.cwd(), CONFIG_FILE_NAME);
  await fs.writeJson(configFile, config, { spaces: 2 });
  return configFile;
}

export function resolvePaths(
  source: string,
  destination: string,
  cwd: string = process.cwd()
): Pick<RunConfig, 'sourceRoot' | 'destinationRoot'> {
  return {
    sourceRoot: path.resolve(cwd, source),
    destinationRoot: path.resolve(cwd, destination),
  };
}

/**
 * Credential precedence: `--api-key`, then `OPENAI_API_KEY`, then the
 * configuration file.
 */
export function resolveRunConfig(
  source: string,
  destination: string,
  options: { apiKey?: string; config: ConverterConfig; env?: NodeJS.ProcessEnv; cwd?: string }
): RunConfig {
  const env = options.env ?? process.env;
  const apiKey = options.apiKey || env.OPENAI_API_KEY || options.config.openaiApiKey;

  if (!apiKey) {
    throw new ConfigError('OpenAI API key is required. Pass --api-key or set OPENAI_API_KEY.');
  }

  return { ...resolvePaths(source, destination, options.cwd), apiKey };
}
