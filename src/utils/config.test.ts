import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import {
  CONFIG_FILE_NAME,
  DEFAULT_USER_PROMPT,
  loadConfig,
  parseConfig,
  resolvePaths,
  resolveRunConfig,
  saveConfig,
} from './config';
import { ConfigError } from './errors';
import { createTempDir, removeDirs } from '../testing/fixtures';

describe('parseConfig', () => {
  it('fills in defaults', () => {
    expect(parseConfig({})).toMatchObject({
      openaiModel: 'gpt-4o-mini',
      temperature: 0,
      userPrompt: DEFAULT_USER_PROMPT,
      sourceExtension: 'java',
      targetExtension: 'php',
      ignoreFiles: ['.gitignore', '.ignore'],
      hidden: false,
    });
    expect(parseConfig({}).parallel).toBeUndefined();
  });

  it('keeps the default prompt templated on the source', () => {
    expect(DEFAULT_USER_PROMPT).toBe('Java:\n{{source}}\n\nPHP:');
  });

  it('lists every invalid field', () => {
    const parse = () => parseConfig({ userPrompt: 'Convert this', sourceExtension: '.java', parallel: { limit: 0 } });

    expect(parse).toThrow(ConfigError);
    expect(parse).toThrow(
      'Invalid configuration:\n' +
      '  - userPrompt: Prompt must contain {{source}}\n' +
      '  - sourceExtension: Extension must not contain dots or slashes\n' +
      '  - parallel.limit: Number must be greater than or equal to 1'
    );
  });
});

describe('loadConfig', () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await createTempDir();
  });

  afterEach(async () => {
    await removeDirs([cwd]);
  });

  it('uses defaults when there is no configuration file', async () => {
    const config = await loadConfig(undefined, cwd);
    expect(config.openaiModel).toBe('gpt-4o-mini');
  });

  it('reads the default configuration file from the working directory', async () => {
    await fs.writeJson(path.join(cwd, CONFIG_FILE_NAME), { openaiModel: 'gpt-4o', parallel: { limit: 3 } });

    const config = await loadConfig(undefined, cwd);
    expect(config.openaiModel).toBe('gpt-4o');
    expect(config.parallel).toEqual({ limit: 3 });
  });

  it('reads an explicit configuration file relative to the working directory', async () => {
    await fs.outputJson(path.join(cwd, 'conf', 'custom.json'), { targetExtension: 'inc' });

    const config = await loadConfig('conf/custom.json', cwd);
    expect(config.targetExtension).toBe('inc');
  });

  it('fails when an explicit configuration file is missing', async () => {
    await expect(loadConfig('missing.json', cwd)).rejects.toThrow(
      new ConfigError(`Configuration file not found: ${path.join(cwd, 'missing.json')}`)
    );
  });

  it('fails on malformed JSON', async () => {
    await fs.outputFile(path.join(cwd, CONFIG_FILE_NAME), '{ not json');
    await expect(loadConfig(undefined, cwd)).rejects.toBeInstanceOf(ConfigError);
  });

  it('round-trips through saveConfig', async () => {
    const file = path.join(cwd, CONFIG_FILE_NAME);
    await saveConfig({ openaiModel: 'gpt-4.1', hidden: true }, file);

    const config = await loadConfig(undefined, cwd);
    expect(config).toMatchObject({ openaiModel: 'gpt-4.1', hidden: true });
  });
});

describe('resolveRunConfig', () => {
  const config = parseConfig({ openaiApiKey: 'config-key' });

  it('prefers the command-line key', () => {
    const run = resolveRunConfig('src', 'out', {
      apiKey: 'cli-key',
      config,
      env: { OPENAI_API_KEY: 'env-key' },
      cwd: '/work',
    });
    expect(run).toEqual({ sourceRoot: '/work/src', destinationRoot: '/work/out', apiKey: 'cli-key' });
  });

  it('falls back to the environment, then the configuration file', () => {
    expect(resolveRunConfig('src', 'out', { config, env: { OPENAI_API_KEY: 'env-key' } }).apiKey).toBe('env-key');
    expect(resolveRunConfig('src', 'out', { config, env: {} }).apiKey).toBe('config-key');
  });

  it('requires a key', () => {
    expect(() => resolveRunConfig('src', 'out', { config: parseConfig({}), env: {} })).toThrow(ConfigError);
  });
});

describe('resolvePaths', () => {
  it('keeps absolute paths', () => {
    expect(resolvePaths('/abs/src', 'out', '/work')).toEqual({
      sourceRoot: '/abs/src',
      destinationRoot: '/work/out',
    });
  });
});
