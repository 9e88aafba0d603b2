#!/usr/bin/env node

import { program } from 'commander';
import chalk from 'chalk';
import boxen from 'boxen';
import { readFileSync } from 'fs';
import { join } from 'path';
import { initCommand } from './commands/init';
import { convertCommand } from './commands/convert';

// package.json sits one level above dist/ and src/.
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, '../package.json'), 'utf-8')
);

const banner = boxen(
  chalk.bold.cyan('☕ → 🐘  java2php\n') +
  chalk.gray('Convert Java source trees to PHP with OpenAI'),
  { padding: 1, margin: 0, borderStyle: 'round' }
);

program
  .name('java2php')
  .description('Convert Java files to PHP using an OpenAI chat model')
  .version(packageJson.version)
  .addHelpText('before', banner + '\n');

program
  .command('init')
  .description('Create a configuration file with an interactive wizard')
  .action(async () => {
    try {
      await initCommand();
    } catch (error) {
      console.error(chalk.red('Error:'), error);
      process.exit(1);
    }
  });

// Convert command (default)
program
  .command('convert', { isDefault: true })
  .description('Convert a Java file, or every Java file under a directory')
  .argument('<source>', 'source file or directory')
  .argument('<destination>', 'destination directory (must exist)')
  .option('-k, --api-key <key>', 'OpenAI API key (default: OPENAI_API_KEY)')
  .option('-c, --config <path>', 'path to configuration file')
  .option('-m, --model <name>', 'model to use')
  .option('-j, --concurrency <n>', 'maximum parallel requests (default: no limit)')
  .option('--hidden', 'include hidden files and directories')
  .option('-d, --dry-run', 'list the files that would be converted without calling the API')
  .option('-v, --verbose', 'print each converted file')
  .action(convertCommand);

program.parse(process.argv);
