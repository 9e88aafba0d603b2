import inquirer from 'inquirer';
import * as fs from 'fs-extra';
import * as path from 'path';
import chalk from 'chalk';
import boxen from 'boxen';
import { z } from 'zod';
import { ConverterConfig } from '../types';
import { CONFIG_FILE_NAME, saveConfig } from '../utils/config';

const InitAnswersSchema = z.object({
  openaiApiKey: z.string(),
  openaiModel: z.string().min(1),
  sourceExtension: z.string().min(1),
  targetExtension: z.string().min(1),
  parallelLimit: z.number().int().min(0),
  hidden: z.boolean(),
});

export type InitAnswers = z.infer<typeof InitAnswersSchema>;

export function validateExtension(input: string): true | string {
  if (!/^[^./\\]+$/.test(input)) {
    return 'Enter the extension without a leading dot, e.g. "java"';
  }
  return true;
}

export function buildConfig(answers: InitAnswers): Partial<ConverterConfig> {
  const config: Partial<ConverterConfig> = {
    openaiModel: answers.openaiModel,
    sourceExtension: answers.sourceExtension,
    targetExtension: answers.targetExtension,
    hidden: answers.hidden,
  };

  // 0 keeps the default: one request per file, all at once.
  if (answers.parallelLimit > 0) {
    config.parallel = { limit: answers.parallelLimit };
  }

  return config;
}

/**
 * Append `OPENAI_API_KEY` to the `.env` file unless one is already there.
 * Returns false when the file already had a key.
 */
export async function saveApiKey(apiKey: string, envPath: string): Promise<boolean> {
  const envContent = `OPENAI_API_KEY=${apiKey}\n`;

  if (!await fs.pathExists(envPath)) {
    await fs.writeFile(envPath, envContent);
    return true;
  }

  const existingEnv = await fs.readFile(envPath, 'utf-8');
  if (/^OPENAI_API_KEY=/m.test(existingEnv)) {
    return false;
  }

  const separator = existingEnv.length === 0 || existingEnv.endsWith('\n') ? '' : '\n';
  await fs.appendFile(envPath, separator + envContent);
  return true;
}

export async function initCommand(): Promise<void> {
  console.log(boxen(
    chalk.bold.cyan('☕ → 🐘  java2php setup'),
    { padding: 1, margin: 1, borderStyle: 'round' }
  ));

  const rawAnswers: unknown = await inquirer.prompt([
    {
      type: 'password',
      name: 'openaiApiKey',
      message: 'OpenAI API key (saved to .env, leave empty to skip):',
      mask: '*',
    },
    {
      type: 'list',
      name: 'openaiModel',
      message: 'Model:',
      choices: [
        { name: 'GPT-4o mini (fast, affordable)', value: 'gpt-4o-mini' },
        { name: 'GPT-4o (higher quality)', value: 'gpt-4o' },
        { name: 'GPT-4.1', value: 'gpt-4.1' },
      ],
      default: 'gpt-4o-mini',
    },
    {
      type: 'input',
      name: 'sourceExtension',
      message: 'Source file extension:',
      default: 'java',
      validate: validateExtension,
    },
    {
      type: 'input',
      name: 'targetExtension',
      message: 'Output file extension:',
      default: 'php',
      validate: validateExtension,
    },
    {
      type: 'number',
      name: 'parallelLimit',
      message: 'Maximum parallel requests (0 = no limit):',
      default: 0,
      validate: (input: number) => {
        if (!Number.isInteger(input) || input < 0) {
          return 'Please enter a whole number, 0 or more';
        }
        return true;
      },
    },
    {
      type: 'confirm',
      name: 'hidden',
      message: 'Convert files inside hidden directories?',
      default: false,
    },
  ]);
  const answers = InitAnswersSchema.parse(rawAnswers);

  const configFile = await saveConfig(buildConfig(answers));
  console.log(chalk.green(`✅ Configuration saved to ${path.basename(configFile)}`));

  if (answers.openaiApiKey) {
    const saved = await saveApiKey(answers.openaiApiKey, path.join(process.cwd(), '.env'));
    if (saved) {
      console.log(chalk.green('✅ API key saved to .env file'));
    } else {
      console.log(chalk.yellow('⚠️  OPENAI_API_KEY already exists in .env file'));
    }
  }

  console.log(boxen(
    chalk.green.bold('🎉 Setup Complete!\n\n') +
    chalk.white('Run ') +
    chalk.cyan('java2php <source> <destination>') +
    chalk.white(` to convert using ${CONFIG_FILE_NAME}.`),
    { padding: 1, margin: 1, borderStyle: 'round' }
  ));
}
