import * as path from 'path';
import chalk from 'chalk';
import ora from 'ora';
import boxen from 'boxen';
import { z } from 'zod';
import { ConversionOutcome, ConversionTask, ConverterConfig, RunSummary } from '../types';
import { loadConfig, resolvePaths, resolveRunConfig } from '../utils/config';
import { ConfigError, describeError } from '../utils/errors';
import { Converter, PlanOptions, planConversion } from '../core/orchestrator';
import { ProgressReporter } from '../core/progress';
import { OpenAITranslator, createOpenAIClient } from '../core/translator';

const ConvertOptionsSchema = z.object({
  apiKey: z.string().optional(),
  config: z.string().optional(),
  model: z.string().min(1).optional(),
  concurrency: z.coerce.number().int().min(1).optional(),
  hidden: z.boolean().optional(),
  dryRun: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

export type ConvertOptions = z.input<typeof ConvertOptionsSchema>;

export async function convertCommand(
  source: string,
  destination: string,
  opts: ConvertOptions
): Promise<void> {
  const spinner = ora('Loading configuration...').start();

  try {
    const parsed = ConvertOptionsSchema.safeParse(opts);
    if (!parsed.success) {
      throw new ConfigError(parsed.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`).join('\n'));
    }
    const options = parsed.data;

    const config = await loadConfig(options.config);
    if (options.model) {
      config.openaiModel = options.model;
    }
    if (options.hidden) {
      config.hidden = true;
    }
    spinner.stop();

    const planOptions: PlanOptions = {
      sourceExtension: config.sourceExtension,
      targetExtension: config.targetExtension,
      ignoreFiles: config.ignoreFiles,
      hidden: config.hidden,
    };

    if (options.dryRun) {
      const plan = await planConversion(resolvePaths(source, destination), planOptions);
      displayPlan(plan, config);
      return;
    }

    const runConfig = resolveRunConfig(source, destination, { apiKey: options.apiKey, config });
    const translator = new OpenAITranslator(
      createOpenAIClient({ apiKey: runConfig.apiKey, baseURL: config.baseURL }),
      {
        model: config.openaiModel,
        temperature: config.temperature,
        maxTokens: config.maxTokens,
        systemPrompt: config.systemPrompt,
        userPrompt: config.userPrompt,
      }
    );

    const progress = new ProgressReporter();
    const converter = new Converter(translator, {
      ...planOptions,
      concurrency: options.concurrency ?? config.parallel?.limit,
      progress,
      onOutcome: options.verbose ? (outcome) => logSuccess(outcome, progress) : undefined,
    });

    const summary = await converter.run(runConfig);

    if (summary.mode === 'file') {
      const [outcome] = summary.outcomes;
      if (outcome.status === 'failure') {
        console.error(chalk.red('Error:'), outcome.message);
        process.exitCode = 1;
        return;
      }
      console.log(chalk.green('✓') + ` ${chalk.gray(outcome.task.sourcePath)} → ${chalk.cyan(outcome.task.destinationPath)}`);
      return;
    }

    displayResults(summary);
  } catch (error) {
    spinner.stop();
    console.error(chalk.red('Error:'), describeError(error));
    process.exit(1);
  }
}

function logSuccess(outcome: ConversionOutcome, progress: ProgressReporter): void {
  if (outcome.status !== 'success') return;
  progress.print(chalk.green('✓') + ` ${chalk.gray(path.relative(process.cwd(), outcome.task.destinationPath))}`);
}

function displayPlan(plan: ConversionTask[], config: ConverterConfig): void {
  console.log(boxen(
    chalk.yellow.bold('🔍 DRY RUN MODE\n\n') +
    chalk.white('Files to convert: ') + chalk.cyan(plan.length) + '\n' +
    chalk.white('Model: ') + chalk.cyan(config.openaiModel) + '\n' +
    chalk.white('Mapping: ') + chalk.cyan(`.${config.sourceExtension} → .${config.targetExtension}`),
    { padding: 1, margin: 1, borderStyle: 'round' }
  ));

  plan.forEach(task => {
    console.log(chalk.gray(`  - ${task.sourcePath} → ${task.destinationPath}`));
  });
}

function displayResults(summary: RunSummary): void {
  const total = summary.succeeded + summary.failed;

  console.log(boxen(
    chalk.green.bold('✨ Conversion Complete!\n\n') +
    chalk.white('Total files: ') + chalk.cyan(total) + '\n' +
    chalk.white('Converted: ') + chalk.green(summary.succeeded) + '\n' +
    chalk.white('Failed: ') + (summary.failed > 0 ? chalk.red : chalk.green)(summary.failed) + '\n' +
    chalk.white('Duration: ') + chalk.cyan(`${summary.duration.toFixed(1)}s`),
    { padding: 1, margin: 1, borderStyle: 'round' }
  ));
}
