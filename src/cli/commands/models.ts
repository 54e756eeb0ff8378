/**
 * Models Command - list models available to the configured API key
 */

import chalk from 'chalk';
import ora from 'ora';
import { createAnthropic, listModels } from '../../clients/anthropic/client.js';
import { loadConfigOrExit } from '../bootstrap.js';

export async function modelsCommand(): Promise<void> {
  const config = loadConfigOrExit();

  if (!config.apiKey) {
    console.error(chalk.red('\n  ✗ ANTHROPIC_API_KEY not set\n'));
    process.exit(1);
  }

  const spinner = ora({ text: 'fetching models', prefixText: ' ' }).start();

  try {
    const models = await listModels(createAnthropic(config).models);
    spinner.stop();

    console.log(chalk.cyan('\n  available models:'));
    for (const model of models) {
      const marker = model.id === config.model ? chalk.green(' (configured)') : '';
      console.log(`  ${model.id}${chalk.gray(` - ${model.display_name}`)}${marker}`);
    }
    console.log();
  } catch (error) {
    spinner.fail(chalk.red('could not list models'));
    console.error(chalk.gray(`  ${error instanceof Error ? error.message : String(error)}\n`));
    process.exit(1);
  }
}
