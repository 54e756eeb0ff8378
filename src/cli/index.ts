#!/usr/bin/env node
/**
 * Parley CLI
 *
 * Commands:
 *   serve     - Start the web chat front-end
 *   chat      - Chat in the terminal
 *   models    - List models available to your API key
 *   doctor    - Diagnose issues
 *   version   - Show version and runtime info
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { serveCommand } from './commands/serve.js';

const VERSION = '0.1.0';

process.on('unhandledRejection', (reason) => {
  console.error(chalk.red('\n  ✗ unhandled error'));
  console.error(chalk.gray(`  ${reason}`));
  console.error(chalk.gray('\n  run `parley doctor` to check your setup\n'));
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  console.error(chalk.red('\n  ✗ unexpected error'));
  console.error(chalk.gray(`  ${error.message}`));
  console.error(chalk.gray('\n  run `parley doctor` to check your setup\n'));
  process.exit(1);
});

const program = new Command();

program
  .name('parley')
  .description('minimal web chat front-end for a hosted language model')
  .version(VERSION);

program
  .command('serve')
  .alias('start')
  .description('start the web chat front-end')
  .option('-p, --port <port>', 'port to listen on (default: $PORT or 5000)')
  .option('-H, --host <host>', 'interface to bind (default: $HOST or 127.0.0.1)')
  .action(serveCommand);

program
  .command('chat')
  .description('chat in the terminal')
  .action(async () => {
    const { chatCommand } = await import('./commands/chat.js');
    await chatCommand();
  });

program
  .command('models')
  .description('list models available to your api key')
  .action(async () => {
    const { modelsCommand } = await import('./commands/models.js');
    await modelsCommand();
  });

program
  .command('doctor')
  .description('diagnose common issues')
  .action(async () => {
    const { doctorCommand } = await import('./commands/doctor.js');
    await doctorCommand();
  });

program
  .command('version')
  .description('show version and runtime info')
  .action(() => {
    console.log(chalk.cyan('\n  parley') + chalk.gray(` v${VERSION}`));
    console.log(chalk.gray(`  runtime: node ${process.version}\n`));
  });

await program.parseAsync();
