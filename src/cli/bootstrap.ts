/**
 * Shared startup for CLI commands: read configuration and resolve the
 * completion client into a responder.
 */

import chalk from 'chalk';
import { ChatResponder, isConfigurationError } from '../chat/index.js';
import { createCompletionClient } from '../clients/anthropic/client.js';
import { getConfig, type ParleyConfig } from '../config/index.js';

export interface Runtime {
  config: ParleyConfig;
  responder: ChatResponder;
}

/**
 * Read configuration, exiting with a readable message when it is malformed
 */
export function loadConfigOrExit(): ParleyConfig {
  try {
    return getConfig();
  } catch (error) {
    if (isConfigurationError(error)) {
      console.error(chalk.red(`\n  ✗ ${error.message}\n`));
      process.exit(1);
    }
    throw error;
  }
}

export async function createRuntime(config: ParleyConfig): Promise<Runtime> {
  const client = await createCompletionClient(config);

  if (!client.ok) {
    console.error(chalk.yellow(`  ! ${client.error.message}`));
    console.error(chalk.gray('  replies will report that the model is not initialized\n'));
  }

  return { config, responder: new ChatResponder(client) };
}
