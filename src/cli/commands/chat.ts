/**
 * Chat Command
 *
 * Terminal chat over the same transcript and responder the web front-end uses.
 */

import chalk from 'chalk';
import readline from 'readline';
import {
  createTranscript,
  turnText,
  windowTranscript,
  type ChatResponder,
} from '../../chat/index.js';
import type { Transcript } from '../../types/index.js';
import { createRuntime, loadConfigOrExit } from '../bootstrap.js';

// =============================================================================
// CLI INTERFACE
// =============================================================================

function createReadline(): readline.Interface {
  return readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: chalk.cyan('you: '),
  });
}

/**
 * The web page renders <br>; the terminal wants real line breaks
 */
export function toTerminalText(text: string): string {
  return text.replace(/<br>/g, '\n');
}

function printReply(text: string, failed: boolean): void {
  console.log();
  const body = toTerminalText(text);
  console.log(chalk.green('parley: ') + (failed ? chalk.red(body) : body));
  console.log();
}

function printWelcome(transcript: Transcript): void {
  console.log();
  console.log(chalk.cyan.bold('  parley chat'));
  console.log(chalk.gray('  Type "exit" or "quit" to leave, /help for commands'));
  console.log();
  for (const turn of transcript) {
    printReply(turnText(turn), false);
  }
}

// =============================================================================
// CHAT LOOP
// =============================================================================

export type LineOutcome = 'continue' | 'exit';

/**
 * Handles terminal input one line at a time. Lines that arrive while a reply
 * is pending wait their turn, so every exchange sees the one before it.
 */
export class ChatLoop {
  private history: Transcript = createTranscript();
  private queue: Promise<unknown> = Promise.resolve();
  private responder: ChatResponder;
  private historyLimit: number;

  constructor(responder: ChatResponder, historyLimit: number) {
    this.responder = responder;
    this.historyLimit = historyLimit;
  }

  get transcript(): Transcript {
    return this.history;
  }

  submit(line: string): Promise<LineOutcome> {
    const handled = this.queue.then(() => this.handle(line));
    this.queue = handled.catch(() => undefined);
    return handled;
  }

  private async handle(line: string): Promise<LineOutcome> {
    const input = line.trim();

    if (input.toLowerCase() === 'exit' || input.toLowerCase() === 'quit') {
      return 'exit';
    }

    if (!input) {
      return 'continue';
    }

    if (input.startsWith('/')) {
      this.runCommand(input);
      return 'continue';
    }

    const exchange = await this.responder.exchange(this.history, input);
    this.history = windowTranscript(exchange.transcript, this.historyLimit);

    const reply = this.history[this.history.length - 1];
    printReply(turnText(reply), !exchange.result.ok);
    return 'continue';
  }

  private runCommand(input: string): void {
    if (input === '/clear') {
      this.history = createTranscript();
      console.log(chalk.gray('  Conversation cleared.'));
    } else if (input === '/help') {
      console.log();
      console.log(chalk.gray('  Commands:'));
      console.log(chalk.gray('    /clear  - Clear conversation history'));
      console.log(chalk.gray('    /help   - Show this help'));
      console.log(chalk.gray('    exit    - Exit chat'));
      console.log();
    } else {
      console.log(chalk.gray(`  Unknown command: ${input}`));
    }
  }
}

// =============================================================================
// MAIN COMMAND
// =============================================================================

export async function chatCommand(): Promise<void> {
  console.log(chalk.gray('  Initializing...'));

  const config = loadConfigOrExit();
  const { responder } = await createRuntime(config);

  const loop = new ChatLoop(responder, config.historyLimit);
  const rl = createReadline();

  printWelcome(loop.transcript);
  rl.prompt();

  rl.on('line', (line) => {
    loop
      .submit(line)
      .then(outcome => {
        if (outcome === 'exit') {
          console.log(chalk.gray('\n  Goodbye!\n'));
          rl.close();
          return;
        }
        rl.prompt();
      })
      .catch((error: unknown) => {
        console.error(chalk.red('  Chat failed:'), error instanceof Error ? error.message : error);
        rl.prompt();
      });
  });

  rl.on('close', () => {
    process.exit(0);
  });
}
