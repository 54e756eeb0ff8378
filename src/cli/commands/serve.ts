/**
 * Serve Command
 *
 * Runs the boot checks, resolves the completion client and starts the web
 * front-end.
 */

import chalk from 'chalk';
import { logConfig } from '../../config/index.js';
import { createApp, handleShutdown, resolveStaticDir, startServer } from '../../web/index.js';
import { createRuntime, loadConfigOrExit } from '../bootstrap.js';
import { checkStaticDir } from './doctor.js';

export interface ServeOptions {
  port?: string;
  host?: string;
}

export async function serveCommand(options: ServeOptions): Promise<void> {
  const config = loadConfigOrExit();

  if (options.port !== undefined) {
    const port = Number(options.port);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      console.error(chalk.red(`\n  ✗ invalid port: ${options.port}\n`));
      process.exit(1);
    }
    config.port = port;
  }

  if (options.host !== undefined) {
    config.host = options.host;
  }

  console.log(chalk.cyan('\n  ─── parley boot check ───'));
  console.log(chalk.gray(`  working directory: ${process.cwd()}`));

  const staticDir = resolveStaticDir();
  const staticCheck = await checkStaticDir(staticDir);
  if (!staticCheck.ok) {
    console.error(chalk.red(`  ✗ static folder ${staticCheck.message}`));
    console.error(chalk.gray('  reinstall parley or restore the public/ folder'));
    process.exit(1);
  }
  console.log(chalk.green('  ✓ found static folder'));

  logConfig(config);

  const { responder } = await createRuntime(config);
  const app = createApp({
    responder,
    historyLimit: config.historyLimit,
    sessionSecret: config.session.secret,
    sessionTtlMs: config.session.ttlMs,
    staticDir,
  });

  const server = await startServer(app, config.port, config.host);
  handleShutdown(server);
}
