/**
 * Doctor Command - Diagnose common issues
 *
 * Checks:
 * - Environment file
 * - API key and model id
 * - Static assets
 * - Installed dependencies
 */

import chalk from 'chalk';
import ora from 'ora';
import * as fs from 'fs/promises';
import * as path from 'path';
import { getConfig, isPlausibleModelId } from '../../config/index.js';
import { resolveStaticDir } from '../../web/app.js';

export interface CheckResult {
  ok: boolean;
  message: string;
}

interface Check {
  name: string;
  check: () => Promise<CheckResult>;
}

export async function doctorCommand(): Promise<void> {
  console.log('\n');
  console.log(chalk.cyan('  ─── parley doctor ───'));
  console.log(chalk.gray(`  runtime: node ${process.version}`));
  console.log('\n');

  const checks: Check[] = [
    { name: 'environment file', check: checkEnvFile },
    { name: 'configuration', check: async () => checkConfiguration(process.env) },
    { name: 'anthropic api key', check: async () => checkApiKey(process.env.ANTHROPIC_API_KEY) },
    { name: 'static folder', check: () => checkStaticDir(resolveStaticDir()) },
    { name: 'node modules', check: checkNodeModules },
  ];

  let allPassed = true;

  for (const { name, check } of checks) {
    const spinner = ora({ text: name, prefixText: '  ' }).start();

    try {
      const result = await check();
      if (result.ok) {
        spinner.succeed(chalk.green(name) + chalk.gray(` - ${result.message}`));
      } else {
        spinner.fail(chalk.red(name) + chalk.gray(` - ${result.message}`));
        allPassed = false;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      spinner.fail(chalk.red(name) + chalk.gray(` - ${message}`));
      allPassed = false;
    }
  }

  console.log('\n');

  if (allPassed) {
    console.log(chalk.green('  ✓ all checks passed\n'));
    console.log(chalk.gray('  ready to run: parley serve\n'));
  } else {
    console.log(chalk.yellow('  ⚠ some checks failed\n'));
    process.exitCode = 1;
  }
}

async function checkEnvFile(): Promise<CheckResult> {
  const envPath = path.join(process.cwd(), '.env');
  try {
    await fs.access(envPath);
    return { ok: true, message: '.env file found' };
  } catch {
    return { ok: false, message: 'copy .env.example to .env' };
  }
}

export function checkConfiguration(env: NodeJS.ProcessEnv): CheckResult {
  try {
    const config = getConfig(env);
    if (!isPlausibleModelId(config.model)) {
      return { ok: false, message: `"${config.model}" is not a claude model id (see parley models)` };
    }
    return { ok: true, message: `model ${config.model}` };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) };
  }
}

export function checkApiKey(key: string | undefined): CheckResult {
  if (!key || !key.trim()) {
    return { ok: false, message: 'ANTHROPIC_API_KEY not set' };
  }
  if (!key.trim().startsWith('sk-ant-')) {
    return { ok: false, message: 'invalid key format' };
  }
  return { ok: true, message: 'key configured' };
}

export async function checkStaticDir(dir: string): Promise<CheckResult> {
  try {
    const stat = await fs.stat(dir);
    if (!stat.isDirectory()) {
      return { ok: false, message: `${dir} is not a directory` };
    }
    return { ok: true, message: dir };
  } catch {
    return { ok: false, message: `not found at ${dir}` };
  }
}

async function checkNodeModules(): Promise<CheckResult> {
  const modulesPath = path.join(process.cwd(), 'node_modules');
  try {
    await fs.access(modulesPath);
    return { ok: true, message: 'dependencies installed' };
  } catch {
    return { ok: false, message: 'run `npm install`' };
  }
}
