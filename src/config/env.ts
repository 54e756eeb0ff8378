/**
 * Parley Configuration
 * Environment-driven settings for the completion client and web server
 */

import { randomBytes } from 'node:crypto';
import chalk from 'chalk';
import { z } from 'zod';
import { ConfigurationError } from '../chat/errors.js';
import { DEFAULT_HISTORY_LIMIT } from '../chat/transcript.js';
import { DEFAULT_MODEL, isPlausibleModelId } from './models.js';

export interface ParleyConfig {
  apiKey: string | null;
  model: string;
  maxTokens: number;
  timeoutMs: number;
  historyLimit: number;
  verifyModel: boolean;
  session: {
    secret: string;
    /** True when no SESSION_SECRET was set and one was generated for this process */
    ephemeral: boolean;
    /** Idle lifetime of a session, applied to the cookie and the store */
    ttlMs: number;
  };
  host: string;
  port: number;
}

export interface ConfigValidation {
  valid: boolean;
  warnings: string[];
  errors: string[];
}

const booleanFlag = z
  .preprocess(
    value => (typeof value === 'string' ? value.toLowerCase() : value),
    z.enum(['true', 'false', '1', '0', 'yes', 'no'])
  )
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  PARLEY_MODEL: z.string().default(DEFAULT_MODEL),
  PARLEY_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  PARLEY_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  PARLEY_HISTORY_LIMIT: z.coerce.number().int().positive().default(DEFAULT_HISTORY_LIMIT),
  PARLEY_VERIFY_MODEL: booleanFlag.default('true'),
  SESSION_SECRET: z.string().optional(),
  PARLEY_SESSION_TTL_MS: z.coerce.number().int().positive().default(86_400_000),
  HOST: z.string().default('127.0.0.1'),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
});

/**
 * Unset and blank variables both fall back to defaults
 */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

/**
 * Read configuration from the environment.
 *
 * Throws ConfigurationError naming the first offending variable when a value
 * is present but malformed. A missing API key is not an error here; it is
 * reported by validateConfig and by the completion client factory.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): ParleyConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const setting = issue.path.join('.');
    throw new ConfigurationError(`Invalid ${setting}: ${issue.message}`, setting);
  }

  const vars = parsed.data;

  return {
    apiKey: vars.ANTHROPIC_API_KEY ?? null,
    model: vars.PARLEY_MODEL,
    maxTokens: vars.PARLEY_MAX_TOKENS,
    timeoutMs: vars.PARLEY_TIMEOUT_MS,
    historyLimit: vars.PARLEY_HISTORY_LIMIT,
    verifyModel: vars.PARLEY_VERIFY_MODEL,
    session: {
      secret: vars.SESSION_SECRET ?? randomBytes(24).toString('hex'),
      ephemeral: vars.SESSION_SECRET === undefined,
      ttlMs: vars.PARLEY_SESSION_TTL_MS,
    },
    host: vars.HOST,
    port: vars.PORT,
  };
}

export function validateConfig(config: ParleyConfig): ConfigValidation {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (!config.apiKey) {
    errors.push('ANTHROPIC_API_KEY not set - replies are disabled');
  }

  if (!isPlausibleModelId(config.model)) {
    warnings.push(`PARLEY_MODEL "${config.model}" does not look like a Claude model id`);
  }

  if (config.session.ephemeral) {
    warnings.push('SESSION_SECRET not set - sessions reset on restart');
  }

  if (config.host !== '127.0.0.1' && config.host !== 'localhost' && config.host !== '::1') {
    warnings.push(`HOST ${config.host} exposes the chat beyond this machine`);
  }

  if (!config.verifyModel) {
    warnings.push('Model verification disabled - a bad model id shows up on first message');
  }

  return {
    valid: errors.length === 0,
    warnings,
    errors,
  };
}

/**
 * Log current configuration on startup
 */
export function logConfig(config: ParleyConfig): void {
  const validation = validateConfig(config);
  const row = (label: string, value: string) =>
    console.log(`  ${chalk.gray(label.padEnd(16))}${value}`);

  console.log();
  console.log(chalk.cyan.bold('  parley configuration'));
  row('model', config.model);
  row('api key', config.apiKey ? chalk.green('configured') : chalk.red('not set'));
  row('history limit', `${config.historyLimit} turns`);
  row('timeout', `${config.timeoutMs}ms`);
  row('listen', `${config.host}:${config.port}`);
  row('session ttl', `${config.session.ttlMs}ms`);

  for (const warning of validation.warnings) {
    console.log(chalk.yellow(`  ! ${warning}`));
  }
  for (const error of validation.errors) {
    console.log(chalk.red(`  ✗ ${error}`));
  }
  console.log();
}
