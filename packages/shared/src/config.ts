/**
 * mailsweep — Configuration
 *
 * Runtime settings come from environment variables (a .env file at the
 * repository root is loaded by the entry points via dotenv). Paths default
 * to files beside the repository root.
 */

import { fileURLToPath } from 'url';
import { resolve, dirname } from 'path';
import { isLogLevel, type LogLevel } from './logger.js';
import type { AccountRecord } from './types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
export const PROJECT_ROOT = resolve(__dirname, '../../..');

export interface MailsweepConfig {
  /** JSON file holding the account list */
  accountsFile: string;
  /** File the cleanup job appends log lines to */
  logFile: string;
  /** Socket connect/read timeout per account */
  timeoutMs: number;
  logLevel: LogLevel;
}

const DEFAULT_TIMEOUT_SECONDS = 60;

function parseEnvNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? defaultValue : parsed;
}

/**
 * Load configuration from the environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MailsweepConfig {
  const logLevel = env.LOG_LEVEL ?? '';
  return {
    accountsFile: resolve(env.MAILSWEEP_ACCOUNTS_FILE || resolve(PROJECT_ROOT, 'accounts.json')),
    logFile: resolve(env.MAILSWEEP_LOG_FILE || resolve(PROJECT_ROOT, 'mail_cleanup.log')),
    timeoutMs: parseEnvNumber(env.MAILSWEEP_TIMEOUT_SECONDS, DEFAULT_TIMEOUT_SECONDS) * 1000,
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
  };
}

/**
 * Get the environment variable that overrides an account's stored password.
 */
export function getPasswordEnvKey(email: string): string {
  return `MAIL_PASS_${email.toUpperCase().replace(/[^A-Z0-9]/g, '_')}`;
}

/**
 * Resolve the password for an account: environment first, then the record.
 * Returns undefined when neither is set.
 */
export function resolvePassword(
  account: Pick<AccountRecord, 'email' | 'password'>,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const fromEnv = env[getPasswordEnvKey(account.email)];
  if (fromEnv) return fromEnv;
  return account.password || undefined;
}
