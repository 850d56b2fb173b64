/**
 * @mailsweep/shared — Core utilities for mailsweep
 *
 * Provides the account store, configuration, logging and error types
 * shared by the cleanup agent and the account editor.
 */

// Types
export * from './types.js';

// Configuration
export {
  PROJECT_ROOT,
  loadConfig,
  getPasswordEnvKey,
  resolvePassword,
} from './config.js';

export type { MailsweepConfig } from './config.js';

// Account Store
export {
  AccountStore,
  AccountStoreFile,
  parseAccounts,
  serializeAccounts,
} from './account-store.js';

export type { LoadOptions } from './account-store.js';

// Logging
export { createLogger, isLogLevel, LOG_LEVELS } from './logger.js';
export type { Logger, LoggerOptions, LogLevel } from './logger.js';

// Errors
export {
  ConfigMissingError,
  ConfigMalformedError,
  ValidationError,
  AccountIndexError,
  MailboxError,
  describeError,
} from './errors.js';
