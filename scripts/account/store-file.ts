/**
 * mailsweep — Accounts File Access
 *
 * Locates the accounts file and writes command results back to it.
 */

import { AccountStoreFile, loadConfig } from '../../packages/shared/src/index.js';
import type { CommandResult, EditorIO } from './types.js';

export function openAccountsFile(env: NodeJS.ProcessEnv = process.env): AccountStoreFile {
  return new AccountStoreFile(loadConfig(env).accountsFile);
}

/**
 * Persist a successful command result and report it. Failed results are
 * printed and nothing is written.
 */
export function applyResult(file: AccountStoreFile, io: EditorIO, result: CommandResult): void {
  if (!result.ok) {
    io.print(result.message);
    return;
  }
  file.save(result.store);
  io.print(`✓ Configuration saved to ${file.path}`);
  io.print(result.message);
}
