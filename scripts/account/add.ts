/**
 * mailsweep — Add Account Flow
 *
 * Collects the fields of a new account and appends it to the accounts file.
 */

import type { AccountStoreFile } from '../../packages/shared/src/index.js';
import { addAccount } from './commands.js';
import { applyResult } from './store-file.js';
import type { AccountDraft, EditorIO } from './types.js';

export async function runAddAccount(file: AccountStoreFile, io: EditorIO): Promise<void> {
  io.print();
  io.print('=== Add New Account ===');

  const draft: AccountDraft = {
    email: await io.ask('Email address:'),
    password: await io.secret('Password:'),
    server: await io.ask('POP3 server:'),
    port: await io.ask('POP3 port [995]:'),
    description: await io.ask('Description (optional):'),
  };

  applyResult(file, io, addAccount(file.load(), draft));
}
