/**
 * mailsweep — Remove Account Flow
 *
 * Shows the numbered list and removes the account the user picks.
 */

import type { AccountStoreFile } from '../../packages/shared/src/index.js';
import { removeAccount } from './commands.js';
import { renderAccounts } from './list.js';
import { applyResult } from './store-file.js';
import type { EditorIO } from './types.js';

export async function runRemoveAccount(file: AccountStoreFile, io: EditorIO): Promise<void> {
  const store = file.load();

  io.print();
  for (const line of renderAccounts(store.accounts)) {
    io.print(line);
  }

  if (store.size === 0) {
    io.print('✗ Nothing to remove');
    return;
  }

  const selector = await io.ask('Enter account number to remove:');
  applyResult(file, io, removeAccount(store, selector));
}
