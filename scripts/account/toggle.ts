/**
 * mailsweep — Enable/Disable Account Flow
 */

import type { AccountStoreFile } from '../../packages/shared/src/index.js';
import { toggleAccount } from './commands.js';
import { renderAccounts } from './list.js';
import { applyResult } from './store-file.js';
import type { EditorIO } from './types.js';

export async function runToggleAccount(file: AccountStoreFile, io: EditorIO): Promise<void> {
  const store = file.load();

  io.print();
  for (const line of renderAccounts(store.accounts)) {
    io.print(line);
  }

  if (store.size === 0) {
    io.print('✗ Nothing to enable or disable');
    return;
  }

  const selector = await io.ask('Enter account number to enable/disable:');
  applyResult(file, io, toggleAccount(store, selector));
}
