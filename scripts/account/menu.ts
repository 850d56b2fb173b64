/**
 * mailsweep — Account Menu
 *
 * The interactive loop: show the menu, run the chosen flow, repeat until
 * the user picks Exit. Bad input ends the current iteration only.
 */

import type { AccountStoreFile } from '../../packages/shared/src/index.js';
import { runAddAccount } from './add.js';
import { parseMenuChoice } from './commands.js';
import { runListAccounts } from './list.js';
import { runRemoveAccount } from './remove.js';
import { runToggleAccount } from './toggle.js';
import type { EditorIO } from './types.js';

export async function runAccountMenu(file: AccountStoreFile, io: EditorIO): Promise<void> {
  for (;;) {
    io.print();
    io.print('=== Mail Cleanup Account Manager ===');

    const command = parseMenuChoice(await io.choose());

    switch (command) {
      case 'list':
        runListAccounts(file, io);
        break;
      case 'add':
        await runAddAccount(file, io);
        break;
      case 'remove':
        await runRemoveAccount(file, io);
        break;
      case 'toggle':
        await runToggleAccount(file, io);
        break;
      case 'exit':
        io.print('Goodbye!');
        return;
      case undefined:
        io.print('✗ Invalid option');
        break;
    }
  }
}
