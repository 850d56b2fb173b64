/**
 * mailsweep — Account Management CLI
 *
 * Interactive editor for the accounts file used by the cleanup agent.
 *
 * Usage:
 *   npm run accounts
 */

import 'dotenv/config';

import { describeError } from '../../packages/shared/src/index.js';
import { runAccountMenu } from './menu.js';
import { terminalIO } from './prompts.js';
import { openAccountsFile } from './store-file.js';

async function main() {
  await runAccountMenu(openAccountsFile(), terminalIO);
}

main().catch((error: unknown) => {
  if (error instanceof Error && error.name === 'ExitPromptError') {
    // User pressed Ctrl+C during prompts
    console.log('\n  Cancelled.');
    process.exit(0);
  }
  console.error('Error:', describeError(error));
  process.exit(1);
});
