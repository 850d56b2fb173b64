/**
 * mailsweep — Terminal Prompts
 *
 * EditorIO backed by @inquirer/prompts.
 */

import { input, password, select } from '@inquirer/prompts';
import { MENU } from './commands.js';
import type { EditorIO } from './types.js';

export const terminalIO: EditorIO = {
  choose: () =>
    select({
      message: 'Select option:',
      choices: MENU.map(item => ({
        name: `${item.key}. ${item.label}`,
        value: item.key,
      })),
    }),
  ask: (message) => input({ message }),
  secret: (message) => password({ message, mask: '*' }),
  print: (line = '') => console.log(line ? `  ${line}` : ''),
};
