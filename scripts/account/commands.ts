/**
 * mailsweep — Editor Commands
 *
 * The menu's closed command set. Each command is a pure function from the
 * current store and the user's raw answers to a new store plus a message;
 * on bad input it returns the message alone and the caller persists nothing.
 */

import {
  AccountIndexError,
  DEFAULT_POP3_PORT,
  ValidationError,
  type AccountRecord,
  type AccountStore,
} from '../../packages/shared/src/index.js';
import type { AccountDraft, CommandResult } from './types.js';

export const MENU = [
  { key: '1', command: 'list', label: 'List accounts' },
  { key: '2', command: 'add', label: 'Add account' },
  { key: '3', command: 'remove', label: 'Remove account' },
  { key: '4', command: 'toggle', label: 'Enable/Disable account' },
  { key: '5', command: 'exit', label: 'Exit' },
] as const;

export type EditorCommand = (typeof MENU)[number]['command'];

export function parseMenuChoice(raw: string): EditorCommand | undefined {
  return MENU.find(item => item.key === raw.trim())?.command;
}

/**
 * Port from user input; blank, non-numeric or out-of-range input gives 995.
 */
export function parsePort(raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return DEFAULT_POP3_PORT;
  const port = Number(trimmed);
  return port >= 1 && port <= 65535 ? port : DEFAULT_POP3_PORT;
}

/**
 * Convert a 1-based account number typed by the user to a 0-based index.
 */
export function parseSelector(raw: string, size: number): number {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ValidationError('selector', 'Invalid input');
  }
  const index = Number(trimmed) - 1;
  if (index < 0 || index >= size) {
    throw new ValidationError('selector', 'Invalid account number');
  }
  return index;
}

export function buildAccount(draft: AccountDraft): AccountRecord {
  const email = draft.email.trim();
  const server = draft.server.trim();
  const password = draft.password.trim();

  if (!email.includes('@')) {
    throw new ValidationError('email', 'Enter a valid email address');
  }
  if (!password) {
    throw new ValidationError('password', 'Password is required');
  }
  if (!server) {
    throw new ValidationError('server', 'POP3 server is required');
  }

  return {
    email,
    password,
    server,
    port: parsePort(draft.port),
    enabled: true,
    description: draft.description.trim(),
  };
}

function attempt(run: () => CommandResult): CommandResult {
  try {
    return run();
  } catch (error) {
    if (error instanceof ValidationError || error instanceof AccountIndexError) {
      return { ok: false, message: `✗ ${error.message}` };
    }
    throw error;
  }
}

// ─── Commands ────────────────────────────────────────────

export function addAccount(store: AccountStore, draft: AccountDraft): CommandResult {
  return attempt(() => {
    const account = buildAccount(draft);
    return { ok: true, store: store.add(account), message: `✓ Added account: ${account.email}` };
  });
}

export function removeAccount(store: AccountStore, selector: string): CommandResult {
  return attempt(() => {
    const index = parseSelector(selector, store.size);
    const removed = store.get(index);
    return { ok: true, store: store.remove(index), message: `✓ Removed account: ${removed.email}` };
  });
}

export function toggleAccount(store: AccountStore, selector: string): CommandResult {
  return attempt(() => {
    const index = parseSelector(selector, store.size);
    const next = store.toggle(index);
    const account = next.get(index);
    const status = account.enabled ? 'enabled' : 'disabled';
    return { ok: true, store: next, message: `✓ Account ${account.email} is now ${status}` };
  });
}
