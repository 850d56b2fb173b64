/**
 * mailsweep — List Accounts
 *
 * Renders configured accounts as a numbered table.
 */

import type { AccountRecord, AccountStoreFile } from '../../packages/shared/src/index.js';
import type { EditorIO } from './types.js';

export function formatStatus(account: AccountRecord): string {
  return account.enabled ? '✓ Enabled' : '✗ Disabled';
}

export function renderAccounts(accounts: readonly AccountRecord[]): string[] {
  if (accounts.length === 0) {
    return ['No accounts configured.'];
  }

  // Calculate column widths
  const numberWidth = Math.max(1, String(accounts.length).length);
  const emailWidth = Math.max(5, ...accounts.map(a => a.email.length));
  const serverWidth = Math.max(6, ...accounts.map(a => a.server.length));
  const portWidth = Math.max(4, ...accounts.map(a => String(a.port).length));
  const statusWidth = Math.max(6, ...accounts.map(a => formatStatus(a).length));

  const header = [
    '#'.padEnd(numberWidth),
    'Email'.padEnd(emailWidth),
    'Server'.padEnd(serverWidth),
    'Port'.padEnd(portWidth),
    'Status'.padEnd(statusWidth),
    'Description',
  ].join('  ');

  const rows = accounts.map((account, i) =>
    [
      String(i + 1).padEnd(numberWidth),
      account.email.padEnd(emailWidth),
      account.server.padEnd(serverWidth),
      String(account.port).padEnd(portWidth),
      formatStatus(account).padEnd(statusWidth),
      account.description,
    ].join('  ').trimEnd(),
  );

  return [header, '-'.repeat(header.length), ...rows];
}

export function runListAccounts(file: AccountStoreFile, io: EditorIO): void {
  io.print();
  for (const line of renderAccounts(file.load().accounts)) {
    io.print(line);
  }
}
