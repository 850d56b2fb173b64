/**
 * mailsweep — Account CLI Types
 *
 * The editor core works on an AccountStore and talks to the user through
 * EditorIO, so the prompt library stays at the edge.
 */

import type { AccountStore } from '../../packages/shared/src/index.js';

export interface EditorIO {
  /** Show the menu and return the raw selection */
  choose(): Promise<string>;
  /** Ask for one line of text */
  ask(message: string): Promise<string>;
  /** Ask for a line of text without echoing it */
  secret(message: string): Promise<string>;
  /** Print a line (blank when omitted) */
  print(line?: string): void;
}

/** Raw answers collected by the add flow */
export interface AccountDraft {
  email: string;
  password: string;
  server: string;
  port: string;
  description: string;
}

export type CommandResult =
  | { ok: true; store: AccountStore; message: string }
  | { ok: false; message: string };
