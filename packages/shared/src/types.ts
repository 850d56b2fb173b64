/**
 * mailsweep — Shared Type Definitions
 *
 * Core interfaces used by the cleanup agent and the account editor.
 */

// ─── Account Configuration ─────────────────────────────────

/** Default POP3-over-TLS port */
export const DEFAULT_POP3_PORT = 995;

export interface AccountRecord {
  /** Mailbox address, also the POP3 login name */
  email: string;
  /** Plaintext password (MAIL_PASS_* in the environment takes precedence) */
  password: string;
  /** POP3 server hostname */
  server: string;
  /** POP3 server port */
  port: number;
  /** Whether the cleanup job processes this account */
  enabled: boolean;
  /** Free-form note shown in listings */
  description: string;
  /** Fields this tool does not manage, carried through load/save unchanged */
  extra?: Record<string, unknown>;
}

// ─── Cleanup Results ───────────────────────────────────────

/**
 * Where a per-account run failed.
 * `commit` means QUIT failed after deletions were marked, so the outcome
 * on the server is unknown.
 */
export type FailureKind = 'connect' | 'auth' | 'protocol' | 'commit';

export type AccountOutcome =
  | { status: 'succeeded'; email: string; deleted: number }
  | { status: 'failed'; email: string; kind: FailureKind; reason: string; marked: number }
  | { status: 'skipped'; email: string };

export interface CleanupSummary {
  /** Enabled accounts a session was attempted for */
  attempted: number;
  succeeded: number;
  failed: number;
  skipped: number;
  /** Messages deleted across succeeded accounts only */
  totalDeleted: number;
  outcomes: AccountOutcome[];
}
