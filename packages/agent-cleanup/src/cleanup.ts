/**
 * mailsweep Agent: Mailbox Cleanup
 *
 * Walks the account list in order and empties every enabled mailbox.
 * Each account yields an AccountOutcome; failures are recorded and the
 * run moves on to the next account.
 */

import {
  AccountStoreFile,
  ConfigMalformedError,
  ConfigMissingError,
  MailboxError,
  describeError,
  resolvePassword,
  type AccountOutcome,
  type AccountRecord,
  type CleanupSummary,
  type FailureKind,
  type Logger,
} from '@mailsweep/shared';
import type { MailboxSession, SessionOpener } from './pop3.js';

export interface CleanupOptions {
  logger: Logger;
  openSession: SessionOpener;
  timeoutMs: number;
  /** Source of MAIL_PASS_* overrides */
  env?: NodeJS.ProcessEnv;
}

export const ExitCode = {
  Success: 0,
  Fatal: 1,
  PartialFailure: 2,
  ConfigMissing: 3,
  ConfigMalformed: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

type Phase = 'connect' | 'auth' | 'protocol' | 'commit';

function failureKind(phase: Phase, error: unknown): FailureKind {
  // Marks were sent, so any error at QUIT leaves the result unknown
  if (phase === 'commit') return 'commit';
  if (error instanceof MailboxError) return error.kind;
  return phase === 'auth' ? 'connect' : phase;
}

// ─── Single Account ──────────────────────────────────────

export async function cleanupAccount(
  account: AccountRecord,
  options: CleanupOptions,
): Promise<AccountOutcome> {
  const { email } = account;
  const log = options.logger.child({ account: email });
  log.info('Processing account');

  const password = resolvePassword(account, options.env);
  if (!password) {
    log.error('No password configured');
    return { status: 'failed', email, kind: 'auth', reason: 'No password configured', marked: 0 };
  }

  let session: MailboxSession | undefined;
  let phase: Phase = 'connect';
  let marked = 0;

  try {
    log.info(`Connecting to ${account.server}:${account.port}...`);
    session = await options.openSession({
      host: account.server,
      port: account.port,
      timeoutMs: options.timeoutMs,
    });

    phase = 'auth';
    log.info('Connected. Authenticating...');
    await session.login(email, password);

    phase = 'protocol';
    log.info('Logged in. Listing messages...');
    const count = await session.count();
    log.info(`Found ${count} messages`);

    for (let messageNumber = 1; messageNumber <= count; messageNumber++) {
      await session.markDeleted(messageNumber);
      marked = messageNumber;
    }

    phase = 'commit';
    await session.quit();
    session = undefined;

    if (count > 0) {
      log.info(`Deleted ${count} messages`);
    } else {
      log.info('No messages to delete');
    }
    return { status: 'succeeded', email, deleted: count };
  } catch (error) {
    const kind = failureKind(phase, error);
    const reason = describeError(error);

    if (kind === 'commit') {
      log.error(
        { kind, marked },
        `Commit failed after marking ${marked} messages; deletions may not have been applied - ${reason}`,
      );
    } else {
      log.error({ kind }, `Error - ${reason}`);
    }
    return { status: 'failed', email, kind, reason, marked };
  } finally {
    // Dropping the connection without QUIT discards any marks
    session?.destroy();
  }
}

// ─── Batch ───────────────────────────────────────────────

export function summarize(outcomes: AccountOutcome[]): CleanupSummary {
  let succeeded = 0;
  let failed = 0;
  let skipped = 0;
  let totalDeleted = 0;

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'succeeded':
        succeeded++;
        totalDeleted += outcome.deleted;
        break;
      case 'failed':
        failed++;
        break;
      case 'skipped':
        skipped++;
        break;
    }
  }

  return { attempted: succeeded + failed, succeeded, failed, skipped, totalDeleted, outcomes };
}

/**
 * Clean every enabled account in list order, one at a time.
 */
export async function runCleanup(
  accounts: readonly AccountRecord[],
  options: CleanupOptions,
): Promise<CleanupSummary> {
  const { logger } = options;

  if (accounts.length === 0) {
    logger.warn('No accounts configured');
    return summarize([]);
  }

  const enabledCount = accounts.filter(a => a.enabled).length;
  if (enabledCount > 0) {
    logger.info(`Starting cleanup for ${enabledCount} of ${accounts.length} account(s)`);
  }

  const outcomes: AccountOutcome[] = [];
  for (const account of accounts) {
    if (!account.enabled) {
      logger.info({ account: account.email }, 'Skipping disabled account');
      outcomes.push({ status: 'skipped', email: account.email });
      continue;
    }
    outcomes.push(await cleanupAccount(account, options));
  }

  const summary = summarize(outcomes);

  if (enabledCount === 0) {
    logger.warn('No enabled accounts to clean up');
    return summary;
  }

  logger.info(
    `Cleanup completed: ${summary.succeeded}/${summary.attempted} accounts succeeded, ` +
    `${summary.skipped} skipped, ${summary.totalDeleted} total messages deleted`,
  );

  if (summary.failed > 0) {
    const failedEmails = outcomes.flatMap(o => (o.status === 'failed' ? [o.email] : []));
    logger.warn(`${summary.failed} account(s) failed: ${failedEmails.join(', ')}`);
  }

  return summary;
}

export function exitCodeFor(summary: CleanupSummary): ExitCode {
  return summary.failed > 0 ? ExitCode.PartialFailure : ExitCode.Success;
}

// ─── Job ─────────────────────────────────────────────────

/**
 * Load the accounts file and clean every enabled account. A missing or
 * malformed file is logged and mapped to its exit code; no account is
 * touched in that case.
 */
export async function runJob(accountsFile: string, options: CleanupOptions): Promise<ExitCode> {
  let accounts: readonly AccountRecord[];
  try {
    accounts = new AccountStoreFile(accountsFile).load({ mustExist: true }).accounts;
  } catch (error) {
    if (error instanceof ConfigMissingError) {
      options.logger.error(error.message);
      return ExitCode.ConfigMissing;
    }
    if (error instanceof ConfigMalformedError) {
      options.logger.error(error.message);
      return ExitCode.ConfigMalformed;
    }
    throw error;
  }

  return exitCodeFor(await runCleanup(accounts, options));
}
