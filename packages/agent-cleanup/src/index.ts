/**
 * mailsweep Agent: Cleanup
 *
 * Deletes every pending message from each enabled account in the accounts
 * file. Meant to be run from cron; takes no arguments.
 *
 * Exit codes:
 *   0  all attempted accounts cleaned (or nothing to do)
 *   1  unexpected error
 *   2  at least one account failed
 *   3  accounts file not found
 *   4  accounts file malformed
 */

import 'dotenv/config';

import { createLogger, describeError, loadConfig } from '@mailsweep/shared';
import { ExitCode, runJob } from './cleanup.js';
import { openPop3Session } from './pop3.js';

async function main(): Promise<ExitCode> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, file: config.logFile });

  return runJob(config.accountsFile, {
    logger,
    openSession: openPop3Session,
    timeoutMs: config.timeoutMs,
  });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Error:', describeError(error));
    process.exitCode = ExitCode.Fatal;
  });
