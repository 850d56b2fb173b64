import { resolve } from 'path';
import { describe, expect, it } from 'vitest';
import { PROJECT_ROOT, getPasswordEnvKey, loadConfig, resolvePassword } from './config.js';

describe('loadConfig', () => {
  it('defaults to files at the repository root', () => {
    const config = loadConfig({});
    expect(config).toEqual({
      accountsFile: resolve(PROJECT_ROOT, 'accounts.json'),
      logFile: resolve(PROJECT_ROOT, 'mail_cleanup.log'),
      timeoutMs: 60_000,
      logLevel: 'info',
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      MAILSWEEP_ACCOUNTS_FILE: '/srv/mailsweep/accounts.json',
      MAILSWEEP_LOG_FILE: '/var/log/mailsweep.log',
      MAILSWEEP_TIMEOUT_SECONDS: '15',
      LOG_LEVEL: 'debug',
    });
    expect(config).toEqual({
      accountsFile: '/srv/mailsweep/accounts.json',
      logFile: '/var/log/mailsweep.log',
      timeoutMs: 15_000,
      logLevel: 'debug',
    });
  });

  it('ignores an unusable timeout or log level', () => {
    const config = loadConfig({ MAILSWEEP_TIMEOUT_SECONDS: 'soon', LOG_LEVEL: 'loud' });
    expect(config.timeoutMs).toBe(60_000);
    expect(config.logLevel).toBe('info');
  });
});

describe('getPasswordEnvKey', () => {
  it('upper-cases the address and replaces separators', () => {
    expect(getPasswordEnvKey('jane.doe@example.com')).toBe('MAIL_PASS_JANE_DOE_EXAMPLE_COM');
  });

  it('replaces a hyphen, unlike the older key that kept it', () => {
    expect(getPasswordEnvKey('jean-luc@example.com')).toBe('MAIL_PASS_JEAN_LUC_EXAMPLE_COM');
  });

  it('replaces every non-alphanumeric character', () => {
    expect(getPasswordEnvKey('a+b-c@mail.example.org')).toBe('MAIL_PASS_A_B_C_MAIL_EXAMPLE_ORG');
  });
});

describe('resolvePassword', () => {
  const account = { email: 'jane@example.com', password: 'from-file' };

  it('prefers the environment', () => {
    expect(resolvePassword(account, { MAIL_PASS_JANE_EXAMPLE_COM: 'from-env' })).toBe('from-env');
  });

  it('falls back to the record', () => {
    expect(resolvePassword(account, {})).toBe('from-file');
  });

  it('returns undefined when neither is set', () => {
    expect(resolvePassword({ ...account, password: '' }, {})).toBeUndefined();
  });
});
