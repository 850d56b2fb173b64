import { mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AccountStore, AccountStoreFile, parseAccounts, serializeAccounts } from './account-store.js';
import { AccountIndexError, ConfigMalformedError, ConfigMissingError } from './errors.js';
import type { AccountRecord } from './types.js';

function account(overrides: Partial<AccountRecord> = {}): AccountRecord {
  return {
    email: 'a@example.com',
    password: 'test-secret',
    server: 'pop.example.com',
    port: 995,
    enabled: true,
    description: '',
    ...overrides,
  };
}

let dir: string;
let file: AccountStoreFile;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'mailsweep-store-'));
  file = new AccountStoreFile(join(dir, 'accounts.json'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('AccountStoreFile.load', () => {
  it('returns an empty store when the file is absent', () => {
    const store = file.load();
    expect(store.size).toBe(0);
  });

  it('throws ConfigMissingError when the file must exist', () => {
    expect(() => file.load({ mustExist: true })).toThrow(ConfigMissingError);
  });

  it('throws ConfigMalformedError on invalid JSON', () => {
    writeFileSync(file.path, '{"accounts": [');
    expect(() => file.load()).toThrow(ConfigMalformedError);
  });

  it('names the offending field when a record is invalid', () => {
    writeFileSync(file.path, JSON.stringify({ accounts: [{ email: 'a@example.com', password: 'x' }] }));
    expect(() => file.load()).toThrow('accounts.0.server');
  });

  it('rejects a blank server', () => {
    writeFileSync(file.path, JSON.stringify({ accounts: [account({ server: '   ' })] }));
    expect(() => file.load()).toThrow('accounts.0.server: server is required');
  });

  it('rejects a non-integer port', () => {
    writeFileSync(file.path, JSON.stringify({ accounts: [account({ port: 99.5 })] }));
    expect(() => file.load()).toThrow(ConfigMalformedError);
  });

  it('applies defaults for optional fields', () => {
    writeFileSync(file.path, JSON.stringify({
      accounts: [{ email: 'b@example.com', password: 'pw', server: 'pop.example.org' }],
    }));

    expect(file.load().accounts).toEqual([{
      email: 'b@example.com',
      password: 'pw',
      server: 'pop.example.org',
      port: 995,
      enabled: true,
      description: '',
    }]);
  });

  it('treats a missing accounts key as an empty list', () => {
    writeFileSync(file.path, '{}');
    expect(file.load().size).toBe(0);
  });
});

describe('AccountStoreFile.save', () => {
  it('round-trips records exactly', () => {
    const store = new AccountStore([
      account(),
      account({ email: 'b@example.com', port: 110, enabled: false, description: 'old alias' }),
    ]);

    file.save(store);

    expect(file.load()).toEqual(store);
  });

  it('keeps surrounding whitespace in hand-edited values', () => {
    const raw = serializeAccounts(new AccountStore([account({ email: ' a@example.com', server: 'pop.example.com ' })]));
    writeFileSync(file.path, raw);

    const store = file.load();
    file.save(store);

    expect(store.get(0)).toMatchObject({ email: ' a@example.com', server: 'pop.example.com ' });
    expect(readFileSync(file.path, 'utf-8')).toBe(raw);
  });

  it('preserves unknown record fields and top-level keys', () => {
    writeFileSync(file.path, JSON.stringify({
      version: 2,
      accounts: [{ ...account(), forwardTo: 'main@example.com' }],
    }));

    const loaded = file.load();
    expect(loaded.get(0).extra).toEqual({ forwardTo: 'main@example.com' });

    file.save(loaded.toggle(0));
    const saved = JSON.parse(readFileSync(file.path, 'utf-8'));
    expect(saved).toEqual({
      accounts: [{ ...account({ enabled: false }), forwardTo: 'main@example.com' }],
      version: 2,
    });
  });

  it('writes known fields in a fixed order with two-space indentation', () => {
    file.save(new AccountStore([account({ description: 'note' })]));

    expect(readFileSync(file.path, 'utf-8')).toBe(
      '{\n' +
      '  "accounts": [\n' +
      '    {\n' +
      '      "email": "a@example.com",\n' +
      '      "password": "test-secret",\n' +
      '      "server": "pop.example.com",\n' +
      '      "port": 995,\n' +
      '      "enabled": true,\n' +
      '      "description": "note"\n' +
      '    }\n' +
      '  ]\n' +
      '}\n',
    );
  });

  it('leaves no temporary file behind', () => {
    file.save(new AccountStore([account()]));
    expect(readdirSync(dir)).toEqual(['accounts.json']);
  });

  it('creates the parent directory', () => {
    const nested = new AccountStoreFile(join(dir, 'conf', 'accounts.json'));
    nested.save(new AccountStore());
    expect(nested.load().size).toBe(0);
  });
});

describe('AccountStore', () => {
  const store = new AccountStore([
    account({ email: 'a@example.com' }),
    account({ email: 'b@example.com', enabled: false }),
  ]);

  it('adds to the end without touching the original', () => {
    const next = store.add(account({ email: 'c@example.com' }));
    expect(next.accounts.map(a => a.email)).toEqual(['a@example.com', 'b@example.com', 'c@example.com']);
    expect(store.size).toBe(2);
  });

  it('removes by 0-based index', () => {
    expect(store.remove(0).accounts.map(a => a.email)).toEqual(['b@example.com']);
  });

  it('toggles the enabled flag', () => {
    expect(store.toggle(1).get(1).enabled).toBe(true);
    expect(store.toggle(1).toggle(1)).toEqual(store);
  });

  it.each([-1, 2, 0.5])('rejects index %s', (index) => {
    expect(() => store.remove(index)).toThrow(AccountIndexError);
    expect(() => store.toggle(index)).toThrow(AccountIndexError);
  });

  it('rejects any index on an empty store', () => {
    expect(() => new AccountStore().remove(0)).toThrow(AccountIndexError);
  });
});

describe('parseAccounts', () => {
  it('matches what serializeAccounts writes', () => {
    const store = new AccountStore([account({ description: 'x' })], { version: 1 });
    expect(parseAccounts(serializeAccounts(store), 'memory')).toEqual(store);
  });

  it('reports the source path in the error', () => {
    expect(() => parseAccounts('not json', '/etc/accounts.json')).toThrow('/etc/accounts.json');
  });
});
