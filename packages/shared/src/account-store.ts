/**
 * mailsweep — Account Store
 *
 * The account list and its JSON file. `AccountStore` is an immutable value:
 * add/remove/toggle return a new store and leave the receiver untouched.
 * `AccountStoreFile` loads and saves it.
 *
 * The file is the single source of truth and there is no locking: at most
 * one process may write it at a time. An editor saving while the cleanup
 * job is loading can race; callers must serialize access themselves.
 */

import { mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { AccountIndexError, ConfigMalformedError, ConfigMissingError } from './errors.js';
import { DEFAULT_POP3_PORT, type AccountRecord } from './types.js';

// ─── Schema ─────────────────────────────────────────────────

const accountRecordSchema = z
  .object({
    email: z.string().refine(s => s.trim().length > 0, 'email is required'),
    password: z.string().default(''),
    server: z.string().refine(s => s.trim().length > 0, 'server is required'),
    port: z.number().int().min(1).max(65535).default(DEFAULT_POP3_PORT),
    enabled: z.boolean().default(true),
    description: z.string().default(''),
  })
  .passthrough();

const accountsFileSchema = z
  .object({
    accounts: z.array(accountRecordSchema).default([]),
  })
  .passthrough();

function withExtra(record: AccountRecord, extra: Record<string, unknown>): AccountRecord {
  return Object.keys(extra).length > 0 ? { ...record, extra } : record;
}

// ─── Store ──────────────────────────────────────────────────

export class AccountStore {
  constructor(
    public readonly accounts: readonly AccountRecord[] = [],
    /** Top-level keys other than `accounts`, preserved on save */
    public readonly extra: Record<string, unknown> = {},
  ) {}

  get size(): number {
    return this.accounts.length;
  }

  /**
   * Record at a 0-based position.
   */
  get(index: number): AccountRecord {
    this.checkIndex(index);
    return this.accounts[index];
  }

  add(record: AccountRecord): AccountStore {
    return new AccountStore([...this.accounts, record], this.extra);
  }

  remove(index: number): AccountStore {
    this.checkIndex(index);
    return new AccountStore(this.accounts.filter((_, i) => i !== index), this.extra);
  }

  toggle(index: number): AccountStore {
    this.checkIndex(index);
    return new AccountStore(
      this.accounts.map((a, i) => (i === index ? { ...a, enabled: !a.enabled } : a)),
      this.extra,
    );
  }

  /**
   * Persisted shape. Known fields come first in a fixed order, unmanaged
   * fields after them.
   */
  toJSON(): Record<string, unknown> {
    return {
      accounts: this.accounts.map(({ extra, ...record }) => ({
        email: record.email,
        password: record.password,
        server: record.server,
        port: record.port,
        enabled: record.enabled,
        description: record.description,
        ...extra,
      })),
      ...this.extra,
    };
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.accounts.length) {
      throw new AccountIndexError(index, this.accounts.length);
    }
  }
}

// ─── Serialization ──────────────────────────────────────────

export function serializeAccounts(store: AccountStore): string {
  return JSON.stringify(store.toJSON(), null, 2) + '\n';
}

/**
 * Parse the JSON text of an accounts file, applying field defaults.
 *
 * @param source - Path used in error messages
 */
export function parseAccounts(raw: string, source: string): AccountStore {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigMalformedError(source, error instanceof Error ? error.message : String(error));
  }

  const result = accountsFileSchema.safeParse(data);
  if (!result.success) {
    const detail = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigMalformedError(source, detail);
  }

  const { accounts, ...extra } = result.data;
  const records = accounts.map(({ email, password, server, port, enabled, description, ...rest }) =>
    withExtra({ email, password, server, port, enabled, description }, rest),
  );

  return new AccountStore(records, extra);
}

// ─── File ───────────────────────────────────────────────────

export interface LoadOptions {
  /** Throw ConfigMissingError instead of returning an empty store */
  mustExist?: boolean;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class AccountStoreFile {
  constructor(public readonly path: string) {}

  load(options: LoadOptions = {}): AccountStore {
    let raw: string;
    try {
      raw = readFileSync(this.path, 'utf-8');
    } catch (error) {
      if (!isNotFound(error)) throw error;
      if (options.mustExist) throw new ConfigMissingError(this.path);
      return new AccountStore();
    }
    return parseAccounts(raw, this.path);
  }

  /**
   * Write the whole store. The content goes to a temporary file in the same
   * directory which is then renamed over the target, so a crash mid-write
   * leaves the previous file intact.
   */
  save(store: AccountStore): void {
    mkdirSync(dirname(this.path), { recursive: true });
    const tempPath = `${this.path}.${process.pid}.tmp`;
    writeFileSync(tempPath, serializeAccounts(store));
    renameSync(tempPath, this.path);
  }
}
