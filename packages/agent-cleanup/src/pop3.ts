/**
 * POP3 session over TLS.
 *
 * Implements only the single-line commands the cleanup agent needs:
 * greeting, USER/PASS, STAT, DELE and QUIT. DELE marks a message; the
 * server removes marked messages when the session ends with QUIT. A
 * connection that drops without QUIT leaves every message in place.
 */

import { connect } from 'tls';
import type { Duplex } from 'stream';
import { MailboxError } from '@mailsweep/shared';

/**
 * The mailbox operations the cleanup agent drives, in order:
 * login → count → markDeleted(1..n) → quit.
 */
export interface MailboxSession {
  login(user: string, password: string): Promise<void>;
  /** Number of messages currently in the maildrop */
  count(): Promise<number>;
  /** Mark a 1-based message number for deletion */
  markDeleted(messageNumber: number): Promise<void>;
  /** End the session, committing marked deletions */
  quit(): Promise<void>;
  /** Drop the connection without committing anything */
  destroy(): void;
}

export interface MailboxTarget {
  host: string;
  port: number;
  timeoutMs: number;
}

export type SessionOpener = (target: MailboxTarget) => Promise<MailboxSession>;

export class Pop3ReplyError extends Error {
  constructor(public readonly command: string, public readonly reply: string) {
    super(`${command} rejected by server: ${reply || 'no reason given'}`);
    this.name = 'Pop3ReplyError';
  }
}

class Pop3TimeoutError extends Error {
  readonly code = 'ETIMEDOUT';

  constructor(timeoutMs: number) {
    super(`Connection timed out after ${timeoutMs / 1000}s`);
    this.name = 'Pop3TimeoutError';
  }
}

interface Waiter {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

export class Pop3Connection implements MailboxSession {
  private buffer = '';
  private readonly lines: string[] = [];
  private readonly waiters: Waiter[] = [];
  private failure: Error | null = null;

  constructor(private readonly socket: Duplex) {
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => this.receive(chunk));
    socket.on('error', (error: Error) => this.fail(error));
    socket.on('close', () => this.fail(new Error('Connection closed by server')));
  }

  /**
   * Wait for the server greeting. Must be called once before any command.
   */
  async greeting(): Promise<string> {
    return this.expectOk('greeting', await this.nextLine());
  }

  async login(user: string, password: string): Promise<void> {
    try {
      await this.send('USER', user);
      await this.send('PASS', password);
    } catch (error) {
      if (error instanceof Pop3ReplyError) {
        throw new MailboxError('auth', `Authentication failed: ${error.reply || 'credentials rejected'}`, undefined, { cause: error });
      }
      throw error;
    }
  }

  async count(): Promise<number> {
    const reply = await this.send('STAT');
    const match = /^(\d+)\s+\d+/.exec(reply);
    if (!match) {
      throw new MailboxError('protocol', `Unexpected STAT reply: ${reply}`);
    }
    return Number(match[1]);
  }

  async markDeleted(messageNumber: number): Promise<void> {
    await this.send('DELE', String(messageNumber));
  }

  async quit(): Promise<void> {
    await this.send('QUIT');
    this.socket.end();
  }

  destroy(): void {
    this.socket.destroy();
  }

  // ─── Wire ──────────────────────────────────────────────

  private async send(command: string, argument?: string): Promise<string> {
    const reply = this.nextLine();
    this.socket.write(argument === undefined ? `${command}\r\n` : `${command} ${argument}\r\n`);
    return this.expectOk(command, await reply);
  }

  private expectOk(command: string, line: string): string {
    if (line.startsWith('+OK')) {
      return line.slice(3).trim();
    }
    throw new Pop3ReplyError(command, line.replace(/^-ERR\s*/, '').trim());
  }

  private nextLine(): Promise<string> {
    const line = this.lines.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.failure) return Promise.reject(this.failure);
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  private receive(chunk: string): void {
    this.buffer += chunk;
    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).replace(/\r$/, '');
      this.buffer = this.buffer.slice(newline + 1);
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter.resolve(line);
      } else {
        this.lines.push(line);
      }
      newline = this.buffer.indexOf('\n');
    }
  }

  private fail(error: Error): void {
    if (!this.failure) this.failure = error;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(this.failure);
    }
  }
}

/**
 * Open a TLS connection to a POP3 server and wait for its greeting.
 * `timeoutMs` applies to the connect and to every reply after it.
 */
export async function openPop3Session(target: MailboxTarget): Promise<MailboxSession> {
  const socket = connect({ host: target.host, port: target.port, timeout: target.timeoutMs });
  socket.on('timeout', () => socket.destroy(new Pop3TimeoutError(target.timeoutMs)));

  const connection = new Pop3Connection(socket);
  try {
    await connection.greeting();
  } catch (error) {
    connection.destroy();
    throw error;
  }
  return connection;
}
