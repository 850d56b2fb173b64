/**
 * Error types and user-friendly error formatting.
 *
 * Maps common socket/TLS errors to readable causes for log lines and
 * editor messages.
 */

import type { FailureKind } from './types.js';

export class ConfigMissingError extends Error {
  constructor(public readonly path: string) {
    super(`Config file not found: ${path}`);
    this.name = 'ConfigMissingError';
  }
}

export class ConfigMalformedError extends Error {
  constructor(public readonly path: string, public readonly detail: string) {
    super(`Config file ${path} is malformed: ${detail}`);
    this.name = 'ConfigMalformedError';
  }
}

export class ValidationError extends Error {
  constructor(public readonly field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class AccountIndexError extends RangeError {
  constructor(public readonly index: number, public readonly size: number) {
    super(`Account index ${index} is out of range (${size} configured)`);
    this.name = 'AccountIndexError';
  }
}

export class MailboxError extends Error {
  constructor(
    public readonly kind: FailureKind,
    message: string,
    public readonly code?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'MailboxError';
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

const CERTIFICATE_CODES = new Set([
  'CERT_HAS_EXPIRED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'ERR_TLS_CERT_ALTNAME_INVALID',
]);

export function describeError(error: unknown): string {
  const code = errorCode(error);
  const message = error instanceof Error ? error.message : String(error);

  // Network
  if (code === 'ETIMEDOUT') {
    return message.includes('timed out') ? message : 'Connection timed out';
  }
  if (code === 'ENOTFOUND' || code === 'EAI_AGAIN') {
    return 'Server not found — check the hostname';
  }
  if (code === 'ECONNREFUSED') {
    return 'Connection refused — check the server and port';
  }
  if (code === 'ECONNRESET' || code === 'EPIPE') {
    return 'Connection reset by server';
  }

  // TLS
  if (code && CERTIFICATE_CODES.has(code)) {
    return `TLS certificate rejected (${code})`;
  }

  return message || 'Unknown error';
}
