import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  AuthenticationError,
  DiskFullError,
  IntegrityError,
  PermissionDeniedError,
  SizeLimitExceededError,
  TransientNetworkError,
  ZipvaultAbortError,
  ZipvaultError,
  ZipvaultIOError,
  ZipvaultProtocolError,
  ZipvaultTimeoutError,
  ZipvaultValidationError,
} from '@zipvault/core';
import {
  displayError,
  exitCodeForKind,
  EXIT_SUCCESS,
  EXIT_ERROR,
  EXIT_USAGE,
  EXIT_NETWORK,
  EXIT_PROTOCOL,
  EXIT_FS,
  EXIT_AUTH,
  EXIT_CANCELLED,
} from '../src/lib/errors.js';

describe('exit codes', () => {
  it('has correct values', () => {
    expect(EXIT_SUCCESS).toBe(0);
    expect(EXIT_ERROR).toBe(1);
    expect(EXIT_USAGE).toBe(2);
    expect(EXIT_NETWORK).toBe(3);
    expect(EXIT_PROTOCOL).toBe(4);
    expect(EXIT_FS).toBe(5);
    expect(EXIT_AUTH).toBe(6);
    expect(EXIT_CANCELLED).toBe(130);
  });

  it('maps error kinds', () => {
    expect(exitCodeForKind('Aborted')).toBe(EXIT_CANCELLED);
    expect(exitCodeForKind('IntegrityError')).toBe(EXIT_PROTOCOL);
    expect(exitCodeForKind('DiskFull')).toBe(EXIT_FS);
    expect(exitCodeForKind('PermissionDenied')).toBe(EXIT_AUTH);
    expect(exitCodeForKind('SizeLimitExceeded')).toBe(EXIT_ERROR);
    expect(exitCodeForKind('Unknown')).toBe(EXIT_ERROR);
  });
});

describe('displayError', () => {
  // Suppress console output during tests
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns EXIT_CANCELLED for aborts', () => {
    expect(displayError(new ZipvaultAbortError())).toBe(EXIT_CANCELLED);
  });

  it('returns EXIT_USAGE for validation errors', () => {
    expect(displayError(new ZipvaultValidationError('bad input'))).toBe(EXIT_USAGE);
  });

  it('returns EXIT_NETWORK for transient failures and timeouts', () => {
    expect(displayError(new TransientNetworkError('connection reset'))).toBe(EXIT_NETWORK);
    expect(displayError(new ZipvaultTimeoutError())).toBe(EXIT_NETWORK);
  });

  it('returns EXIT_PROTOCOL for protocol and integrity errors', () => {
    expect(displayError(new ZipvaultProtocolError('bad response'))).toBe(EXIT_PROTOCOL);
    expect(displayError(new IntegrityError('short read'))).toBe(EXIT_PROTOCOL);
  });

  it('returns EXIT_FS for local filesystem errors', () => {
    expect(displayError(new ZipvaultIOError('cannot read', { path: '/data/a.txt' }))).toBe(EXIT_FS);
    expect(displayError(new DiskFullError())).toBe(EXIT_FS);
    expect(displayError(Object.assign(new Error('ENOENT: no such file or directory'), { code: 'ENOENT' }))).toBe(EXIT_FS);
  });

  it('returns EXIT_AUTH for rejected credentials', () => {
    expect(displayError(new AuthenticationError())).toBe(EXIT_AUTH);
    expect(displayError(new PermissionDeniedError())).toBe(EXIT_AUTH);
  });

  it('prints a hint for size limits', () => {
    const hints: unknown[] = [];
    vi.spyOn(console, 'error').mockImplementation((line: unknown) => {
      hints.push(line);
    });
    expect(displayError(new SizeLimitExceededError('too big', { sizeBytes: 10 }))).toBe(EXIT_ERROR);
    expect(hints[hints.length - 1]).toBe('  Lower ceiling-mb or enable the chunked backend.');
  });

  it('returns EXIT_ERROR for generic errors', () => {
    expect(displayError(new ZipvaultError('something went wrong'))).toBe(EXIT_ERROR);
    expect(displayError(new Error('unknown error'))).toBe(EXIT_ERROR);
  });

  it('returns EXIT_ERROR for non-Error objects', () => {
    expect(displayError('string error')).toBe(EXIT_ERROR);
    expect(displayError(42)).toBe(EXIT_ERROR);
    expect(displayError(null)).toBe(EXIT_ERROR);
  });
});
