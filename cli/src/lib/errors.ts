import { errorCodeOf, errorKindOf, isAbortError, type ErrorKind } from '@zipvault/core';
import { printError, printHint, printWarning, printBlank } from './output.js';

export const EXIT_SUCCESS = 0;
export const EXIT_ERROR = 1;
export const EXIT_USAGE = 2;
export const EXIT_NETWORK = 3;
export const EXIT_PROTOCOL = 4;
export const EXIT_FS = 5;
export const EXIT_AUTH = 6;
export const EXIT_CANCELLED = 130;

const FS_CODES = new Set(['ENOENT', 'EACCES', 'EPERM', 'EISDIR', 'ENOTDIR', 'ENOSPC', 'EDQUOT', 'EROFS']);

const HINTS: Partial<Record<ErrorKind, string>> = {
  TransientNetworkError: 'Check that the backend URL is correct and the server is running.',
  AuthenticationError: 'Check the token: zipvault config set token <token>, or set ZIPVAULT_TOKEN.',
  PermissionDenied: 'The token is valid but not allowed to perform this operation.',
  SizeLimitExceeded: 'Lower ceiling-mb or enable the chunked backend.',
  DiskFull: 'Free some space in the state directory and try again.',
};

/** Exit code for a failure of the given kind. */
export function exitCodeForKind(kind: ErrorKind): number {
  switch (kind) {
    case 'Aborted':
      return EXIT_CANCELLED;
    case 'Validation':
      return EXIT_USAGE;
    case 'TransientNetworkError':
      return EXIT_NETWORK;
    case 'Protocol':
    case 'IntegrityError':
      return EXIT_PROTOCOL;
    case 'IOError':
    case 'DiskFull':
      return EXIT_FS;
    case 'AuthenticationError':
    case 'PermissionDenied':
      return EXIT_AUTH;
    default:
      return EXIT_ERROR;
  }
}

export function displayError(err: unknown): number {
  if (isAbortError(err)) {
    printWarning('Operation cancelled.');
    return EXIT_CANCELLED;
  }

  const kind = errorKindOf(err);
  const message = err instanceof Error ? err.message : String(err);

  if (kind === 'Unknown') {
    const code = errorCodeOf(err);
    printError(message);
    return code !== undefined && FS_CODES.has(code) ? EXIT_FS : EXIT_ERROR;
  }

  printError(message);
  const hint = HINTS[kind];
  if (hint) printHint(hint);
  return exitCodeForKind(kind);
}

export function exitUsage(message: string): never {
  printError(message);
  printHint('Run "zipvault --help" for usage information.');
  printBlank();
  process.exit(EXIT_USAGE);
}

export function exitError(message: string, code = EXIT_ERROR): never {
  printError(message);
  printBlank();
  process.exit(code);
}
