import path from 'node:path';
import type { RunSummary, SyncItemError, TransferUnit } from '@zipvault/core';
import { EXIT_CANCELLED, EXIT_ERROR, EXIT_SUCCESS, exitCodeForKind } from './errors.js';
import { formatBytes } from './format.js';
import { dim, green, red, yellow } from './output.js';

export function unitName(unit: TransferUnit): string {
  if (unit.request.direction === 'download') return unit.request.remote.name;
  return path.basename(unit.sourcePath);
}

/** One log line per settled unit. */
export function formatUnitOutcome(unit: TransferUnit): string {
  const name = unitName(unit);
  const via = unit.backend ? dim(` via ${unit.backend}`) : '';
  switch (unit.state) {
    case 'succeeded':
      return `  ${green('✔')} ${name} ${dim(`(${formatBytes(unit.sizeBytes)})`)}${via}`;
    case 'failed':
      return `  ${red('✘')} ${name}${via}: ${describeItemError(unit.error)}`;
    case 'cancelled':
      return `  ${yellow('■')} ${name} ${dim('cancelled')}`;
    default:
      return `  ${dim('·')} ${name} ${dim(unit.state)}`;
  }
}

export function describeItemError(error: SyncItemError | undefined): string {
  if (!error) return 'unknown error';
  return `${error.message} ${dim(`[${error.kind}]`)}`;
}

/** Exit code for a finished run: cancelled, then the first failure, then success. */
export function exitCodeForSummary(summary: RunSummary): number {
  if (summary.wasCancelled || summary.cancelled > 0) return EXIT_CANCELLED;
  const failed = summary.units.find((u) => u.state === 'failed');
  if (failed) return failed.error ? exitCodeForKind(failed.error.kind) : EXIT_ERROR;
  return EXIT_SUCCESS;
}

export function unitToJson(unit: TransferUnit): Record<string, unknown> {
  return {
    name: unitName(unit),
    direction: unit.direction,
    path: unit.sourcePath,
    state: unit.state,
    backend: unit.backend,
    sizeBytes: unit.sizeBytes,
    attempts: unit.attempts,
    objectId: unit.remote?.objectId,
    error: unit.error,
  };
}
