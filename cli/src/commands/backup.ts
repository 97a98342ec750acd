import fs from 'node:fs';
import path from 'node:path';
import { runBackup, type ArchiveProgress, type BackupResult, type ErrorKind } from '@zipvault/core';
import type { ParsedFlags } from '../lib/parse.js';
import { getFlagBool } from '../lib/parse.js';
import { createArchiver, createBackends, createRuntime, getStagingRoot, resolveSettings } from '../lib/runtime.js';
import { ProgressRenderer, TransferTally } from '../lib/progress.js';
import { onInterrupt } from '../lib/interrupt.js';
import { formatBytes, formatDuration, pluralize } from '../lib/format.js';
import { describeItemError, exitCodeForSummary, formatUnitOutcome } from '../lib/report.js';
import {
  printHeader,
  printKeyValue,
  printBlank,
  printSuccess,
  printFailure,
  printWarning,
  printJson,
  boldCyan,
  colorStatus,
  dim,
  isInteractive,
  isJson,
} from '../lib/output.js';
import { EXIT_CANCELLED, EXIT_ERROR, EXIT_SUCCESS, exitCodeForKind, exitUsage } from '../lib/errors.js';

export async function run(args: string[], flags: ParsedFlags): Promise<number> {
  const dir = args[0];
  if (!dir) exitUsage('Usage: zipvault backup <dir>');
  const sourceDir = path.resolve(dir);
  if (!fs.existsSync(sourceDir) || !fs.statSync(sourceDir).isDirectory()) {
    exitUsage(`Not a directory: ${dir}`);
  }

  const settings = resolveSettings(flags);
  const backends = createBackends(settings);
  const interactive = isInteractive();
  const json = isJson();

  const progress = new ProgressRenderer();
  const tally = new TransferTally();
  let packed: ArchiveProgress | undefined;

  const render = (): void => {
    if (!interactive) return;
    const transfers = tally.snapshot();
    const planned = packed?.partsPlanned ?? 0;
    if (transfers.totalBytes === 0) {
      progress.update({
        processedBytes: packed?.bytesDone ?? 0,
        totalBytes: packed?.bytesTotal ?? 0,
        label: `packing, ${packed?.partsSealed ?? 0}/${planned} parts sealed`,
      });
      return;
    }
    progress.update({
      processedBytes: transfers.processedBytes,
      totalBytes: transfers.totalBytes,
      label: `${transfers.finished}/${planned} ${pluralize(planned, 'part')} uploaded`,
    });
  };

  const { orchestrator, store } = createRuntime(settings, backends, {
    onProgress: (evt) => {
      tally.record(evt);
      render();
    },
    onUnitSettled: (unit) => {
      if (interactive) progress.log(formatUnitOutcome(unit));
    },
  });
  const archiver = createArchiver(settings);

  if (interactive) {
    printHeader('zipvault backup');
    printKeyValue('Folder', sourceDir);
    printKeyValue('Part ceiling', formatBytes(settings.ceilingBytes));
    printKeyValue('Backends', Object.keys(backends).join(', '));
    printBlank();
  }

  const controller = new AbortController();
  const dispose = onInterrupt(() => controller.abort());
  const started = Date.now();

  let result: BackupResult;
  try {
    result = await runBackup({
      sourceDir,
      archiver,
      orchestrator,
      ceilingBytes: settings.ceilingBytes,
      signal: controller.signal,
      onArchiveProgress: (p) => {
        packed = p;
        render();
      },
      onEntryError: (file, error) => {
        if (interactive) progress.log(`  ${dim('skipped')} ${file.relativePath}: ${error.message}`);
      },
      onBackupComplete: (completedAt) => store.setLastBackupAt(completedAt),
    });
  } finally {
    dispose();
    progress.finish();
  }

  const folder = orchestrator.getItem(sourceDir);
  if (result.status === 'Uploaded' && result.jobId && getFlagBool(flags, 'keep-parts') !== true) {
    fs.rmSync(path.join(getStagingRoot(settings), result.jobId), { recursive: true, force: true });
  }

  const exitCode = backupExitCode(result, folder?.error?.kind);

  if (json) {
    printJson({
      jobId: result.jobId,
      status: result.status,
      parts: result.parts.map((part) => {
        const remote = orchestrator.getItem(part.path)?.remote;
        return {
          index: part.index,
          fileName: part.fileName,
          sizeBytes: part.sizeBytes,
          entries: part.entries.length,
          oversized: part.oversized,
          backend: remote?.backend,
          objectId: remote?.objectId,
        };
      }),
      skipped: result.entryErrors.map(({ file, error }) => ({
        path: file.relativePath,
        kind: error.kind,
        message: error.message,
      })),
      error: folder?.error,
      elapsedMs: Date.now() - started,
    });
    return exitCode;
  }

  if (!interactive) {
    if (result.jobId) console.log(result.jobId);
    return exitCode;
  }

  printBlank();
  if (result.status === 'Uploaded') {
    printSuccess(
      `Backed up ${result.parts.length} ${pluralize(result.parts.length, 'part')} ` +
        dim(`(${formatDuration(Date.now() - started)})`),
    );
  } else if (result.status === 'Pending') {
    printWarning('Backup cancelled. Run it again to upload the remaining parts.');
  } else {
    printFailure(`Backup failed: ${describeItemError(folder?.error)}`);
  }
  printKeyValue('Status', colorStatus(result.status));
  if (result.jobId) printKeyValue('Job', boldCyan(result.jobId));
  if (result.entryErrors.length > 0) {
    printWarning(
      `${result.entryErrors.length} ${pluralize(result.entryErrors.length, 'file')} could not be read and ${pluralize(result.entryErrors.length, 'was', 'were')} skipped.`,
    );
  }
  if (result.summary.persistError !== undefined) {
    printWarning('Could not save the backup state; the next run may upload some parts again.');
  }
  printBlank();
  return exitCode;
}

function backupExitCode(result: BackupResult, failureKind: ErrorKind | undefined): number {
  if (result.status === 'Uploaded') return EXIT_SUCCESS;
  if (result.status === 'Pending') return EXIT_CANCELLED;
  if (failureKind) return exitCodeForKind(failureKind);
  const fromUnits = exitCodeForSummary(result.summary);
  return fromUnits === EXIT_SUCCESS ? EXIT_ERROR : fromUnits;
}
