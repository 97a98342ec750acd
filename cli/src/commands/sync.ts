import fs from 'node:fs';
import path from 'node:path';
import { scanTrackedFiles, type RunSummary } from '@zipvault/core';
import type { ParsedFlags } from '../lib/parse.js';
import { createBackends, createRuntime, resolveSettings } from '../lib/runtime.js';
import { ProgressRenderer, TransferTally } from '../lib/progress.js';
import { onInterrupt } from '../lib/interrupt.js';
import { formatBytes, pluralize } from '../lib/format.js';
import { exitCodeForSummary, formatUnitOutcome, unitToJson } from '../lib/report.js';
import {
  printHeader,
  printKeyValue,
  printBlank,
  printSuccess,
  printWarning,
  printFailure,
  printJson,
  isInteractive,
  isJson,
} from '../lib/output.js';
import { EXIT_SUCCESS, exitUsage } from '../lib/errors.js';

/** Upload the files of a folder that are new, changed or not yet uploaded. */
export async function run(args: string[], flags: ParsedFlags): Promise<number> {
  const dir = args[0];
  if (!dir) exitUsage('Usage: zipvault sync <dir>');
  const root = path.resolve(dir);
  if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
    exitUsage(`Not a directory: ${dir}`);
  }

  const settings = resolveSettings(flags);
  const backends = createBackends(settings);
  const interactive = isInteractive();
  const progress = new ProgressRenderer();
  const tally = new TransferTally();
  let dueCount = 0;

  const { orchestrator } = createRuntime(settings, backends, {
    onProgress: (evt) => {
      const t = tally.record(evt);
      if (interactive) {
        progress.update({ processedBytes: t.processedBytes, totalBytes: t.totalBytes, label: `${t.finished}/${dueCount} files` });
      }
    },
    onUnitSettled: (unit) => {
      if (interactive) progress.log(formatUnitOutcome(unit));
    },
  });

  const known = await orchestrator.load();
  const due = await scanTrackedFiles(root, known, { useSha256: settings.useSha256 });
  dueCount = due.length;

  if (interactive) {
    printHeader('zipvault sync');
    printKeyValue('Folder', root);
    printKeyValue('To upload', `${due.length} ${pluralize(due.length, 'file')} (${formatBytes(due.reduce((n, item) => n + item.sizeBytes, 0))})`);
    printBlank();
  }

  if (due.length === 0) {
    if (isJson()) printJson({ scheduled: 0, units: [] });
    else if (interactive) printSuccess('Everything is up to date.');
    return EXIT_SUCCESS;
  }

  for (const item of due) {
    orchestrator.schedule({ direction: 'upload', subject: { kind: 'item', item } });
  }

  const dispose = onInterrupt(() => orchestrator.cancel('Sync cancelled.'));
  let summary: RunSummary;
  try {
    summary = await orchestrator.run();
  } finally {
    dispose();
    progress.finish();
  }
  const exitCode = exitCodeForSummary(summary);

  if (isJson()) {
    printJson({ scheduled: due.length, units: summary.units.map(unitToJson) });
    return exitCode;
  }
  if (!interactive) return exitCode;

  printBlank();
  if (summary.wasCancelled) {
    printWarning(`Sync cancelled. ${summary.succeeded} of ${due.length} files uploaded.`);
  } else if (summary.failed > 0) {
    printFailure(`${summary.failed} ${pluralize(summary.failed, 'file')} failed, ${summary.succeeded} uploaded.`);
  } else {
    printSuccess(`Uploaded ${summary.succeeded} ${pluralize(summary.succeeded, 'file')}.`);
  }
  if (summary.persistError !== undefined) {
    printWarning('Could not save the sync state; the next run may upload some files again.');
  }
  printBlank();
  return exitCode;
}
