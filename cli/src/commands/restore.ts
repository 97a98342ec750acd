import path from 'node:path';
import { runRestore, type RestoreResult } from '@zipvault/core';
import type { ParsedFlags } from '../lib/parse.js';
import { getFlag } from '../lib/parse.js';
import { createBackends, createRuntime, resolveSettings } from '../lib/runtime.js';
import { ProgressRenderer, TransferTally } from '../lib/progress.js';
import { onInterrupt } from '../lib/interrupt.js';
import { formatIndexRanges, pluralize } from '../lib/format.js';
import { exitCodeForSummary, formatUnitOutcome, unitToJson } from '../lib/report.js';
import {
  printHeader,
  printKeyValue,
  printBlank,
  printSuccess,
  printWarning,
  printFailure,
  printJson,
  boldCyan,
  isInteractive,
  isJson,
} from '../lib/output.js';
import { EXIT_SUCCESS, exitUsage } from '../lib/errors.js';

export async function run(args: string[], flags: ParsedFlags): Promise<number> {
  const jobId = args[0];
  const dest = args[1] ?? getFlag(flags, 'dest', 'd');
  if (!jobId || !dest) exitUsage('Usage: zipvault restore <jobId> <dest>');
  const destDir = path.resolve(dest);

  const settings = resolveSettings(flags);
  const backends = createBackends(settings);
  const interactive = isInteractive();
  const progress = new ProgressRenderer();
  const tally = new TransferTally();

  const { orchestrator } = createRuntime(settings, backends, {
    onProgress: (evt) => {
      const t = tally.record(evt);
      if (interactive) {
        progress.update({ processedBytes: t.processedBytes, totalBytes: t.totalBytes, label: `${t.finished} downloaded` });
      }
    },
    onUnitSettled: (unit) => {
      if (interactive) progress.log(formatUnitOutcome(unit));
    },
  });

  if (interactive) {
    printHeader('zipvault restore');
    printKeyValue('Job', boldCyan(jobId));
    printKeyValue('Destination', destDir);
    printBlank();
  }

  const controller = new AbortController();
  const dispose = onInterrupt(() => controller.abort());
  let result: RestoreResult;
  try {
    result = await runRestore({ jobId, destDir, orchestrator, signal: controller.signal });
  } finally {
    dispose();
    progress.finish();
  }

  const exitCode = exitCodeForSummary(result.summary);

  if (isJson()) {
    printJson({
      jobId,
      destDir,
      missingParts: result.missingParts,
      unpacked: result.unpacked,
      units: result.summary.units.map(unitToJson),
    });
    return exitCode;
  }
  if (!interactive) return exitCode;

  printBlank();
  if (result.missingParts.length > 0) {
    printWarning(
      `${pluralize(result.missingParts.length, 'Part')} ${formatIndexRanges(result.missingParts)} ${pluralize(result.missingParts.length, 'was', 'were')} never uploaded; their files are not restored.`,
    );
  }
  if (result.unpacked) {
    const { written, unchanged } = result.unpacked;
    printSuccess(`Restored ${written} ${pluralize(written, 'file')} (${unchanged} already up to date).`);
  } else if (exitCode === EXIT_SUCCESS) {
    printWarning('Nothing was unpacked.');
  } else if (result.summary.wasCancelled) {
    printWarning('Restore cancelled. Nothing was unpacked.');
  } else {
    printFailure(`${result.summary.failed} ${pluralize(result.summary.failed, 'part')} failed to download. Nothing was unpacked.`);
  }
  printBlank();
  return exitCode;
}
