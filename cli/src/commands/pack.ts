import fs from 'node:fs';
import path from 'node:path';
import { Archiver, sanitizeBaseName, type ArchivePart } from '@zipvault/core';
import type { ParsedFlags } from '../lib/parse.js';
import { getFlag } from '../lib/parse.js';
import { resolveSettings } from '../lib/runtime.js';
import { ProgressRenderer } from '../lib/progress.js';
import { onInterrupt } from '../lib/interrupt.js';
import { formatBytes, formatDuration, pluralize } from '../lib/format.js';
import {
  printHeader,
  printKeyValue,
  printBlank,
  printSuccess,
  printJson,
  boldCyan,
  dim,
  yellow,
  isInteractive,
  isJson,
} from '../lib/output.js';
import { EXIT_SUCCESS, exitUsage } from '../lib/errors.js';

/** Pack a folder into size-capped ZIP parts on disk, without uploading. */
export async function run(args: string[], flags: ParsedFlags): Promise<number> {
  const dir = args[0];
  if (!dir) exitUsage('Usage: zipvault pack <dir> [--out <dir>]');
  const sourceDir = path.resolve(dir);
  if (!fs.existsSync(sourceDir) || !fs.statSync(sourceDir).isDirectory()) {
    exitUsage(`Not a directory: ${dir}`);
  }

  const settings = resolveSettings(flags);
  const outputRoot = path.resolve(getFlag(flags, 'out', 'o') ?? process.cwd());
  const baseName = sanitizeBaseName(getFlag(flags, 'name') ?? path.basename(sourceDir)) || 'Backup';
  const archiver = new Archiver({ outputRoot, compressionLevel: settings.compressionLevel });
  const interactive = isInteractive();

  if (interactive) {
    printHeader('zipvault pack');
    printKeyValue('Folder', sourceDir);
    printKeyValue('Part ceiling', formatBytes(settings.ceilingBytes));
    printKeyValue('Compression', settings.compressionLevel === 0 ? 'stored' : `level ${settings.compressionLevel}`);
    printBlank();
  }

  const progress = new ProgressRenderer();
  const controller = new AbortController();
  const dispose = onInterrupt(() => controller.abort());
  const parts: ArchivePart[] = [];
  const skipped: Array<{ path: string; message: string }> = [];
  let outputDir = outputRoot;
  const started = Date.now();

  try {
    const packing = archiver.pack(sourceDir, settings.ceilingBytes, baseName, {
      signal: controller.signal,
      onStart: (info) => {
        outputDir = info.outputDir;
      },
      onProgress: (p) => {
        if (interactive) {
          progress.update({ processedBytes: p.bytesDone, totalBytes: p.bytesTotal, label: p.currentPart });
        }
      },
      onEntryError: (file, error) => {
        skipped.push({ path: file.relativePath, message: error.message });
        if (interactive) progress.log(`  ${dim('skipped')} ${file.relativePath}: ${error.message}`);
      },
    });
    for await (const part of packing) {
      parts.push(part);
      if (interactive) {
        const note = part.oversized ? ` ${yellow('oversized')}` : '';
        progress.log(`  ${part.fileName} ${dim(`(${formatBytes(part.sizeBytes)}, ${part.entries.length} ${pluralize(part.entries.length, 'file')})`)}${note}`);
      }
    }
  } finally {
    dispose();
    progress.finish();
  }

  if (isJson()) {
    printJson({
      outputDir,
      parts: parts.map((p) => ({
        index: p.index,
        fileName: p.fileName,
        path: p.path,
        sizeBytes: p.sizeBytes,
        entries: p.entries.map((e) => e.relativePath),
        oversized: p.oversized,
      })),
      skipped,
    });
    return EXIT_SUCCESS;
  }

  if (!interactive) {
    console.log(outputDir);
    return EXIT_SUCCESS;
  }

  printBlank();
  printSuccess(
    `Packed ${parts.length} ${pluralize(parts.length, 'part')} ${dim(`(${formatDuration(Date.now() - started)})`)}`,
  );
  printKeyValue('Output', boldCyan(outputDir));
  printBlank();
  return EXIT_SUCCESS;
}
