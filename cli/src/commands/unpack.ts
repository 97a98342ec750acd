import fs from 'node:fs';
import path from 'node:path';
import { unpack, type PartLocator, type UnpackResult } from '@zipvault/core';
import type { ParsedFlags } from '../lib/parse.js';
import { getFlag } from '../lib/parse.js';
import { onInterrupt } from '../lib/interrupt.js';
import { pluralize } from '../lib/format.js';
import { printHeader, printKeyValue, printBlank, printSuccess, printJson, dim, isInteractive, isJson } from '../lib/output.js';
import { EXIT_SUCCESS, exitUsage } from '../lib/errors.js';

/** Extract local parts, in the order given, into a destination folder. */
export async function run(args: string[], flags: ParsedFlags): Promise<number> {
  const dest = getFlag(flags, 'dest', 'd');
  if (args.length === 0 || !dest) exitUsage('Usage: zipvault unpack <part.zip...> --dest <dir>');

  const parts: PartLocator[] = args.map((file, i) => {
    const resolved = path.resolve(file);
    if (!fs.existsSync(resolved)) exitUsage(`File not found: ${file}`);
    return { index: i + 1, path: resolved };
  });
  const destDir = path.resolve(dest);
  const interactive = isInteractive();

  if (interactive) {
    printHeader('zipvault unpack');
    printKeyValue('Parts', `${parts.length} ${pluralize(parts.length, 'part')}`);
    printKeyValue('Destination', destDir);
    printBlank();
  }

  const controller = new AbortController();
  const dispose = onInterrupt(() => controller.abort());
  let result: UnpackResult;
  try {
    result = await unpack(parts, destDir, {
      signal: controller.signal,
      onEntry: ({ relativePath, outcome }) => {
        if (interactive && outcome === 'written') console.log(`  ${relativePath}`);
      },
    });
  } finally {
    dispose();
  }

  if (isJson()) {
    printJson({ destDir, ...result });
  } else if (interactive) {
    printBlank();
    printSuccess(`Wrote ${result.written} ${pluralize(result.written, 'file')} ${dim(`(${result.unchanged} unchanged)`)}`);
    printBlank();
  }
  return EXIT_SUCCESS;
}
