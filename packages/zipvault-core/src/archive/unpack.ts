import { createHash } from 'node:crypto';
import { createWriteStream } from 'node:fs';
import { mkdir, rename, rm, stat } from 'node:fs/promises';
import path from 'node:path';
import { sha256File } from '../crypto/index.js';
import { ZipvaultAbortError, ZipvaultValidationError, classifyFsError, errorCodeOf } from '../errors.js';
import type { PartLocator } from '../types.js';
import { SizedWriter } from '../utils/sized-writer.js';
import { readZipDirectory, readZipEntry, type ZipEntryInfo } from '../zip/zip-reader.js';

export interface UnpackOptions {
  signal?: AbortSignal;
  onEntry?: (info: { part: number; relativePath: string; outcome: 'written' | 'unchanged' }) => void;
}

export interface UnpackResult {
  written: number;
  unchanged: number;
}

/**
 * Extract parts into `destDir` in index order.
 * Files whose content already matches are left untouched, so a repeated unpack
 * is a no-op; changed files are replaced atomically.
 */
export async function unpack(
  parts: readonly PartLocator[],
  destDir: string,
  opts: UnpackOptions = {}
): Promise<UnpackResult> {
  const root = path.resolve(destDir);
  const ordered = [...parts].sort((a, b) => a.index - b.index);
  const result: UnpackResult = { written: 0, unchanged: 0 };

  try {
    await mkdir(root, { recursive: true });
  } catch (err) {
    throw classifyFsError(err, root);
  }

  for (const part of ordered) {
    const entries = (await readZipDirectory(part.path)).filter((e) => !e.isDirectory);
    // Validate every name before touching the destination.
    const targets = entries.map((entry) => ({ entry, target: resolveEntryPath(root, entry.name) }));

    for (const { entry, target } of targets) {
      if (opts.signal?.aborted) throw opts.signal.reason ?? new ZipvaultAbortError();
      const outcome = await extractEntry(part.path, entry, target);
      result[outcome]++;
      opts.onEntry?.({ part: part.index, relativePath: entry.name, outcome });
    }
  }
  return result;
}

/**
 * Map an entry name to a path below `root`.
 * @throws {ZipvaultValidationError} For absolute names and names that climb out of `root`.
 */
export function resolveEntryPath(root: string, name: string): string {
  const unsafe = (): ZipvaultValidationError =>
    new ZipvaultValidationError(`Refusing to extract "${name}": it points outside the destination.`, {
      code: 'UNSAFE_ENTRY_NAME',
      details: { name },
    });

  if (!name || name.includes('\0')) throw unsafe();
  const normalised = name.replace(/\\/g, '/');
  if (normalised.startsWith('/') || /^[a-zA-Z]:/.test(normalised)) throw unsafe();
  const segments = normalised.split('/').filter((s) => s !== '' && s !== '.');
  if (segments.length === 0 || segments.includes('..')) throw unsafe();

  const target = path.resolve(root, ...segments);
  const relative = path.relative(root, target);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) throw unsafe();
  return target;
}

async function extractEntry(zipPath: string, entry: ZipEntryInfo, target: string): Promise<'written' | 'unchanged'> {
  const existingSize = await sizeOf(target);
  const dir = path.dirname(target);
  const tempPath = path.join(dir, `.${path.basename(target)}.unpack.partial`);

  try {
    await mkdir(dir, { recursive: true });
  } catch (err) {
    throw classifyFsError(err, dir);
  }

  const hash = createHash('sha256');
  const writer = new SizedWriter(createWriteStream(tempPath), Number.POSITIVE_INFINITY, tempPath);
  try {
    for await (const chunk of readZipEntry(zipPath, entry)) {
      hash.update(chunk);
      await writer.write(chunk);
    }
    await writer.close();
  } catch (err) {
    writer.destroy();
    await rm(tempPath, { force: true });
    throw err;
  }

  try {
    if (existingSize === entry.uncompressedSize && (await sha256File(target)) === hash.digest('hex')) {
      await rm(tempPath, { force: true });
      return 'unchanged';
    }
    await rename(tempPath, target);
    return 'written';
  } catch (err) {
    await rm(tempPath, { force: true });
    throw classifyFsError(err, target);
  }
}

async function sizeOf(filePath: string): Promise<number | null> {
  try {
    const info = await stat(filePath);
    return info.isFile() ? info.size : null;
  } catch (err) {
    if (errorCodeOf(err) === 'ENOENT') return null;
    throw classifyFsError(err, filePath);
  }
}
