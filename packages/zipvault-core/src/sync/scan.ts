import path from 'node:path';
import { walkSourceTree } from '../archive/walk.js';
import { IGNORED_PREFIX, IGNORED_SUFFIXES } from '../constants.js';
import { sha256File } from '../crypto/index.js';
import { classifyFsError } from '../errors.js';
import type { SyncItem } from '../types.js';

export interface ScanOptions {
  /** Include a content hash in the signature. Slower, but catches same-size edits within one second. */
  useSha256?: boolean;
}

/** Partial downloads and office lock files are never tracked. */
export function isIgnoredFile(name: string): boolean {
  if (name.startsWith(IGNORED_PREFIX)) return true;
  const ext = path.extname(name).toLowerCase();
  return ext !== '' && IGNORED_SUFFIXES.includes(ext);
}

/** `size:mtimeSeconds:sha256`, the hash part empty when not computed. */
export function makeSignature(sizeBytes: number, mtimeMs: number, sha256?: string): string {
  return `${sizeBytes}:${Math.trunc(mtimeMs / 1000)}:${sha256 ?? ''}`;
}

/**
 * Walk `root` and return the files that need uploading, as Pending items:
 * files never seen before, files whose signature changed, and known files that
 * never reached Uploaded. Unchanged uploaded files are left out.
 */
export async function scanTrackedFiles(
  root: string,
  known: readonly SyncItem[],
  opts: ScanOptions = {}
): Promise<SyncItem[]> {
  const byPath = new Map(known.map((item) => [item.sourcePath, item]));
  const files = await walkSourceTree(root, { filter: (_rel, name) => !isIgnoredFile(name) });
  const due: SyncItem[] = [];

  for (const file of files) {
    let sha: string | undefined;
    if (opts.useSha256) {
      try {
        sha = await sha256File(file.absolutePath);
      } catch (err) {
        throw classifyFsError(err, file.absolutePath);
      }
    }
    const signature = makeSignature(file.sizeBytes, file.mtimeMs, sha);
    const existing = byPath.get(file.absolutePath);

    if (existing && existing.signature === signature && existing.status === 'Uploaded') continue;

    const base: SyncItem = existing && existing.signature === signature
      ? { ...existing }
      : { sourcePath: file.absolutePath, kind: 'file', sizeBytes: 0, modifiedAt: 0, status: 'Pending' };
    delete base.error;
    due.push({
      ...base,
      kind: 'file',
      sizeBytes: file.sizeBytes,
      modifiedAt: file.mtimeMs,
      signature,
      status: 'Pending',
    });
  }
  return due;
}
