import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { ZipvaultIOError, classifyFsError, errorCodeOf } from '../errors.js';
import { compareRelativePaths, type SourceFile } from './planner.js';

export interface WalkOptions {
  /** Return false to leave a file out. */
  filter?: (relativePath: string, name: string) => boolean;
}

/**
 * List every regular file below `root`, sorted by relative path.
 * Symbolic links are not followed.
 */
export async function walkSourceTree(root: string, opts: WalkOptions = {}): Promise<SourceFile[]> {
  const base = path.resolve(root);
  let info;
  try {
    info = await stat(base);
  } catch (err) {
    throw classifyFsError(err, base);
  }
  if (!info.isDirectory()) {
    throw new ZipvaultIOError(`Not a directory: ${base}`, { path: base });
  }

  const files: SourceFile[] = [];
  const pending = [''];
  while (pending.length > 0) {
    const rel = pending.pop() ?? '';
    const dir = rel ? path.join(base, ...rel.split('/')) : base;
    let dirents;
    try {
      dirents = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      throw classifyFsError(err, dir);
    }
    for (const dirent of dirents) {
      const childRel = rel ? `${rel}/${dirent.name}` : dirent.name;
      if (dirent.isDirectory()) {
        pending.push(childRel);
        continue;
      }
      if (!dirent.isFile()) continue;
      if (opts.filter && !opts.filter(childRel, dirent.name)) continue;
      const absolutePath = path.join(dir, dirent.name);
      try {
        const fileInfo = await stat(absolutePath);
        files.push({ relativePath: childRel, absolutePath, sizeBytes: fileInfo.size, mtimeMs: fileInfo.mtimeMs });
      } catch (err) {
        // Removed between readdir and stat.
        if (errorCodeOf(err) === 'ENOENT') continue;
        throw classifyFsError(err, absolutePath);
      }
    }
  }

  return files.sort((a, b) => compareRelativePaths(a.relativePath, b.relativePath));
}
