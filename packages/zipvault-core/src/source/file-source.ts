import { open, stat, type FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { classifyFsError, ZipvaultIOError } from '../errors.js';
import type { FileSource } from '../types.js';

/**
 * FileSource over a byte range of a file on disk. Reads are lazy; slicing is free.
 */
export class NodeFileSource implements FileSource {
  readonly name: string;
  readonly size: number;
  readonly path: string;
  private readonly start: number;

  private constructor(filePath: string, name: string, start: number, size: number) {
    this.path = filePath;
    this.name = name;
    this.start = start;
    this.size = size;
  }

  /**
   * Open a file as a source. Sizes are captured now; a later change in length
   * surfaces as a short read.
   */
  static async fromPath(filePath: string, name?: string): Promise<NodeFileSource> {
    const resolved = path.resolve(filePath);
    let info;
    try {
      info = await stat(resolved);
    } catch (err) {
      throw classifyFsError(err, resolved);
    }
    if (!info.isFile()) throw new ZipvaultIOError(`Not a file: ${resolved}`, { path: resolved });
    return new NodeFileSource(resolved, name ?? path.basename(resolved), 0, info.size);
  }

  slice(start: number, end: number): NodeFileSource {
    const from = Math.max(0, Math.min(start, this.size));
    const to = Math.max(from, Math.min(end, this.size));
    return new NodeFileSource(this.path, this.name, this.start + from, to - from);
  }

  /** Read the whole range into a Buffer. */
  async read(): Promise<Buffer> {
    let handle: FileHandle | undefined;
    try {
      handle = await open(this.path, 'r');
      const buffer = Buffer.alloc(this.size);
      let offset = 0;
      while (offset < this.size) {
        const { bytesRead } = await handle.read(buffer, offset, this.size - offset, this.start + offset);
        if (bytesRead === 0) break;
        offset += bytesRead;
      }
      if (offset !== this.size) {
        throw new ZipvaultIOError(`Short read from ${this.path}: expected ${this.size} bytes, got ${offset}.`, {
          path: this.path,
        });
      }
      return buffer;
    } catch (err) {
      throw classifyFsError(err, this.path);
    } finally {
      await handle?.close();
    }
  }
}
