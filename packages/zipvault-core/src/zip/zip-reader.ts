import { createReadStream } from 'node:fs';
import { open, type FileHandle } from 'node:fs/promises';
import { Inflate, strFromU8 } from 'fflate';
import { IntegrityError, ZipvaultValidationError, classifyFsError } from '../errors.js';
import { Crc32 } from './crc32.js';

const EOCD_SIGNATURE = 0x06054b50;
const CENTRAL_SIGNATURE = 0x02014b50;
const LOCAL_SIGNATURE = 0x04034b50;
const EOCD_MIN_BYTES = 22;
const MAX_COMMENT_BYTES = 0xffff;
const ZIP64_MARKER = 0xffffffff;

export const METHOD_STORE = 0;
export const METHOD_DEFLATE = 8;

export interface ZipEntryInfo {
  name: string;
  method: number;
  compressedSize: number;
  uncompressedSize: number;
  crc32: number;
  /** Absolute offset of the entry's compressed bytes in the archive. */
  dataOffset: number;
  isDirectory: boolean;
}

/**
 * Read the central directory of a ZIP file.
 * Sizes come from the central directory, so entries written with data
 * descriptors are handled. ZIP64 archives and multi-disk archives are rejected.
 */
export async function readZipDirectory(zipPath: string): Promise<ZipEntryInfo[]> {
  let handle: FileHandle | undefined;
  try {
    handle = await open(zipPath, 'r');
    const { size } = await handle.stat();
    if (size < EOCD_MIN_BYTES) {
      throw new ZipvaultValidationError(`${zipPath} is too small to be a ZIP archive.`);
    }

    const tailLength = Math.min(size, EOCD_MIN_BYTES + MAX_COMMENT_BYTES);
    const tail = Buffer.alloc(tailLength);
    await handle.read(tail, 0, tailLength, size - tailLength);

    let eocd = -1;
    for (let i = tailLength - EOCD_MIN_BYTES; i >= 0; i--) {
      if (tail.readUInt32LE(i) === EOCD_SIGNATURE) {
        eocd = i;
        break;
      }
    }
    if (eocd < 0) {
      throw new ZipvaultValidationError(`${zipPath} has no end of central directory record.`);
    }

    const diskNumber = tail.readUInt16LE(eocd + 4);
    const entryCount = tail.readUInt16LE(eocd + 10);
    const directorySize = tail.readUInt32LE(eocd + 12);
    const directoryOffset = tail.readUInt32LE(eocd + 16);
    if (diskNumber !== 0) {
      throw new ZipvaultValidationError(`${zipPath} spans multiple disks, which is not supported.`);
    }
    if (directoryOffset === ZIP64_MARKER || directorySize === ZIP64_MARKER) {
      throw new ZipvaultValidationError(`${zipPath} is a ZIP64 archive, which is not supported.`);
    }
    if (directoryOffset + directorySize > size) {
      throw new ZipvaultValidationError(`${zipPath} has a truncated central directory.`);
    }

    const directory = Buffer.alloc(directorySize);
    await handle.read(directory, 0, directorySize, directoryOffset);

    const entries: ZipEntryInfo[] = [];
    const localHeader = Buffer.alloc(30);
    let pos = 0;
    for (let n = 0; n < entryCount; n++) {
      if (pos + 46 > directorySize || directory.readUInt32LE(pos) !== CENTRAL_SIGNATURE) {
        throw new ZipvaultValidationError(`${zipPath} has a malformed central directory record.`);
      }
      const method = directory.readUInt16LE(pos + 10);
      const crc32 = directory.readUInt32LE(pos + 16);
      const compressedSize = directory.readUInt32LE(pos + 20);
      const uncompressedSize = directory.readUInt32LE(pos + 24);
      const nameLength = directory.readUInt16LE(pos + 28);
      const extraLength = directory.readUInt16LE(pos + 30);
      const commentLength = directory.readUInt16LE(pos + 32);
      const localOffset = directory.readUInt32LE(pos + 42);
      const name = strFromU8(directory.subarray(pos + 46, pos + 46 + nameLength));

      if (compressedSize === ZIP64_MARKER || uncompressedSize === ZIP64_MARKER || localOffset === ZIP64_MARKER) {
        throw new ZipvaultValidationError(`Entry "${name}" uses ZIP64 fields, which are not supported.`);
      }
      if (method !== METHOD_STORE && method !== METHOD_DEFLATE) {
        throw new ZipvaultValidationError(`Entry "${name}" uses unsupported compression method ${method}.`);
      }

      await handle.read(localHeader, 0, 30, localOffset);
      if (localHeader.readUInt32LE(0) !== LOCAL_SIGNATURE) {
        throw new ZipvaultValidationError(`Entry "${name}" has no local file header.`);
      }
      const dataOffset = localOffset + 30 + localHeader.readUInt16LE(26) + localHeader.readUInt16LE(28);
      if (dataOffset + compressedSize > size) {
        throw new ZipvaultValidationError(`Entry "${name}" extends past the end of the archive.`);
      }

      entries.push({
        name,
        method,
        compressedSize,
        uncompressedSize,
        crc32,
        dataOffset,
        isDirectory: name.endsWith('/'),
      });
      pos += 46 + nameLength + extraLength + commentLength;
    }
    if (pos !== directorySize) {
      throw new ZipvaultValidationError(
        `${zipPath} has a central directory that does not match its entry count of ${entryCount}.`
      );
    }
    return entries;
  } catch (err) {
    if (err instanceof ZipvaultValidationError) throw err;
    throw classifyFsError(err, zipPath);
  } finally {
    await handle?.close();
  }
}

/**
 * Stream the uncompressed bytes of one entry.
 * @throws {IntegrityError} If the inflated length or CRC-32 differs from the central directory.
 */
export async function* readZipEntry(zipPath: string, entry: ZipEntryInfo): AsyncGenerator<Uint8Array> {
  let produced = 0;
  const crc = new Crc32();

  if (entry.compressedSize > 0) {
    const stream = createReadStream(zipPath, {
      start: entry.dataOffset,
      end: entry.dataOffset + entry.compressedSize - 1,
    });
    const pending: Uint8Array[] = [];
    const inflater = entry.method === METHOD_DEFLATE
      ? new Inflate((data) => {
        pending.push(data);
      })
      : null;

    try {
      for await (const chunk of stream) {
        const bytes: Uint8Array = chunk;
        if (!inflater) {
          produced += bytes.byteLength;
          crc.update(bytes);
          yield bytes;
          continue;
        }
        inflater.push(bytes, false);
        while (pending.length > 0) {
          const out = pending.shift();
          if (!out) break;
          produced += out.byteLength;
          crc.update(out);
          yield out;
        }
      }
      if (inflater) {
        inflater.push(new Uint8Array(0), true);
        for (const out of pending.splice(0)) {
          produced += out.byteLength;
          crc.update(out);
          yield out;
        }
      }
    } catch (err) {
      if (err instanceof IntegrityError) throw err;
      if (inflater && !isFsError(err)) {
        throw new IntegrityError(`Entry "${entry.name}" could not be decompressed.`, { cause: err });
      }
      throw classifyFsError(err, zipPath);
    } finally {
      stream.destroy();
    }
  }

  if (produced !== entry.uncompressedSize) {
    throw new IntegrityError(
      `Entry "${entry.name}" expanded to ${produced} bytes, expected ${entry.uncompressedSize}.`,
      { details: { expected: entry.uncompressedSize, actual: produced } }
    );
  }
  const actualCrc = crc.digest();
  if (actualCrc !== entry.crc32) {
    throw new IntegrityError(`Entry "${entry.name}" failed its CRC-32 check.`, {
      details: { expected: entry.crc32, actual: actualCrc },
    });
  }
}

function isFsError(err: unknown): boolean {
  return !!err && typeof err === 'object' && 'syscall' in err;
}
