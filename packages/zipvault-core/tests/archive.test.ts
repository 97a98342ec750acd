import { createReadStream, createWriteStream } from 'node:fs';
import { access, mkdir, readFile, readdir, stat, symlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Writable } from 'node:stream';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  Archiver,
  DiskFullError,
  IntegrityError,
  StreamingZipWriter,
  ZipvaultAbortError,
  ZipvaultIOError,
  ZipvaultValidationError,
  crc32,
  createJobId,
  readZipDirectory,
  readZipEntry,
  resolveEntryPath,
  unpack,
  walkSourceTree,
  type ArchiveProgress,
  type SourceFile,
  type ZipvaultError,
} from '../src/index.js';
import { collect, concatBytes, encoder, makeTempDir, removeDir } from './helpers.js';

const patterned = Uint8Array.from({ length: 3000 }, (_, i) => (i * 7919) % 251);

let root: string;
let src: string;
let out: string;
let dest: string;

beforeEach(async () => {
  root = await makeTempDir();
  src = path.join(root, 'src');
  out = path.join(root, 'out');
  dest = path.join(root, 'dest');
  await mkdir(path.join(src, 'sub', 'deeper'), { recursive: true });
  await writeFile(path.join(src, 'a.txt'), 'hello');
  await writeFile(path.join(src, 'empty.txt'), '');
  await writeFile(path.join(src, 'sub', 'b.bin'), patterned);
  await writeFile(path.join(src, 'sub', 'deeper', 'c.txt'), 'x'.repeat(500));
});

afterEach(async () => {
  await removeDir(root);
});

async function expectRestored(dir: string): Promise<void> {
  expect(await readFile(path.join(dir, 'a.txt'), 'utf8')).toBe('hello');
  expect(await readFile(path.join(dir, 'empty.txt'), 'utf8')).toBe('');
  expect(new Uint8Array(await readFile(path.join(dir, 'sub', 'b.bin')))).toEqual(patterned);
  expect(await readFile(path.join(dir, 'sub', 'deeper', 'c.txt'), 'utf8')).toBe('x'.repeat(500));
}

describe('walkSourceTree', () => {
  it('lists regular files sorted by relative path', async () => {
    const files = await walkSourceTree(src);
    expect(files.map((f) => [f.relativePath, f.sizeBytes])).toEqual([
      ['a.txt', 5],
      ['empty.txt', 0],
      ['sub/b.bin', 3000],
      ['sub/deeper/c.txt', 500],
    ]);
    expect(files[0].absolutePath).toBe(path.join(src, 'a.txt'));
  });

  it('skips symbolic links and filtered files', async () => {
    await symlink(path.join(src, 'a.txt'), path.join(src, 'link.txt'));
    const files = await walkSourceTree(src, { filter: (_rel, name) => name !== 'empty.txt' });
    expect(files.map((f) => f.relativePath)).toEqual(['a.txt', 'sub/b.bin', 'sub/deeper/c.txt']);
  });

  it('rejects a root that is not a directory', async () => {
    await expect(walkSourceTree(path.join(src, 'a.txt'))).rejects.toBeInstanceOf(ZipvaultIOError);
    await expect(walkSourceTree(path.join(src, 'missing'))).rejects.toBeInstanceOf(ZipvaultIOError);
  });
});

describe('createJobId', () => {
  it('formats local time with a five character suffix', () => {
    const when = new Date(2026, 0, 2, 3, 4, 5);
    expect(createJobId(when, () => 0)).toBe('20260102_030405_AAAAA');
    expect(createJobId(when, () => 0.999)).toBe('20260102_030405_99999');
  });
});

describe('Archiver', () => {
  it.each([0, 6])('packs and unpacks a tree at compression level %i', async (level) => {
    const archiver = new Archiver({ outputRoot: out, workers: 2, compressionLevel: level, createJobId: () => 'job-1' });
    const parts = await collect(archiver.pack(src, 2000, 'Backup'));

    expect(parts.map((p) => [p.index, p.fileName, p.oversized])).toEqual([
      [1, 'Backup_001.zip', false],
      [2, 'Backup_002.zip', true],
      [3, 'Backup_003.zip', false],
    ]);
    expect(parts.map((p) => p.entries.map((e) => e.relativePath))).toEqual([
      ['a.txt', 'empty.txt'],
      ['sub/b.bin'],
      ['sub/deeper/c.txt'],
    ]);
    for (const part of parts) {
      expect(part.jobId).toBe('job-1');
      expect(part.path).toBe(path.join(out, 'job-1', part.fileName));
      expect((await stat(part.path)).size).toBe(part.sizeBytes);
      if (!part.oversized) expect(part.sizeBytes).toBeLessThanOrEqual(2000);
    }
    expect((await readdir(path.join(out, 'job-1'))).sort()).toEqual([
      'Backup_001.zip',
      'Backup_002.zip',
      'Backup_003.zip',
    ]);

    const result = await unpack(parts, dest);
    expect(result).toEqual({ written: 4, unchanged: 0 });
    await expectRestored(dest);
  });

  it('starts a new run with a new job id on every iteration', async () => {
    let n = 0;
    const archiver = new Archiver({ outputRoot: out, workers: 1, compressionLevel: 0, createJobId: () => `job-${++n}` });
    const packed = archiver.pack(src, 1_000_000, 'Backup');
    const first = await collect(packed);
    const second = await collect(packed);
    expect(first.map((p) => p.path)).toEqual([path.join(out, 'job-1', 'Backup_001.zip')]);
    expect(second.map((p) => p.path)).toEqual([path.join(out, 'job-2', 'Backup_001.zip')]);
  });

  it('drops an unreadable file, reports it and rebuilds the container', async () => {
    async function* failingRead(): AsyncGenerator<Uint8Array> {
      yield new Uint8Array(0);
      throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
    }
    const archiver = new Archiver({
      outputRoot: out,
      workers: 2,
      compressionLevel: 0,
      createJobId: () => 'job-1',
      openReadStream: (file: SourceFile): AsyncIterable<Uint8Array> =>
        file.relativePath === 'a.txt' ? failingRead() : createReadStream(file.absolutePath),
    });
    const entryErrors: Array<{ file: string; error: ZipvaultError }> = [];
    const progress: ArchiveProgress[] = [];

    const parts = await collect(
      archiver.pack(src, 2000, 'Backup', {
        onEntryError: (file, error) => entryErrors.push({ file: file.relativePath, error }),
        onProgress: (p) => progress.push(p),
      })
    );

    expect(entryErrors.map((e) => e.file)).toEqual(['a.txt']);
    expect(entryErrors[0].error.kind).toBe('IOError');
    expect(entryErrors[0].error.details).toEqual({ fsCode: 'EACCES' });
    expect(parts.map((p) => p.entries.map((e) => e.relativePath))).toEqual([
      ['empty.txt'],
      ['sub/b.bin'],
      ['sub/deeper/c.txt'],
    ]);
    expect(progress[progress.length - 1]).toMatchObject({
      jobId: 'job-1',
      bytesDone: 3505,
      bytesTotal: 3505,
      partsSealed: 3,
      partsPlanned: 3,
      currentPart: 'Backup_003.zip',
    });
  });

  it('leaves only emitted parts behind when the consumer stops early', async () => {
    const archiver = new Archiver({ outputRoot: out, workers: 2, compressionLevel: 0, createJobId: () => 'job-1' });
    for await (const part of archiver.pack(src, 2000, 'Backup')) {
      expect(part.index).toBe(1);
      break;
    }
    expect(await readdir(path.join(out, 'job-1'))).toEqual(['Backup_001.zip']);
  });

  it('ends the run when the destination disk fills up', async () => {
    const archiver = new Archiver({
      outputRoot: out,
      workers: 1,
      compressionLevel: 0,
      createJobId: () => 'job-1',
      openWriteStream: (tempPath: string): Writable => {
        if (!path.basename(tempPath).startsWith('.Backup.build-2-')) return createWriteStream(tempPath, { flags: 'wx' });
        return new Writable({
          write(_chunk, _encoding, callback) {
            callback(Object.assign(new Error('ENOSPC: no space left on device'), { code: 'ENOSPC' }));
          },
        });
      },
    });

    const emitted: string[] = [];
    const packing = (async () => {
      for await (const part of archiver.pack(src, 2000, 'Backup')) emitted.push(part.fileName);
    })();

    await expect(packing).rejects.toBeInstanceOf(DiskFullError);
    expect(emitted).toEqual(['Backup_001.zip']);
    expect(await readdir(path.join(out, 'job-1'))).toEqual(['Backup_001.zip']);
  });

  it('refuses to start once cancelled', async () => {
    const archiver = new Archiver({ outputRoot: out, workers: 1 });
    const controller = new AbortController();
    controller.abort();
    await expect(collect(archiver.pack(src, 2000, 'Backup', { signal: controller.signal }))).rejects.toBeInstanceOf(
      ZipvaultAbortError
    );
  });

  it('validates its arguments', () => {
    expect(() => new Archiver({ outputRoot: out, compressionLevel: 10 })).toThrow(ZipvaultValidationError);
    expect(() => new Archiver({ outputRoot: out, workers: 0 })).toThrow(ZipvaultValidationError);
    const archiver = new Archiver({ outputRoot: out, workers: 1 });
    expect(() => archiver.pack(src, 0)).toThrow(ZipvaultValidationError);
    expect(() => archiver.pack(src, 1000, 'a/b')).toThrow(ZipvaultValidationError);
  });
});

describe('unpack', () => {
  it('is idempotent and replaces only changed files', async () => {
    const archiver = new Archiver({ outputRoot: out, workers: 1, compressionLevel: 6, createJobId: () => 'job-1' });
    const parts = await collect(archiver.pack(src, 2000, 'Backup'));

    expect(await unpack(parts, dest)).toEqual({ written: 4, unchanged: 0 });
    expect(await unpack(parts, dest)).toEqual({ written: 0, unchanged: 4 });

    await writeFile(path.join(dest, 'a.txt'), 'HELLO');
    expect(await unpack(parts, dest)).toEqual({ written: 1, unchanged: 3 });
    await expectRestored(dest);
  });

  it('extracts parts in index order regardless of input order', async () => {
    const archiver = new Archiver({ outputRoot: out, workers: 1, compressionLevel: 0, createJobId: () => 'job-1' });
    const parts = await collect(archiver.pack(src, 2000, 'Backup'));
    const seen: number[] = [];
    await unpack([...parts].reverse(), dest, { onEntry: (e) => seen.push(e.part) });
    expect(seen).toEqual([1, 1, 2, 3]);
  });

  it('refuses archives with entries that escape the destination', async () => {
    const chunks: Uint8Array[] = [];
    const zip = new StreamingZipWriter((chunk) => {
      chunks.push(chunk);
    }, { level: 0 });
    for (const name of ['good.txt', '../evil.txt']) {
      zip.startFile(name);
      zip.writeChunk(encoder.encode(name));
      zip.endFile();
    }
    await zip.finalize();
    const zipPath = path.join(root, 'evil.zip');
    await writeFile(zipPath, concatBytes(chunks));

    const err = await unpack([{ index: 1, path: zipPath }], dest).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ZipvaultValidationError);
    expect(err).toMatchObject({ code: 'UNSAFE_ENTRY_NAME' });
    expect(await readdir(dest)).toEqual([]);
  });
});

describe('resolveEntryPath', () => {
  it('maps relative names below the root', () => {
    expect(resolveEntryPath('/restore', 'a/b.txt')).toBe(path.resolve('/restore', 'a', 'b.txt'));
    expect(resolveEntryPath('/restore', './a//b.txt')).toBe(path.resolve('/restore', 'a', 'b.txt'));
  });

  it.each(['../x', 'a/../../x', '/etc/passwd', 'C:/x', 'a\\..\\..\\x', '', 'nul\0byte', '.'])(
    'rejects %j',
    (name) => {
      expect(() => resolveEntryPath('/restore', name)).toThrow(ZipvaultValidationError);
    }
  );
});

describe('zip reader', () => {
  it('lists entries with their recorded sizes', async () => {
    const archiver = new Archiver({ outputRoot: out, workers: 1, compressionLevel: 6, createJobId: () => 'job-1' });
    const [first] = await collect(archiver.pack(src, 2000, 'Backup'));
    const entries = await readZipDirectory(first.path);
    expect(entries.map((e) => [e.name, e.uncompressedSize, e.isDirectory])).toEqual([
      ['a.txt', 5, false],
      ['empty.txt', 0, false],
    ]);
    const bytes = concatBytes(await collect(readZipEntry(first.path, entries[0])));
    expect(new TextDecoder().decode(bytes)).toBe('hello');
  });

  it('flags a recorded size that does not match the data', async () => {
    const archiver = new Archiver({ outputRoot: out, workers: 1, compressionLevel: 0, createJobId: () => 'job-1' });
    const [first] = await collect(archiver.pack(src, 2000, 'Backup'));
    const [entry] = await readZipDirectory(first.path);
    await expect(collect(readZipEntry(first.path, { ...entry, uncompressedSize: 6 }))).rejects.toBeInstanceOf(
      IntegrityError
    );
  });

  it('refuses to restore an entry whose bytes were altered', async () => {
    const archiver = new Archiver({ outputRoot: out, workers: 1, compressionLevel: 0, createJobId: () => 'job-1' });
    const [first] = await collect(archiver.pack(src, 2000, 'Backup'));
    const [entry] = await readZipDirectory(first.path);
    expect(entry.crc32).toBe(crc32(encoder.encode('hello')));

    const bytes = await readFile(first.path);
    bytes[entry.dataOffset] = 'j'.charCodeAt(0);
    await writeFile(first.path, bytes);

    const err = await unpack([first], dest).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(IntegrityError);
    expect(err).toMatchObject({ message: 'Entry "a.txt" failed its CRC-32 check.' });
    await expect(access(path.join(dest, 'a.txt'))).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('rejects a central directory with more records than its entry count', async () => {
    const chunks: Uint8Array[] = [];
    const zip = new StreamingZipWriter((chunk) => {
      chunks.push(chunk);
    }, { level: 0 });
    for (const name of ['one.txt', 'two.txt', 'three.txt']) {
      zip.startFile(name);
      zip.writeChunk(encoder.encode(name));
      zip.endFile();
    }
    await zip.finalize();
    const bytes = Buffer.from(concatBytes(chunks));
    // Both entry counts of the end record, as a 16-bit count would look after wrapping.
    bytes.writeUInt16LE(1, bytes.length - 22 + 8);
    bytes.writeUInt16LE(1, bytes.length - 22 + 10);
    const zipPath = path.join(root, 'wrapped.zip');
    await writeFile(zipPath, bytes);

    await expect(readZipDirectory(zipPath)).rejects.toBeInstanceOf(ZipvaultValidationError);
  });

  it('computes the standard CRC-32', () => {
    expect(crc32(encoder.encode('123456789'))).toBe(0xcbf43926);
    expect(crc32(new Uint8Array(0))).toBe(0);
  });

  it('rejects files that are not ZIP archives', async () => {
    const bogus = path.join(root, 'bogus.zip');
    await writeFile(bogus, 'this is plainly not a zip archive at all');
    await expect(readZipDirectory(bogus)).rejects.toBeInstanceOf(ZipvaultValidationError);
    await writeFile(bogus, 'tiny');
    await expect(readZipDirectory(bogus)).rejects.toBeInstanceOf(ZipvaultValidationError);
  });
});
