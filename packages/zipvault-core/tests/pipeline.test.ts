import { createReadStream } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  Archiver,
  AuthenticationError,
  TransferOrchestrator,
  ZipvaultValidationError,
  runBackup,
  runRestore,
  sanitizeBaseName,
  type ArchiverOptions,
  type BackendAdapter,
} from '../src/index.js';
import { FakeAdapter, MemoryStore, makeTempDir, removeDir } from './helpers.js';

const photo = Uint8Array.from({ length: 1200 }, (_, i) => (i * 31) % 256);

let root: string;
let source: string;

beforeEach(async () => {
  root = await makeTempDir();
  source = path.join(root, 'My Photos');
  await mkdir(path.join(source, 'notes'), { recursive: true });
  await writeFile(path.join(source, 'one.jpg'), photo);
  await writeFile(path.join(source, 'two.jpg'), photo.subarray(0, 600));
  await writeFile(path.join(source, 'notes', 'readme.txt'), 'hi');
});

afterEach(async () => {
  await removeDir(root);
});

function makeArchiver(overrides: Partial<ArchiverOptions> = {}): Archiver {
  return new Archiver({
    outputRoot: path.join(root, 'staging'),
    workers: 1,
    compressionLevel: 0,
    createJobId: () => 'job-7',
    ...overrides,
  });
}

describe('runBackup', () => {
  it('packs a folder, uploads every part and restores it', async () => {
    const simple = new FakeAdapter('simple');
    const store = new MemoryStore();
    const orchestrator = new TransferOrchestrator({ backends: { simple }, store });
    const completed: Date[] = [];

    const result = await runBackup({
      sourceDir: source,
      archiver: makeArchiver(),
      orchestrator,
      ceilingBytes: 1500,
      onBackupComplete: (at) => completed.push(at),
    });

    expect(result.status).toBe('Uploaded');
    expect(result.jobId).toBe('job-7');
    expect(result.entryErrors).toEqual([]);
    expect(result.summary.succeeded).toBe(3);
    expect(result.parts.map((p) => [p.fileName, p.entries.map((e) => e.relativePath)])).toEqual([
      ['My_Photos_001.zip', ['notes/readme.txt']],
      ['My_Photos_002.zip', ['one.jpg']],
      ['My_Photos_003.zip', ['two.jpg']],
    ]);
    expect([...simple.puts].sort()).toEqual(['My_Photos_001.zip', 'My_Photos_002.zip', 'My_Photos_003.zip']);
    expect(completed).toHaveLength(1);

    expect(orchestrator.getItem(source)).toMatchObject({
      kind: 'folder',
      status: 'Uploaded',
      jobId: 'job-7',
      sizeBytes: 1802,
    });
    const partItems = orchestrator.getItems().filter((item) => item.kind === 'archive-part');
    expect(partItems.map((item) => [item.partIndex, item.status]).sort()).toEqual([
      [1, 'Uploaded'],
      [2, 'Uploaded'],
      [3, 'Uploaded'],
    ]);
    expect(store.latest.find((item) => item.sourcePath === source)?.status).toBe('Uploaded');

    const dest = path.join(root, 'restored');
    const restored = await runRestore({ jobId: 'job-7', destDir: dest, orchestrator });
    expect(restored.missingParts).toEqual([]);
    expect(restored.unpacked).toEqual({ written: 3, unchanged: 0 });
    expect(restored.summary.succeeded).toBe(3);
    expect(new Uint8Array(await readFile(path.join(dest, 'one.jpg')))).toEqual(photo);
    expect(new Uint8Array(await readFile(path.join(dest, 'two.jpg')))).toEqual(photo.subarray(0, 600));
    expect(await readFile(path.join(dest, 'notes', 'readme.txt'), 'utf8')).toBe('hi');
    expect([...simple.gets].sort()).toEqual(['simple-1', 'simple-2', 'simple-3']);
  });

  it('marks the folder Failed when a part cannot be uploaded', async () => {
    const simple = new FakeAdapter('simple', () => {
      throw new AuthenticationError('token expired');
    });
    const orchestrator = new TransferOrchestrator({ backends: { simple } });

    const result = await runBackup({ sourceDir: source, archiver: makeArchiver(), orchestrator, ceilingBytes: 1500 });

    expect(result.status).toBe('Failed');
    expect(result.summary.failed).toBe(3);
    expect(orchestrator.getItem(source)?.error).toEqual({
      kind: 'AuthenticationError',
      message: 'token expired',
      backend: 'simple',
    });
  });

  it('reports unreadable files without failing the backup', async () => {
    async function* denied(): AsyncGenerator<Uint8Array> {
      yield new Uint8Array(0);
      throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
    }
    const archiver = makeArchiver({
      openReadStream: (file) => (file.relativePath === 'two.jpg' ? denied() : createReadStream(file.absolutePath)),
    });
    const orchestrator = new TransferOrchestrator({ backends: { simple: new FakeAdapter('simple') } });

    const result = await runBackup({ sourceDir: source, archiver, orchestrator, ceilingBytes: 1500 });

    expect(result.status).toBe('Uploaded');
    expect(result.parts).toHaveLength(2);
    expect(result.entryErrors.map((e) => e.file.relativePath)).toEqual(['two.jpg']);
    expect(orchestrator.getItem(path.join(source, 'two.jpg'))).toMatchObject({
      kind: 'file',
      status: 'Failed',
      error: { kind: 'IOError', message: 'EACCES: permission denied' },
    });
  });

  it('leaves the folder Pending when cancelled before packing', async () => {
    const simple = new FakeAdapter('simple');
    const orchestrator = new TransferOrchestrator({ backends: { simple } });
    const controller = new AbortController();
    controller.abort();

    const result = await runBackup({
      sourceDir: source,
      archiver: makeArchiver(),
      orchestrator,
      signal: controller.signal,
    });

    expect(result.status).toBe('Pending');
    expect(result.parts).toEqual([]);
    expect(simple.puts).toEqual([]);
    expect(orchestrator.getItem(source)?.status).toBe('Pending');
  });
});

describe('runRestore', () => {
  it('rejects a job with no uploaded parts', async () => {
    const orchestrator = new TransferOrchestrator({ backends: {}, store: new MemoryStore() });
    const err = await runRestore({ jobId: 'missing', destDir: path.join(root, 'out'), orchestrator }).catch(
      (e: unknown) => e
    );
    expect(err).toBeInstanceOf(ZipvaultValidationError);
    expect(err).toMatchObject({ code: 'JOB_NOT_FOUND' });
  });

  it('reports missing parts and skips unpacking after a failed download', async () => {
    const store = new MemoryStore([
      {
        sourcePath: '/staging/job-1/Backup_001.zip',
        kind: 'archive-part',
        sizeBytes: 3,
        modifiedAt: 0,
        status: 'Failed',
        jobId: 'job-1',
        partIndex: 1,
      },
      {
        sourcePath: '/staging/job-1/Backup_002.zip',
        kind: 'archive-part',
        sizeBytes: 3,
        modifiedAt: 0,
        status: 'Uploaded',
        jobId: 'job-1',
        partIndex: 2,
        remote: { backend: 'simple', objectId: 'missing-object', name: 'Backup_002.zip', sizeBytes: 3 },
      },
    ]);
    const denied: BackendAdapter = {
      variant: 'simple',
      maxObjectBytes: Number.MAX_SAFE_INTEGER,
      put: async () => {
        throw new AuthenticationError('token expired');
      },
      async *get(): AsyncGenerator<Uint8Array> {
        throw new AuthenticationError('token expired');
      },
    };
    const orchestrator = new TransferOrchestrator({ backends: { simple: denied }, store });

    const restored = await runRestore({ jobId: 'job-1', destDir: path.join(root, 'out'), orchestrator });
    expect(restored.missingParts).toEqual([1]);
    expect(restored.summary.failed).toBe(1);
    expect(restored.unpacked).toBeUndefined();
  });
});

describe('sanitizeBaseName', () => {
  it('keeps portable characters only', () => {
    expect(sanitizeBaseName('My Photos')).toBe('My_Photos');
    expect(sanitizeBaseName('..hidden dir!')).toBe('hidden_dir_');
    expect(sanitizeBaseName('2026-report_v1.2')).toBe('2026-report_v1.2');
  });
});
