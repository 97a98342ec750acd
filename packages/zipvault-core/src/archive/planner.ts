import { MAX_ZIP_ENTRY_BYTES } from '../constants.js';
import { SizeLimitExceededError } from '../errors.js';

/** A regular file found under the packed directory. */
export interface SourceFile {
  /** `/`-separated path relative to the packed directory. */
  relativePath: string;
  absolutePath: string;
  sizeBytes: number;
  mtimeMs: number;
}

export interface PlannedContainer {
  files: SourceFile[];
  /** Upper bound of the finished archive's size. */
  estimatedBytes: number;
  oversized: boolean;
}

export interface RejectedFile {
  file: SourceFile;
  error: SizeLimitExceededError;
}

export interface ContainerPlan {
  containers: PlannedContainer[];
  rejected: RejectedFile[];
}

/** End of central directory record without a comment. */
export const END_RECORD_BYTES = 22;

/** The end record counts entries in 16 bits. */
export const MAX_ENTRIES_PER_CONTAINER = 0xffff;

// Local header (30) + data descriptor (16) + central record (46) fits well within this.
const ENTRY_FIXED_BYTES = 128;
// Stored-block framing is 5 bytes per block; assume blocks no larger than 16 KiB.
const DEFLATE_BLOCK_BYTES = 16384;
const DEFLATE_BLOCK_OVERHEAD = 5;
const DEFLATE_STREAM_SLACK = 64;

/**
 * Conservative number of bytes one file adds to an archive: headers and the
 * central directory record (the name appears twice) plus the worst-case payload.
 */
export function estimateEntryBytes(relativePath: string, sizeBytes: number, compressionLevel: number): number {
  const nameBytes = Buffer.byteLength(relativePath, 'utf8');
  const payload = compressionLevel === 0
    ? sizeBytes
    : sizeBytes + DEFLATE_BLOCK_OVERHEAD * Math.ceil(sizeBytes / DEFLATE_BLOCK_BYTES) + DEFLATE_STREAM_SLACK;
  return ENTRY_FIXED_BYTES + 2 * nameBytes + payload;
}

/**
 * Split files (already in packing order) into containers whose estimated size
 * stays within `ceilingBytes` and which hold at most {@link MAX_ENTRIES_PER_CONTAINER} entries. A file that cannot fit even alone gets a container
 * of its own flagged `oversized`; files a ZIP without ZIP64 cannot hold are rejected.
 */
export function planContainers(
  files: readonly SourceFile[],
  ceilingBytes: number,
  compressionLevel: number
): ContainerPlan {
  const containers: PlannedContainer[] = [];
  const rejected: RejectedFile[] = [];
  let current: PlannedContainer = { files: [], estimatedBytes: END_RECORD_BYTES, oversized: false };

  const seal = (): void => {
    if (current.files.length > 0) containers.push(current);
    current = { files: [], estimatedBytes: END_RECORD_BYTES, oversized: false };
  };

  for (const file of files) {
    const cost = estimateEntryBytes(file.relativePath, file.sizeBytes, compressionLevel);

    if (file.sizeBytes >= MAX_ZIP_ENTRY_BYTES || END_RECORD_BYTES + cost > MAX_ZIP_ENTRY_BYTES) {
      rejected.push({
        file,
        error: new SizeLimitExceededError(
          `${file.relativePath} is too large for an archive without ZIP64 records.`,
          { sizeBytes: file.sizeBytes, limitBytes: MAX_ZIP_ENTRY_BYTES }
        ),
      });
      continue;
    }

    if (END_RECORD_BYTES + cost > ceilingBytes) {
      seal();
      containers.push({ files: [file], estimatedBytes: END_RECORD_BYTES + cost, oversized: true });
      continue;
    }

    if (current.files.length >= MAX_ENTRIES_PER_CONTAINER) seal();
    if (current.files.length > 0 && current.estimatedBytes + cost > ceilingBytes) seal();
    current.files.push(file);
    current.estimatedBytes += cost;
  }
  seal();

  return { containers, rejected };
}

/** `{baseName}_{index:03d}.zip` */
export function formatPartName(baseName: string, index: number): string {
  return `${baseName}_${String(index).padStart(3, '0')}.zip`;
}

/** Code-unit ordering, independent of locale. */
export function compareRelativePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
