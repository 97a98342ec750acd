import { randomBytes } from 'node:crypto';
import { createWriteStream } from 'node:fs';
import { mkdir, rename, rm } from 'node:fs/promises';
import path from 'node:path';
import { IntegrityError, classifyFsError } from '../errors.js';
import type { AdapterTransferOptions, BackendAdapter, RemoteReference } from '../types.js';
import { SizedWriter } from '../utils/sized-writer.js';

/**
 * Stream an object into `destPath`. Bytes land in a temporary file beside the
 * destination, which is renamed into place only once the byte count matches
 * `ref.sizeBytes`; on any failure the temporary file is removed and `destPath`
 * is left as it was.
 *
 * @returns Bytes written.
 * @throws {IntegrityError} If the backend delivered a different number of bytes.
 */
export async function downloadToFile(
  adapter: BackendAdapter,
  ref: RemoteReference,
  destPath: string,
  opts: AdapterTransferOptions = {}
): Promise<number> {
  const target = path.resolve(destPath);
  const dir = path.dirname(target);
  const tempPath = path.join(dir, `.${path.basename(target)}.${randomBytes(4).toString('hex')}.download`);

  try {
    await mkdir(dir, { recursive: true });
  } catch (err) {
    throw classifyFsError(err, dir);
  }

  let received = 0;
  const writer = new SizedWriter(createWriteStream(tempPath, { flags: 'wx' }), Number.POSITIVE_INFINITY, tempPath);
  try {
    for await (const chunk of adapter.get(ref, opts)) {
      received += chunk.byteLength;
      if (received > ref.sizeBytes) break;
      await writer.write(chunk);
    }
    await writer.close();
    if (received !== ref.sizeBytes) {
      throw new IntegrityError(
        `Downloaded ${received > ref.sizeBytes ? `more than ${ref.sizeBytes}` : received} bytes of ${ref.name}, expected ${ref.sizeBytes}.`,
        { details: { expected: ref.sizeBytes, received, objectId: ref.objectId } }
      );
    }
  } catch (err) {
    writer.destroy();
    await rm(tempPath, { force: true });
    throw err;
  }

  try {
    await rename(tempPath, target);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw classifyFsError(err, target);
  }
  return received;
}
