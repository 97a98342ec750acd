import {
  DEFAULT_CHUNKED_CEILING_BYTES,
  DEFAULT_SIMPLE_CEILING_BYTES,
} from '../constants.js';
import { SizeLimitExceededError } from '../errors.js';
import type { BackendPolicy, BackendVariant } from '../types.js';

export const DEFAULT_BACKEND_POLICY: BackendPolicy = {
  simpleEnabled: true,
  chunkedEnabled: true,
  forceSimple: false,
  forceChunked: false,
  simpleCeilingBytes: DEFAULT_SIMPLE_CEILING_BYTES,
  chunkedCeilingBytes: DEFAULT_CHUNKED_CEILING_BYTES,
};

/**
 * Pick the backend for an object of `sizeBytes`. Pure: the same inputs always
 * give the same answer, and no network is involved.
 *
 * 1. force-simple and it fits the simple ceiling: simple
 * 2. fits the simple ceiling, simple enabled and not forced to chunked: simple
 * 3. fits the chunked ceiling and chunked enabled: chunked
 *
 * @throws {SizeLimitExceededError} When no enabled backend can take the object.
 */
export function selectBackend(sizeBytes: number, policy: BackendPolicy): BackendVariant {
  const fitsSimple = policy.simpleEnabled && sizeBytes <= policy.simpleCeilingBytes;

  if (policy.forceSimple && fitsSimple) return 'simple';
  if (!policy.forceChunked && fitsSimple) return 'simple';
  if (policy.chunkedEnabled && sizeBytes <= policy.chunkedCeilingBytes) return 'chunked';

  if (fitsSimple) {
    throw new SizeLimitExceededError('The simple backend is skipped by force-chunked and the chunked backend is disabled.', {
      sizeBytes,
      limitBytes: 0,
    });
  }
  const limits: number[] = [];
  if (policy.simpleEnabled) limits.push(policy.simpleCeilingBytes);
  if (policy.chunkedEnabled) limits.push(policy.chunkedCeilingBytes);
  const limitBytes = limits.length > 0 ? Math.max(...limits) : undefined;
  throw new SizeLimitExceededError(
    limitBytes === undefined
      ? 'No backend is enabled.'
      : `${sizeBytes} bytes exceeds the largest enabled backend limit of ${limitBytes} bytes.`,
    { sizeBytes, limitBytes }
  );
}
