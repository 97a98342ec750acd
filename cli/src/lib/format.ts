const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;
const UNIT_STEP = 1000;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Decimal units, the same ones the `*-mb` settings use: 1 MB is 1,000,000 bytes.
 * Two decimals below 10, one below 100, none above.
 */
export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes < UNIT_STEP) return `${Math.max(0, Math.round(bytes) || 0)} B`;
  let unit = 0;
  let value = bytes;
  for (;;) {
    while (value >= UNIT_STEP && unit < BYTE_UNITS.length - 1) {
      value /= UNIT_STEP;
      unit++;
    }
    const digits = value < 10 ? 2 : value < 100 ? 1 : 0;
    const text = value.toFixed(digits);
    // 999.9 KB rounds to "1000"; show it as 1.00 MB instead.
    if (Number(text) >= UNIT_STEP && unit < BYTE_UNITS.length - 1) {
      value = Number(text);
      continue;
    }
    return `${text} ${BYTE_UNITS[unit]}`;
  }
}

export function formatSpeed(bytesPerSec: number): string {
  return `${formatBytes(bytesPerSec)}/s`;
}

/** `m:ss`, or `h:mm:ss` from an hour up; `--:--` while the rate is unknown. */
export function formatEta(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds < 0) return '--:--';
  const total = Math.ceil(seconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  return hours > 0 ? `${hours}:${pad2(minutes)}:${pad2(secs)}` : `${minutes}:${pad2(secs)}`;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const seconds = Math.round(ms / 1000);
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m ${pad2(seconds % 60)}s`;
  const minutes = Math.floor(seconds / 60);
  return `${Math.floor(minutes / 60)}h ${pad2(minutes % 60)}m`;
}

/**
 * Collapse sorted part indexes into ranges: [1, 2, 3, 5] becomes "1-3, 5".
 */
export function formatIndexRanges(indexes: readonly number[]): string {
  const sorted = [...new Set(indexes)].sort((a, b) => a - b);
  const ranges: string[] = [];
  let i = 0;
  while (i < sorted.length) {
    let j = i;
    while (j + 1 < sorted.length && sorted[j + 1] === sorted[j] + 1) j++;
    ranges.push(i === j ? String(sorted[i]) : `${sorted[i]}-${sorted[j]}`);
    i = j + 1;
  }
  return ranges.join(', ');
}

/** Show only the last four characters of a token. */
export function maskSecret(secret: string): string {
  if (secret.length <= 4) return '****';
  return `****${secret.slice(-4)}`;
}

export function pluralize(count: number, singular: string, plural?: string): string {
  return count === 1 ? singular : (plural ?? `${singular}s`);
}
