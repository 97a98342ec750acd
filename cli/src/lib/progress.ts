import type { ProgressEvent } from '@zipvault/core';
import { formatBytes, formatSpeed, formatEta } from './format.js';
import { dim, cyan, green, hideCursor, showCursor, clearLine } from './output.js';

const BAR_CHAR_FILLED = '━';
const BAR_CHAR_HEAD = '╺';
const BAR_CHAR_EMPTY = '─';

interface SpeedSample {
  time: number;
  bytes: number;
}

export interface TallySnapshot {
  processedBytes: number;
  totalBytes: number;
  active: number;
  finished: number;
}

/**
 * Sums per-unit progress events into one figure for the whole run.
 * A unit that is retried restarts from zero, so its latest event replaces the previous one.
 */
export class TransferTally {
  private readonly units = new Map<string, { done: number; total: number; finished: boolean }>();

  record(evt: ProgressEvent): TallySnapshot {
    this.units.set(evt.unitId, { done: evt.bytesDone, total: evt.bytesTotal, finished: evt.done });
    return this.snapshot();
  }

  snapshot(): TallySnapshot {
    let processedBytes = 0;
    let totalBytes = 0;
    let active = 0;
    let finished = 0;
    for (const unit of this.units.values()) {
      processedBytes += unit.done;
      totalBytes += unit.total;
      if (unit.finished) finished++;
      else active++;
    }
    return { processedBytes, totalBytes, active, finished };
  }
}

/**
 * One-line progress bar with a rolling-window speed and smoothed ETA.
 * Renders only on a TTY; callers print other lines through `log` so the bar is redrawn below them.
 */
export class ProgressRenderer {
  private startTime = 0;
  private samples: SpeedSample[] = [];
  private smoothedSpeed = 0;
  private lastRenderTime = 0;
  private lastLine = '';
  private finished = false;

  update(evt: { processedBytes: number; totalBytes: number; label?: string }): void {
    if (this.finished || !process.stdout.isTTY) return;

    const now = Date.now();
    if (this.startTime === 0) {
      this.startTime = now;
      hideCursor();
    }

    // Speed sampling (rolling window of ~3 seconds)
    this.samples.push({ time: now, bytes: evt.processedBytes });
    const windowStart = now - 3000;
    while (this.samples.length > 2 && this.samples[0].time < windowStart) {
      this.samples.shift();
    }

    if (this.samples.length >= 2) {
      const oldest = this.samples[0];
      const newest = this.samples[this.samples.length - 1];
      const dt = (newest.time - oldest.time) / 1000;
      if (dt > 0) {
        const rawSpeed = Math.max(0, (newest.bytes - oldest.bytes) / dt);
        this.smoothedSpeed = this.smoothedSpeed === 0
          ? rawSpeed
          : this.smoothedSpeed * 0.7 + rawSpeed * 0.3;
      }
    }

    const percent = evt.totalBytes > 0 ? (evt.processedBytes / evt.totalBytes) * 100 : 0;

    // Throttle renders to ~15fps
    if (now - this.lastRenderTime < 67 && percent < 100) return;
    this.lastRenderTime = now;

    this.lastLine = this.formatBar(percent, evt.processedBytes, evt.totalBytes, evt.label);
    clearLine();
    process.stdout.write(`${this.lastLine}\r`);
  }

  /** Print a line above the bar. */
  log(line: string): void {
    if (process.stdout.isTTY && this.lastLine && !this.finished) {
      clearLine();
      console.log(line);
      process.stdout.write(`${this.lastLine}\r`);
      return;
    }
    console.log(line);
  }

  private formatBar(percent: number, processed: number, total: number, label?: string): string {
    const termWidth = process.stdout.columns || 80;
    const pct = Math.min(100, Math.max(0, percent));
    const pctStr = `${Math.floor(pct)}%`.padStart(4);
    const speedStr = this.smoothedSpeed > 0 ? formatSpeed(this.smoothedSpeed) : '---';

    let etaStr: string;
    if (pct >= 100) {
      etaStr = green('Done');
    } else if (this.smoothedSpeed > 0 && total > 0) {
      etaStr = `ETA ${formatEta((total - processed) / this.smoothedSpeed)}`;
    } else {
      etaStr = '';
    }

    const sizes = dim(`${formatBytes(processed)}/${formatBytes(total)}`);
    const suffix = `${pctStr}  ${speedStr}  ${etaStr}`;
    const labelStr = label ? `  ${dim(label)}` : '';
    const barMaxWidth = termWidth - 4 - suffix.length - 2 - (label ? label.length + 2 : 0) - 24;
    const barWidth = Math.max(10, Math.min(barMaxWidth, 40));

    const filledWidth = Math.round((pct / 100) * barWidth);
    const emptyWidth = barWidth - filledWidth;

    let bar: string;
    if (pct >= 100) {
      bar = green(BAR_CHAR_FILLED.repeat(barWidth));
    } else if (filledWidth === 0) {
      bar = dim(BAR_CHAR_EMPTY.repeat(barWidth));
    } else {
      bar = cyan(BAR_CHAR_FILLED.repeat(filledWidth - 1) + BAR_CHAR_HEAD) + dim(BAR_CHAR_EMPTY.repeat(emptyWidth));
    }

    return `  [${bar}] ${suffix}  ${sizes}${labelStr}`;
  }

  finish(): void {
    if (this.finished) return;
    this.finished = true;
    showCursor();

    if (!process.stdout.isTTY) return;
    if (this.lastLine) process.stdout.write('\n');
  }

  getElapsedMs(): number {
    return this.startTime > 0 ? Date.now() - this.startTime : 0;
  }
}
