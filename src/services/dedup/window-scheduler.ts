/**
 * Window Scheduler
 *
 * Splits the scan range into half-open windows [start, end) where each
 * window starts `overlap` before the previous one ended. Windows are produced
 * lazily so the length can shrink between windows (adaptive sizing).
 *
 * Without a window length and an overlap the whole range is one window.
 */

import type { TimeRange, WindowDescriptor } from '../../core/types.js';
import { ConfigurationInvalidError, createConfigurationError } from '../../core/errors.js';
import { createComponentLogger } from '../../utils/logger.js';

const logger = createComponentLogger('window-scheduler');

export interface WindowResumePoint {
  index: number;
  start: number | null;
  windowLengthMs: number | null;
}

export interface WindowSchedulerOptions {
  range: TimeRange;
  windowLengthMs?: number;
  overlapMs?: number;
  /** Shrink later windows once the index grows past this; 0 or unset disables */
  maxIndexEntries?: number;
  resumeFrom?: WindowResumePoint;
}

export class WindowScheduler {
  readonly windowed: boolean;
  private readonly range: TimeRange;
  private readonly overlapMs: number;
  private readonly maxIndexEntries: number;
  private readonly resumeFrom: WindowResumePoint | undefined;
  private lengthMs: number | null;

  constructor(options: WindowSchedulerOptions) {
    const { range, windowLengthMs, overlapMs } = options;
    this.range = range;
    this.windowed = windowLengthMs !== undefined && overlapMs !== undefined;
    this.overlapMs = this.windowed ? (overlapMs ?? 0) : 0;
    this.lengthMs = this.windowed ? (windowLengthMs ?? null) : null;
    this.maxIndexEntries = options.maxIndexEntries ?? 0;
    this.resumeFrom = options.resumeFrom;

    if (this.windowed) {
      this.validate(windowLengthMs ?? 0, overlapMs ?? 0);
    }

    if (this.resumeFrom?.windowLengthMs !== undefined && this.resumeFrom.windowLengthMs !== null) {
      this.lengthMs = this.resumeFrom.windowLengthMs;
    }
  }

  private validate(windowLengthMs: number, overlapMs: number): void {
    const issues: string[] = [];
    if (windowLengthMs <= 0) {
      issues.push(`windowLengthMs: must be positive (got ${windowLengthMs})`);
    }
    if (overlapMs < 0) {
      issues.push(`overlapMs: must not be negative (got ${overlapMs})`);
    }
    if (overlapMs >= windowLengthMs) {
      issues.push(
        `overlapMs: ${overlapMs}ms must be shorter than the window length (${windowLengthMs}ms), otherwise windows never advance`
      );
    }
    if (issues.length > 0) {
      throw new ConfigurationInvalidError(issues);
    }
    if (this.range.from === undefined || this.range.to === undefined) {
      throw createConfigurationError(
        'range',
        'windowed scans need both range bounds',
        'set DEDUP_FROM and DEDUP_TO, or use a store that reports its time range'
      );
    }
  }

  /** Current window length; null in unbounded mode */
  get currentWindowLengthMs(): number | null {
    return this.lengthMs;
  }

  get overlap(): number {
    return this.overlapMs;
  }

  *windows(): Generator<WindowDescriptor> {
    const { from, to } = this.range;

    if (!this.windowed || from === undefined || to === undefined) {
      yield { index: 0, start: from, end: to, overlapMs: 0, isLast: true };
      return;
    }

    let index = this.resumeFrom?.index ?? 0;
    let start = this.resumeFrom?.start ?? from;

    while (start < to) {
      const length = this.lengthMs ?? to - start;
      const end = Math.min(start + length, to);
      const isLast = end >= to;
      yield { index, start, end, overlapMs: this.overlapMs, isLast };
      if (isLast) return;
      start = end - this.overlapMs;
      index++;
    }
  }

  /**
   * Groups whose newest member is older than this are settled at the end of
   * the window and can be resolved and evicted. Nothing is retained after the
   * last window.
   */
  retentionCutoff(window: WindowDescriptor): number {
    if (window.isLast || window.end === undefined) return Infinity;
    return window.end - window.overlapMs;
  }

  /**
   * Feed back the index size reached in the window just processed.
   *
   * @returns true if later windows were shortened
   */
  reportIndexSize(entries: number): boolean {
    if (!this.windowed || this.lengthMs === null) return false;
    if (this.maxIndexEntries <= 0 || entries <= this.maxIndexEntries) return false;

    const floor = this.overlapMs + 1;
    const next = Math.max(Math.floor(this.lengthMs / 2), floor);
    if (next >= this.lengthMs) return false;

    logger.info(
      { entries, maxIndexEntries: this.maxIndexEntries, previousMs: this.lengthMs, nextMs: next },
      'Index above ceiling, shrinking windows'
    );
    this.lengthMs = next;
    return true;
  }
}
