/**
 * Progress Tracker
 *
 * Moving-average task timing, ETA and throughput for a batch run. The ETA
 * is withheld until the sample window is full; one slow clone would
 * otherwise swing it by hours.
 */

export interface ProgressStats {
  total: number;
  completed: number;
  skipped: number;
  remaining: number;
  elapsedTotalMs: number;
  /** Mean of the last `windowSize` task durations; null before any sample. */
  averageDurationMs: number | null;
  /** null means "insufficient data". */
  etaRemainingMs: number | null;
  throughputPerMinute: number;
}

export interface ProgressTrackerOptions {
  windowSize?: number;
  now?: () => number;
}

export const DEFAULT_PROGRESS_WINDOW = 10;

export class ProgressTracker {
  private readonly windowSize: number;
  private readonly now: () => number;
  private readonly startedAt: number;
  private readonly samples: number[] = [];
  private completed = 0;
  private skipped = 0;

  constructor(
    private readonly total: number,
    options: ProgressTrackerOptions = {},
  ) {
    this.windowSize = Math.max(1, options.windowSize ?? DEFAULT_PROGRESS_WINDOW);
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
  }

  /**
   * A task reached Succeeded or Failed after `durationMs` of work. Pass
   * `timed = false` for outcomes decided without remote work (a failed
   * predecessor), which would drag the average toward zero.
   */
  recordCompletion(durationMs: number, timed = true): void {
    this.completed += 1;
    if (!timed) return;
    this.samples.push(Math.max(0, durationMs));
    if (this.samples.length > this.windowSize) {
      this.samples.shift();
    }
  }

  /** A task needed no work this run. Counts toward progress, not timing. */
  recordSkip(): void {
    this.skipped += 1;
  }

  stats(): ProgressStats {
    const elapsedTotalMs = Math.max(0, this.now() - this.startedAt);
    const remaining = Math.max(0, this.total - this.completed - this.skipped);

    const averageDurationMs =
      this.samples.length > 0
        ? this.samples.reduce((sum, d) => sum + d, 0) / this.samples.length
        : null;

    const etaRemainingMs =
      averageDurationMs !== null && this.samples.length >= this.windowSize
        ? remaining * averageDurationMs
        : null;

    const elapsedMinutes = elapsedTotalMs / 60_000;
    const throughputPerMinute =
      elapsedMinutes > 0 ? this.completed / elapsedMinutes : 0;

    return {
      total: this.total,
      completed: this.completed,
      skipped: this.skipped,
      remaining,
      elapsedTotalMs,
      averageDurationMs,
      etaRemainingMs,
      throughputPerMinute,
    };
  }

  /**
   * One-line status, e.g.
   * `[████████░░…] 4/10 (40.0%) | 2m 5s | ETA: 3m 0s | 1.9/min`
   */
  formatProgressLine(barWidth = 40): string {
    const s = this.stats();
    const processed = s.completed + s.skipped;
    const ratio = s.total > 0 ? processed / s.total : 0;
    const filled = Math.min(barWidth, Math.floor(barWidth * ratio));
    const bar = "█".repeat(filled) + "░".repeat(barWidth - filled);
    const eta =
      s.remaining === 0
        ? ""
        : s.etaRemainingMs === null
          ? " | ETA: insufficient data"
          : ` | ETA: ${formatDuration(s.etaRemainingMs / 1000)}`;
    return (
      `[${bar}] ${processed}/${s.total} (${(ratio * 100).toFixed(1)}%) | ` +
      `${formatDuration(s.elapsedTotalMs / 1000)}${eta} | ` +
      `${s.throughputPerMinute.toFixed(1)}/min`
    );
  }
}

export function formatDuration(seconds: number): string {
  if (seconds < 60) return `${Math.floor(seconds)}s`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m ${Math.floor(seconds % 60)}s`;
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  return `${h}h ${m}m`;
}
