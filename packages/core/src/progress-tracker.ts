import type { IngestProgress } from "@docseek/types";

export interface ProgressTrackerOptions {
  documentId: string;
  pagesTotal: number;
  emit: (progress: IngestProgress) => void;
  /** Milliseconds; defaults to Date.now. */
  now?: () => number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Page-granular ingest progress. The remaining-time estimate extrapolates
 * the average time per completed page; it stays null until a page is done.
 */
export class ProgressTracker {
  private pagesDone = 0;
  private readonly startedAt: number;
  private readonly now: () => number;

  constructor(private readonly options: ProgressTrackerOptions) {
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
  }

  start(): void {
    this.options.emit(this.snapshot());
  }

  advance(pages = 1): void {
    if (pages <= 0 || this.pagesDone >= this.options.pagesTotal) return;
    this.pagesDone = Math.min(this.options.pagesTotal, this.pagesDone + pages);
    this.options.emit(this.snapshot());
  }

  /** Marks every page done and emits, even when nothing was left to advance. */
  finish(): void {
    this.pagesDone = this.options.pagesTotal;
    this.options.emit(this.snapshot());
  }

  snapshot(): IngestProgress {
    const { documentId, pagesTotal } = this.options;
    const elapsedSeconds = Math.max(0, (this.now() - this.startedAt) / 1000);
    const estimatedSecondsRemaining =
      this.pagesDone === 0
        ? null
        : round2((elapsedSeconds / this.pagesDone) * (pagesTotal - this.pagesDone));

    return {
      documentId,
      pagesDone: this.pagesDone,
      pagesTotal,
      elapsedSeconds: round2(elapsedSeconds),
      estimatedSecondsRemaining,
    };
  }
}
