import { STATUS_REPORT_INTERVAL_MS } from '../constants.js';
import type { Logger } from '../logging/index.js';

export interface ProgressReporterOptions {
  /** What is counted, e.g. "elements" */
  unit: string;
  intervalMs?: number;
  now?: () => number;
}

/**
 * Periodic status lines for long-running loops
 *
 * `add()` is called from the loop; a line is logged at most once per interval.
 */
export class ProgressReporter {
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly startedAt: number;
  private lastReportAt: number;
  private total = 0;

  constructor(
    private readonly logger: Logger,
    private readonly options: ProgressReporterOptions
  ) {
    this.intervalMs = options.intervalMs ?? STATUS_REPORT_INTERVAL_MS;
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
    this.lastReportAt = this.startedAt;
  }

  add(n = 1, extra?: Record<string, unknown>): void {
    this.total += n;
    const at = this.now();
    if (at - this.lastReportAt >= this.intervalMs) {
      this.lastReportAt = at;
      this.logger.info(`${this.total} ${this.options.unit} so far`, {
        ...extra,
        perSecond: this.rate(at),
      });
    }
  }

  finish(extra?: Record<string, unknown>): void {
    const at = this.now();
    this.logger.info(`${this.total} ${this.options.unit} in ${((at - this.startedAt) / 1000).toFixed(1)}s`, {
      ...extra,
      perSecond: this.rate(at),
    });
  }

  private rate(at: number): number {
    const seconds = (at - this.startedAt) / 1000;
    return seconds > 0 ? Math.round(this.total / seconds) : this.total;
  }
}
