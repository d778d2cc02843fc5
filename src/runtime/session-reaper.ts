import type { Logger } from "../observability/logger";
import type { SessionId } from "../core/types";

/** The part of the engine the reaper needs. */
export interface IdleSweeper {
  sweepIdle(now?: Date): SessionId[];
}

export interface SweepReport {
  at: string;
  swept: SessionId[];
}

/**
 * Periodically cancels sessions left waiting on an operator. The timer is
 * unref'd so an idle reaper never keeps the process alive.
 */
export class SessionReaper {
  private timer: NodeJS.Timeout | undefined;
  private sweptTotal = 0;
  private lastSweep: SweepReport | undefined;

  constructor(
    private readonly engine: IdleSweeper,
    private readonly intervalMs: number,
    private readonly logger: Logger,
    private readonly onSweep?: (report: SweepReport) => void,
  ) {}

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      this.runOnce();
    }, this.intervalMs);
    this.timer.unref();
  }

  runOnce(now: Date = new Date()): SweepReport {
    const report: SweepReport = {
      at: now.toISOString(),
      swept: this.engine.sweepIdle(now),
    };

    this.sweptTotal += report.swept.length;
    this.lastSweep = report;
    if (report.swept.length > 0) {
      this.logger.info({ swept: report.swept }, "idle sessions cancelled");
    }
    this.onSweep?.(report);
    return report;
  }

  getState(): { running: boolean; sweptTotal: number; lastSweep?: SweepReport } {
    return {
      running: this.timer !== undefined,
      sweptTotal: this.sweptTotal,
      ...(this.lastSweep ? { lastSweep: this.lastSweep } : {}),
    };
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = undefined;
  }
}
