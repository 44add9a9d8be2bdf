import type { LegacyTransferLedger } from "./legacyTransfers.js";
import type { SessionStore } from "./sessionStore.js";
import type { TwoPhaseTransferLedger } from "./twoPhaseTransfers.js";

export interface SweepReport {
  authSessions: number;
  pendingExpired: number;
  pendingReconciled: number;
  transferSessions: number;
  stagedTransfers: number;
}

export interface JanitorDeps {
  sessions: SessionStore;
  legacy: LegacyTransferLedger;
  twoPhase: TwoPhaseTransferLedger;
  batchSize: number;
  intervalMs: number;
}

/**
 * Periodic cleanup. Every expiry is also enforced on use, so a late or
 * skipped run only leaves stale records around longer.
 */
export class Janitor {
  private timer: NodeJS.Timeout | undefined;
  private running: Promise<SweepReport> | undefined;

  constructor(private readonly deps: JanitorDeps) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.runOnce().catch((err: unknown) => {
        console.error("[janitor] sweep failed:", err);
      });
    }, this.deps.intervalMs);
    this.timer.unref();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    if (this.running) await Promise.allSettled([this.running]);
  }

  /** Runs every sweep once. Overlapping calls share the run in progress. */
  runOnce(): Promise<SweepReport> {
    if (!this.running) {
      this.running = this.sweep().finally(() => {
        this.running = undefined;
      });
    }
    return this.running;
  }

  private async sweep(): Promise<SweepReport> {
    const { sessions, legacy, twoPhase, batchSize } = this.deps;
    const authSessions = await sessions.sweepExpired(batchSize);
    const pendingExpired = await legacy.sweepExpired(batchSize);
    const pendingReconciled = await legacy.sweepCommitted(batchSize);
    const twoPhaseResult = await twoPhase.sweepExpired(batchSize);

    const report: SweepReport = {
      authSessions,
      pendingExpired,
      pendingReconciled,
      transferSessions: twoPhaseResult.sessions,
      stagedTransfers: twoPhaseResult.staged
    };
    console.log("[janitor] sweep complete", report);
    return report;
  }
}
