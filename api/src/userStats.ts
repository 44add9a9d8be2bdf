import type { Transaction } from "./store.js";
import type { UserStats } from "./types.js";

export type StatsDelta = Partial<Pick<UserStats, "tokens_owned" | "tokens_received" | "tokens_transferred_out">>;

/** Per-user aggregates. Load inside the transaction before any write, then apply. */
export class UserStatsBatch {
  private constructor(private readonly entries: Map<string, UserStats>) {}

  static async load(tx: Transaction, uids: readonly string[]): Promise<UserStatsBatch> {
    const entries = new Map<string, UserStats>();
    for (const uid of new Set(uids)) {
      const existing = await tx.get("userStats", uid);
      entries.set(
        uid,
        existing ?? { uid, tokens_owned: 0, tokens_received: 0, tokens_transferred_out: 0, last_active_at: 0 }
      );
    }
    return new UserStatsBatch(entries);
  }

  add(uid: string, delta: StatsDelta, now: number): void {
    const stats = this.entries.get(uid);
    if (!stats) throw new Error(`User stats for ${uid} were not loaded`);
    stats.tokens_owned = Math.max(0, stats.tokens_owned + (delta.tokens_owned ?? 0));
    stats.tokens_received += delta.tokens_received ?? 0;
    stats.tokens_transferred_out += delta.tokens_transferred_out ?? 0;
    stats.last_active_at = now;
  }

  recordTransfer(fromUid: string, toUid: string, now: number): void {
    this.add(fromUid, { tokens_owned: -1, tokens_transferred_out: 1 }, now);
    this.add(toUid, { tokens_owned: 1, tokens_received: 1 }, now);
  }

  save(tx: Transaction): void {
    for (const [uid, stats] of this.entries) {
      tx.set("userStats", uid, stats);
    }
  }
}
