import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { CustodyServices } from "../api/src/services.js";
import { getToken } from "../api/src/tokens.js";
import { ManualClock, seedToken, testServices } from "./helpers.js";

describe("Janitor", () => {
  let clock: ManualClock;
  let services: CustodyServices;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    clock = new ManualClock();
    services = testServices(clock);
    for (const id of ["tok-a", "tok-p", "tok-c", "tok-s", "tok-st"]) {
      await seedToken(services, id, { current_owner: "alice", key_version: 1, counter: 1 });
    }
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  async function leaveStaleRecords(): Promise<void> {
    await services.auth.begin({ tokenId: "tok-a", userId: "alice" });
    await services.legacy.initiate("tok-p", "alice", "bob");
    await services.twoPhase.openSession("tok-s", "alice", "bob");

    const now = clock.now;
    await services.store.runTransaction(async (tx) => {
      tx.set("pendingTransfers", "tok-c", {
        token_id: "tok-c",
        from_uid: "alice",
        to_uid: "bob",
        n_next: 2,
        state: "COMMITTED",
        created_at: now,
        expires_at: now + 60_000
      });
      tx.set("transferSessions", "ts-1", {
        id: "ts-1",
        token_id: "tok-st",
        from_uid: "alice",
        to_uid: "bob",
        status: "STAGED",
        challenge: "00".repeat(16),
        validated: true,
        validated_key_hash: null,
        validated_at: now,
        pending_key_hash: null,
        staged_transfer_id: "st-1",
        created_at: now,
        expires_at: now + 300_000
      });
      tx.set("stagedTransfers", "st-1", {
        id: "st-1",
        session_id: "ts-1",
        token_id: "tok-st",
        from_uid: "alice",
        to_uid: "bob",
        original_token_snapshot: { current_owner: "alice", previous_owners: [], key_hash: "", counter: 1 },
        new_token_snapshot: { current_owner: "bob", previous_owners: ["alice"], key_hash: "", counter: 2 },
        state: "STAGED",
        created_at: now,
        expires_at: now + 600_000,
        committed_at: null,
        rolled_back_at: null,
        rollback_reason: null
      });
    });
  }

  it("reports what each sweep cleaned up", async () => {
    await leaveStaleRecords();
    clock.advance(600_000);

    expect(await services.janitor.runOnce()).toEqual({
      authSessions: 1,
      pendingExpired: 1,
      pendingReconciled: 1,
      transferSessions: 1,
      stagedTransfers: 1
    });
    expect((await getToken(services.store, "tok-p")).status).toBe("OK");
    expect((await getToken(services.store, "tok-c")).current_owner).toBe("bob");
    expect((await services.store.get("transferSessions", "ts-1"))?.status).toBe("PENDING");
  });

  it("leaves live records alone", async () => {
    await leaveStaleRecords();
    expect(await services.janitor.runOnce()).toEqual({
      authSessions: 0,
      pendingExpired: 0,
      pendingReconciled: 1,
      transferSessions: 0,
      stagedTransfers: 0
    });
  });

  it("shares a run already in progress", async () => {
    const first = services.janitor.runOnce();
    const second = services.janitor.runOnce();
    expect(second).toBe(first);
    await first;
    const third = services.janitor.runOnce();
    expect(third).not.toBe(first);
    await third;
  });

  it("runs on its interval until stopped", async () => {
    vi.useFakeTimers();
    const runOnce = vi.spyOn(services.janitor, "runOnce");
    services.janitor.start();

    vi.advanceTimersByTime(900_000);
    expect(runOnce).toHaveBeenCalledTimes(1);

    await services.janitor.stop();
    vi.advanceTimersByTime(900_000);
    expect(runOnce).toHaveBeenCalledTimes(1);
  });
});
