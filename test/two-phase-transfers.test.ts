import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  ConflictError,
  ExpiryError,
  InvalidArgumentError,
  PermissionError,
  ProtocolError
} from "../api/src/errors.js";
import { hashBytes } from "../api/src/keyVault.js";
import type { CustodyServices } from "../api/src/services.js";
import { getToken } from "../api/src/tokens.js";
import { ManualClock, authenticate, seedToken, testConfig, testServices, withStatus } from "./helpers.js";

const TOKEN = "tok-2pc";
const SECRET = Buffer.alloc(32, 0x5a);
const OTHER_HASH = "ee".repeat(32);

describe("TwoPhaseTransferLedger", () => {
  let clock: ManualClock;
  let services: CustodyServices;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    clock = new ManualClock();
    services = testServices(clock);
    await seedToken(services, TOKEN, {
      current_owner: "A",
      counter: 5,
      previous_owners: ["X"],
      key_version: 1,
      key_hash: hashBytes(SECRET)
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  /** Opens a session to `receiver`, authenticates, validates the card and writes new transfer data. */
  async function prepare(receiver?: string) {
    const transfer = await services.twoPhase.openSession(TOKEN, "A", receiver);
    const { sessionId } = await authenticate(services, TOKEN, "A");
    await services.twoPhase.validateCardKey(sessionId, transfer.id, "A", withStatus(SECRET, 0x9100));
    const written = await services.card.writeTransferData(sessionId, "A", transfer.id);
    return { transfer, authSessionId: sessionId, keyHash: written.keyHash };
  }

  it("commits after a rolled-back attempt, leaving the token untouched in between", async () => {
    const { transfer, keyHash } = await prepare("B");
    const first = await services.twoPhase.stage(transfer.id, "A", keyHash);
    expect(first).toMatchObject({
      from_uid: "A",
      to_uid: "B",
      state: "STAGED",
      original_token_snapshot: { current_owner: "A", previous_owners: ["X"], key_hash: hashBytes(SECRET), counter: 5 },
      new_token_snapshot: { current_owner: "B", previous_owners: ["X", "A"], key_hash: keyHash, counter: 6 }
    });

    const before = await getToken(services.store, TOKEN);
    const rolledBack = await services.twoPhase.rollback(first.id, "A", "card write failed");
    expect(rolledBack).toMatchObject({ state: "ROLLED_BACK", rollback_reason: "card write failed" });
    expect(await getToken(services.store, TOKEN)).toEqual(before);
    expect(await services.store.get("transferSessions", transfer.id)).toMatchObject({
      status: "PENDING",
      staged_transfer_id: null
    });
    const audit = await services.store.query("auditEvents", (e) => e.action === "transfer.rollback");
    expect(audit.map((e) => e.doc.metadata)).toEqual([{ staged_id: first.id, reason: "card write failed" }]);

    const second = await services.twoPhase.stage(transfer.id, "A", keyHash);
    expect(second.id).not.toBe(first.id);
    clock.advance(2_000);
    const token = await services.twoPhase.commit(second.id, "B");
    expect(token).toMatchObject({
      current_owner: "B",
      previous_owners: ["X", "A"],
      key_hash: keyHash,
      counter: 6,
      status: "OK",
      last_transfer_at: clock.now
    });

    expect(await services.store.get("activeTransferSessions", TOKEN)).toBeUndefined();
    expect((await services.store.get("transferSessions", transfer.id))?.status).toBe("COMMITTED");
    expect(await services.store.get("stagedTransfers", second.id)).toMatchObject({
      state: "COMMITTED",
      committed_at: clock.now
    });
    const events = await services.store.query("transferEvents", () => true);
    expect(events.map((e) => [e.doc.protocol, e.doc.from_owner, e.doc.to_owner, e.doc.counter])).toEqual([
      ["two-phase", "A", "B", 6]
    ]);
    await expect(services.twoPhase.commit(second.id, "B")).rejects.toBeInstanceOf(ConflictError);
  });

  it("frees the token for the new owner after commit", async () => {
    const { transfer, keyHash } = await prepare("B");
    const staged = await services.twoPhase.stage(transfer.id, "A", keyHash);
    await services.twoPhase.commit(staged.id, "A");
    await expect(services.legacy.initiate(TOKEN, "B", "C")).resolves.toMatchObject({ n_next: 7 });
  });

  describe("session lifecycle", () => {
    it("allows one live session per token", async () => {
      await services.twoPhase.openSession(TOKEN, "A", "B");
      await expect(services.twoPhase.openSession(TOKEN, "A", "C")).rejects.toBeInstanceOf(ConflictError);
      clock.advance(testConfig().transferSessionTtlMs);
      await expect(services.twoPhase.openSession(TOKEN, "A", "C")).resolves.toMatchObject({ status: "PENDING" });
    });

    it("expires a stale stage on use instead of waiting for the sweep", async () => {
      const { transfer, keyHash } = await prepare("B");
      const staged = await services.twoPhase.stage(transfer.id, "A", keyHash);

      clock.advance(testConfig().stagedTransferTtlMs - 1);
      await expect(services.twoPhase.openSession(TOKEN, "A", "C")).rejects.toThrow(
        `Token ${TOKEN} already has an active transfer session`
      );

      clock.advance(1);
      const reopened = await services.twoPhase.openSession(TOKEN, "A", "C");
      expect(await services.store.get("stagedTransfers", staged.id)).toMatchObject({ state: "EXPIRED" });
      expect(await services.store.get("transferSessions", transfer.id)).toMatchObject({
        status: "PENDING",
        staged_transfer_id: null
      });
      expect(await services.store.get("activeTransferSessions", TOKEN)).toEqual({
        token_id: TOKEN,
        session_id: reopened.id
      });
    });

    it("lets a legacy transfer start once the stage has expired", async () => {
      const { transfer, keyHash } = await prepare("B");
      const staged = await services.twoPhase.stage(transfer.id, "A", keyHash);
      clock.advance(testConfig().stagedTransferTtlMs);

      await expect(services.legacy.initiate(TOKEN, "A", "C")).resolves.toMatchObject({ n_next: 6, state: "OPEN" });
      expect(await services.store.get("stagedTransfers", staged.id)).toMatchObject({ state: "EXPIRED" });
      expect((await getToken(services.store, TOKEN)).current_owner).toBe("A");
    });

    it("issues a 16-byte hex challenge", async () => {
      const session = await services.twoPhase.openSession(TOKEN, "A", "B");
      expect(session.challenge).toMatch(/^[0-9a-f]{32}$/);
    });

    it("is refused while a legacy transfer is open", async () => {
      await services.legacy.initiate(TOKEN, "A", "B");
      await expect(services.twoPhase.openSession(TOKEN, "A", "C")).rejects.toThrow("has a pending legacy transfer");
    });

    it("only opens for the owner", async () => {
      await expect(services.twoPhase.openSession(TOKEN, "B", "C")).rejects.toBeInstanceOf(PermissionError);
      await expect(services.twoPhase.openSession(TOKEN, "A", "A")).rejects.toBeInstanceOf(InvalidArgumentError);
    });
  });

  describe("card validation", () => {
    it("rejects card data the ledger does not know", async () => {
      const transfer = await services.twoPhase.openSession(TOKEN, "A", "B");
      const { sessionId } = await authenticate(services, TOKEN, "A");
      await expect(
        services.twoPhase.validateCardKey(sessionId, transfer.id, "A", withStatus(Buffer.alloc(32, 1), 0x9100))
      ).rejects.toThrow("Card data does not match the ledger");
    });

    it("needs the full secret", async () => {
      const transfer = await services.twoPhase.openSession(TOKEN, "A", "B");
      const { sessionId } = await authenticate(services, TOKEN, "A");
      await expect(
        services.twoPhase.validateCardKey(sessionId, transfer.id, "A", withStatus(SECRET.subarray(0, 16), 0x9100))
      ).rejects.toThrow("Expected 32 bytes of card data, got 16");
    });

    it("needs an authenticated session", async () => {
      const transfer = await services.twoPhase.openSession(TOKEN, "A", "B");
      const begun = await services.auth.begin({ tokenId: TOKEN, userId: "A" });
      await expect(
        services.twoPhase.validateCardKey(begun.sessionId, transfer.id, "A", withStatus(SECRET, 0x9100))
      ).rejects.toBeInstanceOf(ProtocolError);
    });

    it("marks the session validated with the observed hash", async () => {
      const transfer = await services.twoPhase.openSession(TOKEN, "A", "B");
      const { sessionId } = await authenticate(services, TOKEN, "A");
      const validated = await services.twoPhase.validateCardKey(
        sessionId,
        transfer.id,
        "A",
        withStatus(SECRET, 0x9100)
      );
      expect(validated).toMatchObject({ validated: true, validated_key_hash: hashBytes(SECRET), validated_at: clock.now });
    });
  });

  describe("staging", () => {
    it("requires a validated card", async () => {
      const transfer = await services.twoPhase.openSession(TOKEN, "A", "B");
      await expect(services.twoPhase.stage(transfer.id, "A", OTHER_HASH)).rejects.toThrow(
        "Card key has not been validated for this session"
      );
    });

    it("requires the hash of the data written to the card", async () => {
      const { transfer } = await prepare("B");
      await expect(services.twoPhase.stage(transfer.id, "A", OTHER_HASH)).rejects.toThrow(
        "Key hash does not match the data written to the card"
      );
    });

    it("keeps the receiver bound at open", async () => {
      const { transfer, keyHash } = await prepare("B");
      await expect(services.twoPhase.stage(transfer.id, "A", keyHash, "C")).rejects.toThrow(
        "Receiver does not match the one bound to this session"
      );
    });

    it("needs a receiver from somewhere", async () => {
      const transfer = await services.twoPhase.openSession(TOKEN, "A");
      const { sessionId } = await authenticate(services, TOKEN, "A");
      await services.twoPhase.validateCardKey(sessionId, transfer.id, "A", withStatus(SECRET, 0x9100));
      await expect(services.twoPhase.stage(transfer.id, "A", OTHER_HASH)).rejects.toBeInstanceOf(
        InvalidArgumentError
      );
      await expect(services.twoPhase.stage(transfer.id, "A", OTHER_HASH, "D")).resolves.toMatchObject({
        to_uid: "D"
      });
    });
  });

  describe("commit", () => {
    it("expires a staged transfer left too long", async () => {
      const { transfer, keyHash } = await prepare("B");
      const staged = await services.twoPhase.stage(transfer.id, "A", keyHash);
      clock.advance(testConfig().stagedTransferTtlMs);

      await expect(services.twoPhase.commit(staged.id, "B")).rejects.toBeInstanceOf(ExpiryError);
      expect((await services.store.get("stagedTransfers", staged.id))?.state).toBe("EXPIRED");
      expect((await services.store.get("transferSessions", transfer.id))?.status).toBe("PENDING");
      expect((await getToken(services.store, TOKEN)).current_owner).toBe("A");
    });

    it("refuses when the token changed after staging", async () => {
      const { transfer, keyHash } = await prepare("B");
      const staged = await services.twoPhase.stage(transfer.id, "A", keyHash);
      await seedToken(services, TOKEN, { current_owner: "A", counter: 9, key_version: 1 });
      await expect(services.twoPhase.commit(staged.id, "B")).rejects.toThrow("changed since the transfer was staged");
    });

    it("is limited to the two parties", async () => {
      const { transfer, keyHash } = await prepare("B");
      const staged = await services.twoPhase.stage(transfer.id, "A", keyHash);
      await expect(services.twoPhase.commit(staged.id, "M")).rejects.toBeInstanceOf(PermissionError);
      await expect(services.twoPhase.rollback(staged.id, "M", "nope")).rejects.toBeInstanceOf(PermissionError);
    });
  });

  describe("sweepExpired", () => {
    it("expires idle sessions", async () => {
      const session = await services.twoPhase.openSession(TOKEN, "A", "B");
      clock.advance(testConfig().transferSessionTtlMs);
      expect(await services.twoPhase.sweepExpired(10)).toEqual({ sessions: 1, staged: 0 });
      expect((await services.store.get("transferSessions", session.id))?.status).toBe("EXPIRED");
    });

    it("expires stale staged transfers and reopens their session", async () => {
      const { transfer, keyHash } = await prepare("B");
      const staged = await services.twoPhase.stage(transfer.id, "A", keyHash);
      clock.advance(testConfig().stagedTransferTtlMs);
      expect(await services.twoPhase.sweepExpired(10)).toEqual({ sessions: 0, staged: 1 });
      expect((await services.store.get("stagedTransfers", staged.id))?.state).toBe("EXPIRED");
      expect((await services.store.get("transferSessions", transfer.id))?.status).toBe("PENDING");
    });
  });
});
