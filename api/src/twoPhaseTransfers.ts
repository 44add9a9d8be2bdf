import { randomBytes, randomUUID } from "node:crypto";
import { MalformedResponseError, parseResponse, type CardResponse } from "../../secure-messaging/src/index.js";
import { TRANSFER_SECRET_LENGTH } from "./cardCommands.js";
import {
  ConflictError,
  ExpiryError,
  InvalidArgumentError,
  NotFoundError,
  PermissionError,
  ProtocolError
} from "./errors.js";
import { appendAuditEvent, appendTransferEvent } from "./events.js";
import { proposeHistory, validateAppendOnly } from "./history.js";
import { hashBytes, hashesEqual } from "./keyVault.js";
import { failWith, succeed, unwrap, type Outcome } from "./outcome.js";
import type { SessionStore } from "./sessionStore.js";
import type { Clock, DocumentStore, Transaction } from "./store.js";
import { requireToken, snapshotOf, writeToken } from "./tokens.js";
import type { StagedTransfer, Token, TransferSession, TransferSessionStatus } from "./types.js";
import { UserStatsBatch } from "./userStats.js";

export interface TwoPhaseLedgerDeps {
  store: DocumentStore;
  sessions: SessionStore;
  clock: Clock;
  sessionTtlMs: number;
  stagedTtlMs: number;
}

export interface SweepResult {
  sessions: number;
  staged: number;
}

/** A two-phase session blocks other transfers while PENDING and unexpired, or while STAGED (see readActiveSession). */
export function isLiveSession(status: TransferSessionStatus, expiresAt: number, now: number): boolean {
  if (status === "STAGED") return true;
  return status === "PENDING" && now < expiresAt;
}

/**
 * Reads the token's current two-phase session. A staged transfer past its TTL is
 * expired on the spot and its session returned to PENDING, so a stale stage stops
 * blocking the token before the janitor gets to it. Buffers writes: call after
 * every other read of the transaction.
 */
export async function readActiveSession(
  tx: Transaction,
  tokenId: string,
  now: number
): Promise<TransferSession | undefined> {
  const active = await tx.get("activeTransferSessions", tokenId);
  if (!active) return undefined;
  const session = await tx.get("transferSessions", active.session_id);
  if (!session || session.status !== "STAGED" || session.staged_transfer_id === null) return session;

  const staged = await tx.get("stagedTransfers", session.staged_transfer_id);
  if (!staged || staged.state !== "STAGED" || now < staged.expires_at) return session;
  tx.update("stagedTransfers", staged.id, { state: "EXPIRED" });
  tx.update("transferSessions", session.id, { status: "PENDING", staged_transfer_id: null });
  return { ...session, status: "PENDING", staged_transfer_id: null };
}

/**
 * Ledger side of a transfer that brackets a physical card write: the token
 * document changes only on commit, so a failed write rolls back for free.
 */
export class TwoPhaseTransferLedger {
  constructor(private readonly deps: TwoPhaseLedgerDeps) {}

  async openSession(tokenId: string, caller: string, toUid?: string): Promise<TransferSession> {
    const { store, clock, sessionTtlMs } = this.deps;

    const session = await store.runTransaction(async (tx) => {
      const token = await requireToken(tx, tokenId);
      const pending = await tx.get("pendingTransfers", tokenId);
      const now = clock();
      const current = await readActiveSession(tx, tokenId, now);

      if (token.current_owner !== caller) {
        throw new PermissionError("Only the current owner can open a transfer session");
      }
      if (toUid === caller) throw new InvalidArgumentError("Cannot transfer a token to its current owner");
      if (current && isLiveSession(current.status, current.expires_at, now)) {
        throw new ConflictError(`Token ${tokenId} already has an active transfer session`);
      }
      if (pending?.state === "OPEN" && pending.expires_at > now) {
        throw new ConflictError(`Token ${tokenId} has a pending legacy transfer`);
      }

      const created: TransferSession = {
        id: randomUUID(),
        token_id: tokenId,
        from_uid: caller,
        to_uid: toUid ?? null,
        status: "PENDING",
        challenge: randomBytes(16).toString("hex"),
        validated: false,
        validated_key_hash: null,
        validated_at: null,
        pending_key_hash: null,
        staged_transfer_id: null,
        created_at: now,
        expires_at: now + sessionTtlMs
      };
      tx.set("transferSessions", created.id, created);
      tx.set("activeTransferSessions", tokenId, { token_id: tokenId, session_id: created.id });
      return created;
    });

    console.log(`[ledger] transfer session ${session.id} opened for token ${tokenId}`);
    return session;
  }

  /**
   * Checks the ownership data read back from the card under an authenticated
   * session against what the ledger expects the card to hold.
   */
  async validateCardKey(
    authSessionId: string,
    transferSessionId: string,
    caller: string,
    cardResponse: Uint8Array
  ): Promise<TransferSession> {
    const { store, sessions, clock } = this.deps;

    const outcome = await store.runTransaction(async (tx): Promise<Outcome<TransferSession>> => {
      const auth = await sessions.read(tx, authSessionId);
      const transfer = await tx.get("transferSessions", transferSessionId);
      if (!auth) throw new NotFoundError(`Auth session ${authSessionId} not found`);
      if (!transfer) throw new NotFoundError(`Transfer session ${transferSessionId} not found`);
      const token = await requireToken(tx, transfer.token_id);
      const now = clock();

      if (auth.userId !== caller || transfer.from_uid !== caller) {
        throw new PermissionError("Sessions belong to another user");
      }
      if (auth.tokenId !== transfer.token_id) throw new PermissionError("Auth session is for a different token");
      if (sessions.isExpired(auth)) {
        sessions.destroy(tx, auth.id);
        return failWith(new ExpiryError(`Auth session ${authSessionId} expired`));
      }
      if (auth.phase !== "AUTHENTICATED") throw new ProtocolError("Auth session is not authenticated");
      if (transfer.status !== "PENDING") {
        throw new ConflictError(`Transfer session is ${transfer.status}, expected PENDING`);
      }
      if (now >= transfer.expires_at) {
        tx.update("transferSessions", transfer.id, { status: "EXPIRED" });
        return failWith(new ExpiryError(`Transfer session ${transfer.id} expired`));
      }

      let reply: CardResponse;
      try {
        reply = parseResponse(cardResponse);
      } catch (error) {
        if (error instanceof MalformedResponseError) throw new ProtocolError(error.message);
        throw error;
      }
      if (reply.kind !== "success") throw new ProtocolError("Card did not complete the read");
      if (reply.data.length < TRANSFER_SECRET_LENGTH) {
        throw new ProtocolError(`Expected ${TRANSFER_SECRET_LENGTH} bytes of card data, got ${reply.data.length}`);
      }

      const observed = hashBytes(reply.data.subarray(0, TRANSFER_SECRET_LENGTH));
      const expected = [transfer.pending_key_hash, token.key_hash].filter((hash): hash is string => !!hash);
      if (!expected.some((hash) => hashesEqual(hash, observed))) {
        throw new PermissionError("Card data does not match the ledger");
      }

      const validated: TransferSession = {
        ...transfer,
        validated: true,
        validated_key_hash: observed,
        validated_at: now
      };
      tx.set("transferSessions", transfer.id, validated);
      return succeed(validated);
    });

    return unwrap(outcome);
  }

  async stage(transferSessionId: string, caller: string, newKeyHash: string, toUid?: string): Promise<StagedTransfer> {
    const { store, clock, stagedTtlMs } = this.deps;

    const outcome = await store.runTransaction(async (tx): Promise<Outcome<StagedTransfer>> => {
      const session = await tx.get("transferSessions", transferSessionId);
      if (!session) throw new NotFoundError(`Transfer session ${transferSessionId} not found`);
      const token = await requireToken(tx, session.token_id);
      const pending = await tx.get("pendingTransfers", session.token_id);
      const now = clock();

      if (session.status !== "PENDING") {
        throw new ConflictError(`Transfer session is ${session.status}, expected PENDING`);
      }
      if (now >= session.expires_at) {
        tx.update("transferSessions", session.id, { status: "EXPIRED" });
        return failWith(new ExpiryError(`Transfer session ${session.id} expired`));
      }
      if (!session.validated) throw new PermissionError("Card key has not been validated for this session");
      if (session.from_uid !== caller || token.current_owner !== caller) {
        throw new PermissionError("Only the current owner can stage a transfer");
      }
      if (pending?.state === "OPEN" && pending.expires_at > now) {
        throw new ConflictError(`Token ${token.id} has a pending legacy transfer`);
      }
      if (session.pending_key_hash !== null && !hashesEqual(session.pending_key_hash, newKeyHash)) {
        throw new PermissionError("Key hash does not match the data written to the card");
      }

      const receiver = resolveReceiver(session, toUid);
      if (receiver === token.current_owner) {
        throw new PermissionError("Security violation: receiver already owns this token");
      }
      const proposed = proposeHistory(token.previous_owners, token.current_owner);
      validateAppendOnly(token.previous_owners, proposed, receiver);

      const staged: StagedTransfer = {
        id: randomUUID(),
        session_id: session.id,
        token_id: token.id,
        from_uid: caller,
        to_uid: receiver,
        original_token_snapshot: snapshotOf(token),
        new_token_snapshot: {
          current_owner: receiver,
          previous_owners: proposed,
          key_hash: newKeyHash,
          counter: token.counter + 1
        },
        state: "STAGED",
        created_at: now,
        expires_at: now + stagedTtlMs,
        committed_at: null,
        rolled_back_at: null,
        rollback_reason: null
      };
      tx.set("stagedTransfers", staged.id, staged);
      tx.update("transferSessions", session.id, { status: "STAGED", staged_transfer_id: staged.id, to_uid: receiver });
      return succeed(staged);
    });

    const staged = unwrap(outcome);
    console.log(`[ledger] staged transfer ${staged.id} of ${staged.token_id} to ${staged.to_uid}`);
    return staged;
  }

  async commit(stagedId: string, caller: string): Promise<Token> {
    const { store, clock } = this.deps;

    const outcome = await store.runTransaction(async (tx): Promise<Outcome<Token>> => {
      const staged = await tx.get("stagedTransfers", stagedId);
      if (!staged) throw new NotFoundError(`Staged transfer ${stagedId} not found`);
      const token = await requireToken(tx, staged.token_id);
      const now = clock();

      if (caller !== staged.from_uid && caller !== staged.to_uid) {
        throw new PermissionError("Only the sender or receiver can commit");
      }
      if (staged.state !== "STAGED") throw new ConflictError(`Staged transfer is ${staged.state}`);
      if (now >= staged.expires_at) {
        tx.update("stagedTransfers", staged.id, { state: "EXPIRED" });
        tx.update("transferSessions", staged.session_id, { status: "PENDING", staged_transfer_id: null });
        return failWith(new ExpiryError(`Staged transfer ${staged.id} expired`));
      }

      const before = staged.original_token_snapshot;
      if (token.current_owner !== before.current_owner || token.counter !== before.counter) {
        throw new ConflictError(`Token ${token.id} changed since the transfer was staged`);
      }

      const stats = await UserStatsBatch.load(tx, [staged.from_uid, staged.to_uid]);
      const after = staged.new_token_snapshot;
      const updated: Token = {
        ...token,
        current_owner: after.current_owner,
        previous_owners: after.previous_owners,
        key_hash: after.key_hash,
        counter: after.counter,
        status: "OK",
        last_transfer_at: now
      };
      writeToken(tx, updated);
      tx.update("transferSessions", staged.session_id, { status: "COMMITTED" });
      tx.update("stagedTransfers", staged.id, { state: "COMMITTED", committed_at: now });
      tx.delete("activeTransferSessions", staged.token_id);
      appendTransferEvent(tx, {
        tokenId: staged.token_id,
        from: staged.from_uid,
        to: staged.to_uid,
        counter: updated.counter,
        protocol: "two-phase",
        now
      });
      stats.recordTransfer(staged.from_uid, staged.to_uid, now);
      stats.save(tx);
      return succeed(updated);
    });

    const token = unwrap(outcome);
    console.log(`[ledger] committed transfer ${stagedId}: ${token.id} now owned by ${token.current_owner}`);
    return token;
  }

  /** Abandons a staged transfer after a failed card write. The session can be staged again. */
  async rollback(stagedId: string, caller: string, reason: string): Promise<StagedTransfer> {
    const { store, clock } = this.deps;

    const staged = await store.runTransaction(async (tx) => {
      const current = await tx.get("stagedTransfers", stagedId);
      if (!current) throw new NotFoundError(`Staged transfer ${stagedId} not found`);
      if (caller !== current.from_uid && caller !== current.to_uid) {
        throw new PermissionError("Only the sender or receiver can roll back");
      }
      if (current.state !== "STAGED") throw new ConflictError(`Staged transfer is ${current.state}`);
      const now = clock();

      const rolledBack: StagedTransfer = {
        ...current,
        state: "ROLLED_BACK",
        rolled_back_at: now,
        rollback_reason: reason
      };
      tx.set("stagedTransfers", current.id, rolledBack);
      tx.update("transferSessions", current.session_id, { status: "PENDING", staged_transfer_id: null });
      appendAuditEvent(tx, {
        action: "transfer.rollback",
        tokenId: current.token_id,
        userId: caller,
        metadata: { staged_id: current.id, reason },
        now
      });
      return rolledBack;
    });

    console.log(`[ledger] rolled back transfer ${stagedId}: ${reason}`);
    return staged;
  }

  /** Expires idle sessions and staged transfers nobody committed in time. */
  async sweepExpired(batchSize: number): Promise<SweepResult> {
    const { store, clock } = this.deps;
    const now = clock();
    const result: SweepResult = { sessions: 0, staged: 0 };

    const idle = await store.query(
      "transferSessions",
      (doc) => doc.status === "PENDING" && doc.expires_at <= now,
      batchSize
    );
    for (const { id } of idle) {
      const flipped = await store.runTransaction(async (tx) => {
        const session = await tx.get("transferSessions", id);
        if (!session || session.status !== "PENDING" || session.expires_at > clock()) return false;
        tx.update("transferSessions", id, { status: "EXPIRED" });
        return true;
      });
      if (flipped) result.sessions += 1;
    }

    const stale = await store.query(
      "stagedTransfers",
      (doc) => doc.state === "STAGED" && doc.expires_at <= now,
      batchSize
    );
    for (const { id } of stale) {
      const flipped = await store.runTransaction(async (tx) => {
        const staged = await tx.get("stagedTransfers", id);
        if (!staged || staged.state !== "STAGED" || staged.expires_at > clock()) return false;
        tx.update("stagedTransfers", id, { state: "EXPIRED" });
        tx.update("transferSessions", staged.session_id, { status: "PENDING", staged_transfer_id: null });
        return true;
      });
      if (flipped) result.staged += 1;
    }

    if (result.sessions + result.staged > 0) {
      console.log(`[ledger] expired ${result.sessions} transfer sessions and ${result.staged} staged transfers`);
    }
    return result;
  }
}

function resolveReceiver(session: TransferSession, toUid: string | undefined): string {
  if (toUid !== undefined && session.to_uid !== null && toUid !== session.to_uid) {
    throw new PermissionError("Receiver does not match the one bound to this session");
  }
  const receiver = toUid ?? session.to_uid;
  if (receiver === null) throw new InvalidArgumentError("A receiver is required");
  return receiver;
}
