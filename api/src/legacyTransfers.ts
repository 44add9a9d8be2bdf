import { ConflictError, ExpiryError, InvalidArgumentError, NotFoundError, PermissionError } from "./errors.js";
import { appendAuditEvent, appendTransferEvent } from "./events.js";
import { isAppendOnly, proposeHistory, validateAppendOnly } from "./history.js";
import { failWith, succeed, unwrap, type Outcome } from "./outcome.js";
import type { Clock, DocumentStore, Transaction } from "./store.js";
import { readToken, requireToken, writeToken } from "./tokens.js";
import { isLiveSession, readActiveSession } from "./twoPhaseTransfers.js";
import type { PendingTransfer, Token } from "./types.js";
import { UserStatsBatch } from "./userStats.js";

export interface LegacyLedgerDeps {
  store: DocumentStore;
  clock: Clock;
  pendingTtlMs: number;
}

export interface FinalizeResult {
  token: Token;
  /** Set when finalize found a leftover COMMITTED record and repaired it instead. */
  reconciled: boolean;
}

/**
 * Applies a COMMITTED pending record left behind by an interrupted write:
 * moves the token to the intended receiver if it is not there yet, then drops
 * the record. Finalize never produces this state itself.
 */
function reconcileInTransaction(
  tx: Transaction,
  token: Token | undefined,
  pending: PendingTransfer,
  now: number
): Token | undefined {
  let result = token;
  let corrected = false;
  const receiver = pending.to_uid;

  if (token && receiver !== null && token.current_owner !== receiver) {
    const proposed = proposeHistory(token.previous_owners, token.current_owner);
    result = {
      ...token,
      current_owner: receiver,
      previous_owners: isAppendOnly(token.previous_owners, proposed, receiver) ? proposed : token.previous_owners,
      counter: Math.max(token.counter, pending.n_next),
      status: "OK",
      last_transfer_at: now
    };
    writeToken(tx, result);
    corrected = true;
  } else if (token && token.status !== "OK") {
    result = { ...token, status: "OK" };
    writeToken(tx, result);
  }

  tx.delete("pendingTransfers", pending.token_id);
  appendAuditEvent(tx, {
    action: "pending.reconciled",
    tokenId: pending.token_id,
    userId: receiver,
    metadata: {
      corrected,
      from_uid: pending.from_uid,
      n_next: pending.n_next
    },
    now
  });
  console.warn(`[ledger] reconciled COMMITTED pending transfer for token ${pending.token_id}`);
  return result;
}

/** The two-step protocol older clients use: initiate by the owner, finalize by the receiver. */
export class LegacyTransferLedger {
  constructor(private readonly deps: LegacyLedgerDeps) {}

  async initiate(tokenId: string, caller: string, toUid?: string): Promise<PendingTransfer> {
    const { store, clock, pendingTtlMs } = this.deps;

    const outcome = await store.runTransaction(async (tx): Promise<Outcome<PendingTransfer>> => {
      let token = await requireToken(tx, tokenId);
      let existing = await tx.get("pendingTransfers", tokenId);
      const now = clock();
      const activeSession = await readActiveSession(tx, tokenId, now);

      let reconciled = false;
      if (existing?.state === "COMMITTED") {
        token = reconcileInTransaction(tx, token, existing, now) ?? token;
        existing = undefined;
        reconciled = true;
      }

      const reject = (error: Error): Outcome<PendingTransfer> => {
        if (reconciled) return failWith(error);
        throw error;
      };

      if (token.current_owner !== caller) {
        return reject(new PermissionError("Only the current owner can initiate a transfer"));
      }
      if (toUid === caller) {
        return reject(new InvalidArgumentError("Cannot transfer a token to its current owner"));
      }
      if (activeSession && isLiveSession(activeSession.status, activeSession.expires_at, now)) {
        return reject(new ConflictError(`Token ${tokenId} has an active transfer session`));
      }
      if (existing?.state === "OPEN" && existing.expires_at > now && existing.from_uid !== caller) {
        return reject(new ConflictError(`Token ${tokenId} already has a pending transfer`));
      }

      const pending: PendingTransfer = {
        token_id: tokenId,
        from_uid: caller,
        to_uid: toUid ?? null,
        n_next: token.counter + 1,
        state: "OPEN",
        created_at: now,
        expires_at: now + pendingTtlMs
      };
      tx.set("pendingTransfers", tokenId, pending);
      writeToken(tx, { ...token, status: "PENDING" });
      return succeed(pending);
    });

    const pending = unwrap(outcome);
    console.log(`[ledger] transfer of ${tokenId} initiated by ${caller}`);
    return pending;
  }

  async finalize(tokenId: string, caller: string, tagUid?: string): Promise<FinalizeResult> {
    const { store, clock } = this.deps;

    const outcome = await store.runTransaction(async (tx): Promise<Outcome<FinalizeResult>> => {
      const pending = await tx.get("pendingTransfers", tokenId);
      const token = await readToken(tx, tokenId);
      if (!pending) throw new ConflictError(`No pending transfer for token ${tokenId}`);
      const now = clock();

      if (pending.state === "COMMITTED") {
        const repaired = reconcileInTransaction(tx, token, pending, now);
        if (!repaired) return failWith(new NotFoundError(`Token ${tokenId} not found`));
        return succeed({ token: repaired, reconciled: true });
      }
      if (!token) throw new NotFoundError(`Token ${tokenId} not found`);
      if (pending.state === "EXPIRED") throw new ExpiryError(`Pending transfer for ${tokenId} expired`);
      if (pending.state !== "OPEN") throw new ConflictError(`Pending transfer for ${tokenId} is ${pending.state}`);

      if (now >= pending.expires_at) {
        tx.update("pendingTransfers", tokenId, { state: "EXPIRED" });
        writeToken(tx, { ...token, status: "OK" });
        return failWith(new ExpiryError(`Pending transfer for ${tokenId} expired`));
      }
      if (pending.from_uid !== token.current_owner || pending.n_next !== token.counter + 1) {
        throw new ConflictError(`Token ${tokenId} changed hands since the transfer was initiated`);
      }
      if (tagUid !== undefined && token.tag_uid !== null && tagUid.toLowerCase() !== token.tag_uid.toLowerCase()) {
        throw new PermissionError("Physical tag does not match this token");
      }

      const receiver = pending.to_uid ?? caller;
      if (receiver !== caller) throw new PermissionError("Transfer is bound to a different receiver");
      if (receiver === token.current_owner) {
        throw new PermissionError("Security violation: receiver already owns this token");
      }

      const proposed = proposeHistory(token.previous_owners, token.current_owner);
      validateAppendOnly(token.previous_owners, proposed, receiver);

      const stats = await UserStatsBatch.load(tx, [token.current_owner, receiver]);
      const updated: Token = {
        ...token,
        current_owner: receiver,
        previous_owners: proposed,
        counter: pending.n_next,
        status: "OK",
        last_transfer_at: now
      };
      writeToken(tx, updated);
      tx.delete("pendingTransfers", tokenId);
      appendTransferEvent(tx, {
        tokenId,
        from: token.current_owner,
        to: receiver,
        counter: updated.counter,
        protocol: "legacy",
        now
      });
      stats.recordTransfer(token.current_owner, receiver, now);
      stats.save(tx);
      return succeed({ token: updated, reconciled: false });
    });

    const result = unwrap(outcome);
    if (!result.reconciled) {
      console.log(`[ledger] token ${tokenId} transferred to ${result.token.current_owner} (counter ${result.token.counter})`);
    }
    return result;
  }

  /** Expires OPEN records past their deadline and frees their tokens. */
  async sweepExpired(batchSize: number): Promise<number> {
    const { store, clock } = this.deps;
    const now = clock();
    const candidates = await store.query(
      "pendingTransfers",
      (doc) => doc.state === "OPEN" && doc.expires_at <= now,
      batchSize
    );

    let expired = 0;
    for (const { id } of candidates) {
      const flipped = await store.runTransaction(async (tx) => {
        const pending = await tx.get("pendingTransfers", id);
        const token = await readToken(tx, id);
        if (!pending || pending.state !== "OPEN" || pending.expires_at > clock()) return false;
        tx.update("pendingTransfers", id, { state: "EXPIRED" });
        if (token && token.status === "PENDING") writeToken(tx, { ...token, status: "OK" });
        return true;
      });
      if (flipped) expired += 1;
    }
    if (expired > 0) console.log(`[ledger] expired ${expired} pending transfers`);
    return expired;
  }

  /** Repairs a leftover COMMITTED record. Returns false when there is nothing to do. */
  async reconcileCommitted(tokenId: string): Promise<boolean> {
    const { store, clock } = this.deps;
    return store.runTransaction(async (tx) => {
      const pending = await tx.get("pendingTransfers", tokenId);
      const token = await readToken(tx, tokenId);
      if (!pending || pending.state !== "COMMITTED") return false;
      reconcileInTransaction(tx, token, pending, clock());
      return true;
    });
  }

  async sweepCommitted(batchSize: number): Promise<number> {
    const artifacts = await this.deps.store.query("pendingTransfers", (doc) => doc.state === "COMMITTED", batchSize);
    let repaired = 0;
    for (const { id } of artifacts) {
      if (await this.reconcileCommitted(id)) repaired += 1;
    }
    return repaired;
  }
}
