import { randomUUID } from "node:crypto";
import type { Clock, DocumentStore, Transaction } from "./store.js";
import type { AuthPhase, AuthSessionDoc, PendingKeyChange } from "./types.js";

export interface AuthSession {
  id: string;
  tokenId: string;
  userId: string;
  phase: AuthPhase;
  keyNo: number;
  keyVersion: number;
  leaseId: string | null;
  rndA: Buffer | null;
  rndB: Buffer | null;
  chainedIv: Buffer | null;
  sessionKey: Buffer | null;
  pendingKeyChange: PendingKeyChange | null;
  createdAt: number;
  expiresAt: number;
}

export interface NewAuthSession {
  tokenId: string;
  userId: string;
  keyNo: number;
  keyVersion: number;
  leaseId: string | null;
}

const toBase64 = (bytes: Buffer | null): string | null => (bytes ? bytes.toString("base64") : null);
const fromBase64 = (value: string | null): Buffer | null => (value === null ? null : Buffer.from(value, "base64"));

function toDoc(session: AuthSession): AuthSessionDoc {
  return {
    id: session.id,
    token_id: session.tokenId,
    user_id: session.userId,
    phase: session.phase,
    key_no: session.keyNo,
    key_version: session.keyVersion,
    lease_id: session.leaseId,
    rnd_a: toBase64(session.rndA),
    rnd_b: toBase64(session.rndB),
    chained_iv: toBase64(session.chainedIv),
    session_key: toBase64(session.sessionKey),
    pending_key_change: session.pendingKeyChange,
    created_at: session.createdAt,
    expires_at: session.expiresAt
  };
}

function fromDoc(doc: AuthSessionDoc): AuthSession {
  return {
    id: doc.id,
    tokenId: doc.token_id,
    userId: doc.user_id,
    phase: doc.phase,
    keyNo: doc.key_no,
    keyVersion: doc.key_version,
    leaseId: doc.lease_id,
    rndA: fromBase64(doc.rnd_a),
    rndB: fromBase64(doc.rnd_b),
    chainedIv: fromBase64(doc.chained_iv),
    sessionKey: fromBase64(doc.session_key),
    pendingKeyChange: doc.pending_key_change,
    createdAt: doc.created_at,
    expiresAt: doc.expires_at
  };
}

/**
 * Authentication sessions persisted between the round trips of a card tap.
 * Byte fields are base64 at rest and Buffers everywhere else.
 */
export class SessionStore {
  constructor(
    private readonly store: DocumentStore,
    private readonly clock: Clock,
    readonly ttlMs: number
  ) {}

  create(tx: Transaction, input: NewAuthSession): AuthSession {
    const now = this.clock();
    const session: AuthSession = {
      id: randomUUID(),
      ...input,
      phase: "INIT",
      rndA: null,
      rndB: null,
      chainedIv: null,
      sessionKey: null,
      pendingKeyChange: null,
      createdAt: now,
      expiresAt: now + this.ttlMs
    };
    tx.set("authSessions", session.id, toDoc(session));
    return session;
  }

  async read(tx: Transaction, sessionId: string): Promise<AuthSession | undefined> {
    const doc = await tx.get("authSessions", sessionId);
    return doc === undefined ? undefined : fromDoc(doc);
  }

  async get(sessionId: string): Promise<AuthSession | undefined> {
    const doc = await this.store.get("authSessions", sessionId);
    return doc === undefined ? undefined : fromDoc(doc);
  }

  save(tx: Transaction, session: AuthSession): void {
    tx.set("authSessions", session.id, toDoc(session));
  }

  destroy(tx: Transaction, sessionId: string): void {
    tx.delete("authSessions", sessionId);
  }

  isExpired(session: AuthSession): boolean {
    return this.clock() >= session.expiresAt;
  }

  /** Deletes sessions past their TTL. Returns how many were removed. */
  async sweepExpired(batchSize: number): Promise<number> {
    const now = this.clock();
    const expired = await this.store.query("authSessions", (doc) => doc.expires_at <= now, batchSize);
    let removed = 0;
    for (const { id } of expired) {
      const deleted = await this.store.runTransaction(async (tx) => {
        const doc = await tx.get("authSessions", id);
        if (!doc || doc.expires_at > this.clock()) return false;
        tx.delete("authSessions", id);
        return true;
      });
      if (deleted) removed += 1;
    }
    return removed;
  }
}
