import { randomBytes, randomUUID, timingSafeEqual } from "node:crypto";
import {
  MalformedResponseError,
  WeakKeyError,
  ZERO_IV,
  buildAdditionalFrame,
  buildAuthenticateFrame,
  formatStatus,
  parseResponse,
  rotateLeft,
  tdesCbcDecrypt,
  tdesCbcEncrypt,
  type CardResponse
} from "../../secure-messaging/src/index.js";
import { ConflictError, ExpiryError, NotFoundError, PermissionError, ProtocolError } from "./errors.js";
import { appendAuditEvent } from "./events.js";
import type { KeyVault } from "./keyVault.js";
import { failWith, succeed, unwrap, type Outcome } from "./outcome.js";
import type { AuthSession, SessionStore } from "./sessionStore.js";
import type { Clock, DocumentStore, Transaction } from "./store.js";
import { readToken, writeToken } from "./tokens.js";
import type { Token } from "./types.js";

export interface AuthProtocolDeps {
  store: DocumentStore;
  sessions: SessionStore;
  vault: KeyVault;
  clock: Clock;
  leaseTtlMs: number;
  random?: (size: number) => Buffer;
}

export interface BeginInput {
  tokenId: string;
  userId: string;
  /** Admits a token that has not been registered yet, for first provisioning. */
  allowUnowned?: boolean;
  keyNo?: number;
}

export interface BeginResult {
  sessionId: string;
  apdus: Buffer[];
}

export type ContinueResult =
  | { phase: "CHALLENGE_SENT"; sessionId: string; apdus: Buffer[] }
  | { phase: "AUTHENTICATED"; sessionId: string; apdus: Buffer[] };

const NONCE_LENGTH = 8;

/** Drops the token lease held by a session, if it still holds it. */
export function releaseLease(tx: Transaction, token: Token | undefined, leaseId: string | null): void {
  if (!token || leaseId === null || token.lease?.lease_id !== leaseId) return;
  writeToken(tx, { ...token, lease: null });
}

function sessionKeyFrom(rndA: Buffer, rndB: Buffer): Buffer {
  return Buffer.concat([rndA.subarray(0, 4), rndB.subarray(0, 4), rndA.subarray(4, 8), rndB.subarray(4, 8)]);
}

/**
 * Three-pass ISO authentication with the card, split across client round trips.
 * Each step runs in its own transaction against the persisted session.
 */
export class AuthProtocolEngine {
  private readonly random: (size: number) => Buffer;

  constructor(private readonly deps: AuthProtocolDeps) {
    this.random = deps.random ?? randomBytes;
  }

  async begin(input: BeginInput): Promise<BeginResult> {
    const { store, sessions, clock, leaseTtlMs } = this.deps;
    const keyNo = input.keyNo ?? 0;

    const session = await store.runTransaction(async (tx) => {
      const token = await readToken(tx, input.tokenId);
      const now = clock();

      if (!token) {
        if (!input.allowUnowned) throw new NotFoundError(`Token ${input.tokenId} not found`);
        return sessions.create(tx, {
          tokenId: input.tokenId,
          userId: input.userId,
          keyNo,
          keyVersion: 0,
          leaseId: null
        });
      }
      if (token.current_owner !== input.userId) {
        throw new PermissionError("Only the current owner can authenticate this token");
      }

      // A live lease blocks every caller, its holder included; only an expired one is replaced.
      if (token.lease && token.lease.expires_at > now) {
        throw new ConflictError(`Token ${token.id} is being authenticated by another session`);
      }

      const leaseId = randomUUID();
      const created = sessions.create(tx, {
        tokenId: token.id,
        userId: input.userId,
        keyNo,
        keyVersion: token.key_version,
        leaseId
      });
      writeToken(tx, {
        ...token,
        lease: { lease_id: leaseId, session_id: created.id, user_id: input.userId, expires_at: now + leaseTtlMs }
      });
      return created;
    });

    console.log(`[auth] session ${session.id} opened for token ${input.tokenId}`);
    return { sessionId: session.id, apdus: [buildAuthenticateFrame(keyNo)] };
  }

  /** Feeds the card's full reply, data plus status word, into the session. */
  async continue(sessionId: string, caller: string, cardResponse: Uint8Array): Promise<ContinueResult> {
    const { store, sessions } = this.deps;

    const outcome = await store.runTransaction(async (tx): Promise<Outcome<ContinueResult>> => {
      const session = await sessions.read(tx, sessionId);
      if (!session) throw new NotFoundError(`Auth session ${sessionId} not found`);
      if (session.userId !== caller) throw new PermissionError("Auth session belongs to another user");
      const token = await readToken(tx, session.tokenId);

      const fail = (error: Error): Outcome<ContinueResult> => {
        sessions.destroy(tx, session.id);
        releaseLease(tx, token, session.leaseId);
        if (token) {
          appendAuditEvent(tx, {
            action: "auth.failed",
            tokenId: session.tokenId,
            userId: caller,
            metadata: { phase: session.phase, reason: error.message },
            now: this.deps.clock()
          });
        }
        return failWith(error);
      };

      if (sessions.isExpired(session)) {
        return fail(new ExpiryError(`Auth session ${sessionId} expired`));
      }
      if (session.phase === "AUTHENTICATED") {
        throw new ProtocolError("Session is already authenticated");
      }
      if (session.leaseId !== null && token?.lease?.lease_id !== session.leaseId) {
        return fail(new ConflictError("Token lease was lost to another session"));
      }

      try {
        const response = parseResponse(cardResponse);
        const result =
          session.phase === "INIT"
            ? this.answerChallenge(tx, session, response)
            : this.verifyCard(tx, session, token, response);
        return succeed(result);
      } catch (error) {
        if (error instanceof ProtocolError) return fail(error);
        if (error instanceof MalformedResponseError) return fail(new ProtocolError(error.message));
        if (error instanceof WeakKeyError) return fail(error);
        throw error;
      }
    });

    if (!outcome.ok) {
      console.warn(`[auth] session ${sessionId} destroyed: ${outcome.error.message}`);
    }
    const result = unwrap(outcome);
    if (result.phase === "AUTHENTICATED") {
      console.log(`[auth] session ${sessionId} authenticated`);
    }
    return result;
  }

  private answerChallenge(tx: Transaction, session: AuthSession, response: CardResponse): ContinueResult {
    if (response.kind !== "more") {
      throw new ProtocolError(`Expected 91AF from card, got ${statusOf(response)}`);
    }
    if (response.data.length !== NONCE_LENGTH) {
      throw new ProtocolError(`Expected ${NONCE_LENGTH} challenge bytes, got ${response.data.length}`);
    }

    const key = this.deps.vault.keyFor(session.tokenId, session.keyVersion);
    const rndB = tdesCbcDecrypt(key, ZERO_IV, response.data);
    const rndA = this.random(NONCE_LENGTH);
    const sent = tdesCbcEncrypt(key, response.data, Buffer.concat([rndA, rotateLeft(rndB)]));

    this.deps.sessions.save(tx, {
      ...session,
      phase: "CHALLENGE_SENT",
      rndA,
      rndB,
      chainedIv: sent.subarray(sent.length - NONCE_LENGTH)
    });
    return { phase: "CHALLENGE_SENT", sessionId: session.id, apdus: [buildAdditionalFrame(sent)] };
  }

  private verifyCard(
    tx: Transaction,
    session: AuthSession,
    token: Token | undefined,
    response: CardResponse
  ): ContinueResult {
    if (response.kind !== "success") {
      throw new ProtocolError(`Expected 9100 from card, got ${statusOf(response)}`);
    }
    if (response.data.length !== NONCE_LENGTH) {
      throw new ProtocolError(`Expected ${NONCE_LENGTH} response bytes, got ${response.data.length}`);
    }
    const { rndA, rndB, chainedIv } = session;
    if (!rndA || !rndB || !chainedIv) {
      throw new ProtocolError("Session is missing challenge state");
    }

    const key = this.deps.vault.keyFor(session.tokenId, session.keyVersion);
    const decrypted = tdesCbcDecrypt(key, chainedIv, response.data);
    if (!timingSafeEqual(decrypted, rotateLeft(rndA))) {
      throw new ProtocolError("Card failed to prove knowledge of the key");
    }

    releaseLease(tx, token, session.leaseId);
    this.deps.sessions.save(tx, {
      ...session,
      phase: "AUTHENTICATED",
      leaseId: null,
      chainedIv: null,
      sessionKey: sessionKeyFrom(rndA, rndB)
    });
    return { phase: "AUTHENTICATED", sessionId: session.id, apdus: [] };
  }
}

function statusOf(response: CardResponse): string {
  switch (response.kind) {
    case "success":
      return "9100";
    case "more":
      return "91AF";
    case "error":
      return `${formatStatus(response.status)} (${response.name})`;
  }
}
