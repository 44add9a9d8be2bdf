import { randomBytes } from "node:crypto";
import {
  MalformedResponseError,
  WeakKeyError,
  buildChangeKeyFrames,
  buildCreateApplicationFrame,
  buildCreateStdDataFileFrame,
  buildReadFrame,
  buildSelectApplicationFrame,
  buildWriteFrames,
  formatStatus,
  parseResponse,
  type CardResponse,
  type CommMode
} from "../../secure-messaging/src/index.js";
import { ConflictError, ExpiryError, NotFoundError, PermissionError, ProtocolError } from "./errors.js";
import { appendAuditEvent } from "./events.js";
import { hashBytes, type KeyVault } from "./keyVault.js";
import { failWith, succeed, unwrap, type Outcome } from "./outcome.js";
import type { AuthSession, SessionStore } from "./sessionStore.js";
import type { Clock, DocumentStore, Transaction } from "./store.js";
import { readToken, requireToken, writeToken } from "./tokens.js";

export interface CardCommandsDeps {
  store: DocumentStore;
  sessions: SessionStore;
  vault: KeyVault;
  clock: Clock;
  random?: (size: number) => Buffer;
}

export const TRANSFER_DATA_FILE = 0x01;
export const TRANSFER_SECRET_LENGTH = 32;

const MASTER_APPLICATION = Buffer.from([0x00, 0x00, 0x00]);
/** AID 000001, least significant byte first. */
const TRANSFER_APPLICATION = Buffer.from([0x01, 0x00, 0x00]);
// Master key changeable, free directory listing and file creation, one key.
const TRANSFER_APP_KEY_SETTINGS = 0x0f;
const TRANSFER_FILE_SIZE = 256;

export interface ProvisionResult {
  apdus: Buffer[];
  steps: string[];
}

export interface ChangeKeyResult {
  apdus: Buffer[];
  keyVersion: number;
  keyHash: string;
}

export interface WriteTransferDataResult {
  apdus: Buffer[];
  keyHash: string;
}

interface AuthenticatedSession extends AuthSession {
  sessionKey: Buffer;
}

/** Card operations that run under an established session key. */
export class CardCommands {
  private readonly random: (size: number) => Buffer;

  constructor(private readonly deps: CardCommandsDeps) {
    this.random = deps.random ?? randomBytes;
  }

  /** Rotates the card master key to the next derived version. */
  async changeKey(sessionId: string, caller: string): Promise<ChangeKeyResult> {
    const { store, sessions, vault } = this.deps;

    const outcome = await store.runTransaction(async (tx): Promise<Outcome<ChangeKeyResult>> => {
      const checked = await this.authenticated(tx, sessionId, caller);
      if (!checked.ok) return checked;
      const session = checked.value;

      const token = await requireToken(tx, session.tokenId);
      if (token.current_owner !== caller) throw new PermissionError("Only the current owner can rotate keys");
      if (token.key_version !== session.keyVersion) {
        throw new ConflictError("Token key changed since this session authenticated");
      }

      const nextVersion = token.key_version + 1;
      const oldKey = vault.keyFor(token.id, token.key_version);
      const newKey = vault.keyFor(token.id, nextVersion);
      const keyHash = vault.keyHashFor(token.id, nextVersion);

      let apdus: Buffer[];
      try {
        apdus = buildChangeKeyFrames(session.keyNo, oldKey, newKey, session.sessionKey, nextVersion);
      } catch (error) {
        if (!(error instanceof WeakKeyError)) throw error;
        sessions.destroy(tx, session.id);
        return failWith(error);
      }

      sessions.save(tx, { ...session, pendingKeyChange: { key_version: nextVersion, key_hash: keyHash } });
      return succeed({ apdus, keyVersion: nextVersion, keyHash });
    });

    return this.finish(sessionId, outcome);
  }

  /** Records the rotation once the card has acknowledged the final ChangeKey frame. */
  async confirmKeyChange(
    sessionId: string,
    caller: string,
    cardResponse: Uint8Array
  ): Promise<{ keyVersion: number }> {
    const { store, sessions, clock } = this.deps;

    const outcome = await store.runTransaction(async (tx): Promise<Outcome<{ keyVersion: number }>> => {
      const checked = await this.authenticated(tx, sessionId, caller);
      if (!checked.ok) return checked;
      const session = checked.value;
      const pending = session.pendingKeyChange;
      if (!pending) throw new ConflictError("No key change is pending on this session");

      const token = await requireToken(tx, session.tokenId);
      sessions.destroy(tx, session.id);

      let reply: CardResponse;
      try {
        reply = parseResponse(cardResponse);
      } catch (error) {
        if (error instanceof MalformedResponseError) return failWith(new ProtocolError(error.message));
        throw error;
      }
      if (reply.kind === "error") {
        return failWith(new ProtocolError(`Card rejected ChangeKey with ${formatStatus(reply.status)} (${reply.name})`));
      }
      if (reply.kind === "more") {
        return failWith(new ProtocolError("Card expects more ChangeKey frames"));
      }

      writeToken(tx, { ...token, key_version: pending.key_version });
      appendAuditEvent(tx, {
        action: "token.key-rotated",
        tokenId: token.id,
        userId: caller,
        metadata: { key_version: pending.key_version, key_hash: pending.key_hash },
        now: clock()
      });
      return succeed({ keyVersion: pending.key_version });
    });

    const result = this.finish(sessionId, outcome);
    console.log(`[card] token key rotated to version ${result.keyVersion}`);
    return result;
  }

  /**
   * Writes a fresh ownership secret to the transfer data file. Only its hash is
   * kept, on the transfer session, for staging and later validation.
   */
  async writeTransferData(
    sessionId: string,
    caller: string,
    transferSessionId: string,
    mode: CommMode = "maced"
  ): Promise<WriteTransferDataResult> {
    const { store, sessions, clock } = this.deps;

    const outcome = await store.runTransaction(async (tx): Promise<Outcome<WriteTransferDataResult>> => {
      const checked = await this.authenticated(tx, sessionId, caller);
      if (!checked.ok) return checked;
      const session = checked.value;

      const transfer = await tx.get("transferSessions", transferSessionId);
      if (!transfer) throw new NotFoundError(`Transfer session ${transferSessionId} not found`);
      if (transfer.token_id !== session.tokenId) {
        throw new PermissionError("Transfer session is for a different token");
      }
      if (transfer.from_uid !== caller) throw new PermissionError("Only the sender can write transfer data");
      if (transfer.status !== "PENDING") {
        throw new ConflictError(`Transfer session is ${transfer.status}, expected PENDING`);
      }
      if (clock() >= transfer.expires_at) {
        tx.update("transferSessions", transfer.id, { status: "EXPIRED" });
        return failWith(new ExpiryError(`Transfer session ${transfer.id} expired`));
      }

      const secret = this.random(TRANSFER_SECRET_LENGTH);
      const keyHash = hashBytes(secret);
      let apdus: Buffer[];
      try {
        apdus = buildWriteFrames(TRANSFER_DATA_FILE, 0, secret, session.sessionKey, mode);
      } catch (error) {
        if (!(error instanceof WeakKeyError)) throw error;
        sessions.destroy(tx, session.id);
        return failWith(error);
      }

      tx.update("transferSessions", transfer.id, { pending_key_hash: keyHash });
      return succeed({ apdus, keyHash });
    });

    return this.finish(sessionId, outcome);
  }

  async readFileData(
    sessionId: string,
    caller: string,
    fileNo: number,
    length: number,
    offset = 0
  ): Promise<{ apdus: Buffer[] }> {
    const outcome = await this.deps.store.runTransaction(async (tx): Promise<Outcome<{ apdus: Buffer[] }>> => {
      const checked = await this.authenticated(tx, sessionId, caller);
      if (!checked.ok) return checked;
      return succeed({ apdus: [buildReadFrame(fileNo, offset, length)] });
    });
    return this.finish(sessionId, outcome);
  }

  /**
   * Frames that lay out a blank card: select the PICC level, create and select
   * application 000001, then create the plain 256-byte transfer data file.
   * Selecting an application drops the card's authentication, so the session
   * ends here and the next operation authenticates again.
   */
  async provisionCard(sessionId: string, caller: string): Promise<ProvisionResult> {
    const { store, sessions, clock } = this.deps;

    const outcome = await store.runTransaction(async (tx): Promise<Outcome<ProvisionResult>> => {
      const checked = await this.authenticated(tx, sessionId, caller);
      if (!checked.ok) return checked;
      const session = checked.value;

      const token = await readToken(tx, session.tokenId);
      if (token && token.current_owner !== caller) {
        throw new PermissionError("Only the current owner can provision the card");
      }

      sessions.destroy(tx, session.id);
      appendAuditEvent(tx, {
        action: "card.provisioned",
        tokenId: session.tokenId,
        userId: caller,
        metadata: { application: "000001", file_no: TRANSFER_DATA_FILE },
        now: clock()
      });
      return succeed({
        apdus: [
          buildSelectApplicationFrame(MASTER_APPLICATION),
          buildCreateApplicationFrame(TRANSFER_APPLICATION, TRANSFER_APP_KEY_SETTINGS, 1),
          buildSelectApplicationFrame(TRANSFER_APPLICATION),
          buildCreateStdDataFileFrame(TRANSFER_DATA_FILE, 0x00, 0x0000, TRANSFER_FILE_SIZE)
        ],
        steps: [
          "Select master application",
          "Create application 000001",
          "Select application 000001",
          "Create data file 01"
        ]
      });
    });

    const result = this.finish(sessionId, outcome);
    console.log(`[card] provisioning frames issued for session ${sessionId}`);
    return result;
  }

  private async authenticated(
    tx: Transaction,
    sessionId: string,
    caller: string
  ): Promise<Outcome<AuthenticatedSession>> {
    const { sessions } = this.deps;
    const session = await sessions.read(tx, sessionId);
    if (!session) throw new NotFoundError(`Auth session ${sessionId} not found`);
    if (session.userId !== caller) throw new PermissionError("Auth session belongs to another user");
    if (sessions.isExpired(session)) {
      sessions.destroy(tx, session.id);
      return failWith(new ExpiryError(`Auth session ${sessionId} expired`));
    }
    const { sessionKey } = session;
    if (session.phase !== "AUTHENTICATED" || sessionKey === null) {
      throw new ProtocolError("Auth session is not authenticated");
    }
    return succeed({ ...session, sessionKey });
  }

  private finish<T>(sessionId: string, outcome: Outcome<T>): T {
    if (!outcome.ok) {
      console.warn(`[card] session ${sessionId}: ${outcome.error.message}`);
    }
    return unwrap(outcome);
  }
}
