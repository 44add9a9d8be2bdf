import { z } from "zod";
import { ConflictError, InternalError, NotFoundError } from "./errors.js";
import { appendAuditEvent } from "./events.js";
import { validateAppendOnly } from "./history.js";
import type { Clock, DocumentStore, Transaction } from "./store.js";
import type { Token, TokenSnapshot } from "./types.js";
import { UserStatsBatch } from "./userStats.js";

const leaseSchema = z.object({
  lease_id: z.string(),
  session_id: z.string(),
  user_id: z.string(),
  expires_at: z.number()
});

// Older clients wrote the owner under several names; all of them are read here and nowhere else.
const storedTokenSchema = z
  .object({
    id: z.string().optional(),
    current_owner: z.string().min(1).optional(),
    ownerUid: z.string().min(1).optional(),
    current_owner_id: z.string().min(1).optional(),
    uid: z.string().min(1).optional(),
    previous_owners: z.array(z.string()).default([]),
    key_hash: z.string().default(""),
    key_version: z.number().int().nonnegative().default(0),
    counter: z.number().int().nonnegative().default(0),
    status: z.enum(["OK", "PENDING"]).default("OK"),
    lease: leaseSchema.nullable().default(null),
    tag_uid: z.string().nullable().default(null),
    created_at: z.number().default(0),
    last_transfer_at: z.number().nullable().default(null)
  })
  .transform((doc, ctx) => {
    const owner = doc.current_owner ?? doc.ownerUid ?? doc.current_owner_id ?? doc.uid;
    if (owner === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "token has no owner field" });
      return z.NEVER;
    }
    return {
      current_owner: owner,
      previous_owners: doc.previous_owners,
      key_hash: doc.key_hash,
      key_version: doc.key_version,
      counter: doc.counter,
      status: doc.status,
      lease: doc.lease,
      tag_uid: doc.tag_uid,
      created_at: doc.created_at,
      last_transfer_at: doc.last_transfer_at
    };
  });

/** Any token document ever written, canonical or legacy. */
export type StoredToken = z.input<typeof storedTokenSchema>;

export function parseToken(id: string, doc: StoredToken): Token {
  const parsed = storedTokenSchema.safeParse(doc);
  if (!parsed.success) {
    console.error(`[tokens] malformed token document ${id}: ${parsed.error.message}`);
    throw new InternalError(`Token ${id} is malformed`);
  }
  return { id, ...parsed.data };
}

/** Reads and normalizes a token inside a transaction. */
export async function readToken(tx: Transaction, tokenId: string): Promise<Token | undefined> {
  const doc = await tx.get("tokens", tokenId);
  return doc === undefined ? undefined : parseToken(tokenId, doc);
}

export async function requireToken(tx: Transaction, tokenId: string): Promise<Token> {
  const token = await readToken(tx, tokenId);
  if (!token) throw new NotFoundError(`Token ${tokenId} not found`);
  return token;
}

export async function getToken(store: DocumentStore, tokenId: string): Promise<Token> {
  const doc = await store.get("tokens", tokenId);
  if (doc === undefined) throw new NotFoundError(`Token ${tokenId} not found`);
  return parseToken(tokenId, doc);
}

/** Always writes the canonical shape, which drops any legacy owner fields. */
export function writeToken(tx: Transaction, token: Token): void {
  tx.set("tokens", token.id, { ...token });
}

export function snapshotOf(token: Token): TokenSnapshot {
  return {
    current_owner: token.current_owner,
    previous_owners: [...token.previous_owners],
    key_hash: token.key_hash,
    counter: token.counter
  };
}

export interface RegisterTokenInput {
  tokenId: string;
  caller: string;
  keyHash: string;
  tagUid?: string;
  forceOverwrite?: boolean;
}

export interface TokenRegistryDeps {
  store: DocumentStore;
  clock: Clock;
}

export async function registerToken(deps: TokenRegistryDeps, input: RegisterTokenInput): Promise<Token> {
  const { store, clock } = deps;
  const { tokenId, caller, keyHash } = input;

  const token = await store.runTransaction(async (tx) => {
    const existing = await readToken(tx, tokenId);
    const now = clock();

    if (!existing) {
      const stats = await UserStatsBatch.load(tx, [caller]);
      const created: Token = {
        id: tokenId,
        current_owner: caller,
        previous_owners: [],
        key_hash: keyHash,
        key_version: 0,
        counter: 0,
        status: "OK",
        lease: null,
        tag_uid: input.tagUid ?? null,
        created_at: now,
        last_transfer_at: null
      };
      writeToken(tx, created);
      stats.add(caller, { tokens_owned: 1 }, now);
      stats.save(tx);
      appendAuditEvent(tx, { action: "token.register", tokenId, userId: caller, metadata: { overwrite: false }, now });
      return created;
    }

    if (!input.forceOverwrite) {
      throw new ConflictError(`Token ${tokenId} is already registered`);
    }
    if (existing.status === "PENDING") {
      throw new ConflictError(`Token ${tokenId} has a transfer in progress`);
    }

    const previousOwner = existing.current_owner;
    const lastRecorded = existing.previous_owners[existing.previous_owners.length - 1];
    const previousOwners =
      previousOwner !== lastRecorded && previousOwner !== caller
        ? [...existing.previous_owners, previousOwner]
        : [...existing.previous_owners];
    validateAppendOnly(existing.previous_owners, previousOwners, caller);

    const stats = await UserStatsBatch.load(tx, [caller, previousOwner]);
    const updated: Token = {
      ...existing,
      current_owner: caller,
      previous_owners: previousOwners,
      key_hash: keyHash,
      status: "OK",
      lease: null,
      tag_uid: input.tagUid ?? existing.tag_uid
    };
    writeToken(tx, updated);
    if (previousOwner !== caller) {
      stats.add(previousOwner, { tokens_owned: -1 }, now);
      stats.add(caller, { tokens_owned: 1 }, now);
      stats.save(tx);
    }
    appendAuditEvent(tx, {
      action: "token.register",
      tokenId,
      userId: caller,
      metadata: { overwrite: true, previous_owner: previousOwner },
      now
    });
    return updated;
  });

  console.log(`[tokens] registered ${tokenId} to ${caller}`);
  return token;
}
