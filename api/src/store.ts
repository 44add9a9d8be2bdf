import { ConflictError, InternalError } from "./errors.js";
import type {
  ActiveTransferSession,
  AuditEvent,
  AuthSessionDoc,
  PendingTransfer,
  StagedTransfer,
  TransferEvent,
  TransferSession,
  UserStats
} from "./types.js";
import type { StoredToken } from "./tokens.js";

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export interface DocumentTypes {
  tokens: StoredToken;
  authSessions: AuthSessionDoc;
  pendingTransfers: PendingTransfer;
  transferSessions: TransferSession;
  activeTransferSessions: ActiveTransferSession;
  stagedTransfers: StagedTransfer;
  transferEvents: TransferEvent;
  auditEvents: AuditEvent;
  userStats: UserStats;
}

export type CollectionName = keyof DocumentTypes;

export interface StoredDocument<T> {
  id: string;
  doc: T;
}

/**
 * Reads must come before writes. Writes are buffered and applied atomically
 * on commit; a thrown error discards them.
 */
export interface Transaction {
  get<C extends CollectionName>(collection: C, id: string): Promise<DocumentTypes[C] | undefined>;
  set<C extends CollectionName>(collection: C, id: string, doc: DocumentTypes[C]): void;
  update<C extends CollectionName>(collection: C, id: string, patch: Partial<DocumentTypes[C]>): void;
  delete(collection: CollectionName, id: string): void;
}

export interface DocumentStore {
  runTransaction<T>(fn: (tx: Transaction) => Promise<T>): Promise<T>;
  get<C extends CollectionName>(collection: C, id: string): Promise<DocumentTypes[C] | undefined>;
  query<C extends CollectionName>(
    collection: C,
    filter: (doc: DocumentTypes[C]) => boolean,
    limit?: number
  ): Promise<Array<StoredDocument<DocumentTypes[C]>>>;
}

interface Versioned<T> {
  version: number;
  /** undefined marks a deleted document; its version still counts. */
  doc: T | undefined;
}

type Tables = { [C in CollectionName]: Map<string, Versioned<DocumentTypes[C]>> };

interface ReadRecord {
  collection: CollectionName;
  id: string;
  version: number;
}

interface BufferedWrite {
  check(): void;
  apply(version: number): void;
}

class TransactionConflict extends Error {}

export interface MemoryDocumentStoreOptions {
  maxAttempts?: number;
}

export class MemoryDocumentStore implements DocumentStore {
  private readonly tables: Tables = {
    tokens: new Map(),
    authSessions: new Map(),
    pendingTransfers: new Map(),
    transferSessions: new Map(),
    activeTransferSessions: new Map(),
    stagedTransfers: new Map(),
    transferEvents: new Map(),
    auditEvents: new Map(),
    userStats: new Map()
  };
  private version = 0;
  private readonly maxAttempts: number;

  constructor(options: MemoryDocumentStoreOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? 5;
  }

  async runTransaction<T>(fn: (tx: Transaction) => Promise<T>): Promise<T> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      const reads: ReadRecord[] = [];
      const writes: BufferedWrite[] = [];
      const result = await fn(this.createTransaction(reads, writes));
      try {
        this.commit(reads, writes);
        return result;
      } catch (error) {
        if (!(error instanceof TransactionConflict)) throw error;
        console.warn(`[store] transaction conflict on attempt ${attempt}/${this.maxAttempts}`);
      }
    }
    throw new ConflictError(`Transaction aborted after ${this.maxAttempts} conflicting attempts`);
  }

  async get<C extends CollectionName>(collection: C, id: string): Promise<DocumentTypes[C] | undefined> {
    const entry = this.tables[collection].get(id);
    return entry?.doc === undefined ? undefined : structuredClone(entry.doc);
  }

  async query<C extends CollectionName>(
    collection: C,
    filter: (doc: DocumentTypes[C]) => boolean,
    limit = Number.POSITIVE_INFINITY
  ): Promise<Array<StoredDocument<DocumentTypes[C]>>> {
    const results: Array<StoredDocument<DocumentTypes[C]>> = [];
    for (const [id, entry] of this.tables[collection]) {
      if (results.length >= limit) break;
      if (entry.doc !== undefined && filter(entry.doc)) {
        results.push({ id, doc: structuredClone(entry.doc) });
      }
    }
    return results;
  }

  private createTransaction(reads: ReadRecord[], writes: BufferedWrite[]): Transaction {
    const tables = this.tables;
    // Whether each document this transaction wrote exists once its writes so far apply.
    const written = new Map<string, boolean>();

    return {
      get: async <C extends CollectionName>(collection: C, id: string) => {
        if (writes.length > 0) {
          throw new InternalError("Transaction reads must precede writes");
        }
        const entry = tables[collection].get(id);
        reads.push({ collection, id, version: entry?.version ?? 0 });
        return entry?.doc === undefined ? undefined : structuredClone(entry.doc);
      },

      set: <C extends CollectionName>(collection: C, id: string, doc: DocumentTypes[C]) => {
        const value = structuredClone(doc);
        written.set(`${collection}/${id}`, true);
        writes.push({
          check: () => undefined,
          apply: (version) => {
            tables[collection].set(id, { version, doc: value });
          }
        });
      },

      update: <C extends CollectionName>(collection: C, id: string, patch: Partial<DocumentTypes[C]>) => {
        const value = structuredClone(patch);
        const table = tables[collection];
        const exists = written.get(`${collection}/${id}`);
        writes.push({
          check: () => {
            if (exists ?? table.get(id)?.doc !== undefined) return;
            throw new InternalError(`Cannot update missing document ${collection}/${id}`);
          },
          apply: (version) => {
            const current = table.get(id)?.doc;
            if (current === undefined) return;
            table.set(id, { version, doc: { ...current, ...value } });
          }
        });
      },

      delete: (collection: CollectionName, id: string) => {
        const table = tables[collection];
        written.set(`${collection}/${id}`, false);
        writes.push({
          check: () => undefined,
          apply: (version) => {
            if (table.has(id)) table.set(id, { version, doc: undefined });
          }
        });
      }
    };
  }

  // Runs synchronously, so no other transaction can interleave between validation and apply.
  private commit(reads: ReadRecord[], writes: BufferedWrite[]): void {
    for (const read of reads) {
      const current = this.tables[read.collection].get(read.id)?.version ?? 0;
      if (current !== read.version) throw new TransactionConflict();
    }
    for (const write of writes) write.check();
    if (writes.length === 0) return;

    this.version += 1;
    for (const write of writes) write.apply(this.version);
  }
}
