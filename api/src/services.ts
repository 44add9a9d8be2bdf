import { AuthProtocolEngine } from "./authProtocol.js";
import { CardCommands } from "./cardCommands.js";
import type { ServiceConfig } from "./config.js";
import { Janitor } from "./janitor.js";
import { KeyVault } from "./keyVault.js";
import { LegacyTransferLedger } from "./legacyTransfers.js";
import { MemoryRateLimiter, type AdmissionGate } from "./rateLimit.js";
import { SessionStore } from "./sessionStore.js";
import { MemoryDocumentStore, systemClock, type Clock, type DocumentStore } from "./store.js";
import { TwoPhaseTransferLedger } from "./twoPhaseTransfers.js";

export interface CustodyServices {
  store: DocumentStore;
  clock: Clock;
  vault: KeyVault;
  sessions: SessionStore;
  auth: AuthProtocolEngine;
  card: CardCommands;
  legacy: LegacyTransferLedger;
  twoPhase: TwoPhaseTransferLedger;
  janitor: Janitor;
  gate: AdmissionGate;
}

export interface ServiceOverrides {
  store?: DocumentStore;
  clock?: Clock;
  gate?: AdmissionGate;
  random?: (size: number) => Buffer;
}

function inMemoryStore(): DocumentStore {
  console.warn("[store] no durable store configured; ledger state lives in memory and is lost on restart");
  return new MemoryDocumentStore();
}

/** Wires every component against one store and clock. */
export function createServices(config: ServiceConfig, overrides: ServiceOverrides = {}): CustodyServices {
  const store = overrides.store ?? inMemoryStore();
  const clock = overrides.clock ?? systemClock;
  const vault = new KeyVault(config.masterKeyHex);
  const sessions = new SessionStore(store, clock, config.authSessionTtlMs);

  const legacy = new LegacyTransferLedger({ store, clock, pendingTtlMs: config.pendingTransferTtlMs });
  const twoPhase = new TwoPhaseTransferLedger({
    store,
    sessions,
    clock,
    sessionTtlMs: config.transferSessionTtlMs,
    stagedTtlMs: config.stagedTransferTtlMs
  });

  return {
    store,
    clock,
    vault,
    sessions,
    auth: new AuthProtocolEngine({
      store,
      sessions,
      vault,
      clock,
      leaseTtlMs: config.tokenLeaseTtlMs,
      random: overrides.random
    }),
    card: new CardCommands({ store, sessions, vault, clock, random: overrides.random }),
    legacy,
    twoPhase,
    janitor: new Janitor({
      sessions,
      legacy,
      twoPhase,
      batchSize: config.sweepBatchSize,
      intervalMs: config.sweepIntervalMs
    }),
    gate: overrides.gate ?? new MemoryRateLimiter(config.rateLimitPerUser, config.rateLimitWindowMs, clock)
  };
}
