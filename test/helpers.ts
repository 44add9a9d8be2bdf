/**
 * Shared test utilities: config, a controllable clock, an in-process card and server.
 */

import { randomBytes } from "node:crypto";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { Application } from "express";
import {
  INS_ADDITIONAL_FRAME,
  INS_AUTHENTICATE_ISO,
  SW_ADDITIONAL_FRAME,
  SW_SUCCESS,
  ZERO_IV,
  rotateLeft,
  tdesCbcDecrypt,
  tdesCbcEncrypt,
  type DesKey
} from "../secure-messaging/src/index.js";
import { signSessionToken } from "../api/src/auth.js";
import type { ServiceConfig } from "../api/src/config.js";
import { openGate, type AdmissionGate } from "../api/src/rateLimit.js";
import { createServices, type CustodyServices } from "../api/src/services.js";
import { MemoryDocumentStore, type Clock } from "../api/src/store.js";
import type { StoredToken } from "../api/src/tokens.js";

export const TEST_SIGNING_SECRET = "test-secret";
export const TEST_ADMIN_KEY = "test-admin-key";
export const TEST_MASTER_KEY = "0f".repeat(16);

export function testConfig(overrides: Partial<ServiceConfig> = {}): ServiceConfig {
  return {
    port: 0,
    devMode: true,
    sessionSigningSecret: TEST_SIGNING_SECRET,
    adminApiKey: TEST_ADMIN_KEY,
    masterKeyHex: TEST_MASTER_KEY,
    authSessionTtlMs: 60_000,
    tokenLeaseTtlMs: 15_000,
    pendingTransferTtlMs: 600_000,
    transferSessionTtlMs: 300_000,
    stagedTransferTtlMs: 600_000,
    sweepIntervalMs: 900_000,
    sweepBatchSize: 100,
    rateLimitPerUser: 1000,
    rateLimitWindowMs: 60_000,
    ...overrides
  };
}

export class ManualClock {
  constructor(public now = 1_700_000_000_000) {}

  readonly read: Clock = () => this.now;

  advance(ms: number): void {
    this.now += ms;
  }
}

export function testServices(
  clock: ManualClock,
  config: ServiceConfig = testConfig(),
  gate: AdmissionGate = openGate
): CustodyServices {
  return createServices(config, { store: new MemoryDocumentStore(), clock: clock.read, gate });
}

/** Writes a token document as-is, bypassing registration. */
export async function seedToken(services: CustodyServices, id: string, doc: StoredToken): Promise<void> {
  await services.store.runTransaction(async (tx) => {
    tx.set("tokens", id, doc);
  });
}

export const withStatus = (data: Uint8Array, status: number): Buffer =>
  Buffer.concat([data, Buffer.from([status >> 8, status & 0xff])]);

/** Card side of the three-pass ISO authentication. */
export class FakeCard {
  private rndB: Buffer | null = null;
  private lastCipher: Buffer | null = null;
  sessionKey: Buffer | null = null;

  constructor(private readonly key: DesKey) {}

  answerAuthenticate(apdu: Buffer): Buffer {
    if (apdu[1] !== INS_AUTHENTICATE_ISO) throw new Error(`Unexpected INS ${apdu[1]}`);
    this.rndB = randomBytes(8);
    this.lastCipher = tdesCbcEncrypt(this.key, ZERO_IV, this.rndB);
    return withStatus(this.lastCipher, SW_ADDITIONAL_FRAME);
  }

  answerChallenge(apdu: Buffer): Buffer {
    if (apdu[1] !== INS_ADDITIONAL_FRAME || !this.rndB || !this.lastCipher) {
      throw new Error("Card was not challenged");
    }
    const body = apdu.subarray(5, 5 + apdu[4]);
    const plain = tdesCbcDecrypt(this.key, this.lastCipher, body);
    const rndA = plain.subarray(0, 8);
    if (!plain.subarray(8, 16).equals(rotateLeft(this.rndB))) {
      return withStatus(Buffer.alloc(0), 0x91ae);
    }
    this.sessionKey = Buffer.concat([
      rndA.subarray(0, 4),
      this.rndB.subarray(0, 4),
      rndA.subarray(4, 8),
      this.rndB.subarray(4, 8)
    ]);
    return withStatus(tdesCbcEncrypt(this.key, body.subarray(8, 16), rotateLeft(rndA)), SW_SUCCESS);
  }
}

/** Runs a full authentication for the owner and returns the session id and the card. */
export async function authenticate(
  services: CustodyServices,
  tokenId: string,
  userId: string,
  keyVersion = 1
): Promise<{ sessionId: string; card: FakeCard }> {
  const card = new FakeCard(services.vault.keyFor(tokenId, keyVersion));
  const begun = await services.auth.begin({ tokenId, userId });
  const challenge = await services.auth.continue(begun.sessionId, userId, card.answerAuthenticate(begun.apdus[0]));
  await services.auth.continue(begun.sessionId, userId, card.answerChallenge(challenge.apdus[0]));
  return { sessionId: begun.sessionId, card };
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Start the Express app on a random port; return the base URL and a close fn. */
export async function startTestServer(app: Application): Promise<{
  url: string;
  close: () => Promise<void>;
}> {
  const server: Server = await new Promise((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("Server has no TCP address");
  const { port }: AddressInfo = address;
  return {
    url: `http://127.0.0.1:${port}`,
    close: () => new Promise((res, rej) => server.close((e) => (e ? rej(e) : res())))
  };
}

export async function bearer(userId: string, extra: Record<string, string> = {}): Promise<Record<string, string>> {
  const token = await signSessionToken(userId, TEST_SIGNING_SECRET, 300);
  return { "content-type": "application/json", authorization: `Bearer ${token}`, ...extra };
}
