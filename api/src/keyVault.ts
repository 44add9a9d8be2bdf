import { createHash, createHmac, timingSafeEqual } from "node:crypto";
import { normalizeKey, type DesKey } from "../../secure-messaging/src/index.js";

const KEY_LENGTH = 16;

/**
 * Per-token card keys derived from one master secret. Version 0 is the
 * factory default key every blank card ships with.
 */
export class KeyVault {
  private readonly master: Buffer;

  constructor(masterKeyHex: string) {
    this.master = Buffer.from(masterKeyHex, "hex");
    if (this.master.length < 16) {
      throw new Error("Master key must be at least 16 bytes");
    }
  }

  keyFor(tokenId: string, keyVersion: number): DesKey {
    if (keyVersion === 0) return normalizeKey(Buffer.alloc(KEY_LENGTH));
    const derived = createHmac("sha256", this.master).update(`${tokenId}:${keyVersion}`).digest();
    return normalizeKey(derived.subarray(0, KEY_LENGTH));
  }

  keyHashFor(tokenId: string, keyVersion: number): string {
    return hashBytes(this.keyFor(tokenId, keyVersion).bytes);
  }
}

export function hashBytes(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}

export function hashesEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, "hex");
  const right = Buffer.from(b, "hex");
  return left.length === right.length && timingSafeEqual(left, right);
}
