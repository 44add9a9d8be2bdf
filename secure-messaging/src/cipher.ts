import { createCipheriv, createDecipheriv } from "node:crypto";
import { WeakKeyError } from "./errors.js";
import { normalizeKey, toEde3Key, type DesKey } from "./keys.js";
import { padIso9797M2 } from "./padding.js";

export const DES_BLOCK_SIZE = 8;
export const ZERO_IV = Buffer.alloc(DES_BLOCK_SIZE);

// Two-key keys run as K1||K2||K1 so only the EDE3 primitive is ever needed.
const ALGORITHM = "des-ede3-cbc";

const assertBlocks = (data: Uint8Array): void => {
  if (data.length % DES_BLOCK_SIZE !== 0) {
    throw new RangeError(`Data length ${data.length} is not a multiple of ${DES_BLOCK_SIZE}`);
  }
};

const runCipher = (
  direction: "encrypt" | "decrypt",
  rawKey: Uint8Array | DesKey,
  iv: Uint8Array,
  data: Uint8Array
): Buffer => {
  assertBlocks(data);
  const key = toEde3Key(normalizeKey(rawKey));
  try {
    if (direction === "encrypt") {
      const cipher = createCipheriv(ALGORITHM, key, iv);
      cipher.setAutoPadding(false);
      return Buffer.concat([cipher.update(data), cipher.final()]);
    }
    const decipher = createDecipheriv(ALGORITHM, key, iv);
    decipher.setAutoPadding(false);
    return Buffer.concat([decipher.update(data), decipher.final()]);
  } catch (e) {
    throw new WeakKeyError("Cipher primitive rejected the DES key", e);
  }
};

/** Raw 3DES-CBC encryption; `data` must already be block aligned. */
export function tdesCbcEncrypt(key: Uint8Array | DesKey, iv: Uint8Array, data: Uint8Array): Buffer {
  return runCipher("encrypt", key, iv, data);
}

export function tdesCbcDecrypt(key: Uint8Array | DesKey, iv: Uint8Array, data: Uint8Array): Buffer {
  return runCipher("decrypt", key, iv, data);
}

/** 3DES CBC-MAC: last block of the zero-IV encryption of the padded input. */
export function macCbc(key: Uint8Array | DesKey, data: Uint8Array): Buffer {
  const enc = tdesCbcEncrypt(key, ZERO_IV, padIso9797M2(data, DES_BLOCK_SIZE));
  return enc.subarray(enc.length - DES_BLOCK_SIZE);
}

/** Rotates left by one byte: `[b0, b1, ..., bn] -> [b1, ..., bn, b0]`. */
export function rotateLeft(data: Uint8Array): Buffer {
  if (data.length === 0) return Buffer.alloc(0);
  return Buffer.concat([data.subarray(1), data.subarray(0, 1)]);
}

export function xorBytes(a: Uint8Array, b: Uint8Array): Buffer {
  if (a.length !== b.length) {
    throw new RangeError(`XOR operands differ in length (${a.length} vs ${b.length})`);
  }
  const out = Buffer.alloc(a.length);
  for (let i = 0; i < a.length; i++) out[i] = a[i] ^ b[i];
  return out;
}
