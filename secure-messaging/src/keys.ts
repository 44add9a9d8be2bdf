import { KeyLengthError } from "./errors.js";

export type DesKeyKind = "SingleDES" | "TwoKeyTripleDES" | "ThreeKeyTripleDES";

/**
 * DES key material after normalization. `bytes` is 16 bytes for single DES
 * (K||K) and two-key 3DES, 24 bytes for three-key 3DES, with odd parity set.
 * Only {@link normalizeKey} constructs one.
 */
export type DesKey =
  | { readonly kind: "SingleDES"; readonly bytes: Buffer }
  | { readonly kind: "TwoKeyTripleDES"; readonly bytes: Buffer }
  | { readonly kind: "ThreeKeyTripleDES"; readonly bytes: Buffer };

/**
 * Sets bit 0 of every byte so the byte has an odd number of set bits.
 * The seven data bits are never touched.
 */
export function applyOddParity(key: Uint8Array): Buffer {
  const out = Buffer.from(key);
  for (let i = 0; i < out.length; i++) {
    let ones = 0;
    for (let bit = 1; bit < 8; bit++) {
      if (out[i] & (1 << bit)) ones++;
    }
    out[i] = ones % 2 === 0 ? out[i] | 0x01 : out[i] & 0xfe;
  }
  return out;
}

export function normalizeKey(raw: Uint8Array | DesKey): DesKey {
  if (isDesKey(raw)) return raw;
  switch (raw.length) {
    case 8:
      return { kind: "SingleDES", bytes: applyOddParity(Buffer.concat([raw, raw])) };
    case 16:
      return { kind: "TwoKeyTripleDES", bytes: applyOddParity(raw) };
    case 24:
      return { kind: "ThreeKeyTripleDES", bytes: applyOddParity(raw) };
    default:
      throw new KeyLengthError(`Invalid DES/3DES key length: ${raw.length}`);
  }
}

export function isDesKey(value: Uint8Array | DesKey): value is DesKey {
  return !(value instanceof Uint8Array);
}

/** The 24-byte K1||K2||K3 form the 3DES-EDE3 primitive takes. */
export function toEde3Key(key: DesKey): Buffer {
  if (key.kind === "ThreeKeyTripleDES") return key.bytes;
  return Buffer.concat([key.bytes, key.bytes.subarray(0, 8)]);
}
