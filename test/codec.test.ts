import { describe, it, expect } from "vitest";
import {
  KeyLengthError,
  MalformedResponseError,
  NotImplementedError,
  ZERO_IV,
  applyOddParity,
  buildAuthenticateFrame,
  buildCommand,
  buildCreateApplicationFrame,
  buildCreateStdDataFileFrame,
  buildReadFrame,
  buildSelectApplicationFrame,
  cmacAes,
  crc16,
  crc32,
  formatStatus,
  macCbc,
  normalizeKey,
  padIso9797M2,
  parseResponse,
  readContinuationFrame,
  rotateLeft,
  tdesCbcDecrypt,
  tdesCbcEncrypt,
  toEde3Key,
  uint24le,
  unpadIso9797M2,
  xorBytes
} from "../secure-messaging/src/index.js";

describe("crc16", () => {
  it("matches the MODBUS check value, little-endian", () => {
    expect([...crc16(Buffer.from("123456789", "ascii"))]).toEqual([0x37, 0x4b]);
  });

  it("returns the initial register for empty input", () => {
    expect([...crc16(new Uint8Array(0))]).toEqual([0xff, 0xff]);
  });

  it("leaves AES checksums unimplemented", () => {
    expect(() => crc32(Buffer.alloc(4))).toThrow(NotImplementedError);
    expect(() => cmacAes(Buffer.alloc(16), Buffer.alloc(4))).toThrow(NotImplementedError);
  });
});

describe("ISO 9797-1 method 2 padding", () => {
  it("pads empty input to one full block", () => {
    expect([...padIso9797M2(new Uint8Array(0), 8)]).toEqual([0x80, 0, 0, 0, 0, 0, 0, 0]);
  });

  it("fills the last byte of a block when one byte short", () => {
    const padded = padIso9797M2(Buffer.alloc(7, 0xaa), 8);
    expect(padded.length).toBe(8);
    expect(padded[7]).toBe(0x80);
  });

  it("adds a whole block to aligned input", () => {
    const padded = padIso9797M2(Buffer.alloc(8, 0xaa), 8);
    expect(padded.length).toBe(16);
    expect(padded[8]).toBe(0x80);
    expect(padded.subarray(9).every((b) => b === 0)).toBe(true);
  });

  it("strips the marker and trailing zeros", () => {
    const data = Buffer.from([0x01, 0x00, 0x80, 0x02]);
    expect(unpadIso9797M2(padIso9797M2(data, 8)).equals(data)).toBe(true);
  });

  it("returns input without a marker unchanged", () => {
    const data = Buffer.from([0x01, 0x02, 0x00, 0x00]);
    expect(unpadIso9797M2(data).equals(data)).toBe(true);
  });

  it("rejects a non-positive block size", () => {
    expect(() => padIso9797M2(Buffer.alloc(1), 0)).toThrow(RangeError);
  });
});

describe("DES keys", () => {
  it("sets odd parity on bit 0 only", () => {
    expect([...applyOddParity(Buffer.from([0x00, 0x01, 0x02, 0x03, 0xfe, 0xff]))]).toEqual([
      0x01, 0x01, 0x02, 0x02, 0xfe, 0xfe
    ]);
  });

  it("expands a single DES key to K||K", () => {
    const key = normalizeKey(Buffer.from("0123456789abcdef", "hex"));
    expect(key.kind).toBe("SingleDES");
    expect(key.bytes.length).toBe(16);
    expect(key.bytes.subarray(0, 8).equals(key.bytes.subarray(8))).toBe(true);
  });

  it("classifies two- and three-key material", () => {
    expect(normalizeKey(Buffer.alloc(16, 0x10)).kind).toBe("TwoKeyTripleDES");
    expect(normalizeKey(Buffer.alloc(24, 0x10)).kind).toBe("ThreeKeyTripleDES");
  });

  it("passes a normalized key through", () => {
    const key = normalizeKey(Buffer.alloc(16, 0x10));
    expect(normalizeKey(key)).toBe(key);
  });

  it("rejects other lengths", () => {
    expect(() => normalizeKey(Buffer.alloc(10))).toThrow(KeyLengthError);
  });

  it("builds K1||K2||K1 for two-key 3DES", () => {
    const ede3 = toEde3Key(normalizeKey(Buffer.from("000102030405060708090a0b0c0d0e0f", "hex")));
    expect(ede3.length).toBe(24);
    expect(ede3.subarray(16).equals(ede3.subarray(0, 8))).toBe(true);
  });
});

describe("3DES primitives", () => {
  it("reduces to single DES when all subkeys are equal", () => {
    const key = Buffer.from("133457799bbcdff1", "hex");
    const out = tdesCbcEncrypt(key, ZERO_IV, Buffer.from("0123456789abcdef", "hex"));
    expect(out.toString("hex")).toBe("85e813540f0ab405");
  });

  it("decrypts what it encrypts under a chained IV", () => {
    const key = Buffer.from("00112233445566778899aabbccddeeff", "hex");
    const iv = Buffer.from("0102030405060708", "hex");
    const data = Buffer.from("the quick brown fox jumps over!!", "ascii");
    const enc = tdesCbcEncrypt(key, iv, data);
    expect(enc.equals(data)).toBe(false);
    expect(tdesCbcDecrypt(key, iv, enc).equals(data)).toBe(true);
  });

  it("refuses unaligned data", () => {
    expect(() => tdesCbcEncrypt(Buffer.alloc(16, 0x22), ZERO_IV, Buffer.alloc(9))).toThrow(RangeError);
  });

  it("MACs the last block of the padded encryption", () => {
    const key = Buffer.alloc(16, 0x22);
    const data = Buffer.from("abc", "ascii");
    const enc = tdesCbcEncrypt(key, ZERO_IV, padIso9797M2(data, 8));
    expect(macCbc(key, data).equals(enc.subarray(enc.length - 8))).toBe(true);
  });

  it("rotates left by one byte", () => {
    expect([...rotateLeft(Buffer.from([1, 2, 3]))]).toEqual([2, 3, 1]);
    expect(rotateLeft(Buffer.alloc(0)).length).toBe(0);
  });

  it("refuses to XOR operands of different lengths", () => {
    expect(() => xorBytes(Buffer.alloc(2), Buffer.alloc(3))).toThrow(RangeError);
  });
});

describe("APDU framing", () => {
  it("wraps a body with Lc and Le", () => {
    expect([...buildCommand(0x5a, Buffer.from([1, 2, 3]))]).toEqual([0x90, 0x5a, 0, 0, 3, 1, 2, 3, 0]);
  });

  it("omits the body for an empty command", () => {
    expect([...readContinuationFrame()]).toEqual([0x90, 0xaf, 0, 0, 0]);
  });

  it("rejects bodies a short APDU cannot carry", () => {
    expect(() => buildCommand(0x3d, Buffer.alloc(256))).toThrow(RangeError);
  });

  it("builds AuthenticateISO for a key number", () => {
    expect([...buildAuthenticateFrame(0)]).toEqual([0x90, 0x1a, 0, 0, 1, 0, 0]);
  });

  it("requires a 3-byte application id", () => {
    expect([...buildSelectApplicationFrame(Buffer.from([0x12, 0x34, 0x56]))]).toEqual([
      0x90, 0x5a, 0, 0, 3, 0x12, 0x34, 0x56, 0
    ]);
    expect(() => buildSelectApplicationFrame(Buffer.alloc(2))).toThrow(RangeError);
  });

  it("builds CreateApplication for AID 000001 with one key", () => {
    expect([...buildCreateApplicationFrame(Buffer.from([1, 0, 0]), 0x0f, 1)]).toEqual([
      0x90, 0xca, 0, 0, 5, 1, 0, 0, 0x0f, 1, 0
    ]);
    expect(() => buildCreateApplicationFrame(Buffer.from([1, 0]), 0x0f, 1)).toThrow(RangeError);
    expect(() => buildCreateApplicationFrame(Buffer.from([1, 0, 0]), 0x0f, 0)).toThrow(RangeError);
  });

  it("builds CreateStdDataFile with little-endian rights and size", () => {
    expect([...buildCreateStdDataFileFrame(1, 0, 0x0000, 256)]).toEqual([
      0x90, 0xcd, 0, 0, 7, 1, 0, 0, 0, 0, 1, 0, 0
    ]);
    expect([...buildCreateStdDataFileFrame(2, 3, 0x1234, 32)]).toEqual([
      0x90, 0xcd, 0, 0, 7, 2, 3, 0x34, 0x12, 32, 0, 0, 0
    ]);
    expect(() => buildCreateStdDataFileFrame(1, 0, 0x10000, 32)).toThrow(RangeError);
  });

  it("encodes 24-bit little-endian values", () => {
    expect([...uint24le(0x123456)]).toEqual([0x56, 0x34, 0x12]);
    expect(() => uint24le(-1)).toThrow(RangeError);
    expect(() => uint24le(0x1000000)).toThrow(RangeError);
  });

  it("builds ReadData with offset and length", () => {
    expect([...buildReadFrame(1, 0, 32)]).toEqual([0x90, 0xbd, 0, 0, 7, 1, 0, 0, 0, 32, 0, 0, 0]);
  });
});

describe("parseResponse", () => {
  it("recognizes success and additional-frame", () => {
    expect(parseResponse(Buffer.from([0x91, 0x00]))).toEqual({ kind: "success", data: Buffer.alloc(0) });
    expect(parseResponse(Buffer.from([1, 2, 0x91, 0xaf]))).toEqual({ kind: "more", data: Buffer.from([1, 2]) });
  });

  it("names known error statuses", () => {
    expect(parseResponse(Buffer.from([0x91, 0xae]))).toEqual({
      kind: "error",
      status: 0x91ae,
      name: "AuthenticationError",
      data: Buffer.alloc(0)
    });
    const unknown = parseResponse(Buffer.from([0x91, 0x99]));
    expect(unknown.kind === "error" && unknown.name).toBe("Unknown");
  });

  it("rejects replies without a status word", () => {
    expect(() => parseResponse(Buffer.from([0x91]))).toThrow(MalformedResponseError);
  });

  it("formats statuses as four hex digits", () => {
    expect(formatStatus(0x91ae)).toBe("91AE");
    expect(formatStatus(0x0100)).toBe("0100");
  });
});
