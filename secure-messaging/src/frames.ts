import {
  INS_ADDITIONAL_FRAME,
  INS_CHANGE_KEY,
  INS_READ_DATA,
  INS_WRITE_DATA,
  MAX_CONTINUATION_BODY,
  MAX_FIRST_FRAME_BODY,
  buildCommand,
  uint24le
} from "./apdu.js";
import { DES_BLOCK_SIZE, ZERO_IV, macCbc, tdesCbcEncrypt, xorBytes } from "./cipher.js";
import { crc16 } from "./crc.js";
import { KeyLengthError } from "./errors.js";
import { normalizeKey, type DesKey } from "./keys.js";
import { padIso9797M2 } from "./padding.js";

export type CommMode = "plain" | "maced" | "enciphered";

export const COMM_MODES: readonly CommMode[] = ["plain", "maced", "enciphered"];

/** fileNo(1) + offset(3) + length(3) */
export const WRITE_HEADER_LENGTH = 7;
export const MAX_FIRST_WRITE_PAYLOAD = MAX_FIRST_FRAME_BODY - WRITE_HEADER_LENGTH;
export const MAX_FIRST_CHANGE_KEY_PAYLOAD = MAX_FIRST_FRAME_BODY - 1;

/**
 * Splits `payload` into a first frame (`ins`, `header` + first slice) and
 * 0xAF continuation frames carrying the rest.
 */
function chainFrames(ins: number, header: Uint8Array, payload: Uint8Array, firstCapacity: number): Buffer[] {
  const first = payload.subarray(0, Math.min(payload.length, firstCapacity));
  const frames = [buildCommand(ins, Buffer.concat([header, first]))];

  for (let off = first.length; off < payload.length; off += MAX_CONTINUATION_BODY) {
    frames.push(buildCommand(INS_ADDITIONAL_FRAME, payload.subarray(off, off + MAX_CONTINUATION_BODY)));
  }
  return frames;
}

/** Payload bytes a WriteData command carries after its 7-byte header, per mode. */
export function encodeWritePayload(
  fileNo: number,
  offset: number,
  data: Uint8Array,
  sessionKey: Uint8Array | DesKey,
  mode: CommMode
): Buffer {
  if (mode === "plain") return Buffer.from(data);

  const header = Buffer.concat([Buffer.from([INS_WRITE_DATA, fileNo]), uint24le(offset), uint24le(data.length)]);
  const dataWithCrc = Buffer.concat([data, crc16(Buffer.concat([header, data]))]);

  if (mode === "maced") {
    const mac = macCbc(sessionKey, Buffer.concat([header, dataWithCrc]));
    return Buffer.concat([dataWithCrc, mac]);
  }
  return tdesCbcEncrypt(sessionKey, ZERO_IV, padIso9797M2(dataWithCrc, DES_BLOCK_SIZE));
}

/**
 * WriteData (0x3D) frames. The first frame carries
 * `fileNo | offset:3LE | length:3LE` and up to 48 payload bytes; the rest
 * follows in 0xAF continuation frames of up to 59 bytes.
 */
export function buildWriteFrames(
  fileNo: number,
  offset: number,
  data: Uint8Array,
  sessionKey: Uint8Array | DesKey,
  mode: CommMode
): Buffer[] {
  const payload = encodeWritePayload(fileNo, offset, data, sessionKey, mode);
  const header = Buffer.concat([Buffer.from([fileNo & 0xff]), uint24le(offset), uint24le(data.length)]);
  return chainFrames(INS_WRITE_DATA, header, payload, MAX_FIRST_WRITE_PAYLOAD);
}

/**
 * ChangeKey (0xC4) for DES/3DES keys, changing the key the session was
 * authenticated with. Cryptogram: `(new XOR old) | crc16(new) | keyVersion`,
 * padded and 3DES-CBC encrypted under the session key with a zero IV.
 */
export function buildChangeKeyFrames(
  keyNo: number,
  oldKey: Uint8Array | DesKey,
  newKey: Uint8Array | DesKey,
  sessionKey: Uint8Array | DesKey,
  keyVersion: number
): Buffer[] {
  const oldK = normalizeKey(oldKey);
  const newK = normalizeKey(newKey);
  if (oldK.bytes.length !== newK.bytes.length) {
    throw new KeyLengthError(`Old/new key length mismatch (old=${oldK.bytes.length}, new=${newK.bytes.length})`);
  }

  const cryptogram = Buffer.concat([
    xorBytes(newK.bytes, oldK.bytes),
    crc16(newK.bytes),
    Buffer.from([keyVersion & 0xff])
  ]);
  const enc = tdesCbcEncrypt(sessionKey, ZERO_IV, padIso9797M2(cryptogram, DES_BLOCK_SIZE));
  return chainFrames(INS_CHANGE_KEY, Buffer.from([keyNo & 0xff]), enc, MAX_FIRST_CHANGE_KEY_PAYLOAD);
}

/** ReadData (0xBD) request. A length of 0 reads the whole file. */
export function buildReadFrame(fileNo: number, offset: number, length: number): Buffer {
  return buildCommand(INS_READ_DATA, Buffer.concat([Buffer.from([fileNo & 0xff]), uint24le(offset), uint24le(length)]));
}

/** Continuation request for reads: `90 AF 00 00 00`. */
export function readContinuationFrame(): Buffer {
  return buildCommand(INS_ADDITIONAL_FRAME);
}
