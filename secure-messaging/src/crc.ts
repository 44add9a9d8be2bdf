import { NotImplementedError } from "./errors.js";

/**
 * CRC16 for DES/3DES sessions: reflected, poly 0xA001, init 0xFFFF,
 * no final xor. Returned little-endian.
 */
export function crc16(data: Uint8Array): Buffer {
  let crc = 0xffff;
  for (const byte of data) {
    crc ^= byte;
    for (let bit = 0; bit < 8; bit++) {
      const lsb = crc & 1;
      crc >>>= 1;
      if (lsb) crc ^= 0xa001;
    }
  }
  const out = Buffer.alloc(2);
  out.writeUInt16LE(crc & 0xffff, 0);
  return out;
}

/** CRC32 belongs to AES sessions, which this codec does not implement. */
export function crc32(_data: Uint8Array): Buffer {
  throw new NotImplementedError("CRC32 (AES session checksum)");
}

export function cmacAes(_key: Uint8Array, _data: Uint8Array): Buffer {
  throw new NotImplementedError("AES-CMAC");
}
