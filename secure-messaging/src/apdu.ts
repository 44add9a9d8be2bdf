// Native DESFire command set, wrapped in ISO 7816-4 APDUs (CLA 0x90).

export const CLA_NATIVE = 0x90;

export const INS_AUTHENTICATE_ISO = 0x1a;
export const INS_ADDITIONAL_FRAME = 0xaf;
export const INS_SELECT_APPLICATION = 0x5a;
export const INS_READ_DATA = 0xbd;
export const INS_WRITE_DATA = 0x3d;
export const INS_CHANGE_KEY = 0xc4;
export const INS_CREATE_APPLICATION = 0xca;
export const INS_CREATE_STD_DATA_FILE = 0xcd;

/** Largest command body a short APDU frame carries on the first frame. */
export const MAX_FIRST_FRAME_BODY = 55;
/** Largest body of an 0xAF continuation frame. */
export const MAX_CONTINUATION_BODY = 59;

export const SW_SUCCESS = 0x9100;
export const SW_ADDITIONAL_FRAME = 0x91af;

/** `90 <ins> 00 00 <Lc> <body> 00`, or `90 <ins> 00 00 00` for an empty body. */
export function buildCommand(ins: number, body: Uint8Array = new Uint8Array(0)): Buffer {
  if (body.length > 0xff) {
    throw new RangeError(`APDU body too long: ${body.length} bytes`);
  }
  if (body.length === 0) {
    return Buffer.from([CLA_NATIVE, ins, 0x00, 0x00, 0x00]);
  }
  return Buffer.concat([
    Buffer.from([CLA_NATIVE, ins, 0x00, 0x00, body.length]),
    body,
    Buffer.from([0x00])
  ]);
}

export function buildAuthenticateFrame(keyNo: number): Buffer {
  return buildCommand(INS_AUTHENTICATE_ISO, Buffer.from([keyNo & 0xff]));
}

export function buildAdditionalFrame(body: Uint8Array): Buffer {
  return buildCommand(INS_ADDITIONAL_FRAME, body);
}

export function buildSelectApplicationFrame(aid: Uint8Array): Buffer {
  if (aid.length !== 3) {
    throw new RangeError(`Application id must be 3 bytes, got ${aid.length}`);
  }
  return buildCommand(INS_SELECT_APPLICATION, aid);
}

/** CreateApplication (0xCA): AID, key settings, number of keys. */
export function buildCreateApplicationFrame(aid: Uint8Array, keySettings: number, keyCount: number): Buffer {
  if (aid.length !== 3) {
    throw new RangeError(`Application id must be 3 bytes, got ${aid.length}`);
  }
  if (keyCount < 1 || keyCount > 14) {
    throw new RangeError(`An application holds 1-14 keys, got ${keyCount}`);
  }
  return buildCommand(INS_CREATE_APPLICATION, Buffer.concat([aid, Buffer.from([keySettings & 0xff, keyCount])]));
}

/**
 * CreateStdDataFile (0xCD): file number, communication settings, the 16-bit
 * access rights word (little-endian) and a 24-bit file size.
 */
export function buildCreateStdDataFileFrame(
  fileNo: number,
  commSettings: number,
  accessRights: number,
  size: number
): Buffer {
  if (accessRights < 0 || accessRights > 0xffff) {
    throw new RangeError(`Access rights must fit 16 bits, got ${accessRights}`);
  }
  const rights = Buffer.alloc(2);
  rights.writeUInt16LE(accessRights);
  return buildCommand(
    INS_CREATE_STD_DATA_FILE,
    Buffer.concat([Buffer.from([fileNo & 0xff, commSettings & 0xff]), rights, uint24le(size)])
  );
}

export function uint24le(value: number): Buffer {
  if (!Number.isInteger(value) || value < 0 || value > 0xffffff) {
    throw new RangeError(`Value out of 24-bit range: ${value}`);
  }
  const out = Buffer.alloc(3);
  out.writeUIntLE(value, 0, 3);
  return out;
}
