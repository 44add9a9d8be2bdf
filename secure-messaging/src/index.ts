export {
  CLA_NATIVE,
  INS_ADDITIONAL_FRAME,
  INS_AUTHENTICATE_ISO,
  INS_CHANGE_KEY,
  INS_CREATE_APPLICATION,
  INS_CREATE_STD_DATA_FILE,
  INS_READ_DATA,
  INS_SELECT_APPLICATION,
  INS_WRITE_DATA,
  MAX_CONTINUATION_BODY,
  MAX_FIRST_FRAME_BODY,
  SW_ADDITIONAL_FRAME,
  SW_SUCCESS,
  buildAdditionalFrame,
  buildAuthenticateFrame,
  buildCommand,
  buildCreateApplicationFrame,
  buildCreateStdDataFileFrame,
  buildSelectApplicationFrame,
  uint24le
} from "./apdu.js";
export { DES_BLOCK_SIZE, ZERO_IV, macCbc, rotateLeft, tdesCbcDecrypt, tdesCbcEncrypt, xorBytes } from "./cipher.js";
export { cmacAes, crc16, crc32 } from "./crc.js";
export {
  KeyLengthError,
  MalformedResponseError,
  NotImplementedError,
  SecureMessagingError,
  WeakKeyError
} from "./errors.js";
export {
  COMM_MODES,
  MAX_FIRST_CHANGE_KEY_PAYLOAD,
  MAX_FIRST_WRITE_PAYLOAD,
  WRITE_HEADER_LENGTH,
  buildChangeKeyFrames,
  buildReadFrame,
  buildWriteFrames,
  encodeWritePayload,
  readContinuationFrame
} from "./frames.js";
export type { CommMode } from "./frames.js";
export { applyOddParity, isDesKey, normalizeKey, toEde3Key } from "./keys.js";
export type { DesKey, DesKeyKind } from "./keys.js";
export { padIso9797M2, unpadIso9797M2 } from "./padding.js";
export { formatStatus, parseResponse } from "./response.js";
export type { CardErrorName, CardResponse } from "./response.js";
