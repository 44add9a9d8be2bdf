import { SW_ADDITIONAL_FRAME, SW_SUCCESS } from "./apdu.js";
import { MalformedResponseError } from "./errors.js";

export type CardErrorName =
  | "LengthError"
  | "PermissionDenied"
  | "FileNotFound"
  | "ApplicationNotFound"
  | "CommandNotSupported"
  | "AuthenticationError"
  | "IntegrityError"
  | "Unknown";

export type CardResponse =
  | { kind: "success"; data: Buffer }
  | { kind: "more"; data: Buffer }
  | { kind: "error"; status: number; name: CardErrorName; data: Buffer };

const STATUS_NAMES: ReadonlyMap<number, CardErrorName> = new Map<number, CardErrorName>([
  [0x917e, "LengthError"],
  [0x919d, "PermissionDenied"],
  [0x91bd, "FileNotFound"],
  [0x91f0, "FileNotFound"],
  [0x91a0, "ApplicationNotFound"],
  [0x911c, "CommandNotSupported"],
  [0x91ae, "AuthenticationError"],
  [0x911e, "IntegrityError"]
]);

/** Splits a card reply into data and its trailing status word. */
export function parseResponse(bytes: Uint8Array): CardResponse {
  if (bytes.length < 2) {
    throw new MalformedResponseError(`Response too short: ${bytes.length} bytes`);
  }
  const data = Buffer.from(bytes.subarray(0, bytes.length - 2));
  const status = (bytes[bytes.length - 2] << 8) | bytes[bytes.length - 1];

  if (status === SW_SUCCESS) return { kind: "success", data };
  if (status === SW_ADDITIONAL_FRAME) return { kind: "more", data };
  return { kind: "error", status, name: STATUS_NAMES.get(status) ?? "Unknown", data };
}

export function formatStatus(status: number): string {
  return status.toString(16).toUpperCase().padStart(4, "0");
}
