import { z } from "zod";

const base64Pattern = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const hashPattern = /^[a-fA-F0-9]{64}$/;

const id = z.string().min(1).max(128);
const userId = z.string().min(1).max(128);
const bytes = z.string().regex(base64Pattern, "must be base64").max(8192);

export const decodeBytes = (value: string): Buffer => Buffer.from(value, "base64");
export const encodeBytes = (value: Uint8Array): string => Buffer.from(value).toString("base64");

export const beginAuthSchema = z.object({
  token_id: id,
  key_no: z.number().int().min(0).max(13).optional(),
  allow_unowned: z.boolean().optional()
});

export const continueAuthSchema = z.object({
  session_id: id,
  card_response: bytes
});

export const sessionOnlySchema = z.object({
  session_id: id
});

export const confirmKeyChangeSchema = z.object({
  session_id: id,
  card_response: bytes
});

export const writeTransferDataSchema = z.object({
  session_id: id,
  transfer_session_id: id,
  mode: z.enum(["plain", "maced", "enciphered"]).optional()
});

export const readFileSchema = z.object({
  session_id: id,
  file_no: z.number().int().min(0).max(31),
  offset: z.number().int().min(0).max(0xffffff).optional(),
  length: z.number().int().min(0).max(0xffffff)
});

export const registerTokenSchema = z.object({
  token_id: id,
  key_hash: z.string().regex(hashPattern),
  tag_uid: z.string().min(1).max(32).optional(),
  force_overwrite: z.boolean().optional()
});

export const initiateTransferSchema = z.object({
  token_id: id,
  to_uid: userId.optional()
});

export const finalizeTransferSchema = z.object({
  token_id: id,
  tag_uid: z.string().min(1).max(32).optional()
});

export const openSessionSchema = z.object({
  token_id: id,
  to_uid: userId.optional()
});

export const validateCardKeySchema = z.object({
  auth_session_id: id,
  card_response: bytes
});

export const stageTransferSchema = z.object({
  session_id: id,
  new_key_hash: z.string().regex(hashPattern),
  to_uid: userId.optional()
});

export const commitTransferSchema = z.object({
  staged_id: id
});

export const rollbackTransferSchema = z.object({
  staged_id: id,
  reason: z.string().min(1).max(500)
});
