import type { ParsedArgs } from "minimist";
import { signSessionToken } from "../../../api/src/auth.js";
import { outputError, outputSuccess } from "../output.js";

const DEFAULT_TTL_SECONDS = 3600;
const MAX_TTL_SECONDS = 7 * 24 * 3600;

export function parseTtl(value: unknown): number | null {
  if (value === undefined) return DEFAULT_TTL_SECONDS;
  const text = String(value);
  if (!/^\d+$/.test(text)) return null;
  const ttl = parseInt(text, 10);
  if (ttl <= 0 || ttl > MAX_TTL_SECONDS) return null;
  return ttl;
}

/** Mints a bearer token for local development and operator scripts. */
export async function handleSessionToken(signingSecret: string, args: ParsedArgs): Promise<never> {
  const userId = typeof args.user === "string" ? args.user.trim() : "";
  if (!userId) {
    return outputError("Missing --user <userId>. Usage: custodyctl session-token --user <userId> [--ttl <seconds>]");
  }
  const ttl = parseTtl(args.ttl);
  if (ttl === null) {
    return outputError(`--ttl must be a whole number of seconds between 1 and ${MAX_TTL_SECONDS}`);
  }
  const token = await signSessionToken(userId, signingSecret, ttl);
  return outputSuccess({ user_id: userId, token, expires_in: ttl });
}
