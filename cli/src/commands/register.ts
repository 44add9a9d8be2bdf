import type { ParsedArgs } from "minimist";
import type { CustodyClient } from "../client.js";
import { outputError, outputSuccess } from "../output.js";

export interface RegisterArgs {
  token_id: string;
  key_hash: string;
  tag_uid?: string;
  force_overwrite: boolean;
}

/** Returns the request body, or a usage error. */
export function parseRegisterArgs(args: ParsedArgs): RegisterArgs | string {
  const tokenId = typeof args.id === "string" ? args.id.trim() : "";
  const keyHash = typeof args["key-hash"] === "string" ? args["key-hash"].trim().toLowerCase() : "";
  if (!tokenId) return "Missing --id <tokenId>";
  if (!/^[0-9a-f]{64}$/.test(keyHash)) return "--key-hash must be 64 hex characters (sha256)";

  const request: RegisterArgs = { token_id: tokenId, key_hash: keyHash, force_overwrite: args.force === true };
  if (typeof args["tag-uid"] === "string" && args["tag-uid"].length > 0) {
    request.tag_uid = args["tag-uid"];
  }
  return request;
}

export async function handleRegister(
  client: Pick<CustodyClient, "registerToken">,
  args: ParsedArgs
): Promise<never> {
  const request = parseRegisterArgs(args);
  if (typeof request === "string") {
    return outputError(`${request}. Usage: custodyctl register --id <tokenId> --key-hash <hex> [--tag-uid <uid>] [--force]`);
  }
  return outputSuccess(await client.registerToken(request));
}
