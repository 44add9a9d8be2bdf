import type { ParsedArgs } from "minimist";
import type { CustodyClient } from "../client.js";
import { outputError, outputSuccess } from "../output.js";

export function parseTokenId(args: ParsedArgs): string | null {
  const positional = args._[1];
  const value = positional === undefined ? args.id : positional;
  if (typeof value !== "string" && typeof value !== "number") return null;
  const tokenId = String(value).trim();
  return tokenId.length > 0 ? tokenId : null;
}

export async function handleToken(client: Pick<CustodyClient, "getToken">, args: ParsedArgs): Promise<never> {
  const tokenId = parseTokenId(args);
  if (!tokenId) {
    return outputError("Missing token ID. Usage: custodyctl token <tokenId>");
  }
  return outputSuccess(await client.getToken(tokenId));
}
