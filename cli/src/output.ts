import { CustodyApiError } from "./client.js";

export function outputSuccess(data: unknown): never {
  console.log(JSON.stringify({ ok: true, data }, null, 2));
  process.exit(0);
}

export function outputError(error: string, details?: unknown): never {
  console.error(JSON.stringify({ ok: false, error, details }, null, 2));
  process.exit(1);
}

/** Prints any thrown value as an error envelope; service errors keep their status and code. */
export function outputFailure(err: unknown): never {
  if (err instanceof CustodyApiError) {
    return outputError(err.message, { status: err.status, code: err.code });
  }
  return outputError(err instanceof Error ? err.message : String(err));
}
