import type { CustodyClient } from "../client.js";
import { outputSuccess } from "../output.js";

export async function handleSweep(client: Pick<CustodyClient, "sweep">): Promise<never> {
  return outputSuccess(await client.sweep());
}
