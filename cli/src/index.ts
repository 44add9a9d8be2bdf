#!/usr/bin/env node
import minimist from "minimist";
import { CustodyClient } from "./client.js";
import { getSessionStatus, loadConfig, requireSetting } from "./config.js";
import { outputError, outputFailure } from "./output.js";
import { handleRegister } from "./commands/register.js";
import { handleSessionToken } from "./commands/session-token.js";
import { handleSweep } from "./commands/sweep.js";
import { handleToken } from "./commands/token.js";

const HELP = `custodyctl - operator CLI for the token custody service

Usage:
  custodyctl token <tokenId>                Show a token's owner, counter and history
  custodyctl register --id <tokenId> --key-hash <sha256hex> [--tag-uid <uid>] [--force]
                                            Register a token to the session user
  custodyctl sweep                          Run the expiry/reconcile sweeps once (admin)
  custodyctl session-token --user <userId> [--ttl <seconds>]
                                            Mint a bearer token (needs SESSION_SIGNING_SECRET)

Options:
  --api-url <url>      Service base URL
  --token <jwt>        Bearer token

Environment:
  CUSTODY_API_URL          Service base URL (default: http://127.0.0.1:7100)
  CUSTODY_SESSION_TOKEN    Bearer token for token/register
  ADMIN_API_KEY            Admin key for sweep
  SESSION_SIGNING_SECRET   Signing secret for session-token
`;

const argv = minimist(process.argv.slice(2), {
  string: ["id", "key-hash", "tag-uid", "user", "ttl", "api-url", "token"],
  boolean: ["help", "version", "force"],
  alias: { h: "help", v: "version" }
});

const command = argv._[0];

if (argv.help || !command) {
  console.log(HELP);
  process.exit(0);
}

if (argv.version) {
  console.log("0.1.0");
  process.exit(0);
}

main().catch(outputFailure);

async function main(): Promise<void> {
  const config = loadConfig({
    apiBaseUrl: typeof argv["api-url"] === "string" && argv["api-url"] ? argv["api-url"] : undefined,
    sessionToken: typeof argv.token === "string" && argv.token ? argv.token : undefined
  });

  switch (command) {
    case "session-token": {
      const missing = requireSetting(config, "signingSecret");
      if (missing) outputError(missing);
      await handleSessionToken(config.signingSecret, argv);
      return;
    }
    case "sweep": {
      const missing = requireSetting(config, "adminApiKey");
      if (missing) outputError(missing);
      await handleSweep(new CustodyClient(config.apiBaseUrl, { adminApiKey: config.adminApiKey }));
      return;
    }
    case "token":
    case "register": {
      const missing = requireSetting(config, "sessionToken");
      if (missing) outputError(missing);
      if (!getSessionStatus(config.sessionToken).active) {
        outputError("Session token is expired or malformed. Mint a new one with 'custodyctl session-token'.");
      }
      const client = new CustodyClient(config.apiBaseUrl, { sessionToken: config.sessionToken });
      if (command === "token") await handleToken(client, argv);
      else await handleRegister(client, argv);
      return;
    }
    default:
      outputError(`Unknown command: ${command}. Run 'custodyctl --help' for usage.`);
  }
}
