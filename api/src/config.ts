const parseNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim().length === 0) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return parsed;
};

const DEV_MASTER_KEY = "00000000000000000000000000000000";

export interface ServiceConfig {
  port: number;
  devMode: boolean;
  sessionSigningSecret: string;
  adminApiKey: string;
  /** Hex master secret the per-token card keys are derived from. */
  masterKeyHex: string;
  authSessionTtlMs: number;
  tokenLeaseTtlMs: number;
  pendingTransferTtlMs: number;
  transferSessionTtlMs: number;
  stagedTransferTtlMs: number;
  sweepIntervalMs: number;
  sweepBatchSize: number;
  rateLimitPerUser: number;
  rateLimitWindowMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const devMode = env.CUSTODY_DEV_MODE === "true";

  const requireEnv = (name: string, devFallback: string): string => {
    const value = env[name];
    if (value && value.length > 0) return value;
    if (devMode) return devFallback;
    throw new Error(
      `Missing required env var: ${name}. Set it or enable CUSTODY_DEV_MODE=true for local development.`
    );
  };

  const masterKeyHex = requireEnv("DESFIRE_MASTER_KEY", DEV_MASTER_KEY);
  if (!/^([0-9a-fA-F]{2}){16,64}$/.test(masterKeyHex)) {
    throw new Error("DESFIRE_MASTER_KEY must be 16-64 bytes of hex");
  }

  return {
    port: parseNumber(env.CUSTODY_PORT, 7100),
    devMode,
    sessionSigningSecret: requireEnv("SESSION_SIGNING_SECRET", "session-secret-dev-only"),
    adminApiKey: requireEnv("ADMIN_API_KEY", "change-me-in-production"),
    masterKeyHex,

    // A physical tap round trip takes seconds; sessions outlive it, leases barely do.
    authSessionTtlMs: parseNumber(env.AUTH_SESSION_TTL_MS, 60_000),
    tokenLeaseTtlMs: parseNumber(env.TOKEN_LEASE_TTL_MS, 15_000),

    pendingTransferTtlMs: parseNumber(env.PENDING_TRANSFER_TTL_MS, 10 * 60_000),
    transferSessionTtlMs: parseNumber(env.TRANSFER_SESSION_TTL_MS, 5 * 60_000),
    stagedTransferTtlMs: parseNumber(env.STAGED_TRANSFER_TTL_MS, 10 * 60_000),

    sweepIntervalMs: parseNumber(env.SWEEP_INTERVAL_MS, 15 * 60_000),
    sweepBatchSize: parseNumber(env.SWEEP_BATCH_SIZE, 100),

    rateLimitPerUser: parseNumber(env.RATE_LIMIT_PER_USER, 120),
    rateLimitWindowMs: parseNumber(env.RATE_LIMIT_WINDOW_MS, 60_000)
  };
}
