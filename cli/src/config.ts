export interface CtlConfig {
  apiBaseUrl: string;
  sessionToken: string;
  adminApiKey: string;
  signingSecret: string;
}

const ENV_KEYS: Record<keyof CtlConfig, string> = {
  apiBaseUrl: "CUSTODY_API_URL",
  sessionToken: "CUSTODY_SESSION_TOKEN",
  adminApiKey: "ADMIN_API_KEY",
  signingSecret: "SESSION_SIGNING_SECRET"
};

const DEFAULTS: Record<keyof CtlConfig, string> = {
  apiBaseUrl: "http://127.0.0.1:7100",
  sessionToken: "",
  adminApiKey: "",
  signingSecret: ""
};

export function loadConfig(
  overrides: Partial<CtlConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): CtlConfig {
  const pick = (key: keyof CtlConfig): string => overrides[key] ?? env[ENV_KEYS[key]] ?? DEFAULTS[key];
  return {
    apiBaseUrl: pick("apiBaseUrl").replace(/\/+$/, ""),
    sessionToken: pick("sessionToken"),
    adminApiKey: pick("adminApiKey"),
    signingSecret: pick("signingSecret")
  };
}

export function requireSetting(config: CtlConfig, key: keyof CtlConfig): string | null {
  if (config[key]) return null;
  return `Missing ${key} (set ${ENV_KEYS[key]})`;
}

export interface SessionStatus {
  active: boolean;
  expiresAt: string | null;
}

/** Decode JWT payload without verification to check expiry locally */
export function getSessionStatus(token: string, now = Date.now()): SessionStatus {
  const parts = token.split(".");
  if (parts.length !== 3) return { active: false, expiresAt: null };

  let payload: unknown;
  try {
    payload = JSON.parse(Buffer.from(parts[1], "base64url").toString("utf-8"));
  } catch {
    return { active: false, expiresAt: null };
  }
  if (typeof payload !== "object" || payload === null || !("exp" in payload) || typeof payload.exp !== "number") {
    return { active: true, expiresAt: null };
  }

  const expiresAt = payload.exp * 1000;
  return { active: expiresAt > now, expiresAt: new Date(expiresAt).toISOString() };
}
