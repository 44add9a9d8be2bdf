export class CustodyApiError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "CustodyApiError";
  }
}

export interface TokenRecord {
  id: string;
  current_owner: string;
  previous_owners: string[];
  counter: number;
  key_version: number;
  status: string;
  tag_uid: string | null;
  created_at: number;
  last_transfer_at: number | null;
}

export interface SweepReport {
  authSessions: number;
  pendingExpired: number;
  pendingReconciled: number;
  transferSessions: number;
  stagedTransfers: number;
}

const readError = (body: unknown): { error: string; code: string } => {
  if (typeof body === "object" && body !== null) {
    const error = "error" in body && typeof body.error === "string" ? body.error : "Request failed";
    const code = "code" in body && typeof body.code === "string" ? body.code : "unknown";
    return { error, code };
  }
  return { error: "Request failed", code: "unknown" };
};

/** Thin HTTP client for the custody service. */
export class CustodyClient {
  constructor(
    private readonly baseUrl: string,
    private readonly auth: { sessionToken?: string; adminApiKey?: string } = {}
  ) {}

  async getToken(tokenId: string): Promise<TokenRecord> {
    const body = await this.request<{ token: TokenRecord }>("GET", `/v1/tokens/${encodeURIComponent(tokenId)}`);
    return body.token;
  }

  async registerToken(input: {
    token_id: string;
    key_hash: string;
    tag_uid?: string;
    force_overwrite?: boolean;
  }): Promise<TokenRecord> {
    const body = await this.request<{ token: TokenRecord }>("POST", "/v1/tokens", input);
    return body.token;
  }

  async sweep(): Promise<SweepReport> {
    const body = await this.request<{ report: SweepReport }>("POST", "/v1/admin/sweep");
    return body.report;
  }

  private async request<T>(method: string, path: string, payload?: unknown): Promise<T> {
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.auth.sessionToken) headers.authorization = `Bearer ${this.auth.sessionToken}`;
    if (this.auth.adminApiKey) headers["x-admin-api-key"] = this.auth.adminApiKey;

    const res = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: payload === undefined ? undefined : JSON.stringify(payload)
    });
    const body: unknown = await res.json().catch(() => null);
    if (!res.ok) {
      const { error, code } = readError(body);
      throw new CustodyApiError(res.status, code, error);
    }
    if (body === null) throw new CustodyApiError(res.status, "malformed", "Response was not JSON");
    return body as T;
  }
}
