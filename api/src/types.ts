// Documents as persisted in the store. Times are epoch milliseconds, bytes are base64.

export type TokenStatus = "OK" | "PENDING";

export interface TokenLease {
  lease_id: string;
  session_id: string;
  user_id: string;
  expires_at: number;
}

/** Canonical token shape; the only one code outside tokens.ts ever sees. */
export interface Token {
  id: string;
  current_owner: string;
  previous_owners: string[];
  key_hash: string;
  key_version: number;
  counter: number;
  status: TokenStatus;
  lease: TokenLease | null;
  tag_uid: string | null;
  created_at: number;
  last_transfer_at: number | null;
}

export interface TokenSnapshot {
  current_owner: string;
  previous_owners: string[];
  key_hash: string;
  counter: number;
}

export type AuthPhase = "INIT" | "CHALLENGE_SENT" | "AUTHENTICATED";

export interface PendingKeyChange {
  key_version: number;
  key_hash: string;
}

export interface AuthSessionDoc {
  id: string;
  token_id: string;
  user_id: string;
  phase: AuthPhase;
  key_no: number;
  key_version: number;
  lease_id: string | null;
  rnd_a: string | null;
  rnd_b: string | null;
  chained_iv: string | null;
  session_key: string | null;
  pending_key_change: PendingKeyChange | null;
  created_at: number;
  expires_at: number;
}

export type PendingState = "OPEN" | "COMMITTED" | "EXPIRED" | "CANCELED";

/** Legacy two-step transfer, keyed by token id. */
export interface PendingTransfer {
  token_id: string;
  from_uid: string;
  to_uid: string | null;
  n_next: number;
  state: PendingState;
  created_at: number;
  expires_at: number;
}

export type TransferSessionStatus = "PENDING" | "STAGED" | "COMMITTED" | "EXPIRED";

export interface TransferSession {
  id: string;
  token_id: string;
  from_uid: string;
  to_uid: string | null;
  status: TransferSessionStatus;
  /** Random 16-byte challenge, hex. */
  challenge: string;
  validated: boolean;
  validated_key_hash: string | null;
  validated_at: number | null;
  pending_key_hash: string | null;
  staged_transfer_id: string | null;
  created_at: number;
  expires_at: number;
}

/** Points at the two-phase session currently holding a token, if any. */
export interface ActiveTransferSession {
  token_id: string;
  session_id: string;
}

export type StagedState = "STAGED" | "COMMITTED" | "ROLLED_BACK" | "EXPIRED";

export interface StagedTransfer {
  id: string;
  session_id: string;
  token_id: string;
  from_uid: string;
  to_uid: string;
  original_token_snapshot: TokenSnapshot;
  new_token_snapshot: TokenSnapshot;
  state: StagedState;
  created_at: number;
  expires_at: number;
  committed_at: number | null;
  rolled_back_at: number | null;
  rollback_reason: string | null;
}

export type TransferProtocol = "legacy" | "two-phase";

export interface TransferEvent {
  id: string;
  token_id: string;
  from_owner: string;
  to_owner: string;
  counter: number;
  protocol: TransferProtocol;
  timestamp: number;
}

export type AuditAction =
  | "token.register"
  | "token.key-rotated"
  | "pending.reconciled"
  | "transfer.rollback"
  | "auth.failed"
  | "card.provisioned";

export interface AuditEvent {
  id: string;
  action: AuditAction;
  token_id: string;
  user_id: string | null;
  metadata: Record<string, string | number | boolean | null>;
  created_at: number;
}

export interface UserStats {
  uid: string;
  tokens_owned: number;
  tokens_received: number;
  tokens_transferred_out: number;
  last_active_at: number;
}
