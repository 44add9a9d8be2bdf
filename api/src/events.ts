import { randomUUID } from "node:crypto";
import type { Transaction } from "./store.js";
import type { AuditAction, AuditEvent, TransferProtocol } from "./types.js";

export function appendAuditEvent(
  tx: Transaction,
  event: {
    action: AuditAction;
    tokenId: string;
    userId: string | null;
    metadata?: AuditEvent["metadata"];
    now: number;
  }
): void {
  const id = randomUUID();
  tx.set("auditEvents", id, {
    id,
    action: event.action,
    token_id: event.tokenId,
    user_id: event.userId,
    metadata: event.metadata ?? {},
    created_at: event.now
  });
}

/** Transfer events are immutable; they are only ever created. */
export function appendTransferEvent(
  tx: Transaction,
  event: { tokenId: string; from: string; to: string; counter: number; protocol: TransferProtocol; now: number }
): string {
  const id = randomUUID();
  tx.set("transferEvents", id, {
    id,
    token_id: event.tokenId,
    from_owner: event.from,
    to_owner: event.to,
    counter: event.counter,
    protocol: event.protocol,
    timestamp: event.now
  });
  return id;
}
