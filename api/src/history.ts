import { PermissionError } from "./errors.js";

/**
 * Ownership history may only grow by one entry per transfer, and the new owner
 * can never be the entry just appended. A first registration accepts anything.
 */
export function isAppendOnly(
  existing: readonly string[],
  proposed: readonly string[],
  newOwner: string
): boolean {
  if (existing.length === 0) return true;
  if (proposed.length < existing.length) return false;
  if (proposed.length > existing.length + 1) return false;
  for (let i = 0; i < existing.length; i += 1) {
    if (proposed[i] !== existing[i]) return false;
  }
  if (proposed.length === existing.length + 1) {
    return proposed[proposed.length - 1] !== newOwner;
  }
  return true;
}

export function validateAppendOnly(
  existing: readonly string[],
  proposed: readonly string[],
  newOwner: string
): void {
  if (!isAppendOnly(existing, proposed, newOwner)) {
    console.warn(`[ledger] rejected history rewrite (${existing.length} -> ${proposed.length} entries)`);
    throw new PermissionError("Security violation: ownership history is append-only");
  }
}

/** Appends the outgoing owner unless it is already the last entry. */
export function proposeHistory(existing: readonly string[], outgoingOwner: string): string[] {
  if (existing[existing.length - 1] === outgoingOwner) return [...existing];
  return [...existing, outgoingOwner];
}
