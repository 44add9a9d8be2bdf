/**
 * Result of a transaction callback whose failure must still commit its writes,
 * such as an expiry flip or a destroyed session. Thrown errors discard writes;
 * a failed outcome keeps them and is raised after commit.
 */
export type Outcome<T> = { ok: true; value: T } | { ok: false; error: Error };

export const succeed = <T>(value: T): Outcome<T> => ({ ok: true, value });

export const failWith = <T>(error: Error): Outcome<T> => ({ ok: false, error });

export function unwrap<T>(outcome: Outcome<T>): T {
  if (outcome.ok) return outcome.value;
  throw outcome.error;
}
