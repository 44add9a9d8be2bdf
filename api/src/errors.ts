export type ErrorCode =
  | "protocol"
  | "permission-denied"
  | "not-found"
  | "conflict"
  | "expired"
  | "invalid-argument"
  | "internal";

export class ApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed card reply, wrong status word or failed verification. The session is gone. */
export class ProtocolError extends ApiError {
  constructor(message: string) {
    super(400, "protocol", message);
  }
}

export class PermissionError extends ApiError {
  constructor(message: string) {
    super(403, "permission-denied", message);
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string) {
    super(404, "not-found", message);
  }
}

/** Retryable after re-reading current state. */
export class ConflictError extends ApiError {
  constructor(message: string) {
    super(409, "conflict", message);
  }
}

export class ExpiryError extends ApiError {
  constructor(message: string) {
    super(410, "expired", message);
  }
}

export class InvalidArgumentError extends ApiError {
  constructor(message: string) {
    super(400, "invalid-argument", message);
  }
}

export class InternalError extends ApiError {
  constructor(message: string) {
    super(500, "internal", message);
  }
}
