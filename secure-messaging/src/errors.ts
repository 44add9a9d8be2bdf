/** Base class for everything the codec throws. */
export class SecureMessagingError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The cipher primitive refused the key (weak or policy-rejected DES block).
 * The session key that produced it is unusable: re-authenticate to derive a new one.
 */
export class WeakKeyError extends SecureMessagingError {
  readonly hint = "Re-authenticate to derive a new session key, then retry.";

  constructor(message: string, cause?: unknown) {
    super("WEAK_DES_KEY", message, { cause });
  }
}

export class KeyLengthError extends SecureMessagingError {
  constructor(message: string) {
    super("INVALID_KEY_LENGTH", message);
  }
}

/** AES session paths are scaffolded but intentionally unimplemented. */
export class NotImplementedError extends SecureMessagingError {
  constructor(feature: string) {
    super("NOT_IMPLEMENTED", `${feature} is not implemented for DES/3DES sessions`);
  }
}

export class MalformedResponseError extends SecureMessagingError {
  constructor(message: string) {
    super("MALFORMED_RESPONSE", message);
  }
}
