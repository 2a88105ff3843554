/** Base class for all Paykit errors. Provides a stable machine-readable `code`. */
export abstract class PaykitError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Failure reported by the storage collaborator, or data read from it that
 * breaks the layout conventions. Code: `transport`.
 */
export class TransportError extends PaykitError {
  readonly code = "transport";
}

/** Placeholder for logic that is not wired yet. Code: `unimplemented`. */
export class UnimplementedError extends PaykitError {
  readonly code = "unimplemented";

  constructor(readonly label: string) {
    super(`${label} is not implemented yet`);
  }
}

/** Thrown when a method identifier cannot be used as a path segment. Code: `invalid_method_id`. */
export class InvalidMethodIdError extends PaykitError {
  readonly code = "invalid_method_id";

  constructor(input: string) {
    super(
      `Invalid payment method id: "${input}". Expected a non-empty name without "/"`,
    );
  }
}

/** Thrown when a string is not a z-base-32 encoded public key. Code: `invalid_public_key`. */
export class InvalidPublicKeyError extends PaykitError {
  readonly code = "invalid_public_key";

  constructor(
    readonly input: string,
    readonly reason: string,
  ) {
    super(`Invalid public key "${input}": ${reason}`);
  }
}

/**
 * Raised by storage implementations. `status` carries the HTTP-like status
 * of the failed request when the backend reports one.
 * Code: `storage_request_failed`.
 */
export class StorageRequestError extends PaykitError {
  readonly code = "storage_request_failed";

  constructor(
    message: string,
    readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}
