/**
 * Error taxonomy shared by the core and the HTTP layer.
 *
 * Every error carries a stable `code` so callers can branch without matching
 * on messages. The HTTP layer maps codes to statuses in one place.
 */

export type RegistryErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "STORAGE_CORRUPTION"
  | "RATE_LIMITED"
  | "UNAUTHORIZED";

export abstract class RegistryError extends Error {
  abstract readonly code: RegistryErrorCode;
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/** Malformed input, rejected before any store mutation. */
export class ValidationError extends RegistryError {
  readonly code = "VALIDATION_ERROR";
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class NotFoundError extends RegistryError {
  readonly code = "NOT_FOUND";

  constructor(what: string, id: string) {
    super(`${what} not found: ${id}`);
    this.name = "NotFoundError";
  }
}

/** The persisted document could not be read back. Never treated as an empty store. */
export class StorageCorruptionError extends RegistryError {
  readonly code = "STORAGE_CORRUPTION";
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`Dataset document ${path} is unreadable: ${reason}`, options);
    this.name = "StorageCorruptionError";
    this.path = path;
  }
}

/** The message is sent to the client verbatim; the client id stays server-side. */
export class RateLimitedError extends RegistryError {
  readonly code = "RATE_LIMITED";
  readonly clientId: string;

  constructor(clientId: string) {
    super("rate limit exceeded");
    this.name = "RateLimitedError";
    this.clientId = clientId;
  }
}

export class UnauthorizedError extends RegistryError {
  readonly code = "UNAUTHORIZED";

  constructor(message = "Invalid or missing API key") {
    super(message);
    this.name = "UnauthorizedError";
  }
}
