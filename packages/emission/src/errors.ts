/**
 * Error taxonomy shared by the engine and its collaborators.
 *
 * Every failure aborts the whole operation. Callers match on the class
 * (`err instanceof StateError`) or on `code` for the precise cause.
 */

export type ErrorKind =
  | "validation"
  | "authorization"
  | "state"
  | "already_configured";

export class EmissionError extends Error {
  readonly kind: ErrorKind;
  /** Machine-readable cause, e.g. "cooldown_active". */
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(
    kind: ErrorKind,
    code: string,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "EmissionError";
    this.kind = kind;
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static isEmissionError(err: unknown): err is EmissionError {
    return err instanceof EmissionError;
  }
}

/** Non-positive amount, null address, malformed input. */
export class ValidationError extends EmissionError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super("validation", code, message, details);
    this.name = "ValidationError";
  }
}

/** Caller is neither the owner nor the bound engine. */
export class AuthorizationError extends EmissionError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super("authorization", code, message, details);
    this.name = "AuthorizationError";
  }
}

/** Precondition on current state not met (cooldown, balance, binding...). */
export class StateError extends EmissionError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super("state", code, message, details);
    this.name = "StateError";
  }
}

/** A one-time binding was already set to a different address. */
export class AlreadyConfiguredError extends EmissionError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super("already_configured", code, message, details);
    this.name = "AlreadyConfiguredError";
  }
}
