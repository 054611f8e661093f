/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Two kinds of failure flow through the app:
 *
 *   1. Operational errors: expected problems such as an unknown variant key
 *      or a config bundle missing its apiKey. They carry an HTTP status and a
 *      message that is safe to return to the caller.
 *
 *   2. Programmer errors: defects. The error handler answers these with a
 *      generic 500 and logs the details.
 *
 * `isOperational` tells them apart. ContractViolationError is
 * non-operational: a variant that breaks the ITransport contract is a defect.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses regardless of the compilation target.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, isOperational = true, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

/** The factory was asked for a discriminator nothing is registered under. */
export class UnknownVariantError extends AppError {
  constructor(
    public readonly variant: string,
    public readonly known: readonly string[],
  ) {
    super(`Unknown transport variant: ${variant} (known: ${known.join(', ') || 'none'})`, 404);
  }
}

/**
 * A wrapped Adaptee's native operation failed. The message is the native
 * error's message and the native error itself is kept as `cause`.
 */
export class DelegationError extends AppError {
  constructor(
    public readonly operation: string,
    cause: unknown,
  ) {
    super(cause instanceof Error ? cause.message : String(cause), 502, true, { cause });
  }
}

export class ContractViolationError extends AppError {
  constructor(
    message: string,
    public readonly variants: readonly string[],
  ) {
    super(message, 500, false);
  }
}
