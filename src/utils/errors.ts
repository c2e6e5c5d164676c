/**
 * Error taxonomy for the finance engine.
 * All errors are raised synchronously at the boundary of a call.
 */

export type FinanceErrorCode = "INVALID_INPUT" | "INVALID_DEADLINE";

export class FinanceError extends Error {
  readonly code: FinanceErrorCode;

  constructor(code: FinanceErrorCode, message: string) {
    super(message);
    this.name = "FinanceError";
    this.code = code;
  }
}

/**
 * Negative or non-finite monetary values, or otherwise malformed inputs.
 */
export class InvalidInputError extends FinanceError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
    this.name = "InvalidInputError";
  }
}

/**
 * Deadline that resolves to less than one month remaining, or cannot be read.
 */
export class InvalidDeadlineError extends FinanceError {
  constructor(message: string) {
    super("INVALID_DEADLINE", message);
    this.name = "InvalidDeadlineError";
  }
}

export function isFinanceError(error: unknown): error is FinanceError {
  return error instanceof FinanceError;
}
