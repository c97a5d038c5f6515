export type ValidationErrorKind = "empty_goal_name" | "invalid_status" | "invalid_user_id" | "invalid_timestamp";

/** Base for errors the HTTP layer knows how to map. */
export abstract class AppError extends Error {
  abstract readonly httpStatus: number;
  abstract readonly code: string;
}

/** Caller-supplied data broke a check-in rule. Fix the input and resend. */
export class ValidationError extends AppError {
  readonly httpStatus = 400;
  readonly kind: ValidationErrorKind;
  readonly code: ValidationErrorKind;

  constructor(kind: ValidationErrorKind, message: string) {
    super(message);
    this.name = "ValidationError";
    this.kind = kind;
    this.code = kind;
  }
}

/** The persistence backend failed (I/O, connectivity, bad schema). */
export class StorageError extends AppError {
  readonly httpStatus = 500;
  readonly code = "storage_error";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
  }
}
