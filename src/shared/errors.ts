export type ErrorCode =
  | "bad_request"
  | "validation_failed"
  | "unauthenticated"
  | "forbidden"
  | "not_found"
  | "conflict"
  | "internal_error";

export type FieldErrors = Record<string, string[]>;

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class MalformedRequestError extends AppError {
  constructor(
    message = "Malformed request",
    public readonly errors: string[] = [],
  ) {
    super("bad_request", message);
  }
}

export class ValidationFailedError extends AppError {
  constructor(
    public readonly fieldErrors: FieldErrors,
    message = "Validation failed",
  ) {
    super("validation_failed", message);
  }
}

export class UnauthenticatedError extends AppError {
  constructor(message = "Unauthorized") {
    super("unauthenticated", message);
  }
}

export type ForbiddenReason = "insufficient_role" | "cross_cluster_link" | "row_policy";

export class ForbiddenError extends AppError {
  constructor(
    message = "Forbidden",
    public readonly reason: ForbiddenReason = "insufficient_role",
  ) {
    super("forbidden", message);
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not Found") {
    super("not_found", message);
  }
}

export class ConflictError extends AppError {
  constructor(message = "Conflict") {
    super("conflict", message);
  }
}

export class InternalFailureError extends AppError {
  constructor(message = "Internal Server Error") {
    super("internal_error", message);
  }
}
