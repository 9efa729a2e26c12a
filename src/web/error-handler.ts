import type { FastifyInstance } from "fastify";

import type { ErrorCode } from "../shared/errors.js";
import type { ErrorEnvelope } from "./envelope.js";

import { ForeignKeyViolationError, RowPolicyViolationError, UniqueViolationError } from "../db/errors.js";
import {
  AppError,
  ForbiddenError,
  MalformedRequestError,
  ValidationFailedError,
} from "../shared/errors.js";

const STATUS_BY_CODE: Readonly<Record<ErrorCode, number>> = Object.freeze({
  bad_request: 400,
  unauthenticated: 401,
  forbidden: 403,
  not_found: 404,
  conflict: 409,
  validation_failed: 422,
  internal_error: 500,
});

export type ErrorResponse = {
  status: number;
  body: ErrorEnvelope;
};

function envelope(code: ErrorCode, message: string, extra: Partial<ErrorEnvelope> = {}): ErrorResponse {
  return {
    status: STATUS_BY_CODE[code],
    body: { success: false, error: message, error_code: code, ...extra },
  };
}

export function toErrorResponse(error: unknown): ErrorResponse | null {
  if (error instanceof ValidationFailedError) {
    return envelope(error.code, error.message, { field_errors: error.fieldErrors });
  }
  if (error instanceof MalformedRequestError) {
    return envelope(error.code, error.message, error.errors.length > 0 ? { errors: error.errors } : {});
  }
  if (error instanceof ForbiddenError) {
    return envelope(error.code, error.message, { errors: [error.reason] });
  }
  if (error instanceof AppError && error.code !== "internal_error") {
    return envelope(error.code, error.message);
  }

  // store errors that no service translated
  if (error instanceof UniqueViolationError) {
    return envelope("conflict", "Conflict");
  }
  if (error instanceof ForeignKeyViolationError) {
    return envelope("not_found", "Not Found");
  }
  if (error instanceof RowPolicyViolationError) {
    return envelope("forbidden", "Forbidden", { errors: ["row_policy"] });
  }
  return null;
}

export function registerErrorHandlers(app: FastifyInstance) {
  app.setErrorHandler((error, request, reply) => {
    const known = toErrorResponse(error);
    if (known) {
      return reply.status(known.status).send(known.body);
    }

    // body parser and content-type failures raised by Fastify itself
    const statusCode = error.statusCode;
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      const response = envelope("bad_request", error.message);
      return reply.status(statusCode).send(response.body);
    }

    request.log.error({ err: error }, "unhandled request error");
    const response = envelope("internal_error", "Internal Server Error");
    return reply.status(response.status).send(response.body);
  });

  app.setNotFoundHandler((_request, reply) => {
    const response = envelope("not_found", "Not Found");
    return reply.status(response.status).send(response.body);
  });
}
