/**
 * Centralized API Error Codes
 *
 * Single source of truth mapping each failure kind to its status code, status
 * text and stable code label. The classifier is a pure function from a thrown
 * value to a response descriptor; `errorFromFailure` writes the body clients
 * consume:
 *
 *   { code, message, errors?, timestamp, status, error, path }
 *
 * `errors` is present only for field validation failures.
 */

import type { Context } from "hono";
import { isAppError, type FailureKind, type FieldErrors } from "./errors";

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 500;

/**
 * Error definition with code label, status, status text and default message
 */
export interface ErrorDefinition {
  code: string;
  status: ErrorStatus;
  error: string;
  message: string;
}

export const ApiError = {
  // 400 Bad Request
  ValidationFailed: {
    code: "VALIDATION_ERROR",
    status: 400,
    error: "Bad Request",
    message: "Validation failed",
  },

  // 401 Unauthorized - one status, distinct labels
  InvalidCredential: {
    code: "INVALID_CREDENTIALS",
    status: 401,
    error: "Unauthorized",
    message: "Invalid email or password",
  },
  MissingCredential: {
    code: "UNAUTHORIZED",
    status: 401,
    error: "Unauthorized",
    message: "Authentication required",
  },
  Malformed: {
    code: "TOKEN_MALFORMED",
    status: 401,
    error: "Unauthorized",
    message: "Invalid token format",
  },
  BadSignature: {
    code: "TOKEN_BAD_SIGNATURE",
    status: 401,
    error: "Unauthorized",
    message: "Invalid token signature",
  },
  Expired: {
    code: "TOKEN_EXPIRED",
    status: 401,
    error: "Unauthorized",
    message: "Token has expired",
  },

  // 403 Forbidden
  PermissionDenied: {
    code: "PERMISSION_DENIED",
    status: 403,
    error: "Forbidden",
    message: "Permission denied for this operation",
  },

  // 404 Not Found
  NotFound: {
    code: "NOT_FOUND",
    status: 404,
    error: "Not Found",
    message: "Resource not found",
  },

  // 409 Conflict
  DuplicateCredential: {
    code: "EMAIL_ALREADY_EXISTS",
    status: 409,
    error: "Conflict",
    message: "Email already exists",
  },

  // 500 Internal Server Error - message stays generic
  Internal: {
    code: "INTERNAL_ERROR",
    status: 500,
    error: "Internal Server Error",
    message: "An unexpected error occurred",
  },
} as const satisfies Record<FailureKind, ErrorDefinition>;

/**
 * Everything needed to render a failure
 */
export interface ErrorDescriptor {
  kind: FailureKind;
  code: string;
  status: ErrorStatus;
  error: string;
  message: string;
  errors?: FieldErrors;
}

/**
 * Error body written to clients
 */
export interface ErrorResponseBody {
  code: string;
  message: string;
  errors?: FieldErrors;
  timestamp: string;
  status: number;
  error: string;
  path: string;
}

/**
 * Map any thrown value to a response descriptor.
 *
 * AppErrors keep their own message, except `Internal`, which always reports
 * the generic message. A SyntaxError can only come from parsing a request
 * body and is a validation failure. Anything else is `Internal`.
 */
export function classifyFailure(err: unknown): ErrorDescriptor {
  if (isAppError(err)) {
    const definition = ApiError[err.kind];
    return {
      kind: err.kind,
      code: definition.code,
      status: definition.status,
      error: definition.error,
      message: err.kind === "Internal" ? definition.message : err.message,
      ...(err.fieldErrors && { errors: err.fieldErrors }),
    };
  }

  if (err instanceof SyntaxError) {
    return {
      kind: "ValidationFailed",
      ...ApiError.ValidationFailed,
      message: "Invalid JSON in request body",
    };
  }

  return { kind: "Internal", ...ApiError.Internal };
}

/**
 * Build the error body for a descriptor
 */
export function buildErrorBody(
  descriptor: ErrorDescriptor,
  path: string,
  now: Date = new Date()
): ErrorResponseBody {
  return {
    code: descriptor.code,
    message: descriptor.message,
    ...(descriptor.errors && { errors: descriptor.errors }),
    timestamp: now.toISOString(),
    status: descriptor.status,
    error: descriptor.error,
    path,
  };
}

/**
 * Classify a thrown value and write the error response
 */
export function errorFromFailure(c: Context, err: unknown) {
  const descriptor = classifyFailure(err);
  return c.json(buildErrorBody(descriptor, c.req.path), descriptor.status);
}
