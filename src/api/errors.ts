/**
 * Application Failures
 *
 * Every failure the identity layer and the services surface is an AppError
 * tagged with one kind from a closed set. The error classifier maps the kind
 * to a response; nothing downstream inspects message text.
 */

/**
 * Closed failure taxonomy
 */
export type FailureKind =
  | "ValidationFailed"
  | "DuplicateCredential"
  | "InvalidCredential"
  | "MissingCredential"
  | "Malformed"
  | "BadSignature"
  | "Expired"
  | "PermissionDenied"
  | "NotFound"
  | "Internal";

/** Token problems, reported distinctly but all unauthorized */
export type TokenFailureKind = Extract<FailureKind, "Malformed" | "BadSignature" | "Expired">;

/** Per-field validation detail (field path -> reason) */
export type FieldErrors = Record<string, string>;

export class AppError extends Error {
  readonly kind: FailureKind;
  readonly fieldErrors?: FieldErrors;

  constructor(kind: FailureKind, message: string, fieldErrors?: FieldErrors) {
    super(message);
    this.name = "AppError";
    this.kind = kind;
    if (fieldErrors) {
      this.fieldErrors = fieldErrors;
    }
  }
}

export class ValidationError extends AppError {
  constructor(fieldErrors: FieldErrors, message = "Validation failed") {
    super("ValidationFailed", message, fieldErrors);
    this.name = "ValidationError";
  }
}

export class DuplicateCredentialError extends AppError {
  constructor() {
    super("DuplicateCredential", "Email already exists");
    this.name = "DuplicateCredentialError";
  }
}

/**
 * Login mismatch. The message never says which of email or password was wrong.
 */
export class InvalidCredentialError extends AppError {
  constructor() {
    super("InvalidCredential", "Invalid email or password");
    this.name = "InvalidCredentialError";
  }
}

const TOKEN_MESSAGES: Record<TokenFailureKind | "MissingCredential", string> = {
  MissingCredential:
    "No authentication token found. Please provide a valid JWT token in the Authorization header.",
  Malformed: "Invalid token format",
  BadSignature: "Invalid token signature",
  Expired: "Token has expired",
};

export class TokenError extends AppError {
  constructor(kind: TokenFailureKind | "MissingCredential") {
    super(kind, TOKEN_MESSAGES[kind]);
    this.name = "TokenError";
  }
}

export class PermissionDeniedError extends AppError {
  readonly action: string;
  readonly resourceType: string;
  readonly resourceId: number;

  constructor(action: string, resourceType: string, resourceId: number, message?: string) {
    super(
      "PermissionDenied",
      message ?? `Permission denied: cannot ${action} ${resourceType} ${resourceId}`
    );
    this.name = "PermissionDeniedError";
    this.action = action;
    this.resourceType = resourceType;
    this.resourceId = resourceId;
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: number) {
    super("NotFound", id === undefined ? `${resource} not found` : `${resource} with id ${id} not found`);
    this.name = "NotFoundError";
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
