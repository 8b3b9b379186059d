/**
 * Authentication Middleware for Hono
 *
 * `authenticate()` runs once per request. It reads `Authorization: Bearer
 * <token>`, validates the token, resolves the identity and records the
 * outcome on the context:
 *
 *   no header          -> anonymous
 *   valid token        -> authenticated (identity bound for the request)
 *   invalid token      -> rejected (failure kept for protected routes)
 *
 * Public routes proceed in every state. Protected routes add `requireAuth()`,
 * which turns anything but `authenticated` into the recorded failure, or
 * MissingCredential when no token was sent.
 */

import type { Context, Next } from "hono";
import type { Identity } from "../types";
import type { TokenCodec } from "./jwt";
import type { IdentityResolver } from "./identity";
import { AppError, TokenError, isAppError } from "../api/errors";
import { bindUserToContext, ctxLogger } from "../api/request-context";

export type AuthState =
  | { status: "anonymous" }
  | { status: "authenticated"; identity: Identity }
  | { status: "rejected"; failure: AppError };

// Extend Hono context with the authentication outcome
declare module "hono" {
  interface ContextVariableMap {
    auth: AuthState;
  }
}

const ANONYMOUS: AuthState = { status: "anonymous" };

const BEARER_PREFIX = "Bearer ";

/**
 * Token from an `Authorization: Bearer <token>` header.
 * Any other scheme, or no header, counts as no token.
 */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header || !header.startsWith(BEARER_PREFIX)) return null;
  return header.slice(BEARER_PREFIX.length).trim();
}

export interface AuthenticateOptions {
  codec: TokenCodec;
  resolver: IdentityResolver;
  /** Re-load the account on every authenticated request */
  confirmLiveness?: boolean;
  /** Clock for token expiry (default: wall clock) */
  now?: () => Date;
}

/**
 * Work out who is making the request, without rejecting anything
 */
async function evaluate(token: string, options: AuthenticateOptions): Promise<AuthState> {
  const now = options.now ?? (() => new Date());

  const result = await options.codec.validate(token, now());
  if (!result.valid) {
    return { status: "rejected", failure: new TokenError(result.error) };
  }

  try {
    const identity = await options.resolver.resolve(result.claims, {
      confirmLiveness: options.confirmLiveness,
    });
    return { status: "authenticated", identity };
  } catch (err) {
    if (isAppError(err) && err.kind === "NotFound") {
      return { status: "rejected", failure: err };
    }
    // Lookup failures end the request as Internal
    throw err;
  }
}

/**
 * Authentication gate. Never rejects by itself; see `requireAuth`.
 */
export function authenticate(options: AuthenticateOptions) {
  return async (c: Context, next: Next) => {
    const token = extractBearerToken(c.req.header("Authorization"));

    const state: AuthState = token === null ? ANONYMOUS : await evaluate(token, options);

    if (state.status === "authenticated") {
      bindUserToContext(state.identity.userId);
    } else if (state.status === "rejected") {
      ctxLogger.debug("Token rejected", { failure: state.failure.kind });
    }

    c.set("auth", state);
    await next();
  };
}

/**
 * Fail-closed guard for protected routes. Must run after `authenticate()`.
 */
export function requireAuth() {
  return async (c: Context, next: Next) => {
    const state = getAuthState(c);

    if (state.status === "rejected") {
      throw state.failure;
    }
    if (state.status === "anonymous") {
      throw new TokenError("MissingCredential");
    }

    await next();
  };
}

export function getAuthState(c: Context): AuthState {
  // Unset when the gate is not mounted on this route
  return c.get("auth") ?? ANONYMOUS;
}

/**
 * Identity of the current request, or null when anonymous or rejected
 */
export function getCurrentIdentity(c: Context): Identity | null {
  const state = getAuthState(c);
  return state.status === "authenticated" ? state.identity : null;
}

/**
 * Identity for handlers behind `requireAuth()`
 */
export function requireIdentity(c: Context): Identity {
  const identity = getCurrentIdentity(c);
  if (!identity) {
    throw new TokenError("MissingCredential");
  }
  return identity;
}
