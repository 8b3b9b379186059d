/**
 * Authentication and Authorization Module
 *
 * Credential hashing, signed identity tokens, the per-request gate and
 * ownership checks for mutations.
 */

export { CredentialStore, DEFAULT_BCRYPT_ROUNDS } from "./credentials";

export {
  TokenCodec,
  MAX_TOKEN_SIZE,
  DEFAULT_TOKEN_TTL_SECONDS,
  type TokenCodecOptions,
  type TokenValidationResult,
} from "./jwt";

export { IdentityResolver, type ResolveOptions, type IdentityResolverOptions } from "./identity";

export {
  authenticate,
  requireAuth,
  extractBearerToken,
  getAuthState,
  getCurrentIdentity,
  requireIdentity,
  type AuthState,
  type AuthenticateOptions,
} from "./middleware";

export { check, assertOwnership, type OwnershipDecision, type MutatingAction } from "./ownership";
