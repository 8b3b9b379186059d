/**
 * Identity Resolution
 *
 * Turns validated claims into the identity a request acts as. By default the
 * claims are trusted as signed. With liveness confirmation the account is
 * re-read so a deleted user stops resolving before the token expires.
 */

import type { Identity, TokenClaims, UserProfile } from "../types";
import type { UserDirectory } from "../storage/users";
import { AppError, NotFoundError } from "../api/errors";
import { withTimeout } from "../api/timeout";
import { createLogger } from "../logging";

const log = createLogger("identity");

export const DEFAULT_LOOKUP_TIMEOUT_MS = 2000;

export interface ResolveOptions {
  /** Re-load the account and fail with NotFound if it is gone */
  confirmLiveness?: boolean;
}

export interface IdentityResolverOptions {
  lookupTimeoutMs?: number;
}

export class IdentityResolver {
  private readonly lookupTimeoutMs: number;

  constructor(
    private readonly users: UserDirectory,
    options: IdentityResolverOptions = {}
  ) {
    this.lookupTimeoutMs = options.lookupTimeoutMs ?? DEFAULT_LOOKUP_TIMEOUT_MS;
  }

  /**
   * Resolve claims to an identity.
   *
   * Throws NotFoundError when liveness is confirmed and the account no longer
   * matches the claims. A slow or failing lookup fails closed as Internal and
   * is not retried.
   */
  async resolve(claims: TokenClaims, options: ResolveOptions = {}): Promise<Identity> {
    const identity: Identity = { userId: claims.userId, email: claims.subject };

    if (!options.confirmLiveness) {
      return identity;
    }

    let user: UserProfile | null;
    try {
      user = await withTimeout(
        this.users.findById(claims.userId),
        this.lookupTimeoutMs,
        "Identity lookup"
      );
    } catch (err) {
      log.error("Identity lookup failed", { userId: claims.userId, error: err });
      throw new AppError("Internal", "Identity lookup failed");
    }

    // An id reused by a different account must not inherit the old token
    if (!user || user.email !== claims.subject.toLowerCase()) {
      throw new NotFoundError("User", claims.userId);
    }

    return { userId: user.id, email: user.email };
  }
}
