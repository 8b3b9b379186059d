/**
 * Identity Resolver Tests
 */

import { describe, it, expect, vi } from "vitest";
import { IdentityResolver } from "./identity";
import { AppError, NotFoundError } from "../api/errors";
import type { UserDirectory } from "../storage/users";
import type { TokenClaims, UserProfile } from "../types";

const claims: TokenClaims = {
  subject: "alice@example.com",
  userId: 1,
  issuedAt: 1_700_000_000,
  expiresAt: 1_700_086_400,
};

const aliceProfile: UserProfile = {
  id: 1,
  email: "alice@example.com",
  displayName: "Alice",
  createdAt: "2026-01-01T00:00:00.000Z",
};

function directory(findById: UserDirectory["findById"]): UserDirectory {
  return {
    findById: vi.fn(findById),
    findByEmail: vi.fn(async () => null),
    findCredentials: vi.fn(async () => null),
    existsByEmail: vi.fn(async () => false),
    create: vi.fn(async () => aliceProfile),
  };
}

describe("IdentityResolver", () => {
  it("trusts the claims without a lookup by default", async () => {
    const users = directory(async () => null);
    const resolver = new IdentityResolver(users);

    expect(await resolver.resolve(claims)).toEqual({ userId: 1, email: "alice@example.com" });
    expect(users.findById).not.toHaveBeenCalled();
  });

  it("confirms liveness when asked", async () => {
    const users = directory(async () => aliceProfile);
    const resolver = new IdentityResolver(users);

    expect(await resolver.resolve(claims, { confirmLiveness: true })).toEqual({
      userId: 1,
      email: "alice@example.com",
    });
    expect(users.findById).toHaveBeenCalledWith(1);
  });

  it("fails with NotFound when the account is gone", async () => {
    const resolver = new IdentityResolver(directory(async () => null));

    await expect(resolver.resolve(claims, { confirmLiveness: true })).rejects.toBeInstanceOf(
      NotFoundError
    );
  });

  it("fails with NotFound when the id now belongs to another email", async () => {
    const resolver = new IdentityResolver(
      directory(async () => ({ ...aliceProfile, email: "mallory@example.com" }))
    );

    await expect(resolver.resolve(claims, { confirmLiveness: true })).rejects.toThrow(
      "User with id 1 not found"
    );
  });

  it("fails closed as Internal when the lookup throws", async () => {
    const resolver = new IdentityResolver(
      directory(async () => {
        throw new Error("database is locked");
      })
    );

    const error = await resolver.resolve(claims, { confirmLiveness: true }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(AppError);
    if (error instanceof AppError) {
      expect(error.kind).toBe("Internal");
    }
  });

  it("fails closed as Internal when the lookup times out", async () => {
    const resolver = new IdentityResolver(
      directory(() => new Promise<UserProfile | null>(() => {})),
      { lookupTimeoutMs: 20 }
    );

    const error = await resolver.resolve(claims, { confirmLiveness: true }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(AppError);
    if (error instanceof AppError) {
      expect(error.kind).toBe("Internal");
    }
  });
});
