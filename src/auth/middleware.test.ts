/**
 * Authentication Gate Tests
 */

import { describe, it, expect, beforeAll } from "vitest";
import { Hono } from "hono";
import {
  authenticate,
  requireAuth,
  extractBearerToken,
  getAuthState,
  getCurrentIdentity,
  requireIdentity,
  type AuthenticateOptions,
} from "./middleware";
import { TokenCodec } from "./jwt";
import { IdentityResolver } from "./identity";
import { errorFromFailure } from "../api/error-codes";
import { getRequestContext, requestContext } from "../api/request-context";
import type { UserDirectory } from "../storage/users";
import type { UserProfile } from "../types";

const SECRET = "test-secret-for-gate-tests-only-000";
const alice = { userId: 1, email: "alice@example.com" };

function usersWith(profiles: UserProfile[]): UserDirectory {
  return {
    findById: async (id) => profiles.find((p) => p.id === id) ?? null,
    findByEmail: async (email) => profiles.find((p) => p.email === email) ?? null,
    findCredentials: async () => null,
    existsByEmail: async (email) => profiles.some((p) => p.email === email),
    create: async () => {
      throw new Error("not used");
    },
  };
}

function buildApp(options: AuthenticateOptions) {
  const app = new Hono();
  app.use("*", requestContext());
  app.use("*", authenticate(options));
  app.onError((err, c) => errorFromFailure(c, err));

  app.get("/public", (c) => {
    const identity = getCurrentIdentity(c);
    return c.json({ status: getAuthState(c).status, userId: identity?.userId ?? null });
  });
  app.get("/protected", requireAuth(), (c) => {
    return c.json({ ...requireIdentity(c), contextUserId: getRequestContext()?.userId ?? null });
  });
  return app;
}

describe("extractBearerToken", () => {
  it("strips the Bearer prefix", () => {
    expect(extractBearerToken("Bearer abc.def.ghi")).toBe("abc.def.ghi");
  });

  it.each([undefined, "", "Basic dXNlcjpwYXNz", "bearer abc", "Bearerabc"])(
    "treats %j as no token",
    (header) => {
      expect(extractBearerToken(header)).toBeNull();
    }
  );

  it("keeps an empty token after the prefix", () => {
    expect(extractBearerToken("Bearer ")).toBe("");
  });
});

describe("authenticate", () => {
  let codec: TokenCodec;
  let app: Hono;
  let token: string;

  beforeAll(async () => {
    codec = await TokenCodec.fromSecret(SECRET);
    app = buildApp({ codec, resolver: new IdentityResolver(usersWith([])) });
    token = await codec.issue(alice);
  });

  it("treats a request without a header as anonymous", async () => {
    const res = await app.request("/public");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "anonymous", userId: null });
  });

  it("binds the identity for a valid token", async () => {
    const res = await app.request("/public", {
      headers: { Authorization: `Bearer ${token}` },
    });
    expect(await res.json()).toEqual({ status: "authenticated", userId: 1 });
  });

  it("lets a public route proceed with an invalid token", async () => {
    const res = await app.request("/public", {
      headers: { Authorization: "Bearer not-a-token" },
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "rejected", userId: null });
  });

  it("rejects a protected route without a token as MissingCredential", async () => {
    const res = await app.request("/protected");

    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({
      code: "UNAUTHORIZED",
      message:
        "No authentication token found. Please provide a valid JWT token in the Authorization header.",
      status: 401,
      error: "Unauthorized",
      path: "/protected",
    });
  });

  it("rejects a malformed token on a protected route", async () => {
    const res = await app.request("/protected", {
      headers: { Authorization: "Bearer not-a-token" },
    });

    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({
      code: "TOKEN_MALFORMED",
      message: "Invalid token format",
    });
  });

  it("rejects a token signed with another key", async () => {
    const other = await TokenCodec.fromSecret("another-test-secret-for-gate-tests");
    const foreign = await other.issue(alice);

    const res = await app.request("/protected", {
      headers: { Authorization: `Bearer ${foreign}` },
    });

    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ code: "TOKEN_BAD_SIGNATURE" });
  });

  it("rejects an expired token", async () => {
    const stale = await codec.issue(alice, new Date(Date.now() - 2 * 86400 * 1000));

    const res = await app.request("/protected", {
      headers: { Authorization: `Bearer ${stale}` },
    });

    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({
      code: "TOKEN_EXPIRED",
      message: "Token has expired",
    });
  });

  it("passes the identity to protected handlers and the request context", async () => {
    const res = await app.request("/protected", {
      headers: { Authorization: `Bearer ${token}` },
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      userId: 1,
      email: "alice@example.com",
      contextUserId: 1,
    });
  });

  it("uses the injected clock", async () => {
    const future = buildApp({
      codec,
      resolver: new IdentityResolver(usersWith([])),
      now: () => new Date(Date.now() + 3 * 86400 * 1000),
    });

    const res = await future.request("/protected", {
      headers: { Authorization: `Bearer ${token}` },
    });
    expect(await res.json()).toMatchObject({ code: "TOKEN_EXPIRED" });
  });

  describe("with liveness confirmation", () => {
    it("rejects a token whose user no longer exists", async () => {
      const live = buildApp({
        codec,
        resolver: new IdentityResolver(usersWith([])),
        confirmLiveness: true,
      });

      const res = await live.request("/protected", {
        headers: { Authorization: `Bearer ${token}` },
      });

      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ code: "NOT_FOUND" });
    });

    it("accepts a token whose user still exists", async () => {
      const live = buildApp({
        codec,
        resolver: new IdentityResolver(
          usersWith([
            { id: 1, email: "alice@example.com", displayName: null, createdAt: "2026-01-01T00:00:00.000Z" },
          ])
        ),
        confirmLiveness: true,
      });

      const res = await live.request("/protected", {
        headers: { Authorization: `Bearer ${token}` },
      });
      expect(res.status).toBe(200);
    });
  });
});
