/**
 * Token Codec Tests
 */

import { createHmac } from "node:crypto";
import { describe, it, expect, beforeAll } from "vitest";
import { TokenCodec, MAX_TOKEN_SIZE, DEFAULT_TOKEN_TTL_SECONDS } from "./jwt";

const SECRET = "test-secret-for-token-codec-tests-only";
const alice = { userId: 1, email: "alice@example.com" };
const issuedAt = new Date("2026-03-01T12:00:00.000Z");

function encodeSegment(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString("base64url");
}

function signSegments(header: string, payload: string, secret = SECRET): string {
  return createHmac("sha256", secret).update(`${header}.${payload}`).digest("base64url");
}

function flipFirstChar(segment: string): string {
  return (segment[0] === "A" ? "B" : "A") + segment.slice(1);
}

describe("TokenCodec", () => {
  let codec: TokenCodec;

  beforeAll(async () => {
    codec = await TokenCodec.fromSecret(SECRET);
  });

  describe("fromSecret", () => {
    it("rejects an empty secret", async () => {
      await expect(TokenCodec.fromSecret("")).rejects.toThrow("must not be empty");
    });

    it("defaults the validity window to 24 hours", () => {
      expect(codec.ttlSeconds).toBe(DEFAULT_TOKEN_TTL_SECONDS);
      expect(DEFAULT_TOKEN_TTL_SECONDS).toBe(86400);
    });
  });

  describe("issue", () => {
    it("creates a three-part token", async () => {
      const token = await codec.issue(alice, issuedAt);
      expect(token.split(".")).toHaveLength(3);
    });

    it("signs an HS256 header and seconds-based claims", async () => {
      const token = await codec.issue(alice, issuedAt);
      const [header, payload] = token.split(".");
      const iat = Math.floor(issuedAt.getTime() / 1000);

      expect(JSON.parse(Buffer.from(header ?? "", "base64url").toString())).toEqual({
        alg: "HS256",
        typ: "JWT",
      });
      expect(JSON.parse(Buffer.from(payload ?? "", "base64url").toString())).toEqual({
        sub: "alice@example.com",
        userId: 1,
        iat,
        exp: iat + 86400,
      });
    });

    it("yields different tokens at different instants", async () => {
      const first = await codec.issue(alice, issuedAt);
      const second = await codec.issue(alice, new Date(issuedAt.getTime() + 1000));
      expect(first).not.toBe(second);
    });

    it("uses a custom validity window", async () => {
      const shortLived = await TokenCodec.fromSecret(SECRET, { ttlSeconds: 60 });
      const token = await shortLived.issue(alice, issuedAt);
      const result = await shortLived.validate(token, issuedAt);

      expect(result.valid).toBe(true);
      if (result.valid) {
        expect(result.claims.expiresAt - result.claims.issuedAt).toBe(60);
      }
    });
  });

  describe("validate", () => {
    it("round-trips the issued claims", async () => {
      const token = await codec.issue(alice, issuedAt);
      const result = await codec.validate(token, issuedAt);
      const iat = Math.floor(issuedAt.getTime() / 1000);

      expect(result).toEqual({
        valid: true,
        claims: {
          subject: "alice@example.com",
          userId: 1,
          issuedAt: iat,
          expiresAt: iat + 86400,
        },
      });
    });

    it("accepts a token one second before expiry", async () => {
      const token = await codec.issue(alice, issuedAt);
      const almost = new Date(issuedAt.getTime() + (86400 - 1) * 1000);

      expect((await codec.validate(token, almost)).valid).toBe(true);
    });

    it("reports Expired once the validity window has passed", async () => {
      const token = await codec.issue(alice, issuedAt);
      const later = new Date(issuedAt.getTime() + 86400 * 1000);

      expect(await codec.validate(token, later)).toEqual({ valid: false, error: "Expired" });
    });

    it("reports BadSignature for a tampered signature", async () => {
      const token = await codec.issue(alice, issuedAt);
      const [header, payload, signature] = token.split(".");
      const tampered = `${header}.${payload}.${flipFirstChar(signature ?? "")}`;

      expect(await codec.validate(tampered, issuedAt)).toEqual({
        valid: false,
        error: "BadSignature",
      });
    });

    it("reports BadSignature for every single-bit flip in the signature", async () => {
      const token = await codec.issue(alice, issuedAt);
      const lastDot = token.lastIndexOf(".");
      const signed = token.slice(0, lastDot);
      const signature = token.slice(lastDot + 1);
      const errors = new Set<string>();

      for (let i = 0; i < signature.length; i++) {
        for (let bit = 0; bit < 7; bit++) {
          const flipped = String.fromCharCode(signature.charCodeAt(i) ^ (1 << bit));
          const tampered = `${signed}.${signature.slice(0, i)}${flipped}${signature.slice(i + 1)}`;
          const result = await codec.validate(tampered, issuedAt);
          errors.add(result.valid ? "valid" : result.error);
        }
      }

      expect([...errors]).toEqual(["BadSignature"]);
    });

    it("reports BadSignature for a dot inside the signature segment", async () => {
      const token = await codec.issue(alice, issuedAt);
      const lastDot = token.lastIndexOf(".");
      const signature = token.slice(lastDot + 1);
      const tampered = `${token.slice(0, lastDot)}.${signature.slice(0, 5)}.${signature.slice(6)}`;

      expect(await codec.validate(tampered, issuedAt)).toEqual({
        valid: false,
        error: "BadSignature",
      });
    });

    it("reports BadSignature for tampered claims", async () => {
      const token = await codec.issue(alice, issuedAt);
      const [header, payload, signature] = token.split(".");
      const claims = JSON.parse(Buffer.from(payload ?? "", "base64url").toString());
      const forged = encodeSegment({ ...claims, userId: 2 });

      expect(await codec.validate(`${header}.${forged}.${signature}`, issuedAt)).toEqual({
        valid: false,
        error: "BadSignature",
      });
    });

    it("reports BadSignature for a token signed with another key", async () => {
      const other = await TokenCodec.fromSecret("another-test-secret-for-token-tests");
      const token = await other.issue(alice, issuedAt);

      expect(await codec.validate(token, issuedAt)).toEqual({
        valid: false,
        error: "BadSignature",
      });
    });

    it("reports BadSignature when the signature segment does not decode", async () => {
      const token = await codec.issue(alice, issuedAt);
      const [header, payload] = token.split(".");

      expect(await codec.validate(`${header}.${payload}.***`, issuedAt)).toEqual({
        valid: false,
        error: "BadSignature",
      });
    });

    it("checks the signature before expiry", async () => {
      const token = await codec.issue(alice, issuedAt);
      const [header, payload, signature] = token.split(".");
      const tampered = `${header}.${payload}.${flipFirstChar(signature ?? "")}`;
      const later = new Date(issuedAt.getTime() + 2 * 86400 * 1000);

      expect(await codec.validate(tampered, later)).toEqual({
        valid: false,
        error: "BadSignature",
      });
    });

    it.each([
      ["empty string", ""],
      ["a single segment", "not-a-valid-token"],
      ["a missing segment", "aaaa.bbbb"],
      ["an empty segment", "aaaa..cccc"],
      ["an undecodable header", "!!!!.bbbb.cccc"],
    ])("reports Malformed for %s", async (_label, token) => {
      expect(await codec.validate(token, issuedAt)).toEqual({ valid: false, error: "Malformed" });
    });

    it("reports Malformed for an oversized token", async () => {
      const token = "a".repeat(MAX_TOKEN_SIZE + 1);
      expect(await codec.validate(token, issuedAt)).toEqual({ valid: false, error: "Malformed" });
    });

    it("reports Malformed for alg none", async () => {
      const token = await codec.issue(alice, issuedAt);
      const [, payload, signature] = token.split(".");
      const none = encodeSegment({ alg: "none", typ: "JWT" });

      expect(await codec.validate(`${none}.${payload}.${signature}`, issuedAt)).toEqual({
        valid: false,
        error: "Malformed",
      });
    });

    it("reports Malformed for correctly signed claims of the wrong shape", async () => {
      const header = encodeSegment({ alg: "HS256", typ: "JWT" });
      const payload = encodeSegment({ sub: "alice@example.com", iat: 1, exp: 2 });
      const token = `${header}.${payload}.${signSegments(header, payload)}`;

      expect(await codec.validate(token, issuedAt)).toEqual({ valid: false, error: "Malformed" });
    });

    it("reports Malformed for a correctly signed payload that is not JSON", async () => {
      const header = encodeSegment({ alg: "HS256", typ: "JWT" });
      const payload = Buffer.from("not json").toString("base64url");
      const token = `${header}.${payload}.${signSegments(header, payload)}`;

      expect(await codec.validate(token, issuedAt)).toEqual({ valid: false, error: "Malformed" });
    });
  });
});
