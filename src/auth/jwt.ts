/**
 * JWT Token Codec
 *
 * Issues and validates compact HS256 tokens carrying an identity.
 * Uses the Web Crypto API for HMAC operations.
 *
 * Security Features:
 * - HMAC-SHA256 signing (timing-safe verify via Web Crypto)
 * - Token size limits to prevent memory exhaustion
 * - Algorithm validation to prevent "alg: none" attacks
 * - Signature checked before any claim is trusted
 *
 * The signing key is imported once per codec and never re-read.
 */

import { webcrypto } from "node:crypto";
import { z } from "zod";
import type { Identity, TokenClaims } from "../types";
import type { TokenFailureKind } from "../api/errors";

type CryptoKey = webcrypto.CryptoKey;

/**
 * Maximum token size in bytes (8KB)
 * A token with this claim set is ~200 bytes.
 */
export const MAX_TOKEN_SIZE = 8 * 1024;

/** Default validity window: 24 hours */
export const DEFAULT_TOKEN_TTL_SECONDS = 24 * 60 * 60;

/** Supported JWT algorithm (only HS256) */
const SUPPORTED_ALGORITHM = "HS256";

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+$/;

const HeaderSchema = z.object({
  alg: z.string(),
  typ: z.string().optional(),
});

/** Wire form of the claims */
const PayloadSchema = z.object({
  sub: z.string().min(1),
  userId: z.number().int().positive(),
  iat: z.number().int(),
  exp: z.number().int(),
});

export type JWTPayload = z.infer<typeof PayloadSchema>;

export type TokenValidationResult =
  | { valid: true; claims: TokenClaims }
  | { valid: false; error: TokenFailureKind };

// Base64url encoding/decoding
function base64UrlEncode(data: Uint8Array): string {
  const base64 = btoa(String.fromCharCode(...data));
  return base64.replace(/\+/g, "-").replace(/\//g, "_").replace(/=/g, "");
}

/**
 * Strict decode: rejects foreign characters and non-canonical encodings,
 * so two different segments never decode to the same bytes.
 */
function base64UrlDecode(str: string): Uint8Array | null {
  if (!BASE64URL_PATTERN.test(str)) return null;

  const padded = str + "=".repeat((4 - (str.length % 4)) % 4);
  const base64 = padded.replace(/-/g, "+").replace(/_/g, "/");

  let binary: string;
  try {
    binary = atob(base64);
  } catch {
    return null;
  }

  const bytes = new Uint8Array([...binary].map((char) => char.charCodeAt(0)));
  return base64UrlEncode(bytes) === str ? bytes : null;
}

function decodeJson(segment: string): unknown {
  const bytes = base64UrlDecode(segment);
  if (!bytes) return undefined;
  try {
    return JSON.parse(new TextDecoder().decode(bytes));
  } catch {
    return undefined;
  }
}

function toSeconds(now: Date): number {
  return Math.floor(now.getTime() / 1000);
}

function toClaims(payload: JWTPayload): TokenClaims {
  return {
    subject: payload.sub,
    userId: payload.userId,
    issuedAt: payload.iat,
    expiresAt: payload.exp,
  };
}

export interface TokenCodecOptions {
  /** Validity window in seconds (default: 24 hours) */
  ttlSeconds?: number;
}

/**
 * Issues and validates signed identity tokens.
 *
 * Stateless apart from the imported key, so one instance serves every
 * request concurrently.
 */
export class TokenCodec {
  private constructor(
    private readonly key: CryptoKey,
    readonly ttlSeconds: number
  ) {}

  /**
   * Import the signing secret once and build a codec around it
   */
  static async fromSecret(secret: string, options: TokenCodecOptions = {}): Promise<TokenCodec> {
    if (secret.length === 0) {
      throw new Error("Token signing secret must not be empty");
    }

    const key = await webcrypto.subtle.importKey(
      "raw",
      new TextEncoder().encode(secret),
      { name: "HMAC", hash: "SHA-256" },
      false,
      ["sign", "verify"]
    );

    return new TokenCodec(key, options.ttlSeconds ?? DEFAULT_TOKEN_TTL_SECONDS);
  }

  /**
   * Sign a token for an identity.
   * expiresAt is always issuedAt + the validity window.
   */
  async issue(identity: Identity, now: Date = new Date()): Promise<string> {
    const iat = toSeconds(now);
    const payload: JWTPayload = {
      sub: identity.email,
      userId: identity.userId,
      iat,
      exp: iat + this.ttlSeconds,
    };

    const header = { alg: SUPPORTED_ALGORITHM, typ: "JWT" };
    const encoder = new TextEncoder();

    const headerB64 = base64UrlEncode(encoder.encode(JSON.stringify(header)));
    const payloadB64 = base64UrlEncode(encoder.encode(JSON.stringify(payload)));

    const signature = await webcrypto.subtle.sign(
      "HMAC",
      this.key,
      encoder.encode(`${headerB64}.${payloadB64}`)
    );

    return `${headerB64}.${payloadB64}.${base64UrlEncode(new Uint8Array(signature))}`;
  }

  /**
   * Verify and decode a token
   *
   * Checks, in order:
   * 1. Size limit and header.payload.signature shape (Malformed)
   * 2. Header decodes and names HS256 (Malformed)
   * 3. Signature decodes and verifies (BadSignature)
   * 4. Claims decode and have the expected shape (Malformed)
   * 5. now < expiresAt (Expired)
   */
  async validate(token: string, now: Date = new Date()): Promise<TokenValidationResult> {
    if (token.length > MAX_TOKEN_SIZE) {
      return { valid: false, error: "Malformed" };
    }

    // Everything after the second dot is the signature segment; a stray dot
    // there fails to decode and is reported as BadSignature
    const firstDot = token.indexOf(".");
    const secondDot = firstDot < 0 ? -1 : token.indexOf(".", firstDot + 1);
    if (secondDot < 0) {
      return { valid: false, error: "Malformed" };
    }

    const headerB64 = token.slice(0, firstDot);
    const payloadB64 = token.slice(firstDot + 1, secondDot);
    const signatureB64 = token.slice(secondDot + 1);
    if (!headerB64 || !payloadB64 || !signatureB64) {
      return { valid: false, error: "Malformed" };
    }

    // Reject "alg: none" and algorithm confusion before touching the signature
    const header = HeaderSchema.safeParse(decodeJson(headerB64));
    if (!header.success || header.data.alg !== SUPPORTED_ALGORITHM) {
      return { valid: false, error: "Malformed" };
    }

    if (!BASE64URL_PATTERN.test(payloadB64)) {
      return { valid: false, error: "Malformed" };
    }

    const signatureBytes = base64UrlDecode(signatureB64);
    if (!signatureBytes) {
      return { valid: false, error: "BadSignature" };
    }

    const verified = await webcrypto.subtle.verify(
      "HMAC",
      this.key,
      signatureBytes,
      new TextEncoder().encode(`${headerB64}.${payloadB64}`)
    );
    if (!verified) {
      return { valid: false, error: "BadSignature" };
    }

    const payload = PayloadSchema.safeParse(decodeJson(payloadB64));
    if (!payload.success) {
      return { valid: false, error: "Malformed" };
    }

    if (toSeconds(now) >= payload.data.exp) {
      return { valid: false, error: "Expired" };
    }

    return { valid: true, claims: toClaims(payload.data) };
  }
}
