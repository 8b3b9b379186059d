/**
 * Centralized Configuration Module
 *
 * All environment variables are validated at startup using Zod schemas.
 * Fail fast if required config is missing or invalid.
 *
 * The JWT signing secret is read here exactly once; the token codec receives
 * it by reference and never looks at the environment again.
 *
 * Usage:
 *   import { loadConfig } from "./config";
 *   const config = loadConfig();
 *   console.log(config.server.port);
 */

import { z } from "zod";
import { resolve, normalize } from "path";
import { createLogger } from "../logging";

const log = createLogger("config");

/** Fallback secret for development and tests only */
const DEV_JWT_SECRET = "wayfarer-dev-secret-do-not-use-in-production";

/**
 * Detect ".." used as a whole path segment; names like "..." are fine
 */
function hasPathTraversal(inputPath: string): boolean {
  return normalize(inputPath)
    .split(/[/\\]/)
    .some((seg) => seg === "..");
}

/**
 * Resolve a database path to an absolute path (":memory:" passes through)
 */
function resolveDatabasePath(inputPath: string): string {
  return inputPath === ":memory:" ? inputPath : resolve(normalize(inputPath));
}

/**
 * Helper to create a port number schema with default
 */
const portSchema = (defaultPort: number) =>
  z.preprocess(
    (val) => val ?? String(defaultPort),
    z
      .string()
      .transform((s) => parseInt(s, 10))
      .pipe(z.number().int().min(1).max(65535))
  );

/**
 * Helper to create a number schema with default and range
 */
const numberSchema = (defaultValue: number, min: number, max: number) =>
  z.preprocess(
    (val) => val ?? String(defaultValue),
    z
      .string()
      .transform((s) => parseInt(s, 10))
      .pipe(z.number().int().min(min).max(max))
  );

/**
 * Helper for boolean env vars (truthy = "true" or "1")
 */
const booleanSchema = (defaultValue: boolean) =>
  z.preprocess(
    (val) => val ?? String(defaultValue),
    z.string().transform((s) => s === "true" || s === "1")
  );

const envSchema = z.object({
  // Server
  PORT: portSchema(8080),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  ALLOWED_ORIGINS: z.string().optional(),
  SHUTDOWN_TIMEOUT_MS: numberSchema(30_000, 0, 300_000),

  // Storage (validated for path traversal)
  DATABASE_PATH: z
    .string()
    .min(1)
    .default("./data/wayfarer.db")
    .refine((path) => !hasPathTraversal(path), { message: "path traversal detected" })
    .transform(resolveDatabasePath),

  // Token signing. Production requires at least 32 characters.
  JWT_SECRET: z.string().min(32).optional(),
  JWT_EXPIRATION_SECONDS: numberSchema(24 * 60 * 60, 60, 30 * 24 * 60 * 60),

  // Credential hashing work factor (2^rounds iterations)
  BCRYPT_ROUNDS: numberSchema(10, 4, 15),

  // Identity resolution
  IDENTITY_LOOKUP_TIMEOUT_MS: numberSchema(2000, 50, 60_000),
  AUTH_CONFIRM_LIVENESS: booleanSchema(false),

  // Logging
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Parse and validate an environment
 */
function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    log.error("Invalid configuration", {
      issues: result.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    });
    throw new ConfigurationError(
      `Invalid configuration: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`
    );
  }

  if (result.data.NODE_ENV === "production" && !result.data.JWT_SECRET) {
    throw new ConfigurationError(
      "JWT_SECRET is required in production (must be at least 32 characters)"
    );
  }

  if (!result.data.JWT_SECRET && result.data.NODE_ENV !== "test") {
    log.warn("Using insecure default JWT secret - do NOT deploy to production without setting JWT_SECRET");
  }

  return result.data;
}

/**
 * Build the grouped configuration from an environment.
 * Pure apart from warnings; used directly by tests.
 */
export function loadConfig(source: Record<string, string | undefined> = process.env) {
  const env = parseEnv(source);

  return Object.freeze({
    env: env.NODE_ENV,
    isProduction: env.NODE_ENV === "production",
    isDevelopment: env.NODE_ENV === "development",
    isTest: env.NODE_ENV === "test",

    server: Object.freeze({
      port: env.PORT,
      allowedOrigins: parseOrigins(env.ALLOWED_ORIGINS, env.NODE_ENV),
      shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS,
    }),

    database: Object.freeze({
      path: env.DATABASE_PATH,
    }),

    security: Object.freeze({
      /** JWT signing secret (falls back to dev secret in non-production) */
      jwtSecret: env.JWT_SECRET ?? DEV_JWT_SECRET,
      /** Whether a custom JWT secret is configured */
      jwtSecretConfigured: Boolean(env.JWT_SECRET),
      /** Token validity window */
      tokenTtlSeconds: env.JWT_EXPIRATION_SECONDS,
      bcryptRounds: env.BCRYPT_ROUNDS,
    }),

    identity: Object.freeze({
      lookupTimeoutMs: env.IDENTITY_LOOKUP_TIMEOUT_MS,
      /** Re-load the user on every authenticated request */
      confirmLiveness: env.AUTH_CONFIRM_LIVENESS,
    }),

    logging: Object.freeze({
      level: env.LOG_LEVEL,
    }),
  });
}

/**
 * Type for the configuration object
 */
export type Config = ReturnType<typeof loadConfig>;

/**
 * Parse comma-separated origins and add defaults for development
 */
function parseOrigins(origins: string | undefined, nodeEnv: string): string[] {
  const parsed = origins ? origins.split(",").map((o) => o.trim()).filter(Boolean) : [];

  if (nodeEnv !== "production") {
    const devOrigins = ["http://localhost:5173", "http://localhost:3000"];
    for (const origin of devOrigins) {
      if (!parsed.includes(origin)) {
        parsed.push(origin);
      }
    }
  }

  return parsed;
}

/**
 * Get configuration summary for diagnostics (never includes the secret)
 */
export function getConfigSummary(cfg: Config): Record<string, unknown> {
  return {
    environment: cfg.env,
    server: {
      port: cfg.server.port,
      originsCount: cfg.server.allowedOrigins.length,
    },
    database: {
      path: cfg.database.path,
    },
    security: {
      jwtSecretConfigured: cfg.security.jwtSecretConfigured,
      tokenTtlSeconds: cfg.security.tokenTtlSeconds,
      bcryptRounds: cfg.security.bcryptRounds,
    },
    identity: cfg.identity,
    logging: cfg.logging,
  };
}

// Export for testing
export { envSchema, DEV_JWT_SECRET };
