/**
 * Health Check Module
 *
 * Database connectivity and process memory, reported on /api/health.
 */

import { z } from "zod";
import type { DatabaseHandle } from "../storage/db";

export type HealthStatus = "healthy" | "degraded" | "unhealthy";

export interface HealthCheckResult {
  status: "ok" | "error";
  latencyMs?: number;
  error?: string;
  details?: Record<string, unknown>;
}

export interface HealthResponse {
  status: HealthStatus;
  timestamp: string;
  uptime: number;
  checks: {
    database: HealthCheckResult;
    memory: HealthCheckResult;
  };
}

const MEMORY_THRESHOLD_MB = 512;

const CountRow = z.object({ count: z.number() });

// Track server start time for uptime calculation
const startTime = Date.now();

function round(ms: number): number {
  return Math.round(ms * 100) / 100;
}

export function checkDatabase(db: DatabaseHandle): HealthCheckResult {
  const start = performance.now();

  try {
    const row = db.get("SELECT COUNT(*) AS count FROM users", CountRow);
    return {
      status: "ok",
      latencyMs: round(performance.now() - start),
      details: { userCount: row?.count ?? 0 },
    };
  } catch (err) {
    return {
      status: "error",
      latencyMs: round(performance.now() - start),
      error: err instanceof Error ? err.message : "Database check failed",
    };
  }
}

export function checkMemory(thresholdMb: number = MEMORY_THRESHOLD_MB): HealthCheckResult {
  const heapUsedMb = Math.round(process.memoryUsage().heapUsed / 1024 / 1024);
  return {
    status: heapUsedMb < thresholdMb ? "ok" : "error",
    details: { heapUsedMb, thresholdMb },
    ...(heapUsedMb >= thresholdMb ? { error: "Heap usage above threshold" } : {}),
  };
}

/**
 * Database failure is unhealthy; memory pressure alone is degraded
 */
export function runHealthChecks(db: DatabaseHandle): HealthResponse {
  const database = checkDatabase(db);
  const memory = checkMemory();

  const status: HealthStatus =
    database.status === "error" ? "unhealthy" : memory.status === "error" ? "degraded" : "healthy";

  return {
    status,
    timestamp: new Date().toISOString(),
    uptime: Math.round((Date.now() - startTime) / 1000),
    checks: { database, memory },
  };
}
