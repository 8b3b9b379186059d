/**
 * Graceful Shutdown Handler
 *
 * Ensures the server shuts down cleanly by:
 * - Refusing new requests with 503 once shutdown starts
 * - Waiting for in-flight requests to complete, up to a deadline
 * - Running registered cleanup callbacks (HTTP server, database)
 */

import type { Context, Next } from "hono";
import { createLogger } from "../logging";

const log = createLogger("shutdown");

const DRAIN_INTERVAL_MS = 100;

type ShutdownCallback = () => Promise<void> | void;

export interface ShutdownOptions {
  /** How long to wait for in-flight requests */
  timeoutMs: number;
}

export interface ShutdownResult {
  drained: boolean;
  remaining: number;
  failedCallbacks: string[];
}

export interface ShutdownController {
  middleware(): (c: Context, next: Next) => Promise<Response | void>;
  onShutdown(name: string, callback: ShutdownCallback): void;
  shutdown(signal: string): Promise<ShutdownResult>;
  isShuttingDown(): boolean;
  activeRequestCount(): number;
}

export function createShutdownController(options: ShutdownOptions): ShutdownController {
  let shuttingDown = false;
  let shutdownPromise: Promise<ShutdownResult> | null = null;
  const activeRequests = new Set<symbol>();
  const callbacks: Array<{ name: string; callback: ShutdownCallback }> = [];

  async function drainRequests(): Promise<{ drained: boolean; remaining: number }> {
    const startTime = Date.now();

    while (activeRequests.size > 0) {
      if (Date.now() - startTime >= options.timeoutMs) {
        log.warn("Drain timeout reached", { remaining: activeRequests.size });
        return { drained: false, remaining: activeRequests.size };
      }

      log.debug("Waiting for requests to complete", { active: activeRequests.size });
      await new Promise((resolve) => setTimeout(resolve, DRAIN_INTERVAL_MS));
    }

    return { drained: true, remaining: 0 };
  }

  async function runShutdown(signal: string): Promise<ShutdownResult> {
    log.info("Starting graceful shutdown", { signal });
    const startTime = Date.now();

    const drainResult = await drainRequests();

    const failedCallbacks: string[] = [];
    for (const { name, callback } of callbacks) {
      try {
        log.debug("Running cleanup", { name });
        await callback();
      } catch (err) {
        log.error("Cleanup failed", { name, error: err });
        failedCallbacks.push(name);
      }
    }

    log.info("Graceful shutdown completed", {
      durationMs: Date.now() - startTime,
      drained: drainResult.drained,
    });

    return { ...drainResult, failedCallbacks };
  }

  return {
    /**
     * Track active requests and reject new ones during shutdown
     */
    middleware() {
      return async (c: Context, next: Next) => {
        if (shuttingDown) {
          c.header("Connection", "close");
          c.header("Retry-After", "60");
          return c.json(
            {
              code: "SERVICE_UNAVAILABLE",
              message: "Server is shutting down",
              timestamp: new Date().toISOString(),
              status: 503,
              error: "Service Unavailable",
              path: c.req.path,
            },
            503
          );
        }

        const requestId = Symbol();
        activeRequests.add(requestId);

        try {
          await next();
        } finally {
          activeRequests.delete(requestId);
        }
      };
    },

    onShutdown(name, callback) {
      callbacks.push({ name, callback });
    },

    /** Idempotent: later calls get the first call's result */
    shutdown(signal) {
      shuttingDown = true;
      shutdownPromise ??= runShutdown(signal);
      return shutdownPromise;
    },

    isShuttingDown: () => shuttingDown,
    activeRequestCount: () => activeRequests.size,
  };
}

/**
 * Exit after a graceful shutdown on SIGTERM or SIGINT
 */
export function installShutdownHandlers(controller: ShutdownController): void {
  const handle = (signal: string) => {
    controller.shutdown(signal).then(
      (result) => {
        const clean = result.drained && result.failedCallbacks.length === 0;
        process.exit(clean ? 0 : 1);
      },
      (err: unknown) => {
        log.error("Shutdown failed", { error: err });
        process.exit(1);
      }
    );
  };

  process.on("SIGTERM", () => handle("SIGTERM"));
  process.on("SIGINT", () => handle("SIGINT"));

  process.on("unhandledRejection", (reason) => {
    log.error("Unhandled rejection", { error: reason });
  });

  log.debug("Shutdown handlers installed");
}
