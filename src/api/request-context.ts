/**
 * Request Context using AsyncLocalStorage
 *
 * Provides request-scoped context that propagates through async operations.
 * Carries the request id, timing and, once the authentication gate has run,
 * the authenticated user id, so every log line in a request can name both.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import type { Context, Next } from "hono";
import { nanoid } from "nanoid";
import { createLogger, type LogMetadata } from "../logging";

const log = createLogger("request");

export interface RequestContext {
  /** Unique request identifier */
  requestId: string;
  /** Request start time (high-resolution) */
  startTime: number;
  path: string;
  method: string;
  /** Set by the authentication gate; absent for anonymous requests */
  userId?: number;
}

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

export function getRequestContext(): RequestContext | undefined {
  return requestContextStorage.getStore();
}

/**
 * Elapsed time since request start
 */
export function getElapsedMs(): number {
  const ctx = requestContextStorage.getStore();
  if (!ctx) return 0;
  return performance.now() - ctx.startTime;
}

/**
 * Record the authenticated user on the current request.
 * No-op outside a request context.
 */
export function bindUserToContext(userId: number): void {
  const ctx = requestContextStorage.getStore();
  if (ctx) {
    ctx.userId = userId;
  }
}

export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return requestContextStorage.run(context, fn);
}

export function createRequestContext(
  requestId: string,
  path: string,
  method: string
): RequestContext {
  return {
    requestId,
    startTime: performance.now(),
    path,
    method,
  };
}

export const REQUEST_ID_HEADER = "X-Request-ID";
export const RESPONSE_TIME_HEADER = "X-Response-Time";

/** Inbound request ids longer than this, or with other characters, are replaced */
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,64}$/;

/**
 * Request context middleware for Hono
 *
 * Creates a request context with a unique ID and tracks timing.
 * The context is propagated through all async operations.
 */
export function requestContext() {
  return async (c: Context, next: Next) => {
    const inbound = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      inbound && REQUEST_ID_PATTERN.test(inbound) ? inbound : `req-${nanoid(12)}`;

    const context = createRequestContext(requestId, c.req.path, c.req.method);

    return requestContextStorage.run(context, async () => {
      c.header(REQUEST_ID_HEADER, requestId);

      try {
        await next();
      } finally {
        c.header(RESPONSE_TIME_HEADER, `${getElapsedMs().toFixed(2)}ms`);
      }
    });
  };
}

function withContext(extra?: LogMetadata): LogMetadata {
  const ctx = getRequestContext();
  return {
    ...extra,
    requestId: ctx?.requestId,
    path: ctx?.path,
    ...(ctx?.userId !== undefined ? { userId: ctx.userId } : {}),
  };
}

/**
 * Context-aware logger
 * Adds request id, path and user id to every entry
 */
export const ctxLogger = {
  info(message: string, extra?: LogMetadata): void {
    log.info(message, withContext(extra));
  },

  warn(message: string, extra?: LogMetadata): void {
    log.warn(message, withContext(extra));
  },

  error(message: string, extra?: LogMetadata): void {
    log.error(message, withContext(extra));
  },

  debug(message: string, extra?: LogMetadata): void {
    log.debug(message, withContext(extra));
  },
};
