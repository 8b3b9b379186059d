/**
 * Wayfarer Web Server
 *
 * Builds the Hono application. Every collaborator is passed in, so tests can
 * build an app over an in-memory database and drive it with `app.request`.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import type { Config } from "./config";
import type { DatabaseHandle } from "./storage/db";
import type { UserDirectory } from "./storage/users";
import type { TripStorage } from "./storage/trips";
import {
  IdentityResolver,
  authenticate,
  requireAuth,
  requireIdentity,
  type CredentialStore,
  type TokenCodec,
} from "./auth";
import { AuthService } from "./services/auth";
import { TripService } from "./services/trips";
import { AppError } from "./api/errors";
import { buildErrorBody, classifyFailure, errorFromFailure } from "./api/error-codes";
import { requestContext, ctxLogger } from "./api/request-context";
import { validateBody, validateParams, validateQuery } from "./api/validation";
import { runHealthChecks } from "./api/health";
import type { ShutdownController } from "./api/shutdown";
import {
  RegisterSchema,
  LoginSchema,
  CreateTripSchema,
  UpdateTripSchema,
  TripIdParamSchema,
  SearchQuerySchema,
} from "./validation/schemas";

// Reject absurdly long Origin headers before comparing them
const MAX_ORIGIN_LENGTH = 2048;

export interface AppDependencies {
  config: Config;
  db: DatabaseHandle;
  users: UserDirectory;
  trips: TripStorage;
  credentials: CredentialStore;
  codec: TokenCodec;
  /** Defaults to a resolver over `users` with the configured lookup timeout */
  resolver?: IdentityResolver;
  /** When given, new requests get 503 once shutdown starts */
  shutdown?: ShutdownController;
}

export function createApp(deps: AppDependencies) {
  const { config } = deps;

  const resolver =
    deps.resolver ??
    new IdentityResolver(deps.users, { lookupTimeoutMs: config.identity.lookupTimeoutMs });
  const authService = new AuthService(deps.users, deps.credentials, deps.codec);
  const tripService = new TripService(deps.trips);

  const app = new Hono();

  // Middleware
  // Request context (must be first to track timing)
  app.use("*", requestContext());

  if (deps.shutdown) {
    app.use("*", deps.shutdown.middleware());
  }

  app.use("*", logger((line) => ctxLogger.debug(line)));

  app.use(
    "*",
    cors({
      origin: (origin) => {
        if (!origin || origin.length > MAX_ORIGIN_LENGTH) return null;
        return config.server.allowedOrigins.includes(origin) ? origin : null;
      },
      allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type", "Authorization", "X-Request-ID"],
      exposeHeaders: ["X-Request-ID", "X-Response-Time"],
      credentials: true,
      maxAge: 86400,
    })
  );

  // Authentication gate - records who is calling; protected routes add requireAuth()
  app.use(
    "/api/*",
    authenticate({
      codec: deps.codec,
      resolver,
      confirmLiveness: config.identity.confirmLiveness,
    })
  );

  // Global error handler
  app.onError((err, c) => {
    const descriptor = classifyFailure(err);

    if (descriptor.kind === "Internal") {
      ctxLogger.error("Unhandled error", { method: c.req.method, error: err });
    } else {
      ctxLogger.debug("Request failed", { method: c.req.method, code: descriptor.code });
    }

    return errorFromFailure(c, err);
  });

  app.notFound((c) => {
    const descriptor = classifyFailure(
      new AppError("NotFound", `API endpoint not found: ${c.req.method} ${c.req.path}`)
    );
    return c.json(buildErrorBody(descriptor, c.req.path), descriptor.status);
  });

  // ==================== Health ====================

  app.get("/api/health", (c) => {
    const health = runHealthChecks(deps.db);
    return c.json(health, health.status === "unhealthy" ? 503 : 200);
  });

  // ==================== Auth ====================

  app.post("/api/auth/register", validateBody(RegisterSchema), async (c) => {
    const response = await authService.register(c.get("validatedBody"));
    return c.json(response, 201);
  });

  app.post("/api/auth/login", validateBody(LoginSchema), async (c) => {
    return c.json(await authService.login(c.get("validatedBody")));
  });

  app.get("/api/auth/me", requireAuth(), async (c) => {
    return c.json(await authService.currentUser(requireIdentity(c)));
  });

  // Tokens are not tracked server-side; the client discards its copy
  app.post("/api/auth/logout", (c) => c.json({ message: "Logged out successfully" }));

  // ==================== Trips ====================
  // Static paths are registered before /:id so they win the match

  app.get("/api/trips", (c) => c.json(tripService.listTrips()));

  app.get("/api/trips/search", validateQuery(SearchQuerySchema), (c) => {
    return c.json(tripService.searchTrips(c.get("validatedQuery").q));
  });

  app.get("/api/trips/mine", requireAuth(), (c) => {
    return c.json(tripService.listMine(requireIdentity(c)));
  });

  app.get("/api/trips/:id", validateParams(TripIdParamSchema), (c) => {
    return c.json(tripService.getTrip(c.get("validatedParams").id));
  });

  app.post("/api/trips", requireAuth(), validateBody(CreateTripSchema), (c) => {
    const trip = tripService.createTrip(requireIdentity(c), c.get("validatedBody"));
    return c.json(trip, 201);
  });

  app.put(
    "/api/trips/:id",
    requireAuth(),
    validateParams(TripIdParamSchema),
    validateBody(UpdateTripSchema),
    (c) => {
      const trip = tripService.updateTrip(
        requireIdentity(c),
        c.get("validatedParams").id,
        c.get("validatedBody")
      );
      return c.json(trip);
    }
  );

  app.delete("/api/trips/:id", requireAuth(), validateParams(TripIdParamSchema), (c) => {
    tripService.deleteTrip(requireIdentity(c), c.get("validatedParams").id);
    return c.json({ message: "Trip deleted successfully" });
  });

  return app;
}

export type App = ReturnType<typeof createApp>;
