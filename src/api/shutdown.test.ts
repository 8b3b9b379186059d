/**
 * Graceful Shutdown Tests
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { createShutdownController } from "./shutdown";

describe("createShutdownController", () => {
  it("serves requests until shutdown starts, then answers 503", async () => {
    const controller = createShutdownController({ timeoutMs: 0 });
    const app = new Hono();
    app.use("*", controller.middleware());
    app.get("/ping", (c) => c.text("pong"));

    expect((await app.request("/ping")).status).toBe(200);

    await controller.shutdown("SIGTERM");
    const res = await app.request("/ping");

    expect(res.status).toBe(503);
    expect(res.headers.get("Connection")).toBe("close");
    expect(await res.json()).toMatchObject({ code: "SERVICE_UNAVAILABLE", path: "/ping" });
  });

  it("waits for in-flight requests", async () => {
    const controller = createShutdownController({ timeoutMs: 2000 });
    const app = new Hono();
    app.use("*", controller.middleware());
    app.get("/slow", async (c) => {
      await new Promise((resolve) => setTimeout(resolve, 150));
      return c.text("done");
    });

    const inFlight = app.request("/slow");
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(controller.activeRequestCount()).toBe(1);

    const result = await controller.shutdown("SIGTERM");
    expect(result.drained).toBe(true);
    expect((await inFlight).status).toBe(200);
  });

  it("gives up draining after the timeout", async () => {
    const controller = createShutdownController({ timeoutMs: 50 });
    const app = new Hono();
    app.use("*", controller.middleware());
    app.get("/stuck", async (c) => {
      await new Promise((resolve) => setTimeout(resolve, 400));
      return c.text("late");
    });

    const inFlight = app.request("/stuck");
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(await controller.shutdown("SIGINT")).toEqual({
      drained: false,
      remaining: 1,
      failedCallbacks: [],
    });
    await inFlight;
  });

  it("runs every cleanup callback in order and reports failures", async () => {
    const controller = createShutdownController({ timeoutMs: 0 });
    const calls: string[] = [];

    controller.onShutdown("server", () => {
      calls.push("server");
    });
    controller.onShutdown("broken", () => {
      throw new Error("already closed");
    });
    controller.onShutdown("database", async () => {
      calls.push("database");
    });

    const result = await controller.shutdown("SIGTERM");

    expect(calls).toEqual(["server", "database"]);
    expect(result.failedCallbacks).toEqual(["broken"]);
  });

  it("runs only once", async () => {
    const controller = createShutdownController({ timeoutMs: 0 });
    let runs = 0;
    controller.onShutdown("count", () => {
      runs += 1;
    });

    await Promise.all([controller.shutdown("SIGTERM"), controller.shutdown("SIGINT")]);

    expect(runs).toBe(1);
    expect(controller.isShuttingDown()).toBe(true);
  });
});
