import type { Hono } from "hono";
import type { HealthResponse } from "@mdlive/core";
import type { ServerContext } from "../context.ts";

export function healthRoute(app: Hono, { coordinator }: ServerContext) {
  app.get("/health", (c) => {
    const health: HealthResponse = {
      status: "ok",
      root: coordinator.root,
      pid: process.pid,
      liveReload: coordinator.liveReload,
      notes: coordinator.stats().totalNotes,
    };
    return c.json(health);
  });
}
