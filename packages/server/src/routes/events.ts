import type { Hono } from "hono";
import type { ServerContext } from "../context.ts";
import { openLiveSession } from "../sessions.ts";

export function eventsRoute(app: Hono, { coordinator }: ServerContext) {
  app.get("/events", (c) => openLiveSession(coordinator, c.req.raw.signal));
}
