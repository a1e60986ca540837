import type { Hono } from "hono";
import type { ServerContext } from "../context.ts";

export function indexRoute(app: Hono, { coordinator }: ServerContext) {
  app.get("/index/status", (c) => {
    return c.json({ ...coordinator.stats(), liveReload: coordinator.liveReload });
  });

  app.post("/index/rescan", async (c) => {
    const changed = await coordinator.rescan();
    return c.json({ status: "ok", changed, ...coordinator.stats() });
  });
}
