import { Hono } from "hono";
import { cors } from "hono/cors";
import { serve } from "@hono/node-server";
import { EditSession, SyncCoordinator, info, warn, type Config } from "@mdlive/core";
import type { ServerContext } from "./context.ts";
import { errorHandler } from "./middleware/errors.ts";
import { healthRoute } from "./routes/health.ts";
import { notesRoute } from "./routes/notes.ts";
import { searchRoute } from "./routes/search.ts";
import { saveRoute } from "./routes/save.ts";
import { eventsRoute } from "./routes/events.ts";
import { indexRoute } from "./routes/index-cmd.ts";
import { pagesRoute } from "./routes/pages.ts";

export type { ServerContext } from "./context.ts";
export { openLiveSession } from "./sessions.ts";

const LOCAL_ORIGIN = /^https?:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/;

export function createApp(context: ServerContext): Hono {
  const app = new Hono();

  app.onError(errorHandler);
  app.use("*", cors({ origin: (origin) => (LOCAL_ORIGIN.test(origin) ? origin : null) }));

  healthRoute(app, context);
  notesRoute(app, context);
  searchRoute(app, context);
  saveRoute(app, context);
  eventsRoute(app, context);
  indexRoute(app, context);
  // Catch-all page routes go last.
  pagesRoute(app, context);

  return app;
}

export async function startServer(config: Config, options: { port?: number } = {}) {
  const coordinator = SyncCoordinator.fromConfig(config);
  await coordinator.start();

  const editor = new EditSession(coordinator);
  const app = createApp({ config, coordinator, editor });
  const port = options.port ?? config.server.port;

  if (config.watch.enabled) {
    // Never rejects: watch failures end in live reload being disabled.
    void coordinator.watch();
  } else {
    warn("File watching disabled; restart or POST /index/rescan to pick up external changes");
  }

  const server = serve({ fetch: app.fetch, port, hostname: config.server.host });

  info(`Serving notes at http://localhost:${port}`);
  if (config.watch.enabled) {
    info("Live reload enabled - watching for file changes");
  }

  const shutdown = () => {
    coordinator.stop();
    server.close();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  return { app, coordinator, server };
}
