import type { Hono } from "hono";
import type { NoteResponse, TreeResponse } from "@mdlive/core";
import type { ServerContext } from "../context.ts";

export function notesRoute(app: Hono, { coordinator }: ServerContext) {
  app.get("/api/tree", (c) => {
    const { node, children } = coordinator.tree(c.req.query("path") ?? "");
    const body: TreeResponse = { path: node.path, children };
    return c.json(body);
  });

  app.get("/api/notes/:path{.+}", async (c) => {
    const doc = await coordinator.document(c.req.param("path"));
    const body: NoteResponse = {
      path: doc.path,
      title: doc.title,
      html: doc.html,
      frontmatter: doc.frontmatter,
      headings: doc.headings,
    };
    return c.json(body);
  });

  // Exact bytes for the editor, so a save round-trips without loss.
  app.get("/raw/:path{.+}", async (c) => {
    const bytes = await coordinator.raw(c.req.param("path"));
    return c.body(new Uint8Array(bytes), 200, {
      "Content-Type": "text/markdown; charset=utf-8",
      "Cache-Control": "no-store",
    });
  });
}
