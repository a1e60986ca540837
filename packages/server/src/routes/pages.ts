import { extname } from "path";
import type { Context, Hono } from "hono";
import { normalizeNotePath, joinNotePath, type SyncCoordinator } from "@mdlive/core";
import type { ServerContext } from "../context.ts";
import { renderListing, renderPage, renderResults } from "../render/page.ts";

const DIRECTORY_PAGES = ["README.md", "INDEX.md"];

const CONTENT_TYPES: Record<string, string> = {
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  gif: "image/gif",
  svg: "image/svg+xml",
  webp: "image/webp",
  pdf: "application/pdf",
  css: "text/css",
  js: "application/javascript",
  txt: "text/plain; charset=utf-8",
  json: "application/json",
};

function contentTypeFor(path: string): string {
  return CONTENT_TYPES[extname(path).slice(1).toLowerCase()] ?? "application/octet-stream";
}

export function pagesRoute(app: Hono, { coordinator }: ServerContext) {
  app.get("/", (c) => {
    const query = c.req.query("q");
    if (query !== undefined && query.trim() !== "") {
      const content = renderResults(query, coordinator.query(query));
      return c.html(renderPage({ title: `Search: ${query}`, content, query }));
    }
    return renderDirectory(c, coordinator, "");
  });

  app.get("/:path{.+}", async (c) => {
    const path = normalizeNotePath(c.req.param("path"));
    const node = coordinator.lookup(path);
    if (!node) {
      // Images and other attachments live beside the notes but are not indexed.
      const bytes = await coordinator.asset(path);
      if (bytes) return c.body(new Uint8Array(bytes), 200, { "Content-Type": contentTypeFor(path) });
      return c.html(renderPage({ title: "Not found", content: "<h1>Not found</h1>" }), 404);
    }

    if (node.kind === "directory") {
      if (!c.req.path.endsWith("/")) return c.redirect(`${c.req.path}/`, 301);
      return renderDirectory(c, coordinator, path);
    }

    const doc = await coordinator.document(path);
    return c.html(renderPage({ title: doc.title, content: doc.html, editPath: `/${doc.path}` }));
  });
}

async function renderDirectory(c: Context, coordinator: SyncCoordinator, path: string) {
  for (const name of DIRECTORY_PAGES) {
    const candidate = joinNotePath(path, name);
    if (coordinator.lookup(candidate)?.kind === "file") {
      const doc = await coordinator.document(candidate);
      return c.html(renderPage({ title: doc.title, content: doc.html, editPath: `/${doc.path}` }));
    }
  }

  const { node, children } = coordinator.tree(path);
  const title = node.name || "Notes";
  return c.html(renderPage({ title, content: renderListing(path, children) }));
}
