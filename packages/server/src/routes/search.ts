import type { Hono } from "hono";
import { z } from "zod";
import type { ErrorResponse, SearchResponse } from "@mdlive/core";
import type { ServerContext } from "../context.ts";

const searchQuery = z.object({
  q: z.string().default(""),
  limit: z.coerce.number().int().positive().optional(),
});

export function searchRoute(app: Hono, { coordinator, config }: ServerContext) {
  app.get("/search", (c) => {
    const parsed = searchQuery.safeParse(c.req.query());
    if (!parsed.success) {
      const body: ErrorResponse = { error: "limit must be a positive integer" };
      return c.json(body, 400);
    }

    const { q, limit } = parsed.data;
    const results = coordinator.query(q, Math.min(limit ?? config.search.maxResults, config.search.maxResults));
    const body: SearchResponse = { query: q, results };
    return c.json(body);
  });
}
