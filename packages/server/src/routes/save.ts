import type { Hono } from "hono";
import { z } from "zod";
import { InvalidPathError, NotesError, type SaveRequest, type SaveResponse } from "@mdlive/core";
import type { ServerContext } from "../context.ts";
import { statusFor } from "../middleware/errors.ts";

const saveRequest = z.object({
  path: z.string().min(1),
  content: z.string(),
}) satisfies z.ZodType<SaveRequest>;

function failure(error: string): SaveResponse {
  return { success: false, error };
}

export function saveRoute(app: Hono, { editor }: ServerContext) {
  app.post("/save", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(failure("Request body must be JSON"), 400);
    }

    const parsed = saveRequest.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const message = issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : "Invalid request";
      return c.json(failure(message), 400);
    }

    try {
      await editor.save(parsed.data.path, parsed.data.content);
      const ok: SaveResponse = { success: true };
      return c.json(ok);
    } catch (e) {
      if (!(e instanceof NotesError)) throw e;
      const status = e instanceof InvalidPathError ? 400 : statusFor(e);
      return c.json(failure(e.message), status);
    }
  });
}
