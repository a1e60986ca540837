import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { NotesError, error as logError, type ErrorResponse, type NotesErrorCode } from "@mdlive/core";

const STATUS: Record<NotesErrorCode, ContentfulStatusCode> = {
  invalid_path: 403,
  not_found: 404,
  encoding: 415,
  io: 500,
  watch: 503,
  config: 500,
};

export function statusFor(err: unknown): ContentfulStatusCode {
  return err instanceof NotesError ? STATUS[err.code] : 500;
}

/** Maps core errors to JSON responses; anything unexpected is logged and reported as 500. */
export function errorHandler(err: Error, c: Context) {
  const status = statusFor(err);
  if (status === 500) {
    logError(`${c.req.method} ${c.req.path}:`, err.message);
  }
  const body: ErrorResponse = { error: err.message };
  return c.json(body, status);
}
