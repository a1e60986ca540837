export type NotesErrorCode =
  | "io"
  | "invalid_path"
  | "encoding"
  | "watch"
  | "not_found"
  | "config";

export class NotesError extends Error {
  readonly code: NotesErrorCode;

  constructor(code: NotesErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = "NotesError";
  }
}

/** Filesystem read/write/permission failure. */
export class IoError extends NotesError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super("io", `I/O error on ${path || "<root>"}: ${describeCause(cause)}`, { cause });
    this.path = path;
    this.name = "IoError";
  }
}

/** Path traversal, absolute paths or anything else that escapes the notes root. */
export class InvalidPathError extends NotesError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super("invalid_path", `Invalid path "${path}": ${reason}`);
    this.path = path;
    this.name = "InvalidPathError";
  }
}

export class EncodingError extends NotesError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super("encoding", `${path} is not valid UTF-8 text`, { cause });
    this.path = path;
    this.name = "EncodingError";
  }
}

export class WatchError extends NotesError {
  constructor(root: string, cause?: unknown) {
    super("watch", `Cannot watch ${root}: ${describeCause(cause)}`, { cause });
    this.name = "WatchError";
  }
}

export class NotFoundError extends NotesError {
  readonly path: string;

  constructor(path: string) {
    super("not_found", `Note not found: ${path || "<root>"}`);
    this.path = path;
    this.name = "NotFoundError";
  }
}

export class ConfigError extends NotesError {
  constructor(message: string) {
    super("config", message);
    this.name = "ConfigError";
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    const code = errnoCode(cause);
    return code ? `${code} ${cause.message}` : cause.message;
  }
  return String(cause);
}

export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function isMissing(err: unknown): boolean {
  const code = errnoCode(err);
  return code === "ENOENT" || code === "ENOTDIR";
}
