import { isAbsolute, relative, resolve, sep } from "path";
import { InvalidPathError } from "../errors.ts";
import type { NotePath } from "../types/notes.ts";

export const MARKDOWN_EXT = ".md";

/**
 * Turns user or OS supplied input into a NotePath.
 * Leading/trailing slashes and `.` segments are dropped; `..`, absolute
 * paths, backslashes and NUL bytes are rejected.
 */
export function normalizeNotePath(input: string): NotePath {
  if (input.includes("\0")) {
    throw new InvalidPathError(input, "contains a NUL byte");
  }
  if (input.includes("\\")) {
    throw new InvalidPathError(input, "backslashes are not allowed");
  }
  if (/^[a-zA-Z]:/.test(input)) {
    throw new InvalidPathError(input, "absolute paths are not allowed");
  }

  const segments: string[] = [];
  for (const segment of input.split("/")) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      throw new InvalidPathError(input, "parent directory segments are not allowed");
    }
    segments.push(segment);
  }
  return segments.join("/");
}

export function joinNotePath(parent: NotePath, name: string): NotePath {
  return parent === "" ? name : `${parent}/${name}`;
}

export function parentOf(path: NotePath): NotePath {
  const idx = path.lastIndexOf("/");
  return idx === -1 ? "" : path.slice(0, idx);
}

export function baseName(path: NotePath): string {
  const idx = path.lastIndexOf("/");
  return idx === -1 ? path : path.slice(idx + 1);
}

export function stem(path: NotePath): string {
  const name = baseName(path);
  return name.endsWith(MARKDOWN_EXT) ? name.slice(0, -MARKDOWN_EXT.length) : name;
}

export function isMarkdownPath(path: string): boolean {
  return path.endsWith(MARKDOWN_EXT) && baseName(path).length > MARKDOWN_EXT.length;
}

/** `a/b` is inside `a`; every path is inside the root `""`. */
export function isWithin(path: NotePath, ancestor: NotePath): boolean {
  return ancestor === "" || path === ancestor || path.startsWith(`${ancestor}/`);
}

/** Absolute filesystem location of a NotePath. */
export function toAbsolute(root: string, path: NotePath): string {
  return path === "" ? resolve(root) : resolve(root, ...path.split("/"));
}

/** NotePath for an absolute location, or throws if it lies outside `root`. */
export function fromAbsolute(root: string, absolute: string): NotePath {
  const rel = relative(resolve(root), resolve(absolute));
  if (rel === "") return "";
  if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new InvalidPathError(absolute, "outside the notes root");
  }
  return rel.split(sep).join("/");
}
