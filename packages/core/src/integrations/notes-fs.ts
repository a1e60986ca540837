import { join, dirname, basename } from "path";
import { createHash, randomBytes } from "crypto";
import { mkdir, readdir, readFile, realpath, rename, rm, stat, writeFile } from "fs/promises";
import { EncodingError, InvalidPathError, IoError, NotFoundError, errnoCode, isMissing } from "../errors.ts";
import type { FileStat, NodeKind, NotePath } from "../types/notes.ts";
import type { IgnoreMatcher } from "../utils/ignore.ts";
import { isMarkdownPath, joinNotePath, fromAbsolute, toAbsolute } from "../utils/paths.ts";
import { warn } from "../utils/logger.ts";

export const MAX_SCAN_DEPTH = 32;

export interface ScanEntry extends FileStat {
  path: NotePath;
}

export interface ScanOptions {
  ignore?: IgnoreMatcher;
  maxDepth?: number;
  /** Subtree to scan; defaults to the whole root. */
  from?: NotePath;
}

/**
 * Recursive walk of the notes root returning directories and markdown files.
 * Symlinks are followed; a directory reached twice (same dev/inode) or below
 * `maxDepth` is not descended into, and links pointing outside the root are skipped.
 */
export async function scanTree(root: string, options: ScanOptions = {}): Promise<ScanEntry[]> {
  const maxDepth = options.maxDepth ?? MAX_SCAN_DEPTH;
  const start = options.from ?? "";
  const entries: ScanEntry[] = [];
  const visited = new Set<string>();

  let realRoot: string;
  try {
    realRoot = await realpath(root);
  } catch (e) {
    throw new IoError("", e);
  }

  async function walk(dir: NotePath, depth: number): Promise<void> {
    if (depth > maxDepth) {
      warn(`Not descending into ${dir}: deeper than ${maxDepth} levels`);
      return;
    }

    const abs = toAbsolute(root, dir);
    let names: string[];
    try {
      const dirStat = await stat(abs);
      const key = `${dirStat.dev}:${dirStat.ino}`;
      if (visited.has(key)) {
        warn(`Skipping ${dir}: directory cycle`);
        return;
      }
      visited.add(key);
      names = await readdir(abs);
    } catch (e) {
      if (dir === start) throw new IoError(dir, e);
      warn(`Skipping unreadable directory ${dir}:`, e instanceof Error ? e.message : String(e));
      return;
    }

    names.sort();
    for (const name of names) {
      const path = joinNotePath(dir, name);
      if (options.ignore?.ignores(path)) continue;

      const entry = await statEntry(root, realRoot, path);
      if (!entry) continue;

      if (entry.kind === "directory") {
        entries.push(entry);
        await walk(path, depth + 1);
      } else if (isMarkdownPath(path)) {
        entries.push(entry);
      }
    }
  }

  await walk(start, 0);
  return entries;
}

async function statEntry(root: string, realRoot: string, path: NotePath): Promise<ScanEntry | undefined> {
  const abs = toAbsolute(root, path);
  try {
    const real = await realpath(abs);
    if (fromAbsoluteOrNull(realRoot, real) === null) {
      warn(`Skipping ${path}: link points outside the notes root`);
      return undefined;
    }
    const s = await stat(abs);
    const kind: NodeKind | undefined = s.isDirectory() ? "directory" : s.isFile() ? "file" : undefined;
    if (!kind) return undefined;
    return { path, kind, mtimeMs: s.mtimeMs, size: kind === "file" ? s.size : 0 };
  } catch (e) {
    // Dangling symlinks and entries removed mid-scan.
    if (isMissing(e) || errnoCode(e) === "ELOOP") return undefined;
    warn(`Skipping ${path}:`, e instanceof Error ? e.message : String(e));
    return undefined;
  }
}

function fromAbsoluteOrNull(root: string, absolute: string): NotePath | null {
  try {
    return fromAbsolute(root, absolute);
  } catch {
    return null;
  }
}

/** Current stat of a note or directory, or `undefined` when it no longer exists. */
export async function statNote(root: string, path: NotePath): Promise<FileStat | undefined> {
  try {
    const s = await stat(toAbsolute(root, path));
    if (s.isDirectory()) return { kind: "directory", mtimeMs: s.mtimeMs, size: 0 };
    if (s.isFile()) return { kind: "file", mtimeMs: s.mtimeMs, size: s.size };
    return undefined;
  } catch (e) {
    if (isMissing(e)) return undefined;
    throw new IoError(path, e);
  }
}

export async function readNoteBytes(root: string, path: NotePath): Promise<Buffer> {
  try {
    return await readFile(toAbsolute(root, path));
  } catch (e) {
    if (isMissing(e)) throw new NotFoundError(path);
    throw new IoError(path, e);
  }
}

const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/** Strict UTF-8 decode that keeps a BOM, so the string re-encodes to the same bytes. */
export function decodeNote(path: NotePath, bytes: Uint8Array): string {
  if (bytes.includes(0)) throw new EncodingError(path);
  try {
    return decoder.decode(bytes);
  } catch (e) {
    throw new EncodingError(path, e);
  }
}

export function hashContent(content: string | Uint8Array): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Resolves the deepest existing ancestor of `path` and checks it is still
 * inside the root, so a symlinked folder cannot redirect a write elsewhere.
 */
export async function assertInsideRoot(root: string, path: NotePath): Promise<void> {
  let realRoot: string;
  try {
    realRoot = await realpath(root);
  } catch (e) {
    throw new IoError("", e);
  }

  let candidate = toAbsolute(root, path);
  for (;;) {
    try {
      const real = await realpath(candidate);
      if (fromAbsoluteOrNull(realRoot, real) === null) {
        throw new InvalidPathError(path, "resolves outside the notes root");
      }
      return;
    } catch (e) {
      if (e instanceof InvalidPathError) throw e;
      if (!isMissing(e)) throw new IoError(path, e);
      const parent = dirname(candidate);
      if (parent === candidate) return;
      candidate = parent;
    }
  }
}

/**
 * Writes to a hidden temp file beside the target and renames it into place.
 * Readers see either the old bytes or the new ones, never a partial file.
 */
export async function writeNoteAtomic(root: string, path: NotePath, content: string): Promise<string> {
  const target = toAbsolute(root, path);
  const dir = dirname(target);
  const temp = join(dir, `.${basename(target)}.${randomBytes(6).toString("hex")}.tmp`);

  try {
    await mkdir(dir, { recursive: true });
    await writeFile(temp, content, "utf8");
    await rename(temp, target);
  } catch (e) {
    await rm(temp, { force: true });
    throw new IoError(path, e);
  }

  return hashContent(Buffer.from(content, "utf8"));
}
