import { EncodingError, NotFoundError } from "../errors.ts";
import { decodeNote, hashContent, readNoteBytes, statNote } from "../integrations/notes-fs.ts";
import type { Document, NotePath } from "../types/notes.ts";
import { createLogger } from "../utils/logger.ts";
import {
  deriveTitle,
  extractHeadings,
  extractWikilinks,
  parseFrontmatter,
  renderMarkdown,
} from "../utils/markdown.ts";
import { stem } from "../utils/paths.ts";
import { tokenize } from "../utils/tokenize.ts";
import type { PathIndex } from "./path-index.ts";

const log = createLogger("content");

/** Parses raw markdown into a Document. Pure; the same input gives the same output. */
export function buildDocument(path: NotePath, raw: string, mtimeMs: number, hash = hashContent(raw)): Document {
  const { data, body } = parseFrontmatter(raw);
  const headings = extractHeadings(body);
  const title = deriveTitle(headings, stem(path));

  return {
    path,
    title,
    raw,
    body,
    html: renderMarkdown(body),
    frontmatter: data,
    tokens: [...tokenize(title, "title"), ...tokenize(body, "body")],
    headings,
    wikilinks: extractWikilinks(body),
    hash,
    mtimeMs,
  };
}

/** Placeholder for a file that is not valid text: searchable by title only. */
export function emptyDocument(path: NotePath, mtimeMs: number, hash: string): Document {
  const title = stem(path);
  return {
    path,
    title,
    raw: "",
    body: "",
    html: "",
    frontmatter: {},
    tokens: tokenize(title, "title"),
    headings: [],
    wikilinks: [],
    hash,
    mtimeMs,
  };
}

/**
 * Cache of parsed Documents keyed by NotePath. Only files present in the
 * PathIndex can be loaded.
 */
export class ContentStore {
  private readonly cache = new Map<NotePath, Document>();
  private readonly inflight = new Map<NotePath, Promise<Document>>();
  private readonly generations = new Map<NotePath, number>();

  constructor(
    private readonly root: string,
    private readonly index: PathIndex,
  ) {}

  get size(): number {
    return this.cache.size;
  }

  peek(path: NotePath): Document | undefined {
    return this.cache.get(path);
  }

  /** Cached Document, or a fresh read that is cached unless invalidated meanwhile. */
  async getOrLoad(path: NotePath): Promise<Document> {
    const cached = this.cache.get(path);
    if (cached) return cached;
    if (!this.index.has(path, "file")) throw new NotFoundError(path);

    const pending = this.inflight.get(path);
    if (pending) return pending;

    const generation = this.generation(path);
    const promise: Promise<Document> = this.load(path).then(
      (doc) => {
        const current = this.inflight.get(path) === promise;
        if (current && this.generation(path) === generation && this.index.has(path, "file")) {
          this.cache.set(path, doc);
        }
        if (current) this.inflight.delete(path);
        return doc;
      },
      (err: unknown) => {
        if (this.inflight.get(path) === promise) this.inflight.delete(path);
        throw err;
      },
    );
    this.inflight.set(path, promise);
    return promise;
  }

  /** Reads and parses a file without touching the cache. */
  async load(path: NotePath): Promise<Document> {
    const [bytes, stat] = await Promise.all([readNoteBytes(this.root, path), statNote(this.root, path)]);
    if (!stat) throw new NotFoundError(path);
    const raw = decodeNote(path, bytes);
    return buildDocument(path, raw, stat.mtimeMs, hashContent(bytes));
  }

  /** Like `load`, but a file that is not valid text becomes an empty Document. */
  async loadOrEmpty(path: NotePath): Promise<Document> {
    try {
      return await this.load(path);
    } catch (e) {
      if (!(e instanceof EncodingError)) throw e;
      log.warn(`${path} is not valid UTF-8; indexing it without content`);
      const bytes = await readNoteBytes(this.root, path);
      const stat = await statNote(this.root, path);
      return emptyDocument(path, stat?.mtimeMs ?? 0, hashContent(bytes));
    }
  }

  /** Exact on-disk bytes, for editing round trips. */
  async readRaw(path: NotePath): Promise<Buffer> {
    if (!this.index.has(path, "file")) throw new NotFoundError(path);
    return readNoteBytes(this.root, path);
  }

  /** Stores a Document built elsewhere, replacing any cached version. */
  put(doc: Document): void {
    this.invalidate(doc.path);
    this.cache.set(doc.path, doc);
  }

  /** Drops the cached Document; the next `getOrLoad` reads the file again. */
  invalidate(path: NotePath): void {
    this.cache.delete(path);
    this.generations.set(path, this.generation(path) + 1);
  }

  /** Forgets a path that no longer exists; a load still running for it is not cached. */
  forget(path: NotePath): void {
    this.cache.delete(path);
    this.inflight.delete(path);
    this.generations.delete(path);
  }

  /** Paths the store holds any state for. */
  get tracked(): number {
    return new Set([...this.cache.keys(), ...this.inflight.keys(), ...this.generations.keys()]).size;
  }

  clear(): void {
    for (const path of this.cache.keys()) this.invalidate(path);
  }

  private generation(path: NotePath): number {
    return this.generations.get(path) ?? 0;
  }
}
