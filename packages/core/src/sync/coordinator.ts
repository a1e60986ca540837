import { randomUUID } from "crypto";
import { setTimeout as sleep } from "timers/promises";
import { NotFoundError } from "../errors.ts";
import { ContentStore, emptyDocument } from "../index/content-store.ts";
import { PathIndex } from "../index/path-index.ts";
import { SearchEngine } from "../index/search-engine.ts";
import { assertInsideRoot, readNoteBytes, scanTree, statNote, type ScanEntry } from "../integrations/notes-fs.ts";
import type { Config, WatchConfig } from "../types/config.ts";
import { DEFAULT_CONFIG } from "../types/config.ts";
import type {
  ChangeEvent,
  Document,
  FileStat,
  NotePath,
  NotesStats,
  ReloadNotification,
  TreeNode,
} from "../types/notes.ts";
import type { SearchHit } from "../types/search.ts";
import { createIgnoreMatcher, type IgnoreMatcher } from "../utils/ignore.ts";
import { createLogger } from "../utils/logger.ts";
import { isMarkdownPath, normalizeNotePath } from "../utils/paths.ts";
import { Watcher, type RawEventSource } from "./watcher.ts";
import { KeyedQueue } from "./keyed-queue.ts";

const log = createLogger("sync");

const LOAD_BATCH = 16;

/** Returns `false` when the channel is closed or full; throwing means the same. */
export type SendFn = (message: ReloadNotification) => boolean | void;

export interface Subscriber {
  readonly id: string;
  send: SendFn;
}

export type LiveReloadState = "active" | "disabled";

export interface CoordinatorOptions {
  root: string;
  ignore?: string[];
  maxResults?: number;
  watch?: Partial<WatchConfig>;
}

type Commit = () => boolean;

/**
 * Owns the PathIndex, ContentStore, SearchEngine and subscriber registry.
 *
 * Every mutation goes through `apply`. Events for one path run strictly in
 * arrival order; events for different paths may interleave. Each update does
 * its I/O first and then changes all three structures in one synchronous
 * step, so readers see either the old state or the new one.
 */
export class SyncCoordinator {
  readonly root: string;
  readonly ignore: IgnoreMatcher;

  private readonly index = new PathIndex();
  private readonly store: ContentStore;
  private readonly search: SearchEngine;
  private readonly queue = new KeyedQueue();
  private readonly subscribers = new Map<string, Subscriber>();
  private readonly inFlight = new Set<Promise<boolean>>();
  private readonly watchConfig: WatchConfig;

  private watcher: Watcher | null = null;
  private state: LiveReloadState = "disabled";
  private stopped = false;

  constructor(options: CoordinatorOptions) {
    this.root = options.root;
    this.ignore = createIgnoreMatcher(options.ignore ?? []);
    this.store = new ContentStore(this.root, this.index);
    this.search = new SearchEngine(options.maxResults ?? DEFAULT_CONFIG.search.maxResults);
    this.watchConfig = { ...DEFAULT_CONFIG.watch, ...options.watch };
  }

  static fromConfig(config: Config): SyncCoordinator {
    return new SyncCoordinator({
      root: config.notes.root,
      ignore: config.notes.ignore,
      maxResults: config.search.maxResults,
      watch: config.watch,
    });
  }

  get liveReload(): LiveReloadState {
    return this.state;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  /**
   * Full scan and index build. Throws `IoError` only when the root itself
   * cannot be read; individual notes that fail are indexed empty.
   */
  async start(): Promise<NotesStats> {
    const started = Date.now();
    const entries = await scanTree(this.root, { ignore: this.ignore });
    const docs = await this.loadAll(entries);

    this.index.load(entries);
    this.store.clear();
    this.search.clear();
    for (const doc of docs) {
      this.store.put(doc);
      this.search.reindex(doc.path, doc);
    }

    const stats = this.stats();
    log.info(
      `Indexed ${stats.totalNotes} notes in ${stats.totalFolders} folders (${Date.now() - started} ms)`,
    );
    return stats;
  }

  /**
   * Rescans the root and applies the difference as ChangeEvents. Used after
   * the watch was down, when changes may have been missed.
   */
  async rescan(): Promise<number> {
    const entries = await scanTree(this.root, { ignore: this.ignore });
    const seen = new Set<NotePath>();
    const events: ChangeEvent[] = [];

    for (const entry of entries) {
      seen.add(entry.path);
      const known = this.index.lookup(entry.path);
      if (!known || known.kind !== entry.kind) {
        events.push({ type: "created", path: entry.path });
      } else if (entry.kind === "file" && (known.mtimeMs !== entry.mtimeMs || known.size !== entry.size)) {
        events.push({ type: "modified", path: entry.path });
      }
    }
    for (const path of [...this.index.files(), ...this.directories()]) {
      if (!seen.has(path)) events.push({ type: "removed", path });
    }

    const results = await Promise.all(events.map((event) => this.applyLogged(event)));
    const changed = results.filter(Boolean).length;
    log.debug(`rescan applied ${changed} change(s)`);
    return changed;
  }

  /**
   * Applies one ChangeEvent and broadcasts a reload for each path it changed.
   * Resolves `true` if anything changed; rejects if the update failed.
   */
  apply(event: ChangeEvent): Promise<boolean> {
    const keys = event.type === "renamed" ? [event.from, event.to] : [event.path];
    return this.queue.run(keys, () => this.process(event));
  }

  /** Watches the root until `stop()`, retrying a failed watch before giving up on live reload. */
  async watch(source?: RawEventSource): Promise<void> {
    const { debounceMs, retryAttempts, retryDelayMs } = this.watchConfig;
    let failures = 0;

    while (!this.stopped) {
      const watcher = new Watcher({
        root: this.root,
        debounceMs,
        ignore: this.ignore,
        known: (path) => this.knownStat(path),
        source,
      });
      this.watcher = watcher;

      try {
        watcher.start();
        this.state = "active";
        if (failures > 0) await this.rescan();
        for await (const event of watcher.events()) {
          failures = 0;
          this.track(this.applyLogged(event));
        }
        return;
      } catch (e) {
        watcher.close();
        this.state = "disabled";
        failures++;
        log.error(e instanceof Error ? e.message : String(e));
        if (this.stopped || failures > retryAttempts) {
          log.warn("Live reload disabled; pages still serve current content");
          return;
        }
        await sleep(retryDelayMs * failures);
      } finally {
        if (this.watcher === watcher) this.watcher = null;
      }
    }
  }

  stop(): void {
    this.stopped = true;
    this.state = "disabled";
    this.watcher?.close();
    this.watcher = null;
  }

  /** Resolves when every event handed over so far has been applied. */
  async idle(): Promise<void> {
    await this.watcher?.settled();
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
    await this.queue.idle();
  }

  subscribe(send: SendFn, id: string = randomUUID()): Subscriber {
    const subscriber: Subscriber = { id, send };
    this.subscribers.set(id, subscriber);
    log.debug(`session ${id} connected (${this.subscribers.size} open)`);
    return subscriber;
  }

  unsubscribe(id: string): boolean {
    const removed = this.subscribers.delete(id);
    if (removed) log.debug(`session ${id} disconnected (${this.subscribers.size} open)`);
    return removed;
  }

  /** Best-effort fan-out; a failing channel is dropped and the rest still receive. */
  broadcast(notification: ReloadNotification): number {
    let delivered = 0;
    for (const subscriber of [...this.subscribers.values()]) {
      try {
        if (subscriber.send(notification) === false) {
          this.drop(subscriber.id, "channel closed or full");
          continue;
        }
        delivered++;
      } catch (e) {
        this.drop(subscriber.id, e instanceof Error ? e.message : String(e));
      }
    }
    log.debug(`reload ${notification.path} sent to ${delivered} session(s)`);
    return delivered;
  }

  // Reads

  lookup(path: string): TreeNode | undefined {
    return this.index.lookup(normalizeNotePath(path));
  }

  /** A directory's node and its children in display order. */
  tree(path = ""): { node: TreeNode; children: TreeNode[] } {
    const normalized = normalizeNotePath(path);
    const node = this.index.lookup(normalized);
    if (!node) throw new NotFoundError(normalized);
    return { node, children: this.index.children(normalized) };
  }

  document(path: string): Promise<Document> {
    return this.store.getOrLoad(normalizeNotePath(path));
  }

  raw(path: string): Promise<Buffer> {
    return this.store.readRaw(normalizeNotePath(path));
  }

  /**
   * Bytes of a non-markdown file inside the root, such as an image a note
   * embeds. `undefined` when there is no such file or the path is ignored.
   */
  async asset(path: string): Promise<Buffer | undefined> {
    const normalized = normalizeNotePath(path);
    if (normalized === "" || isMarkdownPath(normalized) || this.ignore.ignores(normalized)) return undefined;
    await assertInsideRoot(this.root, normalized);
    const stat = await statNote(this.root, normalized);
    if (stat?.kind !== "file") return undefined;
    return readNoteBytes(this.root, normalized);
  }

  query(text: string, limit?: number): SearchHit[] {
    return this.search.query(text, limit);
  }

  files(): NotePath[] {
    return this.index.files();
  }

  stats(): NotesStats {
    return this.index.stats(this.root);
  }

  // Processing

  private async process(event: ChangeEvent): Promise<boolean> {
    switch (event.type) {
      case "created":
      case "modified": {
        const commit = await this.prepareUpsert(event.path);
        return this.notify(commit(), event.path);
      }
      case "removed":
        return this.notify(this.commitRemove(event.path), event.path);
      case "renamed": {
        // Read the new location first so removal and creation land together.
        const commit = await this.prepareUpsert(event.to);
        const removed = this.commitRemove(event.from);
        const created = commit();
        this.notify(removed, event.from);
        this.notify(created, event.to);
        return removed || created;
      }
    }
  }

  private async prepareUpsert(path: NotePath): Promise<Commit> {
    const stat = await statNote(this.root, path);
    if (!stat) return () => this.commitRemove(path);

    if (stat.kind === "directory") {
      const entries = await scanTree(this.root, { ignore: this.ignore, from: path });
      const docs = await this.loadAll(entries);
      return () => {
        const existed = this.index.has(path, "directory");
        this.index.upsert(path, "directory", stat);
        for (const entry of entries) this.index.upsert(entry.path, entry.kind, entry);
        const displaced = this.dropFiles(this.index.takeDisplaced());
        for (const doc of docs) this.commitDocument(doc);
        return !existed || docs.length > 0 || displaced > 0;
      };
    }

    if (!isMarkdownPath(path)) return () => false;

    const doc = await this.store.loadOrEmpty(path);
    return () => {
      const previous = this.store.peek(path);
      const unchanged = previous?.hash === doc.hash && this.index.has(path, "file");
      this.index.upsert(path, "file", stat);
      const displaced = this.dropFiles(this.index.takeDisplaced());
      if (unchanged && displaced === 0) return false;
      this.commitDocument(doc);
      return true;
    };
  }

  private commitDocument(doc: Document): void {
    this.store.invalidate(doc.path);
    this.store.put(doc);
    this.search.reindex(doc.path, doc);
  }

  private commitRemove(path: NotePath): boolean {
    if (path === "" || !this.index.has(path)) return false;
    this.dropFiles(this.index.remove(path));
    return true;
  }

  /** Takes files the PathIndex no longer holds out of the store and the search index. */
  private dropFiles(files: NotePath[]): number {
    for (const file of files) {
      this.store.forget(file);
      this.search.remove(file);
    }
    return files.length;
  }

  private notify(changed: boolean, path: NotePath): boolean {
    if (changed) this.broadcast({ type: "reload", path });
    return changed;
  }

  private async applyLogged(event: ChangeEvent): Promise<boolean> {
    try {
      return await this.apply(event);
    } catch (e) {
      const target = event.type === "renamed" ? `${event.from} → ${event.to}` : event.path;
      log.error(`failed to apply ${event.type} ${target}:`, e instanceof Error ? e.message : String(e));
      return false;
    }
  }

  private track(task: Promise<boolean>): void {
    this.inFlight.add(task);
    void task.then(() => this.inFlight.delete(task));
  }

  private async loadAll(entries: ScanEntry[]): Promise<Document[]> {
    const files = entries.filter((entry) => entry.kind === "file");
    const docs: Document[] = [];
    for (let i = 0; i < files.length; i += LOAD_BATCH) {
      const batch = files.slice(i, i + LOAD_BATCH);
      docs.push(...(await Promise.all(batch.map((entry) => this.loadForIndex(entry)))));
    }
    return docs;
  }

  private async loadForIndex(entry: ScanEntry): Promise<Document> {
    try {
      return await this.store.loadOrEmpty(entry.path);
    } catch (e) {
      log.warn(`indexing ${entry.path} without content:`, e instanceof Error ? e.message : String(e));
      return emptyDocument(entry.path, entry.mtimeMs, "");
    }
  }

  private knownStat(path: NotePath): FileStat | undefined {
    const node = this.index.lookup(path);
    if (!node) return undefined;
    return { kind: node.kind, mtimeMs: node.mtimeMs, size: node.size ?? 0 };
  }

  private directories(): NotePath[] {
    const out: NotePath[] = [];
    const stack: NotePath[] = [""];
    while (stack.length > 0) {
      const dir = stack.pop();
      if (dir === undefined) break;
      for (const child of this.index.children(dir)) {
        if (child.kind === "directory") {
          out.push(child.path);
          stack.push(child.path);
        }
      }
    }
    return out;
  }

  private drop(id: string, reason: string): void {
    if (this.subscribers.delete(id)) {
      log.debug(`dropping session ${id}: ${reason}`);
    }
  }
}
