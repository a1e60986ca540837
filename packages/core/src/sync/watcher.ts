import { watch } from "fs";
import { sep } from "path";
import { WatchError } from "../errors.ts";
import { statNote } from "../integrations/notes-fs.ts";
import type { ChangeEvent, FileStat, NotePath } from "../types/notes.ts";
import { createIgnoreMatcher, type IgnoreMatcher } from "../utils/ignore.ts";
import { createLogger } from "../utils/logger.ts";
import { isMarkdownPath, normalizeNotePath } from "../utils/paths.ts";
import { DeadlineMap } from "./deadlines.ts";

const log = createLogger("watcher");

export const DEFAULT_DEBOUNCE_MS = 300;

export interface RawWatchListener {
  /** A path relative to the root, in the platform's separator. */
  event(relativePath: string): void;
  error(err: unknown): void;
}

export interface RawWatchHandle {
  close(): void;
}

/** Where raw notifications come from; `fs.watch` unless a test supplies its own. */
export type RawEventSource = (root: string, listener: RawWatchListener) => RawWatchHandle;

export const fsWatchSource: RawEventSource = (root, listener) => {
  const watcher = watch(root, { recursive: true }, (_eventType, filename) => {
    if (filename) listener.event(filename);
  });
  watcher.on("error", (err) => listener.error(err));
  return watcher;
};

export interface WatcherOptions {
  root: string;
  debounceMs?: number;
  ignore?: IgnoreMatcher;
  /** Last known state of a path, or `undefined` when the consumer has never seen it. */
  known?: (path: NotePath) => FileStat | undefined;
  source?: RawEventSource;
  stat?: (path: NotePath) => Promise<FileStat | undefined>;
  now?: () => number;
}

interface Waiter {
  resolve(event: ChangeEvent | null): void;
  reject(err: unknown): void;
}

/**
 * Turns bursts of raw filesystem notifications into ChangeEvents.
 *
 * Raw events for a path keep pushing that path's deadline out by the debounce
 * window. Once it passes, the path is stat'ed once and compared with what the
 * consumer last knew to decide between created, modified and removed. A removal
 * and a creation flushed together whose size and mtime agree become a rename.
 */
export class Watcher {
  private readonly root: string;
  private readonly ignore: IgnoreMatcher;
  private readonly known: (path: NotePath) => FileStat | undefined;
  private readonly source: RawEventSource;
  private readonly stat: (path: NotePath) => Promise<FileStat | undefined>;
  private readonly now: () => number;
  private readonly deadlines: DeadlineMap<NotePath>;

  private handle: RawWatchHandle | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private flushing: Promise<void> = Promise.resolve();
  private readonly queue: ChangeEvent[] = [];
  private waiter: Waiter | null = null;
  private failure: WatchError | null = null;
  private closed = false;

  constructor(options: WatcherOptions) {
    this.root = options.root;
    this.ignore = options.ignore ?? createIgnoreMatcher();
    this.known = options.known ?? (() => undefined);
    this.source = options.source ?? fsWatchSource;
    this.stat = options.stat ?? ((path) => statNote(options.root, path));
    this.now = options.now ?? (() => Date.now());
    this.deadlines = new DeadlineMap(options.debounceMs ?? DEFAULT_DEBOUNCE_MS);
  }

  get active(): boolean {
    return this.handle !== null;
  }

  /** Establishes the OS watch. Throws `WatchError` if it cannot be set up. */
  start(): void {
    if (this.closed) throw new WatchError(this.root, "watcher is closed");
    if (this.handle) return;

    this.failure = null;
    try {
      this.handle = this.source(this.root, {
        event: (relativePath) => this.onRaw(relativePath),
        error: (err) => this.fail(err),
      });
    } catch (e) {
      throw new WatchError(this.root, e);
    }
    log.debug(`watching ${this.root}`);
  }

  /**
   * ChangeEvents as they are flushed. Runs until `close()`; throws `WatchError`
   * if the underlying watch fails. Calling it again after a failure re-subscribes.
   */
  async *events(): AsyncGenerator<ChangeEvent, void, undefined> {
    this.start();
    try {
      for (;;) {
        const event = await this.next();
        if (!event) return;
        yield event;
      }
    } finally {
      this.stop();
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.stop();
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.resolve(null);
  }

  /** Resolves once every flush scheduled so far has pushed its events. */
  async settled(): Promise<void> {
    await this.flushing;
  }

  private onRaw(relativePath: string): void {
    let path: NotePath;
    try {
      path = normalizeNotePath(relativePath.split(sep).join("/"));
    } catch (e) {
      log.debug("ignoring raw event:", e instanceof Error ? e.message : String(e));
      return;
    }
    if (path === "" || this.ignore.ignores(path)) return;

    this.deadlines.touch(path, this.now());
    this.schedule();
  }

  private schedule(): void {
    if (this.timer || !this.handle) return;
    const next = this.deadlines.next();
    if (next === undefined) return;

    this.timer = setTimeout(() => {
      this.timer = null;
      const due = this.deadlines.takeDue(this.now());
      if (due.length > 0) {
        this.flushing = this.flushing.then(() => this.flush(due));
      }
      this.schedule();
    }, Math.max(0, next - this.now()));
  }

  private async flush(paths: NotePath[]): Promise<void> {
    const events: ChangeEvent[] = [];
    const removed: Array<{ path: NotePath; last: FileStat }> = [];
    const created: Array<{ path: NotePath; stat: FileStat }> = [];

    for (const path of paths) {
      let current: FileStat | undefined;
      try {
        current = await this.stat(path);
      } catch (e) {
        log.warn(`cannot stat ${path}:`, e instanceof Error ? e.message : String(e));
        continue;
      }
      const last = this.known(path);

      if (current) {
        if (current.kind === "file" && !isMarkdownPath(path)) continue;
        if (!last) {
          created.push({ path, stat: current });
        } else if (current.kind === "file") {
          events.push({ type: "modified", path });
        } else if (last.kind === "file") {
          events.push({ type: "created", path });
        }
      } else if (last) {
        removed.push({ path, last });
      }
    }

    for (const { path, last } of removed) {
      const index =
        last.kind === "file"
          ? created.findIndex(
              ({ stat }) => stat.kind === "file" && stat.size === last.size && stat.mtimeMs === last.mtimeMs,
            )
          : -1;
      const [match] = index === -1 ? [] : created.splice(index, 1);
      if (match) {
        events.push({ type: "renamed", from: path, to: match.path });
      } else {
        events.push({ type: "removed", path });
      }
    }
    for (const { path } of created) {
      events.push({ type: "created", path });
    }

    for (const event of events) this.push(event);
  }

  private push(event: ChangeEvent): void {
    if (this.closed) return;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.resolve(event);
    } else {
      this.queue.push(event);
    }
  }

  private next(): Promise<ChangeEvent | null> {
    if (this.failure) return Promise.reject(this.failure);
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  private fail(err: unknown): void {
    const failure = new WatchError(this.root, err);
    log.error(failure.message);
    this.failure = failure;
    this.stop();
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.reject(failure);
  }

  private stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.deadlines.clear();
    if (this.handle) {
      this.handle.close();
      this.handle = null;
    }
  }
}
