import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  Watcher,
  WatchError,
  type ChangeEvent,
  type FileStat,
  type RawEventSource,
  type RawWatchListener,
} from "@mdlive/core";

function fakeSource() {
  let listener: RawWatchListener | undefined;
  let closed = 0;
  let opened = 0;
  const source: RawEventSource = (_root, l) => {
    listener = l;
    opened++;
    return {
      close: () => {
        closed++;
      },
    };
  };
  return {
    source,
    emit: (path: string) => listener?.event(path),
    fail: (err: unknown) => listener?.error(err),
    closed: () => closed,
    opened: () => opened,
  };
}

function fileStat(mtimeMs: number, size: number): FileStat {
  return { kind: "file", mtimeMs, size };
}

async function take(iter: AsyncIterator<ChangeEvent>, count: number): Promise<ChangeEvent[]> {
  const out: ChangeEvent[] = [];
  for (let i = 0; i < count; i++) {
    const result = await iter.next();
    if (result.done) break;
    out.push(result.value);
  }
  return out;
}

describe("Watcher", () => {
  const onDisk = new Map<string, FileStat>();
  const known = new Map<string, FileStat>();

  beforeEach(() => {
    vi.useFakeTimers();
    onDisk.clear();
    known.clear();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function setup(debounceMs = 20) {
    const fake = fakeSource();
    const watcher = new Watcher({
      root: "/notes",
      debounceMs,
      source: fake.source,
      known: (path) => known.get(path),
      stat: async (path) => onDisk.get(path),
    });
    watcher.start();
    const iter = watcher.events()[Symbol.asyncIterator]();
    return { fake, watcher, iter };
  }

  it("collapses a burst for one path into a single event", async () => {
    const { fake, watcher, iter } = setup();
    onDisk.set("a.md", fileStat(1, 10));

    for (let i = 0; i < 10; i++) fake.emit("a.md");
    await vi.advanceTimersByTimeAsync(25);

    expect(await take(iter, 1)).toEqual([{ type: "created", path: "a.md" }]);

    await watcher.settled();
    watcher.close();
    expect((await iter.next()).done).toBe(true);
  });

  it("pushes the flush out while events keep arriving", async () => {
    const { fake, watcher, iter } = setup();
    onDisk.set("a.md", fileStat(1, 10));
    known.set("a.md", fileStat(0, 5));

    let received = false;
    const first = iter.next().then((result) => {
      received = true;
      return result;
    });

    fake.emit("a.md");
    await vi.advanceTimersByTimeAsync(15);
    fake.emit("a.md");
    await vi.advanceTimersByTimeAsync(15);
    expect(received).toBe(false);

    await vi.advanceTimersByTimeAsync(10);
    expect((await first).value).toEqual({ type: "modified", path: "a.md" });
    watcher.close();
  });

  it("reports a removal and creation with the same size and mtime as a rename", async () => {
    const { fake, watcher, iter } = setup();
    known.set("old.md", fileStat(1000, 42));
    onDisk.set("new.md", fileStat(1000, 42));

    fake.emit("old.md");
    fake.emit("new.md");
    await vi.advanceTimersByTimeAsync(25);

    expect(await take(iter, 1)).toEqual([{ type: "renamed", from: "old.md", to: "new.md" }]);
    watcher.close();
  });

  it("keeps a removal and an unrelated creation apart", async () => {
    const { fake, watcher, iter } = setup();
    known.set("old.md", fileStat(1000, 42));
    onDisk.set("new.md", fileStat(2000, 7));

    fake.emit("old.md");
    fake.emit("new.md");
    await vi.advanceTimersByTimeAsync(25);

    expect(await take(iter, 2)).toEqual([
      { type: "removed", path: "old.md" },
      { type: "created", path: "new.md" },
    ]);
    watcher.close();
  });

  it("drops ignored paths, other file types and directory touches", async () => {
    const { fake, watcher, iter } = setup();
    onDisk.set("image.png", fileStat(1, 1));
    onDisk.set("dir", { kind: "directory", mtimeMs: 5, size: 0 });
    known.set("dir", { kind: "directory", mtimeMs: 1, size: 0 });
    onDisk.set("dir/note.md", fileStat(1, 1));

    fake.emit(".git/index");
    fake.emit("dir/.note.md.swp");
    fake.emit("image.png");
    fake.emit("dir");
    fake.emit("dir/note.md");
    await vi.advanceTimersByTimeAsync(25);

    expect(await take(iter, 1)).toEqual([{ type: "created", path: "dir/note.md" }]);
    await watcher.settled();
    watcher.close();
    expect((await iter.next()).done).toBe(true);
  });

  it("throws WatchError when the watch cannot be set up", () => {
    const watcher = new Watcher({
      root: "/notes",
      source: () => {
        throw new Error("EMFILE: too many open files");
      },
    });
    expect(() => watcher.start()).toThrow(WatchError);
    expect(watcher.active).toBe(false);
  });

  it("ends the stream with WatchError when the watch fails", async () => {
    const { fake, iter } = setup();
    const pending = iter.next();
    fake.fail(new Error("watch descriptor lost"));

    await expect(pending).rejects.toBeInstanceOf(WatchError);
    expect(fake.closed()).toBe(1);
  });

  it("watches again when events() is called after a failure", async () => {
    const { fake, watcher, iter } = setup();
    const pending = iter.next();
    fake.fail(new Error("watch descriptor lost"));
    await expect(pending).rejects.toBeInstanceOf(WatchError);

    const again = watcher.events()[Symbol.asyncIterator]();
    const next = again.next();
    expect(fake.opened()).toBe(2);
    expect(watcher.active).toBe(true);

    onDisk.set("back.md", fileStat(1, 4));
    fake.emit("back.md");
    await vi.advanceTimersByTimeAsync(25);

    expect((await next).value).toEqual({ type: "created", path: "back.md" });
    watcher.close();
    expect((await again.next()).done).toBe(true);
  });
});
