import { afterEach, describe, expect, it } from "vitest";
import { rm, writeFile } from "fs/promises";
import { join } from "path";
import {
  ContentStore,
  EncodingError,
  NotFoundError,
  PathIndex,
  buildDocument,
  createIgnoreMatcher,
} from "@mdlive/core";
import { makeNotes, removeNotes } from "./helpers.ts";

describe("buildDocument", () => {
  it("takes the title from the first level one heading", () => {
    const doc = buildDocument("plans/q3.md", "# Quarter Plan\n\nSee [[roadmap]].\n", 7);

    expect(doc.title).toBe("Quarter Plan");
    expect(doc.wikilinks).toEqual(["roadmap"]);
    expect(doc.html).toContain("<h1>Quarter Plan</h1>");
    expect(doc.html).toContain('<a href="/roadmap.md">roadmap</a>');
    expect(doc.mtimeMs).toBe(7);
  });

  it("falls back to the file name and indexes title tokens first", () => {
    const doc = buildDocument("dir/My Note.md", "plain text", 0);

    expect(doc.title).toBe("My Note");
    expect(doc.tokens.map((t) => `${t.field}:${t.term}`)).toEqual([
      "title:my",
      "title:note",
      "body:plain",
      "body:text",
    ]);
  });

  it("keeps frontmatter out of the body", () => {
    const doc = buildDocument("a.md", "---\ntags: [x]\n---\nhello\n", 0);
    expect(doc.frontmatter).toEqual({ tags: ["x"] });
    expect(doc.body).toBe("hello\n");
    expect(doc.raw).toBe("---\ntags: [x]\n---\nhello\n");
  });
});

describe("ContentStore", () => {
  let root = "";

  afterEach(async () => {
    await removeNotes(root);
  });

  async function setup(files: Record<string, string | Uint8Array>) {
    root = await makeNotes(files);
    const index = new PathIndex();
    await index.rebuild(root, { ignore: createIgnoreMatcher() });
    return { index, store: new ContentStore(root, index) };
  }

  it("caches loaded documents until invalidated", async () => {
    const { store } = await setup({ "a.md": "# One" });

    const first = await store.getOrLoad("a.md");
    expect(await store.getOrLoad("a.md")).toBe(first);

    await writeFile(join(root, "a.md"), "# Two");
    expect((await store.getOrLoad("a.md")).title).toBe("One");

    store.invalidate("a.md");
    expect((await store.getOrLoad("a.md")).title).toBe("Two");
  });

  it("keeps no state for a path once it is forgotten", async () => {
    const { index, store } = await setup({ "a.md": "# One", "b.md": "# B" });

    await store.getOrLoad("a.md");
    store.invalidate("b.md");
    expect(store.tracked).toBe(2);

    await rm(join(root, "a.md"));
    index.remove("a.md");
    store.forget("a.md");
    expect(store.tracked).toBe(1);
    expect(store.peek("a.md")).toBeUndefined();
  });

  it("does not cache a load that was running when the path was forgotten", async () => {
    const { index, store } = await setup({ "a.md": "# One" });

    const pending = store.getOrLoad("a.md");
    store.forget("a.md");
    await writeFile(join(root, "a.md"), "# Two");
    index.upsert("a.md", "file");

    await pending;
    expect(store.peek("a.md")).toBeUndefined();
    expect((await store.getOrLoad("a.md")).title).toBe("Two");
  });

  it("refuses paths the index does not know", async () => {
    const { store } = await setup({ "a.md": "x" });
    await expect(store.getOrLoad("b.md")).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.readRaw("b.md")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("indexes invalid UTF-8 as an empty document", async () => {
    const { store } = await setup({ "bad.md": Uint8Array.from([0x23, 0x20, 0xff, 0xfe, 0x41]) });

    await expect(store.load("bad.md")).rejects.toBeInstanceOf(EncodingError);
    const doc = await store.loadOrEmpty("bad.md");
    expect(doc.title).toBe("bad");
    expect(doc.body).toBe("");
    expect(doc.tokens.map((t) => t.term)).toEqual(["bad"]);
  });

  it("returns raw bytes unchanged, byte order mark included", async () => {
    const bytes = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from("# Hi\r\nthere", "utf8")]);
    const { store } = await setup({ "bom.md": bytes });

    expect((await store.readRaw("bom.md")).equals(bytes)).toBe(true);
    const doc = await store.load("bom.md");
    expect(Buffer.from(doc.raw, "utf8").equals(bytes)).toBe(true);
  });
});
