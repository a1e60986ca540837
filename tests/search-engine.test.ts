import { beforeEach, describe, expect, it } from "vitest";
import { SearchEngine, buildDocument, excerpt } from "@mdlive/core";

function index(engine: SearchEngine, path: string, raw: string): void {
  engine.reindex(path, buildDocument(path, raw, 0));
}

describe("SearchEngine", () => {
  let engine: SearchEngine;

  beforeEach(() => {
    engine = new SearchEngine();
    index(engine, "notes/alpha.md", "# Alpha\nThe quick brown fox.");
    index(engine, "notes/beta.md", "# Beta\nAlpha particles everywhere.");
    index(engine, "gamma.md", "# Alpha Centauri\nA star system.");
  });

  it("ranks exact titles, then title matches, then body matches", () => {
    const hits = engine.query("alpha");
    expect(hits.map((h) => h.path)).toEqual(["notes/alpha.md", "gamma.md", "notes/beta.md"]);
    expect(hits[0]?.score).toBeCloseTo(3 + 8 / 9);
    expect(hits[0]?.snippet).toBe("# Alpha The quick brown fox.");
  });

  it("is case insensitive", () => {
    expect(engine.query("ALPHA CENTAURI").map((h) => h.path)).toEqual(["gamma.md"]);
  });

  it("matches all terms in any order", () => {
    expect(engine.query("brown quick").map((h) => h.path)).toEqual(["notes/alpha.md"]);
  });

  it("matches through stemming", () => {
    expect(engine.query("foxes").map((h) => h.path)).toEqual(["notes/alpha.md"]);
  });

  it("returns nothing for an empty query or a zero limit", () => {
    expect(engine.query("")).toEqual([]);
    expect(engine.query("   ")).toEqual([]);
    expect(engine.query("alpha", 0)).toEqual([]);
    expect(engine.query("alpha", 1).map((h) => h.path)).toEqual(["notes/alpha.md"]);
  });

  it("breaks ties by path", () => {
    const tied = new SearchEngine();
    index(tied, "b.md", "shared words");
    index(tied, "a.md", "shared words");
    expect(tied.query("shared").map((h) => h.path)).toEqual(["a.md", "b.md"]);
  });

  it("forgets removed documents", () => {
    engine.remove("notes/alpha.md");
    expect(engine.query("fox")).toEqual([]);
    expect(engine.entriesFor("notes/alpha.md").size).toBe(0);
    expect(engine.has("notes/alpha.md")).toBe(false);
    expect(engine.size).toBe(2);
  });

  it("replaces entries on reindex instead of adding to them", () => {
    const before = engine.entriesFor("notes/alpha.md");
    index(engine, "notes/alpha.md", "# Alpha\nThe quick brown fox.");
    expect(engine.entriesFor("notes/alpha.md")).toEqual(before);
    expect(engine.query("alpha")).toHaveLength(3);

    index(engine, "notes/alpha.md", "# Alpha\nA slow grey cat.");
    expect(engine.query("fox")).toEqual([]);
    expect(engine.query("grey").map((h) => h.path)).toEqual(["notes/alpha.md"]);
  });
});

describe("excerpt", () => {
  it("collapses whitespace and marks cut ends", () => {
    const text = `${"a".repeat(100)} needle\n\nafter ${"b".repeat(200)}`;
    const snippet = excerpt(text, 101, 20);
    expect(snippet).toBe(`…${"a".repeat(20)}…`);
  });

  it("leaves short text whole", () => {
    expect(excerpt("short  text", 0)).toBe("short text");
  });
});
