import { describe, expect, it } from "vitest";
import {
  InvalidPathError,
  baseName,
  fromAbsolute,
  isMarkdownPath,
  isWithin,
  joinNotePath,
  normalizeNotePath,
  parentOf,
  stem,
  toAbsolute,
} from "@mdlive/core";

describe("normalizeNotePath", () => {
  it("drops empty and dot segments", () => {
    expect(normalizeNotePath("/a//./b.md/")).toBe("a/b.md");
    expect(normalizeNotePath("")).toBe("");
    expect(normalizeNotePath("/")).toBe("");
  });

  it.each(["../outside.md", "a/../b.md", "C:/notes/x.md", "a\\b.md", "a\0b.md"])(
    "rejects %j",
    (input) => {
      expect(() => normalizeNotePath(input)).toThrow(InvalidPathError);
    },
  );

  it("keeps names that merely start with dots", () => {
    expect(normalizeNotePath("..notes/a.md")).toBe("..notes/a.md");
  });
});

describe("path helpers", () => {
  it("splits parents and names", () => {
    expect(parentOf("a/b/c.md")).toBe("a/b");
    expect(parentOf("c.md")).toBe("");
    expect(baseName("a/b/c.md")).toBe("c.md");
    expect(stem("a/My Note.md")).toBe("My Note");
    expect(joinNotePath("", "x.md")).toBe("x.md");
    expect(joinNotePath("a", "x.md")).toBe("a/x.md");
  });

  it("recognises markdown files", () => {
    expect(isMarkdownPath("a.md")).toBe(true);
    expect(isMarkdownPath("dir/.md")).toBe(false);
    expect(isMarkdownPath("a.markdown")).toBe(false);
    expect(isMarkdownPath("a.md.bak")).toBe(false);
  });

  it("tests containment by whole segments", () => {
    expect(isWithin("a/b.md", "a")).toBe(true);
    expect(isWithin("ab/c.md", "a")).toBe(false);
    expect(isWithin("anything", "")).toBe(true);
  });

  it("maps between absolute locations and note paths", () => {
    const abs = toAbsolute("/srv/notes", "a/b.md");
    expect(abs).toBe("/srv/notes/a/b.md");
    expect(fromAbsolute("/srv/notes", abs)).toBe("a/b.md");
    expect(fromAbsolute("/srv/notes", "/srv/notes")).toBe("");
    expect(fromAbsolute("/srv/notes", "/srv/notes/..draft.md")).toBe("..draft.md");
    expect(() => fromAbsolute("/srv/notes", "/srv/other/x.md")).toThrow(InvalidPathError);
  });
});
