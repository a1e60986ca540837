import { describe, expect, it } from "vitest";
import { queryTerms, stemTerm, tokenize } from "@mdlive/core";

describe("tokenize", () => {
  it("lowercases words and records positions and offsets", () => {
    expect(tokenize("Hello, wörld 42", "body")).toEqual([
      { term: "hello", position: 0, offset: 0, field: "body" },
      { term: "wörld", position: 1, offset: 7, field: "body" },
      { term: "42", position: 2, offset: 13, field: "body" },
    ]);
  });

  it("returns nothing for punctuation only", () => {
    expect(tokenize("--- !!", "title")).toEqual([]);
  });
});

describe("stemTerm", () => {
  it.each([
    ["running", "runn"],
    ["linked", "link"],
    ["notes", "note"],
    ["boxes", "box"],
    ["class", "class"],
    ["status", "status"],
    ["cats", "cats"],
  ])("%s -> %s", (input, expected) => {
    expect(stemTerm(input)).toBe(expected);
  });
});

describe("queryTerms", () => {
  it("deduplicates after stemming", () => {
    expect(queryTerms("Notes note NOTE")).toEqual(["note"]);
  });
});
