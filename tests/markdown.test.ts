import { describe, expect, it } from "vitest";
import {
  deriveTitle,
  extractHeadings,
  extractWikilinks,
  parseFrontmatter,
  renderMarkdown,
  rewriteWikilinks,
} from "@mdlive/core";

describe("rewriteWikilinks", () => {
  it("links to the target note", () => {
    expect(rewriteWikilinks("see [[Other Note]]")).toBe("see [Other Note](</Other Note.md>)");
  });

  it("uses the label and keeps an explicit extension", () => {
    expect(rewriteWikilinks("[[dir/page.md|the page]]")).toBe("[the page](</dir/page.md>)");
  });
});

describe("renderMarkdown", () => {
  it("renders wikilinks as anchors", () => {
    expect(renderMarkdown("[[target|label]]")).toBe('<p><a href="/target.md">label</a></p>');
  });

  it("passes raw html through", () => {
    expect(renderMarkdown('<div class="x">hi</div>')).toBe('<div class="x">hi</div>');
  });

  it("supports tables", () => {
    expect(renderMarkdown("| a |\n| - |\n| 1 |")).toContain("<table>");
  });

  it("gives the same output for the same input", () => {
    const source = "# Title\n\n- [ ] task\n- [x] done\n\n~~gone~~ and [[link]]\n";
    expect(renderMarkdown(source)).toBe(renderMarkdown(source));
  });
});

describe("parseFrontmatter", () => {
  it("splits yaml data from the body", () => {
    const { data, body } = parseFrontmatter("---\ntitle: Plan\ntags: [work]\n---\n# Body\n");
    expect(data).toEqual({ title: "Plan", tags: ["work"] });
    expect(body).toBe("# Body\n");
  });

  it("treats broken yaml as plain markdown", () => {
    const raw = "---\ntitle: [unclosed\n---\nbody\n";
    expect(parseFrontmatter(raw)).toEqual({ data: {}, body: raw });
  });
});

describe("headings and titles", () => {
  it("skips headings inside fenced code", () => {
    expect(extractHeadings("# A\n```\n# not a heading\n```\n## B ##\n")).toEqual([
      { level: 1, text: "A" },
      { level: 2, text: "B" },
    ]);
  });

  it("prefers the first level one heading", () => {
    expect(deriveTitle([{ level: 2, text: "Sub" }, { level: 1, text: "Main" }], "file")).toBe("Main");
    expect(deriveTitle([{ level: 2, text: "Sub" }], "file")).toBe("file");
  });

  it("collects unique wikilink targets", () => {
    expect(extractWikilinks("[[a]] [[ b |x]] [[a]]")).toEqual(["a", "b"]);
  });
});
