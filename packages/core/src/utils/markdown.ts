import matter from "gray-matter";
import { unified } from "unified";
import remarkParse from "remark-parse";
import remarkGfm from "remark-gfm";
import remarkRehype from "remark-rehype";
import rehypeStringify from "rehype-stringify";
import type { Heading, NoteFrontmatter } from "../types/notes.ts";
import { debug } from "./logger.ts";

const WIKILINK = /\[\[([^\]|]+)(?:\|([^\]]+))?\]\]/g;
const FENCE = /^\s{0,3}(`{3,}|~{3,})/;
const ATX_HEADING = /^\s{0,3}(#{1,6})\s+(.+?)(?:\s+#+)?\s*$/;

const processor = unified()
  .use(remarkParse)
  .use(remarkGfm)
  .use(remarkRehype, { allowDangerousHtml: true })
  .use(rehypeStringify, { allowDangerousHtml: true });

/**
 * Markdown to HTML with GitHub extensions and `[[wikilinks]]`.
 * Raw HTML in the source is passed through untouched.
 */
export function renderMarkdown(markdown: string): string {
  return String(processor.processSync(rewriteWikilinks(markdown)));
}

/** `[[target|label]]` → `[label](</target.md>)` */
export function rewriteWikilinks(content: string): string {
  return content.replace(WIKILINK, (_match, target: string, label: string | undefined) => {
    const trimmed = target.trim();
    const href = trimmed.endsWith(".md") ? `/${trimmed}` : `/${trimmed}.md`;
    return `[${label ?? trimmed}](<${href}>)`;
  });
}

export function parseFrontmatter(content: string): {
  data: NoteFrontmatter;
  body: string;
} {
  try {
    const { data, content: body } = matter(content);
    return { data: { ...data }, body };
  } catch (e) {
    // Unparseable YAML: treat the block as ordinary markdown.
    debug("frontmatter parse failed:", e instanceof Error ? e.message : String(e));
    return { data: {}, body: content };
  }
}

export function extractWikilinks(content: string): string[] {
  const links: string[] = [];
  for (const match of content.matchAll(WIKILINK)) {
    if (match[1]) links.push(match[1].trim());
  }
  return [...new Set(links)];
}

/** ATX headings outside fenced code blocks. */
export function extractHeadings(content: string): Heading[] {
  const headings: Heading[] = [];
  let fence: string | null = null;

  for (const line of content.split(/\r?\n/)) {
    const fenceMatch = FENCE.exec(line);
    if (fenceMatch?.[1]) {
      const marker = fenceMatch[1];
      if (fence === null) {
        fence = marker;
      } else if (marker[0] === fence[0] && marker.length >= fence.length) {
        fence = null;
      }
      continue;
    }
    if (fence !== null) continue;

    const match = ATX_HEADING.exec(line);
    if (match?.[1] && match[2]) {
      headings.push({ level: match[1].length, text: match[2].trim() });
    }
  }

  return headings;
}

/** First level-1 heading, else the filename without its extension. */
export function deriveTitle(headings: Heading[], fallback: string): string {
  const first = headings.find((h) => h.level === 1);
  return first ? first.text : fallback;
}
