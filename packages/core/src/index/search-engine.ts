import type { Document, NotePath } from "../types/notes.ts";
import type { SearchHit, SearchPosting } from "../types/search.ts";
import { queryTerms } from "../utils/tokenize.ts";

export const DEFAULT_SEARCH_LIMIT = 50;
export const SNIPPET_LENGTH = 160;
const SNIPPET_LEAD = 60;

/** Ranking tiers; a hit's score is its tier plus a fraction below 1. */
const EXACT_TITLE = 3;
const TITLE_MATCH = 2;
const BODY_MATCH = 1;
const TITLE_WEIGHT = 3;

interface IndexedDocument {
  title: string;
  titleLower: string;
  body: string;
  bodyLower: string;
  /** Terms with postings for this path; what `remove` has to clean up. */
  terms: Map<string, SearchPosting>;
  /** First body offset of each term, for snippets. */
  firstOffsets: Map<string, number>;
}

/**
 * Inverted index over Document tokens with a substring fallback over
 * titles and bodies. Entries are replaced per path, never merged.
 */
export class SearchEngine {
  private readonly postings = new Map<string, Map<NotePath, SearchPosting>>();
  private readonly docs = new Map<NotePath, IndexedDocument>();

  constructor(private readonly defaultLimit = DEFAULT_SEARCH_LIMIT) {}

  get size(): number {
    return this.docs.size;
  }

  has(path: NotePath): boolean {
    return this.docs.has(path);
  }

  /** Replaces every entry for `path` with entries built from `doc`. */
  reindex(path: NotePath, doc: Document): void {
    this.remove(path);

    const terms = new Map<string, SearchPosting>();
    const firstOffsets = new Map<string, number>();
    for (const token of doc.tokens) {
      let posting = terms.get(token.term);
      if (!posting) {
        posting = { weight: 0, titleHits: 0, bodyHits: 0 };
        terms.set(token.term, posting);
      }
      if (token.field === "title") {
        posting.titleHits++;
        posting.weight += TITLE_WEIGHT;
      } else {
        posting.bodyHits++;
        posting.weight += 1;
        if (!firstOffsets.has(token.term)) firstOffsets.set(token.term, token.offset);
      }
    }

    for (const [term, posting] of terms) {
      let byPath = this.postings.get(term);
      if (!byPath) {
        byPath = new Map();
        this.postings.set(term, byPath);
      }
      byPath.set(path, posting);
    }

    this.docs.set(path, {
      title: doc.title,
      titleLower: doc.title.toLowerCase(),
      body: doc.body,
      bodyLower: doc.body.toLowerCase(),
      terms,
      firstOffsets,
    });
  }

  remove(path: NotePath): void {
    const existing = this.docs.get(path);
    if (!existing) return;

    for (const term of existing.terms.keys()) {
      const byPath = this.postings.get(term);
      if (!byPath) continue;
      byPath.delete(path);
      if (byPath.size === 0) this.postings.delete(term);
    }
    this.docs.delete(path);
  }

  clear(): void {
    this.postings.clear();
    this.docs.clear();
  }

  /** Postings currently held for one path, keyed by term. */
  entriesFor(path: NotePath): Map<string, SearchPosting> {
    const out = new Map<string, SearchPosting>();
    for (const [term, byPath] of this.postings) {
      const posting = byPath.get(path);
      if (posting) out.set(term, { ...posting });
    }
    return out;
  }

  /**
   * Case-insensitive search over titles and bodies. A note matches when the
   * whole query is a substring of its title or body, or when every query
   * term is one of its tokens.
   */
  query(text: string, limit = this.defaultLimit): SearchHit[] {
    const needle = text.trim().toLowerCase();
    if (needle === "" || limit <= 0) return [];

    const terms = queryTerms(needle);
    const candidates = new Set<NotePath>();
    for (const term of terms) {
      for (const path of this.postings.get(term)?.keys() ?? []) candidates.add(path);
    }
    for (const [path, doc] of this.docs) {
      if (doc.titleLower.includes(needle) || doc.bodyLower.includes(needle)) candidates.add(path);
    }

    const hits: SearchHit[] = [];
    for (const path of candidates) {
      const doc = this.docs.get(path);
      if (!doc) continue;
      const hit = this.score(path, doc, needle, terms);
      if (hit) hits.push(hit);
    }

    hits.sort((a, b) => b.score - a.score || (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    return hits.slice(0, limit);
  }

  private score(path: NotePath, doc: IndexedDocument, needle: string, terms: string[]): SearchHit | null {
    const matched = terms.filter((term) => doc.terms.has(term));
    const allTerms = terms.length > 0 && matched.length === terms.length;
    const titleSubstring = doc.titleLower.includes(needle);
    const bodyOccurrences = countOccurrences(doc.bodyLower, needle);

    if (!allTerms && !titleSubstring && bodyOccurrences === 0) return null;

    let titleHits = titleSubstring ? 1 : 0;
    let bodyHits = bodyOccurrences;
    if (allTerms) {
      for (const term of matched) {
        const posting = doc.terms.get(term);
        if (!posting) continue;
        titleHits += posting.titleHits;
        bodyHits += posting.bodyHits;
      }
    }

    let tier: number;
    let strength: number;
    if (doc.titleLower.trim() === needle) {
      tier = EXACT_TITLE;
      strength = titleHits * TITLE_WEIGHT + bodyHits;
    } else if (titleHits > 0) {
      tier = TITLE_MATCH;
      strength = titleHits * TITLE_WEIGHT + bodyHits;
    } else {
      tier = BODY_MATCH;
      strength = bodyHits;
    }

    return {
      path,
      title: doc.title,
      snippet: this.snippet(doc, needle, matched),
      score: tier + strength / (strength + 1),
    };
  }

  private snippet(doc: IndexedDocument, needle: string, matched: string[]): string {
    let at = doc.bodyLower.indexOf(needle);
    if (at === -1) {
      const offsets = matched
        .map((term) => doc.firstOffsets.get(term))
        .filter((offset): offset is number => offset !== undefined);
      at = offsets.length > 0 ? Math.min(...offsets) : 0;
    }
    return excerpt(doc.body, at);
  }
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

/** Whitespace-collapsed window of `text` around `at`, with `…` where it was cut. */
export function excerpt(text: string, at: number, length = SNIPPET_LENGTH): string {
  const start = Math.max(0, Math.min(at - SNIPPET_LEAD, text.length - length));
  const end = Math.min(text.length, start + length);
  const window = text.slice(start, end).replace(/\s+/g, " ").trim();
  return `${start > 0 ? "…" : ""}${window}${end < text.length ? "…" : ""}`;
}
