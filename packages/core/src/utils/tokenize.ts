import type { Token, TokenField } from "../types/notes.ts";

const WORD = /[\p{L}\p{N}]+/gu;

/**
 * Light English suffix stripping. Query terms go through the same
 * function, so the only requirement is that it is deterministic.
 */
export function stemTerm(term: string): string {
  if (term.length <= 4) return term;
  if (term.endsWith("ing") && term.length - 3 >= 3) return term.slice(0, -3);
  if (term.endsWith("ed") && term.length - 2 >= 3) return term.slice(0, -2);
  if (/(?:[sxz]|ch|sh)es$/.test(term)) return term.slice(0, -2);
  if (term.endsWith("s") && !/(?:ss|us|is)$/.test(term)) return term.slice(0, -1);
  return term;
}

export function tokenize(text: string, field: TokenField): Token[] {
  const tokens: Token[] = [];
  let position = 0;

  for (const match of text.matchAll(WORD)) {
    tokens.push({
      term: stemTerm(match[0].toLowerCase()),
      position: position++,
      offset: match.index ?? 0,
      field,
    });
  }

  return tokens;
}

/** Distinct stemmed terms of a query, in order of first appearance. */
export function queryTerms(text: string): string[] {
  return [...new Set(tokenize(text, "body").map((t) => t.term))];
}
