import type { NotePath } from "./notes.ts";

export interface SearchHit {
  path: NotePath;
  title: string;
  snippet: string;
  score: number;
}

export interface SearchPosting {
  weight: number;
  titleHits: number;
  bodyHits: number;
}
