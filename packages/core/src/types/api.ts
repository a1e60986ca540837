/** Shared request/response types for server↔browser communication. */

import type { Heading, NoteFrontmatter, TreeNode } from "./notes.ts";
import type { SearchHit } from "./search.ts";

export interface SaveRequest {
  path: string;
  content: string;
}

export type SaveResponse = { success: true } | { success: false; error: string };

export interface TreeResponse {
  path: string;
  children: TreeNode[];
}

export interface NoteResponse {
  path: string;
  title: string;
  html: string;
  frontmatter: NoteFrontmatter;
  headings: Heading[];
}

export interface SearchResponse {
  query: string;
  results: SearchHit[];
}

export interface HealthResponse {
  status: "ok";
  root: string;
  pid: number;
  liveReload: "active" | "disabled";
  notes: number;
}

export interface ErrorResponse {
  error: string;
}
